import { DnsCodec, toDnsError, udpExchange } from '../src/index';

// process command line arguments
const args = process.argv.slice(2);
const query = args[0] || 'example.com';
const recordType = args[1] || 'A';
const server = args[2] || '1.1.1.1';

async function main() {
  const codec = new DnsCodec({ edns: true });
  const request = codec.query(query, recordType);
  const response = await udpExchange(codec.encode(request), server, { bufferSize: 4096 });
  console.log(codec.format(codec.decode(response)));
}

main().catch(error => {
  const dnsError = toDnsError(error);
  console.error(`${dnsError.name} (${dnsError.code}): ${dnsError.message}`);
  process.exitCode = 1;
});
