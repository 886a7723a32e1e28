import { readFile } from 'fs/promises';
import path from 'path';
import { DomainName } from '../names';
import type { HostsCacheOptions } from '../types';
import { clearFullDomain, isValidIp, normalizeIp } from '../utils';

// how long a loaded hosts file is trusted
export const HOSTS_MAX_AGE = 5_000;

// system hosts file location, null when it cannot be determined
export function defaultHostsPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string | null {
  if (platform !== 'win32') return '/etc/hosts';
  const systemRoot = env.SystemRoot;
  return systemRoot ? path.win32.join(systemRoot, 'System32', 'drivers', 'etc', 'hosts') : null;
}

export const DEFAULT_HOSTS_OPTIONS: HostsCacheOptions = {
  path: defaultHostsPath() ?? '/etc/hosts',
  maxAge: HOSTS_MAX_AGE,
  now: () => Date.now(),
  readFile: file => readFile(file, 'utf8'),
};

/**
 * Parse hosts file text into a name => address table.
 *
 * Comments start at '#'. A line needs an address and at least one name;
 * lines whose address does not parse are skipped with a warning. Names are
 * lower-cased, and a later line wins over an earlier one for the same name.
 */
export function parseHosts(text: string): Map<string, string> {
  const table = new Map<string, string>();
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.split('#')[0].trim();
    if (!line) continue;

    const fields = line.split(/\s+/);
    if (fields.length < 2) continue;

    const [address, ...names] = fields;
    if (!isValidIp(address)) {
      console.warn(`could not parse ip from hosts file: ${address}`);
      continue;
    }

    for (const name of names.map(domain => domain.toLowerCase())) {
      if (DomainName.verify(name)) {
        table.set(name, normalizeIp(address));
      }
    }
  }
  return table;
}

// static name => address table read from the hosts file, refreshed after maxAge
export class HostsCache {
  private options: HostsCacheOptions;
  private table: Map<string, string>;
  private expires: number;
  private loading: Promise<void> | null;

  constructor(opts: Partial<HostsCacheOptions> = {}) {
    this.options = { ...DEFAULT_HOSTS_OPTIONS, ...opts };
    this.table = new Map();
    this.expires = -Infinity;
    this.loading = null;
  }

  async get(name: string): Promise<string | null> {
    if (this.options.now() > this.expires) {
      await this.reload();
    }
    return this.table.get(clearFullDomain(name.toLowerCase())) ?? null;
  }

  // read the file again, concurrent callers share one read
  async reload(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return await this.loading;
  }

  // a failed read leaves the table empty and the expiry alone, so the next get retries
  private async load(): Promise<void> {
    this.table.clear();
    try {
      const text = await this.options.readFile(this.options.path);
      this.table = parseHosts(text);
      this.expires = this.options.now() + this.options.maxAge;
    } catch (error) {
      console.error(`load system hosts failed: ${this.options.path}`, error);
    }
  }

  size(): number {
    return this.table.size;
  }
}
