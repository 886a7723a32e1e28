// convert any error to DnsError (preserves DnsError subclasses)
export function toDnsError(error: unknown): DnsError {
  // already a DnsError, return as-is
  if (error instanceof DnsError) {
    return error;
  }

  // extract message from Error or convert unknown to string
  const message =
    error instanceof Error ? error.message : String(error) || 'An unknown error occurred';

  const codedError = new DnsError(message);

  // if it's an Error, preserve the original error properties
  if (error instanceof Error) {
    codedError.name = error.name;
    codedError.stack = error.stack;
  }

  return codedError;
}

// base error class for all codec errors
// matches Node.js SystemError structure
export class DnsError extends Error {
  public code: number;
  public errno: number;
  public syscall: string;

  constructor(message: string) {
    super(message);
    this.name = 'DnsError';

    // SystemError-like properties
    // code: numeric error code (set by subclass property initializer or defaults to -1)
    // errno: numeric error code (always equals code)
    // syscall: always 'dns-wire'
    this.code = -1;
    this.errno = -1;
    this.syscall = 'dns-wire';

    Object.setPrototypeOf(this, new.target.prototype);

    // Maintain proper stack trace (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// fixed-width read ran past the end of the buffer
export class BufferTooSmallError extends DnsError {
  public code = 400; // Bad Request

  constructor(message = 'buffer size too small') {
    super(message);
    this.name = 'BufferTooSmallError';
    this.errno = this.code;
  }
}

// a declared length points past the end of the message
export class UnpackOverflowError extends DnsError {
  public code = 400; // Bad Request

  constructor(message: string) {
    super(message);
    this.name = 'UnpackOverflowError';
    this.errno = this.code;
  }
}

// rdata length disagrees with the cursor or the payload
export class InvalidRdLengthError extends DnsError {
  public code = 400; // Bad Request

  constructor(message = 'bad rdlength') {
    super(message);
    this.name = 'InvalidRdLengthError';
    this.errno = this.code;
  }
}

// length byte with the reserved 01/10 prefix
export class BadLabelError extends DnsError {
  public code = 400; // Bad Request

  constructor(message = 'bad label') {
    super(message);
    this.name = 'BadLabelError';
    this.errno = this.code;
  }
}

// compression pointer loop or chain deeper than allowed
export class TooMuchRecursionError extends DnsError {
  public code = 508; // Loop Detected

  constructor(message = 'TooMuchRecursion') {
    super(message);
    this.name = 'TooMuchRecursionError';
    this.errno = this.code;
  }
}

// a single label over 255 bytes, carries the offending label
export class LabelTooLongError extends DnsError {
  public code = 422; // Unprocessable Entity
  public label: string;

  constructor(label: string) {
    super(`label too long: ${label}`);
    this.name = 'LabelTooLongError';
    this.errno = this.code;
    this.label = label;
  }
}

// whole name over 255 wire octets
export class NameTooLongError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'NameTooLongError';
    this.errno = this.code;
  }
}

// malformed client-subnet option
export class InvalidSubnetError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'InvalidSubnetError';
    this.errno = this.code;
  }
}

// response code above 0xF without an OPT record to carry the high bits
export class BadExtendedResponseCodeError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message = 'extended response code requires an OPT record') {
    super(message);
    this.name = 'BadExtendedResponseCodeError';
    this.errno = this.code;
  }
}

// response code that does not fit in 12 bits
export class BadResponseCodeError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message = 'response code out of range') {
    super(message);
    this.name = 'BadResponseCodeError';
    this.errno = this.code;
  }
}

// opaque payload that is not valid hex
export class HexDecodeError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'HexDecodeError';
    this.errno = this.code;
  }
}

// a received datagram could not be decoded
export class ParsingError extends DnsError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'ParsingError';
    this.errno = this.code;
  }
}

// socket error on send or receive
export class ConnectionError extends DnsError {
  public code = 503; // Service Unavailable

  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
    this.errno = this.code;
  }
}

// AbortSignal cancellation error
export class AbortError extends DnsError {
  public code = 499; // Client Closed Request

  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
    this.errno = this.code;
  }
}
