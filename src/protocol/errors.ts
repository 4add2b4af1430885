/**
 * Wire-level decode failures. They are scoped to a single request: the parser reports
 * them as values and the connection keeps going.
 */
export abstract class ProtocolError extends Error {
  abstract readonly code: 'MALFORMED' | 'ARRAY_TOO_LARGE' | 'BULK_TOO_LARGE' | 'INCOMPLETE';
}

export class MalformedFrameError extends ProtocolError {
  readonly code = 'MALFORMED';

  constructor(message: string) {
    super(message);
    this.name = 'MalformedFrameError';
  }
}

export class ArrayTooLargeError extends ProtocolError {
  readonly code = 'ARRAY_TOO_LARGE';

  constructor(readonly length: number, readonly limit: number) {
    super(`array length too large: ${length} > ${limit}`);
    this.name = 'ArrayTooLargeError';
  }
}

export class BulkTooLargeError extends ProtocolError {
  readonly code = 'BULK_TOO_LARGE';

  constructor(readonly index: number, readonly length: number, readonly limit: number) {
    super(`bulk string exceeds max length at index ${index}: ${length} > ${limit}`);
    this.name = 'BulkTooLargeError';
  }
}

/** The stream ended in the middle of a frame. */
export class IncompleteInputError extends ProtocolError {
  readonly code = 'INCOMPLETE';

  constructor(readonly pendingBytes: number) {
    super(`connection closed with ${pendingBytes} bytes of an incomplete request`);
    this.name = 'IncompleteInputError';
  }
}
