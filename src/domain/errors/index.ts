/**
 * Error types shared by the client core
 *
 * ClientError and its subclasses are recoverable: the core turns them into
 * error messages inside a failed response. ProtocolError and ArgumentError are
 * contract violations and are never absorbed.
 */

export class ClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClientError';
  }
}

export type TransportErrorKind = 'connection' | 'auth' | 'rejected' | 'timeout' | 'aborted';

export class TransportError extends ClientError {
  constructor(message: string, readonly kind: TransportErrorKind) {
    super(message);
    this.name = 'TransportError';
  }
}

/** A user-supplied value (rate, URL, priority) could not be read */
export class InputError extends ClientError {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

/** The daemon returned a payload the client cannot interpret */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** A caller passed a selector or file selection of an unsupported shape */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Narrows a thrown value to a recoverable client error
 * Cancellations raised outside the transport count as transport failures too.
 */
export function asClientError(error: unknown): ClientError | null {
  if (error instanceof ClientError) {
    return error;
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TransportError(error.message || 'Request aborted', error.name === 'TimeoutError' ? 'timeout' : 'aborted');
  }
  return null;
}
