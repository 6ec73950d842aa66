/**
 * Transport-level failures raised by the backend invoker
 */

/**
 * Options for a transport error
 */
export interface TransportErrorOptions {
  url: string;
  method: string;
  /** Underlying error code (ECONNREFUSED, UND_ERR_HEADERS_TIMEOUT, ...) */
  errorCode?: string;
  timedOut?: boolean;
  aborted?: boolean;
  cause?: unknown;
}

/**
 * A backend call that produced no HTTP response
 */
export class TransportError extends Error {
  readonly code = 'TRANSPORT_ERROR';
  readonly url: string;
  readonly method: string;
  readonly errorCode?: string;
  readonly timedOut: boolean;
  readonly aborted: boolean;

  constructor(message: string, options: TransportErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.url = options.url;
    this.method = options.method;
    this.errorCode = options.errorCode;
    this.timedOut = options.timedOut ?? false;
    this.aborted = options.aborted ?? false;
  }
}

/**
 * Type guard for TransportError
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
