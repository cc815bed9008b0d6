/**
 * The API answered 409: an optimistic-concurrency conflict. Callers that want
 * to re-fetch and reapply branch on this kind; the client never retries it.
 */
export class ConflictError extends Error {
  readonly kind = 'conflict' as const;
  readonly status = 409;

  constructor(public readonly body: string) {
    super(`conflict: body "${body}"`);
    this.name = 'ConflictError';
  }
}

/**
 * Any other non-2xx response. Status text and body are echoed back.
 */
export class HttpError extends Error {
  readonly kind = 'http' as const;

  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
  ) {
    super(`response has status "${statusText}" and body "${body}"`);
    this.name = 'HttpError';
  }
}

/**
 * The server answered 2xx but the payload did not match the expected shape.
 */
export class DecodeError extends Error {
  readonly kind = 'decode' as const;

  constructor(
    message: string,
    public readonly body: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

/**
 * The request body could not be serialized to JSON.
 */
export class EncodeError extends Error {
  readonly kind = 'encode' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodeError';
  }
}

export type RequestError = ConflictError | HttpError | DecodeError | EncodeError;

export const isConflictError = (error: unknown): error is ConflictError => error instanceof ConflictError;

export const isRequestError = (error: unknown): error is RequestError =>
  error instanceof ConflictError ||
  error instanceof HttpError ||
  error instanceof DecodeError ||
  error instanceof EncodeError;
