export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string>;

/**
 * One logical call against the API. Frozen before it reaches the retry loop,
 * so every attempt sends the same request.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: Readonly<QueryParams>;
  readonly body?: unknown;
}

/**
 * Transport layer request, already serialized.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

/**
 * A live response handed back by a transport. The caller owns the body:
 * `read()` buffers it, `close()` releases whatever the transport holds open.
 */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: HttpHeaders;
  read(): Promise<Uint8Array>;
  close(): Promise<void>;
}

/**
 * HTTP transport abstraction. A rejected promise is a transport failure and is
 * the only thing the retry loop retries; HTTP error statuses must resolve.
 */
export interface HttpTransport {
  (req: TransportRequest): Promise<TransportResponse>;
}

/**
 * Single-method logging capability. A missing logger disables logging.
 */
export interface Logger {
  printf(format: string, ...args: unknown[]): void;
}

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicy {
  maxAttempts?: number;     // Default: 8
  initialDelayMs?: number;  // Default: 2_000, doubled after every failed attempt
  sleep?: Sleep;            // Default: timers/promises setTimeout
}

export interface HttpClientConfig {
  baseUrl: string;
  /** Bearer credential. Sent on every request, never logged. */
  token: string;
  /** Short-circuit every call to an empty JSON object without any I/O. */
  fake?: boolean;
  transport?: HttpTransport;
  retry?: RetryPolicy;
  logger?: Logger;
}
