import { setTimeout as sleep } from 'timers/promises';
import type { ZodType, ZodTypeDef } from 'zod';
import { DecodeError } from './errors';
import { buildTransportRequest, invoke } from './invoker';
import { decodeText, interpretResponse } from './responseInterpreter';
import { fetchTransport } from './transport/fetchTransport';
import type {
  HttpClientConfig,
  HttpTransport,
  Logger,
  RequestDescriptor,
  Sleep,
  TransportResponse,
} from './types';

export const DEFAULT_MAX_ATTEMPTS = 8;
export const DEFAULT_INITIAL_DELAY_MS = 2_000;

const EMPTY_OBJECT = '{}';
const encoder = new TextEncoder();

const defaultSleep: Sleep = async (ms) => {
  await sleep(ms);
};

const positiveIntegerOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isInteger(value) && value >= 1 ? value : fallback;

const nonNegativeOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback;

function freezeDescriptor(descriptor: RequestDescriptor): RequestDescriptor {
  if (Object.isFrozen(descriptor)) {
    return descriptor;
  }
  return Object.freeze({
    ...descriptor,
    query: descriptor.query ? Object.freeze({ ...descriptor.query }) : undefined,
  });
}

export class HttpClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fake: boolean;
  private readonly transport: HttpTransport;
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly sleep: Sleep;
  private readonly logger?: Logger;

  constructor(config: HttpClientConfig) {
    this.baseUrl = config.baseUrl;
    this.token = config.token;
    this.fake = config.fake ?? false;
    this.transport = config.transport ?? fetchTransport;
    // Values that cannot bound the loop fall back to the defaults.
    this.maxAttempts = positiveIntegerOr(config.retry?.maxAttempts, DEFAULT_MAX_ATTEMPTS);
    this.initialDelayMs = nonNegativeOr(config.retry?.initialDelayMs, DEFAULT_INITIAL_DELAY_MS);
    this.sleep = config.retry?.sleep ?? defaultSleep;
    this.logger = config.logger;
  }

  get isFake(): boolean {
    return this.fake;
  }

  /**
   * Performs a request and resolves once the outcome is known.
   *
   * Without a schema the body is drained and discarded. With one, the body is
   * parsed as JSON (an empty body counts as `{}`) and validated; a mismatch
   * rejects with {@link DecodeError} and is never retried.
   */
  async request(descriptor: RequestDescriptor): Promise<void>;
  async request<T>(descriptor: RequestDescriptor, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>;
  async request<T>(
    descriptor: RequestDescriptor,
    schema?: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T | void> {
    const bytes = await this.execute(descriptor);
    if (!schema) {
      return;
    }
    return this.decode(bytes, schema);
  }

  /**
   * Retry executor. Retries only when the transport itself fails, sleeping
   * initialDelayMs, then twice that, and so on between attempts. Once a
   * response arrives its status is final: 409 and every other non-2xx are
   * raised without another attempt. After the last failed attempt the
   * transport's own error is rethrown unchanged.
   */
  async execute(descriptor: RequestDescriptor): Promise<Uint8Array> {
    if (this.fake) {
      return encoder.encode(EMPTY_OBJECT);
    }

    const frozen = freezeDescriptor(descriptor);
    const request = buildTransportRequest({ baseUrl: this.baseUrl, token: this.token }, frozen);

    let response: TransportResponse | undefined;
    let lastError: unknown;
    let delay = this.initialDelayMs;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        response = await invoke(this.transport, request);
        break;
      } catch (error) {
        lastError = error;
        if (attempt === this.maxAttempts) {
          break;
        }
        this.logger?.printf(
          '%s %s failed (attempt %d of %d), retrying in %dms: %s',
          frozen.method,
          frozen.path,
          attempt,
          this.maxAttempts,
          delay,
          error instanceof Error ? error.message : String(error),
        );
        await this.sleep(delay);
        delay *= 2;
      }
    }

    if (!response) {
      throw lastError;
    }
    return interpretResponse(response, this.logger);
  }

  private decode<T>(bytes: Uint8Array, schema: ZodType<T, ZodTypeDef, unknown>): T {
    const text = bytes.length === 0 ? EMPTY_OBJECT : decodeText(bytes);

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(
        `response body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        text,
        { cause: error },
      );
    }

    const result = schema.safeParse(value);
    if (!result.success) {
      throw new DecodeError(`response body has unexpected shape: ${result.error.message}`, text, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
