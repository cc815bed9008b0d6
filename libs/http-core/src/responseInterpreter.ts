import { ConflictError, HttpError } from './errors';
import type { Logger, TransportResponse } from './types';

const decoder = new TextDecoder();

export const decodeText = (bytes: Uint8Array): string => decoder.decode(bytes);

export function formatStatus(response: Pick<TransportResponse, 'status' | 'statusText'>): string {
  return `${response.status} ${response.statusText}`.trim();
}

async function release(response: TransportResponse, logger: Logger | undefined): Promise<void> {
  try {
    await response.close();
  } catch (error) {
    // A failed release must not replace the outcome of the call.
    logger?.printf('failed to release response: %s', error instanceof Error ? error.message : String(error));
  }
}

/**
 * Buffers the whole body, releases the response on every path and maps the
 * status: 2xx yields the bytes, 409 a ConflictError, anything else an HttpError.
 */
export async function interpretResponse(response: TransportResponse, logger?: Logger): Promise<Uint8Array> {
  let body: Uint8Array;
  try {
    body = await response.read();
  } finally {
    await release(response, logger);
  }

  if (response.status === 409) {
    throw new ConflictError(decodeText(body));
  }
  if (response.status < 200 || response.status > 299) {
    throw new HttpError(response.status, formatStatus(response), decodeText(body));
  }
  return body;
}
