import { EncodeError } from './errors';
import type { HttpClientConfig, HttpHeaders, HttpTransport, RequestDescriptor, TransportRequest, TransportResponse } from './types';

export const JSON_CONTENT_TYPE = 'application/json';
export const MERGE_PATCH_CONTENT_TYPE = 'application/strategic-merge-patch+json';

export function normalizeBaseUrl(value: string): string {
  const trimmed = value.trim();
  return trimmed.replace(/\/+$/, '');
}

export function buildUrl(baseUrl: string, descriptor: RequestDescriptor): string {
  const url = `${normalizeBaseUrl(baseUrl)}${descriptor.path}`;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(descriptor.query ?? {})) {
    params.set(key, value);
  }
  const search = params.toString();
  return search ? `${url}?${search}` : url;
}

function serializeBody(body: unknown): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  try {
    return JSON.stringify(body);
  } catch (error) {
    throw new EncodeError(
      `request body could not be serialized: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * Turns a descriptor into the exact request a transport sends: bearer auth,
 * content type by method, URL-encoded query and a JSON body when there is one.
 */
export function buildTransportRequest(
  config: Pick<HttpClientConfig, 'baseUrl' | 'token'>,
  descriptor: RequestDescriptor,
): TransportRequest {
  const headers: HttpHeaders = {
    Authorization: `Bearer ${config.token}`,
    'Content-Type': descriptor.method === 'PATCH' ? MERGE_PATCH_CONTENT_TYPE : JSON_CONTENT_TYPE,
    Accept: JSON_CONTENT_TYPE,
  };

  const request: TransportRequest = {
    method: descriptor.method,
    url: buildUrl(config.baseUrl, descriptor),
    headers,
  };

  const body = serializeBody(descriptor.body);
  if (body !== undefined) {
    request.body = body;
  }
  return request;
}

/**
 * Issues exactly one request. No retries and no status classification here.
 */
export function invoke(transport: HttpTransport, request: TransportRequest): Promise<TransportResponse> {
  return transport(request);
}
