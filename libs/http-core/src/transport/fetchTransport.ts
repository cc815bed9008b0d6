import type { HttpHeaders, HttpTransport, TransportRequest, TransportResponse } from '../types';

/**
 * fetch-based HTTP transport.
 * Rejects only on network failure; every HTTP status resolves.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest): Promise<TransportResponse> => {
  const response = await fetch(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
  });

  // Convert Headers object to plain object
  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    statusText: response.statusText,
    headers,
    read: async () => new Uint8Array(await response.arrayBuffer()),
    close: async () => {
      if (response.body && !response.bodyUsed) {
        await response.body.cancel();
      }
    },
  };
};
