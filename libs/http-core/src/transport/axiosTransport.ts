import type { Readable } from 'node:stream';
import type { AxiosInstance } from 'axios';
import type { HttpHeaders, HttpTransport, TransportRequest, TransportResponse } from '../types';

async function drain(stream: Readable): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return new Uint8Array(Buffer.concat(chunks));
}

/**
 * axios-based HTTP transport.
 * Streams the body so the caller decides when it is read and released, and
 * accepts every status so that only I/O failures reject.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstance): HttpTransport => {
  return async (req: TransportRequest): Promise<TransportResponse> => {
    const response = await axiosInstance.request<Readable>({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      responseType: 'stream',
      validateStatus: () => true,
    });

    // Normalize headers to plain object
    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (value !== undefined && value !== null) {
        headers[key] = Array.isArray(value) ? value.join(', ') : String(value);
      }
    }

    const stream = response.data;
    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      read: () => drain(stream),
      close: async () => {
        if (!stream.destroyed) {
          stream.destroy();
        }
      },
    };
  };
};
