export * from './types';
export { HttpClient, DEFAULT_INITIAL_DELAY_MS, DEFAULT_MAX_ATTEMPTS } from './HttpClient';
export { ConflictError, DecodeError, EncodeError, HttpError, isConflictError, isRequestError } from './errors';
export type { RequestError } from './errors';
export { buildTransportRequest, buildUrl, invoke, JSON_CONTENT_TYPE, MERGE_PATCH_CONTENT_TYPE } from './invoker';
export { interpretResponse } from './responseInterpreter';
export { consoleLogger, logCall } from './logger';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
