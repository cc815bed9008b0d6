/**
 * @kube-control/kube-client
 *
 * Namespace-scoped client for pods, jobs, secrets and pod logs.
 *
 * ## Usage
 *
 * ```typescript
 * import { createInClusterClient, isConflictError } from '@kube-control/kube-client';
 *
 * const client = await createInClusterClient('ci');
 * const patch = { metadata: { labels: { state: 'done' } } };
 *
 * try {
 *   await client.patchJob('build-42', patch);
 * } catch (error) {
 *   if (!isConflictError(error)) {
 *     throw error;
 *   }
 *   // somebody else updated the job: re-read and reapply
 *   await client.getJob('build-42');
 *   await client.patchJob('build-42', patch);
 * }
 * ```
 *
 * Tests can use `createFakeClient()`, which runs the same code path without
 * any I/O.
 */

export * from './types';
export { KubeClient, labelsToSelector } from './kubeClient';
export {
  createFakeClient,
  createInClusterClient,
  createKubeClientFromEnv,
  parseCaBundle,
  DEFAULT_NAMESPACE,
  IN_CLUSTER_BASE_URL,
  SERVICE_ACCOUNT_CA_PATH,
  SERVICE_ACCOUNT_TOKEN_PATH,
} from './factory';
export {
  ConflictError,
  DecodeError,
  EncodeError,
  HttpError,
  consoleLogger,
  isConflictError,
  isRequestError,
} from '@kube-control/http-core';
export type { Logger, RetryPolicy, RequestError } from '@kube-control/http-core';
