import { HttpClient, logCall } from '@kube-control/http-core';
import type { Logger, QueryParams, RequestDescriptor } from '@kube-control/http-core';
import { jobListSchema, jobSchema, podListSchema, podSchema } from './types';
import type { Job, KubeClientConfig, Pod, Secret } from './types';

/**
 * Builds a label selector from a label map: `k = v` pairs joined by commas.
 */
export function labelsToSelector(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key} = ${value}`)
    .join(',');
}

const segment = (value: string): string => encodeURIComponent(value);

/**
 * Kubernetes API client scoped to a single namespace.
 *
 * Every call goes through one retrying HttpClient; transport failures are
 * retried, HTTP failures are not. A 409 surfaces as ConflictError so callers
 * can re-read and reapply.
 */
export class KubeClient {
  readonly namespace: string;
  private readonly logger?: Logger;
  private readonly http: HttpClient;

  constructor(config: KubeClientConfig) {
    const frozen = Object.freeze({ ...config });
    this.namespace = frozen.namespace;
    this.logger = frozen.logger;
    this.http = new HttpClient({
      baseUrl: frozen.baseUrl,
      token: frozen.token,
      fake: frozen.fake,
      transport: frozen.transport,
      retry: frozen.retry,
      logger: frozen.logger,
    });
  }

  get isFake(): boolean {
    return this.http.isFake;
  }

  private log(methodName: string, ...args: unknown[]): void {
    logCall(this.logger, methodName, ...args);
  }

  private corePath(resource: string, name?: string): string {
    const base = `/api/v1/namespaces/${segment(this.namespace)}/${resource}`;
    return name === undefined ? base : `${base}/${segment(name)}`;
  }

  private batchPath(resource: string, name?: string): string {
    const base = `/apis/batch/v1/namespaces/${segment(this.namespace)}/${resource}`;
    return name === undefined ? base : `${base}/${segment(name)}`;
  }

  private selectorQuery(labels: Record<string, string>): QueryParams {
    return { labelSelector: labelsToSelector(labels) };
  }

  // ==========================================================================
  // Pods
  // ==========================================================================

  async getPod(name: string): Promise<Pod> {
    this.log('getPod', name);
    return this.http.request({ method: 'GET', path: this.corePath('pods', name) }, podSchema);
  }

  async listPods(labels: Record<string, string>): Promise<Pod[]> {
    this.log('listPods', labels);
    const list = await this.http.request(
      { method: 'GET', path: this.corePath('pods'), query: this.selectorQuery(labels) },
      podListSchema,
    );
    return list.items ?? [];
  }

  async createPod(pod: Pod): Promise<Pod> {
    this.log('createPod', pod);
    return this.http.request({ method: 'POST', path: this.corePath('pods'), body: pod }, podSchema);
  }

  async deletePod(name: string): Promise<void> {
    this.log('deletePod', name);
    await this.http.request({ method: 'DELETE', path: this.corePath('pods', name) });
  }

  /**
   * Full log of the pod's container, buffered.
   */
  async getLog(pod: string): Promise<Uint8Array> {
    this.log('getLog', pod);
    const descriptor: RequestDescriptor = { method: 'GET', path: `${this.corePath('pods', pod)}/log` };
    return this.http.execute(descriptor);
  }

  // ==========================================================================
  // Jobs
  // ==========================================================================

  async getJob(name: string): Promise<Job> {
    this.log('getJob', name);
    return this.http.request({ method: 'GET', path: this.batchPath('jobs', name) }, jobSchema);
  }

  async listJobs(labels: Record<string, string>): Promise<Job[]> {
    this.log('listJobs', labels);
    const list = await this.http.request(
      { method: 'GET', path: this.batchPath('jobs'), query: this.selectorQuery(labels) },
      jobListSchema,
    );
    return list.items ?? [];
  }

  async createJob(job: Job): Promise<Job> {
    this.log('createJob', job);
    return this.http.request({ method: 'POST', path: this.batchPath('jobs'), body: job }, jobSchema);
  }

  async deleteJob(name: string): Promise<void> {
    this.log('deleteJob', name);
    await this.http.request({ method: 'DELETE', path: this.batchPath('jobs', name) });
  }

  async patchJob(name: string, job: Job): Promise<Job> {
    this.log('patchJob', name, job);
    return this.http.request({ method: 'PATCH', path: this.batchPath('jobs', name), body: job }, jobSchema);
  }

  async patchJobStatus(name: string, job: Job): Promise<Job> {
    this.log('patchJobStatus', name, job);
    return this.http.request(
      { method: 'PATCH', path: `${this.batchPath('jobs', name)}/status`, body: job },
      jobSchema,
    );
  }

  // ==========================================================================
  // Secrets
  // ==========================================================================

  async replaceSecret(name: string, secret: Secret): Promise<void> {
    // The secret itself stays out of the logs.
    this.log('replaceSecret', name);
    await this.http.request({ method: 'PUT', path: this.corePath('secrets', name), body: secret });
  }
}
