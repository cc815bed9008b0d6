import { readFile } from 'node:fs/promises';
import { X509Certificate } from 'node:crypto';
import { Agent } from 'node:https';
import axios from 'axios';
import { consoleLogger, createAxiosTransport, DEFAULT_INITIAL_DELAY_MS, DEFAULT_MAX_ATTEMPTS } from '@kube-control/http-core';
import type { Logger, RetryPolicy } from '@kube-control/http-core';
import { KubeClient } from './kubeClient';
import type { InClusterOptions, KubeClientConfig } from './types';

export const IN_CLUSTER_BASE_URL = 'https://kubernetes';
export const SERVICE_ACCOUNT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';
export const SERVICE_ACCOUNT_CA_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/ca.crt';
export const DEFAULT_NAMESPACE = 'default';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Creates a client that never touches the network: every call resolves with
 * an empty object (or its zero-value decoding).
 */
export function createFakeClient(options: { logger?: Logger } = {}): KubeClient {
  return new KubeClient({
    baseUrl: '',
    token: '',
    namespace: DEFAULT_NAMESPACE,
    fake: true,
    logger: options.logger,
  });
}

/**
 * Splits a PEM bundle into certificates and checks that each one parses.
 */
export function parseCaBundle(pem: string): string[] {
  const blocks = pem.match(PEM_CERTIFICATE) ?? [];
  if (blocks.length === 0) {
    throw new Error('CA bundle contains no PEM certificates');
  }
  for (const block of blocks) {
    try {
      new X509Certificate(block);
    } catch (error) {
      throw new Error(`CA bundle contains an invalid certificate: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }
  return blocks;
}

async function readRequired(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new Error(`failed to read ${what} from ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

/**
 * Creates a client that works from within a pod, authenticating with the
 * mounted service account token and trusting only the mounted CA over TLS 1.2+.
 * Rejects if either file is missing or the CA bundle does not parse.
 */
export async function createInClusterClient(namespace: string, options: InClusterOptions = {}): Promise<KubeClient> {
  const token = (await readRequired(options.tokenPath ?? SERVICE_ACCOUNT_TOKEN_PATH, 'service account token')).trim();
  const ca = parseCaBundle(await readRequired(options.caPath ?? SERVICE_ACCOUNT_CA_PATH, 'CA bundle'));

  const instance = axios.create({
    httpsAgent: new Agent({ ca, minVersion: 'TLSv1.2' }),
  });

  return new KubeClient({
    baseUrl: options.baseUrl ?? IN_CLUSTER_BASE_URL,
    token,
    namespace,
    transport: createAxiosTransport(instance),
    retry: options.retry,
    logger: options.logger,
  });
}

function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const isTruthy = (value: string | undefined): boolean => value === '1' || value?.toLowerCase() === 'true';

/**
 * Factory function to create a client from environment variables
 *
 * - `KUBE_FAKE=1` gives a fake client
 * - `KUBE_API_URL` and `KUBE_TOKEN` give a client against that server
 * - otherwise the in-cluster service account is used
 *
 * `KUBE_NAMESPACE`, `KUBE_MAX_ATTEMPTS`, `KUBE_RETRY_DELAY_MS` and `KUBE_LOG`
 * tune the result; explicit overrides win over the environment.
 */
export async function createKubeClientFromEnv(
  overrides: Partial<KubeClientConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<KubeClient> {
  const logger = overrides.logger ?? (isTruthy(env.KUBE_LOG) ? consoleLogger : undefined);

  if (overrides.fake ?? isTruthy(env.KUBE_FAKE)) {
    return createFakeClient({ logger });
  }

  const namespace = overrides.namespace ?? env.KUBE_NAMESPACE ?? DEFAULT_NAMESPACE;
  const retry: RetryPolicy = {
    maxAttempts: parseNumberOrDefault(env.KUBE_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    initialDelayMs: parseNumberOrDefault(env.KUBE_RETRY_DELAY_MS, DEFAULT_INITIAL_DELAY_MS),
    ...overrides.retry,
  };

  const baseUrl = overrides.baseUrl ?? env.KUBE_API_URL;
  const token = overrides.token ?? env.KUBE_TOKEN;
  if (baseUrl) {
    if (!token) {
      throw new Error('KUBE_TOKEN environment variable is required when KUBE_API_URL is set');
    }
    return new KubeClient({
      baseUrl,
      token,
      namespace,
      logger,
      retry,
      transport: overrides.transport,
    });
  }

  return createInClusterClient(namespace, { logger, retry });
}
