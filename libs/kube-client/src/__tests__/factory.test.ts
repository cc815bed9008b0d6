import { readFileSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { Agent } from 'node:https';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import axios from 'axios';
import type { AxiosInstance, CreateAxiosDefaults } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { TransportRequest, TransportResponse } from '@kube-control/http-core';
import { createFakeClient, createInClusterClient, createKubeClientFromEnv, parseCaBundle } from '../factory';

const encoder = new TextEncoder();

const ok = (body: string): TransportResponse => ({
  status: 200,
  statusText: 'OK',
  headers: {},
  read: async () => encoder.encode(body),
  close: async () => undefined,
});

const TEST_CA_PATH = fileURLToPath(new URL('./fixtures/test-ca.crt', import.meta.url));
const TEST_CA = readFileSync(TEST_CA_PATH, 'utf-8').trim();

const BOGUS_PEM = ['-----BEGIN CERTIFICATE-----', 'bm90IGEgY2VydA==', '-----END CERTIFICATE-----'].join('\n');

describe('createFakeClient', () => {
  it('targets the default namespace without a network', () => {
    const client = createFakeClient();

    expect(client.isFake).toBe(true);
    expect(client.namespace).toBe('default');
  });
});

describe('parseCaBundle', () => {
  it('returns each certificate of a bundle', () => {
    expect(parseCaBundle(`${TEST_CA}\n`)).toEqual([TEST_CA]);
    expect(parseCaBundle(`${TEST_CA}\n${TEST_CA}\n`)).toEqual([TEST_CA, TEST_CA]);
  });

  it('rejects text without certificates', () => {
    expect(() => parseCaBundle('not a certificate')).toThrow('CA bundle contains no PEM certificates');
  });

  it('rejects a block that does not parse', () => {
    expect(() => parseCaBundle(BOGUS_PEM)).toThrow(/^CA bundle contains an invalid certificate: /);
  });
});

describe('createInClusterClient', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kube-client-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('builds a client on the service account over TLS 1.2', async () => {
    const tokenPath = join(dir, 'token');
    await writeFile(tokenPath, 'test-token\n');
    const created: Array<{ config: CreateAxiosDefaults | undefined; instance: AxiosInstance }> = [];
    const create = axios.create.bind(axios);
    vi.spyOn(axios, 'create').mockImplementation((config) => {
      const instance = create(config);
      vi.spyOn(instance, 'request').mockRejectedValue(new Error('offline'));
      created.push({ config, instance });
      return instance;
    });

    const client = await createInClusterClient('ci', { tokenPath, caPath: TEST_CA_PATH, retry: { maxAttempts: 1 } });

    expect(client.namespace).toBe('ci');
    expect(client.isFake).toBe(false);
    expect(created).toHaveLength(1);
    const [{ config, instance }] = created;
    const agent: unknown = config?.httpsAgent;
    expect(agent).toBeInstanceOf(Agent);
    if (agent instanceof Agent) {
      expect(agent.options.minVersion).toBe('TLSv1.2');
      expect(agent.options.ca).toEqual([TEST_CA]);
    }

    await expect(client.getPod('web-0')).rejects.toThrow('offline');
    expect(instance.request).toHaveBeenCalledWith(
      expect.objectContaining({
        method: 'GET',
        url: 'https://kubernetes/api/v1/namespaces/ci/pods/web-0',
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
      }),
    );
  });

  it('fails when the token file is missing', async () => {
    const tokenPath = join(dir, 'token');

    await expect(createInClusterClient('ci', { tokenPath, caPath: join(dir, 'ca.crt') })).rejects.toThrow(
      `failed to read service account token from ${tokenPath}: `,
    );
  });

  it('fails when the CA bundle is missing', async () => {
    const tokenPath = join(dir, 'token');
    const caPath = join(dir, 'ca.crt');
    await writeFile(tokenPath, 'test-token\n');

    await expect(createInClusterClient('ci', { tokenPath, caPath })).rejects.toThrow(
      `failed to read CA bundle from ${caPath}: `,
    );
  });

  it('fails when the CA bundle holds no certificate', async () => {
    const tokenPath = join(dir, 'token');
    const caPath = join(dir, 'ca.crt');
    await writeFile(tokenPath, 'test-token');
    await writeFile(caPath, 'not a certificate');

    await expect(createInClusterClient('ci', { tokenPath, caPath })).rejects.toThrow(
      'CA bundle contains no PEM certificates',
    );
  });

  it('fails when the CA bundle holds a broken certificate', async () => {
    const tokenPath = join(dir, 'token');
    const caPath = join(dir, 'ca.crt');
    await writeFile(tokenPath, 'test-token');
    await writeFile(caPath, BOGUS_PEM);

    await expect(createInClusterClient('ci', { tokenPath, caPath })).rejects.toThrow(
      /^CA bundle contains an invalid certificate: /,
    );
  });
});

describe('createKubeClientFromEnv', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns a fake client when KUBE_FAKE is set', async () => {
    const client = await createKubeClientFromEnv({}, { KUBE_FAKE: '1' });

    expect(client.isFake).toBe(true);
    expect(client.namespace).toBe('default');
  });

  it('targets KUBE_API_URL with KUBE_TOKEN in KUBE_NAMESPACE', async () => {
    const transport = vi.fn(async (_req: TransportRequest) => ok('{}'));
    const client = await createKubeClientFromEnv(
      { transport },
      { KUBE_API_URL: 'https://kube.test', KUBE_TOKEN: 'test-token', KUBE_NAMESPACE: 'ci' },
    );

    await client.getPod('web-0');

    expect(client.isFake).toBe(false);
    expect(client.namespace).toBe('ci');
    const [req] = transport.mock.calls[0];
    expect(req.url).toBe('https://kube.test/api/v1/namespaces/ci/pods/web-0');
    expect(req.headers.Authorization).toBe('Bearer test-token');
  });

  it('requires a token alongside KUBE_API_URL', async () => {
    await expect(createKubeClientFromEnv({}, { KUBE_API_URL: 'https://kube.test' })).rejects.toThrow(
      'KUBE_TOKEN environment variable is required when KUBE_API_URL is set',
    );
  });

  it('reads the retry policy from the environment', async () => {
    const failure = new Error('connect ECONNREFUSED 127.0.0.1:6443');
    const transport = vi.fn(async (_req: TransportRequest): Promise<TransportResponse> => {
      throw failure;
    });
    const sleep = vi.fn(async (_ms: number) => undefined);
    const client = await createKubeClientFromEnv(
      { transport, retry: { sleep } },
      {
        KUBE_API_URL: 'https://kube.test',
        KUBE_TOKEN: 'test-token',
        KUBE_MAX_ATTEMPTS: '2',
        KUBE_RETRY_DELAY_MS: '5',
      },
    );

    await expect(client.deleteJob('build-1')).rejects.toBe(failure);
    expect(transport).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5]);
  });

  it('ignores a retry bound that is not a whole number', async () => {
    const failure = new Error('connect ECONNREFUSED 127.0.0.1:6443');
    const transport = vi.fn(async (_req: TransportRequest): Promise<TransportResponse> => {
      throw failure;
    });
    const sleep = vi.fn(async (_ms: number) => undefined);
    const client = await createKubeClientFromEnv(
      { transport, retry: { sleep } },
      {
        KUBE_API_URL: 'https://kube.test',
        KUBE_TOKEN: 'test-token',
        KUBE_MAX_ATTEMPTS: '2.5',
        KUBE_RETRY_DELAY_MS: '1',
      },
    );

    await expect(client.deleteJob('build-1')).rejects.toBe(failure);
    expect(transport).toHaveBeenCalledTimes(8);
    expect(sleep).toHaveBeenCalledTimes(7);
  });

  it('logs to stdout when KUBE_LOG is set', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const client = await createKubeClientFromEnv({}, { KUBE_FAKE: 'true', KUBE_LOG: '1' });

    await client.getPod('web-0');

    expect(log).toHaveBeenCalledWith('getPod(web-0)');
  });
});
