/**
 * HTTP surface over an in-memory registry. The app listens on an ephemeral
 * port and is exercised with fetch.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server } from 'node:http';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ERC165_INTERFACE_ID, ZERO_SALT } from '@token-services/shared';
import { createApp } from '../src/app.js';
import { computeServiceAddress } from '../src/registry/addressDeriver.js';
import { SERVICE_REGISTRY_INTERFACE_ID } from '../src/registry/capability.js';
import { createMemoryBackend } from '../src/services/registryBackend.js';
import { readByType } from '../src/storage/logStore.js';
import { binding, REGISTRY_ADDRESS } from './helpers/fixtures.js';

const body = {
  implementation: '0x1111111111111111111111111111111111111111',
  salt: ZERO_SALT,
  originChainId: 1,
  tokenContract: '0x2222222222222222222222222222222222222222',
  tokenId: '42',
};

function listen(server: Server): string {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

async function start(txGasLimit: bigint): Promise<{ server: Server; baseUrl: string }> {
  const app = createApp(createMemoryBackend({ chainId: 31337, registryAddress: REGISTRY_ADDRESS, txGasLimit }));
  const server = await new Promise<Server>((resolveServer) => {
    const s = app.listen(0, '127.0.0.1', () => resolveServer(s));
  });
  return { server, baseUrl: listen(server) };
}

function close(server: Server): Promise<void> {
  return new Promise((resolveClose, reject) => server.close((err) => (err ? reject(err) : resolveClose())));
}

function post(baseUrl: string, path: string, payload: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  });
}

describe('registry routes', () => {
  const expectedService = computeServiceAddress(REGISTRY_ADDRESS, binding());
  let logDir: string;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    logDir = mkdtempSync(join(tmpdir(), 'registry-logs-'));
    process.env.LOG_STORE_PATH = logDir;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    ({ server, baseUrl } = await start(30_000_000n));
  });

  afterAll(async () => {
    await close(server);
    delete process.env.LOG_STORE_PATH;
    rmSync(logDir, { recursive: true, force: true });
  });

  it('GET /health reports mode and chain', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      service: 'token-service-registry',
      mode: 'memory',
      chainId: 31337,
      registry: '0x0000…ce55',
    });
    expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{8}$/);
  });

  it('POST /api/services/compute predicts without deploying', async () => {
    const res = await post(baseUrl, '/api/services/compute', body);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, service: expectedService, status: 'NOT_DEPLOYED' });
  });

  it('POST /api/services creates, then returns the existing service', async () => {
    const first = await post(baseUrl, '/api/services', body);
    expect(first.status).toBe(201);
    expect(await first.json()).toMatchObject({ ok: true, service: expectedService, created: true });

    const second = await post(baseUrl, '/api/services', body);
    expect(second.status).toBe(200);
    expect(await second.json()).toMatchObject({ ok: true, service: expectedService, created: false });

    expect(readByType('SERVICE_CREATED')).toHaveLength(1);
    expect(readByType('SERVICE_EXISTS')).toHaveLength(1);
    expect(readByType('SERVICE_CREATED')[0]?.payload).toMatchObject({ service: expectedService });
  });

  it('POST /api/services/compute reports DEPLOYED afterwards', async () => {
    const res = await post(baseUrl, '/api/services/compute', body);
    expect(await res.json()).toEqual({ ok: true, service: expectedService, status: 'DEPLOYED' });
  });

  it('GET /api/services/:address/token returns decimal strings', async () => {
    const res = await fetch(`${baseUrl}/api/services/${expectedService}/token`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      originChainId: '1',
      tokenContract: '0x2222222222222222222222222222222222222222',
      tokenId: '42',
    });
  });

  it('GET /api/services/:address/token is 404 for an address without a service', async () => {
    const address = '0x9999999999999999999999999999999999999999';
    const res = await fetch(`${baseUrl}/api/services/${address}/token`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      ok: false,
      reason: `No service deployed at ${address}`,
      code: 'SERVICE_NOT_DEPLOYED',
    });
  });

  it('GET /api/services/records lists Created records', async () => {
    const res = await fetch(`${baseUrl}/api/services/records`);
    expect(await res.json()).toMatchObject({
      ok: true,
      records: [{ service: expectedService, tokenId: '42', originChainId: '1', blockNumber: '1' }],
    });
  });

  it('rejects a malformed binding with 400', async () => {
    const res = await post(baseUrl, '/api/services', { ...body, salt: '0x01' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, reason: 'Invalid binding', code: 'VALIDATION' });
  });

  it('rejects a binding with a missing field on compute with 400', async () => {
    const res = await post(baseUrl, '/api/services/compute', { ...body, tokenId: undefined });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, reason: 'Invalid binding', code: 'VALIDATION' });
  });

  it('POST /api/services answers with exactly service, created and transactionHash', async () => {
    const res = await post(baseUrl, '/api/services', body);
    expect(await res.json()).toEqual({
      ok: true,
      service: expectedService,
      created: false,
      transactionHash: expect.stringMatching(/^0x[0-9a-f]{64}$/),
    });
  });

  it('GET /api/capabilities/:id answers the probe', async () => {
    const yes = await fetch(`${baseUrl}/api/capabilities/${SERVICE_REGISTRY_INTERFACE_ID}`);
    expect(await yes.json()).toEqual({ ok: true, capabilityId: SERVICE_REGISTRY_INTERFACE_ID, supported: true });

    const no = await fetch(`${baseUrl}/api/capabilities/${ERC165_INTERFACE_ID}`);
    expect(await no.json()).toEqual({ ok: true, capabilityId: ERC165_INTERFACE_ID, supported: false });

    const bad = await fetch(`${baseUrl}/api/capabilities/0x12`);
    expect(bad.status).toBe(400);
  });

  describe('with a starved gas limit', () => {
    let starved: { server: Server; baseUrl: string };

    beforeAll(async () => {
      starved = await start(50_000n);
    });

    afterAll(async () => {
      await close(starved.server);
    });

    it('POST /api/services is 409 CREATION_FAILED and deploys nothing', async () => {
      const res = await post(starved.baseUrl, '/api/services', body);
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        ok: false,
        reason: `CreationFailed: ${expectedService}`,
        code: 'CREATION_FAILED',
      });

      const compute = await post(starved.baseUrl, '/api/services/compute', body);
      expect(await compute.json()).toMatchObject({ status: 'NOT_DEPLOYED' });
      expect(readByType('CREATION_FAILED')).toHaveLength(1);
    });
  });
});
