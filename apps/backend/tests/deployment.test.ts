/**
 * Deployment config: file values, env overrides, strict mode.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeploymentConfigError, reloadDeployment } from '../src/config/deployment.js';

const ENV_KEYS = [
  'DEPLOYMENT_PATH',
  'REGISTRY_STRICT',
  'CHAIN_ID',
  'REGISTRY_MODE',
  'RPC_URL',
  'REGISTRY_ADDRESS',
  'TX_GAS_LIMIT',
  'PORT',
] as const;

describe('deployment config', () => {
  let dir: string;
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  function writeDeployment(contents: unknown): void {
    const path = join(dir, 'deployment.json');
    writeFileSync(path, JSON.stringify(contents));
    process.env.DEPLOYMENT_PATH = path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'registry-config-'));
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the deployment file', () => {
    writeDeployment({
      chainId: 8453,
      name: 'Base',
      mode: 'rpc',
      rpcUrl: 'http://127.0.0.1:8545',
      registryAddress: '0x000000000000000000000000000000000000BEEF',
      txGasLimit: '500000',
      port: 4100,
    });
    expect(reloadDeployment()).toEqual({
      chainId: 8453,
      name: 'Base',
      mode: 'rpc',
      rpcUrl: 'http://127.0.0.1:8545',
      registryAddress: '0x000000000000000000000000000000000000beef',
      txGasLimit: 500_000n,
      port: 4100,
    });
  });

  it('falls back to local defaults', () => {
    process.env.DEPLOYMENT_PATH = join(dir, 'missing.json');
    const dep = reloadDeployment();
    expect(dep).toMatchObject({
      chainId: 31337,
      mode: 'memory',
      registryAddress: '0x000000000000000000000000000000000000ce55',
      txGasLimit: 30_000_000n,
      port: 4000,
    });
  });

  it('lets env override the file', () => {
    writeDeployment({ chainId: 8453, mode: 'rpc', rpcUrl: 'http://127.0.0.1:8545' });
    process.env.CHAIN_ID = '84532';
    process.env.REGISTRY_MODE = 'memory';
    process.env.REGISTRY_ADDRESS = '0x000000000000000000000000000000000000dead';
    process.env.TX_GAS_LIMIT = '0x100000';
    expect(reloadDeployment()).toMatchObject({
      chainId: 84532,
      mode: 'memory',
      registryAddress: '0x000000000000000000000000000000000000dead',
      txGasLimit: 1_048_576n,
    });
  });

  it('ignores malformed env values', () => {
    writeDeployment({ chainId: 8453 });
    process.env.CHAIN_ID = 'abc';
    process.env.REGISTRY_ADDRESS = '0x1234';
    expect(reloadDeployment()).toMatchObject({
      chainId: 8453,
      registryAddress: '0x000000000000000000000000000000000000ce55',
    });
  });

  it('rejects a deployment file that does not match the schema', () => {
    writeDeployment({ chainId: 'mainnet', registryAddress: '0x1234' });
    expect(() => reloadDeployment()).toThrow(DeploymentConfigError);
    try {
      reloadDeployment();
    } catch (err) {
      expect(err instanceof DeploymentConfigError && err.violations).toHaveLength(2);
    }
  });

  describe('strict mode', () => {
    it('collects every violation', () => {
      writeDeployment({
        mode: 'rpc',
        registryAddress: '0x0000000000000000000000000000000000000000',
        txGasLimit: 0,
      });
      process.env.REGISTRY_STRICT = 'true';
      const error = (() => {
        try {
          reloadDeployment();
          return null;
        } catch (err) {
          return err;
        }
      })();
      expect(error).toBeInstanceOf(DeploymentConfigError);
      expect(error instanceof DeploymentConfigError && error.violations).toEqual([
        'registryAddress is the zero address. Set REGISTRY_ADDRESS or update the deployment file.',
        'rpcUrl is empty in rpc mode. Set RPC_URL.',
        'txGasLimit must be positive.',
      ]);
    });

    it('accepts a complete config', () => {
      writeDeployment({ mode: 'rpc', rpcUrl: 'http://127.0.0.1:8545' });
      process.env.REGISTRY_STRICT = 'true';
      expect(reloadDeployment().mode).toBe('rpc');
    });

    it('is off unless REGISTRY_STRICT=true', () => {
      writeDeployment({ registryAddress: '0x0000000000000000000000000000000000000000' });
      expect(reloadDeployment().registryAddress).toBe('0x0000000000000000000000000000000000000000');
    });
  });
});
