/**
 * Registry deployment config.
 * Loads from deployments/local.json (or DEPLOYMENT_PATH) with env overrides.
 *
 * Strict mode (REGISTRY_STRICT=true):
 *   Fail-closed on misconfiguration. Rejects a zero registry address and an
 *   rpc-mode config without an RPC URL at load time.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_BLOCK_GAS_LIMIT, LOCAL_CHAIN_ID, ZERO_ADDRESS, zAddress, zUint256 } from '@token-services/shared';

export type RegistryMode = 'memory' | 'rpc';

export interface RegistryDeployment {
  chainId: number;
  name: string;
  mode: RegistryMode;
  rpcUrl: string;
  /** Deployer identity: the address services are derived from */
  registryAddress: `0x${string}`;
  /** Gas limit for create transactions */
  txGasLimit: bigint;
  port: number;
}

const DEFAULT_REGISTRY_ADDRESS = '0x000000000000000000000000000000000000ce55' as const;

const DeploymentFileSchema = z.object({
  chainId: z.number().int().positive().optional(),
  name: z.string().optional(),
  mode: z.enum(['memory', 'rpc']).optional(),
  rpcUrl: z.string().optional(),
  registryAddress: zAddress.optional(),
  txGasLimit: zUint256.optional(),
  port: z.number().int().positive().optional(),
});

// ─── Strict-mode validation ──────────────────────────────

/** Whether REGISTRY_STRICT=true is set in the environment. */
export function isStrictMode(): boolean {
  return process.env.REGISTRY_STRICT === 'true';
}

/**
 * Thrown at startup when REGISTRY_STRICT=true and the deployment config is
 * missing required values, or when the deployment file does not parse.
 */
export class DeploymentConfigError extends Error {
  public readonly violations: string[];
  constructor(violations: string[]) {
    const header = `[REGISTRY_STRICT] Deployment config is not usable (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super(`${header}\n${body}`);
    this.name = 'DeploymentConfigError';
    this.violations = violations;
  }
}

/**
 * Collects all violations and throws once, so operators can fix everything
 * in one pass.
 */
function validateDeploymentStrict(dep: RegistryDeployment): void {
  const violations: string[] = [];

  if (dep.registryAddress === ZERO_ADDRESS) {
    violations.push('registryAddress is the zero address. Set REGISTRY_ADDRESS or update the deployment file.');
  }
  if (dep.mode === 'rpc' && dep.rpcUrl.trim() === '') {
    violations.push('rpcUrl is empty in rpc mode. Set RPC_URL.');
  }
  if (dep.txGasLimit <= 0n) {
    violations.push('txGasLimit must be positive.');
  }

  if (violations.length > 0) {
    throw new DeploymentConfigError(violations);
  }
}

function envString(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(name: string): number | undefined {
  const value = envString(name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function envMode(): RegistryMode | undefined {
  const value = envString('REGISTRY_MODE');
  return value === 'memory' || value === 'rpc' ? value : undefined;
}

function envAddress(name: string): `0x${string}` | undefined {
  const parsed = zAddress.safeParse(envString(name));
  return parsed.success ? parsed.data : undefined;
}

function envGasLimit(): bigint | undefined {
  const parsed = zUint256.safeParse(envString('TX_GAS_LIMIT'));
  return parsed.success ? parsed.data : undefined;
}

function loadDeployment(): RegistryDeployment {
  const candidates = process.env.DEPLOYMENT_PATH
    ? [process.env.DEPLOYMENT_PATH]
    : [
        resolve(process.cwd(), 'deployments', 'local.json'),
        resolve(process.cwd(), '..', '..', 'deployments', 'local.json'),
      ];
  const path = candidates.find((p) => existsSync(p)) ?? candidates[0];

  let file: z.infer<typeof DeploymentFileSchema> = {};
  if (existsSync(path)) {
    const parsed = DeploymentFileSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (!parsed.success) {
      throw new DeploymentConfigError(
        parsed.error.issues.map((issue) => `${path}: ${issue.path.join('.') || '(root)'} ${issue.message}`),
      );
    }
    file = parsed.data;
  }

  return {
    chainId: envInt('CHAIN_ID') ?? file.chainId ?? LOCAL_CHAIN_ID,
    name: file.name ?? 'Local Ledger',
    mode: envMode() ?? file.mode ?? 'memory',
    rpcUrl: envString('RPC_URL') ?? file.rpcUrl ?? '',
    registryAddress: envAddress('REGISTRY_ADDRESS') ?? file.registryAddress ?? DEFAULT_REGISTRY_ADDRESS,
    txGasLimit: envGasLimit() ?? file.txGasLimit ?? DEFAULT_BLOCK_GAS_LIMIT,
    port: envInt('PORT') ?? file.port ?? 4000,
  };
}

let _config: RegistryDeployment | null = null;

/**
 * Get the deployment config (cached after first load).
 *
 * When REGISTRY_STRICT=true, the first call validates the config and throws
 * DeploymentConfigError on failure.
 */
export function getDeployment(): RegistryDeployment {
  if (!_config) {
    _config = loadDeployment();
    if (isStrictMode()) {
      validateDeploymentStrict(_config);
    }
  }
  return _config;
}

/**
 * Force-reload deployment config. Useful in tests or after config changes.
 */
export function reloadDeployment(): RegistryDeployment {
  _config = null;
  return getDeployment();
}
