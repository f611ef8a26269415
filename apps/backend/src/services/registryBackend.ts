/**
 * Registry backend selected by config: the in-process ledger (memory) or a
 * registry contract on a live chain (rpc).
 */

import { createPublicClient, createWalletClient, defineChain, http, type Address, type Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import {
  CHAINS,
  type BindingRecord,
  type CreationRecord,
  type ServiceStatus,
  type TokenReference,
} from '@token-services/shared';
import { getDeployment, type RegistryDeployment, type RegistryMode } from '../config/deployment.js';
import { MemoryLedger } from '../ledger/memoryLedger.js';
import { ServiceRegistry, type CreateResult } from '../registry/serviceRegistry.js';
import { OnchainServiceRegistry } from './rpc/onchainRegistry.js';

type MaybePromise<T> = T | Promise<T>;

/** What the HTTP layer needs from a registry, local or remote. */
export interface RegistryPort {
  readonly address: Address;
  readonly chainId: number;
  compute(binding: BindingRecord): MaybePromise<Address>;
  deploy(binding: BindingRecord): Promise<CreateResult>;
  supports(capabilityId: Hex): MaybePromise<boolean>;
  status(binding: BindingRecord): MaybePromise<ServiceStatus>;
  token(service: Address): MaybePromise<TokenReference>;
}

export interface RegistryBackend {
  mode: RegistryMode;
  registry: RegistryPort;
  /** Created records, available when the ledger is in process */
  records?: () => CreationRecord[];
}

function getSigner(): ReturnType<typeof privateKeyToAccount> | null {
  const pk = process.env.REGISTRY_SIGNER_PRIVATE_KEY;
  if (!pk) return null;
  const hex: Hex = pk.startsWith('0x') ? `0x${pk.slice(2)}` : `0x${pk}`;
  return privateKeyToAccount(hex);
}

export function createMemoryBackend(dep: Pick<RegistryDeployment, 'chainId' | 'registryAddress' | 'txGasLimit'>): RegistryBackend {
  const ledger = new MemoryLedger({ chainId: dep.chainId });
  const registry = new ServiceRegistry(ledger, dep.registryAddress, { gasLimit: dep.txGasLimit });
  return {
    mode: 'memory',
    registry,
    records: () => registry.getCreationRecords(),
  };
}

export function createRpcBackend(dep: RegistryDeployment): RegistryBackend {
  const known = CHAINS[dep.chainId];
  const chain = defineChain({
    id: dep.chainId,
    name: known?.name ?? dep.name,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: { default: { http: [dep.rpcUrl] } },
  });
  const transport = http(dep.rpcUrl);
  const signer = getSigner();
  const registry = new OnchainServiceRegistry({
    address: dep.registryAddress,
    publicClient: createPublicClient({ chain, transport }),
    walletClient: signer ? createWalletClient({ account: signer, chain, transport }) : undefined,
  });
  if (!signer) {
    console.warn('[registry] REGISTRY_SIGNER_PRIVATE_KEY not set: create requests will fail in rpc mode');
  }
  return { mode: 'rpc', registry };
}

export function createRegistryBackend(dep: RegistryDeployment = getDeployment()): RegistryBackend {
  return dep.mode === 'rpc' ? createRpcBackend(dep) : createMemoryBackend(dep);
}
