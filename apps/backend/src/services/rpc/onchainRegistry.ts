/**
 * Client for a registry deployed on a live chain.
 *
 * Mirrors ServiceRegistry over JSON-RPC: reads go through eth_call, create
 * sends a transaction and waits for its receipt. A revert during gas
 * estimation or a reverted receipt is a CreationFailed; a successful receipt
 * without a Created log means the service already existed.
 */

import {
  BaseError,
  ContractFunctionRevertedError,
  parseEventLogs,
  type Account,
  type Address,
  type Chain,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
} from 'viem';
import type { BindingRecord, CreationRecord, ServiceStatus, TokenReference } from '@token-services/shared';
import { ServiceRegistryAbi } from '../../abi/ServiceRegistry.js';
import { ServiceAccessorAbi } from '../../abi/ServiceAccessor.js';
import { buildArtifact, lowerHex } from '../../registry/artifactBuilder.js';
import { CreationFailedError, ServiceNotDeployedError } from '../../registry/errors.js';
import type { CreateResult } from '../../registry/serviceRegistry.js';

export interface OnchainRegistryConfig {
  address: Address;
  publicClient: PublicClient<Transport, Chain>;
  /** Needed only for create */
  walletClient?: WalletClient<Transport, Chain, Account>;
}

export class OnchainServiceRegistry {
  public readonly address: Address;
  private readonly publicClient: PublicClient<Transport, Chain>;
  private readonly walletClient?: WalletClient<Transport, Chain, Account>;

  constructor(config: OnchainRegistryConfig) {
    this.address = config.address;
    this.publicClient = config.publicClient;
    this.walletClient = config.walletClient;
  }

  get chainId(): number {
    return this.publicClient.chain.id;
  }

  async compute(binding: BindingRecord): Promise<Address> {
    return this.publicClient.readContract({
      address: this.address,
      abi: ServiceRegistryAbi,
      functionName: 'compute',
      args: [binding.implementation, binding.salt, binding.originChainId, binding.tokenContract, binding.tokenId],
    });
  }

  async supports(capabilityId: Hex): Promise<boolean> {
    return this.publicClient.readContract({
      address: this.address,
      abi: ServiceRegistryAbi,
      functionName: 'supportsInterface',
      args: [capabilityId],
    });
  }

  async isDeployed(binding: BindingRecord): Promise<boolean> {
    const code = await this.publicClient.getCode({ address: await this.compute(binding) });
    return code !== undefined && code !== '0x';
  }

  async status(binding: BindingRecord): Promise<ServiceStatus> {
    return (await this.isDeployed(binding)) ? 'DEPLOYED' : 'NOT_DEPLOYED';
  }

  async token(service: Address): Promise<TokenReference> {
    const code = await this.publicClient.getCode({ address: service });
    if (code === undefined || code === '0x') {
      throw new ServiceNotDeployedError(service);
    }
    const [originChainId, tokenContract, tokenId] = await this.publicClient.readContract({
      address: service,
      abi: ServiceAccessorAbi,
      functionName: 'token',
    });
    return { originChainId, tokenContract: lowerHex(tokenContract), tokenId };
  }

  /** True when the code at the derived address is byte-for-byte the expected artifact. */
  async verifyArtifact(binding: BindingRecord): Promise<boolean> {
    const code = await this.publicClient.getCode({ address: await this.compute(binding) });
    return code !== undefined && code.toLowerCase() === buildArtifact(binding);
  }

  async create(binding: BindingRecord): Promise<Address> {
    const { service } = await this.deploy(binding);
    return service;
  }

  async deploy(binding: BindingRecord): Promise<CreateResult & { record?: CreationRecord }> {
    if (!this.walletClient) {
      throw new Error('OnchainServiceRegistry: walletClient required for create');
    }
    const service = await this.compute(binding);
    let hash: Hex;
    try {
      hash = await this.walletClient.writeContract({
        address: this.address,
        abi: ServiceRegistryAbi,
        functionName: 'create',
        args: [binding.implementation, binding.salt, binding.originChainId, binding.tokenContract, binding.tokenId],
      });
    } catch (err) {
      // Local signers estimate gas first; the node reports the revert there.
      const revert = err instanceof BaseError ? err.walk((e) => e instanceof ContractFunctionRevertedError) : null;
      if (revert instanceof ContractFunctionRevertedError) {
        throw new CreationFailedError(service, { detail: `${revert.data?.errorName ?? 'reverted'} before broadcast` });
      }
      throw err;
    }
    const receipt = await this.publicClient.waitForTransactionReceipt({ hash });
    if (receipt.status !== 'success') {
      throw new CreationFailedError(service, { detail: 'transaction reverted', transactionHash: hash });
    }

    const [created] = parseEventLogs({ abi: ServiceRegistryAbi, eventName: 'Created', logs: receipt.logs }).filter(
      (log) => log.address.toLowerCase() === this.address.toLowerCase(),
    );
    if (!created) {
      return { service, created: false, transactionHash: hash };
    }
    console.log(`[onchain-registry] created ${created.args.service} (tx ${hash})`);
    return {
      service: created.args.service,
      created: true,
      transactionHash: hash,
      record: {
        service: created.args.service,
        implementation: lowerHex(created.args.implementation),
        salt: created.args.salt,
        originChainId: created.args.chainId,
        tokenContract: lowerHex(created.args.tokenContract),
        tokenId: created.args.tokenId,
        blockNumber: receipt.blockNumber,
        transactionHash: hash,
      },
    };
  }
}
