/**
 * Service registry: deploy-or-return for token-bound services.
 *
 * There is no lookup table. Whether a binding is bound is answered by the
 * ledger alone: code at the derived address means deployed. Instances are
 * plain values keyed by their own address, so any number of registries can
 * share one ledger without seeing each other's services.
 */

import {
  decodeEventLog,
  encodeAbiParameters,
  encodeEventTopics,
  encodeFunctionData,
  type Address,
  type Hex,
} from 'viem';
import { ZERO_ADDRESS, type BindingRecord, type CreationRecord, type ServiceStatus, type TokenReference } from '@token-services/shared';
import { ServiceRegistryAbi } from '../abi/ServiceRegistry.js';
import type { Ledger, LedgerLog, LogEntry } from '../ledger/types.js';
import { buildCreationCode, lowerHex } from './artifactBuilder.js';
import { computeServiceAddress } from './addressDeriver.js';
import { supportsCapability } from './capability.js';
import { CreationFailedError, isRegistryError } from './errors.js';
import { ServiceAccessor } from './serviceAccessor.js';

export interface ServiceRegistryOptions {
  /** Caller used when `create` is not given one */
  defaultSender?: Address;
  /** Gas limit for create transactions; the ledger default otherwise */
  gasLimit?: bigint;
}

export interface CreateOptions {
  sender?: Address;
  gasLimit?: bigint;
}

export interface CreateResult {
  service: Address;
  /** False when the service already existed and nothing was written */
  created: boolean;
  transactionHash: Hex;
}

export interface CreationRecordFilter {
  implementation?: Address;
  tokenContract?: Address;
  tokenId?: bigint;
  fromBlock?: bigint;
}

export type CreationListener = (record: CreationRecord) => void;

const [CREATED_TOPIC] = encodeEventTopics({ abi: ServiceRegistryAbi, eventName: 'Created' });

function isHex(topic: unknown): topic is Hex {
  return typeof topic === 'string';
}

export function encodeCreatedLog(registry: Address, service: Address, binding: BindingRecord): LogEntry {
  const [signature, ...indexed] = encodeEventTopics({
    abi: ServiceRegistryAbi,
    eventName: 'Created',
    args: {
      implementation: binding.implementation,
      tokenContract: binding.tokenContract,
      tokenId: binding.tokenId,
    },
  });
  return {
    address: registry,
    topics: [signature, ...indexed.filter(isHex)],
    data: encodeAbiParameters(
      [{ type: 'address' }, { type: 'bytes32' }, { type: 'uint256' }],
      [service, binding.salt, binding.originChainId],
    ),
  };
}

export function decodeCreatedLog(log: LedgerLog): CreationRecord {
  const { args } = decodeEventLog({
    abi: ServiceRegistryAbi,
    eventName: 'Created',
    topics: log.topics,
    data: log.data,
  });
  return {
    service: args.service,
    implementation: lowerHex(args.implementation),
    salt: args.salt,
    originChainId: args.chainId,
    tokenContract: lowerHex(args.tokenContract),
    tokenId: args.tokenId,
    blockNumber: log.blockNumber,
    transactionHash: log.transactionHash,
  };
}

export class ServiceRegistry {
  public readonly address: Address;
  private readonly ledger: Ledger;
  private readonly defaultSender: Address;
  private readonly gasLimit?: bigint;

  constructor(ledger: Ledger, address: Address, options: ServiceRegistryOptions = {}) {
    this.ledger = ledger;
    this.address = address;
    this.defaultSender = options.defaultSender ?? ZERO_ADDRESS;
    this.gasLimit = options.gasLimit;
  }

  get chainId(): number {
    return this.ledger.chainId;
  }

  /** Predicted service address. Pure; never touches the ledger. */
  compute(binding: BindingRecord): Address {
    return computeServiceAddress(this.address, binding);
  }

  async create(binding: BindingRecord, options: CreateOptions = {}): Promise<Address> {
    const { service } = await this.deploy(binding, options);
    return service;
  }

  /**
   * Deploy the service for `binding` unless it already exists.
   * Throws CreationFailedError when the deployment primitive fails; the
   * transaction is then reverted as a whole.
   */
  async deploy(binding: BindingRecord, options: CreateOptions = {}): Promise<CreateResult> {
    const target = this.compute(binding);
    const input = encodeFunctionData({
      abi: ServiceRegistryAbi,
      functionName: 'create',
      args: [binding.implementation, binding.salt, binding.originChainId, binding.tokenContract, binding.tokenId],
    });

    let transactionHash: Hex | undefined;
    try {
      const { result, receipt } = await this.ledger.transact(
        options.sender ?? this.defaultSender,
        (tx) => {
          transactionHash = tx.hash;
          if (tx.getCode(target) !== '0x') {
            return { service: target, created: false };
          }
          const deployed = tx.create2(this.address, binding.salt, buildCreationCode(binding));
          if (deployed === null) {
            throw new CreationFailedError(target, { transactionHash: tx.hash });
          }
          tx.emit(encodeCreatedLog(this.address, deployed, binding));
          return { service: deployed, created: true };
        },
        { to: this.address, input, gasLimit: options.gasLimit ?? this.gasLimit },
      );
      if (result.created) {
        console.log(`[registry] ${this.address} created ${result.service} in block ${receipt.blockNumber}`);
      }
      return { ...result, transactionHash: receipt.transactionHash };
    } catch (err) {
      if (isRegistryError(err)) throw err;
      throw new CreationFailedError(target, {
        detail: err instanceof Error ? err.message : String(err),
        transactionHash,
      });
    }
  }

  supports(capabilityId: string): boolean {
    return supportsCapability(capabilityId);
  }

  isDeployed(binding: BindingRecord): boolean {
    return this.ledger.getCode(this.compute(binding)) !== '0x';
  }

  status(binding: BindingRecord): ServiceStatus {
    return this.isDeployed(binding) ? 'DEPLOYED' : 'NOT_DEPLOYED';
  }

  /** `token()` of the service at `service`. */
  token(service: Address): TokenReference {
    return ServiceAccessor.at(this.ledger, service).token();
  }

  getCreationRecords(filter: CreationRecordFilter = {}): CreationRecord[] {
    return this.ledger
      .getLogs({ address: this.address, fromBlock: filter.fromBlock, topics: [CREATED_TOPIC] })
      .map(decodeCreatedLog)
      .filter(
        (record) =>
          (filter.implementation === undefined ||
            record.implementation === filter.implementation.toLowerCase()) &&
          (filter.tokenContract === undefined || record.tokenContract === filter.tokenContract.toLowerCase()) &&
          (filter.tokenId === undefined || record.tokenId === filter.tokenId),
      );
  }

  /** Called once per Created record, after its transaction commits. */
  onCreated(listener: CreationListener): () => void {
    return this.ledger.onLogs((logs) => {
      for (const log of logs) {
        if (log.address.toLowerCase() !== this.address.toLowerCase()) continue;
        if (log.topics[0] !== CREATED_TOPIC) continue;
        listener(decodeCreatedLog(log));
      }
    });
  }
}
