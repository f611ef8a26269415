/**
 * In-process serialized ledger.
 *
 * Every transaction is queued and executed one at a time in submission
 * order, then mined into its own block. A transaction body runs against a
 * journal; the journal is committed only when the body returns, so a
 * failed body leaves no code, no nonce bump on created accounts and no logs.
 * The sender's nonce advances for reverted transactions as well. A gas
 * limit below the intrinsic cost is refused outright and never mined.
 */

import {
  concat,
  encodeAbiParameters,
  getContractAddress,
  keccak256,
  size,
  slice,
  toHex,
  type Address,
  type Hex,
} from 'viem';
import { DEFAULT_BLOCK_GAS_LIMIT, LOCAL_CHAIN_ID } from '@token-services/shared';
import { create2Gas, logGas, TX_BASE_GAS } from './gas.js';
import type {
  Ledger,
  LedgerLog,
  LedgerReceipt,
  LedgerTransaction,
  LogEntry,
  LogFilter,
  LogListener,
  TransactionContext,
  TransactionOutcome,
  TransactOptions,
} from './types.js';

interface AccountState {
  code: Hex;
  nonce: number;
}

const EMPTY_ACCOUNT: AccountState = { code: '0x', nonce: 0 };

// Constructor shape the ledger can run: copy N bytes after itself, return them.
const COPY_RETURN_CONSTRUCTOR = /^0x3d60([0-9a-f]{2})80600a3d3981f3/;
const COPY_RETURN_CONSTRUCTOR_SIZE = 10;

function accountKey(address: Address): string {
  return address.toLowerCase();
}

/**
 * Run a creation payload and return the runtime code it deploys, or null
 * if the payload is not a constructor this ledger can execute.
 */
export function runConstructor(initCode: Hex): Hex | null {
  const match = COPY_RETURN_CONSTRUCTOR.exec(initCode.toLowerCase());
  if (!match) return null;
  const length = parseInt(match[1], 16);
  if (size(initCode) !== COPY_RETURN_CONSTRUCTOR_SIZE + length) return null;
  return `0x${slice(initCode, COPY_RETURN_CONSTRUCTOR_SIZE).slice(2).toLowerCase()}`;
}

export interface MemoryLedgerOptions {
  chainId?: number;
  /** Gas available to a transaction that does not set its own limit */
  blockGasLimit?: bigint;
}

export class MemoryLedger implements Ledger {
  public readonly chainId: number;
  private readonly blockGasLimit: bigint;
  private readonly accounts = new Map<string, AccountState>();
  private readonly receipts = new Map<string, LedgerReceipt>();
  private readonly transactions = new Map<string, LedgerTransaction>();
  private readonly logs: LedgerLog[] = [];
  private readonly listeners = new Set<LogListener>();
  private head = 0n;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: MemoryLedgerOptions = {}) {
    this.chainId = options.chainId ?? LOCAL_CHAIN_ID;
    this.blockGasLimit = options.blockGasLimit ?? DEFAULT_BLOCK_GAS_LIMIT;
  }

  // ─── Reads ─────────────────────────────────────────────

  blockNumber(): bigint {
    return this.head;
  }

  getCode(address: Address): Hex {
    return (this.accounts.get(accountKey(address)) ?? EMPTY_ACCOUNT).code;
  }

  getNonce(address: Address): number {
    return (this.accounts.get(accountKey(address)) ?? EMPTY_ACCOUNT).nonce;
  }

  getReceipt(hash: Hex): LedgerReceipt | undefined {
    return this.receipts.get(hash.toLowerCase());
  }

  getTransaction(hash: Hex): LedgerTransaction | undefined {
    return this.transactions.get(hash.toLowerCase());
  }

  getLogs(filter: LogFilter = {}): LedgerLog[] {
    return this.logs.filter((log) => {
      if (filter.address && accountKey(filter.address) !== accountKey(log.address)) return false;
      if (filter.fromBlock !== undefined && log.blockNumber < filter.fromBlock) return false;
      if (filter.topics) {
        return filter.topics.every((topic, i) => {
          if (topic === null) return true;
          const actual = log.topics[i];
          return actual !== undefined && actual.toLowerCase() === topic.toLowerCase();
        });
      }
      return true;
    });
  }

  onLogs(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── State overrides ───────────────────────────────────
  // Direct writes outside any transaction, like a dev node's setCode.

  setCode(address: Address, code: Hex): void {
    const current = this.accounts.get(accountKey(address)) ?? EMPTY_ACCOUNT;
    this.accounts.set(accountKey(address), { ...current, code: `0x${code.slice(2).toLowerCase()}` });
  }

  setNonce(address: Address, nonce: number): void {
    const current = this.accounts.get(accountKey(address)) ?? EMPTY_ACCOUNT;
    this.accounts.set(accountKey(address), { ...current, nonce });
  }

  // ─── Transactions ──────────────────────────────────────

  transact<T>(
    sender: Address,
    body: (tx: TransactionContext) => T,
    options: TransactOptions = {},
  ): Promise<TransactionOutcome<T>> {
    const run = () => this.execute(sender, body, options);
    const next = this.queue.then(run);
    this.queue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private execute<T>(sender: Address, body: (tx: TransactionContext) => T, options: TransactOptions): TransactionOutcome<T> {
    const nonce = this.getNonce(sender);
    const blockNumber = this.head + 1n;
    const gasLimit = options.gasLimit ?? this.blockGasLimit;
    // Rejected before inclusion: no block, no receipt, no nonce bump.
    if (gasLimit < TX_BASE_GAS) {
      throw new Error(`intrinsic gas too low: have ${gasLimit}, want ${TX_BASE_GAS}`);
    }
    const hash = keccak256(
      encodeAbiParameters(
        [{ type: 'uint256' }, { type: 'address' }, { type: 'uint256' }],
        [BigInt(this.chainId), sender, BigInt(nonce)],
      ),
    );
    const blockHash = keccak256(concat([toHex(blockNumber, { size: 32 }), hash]));

    const journal = new Map<string, AccountState>();
    const pendingLogs: LogEntry[] = [];
    let gasUsed = TX_BASE_GAS;

    const read = (address: Address): AccountState =>
      journal.get(accountKey(address)) ?? this.accounts.get(accountKey(address)) ?? EMPTY_ACCOUNT;

    const context: TransactionContext = {
      hash,
      sender,
      blockNumber,
      getCode: (address) => read(address).code,
      getNonce: (address) => read(address).nonce,
      create2: (deployer, salt, initCode) => {
        const runtime = runConstructor(initCode);
        if (runtime === null) return null;

        const cost = create2Gas(initCode, runtime);
        if (gasUsed + cost > gasLimit) {
          gasUsed = gasLimit;
          return null;
        }
        gasUsed += cost;

        const target = getContractAddress({ opcode: 'CREATE2', from: deployer, salt, bytecode: initCode });
        const existing = read(target);
        if (existing.code !== '0x' || existing.nonce > 0) return null;

        const creator = read(deployer);
        journal.set(accountKey(deployer), { ...creator, nonce: creator.nonce + 1 });
        journal.set(accountKey(target), { code: runtime, nonce: 1 });
        return target;
      },
      emit: (log) => {
        const cost = logGas(log);
        if (gasUsed + cost > gasLimit) {
          gasUsed = gasLimit;
          throw new Error('out of gas');
        }
        gasUsed += cost;
        pendingLogs.push(log);
      },
    };

    this.transactions.set(hash, {
      hash,
      from: sender,
      to: options.to ?? null,
      input: options.input ?? '0x',
      nonce,
      gasLimit,
      blockNumber,
      blockHash,
    });
    this.head = blockNumber;
    this.setNonce(sender, nonce + 1);

    let result: T;
    try {
      result = body(context);
    } catch (err) {
      this.receipts.set(hash, {
        transactionHash: hash,
        blockNumber,
        blockHash,
        from: sender,
        to: options.to ?? null,
        status: 'reverted',
        gasUsed,
        logs: [],
      });
      throw err;
    }

    for (const [key, state] of journal) {
      this.accounts.set(key, state);
    }
    const committed: LedgerLog[] = pendingLogs.map((log, i) => ({
      ...log,
      blockNumber,
      blockHash,
      transactionHash: hash,
      transactionIndex: 0,
      logIndex: i,
    }));
    this.logs.push(...committed);

    const receipt: LedgerReceipt = {
      transactionHash: hash,
      blockNumber,
      blockHash,
      from: sender,
      to: options.to ?? null,
      status: 'success',
      gasUsed,
      logs: committed,
    };
    this.receipts.set(hash, receipt);

    if (committed.length > 0) {
      for (const listener of this.listeners) {
        try {
          listener(committed);
        } catch (err) {
          console.error('[ledger] log listener failed:', err instanceof Error ? err.message : String(err));
        }
      }
    }

    return { result, receipt };
  }
}
