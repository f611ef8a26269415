import type { Address, Hex } from 'viem';

// ─── Ledger Types ────────────────────────────────────────

export type LogTopics = [Hex, ...Hex[]] | [];

export interface LogEntry {
  address: Address;
  topics: LogTopics;
  data: Hex;
}

export interface LedgerLog extends LogEntry {
  blockNumber: bigint;
  blockHash: Hex;
  transactionHash: Hex;
  transactionIndex: number;
  logIndex: number;
}

export type ReceiptStatus = 'success' | 'reverted';

export interface LedgerReceipt {
  transactionHash: Hex;
  blockNumber: bigint;
  blockHash: Hex;
  from: Address;
  to: Address | null;
  status: ReceiptStatus;
  gasUsed: bigint;
  logs: LedgerLog[];
}

export interface LedgerTransaction {
  hash: Hex;
  from: Address;
  to: Address | null;
  input: Hex;
  nonce: number;
  gasLimit: bigint;
  blockNumber: bigint;
  blockHash: Hex;
}

export interface TransactOptions {
  to?: Address;
  input?: Hex;
  gasLimit?: bigint;
}

/**
 * View of the ledger handed to a transaction body. Writes go to a journal
 * that is committed only if the body returns.
 */
export interface TransactionContext {
  readonly hash: Hex;
  readonly sender: Address;
  readonly blockNumber: bigint;
  getCode(address: Address): Hex;
  getNonce(address: Address): number;
  /** Deterministic deployment. Returns null when the primitive fails. */
  create2(deployer: Address, salt: Hex, initCode: Hex): Address | null;
  emit(log: LogEntry): void;
}

export interface TransactionOutcome<T> {
  result: T;
  receipt: LedgerReceipt;
}

export interface LogFilter {
  address?: Address;
  fromBlock?: bigint;
  /** Positional topic match; null matches anything. */
  topics?: (Hex | null)[];
}

export type LogListener = (logs: LedgerLog[]) => void;

/**
 * Serialized execution substrate: state-changing work is totally ordered,
 * and code-at-address is the only registry state.
 */
export interface Ledger {
  readonly chainId: number;
  blockNumber(): bigint;
  getCode(address: Address): Hex;
  getNonce(address: Address): number;
  transact<T>(
    sender: Address,
    body: (tx: TransactionContext) => T,
    options?: TransactOptions,
  ): Promise<TransactionOutcome<T>>;
  getReceipt(hash: Hex): LedgerReceipt | undefined;
  getTransaction(hash: Hex): LedgerTransaction | undefined;
  getLogs(filter?: LogFilter): LedgerLog[];
  onLogs(listener: LogListener): () => void;
}
