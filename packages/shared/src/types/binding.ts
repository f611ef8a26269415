// ─── Binding Types ───────────────────────────────────────

/**
 * Immutable identity of a service: one deployed artifact exists per
 * distinct record on a given registry.
 */
export interface BindingRecord {
  /** Delegate target shared by every service of this kind */
  implementation: `0x${string}`;
  /** Caller-chosen 32-byte disambiguator */
  salt: `0x${string}`;
  /** Chain the token lives on; may differ from the deployment chain */
  originChainId: bigint;
  tokenContract: `0x${string}`;
  tokenId: bigint;
}

/** Loosely typed binding as it arrives over the wire or from a CLI. */
export interface BindingInput {
  implementation: string;
  salt: string;
  originChainId: bigint | number | string;
  tokenContract: string;
  tokenId: bigint | number | string;
}

/** What a deployed service reports through `token()`. */
export interface TokenReference {
  originChainId: bigint;
  tokenContract: `0x${string}`;
  tokenId: bigint;
}

export type ServiceStatus = 'NOT_DEPLOYED' | 'DEPLOYED';

/**
 * Emitted exactly once, by the transaction that first deploys a service.
 */
export interface CreationRecord extends BindingRecord {
  service: `0x${string}`;
  blockNumber: bigint;
  transactionHash: `0x${string}`;
}

/** JSON-safe binding: integers as decimal strings. */
export interface SerializedBinding {
  implementation: string;
  salt: string;
  originChainId: string;
  tokenContract: string;
  tokenId: string;
}

export interface SerializedCreationRecord extends SerializedBinding {
  service: string;
  blockNumber: string;
  transactionHash: string;
}
