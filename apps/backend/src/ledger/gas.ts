import { size, type Hex } from 'viem';
import type { LogEntry } from './types.js';

// ─── Gas Schedule ────────────────────────────────────────
// Subset of the EVM schedule that matters for service creation.

export const TX_BASE_GAS = 21_000n;
export const CREATE2_BASE_GAS = 32_000n;
/** keccak of the init code, per 32-byte word */
export const HASH_WORD_GAS = 6n;
/** EIP-3860 init code metering, per 32-byte word */
export const INITCODE_WORD_GAS = 2n;
/** Per byte of deployed code */
export const CODE_DEPOSIT_GAS = 200n;
export const LOG_BASE_GAS = 375n;
export const LOG_TOPIC_GAS = 375n;
export const LOG_DATA_BYTE_GAS = 8n;

function words(bytes: number): bigint {
  return BigInt(Math.ceil(bytes / 32));
}

export function create2Gas(initCode: Hex, runtime: Hex): bigint {
  return (
    CREATE2_BASE_GAS +
    (HASH_WORD_GAS + INITCODE_WORD_GAS) * words(size(initCode)) +
    CODE_DEPOSIT_GAS * BigInt(size(runtime))
  );
}

export function logGas(log: LogEntry): bigint {
  return LOG_BASE_GAS + LOG_TOPIC_GAS * BigInt(log.topics.length) + LOG_DATA_BYTE_GAS * BigInt(size(log.data));
}
