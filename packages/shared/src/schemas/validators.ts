import { z } from 'zod';
import { MAX_UINT256 } from '../constants/index.js';

// ─── Hex / Integer Validators ────────────────────────────
// Reusable Zod refinements for EVM-compatible data.

function toLowerHex(value: string): `0x${string}` {
  return `0x${value.slice(2).toLowerCase()}`;
}

/** Ethereum address: 0x + 40 hex chars, normalised to lower case */
export const zAddress = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'Invalid Ethereum address (expected 0x + 40 hex chars)')
  .transform(toLowerHex);

/** 32-byte hex: 0x + 64 hex chars, normalised to lower case */
export const zBytes32 = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, 'Invalid bytes32 (expected 0x + 64 hex chars)')
  .transform(toLowerHex);

/** Capability / interface identifier: 0x + 8 hex chars */
export const zBytes4 = z
  .string()
  .regex(/^0x[0-9a-fA-F]{8}$/, 'Invalid bytes4 (expected 0x + 8 hex chars)')
  .transform(toLowerHex);

/**
 * uint256 given as bigint, safe integer, decimal string or 0x hex string.
 */
export const zUint256 = z
  .union([
    z.bigint(),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.string().regex(/^(0x[0-9a-fA-F]{1,64}|[0-9]{1,78})$/, 'Invalid uint256 (expected decimal or 0x hex)'),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n && value <= MAX_UINT256, 'uint256 out of range');
