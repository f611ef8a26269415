import type { Address, Hex } from 'viem';
import { ZERO_SALT, type BindingRecord } from '@token-services/shared';

export const IMPLEMENTATION: Address = '0x1111111111111111111111111111111111111111';
export const TOKEN_CONTRACT: Address = '0x2222222222222222222222222222222222222222';
export const REGISTRY_ADDRESS: Address = '0x000000000000000000000000000000000000ce55';
export const OTHER_REGISTRY_ADDRESS: Address = '0x000000000000000000000000000000000000beef';
export const SENDER: Address = '0x00000000000000000000000000000000000000a1';
export const SALT_ONE: Hex = '0x0000000000000000000000000000000000000000000000000000000000000001';

/** Implementation 0x11..11, zero salt, chain 1, token 0x22..22 #42 */
export function binding(overrides: Partial<BindingRecord> = {}): BindingRecord {
  return {
    implementation: IMPLEMENTATION,
    salt: ZERO_SALT,
    originChainId: 1n,
    tokenContract: TOKEN_CONTRACT,
    tokenId: 42n,
    ...overrides,
  };
}

/** 32-byte big-endian word as bare hex digits */
export function word(value: bigint): string {
  return value.toString(16).padStart(64, '0');
}

/** Placeholder key for a local signer; never funded anywhere. */
export const SIGNER_KEY: Hex = `0x${'01'.repeat(32)}`;
