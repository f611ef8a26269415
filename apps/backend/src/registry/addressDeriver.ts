import { concat, getAddress, keccak256, slice, type Address, type Hex } from 'viem';
import { CREATE2_PREFIX, type BindingRecord } from '@token-services/shared';
import { buildCreationCode } from './artifactBuilder.js';

/**
 * keccak256(0xff ++ deployer ++ salt ++ initCodeHash)[12:]
 */
export function create2Address(deployer: Address, salt: Hex, initCodeHash: Hex): Address {
  const digest = keccak256(concat([CREATE2_PREFIX, deployer, salt, initCodeHash]));
  return getAddress(slice(digest, 12));
}

export function initCodeHash(binding: BindingRecord): Hex {
  return keccak256(buildCreationCode(binding));
}

/** Address the service for `binding` has (or will have) under `deployer`. */
export function computeServiceAddress(deployer: Address, binding: BindingRecord): Address {
  return create2Address(deployer, binding.salt, initCodeHash(binding));
}
