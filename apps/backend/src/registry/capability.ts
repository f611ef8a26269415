import { hexToBigInt, toFunctionSelector, toHex, type Hex } from 'viem';

// Functions that make up the registry interface; the identifier is the XOR
// of their selectors, ERC-165 style.
export const CAPABILITY_SIGNATURES = [
  'create(address,bytes32,uint256,address,uint256)',
  'compute(address,bytes32,uint256,address,uint256)',
] as const;

export const SERVICE_REGISTRY_INTERFACE_ID: Hex = toHex(
  CAPABILITY_SIGNATURES.reduce((id, signature) => id ^ hexToBigInt(toFunctionSelector(signature)), 0n),
  { size: 4 },
);

/** True only for this protocol's own identifier. */
export function supportsCapability(capabilityId: string): boolean {
  return capabilityId.toLowerCase() === SERVICE_REGISTRY_INTERFACE_ID;
}
