/**
 * Accessor every deployed service answers: the token it is bound to.
 */
export const ServiceAccessorAbi = [
  {
    inputs: [],
    name: 'token',
    outputs: [
      { name: 'chainId', type: 'uint256' },
      { name: 'tokenContract', type: 'address' },
      { name: 'tokenId', type: 'uint256' },
    ],
    stateMutability: 'view',
    type: 'function',
  },
] as const;
