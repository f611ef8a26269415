/**
 * ServiceRegistry ABI: create, compute, supportsInterface, Created, CreationFailed.
 * Same surface whether the registry runs on a chain or on the in-process ledger.
 */
export const ServiceRegistryAbi = [
  {
    inputs: [
      { name: 'implementation', type: 'address' },
      { name: 'salt', type: 'bytes32' },
      { name: 'chainId', type: 'uint256' },
      { name: 'tokenContract', type: 'address' },
      { name: 'tokenId', type: 'uint256' },
    ],
    name: 'create',
    outputs: [{ name: 'service', type: 'address' }],
    stateMutability: 'nonpayable',
    type: 'function',
  },
  {
    inputs: [
      { name: 'implementation', type: 'address' },
      { name: 'salt', type: 'bytes32' },
      { name: 'chainId', type: 'uint256' },
      { name: 'tokenContract', type: 'address' },
      { name: 'tokenId', type: 'uint256' },
    ],
    name: 'compute',
    outputs: [{ name: 'service', type: 'address' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    inputs: [{ name: 'interfaceId', type: 'bytes4' }],
    name: 'supportsInterface',
    outputs: [{ name: '', type: 'bool' }],
    stateMutability: 'view',
    type: 'function',
  },
  {
    anonymous: false,
    inputs: [
      { indexed: false, name: 'service', type: 'address' },
      { indexed: true, name: 'implementation', type: 'address' },
      { indexed: false, name: 'salt', type: 'bytes32' },
      { indexed: false, name: 'chainId', type: 'uint256' },
      { indexed: true, name: 'tokenContract', type: 'address' },
      { indexed: true, name: 'tokenId', type: 'uint256' },
    ],
    name: 'Created',
    type: 'event',
  },
  {
    inputs: [],
    name: 'CreationFailed',
    type: 'error',
  },
] as const;
