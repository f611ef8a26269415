// ─── Chain Configurations ────────────────────────────────

export interface ChainConfig {
  chainId: number;
  name: string;
  rpc: string;
  explorer: string;
  isTestnet: boolean;
}

export const CHAINS: Record<number, ChainConfig> = {
  1: {
    chainId: 1,
    name: 'Ethereum',
    rpc: 'https://eth.llamarpc.com',
    explorer: 'https://etherscan.io',
    isTestnet: false,
  },
  8453: {
    chainId: 8453,
    name: 'Base',
    rpc: 'https://mainnet.base.org',
    explorer: 'https://basescan.org',
    isTestnet: false,
  },
  84532: {
    chainId: 84532,
    name: 'Base Sepolia',
    rpc: 'https://sepolia.base.org',
    explorer: 'https://sepolia.basescan.org',
    isTestnet: true,
  },
  31337: {
    chainId: 31337,
    name: 'Local Ledger',
    rpc: '',
    explorer: '',
    isTestnet: true,
  },
} as const;

/** In-process ledger chain id */
export const LOCAL_CHAIN_ID = 31337;
