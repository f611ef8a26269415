// ─── Constants ───────────────────────────────────────────

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;

export const ZERO_SALT = '0x0000000000000000000000000000000000000000000000000000000000000000' as const;

/** Largest uint256 */
export const MAX_UINT256 = 2n ** 256n - 1n;

/** Generic ERC-165 interface id (supportsInterface itself) */
export const ERC165_INTERFACE_ID = '0x01ffc9a7' as const;

/** Block gas limit of the in-process ledger */
export const DEFAULT_BLOCK_GAS_LIMIT = 30_000_000n;

// Artifact layout
export {
  ARTIFACT_HEADER,
  ARTIFACT_FOOTER,
  CREATION_PREFIX,
  CREATE2_PREFIX,
  ARTIFACT_SIZE,
  CREATION_CODE_SIZE,
  ARTIFACT_SEGMENTS,
  TOKEN_REFERENCE_OFFSET,
  TOKEN_REFERENCE_SIZE,
} from './artifact.js';
export type { ArtifactSegment, ArtifactSegmentName } from './artifact.js';

// Chain configurations
export { CHAINS, LOCAL_CHAIN_ID } from './chains.js';
export type { ChainConfig } from './chains.js';
