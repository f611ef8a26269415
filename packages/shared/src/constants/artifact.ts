// ─── Service Artifact Layout ─────────────────────────────
// Deployed code of every service: a minimal delegate-forwarder with the
// binding appended. Offsets and template bytes are the compatibility
// surface with existing deployments; they must never change.

/** Forwarder prologue, ends with PUSH20 for the implementation address. */
export const ARTIFACT_HEADER = '0x363d3d373d3d3d363d73' as const;

/** Forwarder epilogue: DELEGATECALL, return data copy, revert/return. */
export const ARTIFACT_FOOTER = '0x5af43d82803e903d91602b57fd5bf3' as const;

/**
 * Constructor placed in front of the artifact at creation time.
 * Copies the 0xad (173) bytes following it into memory and returns them.
 */
export const CREATION_PREFIX = '0x3d60ad80600a3d3981f3' as const;

/** CREATE2 domain tag byte. */
export const CREATE2_PREFIX = '0xff' as const;

export const ARTIFACT_SIZE = 173;
export const CREATION_CODE_SIZE = 183;

export type ArtifactSegmentName =
  | 'header'
  | 'implementation'
  | 'footer'
  | 'salt'
  | 'originChainId'
  | 'tokenContract'
  | 'tokenId';

export interface ArtifactSegment {
  name: ArtifactSegmentName;
  offset: number;
  length: number;
}

/** Segment table, in layout order. */
export const ARTIFACT_SEGMENTS: readonly ArtifactSegment[] = [
  { name: 'header', offset: 0, length: 10 },
  { name: 'implementation', offset: 10, length: 20 },
  { name: 'footer', offset: 30, length: 15 },
  { name: 'salt', offset: 45, length: 32 },
  { name: 'originChainId', offset: 77, length: 32 },
  { name: 'tokenContract', offset: 109, length: 32 },
  { name: 'tokenId', offset: 141, length: 32 },
] as const;

/** Byte offset of the token reference read by `token()`. */
export const TOKEN_REFERENCE_OFFSET = 77;
/** Byte length of the token reference (chain id, contract, id). */
export const TOKEN_REFERENCE_SIZE = 96;
