/**
 * Service artifact construction.
 *
 * The deployed code is assembled from the named fixed-length segments of
 * ARTIFACT_SEGMENTS and nothing else, so `compute` and `create` always see
 * the same bytes. Layout (173 bytes):
 *
 *   [0, 10)    forwarder header
 *   [10, 30)   implementation
 *   [30, 45)   forwarder footer
 *   [45, 77)   salt
 *   [77, 109)  originChainId
 *   [109, 141) tokenContract, left-padded
 *   [141, 173) tokenId
 */

import { concat, hexToBigInt, pad, size, slice, toHex, type Hex } from 'viem';
import {
  ARTIFACT_FOOTER,
  ARTIFACT_HEADER,
  ARTIFACT_SEGMENTS,
  ARTIFACT_SIZE,
  CREATION_PREFIX,
  type ArtifactSegmentName,
  type BindingRecord,
} from '@token-services/shared';

export function lowerHex(value: Hex): Hex {
  return `0x${value.slice(2).toLowerCase()}`;
}

function segmentValues(binding: BindingRecord): Record<ArtifactSegmentName, Hex> {
  return {
    header: ARTIFACT_HEADER,
    implementation: binding.implementation,
    footer: ARTIFACT_FOOTER,
    salt: binding.salt,
    originChainId: toHex(binding.originChainId, { size: 32 }),
    tokenContract: pad(binding.tokenContract, { size: 32 }),
    tokenId: toHex(binding.tokenId, { size: 32 }),
  };
}

/** Deployed code of the service bound to `binding`. */
export function buildArtifact(binding: BindingRecord): Hex {
  const values = segmentValues(binding);
  const parts = ARTIFACT_SEGMENTS.map((segment) => {
    const value = values[segment.name];
    if (size(value) !== segment.length) {
      throw new Error(
        `Artifact segment "${segment.name}" must be ${segment.length} bytes, got ${size(value)}`,
      );
    }
    return lowerHex(value);
  });
  return concat(parts);
}

/** Creation bytes: copy-and-return constructor followed by the artifact. */
export function buildCreationCode(binding: BindingRecord): Hex {
  return concat([CREATION_PREFIX, buildArtifact(binding)]);
}

/** Read one named segment out of deployed code. */
export function readSegment(code: Hex, name: ArtifactSegmentName): Hex {
  const segment = ARTIFACT_SEGMENTS.find((s) => s.name === name);
  if (!segment) {
    throw new Error(`Unknown artifact segment "${name}"`);
  }
  return lowerHex(slice(code, segment.offset, segment.offset + segment.length, { strict: true }));
}

/** True when `code` has the service artifact shape (size and template bytes). */
export function isServiceArtifact(code: Hex): boolean {
  if (size(code) !== ARTIFACT_SIZE) return false;
  return readSegment(code, 'header') === ARTIFACT_HEADER && readSegment(code, 'footer') === ARTIFACT_FOOTER;
}

/** Recover the full binding from deployed code, or null if it is not a service artifact. */
export function decodeArtifact(code: Hex): BindingRecord | null {
  if (!isServiceArtifact(code)) return null;
  return {
    implementation: readSegment(code, 'implementation'),
    salt: readSegment(code, 'salt'),
    originChainId: hexToBigInt(readSegment(code, 'originChainId')),
    tokenContract: slice(readSegment(code, 'tokenContract'), 12),
    tokenId: hexToBigInt(readSegment(code, 'tokenId')),
  };
}
