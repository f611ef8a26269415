import { hexToBigInt, slice, type Address, type Hex } from 'viem';
import { TOKEN_REFERENCE_OFFSET, TOKEN_REFERENCE_SIZE, type TokenReference } from '@token-services/shared';
import { isServiceArtifact, lowerHex } from './artifactBuilder.js';
import { ServiceNotDeployedError } from './errors.js';
import type { Ledger } from '../ledger/types.js';

/**
 * Decode the token reference from a service's own deployed bytes.
 * Reads only the trailing 96 bytes at offset 77.
 */
export function readTokenReference(code: Hex): TokenReference {
  const reference = slice(code, TOKEN_REFERENCE_OFFSET, TOKEN_REFERENCE_OFFSET + TOKEN_REFERENCE_SIZE, {
    strict: true,
  });
  return {
    originChainId: hexToBigInt(slice(reference, 0, 32)),
    tokenContract: lowerHex(slice(reference, 44, 64)),
    tokenId: hexToBigInt(slice(reference, 64, 96)),
  };
}

/**
 * What a deployed service answers when asked which token it belongs to.
 */
export class ServiceAccessor {
  private constructor(
    private readonly ledger: Ledger,
    public readonly address: Address,
  ) {}

  static at(ledger: Ledger, address: Address): ServiceAccessor {
    return new ServiceAccessor(ledger, address);
  }

  token(): TokenReference {
    const code = this.ledger.getCode(this.address);
    if (!isServiceArtifact(code)) {
      throw new ServiceNotDeployedError(this.address);
    }
    return readTokenReference(code);
  }
}
