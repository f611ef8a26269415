import { describe, it, expect } from 'vitest';
import { buildArtifact } from '../src/registry/artifactBuilder.js';
import { ServiceNotDeployedError } from '../src/registry/errors.js';
import { readTokenReference, ServiceAccessor } from '../src/registry/serviceAccessor.js';
import { MemoryLedger } from '../src/ledger/memoryLedger.js';
import { binding, SALT_ONE, TOKEN_CONTRACT } from './helpers/fixtures.js';

const SERVICE = '0x5555555555555555555555555555555555555555';

describe('service accessor', () => {
  it('reads the token reference out of the artifact trailer', () => {
    expect(readTokenReference(buildArtifact(binding()))).toEqual({
      originChainId: 1n,
      tokenContract: TOKEN_CONTRACT,
      tokenId: 42n,
    });
  });

  it('does not depend on implementation or salt', () => {
    const a = readTokenReference(buildArtifact(binding()));
    const b = readTokenReference(
      buildArtifact(binding({ implementation: '0x3333333333333333333333333333333333333333', salt: SALT_ONE })),
    );
    expect(b).toEqual(a);
  });

  it('returns the origin chain even when it is not the ledger chain', () => {
    const ledger = new MemoryLedger({ chainId: 31337 });
    ledger.setCode(SERVICE, buildArtifact(binding({ originChainId: 8453n })));
    expect(ServiceAccessor.at(ledger, SERVICE).token().originChainId).toBe(8453n);
  });

  it('throws ServiceNotDeployedError for an address without a service', () => {
    const ledger = new MemoryLedger();
    expect(() => ServiceAccessor.at(ledger, SERVICE).token()).toThrow(ServiceNotDeployedError);
    ledger.setCode(SERVICE, '0x6080604052');
    expect(() => ServiceAccessor.at(ledger, SERVICE).token()).toThrow(`No service deployed at ${SERVICE}`);
  });
});
