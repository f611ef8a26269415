import { z } from 'zod';
import { zAddress, zBytes32, zUint256 } from './validators.js';
import type {
  BindingInput,
  BindingRecord,
  CreationRecord,
  SerializedBinding,
  SerializedCreationRecord,
} from '../types/binding.js';

// ─── Binding Zod Schemas ─────────────────────────────────

export const BindingRecordSchema = z.object({
  implementation: zAddress,
  salt: zBytes32,
  originChainId: zUint256,
  tokenContract: zAddress,
  tokenId: zUint256,
});

// ─── Helpers ─────────────────────────────────────────────

/** Normalise wire input into a BindingRecord. Throws ZodError on bad input. */
export function toBindingRecord(input: BindingInput): BindingRecord {
  return BindingRecordSchema.parse(input);
}

/** Canonical key: equal records always produce the same key. */
export function bindingKey(binding: BindingRecord): string {
  return [
    binding.implementation.toLowerCase(),
    binding.salt.toLowerCase(),
    binding.originChainId.toString(),
    binding.tokenContract.toLowerCase(),
    binding.tokenId.toString(),
  ].join(':');
}

export function bindingsEqual(a: BindingRecord, b: BindingRecord): boolean {
  return bindingKey(a) === bindingKey(b);
}

export function serializeBinding(binding: BindingRecord): SerializedBinding {
  return {
    implementation: binding.implementation,
    salt: binding.salt,
    originChainId: binding.originChainId.toString(),
    tokenContract: binding.tokenContract,
    tokenId: binding.tokenId.toString(),
  };
}

export function serializeCreationRecord(record: CreationRecord): SerializedCreationRecord {
  return {
    ...serializeBinding(record),
    service: record.service,
    blockNumber: record.blockNumber.toString(),
    transactionHash: record.transactionHash,
  };
}
