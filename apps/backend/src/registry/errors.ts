import type { Address, Hex } from 'viem';

export type RegistryErrorCode = 'CREATION_FAILED' | 'SERVICE_NOT_DEPLOYED';

/** Base for failures surfaced by the registry; `code` is stable across releases. */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
  }
}

/**
 * The deployment primitive did not produce the service. The enclosing
 * transaction is reverted: no code at `service`, no Created record.
 */
export class CreationFailedError extends RegistryError {
  public readonly service: Address;
  /** Hash of the reverted transaction, when one was mined */
  public readonly transactionHash?: Hex;
  constructor(service: Address, options: { detail?: string; transactionHash?: Hex } = {}) {
    super('CREATION_FAILED', `CreationFailed: ${service}${options.detail ? ` (${options.detail})` : ''}`);
    this.name = 'CreationFailedError';
    this.service = service;
    this.transactionHash = options.transactionHash;
  }
}

/** No service artifact lives at the given address. */
export class ServiceNotDeployedError extends RegistryError {
  public readonly service: Address;
  constructor(service: Address) {
    super('SERVICE_NOT_DEPLOYED', `No service deployed at ${service}`);
    this.name = 'ServiceNotDeployedError';
    this.service = service;
  }
}

export function isRegistryError(err: unknown): err is RegistryError {
  return err instanceof RegistryError;
}
