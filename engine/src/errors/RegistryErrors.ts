/**
 * Registry Errors
 *
 * @module errors
 */

import { CapflowError } from './CapflowError.js';
import { CapflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * Duplicate capability registration
 */
export class ConflictError extends CapflowError {
  readonly capabilityId: string;

  constructor(capabilityId: string) {
    super({
      code: CapflowErrorCode.REGISTRY_CONFLICT,
      message: `Capability '${capabilityId}' is already registered`,
      severity: ErrorSeverity.ERROR,
      context: { capabilityId },
    });
    this.capabilityId = capabilityId;
  }
}

/**
 * Lookup of an unknown capability
 */
export class NotFoundError extends CapflowError {
  readonly capabilityId: string;

  constructor(capabilityId: string, available: readonly string[]) {
    super({
      code: CapflowErrorCode.REGISTRY_NOT_FOUND,
      message: `Capability '${capabilityId}' is not registered`,
      severity: ErrorSeverity.ERROR,
      hint: available.length > 0
        ? `Registered capabilities: ${available.join(', ')}`
        : 'No capabilities are registered',
      context: { capabilityId, available: [...available] },
    });
    this.capabilityId = capabilityId;
  }
}

/**
 * Provider construction or initialization failure
 */
export class InitError extends CapflowError {
  readonly providerName: string;

  constructor(providerName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: CapflowErrorCode.PROVIDER_INIT_FAILED,
      message: `Provider '${providerName}' failed to initialize: ${reason}`,
      severity: ErrorSeverity.ERROR,
      context: { providerName },
      cause,
    });
    this.providerName = providerName;
  }
}
