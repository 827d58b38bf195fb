// Estimator error types

import type {
  EstimatorErrorCode,
  RequestValidationError,
  SecurityBits,
  SystemKey,
} from '@proofcost/protocol';
import { SECURITY_LEVELS, SYSTEM_KEYS } from '@proofcost/protocol';

/**
 * Base class for all estimator errors.
 * Every failure is terminal for its invocation; nothing is retried.
 */
export class EstimatorError extends Error {
  readonly code: EstimatorErrorCode;

  constructor(code: EstimatorErrorCode, message: string) {
    super(message);
    this.name = 'EstimatorError';
    this.code = code;
  }
}

/**
 * A numeric input is outside its valid domain.
 */
export class InvalidParameterError extends EstimatorError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('INVALID_PARAMETER', message);
    this.name = 'InvalidParameterError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * The requested system key is not in the profile catalog.
 */
export class UnknownSystemError extends EstimatorError {
  readonly systemKey: string;
  readonly validKeys: readonly SystemKey[];

  constructor(systemKey: string) {
    super(
      'UNKNOWN_SYSTEM',
      `Unknown proving system "${systemKey}"; valid systems: ${SYSTEM_KEYS.join(', ')}`
    );
    this.name = 'UnknownSystemError';
    this.systemKey = systemKey;
    this.validKeys = SYSTEM_KEYS;
  }
}

/**
 * The requested security level has no scaling factor.
 */
export class UnsupportedSecurityLevelError extends EstimatorError {
  readonly securityBits: unknown;
  readonly supportedLevels: readonly SecurityBits[];

  constructor(securityBits: unknown) {
    super(
      'UNSUPPORTED_SECURITY_LEVEL',
      `Unsupported security level ${String(securityBits)}; supported levels: ${SECURITY_LEVELS.join(', ')}`
    );
    this.name = 'UnsupportedSecurityLevelError';
    this.securityBits = securityBits;
    this.supportedLevels = SECURITY_LEVELS;
  }
}

export function isEstimatorError(error: unknown): error is EstimatorError {
  return error instanceof EstimatorError;
}

/**
 * Convert a validation failure into the matching typed error.
 */
export function toEstimatorError(failure: RequestValidationError): EstimatorError {
  switch (failure.code) {
    case 'UNKNOWN_SYSTEM':
      return new UnknownSystemError(String(failure.value));
    case 'UNSUPPORTED_SECURITY_LEVEL':
      return new UnsupportedSecurityLevelError(failure.value);
    case 'INVALID_PARAMETER':
      return new InvalidParameterError(failure.message, {
        field: failure.field,
        details: { value: failure.value },
      });
  }
}
