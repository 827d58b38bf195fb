// Common types used across the protocol

/**
 * Key of a proving-system profile in the catalog
 */
export type SystemKey = 'aztec' | 'zama' | 'soundness';

/**
 * Supported logical security levels, in bits
 */
export type SecurityBits = 128 | 192 | 256;

/**
 * Error codes shared by validation results and runtime errors
 */
export type EstimatorErrorCode =
  | 'INVALID_PARAMETER'
  | 'UNKNOWN_SYSTEM'
  | 'UNSUPPORTED_SECURITY_LEVEL';
