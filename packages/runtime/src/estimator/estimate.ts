// Proof Cost Estimation
//
// Computes an EstimateResult from an EstimateRequest and the profile catalog.
// Pure: identical requests produce identical results, nothing is read or
// written outside the arguments and the frozen catalog.

import type {
  EstimateRequest,
  EstimateResult,
  ProvingSystemProfile,
} from '@proofcost/protocol';
import { getProfile, isSecurityBits, validateEstimateRequest } from '@proofcost/protocol';
import {
  InvalidParameterError,
  UnknownSystemError,
  UnsupportedSecurityLevelError,
  toEstimatorError,
} from '../errors.js';
import { defaultVolumeCurve, type VolumeCurve } from './volume.js';

/**
 * Options for estimating proof cost
 */
export type EstimateOptions = {
  /**
   * Volume scaling curve (defaults to the logarithmic default curve)
   */
  volumeCurve?: VolumeCurve;
};

/**
 * Number of proofs needed for txCount transactions.
 * A partial final batch still costs a whole proof.
 */
export function calculateBatches(txCount: number, batchSize: number): number {
  return Math.ceil(txCount / batchSize);
}

/**
 * Look up the security factor for a profile.
 *
 * @throws UnsupportedSecurityLevelError for levels outside 128/192/256
 */
export function securityFactorFor(profile: ProvingSystemProfile, securityBits: unknown): number {
  if (!isSecurityBits(securityBits)) {
    throw new UnsupportedSecurityLevelError(securityBits);
  }
  return profile.securityScaling[securityBits];
}

function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidParameterError(`${field} must be a positive integer`, {
      field,
      details: { value },
    });
  }
}

function assertPositiveReal(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(`${field} must be > 0`, { field, details: { value } });
  }
}

/**
 * Parse untrusted parameters into an EstimateRequest.
 *
 * @throws The typed error for the first failing field
 */
export function parseEstimateRequest(input: unknown): EstimateRequest {
  const result = validateEstimateRequest(input);
  if (!result.valid) {
    throw toEstimatorError(result.errors[0]);
  }
  return result.value;
}

/**
 * Estimate proof counts, latency and cost for a request.
 *
 * The request is expected to come from validation; it is re-checked here
 * so that no invalid value reaches the arithmetic.
 *
 * @throws UnknownSystemError, UnsupportedSecurityLevelError, InvalidParameterError
 */
export function estimateCost(request: EstimateRequest, options: EstimateOptions = {}): EstimateResult {
  const { volumeCurve = defaultVolumeCurve } = options;
  const { txCount, systemKey, batchSize, securityBits, hardwareScale } = request;

  const profile = getProfile(systemKey);
  if (!profile) {
    throw new UnknownSystemError(systemKey);
  }

  const securityFactor = securityFactorFor(profile, securityBits);

  assertPositiveInteger('txCount', txCount);
  assertPositiveInteger('batchSize', batchSize);
  assertPositiveReal('hardwareScale', hardwareScale);

  const volumeFactor = volumeCurve(txCount);
  if (!Number.isFinite(volumeFactor) || volumeFactor <= 0) {
    throw new InvalidParameterError('volume curve must produce a positive factor', {
      field: 'volumeCurve',
      details: { txCount, volumeFactor },
    });
  }

  const batches = calculateBatches(txCount, batchSize);

  const perProofMs = (profile.baseMsPerProof * securityFactor * volumeFactor) / hardwareScale;
  const perProofUsd = (profile.baseUsdPerProof * securityFactor * volumeFactor) / hardwareScale;

  const totalMs = perProofMs * batches;
  const totalUsd = perProofUsd * batches;

  return Object.freeze({
    system: profile.key,
    systemName: profile.displayName,
    family: profile.family,
    description: profile.description,
    securityBits,
    hardwareScale,
    txCount,
    batchSize,
    batches,
    perProofMs,
    perProofUsd,
    totalMs,
    totalUsd,
    perTxMs: totalMs / txCount,
    perTxUsd: totalUsd / txCount,
    volumeFactor,
  });
}
