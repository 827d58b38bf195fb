// On-chain Verification Cost
//
// Prices the on-chain verification of proofs: gas -> ETH -> USD.

import type {
  ComparisonVerdict,
  VerificationComparison,
  VerificationCostRequest,
  VerificationCostResult,
} from '@proofcost/protocol';
import {
  LARGE_PROOF_COUNT_THRESHOLD,
  validateVerificationComparisonRequest,
  validateVerificationCostRequest,
} from '@proofcost/protocol';
import { toEstimatorError } from '../errors.js';
import { consoleLogger, type EstimatorLogger } from '../logging/index.js';

export const ETH_PER_GWEI = 1e-9;

export type VerificationOptions = {
  /**
   * Receives a warning for unusually large proof counts (defaults to console)
   */
  logger?: EstimatorLogger;
};

function warnOnLargeCount(numProofs: number, logger: EstimatorLogger): void {
  if (numProofs > LARGE_PROOF_COUNT_THRESHOLD) {
    logger.warn('numProofs is very large; check that this is intentional', {
      numProofs,
      threshold: LARGE_PROOF_COUNT_THRESHOLD,
    });
  }
}

function price(request: VerificationCostRequest): VerificationCostResult {
  const totalGas = request.numProofs * request.gasPerProof;
  const totalEth = totalGas * request.gasPriceGwei * ETH_PER_GWEI;
  return Object.freeze({
    ...request,
    totalGas,
    totalEth,
    totalUsd: totalEth * request.ethPriceUsd,
  });
}

/**
 * Price the verification of numProofs proofs.
 *
 * @param input - Untrusted parameters
 * @throws InvalidParameterError for the first failing field
 */
export function estimateVerificationCost(
  input: unknown,
  options: VerificationOptions = {}
): VerificationCostResult {
  const { logger = consoleLogger } = options;

  const validation = validateVerificationCostRequest(input);
  if (!validation.valid) {
    throw toEstimatorError(validation.errors[0]);
  }

  warnOnLargeCount(validation.value.numProofs, logger);
  return price(validation.value);
}

export function verdictFor(diffUsd: number): ComparisonVerdict {
  if (diffUsd > 0) {
    return 'b_more_expensive';
  }
  if (diffUsd < 0) {
    return 'b_cheaper';
  }
  return 'equal';
}

/**
 * Price two gas-per-proof figures under the same market and report B - A.
 *
 * @param input - Untrusted parameters
 * @throws InvalidParameterError for the first failing field
 */
export function compareVerificationCosts(
  input: unknown,
  options: VerificationOptions = {}
): VerificationComparison {
  const { logger = consoleLogger } = options;

  const validation = validateVerificationComparisonRequest(input);
  if (!validation.valid) {
    throw toEstimatorError(validation.errors[0]);
  }

  const { numProofs, gasPerProofA, gasPerProofB, gasPriceGwei, ethPriceUsd } = validation.value;
  warnOnLargeCount(numProofs, logger);

  const a = price({ numProofs, gasPerProof: gasPerProofA, gasPriceGwei, ethPriceUsd });
  const b = price({ numProofs, gasPerProof: gasPerProofB, gasPriceGwei, ethPriceUsd });
  const diffUsd = b.totalUsd - a.totalUsd;

  return Object.freeze({
    a,
    b,
    diffEth: b.totalEth - a.totalEth,
    diffUsd,
    verdict: verdictFor(diffUsd),
  });
}
