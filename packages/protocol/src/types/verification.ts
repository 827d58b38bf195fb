// On-chain verification cost types

/**
 * Parameters for pricing the on-chain verification of a number of proofs
 */
export type VerificationCostRequest = {
  numProofs: number;
  gasPerProof: number;
  gasPriceGwei: number;
  ethPriceUsd: number;
};

export type VerificationCostResult = VerificationCostRequest & {
  readonly totalGas: number;
  readonly totalEth: number;
  readonly totalUsd: number;
};

/**
 * Parameters for comparing two gas-per-proof figures under the same market
 */
export type VerificationComparisonRequest = {
  numProofs: number;
  gasPerProofA: number;
  gasPerProofB: number;
  gasPriceGwei: number;
  ethPriceUsd: number;
};

/**
 * Outcome of a comparison, read as "scheme B relative to scheme A"
 */
export type ComparisonVerdict = 'b_more_expensive' | 'b_cheaper' | 'equal';

export type VerificationComparison = {
  readonly a: VerificationCostResult;
  readonly b: VerificationCostResult;

  /**
   * b.totalEth - a.totalEth
   */
  readonly diffEth: number;

  /**
   * b.totalUsd - a.totalUsd
   */
  readonly diffUsd: number;

  readonly verdict: ComparisonVerdict;
};
