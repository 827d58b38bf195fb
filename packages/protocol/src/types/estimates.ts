// Estimate request and result types

import type { SecurityBits, SystemKey } from './common.js';

/**
 * A validated set of estimate parameters.
 * Only produced by request validation; never partially valid.
 */
export type EstimateRequest = {
  /**
   * Number of transactions to estimate for (positive integer)
   */
  txCount: number;

  systemKey: SystemKey;

  /**
   * Transactions per proof (positive integer)
   */
  batchSize: number;

  securityBits: SecurityBits;

  /**
   * Relative capability of the proving hardware.
   * 1.0 = reference machine, larger = faster and cheaper.
   */
  hardwareScale: number;
};

/**
 * Raw, unvalidated estimate parameters as they arrive from a caller.
 * Optional fields fall back to the documented defaults.
 */
export type EstimateRequestInput = {
  txCount: unknown;
  systemKey?: unknown;
  batchSize?: unknown;
  securityBits?: unknown;
  hardwareScale?: unknown;
};

/**
 * The computed estimate. Derived entirely from one request and its profile.
 */
export type EstimateResult = {
  readonly system: SystemKey;
  readonly systemName: string;
  readonly family: string;
  readonly description: string;
  readonly securityBits: SecurityBits;
  readonly hardwareScale: number;
  readonly txCount: number;
  readonly batchSize: number;

  /**
   * Number of proofs needed to cover all transactions
   */
  readonly batches: number;

  readonly perProofMs: number;
  readonly perProofUsd: number;
  readonly totalMs: number;
  readonly totalUsd: number;
  readonly perTxMs: number;
  readonly perTxUsd: number;

  /**
   * Per-proof scaling applied for the overall transaction volume
   */
  readonly volumeFactor: number;
};
