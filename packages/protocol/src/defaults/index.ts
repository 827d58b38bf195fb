// Documented defaults for omitted estimate parameters

import type { EstimateRequest } from '../types/estimates.js';

export const DEFAULT_ESTIMATE_PARAMETERS: Readonly<Omit<EstimateRequest, 'txCount'>> = Object.freeze({
  systemKey: 'aztec',
  batchSize: 500,
  securityBits: 128,
  hardwareScale: 1.0,
});

/**
 * Proof counts above this are likely a typo (warned about, still computed)
 */
export const LARGE_PROOF_COUNT_THRESHOLD = 10_000_000;
