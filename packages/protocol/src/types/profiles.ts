// Proving-system profile types

import type { SecurityBits, SystemKey } from './common.js';

/**
 * Multiplicative latency/cost factor for each supported security level.
 * Every profile defines all three levels.
 */
export type SecurityScaling = Readonly<Record<SecurityBits, number>>;

/**
 * A named, static description of a proving-system family's
 * baseline performance characteristics.
 */
export type ProvingSystemProfile = {
  readonly key: SystemKey;

  /**
   * Human-readable name
   */
  readonly displayName: string;

  /**
   * Short classification (e.g. "zk-snark", "fhe-hybrid")
   */
  readonly family: string;

  readonly description: string;

  /**
   * Per-proof latency in milliseconds at reference hardware and 128-bit security
   */
  readonly baseMsPerProof: number;

  /**
   * Per-proof abstract cost in USD at the same reference point
   */
  readonly baseUsdPerProof: number;

  readonly securityScaling: SecurityScaling;
};
