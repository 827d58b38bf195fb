// Proving-system profile catalog
//
// Static, frozen table of the supported proving-system families.
// Profiles differ only in data; adding one means adding a row here.

import type { SecurityBits, SystemKey } from '../types/common.js';
import type { ProvingSystemProfile, SecurityScaling } from '../types/profiles.js';

/**
 * Catalog keys, in display order
 */
export const SYSTEM_KEYS = ['aztec', 'zama', 'soundness'] as const satisfies readonly SystemKey[];

/**
 * Supported security levels, ascending
 */
export const SECURITY_LEVELS = [128, 192, 256] as const satisfies readonly SecurityBits[];

function scaling(levels: SecurityScaling): SecurityScaling {
  return Object.freeze({ ...levels });
}

function profile(definition: ProvingSystemProfile): ProvingSystemProfile {
  return Object.freeze({
    ...definition,
    securityScaling: scaling(definition.securityScaling),
  });
}

const STANDARD_SCALING: SecurityScaling = { 128: 1.0, 192: 1.35, 256: 1.7 };

export const PROVING_SYSTEM_PROFILES: Readonly<Record<SystemKey, ProvingSystemProfile>> =
  Object.freeze({
    aztec: profile({
      key: 'aztec',
      displayName: 'Aztec-style zk SNARK System',
      family: 'zk-snark',
      description: 'Privacy-focused zk rollup proving for encrypted state and contracts.',
      baseMsPerProof: 420,
      baseUsdPerProof: 0.18,
      securityScaling: STANDARD_SCALING,
    }),
    zama: profile({
      key: 'zama',
      displayName: 'Zama-style FHE + Proof Hybrid',
      family: 'fhe-hybrid',
      description: 'FHE-heavy design where zk proofs attest to encrypted compute pipelines.',
      baseMsPerProof: 780,
      baseUsdPerProof: 0.35,
      securityScaling: STANDARD_SCALING,
    }),
    soundness: profile({
      key: 'soundness',
      displayName: 'Soundness-first Minimal Circuit System',
      family: 'verified-zk',
      description: 'Formally specified circuits tuned for clarity and soundness over raw speed.',
      baseMsPerProof: 500,
      baseUsdPerProof: 0.22,
      securityScaling: STANDARD_SCALING,
    }),
  });

/**
 * Check whether a value is a catalog key.
 */
export function isSystemKey(value: unknown): value is SystemKey {
  return typeof value === 'string' && (SYSTEM_KEYS as readonly string[]).includes(value);
}

/**
 * Check whether a value is a supported security level.
 */
export function isSecurityBits(value: unknown): value is SecurityBits {
  return typeof value === 'number' && (SECURITY_LEVELS as readonly number[]).includes(value);
}

/**
 * Look up a profile by key.
 *
 * @returns The profile, or undefined for keys outside the catalog
 */
export function getProfile(key: string): ProvingSystemProfile | undefined {
  return isSystemKey(key) ? PROVING_SYSTEM_PROFILES[key] : undefined;
}

/**
 * All profiles, in catalog order.
 */
export function listProfiles(): ProvingSystemProfile[] {
  return SYSTEM_KEYS.map((key) => PROVING_SYSTEM_PROFILES[key]);
}
