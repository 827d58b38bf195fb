// Tests for the proving-system profile catalog

import { describe, it, expect } from 'vitest';
import {
  PROVING_SYSTEM_PROFILES,
  SECURITY_LEVELS,
  SYSTEM_KEYS,
  getProfile,
  isSecurityBits,
  isSystemKey,
  listProfiles,
} from './catalog.js';

describe('PROVING_SYSTEM_PROFILES', () => {
  it('has one profile per key, keyed by its own key', () => {
    for (const key of SYSTEM_KEYS) {
      expect(PROVING_SYSTEM_PROFILES[key].key).toBe(key);
    }
    expect(Object.keys(PROVING_SYSTEM_PROFILES)).toEqual(['aztec', 'zama', 'soundness']);
  });

  it('defines a scaling factor for every supported security level', () => {
    for (const profile of listProfiles()) {
      for (const bits of SECURITY_LEVELS) {
        expect(profile.securityScaling[bits]).toBeGreaterThan(0);
      }
    }
  });

  it('never scales down as the security level rises', () => {
    for (const profile of listProfiles()) {
      const { securityScaling } = profile;
      expect(securityScaling[128]).toBe(1);
      expect(securityScaling[192]).toBeGreaterThanOrEqual(securityScaling[128]);
      expect(securityScaling[256]).toBeGreaterThanOrEqual(securityScaling[192]);
    }
  });

  it('is frozen', () => {
    expect(Object.isFrozen(PROVING_SYSTEM_PROFILES)).toBe(true);
    expect(Object.isFrozen(PROVING_SYSTEM_PROFILES.aztec)).toBe(true);
    expect(Object.isFrozen(PROVING_SYSTEM_PROFILES.aztec.securityScaling)).toBe(true);
  });

  it('rejects mutation attempts', () => {
    expect(Reflect.set(PROVING_SYSTEM_PROFILES, 'custom', PROVING_SYSTEM_PROFILES.aztec)).toBe(false);
    expect(Reflect.set(PROVING_SYSTEM_PROFILES.zama, 'baseMsPerProof', 1)).toBe(false);
    expect(PROVING_SYSTEM_PROFILES.zama.baseMsPerProof).toBe(780);
    expect(getProfile('custom')).toBeUndefined();
  });
});

describe('getProfile', () => {
  it('returns the profile for a known key', () => {
    const profile = getProfile('zama');
    expect(profile?.displayName).toBe('Zama-style FHE + Proof Hybrid');
    expect(profile?.family).toBe('fhe-hybrid');
    expect(profile?.baseUsdPerProof).toBe(0.35);
  });

  it('returns undefined for unknown keys', () => {
    expect(getProfile('unknown')).toBeUndefined();
    expect(getProfile('toString')).toBeUndefined();
  });
});

describe('isSystemKey / isSecurityBits', () => {
  it('accepts only catalog keys', () => {
    expect(isSystemKey('aztec')).toBe(true);
    expect(isSystemKey('soundness')).toBe(true);
    expect(isSystemKey('Aztec')).toBe(false);
    expect(isSystemKey(42)).toBe(false);
  });

  it('accepts only supported levels', () => {
    expect(isSecurityBits(128)).toBe(true);
    expect(isSecurityBits(256)).toBe(true);
    expect(isSecurityBits(100)).toBe(false);
    expect(isSecurityBits('128')).toBe(false);
  });
});

describe('listProfiles', () => {
  it('lists profiles in catalog order', () => {
    expect(listProfiles().map((p) => p.key)).toEqual(['aztec', 'zama', 'soundness']);
  });
});
