// Volume Curves
//
// A volume curve maps total transaction volume to a per-proof scaling
// factor. Curves must be monotonic non-decreasing in txCount and equal
// 1.0 at their reference volume.

import { InvalidParameterError } from '../errors.js';

export type VolumeCurve = (txCount: number) => number;

export type LogVolumeCurveOptions = {
  /**
   * Volume at which the factor is exactly 1.0 (default: 10000)
   */
  referenceVolume?: number;

  /**
   * Factor change per doubling of volume (default: 0.05)
   */
  slopePerDoubling?: number;

  /**
   * Lower clamp (default: 0.5, must be <= 1)
   */
  min?: number;

  /**
   * Upper clamp (default: 1.25, must be >= 1)
   */
  max?: number;
};

export const REFERENCE_VOLUME = 10_000;

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Build a logarithmic curve:
 *
 *   factor(tx) = clamp(1 + slope * log2(tx / referenceVolume), min, max)
 *
 * @throws InvalidParameterError if the options would break monotonicity
 *   or move the factor away from 1.0 at the reference volume
 */
export function createLogVolumeCurve(options: LogVolumeCurveOptions = {}): VolumeCurve {
  const {
    referenceVolume = REFERENCE_VOLUME,
    slopePerDoubling = 0.05,
    min = 0.5,
    max = 1.25,
  } = options;

  if (!Number.isFinite(referenceVolume) || referenceVolume <= 0) {
    throw new InvalidParameterError('referenceVolume must be > 0', {
      field: 'referenceVolume',
      details: { referenceVolume },
    });
  }
  if (!Number.isFinite(slopePerDoubling) || slopePerDoubling < 0) {
    throw new InvalidParameterError('slopePerDoubling must be >= 0', {
      field: 'slopePerDoubling',
      details: { slopePerDoubling },
    });
  }
  if (!(min > 0 && min <= 1)) {
    throw new InvalidParameterError('min must be in (0, 1]', { field: 'min', details: { min } });
  }
  if (!(max >= 1)) {
    throw new InvalidParameterError('max must be >= 1', { field: 'max', details: { max } });
  }

  return (txCount: number) =>
    clamp(1 + slopePerDoubling * Math.log2(txCount / referenceVolume), min, max);
}

/**
 * Curve used when no other is supplied. Grows 5% per doubling of volume
 * above 10k transactions, bounded to [0.5, 1.25].
 */
export const defaultVolumeCurve: VolumeCurve = createLogVolumeCurve();

/**
 * A curve that ignores volume entirely.
 */
export const flatVolumeCurve: VolumeCurve = () => 1;
