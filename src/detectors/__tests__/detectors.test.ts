// ============================================================================
// Tests: Detector Set
// ============================================================================

import { describe, it, expect } from 'vitest';
import {
  DETECTORS,
  detectorFromIndex,
  detectorFromName,
  detectorName,
  isDetectorCode,
  normalizeDetector,
} from '../detectors.js';
import { InvalidDetectorError } from '../../files/errors.js';

// ============================================================================
// Enumeration
// ============================================================================

describe('DETECTORS', () => {
  it('lists the 12 NaI then 2 BGO detectors in canonical order', () => {
    expect(DETECTORS.map(d => d.code)).toEqual([
      'n0', 'n1', 'n2', 'n3', 'n4', 'n5', 'n6', 'n7', 'n8', 'n9', 'na', 'nb', 'b0', 'b1',
    ]);
  });

  it('numbers detectors by position', () => {
    DETECTORS.forEach((det, i) => expect(det.index).toBe(i));
  });

  it('derives full names from the family and hex digit', () => {
    expect(detectorName('n0')).toBe('NAI_00');
    expect(detectorName('n9')).toBe('NAI_09');
    expect(detectorName('na')).toBe('NAI_10');
    expect(detectorName('nb')).toBe('NAI_11');
    expect(detectorName('b0')).toBe('BGO_00');
    expect(detectorName('b1')).toBe('BGO_01');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DETECTORS)).toBe(true);
    expect(Object.isFrozen(DETECTORS[0])).toBe(true);
  });
});

describe('isDetectorCode', () => {
  it('accepts only normalized codes', () => {
    expect(isDetectorCode('n0')).toBe(true);
    expect(isDetectorCode('b1')).toBe(true);
    expect(isDetectorCode('N0')).toBe(false);
    expect(isDetectorCode('b2')).toBe(false);
    expect(isDetectorCode('all')).toBe(false);
    expect(isDetectorCode(0)).toBe(false);
  });
});

// ============================================================================
// Lookups
// ============================================================================

describe('detectorFromIndex', () => {
  it('finds detectors at both ends of the range', () => {
    expect(detectorFromIndex(0)?.code).toBe('n0');
    expect(detectorFromIndex(12)?.code).toBe('b0');
    expect(detectorFromIndex(13)?.code).toBe('b1');
  });

  it('returns null outside the range and for fractions', () => {
    expect(detectorFromIndex(14)).toBeNull();
    expect(detectorFromIndex(-1)).toBeNull();
    expect(detectorFromIndex(1.5)).toBeNull();
  });
});

describe('detectorFromName', () => {
  it('accepts short codes and full names in any case', () => {
    expect(detectorFromName('n5')?.code).toBe('n5');
    expect(detectorFromName('NAI_05')?.code).toBe('n5');
    expect(detectorFromName('nai_10')?.code).toBe('na');
    expect(detectorFromName('B1')?.code).toBe('b1');
    expect(detectorFromName(' BGO_00 ')?.code).toBe('b0');
  });

  it('returns null for unknown names', () => {
    expect(detectorFromName('n12')).toBeNull();
    expect(detectorFromName('NAI_12')).toBeNull();
    expect(detectorFromName('')).toBeNull();
  });
});

// ============================================================================
// normalizeDetector
// ============================================================================

describe('normalizeDetector', () => {
  it('resolves index, short code and full name to the same code', () => {
    for (const det of DETECTORS) {
      const fromIndex = normalizeDetector(det.index);
      expect(fromIndex).toBe(det.code);
      expect(normalizeDetector(det.code)).toBe(fromIndex);
      expect(normalizeDetector(det.name)).toBe(fromIndex);
    }
  });

  it('reads digit strings as indices', () => {
    expect(normalizeDetector('3')).toBe('n3');
    expect(normalizeDetector('13')).toBe('b1');
  });

  it('maps "all" and missing values to null', () => {
    expect(normalizeDetector('all')).toBeNull();
    expect(normalizeDetector('ALL')).toBeNull();
    expect(normalizeDetector(null)).toBeNull();
    expect(normalizeDetector(undefined)).toBeNull();
  });

  it('throws InvalidDetectorError for an out-of-range index', () => {
    expect(() => normalizeDetector(14)).toThrow(InvalidDetectorError);
    expect(() => normalizeDetector(-1)).toThrow(InvalidDetectorError);
    expect(() => normalizeDetector('14')).toThrow(InvalidDetectorError);
  });

  it('throws InvalidDetectorError for unknown names', () => {
    expect(() => normalizeDetector('n12')).toThrow('Invalid detector: "n12"');
    expect(() => normalizeDetector('')).toThrow(InvalidDetectorError);
  });

  it('keeps the rejected input on the error', () => {
    let caught: unknown;
    try {
      normalizeDetector(99);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidDetectorError);
    expect(caught).toMatchObject({ name: 'InvalidDetectorError', input: 99 });
  });
});
