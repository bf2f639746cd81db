// ============================================================================
// Detector Set: Fixed enumeration of the instrument's detectors
// ============================================================================
//
// Twelve NaI detectors (n0..n9, na, nb) followed by two BGO detectors (b0, b1).
// The order here is canonical: detector lists, completeness reports and
// `GbmFile.detectorList()` all follow it.
//
// Each detector can be named three ways:
//   index  0..13         e.g. 12
//   short  code          e.g. "b0"
//   full   name          e.g. "BGO_00"

import { InvalidDetectorError } from '../files/errors.js';

// ============================================================================
// Types
// ============================================================================

export const DETECTOR_CODES = [
  'n0', 'n1', 'n2', 'n3', 'n4', 'n5', 'n6', 'n7', 'n8', 'n9', 'na', 'nb',
  'b0', 'b1',
] as const;

/** Normalized detector short code */
export type DetectorCode = typeof DETECTOR_CODES[number];

export interface Detector {
  code: DetectorCode;
  name: string;
  index: number;
}

/** Anything a caller may pass where a detector is expected */
export type DetectorInput = DetectorCode | string | number | null | undefined;

/** Literal used in filenames for "no specific detector" */
export const ALL_DETECTORS = 'all';

// ============================================================================
// Enumeration
// ============================================================================

function fullName(code: DetectorCode): string {
  const family = code.startsWith('n') ? 'NAI' : 'BGO';
  const number = parseInt(code.slice(1), 16);
  return `${family}_${String(number).padStart(2, '0')}`;
}

/** All detectors, in canonical order */
export const DETECTORS: readonly Detector[] = Object.freeze(
  DETECTOR_CODES.map((code, index) => Object.freeze({ code, name: fullName(code), index })),
);

const BY_KEY: Map<string, Detector> = new Map();
for (const det of DETECTORS) {
  BY_KEY.set(det.code, det);
  BY_KEY.set(det.name.toLowerCase(), det);
}

// ============================================================================
// Public API
// ============================================================================

export function isDetectorCode(value: unknown): value is DetectorCode {
  return typeof value === 'string' && (DETECTOR_CODES as readonly string[]).includes(value);
}

/**
 * Looks up a detector by numeric index.
 * Returns null for non-integers and indices outside 0..13.
 */
export function detectorFromIndex(index: number): Detector | null {
  if (!Number.isInteger(index)) return null;
  return DETECTORS[index] ?? null;
}

/**
 * Looks up a detector by short code ("n0") or full name ("NAI_00").
 * Case-insensitive, surrounding whitespace ignored.
 */
export function detectorFromName(name: string): Detector | null {
  return BY_KEY.get(name.trim().toLowerCase()) ?? null;
}

/**
 * Resolves any accepted detector input to a normalized code.
 *
 * - null, undefined or "all" (any case) → null, meaning no specific detector
 * - number → by index
 * - string → by short code or full name; all-digit strings are read as an index
 *
 * @throws InvalidDetectorError when the input names no detector
 */
export function normalizeDetector(input: DetectorInput): DetectorCode | null {
  if (input === null || input === undefined) return null;

  if (typeof input === 'number') {
    const det = detectorFromIndex(input);
    if (!det) throw new InvalidDetectorError(input);
    return det.code;
  }

  const trimmed = input.trim();
  if (trimmed.toLowerCase() === ALL_DETECTORS) return null;

  const det = /^\d+$/.test(trimmed)
    ? detectorFromIndex(parseInt(trimmed, 10))
    : detectorFromName(trimmed);
  if (!det) throw new InvalidDetectorError(input);
  return det.code;
}

/** Full name for a code, e.g. "na" → "NAI_10" */
export function detectorName(code: DetectorCode): string {
  return fullName(code);
}
