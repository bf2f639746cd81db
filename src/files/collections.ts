// ============================================================================
// Collection Utilities: Checks over a set of filename records
// ============================================================================

import fs from 'node:fs';
import path from 'node:path';
import {
  DETECTORS,
  normalizeDetector,
  type DetectorCode,
  type DetectorInput,
} from '../detectors/detectors.js';
import { InvalidDetectorError } from './errors.js';
import { GbmFile } from './gbm-file.js';

/**
 * True when every record exists on disk. With `parentDir`, each record's
 * basename is looked up there instead of in its own directory.
 * Stops at the first missing file.
 */
export function allExist(records: Iterable<GbmFile>, parentDir?: string): boolean {
  for (const record of records) {
    const target = parentDir !== undefined
      ? path.join(parentDir, record.basename())
      : record.fullPath();
    if (!fs.existsSync(target)) return false;
  }
  return true;
}

/**
 * True when any record is for `detector`. The query accepts everything
 * normalizeDetector() does; null or "all" looks for records with no
 * specific detector. A query that names no detector matches nothing.
 */
export function hasDetector(records: Iterable<GbmFile>, detector: DetectorInput): boolean {
  let code: DetectorCode | null;
  try {
    code = normalizeDetector(detector);
  } catch (err) {
    if (err instanceof InvalidDetectorError) return false;
    throw err;
  }
  for (const record of records) {
    if (record.detector === code) return true;
  }
  return false;
}

/** Detector codes with no record, in canonical order */
export function missingDetectors(records: Iterable<GbmFile>): DetectorCode[] {
  const present = new Set<DetectorCode | null>();
  for (const record of records) present.add(record.detector);
  return DETECTORS.map(d => d.code).filter(code => !present.has(code));
}

/** True when there is a record for every detector in the set */
export function isComplete(records: Iterable<GbmFile>): boolean {
  const list = [...records];
  return DETECTORS.every(det => hasDetector(list, det.code));
}

/**
 * Highest version among the items, or null if none has one.
 * Strings are parsed as filenames; strings that do not parse are skipped.
 */
export function maxVersion(items: Iterable<GbmFile | string>): number | null {
  return foldVersions(items, Math.max);
}

/** Lowest version among the items, or null. Same skipping rules as maxVersion(). */
export function minVersion(items: Iterable<GbmFile | string>): number | null {
  return foldVersions(items, Math.min);
}

function foldVersions(
  items: Iterable<GbmFile | string>,
  pick: (a: number, b: number) => number,
): number | null {
  let result: number | null = null;
  for (const item of items) {
    const record = typeof item === 'string' ? GbmFile.fromPath(item) : item;
    if (!record || !Number.isInteger(record.version)) continue;
    result = result === null ? record.version : pick(result, record.version);
  }
  return result;
}
