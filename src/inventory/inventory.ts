// ============================================================================
// Inventory: Groups the canonical files under a directory by observation
// ============================================================================
//
// An observation is one data product for one uid: the same dataType, trigger
// flag, uid, metadata and extension, across detectors and versions. For each
// one the inventory reports which detectors are on disk, which are missing,
// the version range and the date directory the files belong in.
//
// Products written for "all" detectors (a single file per observation) are
// never reported as missing detectors.

import { appConfig } from '../config.js';
import { DETECTORS, type DetectorCode } from '../detectors/detectors.js';
import {
  GbmFile,
  TRIGGER_MARKER,
  UnparseableDateSourceError,
  formatVersion,
  maxVersion,
  minVersion,
  missingDetectors,
  scanDir,
  ymdPath,
} from '../files/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ObservationGroup {
  /** Filename with the detector and version wildcarded, e.g. "glg_cspec_*_bn090131090_v*.pha" */
  label: string;
  dataType: string;
  trigger: boolean;
  uid: string;
  meta: string;
  extension: string;
  /** True when every file in the group is an "all" product */
  allDetectors: boolean;
  /** Detectors with at least one file, in canonical order */
  detectors: DetectorCode[];
  /** Detectors with no file; always empty for "all" products */
  missing: DetectorCode[];
  minVersion: number | null;
  maxVersion: number | null;
  /** YYYY-MM-DD directory under the data root, or null if the uid has no date */
  dateDir: string | null;
  files: string[];
}

export interface Inventory {
  root: string;
  groups: ObservationGroup[];
  /** Paths that are not canonical filenames */
  unrecognized: string[];
}

export interface InventoryOptions {
  includeHidden?: boolean;
  /** Base for dateDir (default: appConfig.dataRoot) */
  dataRoot?: string;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Scans `root` recursively and groups the canonical files it finds.
 * Groups are returned in the order their first file was seen.
 */
export function buildInventory(root: string, options: InventoryOptions = {}): Inventory {
  const dataRoot = options.dataRoot ?? appConfig.dataRoot;
  const unrecognized: string[] = [];

  const records = GbmFile.listFromPaths(
    scanDir(root, { recursive: true, includeHidden: options.includeHidden ?? false }),
    { unknown: 'collect', sink: unrecognized },
  );

  const byKey = new Map<string, GbmFile[]>();
  for (const record of records) {
    const key = observationKey(record);
    const bucket = byKey.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      byKey.set(key, [record]);
    }
  }

  const groups = [...byKey.values()].map(bucket => summarize(bucket, dataRoot));

  console.log('[inventory] Scanned directory:', {
    root,
    files: records.length,
    observations: groups.length,
    incomplete: groups.filter(g => g.missing.length > 0).length,
    unrecognized: unrecognized.length,
  });

  return { root, groups, unrecognized };
}

/** One line per group, plus a line per unrecognized path */
export function formatInventory(inventory: Inventory): string {
  const lines: string[] = [];

  for (const group of inventory.groups) {
    const detectors = group.allDetectors
      ? 'all'
      : `${group.detectors.length}/${DETECTORS.length}`;
    const versions = group.minVersion === group.maxVersion
      ? `v${pad(group.minVersion)}`
      : `v${pad(group.minVersion)}-v${pad(group.maxVersion)}`;

    lines.push(`${group.label}  detectors=${detectors}  ${versions}  ${group.dateDir ?? '-'}`);
    if (group.missing.length > 0) {
      lines.push(`  missing: ${group.missing.join(', ')}`);
    }
  }

  for (const p of inventory.unrecognized) {
    lines.push(`? ${p}`);
  }

  return lines.join('\n');
}

// ============================================================================
// Internal helpers
// ============================================================================

function observationKey(record: GbmFile): string {
  return [record.dataType, record.trigger ? TRIGGER_MARKER : '', record.uid, record.meta, record.extension].join('|');
}

function summarize(bucket: GbmFile[], dataRoot: string): ObservationGroup {
  const first = bucket[0];
  const allDetectors = bucket.every(r => r.detector === null);
  const present = new Set(bucket.map(r => r.detector));
  const trigger = first.trigger ? TRIGGER_MARKER : '';

  return {
    label: `glg_${first.dataType}_*_${trigger}${first.uid}${first.meta}_v*.${first.extension}`,
    dataType: first.dataType,
    trigger: first.trigger,
    uid: first.uid,
    meta: first.meta,
    extension: first.extension,
    allDetectors,
    detectors: DETECTORS.map(d => d.code).filter(code => present.has(code)),
    missing: allDetectors ? [] : missingDetectors(bucket),
    minVersion: minVersion(bucket),
    maxVersion: maxVersion(bucket),
    dateDir: dateDirFor(first, dataRoot),
    files: bucket.map(r => r.fullPath()),
  };
}

function dateDirFor(record: GbmFile, dataRoot: string): string | null {
  try {
    return ymdPath(dataRoot, record);
  } catch (err) {
    if (err instanceof UnparseableDateSourceError) return null;
    throw err;
  }
}

function pad(version: number | null): string {
  return version === null ? '??' : formatVersion(version);
}
