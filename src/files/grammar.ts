/**
 * Filename Grammar
 *
 * The single authority on what a canonical filename looks like:
 *
 *   glg_<dataType>_<detector>_<trigger?><uid><meta?>_v<version>.<extension>
 *
 * Examples:
 *   - "glg_cspec_n0_bn090131090_v00.pha"       (trigger, detector n0)
 *   - "glg_tte_b1_bn170817529_v01.fit"         (trigger, BGO detector)
 *   - "glg_ctime_all_190101_v00.pha"           (daily, no specific detector)
 *   - "glg_tte_n5_190101_03z_v00.fit.gz"       (hourly continuous file)
 *   - "glg_healpix_all_bn190101123_extra_v02.fit"  (with metadata)
 *
 * Pure functions, no I/O.
 */

import { ALL_DETECTORS, isDetectorCode, type DetectorCode } from '../detectors/detectors.js';

// ---------------------------------------------------------------------------
// Pattern
// ---------------------------------------------------------------------------

export const FILENAME_PATTERN =
  /^glg_(?<dataType>.+)_(?<detector>[bn][0-9ab]|all)_(?<trigger>(?:bn)?)(?<uid>\d{9}|\d{6}_\d{2}z|\d{6})(?<meta>(?:_.+?)?)_v(?<version>\d{2})\.(?<extension>.+)$/i;

export const TRIGGER_MARKER = 'bn';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The seven fields encoded in a canonical filename */
export interface FilenameFields {
  dataType: string;
  /** null means "all" */
  detector: DetectorCode | null;
  trigger: boolean;
  uid: string;
  /** Empty when absent; otherwise includes its leading underscore */
  meta: string;
  version: number;
  extension: string;
}

// ---------------------------------------------------------------------------
// Parse / Serialize
// ---------------------------------------------------------------------------

/**
 * Parses a filename's base component.
 * Returns null unless the whole string matches; there is no partial result.
 */
export function parseFilename(basename: string): FilenameFields | null {
  const groups = FILENAME_PATTERN.exec(basename)?.groups;
  if (!groups) return null;

  const code = groups.detector.toLowerCase();
  const detector = isDetectorCode(code) ? code : null;
  if (!detector && code !== ALL_DETECTORS) return null;

  return {
    dataType: groups.dataType,
    detector,
    trigger: groups.trigger !== '',
    uid: groups.uid,
    meta: groups.meta,
    version: parseInt(groups.version, 10),
    extension: groups.extension,
  };
}

/** Zero-pads a version to its two-digit filename form */
export function formatVersion(version: number): string {
  return String(version).padStart(2, '0');
}

/** Inverse of parseFilename() */
export function serializeFilename(fields: FilenameFields): string {
  const detector = fields.detector ?? ALL_DETECTORS;
  const trigger = fields.trigger ? TRIGGER_MARKER : '';
  return (
    `glg_${fields.dataType}_${detector}_${trigger}${fields.uid}${fields.meta}` +
    `_v${formatVersion(fields.version)}.${fields.extension}`
  );
}
