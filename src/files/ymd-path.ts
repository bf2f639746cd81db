// ============================================================================
// Date-Path Resolver: Maps a file or date onto its YYYY-MM-DD directory
// ============================================================================
//
// Data is stored in one directory per UTC day:
//   <base>/2009-01-31/glg_cspec_n0_bn090131090_v00.pha
//
// The day comes from the six-digit YYMMDD prefix of the uid, which is the
// same for trigger ids (bnYYMMDDfff), daily ids (YYMMDD) and hourly ids
// (YYMMDD_HHz).

import path from 'node:path';
import { UnparseableDateSourceError } from './errors.js';
import { GbmFile } from './gbm-file.js';

/** Date prefix of a uid, tolerating the trigger marker and a short suffix */
export const UID_DATE_PATTERN = /^(?:bn)?(\d{2})(\d{2})(\d{2})(?:\d{3}|_\d{2}z)?$/i;

/** Two-digit years are all in this century */
const CENTURY = 2000;

export type DateSource = GbmFile | string | Date;

/**
 * The UTC date encoded in a uid, or null when the uid carries none.
 * Returns null for impossible dates such as month 13.
 */
export function dateFromUid(uid: string): Date | null {
  const m = UID_DATE_PATTERN.exec(uid);
  if (!m) return null;

  const year = CENTURY + parseInt(m[1], 10);
  const month = parseInt(m[2], 10);
  const day = parseInt(m[3], 10);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

/** Formats a Date's UTC calendar day as YYYY-MM-DD */
export function formatYmd(date: Date): string {
  const y = String(date.getUTCFullYear()).padStart(4, '0');
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Joins the YYYY-MM-DD directory for `value` onto `base`.
 *
 * - GbmFile: date taken from its uid
 * - string: parsed as a filename path and its uid used; if it is not a
 *   canonical filename, its basename is tried as a bare uid
 * - Date: its UTC calendar day. A Date built from local time east or west
 *   of UTC may land on the neighbouring day; build it with Date.UTC to pin it
 *
 * @throws UnparseableDateSourceError when no date can be derived
 */
export function ymdPath(base: string, value: DateSource): string {
  return path.join(base, formatYmd(resolveDate(value)));
}

function resolveDate(value: unknown): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new UnparseableDateSourceError(value);
    return value;
  }

  let uid: string | null = null;
  if (value instanceof GbmFile) {
    uid = value.uid;
  } else if (typeof value === 'string') {
    uid = GbmFile.fromPath(value)?.uid ?? path.basename(value);
  }

  const date = uid === null ? null : dateFromUid(uid);
  if (!date) throw new UnparseableDateSourceError(value);
  return date;
}
