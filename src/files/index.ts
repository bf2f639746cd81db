// ============================================================================
// Files Module: Barrel Export
// ============================================================================
//
// Canonical filename parsing and serialization, directory scanning,
// collection checks and date-partitioned paths.

// Grammar
export {
  FILENAME_PATTERN,
  TRIGGER_MARKER,
  parseFilename,
  serializeFilename,
  formatVersion,
} from './grammar.js';
export type { FilenameFields } from './grammar.js';

// Record
export { GbmFile, GbmFileInputSchema, GBM_FILE_FIELDS, isGbmFileField } from './gbm-file.js';
export type { GbmFileInput, GbmFileField, UnknownPathPolicy } from './gbm-file.js';

// Scanner
export { scanDir, scanGbmFiles } from './scan.js';
export type { ScanOptions } from './scan.js';

// Collections
export {
  allExist,
  hasDetector,
  missingDetectors,
  isComplete,
  maxVersion,
  minVersion,
} from './collections.js';

// Date paths
export { ymdPath, dateFromUid, formatYmd, UID_DATE_PATTERN } from './ymd-path.js';
export type { DateSource } from './ymd-path.js';

// Errors
export {
  GbmFileError,
  InvalidDetectorError,
  InvalidVersionError,
  InvalidFieldError,
  NoGrammarMatchError,
  UnparseableDateSourceError,
  UnknownFieldError,
} from './errors.js';
