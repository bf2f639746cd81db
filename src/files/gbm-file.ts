// ============================================================================
// GbmFile: Structured record for a canonical filename
// ============================================================================
//
// Built either from caller-supplied fields (GbmFile.create) or by parsing a
// path (GbmFile.fromPath). Validation happens once, at construction; records
// are frozen afterwards and every "change" returns a new record.
//
// Usage:
//   const f = GbmFile.create({ dataType: 'cspec', detector: 'NAI_00', trigger: true, uid: '090131090' });
//   f.basename()  // "glg_cspec_n0_bn090131090_v00.fit"
//   GbmFile.fromPath('/data/glg_tte_b0_bn090131090_v01.fit')?.detector  // "b0"

import path from 'node:path';
import { z, type ZodIssue } from 'zod';
import { appConfig } from '../config.js';
import {
  DETECTORS,
  normalizeDetector,
  type DetectorCode,
} from '../detectors/detectors.js';
import {
  InvalidFieldError,
  InvalidVersionError,
  NoGrammarMatchError,
  UnknownFieldError,
} from './errors.js';
import {
  formatVersion,
  parseFilename,
  serializeFilename,
  type FilenameFields,
} from './grammar.js';

// ============================================================================
// Types
// ============================================================================

/** Zod schema for construction input. Unknown keys are rejected. */
export const GbmFileInputSchema = z.object({
  dataType: z.string().min(1),
  detector: z.union([z.string(), z.number()]).nullable().optional(),
  trigger: z.boolean().optional(),
  uid: z.string().min(1),
  meta: z.string().optional(),
  version: z.number().optional(),
  extension: z.string().min(1).optional(),
  directory: z.string().optional(),
}).strict();

/** Fields accepted by GbmFile.create() */
export type GbmFileInput = z.infer<typeof GbmFileInputSchema>;

export type GbmFileField = keyof GbmFileInput;

export const GBM_FILE_FIELDS: readonly GbmFileField[] = [
  'dataType', 'detector', 'trigger', 'uid', 'meta', 'version', 'extension', 'directory',
];

/** What to do with paths that are not canonical filenames in a batch parse */
export type UnknownPathPolicy =
  | { unknown: 'collect'; sink: string[] }
  | { unknown: 'throw' };

interface GbmFileState extends FilenameFields {
  directory: string;
}

// ============================================================================
// Record
// ============================================================================

export class GbmFile implements FilenameFields {
  readonly dataType: string;
  readonly detector: DetectorCode | null;
  readonly trigger: boolean;
  readonly uid: string;
  readonly meta: string;
  readonly version: number;
  readonly extension: string;
  readonly directory: string;

  private constructor(state: GbmFileState) {
    this.dataType = state.dataType;
    this.detector = state.detector;
    this.trigger = state.trigger;
    this.uid = state.uid;
    this.meta = state.meta;
    this.version = state.version;
    this.extension = state.extension;
    this.directory = state.directory;
    Object.freeze(this);
  }

  // --------------------------------------------------------------------------
  // Factories
  // --------------------------------------------------------------------------

  /**
   * Builds a record from caller fields.
   *
   * The detector may be a code ("n0"), a full name ("NAI_00"), an index (0),
   * "all" or null. Metadata without a leading underscore gets one.
   *
   * @throws UnknownFieldError for a key outside the schema
   * @throws InvalidDetectorError when the detector does not resolve
   * @throws InvalidVersionError for a version outside 0..99
   * @throws InvalidFieldError for values of the wrong type, or fields whose
   *   filename would not parse back to the same values
   */
  static create(input: GbmFileInput): GbmFile {
    return GbmFile.fromUnknown(input);
  }

  /**
   * Parses a path's basename. The directory component (empty for a bare
   * name) becomes the record's directory.
   *
   * Returns null when the basename is not a canonical filename.
   */
  static fromPath(filePath: string): GbmFile | null {
    const { dir, base } = path.parse(filePath);
    const fields = parseFilename(base);
    if (!fields) return null;
    return new GbmFile({ ...fields, directory: dir });
  }

  /**
   * Parses a batch of paths.
   *
   * With `{ unknown: 'collect', sink }`, paths that do not parse are pushed
   * onto `sink` and skipped. With `{ unknown: 'throw' }` the first one aborts
   * the batch.
   *
   * @throws NoGrammarMatchError under the 'throw' policy
   */
  static listFromPaths(
    paths: Iterable<string>,
    policy: UnknownPathPolicy = { unknown: 'throw' },
  ): GbmFile[] {
    const records: GbmFile[] = [];
    for (const p of paths) {
      const record = GbmFile.fromPath(p);
      if (record) {
        records.push(record);
      } else if (policy.unknown === 'collect') {
        policy.sink.push(p);
      } else {
        throw new NoGrammarMatchError(p);
      }
    }
    return records;
  }

  /**
   * Sets one field by name, returning a new record.
   * Only the names in GBM_FILE_FIELDS are accepted.
   *
   * @throws UnknownFieldError for any other name
   */
  static assign(record: GbmFile, field: string, value: unknown): GbmFile {
    if (!isGbmFileField(field)) {
      throw new UnknownFieldError(field);
    }
    const raw: Record<string, unknown> = { ...record.toInput() };
    raw[field] = value;
    return GbmFile.fromUnknown(raw);
  }

  private static fromUnknown(input: unknown): GbmFile {
    const parsed = GbmFileInputSchema.safeParse(input);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        if (issue.code === 'unrecognized_keys') {
          throw new UnknownFieldError(issue.keys[0] ?? '');
        }
      }
      throw new InvalidFieldError(parsed.error.issues);
    }

    const fields = parsed.data;
    const version = fields.version ?? 0;
    if (!Number.isInteger(version) || version < 0 || version > 99) {
      throw new InvalidVersionError(version);
    }

    const meta = fields.meta ?? '';

    const state: GbmFileState = {
      dataType: fields.dataType,
      detector: normalizeDetector(fields.detector),
      trigger: fields.trigger ?? false,
      uid: fields.uid,
      meta: meta === '' || meta.startsWith('_') ? meta : `_${meta}`,
      version,
      extension: fields.extension ?? appConfig.defaultExtension,
      directory: fields.directory ?? '',
    };
    assertRoundTrip(state);
    return new GbmFile(state);
  }

  // --------------------------------------------------------------------------
  // Derived values
  // --------------------------------------------------------------------------

  /** Version as it appears in the filename, always two digits */
  get versionStr(): string {
    return formatVersion(this.version);
  }

  /** The canonical filename, without directory */
  basename(): string {
    return serializeFilename(this);
  }

  /** Directory joined with the basename using the platform separator */
  fullPath(): string {
    return path.join(this.directory, this.basename());
  }

  /**
   * One copy of this record per detector, in canonical detector order.
   * Copies differ from this record only in `detector`.
   */
  detectorList(): GbmFile[] {
    return DETECTORS.map(det => new GbmFile({ ...this.toState(), detector: det.code }));
  }

  /**
   * Returns a new record with the given fields replaced.
   * Accepts the same inputs as create().
   */
  with(changes: Partial<GbmFileInput>): GbmFile {
    return GbmFile.fromUnknown({ ...this.toInput(), ...changes });
  }

  equals(other: GbmFile): boolean {
    return this.directory === other.directory && this.basename() === other.basename();
  }

  /** Plain field values, suitable for create() */
  toInput(): GbmFileInput {
    return {
      dataType: this.dataType,
      detector: this.detector,
      trigger: this.trigger,
      uid: this.uid,
      meta: this.meta,
      version: this.version,
      extension: this.extension,
      directory: this.directory,
    };
  }

  toString(): string {
    return this.basename();
  }

  private toState(): GbmFileState {
    return {
      dataType: this.dataType,
      detector: this.detector,
      trigger: this.trigger,
      uid: this.uid,
      meta: this.meta,
      version: this.version,
      extension: this.extension,
      directory: this.directory,
    };
  }
}

export function isGbmFileField(name: string): name is GbmFileField {
  return (GBM_FILE_FIELDS as readonly string[]).includes(name);
}

// ============================================================================
// Internal helpers
// ============================================================================

const GRAMMAR_FIELDS: readonly (keyof FilenameFields)[] = [
  'dataType', 'detector', 'trigger', 'uid', 'meta', 'version', 'extension',
];

/**
 * Rejects field combinations whose filename would parse back differently,
 * e.g. meta "_03z" after a six-digit uid reads back as an hourly uid.
 *
 * @throws InvalidFieldError naming the fields that do not survive
 */
function assertRoundTrip(fields: FilenameFields): void {
  const name = serializeFilename(fields);
  const reparsed = parseFilename(name);

  if (!reparsed) {
    throw new InvalidFieldError([{
      code: z.ZodIssueCode.custom,
      path: [],
      message: `"${name}" is not a canonical filename`,
    }]);
  }

  const drifted = GRAMMAR_FIELDS.filter(key => reparsed[key] !== fields[key]);
  if (drifted.length > 0) {
    throw new InvalidFieldError(drifted.map((key): ZodIssue => ({
      code: z.ZodIssueCode.custom,
      path: [key],
      message: `does not survive a round trip through "${name}"`,
    })));
  }
}
