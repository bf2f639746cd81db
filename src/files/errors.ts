// ============================================================================
// Filename Error Types: Typed errors for malformed input
// ============================================================================
//
// All of these describe bad input, never a transient condition, so callers
// should report them rather than retry.

import type { ZodIssue } from 'zod';

/** Base error for everything the filename library throws */
export class GbmFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GbmFileError';
  }
}

/** A detector code, name or index that resolves to no detector */
export class InvalidDetectorError extends GbmFileError {
  readonly input: unknown;

  constructor(input: unknown) {
    super(`Invalid detector: ${JSON.stringify(input)}`);
    this.name = 'InvalidDetectorError';
    this.input = input;
  }
}

/** A version outside 0..99 (it would not serialize to two digits) */
export class InvalidVersionError extends GbmFileError {
  readonly input: unknown;

  constructor(input: unknown) {
    super(`Invalid version: ${JSON.stringify(input)}. Expected an integer from 0 to 99.`);
    this.name = 'InvalidVersionError';
    this.input = input;
  }
}

/**
 * A path whose basename does not follow the canonical filename shape.
 * Only thrown by fail-fast batch parsing; single parses return null instead.
 */
export class NoGrammarMatchError extends GbmFileError {
  readonly path: string;

  constructor(path: string) {
    super(`Not a canonical filename: ${path}`);
    this.name = 'NoGrammarMatchError';
    this.path = path;
  }
}

/** Input to ymdPath() that carries no usable date */
export class UnparseableDateSourceError extends GbmFileError {
  readonly input: unknown;

  constructor(input: unknown) {
    super(`Cannot derive a date from: ${describe(input)}`);
    this.name = 'UnparseableDateSourceError';
    this.input = input;
  }
}

/** A field name outside the record schema */
export class UnknownFieldError extends GbmFileError {
  readonly field: string;

  constructor(field: string) {
    super(`Unknown filename field: ${field}`);
    this.name = 'UnknownFieldError';
    this.field = field;
  }
}

/** Known fields given values of the wrong type, or values that do not round-trip */
export class InvalidFieldError extends GbmFileError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(
      'Invalid filename fields: ' +
      issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    );
    this.name = 'InvalidFieldError';
    this.issues = issues;
  }
}

function describe(input: unknown): string {
  if (input instanceof Date) return `Date(${String(input.getTime())})`;
  if (typeof input === 'string') return JSON.stringify(input);
  return typeof input;
}
