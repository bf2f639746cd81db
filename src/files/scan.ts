// ============================================================================
// Directory Scanner: Lazy traversal of a directory tree
// ============================================================================
//
// Yields file paths on demand. Each call starts a fresh traversal, so the
// returned generator can be dropped at any point and the scan re-run later.
// Entries come back in the filesystem's native order (no sorting).
// Directories are descended into only when `recursive` is set and are never
// yielded themselves. Symlinks to files are yielded under the link's own
// path; symlinked directories are not followed and dangling links are skipped.

import fs, { type Dirent } from 'node:fs';
import path from 'node:path';
import { GbmFile } from './gbm-file.js';

// ============================================================================
// Types
// ============================================================================

export interface ScanOptions {
  /** Include entries whose name starts with "." (default false) */
  includeHidden?: boolean;
  /** Descend into subdirectories (default false) */
  recursive?: boolean;
  /** Yield absolute paths (default false: paths are joined onto root as given) */
  absolute?: boolean;
  /** Only yield files whose name matches */
  match?: RegExp | ((name: string) => boolean);
}

const HIDDEN_PREFIX = '.';

// ============================================================================
// Public API
// ============================================================================

/**
 * Walks `root` and yields the path of every file that passes the options.
 * Read errors (missing root, permissions) surface on the first pull.
 */
export function* scanDir(root: string, options: ScanOptions = {}): Generator<string, void, undefined> {
  const { includeHidden = false, recursive = false, absolute = false, match } = options;

  const entries = fs.readdirSync(root, { withFileTypes: true });

  for (const entry of entries) {
    if (!includeHidden && entry.name.startsWith(HIDDEN_PREFIX)) continue;

    const entryPath = path.join(root, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        yield* scanDir(entryPath, options);
      }
      continue;
    }

    if (!entry.isFile() && !isLinkToFile(entry, entryPath)) continue;
    if (match && !matches(match, entry.name)) continue;

    yield absolute ? path.resolve(entryPath) : entryPath;
  }
}

/**
 * Scans `root` and yields a record for every canonical filename found.
 * Files that are not canonical filenames are skipped.
 */
export function* scanGbmFiles(root: string, options: ScanOptions = {}): Generator<GbmFile, void, undefined> {
  for (const filePath of scanDir(root, options)) {
    const record = GbmFile.fromPath(filePath);
    if (record) yield record;
  }
}

// ============================================================================
// Internal helpers
// ============================================================================

function isLinkToFile(entry: Dirent, entryPath: string): boolean {
  if (!entry.isSymbolicLink()) return false;
  return fs.statSync(entryPath, { throwIfNoEntry: false })?.isFile() === true;
}

function matches(match: RegExp | ((name: string) => boolean), name: string): boolean {
  if (typeof match === 'function') return match(name);
  // A global/sticky regex carries lastIndex between calls
  match.lastIndex = 0;
  return match.test(name);
}
