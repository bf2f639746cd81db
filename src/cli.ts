/**
 * Command-line interface
 *
 * Usage:
 *   glg-files <dir> [--hidden] [--json]   Inventory of canonical files under <dir>
 *   glg-files parse <name...>             Parsed fields of each filename
 *
 * Returns the process exit code instead of exiting, so it can be tested.
 */

import { appConfig } from './config.js';
import { GbmFile } from './files/index.js';
import { buildInventory, formatInventory } from './inventory/index.js';

const USAGE = 'Usage: glg-files <dir> [--hidden] [--json] | glg-files parse <name...>';

export function runCli(argv: string[]): number {
  const flags = new Set(argv.filter(a => a.startsWith('--')));
  const positional = argv.filter(a => !a.startsWith('--'));

  if (flags.has('--help')) {
    console.log(USAGE);
    return 0;
  }
  if (positional.length === 0) {
    console.error(USAGE);
    return 1;
  }

  try {
    if (positional[0] === 'parse') {
      return parseNames(positional.slice(1), flags.has('--json'));
    }

    const inventory = buildInventory(positional[0], {
      includeHidden: flags.has('--hidden') || appConfig.includeHidden,
    });
    console.log(flags.has('--json') ? JSON.stringify(inventory, null, 2) : formatInventory(inventory));
    return 0;
  } catch (err) {
    console.error('[cli] Failed:', err instanceof Error ? err.message : String(err));
    return 1;
  }
}

function parseNames(names: string[], json: boolean): number {
  let failed = 0;

  for (const name of names) {
    const record = GbmFile.fromPath(name);
    if (!record) {
      console.error(`${name}: no match`);
      failed++;
      continue;
    }
    const fields = record.toInput();
    console.log(json ? JSON.stringify(fields) : `${name}: ${describeFields(record)}`);
  }

  return failed > 0 ? 1 : 0;
}

function describeFields(record: GbmFile): string {
  return [
    `dataType=${record.dataType}`,
    `detector=${record.detector ?? 'all'}`,
    `trigger=${String(record.trigger)}`,
    `uid=${record.uid}`,
    `meta=${record.meta}`,
    `version=${record.versionStr}`,
    `extension=${record.extension}`,
  ].join(' ');
}
