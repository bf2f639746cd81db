// ============================================================================
// Tests: Command-line interface
// ============================================================================

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runCli } from '../cli.js';
import { appConfig } from '../config.js';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// parse
// ============================================================================

describe('glg-files parse', () => {
  it('prints the fields of a canonical filename', () => {
    expect(runCli(['parse', 'glg_cspec_n0_bn090131090_v00.pha'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(
      'glg_cspec_n0_bn090131090_v00.pha: dataType=cspec detector=n0 trigger=true ' +
      'uid=090131090 meta= version=00 extension=pha',
    );
  });

  it('prints JSON with --json', () => {
    expect(runCli(['parse', '--json', 'glg_ctime_all_190101_v02.pha'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(JSON.stringify({
      dataType: 'ctime',
      detector: null,
      trigger: false,
      uid: '190101',
      meta: '',
      version: 2,
      extension: 'pha',
      directory: '',
    }));
  });

  it('exits 1 when a name does not parse', () => {
    expect(runCli(['parse', 'glg_cspec_n0_bn090131090_v00.pha', 'notes.txt'])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('notes.txt: no match');
  });
});

// ============================================================================
// inventory
// ============================================================================

describe('glg-files <dir>', () => {
  it('prints usage and exits 1 without arguments', () => {
    expect(runCli([])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Usage: glg-files <dir> [--hidden] [--json] | glg-files parse <name...>',
    );
  });

  it('prints usage and exits 0 with --help', () => {
    expect(runCli(['--help'])).toBe(0);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('prints the inventory of a directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'glg-cli-'));
    try {
      fs.writeFileSync(path.join(dir, 'glg_ctime_all_190101_v00.pha'), '');
      expect(runCli([dir])).toBe(0);
      expect(console.log).toHaveBeenLastCalledWith(
        `glg_ctime_*_190101_v*.pha  detectors=all  v00  ${path.join(appConfig.dataRoot, '2019-01-01')}`,
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing directory and exits 1', () => {
    const missing = path.join(os.tmpdir(), 'glg-cli-missing-dir');
    expect(runCli([missing])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('[cli] Failed:', expect.stringContaining('ENOENT'));
  });
});
