import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveRunConfig, RunConfigInput } from '../src/config.js';
import { runDedupeSession } from '../src/dedupe-session.js';
import { FileRemover, RemoveResult } from '../src/types.js';

const RUN_DATE = new Date(2025, 0, 2, 3, 4, 5);

describe('duplicate sweep session', () => {
  let tmpDir: string;
  let keepDir: string;
  let delDir: string;
  let logDir: string;
  let files: Record<'A' | 'B' | 'C' | 'D' | 'E' | 'F', string>;

  const write = (file: string, content: string) => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf8');
    return file;
  };

  // Content doubles as the fingerprint so expected log lines stay readable.
  const contentFingerprint = async (file: string) => fs.readFileSync(file, 'utf8').toUpperCase();

  const config = (overrides: RunConfigInput = {}) =>
    resolveRunConfig({
      scanRoots: [keepDir, delDir],
      deleteRoots: [delDir],
      policy: 'automatic',
      dryRun: false,
      logDir,
      ...overrides,
    });

  const logLines = (logPath: string) => {
    const lines = fs.readFileSync(logPath, 'utf8').trimEnd().split('\n');
    return lines.slice(lines.indexOf('-------------------') + 1);
  };

  beforeEach(() => {
    tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'dedupe-session-test-')));
    keepDir = path.join(tmpDir, 'keep');
    delDir = path.join(tmpDir, 'del');
    logDir = path.join(tmpDir, 'logs');
    files = {
      A: write(path.join(keepDir, 'A.txt'), 'alpha'),
      B: write(path.join(delDir, 'B.txt'), 'alpha'),
      C: write(path.join(delDir, 'C.txt'), 'alpha'),
      D: write(path.join(delDir, 'D.txt'), 'unique'),
      E: write(path.join(delDir, 'sub', 'E.txt'), 'beta'),
      F: write(path.join(delDir, 'F.txt'), 'beta'),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('simulates deletions in a dry run without touching the filesystem', async () => {
    const remove = vi.fn<[string], Promise<RemoveResult>>(async () => ({ ok: true }));
    const remover: FileRemover = { remove };

    const { report, logPath } = await runDedupeSession(config({ dryRun: true }), {
      fingerprint: contentFingerprint,
      remover,
      now: () => RUN_DATE,
    });

    expect(remove).not.toHaveBeenCalled();
    for (const file of Object.values(files)) {
      expect(fs.existsSync(file)).toBe(true);
    }
    expect(logPath).toBe(path.join(logDir, 'log_20250102030405.txt'));
    expect(logLines(logPath)).toEqual([
      `DRY run: Would delete ${files.B} (Hash: ALPHA, Duplicates: ${files.A}, ${files.B}, ${files.C})`,
      `DRY run: Would delete ${files.C} (Hash: ALPHA, Duplicates: ${files.A}, ${files.B}, ${files.C})`,
      `Kept ${files.F} (Hash: BETA, Duplicates: ${files.F}, ${files.E})`,
      `DRY run: Would delete ${files.E} (Hash: BETA, Duplicates: ${files.F}, ${files.E})`,
    ]);
    expect(report.filesRemoved).toBe(0);
    expect(report.getStats()).toMatchObject({ filesScanned: 6, duplicateGroups: 2, simulated: 3, kept: 1 });
  });

  it('removes authorized copies and keeps one copy of every content', async () => {
    const { report, logPath } = await runDedupeSession(config(), { fingerprint: contentFingerprint });

    expect(fs.existsSync(files.A)).toBe(true);
    expect(fs.existsSync(files.B)).toBe(false);
    expect(fs.existsSync(files.C)).toBe(false);
    expect(fs.existsSync(files.D)).toBe(true);
    expect(fs.existsSync(files.F)).toBe(true);
    expect(fs.existsSync(files.E)).toBe(false);
    expect(report.filesRemoved).toBe(3);
    expect(logLines(logPath)[0]).toBe(
      `Deleted ${files.B} (Hash: ALPHA, Duplicates: ${files.A}, ${files.B}, ${files.C})`
    );
  });

  it('works with the real content digests', async () => {
    const { report } = await runDedupeSession(config({ algorithm: 'MD5' }));

    expect(report.filesRemoved).toBe(3);
    expect(report.getStats().duplicateGroups).toBe(2);
    expect(fs.readdirSync(keepDir)).toEqual(['A.txt']);
  });

  it('skips every member when no copy is in an authorized directory', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { report, logPath } = await runDedupeSession(config({ deleteRoots: [path.join(tmpDir, 'elsewhere')] }), {
      fingerprint: contentFingerprint,
    });

    expect(logLines(logPath).map(line => line.split(' ')[0])).toEqual(['Skipped', 'Skipped', 'Skipped', 'Skipped', 'Skipped']);
    expect(report.filesRemoved).toBe(0);
    expect(Object.values(files).every(file => fs.existsSync(file))).toBe(true);
  });

  it('records removal failures and carries on with the next decision', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const remover: FileRemover = {
      remove: async (file) =>
        file === files.B ? { ok: false, cause: 'EPERM: operation not permitted' } : { ok: true },
    };

    const { report, logPath } = await runDedupeSession(config(), { fingerprint: contentFingerprint, remover });

    expect(logLines(logPath)).toEqual([
      `Failed to delete ${files.B} - EPERM: operation not permitted`,
      `Deleted ${files.C} (Hash: ALPHA, Duplicates: ${files.A}, ${files.B}, ${files.C})`,
      `Kept ${files.F} (Hash: BETA, Duplicates: ${files.F}, ${files.E})`,
      `Deleted ${files.E} (Hash: BETA, Duplicates: ${files.F}, ${files.E})`,
    ]);
    expect(report.filesRemoved).toBe(2);
    expect(report.getStats().failed).toBe(1);
  });

  it('asks the operator about authorized copies in manual mode', async () => {
    const prompt = vi.fn(async (candidates: readonly string[]) => (candidates.includes(files.B) ? 2 : 0));

    const { logPath } = await runDedupeSession(config({ policy: 'manual', dryRun: true }), {
      fingerprint: contentFingerprint,
      promptForKeepIndex: prompt,
    });

    expect(prompt).toHaveBeenCalledTimes(2);
    expect(prompt).toHaveBeenNthCalledWith(1, [files.B, files.C], 'ALPHA');
    expect(prompt).toHaveBeenNthCalledWith(2, [files.F, files.E], 'BETA');
    expect(logLines(logPath)).toEqual([
      `Kept ${files.C} (Hash: ALPHA, Duplicates: ${files.A}, ${files.B}, ${files.C})`,
      `DRY run: Would delete ${files.B} (Hash: ALPHA, Duplicates: ${files.A}, ${files.B}, ${files.C})`,
      `Skipped ${files.F} (Hash: BETA, Duplicates: ${files.F}, ${files.E})`,
      `Skipped ${files.E} (Hash: BETA, Duplicates: ${files.F}, ${files.E})`,
    ]);
  });

  it('leaves files without a fingerprint out of every group', async () => {
    const fingerprint = async (file: string) => (file === files.A ? null : contentFingerprint(file));

    const { report, logPath } = await runDedupeSession(config({ dryRun: true }), { fingerprint });

    expect(report.getStats().unreadableFiles).toBe(1);
    expect(logLines(logPath)[0]).toBe(`Kept ${files.B} (Hash: ALPHA, Duplicates: ${files.B}, ${files.C})`);
  });

  it('carries on past a missing scan root', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const { report } = await runDedupeSession(
      config({ scanRoots: [path.join(tmpDir, 'missing'), keepDir, delDir], dryRun: true }),
      { fingerprint: contentFingerprint }
    );

    expect(report.getStats()).toMatchObject({ missingRoots: 1, filesScanned: 6, duplicateGroups: 2 });
  });

  it('never removes a file reached through a symlinked scan root', async () => {
    const photos = path.join(tmpDir, 'photos');
    const alias = path.join(tmpDir, 'alias');
    const only = write(path.join(photos, 'only.jpg'), 'picture');
    fs.symlinkSync(photos, alias);

    const { report, logPath } = await runDedupeSession(
      config({ scanRoots: [photos, alias], deleteRoots: [photos] }),
      { fingerprint: contentFingerprint }
    );

    expect(fs.existsSync(only)).toBe(true);
    expect(report.filesRemoved).toBe(0);
    expect(report.getStats()).toMatchObject({ filesScanned: 1, duplicateGroups: 0 });
    expect(logLines(logPath)).toEqual([]);
  });

  it('refuses manual mode without a prompt before creating a log', async () => {
    await expect(runDedupeSession(config({ policy: 'manual' }))).rejects.toMatchObject({ code: 'INVALID_OPTION' });
    expect(fs.existsSync(logDir)).toBe(false);
  });

  it('writes the progress line when asked to', async () => {
    const output: string[] = [];
    await runDedupeSession(config({ dryRun: true, algorithm: 'SHA-256' }), {
      fingerprint: contentFingerprint,
      progressOutput: (text) => output.push(text),
      clock: () => 0,
    });

    expect(output[output.length - 2]).toBe(
      '\rCalculating SHA-256 hashes: 6/6 (100%) Elapsed: 0h,00m,00s Estimated Total: 0h,00m,00s'
    );
    expect(output[output.length - 1]).toBe('\n');
  });
});
