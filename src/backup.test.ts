import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { backupConfig, backupPathFor, formatTimestamp, writeConfig } from './backup';
import { IOFailureError } from './errors';
import { createScriptedReader, Prompter } from './prompt';
import { parseConfig, removeAt, renderConfig } from './utils/kubeconfig';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, utimesSync: vi.fn(actual.utimesSync) };
});

const SAMPLE = fs.readFileSync(path.join(__dirname, '__fixtures__', 'kubeconfig.yaml'), 'utf-8');
const NOW = new Date(2024, 0, 5, 7, 8, 9);

const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

function prompterFor(answers: string[]): Prompter {
  return new Prompter(createScriptedReader(answers));
}

let dir: string;
let configPath: string;

beforeEach(() => {
  logSpy.mockClear();
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kube-prune-'));
  configPath = path.join(dir, 'config');
  fs.writeFileSync(configPath, SAMPLE);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('formatTimestamp', () => {
  it('pads every field to a fixed width', () => {
    expect(formatTimestamp(NOW)).toBe('20240105-070809');
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('20231231-235958');
  });
});

describe('backupConfig', () => {
  it('copies the file byte for byte when the default is taken', async () => {
    const backupPath = await backupConfig(configPath, prompterFor(['']), NOW);

    expect(backupPath).toBe(`${configPath}.backup.20240105-070809`);
    expect(fs.readFileSync(`${configPath}.backup.20240105-070809`)).toEqual(fs.readFileSync(configPath));
    expect(logSpy).toHaveBeenCalledWith(`Created backup: ${configPath}.backup.20240105-070809`);
  });

  it('overwrites an earlier backup with the same timestamp', async () => {
    const existing = backupPathFor(configPath, NOW);
    fs.writeFileSync(existing, 'stale');

    await backupConfig(configPath, prompterFor(['y']), NOW);

    expect(fs.readFileSync(existing, 'utf-8')).toBe(SAMPLE);
  });

  it('keeps the file mode', async () => {
    fs.chmodSync(configPath, 0o600);

    const backupPath = await backupConfig(configPath, prompterFor(['y']), NOW);

    expect(backupPath).toBeDefined();
    expect(fs.statSync(backupPath ?? '').mode & 0o777).toBe(0o600);
  });

  it('does nothing when declined', async () => {
    await expect(backupConfig(configPath, prompterFor(['n']), NOW)).resolves.toBeUndefined();
    expect(fs.readdirSync(dir)).toEqual(['config']);
  });

  it('removes the copy when its attributes cannot be set', async () => {
    vi.mocked(fs.utimesSync).mockImplementationOnce(() => {
      throw new Error('EPERM: operation not permitted');
    });

    await expect(backupConfig(configPath, prompterFor(['y']), NOW)).rejects.toThrow(
      `Failed to copy file attributes to backup ${configPath}.backup.20240105-070809`
    );
    expect(fs.readdirSync(dir)).toEqual(['config']);
  });

  it('wraps copy failures in IOFailureError', async () => {
    const missing = path.join(dir, 'gone');
    await expect(backupConfig(missing, prompterFor(['y']), NOW)).rejects.toThrow(IOFailureError);
  });
});

describe('writeConfig', () => {
  it('leaves the file alone by default', async () => {
    const doc = parseConfig(SAMPLE);
    removeAt(doc, 'contexts', [0]);

    await expect(writeConfig(configPath, doc, prompterFor(['']))).resolves.toBe(false);
    expect(fs.readFileSync(configPath, 'utf-8')).toBe(SAMPLE);
  });

  it('overwrites the file with the rendered document when confirmed', async () => {
    const doc = parseConfig(SAMPLE);
    removeAt(doc, 'contexts', [0]);

    await expect(writeConfig(configPath, doc, prompterFor(['y']))).resolves.toBe(true);
    expect(fs.readFileSync(configPath, 'utf-8')).toBe(renderConfig(doc));
  });

  it('wraps write failures in IOFailureError', async () => {
    const doc = parseConfig(SAMPLE);
    await expect(writeConfig(dir, doc, prompterFor(['y']))).rejects.toThrow(IOFailureError);
  });
});
