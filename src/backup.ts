import * as fs from 'fs';
import * as path from 'path';
import { IOFailureError } from './errors';
import type { Prompter } from './prompt';
import type { ConfigDocument } from './utils/kubeconfig';
import { renderConfig } from './utils/kubeconfig';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD-HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export function backupPathFor(configPath: string, now: Date): string {
  return `${path.resolve(configPath)}.backup.${formatTimestamp(now)}`;
}

/**
 * Offers to copy the config next to itself before anything is changed.
 * An existing backup with the same name is overwritten; mode and timestamps
 * are carried over from the original.
 *
 * @returns the backup path, or undefined if the user declined
 */
export async function backupConfig(
  configPath: string,
  prompter: Prompter,
  now: Date = new Date()
): Promise<string | undefined> {
  const absolutePath = path.resolve(configPath);
  const createBackup = await prompter.yesOrNo(`Create backup of '${absolutePath}'?`);
  if (!createBackup) {
    return undefined;
  }

  const backupPath = backupPathFor(absolutePath, now);
  let stats: fs.Stats;
  try {
    stats = fs.statSync(absolutePath);
    fs.copyFileSync(absolutePath, backupPath);
  } catch (err) {
    throw new IOFailureError(`Failed to create backup ${backupPath}`, backupPath, err);
  }

  try {
    fs.chmodSync(backupPath, stats.mode & 0o7777);
    fs.utimesSync(backupPath, stats.atime, stats.mtime);
  } catch (err) {
    // A copy without the original's attributes is not kept
    fs.rmSync(backupPath, { force: true });
    throw new IOFailureError(`Failed to copy file attributes to backup ${backupPath}`, backupPath, err);
  }

  console.log(`Created backup: ${backupPath}`);
  return backupPath;
}

/**
 * Offers to overwrite the config with the edited document.
 * The file is truncated and rewritten in place.
 */
export async function writeConfig(configPath: string, doc: ConfigDocument, prompter: Prompter): Promise<boolean> {
  const absolutePath = path.resolve(configPath);
  const writeIt = await prompter.yesOrNo(`Write updated config back to '${absolutePath}'?`, false);
  if (!writeIt) {
    return false;
  }

  try {
    fs.writeFileSync(absolutePath, renderConfig(doc));
  } catch (err) {
    throw new IOFailureError(`Failed to write ${absolutePath}`, absolutePath, err);
  }
  return true;
}
