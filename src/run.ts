import * as os from 'os';
import { backupConfig, writeConfig } from './backup';
import { cascadeDelete } from './cascade';
import { resolveConfigPath } from './config';
import type { RemovedContextInfo } from './context-pruner';
import { pruneContexts } from './context-pruner';
import type { Prompter } from './prompt';
import { ensureConfigExists, loadConfig, renderConfig } from './utils/kubeconfig';

export interface RunOptions {
  prompter: Prompter;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  now?: () => Date;
}

export interface RunResult {
  configPath: string;
  backupPath?: string;
  removedContexts: RemovedContextInfo[];
  removedClusters: string[];
  removedUsers: string[];
  written: boolean;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One full pass: backup, prune, cascade, show the result, write back
 */
export async function runPrune(args: string[], options: RunOptions): Promise<RunResult> {
  const { prompter } = options;
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const now = options.now ?? (() => new Date());

  const configPath = resolveConfigPath(args, env, homeDir);
  console.log(`Reading '${configPath}'`);
  ensureConfigExists(configPath);

  const backupPath = await backupConfig(configPath, prompter, now());

  const doc = loadConfig(configPath);
  const removedContexts = await pruneContexts(doc, prompter);
  const { clusters, users } = cascadeDelete(doc, removedContexts);

  console.log('');
  console.log(`Final config is:\n${renderConfig(doc)}`);
  console.log('');

  const written = await writeConfig(configPath, doc, prompter);

  console.log(
    `Removed ${plural(removedContexts.length, 'context')}, ${plural(clusters.length, 'cluster')}, ${plural(users.length, 'user')}.`
  );

  return {
    configPath,
    backupPath,
    removedContexts,
    removedClusters: clusters,
    removedUsers: users,
    written,
  };
}
