import * as path from 'path';
import { UsageError } from './errors';

/**
 * Overrides the default kubeconfig location, e.g. from a .env file
 */
export const DEFAULT_CONFIG_ENV = 'KUBE_PRUNE_DEFAULT_CONFIG';

export function defaultConfigPath(env: NodeJS.ProcessEnv, homeDir: string): string {
  const fromEnv = env[DEFAULT_CONFIG_ENV];
  if (fromEnv && fromEnv.trim()) {
    return fromEnv;
  }
  return path.join(homeDir, '.kube', 'config');
}

/**
 * No args: the default config. One arg: that file. More: usage error.
 */
export function resolveConfigPath(args: string[], env: NodeJS.ProcessEnv, homeDir: string): string {
  if (args.length > 1) {
    throw new UsageError('At most 1 argument allowed');
  }
  if (args.length === 1) {
    return args[0];
  }
  return defaultConfigPath(env, homeDir);
}
