import type { RemovedContextInfo } from './context-pruner';
import type { ConfigDocument, ListKey } from './utils/kubeconfig';
import { listNames, removeAt } from './utils/kubeconfig';

export type EntryKind = 'cluster' | 'user';

const LIST_FOR_KIND: Record<EntryKind, ListKey> = {
  cluster: 'clusters',
  user: 'users',
};

/**
 * Deletes every cluster (or user) whose name a removed context pointed at.
 *
 * Surviving contexts are not consulted: a cluster shared by a kept context
 * and a deleted one goes too. Every entry carrying the name is removed,
 * duplicates included.
 *
 * @returns the names of the removed entries, in list order
 */
export function deleteOrphans(doc: ConfigDocument, removed: RemovedContextInfo[], kind: EntryKind): string[] {
  const namesToDelete = new Set(
    removed.map((entry) => (kind === 'cluster' ? entry.clusterName : entry.userName))
  );
  const listKey = LIST_FOR_KIND[kind];

  const indices: number[] = [];
  const deleted: string[] = [];
  listNames(doc, listKey).forEach((name, index) => {
    if (namesToDelete.has(name)) {
      indices.push(index);
      deleted.push(name);
      console.log(`Deleting ${kind}: '${name}'`);
    }
  });

  removeAt(doc, listKey, indices);

  return deleted;
}

export function cascadeDelete(
  doc: ConfigDocument,
  removed: RemovedContextInfo[]
): { clusters: string[]; users: string[] } {
  const clusters = deleteOrphans(doc, removed, 'cluster');
  const users = deleteOrphans(doc, removed, 'user');
  return { clusters, users };
}
