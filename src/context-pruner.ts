import type { Prompter } from './prompt';
import type { ConfigDocument } from './utils/kubeconfig';
import { listContexts, removeAt } from './utils/kubeconfig';

export interface RemovedContextInfo {
  originalIndex: number;
  clusterName: string;
  userName: string;
}

/**
 * Walks the contexts in order and asks whether to delete each one.
 * Nothing is removed until every context has been asked about, so the
 * recorded indices all refer to the list as it was loaded.
 */
export async function pruneContexts(doc: ConfigDocument, prompter: Prompter): Promise<RemovedContextInfo[]> {
  const contexts = listContexts(doc);
  const removed: RemovedContextInfo[] = [];

  for (let i = 0; i < contexts.length; i++) {
    const context = contexts[i];
    console.log('');
    console.log(`=== Context: '${context.name}' ===`);
    console.log(`cluster: ${context.clusterRef}`);
    console.log(`user   : ${context.userRef}`);

    const deleteIt = await prompter.yesOrNo(`Delete context '${context.name}'?`, false);
    if (deleteIt) {
      removed.push({
        originalIndex: i,
        clusterName: context.clusterRef,
        userName: context.userRef,
      });
    }
  }

  removeAt(doc, 'contexts', removed.map((entry) => entry.originalIndex));

  return removed;
}
