import * as fs from 'fs';
import type { Document, YAMLSeq } from 'yaml';
import { isAlias, isMap, isScalar, isSeq, parseDocument } from 'yaml';
import { ConfigParseError, IOFailureError, NotFoundError } from '../errors';

export type ConfigDocument = Document.Parsed;

export type ListKey = 'contexts' | 'clusters' | 'users';

export interface ContextEntry {
  name: string;
  clusterRef: string;
  userRef: string;
}

/**
 * Throws NotFoundError if nothing exists at the given path
 */
export function ensureConfigExists(configPath: string): void {
  if (!fs.existsSync(configPath)) {
    throw new NotFoundError(configPath);
  }
}

/**
 * Loads a kubeconfig file into an editable YAML document.
 * Comments, key order and fields we never touch survive a later render.
 * Callers check the path with ensureConfigExists first.
 */
export function loadConfig(configPath: string): ConfigDocument {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new IOFailureError(`Failed to read ${configPath}`, configPath, err);
  }
  return parseConfig(content, configPath);
}

export function parseConfig(content: string, source: string = '<input>'): ConfigDocument {
  const doc = parseDocument(content);

  if (doc.errors.length > 0) {
    throw new ConfigParseError(doc.errors[0].message, source);
  }
  if (!isMap(doc.contents)) {
    throw new ConfigParseError('top level of the document is not a mapping', source);
  }

  // Surface a malformed list now rather than halfway through the prompts
  for (const key of ['contexts', 'clusters', 'users'] as const) {
    getList(doc, key, source);
  }

  return doc;
}

/**
 * Serializes the document back to YAML, without a leading `---`
 */
export function renderConfig(doc: ConfigDocument): string {
  if (doc.directives) {
    doc.directives.docStart = null;
  }
  return doc.toString();
}

/**
 * Returns the top-level sequence for a key, or undefined when it is absent or null
 */
function getList(doc: ConfigDocument, key: ListKey, source: string = '<input>'): YAMLSeq | undefined {
  const node = doc.get(key);
  if (node === undefined || node === null) {
    return undefined;
  }
  if (!isSeq(node)) {
    throw new ConfigParseError(`'${key}' is not a list`, source);
  }
  return node;
}

function resolveNode(doc: ConfigDocument, node: unknown): unknown {
  return isAlias(node) ? node.resolve(doc) : node;
}

/**
 * Reads a scalar below an entry, following `*alias` references on the way
 */
function readText(doc: ConfigDocument, item: unknown, path: string[]): string {
  let node = resolveNode(doc, item);
  for (const key of path) {
    if (!isMap(node)) {
      return '';
    }
    node = resolveNode(doc, node.get(key, true));
  }
  if (!isScalar(node) || node.value === null || node.value === undefined || typeof node.value === 'object') {
    return '';
  }
  return String(node.value);
}

export function listContexts(doc: ConfigDocument): ContextEntry[] {
  const contexts = getList(doc, 'contexts');
  if (!contexts) {
    return [];
  }
  return contexts.items.map((item) => ({
    name: readText(doc, item, ['name']),
    clusterRef: readText(doc, item, ['context', 'cluster']),
    userRef: readText(doc, item, ['context', 'user']),
  }));
}

/**
 * Names of the entries in a top-level list, by position
 */
export function listNames(doc: ConfigDocument, key: ListKey): string[] {
  const list = getList(doc, key);
  if (!list) {
    return [];
  }
  return list.items.map((item) => readText(doc, item, ['name']));
}

/**
 * Removes entries by their index before any removal took place.
 * Indices are applied highest first so the lower ones stay valid.
 */
export function removeAt(doc: ConfigDocument, key: ListKey, indices: number[]): void {
  const list = getList(doc, key);
  if (!list) {
    return;
  }
  const descending = [...new Set(indices)].sort((a, b) => b - a);
  for (const index of descending) {
    if (index >= 0 && index < list.items.length) {
      list.items.splice(index, 1);
    }
  }
}
