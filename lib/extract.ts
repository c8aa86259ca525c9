/**
 * Heuristic extraction of hostnames and pagination cursors from loosely shaped
 * JSON documents. Upstream responses carry no fixed schema, so the walk is
 * tolerant: it over-approximates and leaves precision to scope filtering.
 */

export type TreeNode =
  | { kind: 'string'; value: string }
  | { kind: 'sequence'; items: TreeNode[] }
  | { kind: 'mapping'; entries: Map<string, TreeNode> }
  | { kind: 'scalar' }; // number, boolean, null

export const HOST_KEYS: readonly string[] = ['domain', 'subdomain', 'fqdn', 'name', 'host'];
export const COLLECTION_KEYS: readonly string[] = ['subdomains', 'results', 'data', 'items'];
export const CURSOR_KEYS: readonly string[] = ['page_state', 'next_page_state', 'next', 'cursor'];

const SCALAR: TreeNode = { kind: 'scalar' };

export function fromJson(value: unknown): TreeNode {
  if (typeof value === 'string') return { kind: 'string', value };
  if (Array.isArray(value)) return { kind: 'sequence', items: value.map(fromJson) };
  if (value !== null && typeof value === 'object') {
    const entries = new Map<string, TreeNode>();
    for (const [k, v] of Object.entries(value)) entries.set(k, fromJson(v));
    return { kind: 'mapping', entries };
  }
  return SCALAR;
}

/**
 * Walk `tree` depth-first and yield every string that may be a hostname.
 *
 * On a mapping: hostname keys first (`extraHostKeys` after the built-in ones),
 * then collection keys, then every other nested mapping or sequence.
 */
export function* extractCandidates(tree: TreeNode, extraHostKeys: readonly string[] = []): Generator<string> {
  switch (tree.kind) {
    case 'string':
      yield tree.value;
      return;
    case 'sequence':
      for (const item of tree.items) yield* extractCandidates(item, extraHostKeys);
      return;
    case 'mapping':
      yield* walkMapping(tree.entries, extraHostKeys);
      return;
    default:
      return;
  }
}

function* walkMapping(entries: Map<string, TreeNode>, extraHostKeys: readonly string[]): Generator<string> {
  for (const key of [...HOST_KEYS, ...extraHostKeys]) {
    const v = entries.get(key);
    if (v?.kind === 'string') {
      const trimmed = v.value.trim();
      if (trimmed) yield trimmed;
    }
  }

  const visited = new Set<string>();
  for (const key of COLLECTION_KEYS) {
    const v = entries.get(key);
    if (v && v.kind !== 'scalar') {
      visited.add(key);
      yield* extractCandidates(v, extraHostKeys);
    }
  }

  for (const [key, v] of entries) {
    if (visited.has(key)) continue;
    if (v.kind === 'mapping' || v.kind === 'sequence') yield* extractCandidates(v, extraHostKeys);
  }
}

/**
 * Find the next-page token: cursor keys of the current mapping first, then
 * children in order. The first non-empty string wins.
 */
export function extractCursor(tree: TreeNode): string | undefined {
  if (tree.kind === 'mapping') {
    for (const key of CURSOR_KEYS) {
      const v = tree.entries.get(key);
      if (v?.kind === 'string' && v.value) return v.value;
    }
    for (const child of tree.entries.values()) {
      const found = extractCursor(child);
      if (found) return found;
    }
  } else if (tree.kind === 'sequence') {
    for (const item of tree.items) {
      const found = extractCursor(item);
      if (found) return found;
    }
  }
  return undefined;
}
