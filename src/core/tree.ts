/**
 * Node model operations.
 *
 * Mutators append or change in place and return the receiver so calls can
 * be chained. None of them check whether a kind may nest inside another;
 * that is the layout engine's business.
 */

import type { AttrValue, EventBinding, KirNode, LayoutRecord, NodeOptions, StyleRecord } from './types.js';
import type { NodeKind } from './kinds.js';
import { assignOwn } from './json.js';

/** Generic attribute-bag constructor. Collections from `options` are copied. */
export function createNode(kind: NodeKind, options: NodeOptions = {}): KirNode {
  const node: KirNode = {
    kind,
    attributes: { ...options.attributes },
    children: [...(options.children ?? [])],
    events: (options.events ?? []).map((e) => ({ type: e.type, handler: e.handler })),
  };
  if (options.id !== undefined) node.id = options.id;
  if (options.style !== undefined) node.style = options.style;
  if (options.layout !== undefined) node.layout = options.layout;
  return node;
}

export function attachChild(parent: KirNode, child: KirNode): KirNode {
  parent.children.push(child);
  return parent;
}

export function attachChildren(parent: KirNode, ...children: KirNode[]): KirNode {
  parent.children.push(...children);
  return parent;
}

/** Insert at `index`, clamped to the current child range. */
export function insertChild(parent: KirNode, child: KirNode, index: number): KirNode {
  const idx = Math.max(0, Math.min(index, parent.children.length));
  parent.children.splice(idx, 0, child);
  return parent;
}

/** Remove `child` (by identity). Returns false when it is not a direct child. */
export function detachChild(parent: KirNode, child: KirNode): boolean {
  const idx = parent.children.indexOf(child);
  if (idx < 0) return false;
  parent.children.splice(idx, 1);
  return true;
}

export function getChild(parent: KirNode, index: number): KirNode | null {
  return parent.children[index] ?? null;
}

export function addEvent(node: KirNode, type: string, handler: string): KirNode {
  node.events.push({ type, handler });
  return node;
}

export function setAttribute(node: KirNode, key: string, value: AttrValue): KirNode {
  assignOwn(node.attributes, key, value);
  return node;
}

export function setStyle(node: KirNode, style: StyleRecord): KirNode {
  node.style = style;
  return node;
}

export function setLayout(node: KirNode, layout: LayoutRecord): KirNode {
  node.layout = layout;
  return node;
}

// ── Traversal ──────────────────────────────────────────────────────

/** Walk all nodes in preorder. */
export function walkTree(node: KirNode | null, visitor: (node: KirNode, depth: number) => void, depth = 0): void {
  if (!node) return;
  visitor(node, depth);
  for (const child of node.children) {
    walkTree(child, visitor, depth + 1);
  }
}

export function findNodes(root: KirNode | null, predicate: (node: KirNode) => boolean): KirNode[] {
  const results: KirNode[] = [];
  walkTree(root, (node) => {
    if (predicate(node)) results.push(node);
  });
  return results;
}

/** First node in preorder carrying `id`. */
export function findById(root: KirNode | null, id: number): KirNode | null {
  return findNodes(root, (n) => n.id === id)[0] ?? null;
}

export function countNodes(node: KirNode | null): number {
  if (!node) return 0;
  return 1 + node.children.reduce((sum, c) => sum + countNodes(c), 0);
}

export function treeDepth(node: KirNode | null): number {
  if (!node) return 0;
  if (node.children.length === 0) return 1;
  return 1 + Math.max(...node.children.map(treeDepth));
}

// ── Equivalence ────────────────────────────────────────────────────

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }

  const aEntries = Object.entries(a).filter(([, v]) => v !== undefined);
  const bEntries = new Map(Object.entries(b).filter(([, v]) => v !== undefined));
  if (aEntries.length !== bEntries.size) return false;
  return aEntries.every(([key, value]) => bEntries.has(key) && valuesEqual(value, bEntries.get(key)));
}

export interface EquivalenceOptions {
  /** Compare ids as well (default false). */
  compareIds?: boolean;
}

function eventsEqual(a: EventBinding[], b: EventBinding[]): boolean {
  return a.length === b.length && a.every((e, i) => e.type === b[i].type && e.handler === b[i].handler);
}

/**
 * Structural equivalence: same kind, attributes, style, layout and events,
 * and pairwise-equivalent children in order. An absent style equals an
 * empty one.
 */
export function nodesEqual(a: KirNode, b: KirNode, options: EquivalenceOptions = {}): boolean {
  if (a.kind !== b.kind) return false;
  if (options.compareIds && a.id !== b.id) return false;
  if (!valuesEqual(a.attributes, b.attributes)) return false;
  if (!valuesEqual(a.style ?? {}, b.style ?? {})) return false;
  if (!valuesEqual(a.layout ?? {}, b.layout ?? {})) return false;
  if (!eventsEqual(a.events, b.events)) return false;
  if (a.children.length !== b.children.length) return false;
  return a.children.every((child, i) => nodesEqual(child, b.children[i], options));
}
