/**
 * Tree encoder: KirNode → KIR document.
 *
 * Nodes are visited in preorder. Nodes without an explicit id take the next
 * value of a counter that starts at 1 for every call; explicit ids are
 * written as-is and do not advance the counter. The input tree is never
 * modified, so encoding the same tree twice yields identical output.
 *
 * The counter does not skip values already taken by explicit ids: a tree
 * mixing both can come out with duplicates. validateTree reports them.
 */

import type { KirDocument, KirNode, KirNodeJson } from '../core/types.js';
import { DEFAULT_LANGUAGE, KIR_FORMAT, KIR_VERSION } from '../core/types.js';
import { kindToWireName } from '../core/kinds.js';
import { encodeKeys } from '../core/case-keys.js';
import { encodeLayout, encodeStyle } from '../core/style.js';

export interface EncodeOptions {
  /** `metadata.language`. Defaults to `typescript`. */
  language?: string;
}

export interface SerializeOptions {
  /** Spaces per level; 0 writes compact JSON. Defaults to 2. */
  indent?: number;
}

function encodeWithCounter(node: KirNode, next: () => number): KirNodeJson {
  const json: KirNodeJson = {
    type: kindToWireName(node.kind),
    id: node.id ?? next(),
  };

  if (Object.keys(node.attributes).length > 0) {
    json.properties = encodeKeys(node.attributes);
  }

  if (node.style) {
    const style = encodeStyle(node.style);
    if (Object.keys(style).length > 0) json.style = style;
  }

  if (node.layout) {
    const layout = encodeLayout(node.layout);
    if (Object.keys(layout).length > 0) json.layout = layout;
  }

  if (node.children.length > 0) {
    json.children = node.children.map((child) => encodeWithCounter(child, next));
  }

  if (node.events.length > 0) {
    json.events = node.events.map((e) => ({ type: e.type, handler: e.handler }));
  }

  return json;
}

function idCounter(): () => number {
  let counter = 1;
  return () => counter++;
}

/** Encode a single node and its subtree. */
export function encodeNode(node: KirNode): KirNodeJson {
  return encodeWithCounter(node, idCounter());
}

export function encodeDocument(root: KirNode, options: EncodeOptions = {}): KirDocument {
  return {
    version: KIR_VERSION,
    metadata: {
      format: KIR_FORMAT,
      language: options.language ?? DEFAULT_LANGUAGE,
    },
    root: encodeNode(root),
  };
}

export function serializeDocument(doc: KirDocument, options: SerializeOptions = {}): string {
  const indent = options.indent ?? 2;
  return indent > 0 ? JSON.stringify(doc, null, indent) : JSON.stringify(doc);
}

/** encodeDocument followed by serializeDocument. */
export function treeToJson(root: KirNode, options: EncodeOptions & SerializeOptions = {}): string {
  return serializeDocument(encodeDocument(root, options), options);
}
