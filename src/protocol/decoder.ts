/**
 * Tree decoder: KIR document → KirNode.
 *
 * Kinds whose constructor takes positional parameters are rebuilt through
 * that constructor when the attribute bag supplies them, so a decoded node
 * equals the one the DSL would build. Anything else goes through the
 * generic createNode with the bag as-is.
 */

import type { KirNode, NodeOptions } from '../core/types.js';
import { DEFAULT_LANGUAGE, KIR_VERSION } from '../core/types.js';
import { isKnownWireName, wireNameToKind } from '../core/kinds.js';
import { decodeKeys } from '../core/case-keys.js';
import { decodeLayout, decodeStyle } from '../core/style.js';
import { addEvent, createNode } from '../core/tree.js';
import { FormatError } from '../core/errors.js';
import { SILENT_LOGGER, type Logger } from '../core/logger.js';
import { CONSTRUCTOR_PARAMS, extractParams } from '../dsl/components.js';
import { documentSchema, nodeSchema, parseWith, type WireNode } from './schema.js';

export interface DecodeOptions {
  logger?: Logger;
}

export interface DecodedDocument {
  root: KirNode;
  version: string;
  language: string;
}

/** Parse KIR JSON text. Malformed JSON throws a FormatError. */
export function parseDocument(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new FormatError(`Malformed KIR JSON: ${err instanceof Error ? err.message : String(err)}`, text, {
      cause: err,
    });
  }
}

function buildNode(wire: WireNode, path: string, logger: Logger): KirNode {
  if (!isKnownWireName(wire.type)) {
    logger.debug('Unknown node type, decoding as Container', { type: wire.type, path });
  }
  const kind = wireNameToKind(wire.type);

  const attributes = decodeKeys(wire.properties ?? {});
  const options: NodeOptions = {
    id: wire.id,
    style: wire.style ? decodeStyle(wire.style, `${path}.style`) : undefined,
    layout: wire.layout ? decodeLayout(wire.layout, `${path}.layout`) : undefined,
    children: (wire.children ?? []).map((child, i) => buildNode(child, `${path}.children.${i}`, logger)),
  };

  let node: KirNode | undefined;
  const spec = CONSTRUCTOR_PARAMS.get(kind);
  if (spec && spec.params.length > 0) {
    const extracted = extractParams(spec, attributes);
    if (extracted) node = spec.build(extracted.args, { ...options, attributes: extracted.rest });
  }
  node ??= createNode(kind, { ...options, attributes });

  for (const event of wire.events ?? []) {
    addEvent(node, event.type, event.handler);
  }
  return node;
}

/** Decode a bare node object and its subtree. */
export function decodeNode(value: unknown, options: DecodeOptions = {}): KirNode {
  const wire = parseWith(nodeSchema, value, 'root');
  return buildNode(wire, 'root', options.logger ?? SILENT_LOGGER);
}

function hasRoot(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'root' in value;
}

/**
 * Decode a KIR document. Input without a `root` member is taken to be a
 * bare node. Missing version/metadata fall back to the current defaults.
 */
export function decodeDocument(value: unknown, options: DecodeOptions = {}): DecodedDocument {
  const logger = options.logger ?? SILENT_LOGGER;

  if (!hasRoot(value)) {
    return { root: decodeNode(value, options), version: KIR_VERSION, language: DEFAULT_LANGUAGE };
  }

  const doc = parseWith(documentSchema, value, '');
  return {
    root: buildNode(doc.root, 'root', logger),
    version: doc.version ?? KIR_VERSION,
    language: doc.metadata?.language ?? DEFAULT_LANGUAGE,
  };
}

/** parseDocument followed by decodeDocument. */
export function treeFromJson(text: string, options: DecodeOptions = {}): DecodedDocument {
  return decodeDocument(parseDocument(text), options);
}
