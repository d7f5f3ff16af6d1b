/**
 * Tests for the KIR tree decoder.
 */

import { describe, it, expect } from 'vitest';
import { parseDocument, decodeDocument, decodeNode, treeFromJson } from '../../src/protocol/decoder.js';
import { encodeDocument } from '../../src/protocol/encoder.js';
import {
  button,
  checkbox,
  column,
  flowchartNode,
  flowchartSubgraph,
  heading,
  text,
} from '../../src/dsl/components.js';
import { style } from '../../src/core/style.js';
import { attachChildren, nodesEqual } from '../../src/core/tree.js';
import { NodeKind } from '../../src/core/kinds.js';
import { createLogger } from '../../src/core/logger.js';
import { FormatError, ValidationError } from '../../src/core/errors.js';
import { percent, px, rgba } from '../../src/core/values.js';

describe('parseDocument', () => {
  it('parses JSON text', () => {
    expect(parseDocument('{"a":1}')).toEqual({ a: 1 });
  });

  it('rejects malformed JSON with a FormatError', () => {
    expect(() => parseDocument('{"root": ')).toThrow(FormatError);
  });
});

describe('decodeDocument', () => {
  it('reads the envelope', () => {
    const decoded = decodeDocument({
      version: '2.0',
      metadata: { format: 'KIR', language: 'lua' },
      root: { type: 'Text', id: 1, properties: { textContent: 'x' } },
    });
    expect(decoded.version).toBe('2.0');
    expect(decoded.language).toBe('lua');
    expect(decoded.root.kind).toBe(NodeKind.Text);
    expect(decoded.root.id).toBe(1);
  });

  it('accepts a bare node', () => {
    const decoded = decodeDocument({ type: 'Button', id: 3, properties: { title: 'Go' } });
    expect(decoded.root.kind).toBe(NodeKind.Button);
    expect(decoded.version).toBe('2.0');
    expect(decoded.language).toBe('typescript');
  });

  it('transcodes properties, style, layout and events', () => {
    const { root } = decodeDocument({
      root: {
        type: 'Column',
        id: 1,
        style: { width: { value: '50%' }, backgroundColor: '#0000ff', paddingTop: 4 },
        layout: { flexDirection: 'column', columnGap: 2 },
        events: [{ type: 'scroll', handler: 'onScroll' }],
        properties: { customData: 'x' },
      },
    });
    expect(root.style).toEqual({ width: percent(50), background_color: rgba(0, 0, 255), padding_top: 4 });
    expect(root.layout).toEqual({ flex_direction: 'column', column_gap: 2 });
    expect(root.events).toEqual([{ type: 'scroll', handler: 'onScroll' }]);
    expect(root.attributes).toEqual({ custom_data: 'x' });
  });

  it('rebuilds kind-specific nodes through their constructors', () => {
    const source = attachChildren(column(), heading('Intro', 2), checkbox(true, 'Agree'), button('Go', { onClick: 'go' }));
    const { root } = decodeDocument(encodeDocument(source));
    expect(nodesEqual(root, source)).toBe(true);
    expect(root.children[2].events).toEqual([{ type: 'click', handler: 'go' }]);
  });

  it('falls back to the generic constructor when required fields are missing', () => {
    const { root } = decodeDocument({ type: 'Heading', id: 1, properties: { level: 3 } });
    expect(root.kind).toBe(NodeKind.Heading);
    expect(root.attributes).toEqual({ level: 3 });
  });

  it('propagates an out-of-range heading level', () => {
    expect(() => decodeDocument({ type: 'Heading', id: 1, properties: { text: 'x', level: 9 } })).toThrow(ValidationError);
  });

  it('decodes a numeric font weight', () => {
    const { root } = decodeDocument({ type: 'Text', id: 1, properties: { textContent: 'x' }, style: { fontWeight: 700 } });
    expect(root.style).toEqual({ font_weight: 700 });
    expect(nodesEqual(root, text('x', { style: style({ font_weight: 700 }) }))).toBe(true);
  });

  it('keeps style values of an unexpected JSON type', () => {
    const { root } = decodeDocument({ type: 'Text', id: 1, style: { fontSize: 'large', opacity: 0.5 } });
    expect(root.style).toEqual({ font_size: 'large', opacity: 0.5 });
  });

  it('rebuilds flowchart nodes from their id and label', () => {
    const { root } = decodeDocument({ type: 'FlowchartNode', id: 1, properties: { id: 'a', label: 'Start' } });
    expect(nodesEqual(root, flowchartNode('a', 'Start'))).toBe(true);
    expect(root.attributes).toEqual({ id: 'a', label: 'Start' });
    expect(encodeDocument(root).root.properties).toEqual({ id: 'a', label: 'Start' });
  });

  it('rebuilds flowchart subgraphs from their id', () => {
    const { root } = decodeDocument({ type: 'FlowchartSubgraph', id: 1, properties: { id: 'g1', title: 'Group' } });
    expect(nodesEqual(root, flowchartSubgraph('g1', { attributes: { title: 'Group' } }))).toBe(true);
  });

  it('does not re-seed layout on decoded rows', () => {
    const { root } = decodeDocument({ type: 'Row', id: 1 });
    expect(root.kind).toBe(NodeKind.Row);
    expect(root.layout).toBeUndefined();
  });
});

describe('unknown kinds', () => {
  const futureDoc = {
    version: '2.0',
    metadata: { format: 'KIR', language: 'typescript' },
    root: {
      type: 'FutureWidget',
      id: 5,
      properties: { sparkle: true, textContent: 'new' },
      style: { height: { value: '10px' } },
      layout: { gap: 3 },
      children: [{ type: 'Text', id: 6, properties: { textContent: 'inside' } }],
    },
  };

  it('decode as a container that keeps everything else', () => {
    const { root } = decodeDocument(futureDoc);
    expect(root.kind).toBe(NodeKind.Container);
    expect(root.id).toBe(5);
    expect(root.attributes).toEqual({ sparkle: true, text_content: 'new' });
    expect(root.style).toEqual({ height: px(10) });
    expect(root.layout).toEqual({ gap: 3 });
    expect(root.children).toHaveLength(1);
    expect(root.children[0].attributes).toEqual({ text_content: 'inside' });
  });

  it('log the miss at debug level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'debug', component: 'test', write: (line) => lines.push(line) });
    decodeDocument(futureDoc, { logger });
    expect(lines).toEqual([
      '[DEBUG] [test] Unknown node type, decoding as Container {"type":"FutureWidget","path":"root"}',
    ]);
  });
});

describe('malformed documents', () => {
  it('report the path of a shape error', () => {
    try {
      decodeDocument({ root: { type: 'Column', id: 1, children: [{ id: 2 }] } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormatError);
      if (err instanceof FormatError) expect(err.path).toBe('root.children.0.type');
    }
  });

  it('report the path of a bad style value', () => {
    try {
      decodeDocument({ root: { type: 'Column', id: 1, children: [{ type: 'Text', id: 2, style: { color: 'mauve' } }] } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormatError);
      if (err instanceof FormatError) expect(err.path).toBe('root.children.0.style.color');
    }
  });

  it('reject non-objects', () => {
    expect(() => decodeNode(42)).toThrow(FormatError);
    expect(() => decodeDocument(null)).toThrow(FormatError);
  });
});

describe('treeFromJson', () => {
  it('keeps a __proto__ key as an ordinary property', () => {
    const json = '{"type":"Container","id":1,"properties":{"__proto__":"x","a":1},"style":{"__proto__":2}}';
    const { root } = treeFromJson(json);
    expect(Object.keys(root.attributes)).toEqual(['__proto__', 'a']);
    expect(Object.getPrototypeOf(root.attributes)).toBe(Object.prototype);
    expect(Object.keys(root.style ?? {})).toEqual(['__proto__']);

    const wire = encodeDocument(root).root;
    expect(Object.keys(wire.properties ?? {})).toEqual(['__proto__', 'a']);
    expect(JSON.stringify(wire.style)).toBe('{"__proto__":2}');
  });

  it('parses and decodes', () => {
    const { root } = treeFromJson('{"root":{"type":"Row","id":1,"children":[{"type":"Text","id":2,"properties":{"textContent":"a"}}]}}');
    expect(root.kind).toBe(NodeKind.Row);
    expect(root.children[0].id).toBe(2);
    expect(root.children[0].attributes).toEqual({ text_content: 'a' });
  });
});
