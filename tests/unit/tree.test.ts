/**
 * Tests for node model operations.
 */

import { describe, it, expect } from 'vitest';
import {
  createNode,
  attachChild,
  attachChildren,
  insertChild,
  detachChild,
  getChild,
  addEvent,
  setAttribute,
  setStyle,
  setLayout,
  walkTree,
  findNodes,
  findById,
  countNodes,
  treeDepth,
  nodesEqual,
} from '../../src/core/tree.js';
import { NodeKind } from '../../src/core/kinds.js';
import { px } from '../../src/core/values.js';

function leaf(label: string): ReturnType<typeof createNode> {
  return createNode(NodeKind.Text, { attributes: { text_content: label } });
}

describe('createNode', () => {
  it('starts empty', () => {
    const node = createNode(NodeKind.Container);
    expect(node).toEqual({ kind: NodeKind.Container, attributes: {}, children: [], events: [] });
    expect(node.id).toBeUndefined();
  });

  it('copies collections from options', () => {
    const attributes = { a: 1 };
    const children = [leaf('x')];
    const node = createNode(NodeKind.Row, { id: 9, attributes, children });
    attributes.a = 2;
    children.push(leaf('y'));
    expect(node.id).toBe(9);
    expect(node.attributes).toEqual({ a: 1 });
    expect(node.children).toHaveLength(1);
  });
});

describe('mutators', () => {
  it('attach in order and return the parent', () => {
    const parent = createNode(NodeKind.Column);
    const a = leaf('a');
    const b = leaf('b');
    const c = leaf('c');
    expect(attachChild(parent, a)).toBe(parent);
    attachChildren(parent, b, c);
    expect(parent.children).toEqual([a, b, c]);
  });

  it('clamps the insertion index', () => {
    const parent = createNode(NodeKind.Column, { children: [leaf('a'), leaf('b')] });
    const first = leaf('first');
    const last = leaf('last');
    insertChild(parent, first, -5);
    insertChild(parent, last, 99);
    expect(parent.children[0]).toBe(first);
    expect(parent.children[3]).toBe(last);
  });

  it('detaches by identity', () => {
    const a = leaf('a');
    const parent = createNode(NodeKind.Column, { children: [a] });
    expect(detachChild(parent, leaf('a'))).toBe(false);
    expect(detachChild(parent, a)).toBe(true);
    expect(parent.children).toHaveLength(0);
  });

  it('returns null for a missing child index', () => {
    const parent = createNode(NodeKind.Column, { children: [leaf('a')] });
    expect(getChild(parent, 0)?.attributes).toEqual({ text_content: 'a' });
    expect(getChild(parent, 1)).toBeNull();
  });

  it('sets attributes, style, layout and events', () => {
    const node = createNode(NodeKind.Button);
    setAttribute(node, 'title', 'Go');
    setStyle(node, { width: px(10) });
    setLayout(node, { gap: 4 });
    addEvent(addEvent(node, 'click', 'onGo'), 'hover', 'onHover');
    expect(node.attributes).toEqual({ title: 'Go' });
    expect(node.style).toEqual({ width: px(10) });
    expect(node.layout).toEqual({ gap: 4 });
    expect(node.events).toEqual([
      { type: 'click', handler: 'onGo' },
      { type: 'hover', handler: 'onHover' },
    ]);
  });
});

describe('traversal', () => {
  const tree = createNode(NodeKind.Column, {
    id: 1,
    children: [
      createNode(NodeKind.Row, { id: 2, children: [leaf('a'), createNode(NodeKind.Text, { id: 7 })] }),
      leaf('b'),
    ],
  });

  it('walks in preorder with depth', () => {
    const seen: string[] = [];
    walkTree(tree, (node, depth) => seen.push(`${NodeKind[node.kind]}@${depth}`));
    expect(seen).toEqual(['Column@0', 'Row@1', 'Text@2', 'Text@2', 'Text@1']);
  });

  it('counts and measures', () => {
    expect(countNodes(tree)).toBe(5);
    expect(treeDepth(tree)).toBe(3);
    expect(countNodes(null)).toBe(0);
    expect(treeDepth(null)).toBe(0);
  });

  it('finds nodes', () => {
    expect(findNodes(tree, (n) => n.kind === NodeKind.Text)).toHaveLength(3);
    expect(findById(tree, 7)?.kind).toBe(NodeKind.Text);
    expect(findById(tree, 99)).toBeNull();
  });
});

describe('nodesEqual', () => {
  it('ignores ids by default', () => {
    const a = createNode(NodeKind.Text, { id: 1, attributes: { text_content: 'x' } });
    const b = createNode(NodeKind.Text, { id: 2, attributes: { text_content: 'x' } });
    expect(nodesEqual(a, b)).toBe(true);
    expect(nodesEqual(a, b, { compareIds: true })).toBe(false);
  });

  it('treats an absent style as empty', () => {
    const a = createNode(NodeKind.Container);
    const b = createNode(NodeKind.Container, { style: {}, layout: {} });
    expect(nodesEqual(a, b)).toBe(true);
  });

  it('compares nested attribute values and child order', () => {
    const a = createNode(NodeKind.Column, { attributes: { data: { list: [1, 2] } }, children: [leaf('1'), leaf('2')] });
    const b = createNode(NodeKind.Column, { attributes: { data: { list: [1, 2] } }, children: [leaf('1'), leaf('2')] });
    const c = createNode(NodeKind.Column, { attributes: { data: { list: [1, 2] } }, children: [leaf('2'), leaf('1')] });
    expect(nodesEqual(a, b)).toBe(true);
    expect(nodesEqual(a, c)).toBe(false);
  });

  it('compares events', () => {
    const a = addEvent(createNode(NodeKind.Button), 'click', 'a');
    const b = addEvent(createNode(NodeKind.Button), 'click', 'b');
    expect(nodesEqual(a, b)).toBe(false);
  });
});
