/**
 * Component constructor functions.
 *
 * One constructor per node kind. Constructors seed the attributes their
 * kind requires under internal keys (`text('Hi')` seeds `text_content`);
 * seeded values win over the same key in `options.attributes`.
 *
 * CONSTRUCTOR_PARAMS describes, per kind, which constructor builds it and which
 * attributes it takes positionally. The decoder uses it to rebuild nodes
 * through the same constructors, and the source regenerator uses it to
 * print constructor calls.
 */

import type { AttrValue, KirNode, LayoutRecord, NodeOptions } from '../core/types.js';
import { NodeKind, kindFromLooseName } from '../core/kinds.js';
import { addEvent, createNode } from '../core/tree.js';
import { ValidationError } from '../core/errors.js';
import { assignOwn } from '../core/json.js';

function seeded(kind: NodeKind, seeds: Record<string, AttrValue | undefined>, options: NodeOptions = {}): KirNode {
  const attributes: Record<string, AttrValue> = { ...options.attributes };
  for (const [key, value] of Object.entries(seeds)) {
    if (value !== undefined) attributes[key] = value;
  }
  return createNode(kind, { ...options, attributes });
}

// ── Layout containers ──────────────────────────────────────────────

export interface ContainerOptions extends NodeOptions {
  gap?: number;
  justifyContent?: string;
  alignItems?: string;
}

function flexContainer(kind: NodeKind, base: LayoutRecord, options: ContainerOptions): KirNode {
  const { gap, justifyContent, alignItems, ...rest } = options;
  const merged: LayoutRecord = { ...base };
  if (gap !== undefined) merged.gap = gap;
  if (justifyContent !== undefined) merged.justify_content = justifyContent;
  if (alignItems !== undefined) merged.align_items = alignItems;

  // Fields of an explicit layout override the seeded ones.
  for (const [key, value] of Object.entries(rest.layout ?? {})) {
    if (value !== undefined) assignOwn(merged, key, value);
  }
  return createNode(kind, { ...rest, layout: merged });
}

const ROW_LAYOUT: LayoutRecord = { flex_direction: 'row' };
const COLUMN_LAYOUT: LayoutRecord = { flex_direction: 'column' };
const CENTER_LAYOUT: LayoutRecord = { justify_content: 'center', align_items: 'center' };

export function container(options: NodeOptions = {}): KirNode {
  return createNode(NodeKind.Container, options);
}

/** Horizontal flex container. */
export function row(options: ContainerOptions = {}): KirNode {
  return flexContainer(NodeKind.Row, ROW_LAYOUT, options);
}

/** Vertical flex container. */
export function column(options: ContainerOptions = {}): KirNode {
  return flexContainer(NodeKind.Column, COLUMN_LAYOUT, options);
}

export function center(options: ContainerOptions = {}): KirNode {
  return flexContainer(NodeKind.Center, CENTER_LAYOUT, options);
}

// ── Basic controls ─────────────────────────────────────────────────

export function text(content: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Text, { text_content: content }, options);
}

export interface ButtonOptions extends NodeOptions {
  /** Handler name bound to the `click` event. */
  onClick?: string;
}

export function button(title: string, options: ButtonOptions = {}): KirNode {
  const { onClick, ...rest } = options;
  const node = seeded(NodeKind.Button, { title }, rest);
  if (onClick) addEvent(node, 'click', onClick);
  return node;
}

export function input(placeholder?: string, value?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Input, { placeholder, value }, options);
}

export function checkbox(checked = false, label?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Checkbox, { checked, label }, options);
}

export function dropdown(choices?: string[], selectedIndex = 0, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Dropdown, { options: choices, selected_index: selectedIndex }, options);
}

export function textarea(placeholder?: string, value?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Textarea, { placeholder, value }, options);
}

// ── Display ────────────────────────────────────────────────────────

export function image(src: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Image, { src }, options);
}

export function canvas(width = 300, height = 150, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Canvas, { width, height }, options);
}

/** Platform canvas drawn by the host renderer. */
export function nativeCanvas(width = 300, height = 150, options?: NodeOptions): KirNode {
  return seeded(NodeKind.NativeCanvas, { width, height }, options);
}

export function markdown(content: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Markdown, { content }, options);
}

export function sprite(src: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Sprite, { src }, options);
}

// ── Tabs ───────────────────────────────────────────────────────────

export function tabGroup(selectedIndex = 0, options?: NodeOptions): KirNode {
  return seeded(NodeKind.TabGroup, { selected_index: selectedIndex }, options);
}

export function tabBar(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TabBar, options);
}

export function tab(title: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Tab, { title }, options);
}

export function tabContent(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TabContent, options);
}

export function tabPanel(title: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.TabPanel, { title }, options);
}

export function modal(isOpen = false, title?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Modal, { is_open: isOpen, title }, options);
}

// ── Tables ─────────────────────────────────────────────────────────

export function table(options?: NodeOptions): KirNode {
  return createNode(NodeKind.Table, options);
}

export function tableHead(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TableHead, options);
}

export function tableBody(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TableBody, options);
}

export function tableFoot(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TableFoot, options);
}

export function tableRow(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TableRow, options);
}

export function tableCell(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TableCell, options);
}

export function tableHeaderCell(options?: NodeOptions): KirNode {
  return createNode(NodeKind.TableHeaderCell, options);
}

// ── Markdown blocks ────────────────────────────────────────────────

/** Heading of level 1..6. Any other level throws a ValidationError. */
export function heading(content: string, level = 1, options?: NodeOptions): KirNode {
  if (!Number.isInteger(level) || level < 1 || level > 6) {
    throw new ValidationError(`Heading level must be between 1 and 6, got ${level}`, level);
  }
  return seeded(NodeKind.Heading, { text: content, level }, options);
}

export function paragraph(content: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Paragraph, { text_content: content }, options);
}

export function blockquote(content: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Blockquote, { text_content: content }, options);
}

export function codeBlock(code: string, language?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.CodeBlock, { code, language }, options);
}

export function horizontalRule(options?: NodeOptions): KirNode {
  return createNode(NodeKind.HorizontalRule, options);
}

export function list(ordered = false, start = 1, options?: NodeOptions): KirNode {
  return seeded(NodeKind.List, { ordered, start }, options);
}

export function listItem(content?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.ListItem, { text_content: content }, options);
}

export function link(content: string, url: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Link, { text_content: content, url }, options);
}

// ── Inline text ────────────────────────────────────────────────────

export function span(options?: NodeOptions): KirNode {
  return createNode(NodeKind.Span, options);
}

export function strong(content?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Strong, { text_content: content }, options);
}

export function em(content?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Em, { text_content: content }, options);
}

export function codeInline(content: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.CodeInline, { text_content: content }, options);
}

export function small(content?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Small, { text_content: content }, options);
}

export function mark(content?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Mark, { text_content: content }, options);
}

// ── Templates and flow control ─────────────────────────────────────

export function customComponent(name = 'Custom', options?: NodeOptions): KirNode {
  return seeded(NodeKind.Custom, { component_name: name }, options);
}

/** Block evaluated once at compile time. */
export function staticBlock(options?: NodeOptions): KirNode {
  return createNode(NodeKind.StaticBlock, options);
}

/** Compile-time iteration template. */
export function forLoop(options?: NodeOptions): KirNode {
  return createNode(NodeKind.ForLoop, options);
}

/** Runtime list rendering over the `items` expression. */
export function forEach(items?: string, itemName = 'item', options?: NodeOptions): KirNode {
  return seeded(NodeKind.ForEach, { items, item_name: itemName }, options);
}

export function varDecl(options?: NodeOptions): KirNode {
  return createNode(NodeKind.VarDecl, options);
}

/** Template placeholder (`{{name}}`). */
export function placeholder(name: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.Placeholder, { name }, options);
}

// ── Diagrams ───────────────────────────────────────────────────────

export function flowchart(options?: NodeOptions): KirNode {
  return createNode(NodeKind.Flowchart, options);
}

export function flowchartNode(nodeId: string, label: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.FlowchartNode, { id: nodeId, label }, options);
}

export function flowchartEdge(from: string, to: string, label?: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.FlowchartEdge, { from, to, label }, options);
}

export function flowchartSubgraph(subgraphId: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.FlowchartSubgraph, { id: subgraphId }, options);
}

export function flowchartLabel(content: string, options?: NodeOptions): KirNode {
  return seeded(NodeKind.FlowchartLabel, { text: content }, options);
}

/** Build a node from a loosely written kind name (`'table_row'`, `'TableRow'`). */
export function element(kindName: string, options?: NodeOptions): KirNode {
  return createNode(kindFromLooseName(kindName), options);
}

// ── Constructor table ──────────────────────────────────────────────

export type ParamType = 'string' | 'number' | 'boolean' | 'string[]';

export interface ParamSpec {
  /** Internal attribute key the parameter seeds. */
  key: string;
  type: ParamType;
  /** Optional parameters are seeded only when given. */
  optional?: boolean;
}

export type ParamValue = string | number | boolean | string[] | undefined;

export interface ConstructorSpec {
  /** Exported constructor function name. */
  name: string;
  params: readonly ParamSpec[];
  /** Layout fields the constructor seeds. */
  seededLayout?: LayoutRecord;
  build(args: readonly ParamValue[], options: NodeOptions): KirNode;
}

function str(value: ParamValue): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function num(value: ParamValue): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function bool(value: ParamValue): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function strList(value: ParamValue): string[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

const S = (key: string, optional?: boolean): ParamSpec => ({ key, type: 'string', optional });
const N = (key: string): ParamSpec => ({ key, type: 'number' });
const B = (key: string): ParamSpec => ({ key, type: 'boolean' });

function plain(name: string, ctor: (options: NodeOptions) => KirNode): ConstructorSpec {
  return { name, params: [], build: (_args, options) => ctor(options) };
}

export const CONSTRUCTOR_PARAMS: ReadonlyMap<NodeKind, ConstructorSpec> = new Map<NodeKind, ConstructorSpec>([
  [NodeKind.Container, plain('container', container)],
  [NodeKind.Row, { ...plain('row', row), seededLayout: ROW_LAYOUT }],
  [NodeKind.Column, { ...plain('column', column), seededLayout: COLUMN_LAYOUT }],
  [NodeKind.Center, { ...plain('center', center), seededLayout: CENTER_LAYOUT }],

  [NodeKind.Text, { name: 'text', params: [S('text_content')], build: ([c], o) => text(str(c) ?? '', o) }],
  [NodeKind.Button, { name: 'button', params: [S('title')], build: ([t], o) => button(str(t) ?? '', o) }],
  [NodeKind.Input, {
    name: 'input',
    params: [S('placeholder', true), S('value', true)],
    build: ([p, v], o) => input(str(p), str(v), o),
  }],
  [NodeKind.Checkbox, {
    name: 'checkbox',
    params: [B('checked'), S('label', true)],
    build: ([c, l], o) => checkbox(bool(c), str(l), o),
  }],
  [NodeKind.Dropdown, {
    name: 'dropdown',
    params: [{ key: 'options', type: 'string[]', optional: true }, N('selected_index')],
    build: ([c, i], o) => dropdown(strList(c), num(i), o),
  }],
  [NodeKind.Textarea, {
    name: 'textarea',
    params: [S('placeholder', true), S('value', true)],
    build: ([p, v], o) => textarea(str(p), str(v), o),
  }],

  [NodeKind.Image, { name: 'image', params: [S('src')], build: ([s], o) => image(str(s) ?? '', o) }],
  [NodeKind.Canvas, {
    name: 'canvas',
    params: [N('width'), N('height')],
    build: ([w, h], o) => canvas(num(w), num(h), o),
  }],
  [NodeKind.NativeCanvas, {
    name: 'nativeCanvas',
    params: [N('width'), N('height')],
    build: ([w, h], o) => nativeCanvas(num(w), num(h), o),
  }],
  [NodeKind.Markdown, { name: 'markdown', params: [S('content')], build: ([c], o) => markdown(str(c) ?? '', o) }],
  [NodeKind.Sprite, { name: 'sprite', params: [S('src')], build: ([s], o) => sprite(str(s) ?? '', o) }],

  [NodeKind.TabGroup, { name: 'tabGroup', params: [N('selected_index')], build: ([i], o) => tabGroup(num(i), o) }],
  [NodeKind.TabBar, plain('tabBar', tabBar)],
  [NodeKind.Tab, { name: 'tab', params: [S('title')], build: ([t], o) => tab(str(t) ?? '', o) }],
  [NodeKind.TabContent, plain('tabContent', tabContent)],
  [NodeKind.TabPanel, { name: 'tabPanel', params: [S('title')], build: ([t], o) => tabPanel(str(t) ?? '', o) }],
  [NodeKind.Modal, {
    name: 'modal',
    params: [B('is_open'), S('title', true)],
    build: ([open, t], o) => modal(bool(open), str(t), o),
  }],

  [NodeKind.Table, plain('table', table)],
  [NodeKind.TableHead, plain('tableHead', tableHead)],
  [NodeKind.TableBody, plain('tableBody', tableBody)],
  [NodeKind.TableFoot, plain('tableFoot', tableFoot)],
  [NodeKind.TableRow, plain('tableRow', tableRow)],
  [NodeKind.TableCell, plain('tableCell', tableCell)],
  [NodeKind.TableHeaderCell, plain('tableHeaderCell', tableHeaderCell)],

  [NodeKind.Heading, {
    name: 'heading',
    params: [S('text'), N('level')],
    build: ([t, l], o) => heading(str(t) ?? '', num(l), o),
  }],
  [NodeKind.Paragraph, { name: 'paragraph', params: [S('text_content')], build: ([c], o) => paragraph(str(c) ?? '', o) }],
  [NodeKind.Blockquote, { name: 'blockquote', params: [S('text_content')], build: ([c], o) => blockquote(str(c) ?? '', o) }],
  [NodeKind.CodeBlock, {
    name: 'codeBlock',
    params: [S('code'), S('language', true)],
    build: ([c, l], o) => codeBlock(str(c) ?? '', str(l), o),
  }],
  [NodeKind.HorizontalRule, plain('horizontalRule', horizontalRule)],
  [NodeKind.List, { name: 'list', params: [B('ordered'), N('start')], build: ([ord, s], o) => list(bool(ord), num(s), o) }],
  [NodeKind.ListItem, { name: 'listItem', params: [S('text_content', true)], build: ([c], o) => listItem(str(c), o) }],
  [NodeKind.Link, {
    name: 'link',
    params: [S('text_content'), S('url')],
    build: ([c, u], o) => link(str(c) ?? '', str(u) ?? '', o),
  }],

  [NodeKind.Span, plain('span', span)],
  [NodeKind.Strong, { name: 'strong', params: [S('text_content', true)], build: ([c], o) => strong(str(c), o) }],
  [NodeKind.Em, { name: 'em', params: [S('text_content', true)], build: ([c], o) => em(str(c), o) }],
  [NodeKind.CodeInline, { name: 'codeInline', params: [S('text_content')], build: ([c], o) => codeInline(str(c) ?? '', o) }],
  [NodeKind.Small, { name: 'small', params: [S('text_content', true)], build: ([c], o) => small(str(c), o) }],
  [NodeKind.Mark, { name: 'mark', params: [S('text_content', true)], build: ([c], o) => mark(str(c), o) }],

  [NodeKind.Custom, {
    name: 'customComponent',
    params: [S('component_name')],
    build: ([n], o) => customComponent(str(n), o),
  }],
  [NodeKind.StaticBlock, plain('staticBlock', staticBlock)],
  [NodeKind.ForLoop, plain('forLoop', forLoop)],
  [NodeKind.ForEach, {
    name: 'forEach',
    params: [S('items', true), S('item_name')],
    build: ([i, n], o) => forEach(str(i), str(n), o),
  }],
  [NodeKind.VarDecl, plain('varDecl', varDecl)],
  [NodeKind.Placeholder, { name: 'placeholder', params: [S('name')], build: ([n], o) => placeholder(str(n) ?? '', o) }],

  [NodeKind.Flowchart, plain('flowchart', flowchart)],
  [NodeKind.FlowchartNode, {
    name: 'flowchartNode',
    params: [S('id'), S('label')],
    build: ([id, l], o) => flowchartNode(str(id) ?? '', str(l) ?? '', o),
  }],
  [NodeKind.FlowchartEdge, {
    name: 'flowchartEdge',
    params: [S('from'), S('to'), S('label', true)],
    build: ([f, t, l], o) => flowchartEdge(str(f) ?? '', str(t) ?? '', str(l), o),
  }],
  [NodeKind.FlowchartSubgraph, {
    name: 'flowchartSubgraph',
    params: [S('id')],
    build: ([id], o) => flowchartSubgraph(str(id) ?? '', o),
  }],
  [NodeKind.FlowchartLabel, { name: 'flowchartLabel', params: [S('text')], build: ([t], o) => flowchartLabel(str(t) ?? '', o) }],
]);

function matchesType(value: AttrValue, type: ParamType): boolean {
  switch (type) {
    case 'string':
    case 'number':
    case 'boolean':
      return typeof value === type;
    case 'string[]':
      return Array.isArray(value) && value.every((v) => typeof v === 'string');
  }
}

function toParamValue(value: AttrValue): ParamValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return undefined;
}

export interface ExtractedParams {
  args: ParamValue[];
  /** Attributes not consumed by a positional parameter. */
  rest: Record<string, AttrValue>;
}

/**
 * Split an attribute bag into a constructor's positional arguments and the
 * remainder. Returns null when the bag cannot go through the constructor:
 * a required parameter is missing or any parameter has the wrong type.
 */
export function extractParams(spec: ConstructorSpec, attributes: Readonly<Record<string, AttrValue>>): ExtractedParams | null {
  const rest: Record<string, AttrValue> = { ...attributes };
  const args: ParamValue[] = [];

  for (const param of spec.params) {
    if (!(param.key in rest)) {
      if (!param.optional) return null;
      args.push(undefined);
      continue;
    }
    const value = rest[param.key];
    if (!matchesType(value, param.type)) return null;
    args.push(toParamValue(value));
    delete rest[param.key];
  }

  return { args, rest };
}
