/**
 * In-process IrLibrary over the plain node model.
 *
 * Handles index into tables of KirNode, StyleRecord and LayoutRecord
 * objects. Nodes reached through getChild/findById/deserialize get a handle
 * the first time they are returned. Serialization goes through the same
 * encoder and decoder as the rest of the package.
 */

import type { Color, Dimension, KirNode, LayoutRecord, StyleRecord } from '../core/types.js';
import type { LayoutInput } from '../core/style.js';
import { layout } from '../core/style.js';
import type { NodeKind } from '../core/kinds.js';
import { kindFromLooseName, kindToWireName } from '../core/kinds.js';
import { addEvent, attachChild, createNode, detachChild, findById, getChild, insertChild, setAttribute, walkTree } from '../core/tree.js';
import { ResourceError } from '../core/errors.js';
import { SILENT_LOGGER, type Logger } from '../core/logger.js';
import { encodeDocument, treeToJson } from '../protocol/encoder.js';
import { treeFromJson } from '../protocol/decoder.js';
import { readKirFile, writeKirFile } from '../io/kir-file.js';
import type {
  BorderSpec,
  EdgeInsets,
  IrLibrary,
  LayoutHandle,
  NodeHandle,
  SerializeCompleteOptions,
  StyleHandle,
} from './ir-library.js';

export class InMemoryIrLibrary implements IrLibrary {
  readonly name = 'memory';

  private nextHandle = 1;
  private readonly nodes = new Map<NodeHandle, KirNode>();
  private readonly nodeHandles = new Map<KirNode, NodeHandle>();
  private readonly parents = new Map<KirNode, KirNode>();
  private readonly styles = new Map<StyleHandle, StyleRecord>();
  private readonly styleHandles = new Map<StyleRecord, StyleHandle>();
  private readonly layouts = new Map<LayoutHandle, LayoutRecord>();

  constructor(private readonly logger: Logger = SILENT_LOGGER) {}

  // ── Handle tables ────────────────────────────────────────────

  /** Number of live node handles. */
  get nodeCount(): number {
    return this.nodes.size;
  }

  /** The node behind a handle, for handing trees to the pure API. */
  tree(handle: NodeHandle): KirNode {
    return this.node(handle);
  }

  /** Handle for a node built outside the library. */
  adopt(node: KirNode): NodeHandle {
    walkTree(node, (n) => {
      for (const child of n.children) this.parents.set(child, n);
    });
    return this.register(node);
  }

  private register(node: KirNode): NodeHandle {
    const existing = this.nodeHandles.get(node);
    if (existing !== undefined) return existing;
    const handle = this.nextHandle++;
    this.nodes.set(handle, node);
    this.nodeHandles.set(node, handle);
    return handle;
  }

  private node(handle: NodeHandle): KirNode {
    const node = this.nodes.get(handle);
    if (!node) throw new ResourceError(`Unknown node handle ${handle}`, `node:${handle}`);
    return node;
  }

  private styleRecord(handle: StyleHandle): StyleRecord {
    const record = this.styles.get(handle);
    if (!record) throw new ResourceError(`Unknown style handle ${handle}`, `style:${handle}`);
    return record;
  }

  private layoutRecord(handle: LayoutHandle): LayoutRecord {
    const record = this.layouts.get(handle);
    if (!record) throw new ResourceError(`Unknown layout handle ${handle}`, `layout:${handle}`);
    return record;
  }

  private registerStyle(record: StyleRecord): StyleHandle {
    const existing = this.styleHandles.get(record);
    if (existing !== undefined) return existing;
    const handle = this.nextHandle++;
    this.styles.set(handle, record);
    this.styleHandles.set(record, handle);
    return handle;
  }

  private unlink(child: KirNode): void {
    const parent = this.parents.get(child);
    if (parent) {
      detachChild(parent, child);
      this.parents.delete(child);
    }
  }

  // ── Nodes ────────────────────────────────────────────────────

  createNode(kind: NodeKind): NodeHandle {
    return this.register(createNode(kind));
  }

  createNodeWithId(kind: NodeKind, id: number): NodeHandle {
    return this.register(createNode(kind, { id }));
  }

  destroy(handle: NodeHandle): void {
    const root = this.node(handle);
    this.unlink(root);
    walkTree(root, (n) => {
      const h = this.nodeHandles.get(n);
      if (h !== undefined) this.nodes.delete(h);
      this.nodeHandles.delete(n);
      this.parents.delete(n);
    });
  }

  attachChild(parent: NodeHandle, child: NodeHandle): void {
    const p = this.node(parent);
    const c = this.node(child);
    this.unlink(c);
    attachChild(p, c);
    this.parents.set(c, p);
  }

  insertChild(parent: NodeHandle, child: NodeHandle, index: number): void {
    const p = this.node(parent);
    const c = this.node(child);
    this.unlink(c);
    insertChild(p, c, index);
    this.parents.set(c, p);
  }

  detachChild(parent: NodeHandle, child: NodeHandle): boolean {
    const c = this.node(child);
    const removed = detachChild(this.node(parent), c);
    if (removed) this.parents.delete(c);
    return removed;
  }

  getChild(parent: NodeHandle, index: number): NodeHandle | null {
    const child = getChild(this.node(parent), index);
    return child ? this.register(child) : null;
  }

  childCount(parent: NodeHandle): number {
    return this.node(parent).children.length;
  }

  findById(root: NodeHandle, id: number): NodeHandle | null {
    const found = findById(this.node(root), id);
    return found ? this.register(found) : null;
  }

  setText(node: NodeHandle, text: string): void {
    setAttribute(this.node(node), 'text_content', text);
  }

  setCustomData(node: NodeHandle, data: string): void {
    setAttribute(this.node(node), 'custom_data', data);
  }

  addEvent(node: NodeHandle, type: string, handler: string): void {
    addEvent(this.node(node), type, handler);
  }

  // ── Styles ───────────────────────────────────────────────────

  createStyle(): StyleHandle {
    return this.registerStyle({});
  }

  destroyStyle(handle: StyleHandle): void {
    const record = this.styleRecord(handle);
    this.styles.delete(handle);
    this.styleHandles.delete(record);
  }

  /** The node takes the record itself; later setters on the handle show up on the node. */
  setStyle(node: NodeHandle, style: StyleHandle): void {
    this.node(node).style = this.styleRecord(style);
  }

  getStyle(node: NodeHandle): StyleHandle | null {
    const record = this.node(node).style;
    return record ? this.registerStyle(record) : null;
  }

  setWidth(style: StyleHandle, width: Dimension): void {
    this.styleRecord(style).width = width;
  }

  setHeight(style: StyleHandle, height: Dimension): void {
    this.styleRecord(style).height = height;
  }

  setBackground(style: StyleHandle, color: Color): void {
    this.styleRecord(style).background_color = color;
  }

  setBorder(style: StyleHandle, border: BorderSpec): void {
    const record = this.styleRecord(style);
    record.border_width = border.width;
    record.border_color = border.color;
    if (border.radius !== undefined) record.border_radius = border.radius;
  }

  setMargin(style: StyleHandle, insets: EdgeInsets): void {
    const record = this.styleRecord(style);
    record.margin_top = insets.top;
    record.margin_right = insets.right;
    record.margin_bottom = insets.bottom;
    record.margin_left = insets.left;
  }

  setPadding(style: StyleHandle, insets: EdgeInsets): void {
    const record = this.styleRecord(style);
    record.padding_top = insets.top;
    record.padding_right = insets.right;
    record.padding_bottom = insets.bottom;
    record.padding_left = insets.left;
  }

  // ── Layouts ──────────────────────────────────────────────────

  createLayout(): LayoutHandle {
    const handle = this.nextHandle++;
    this.layouts.set(handle, {});
    return handle;
  }

  destroyLayout(handle: LayoutHandle): void {
    this.layoutRecord(handle);
    this.layouts.delete(handle);
  }

  setLayout(node: NodeHandle, handle: LayoutHandle): void {
    this.node(node).layout = this.layoutRecord(handle);
  }

  setLayoutFields(handle: LayoutHandle, fields: LayoutInput): void {
    Object.assign(this.layoutRecord(handle), layout(fields));
  }

  // ── Serialization ────────────────────────────────────────────

  serializeComplete(root: NodeHandle, options: SerializeCompleteOptions = {}): string {
    return treeToJson(this.node(root), options);
  }

  deserialize(json: string): NodeHandle {
    const { root } = treeFromJson(json, { logger: this.logger });
    return this.adopt(root);
  }

  async readFile(path: string): Promise<NodeHandle> {
    const { root } = await readKirFile(path, this.logger);
    return this.adopt(root);
  }

  async writeFile(root: NodeHandle, path: string): Promise<void> {
    await writeKirFile(path, encodeDocument(this.node(root)), { logger: this.logger });
  }

  // ── Kind names ───────────────────────────────────────────────

  kindToString(kind: NodeKind): string {
    return kindToWireName(kind);
  }

  stringToKind(name: string): NodeKind {
    return kindFromLooseName(name);
  }
}
