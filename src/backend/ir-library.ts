/**
 * Handle-based IR library contract.
 *
 * Native IR libraries hand out opaque handles for nodes, styles and
 * layouts and expose setters over them. This interface describes that
 * contract so callers can target any implementation: the in-process one
 * in in-memory.ts, or a binding to native code.
 */

import type { Color, Dimension } from '../core/types.js';
import type { NodeKind } from '../core/kinds.js';
import type { LayoutInput } from '../core/style.js';

export type NodeHandle = number;
export type StyleHandle = number;
export type LayoutHandle = number;

export interface BorderSpec {
  width: number;
  color: Color;
  radius?: number;
}

export interface EdgeInsets {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface SerializeCompleteOptions {
  language?: string;
  indent?: number;
}

export interface IrLibrary {
  readonly name: string;

  // Nodes
  createNode(kind: NodeKind): NodeHandle;
  createNodeWithId(kind: NodeKind, id: number): NodeHandle;
  /** Release a node and its subtree. The node is detached from its parent. */
  destroy(node: NodeHandle): void;
  attachChild(parent: NodeHandle, child: NodeHandle): void;
  insertChild(parent: NodeHandle, child: NodeHandle, index: number): void;
  detachChild(parent: NodeHandle, child: NodeHandle): boolean;
  getChild(parent: NodeHandle, index: number): NodeHandle | null;
  childCount(parent: NodeHandle): number;
  findById(root: NodeHandle, id: number): NodeHandle | null;
  setText(node: NodeHandle, text: string): void;
  setCustomData(node: NodeHandle, data: string): void;
  addEvent(node: NodeHandle, type: string, handler: string): void;

  // Styles
  createStyle(): StyleHandle;
  destroyStyle(style: StyleHandle): void;
  setStyle(node: NodeHandle, style: StyleHandle): void;
  getStyle(node: NodeHandle): StyleHandle | null;
  setWidth(style: StyleHandle, width: Dimension): void;
  setHeight(style: StyleHandle, height: Dimension): void;
  setBackground(style: StyleHandle, color: Color): void;
  setBorder(style: StyleHandle, border: BorderSpec): void;
  setMargin(style: StyleHandle, insets: EdgeInsets): void;
  setPadding(style: StyleHandle, insets: EdgeInsets): void;

  // Layouts
  createLayout(): LayoutHandle;
  destroyLayout(layout: LayoutHandle): void;
  setLayout(node: NodeHandle, layout: LayoutHandle): void;
  setLayoutFields(layout: LayoutHandle, fields: LayoutInput): void;

  // Serialization
  serializeComplete(root: NodeHandle, options?: SerializeCompleteOptions): string;
  deserialize(json: string): NodeHandle;
  readFile(path: string): Promise<NodeHandle>;
  writeFile(root: NodeHandle, path: string): Promise<void>;

  // Kind names
  kindToString(kind: NodeKind): string;
  stringToKind(name: string): NodeKind;
}
