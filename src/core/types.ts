/**
 * Core KIR types.
 *
 * Two families live here: the in-memory node model (KirNode and the
 * records hanging off it, keyed with internal snake_case names) and the
 * JSON wire shapes (KirDocument, KirNodeJson, keyed in camelCase).
 */

import type { NodeKind } from './kinds.js';

// ── Wire format constants ──────────────────────────────────────────

export const KIR_VERSION = '2.0';
export const KIR_FORMAT = 'KIR';
export const DEFAULT_LANGUAGE = 'typescript';

// ── Values ─────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Attribute values are plain JSON. */
export type AttrValue = JsonValue;

export type Dimension =
  | { kind: 'auto' }
  | { kind: 'pixels'; value: number }
  | { kind: 'percent'; value: number }
  | { kind: 'opaque'; text: string };

/** RGBA color. Channels are 0..255 integers, alpha is 0..1. */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

// ── Style / layout records ─────────────────────────────────────────

/**
 * Visual properties of a node. Every field is independently optional;
 * absent fields never reach the wire. Keys unknown to this version are
 * carried through untouched so newer documents survive a round trip.
 */
export interface StyleRecord {
  // Dimensions
  width?: Dimension;
  height?: Dimension;
  min_width?: Dimension;
  max_width?: Dimension;
  min_height?: Dimension;
  max_height?: Dimension;

  // Colors
  background_color?: Color;
  color?: Color;
  border_color?: Color;

  // Border
  border_width?: number;
  border_radius?: number;

  // Spacing
  margin?: number;
  margin_top?: number;
  margin_right?: number;
  margin_bottom?: number;
  margin_left?: number;
  padding?: number;
  padding_top?: number;
  padding_right?: number;
  padding_bottom?: number;
  padding_left?: number;

  // Typography
  font_size?: number;
  font_family?: string;
  font_weight?: string | number;
  font_style?: string;
  line_height?: number;
  text_align?: string;

  // Display
  visible?: boolean;
  opacity?: number;
  overflow?: string;

  // Flex item
  flex_grow?: number;
  flex_shrink?: number;
  flex_basis?: Dimension;

  // Position
  position?: string;
  x?: number;
  y?: number;

  [key: string]: unknown;
}

/** Flex-container properties of a node. */
export interface LayoutRecord {
  flex_direction?: string;
  justify_content?: string;
  align_items?: string;
  align_content?: string;
  flex_wrap?: string;

  gap?: number;
  row_gap?: number;
  column_gap?: number;

  top?: number;
  right?: number;
  bottom?: number;
  left?: number;

  [key: string]: unknown;
}

// ── Node model ─────────────────────────────────────────────────────

export interface EventBinding {
  type: string;
  handler: string;
}

export interface KirNode {
  kind: NodeKind;
  /** Unset until assigned explicitly or by the encoder's output. */
  id?: number;
  attributes: Record<string, AttrValue>;
  style?: StyleRecord;
  layout?: LayoutRecord;
  children: KirNode[];
  events: EventBinding[];
}

/** Options accepted by every node constructor. */
export interface NodeOptions {
  id?: number;
  attributes?: Record<string, AttrValue>;
  style?: StyleRecord;
  layout?: LayoutRecord;
  children?: KirNode[];
  events?: EventBinding[];
}

// ── Wire shapes ────────────────────────────────────────────────────

export interface KirMetadata {
  format: string;
  language: string;
}

export interface KirNodeJson {
  type: string;
  id: number;
  properties?: Record<string, JsonValue>;
  style?: Record<string, JsonValue>;
  layout?: Record<string, JsonValue>;
  children?: KirNodeJson[];
  events?: EventBinding[];
}

export interface KirDocument {
  version: string;
  metadata: KirMetadata;
  root: KirNodeJson;
}
