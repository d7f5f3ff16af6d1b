/**
 * Style and layout records: builders and wire transcoding.
 *
 * Builders accept loose values (`'100%'`, `'#fff'`, plain numbers) and
 * produce typed records. encode/decode translate present fields only;
 * absent fields never appear on the wire.
 */

import type { Color, Dimension, JsonValue, LayoutRecord, StyleRecord } from './types.js';
import { assignOwn, isJsonValue } from './json.js';
import { decodeKey, encodeKey } from './case-keys.js';
import { FormatError, ValidationError } from './errors.js';
import {
  decodeColor,
  decodeDimension,
  encodeColor,
  encodeDimension,
  isColor,
  isDimension,
  parseColor,
  parseDimension,
} from './values.js';

/** `scalar` fields take a string or a number (`font_weight: 'bold'` or `700`). */
export type FieldType = 'dimension' | 'color' | 'number' | 'string' | 'boolean' | 'scalar';

const FIELD_TYPES: readonly FieldType[] = ['dimension', 'color', 'number', 'string', 'boolean', 'scalar'];

function fieldTable(groups: Partial<Record<FieldType, readonly string[]>>): ReadonlyMap<string, FieldType> {
  const table = new Map<string, FieldType>();
  for (const type of FIELD_TYPES) {
    for (const key of groups[type] ?? []) table.set(key, type);
  }
  return table;
}

export const STYLE_FIELDS = fieldTable({
  dimension: ['width', 'height', 'min_width', 'max_width', 'min_height', 'max_height', 'flex_basis'],
  color: ['background_color', 'color', 'border_color'],
  number: [
    'border_width', 'border_radius',
    'margin', 'margin_top', 'margin_right', 'margin_bottom', 'margin_left',
    'padding', 'padding_top', 'padding_right', 'padding_bottom', 'padding_left',
    'font_size', 'line_height', 'opacity', 'flex_grow', 'flex_shrink', 'x', 'y',
  ],
  string: ['font_family', 'font_style', 'text_align', 'overflow', 'position'],
  boolean: ['visible'],
  scalar: ['font_weight'],
});

export const LAYOUT_FIELDS = fieldTable({
  string: ['flex_direction', 'justify_content', 'align_items', 'align_content', 'flex_wrap'],
  number: ['gap', 'row_gap', 'column_gap', 'top', 'right', 'bottom', 'left'],
});

// ── Builder input types ────────────────────────────────────────────

export type DimensionInput = string | number | Dimension;
export type ColorInput = string | Color;

type Loosen<T> = T extends Dimension ? DimensionInput : T extends Color ? ColorInput : T;

export type StyleInput = { [K in keyof StyleRecord]?: Loosen<Exclude<StyleRecord[K], undefined>> };
export type LayoutInput = { [K in keyof LayoutRecord]?: LayoutRecord[K] };

// ── Shared helpers ─────────────────────────────────────────────────

function isDimensionInput(value: unknown): value is DimensionInput {
  return typeof value === 'string' || typeof value === 'number' || isDimension(value);
}

function isColorInput(value: unknown): value is ColorInput {
  return typeof value === 'string' || isColor(value);
}

function isScalar(value: unknown): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

/** Whether `value` has the shape the builders produce for field `key`. Unknown keys take anything. */
export function fitsField(fields: ReadonlyMap<string, FieldType>, key: string, value: unknown): boolean {
  const type = fields.get(key);
  switch (type) {
    case 'dimension':
      return isDimension(value);
    case 'color':
      return isColor(value);
    case 'number':
    case 'string':
    case 'boolean':
      return typeof value === type;
    case 'scalar':
      return isScalar(value);
    default:
      return true;
  }
}

function expectPrimitive(type: 'number' | 'string' | 'boolean', value: unknown, what: string): unknown {
  if (typeof value !== type) {
    throw new ValidationError(`${what} expects a ${type}, got ${JSON.stringify(value)}`, value);
  }
  return value;
}

function buildRecord(
  fields: ReadonlyMap<string, FieldType>,
  input: Readonly<Record<string, unknown>>,
  target: Record<string, unknown>,
  label: string,
): void {
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;
    const what = `${label}.${key}`;
    const type = fields.get(key);

    switch (type) {
      case 'dimension':
        if (!isDimensionInput(value)) {
          throw new ValidationError(`${what} expects a dimension, got ${JSON.stringify(value)}`, value);
        }
        assignOwn(target, key, parseDimension(value));
        break;
      case 'color':
        if (!isColorInput(value)) {
          throw new ValidationError(`${what} expects a color, got ${JSON.stringify(value)}`, value);
        }
        assignOwn(target, key, parseColor(value));
        break;
      case 'number':
      case 'string':
      case 'boolean':
        assignOwn(target, key, expectPrimitive(type, value, what));
        break;
      case 'scalar':
        if (!isScalar(value)) {
          throw new ValidationError(`${what} expects a string or a number, got ${JSON.stringify(value)}`, value);
        }
        assignOwn(target, key, value);
        break;
      default:
        assignOwn(target, key, value);
    }
  }
}

function encodeRecord(
  fields: ReadonlyMap<string, FieldType>,
  record: Readonly<Record<string, unknown>>,
  label: string,
): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};

  for (const [key, value] of Object.entries(record)) {
    if (value === undefined || value === null) continue;
    const wireKey = encodeKey(key);
    const type = fields.get(key);

    if (type === 'dimension' && isDimension(value)) {
      assignOwn(out, wireKey, { value: encodeDimension(value).value });
    } else if (type === 'color' && isColor(value)) {
      assignOwn(out, wireKey, encodeColor(value));
    } else if (isJsonValue(value)) {
      assignOwn(out, wireKey, value);
    } else {
      throw new FormatError(`${label}.${key} cannot be encoded: ${String(value)}`, value, { path: `${label}.${wireKey}` });
    }
  }

  return out;
}

function isDimensionJson(value: JsonValue): boolean {
  if (typeof value === 'string' || typeof value === 'number') return true;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const inner = value['value'];
  return typeof inner === 'string' || typeof inner === 'number';
}

/**
 * Known fields are decoded when their JSON type fits: malformed text in a
 * dimension or color still throws. A value of another JSON type is kept
 * as it arrived, like an unknown key.
 */
function decodeRecord(
  fields: ReadonlyMap<string, FieldType>,
  json: Readonly<Record<string, JsonValue>>,
  target: Record<string, unknown>,
  path: string,
): void {
  for (const [wireKey, value] of Object.entries(json)) {
    if (value === null) continue;
    const key = decodeKey(wireKey);
    const fieldPath = `${path}.${wireKey}`;
    const type = fields.get(key);

    if (type === 'dimension' && isDimensionJson(value)) {
      assignOwn(target, key, decodeDimension(value, fieldPath));
    } else if (type === 'color' && typeof value === 'string') {
      assignOwn(target, key, decodeColor(value, fieldPath));
    } else {
      assignOwn(target, key, value);
    }
  }
}

// ── Style ──────────────────────────────────────────────────────────

/** Build a StyleRecord, e.g. `style({ width: '100%', background_color: '#222' })`. */
export function style(input: StyleInput): StyleRecord {
  const record: StyleRecord = {};
  buildRecord(STYLE_FIELDS, input, record, 'style');
  return record;
}

export function encodeStyle(record: StyleRecord): Record<string, JsonValue> {
  return encodeRecord(STYLE_FIELDS, record, 'style');
}

export function decodeStyle(json: Readonly<Record<string, JsonValue>>, path = 'style'): StyleRecord {
  const record: StyleRecord = {};
  decodeRecord(STYLE_FIELDS, json, record, path);
  return record;
}

// ── Layout ─────────────────────────────────────────────────────────

/** Build a LayoutRecord, e.g. `layout({ flex_direction: 'row', gap: 8 })`. */
export function layout(input: LayoutInput): LayoutRecord {
  const record: LayoutRecord = {};
  buildRecord(LAYOUT_FIELDS, input, record, 'layout');
  return record;
}

export function encodeLayout(record: LayoutRecord): Record<string, JsonValue> {
  return encodeRecord(LAYOUT_FIELDS, record, 'layout');
}

export function decodeLayout(json: Readonly<Record<string, JsonValue>>, path = 'layout'): LayoutRecord {
  const record: LayoutRecord = {};
  decodeRecord(LAYOUT_FIELDS, json, record, path);
  return record;
}

/** Number of present (non-undefined) fields. */
export function fieldCount(record: Readonly<Record<string, unknown>>): number {
  return Object.values(record).filter((v) => v !== undefined).length;
}
