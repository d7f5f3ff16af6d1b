/**
 * Dimension and color value codecs.
 *
 * Wire forms:
 *   dimension  { "value": "auto" | "<n>px" | "<n>%" | <opaque text> }
 *   color      "#rrggbb" when fully opaque, "rgba(r, g, b, a)" otherwise
 */

import type { Color, Dimension } from './types.js';
import { FormatError, ValidationError } from './errors.js';

// ── Dimensions ─────────────────────────────────────────────────────

export const AUTO: Dimension = Object.freeze({ kind: 'auto' });

export function px(value: number): Dimension {
  return { kind: 'pixels', value };
}

export function percent(value: number): Dimension {
  return { kind: 'percent', value };
}

export function opaque(text: string): Dimension {
  return { kind: 'opaque', text };
}

const NUMERIC = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

function parseNumeric(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMERIC.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : undefined;
}

/** Integral values print without a fractional part (`100`, not `100.0`). */
function formatNumber(n: number): string {
  return Number.isInteger(n) ? n.toFixed(0) : String(n);
}

export interface DimensionJson {
  value: string;
}

export function encodeDimension(d: Dimension): DimensionJson {
  switch (d.kind) {
    case 'auto':
      return { value: 'auto' };
    case 'percent':
      return { value: `${formatNumber(d.value)}%` };
    case 'pixels':
      return { value: `${formatNumber(d.value)}px` };
    case 'opaque':
      return { value: d.text };
  }
}

/** Dimension as it appears inside a `{value}` object, without the wrapper. */
export function formatDimension(d: Dimension): string {
  return encodeDimension(d).value;
}

function decodeDimensionText(text: string): Dimension {
  if (text === 'auto') return AUTO;

  if (text.endsWith('%')) {
    const n = parseNumeric(text.slice(0, -1));
    if (n !== undefined) return percent(n);
  } else if (text.endsWith('px')) {
    const n = parseNumeric(text.slice(0, -2));
    if (n !== undefined) return px(n);
  } else {
    const n = parseNumeric(text);
    if (n !== undefined) return px(n);
  }

  return opaque(text);
}

function hasValueField(input: object): input is { value: unknown } {
  return 'value' in input;
}

/**
 * Decode a wire dimension. Accepts the `{value}` wrapper, bare text and
 * bare numbers (pixels). Text that is not a recognised unit form is kept
 * as an opaque dimension.
 */
export function decodeDimension(input: unknown, path?: string): Dimension {
  if (typeof input === 'string') return decodeDimensionText(input);

  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new FormatError(`Invalid dimension: ${input}`, input, { path });
    }
    return px(input);
  }

  if (typeof input === 'object' && input !== null && hasValueField(input)) {
    const { value } = input;
    if (typeof value === 'string' || typeof value === 'number') {
      return decodeDimension(value, path);
    }
  }

  throw new FormatError(`Invalid dimension: ${JSON.stringify(input)}`, input, { path });
}

/** Normalize builder input: `'50%'`, `120` and Dimension values are all accepted. */
export function parseDimension(input: string | number | Dimension): Dimension {
  if (typeof input === 'object') return input;
  return decodeDimension(input);
}

export function dimensionsEqual(a: Dimension, b: Dimension): boolean {
  switch (a.kind) {
    case 'auto':
      return b.kind === 'auto';
    case 'pixels':
    case 'percent':
      return b.kind === a.kind && b.value === a.value;
    case 'opaque':
      return b.kind === 'opaque' && b.text === a.text;
  }
}

export function isDimension(value: unknown): value is Dimension {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  switch (value.kind) {
    case 'auto':
      return true;
    case 'pixels':
    case 'percent':
      return 'value' in value && typeof value.value === 'number';
    case 'opaque':
      return 'text' in value && typeof value.text === 'string';
    default:
      return false;
  }
}

// ── Colors ─────────────────────────────────────────────────────────

function checkChannel(name: string, value: number, max: number): void {
  if (!Number.isFinite(value) || value < 0 || value > max) {
    throw new ValidationError(`Color channel ${name} out of range 0..${max}: ${value}`, value);
  }
}

/** Build a color, validating channel ranges. */
export function rgba(r: number, g: number, b: number, a = 1): Color {
  checkChannel('r', r, 255);
  checkChannel('g', g, 255);
  checkChannel('b', b, 255);
  checkChannel('a', a, 1);
  return { r: Math.round(r), g: Math.round(g), b: Math.round(b), a };
}

function hexByte(n: number): string {
  return Math.round(n).toString(16).padStart(2, '0');
}

const HEX_DIGITS = /^[0-9a-fA-F]*$/;

/**
 * Parse `#rgb`, `#rrggbb` or `#rrggbbaa` (the `#` is optional).
 * Any other digit count is a ValidationError.
 */
export function colorFromHex(hex: string): Color {
  const digits = hex.startsWith('#') ? hex.slice(1) : hex;

  if (!HEX_DIGITS.test(digits)) {
    throw new FormatError(`Invalid hex color: ${hex}`, hex);
  }

  const full = digits.length === 3
    ? digits.split('').map((c) => c + c).join('')
    : digits;

  if (full.length !== 6 && full.length !== 8) {
    throw new ValidationError(`Invalid hex color length (expected 3, 6 or 8 digits): ${hex}`, hex);
  }

  return {
    r: parseInt(full.slice(0, 2), 16),
    g: parseInt(full.slice(2, 4), 16),
    b: parseInt(full.slice(4, 6), 16),
    a: full.length === 8 ? parseInt(full.slice(6, 8), 16) / 255 : 1,
  };
}

/** `#rrggbb` for opaque colors, `#rrggbbaa` otherwise. */
export function colorToHex(c: Color): string {
  const base = `#${hexByte(c.r)}${hexByte(c.g)}${hexByte(c.b)}`;
  return c.a === 1 ? base : base + hexByte(c.a * 255);
}

export function encodeColor(c: Color): string {
  if (c.a === 1) return colorToHex(c);
  return `rgba(${c.r}, ${c.g}, ${c.b}, ${c.a})`;
}

const FUNCTIONAL_COLOR = /^rgba?\(\s*([^,\s]+)\s*,\s*([^,\s]+)\s*,\s*([^,\s]+)\s*(?:,\s*([^,\s]+)\s*)?\)$/;

/** Decode a wire color: hex forms or `rgb(...)` / `rgba(...)`. */
export function decodeColor(input: unknown, path?: string): Color {
  if (typeof input !== 'string') {
    throw new FormatError(`Invalid color: ${JSON.stringify(input)}`, input, { path });
  }

  const text = input.trim();
  if (text.startsWith('#')) return colorFromHex(text);

  const match = FUNCTIONAL_COLOR.exec(text);
  if (match) {
    const channels = match.slice(1, 5).map((part) => (part === undefined ? undefined : parseNumeric(part)));
    const [r, g, b, a] = channels;
    if (r !== undefined && g !== undefined && b !== undefined && (match[4] === undefined || a !== undefined)) {
      return rgba(r, g, b, a ?? 1);
    }
  }

  throw new FormatError(`Invalid color: ${input}`, input, { path });
}

/** Normalize builder input: hex/rgba strings and Color values. */
export function parseColor(input: string | Color): Color {
  return typeof input === 'string' ? decodeColor(input) : input;
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

export function isColor(value: unknown): value is Color {
  return typeof value === 'object' && value !== null
    && 'r' in value && typeof value.r === 'number'
    && 'g' in value && typeof value.g === 'number'
    && 'b' in value && typeof value.b === 'number'
    && 'a' in value && typeof value.a === 'number';
}
