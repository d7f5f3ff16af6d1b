/**
 * Internal ↔ wire key names.
 *
 * The node model keys attributes, style and layout fields in snake_case
 * (`background_color`); KIR documents use camelCase (`backgroundColor`).
 * The override table is authoritative. Keys outside it go through the
 * generic conversion, which is only guaranteed to invert for keys made of
 * lowercase words; see isRoundTripSafe().
 */

const KEY_OVERRIDES: ReadonlyArray<readonly [internal: string, wire: string]> = [
  ['text_content', 'textContent'],
  ['custom_data', 'customData'],
  ['source_module', 'sourceModule'],
  ['export_name', 'exportName'],
  ['module_ref', 'moduleRef'],
  ['component_ref', 'componentRef'],
  ['component_props', 'componentProps'],
  ['selected_index', 'selectedIndex'],
  ['is_open', 'isOpen'],
];

const INTERNAL_TO_WIRE = new Map<string, string>(KEY_OVERRIDES);
const WIRE_TO_INTERNAL = new Map<string, string>(KEY_OVERRIDES.map(([internal, wire]) => [wire, internal]));

/** `background_color` → `backgroundColor`. Leading and trailing underscores stay. */
export function encodeKey(key: string): string {
  const override = INTERNAL_TO_WIRE.get(key);
  if (override !== undefined) return override;

  return key.replace(/(?<=[A-Za-z0-9])_([A-Za-z0-9])/g, (_match, next: string) => next.toUpperCase());
}

/** `backgroundColor` → `background_color`. An uppercase run becomes one word. */
export function decodeKey(key: string): string {
  const override = WIRE_TO_INTERNAL.get(key);
  if (override !== undefined) return override;

  return key
    .replace(/[A-Z]+/g, (run, offset: number) => (offset > 0 ? `_${run}` : run))
    .toLowerCase();
}

/** Whether `key` survives encodeKey → decodeKey unchanged. */
export function isRoundTripSafe(key: string): boolean {
  return decodeKey(encodeKey(key)) === key;
}

/** Re-key a record with wire names. Values are passed through as-is. */
export function encodeKeys<T>(record: Readonly<Record<string, T>>): Record<string, T> {
  return Object.fromEntries(Object.entries(record).map(([key, value]): [string, T] => [encodeKey(key), value]));
}

/** Re-key a record with internal names. Values are passed through as-is. */
export function decodeKeys<T>(record: Readonly<Record<string, T>>): Record<string, T> {
  return Object.fromEntries(Object.entries(record).map(([key, value]): [string, T] => [decodeKey(key), value]));
}

/** Internal keys with an irregular wire name. */
export const KEY_OVERRIDE_TABLE: ReadonlyMap<string, string> = INTERNAL_TO_WIRE;
