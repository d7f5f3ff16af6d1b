/**
 * zod schemas for KIR JSON documents.
 *
 * Shapes only: unit text, colors and kind names are checked by the codecs
 * during decoding, not here.
 */

import { z } from 'zod';
import type { EventBinding, JsonValue } from '../core/types.js';
import { FormatError } from '../core/errors.js';
import { isJsonObject } from '../core/json.js';

// Checked by hand rather than with z.record, which drops a `__proto__` key.
const jsonRecordSchema = z.custom<Record<string, JsonValue>>(isJsonObject, {
  message: 'Expected an object of JSON values',
});

export const eventSchema: z.ZodType<EventBinding> = z.object({
  type: z.string(),
  handler: z.string(),
});

/** A node as it arrives on the wire. `id` may be missing in hand-written documents. */
export interface WireNode {
  type: string;
  id?: number;
  properties?: Record<string, JsonValue>;
  style?: Record<string, JsonValue>;
  layout?: Record<string, JsonValue>;
  children?: WireNode[];
  events?: EventBinding[];
}

export const nodeSchema: z.ZodType<WireNode> = z.lazy(() =>
  z.object({
    type: z.string(),
    id: z.number().int().nonnegative().optional(),
    properties: jsonRecordSchema.optional(),
    style: jsonRecordSchema.optional(),
    layout: jsonRecordSchema.optional(),
    children: z.array(nodeSchema).optional(),
    events: z.array(eventSchema).optional(),
  }),
);

export const documentSchema = z.object({
  version: z.string().optional(),
  metadata: z
    .object({
      format: z.string().optional(),
      language: z.string().optional(),
    })
    .optional(),
  root: nodeSchema,
});

export type WireDocument = z.infer<typeof documentSchema>;

/** Parse `value` against `schema`, turning the first issue into a FormatError. */
export function parseWith<T>(schema: z.ZodType<T>, value: unknown, prefix: string): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const path = [prefix, ...issue.path].filter((p) => p !== '').join('.');
  throw new FormatError(`Malformed KIR at ${path || '<document>'}: ${issue.message}`, value, { path });
}
