/**
 * Binary KIR container (`.kirb`): 16-byte header + CBOR payload.
 *
 * ┌──────────┬───────┬───────┬────────────┬─────────────┬────────────┬──────────────┐
 * │ magic    │ major │ minor │ flags      │ length      │ reserved   │ CBOR payload │
 * │ 4 bytes  │ 1 byte│ 1 byte│ 2 bytes LE │ 4 bytes LE  │ 4 bytes    │ variable     │
 * └──────────┴───────┴───────┴────────────┴─────────────┴────────────┴──────────────┘
 *
 * The payload is the same document object the JSON form carries.
 */

import { encode, decode } from 'cborg';
import type { KirDocument } from '../core/types.js';
import { FormatError } from '../core/errors.js';

export const HEADER_SIZE = 16;

/** 'KIRB' read as a big-endian u32. */
export const BINARY_MAGIC = 0x4b495242;

export const BINARY_MAJOR = 2;
export const BINARY_MINOR = 0;

export interface BinaryHeader {
  major: number;
  minor: number;
  flags: number;
  length: number;
}

export function encodeHeader(payloadLength: number, flags = 0): Uint8Array {
  const buf = new Uint8Array(HEADER_SIZE);
  const view = new DataView(buf.buffer);

  view.setUint32(0, BINARY_MAGIC, false);
  view.setUint8(4, BINARY_MAJOR);
  view.setUint8(5, BINARY_MINOR);
  view.setUint16(6, flags, true);
  view.setUint32(8, payloadLength, true);
  view.setUint32(12, 0, true);

  return buf;
}

/** Returns null when the buffer is too short or the magic doesn't match. */
export function decodeHeader(data: Uint8Array): BinaryHeader | null {
  if (data.length < HEADER_SIZE) return null;

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  if (view.getUint32(0, false) !== BINARY_MAGIC) return null;

  return {
    major: view.getUint8(4),
    minor: view.getUint8(5),
    flags: view.getUint16(6, true),
    length: view.getUint32(8, true),
  };
}

export function isBinaryKir(data: Uint8Array): boolean {
  return decodeHeader(data) !== null;
}

export function encodeBinary(doc: KirDocument): Uint8Array {
  const payload = encode(doc);
  const out = new Uint8Array(HEADER_SIZE + payload.length);
  out.set(encodeHeader(payload.length), 0);
  out.set(payload, HEADER_SIZE);
  return out;
}

/**
 * Unwrap a `.kirb` buffer and return the CBOR-decoded document value.
 * The value still has to go through decodeDocument.
 */
export function decodeBinary(data: Uint8Array): unknown {
  const header = decodeHeader(data);
  if (!header) {
    throw new FormatError('Not a binary KIR buffer (bad magic or short header)', data);
  }
  if (header.major !== BINARY_MAJOR) {
    throw new FormatError(`Unsupported binary KIR version ${header.major}.${header.minor}`, header);
  }
  if (data.length < HEADER_SIZE + header.length) {
    throw new FormatError(
      `Truncated binary KIR: header announces ${header.length} payload bytes, ${data.length - HEADER_SIZE} present`,
      header,
    );
  }

  try {
    return decode(data.subarray(HEADER_SIZE, HEADER_SIZE + header.length));
  } catch (err) {
    throw new FormatError('Malformed CBOR payload', data, { cause: err });
  }
}
