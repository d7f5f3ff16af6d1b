/**
 * Protocol module: KIR JSON encoder/decoder and the binary container.
 */

export { encodeDocument, encodeNode, serializeDocument, treeToJson } from './encoder.js';
export type { EncodeOptions, SerializeOptions } from './encoder.js';
export { parseDocument, decodeDocument, decodeNode, treeFromJson } from './decoder.js';
export type { DecodeOptions, DecodedDocument } from './decoder.js';
export { encodeBinary, decodeBinary, isBinaryKir, BINARY_MAGIC, HEADER_SIZE } from './binary.js';
export type { BinaryHeader } from './binary.js';
export { documentSchema, nodeSchema } from './schema.js';
export type { WireNode, WireDocument } from './schema.js';
