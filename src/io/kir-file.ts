/**
 * Reading and writing `.kir` (JSON) and `.kirb` (binary) files.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { KirDocument } from '../core/types.js';
import { ResourceError } from '../core/errors.js';
import { SILENT_LOGGER, type Logger } from '../core/logger.js';
import { serializeDocument } from '../protocol/encoder.js';
import { decodeDocument, treeFromJson, type DecodedDocument } from '../protocol/decoder.js';
import { decodeBinary, encodeBinary, isBinaryKir } from '../protocol/binary.js';

export interface WriteKirOptions {
  /** Indent JSON output. Defaults to true. */
  pretty?: boolean;
  /** Spaces per level when pretty. Defaults to 2. */
  indent?: number;
  /** Write the binary container. Defaults to true for `.kirb` paths. */
  binary?: boolean;
  logger?: Logger;
}

export function isBinaryPath(path: string): boolean {
  return extname(path).toLowerCase() === '.kirb';
}

/** Read a KIR file; the binary container is recognised by its magic, not the extension. */
export async function readKirFile(path: string, logger: Logger = SILENT_LOGGER): Promise<DecodedDocument> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new ResourceError(`Cannot read ${path}`, path, { cause: err });
  }

  if (isBinaryKir(bytes)) {
    logger.debug('Reading binary KIR', { path, bytes: bytes.length });
    return decodeDocument(decodeBinary(bytes), { logger });
  }

  logger.debug('Reading KIR JSON', { path, bytes: bytes.length });
  return treeFromJson(bytes.toString('utf-8'), { logger });
}

export async function writeKirFile(path: string, doc: KirDocument, options: WriteKirOptions = {}): Promise<void> {
  const logger = options.logger ?? SILENT_LOGGER;
  const binary = options.binary ?? isBinaryPath(path);

  const data = binary
    ? encodeBinary(doc)
    : serializeDocument(doc, { indent: options.pretty === false ? 0 : options.indent ?? 2 }) + '\n';

  try {
    await writeFile(path, data);
  } catch (err) {
    throw new ResourceError(`Cannot write ${path}`, path, { cause: err });
  }
  logger.debug('Wrote KIR file', { path, binary });
}
