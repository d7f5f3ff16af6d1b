/**
 * Error taxonomy for the KIR layer.
 *
 * Codec and constructor failures are thrown straight to the caller with the
 * offending input attached. Unknown wire kinds are not errors: the decoder
 * falls back to a generic container (see kinds.ts).
 */

export type KirErrorCode = 'VALIDATION' | 'FORMAT' | 'RESOURCE';

export class KirError extends Error {
  readonly code: KirErrorCode;

  constructor(code: KirErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KirError';
    this.code = code;
  }
}

/** A value is well-formed but outside its allowed range (heading level, hex length). */
export class ValidationError extends KirError {
  readonly input: unknown;

  constructor(message: string, input: unknown) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
    this.input = input;
  }
}

/** Text or document that cannot be parsed (dimension, color, JSON, CBOR). */
export class FormatError extends KirError {
  readonly input: unknown;
  /** Location inside a document, e.g. `root.children.0.style.width`. */
  readonly path?: string;

  constructor(message: string, input: unknown, options?: { path?: string; cause?: unknown }) {
    super('FORMAT', message, { cause: options?.cause });
    this.name = 'FormatError';
    this.input = input;
    this.path = options?.path;
  }
}

/** A collaborator (IR library, file) could not be located or loaded. */
export class ResourceError extends KirError {
  readonly resource: string;

  constructor(message: string, resource: string, options?: { cause?: unknown }) {
    super('RESOURCE', message, options);
    this.name = 'ResourceError';
    this.resource = resource;
  }
}

export function isKirError(err: unknown): err is KirError {
  return err instanceof KirError;
}
