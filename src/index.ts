/**
 * kir-tree: component-tree model, KIR wire format and source regeneration.
 */

// Model
export * from './core/types.js';
export * from './core/kinds.js';
export * from './core/tree.js';
export * from './core/case-keys.js';
export * from './core/values.js';
export { style, layout, encodeStyle, decodeStyle, encodeLayout, decodeLayout, fieldCount, fitsField, STYLE_FIELDS, LAYOUT_FIELDS } from './core/style.js';
export type { StyleInput, LayoutInput, DimensionInput, ColorInput } from './core/style.js';
export * from './core/validation.js';

// DSL
export * from './dsl/components.js';

// Ambient
export { KirError, ValidationError, FormatError, ResourceError, isKirError } from './core/errors.js';
export type { KirErrorCode } from './core/errors.js';
export { createLogger, SILENT_LOGGER, LOG_LEVELS, isLogLevel } from './core/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './core/logger.js';
export { DEFAULT_CONFIG, mergeConfigs, parseCliArgs, loadConfigFile, findConfigFile, resolveConfig } from './core/config.js';
export type { KirConfig, ParsedCli, ResolvedCli } from './core/config.js';

// Codecs
export * from './protocol/index.js';
export { regenerateSource, regenerateStatements } from './codegen/regenerate.js';
export type { RegenerateOptions, RegeneratedStatements } from './codegen/regenerate.js';
export { readKirFile, writeKirFile, isBinaryPath } from './io/kir-file.js';
export type { WriteKirOptions } from './io/kir-file.js';

// Collaborator contract
export * from './backend/index.js';
