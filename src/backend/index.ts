export type {
  IrLibrary,
  NodeHandle,
  StyleHandle,
  LayoutHandle,
  BorderSpec,
  EdgeInsets,
  SerializeCompleteOptions,
} from './ir-library.js';
export { InMemoryIrLibrary } from './in-memory.js';
export { IrLibraryRegistry, createDefaultRegistry } from './registry.js';
export type { IrLibraryFactory } from './registry.js';
