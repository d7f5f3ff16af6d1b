/**
 * IR library registry: maps library names to factories.
 *
 * The registry is an ordinary object passed to whoever needs a library;
 * there is no process-wide instance. Libraries are created on first load
 * and reused afterwards.
 *
 *   const registry = createDefaultRegistry();
 *   const lib = registry.load('memory');
 */

import { ResourceError } from '../core/errors.js';
import { SILENT_LOGGER, type Logger } from '../core/logger.js';
import type { IrLibrary } from './ir-library.js';
import { InMemoryIrLibrary } from './in-memory.js';

export type IrLibraryFactory = (logger: Logger) => IrLibrary;

export class IrLibraryRegistry {
  private factories = new Map<string, IrLibraryFactory>();
  private loaded = new Map<string, IrLibrary>();

  constructor(private readonly logger: Logger = SILENT_LOGGER) {}

  /** Register a factory. Replacing a name drops the instance loaded under it. */
  register(name: string, factory: IrLibraryFactory): this {
    this.factories.set(name, factory);
    this.loaded.delete(name);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  get names(): string[] {
    return [...this.factories.keys()];
  }

  load(name: string): IrLibrary {
    const cached = this.loaded.get(name);
    if (cached) return cached;

    const factory = this.factories.get(name);
    if (!factory) {
      throw new ResourceError(
        `No IR library registered as "${name}". Available: ${this.names.join(', ') || 'none'}`,
        name,
      );
    }

    const library = factory(this.logger.child(name));
    this.loaded.set(name, library);
    this.logger.debug('Loaded IR library', { name });
    return library;
  }
}

/** Registry with the in-process library registered as `memory`. */
export function createDefaultRegistry(logger: Logger = SILENT_LOGGER): IrLibraryRegistry {
  return new IrLibraryRegistry(logger).register('memory', (log) => new InMemoryIrLibrary(log));
}
