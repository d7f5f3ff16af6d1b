/**
 * Source regenerator: KirNode → TypeScript that rebuilds the tree.
 *
 * Every node becomes one `const`. Children are named `<parent>_child_<i>`
 * and attached to their parent right after their own statements, so the
 * output reads top-down in the same preorder the encoder uses.
 *
 *   const app = column({ layout: layout({ flex_direction: "column", gap: 8 }) });
 *   const app_child_0 = text("Hello");
 *   attachChild(app, app_child_0);
 */

import type { KirNode } from '../core/types.js';
import { kindToWireName } from '../core/kinds.js';
import { LAYOUT_FIELDS, STYLE_FIELDS, fitsField, type FieldType } from '../core/style.js';
import { ValidationError } from '../core/errors.js';
import { encodeColor, formatDimension, isColor, isDimension } from '../core/values.js';
import { CONSTRUCTOR_PARAMS, extractParams, type ConstructorSpec, type ParamValue } from '../dsl/components.js';

export interface RegenerateOptions {
  /** Variable name of the root node. Defaults to `app`. */
  rootName?: string;
  /** Module the constructors are imported from. Defaults to `kir-tree`. */
  moduleName?: string;
}

export interface RegeneratedStatements {
  /** Statement lines, without imports or exports. */
  statements: string;
  rootName: string;
  /** Names the statements reference, sorted. */
  imports: string[];
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function renderKey(key: string): string {
  // A literal `__proto__:` key sets the prototype; the computed form makes an own property.
  if (key === '__proto__') return `[${JSON.stringify(key)}]`;
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

/** Render a plain value as a JavaScript literal. */
function renderValue(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  if (Array.isArray(value)) {
    return `[${value.map((v) => renderValue(v) ?? 'null').join(', ')}]`;
  }
  if (typeof value === 'object') {
    return renderObject(Object.entries(value).map(([k, v]) => [k, renderValue(v)]));
  }
  return undefined;
}

function renderParts(entries: Array<[string, string | undefined]>): string[] {
  return entries
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([k, v]) => `${renderKey(k)}: ${v}`);
}

function renderObject(entries: Array<[string, string | undefined]>): string {
  const parts = renderParts(entries);
  return parts.length > 0 ? `{ ${parts.join(', ')} }` : '{}';
}

/**
 * `builder({ ... })` over the fields the builder accepts. Values the builder
 * would reject (kept as decoded from a document) are spread in after it.
 */
function renderRecord(
  builder: string,
  fields: ReadonlyMap<string, FieldType>,
  record: Readonly<Record<string, unknown>>,
): string {
  const built: Array<[string, string | undefined]> = [];
  const raw: Array<[string, string | undefined]> = [];

  for (const [key, value] of Object.entries(record)) {
    const type = fields.get(key);
    if (!fitsField(fields, key, value)) {
      raw.push([key, renderValue(value)]);
    } else if (type === 'dimension' && isDimension(value)) {
      built.push([key, JSON.stringify(formatDimension(value))]);
    } else if (type === 'color' && isColor(value)) {
      built.push([key, JSON.stringify(encodeColor(value))]);
    } else {
      built.push([key, renderValue(value)]);
    }
  }

  const call = `${builder}(${renderObject(built)})`;
  const rawParts = renderParts(raw);
  return rawParts.length > 0 ? `{ ...${call}, ${rawParts.join(', ')} }` : call;
}

function hasEntries(record: Readonly<Record<string, unknown>> | undefined): record is Readonly<Record<string, unknown>> {
  return record !== undefined && Object.values(record).some((v) => v !== undefined);
}

class Emitter {
  readonly lines: string[] = [];
  readonly imports = new Set<string>();

  emit(node: KirNode, name: string): void {
    this.lines.push(`const ${name} = ${this.expression(node)};`);

    node.children.forEach((child, i) => {
      const childName = `${name}_child_${i}`;
      this.emit(child, childName);
      this.imports.add('attachChild');
      this.lines.push(`attachChild(${name}, ${childName});`);
    });
  }

  private options(node: KirNode, attributes: Readonly<Record<string, unknown>>): string | undefined {
    const entries: Array<[string, string | undefined]> = [];

    if (node.id !== undefined) entries.push(['id', String(node.id)]);
    if (hasEntries(attributes)) entries.push(['attributes', renderValue(attributes)]);
    if (hasEntries(node.style)) {
      this.imports.add('style');
      entries.push(['style', renderRecord('style', STYLE_FIELDS, node.style)]);
    }
    if (hasEntries(node.layout)) {
      this.imports.add('layout');
      entries.push(['layout', renderRecord('layout', LAYOUT_FIELDS, node.layout)]);
    }
    if (node.events.length > 0) {
      entries.push(['events', renderValue(node.events.map((e) => ({ type: e.type, handler: e.handler })))]);
    }

    return entries.length > 0 ? renderObject(entries) : undefined;
  }

  private generic(node: KirNode): string {
    this.imports.add('createNode');
    this.imports.add('NodeKind');
    const opts = this.options(node, node.attributes);
    const kind = `NodeKind.${kindToWireName(node.kind)}`;
    return opts ? `createNode(${kind}, ${opts})` : `createNode(${kind})`;
  }

  private call(spec: ConstructorSpec, args: readonly ParamValue[], opts: string | undefined): string {
    this.imports.add(spec.name);
    const rendered = args.map((a) => renderValue(a) ?? 'undefined');
    if (opts) {
      rendered.push(opts);
    } else {
      while (rendered.length > 0 && rendered[rendered.length - 1] === 'undefined') rendered.pop();
    }
    return `${spec.name}(${rendered.join(', ')})`;
  }

  /** Whether the constructor takes these arguments; `heading("x", 9)` would throw. */
  private accepts(spec: ConstructorSpec, args: readonly ParamValue[]): boolean {
    try {
      spec.build(args, {});
      return true;
    } catch (err) {
      if (err instanceof ValidationError) return false;
      throw err;
    }
  }

  private expression(node: KirNode): string {
    const spec = CONSTRUCTOR_PARAMS.get(node.kind);
    if (!spec) return this.generic(node);

    // A constructor that seeds layout fields only fits nodes that carry them.
    if (spec.seededLayout) {
      const nodeLayout = node.layout ?? {};
      const fits = Object.entries(spec.seededLayout).every(([key, value]) => nodeLayout[key] === value);
      if (!fits) return this.generic(node);
    }

    const extracted = extractParams(spec, node.attributes);
    if (!extracted || !this.accepts(spec, extracted.args)) return this.generic(node);

    return this.call(spec, extracted.args, this.options(node, extracted.rest));
  }
}

export function regenerateStatements(root: KirNode, options: RegenerateOptions = {}): RegeneratedStatements {
  const rootName = options.rootName ?? 'app';
  const emitter = new Emitter();
  emitter.emit(root, rootName);

  return {
    statements: emitter.lines.join('\n') + '\n',
    rootName,
    imports: [...emitter.imports].sort(),
  };
}

/** A complete module: imports, statements and `export default <root>`. */
export function regenerateSource(root: KirNode, options: RegenerateOptions = {}): string {
  const moduleName = options.moduleName ?? 'kir-tree';
  const { statements, rootName, imports } = regenerateStatements(root, options);

  return [
    `import { ${imports.join(', ')} } from '${moduleName}';`,
    '',
    statements,
    `export default ${rootName};`,
    '',
  ].join('\n');
}
