/**
 * Tree-building DSL: per-kind constructors plus the helpers regenerated
 * source refers to.
 *
 *   const app = column({ style: style({ padding: 16 }) });
 *   attachChild(app, text('Hello'));
 */

export * from './components.js';
export { attachChild, attachChildren, addEvent, createNode } from '../core/tree.js';
export { NodeKind } from '../core/kinds.js';
export { style, layout } from '../core/style.js';
export { AUTO, px, percent, opaque, rgba, colorFromHex } from '../core/values.js';
