/**
 * Structural checks over a node tree.
 *
 * The node model accepts any shape; these checks catch what would produce
 * an ambiguous or unloadable document.
 */

import type { KirNode } from './types.js';
import { NodeKind, kindToWireName } from './kinds.js';
import { ValidationError } from './errors.js';

export type ValidationIssueCode = 'duplicate-id' | 'id-out-of-range' | 'heading-level' | 'empty-event';

export interface ValidationIssue {
  code: ValidationIssueCode;
  message: string;
  /** Location of the node, e.g. `root.children.1`. */
  path: string;
}

const MAX_ID = 0xffffffff;

export function validateTree(root: KirNode): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seen = new Map<number, string>();

  const visit = (node: KirNode, path: string): void => {
    if (node.id !== undefined) {
      if (!Number.isInteger(node.id) || node.id < 0 || node.id > MAX_ID) {
        issues.push({ code: 'id-out-of-range', message: `Id ${node.id} is not a uint32`, path });
      }
      const first = seen.get(node.id);
      if (first !== undefined) {
        issues.push({ code: 'duplicate-id', message: `Id ${node.id} already used at ${first}`, path });
      } else {
        seen.set(node.id, path);
      }
    }

    if (node.kind === NodeKind.Heading) {
      const level = node.attributes['level'];
      if (level !== undefined && (typeof level !== 'number' || !Number.isInteger(level) || level < 1 || level > 6)) {
        issues.push({ code: 'heading-level', message: `Heading level must be 1..6, got ${JSON.stringify(level)}`, path });
      }
    }

    node.events.forEach((event, i) => {
      if (!event.type || !event.handler) {
        issues.push({
          code: 'empty-event',
          message: `${kindToWireName(node.kind)} event ${i} has an empty ${event.type ? 'handler' : 'type'}`,
          path,
        });
      }
    });

    node.children.forEach((child, i) => visit(child, `${path}.children.${i}`));
  };

  visit(root, 'root');
  return issues;
}

/** Throws a ValidationError describing the first issue, if any. */
export function assertValidTree(root: KirNode): void {
  const [first] = validateTree(root);
  if (first) {
    throw new ValidationError(`${first.path}: ${first.message}`, first);
  }
}
