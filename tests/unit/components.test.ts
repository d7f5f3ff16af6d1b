/**
 * Tests for per-kind constructors and the constructor table.
 */

import { describe, it, expect } from 'vitest';
import {
  container,
  row,
  column,
  center,
  text,
  button,
  input,
  checkbox,
  dropdown,
  canvas,
  modal,
  heading,
  paragraph,
  list,
  link,
  codeBlock,
  customComponent,
  forEach,
  flowchartNode,
  flowchartEdge,
  element,
  CONSTRUCTOR_PARAMS,
  extractParams,
} from '../../src/dsl/components.js';
import { ALL_KINDS, NodeKind } from '../../src/core/kinds.js';
import { ValidationError } from '../../src/core/errors.js';
import { nodesEqual } from '../../src/core/tree.js';

describe('layout containers', () => {
  it('row and column seed flex_direction', () => {
    expect(row().layout).toEqual({ flex_direction: 'row' });
    expect(column().layout).toEqual({ flex_direction: 'column' });
  });

  it('center seeds both alignments', () => {
    expect(center().layout).toEqual({ justify_content: 'center', align_items: 'center' });
  });

  it('merges shorthand and explicit layout over the seeded fields', () => {
    const node = row({ gap: 8, alignItems: 'end', layout: { flex_direction: 'row-reverse', flex_wrap: 'wrap' } });
    expect(node.kind).toBe(NodeKind.Row);
    expect(node.layout).toEqual({ flex_direction: 'row-reverse', gap: 8, align_items: 'end', flex_wrap: 'wrap' });
  });

  it('container takes options as-is', () => {
    const node = container({ id: 3, attributes: { role: 'main' } });
    expect(node).toEqual({ kind: NodeKind.Container, id: 3, attributes: { role: 'main' }, children: [], events: [] });
  });
});

describe('controls', () => {
  it('text seeds text_content', () => {
    expect(text('Hello').attributes).toEqual({ text_content: 'Hello' });
  });

  it('button seeds title and an optional click handler', () => {
    const node = button('Save', { onClick: 'onSave' });
    expect(node.attributes).toEqual({ title: 'Save' });
    expect(node.events).toEqual([{ type: 'click', handler: 'onSave' }]);
    expect(button('Plain').events).toEqual([]);
  });

  it('omits optional parameters that are not given', () => {
    expect(input().attributes).toEqual({});
    expect(input('Name').attributes).toEqual({ placeholder: 'Name' });
    expect(checkbox().attributes).toEqual({ checked: false });
    expect(checkbox(true, 'Agree').attributes).toEqual({ checked: true, label: 'Agree' });
  });

  it('applies defaults', () => {
    expect(dropdown(['a', 'b']).attributes).toEqual({ options: ['a', 'b'], selected_index: 0 });
    expect(canvas().attributes).toEqual({ width: 300, height: 150 });
    expect(modal().attributes).toEqual({ is_open: false });
    expect(list().attributes).toEqual({ ordered: false, start: 1 });
    expect(customComponent().attributes).toEqual({ component_name: 'Custom' });
    expect(forEach('rows').attributes).toEqual({ items: 'rows', item_name: 'item' });
  });

  it('seeded values win over options.attributes', () => {
    const node = text('seeded', { attributes: { text_content: 'ignored', extra: 1 } });
    expect(node.attributes).toEqual({ text_content: 'seeded', extra: 1 });
  });
});

describe('heading', () => {
  it('accepts levels 1..6', () => {
    for (let level = 1; level <= 6; level++) {
      expect(heading('Title', level).attributes).toEqual({ text: 'Title', level });
    }
  });

  it('defaults to level 1', () => {
    expect(heading('Top').attributes['level']).toBe(1);
  });

  it('rejects other levels', () => {
    expect(() => heading('Too deep', 7)).toThrow(ValidationError);
    expect(() => heading('Zero', 0)).toThrow(ValidationError);
    expect(() => heading('Half', 2.5)).toThrow(ValidationError);
  });
});

describe('other constructors', () => {
  it('seed their required fields', () => {
    expect(paragraph('p').attributes).toEqual({ text_content: 'p' });
    expect(link('Docs', '/docs').attributes).toEqual({ text_content: 'Docs', url: '/docs' });
    expect(codeBlock('let x = 1;', 'ts').attributes).toEqual({ code: 'let x = 1;', language: 'ts' });
    expect(flowchartNode('n1', 'Start').attributes).toEqual({ id: 'n1', label: 'Start' });
    expect(flowchartEdge('n1', 'n2').attributes).toEqual({ from: 'n1', to: 'n2' });
  });

  it('element resolves loose kind names', () => {
    expect(element('table_row').kind).toBe(NodeKind.TableRow);
    expect(element('unknown-thing').kind).toBe(NodeKind.Container);
  });
});

describe('CONSTRUCTOR_PARAMS', () => {
  it('covers every kind with a distinct constructor name', () => {
    expect(ALL_KINDS.every((kind) => CONSTRUCTOR_PARAMS.has(kind))).toBe(true);
    const names = [...CONSTRUCTOR_PARAMS.values()].map((spec) => spec.name);
    expect(new Set(names).size).toBe(ALL_KINDS.length);
  });

  it('builds the same node as the constructor it names', () => {
    const spec = CONSTRUCTOR_PARAMS.get(NodeKind.Link);
    expect(spec?.name).toBe('link');
    const built = spec?.build(['Docs', '/docs'], { id: 4 });
    expect(built && nodesEqual(built, link('Docs', '/docs', { id: 4 }), { compareIds: true })).toBe(true);
  });

  it('records the layout a constructor seeds', () => {
    expect(CONSTRUCTOR_PARAMS.get(NodeKind.Column)?.seededLayout).toEqual({ flex_direction: 'column' });
    expect(CONSTRUCTOR_PARAMS.get(NodeKind.Container)?.seededLayout).toBeUndefined();
  });
});

describe('extractParams', () => {
  const headingSpec = CONSTRUCTOR_PARAMS.get(NodeKind.Heading);
  const inputSpec = CONSTRUCTOR_PARAMS.get(NodeKind.Input);

  it('splits positional arguments from the rest', () => {
    if (!headingSpec) throw new Error('missing heading spec');
    expect(extractParams(headingSpec, { text: 'T', level: 2, anchor: 'top' })).toEqual({
      args: ['T', 2],
      rest: { anchor: 'top' },
    });
  });

  it('returns null for a missing required parameter', () => {
    if (!headingSpec) throw new Error('missing heading spec');
    expect(extractParams(headingSpec, { text: 'T' })).toBeNull();
  });

  it('returns null for a mistyped parameter', () => {
    if (!headingSpec) throw new Error('missing heading spec');
    expect(extractParams(headingSpec, { text: 'T', level: '2' })).toBeNull();
  });

  it('passes undefined for absent optional parameters', () => {
    if (!inputSpec) throw new Error('missing input spec');
    expect(extractParams(inputSpec, { value: 'v' })).toEqual({ args: [undefined, 'v'], rest: {} });
  });
});
