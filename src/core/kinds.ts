/**
 * Node kind registry.
 *
 * Numeric values follow the native IR enumeration order and never change;
 * new kinds append. Every kind has one PascalCase wire name (the `type`
 * field of a KIR node) and one lowercase lookup key (the wire name with
 * separators removed) used by loose, hand-typed lookups.
 */

export enum NodeKind {
  // Basic controls
  Container = 0,
  Text = 1,
  Button = 2,
  Input = 3,
  Checkbox = 4,
  Dropdown = 5,
  Textarea = 6,

  // Layout
  Row = 7,
  Column = 8,
  Center = 9,

  // Display
  Image = 10,
  Canvas = 11,
  NativeCanvas = 12,
  Markdown = 13,
  Sprite = 14,

  // Tabs
  TabGroup = 15,
  TabBar = 16,
  Tab = 17,
  TabContent = 18,
  TabPanel = 19,

  Modal = 20,

  // Tables
  Table = 21,
  TableHead = 22,
  TableBody = 23,
  TableFoot = 24,
  TableRow = 25,
  TableCell = 26,
  TableHeaderCell = 27,

  // Markdown blocks
  Heading = 28,
  Paragraph = 29,
  Blockquote = 30,
  CodeBlock = 31,
  HorizontalRule = 32,
  List = 33,
  ListItem = 34,
  Link = 35,

  // Inline text
  Span = 36,
  Strong = 37,
  Em = 38,
  CodeInline = 39,
  Small = 40,
  Mark = 41,

  // Templates and flow control
  Custom = 42,
  StaticBlock = 43,
  ForLoop = 44,
  ForEach = 45,
  VarDecl = 46,
  Placeholder = 47,

  // Diagrams
  Flowchart = 48,
  FlowchartNode = 49,
  FlowchartEdge = 50,
  FlowchartSubgraph = 51,
  FlowchartLabel = 52,
}

/** Kind used for unknown wire names and loose names. */
export const FALLBACK_KIND = NodeKind.Container;

/** Every known kind, in enumeration order. */
export const ALL_KINDS: readonly NodeKind[] = Object.values(NodeKind)
  .filter((value): value is NodeKind => typeof value === 'number')
  .sort((a, b) => a - b);

// The enum member names are the wire names.
const WIRE_NAMES: ReadonlyArray<readonly [NodeKind, string]> = ALL_KINDS.map((kind) => [kind, NodeKind[kind]] as const);

const KIND_TO_WIRE = new Map<NodeKind, string>(WIRE_NAMES);
const WIRE_TO_KIND = new Map<string, NodeKind>(WIRE_NAMES.map(([kind, name]) => [name, kind]));

/** Loose lookup key: lowercase, with `_`, `-` and whitespace removed. */
function looseKey(name: string): string {
  return name.toLowerCase().replace(/[_\-\s]/g, '');
}

const LOOSE_TO_KIND = new Map<string, NodeKind>(
  WIRE_NAMES.map(([kind, name]) => [looseKey(name), kind]),
);

/** Canonical PascalCase wire name of a kind. */
export function kindToWireName(kind: NodeKind): string {
  const name = KIND_TO_WIRE.get(kind);
  if (name === undefined) {
    // Only reachable with a number cast to NodeKind from outside the enum.
    return KIND_TO_WIRE.get(FALLBACK_KIND) ?? 'Container';
  }
  return name;
}

/** Exact wire-name lookup. Unknown names resolve to the fallback kind. */
export function wireNameToKind(name: string): NodeKind {
  return WIRE_TO_KIND.get(name) ?? FALLBACK_KIND;
}

/** Whether a wire name denotes a known kind (as opposed to a fallback). */
export function isKnownWireName(name: string): boolean {
  return WIRE_TO_KIND.has(name);
}

/** Canonical lowercase lookup key of a kind, e.g. `tableheadercell`. */
export function kindLookupKey(kind: NodeKind): string {
  return looseKey(kindToWireName(kind));
}

/**
 * Case- and separator-insensitive lookup for construction APIs:
 * `'table_header_cell'`, `'TableHeaderCell'` and `'tableheadercell'` all
 * resolve to the same kind.
 */
export function kindFromLooseName(name: string): NodeKind {
  return LOOSE_TO_KIND.get(looseKey(name)) ?? FALLBACK_KIND;
}
