/**
 * `kir` command line, driven in-process with captured output.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runCli } from '../../src/cli/kir.js';
import { attachChildren, createNode } from '../../src/core/tree.js';
import { NodeKind } from '../../src/core/kinds.js';
import { encodeDocument } from '../../src/protocol/encoder.js';
import { readKirFile, writeKirFile } from '../../src/io/kir-file.js';
import { isBinaryKir } from '../../src/protocol/binary.js';
import { button, column, text } from '../../src/dsl/components.js';

interface Captured {
  code: number;
  stdout: string;
  stderr: string[];
}

describe('kir CLI', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kir-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function run(...argv: string[]): Promise<Captured> {
    let stdout = '';
    const stderr: string[] = [];
    const code = await runCli(argv, {
      stdout: (t) => {
        stdout += t;
      },
      stderr: (line) => {
        stderr.push(line);
      },
      env: { XDG_CONFIG_HOME: join(dir, 'xdg') },
      cwd: dir,
    });
    return { code, stdout, stderr };
  }

  async function sample(name = 'app.kir'): Promise<string> {
    const path = join(dir, name);
    const tree = attachChildren(column(), text('Hi'), button('Go', { onClick: 'go' }));
    await writeKirFile(path, encodeDocument(tree));
    return path;
  }

  // ── Usage ─────────────────────────────────────────────────────

  it('prints usage and fails without a command', async () => {
    const result = await run();
    expect(result.code).toBe(1);
    expect(result.stdout.startsWith('Usage: kir <command> [options]')).toBe(true);
  });

  it('prints usage for --help', async () => {
    expect((await run('--help')).code).toBe(0);
    expect((await run('inspect', '--help')).code).toBe(0);
  });

  it('rejects unknown commands', async () => {
    const result = await run('explode');
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual(['[ERROR] [kir] Unknown command "explode"']);
  });

  it('reports missing arguments', async () => {
    const result = await run('convert', 'only-one.kir');
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual([
      '[ERROR] [kir:convert] Missing arguments. Usage: kir convert <in> <out> {"code":"VALIDATION"}',
    ]);
  });

  it('reports unreadable files', async () => {
    const result = await run('inspect', join(dir, 'missing.kir'));
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual([
      `[ERROR] [kir:inspect] Cannot read ${join(dir, 'missing.kir')} {"code":"RESOURCE"}`,
    ]);
  });

  // ── Commands ──────────────────────────────────────────────────

  it('inspects a document', async () => {
    const result = await run('inspect', await sample());
    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      [
        'KIR 2.0 (typescript), 3 nodes, depth 2',
        'Column #1',
        '  Text #2 text_content="Hi"',
        '  Button #3 title="Go" on:click=go',
        '',
      ].join('\n'),
    );
  });

  it('regenerates source with configured names', async () => {
    const result = await run('codegen', await sample(), '--root-name', 'page', '--module', './dsl.js');
    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      [
        "import { attachChild, button, column, layout, text } from './dsl.js';",
        '',
        'const page = column({ id: 1, layout: layout({ flex_direction: "column" }) });',
        'const page_child_0 = text("Hi", { id: 2 });',
        'attachChild(page, page_child_0);',
        'const page_child_1 = button("Go", { id: 3, events: [{ type: "click", handler: "go" }] });',
        'attachChild(page, page_child_1);',
        '',
        'export default page;',
        '',
      ].join('\n'),
    );
  });

  it('writes codegen output to --out', async () => {
    const out = join(dir, 'app.ts');
    const result = await run('codegen', await sample(), '--out', out);
    expect(result.code).toBe(0);
    expect(result.stdout).toBe('');
    expect((await readFile(out, 'utf-8')).endsWith('export default app;\n')).toBe(true);
  });

  it('converts JSON to binary and back', async () => {
    const input = await sample();
    const binary = join(dir, 'app.kirb');
    const back = join(dir, 'back.kir');

    expect((await run('convert', input, binary)).code).toBe(0);
    expect(isBinaryKir(await readFile(binary))).toBe(true);

    expect((await run('convert', binary, back, '--indent', '0')).code).toBe(0);
    expect(await readFile(back, 'utf-8')).toBe(
      '{"version":"2.0","metadata":{"format":"KIR","language":"typescript"},"root":' +
        '{"type":"Column","id":1,"layout":{"flexDirection":"column"},"children":[' +
        '{"type":"Text","id":2,"properties":{"textContent":"Hi"}},' +
        '{"type":"Button","id":3,"properties":{"title":"Go"},"events":[{"type":"click","handler":"go"}]}]}}\n',
    );
  });

  it('overrides the language on convert', async () => {
    const out = join(dir, 'lua.kir');
    expect((await run('convert', await sample(), out, '--language', 'lua')).code).toBe(0);
    expect((await readKirFile(out)).language).toBe('lua');
  });

  it('validates a clean document', async () => {
    const result = await run('validate', await sample());
    expect(result).toEqual({ code: 0, stdout: 'OK: 3 nodes\n', stderr: [] });
  });

  it('lists validation issues', async () => {
    const path = join(dir, 'bad.kir');
    const tree = attachChildren(
      column({ id: 1 }),
      text('a', { id: 1 }),
      createNode(NodeKind.Heading, { id: 2, attributes: { level: 'big' } }),
    );
    await writeKirFile(path, encodeDocument(tree));

    const result = await run('validate', path);
    expect(result.code).toBe(1);
    expect(result.stdout).toBe(
      'root.children.0: Id 1 already used at root\n' +
        'root.children.1: Heading level must be 1..6, got "big"\n',
    );
  });

  it('formats a compact document', async () => {
    const path = join(dir, 'compact.kir');
    await writeFile(path, '{"root":{"type":"Text","properties":{"textContent":"x"}}}');
    const result = await run('format', path);
    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      [
        '{',
        '  "version": "2.0",',
        '  "metadata": {',
        '    "format": "KIR",',
        '    "language": "typescript"',
        '  },',
        '  "root": {',
        '    "type": "Text",',
        '    "id": 1,',
        '    "properties": {',
        '      "textContent": "x"',
        '    }',
        '  }',
        '}',
        '',
      ].join('\n'),
    );
  });

  // ── Configuration ─────────────────────────────────────────────

  it('reads kir.config.json from the working directory', async () => {
    await writeFile(join(dir, 'kir.config.json'), JSON.stringify({ rootName: 'screen' }));
    const result = await run('codegen', await sample());
    expect(result.stdout).toContain('export default screen;\n');
  });

  it('fails on an invalid config file', async () => {
    await writeFile(join(dir, 'kir.config.json'), JSON.stringify({ indent: 'wide' }));
    const result = await run('inspect', await sample());
    expect(result.code).toBe(1);
    expect(result.stderr).toHaveLength(1);
    expect(result.stderr[0].startsWith('[ERROR] [kir] Invalid config file')).toBe(true);
  });

  it('logs progress at info level', async () => {
    const out = join(dir, 'out.kirb');
    const result = await run('convert', await sample(), out, '--log-level', 'info');
    expect(result.stderr).toEqual([
      `[INFO] [kir:convert] Converted {"from":"${join(dir, 'app.kir')}","to":"${out}"}`,
    ]);
  });
});
