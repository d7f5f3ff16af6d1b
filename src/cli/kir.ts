#!/usr/bin/env node
/**
 * `kir` command line.
 *
 * Usage:
 *   kir inspect <file>                 Print a summary and outline of a document
 *   kir codegen <file> [--out f]       Regenerate TypeScript that builds the tree
 *   kir convert <in> <out>             Convert between .kir and .kirb by extension
 *   kir validate <file>                Report structural problems
 *   kir format <file> [--out f]        Rewrite as canonical KIR JSON
 */

import { writeFile } from 'node:fs/promises';
import type { KirNode } from '../core/types.js';
import { kindToWireName } from '../core/kinds.js';
import { countNodes, treeDepth, walkTree } from '../core/tree.js';
import { resolveConfig, type ResolvedCli } from '../core/config.js';
import { ResourceError, ValidationError, isKirError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/logger.js';
import { validateTree } from '../core/validation.js';
import { encodeDocument, serializeDocument } from '../protocol/encoder.js';
import { regenerateSource } from '../codegen/regenerate.js';
import { readKirFile, writeKirFile } from '../io/kir-file.js';

export interface CliIO {
  /** Receives command output (documents, source, reports). */
  stdout: (text: string) => void;
  /** Receives log lines. Defaults to console.error. */
  stderr?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

interface CommandContext {
  cli: ResolvedCli;
  args: string[];
  io: CliIO;
  logger: Logger;
}

type Command = (ctx: CommandContext) => Promise<number>;

const USAGE = `Usage: kir <command> [options]

Commands:
  inspect <file>              Print a summary and outline of a document
  codegen <file> [--out f]    Regenerate TypeScript that builds the tree
  convert <in> <out>          Convert between .kir and .kirb (by extension)
  validate <file>             Report structural problems
  format <file> [--out f]     Rewrite as canonical KIR JSON

Options:
  --config <path>       Config file (default: KIR_CONFIG, ./kir.config.json)
  --log-level <level>   silent | error | warn | info | debug
  --indent <n>          JSON indentation (0 for compact)
  --language <name>     metadata.language of written documents
  --root-name <name>    Root variable name for codegen
  --module <name>       Import module for codegen
  --out <path>          Write output to a file instead of stdout
  --help                Show this help
`;

function requireArgs(args: string[], count: number, usage: string): void {
  if (args.length < count) {
    throw new ValidationError(`Missing arguments. Usage: kir ${usage}`, args);
  }
}

async function emit(ctx: CommandContext, text: string): Promise<void> {
  const out = ctx.cli.outPath;
  if (!out) {
    ctx.io.stdout(text);
    return;
  }
  try {
    await writeFile(out, text);
  } catch (err) {
    throw new ResourceError(`Cannot write ${out}`, out, { cause: err });
  }
  ctx.logger.info('Wrote output', { path: out });
}

function describeNode(node: KirNode): string {
  const parts = [kindToWireName(node.kind)];
  if (node.id !== undefined) parts.push(`#${node.id}`);
  for (const [key, value] of Object.entries(node.attributes)) {
    parts.push(`${key}=${JSON.stringify(value)}`);
  }
  for (const event of node.events) {
    parts.push(`on:${event.type}=${event.handler}`);
  }
  return parts.join(' ');
}

const commands: Record<string, Command> = {
  async inspect(ctx) {
    requireArgs(ctx.args, 1, 'inspect <file>');
    const doc = await readKirFile(ctx.args[0], ctx.logger);

    const lines = [
      `KIR ${doc.version} (${doc.language}), ${countNodes(doc.root)} nodes, depth ${treeDepth(doc.root)}`,
    ];
    walkTree(doc.root, (node, depth) => {
      lines.push(`${'  '.repeat(depth)}${describeNode(node)}`);
    });
    await emit(ctx, lines.join('\n') + '\n');
    return 0;
  },

  async codegen(ctx) {
    requireArgs(ctx.args, 1, 'codegen <file>');
    const doc = await readKirFile(ctx.args[0], ctx.logger);
    const source = regenerateSource(doc.root, {
      rootName: ctx.cli.config.rootName,
      moduleName: ctx.cli.config.moduleName,
    });
    await emit(ctx, source);
    return 0;
  },

  async convert(ctx) {
    requireArgs(ctx.args, 2, 'convert <in> <out>');
    const [input, output] = ctx.args;
    const doc = await readKirFile(input, ctx.logger);
    const encoded = encodeDocument(doc.root, { language: ctx.cli.flags.language ?? doc.language });
    await writeKirFile(output, encoded, { indent: ctx.cli.config.indent, logger: ctx.logger });
    ctx.logger.info('Converted', { from: input, to: output });
    return 0;
  },

  async validate(ctx) {
    requireArgs(ctx.args, 1, 'validate <file>');
    const doc = await readKirFile(ctx.args[0], ctx.logger);
    const issues = validateTree(doc.root);

    if (issues.length === 0) {
      ctx.io.stdout(`OK: ${countNodes(doc.root)} nodes\n`);
      return 0;
    }
    ctx.io.stdout(issues.map((issue) => `${issue.path}: ${issue.message}\n`).join(''));
    return 1;
  },

  async format(ctx) {
    requireArgs(ctx.args, 1, 'format <file>');
    const doc = await readKirFile(ctx.args[0], ctx.logger);
    const encoded = encodeDocument(doc.root, { language: ctx.cli.flags.language ?? doc.language });
    await emit(ctx, serializeDocument(encoded, { indent: ctx.cli.config.indent }) + '\n');
    return 0;
  },
};

/** Run the CLI and return the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const write = io.stderr ?? ((line: string) => console.error(line));
  let logger = createLogger({ level: 'error', component: 'kir', write });

  try {
    const [name, ...rest] = argv;
    if (name === undefined || name === '--help' || name === '-h') {
      io.stdout(USAGE);
      return name === undefined ? 1 : 0;
    }

    const command = Object.hasOwn(commands, name) ? commands[name] : undefined;
    if (!command) {
      logger.error(`Unknown command "${name}"`);
      io.stdout(USAGE);
      return 1;
    }

    const cli = await resolveConfig(rest, io.env, io.cwd);
    if (cli.help) {
      io.stdout(USAGE);
      return 0;
    }

    logger = createLogger({ level: cli.config.logLevel, component: 'kir', write }).child(name);
    return await command({ cli, args: cli.positionals, io, logger });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(message, isKirError(err) ? { code: err.code } : undefined);
    return 1;
  }
}

const isMainModule = process.argv[1]?.endsWith('cli/kir.ts') ||
                     process.argv[1]?.endsWith('cli/kir.js');
if (isMainModule) {
  runCli(process.argv.slice(2), { stdout: (text) => process.stdout.write(text) })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
