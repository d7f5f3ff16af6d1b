/**
 * Tool configuration.
 *
 * Merged from several sources, later ones winning:
 *   1. defaults (DEFAULT_CONFIG)
 *   2. config file
 *   3. CLI args
 */

import { readFile, access } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { FormatError, ResourceError, ValidationError } from './errors.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_LANGUAGE } from './types.js';

// ── Configuration Schema ─────────────────────────────────────────

export interface KirConfig {
  /** Value written to `metadata.language` of encoded documents. */
  language: string;
  /** JSON indentation. 0 writes compact output. */
  indent: number;
  /** Variable name of the root node in regenerated source. */
  rootName: string;
  /** Module the regenerated source imports its constructors from. */
  moduleName: string;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: KirConfig = {
  language: DEFAULT_LANGUAGE,
  indent: 2,
  rootName: 'app',
  moduleName: 'kir-tree',
  logLevel: 'warn',
};

const identifier = z.string().regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be a valid identifier');

const configFileSchema = z
  .object({
    language: z.string().min(1),
    indent: z.number().int().min(0).max(10),
    rootName: identifier,
    moduleName: z.string().min(1),
    logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
  })
  .partial()
  .strict();

// ── Config Merging ───────────────────────────────────────────────

/** Apply partial configs over the defaults, in order. */
export function mergeConfigs(...sources: Partial<KirConfig>[]): KirConfig {
  const result: KirConfig = { ...DEFAULT_CONFIG };

  for (const source of sources) {
    if (source.language !== undefined) result.language = source.language;
    if (source.indent !== undefined) result.indent = source.indent;
    if (source.rootName !== undefined) result.rootName = source.rootName;
    if (source.moduleName !== undefined) result.moduleName = source.moduleName;
    if (source.logLevel !== undefined) result.logLevel = source.logLevel;
  }

  return result;
}

// ── CLI Argument Parsing ─────────────────────────────────────────

/**
 * Global flags:
 *   --config <path>       Config file path
 *   --log-level <level>   Logging level
 *   --indent <n>          JSON indentation
 *   --language <name>     metadata.language of written documents
 *   --root-name <name>    Root variable in regenerated source
 *   --module <name>       Import module of regenerated source
 *   --out <path>          Output file
 *
 * Everything not starting with `--` is a positional argument.
 */
export interface ParsedCli {
  config: Partial<KirConfig>;
  positionals: string[];
  configFilePath?: string;
  outPath?: string;
  help?: boolean;
}

function takeValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`${flag} expects a value`, value);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const config: Partial<KirConfig> = {};
  const positionals: string[] = [];
  let configFilePath: string | undefined;
  let outPath: string | undefined;
  let help = false;

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    switch (arg) {
      case '--config':
        configFilePath = takeValue(argv, ++i, arg);
        break;
      case '--log-level': {
        const level = takeValue(argv, ++i, arg);
        if (!isLogLevel(level)) {
          throw new ValidationError(`--log-level must be one of ${LOG_LEVELS.join(', ')}`, level);
        }
        config.logLevel = level;
        break;
      }
      case '--indent': {
        const raw = takeValue(argv, ++i, arg);
        const indent = Number(raw);
        if (!Number.isInteger(indent) || indent < 0) {
          throw new ValidationError('--indent expects a non-negative integer', raw);
        }
        config.indent = indent;
        break;
      }
      case '--language':
        config.language = takeValue(argv, ++i, arg);
        break;
      case '--root-name':
        config.rootName = takeValue(argv, ++i, arg);
        break;
      case '--module':
        config.moduleName = takeValue(argv, ++i, arg);
        break;
      case '--out':
        outPath = takeValue(argv, ++i, arg);
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ValidationError(`Unknown option ${arg}`, arg);
        }
        positionals.push(arg);
    }

    i++;
  }

  return { config, positionals, configFilePath, outPath, help };
}

// ── Config File Loading ──────────────────────────────────────────

/** Load and validate a JSON config file. Only fields present in the file are returned. */
export async function loadConfigFile(path: string): Promise<Partial<KirConfig>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ResourceError(`Cannot read config file ${path}`, path, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new FormatError(`Config file ${path} is not valid JSON`, content, { cause: err });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.join('.');
    throw new FormatError(`Invalid config file ${path}: ${where ? `${where}: ` : ''}${issue.message}`, raw, {
      path: where,
    });
  }
  return parsed.data;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search for a config file in standard locations.
 *
 * Checks (in order):
 *   1. KIR_CONFIG env var
 *   2. ./kir.config.json (current directory)
 *   3. $XDG_CONFIG_HOME/kir/config.json (defaults to ~/.config)
 */
export async function findConfigFile(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Promise<string | undefined> {
  const candidates: string[] = [];

  const envPath = env['KIR_CONFIG'];
  if (envPath) candidates.push(envPath);

  candidates.push(join(cwd, 'kir.config.json'));

  const xdgConfig = env['XDG_CONFIG_HOME'] || join(homedir(), '.config');
  candidates.push(join(xdgConfig, 'kir', 'config.json'));

  for (const candidate of candidates) {
    if (await exists(candidate)) return candidate;
  }
  return undefined;
}

// ── Full Resolution ──────────────────────────────────────────────

export interface ResolvedCli extends Omit<ParsedCli, 'config'> {
  config: KirConfig;
  /** Settings given as flags, before merging. */
  flags: Partial<KirConfig>;
}

/** defaults → config file → CLI args. A config file that exists but is invalid throws. */
export async function resolveConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd = process.cwd(),
): Promise<ResolvedCli> {
  const cli = parseCliArgs(argv);

  const configPath = cli.configFilePath ?? await findConfigFile(env, cwd);
  const fileConfig = configPath ? await loadConfigFile(configPath) : {};

  return { ...cli, flags: cli.config, config: mergeConfigs(fileConfig, cli.config) };
}
