#!/usr/bin/env node

/**
 * `org-conversations` - local CLI for gptel-annotated Org files.
 *
 * This CLI is a first-class interface alongside the stdio server. Both share
 * the same core API so behavior stays in sync.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFile } from 'node:fs/promises';

import type { OrgConversationsConfig } from './config.js';
import {
  buildDocument,
  importTranscripts,
  parseDailiesDirectory,
  parseOrgFile,
} from './org/api.js';
import { decodeBounds } from './org/bounds.js';
import { DEFAULT_DAILIES_DIR } from './org/constants.js';
import { resolveWithinRoot, writeFileAtomic } from './org/storage.js';
import { toConversationView } from './org/view.js';

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Render CLI help text.
 *
 * Keep this stable and human-readable: tests and users often depend on it.
 */
function helpText(defaultRoot: string): string {
  return [
    'org-conversations — gptel Org conversation converter',
    '',
    'Usage:',
    '  org-conversations [--root <dir>] [--dailies <dir>] <cmd>',
    '',
    'Parse:',
    '  org-conversations parse <file.org> [--offsets] [--position-base <n>]',
    '  org-conversations parse-dir [dir] [--offsets] [--position-base <n>]',
    '  org-conversations decode <bounds>',
    '',
    'Build:',
    '  org-conversations build <conversations.json> [--out <file.org>] [--max-iterations <n>]',
    '  org-conversations import <export.json> [--out <dir>] [--overwrite] [--dry-run]',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot} --dailies=${DEFAULT_DAILIES_DIR}`,
    '  Note: JSON input paths are resolved relative to the current working directory (not --root).',
    '  Output: JSON to stdout; errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: CliIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

/**
 * Write a JSON value to stdout (pretty-printed).
 */
function writeJson(io: CliIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

/**
 * Ensure there are no remaining `--unknown` flags in argv.
 */
function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

/**
 * Parse a non-negative integer option.
 */
function parseCount(value: string | undefined, flagName: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${flagName}: ${JSON.stringify(value)}`);
  }
  return parsed;
}

/**
 * Read a JSON input file relative to the working directory.
 */
async function readJsonFile(cwd: string, path: string): Promise<unknown> {
  const text = await readFile(resolvePath(cwd, path), 'utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${path}: ${reason}`);
  }
}

/**
 * Parse global CLI options (`--root`, `--dailies`) into an API config object.
 */
function takeCliConfig(argv: string[], defaultRoot: string): OrgConversationsConfig {
  let rootDir = defaultRoot;
  const rootArg = takeOption(argv, '--root');
  if (rootArg) rootDir = resolvePath(defaultRoot, rootArg);

  let dailiesDir = DEFAULT_DAILIES_DIR;
  const dailiesArg = takeOption(argv, '--dailies');
  if (dailiesArg) dailiesDir = dailiesArg;

  return { rootDir, dailiesDir };
}

async function handleParse(config: OrgConversationsConfig, argv: string[], io: CliIo): Promise<number> {
  const includeOffsets = takeFlag(argv, '--offsets');
  const positionBase = parseCount(takeOption(argv, '--position-base'), '--position-base');
  assertNoUnknownFlags(argv);
  const path = argv.shift();
  if (!path) throw new Error('Missing <file.org>');

  const parsed = await parseOrgFile(config, { path, positionBase });
  writeJson(io, {
    path: parsed.path,
    etag: parsed.etag,
    conversations: parsed.conversations.map((c) => toConversationView(c, { includeOffsets })),
    warnings: parsed.warnings,
  });
  return 0;
}

async function handleParseDir(config: OrgConversationsConfig, argv: string[], io: CliIo): Promise<number> {
  const includeOffsets = takeFlag(argv, '--offsets');
  const positionBase = parseCount(takeOption(argv, '--position-base'), '--position-base');
  assertNoUnknownFlags(argv);
  const dir = argv.shift();

  const parsed = await parseDailiesDirectory(config, { dir, positionBase });
  writeJson(io, {
    files: parsed.files,
    conversations: parsed.conversations.map((c) => toConversationView(c, { includeOffsets })),
    errors: parsed.errors,
    warnings: parsed.warnings,
  });
  return 0;
}

async function handleBuild(
  config: OrgConversationsConfig,
  argv: string[],
  io: CliIo,
  cwd: string
): Promise<number> {
  const input = argv.shift();
  const out = takeOption(argv, '--out');
  const maxIterations = parseCount(takeOption(argv, '--max-iterations'), '--max-iterations');
  assertNoUnknownFlags(argv);
  if (!input) throw new Error('Missing <conversations.json>');

  const built = buildDocument({ conversations: await readJsonFile(cwd, input), maxIterations });
  if (!out) {
    writeJson(io, built);
    return 0;
  }

  await writeFileAtomic(resolveWithinRoot(config, out), built.text);
  writeJson(io, {
    path: out,
    bounds: built.bounds,
    iterations: built.iterations,
    converged: built.converged,
    warnings: built.warnings,
  });
  return 0;
}

async function handleImport(
  config: OrgConversationsConfig,
  argv: string[],
  io: CliIo,
  cwd: string
): Promise<number> {
  const input = argv.shift();
  const outDir = takeOption(argv, '--out');
  const overwrite = takeFlag(argv, '--overwrite');
  const dryRun = takeFlag(argv, '--dry-run');
  assertNoUnknownFlags(argv);
  if (!input) throw new Error('Missing <export.json>');

  const imported = await importTranscripts(config, {
    entries: await readJsonFile(cwd, input),
    outDir,
    overwrite,
    dryRun,
  });
  writeJson(io, imported);
  return 0;
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`. This keeps the CLI
 * testable without relying on spawning child processes.
 */
export async function runConversationsCli(
  args: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
  cwd: string = process.cwd()
): Promise<number> {
  const argv = [...args];

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, cwd);
      return 0;
    }

    const config = takeCliConfig(argv, cwd);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, cwd);
      return 0;
    }

    if (cmd === 'parse') return await handleParse(config, argv, io);
    if (cmd === 'parse-dir') return await handleParseDir(config, argv, io);
    if (cmd === 'build') return await handleBuild(config, argv, io, cwd);
    if (cmd === 'import') return await handleImport(config, argv, io, cwd);

    if (cmd === 'decode') {
      const raw = argv.shift();
      assertNoUnknownFlags(argv);
      if (raw === undefined) throw new Error('Missing <bounds>');
      writeJson(io, { markers: decodeBounds(raw) });
      return 0;
    }

    throw new Error(`Unknown command: ${cmd}`);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io, cwd);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runConversationsCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
