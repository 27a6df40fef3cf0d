import { access } from 'node:fs/promises';
import { join } from 'node:path';
import type { OrgConversationsConfig } from '../config.js';
import { buildOrgDocument } from './build.js';
import type { BuildOrgResult } from './build.js';
import { ORG_FILE_EXTENSION } from './constants.js';
import { errorDiagnostic, withPath } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import type { Conversation } from './model.js';
import { parseOrgDocument } from './parse.js';
import {
  draftConversationSchema,
  parseWithSchema,
  transcriptExportSchema,
} from './schema.js';
import {
  displayPath,
  listOrgFiles,
  readOrgFile,
  resolveDailiesDir,
  writeFileAtomic,
  writeFileAtomicExclusive,
} from './storage.js';
import { groupByDay } from './transcript.js';

/**
 * Public API for conversation parsing and document building.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - parsing (`parse.ts`) and building (`build.ts`)
 * - payload validation (`schema.ts`)
 *
 * Paths in results are relative to `config.rootDir`.
 */
export interface ParseFileOptions {
  path: string;
  positionBase?: number;
}

export interface ParseFileResult {
  path: string;
  etag: string;
  conversations: Conversation[];
  warnings: Diagnostic[];
}

/**
 * Read and parse one Org file. The conversation date comes from the file name.
 */
export async function parseOrgFile(
  config: OrgConversationsConfig,
  options: ParseFileOptions
): Promise<ParseFileResult> {
  const { absolutePath, text, etag } = await readOrgFile(config, options.path);
  const path = displayPath(config, absolutePath);
  const { conversations, warnings } = parseOrgDocument(text, {
    sourcePath: path,
    positionBase: options.positionBase,
  });
  return { path, etag, conversations, warnings: withPath(warnings, path) };
}

export interface ParseDirectoryOptions {
  /** Directory relative to `rootDir`; defaults to `config.dailiesDir`. */
  dir?: string;
  positionBase?: number;
}

export interface ParseDirectoryResult {
  /** Number of `.org` files visited. */
  files: number;
  conversations: Conversation[];
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

/**
 * Parse every `.org` file in a directory, in file name order.
 *
 * A missing directory yields an empty result.
 * A file that cannot be read or parsed becomes a `PARSE_FAILED` error and the
 * remaining files are still processed.
 */
export async function parseDailiesDirectory(
  config: OrgConversationsConfig,
  options: ParseDirectoryOptions = {}
): Promise<ParseDirectoryResult> {
  const absoluteDir = resolveDailiesDir(config, options.dir);
  try {
    await access(absoluteDir);
  } catch {
    return { files: 0, conversations: [], errors: [], warnings: [] };
  }

  const files = await listOrgFiles(absoluteDir);

  const conversations: Conversation[] = [];
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];

  for (const absolutePath of files) {
    const path = displayPath(config, absolutePath);
    try {
      const parsed = await parseOrgFile(config, { path, positionBase: options.positionBase });
      conversations.push(...parsed.conversations);
      warnings.push(...parsed.warnings);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(errorDiagnostic('PARSE_FAILED', message, path));
    }
  }

  return { files: files.length, conversations, errors, warnings };
}

export interface BuildDocumentOptions {
  /** Draft conversations; validated before building. */
  conversations: unknown;
  maxIterations?: number;
}

/**
 * Validate draft conversations and build one Org document from them.
 */
export function buildDocument(options: BuildDocumentOptions): BuildOrgResult {
  const conversations = parseWithSchema(
    draftConversationSchema.array(),
    options.conversations,
    'conversations'
  );
  return buildOrgDocument(conversations, { maxIterations: options.maxIterations });
}

export interface ImportTranscriptsOptions {
  /** Exported entries (`[{ date, conversation }]`); validated before use. */
  entries: unknown;
  /** Output directory relative to `rootDir`; defaults to `config.dailiesDir`. */
  outDir?: string;
  /** Replace existing daily files instead of reporting them. */
  overwrite?: boolean;
  /** Build documents without writing them. */
  dryRun?: boolean;
}

export interface ImportedFile {
  date: string;
  path: string;
  conversations: number;
  responses: number;
  written: boolean;
}

export interface ImportTranscriptsResult {
  files: ImportedFile[];
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

function isEexist(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Turn a chat history export into one `YYYY-MM-DD.org` file per day.
 *
 * Existing files are left alone (reported as `FILE_EXISTS`) unless `overwrite` is set.
 */
export async function importTranscripts(
  config: OrgConversationsConfig,
  options: ImportTranscriptsOptions
): Promise<ImportTranscriptsResult> {
  const entries = parseWithSchema(transcriptExportSchema, options.entries, 'transcript export');
  const absoluteDir = resolveDailiesDir(config, options.outDir);
  const { days, warnings } = groupByDay(entries);

  const files: ImportedFile[] = [];
  const errors: Diagnostic[] = [];

  for (const day of days) {
    const absolutePath = join(absoluteDir, `${day.date}${ORG_FILE_EXTENSION}`);
    const path = displayPath(config, absolutePath);
    const built = buildOrgDocument(day.conversations);
    warnings.push(...withPath(built.warnings, path));

    const file: ImportedFile = {
      date: day.date,
      path,
      conversations: day.conversations.length,
      responses: built.bounds.length,
      written: false,
    };
    files.push(file);
    if (options.dryRun) continue;

    try {
      if (options.overwrite) await writeFileAtomic(absolutePath, built.text);
      else await writeFileAtomicExclusive(absolutePath, built.text);
      file.written = true;
    } catch (error) {
      if (!isEexist(error)) throw error;
      errors.push(errorDiagnostic('FILE_EXISTS', `File already exists: ${path}`, path));
    }
  }

  return { files, errors, warnings };
}
