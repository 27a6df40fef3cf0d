import { createHash, randomUUID } from 'node:crypto';
import { link, mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { OrgConversationsConfig } from '../config.js';
import { ORG_FILE_EXTENSION } from './constants.js';

/**
 * Filesystem helpers for daily Org files.
 *
 * Responsibilities:
 * - Ensure all reads/writes stay within `config.rootDir`.
 * - Provide content hashing (etag) and atomic writes.
 */
export interface ReadOrgFileResult {
  absolutePath: string;
  text: string;
  etag: string;
}

/**
 * Compute a stable hex-encoded SHA-256 digest.
 *
 * Used as an etag so callers can skip re-ingesting unchanged files.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * This is a lexical guard only: symlinks under `rootDir` that point outside
 * are followed, since users may link their org directory in on purpose.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

/**
 * Resolve a user-supplied path against `rootDir` and ensure it stays inside.
 */
export function resolveWithinRoot(config: OrgConversationsConfig, path: string): string {
  const rootDir = resolve(config.rootDir);
  const absolutePath = resolve(rootDir, path);
  assertPathWithinRoot(rootDir, absolutePath);
  return absolutePath;
}

/**
 * Resolve the dailies directory (or `dir`, when given) inside `rootDir`.
 */
export function resolveDailiesDir(config: OrgConversationsConfig, dir?: string): string {
  return resolveWithinRoot(config, dir ?? config.dailiesDir);
}

/**
 * Path of `absolutePath` as shown to users: relative to `rootDir`.
 */
export function displayPath(config: OrgConversationsConfig, absolutePath: string): string {
  return relative(resolve(config.rootDir), absolutePath);
}

/**
 * Read an Org file and compute its etag.
 */
export async function readOrgFile(
  config: OrgConversationsConfig,
  path: string
): Promise<ReadOrgFileResult> {
  const absolutePath = resolveWithinRoot(config, path);
  const text = await readFile(absolutePath, 'utf8');
  return { absolutePath, text, etag: sha256Hex(text) };
}

/**
 * Absolute paths of the `.org` files directly inside `absoluteDir`, sorted by name.
 */
export async function listOrgFiles(absoluteDir: string): Promise<string[]> {
  const entries = await readdir(absoluteDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(ORG_FILE_EXTENSION))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => join(absoluteDir, name));
}

/**
 * Write a file via a temporary path and atomic rename.
 *
 * This pattern avoids torn writes and never leaves a partially written
 * document on disk.
 */
export async function writeFileAtomic(
  absolutePath: string,
  text: string
): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}

/**
 * Write a file via a temporary path, but fail if the destination already exists.
 *
 * Implementation:
 * - Write a temp file in the same directory as the destination.
 * - Atomically `link()` it into place (fails with EEXIST if dest exists).
 * - Remove the temp path; the destination link remains.
 */
export async function writeFileAtomicExclusive(
  absolutePath: string,
  text: string
): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });

  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  try {
    await link(tmpPath, absolutePath);
  } finally {
    await rm(tmpPath, { force: true });
  }
}
