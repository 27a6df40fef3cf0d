import { resolve } from 'node:path';
import { DEFAULT_DAILIES_DIR } from './org/constants.js';

/**
 * Runtime configuration for locating daily Org files.
 *
 * `rootDir` is treated as a trust boundary: every file path must resolve within it.
 */
export interface OrgConversationsConfig {
  rootDir: string;
  /** Directory (relative to `rootDir`) scanned by directory parses and written by imports. */
  dailiesDir: string;
}

/**
 * Parse CLI args into an `OrgConversationsConfig`.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--dailies <dir>`: dailies directory relative to root (defaults to `dailies`).
 */
export function loadConfigFromArgs(
  argv: string[],
  cwd: string
): OrgConversationsConfig {
  const args = [...argv];

  let rootDir = cwd;
  let dailiesDir = DEFAULT_DAILIES_DIR;

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --root');
      rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--dailies') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --dailies');
      dailiesDir = value;
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  return { rootDir, dailiesDir };
}
