#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * - Parse CLI flags into an `OrgConversationsConfig`.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { runStdioServer } from './server.js';
import { loadConfigFromArgs } from './config.js';

const VERSION = '0.1.0';

function printHelp(): void {
  process.stdout.write(
    [
      'org-conversations-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  org-conversations-mcp [--root <dir>] [--dailies <dir>]',
      '',
      'Options:',
      '  --root     Root directory (default: cwd)',
      '  --dailies  Dailies directory relative to root (default: dailies)',
      '  --help     Show help',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

/**
 * Parse args and run the stdio server.
 */
async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`org-conversations-mcp ${VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(config);
}

await main();
