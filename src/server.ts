import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { OrgConversationsConfig } from './config.js';
import {
  buildDocument,
  importTranscripts,
  parseDailiesDirectory,
  parseOrgFile,
} from './org/api.js';
import {
  conversationViewSchema,
  diagnosticSchema,
  draftConversationSchema,
  transcriptEntrySchema,
} from './org/schema.js';
import { toConversationView } from './org/view.js';

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `org.*` reads or writes gptel-annotated Org documents.
 * - `transcript.*` converts chat exports into daily Org files.
 *
 * Paths are relative to `config.rootDir`; `dir`/`outDir` default to the
 * configured dailies directory.
 */
export function createMcpServer(config: OrgConversationsConfig): McpServer {
  const server = new McpServer({ name: 'org-conversations-mcp', version: '0.1.0' });

  server.registerTool(
    'org.parse',
    {
      title: 'Parse an Org file',
      description:
        'Parse one gptel-annotated Org file into conversations of user/assistant messages.',
      inputSchema: {
        path: z.string(),
        includeOffsets: z.boolean().optional(),
        positionBase: z.number().int().nonnegative().optional(),
      },
      outputSchema: {
        path: z.string(),
        etag: z.string(),
        conversations: z.array(conversationViewSchema),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ path, includeOffsets, positionBase }) => {
      const parsed = await parseOrgFile(config, { path, positionBase });
      const result = {
        path: parsed.path,
        etag: parsed.etag,
        conversations: parsed.conversations.map((conversation) =>
          toConversationView(conversation, { includeOffsets: includeOffsets ?? false })
        ),
        warnings: parsed.warnings,
      };
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  server.registerTool(
    'org.parseDir',
    {
      title: 'Parse a directory of Org files',
      description:
        'Parse every .org file in a directory (default: the dailies directory). Files that fail are reported in errors; the rest are still parsed.',
      inputSchema: {
        dir: z.string().optional(),
        includeOffsets: z.boolean().optional(),
        positionBase: z.number().int().nonnegative().optional(),
      },
      outputSchema: {
        files: z.number().int().nonnegative(),
        conversations: z.array(conversationViewSchema),
        errors: z.array(diagnosticSchema),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ dir, includeOffsets, positionBase }) => {
      const parsed = await parseDailiesDirectory(config, { dir, positionBase });
      const result = {
        files: parsed.files,
        conversations: parsed.conversations.map((conversation) =>
          toConversationView(conversation, { includeOffsets: includeOffsets ?? false })
        ),
        errors: parsed.errors,
        warnings: parsed.warnings,
      };
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  server.registerTool(
    'org.build',
    {
      title: 'Build an Org document',
      description:
        'Build a gptel-annotated Org document from conversations. Assistant content is Markdown and is rendered to Org; GPTEL_BOUNDS is computed for the result.',
      inputSchema: {
        conversations: z.array(draftConversationSchema),
        maxIterations: z.number().int().min(1).max(100).optional(),
      },
      outputSchema: {
        text: z.string(),
        bounds: z.array(z.object({ start: z.number().int(), end: z.number().int() })),
        iterations: z.number().int().nonnegative(),
        converged: z.boolean(),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ conversations, maxIterations }) => {
      const built = buildDocument({ conversations, maxIterations });
      return {
        content: [{ type: 'text', text: built.text }],
        structuredContent: { ...built },
      };
    }
  );

  server.registerTool(
    'transcript.import',
    {
      title: 'Import a chat export',
      description:
        'Convert exported conversations ("Question:" / "AI Response:" text) into one YYYY-MM-DD.org file per day. Existing files are reported, not replaced, unless overwrite is set.',
      inputSchema: {
        entries: z.array(transcriptEntrySchema),
        outDir: z.string().optional(),
        overwrite: z.boolean().optional(),
        dryRun: z.boolean().optional(),
      },
      outputSchema: {
        files: z.array(
          z.object({
            date: z.string(),
            path: z.string(),
            conversations: z.number().int().nonnegative(),
            responses: z.number().int().nonnegative(),
            written: z.boolean(),
          })
        ),
        errors: z.array(diagnosticSchema),
        warnings: z.array(diagnosticSchema),
      },
    },
    async ({ entries, outDir, overwrite, dryRun }) => {
      const imported = await importTranscripts(config, { entries, outDir, overwrite, dryRun });
      return {
        content: [{ type: 'text', text: JSON.stringify(imported, null, 2) }],
        structuredContent: { ...imported },
      };
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 *
 * This function does not return until the transport closes.
 */
export async function runStdioServer(config: OrgConversationsConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
