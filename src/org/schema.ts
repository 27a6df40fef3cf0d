import * as z from 'zod';

/**
 * zod schemas for payloads that cross a process boundary (tool input, JSON
 * files handed to the CLI).
 *
 * Shapes are exported separately so the MCP server can reuse them as raw
 * `inputSchema` objects.
 */
export const messageRoleSchema = z.enum(['user', 'assistant']);

export const draftMessageSchema = z.object({
  role: messageRoleSchema,
  content: z.string(),
});

export const draftConversationSchema = z.object({
  topic: z.string(),
  messages: z.array(draftMessageSchema),
});

export const transcriptEntrySchema = z.object({
  date: z.string(),
  conversation: z.string(),
});

export const transcriptExportSchema = z.array(transcriptEntrySchema);

export const diagnosticSchema = z.object({
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  path: z.string().optional(),
});

export const messageViewSchema = z.object({
  role: messageRoleSchema,
  content: z.string(),
  tokenCount: z.number().int().nonnegative(),
  charStart: z.number().int().nonnegative().optional(),
  charEnd: z.number().int().nonnegative().optional(),
});

export const conversationViewSchema = z.object({
  sourcePath: z.string(),
  date: z.string().optional(),
  topic: z.string().optional(),
  model: z.string().optional(),
  backend: z.string().optional(),
  systemPrompt: z.string().optional(),
  messages: z.array(messageViewSchema),
});

/**
 * Validate `value` against `schema`, throwing a readable error on mismatch.
 */
export function parseWithSchema<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const details = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid ${label}: ${details}`);
}
