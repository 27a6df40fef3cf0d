import type { Conversation, Message, MessageRole } from './model.js';

/**
 * View/presentation helpers for parsed conversations.
 *
 * Offsets only make sense next to the source text, so tool/CLI output leaves
 * them out unless asked for.
 */
export type MessageView = {
  role: MessageRole;
  content: string;
  tokenCount: number;
  charStart?: number;
  charEnd?: number;
};

export type ConversationView = {
  sourcePath: string;
  date?: string;
  topic?: string;
  model?: string;
  backend?: string;
  systemPrompt?: string;
  messages: MessageView[];
};

export function toMessageView(message: Message, options: { includeOffsets: boolean }): MessageView {
  const view: MessageView = {
    role: message.role,
    content: message.content,
    tokenCount: message.tokenCount,
  };
  if (options.includeOffsets) {
    view.charStart = message.charStart;
    view.charEnd = message.charEnd;
  }
  return view;
}

/**
 * Convert a conversation into its JSON output shape, dropping unset metadata.
 */
export function toConversationView(
  conversation: Conversation,
  options: { includeOffsets: boolean }
): ConversationView {
  const view: ConversationView = {
    sourcePath: conversation.sourcePath,
    messages: conversation.messages.map((message) => toMessageView(message, options)),
  };
  if (conversation.date !== undefined) view.date = conversation.date;
  if (conversation.topic !== undefined) view.topic = conversation.topic;
  if (conversation.model !== undefined) view.model = conversation.model;
  if (conversation.backend !== undefined) view.backend = conversation.backend;
  if (conversation.systemPrompt !== undefined) view.systemPrompt = conversation.systemPrompt;
  return view;
}
