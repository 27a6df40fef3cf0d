/**
 * Parsed representation of gptel-annotated Org documents.
 *
 * Notes:
 * - Offsets are 0-based, half-open string indices (`text.slice(start, end)`).
 * - `charStart`/`charEnd` on a message refer to the raw span before markup
 *   stripping, relative to the text the message was extracted from.
 */
export type MessageRole = 'user' | 'assistant';

export interface RegionMarker {
  start: number;
  end: number;
}

export interface Message {
  role: MessageRole;
  /** Plain text with Org markup stripped. */
  content: string;
  charStart: number;
  charEnd: number;
  /** Filled in by token counters downstream; always 0 here. */
  tokenCount: number;
}

export interface Conversation {
  sourcePath: string;
  /** ISO date (`YYYY-MM-DD`) taken from the file name. */
  date?: string;
  topic?: string;
  model?: string;
  backend?: string;
  systemPrompt?: string;
  messages: Message[];
}

export interface Section {
  /** Heading text without the leading `* `. */
  title: string;
  /** Index of the first character of the heading line. */
  startPos: number;
  /** Exclusive end: the next section's start, or the text length. */
  endPos: number;
  /** `GPTEL_TOPIC` from the section's own property drawer. */
  topic?: string;
}

export interface DocumentProperties {
  model?: string;
  backend?: string;
  system?: string;
  topic?: string;
  /** Raw, still-encoded `GPTEL_BOUNDS` value. */
  bounds?: string;
}

/**
 * A role-tagged message as accepted by the document builder.
 */
export interface DraftMessage {
  role: MessageRole;
  content: string;
}

export interface DraftConversation {
  topic: string;
  messages: DraftMessage[];
}
