import { truncateWithEllipsis } from './chars.js';
import { DEFAULT_TOPIC, MAX_HEADING_LENGTH } from './constants.js';
import { warningDiagnostic } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import type { DraftConversation, DraftMessage, MessageRole } from './model.js';

/**
 * Importer for chat history exports.
 *
 * Exported conversations are plain text where each turn starts with a marker
 * line:
 *
 * ```text
 * Question:
 * How do I ...?
 * AI Response:
 * You can ...
 * ```
 *
 * Entries carry a timestamp; they are grouped per calendar day so each day can
 * be written as one `YYYY-MM-DD.org` file.
 */
export interface TranscriptEntry {
  /** `M/D/YY, h:mm AM|PM` (mobile export) or ISO 8601. */
  date: string;
  conversation: string;
}

export interface DailyTranscript {
  /** ISO date (`YYYY-MM-DD`). */
  date: string;
  conversations: DraftConversation[];
}

export interface ExportTimestamp {
  /** ISO calendar day as written (no time zone conversion). */
  day: string;
  /** Milliseconds used to order conversations within a day. */
  sortKey: number;
}

const MARKER_LINE_RE = /^(Question|AI Response):[ \t]*$/;
const US_EXPORT_DATE_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{2}),\s+(\d{1,2}):(\d{2})\s*([AP]M)$/i;
const ISO_DAY_RE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Split an exported conversation into role-tagged messages.
 *
 * Text before the first marker is ignored; empty turns are dropped.
 */
export function parseTranscript(text: string): DraftMessage[] {
  const messages: DraftMessage[] = [];
  let role: MessageRole | undefined;
  let buffer: string[] = [];

  const flush = (): void => {
    if (!role) return;
    const content = buffer.join('\n').trim();
    if (content) messages.push({ role, content });
  };

  for (const line of text.replace(/\r\n?/g, '\n').split('\n')) {
    const marker = line.match(MARKER_LINE_RE);
    if (marker) {
      flush();
      role = marker[1] === 'Question' ? 'user' : 'assistant';
      buffer = [];
      continue;
    }
    buffer.push(line);
  }
  flush();

  return messages;
}

/**
 * Topic for a conversation: the first line of its first user message.
 */
export function makeTopic(messages: DraftMessage[]): string {
  const first = messages.find((message) => message.role === 'user');
  if (!first) return DEFAULT_TOPIC;
  const firstLine = (first.content.split('\n')[0] ?? '').trim();
  return firstLine ? truncateWithEllipsis(firstLine, MAX_HEADING_LENGTH) : DEFAULT_TOPIC;
}

/**
 * Parse an export timestamp.
 *
 * Two-digit years follow the POSIX `%y` pivot: 69..99 → 19xx, 00..68 → 20xx.
 */
export function parseExportDate(value: string): ExportTimestamp | undefined {
  const trimmed = value.trim();

  const us = trimmed.match(US_EXPORT_DATE_RE);
  if (us) {
    const month = Number(us[1]);
    const day = Number(us[2]);
    const shortYear = Number(us[3]);
    const year = shortYear >= 69 ? 1900 + shortYear : 2000 + shortYear;
    const hour12 = Number(us[4]);
    const minute = Number(us[5]);
    if (hour12 < 1 || hour12 > 12 || minute > 59) return undefined;
    const hour = (hour12 % 12) + ((us[6] ?? '').toUpperCase() === 'PM' ? 12 : 0);

    const sortKey = Date.UTC(year, month - 1, day, hour, minute);
    const check = new Date(sortKey);
    if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return undefined;
    return { day: `${year}-${pad2(month)}-${pad2(day)}`, sortKey };
  }

  const iso = trimmed.match(ISO_DAY_RE);
  if (iso) {
    const sortKey = Date.parse(trimmed);
    if (Number.isNaN(sortKey)) return undefined;
    return { day: `${iso[1]}-${iso[2]}-${iso[3]}`, sortKey };
  }

  return undefined;
}

/**
 * Group exported conversations by calendar day.
 *
 * Days are sorted ascending; conversations within a day by time, ties keeping
 * export order.
 */
export function groupByDay(entries: TranscriptEntry[]): {
  days: DailyTranscript[];
  warnings: Diagnostic[];
} {
  const warnings: Diagnostic[] = [];
  const byDay = new Map<string, { sortKey: number; conversation: DraftConversation }[]>();

  entries.forEach((entry, index) => {
    const timestamp = parseExportDate(entry.date);
    if (!timestamp) {
      warnings.push(
        warningDiagnostic('INVALID_DATE', `Skipping entry ${index}: unrecognized date ${JSON.stringify(entry.date)}`)
      );
      return;
    }

    const messages = parseTranscript(entry.conversation);
    if (messages.length === 0) {
      warnings.push(warningDiagnostic('EMPTY_CONVERSATION', `Skipping entry ${index}: no messages`));
      return;
    }

    const bucket = byDay.get(timestamp.day) ?? [];
    bucket.push({ sortKey: timestamp.sortKey, conversation: { topic: makeTopic(messages), messages } });
    byDay.set(timestamp.day, bucket);
  });

  const days = [...byDay.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, bucket]) => ({
      date,
      conversations: [...bucket].sort((a, b) => a.sortKey - b.sortKey).map((item) => item.conversation),
    }));

  return { days, warnings };
}
