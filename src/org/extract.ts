import type { Message, MessageRole, RegionMarker } from './model.js';
import { stripOrgMarkup } from './strip.js';

/**
 * Turn a text and its response markers into an ordered message list.
 *
 * Markers are assistant spans; everything between them belongs to the user.
 * The sweep trusts its input: markers are sorted but overlap is not detected,
 * so overlapping markers can repeat or skip text.
 */
function toMessage(
  text: string,
  role: MessageRole,
  charStart: number,
  charEnd: number
): Message | undefined {
  const content = stripOrgMarkup(text.slice(charStart, charEnd));
  if (!content) return undefined;
  return { role, content, charStart, charEnd, tokenCount: 0 };
}

export function extractMessages(text: string, markers: RegionMarker[]): Message[] {
  if (markers.length === 0) return [];

  // Array.prototype.sort is stable, so equal starts keep their encounter order.
  const sorted = [...markers].sort((a, b) => a.start - b.start);
  const messages: Message[] = [];
  let cursor = 0;

  const push = (message: Message | undefined): void => {
    if (message) messages.push(message);
  };

  for (const marker of sorted) {
    if (marker.start > cursor) push(toMessage(text, 'user', cursor, marker.start));
    push(toMessage(text, 'assistant', marker.start, marker.end));
    cursor = marker.end;
  }

  if (cursor < text.length) push(toMessage(text, 'user', cursor, text.length));

  return messages;
}
