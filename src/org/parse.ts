import { basename } from 'node:path';
import { decodeBounds } from './bounds.js';
import { createCharIndex } from './chars.js';
import { DEFAULT_POSITION_BASE } from './constants.js';
import { warningDiagnostic } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import { extractMessages } from './extract.js';
import type { Conversation, DocumentProperties, RegionMarker } from './model.js';
import { readDocumentDrawer, toDocumentProperties } from './properties.js';
import { filterMarkersForSection, findTopLevelSections, rebaseMarkers } from './sections.js';

/**
 * Parser for gptel-annotated Org documents.
 *
 * The parser is intentionally "format-aware" rather than a general Org parser.
 * It only recognizes:
 * - the document-level property drawer (gptel model/system/bounds)
 * - top-level headings and their own drawers (topics)
 * - the response bounds, which split the text into user/assistant messages
 *
 * Everything else is content.
 */
export interface ParseOrgOptions {
  /** Path recorded on every conversation. */
  sourcePath: string;
  /** ISO date for the conversations; defaults to the date in `sourcePath`'s file name. */
  date?: string;
  /**
   * Base of the positions stored in the bounds property.
   *
   * gptel writes Emacs buffer positions, which start at 1.
   */
  positionBase?: number;
}

export interface ParseOrgResult {
  properties: DocumentProperties;
  conversations: Conversation[];
  warnings: Diagnostic[];
}

const DAILY_FILE_NAME_RE = /^(\d{4})-(\d{2})-(\d{2})\.[^.]+$/;

/**
 * Extract the ISO date from an org-roam daily file name (`YYYY-MM-DD.org`).
 *
 * Returns `undefined` for other names and for impossible dates (`2024-02-30`).
 */
export function parseDateFromFilename(path: string): string | undefined {
  const match = basename(path).match(DAILY_FILE_NAME_RE);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

/**
 * Convert decoded bounds (external character positions) into string-index markers.
 *
 * Pairs that are empty or fall outside the text are skipped and reported once.
 */
export function resolveMarkers(
  text: string,
  bounds: RegionMarker[],
  positionBase: number = DEFAULT_POSITION_BASE
): { markers: RegionMarker[]; warnings: Diagnostic[] } {
  const index = createCharIndex(text);
  const markers: RegionMarker[] = [];
  const skipped: RegionMarker[] = [];

  for (const pair of bounds) {
    const start = pair.start - positionBase;
    const end = pair.end - positionBase;
    if (start < 0 || start >= end || end > index.length) {
      skipped.push(pair);
      continue;
    }
    markers.push({ start: index.toStringIndex(start), end: index.toStringIndex(end) });
  }

  const warnings =
    skipped.length > 0
      ? [
          warningDiagnostic(
            'BOUNDS_OUT_OF_RANGE',
            `Skipped ${skipped.length} bounds pair(s) outside the document: ${skipped
              .map((pair) => `(${pair.start} ${pair.end})`)
              .join(' ')}`
          ),
        ]
      : [];

  return { markers, warnings };
}

/**
 * Parse an Org document into conversations.
 *
 * Behavior highlights:
 * - No bounds in the document-level drawer means no conversations, even when
 *   the document has headings.
 * - With top-level headings, each heading is one conversation; sections whose
 *   range holds no marker are dropped.
 * - Without headings, the whole document is one conversation.
 */
export function parseOrgDocument(text: string, options: ParseOrgOptions): ParseOrgResult {
  const properties = toDocumentProperties(readDocumentDrawer(text));
  const bounds = decodeBounds(properties.bounds);
  if (bounds.length === 0) return { properties, conversations: [], warnings: [] };

  const { markers, warnings } = resolveMarkers(text, bounds, options.positionBase);

  const base: Omit<Conversation, 'topic' | 'messages'> = {
    sourcePath: options.sourcePath,
    date: options.date ?? parseDateFromFilename(options.sourcePath),
    model: properties.model,
    backend: properties.backend,
    systemPrompt: properties.system,
  };

  const sections = findTopLevelSections(text);
  if (sections.length === 0) {
    const messages = extractMessages(text, markers);
    const conversations: Conversation[] =
      messages.length > 0 ? [{ ...base, topic: properties.topic, messages }] : [];
    return { properties, conversations, warnings };
  }

  const conversations: Conversation[] = [];
  for (const section of sections) {
    const sectionMarkers = filterMarkersForSection(markers, section);
    if (sectionMarkers.length === 0) continue;

    const sectionText = text.slice(section.startPos, section.endPos);
    const messages = extractMessages(sectionText, rebaseMarkers(sectionMarkers, section.startPos));
    if (messages.length === 0) continue;

    conversations.push({ ...base, topic: section.topic ?? section.title, messages });
  }

  return { properties, conversations, warnings };
}
