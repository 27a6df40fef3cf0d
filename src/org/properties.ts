import {
  GPTEL_BACKEND_PROPERTY,
  GPTEL_BOUNDS_PROPERTY,
  GPTEL_MODEL_PROPERTY,
  GPTEL_SYSTEM_PROPERTY,
  GPTEL_TOPIC_PROPERTY,
  PROPERTIES_DRAWER_END,
  PROPERTIES_DRAWER_START,
} from './constants.js';
import type { DocumentProperties } from './model.js';

/**
 * Reader for Org property drawers.
 *
 * A drawer looks like:
 *
 * ```org
 * :PROPERTIES:
 * :GPTEL_MODEL: claude-sonnet
 * :GPTEL_BOUNDS: ((response (120 480)))
 * :END:
 * ```
 *
 * Property names are matched case-insensitively, as Org does.
 */
export interface PropertyDrawer {
  /** Property values keyed by upper-cased name. */
  values: Map<string, string>;
  /** Index of the first character of the `:PROPERTIES:` line. */
  start: number;
  /** Index just past the `:END:` line (including its newline, if any). */
  end: number;
}

const DRAWER_START_RE = /^[ \t]*:PROPERTIES:[ \t]*$/i;
const DRAWER_END_RE = /^[ \t]*:END:[ \t]*$/i;
const PROPERTY_LINE_RE = /^[ \t]*:([^:\s]+):(?:[ \t]+(.*))?$/;
const HEADING_RE = /^\*+ /;

interface Line {
  text: string;
  start: number;
  /** Index just past the line terminator. */
  next: number;
}

function* linesFrom(text: string, from: number, to: number): Generator<Line> {
  let start = from;
  while (start < to) {
    const newline = text.indexOf('\n', start);
    const lineEnd = newline === -1 || newline >= to ? to : newline;
    const next = lineEnd < to ? lineEnd + 1 : to;
    yield { text: text.slice(start, lineEnd).replace(/\r$/, ''), start, next };
    start = next;
  }
}

function readDrawerBody(text: string, first: Line, to: number): PropertyDrawer | undefined {
  const values = new Map<string, string>();
  for (const line of linesFrom(text, first.next, to)) {
    if (DRAWER_END_RE.test(line.text)) {
      return { values, start: first.start, end: line.next };
    }
    const match = line.text.match(PROPERTY_LINE_RE);
    if (!match) continue;
    const name = (match[1] ?? '').toUpperCase();
    if (!values.has(name)) values.set(name, (match[2] ?? '').trim());
  }
  return undefined;
}

/**
 * Find the document-level drawer: the first drawer before the first heading.
 */
export function readDocumentDrawer(text: string): PropertyDrawer | undefined {
  for (const line of linesFrom(text, 0, text.length)) {
    if (HEADING_RE.test(line.text)) return undefined;
    if (DRAWER_START_RE.test(line.text)) return readDrawerBody(text, line, text.length);
  }
  return undefined;
}

/**
 * Read the first drawer in the section whose heading line starts at `headingStart`.
 *
 * The drawer may follow planning lines (`SCHEDULED:`, `DEADLINE:`) or body text.
 */
export function readHeadingDrawer(
  text: string,
  headingStart: number,
  sectionEnd: number
): PropertyDrawer | undefined {
  const newline = text.indexOf('\n', headingStart);
  if (newline === -1 || newline >= sectionEnd) return undefined;

  for (const line of linesFrom(text, newline + 1, sectionEnd)) {
    if (DRAWER_START_RE.test(line.text)) return readDrawerBody(text, line, sectionEnd);
  }
  return undefined;
}

/**
 * Pick the gptel properties out of a drawer.
 */
export function toDocumentProperties(drawer: PropertyDrawer | undefined): DocumentProperties {
  if (!drawer) return {};
  const read = (name: string): string | undefined => drawer.values.get(name) || undefined;
  return {
    model: read(GPTEL_MODEL_PROPERTY),
    backend: read(GPTEL_BACKEND_PROPERTY),
    system: read(GPTEL_SYSTEM_PROPERTY),
    topic: read(GPTEL_TOPIC_PROPERTY),
    bounds: read(GPTEL_BOUNDS_PROPERTY),
  };
}

/**
 * Render a drawer. Values are written on one line each; newlines are folded to spaces.
 */
export function renderPropertyDrawer(entries: [name: string, value: string][]): string {
  const lines = entries.map(([name, value]) => `:${name}: ${value.replace(/\r?\n/g, ' ')}`);
  return [PROPERTIES_DRAWER_START, ...lines, PROPERTIES_DRAWER_END, ''].join('\n');
}
