import { encodeBounds } from './bounds.js';
import { codePointLength, truncateWithEllipsis } from './chars.js';
import {
  DEFAULT_MAX_BOUNDS_ITERATIONS,
  DEFAULT_POSITION_BASE,
  DEFAULT_TOPIC,
  GPTEL_BOUNDS_PROPERTY,
  GPTEL_TOPIC_PROPERTY,
  MAX_HEADING_LENGTH,
  RESPONSE_HEADING,
} from './constants.js';
import { warningDiagnostic } from './diagnostics.js';
import type { Diagnostic } from './diagnostics.js';
import { markdownToOrg } from './markdown.js';
import type { DraftConversation, RegionMarker } from './model.js';
import { renderPropertyDrawer } from './properties.js';

/**
 * Builder for gptel-annotated Org documents.
 *
 * Layout:
 *
 * ```org
 * :PROPERTIES:
 * :GPTEL_BOUNDS: ((response (s1 e1) ...))
 * :END:
 *
 * * Topic
 * :PROPERTIES:
 * :GPTEL_TOPIC: Topic
 * :END:
 *
 * ** First line of the question
 * Question text
 *
 * *** Response
 * Rendered answer
 * ```
 *
 * The bounds drawer precedes the body, so the positions it stores depend on
 * its own length. `buildOrgDocument` resolves that by iterating until the
 * encoded value stops changing.
 */
export interface BuildOrgOptions {
  /** Cap for the fixed-point loop (default 10). */
  maxIterations?: number;
  /** Base of the written positions (default 1, Emacs buffer positions). */
  positionBase?: number;
}

export interface BuildOrgResult {
  text: string;
  /** Bounds as written to the document (external positions). */
  bounds: RegionMarker[];
  /** Fixed-point passes run; 0 when the document has no responses. */
  iterations: number;
  converged: boolean;
  warnings: Diagnostic[];
}

interface OrgBody {
  text: string;
  /** Body-relative, 0-based code-point ranges of every rendered response. */
  responses: RegionMarker[];
}

/**
 * Rewrite `* ` at line starts to `- ` so content never opens a new top-level section.
 */
export function escapeTopLevelHeadings(text: string): string {
  return text.replace(/^\* /gm, '- ');
}

function singleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ').trim();
}

/**
 * Heading text for a user message: its first line, truncated to 60 characters.
 */
export function headingForContent(content: string): string {
  const firstLine = content.trim().split(/\r?\n/)[0] ?? '';
  return truncateWithEllipsis(firstLine.trim(), MAX_HEADING_LENGTH);
}

function buildBody(conversations: DraftConversation[]): OrgBody {
  const parts: string[] = [];
  const responses: RegionMarker[] = [];
  let position = 0;

  const write = (chunk: string): void => {
    parts.push(chunk);
    position += codePointLength(chunk);
  };

  for (const conversation of conversations) {
    const topic = singleLine(conversation.topic) || DEFAULT_TOPIC;
    write(`* ${topic}\n`);
    write(renderPropertyDrawer([[GPTEL_TOPIC_PROPERTY, topic]]));
    write('\n');

    for (const message of conversation.messages) {
      const content = message.content.trim();
      if (!content) continue;

      if (message.role === 'user') {
        write(`** ${headingForContent(content)}\n`);
        write(`${escapeTopLevelHeadings(content)}\n\n`);
        continue;
      }

      write(`*** ${RESPONSE_HEADING}\n`);
      const start = position;
      write(escapeTopLevelHeadings(markdownToOrg(content)));
      responses.push({ start, end: position });
      write('\n\n');
    }
  }

  return { text: parts.join(''), responses };
}

function boundsHeader(encoded: string): string {
  return `${renderPropertyDrawer([[GPTEL_BOUNDS_PROPERTY, encoded]])}\n`;
}

export function buildOrgDocument(
  conversations: DraftConversation[],
  options: BuildOrgOptions = {}
): BuildOrgResult {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_BOUNDS_ITERATIONS;
  const positionBase = options.positionBase ?? DEFAULT_POSITION_BASE;
  const body = buildBody(conversations);

  if (body.responses.length === 0) {
    return { text: body.text, bounds: [], iterations: 0, converged: true, warnings: [] };
  }

  let encoded = encodeBounds([]);
  let bounds: RegionMarker[] = [];
  let iterations = 0;
  let converged = false;

  while (iterations < maxIterations) {
    iterations += 1;
    const offset = codePointLength(boundsHeader(encoded)) + positionBase;
    const next = body.responses.map((range) => ({
      start: range.start + offset,
      end: range.end + offset,
    }));
    const nextEncoded = encodeBounds(next);
    bounds = next;
    if (nextEncoded === encoded) {
      converged = true;
      break;
    }
    encoded = nextEncoded;
  }

  const warnings = converged
    ? []
    : [
        warningDiagnostic(
          'BOUNDS_NOT_CONVERGED',
          `Bounds did not stabilize after ${iterations} iteration(s); positions may be off`
        ),
      ];

  return { text: `${boundsHeader(encoded)}${body.text}`, bounds, iterations, converged, warnings };
}
