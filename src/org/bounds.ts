import { BOUNDS_RESPONSE_TAG } from './constants.js';
import type { RegionMarker } from './model.js';

/**
 * Codec for the gptel response bounds property.
 *
 * Two grammars exist in the wild:
 * - dotted pairs (older gptel): `((1807 . 3547) (3600 . 3900))`
 * - tagged lists (current gptel): `((response (1116 2260) (2648 3860)))`
 *
 * Decoding never throws: it yields whatever pairs the selected pattern matches.
 * Encoding always writes the tagged grammar.
 */
const TAGGED_PAIR_RE = /\((\d+)\s+(\d+)\)/g;
const DOTTED_PAIR_RE = /\((\d+)\s*\.\s*(\d+)\)/g;

function collectPairs(raw: string, pattern: RegExp): RegionMarker[] {
  const markers: RegionMarker[] = [];
  for (const match of raw.matchAll(pattern)) {
    markers.push({ start: Number(match[1]), end: Number(match[2]) });
  }
  return markers;
}

/**
 * Decode a raw bounds value into `{ start, end }` pairs in encounter order.
 *
 * The numbers are returned as written; converting external positions into
 * string indices is the document parser's job.
 */
export function decodeBounds(raw: string | undefined): RegionMarker[] {
  if (!raw) return [];
  if (raw.includes(BOUNDS_RESPONSE_TAG)) return collectPairs(raw, TAGGED_PAIR_RE);
  return collectPairs(raw, DOTTED_PAIR_RE);
}

/**
 * Encode markers in the tagged grammar. An empty list encodes as `((response))`.
 */
export function encodeBounds(markers: RegionMarker[]): string {
  const pairs = markers.map((marker) => ` (${marker.start} ${marker.end})`).join('');
  return `((${BOUNDS_RESPONSE_TAG}${pairs}))`;
}
