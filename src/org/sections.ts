import type { RegionMarker, Section } from './model.js';
import { readHeadingDrawer, toDocumentProperties } from './properties.js';

/**
 * Splits an Org document into top-level sections and assigns region markers
 * to them.
 *
 * A daily file usually holds one conversation per top-level heading; gptel
 * keeps the bounds for all of them in the single document-level drawer.
 */
const TOP_LEVEL_HEADING_RE = /^\* (.+)$/gm;

/**
 * Find all top-level (`* `) headings. `** ` and deeper never match.
 *
 * Returns `[]` when the document has no top-level heading; callers then treat
 * the whole document as one implicit section.
 */
export function findTopLevelSections(text: string): Section[] {
  const starts: { title: string; startPos: number }[] = [];
  for (const match of text.matchAll(TOP_LEVEL_HEADING_RE)) {
    starts.push({ title: (match[1] ?? '').trim(), startPos: match.index ?? 0 });
  }

  return starts.map(({ title, startPos }, index) => {
    const endPos = starts[index + 1]?.startPos ?? text.length;
    const section: Section = { title, startPos, endPos };
    const topic = toDocumentProperties(readHeadingDrawer(text, startPos, endPos)).topic;
    if (topic) section.topic = topic;
    return section;
  });
}

/**
 * Markers fully contained in `[section.startPos, section.endPos)`.
 *
 * A marker that straddles a section boundary belongs to no section and is
 * dropped. gptel never writes such bounds for a well-formed file, but hand
 * edits can produce them.
 */
export function filterMarkersForSection(
  markers: RegionMarker[],
  section: Pick<Section, 'startPos' | 'endPos'>
): RegionMarker[] {
  return markers.filter(
    (marker) => marker.start >= section.startPos && marker.end <= section.endPos
  );
}

/**
 * Shift markers so they are relative to `offset`.
 */
export function rebaseMarkers(markers: RegionMarker[], offset: number): RegionMarker[] {
  return markers.map((marker) => ({ start: marker.start - offset, end: marker.end - offset }));
}
