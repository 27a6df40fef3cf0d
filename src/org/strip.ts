/**
 * Reduce an Org span to the plain text a reader would see.
 *
 * The stripper is line-based and never looks at offsets: callers record span
 * positions before stripping, so content length changes here cannot move them.
 */
const BLOCK_BEGIN_RE = /^[ \t]*#\+begin_(src|quote|example)\b/i;
const DRAWER_START_RE = /^[ \t]*:PROPERTIES:[ \t]*$/i;
const DRAWER_END_RE = /^[ \t]*:END:[ \t]*$/i;
const DIRECTIVE_RE = /^[ \t]*#\+/;
const ROLE_LINE_RE = /^[ \t]*(?:Question|AI Response):[ \t]*$/;
const ROLE_TOKEN_RE = /@(?:user|assistant)\b[ \t]*/g;
const HEADING_STARS_RE = /^\*+[ \t]+/;
const LINK_RE = /\[\[([^\]]*)\](?:\[([^\]]*)\])?\]/g;

function blockEndPattern(kind: string): RegExp {
  return new RegExp(`^[ \\t]*#\\+end_${kind}\\b`, 'i');
}

function stripInline(line: string): string {
  return line
    .replace(HEADING_STARS_RE, '')
    .replace(LINK_RE, (_match, target: string, display: string | undefined) => display ?? target)
    .replace(ROLE_TOKEN_RE, '');
}

export function stripOrgMarkup(text: string): string {
  const out: string[] = [];
  let blockEnd: RegExp | undefined;
  let inDrawer = false;

  for (const line of text.replace(/\r\n?/g, '\n').split('\n')) {
    // Block bodies (src/quote/example) are kept verbatim.
    if (blockEnd) {
      if (blockEnd.test(line)) blockEnd = undefined;
      else out.push(line);
      continue;
    }

    const blockBegin = line.match(BLOCK_BEGIN_RE);
    if (blockBegin) {
      blockEnd = blockEndPattern((blockBegin[1] ?? '').toLowerCase());
      continue;
    }

    if (inDrawer) {
      if (DRAWER_END_RE.test(line)) inDrawer = false;
      continue;
    }
    if (DRAWER_START_RE.test(line)) {
      inDrawer = true;
      continue;
    }

    if (DIRECTIVE_RE.test(line)) continue;
    if (ROLE_LINE_RE.test(line)) continue;

    out.push(stripInline(line));
  }

  return out
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
