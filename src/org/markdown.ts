import { MARKDOWN_HEADING_DEPTH_OFFSET } from './constants.js';

/**
 * Markdown → Org rendering for assistant replies.
 *
 * Only the constructs chat models commonly emit are mapped:
 * - fenced code blocks → `#+begin_src lang` / `#+end_src`
 * - `#`..`######` headings → Org headings nested under `*** Response`
 * - inline code, bold, images and links
 *
 * Code block bodies are copied untouched.
 */
const FENCE_RE = /^\s*```(.*)$/;
const HEADING_RE = /^(#{1,6})\s+(.*)$/;
const INLINE_CODE_RE = /`([^`]+)`/g;
const BOLD_RE = /\*\*(.+?)\*\*/g;
const IMAGE_RE = /!\[([^\]]*)\]\(([^)]+)\)/g;
const LINK_RE = /\[([^\]]+)\]\(([^)]+)\)/g;

function renderInline(line: string): string {
  return line
    .replace(INLINE_CODE_RE, '~$1~')
    .replace(BOLD_RE, '*$1*')
    .replace(IMAGE_RE, '[[$2]]')
    .replace(LINK_RE, '[[$2][$1]]');
}

export function markdownToOrg(markdown: string): string {
  const out: string[] = [];
  let inCodeBlock = false;

  for (const line of markdown.replace(/\r\n?/g, '\n').split('\n')) {
    const fence = line.match(FENCE_RE);
    if (fence) {
      if (inCodeBlock) {
        out.push('#+end_src');
      } else {
        const language = (fence[1] ?? '').trim();
        out.push(language ? `#+begin_src ${language}` : '#+begin_src');
      }
      inCodeBlock = !inCodeBlock;
      continue;
    }

    if (inCodeBlock) {
      out.push(line);
      continue;
    }

    const heading = line.match(HEADING_RE);
    if (heading) {
      const level = (heading[1] ?? '').length + MARKDOWN_HEADING_DEPTH_OFFSET;
      out.push(`${'*'.repeat(level)} ${heading[2] ?? ''}`);
      continue;
    }

    out.push(renderInline(line));
  }

  return out.join('\n');
}
