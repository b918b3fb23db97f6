/**
 * Text Preprocessor
 *
 * Strips PDF-to-text artifacts from agenda and minutes before any pattern
 * matching runs. Line structure is preserved: the title resolver relies on
 * "N. Title" headings starting a line.
 */

const PAGE_MARKER_LINE = [
  /^-{2,}\s*PAGE\s+\d+\s*-{2,}$/i,
  /^Page\s+\d+(?:\s+of\s+\d+)?$/i,
  /^-\s*\d+\s*-$/,
];

/** Roll-call labels, status lines, motions and item headings are content on every page */
const VOTE_CONTENT = /\bMOTION:|\b(?:AYES|YES|NOES|NAYS|NO|ABSTAIN(?:ED|S)?|ABSENT|RECUSED|RECUSAL)\s*:|\bStatus:|^\d+\.\s+\S/i;

function isPageMarker(line: string): boolean {
  const trimmed = line.trim();
  return PAGE_MARKER_LINE.some((pattern) => pattern.test(trimmed));
}

/**
 * Split into pages on form feeds and explicit page markers, dropping the markers.
 */
function splitPages(text: string): string[][] {
  const pages: string[][] = [[]];
  for (const rawLine of text.split('\n')) {
    const segments = rawLine.split('\f');
    segments.forEach((segment, index) => {
      if (index > 0) pages.push([]);
      if (isPageMarker(segment)) {
        if ((pages[pages.length - 1]?.length ?? 0) > 0) pages.push([]);
        return;
      }
      pages[pages.length - 1]?.push(segment);
    });
  }
  return pages.filter((page) => page.some((line) => line.trim().length > 0));
}

/**
 * Indexes of the first and last non-blank lines of a page, unless they carry vote content
 */
function edgeIndexes(page: readonly string[]): number[] {
  const first = page.findIndex((line) => line.trim().length > 0);
  if (first === -1) return [];
  let last = page.length - 1;
  while (last > first && (page[last] ?? '').trim().length === 0) last--;
  return [...new Set([first, last])].filter((index) => !VOTE_CONTENT.test((page[index] ?? '').trim()));
}

/**
 * Lines that are the outermost line of at least two pages and at least half
 * of all pages are running headers or footers.
 */
export function findRunningLines(pages: readonly (readonly string[])[]): Set<string> {
  const running = new Set<string>();
  if (pages.length < 2) return running;

  const pageCounts = new Map<string, number>();
  for (const page of pages) {
    const seen = new Set<string>();
    for (const index of edgeIndexes(page)) {
      const key = (page[index] ?? '').trim();
      if (key.length === 0 || seen.has(key)) continue;
      seen.add(key);
      pageCounts.set(key, (pageCounts.get(key) ?? 0) + 1);
    }
  }

  const minimum = Math.max(2, Math.ceil(pages.length / 2));
  for (const [line, count] of pageCounts) {
    if (count >= minimum) running.add(line);
  }
  return running;
}

function dropRunningLines(pages: readonly (readonly string[])[], running: Set<string>): string[] {
  const lines: string[] = [];
  for (const page of pages) {
    const edges = new Set(edgeIndexes(page));
    page.forEach((line, index) => {
      if (edges.has(index) && running.has(line.trim())) return;
      lines.push(line);
    });
  }
  return lines;
}

/**
 * Clean raw agenda or minutes text.
 *
 * Removes page markers and running headers/footers, rejoins words hyphenated
 * across line breaks and collapses redundant whitespace.
 */
export function cleanDocumentText(raw: string): string {
  if (raw.length === 0) return raw;

  const normalized = raw.replace(/\r\n?/g, '\n');
  const pages = splitPages(normalized);
  const lines = dropRunningLines(pages, findRunningLines(pages));

  return lines
    .join('\n')
    .replace(/([A-Za-z])-\n[ \t]*([a-z])/g, '$1$2')
    .replace(/[ \t\u00a0]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Collapse all whitespace to single spaces (for motion text and titles).
 */
export function squashWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
