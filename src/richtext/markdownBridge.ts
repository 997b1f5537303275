/**
 * Converts between formatted runs and Markdown source.
 */

import { HeadingLevel, RunAttributes, TextRun, coalesceRuns, splitLines } from './runs';

// ---------------------------------------------------------------------------
// Runs → Markdown
// ---------------------------------------------------------------------------

const EDGE_WHITESPACE = /^(\s*)([\s\S]*?)(\s*)$/;

type MarkerKey = 'bold' | 'italic' | 'underline' | 'highlight' | 'strikethrough';

// Outermost first when two markers open and close together
const MARKER_KEYS: MarkerKey[] = ['bold', 'italic', 'underline', 'highlight', 'strikethrough'];

const FIXED_MARKERS: Record<'underline' | 'highlight' | 'strikethrough', [string, string]> = {
  underline: ['<u>', '</u>'],
  highlight: ['==', '=='],
  strikethrough: ['~~', '~~'],
};

interface OpenMarker {
  key: MarkerKey;
  close: string;
}

function isBlank(run: TextRun): boolean {
  return run.text.trim().length === 0;
}

/**
 * Index just past the last run of the stretch starting at `start` that
 * keeps `key` set. Blank runs neither extend nor break the stretch.
 */
function stretchEnd(line: TextRun[], start: number, key: MarkerKey): number {
  let end = start;
  for (let i = start; i < line.length; i++) {
    if (isBlank(line[i])) continue;
    if (!line[i][key]) break;
    end = i + 1;
  }
  return end;
}

function markerPair(
  key: MarkerKey,
  line: TextRun[],
  start: number,
  end: number,
  stack: OpenMarker[],
  afterStar: boolean
): [string, string] {
  if (key === 'bold') return afterStar ? ['__', '__'] : ['**', '**'];
  if (key === 'italic') {
    // Star italics cannot wrap a bold span that opens later
    const boldOpen = stack.some(marker => marker.key === 'bold');
    const wrapsBold = !boldOpen && line.slice(start, end).some(run => run.bold && !isBlank(run));
    return afterStar || wrapsBold ? ['_', '_'] : ['*', '*'];
  }
  return FIXED_MARKERS[key];
}

/**
 * Writes one line of runs. Markers open where an attribute starts and close
 * where it ends, so nested spans keep their nesting. Marker characters never
 * touch whitespace: edge whitespace of a run sits outside the markers and
 * whitespace-only runs pass through as they are.
 */
function lineToMarkdown(line: TextRun[]): string {
  let output = '';
  const heading = line.find(run => !isBlank(run))?.headingLevel;
  if (heading) output += '#'.repeat(heading) + ' ';

  const stack: OpenMarker[] = [];
  let pending = '';

  line.forEach((run, index) => {
    if (isBlank(run)) {
      pending += run.text;
      return;
    }

    const match = EDGE_WHITESPACE.exec(run.text);
    const leading = match ? match[1] : '';
    const core = match ? match[2] : run.text;
    const trailing = match ? match[3] : '';

    let closing = '';
    const firstEnded = stack.findIndex(marker => !run[marker.key]);
    if (firstEnded >= 0) {
      for (const marker of stack.splice(firstEnded).reverse()) closing += marker.close;
    }
    const gap = pending + leading;
    output += closing + gap;
    pending = '';

    let afterStar = gap.length === 0 && closing.endsWith('*');
    const opening = MARKER_KEYS.filter(key => run[key] && !stack.some(marker => marker.key === key))
      .map(key => ({ key, end: stretchEnd(line, index, key) }))
      .sort((a, b) => b.end - a.end);
    for (const { key, end } of opening) {
      const [open, close] = markerPair(key, line, index, end, stack, afterStar);
      output += open;
      stack.push({ key, close });
      afterStar = false;
    }

    output += run.href ? `[${core}](${run.href})` : core;
    pending = trailing;
  });

  for (const marker of stack.reverse()) output += marker.close;
  return output + pending;
}

export function runsToMarkdown(runs: TextRun[]): string {
  return cleanupMarkdown(splitLines(coalesceRuns(runs)).map(lineToMarkdown).join('\n'));
}

// ---------------------------------------------------------------------------
// Cleanup
// ---------------------------------------------------------------------------

const THEMATIC_BREAK = /^\s*([*_~=-])(\s*\1){2,}\s*$/;

const MARKER_RULES: Array<[RegExp, string]> = [
  // Identical markers split by a single space
  [/\*\*\* \*\*\*/g, ' '],
  [/(?<!\*)\*\* \*\*(?!\*)/g, ' '],
  [/~~ ~~/g, ' '],
  [/== ==/g, ' '],
  [/<\/u> <u>/g, ' '],
  // Empty pairs and directly adjacent identical markers
  [/\*{6}/g, ''],
  [/(?<!\*)\*{4}(?!\*)/g, ''],
  [/~~~~/g, ''],
  [/====/g, ''],
  [/<u><\/u>/g, ''],
  [/<\/u><u>/g, ''],
];

function cleanupMarkers(line: string): string {
  if (THEMATIC_BREAK.test(line)) return line;
  let result = line;
  for (const [pattern, replacement] of MARKER_RULES) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function cleanupPass(text: string): string {
  const lines = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => cleanupMarkers(line).replace(/[ \t]+$/, ''));

  return lines
    .join('\n')
    .replace(/\n{4,}/g, '\n\n\n')
    .replace(/^\n+/, '')
    .replace(/\n+$/, '');
}

/**
 * Normalizes emitted Markdown: line endings, redundant marker pairs,
 * trailing whitespace and long blank-line runs. Applying it twice gives the
 * same result as applying it once.
 */
export function cleanupMarkdown(text: string): string {
  let current = text;
  for (;;) {
    const next = cleanupPass(current);
    if (next === current) return next;
    current = next;
  }
}

// ---------------------------------------------------------------------------
// Markdown → Runs
// ---------------------------------------------------------------------------

interface InlinePattern {
  regex: RegExp;
  attributes: (match: RegExpExecArray) => RunAttributes;
  // Capture group holding the inner text
  group: number;
  // Length of the opening marker
  open: number;
}

const SPAN = '(\\S(?:[^\\n]*?\\S)?)';

// Precedence order: earlier patterns claim their spans first
const INLINE_PATTERNS: InlinePattern[] = [
  {
    regex: /\[([^\]\n]+)\]\(([^)\s]+)\)/g,
    attributes: match => ({ href: match[2] }),
    group: 1,
    open: 1,
  },
  { regex: new RegExp(`\\*\\*\\*${SPAN}\\*\\*\\*`, 'g'), attributes: () => ({ bold: true, italic: true }), group: 1, open: 3 },
  { regex: new RegExp(`___${SPAN}___`, 'g'), attributes: () => ({ bold: true, italic: true }), group: 1, open: 3 },
  { regex: new RegExp(`\\*\\*${SPAN}\\*\\*(?!\\*)`, 'g'), attributes: () => ({ bold: true }), group: 1, open: 2 },
  { regex: new RegExp(`__${SPAN}__(?!_)`, 'g'), attributes: () => ({ bold: true }), group: 1, open: 2 },
  { regex: new RegExp(`\\*${SPAN}\\*`, 'g'), attributes: () => ({ italic: true }), group: 1, open: 1 },
  { regex: new RegExp(`(?<![\\w])_${SPAN}_(?![\\w])`, 'g'), attributes: () => ({ italic: true }), group: 1, open: 1 },
  { regex: new RegExp(`~~${SPAN}~~`, 'g'), attributes: () => ({ strikethrough: true }), group: 1, open: 2 },
  { regex: new RegExp(`==${SPAN}==`, 'g'), attributes: () => ({ highlight: true }), group: 1, open: 2 },
  { regex: /<u>([^\n]+?)<\/u>/g, attributes: () => ({ underline: true }), group: 1, open: 3 },
];

interface Claim {
  start: number;
  end: number;
  innerStart: number;
  innerEnd: number;
  inner: string;
  attributes: RunAttributes;
}

function nestsInside(claim: Claim, outer: Claim): boolean {
  return claim.start >= outer.innerStart && claim.end <= outer.innerEnd;
}

/**
 * A candidate may wrap earlier claims whole; any other overlap drops it.
 */
function conflicts(claims: Claim[], candidate: Claim): boolean {
  return claims.some(
    claim => candidate.start < claim.end && claim.start < candidate.end && !nestsInside(claim, candidate)
  );
}

function parseInline(text: string, base: RunAttributes): TextRun[] {
  let claims: Claim[] = [];

  for (const pattern of INLINE_PATTERNS) {
    const regex = new RegExp(pattern.regex.source, pattern.regex.flags);
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      const start = match.index;
      const inner = match[pattern.group];
      const candidate: Claim = {
        start,
        end: start + match[0].length,
        innerStart: start + pattern.open,
        innerEnd: start + pattern.open + inner.length,
        inner,
        attributes: pattern.attributes(match),
      };
      if (conflicts(claims, candidate)) {
        regex.lastIndex = start + 1;
        continue;
      }
      // Wrapped claims are found again when the inner text is parsed
      claims = claims.filter(claim => !nestsInside(claim, candidate));
      claims.push(candidate);
    }
  }

  claims.sort((a, b) => a.start - b.start);

  const runs: TextRun[] = [];
  let cursor = 0;
  for (const claim of claims) {
    if (claim.start > cursor) {
      runs.push({ ...base, text: text.slice(cursor, claim.start) });
    }
    // Markers fully inside a claimed span still apply, nested
    runs.push(...parseInline(claim.inner, { ...base, ...claim.attributes }));
    cursor = claim.end;
  }
  if (cursor < text.length) {
    runs.push({ ...base, text: text.slice(cursor) });
  }
  return runs;
}

const HEADING_LINE = /^(#{1,3}) +(.*)$/;

function toHeadingLevel(hashes: number): HeadingLevel | undefined {
  return hashes === 1 || hashes === 2 || hashes === 3 ? hashes : undefined;
}

/**
 * Parses Markdown inline markup into runs. Heading lines (#, ##, ###) carry
 * a heading level on their runs; everything else keeps the base attributes.
 */
export function markdownToRuns(markdown: string, base: RunAttributes = {}): TextRun[] {
  const runs: TextRun[] = [];
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');

  lines.forEach((line, index) => {
    if (index > 0) runs.push({ ...base, text: '\n' });
    const heading = HEADING_LINE.exec(line);
    if (heading) {
      runs.push(...parseInline(heading[2], { ...base, headingLevel: toHeadingLevel(heading[1].length) }));
    } else {
      runs.push(...parseInline(line, base));
    }
  });

  return coalesceRuns(runs);
}
