/**
 * Runs and Markdown blocks → HTML/XHTML fragments.
 */

import { TextRun, coalesceRuns, splitLines } from './runs';
import { markdownToRuns } from './markdownBridge';
import { escapeXml } from '../util/xml';
import { headingAnchor } from '../util/slug';

export function runsToHtml(runs: TextRun[]): string {
  return coalesceRuns(runs)
    .map(run => {
      let html = escapeXml(run.text);
      if (run.href) return `<a href="${escapeXml(run.href)}">${html}</a>`;
      if (run.highlight) html = `<mark>${html}</mark>`;
      if (run.underline) html = `<u>${html}</u>`;
      if (run.strikethrough) html = `<del>${html}</del>`;
      if (run.italic) html = `<em>${html}</em>`;
      if (run.bold) html = `<strong>${html}</strong>`;
      return html;
    })
    .join('');
}

/**
 * Inline Markdown for one paragraph; single newlines become <br/>.
 */
export function inlineMarkdownToHtml(text: string): string {
  return splitLines(markdownToRuns(text))
    .map(line => runsToHtml(line.map(run => ({ ...run, headingLevel: undefined }))))
    .join('<br/>');
}

export type HtmlBlock =
  | { kind: 'heading'; level: number; anchor: string; html: string }
  | { kind: 'rule' }
  | { kind: 'list'; items: string[] }
  | { kind: 'paragraph'; html: string };

const HEADING = /^(#{1,6}) +(.*)$/;
const RULE = /^\s*([*_-])(\s*\1){2,}\s*$/;
const LIST_ITEM = /^\s*[-*+] +(.*)$/;

/**
 * Splits Markdown into blank-line separated blocks. Heading and rule lines
 * always stand alone.
 */
export function markdownToBlocks(markdown: string): HtmlBlock[] {
  const blocks: HtmlBlock[] = [];
  let pending: string[] = [];

  const flush = (): void => {
    if (pending.length === 0) return;
    if (pending.every(line => LIST_ITEM.test(line))) {
      blocks.push({
        kind: 'list',
        items: pending.map(line => inlineMarkdownToHtml(line.replace(LIST_ITEM, '$1'))),
      });
    } else {
      blocks.push({ kind: 'paragraph', html: inlineMarkdownToHtml(pending.join('\n')) });
    }
    pending = [];
  };

  for (const line of markdown.replace(/\r\n?/g, '\n').split('\n')) {
    const heading = HEADING.exec(line);
    if (line.trim() === '') {
      flush();
    } else if (heading) {
      flush();
      blocks.push({
        kind: 'heading',
        level: heading[1].length,
        anchor: headingAnchor(heading[2]),
        html: inlineMarkdownToHtml(heading[2]),
      });
    } else if (RULE.test(line)) {
      flush();
      blocks.push({ kind: 'rule' });
    } else {
      pending.push(line);
    }
  }
  flush();
  return blocks;
}

export function renderBlocks(blocks: HtmlBlock[], options: { firstParagraphClass?: string } = {}): string {
  let firstParagraph = true;
  return blocks
    .map(block => {
      switch (block.kind) {
        case 'heading': {
          const id = block.anchor ? ` id="${escapeXml(block.anchor)}"` : '';
          return `<h${block.level}${id}>${block.html}</h${block.level}>`;
        }
        case 'rule':
          return '<hr/>';
        case 'list':
          return `<ul>\n${block.items.map(item => `  <li>${item}</li>`).join('\n')}\n</ul>`;
        case 'paragraph': {
          const className = firstParagraph && options.firstParagraphClass ? ` class="${options.firstParagraphClass}"` : '';
          firstParagraph = false;
          return `<p${className}>${block.html}</p>`;
        }
      }
    })
    .join('\n');
}
