/**
 * Formatted run model shared by the Markdown, RTF, HTML and OOXML converters.
 */

export type HeadingLevel = 1 | 2 | 3;

export interface TextRun {
  text: string;
  bold?: boolean;
  italic?: boolean;
  strikethrough?: boolean;
  underline?: boolean;
  highlight?: boolean;
  href?: string;
  // Applies to the whole line the run sits on
  headingLevel?: HeadingLevel;
}

export type RunAttributes = Omit<TextRun, 'text'>;

export function sameAttributes(a: RunAttributes, b: RunAttributes): boolean {
  return (
    !!a.bold === !!b.bold &&
    !!a.italic === !!b.italic &&
    !!a.strikethrough === !!b.strikethrough &&
    !!a.underline === !!b.underline &&
    !!a.highlight === !!b.highlight &&
    a.href === b.href &&
    a.headingLevel === b.headingLevel
  );
}

export function attributesOf(run: TextRun): RunAttributes {
  const { text: _text, ...attributes } = run;
  return attributes;
}

/**
 * Drops empty runs and joins neighbours that share every attribute.
 */
export function coalesceRuns(runs: TextRun[]): TextRun[] {
  const result: TextRun[] = [];
  for (const run of runs) {
    if (run.text.length === 0) continue;
    const last = result[result.length - 1];
    if (last && sameAttributes(last, run)) {
      last.text += run.text;
    } else {
      result.push({ ...run });
    }
  }
  return result;
}

export function plainText(runs: TextRun[]): string {
  return runs.map(run => run.text).join('');
}

/**
 * Splits a run list into lines at '\n'. Each line keeps its runs in order.
 */
export function splitLines(runs: TextRun[]): TextRun[][] {
  const lines: TextRun[][] = [[]];
  for (const run of runs) {
    const parts = run.text.split('\n');
    parts.forEach((part, index) => {
      if (index > 0) lines.push([]);
      if (part.length > 0) lines[lines.length - 1].push({ ...run, text: part });
    });
  }
  return lines;
}
