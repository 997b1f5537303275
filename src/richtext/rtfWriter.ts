/**
 * Runs → RTF encoder. Output is the Cocoa flavour Scrivener writes itself:
 * Helvetica 12pt, a two-colour table whose second entry is the highlight
 * yellow, one group per formatted run.
 */

import { HeadingLevel, TextRun, coalesceRuns } from './runs';
import { markdownToRuns } from './markdownBridge';

const RTF_HEADER =
  '{\\rtf1\\ansi\\ansicpg1252\\cocoartf2639\n' +
  '{\\fonttbl\\f0\\fswiss\\fcharset0 Helvetica;}\n' +
  '{\\colortbl;\\red0\\green0\\blue0;\\red255\\green255\\blue0;}\n' +
  '\\pard\\f0\\fs24 ';

const HEADING_FONT_SIZE: Record<HeadingLevel, number> = { 1: 48, 2: 36, 3: 28 };

// Index into the colour table above
const HIGHLIGHT_COLOR = 2;

export function escapeRtfText(text: string): string {
  let out = '';
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === '\\' || ch === '{' || ch === '}') {
      out += '\\' + ch;
    } else if (ch === '\n') {
      out += '\\par\n';
    } else if (ch === '\t') {
      out += '\\tab ';
    } else if (code < 0x80) {
      out += ch;
    } else {
      // \uN takes a signed 16-bit value; astral characters go as surrogate pairs
      for (let i = 0; i < ch.length; i++) {
        const unit = ch.charCodeAt(i);
        out += `\\u${unit > 0x7fff ? unit - 0x10000 : unit}?`;
      }
    }
  }
  return out;
}

function controlWords(run: TextRun): string {
  let words = '';
  if (run.headingLevel) {
    words += `\\b\\fs${HEADING_FONT_SIZE[run.headingLevel]}`;
    // Headings are bold already; the outline level keeps explicit bold apart
    if (run.bold) words += `\\outlinelevel${run.headingLevel - 1}`;
  } else if (run.bold) {
    words += '\\b';
  }
  if (run.italic) words += '\\i';
  if (run.strikethrough) words += '\\strike';
  if (run.underline) words += '\\ul';
  if (run.highlight) words += `\\highlight${HIGHLIGHT_COLOR}`;
  return words;
}

function encodeRun(run: TextRun): string {
  const words = controlWords(run);
  const body = escapeRtfText(run.text);
  const styled = words ? `{${words} ${body}}` : body;
  if (!run.href) return styled;
  const url = run.href.replace(/"/g, '%22');
  return `{\\field{\\*\\fldinst{HYPERLINK "${escapeRtfText(url)}"}}{\\fldrslt ${styled}}}`;
}

export function runsToRtf(runs: TextRun[]): string {
  return RTF_HEADER + coalesceRuns(runs).map(encodeRun).join('') + '}';
}

export function markdownToRtf(markdown: string): string {
  return runsToRtf(markdownToRuns(markdown));
}
