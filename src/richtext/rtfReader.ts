/**
 * RTF → runs decoder.
 *
 * Handles the subset Cocoa and Scrivener emit: character formatting, font
 * sizes (mapped to heading levels), unicode escapes, code page 1252 hex
 * escapes and HYPERLINK fields. Tables, pictures and other destinations are
 * skipped.
 */

import { TextDecoder } from 'util';
import { HeadingLevel, TextRun, coalesceRuns } from './runs';
import { cleanupMarkdown, runsToMarkdown } from './markdownBridge';
import { decodeCp1252 } from './cp1252';

export class RtfParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RtfParseError';
  }
}

// Bold text at these sizes (half-points) reads as a heading
const HEADING_SIZES: Record<number, HeadingLevel> = { 48: 1, 36: 2, 28: 3 };

const DEFAULT_FONT_SIZE = 24;

// Destinations whose text never reaches the document body
const SKIPPED_DESTINATIONS = new Set([
  'fonttbl',
  'colortbl',
  'stylesheet',
  'info',
  'pict',
  'header',
  'headerl',
  'headerr',
  'headerf',
  'footer',
  'footerl',
  'footerr',
  'footerf',
  'footnote',
  'listtable',
  'listoverridetable',
  'revtbl',
  'rsidtbl',
  'generator',
  'themedata',
  'colorschememapping',
  'latentstyles',
  'datastore',
  'xmlnstbl',
  'object',
  'nonshppict',
]);

const SYMBOL_WORDS: Record<string, string> = {
  emdash: '—',
  endash: '–',
  bullet: '•',
  lquote: '‘',
  rquote: '’',
  ldblquote: '“',
  rdblquote: '”',
  emspace: ' ',
  enspace: ' ',
};

interface Field {
  instruction: string;
  href?: string;
}

interface GroupState {
  bold: boolean;
  italic: boolean;
  strikethrough: boolean;
  underline: boolean;
  highlight: boolean;
  fontSize: number;
  // Set by \outlinelevel; marks a heading whose bold is part of the text
  outlineLevel?: HeadingLevel;
  unicodeSkip: number;
  skip: boolean;
  destination?: 'fldinst';
  field?: Field;
  href?: string;
}

function outlineHeading(param: number | undefined): HeadingLevel | undefined {
  const level = (param ?? 0) + 1;
  return level === 1 || level === 2 || level === 3 ? level : undefined;
}

function initialState(): GroupState {
  return {
    bold: false,
    italic: false,
    strikethrough: false,
    underline: false,
    highlight: false,
    fontSize: DEFAULT_FONT_SIZE,
    unicodeSkip: 1,
    skip: false,
  };
}

const HYPERLINK = /HYPERLINK\s+"([^"]*)"/i;

class RtfDecoder {
  private pos = 0;
  private state: GroupState = initialState();
  private stack: GroupState[] = [];
  private runs: TextRun[] = [];
  // Fallback characters still to drop after a \u escape
  private pendingSkip = 0;
  // \* seen; the next control word decides whether the group is skipped
  private ignorableNext = false;

  constructor(private source: string) {}

  decode(): TextRun[] {
    const start = this.source.search(/\S/);
    if (start < 0 || !this.source.startsWith('{\\rtf', start)) {
      throw new RtfParseError('Missing {\\rtf header');
    }
    this.pos = start;

    let closedRoot = false;
    while (this.pos < this.source.length && !closedRoot) {
      const ch = this.source[this.pos];
      if (ch === '{') {
        this.pos++;
        this.stack.push(this.state);
        this.state = { ...this.state };
        this.pendingSkip = 0;
      } else if (ch === '}') {
        this.pos++;
        this.closeGroup();
        closedRoot = this.stack.length === 0;
      } else if (ch === '\\') {
        this.readControl();
      } else if (ch === '\r' || ch === '\n') {
        this.pos++;
      } else {
        this.pos++;
        this.emit(ch);
      }
    }

    if (!closedRoot) {
      throw new RtfParseError('Unbalanced braces: document ended inside a group');
    }
    return coalesceRuns(this.runs);
  }

  private closeGroup(): void {
    const closing = this.state;
    const parent = this.stack.pop();
    if (!parent) {
      throw new RtfParseError('Unbalanced braces: unexpected }');
    }
    if (closing.destination === 'fldinst' && parent.field) {
      const match = HYPERLINK.exec(parent.field.instruction);
      if (match) parent.field.href = match[1];
    }
    this.state = parent;
    this.pendingSkip = 0;
  }

  private readControl(): void {
    const next = this.source[this.pos + 1];
    if (next === undefined) {
      throw new RtfParseError('Dangling backslash at end of input');
    }

    // Control symbols
    if (!/[a-zA-Z]/.test(next)) {
      this.pos += 2;
      switch (next) {
        case '\\':
        case '{':
        case '}':
          this.emit(next);
          return;
        case '\'': {
          const hex = this.source.slice(this.pos, this.pos + 2);
          this.pos += 2;
          const byte = parseInt(hex, 16);
          if (Number.isNaN(byte)) throw new RtfParseError(`Bad hex escape \\'${hex}`);
          this.emit(decodeCp1252(byte));
          return;
        }
        case '~':
          this.emit(' ');
          return;
        case '_':
          this.emit('‑');
          return;
        case '*':
          this.ignorableNext = true;
          return;
        case '\n':
        case '\r':
          this.emit('\n');
          return;
        default:
          // \- optional hyphen, \: index subentry and friends
          return;
      }
    }

    const match = /^\\([a-zA-Z]+)(-?\d+)? ?/.exec(this.source.slice(this.pos, this.pos + 64));
    if (!match) {
      throw new RtfParseError(`Malformed control word at offset ${this.pos}`);
    }
    this.pos += match[0].length;
    const word = match[1];
    const param = match[2] === undefined ? undefined : parseInt(match[2], 10);

    const ignorable = this.ignorableNext;
    this.ignorableNext = false;

    if (this.pendingSkip > 0 && word !== 'u') {
      this.pendingSkip--;
      return;
    }

    this.applyControlWord(word, param, ignorable);
  }

  private applyControlWord(word: string, param: number | undefined, ignorable: boolean): void {
    const state = this.state;
    const on = param === undefined || param !== 0;

    if (word === 'fldinst') {
      state.destination = 'fldinst';
      return;
    }
    if (ignorable || SKIPPED_DESTINATIONS.has(word)) {
      state.skip = true;
      return;
    }

    switch (word) {
      case 'par':
      case 'line':
      case 'sect':
      case 'page':
        this.emit('\n');
        return;
      case 'tab':
        this.emit('\t');
        return;
      case 'b':
        state.bold = on;
        return;
      case 'i':
        state.italic = on;
        return;
      case 'strike':
      case 'striked':
        state.strikethrough = on;
        return;
      case 'ulnone':
        state.underline = false;
        return;
      case 'highlight':
        state.highlight = (param ?? 0) > 0;
        return;
      case 'fs':
        state.fontSize = param ?? DEFAULT_FONT_SIZE;
        return;
      case 'outlinelevel':
        state.outlineLevel = outlineHeading(param);
        return;
      case 'pard':
        state.outlineLevel = undefined;
        return;
      case 'plain':
        state.bold = false;
        state.italic = false;
        state.strikethrough = false;
        state.underline = false;
        state.highlight = false;
        state.fontSize = DEFAULT_FONT_SIZE;
        return;
      case 'uc':
        state.unicodeSkip = param ?? 1;
        return;
      case 'u': {
        if (param === undefined) return;
        const code = param < 0 ? param + 65536 : param;
        this.emit(String.fromCharCode(code));
        this.pendingSkip = state.unicodeSkip;
        return;
      }
      case 'field':
        state.field = { instruction: '' };
        return;
      case 'fldrslt':
        state.href = state.field?.href ?? this.stack[this.stack.length - 1]?.field?.href;
        return;
      default:
        break;
    }

    if (word.startsWith('ul') && word !== 'ulc') {
      state.underline = on;
      return;
    }
    const symbol = SYMBOL_WORDS[word];
    if (symbol) this.emit(symbol);
  }

  private emit(text: string): void {
    if (this.pendingSkip > 0) {
      this.pendingSkip--;
      return;
    }
    const state = this.state;
    if (state.destination === 'fldinst') {
      const owner = this.nearestField();
      if (owner) owner.instruction += text;
      return;
    }
    if (state.skip) return;

    // Bold text at a heading size reads as a plain heading
    const sizedHeading = state.bold ? HEADING_SIZES[state.fontSize] : undefined;
    const headingLevel = state.outlineLevel ?? sizedHeading;
    const run: TextRun = { text };
    if (state.bold && (state.outlineLevel !== undefined || !sizedHeading)) run.bold = true;
    if (state.italic) run.italic = true;
    if (state.strikethrough) run.strikethrough = true;
    if (state.underline) run.underline = true;
    if (state.highlight) run.highlight = true;
    if (state.href) run.href = state.href;
    if (headingLevel && text !== '\n') run.headingLevel = headingLevel;

    this.runs.push(run);
  }

  private nearestField(): Field | undefined {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const field = this.stack[i].field;
      if (field) return field;
    }
    return undefined;
  }
}

/**
 * Decodes RTF bytes into runs. Throws RtfParseError on input that is not
 * well-formed RTF.
 */
export function rtfToRuns(input: Uint8Array | string): TextRun[] {
  const source = typeof input === 'string' ? input : Buffer.from(input).toString('latin1');
  return new RtfDecoder(source).decode();
}

export type RtfConversionOutcome = 'rtf' | 'plainText' | 'empty';

export interface RtfConversionResult {
  markdown: string;
  outcome: RtfConversionOutcome;
  detail?: string;
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Converts RTF bytes to Markdown without throwing. Input that is not RTF is
 * read as UTF-8 plain text; if that fails too the content comes back empty
 * and the outcome says so.
 */
export function rtfToMarkdown(input: Uint8Array): RtfConversionResult {
  try {
    return { markdown: runsToMarkdown(rtfToRuns(input)), outcome: 'rtf' };
  } catch (rtfError) {
    const detail = rtfError instanceof Error ? rtfError.message : String(rtfError);
    try {
      return { markdown: cleanupMarkdown(strictUtf8.decode(input)), outcome: 'plainText', detail };
    } catch (utf8Error) {
      const reason = utf8Error instanceof Error ? utf8Error.message : String(utf8Error);
      return { markdown: '', outcome: 'empty', detail: `${detail}; ${reason}` };
    }
  }
}
