/**
 * Single-column PDF 1.4 output.
 *
 * Text is set in the standard 14 fonts with WinAnsiEncoding, so nothing is
 * embedded. Line breaking measures with a per-family average glyph width
 * rather than real font metrics; Courier is exact, the proportional faces
 * are close enough for manuscript drafts. Inline Markdown styling is dropped.
 */

import { CompileJob, reportProcessing } from '../types';
import { CompileFontStyle, CompileSettings, PAGE_DIMENSIONS } from '../settings';
import { CompileError } from '../../errors';
import { markdownToRuns } from '../../richtext/markdownBridge';
import { plainText } from '../../richtext/runs';
import { encodeCp1252 } from '../../richtext/cp1252';

interface PdfFontFamily {
  regular: string;
  bold: string;
  // Average advance width as a fraction of the font size
  widthFactor: number;
}

const FONT_FAMILIES: Record<CompileFontStyle, PdfFontFamily> = {
  serif: { regular: 'Times-Roman', bold: 'Times-Bold', widthFactor: 0.5 },
  sansSerif: { regular: 'Helvetica', bold: 'Helvetica-Bold', widthFactor: 0.55 },
  monospace: { regular: 'Courier', bold: 'Courier-Bold', widthFactor: 0.6 },
};

type FontKey = 'F1' | 'F2';

const TITLE_SIZE = 36;
const AUTHOR_SIZE = 18;
const PAGE_NUMBER_SIZE = 10;
const PAGE_NUMBER_BASELINE = 36;

/**
 * Encodes text as a PDF literal string in WinAnsi. Characters outside
 * Windows-1252 become "?".
 */
export function pdfString(text: string): string {
  let out = '(';
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0x3f;
    const byte = encodeCp1252(codePoint) ?? 0x3f;
    if (byte === 0x28 || byte === 0x29 || byte === 0x5c) {
      out += '\\' + String.fromCharCode(byte);
    } else if (byte < 0x20 || byte > 0x7e) {
      out += '\\' + byte.toString(8).padStart(3, '0');
    } else {
      out += String.fromCharCode(byte);
    }
  }
  return out + ')';
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2).replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Greedy word wrap. Words wider than the line are split by character.
 */
export function wrapText(text: string, maxWidth: number, measure: (text: string) => number): string[] {
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter(part => part.length > 0)) {
    const candidate = current ? `${current} ${word}` : word;
    if (measure(candidate) <= maxWidth) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);

    let rest = [...word];
    while (rest.length > 1 && measure(rest.join('')) > maxWidth) {
      let fit = 1;
      while (fit < rest.length && measure(rest.slice(0, fit + 1).join('')) <= maxWidth) fit++;
      lines.push(rest.slice(0, fit).join(''));
      rest = rest.slice(fit);
    }
    current = rest.join('');
  }

  if (current) lines.push(current);
  return lines;
}

interface PdfPage {
  operations: string[];
  numbered: boolean;
}

/**
 * Cursor-based page builder. The cursor is the top of the next line, in PDF
 * coordinates (origin bottom-left).
 */
class PageLayout {
  readonly pages: PdfPage[] = [];
  private cursor = 0;
  private readonly width: number;
  private readonly height: number;
  private readonly family: PdfFontFamily;

  constructor(private readonly settings: CompileSettings) {
    const page = PAGE_DIMENSIONS[settings.pageSize];
    this.width = page.width;
    this.height = page.height;
    this.family = FONT_FAMILIES[settings.fontStyle];
  }

  get pageWidth(): number {
    return this.width;
  }

  get pageHeight(): number {
    return this.height;
  }

  get contentWidth(): number {
    return this.width - this.settings.margins.leading - this.settings.margins.trailing;
  }

  get atTopOfPage(): boolean {
    return this.cursor === this.height - this.settings.margins.top;
  }

  measure(text: string, size: number): number {
    return [...text].length * size * this.family.widthFactor;
  }

  newPage(numbered = true): void {
    this.pages.push({ operations: [], numbered });
    this.cursor = this.height - this.settings.margins.top;
  }

  /**
   * Draws text at an absolute baseline, ignoring the cursor
   */
  drawAt(text: string, font: FontKey, size: number, x: number, baseline: number): void {
    const page = this.pages[this.pages.length - 1];
    if (!page) return;
    page.operations.push(
      `BT /${font} ${formatNumber(size)} Tf ${formatNumber(x)} ${formatNumber(baseline)} Td ${pdfString(text)} Tj ET`
    );
  }

  line(text: string, font: FontKey, size: number, options: { indent?: number; centered?: boolean } = {}): void {
    const lineHeight = size * this.settings.lineSpacing;
    if (this.pages.length === 0 || this.cursor - lineHeight < this.settings.margins.bottom) {
      this.newPage();
    }
    const x = options.centered
      ? (this.width - this.measure(text, size)) / 2
      : this.settings.margins.leading + (options.indent ?? 0);
    this.drawAt(text, font, size, x, this.cursor - size);
    this.cursor -= lineHeight;
  }

  paragraph(text: string, font: FontKey, size: number, indent = 0): void {
    const lines = wrapText(text, this.contentWidth - indent, value => this.measure(value, size));
    for (const line of lines) this.line(line, font, size, { indent });
  }

  space(points: number): void {
    this.cursor -= points;
  }
}

function drawTitlePage(layout: PageLayout, title: string, author: string): void {
  layout.newPage(false);
  const centerX = (text: string, size: number): number => (layout.pageWidth - layout.measure(text, size)) / 2;
  layout.drawAt(title, 'F2', TITLE_SIZE, centerX(title, TITLE_SIZE), layout.pageHeight - 300);
  if (author) {
    const byline = `by ${author}`;
    layout.drawAt(byline, 'F1', AUTHOR_SIZE, centerX(byline, AUTHOR_SIZE), layout.pageHeight - 360);
  }
}

function layOutDocuments(job: CompileJob, layout: PageLayout): void {
  const { documents, settings } = job;
  const size = settings.fontSize;
  const headingSize = size + 6;

  if (settings.includeTableOfContents) {
    layout.newPage();
    layout.paragraph('Table of Contents', 'F2', headingSize);
    layout.space(size);
    for (const doc of documents) {
      layout.paragraph(doc.title, 'F1', size, doc.depth * 20);
    }
  }

  layout.newPage();
  documents.forEach((doc, index) => {
    reportProcessing(job, index);

    if (index > 0) {
      switch (settings.documentSeparator) {
        case 'pageBreak':
        case 'chapterHeading':
          layout.newPage();
          break;
        case 'threeAsterisks':
          layout.space(size);
          layout.line('* * *', 'F1', size, { centered: true });
          layout.space(size);
          break;
        case 'blankLine':
          layout.space(size * settings.lineSpacing);
          break;
        case 'none':
          break;
      }
    }

    if (settings.includeChapterTitles && doc.title) {
      if (!layout.atTopOfPage) layout.space(size * 2);
      layout.paragraph(doc.title, 'F2', headingSize);
      layout.space(size);
    }

    for (const block of doc.content.trim().split(/\n\s*\n/)) {
      if (!block.trim()) continue;
      for (const line of block.split('\n')) {
        layout.paragraph(plainText(markdownToRuns(line)), 'F1', size);
      }
      layout.space(size);
    }
  });
}

function infoDate(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `D:${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}

/**
 * Serializes objects 1..n with a classic cross-reference table. Every
 * character is below 0x100, so string length equals byte length.
 */
function assemblePdf(objects: string[]): Buffer {
  let output = '%PDF-1.4\n%âãÏÓ\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(output.length);
    output += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = output.length;
  output += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    output += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  output += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Info 5 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(output, 'latin1');
}

export function exportPdf(job: CompileJob): Buffer {
  const { settings, title, author } = job;
  job.onProgress?.({ currentDocument: 0, totalDocuments: job.documents.length, phase: 'generating' });

  const layout = new PageLayout(settings);
  if (layout.contentWidth <= settings.fontSize) {
    throw CompileError.pdfGenerationFailed('margins leave no room for text');
  }
  if (settings.includeTitlePage) {
    drawTitlePage(layout, title, author);
  }
  layOutDocuments(job, layout);

  const family = FONT_FAMILIES[settings.fontStyle];
  const pageObjects: string[] = [];
  const kids: string[] = [];
  const firstPageObject = 6;

  layout.pages.forEach((page, index) => {
    const operations = [...page.operations];
    if (settings.includePageNumbers && page.numbered) {
      const label = String(index + 1);
      const x = (layout.pageWidth - layout.measure(label, PAGE_NUMBER_SIZE)) / 2;
      operations.push(
        `BT /F1 ${PAGE_NUMBER_SIZE} Tf ${formatNumber(x)} ${PAGE_NUMBER_BASELINE} Td ${pdfString(label)} Tj ET`
      );
    }
    const stream = operations.join('\n');
    const contentNumber = firstPageObject + index * 2;
    pageObjects.push(`<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`);
    pageObjects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 ${layout.pageWidth} ${layout.pageHeight}] ` +
        `/Resources << /Font << /F1 3 0 R /F2 4 0 R >> >> /Contents ${contentNumber} 0 R >>`
    );
    kids.push(`${contentNumber + 1} 0 R`);
  });

  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${kids.join(' ')}] /Count ${kids.length} >>`,
    `<< /Type /Font /Subtype /Type1 /BaseFont /${family.regular} /Encoding /WinAnsiEncoding >>`,
    `<< /Type /Font /Subtype /Type1 /BaseFont /${family.bold} /Encoding /WinAnsiEncoding >>`,
    `<< /Title ${pdfString(title)} /Author ${pdfString(author)} /Producer (BinderInterchange) /CreationDate ${pdfString(infoDate(job.now))} >>`,
    ...pageObjects,
  ];

  job.onProgress?.({ currentDocument: job.documents.length, totalDocuments: job.documents.length, phase: 'complete' });
  return assemblePdf(objects);
}
