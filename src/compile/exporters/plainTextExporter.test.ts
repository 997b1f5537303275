import { describe, it, expect } from 'vitest';
import { exportPlainText, stripMarkdownFormatting } from './plainTextExporter';
import { compilable, makeJob } from '../../testing/projectFixtures';

const DOCUMENTS = [compilable('Opening', 'Hello *there*'), compilable('Deeper', 'Below', 1, 1)];

describe('exportPlainText', () => {
  it('underlines the title and chapter headings', () => {
    const output = exportPlainText(makeJob(DOCUMENTS)).toString('utf-8');

    expect(output).toBe(
      'THE BOOK\n========\n\n' +
        'by Jane Placeholder\n\n' +
        'OPENING\n-------\n\n' +
        'Hello there\n' +
        '\n\n' +
        'DEEPER\n------\n\n' +
        'Below\n'
    );
  });

  it('lists contents with bullets and uses a rule for page breaks', () => {
    const job = makeJob(DOCUMENTS, { includeTableOfContents: true, documentSeparator: 'pageBreak' });
    job.author = '';
    const rule = '-'.repeat(40);

    expect(exportPlainText(job).toString('utf-8')).toBe(
      'THE BOOK\n========\n\n' +
        'TABLE OF CONTENTS\n-----------------\n\n' +
        '• Opening\n' +
        '  • Deeper\n' +
        `\n${rule}\n\n` +
        'OPENING\n-------\n\n' +
        'Hello there\n' +
        `\n\n${rule}\n\n` +
        'DEEPER\n------\n\n' +
        'Below\n'
    );
  });

  it('underlines by code point', () => {
    const job = makeJob([compilable('Café', '')]);
    job.title = 'Café';
    job.author = '';

    expect(exportPlainText(job).toString('utf-8')).toBe('CAFÉ\n====\n\nCAFÉ\n----\n\n');
  });
});

describe('stripMarkdownFormatting', () => {
  it('keeps the text inside markers and links', () => {
    expect(stripMarkdownFormatting('# Head\n**b** and ~~gone~~ [link](http://example.test)')).toBe(
      'Head\nb and gone link'
    );
  });

  it('turns underscores into spaces', () => {
    expect(stripMarkdownFormatting('_x_')).toBe(' x ');
  });

  it('removes underline tags and highlight markers', () => {
    expect(stripMarkdownFormatting('<u>under</u> ==mark==')).toBe('under mark');
  });
});
