import { describe, it, expect } from 'vitest';
import { RtfParseError, rtfToMarkdown, rtfToRuns } from './rtfReader';

describe('rtfToRuns', () => {
  it('reads character formatting and skips the font table', () => {
    const rtf = '{\\rtf1\\ansi {\\fonttbl\\f0 Helvetica;}\\f0 Hello \\b bold\\b0  world\\par}';
    expect(rtfToRuns(rtf)).toEqual([{ text: 'Hello ' }, { text: 'bold', bold: true }, { text: ' world\n' }]);
  });

  it('decodes unicode escapes and drops their fallback characters', () => {
    expect(rtfToRuns('{\\rtf1\\uc1 caf\\u233 e}')).toEqual([{ text: 'café' }]);
  });

  it('decodes code page 1252 hex escapes', () => {
    expect(rtfToRuns("{\\rtf1 \\'93quoted\\'94}")).toEqual([{ text: '“quoted”' }]);
  });

  it('turns HYPERLINK fields into linked runs', () => {
    const rtf = '{\\rtf1 {\\field{\\*\\fldinst{HYPERLINK "https://example.com"}}{\\fldrslt link}}}';
    expect(rtfToRuns(rtf)).toEqual([{ text: 'link', href: 'https://example.com' }]);
  });

  it('skips ignorable destinations', () => {
    expect(rtfToRuns('{\\rtf1 {\\*\\generator Some Tool;}Body}')).toEqual([{ text: 'Body' }]);
  });

  it('rejects input without an RTF header', () => {
    expect(() => rtfToRuns('plain text')).toThrow(RtfParseError);
  });

  it('rejects unbalanced groups', () => {
    expect(() => rtfToRuns('{\\rtf1 open')).toThrow('Unbalanced braces');
  });
});

describe('rtfToMarkdown', () => {
  it('maps large bold text to headings', () => {
    const result = rtfToMarkdown(Buffer.from('{\\rtf1 \\b\\fs48 Title\\par\\b0\\fs24 Body}', 'latin1'));
    expect(result).toEqual({ markdown: '# Title\nBody', outcome: 'rtf' });
  });

  it('keeps bold on headings marked with an outline level', () => {
    const result = rtfToMarkdown(
      Buffer.from('{\\rtf1 \\b\\fs36\\outlinelevel1 Part\\par\\pard\\b0\\fs24 Body}', 'latin1')
    );
    expect(result).toEqual({ markdown: '## **Part**\nBody', outcome: 'rtf' });
  });

  it('falls back to UTF-8 text', () => {
    const result = rtfToMarkdown(Buffer.from('Just words'));
    expect(result.outcome).toBe('plainText');
    expect(result.markdown).toBe('Just words');
    expect(result.detail).toBe('Missing {\\rtf header');
  });

  it('gives up with empty content on undecodable bytes', () => {
    const result = rtfToMarkdown(Uint8Array.from([0xff, 0xfe, 0x00]));
    expect(result.outcome).toBe('empty');
    expect(result.markdown).toBe('');
  });
});
