import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TextDocumentImporter, formatFileSize } from './textDocumentImporter';
import { ImportErrorKind } from '../errors';
import { WarningSeverity } from '../types';

const NOW = new Date('2024-04-10T08:00:00Z');

let tmpDir: string;

function writeFile(name: string, content: string | Uint8Array): string {
  const filePath = path.join(tmpDir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

function importer(): TextDocumentImporter {
  return new TextDocumentImporter({ now: () => NOW });
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'text-import-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('formatFileSize', () => {
  it('picks a unit by magnitude', () => {
    expect(formatFileSize(512)).toBe('512 B');
    expect(formatFileSize(2048)).toBe('2 KB');
    expect(formatFileSize(1.5 * 1024 * 1024)).toBe('1.5 MB');
  });
});

describe('TextDocumentImporter.validate', () => {
  it('reports a missing file', async () => {
    const result = await importer().validate(path.join(tmpDir, 'nope.md'));

    expect(result).toEqual({
      isValid: false,
      documentTitle: 'nope',
      fileSize: 0,
      warnings: [],
      errors: ['File does not exist at nope.md'],
    });
  });

  it('rejects unsupported extensions', async () => {
    const result = await importer().validate(writeFile('scan.pdf', 'data'));

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      'File is not a supported text or markdown document (.md, .markdown, .txt, .rtf)',
    ]);
  });

  it('rejects empty files', async () => {
    const result = await importer().validate(writeFile('empty.txt', ''));

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['File is empty']);
  });

  it('rejects text that is not UTF-8', async () => {
    const result = await importer().validate(writeFile('bad.txt', Uint8Array.from([0x61, 0xff, 0x62])));

    expect(result.isValid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith('Could not read text content: ')).toBe(true);
  });

  it('accepts a readable Markdown file', async () => {
    const result = await importer().validate(writeFile('Chapter.MD', '# Hi'));

    expect(result).toEqual({ isValid: true, documentTitle: 'Chapter', fileSize: 4, warnings: [], errors: [] });
  });
});

describe('TextDocumentImporter.importDocument', () => {
  it('keeps Markdown as written and notes it', async () => {
    const result = await importer().importDocument(writeFile('Chapter 1.md', '# Title\n**Bold** text'));

    expect(result.title).toBe('Chapter 1');
    expect(result.document).toMatchObject({
      title: 'Chapter 1',
      content: '# Title\n**Bold** text',
      creationDate: NOW,
      iconName: 'doc.text.fill',
      colorName: 'Brown',
      includeInCompile: true,
    });
    expect(result.warnings).toEqual([
      { message: 'Markdown syntax is preserved as editable text content.', severity: WarningSeverity.INFO },
    ]);
  });

  it('flattens Markdown without formatting', async () => {
    const result = await importer().importDocument(writeFile('scene.markdown', '# Title\n**Bold** text'), {
      preserveFormatting: false,
    });

    expect(result.document.content).toBe('Title\nBold text');
    expect(result.warnings).toEqual([]);
  });

  it('leaves plain text untouched', async () => {
    const result = await importer().importDocument(writeFile('notes.txt', '*keep*'), { preserveFormatting: false });

    expect(result.document.content).toBe('*keep*');
  });

  it('converts RTF to Markdown', async () => {
    const result = await importer().importDocument(writeFile('draft.rtf', '{\\rtf1 \\b\\fs48 Title\\par\\b0\\fs24 Body}'));

    expect(result.document.content).toBe('# Title\nBody');
    expect(result.warnings).toEqual([]);
  });

  it('imports text that only claims to be RTF', async () => {
    const result = await importer().importDocument(writeFile('fake.rtf', 'Just words'));

    expect(result.document.content).toBe('Just words');
    expect(result.warnings).toEqual([
      {
        message: 'RTF could not be decoded; imported as plain text (Missing {\\rtf header)',
        severity: WarningSeverity.INFO,
      },
    ]);
  });

  it('reports progress in stages', async () => {
    const fractions: number[] = [];

    await importer().importDocument(writeFile('a.txt', 'x'), {}, fraction => fractions.push(fraction));

    expect(fractions).toEqual([0.1, 0.6, 0.9, 1.0]);
  });

  it('fails on an unreadable path', async () => {
    await expect(importer().importDocument(path.join(tmpDir, 'gone.md'))).rejects.toMatchObject({
      kind: ImportErrorKind.FILE_READ_FAILED,
    });
  });
});
