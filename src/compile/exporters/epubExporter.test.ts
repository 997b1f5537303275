import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { SaxesParser } from 'saxes';
import { chapterFilename, exportEpub } from './epubExporter';
import { compilable, makeJob } from '../../testing/projectFixtures';

const DOCUMENTS = [compilable('Opening', 'First para\n\nSecond para'), compilable('Deeper', 'Below', 1, 1)];

async function entry(archive: JSZip, name: string): Promise<string> {
  const file = archive.file(name);
  if (!file) throw new Error(`missing ${name}`);
  return file.async('string');
}

describe('chapterFilename', () => {
  it('pads the one-based index', () => {
    expect(chapterFilename(0)).toBe('chapter-001.xhtml');
    expect(chapterFilename(41)).toBe('chapter-042.xhtml');
  });
});

describe('exportEpub', () => {
  it('stores the mimetype uncompressed as the first entry', async () => {
    const data = exportEpub(makeJob(DOCUMENTS), 'book-1');

    expect(data.readUInt16LE(8)).toBe(0);
    expect(data.subarray(30, 38).toString('latin1')).toBe('mimetype');
    expect(data.subarray(38, 58).toString('latin1')).toBe('application/epub+zip');

    const archive = await JSZip.loadAsync(data);
    expect(Object.keys(archive.files)).toEqual([
      'mimetype',
      'META-INF/container.xml',
      'OEBPS/content.opf',
      'OEBPS/toc.ncx',
      'OEBPS/nav.xhtml',
      'OEBPS/styles.css',
      'OEBPS/title.xhtml',
      'OEBPS/chapter-001.xhtml',
      'OEBPS/chapter-002.xhtml',
    ]);
  });

  it('describes the book in the package document', async () => {
    const archive = await JSZip.loadAsync(exportEpub(makeJob(DOCUMENTS), 'book-1'));
    const opf = await entry(archive, 'OEBPS/content.opf');

    expect(opf).toContain('<dc:identifier id="bookid">urn:uuid:book-1</dc:identifier>');
    expect(opf).toContain('<dc:title>The Book</dc:title>');
    expect(opf).toContain('<dc:creator>Jane Placeholder</dc:creator>');
    expect(opf).toContain('<meta property="dcterms:modified">2024-03-05T10:00:00Z</meta>');
    expect(opf).toContain(
      '    <itemref idref="chapter-0"/>\n    <itemref idref="chapter-1"/>\n    <itemref idref="chapter-2"/>\n  </spine>'
    );
    expect(opf).toContain('<item id="chapter-1" href="chapter-001.xhtml" media-type="application/xhtml+xml"/>');

    const ncx = await entry(archive, 'OEBPS/toc.ncx');
    expect(ncx).toContain('<meta name="dtb:uid" content="urn:uuid:book-1"/>');
    expect(ncx).toContain('<navPoint id="navpoint-3" playOrder="3">');

    const nav = await entry(archive, 'OEBPS/nav.xhtml');
    expect(nav).toContain('<li><a href="title.xhtml">Title Page</a></li>');
  });

  it('renders chapters with headings by depth', async () => {
    const archive = await JSZip.loadAsync(exportEpub(makeJob(DOCUMENTS), 'book-1'));

    expect(await entry(archive, 'OEBPS/chapter-001.xhtml')).toContain(
      '<body>\n<h1>Opening</h1>\n<p class="first">First para</p>\n<p>Second para</p>\n</body>'
    );
    expect(await entry(archive, 'OEBPS/chapter-002.xhtml')).toContain(
      '<body>\n<h2>Deeper</h2>\n<p class="first">Below</p>\n</body>'
    );
    expect(await entry(archive, 'OEBPS/title.xhtml')).toContain(
      '<h1>The Book</h1>\n    <p class="author">by Jane Placeholder</p>'
    );
  });

  it('adds a contents page and follows font settings', async () => {
    const job = makeJob(DOCUMENTS, {
      includeTitlePage: false,
      includeTableOfContents: true,
      fontStyle: 'monospace',
      fontSize: 11.5,
      lineSpacing: 2,
    });
    const archive = await JSZip.loadAsync(exportEpub(job, 'book-1'));

    expect(archive.file('OEBPS/title.xhtml')).toBeNull();
    expect(await entry(archive, 'OEBPS/toc-page.xhtml')).toContain(
      '  <p><a href="chapter-001.xhtml">Opening</a></p>\n' +
        '  <p style="margin-left: 20px"><a href="chapter-002.xhtml">Deeper</a></p>'
    );

    const css = await entry(archive, 'OEBPS/styles.css');
    expect(css).toContain("font-family: Menlo, Monaco, 'Courier New', monospace;\n  font-size: 11pt;\n  line-height: 2;");
  });

  it('escapes titles in markup', async () => {
    const archive = await JSZip.loadAsync(exportEpub(makeJob([compilable('Cats & Dogs', '')]), 'book-1'));

    expect(await entry(archive, 'OEBPS/chapter-001.xhtml')).toContain('<title>Cats &amp; Dogs</title>');
  });
});

describe('exportEpub with control characters', () => {
  it('writes XHTML and package files a parser accepts', async () => {
    const job = makeJob([compilable('Bad\u000Btitle', 'Some\u0001 text')]);
    job.title = 'The\u0002 Book';
    const archive = await JSZip.loadAsync(exportEpub(job, 'book-1'));

    for (const name of ['OEBPS/content.opf', 'OEBPS/toc.ncx', 'OEBPS/nav.xhtml', 'OEBPS/title.xhtml', 'OEBPS/chapter-001.xhtml']) {
      const xml = await entry(archive, name);
      expect(() => new SaxesParser().write(xml).close()).not.toThrow();
    }
    expect(await entry(archive, 'OEBPS/chapter-001.xhtml')).toContain('Some text');
    expect(await entry(archive, 'OEBPS/content.opf')).toContain('<dc:title>The Book</dc:title>');
  });
});
