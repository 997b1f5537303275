import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { SaxesParser } from 'saxes';
import { buildStylesXml, exportDocx, runProperties } from './docxExporter';
import { parseCompileSettings } from '../settings';
import { compilable, makeJob } from '../../testing/projectFixtures';

async function entry(archive: JSZip, name: string): Promise<string> {
  const file = archive.file(name);
  if (!file) throw new Error(`missing ${name}`);
  return file.async('string');
}

describe('runProperties', () => {
  it('lists formatting in a fixed order', () => {
    expect(runProperties({ text: 'x', underline: true, bold: true, highlight: true })).toBe(
      '<w:rPr><w:b/><w:highlight w:val="yellow"/><w:u w:val="single"/></w:rPr>'
    );
    expect(runProperties({ text: 'x' })).toBe('');
  });
});

describe('buildStylesXml', () => {
  it('derives sizes and spacing from settings', () => {
    const styles = buildStylesXml(parseCompileSettings({}));

    expect(styles).toContain('<w:rFonts w:ascii="Georgia" w:hAnsi="Georgia"/><w:sz w:val="24"/>');
    expect(styles).toContain('<w:spacing w:line="360" w:lineRule="auto"/>');
    expect(styles).toContain(
      '<w:style w:type="paragraph" w:styleId="Heading1">\n' +
        '    <w:name w:val="Heading 1"/>\n' +
        '    <w:basedOn w:val="Normal"/>\n' +
        '    <w:pPr><w:spacing w:before="480" w:after="240"/></w:pPr>\n' +
        '    <w:rPr><w:b/><w:sz w:val="36"/></w:rPr>'
    );
  });
});

describe('exportDocx', () => {
  it('writes the package parts in order', async () => {
    const archive = await JSZip.loadAsync(exportDocx(makeJob([compilable('Opening', 'Text')])));

    expect(Object.keys(archive.files)).toEqual([
      '[Content_Types].xml',
      '_rels/.rels',
      'word/_rels/document.xml.rels',
      'word/document.xml',
      'word/styles.xml',
      'word/footer1.xml',
      'docProps/core.xml',
      'docProps/app.xml',
    ]);
    expect(await entry(archive, 'docProps/core.xml')).toContain(
      '<dcterms:created xsi:type="dcterms:W3CDTF">2024-03-05T10:00:00Z</dcterms:created>'
    );
  });

  it('leaves out the footer without page numbers', async () => {
    const job = makeJob([compilable('Opening', 'Text')], { includePageNumbers: false });
    const archive = await JSZip.loadAsync(exportDocx(job));

    expect(archive.file('word/footer1.xml')).toBeNull();
    expect(await entry(archive, '[Content_Types].xml')).not.toContain('footer1.xml');
    const documentXml = await entry(archive, 'word/document.xml');
    expect(documentXml).toContain(
      '<w:sectPr><w:pgSz w:w="12240" w:h="15840"/>' +
        '<w:pgMar w:top="1440" w:right="1440" w:bottom="1440" w:left="1440" w:header="720" w:footer="720" w:gutter="0"/>' +
        '</w:sectPr>'
    );
  });

  it('writes a centered title page followed by a page break', async () => {
    const archive = await JSZip.loadAsync(exportDocx(makeJob([compilable('Opening', 'Text')])));
    const documentXml = await entry(archive, 'word/document.xml');

    expect(documentXml).toContain(
      '<w:p><w:pPr><w:pStyle w:val="Title"/><w:jc w:val="center"/></w:pPr>' +
        '<w:r><w:t xml:space="preserve">The Book</w:t></w:r></w:p>\n'
    );
    expect(documentXml).toContain(
      '<w:p><w:pPr><w:pStyle w:val="Subtitle"/><w:jc w:val="center"/></w:pPr>' +
        '<w:r><w:t xml:space="preserve">by Jane Placeholder</w:t></w:r></w:p>\n' +
        '<w:p><w:r><w:br w:type="page"/></w:r></w:p>\n' +
        '<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr>' +
        '<w:r><w:t xml:space="preserve">Opening</w:t></w:r></w:p>\n'
    );
    expect(documentXml).toContain('<w:footerReference w:type="default" r:id="rId2"/>');
    expect(documentXml).toContain('<w:pgNumType w:start="1"/>');
  });

  it('converts Markdown paragraphs, breaks and links', async () => {
    const job = makeJob(
      [compilable('Opening', '# Big\n\nSee [site](http://example.test/a?b=1&c=2) **now**\nnext line')],
      { includeTitlePage: false, includeChapterTitles: false }
    );
    const archive = await JSZip.loadAsync(exportDocx(job));
    const documentXml = await entry(archive, 'word/document.xml');

    expect(documentXml).toContain(
      '<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr><w:r><w:t xml:space="preserve">Big</w:t></w:r></w:p>\n'
    );
    expect(documentXml).toContain(
      '<w:p><w:pPr><w:pStyle w:val="Normal"/></w:pPr>' +
        '<w:r><w:t xml:space="preserve">See </w:t></w:r>' +
        '<w:hyperlink r:id="rId3"><w:r><w:rPr><w:color w:val="0563C1"/><w:u w:val="single"/></w:rPr>' +
        '<w:t xml:space="preserve">site</w:t></w:r></w:hyperlink>' +
        '<w:r><w:t xml:space="preserve"> </w:t></w:r>' +
        '<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">now</w:t></w:r>' +
        '<w:r><w:br/></w:r>' +
        '<w:r><w:t xml:space="preserve">next line</w:t></w:r></w:p>\n'
    );

    expect(await entry(archive, 'word/_rels/document.xml.rels')).toContain(
      '<Relationship Id="rId3" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink" ' +
        'Target="http://example.test/a?b=1&amp;c=2" TargetMode="External"/>'
    );
  });

  it('separates documents and lists contents', async () => {
    const job = makeJob([compilable('One', 'a'), compilable('Two', 'b', 1, 1)], {
      includeTitlePage: false,
      includeTableOfContents: true,
      documentSeparator: 'threeAsterisks',
    });
    const archive = await JSZip.loadAsync(exportDocx(job));
    const documentXml = await entry(archive, 'word/document.xml');

    expect(documentXml).toContain(
      '<w:p><w:pPr><w:pStyle w:val="TOC1"/></w:pPr><w:r><w:t xml:space="preserve">One</w:t></w:r></w:p>\n' +
        '<w:p><w:pPr><w:pStyle w:val="TOC2"/></w:pPr><w:r><w:t xml:space="preserve">    Two</w:t></w:r></w:p>\n' +
        '<w:p><w:r><w:br w:type="page"/></w:r></w:p>\n'
    );
    expect(documentXml).toContain(
      '<w:p><w:pPr><w:pStyle w:val="Normal"/><w:jc w:val="center"/></w:pPr>' +
        '<w:r><w:t xml:space="preserve">* * *</w:t></w:r></w:p>\n' +
        '<w:p><w:pPr><w:pStyle w:val="Heading2"/></w:pPr><w:r><w:t xml:space="preserve">Two</w:t></w:r></w:p>\n'
    );
  });
});

describe('exportDocx with control characters', () => {
  it('writes XML parts a parser accepts', async () => {
    const job = makeJob([compilable('Bad\u000Btitle', 'Some\u0001 text')]);
    job.title = 'The\u0002 Book';
    const archive = await JSZip.loadAsync(exportDocx(job));

    for (const name of ['word/document.xml', 'docProps/core.xml']) {
      const xml = await entry(archive, name);
      expect(() => new SaxesParser().write(xml).close()).not.toThrow();
    }
    const document = await entry(archive, 'word/document.xml');
    expect(document).toContain('Badtitle');
    expect(document).toContain('Some text');
  });
});
