/**
 * DOCX (Office Open XML) output: a ZIP of WordprocessingML parts.
 *
 * Relationship ids in word/_rels/document.xml.rels are fixed for styles
 * (rId1) and the page-number footer (rId2); hyperlinks are numbered from rId3
 * in order of first use.
 */

import { CompilableDocument, CompileJob, reportProcessing } from '../types';
import { CompileSettings, DocumentSeparator, FONT_NAMES, PAGE_DIMENSIONS } from '../settings';
import { ZipArchiveWriter } from '../../archive/zipArchiveWriter';
import { markdownToRuns } from '../../richtext/markdownBridge';
import { TextRun, splitLines } from '../../richtext/runs';
import { escapeXml } from '../../util/xml';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const R_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const REL_TYPE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

const STYLES_REL_ID = 'rId1';
const FOOTER_REL_ID = 'rId2';
const FIRST_LINK_REL_ID = 3;

const HYPERLINK_RPR = '<w:rPr><w:color w:val="0563C1"/><w:u w:val="single"/></w:rPr>';

/**
 * Hyperlink targets collected while the body is generated
 */
class LinkRelationships {
  private readonly ids = new Map<string, string>();

  idFor(url: string): string {
    let id = this.ids.get(url);
    if (!id) {
      id = `rId${FIRST_LINK_REL_ID + this.ids.size}`;
      this.ids.set(url, id);
    }
    return id;
  }

  entries(): Array<[string, string]> {
    return [...this.ids.entries()];
  }
}

// Twentieths of a point
const twips = (points: number): number => Math.trunc(points * 20);

export function runProperties(run: TextRun): string {
  const parts: string[] = [];
  if (run.bold) parts.push('<w:b/>');
  if (run.italic) parts.push('<w:i/>');
  if (run.strikethrough) parts.push('<w:strike/>');
  if (run.highlight) parts.push('<w:highlight w:val="yellow"/>');
  if (run.underline) parts.push('<w:u w:val="single"/>');
  return parts.length > 0 ? `<w:rPr>${parts.join('')}</w:rPr>` : '';
}

function textRun(text: string, rPr = ''): string {
  return `<w:r>${rPr}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

function runsXml(runs: TextRun[], links: LinkRelationships): string {
  return runs
    .map(run =>
      run.href
        ? `<w:hyperlink r:id="${links.idFor(run.href)}">${textRun(run.text, HYPERLINK_RPR)}</w:hyperlink>`
        : textRun(run.text, runProperties(run))
    )
    .join('');
}

function paragraphXml(content: string, style: string, centered = false): string {
  const alignment = centered ? '<w:jc w:val="center"/>' : '';
  return `<w:p><w:pPr><w:pStyle w:val="${style}"/>${alignment}</w:pPr>${content}</w:p>\n`;
}

function plainParagraph(text: string, style: string, centered = false): string {
  return paragraphXml(textRun(text), style, centered);
}

const PAGE_BREAK = '<w:p><w:r><w:br w:type="page"/></w:r></w:p>\n';

/**
 * One Markdown paragraph. A lone heading line takes the matching heading
 * style; other line breaks inside the paragraph become w:br.
 */
function contentParagraph(block: string, links: LinkRelationships): string {
  const lines = splitLines(markdownToRuns(block));
  const headingLevel = lines.length === 1 ? lines[0][0]?.headingLevel : undefined;
  if (headingLevel) {
    const runs = lines[0].map(run => ({ ...run, headingLevel: undefined }));
    return paragraphXml(runsXml(runs, links), `Heading${headingLevel}`);
  }
  const content = lines.map(line => runsXml(line, links)).join('<w:r><w:br/></w:r>');
  return paragraphXml(content, 'Normal');
}

function separatorXml(separator: DocumentSeparator): string {
  switch (separator) {
    case 'none':
      return '';
    case 'blankLine':
      return plainParagraph('', 'Normal');
    case 'threeAsterisks':
      return plainParagraph('* * *', 'Normal', true);
    case 'pageBreak':
    case 'chapterHeading':
      return PAGE_BREAK;
  }
}

function titlePageXml(title: string, author: string): string {
  let xml = plainParagraph('', 'Normal').repeat(6);
  xml += plainParagraph(title, 'Title', true);
  if (author) {
    xml += plainParagraph('', 'Normal');
    xml += plainParagraph(`by ${author}`, 'Subtitle', true);
  }
  return xml;
}

function tableOfContentsXml(documents: CompilableDocument[]): string {
  let xml = plainParagraph('Table of Contents', 'Heading1');
  for (const doc of documents) {
    xml += plainParagraph(`${'    '.repeat(doc.depth)}${doc.title}`, `TOC${Math.min(doc.depth + 1, 3)}`);
  }
  return xml;
}

function sectionPropertiesXml(settings: CompileSettings): string {
  const page = PAGE_DIMENSIONS[settings.pageSize];
  const { top, trailing, bottom, leading } = settings.margins;
  const footer = settings.includePageNumbers ? `<w:footerReference w:type="default" r:id="${FOOTER_REL_ID}"/>` : '';
  const pageNumbers = settings.includePageNumbers ? '<w:pgNumType w:start="1"/>' : '';
  return (
    `<w:sectPr>${footer}` +
    `<w:pgSz w:w="${twips(page.width)}" w:h="${twips(page.height)}"/>` +
    `<w:pgMar w:top="${twips(top)}" w:right="${twips(trailing)}" w:bottom="${twips(bottom)}" w:left="${twips(leading)}" w:header="720" w:footer="720" w:gutter="0"/>` +
    `${pageNumbers}</w:sectPr>`
  );
}

function buildDocumentXml(job: CompileJob, links: LinkRelationships): string {
  const { documents, settings, title, author } = job;
  let body = '';

  if (settings.includeTitlePage) {
    body += titlePageXml(title, author);
    if (settings.includeTableOfContents || documents.length > 0) body += PAGE_BREAK;
  }

  if (settings.includeTableOfContents) {
    body += tableOfContentsXml(documents);
    if (documents.length > 0) body += PAGE_BREAK;
  }

  documents.forEach((doc, index) => {
    reportProcessing(job, index);

    if (settings.includeChapterTitles && doc.title) {
      body += plainParagraph(doc.title, doc.depth === 0 ? 'Heading1' : 'Heading2');
    }

    for (const paragraph of doc.content.split('\n\n')) {
      const trimmed = paragraph.trim();
      if (trimmed) body += contentParagraph(trimmed, links);
    }

    if (index < documents.length - 1) {
      body += separatorXml(settings.documentSeparator);
    }
  });

  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="${W_NS}" xmlns:r="${R_NS}">
<w:body>
${body}${sectionPropertiesXml(settings)}
</w:body>
</w:document>
`;
}

function buildContentTypesXml(withFooter: boolean): string {
  const footer = withFooter
    ? '\n  <Override PartName="/word/footer1.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.footer+xml"/>'
    : '';
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
  <Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>${footer}
  <Override PartName="/docProps/core.xml" ContentType="application/vnd.openxmlformats-package.core-properties+xml"/>
  <Override PartName="/docProps/app.xml" ContentType="application/vnd.openxmlformats-officedocument.extended-properties+xml"/>
</Types>
`;
}

function buildPackageRelsXml(): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="${REL_TYPE}/officeDocument" Target="word/document.xml"/>
  <Relationship Id="rId2" Type="http://schemas.openxmlformats.org/package/2006/relationships/metadata/core-properties" Target="docProps/core.xml"/>
  <Relationship Id="rId3" Type="${REL_TYPE}/extended-properties" Target="docProps/app.xml"/>
</Relationships>
`;
}

function buildDocumentRelsXml(withFooter: boolean, links: LinkRelationships): string {
  let xml = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="${STYLES_REL_ID}" Type="${REL_TYPE}/styles" Target="styles.xml"/>
`;
  if (withFooter) {
    xml += `  <Relationship Id="${FOOTER_REL_ID}" Type="${REL_TYPE}/footer" Target="footer1.xml"/>\n`;
  }
  for (const [url, id] of links.entries()) {
    xml += `  <Relationship Id="${id}" Type="${REL_TYPE}/hyperlink" Target="${escapeXml(url)}" TargetMode="External"/>\n`;
  }
  return xml + '</Relationships>\n';
}

function buildFooterXml(): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:ftr xmlns:w="${W_NS}" xmlns:r="${R_NS}">
<w:p><w:pPr><w:jc w:val="center"/></w:pPr><w:r><w:fldChar w:fldCharType="begin"/></w:r><w:r><w:instrText xml:space="preserve"> PAGE </w:instrText></w:r><w:r><w:fldChar w:fldCharType="separate"/></w:r><w:r><w:t>1</w:t></w:r><w:r><w:fldChar w:fldCharType="end"/></w:r></w:p>
</w:ftr>
`;
}

function headingStyle(id: string, name: string, before: number, after: number, size: number): string {
  return `  <w:style w:type="paragraph" w:styleId="${id}">
    <w:name w:val="${name}"/>
    <w:basedOn w:val="Normal"/>
    <w:pPr><w:spacing w:before="${before}" w:after="${after}"/></w:pPr>
    <w:rPr><w:b/><w:sz w:val="${size}"/></w:rPr>
  </w:style>
`;
}

export function buildStylesXml(settings: CompileSettings): string {
  const fontName = FONT_NAMES[settings.fontStyle];
  const fontSize = Math.trunc(settings.fontSize * 2); // half-points
  const lineSpacing = Math.trunc(settings.lineSpacing * 240);

  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:styles xmlns:w="${W_NS}">
  <w:docDefaults>
    <w:rPrDefault><w:rPr><w:rFonts w:ascii="${escapeXml(fontName)}" w:hAnsi="${escapeXml(fontName)}"/><w:sz w:val="${fontSize}"/></w:rPr></w:rPrDefault>
    <w:pPrDefault><w:pPr><w:spacing w:line="${lineSpacing}" w:lineRule="auto"/></w:pPr></w:pPrDefault>
  </w:docDefaults>
  <w:style w:type="paragraph" w:styleId="Normal" w:default="1">
    <w:name w:val="Normal"/>
    <w:pPr><w:spacing w:after="200"/></w:pPr>
  </w:style>
  <w:style w:type="paragraph" w:styleId="Title">
    <w:name w:val="Title"/>
    <w:basedOn w:val="Normal"/>
    <w:pPr><w:spacing w:after="300"/><w:jc w:val="center"/></w:pPr>
    <w:rPr><w:b/><w:sz w:val="72"/></w:rPr>
  </w:style>
  <w:style w:type="paragraph" w:styleId="Subtitle">
    <w:name w:val="Subtitle"/>
    <w:basedOn w:val="Normal"/>
    <w:pPr><w:jc w:val="center"/></w:pPr>
    <w:rPr><w:i/><w:color w:val="666666"/><w:sz w:val="36"/></w:rPr>
  </w:style>
${headingStyle('Heading1', 'Heading 1', 480, 240, fontSize + 12)}${headingStyle('Heading2', 'Heading 2', 360, 200, fontSize + 8)}${headingStyle('Heading3', 'Heading 3', 240, 160, fontSize + 4)}  <w:style w:type="paragraph" w:styleId="TOC1">
    <w:name w:val="TOC 1"/>
    <w:basedOn w:val="Normal"/>
  </w:style>
  <w:style w:type="paragraph" w:styleId="TOC2">
    <w:name w:val="TOC 2"/>
    <w:basedOn w:val="Normal"/>
    <w:pPr><w:ind w:left="240"/></w:pPr>
  </w:style>
  <w:style w:type="paragraph" w:styleId="TOC3">
    <w:name w:val="TOC 3"/>
    <w:basedOn w:val="Normal"/>
    <w:pPr><w:ind w:left="480"/></w:pPr>
  </w:style>
</w:styles>
`;
}

function buildCorePropertiesXml(title: string, author: string, now: Date): string {
  const timestamp = now.toISOString().replace(/\.\d{3}Z$/, 'Z');
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <dc:title>${escapeXml(title)}</dc:title>
  <dc:creator>${escapeXml(author)}</dc:creator>
  <dcterms:created xsi:type="dcterms:W3CDTF">${timestamp}</dcterms:created>
  <dcterms:modified xsi:type="dcterms:W3CDTF">${timestamp}</dcterms:modified>
</cp:coreProperties>
`;
}

function buildAppPropertiesXml(): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Properties xmlns="http://schemas.openxmlformats.org/officeDocument/2006/extended-properties">
  <Application>BinderInterchange</Application>
</Properties>
`;
}

export function exportDocx(job: CompileJob): Buffer {
  const { documents, settings } = job;
  job.onProgress?.({ currentDocument: 0, totalDocuments: documents.length, phase: 'generating' });

  const links = new LinkRelationships();
  const documentXml = buildDocumentXml(job, links);
  const withFooter = settings.includePageNumbers;

  const zip = new ZipArchiveWriter(job.now);
  zip.addEntry('[Content_Types].xml', buildContentTypesXml(withFooter));
  zip.addEntry('_rels/.rels', buildPackageRelsXml());
  zip.addEntry('word/_rels/document.xml.rels', buildDocumentRelsXml(withFooter, links));
  zip.addEntry('word/document.xml', documentXml);
  zip.addEntry('word/styles.xml', buildStylesXml(settings));
  if (withFooter) {
    zip.addEntry('word/footer1.xml', buildFooterXml());
  }
  zip.addEntry('docProps/core.xml', buildCorePropertiesXml(job.title, job.author, job.now));
  zip.addEntry('docProps/app.xml', buildAppPropertiesXml());

  job.onProgress?.({ currentDocument: documents.length, totalDocuments: documents.length, phase: 'complete' });
  return zip.finalize();
}
