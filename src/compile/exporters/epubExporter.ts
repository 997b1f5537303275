/**
 * EPUB 3 output with an EPUB 2 NCX for older readers.
 *
 * Layout: mimetype (stored, first entry), META-INF/container.xml, then
 * everything else under OEBPS/.
 */

import { v4 as uuidv4 } from 'uuid';
import { CompilableDocument, CompileJob, reportProcessing } from '../types';
import { CompileFontStyle, CompileSettings } from '../settings';
import { ZipArchiveWriter } from '../../archive/zipArchiveWriter';
import { markdownToBlocks, renderBlocks } from '../../richtext/htmlWriter';
import { escapeXml } from '../../util/xml';

interface Chapter {
  filename: string;
  title: string;
  content: string;
}

const FONT_FAMILIES: Record<CompileFontStyle, string> = {
  serif: "Georgia, 'Times New Roman', serif",
  sansSerif: "'Helvetica Neue', Helvetica, Arial, sans-serif",
  monospace: "Menlo, Monaco, 'Courier New', monospace",
};

export function chapterFilename(index: number): string {
  return `chapter-${String(index + 1).padStart(3, '0')}.xhtml`;
}

function isoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function xhtmlPage(title: string, body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
  <meta charset="UTF-8"/>
  <title>${escapeXml(title)}</title>
  <link rel="stylesheet" type="text/css" href="styles.css"/>
</head>
<body>
${body}
</body>
</html>
`;
}

function buildContainerXml(): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;
}

function buildContentOpf(title: string, author: string, bookId: string, modified: Date, chapters: Chapter[]): string {
  const manifest = chapters
    .map((chapter, index) => `    <item id="chapter-${index}" href="${chapter.filename}" media-type="application/xhtml+xml"/>`)
    .join('\n');
  const spine = chapters.map((_chapter, index) => `    <itemref idref="chapter-${index}"/>`).join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="bookid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="bookid">urn:uuid:${bookId}</dc:identifier>
    <dc:title>${escapeXml(title)}</dc:title>
    <dc:creator>${escapeXml(author)}</dc:creator>
    <dc:language>en</dc:language>
    <meta property="dcterms:modified">${isoSeconds(modified)}</meta>
  </metadata>
  <manifest>
    <item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>
    <item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>
    <item id="css" href="styles.css" media-type="text/css"/>
${manifest}
  </manifest>
  <spine toc="ncx">
${spine}
  </spine>
</package>
`;
}

function buildTocNcx(title: string, bookId: string, chapters: Chapter[]): string {
  const navPoints = chapters
    .map(
      (chapter, index) => `    <navPoint id="navpoint-${index + 1}" playOrder="${index + 1}">
      <navLabel>
        <text>${escapeXml(chapter.title)}</text>
      </navLabel>
      <content src="${chapter.filename}"/>
    </navPoint>`
    )
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="urn:uuid:${bookId}"/>
    <meta name="dtb:depth" content="1"/>
    <meta name="dtb:totalPageCount" content="0"/>
    <meta name="dtb:maxPageNumber" content="0"/>
  </head>
  <docTitle>
    <text>${escapeXml(title)}</text>
  </docTitle>
  <navMap>
${navPoints}
  </navMap>
</ncx>
`;
}

function buildNavXhtml(title: string, chapters: Chapter[]): string {
  const items = chapters
    .map(chapter => `      <li><a href="${chapter.filename}">${escapeXml(chapter.title)}</a></li>`)
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head>
  <meta charset="UTF-8"/>
  <title>${escapeXml(title)}</title>
  <link rel="stylesheet" type="text/css" href="styles.css"/>
</head>
<body>
  <nav epub:type="toc" id="toc">
    <h1>Table of Contents</h1>
    <ol>
${items}
    </ol>
  </nav>
</body>
</html>
`;
}

function buildStylesCss(settings: CompileSettings): string {
  return `body {
  font-family: ${FONT_FAMILIES[settings.fontStyle]};
  font-size: ${Math.trunc(settings.fontSize)}pt;
  line-height: ${settings.lineSpacing};
  margin: 1em;
  text-align: justify;
}

h1 {
  font-size: 2em;
  font-weight: bold;
  margin-top: 1em;
  margin-bottom: 0.5em;
  text-align: left;
}

h2 {
  font-size: 1.5em;
  font-weight: bold;
  margin-top: 1em;
  margin-bottom: 0.5em;
}

p {
  margin: 0.5em 0;
  text-indent: 1.5em;
}

p.first, h1 + p, h2 + p {
  text-indent: 0;
}

.title-page {
  text-align: center;
  margin-top: 30%;
}

.title-page h1 {
  font-size: 2.5em;
  text-align: center;
}

.title-page .author {
  font-size: 1.2em;
  font-style: italic;
  color: #666;
  margin-top: 1em;
}

nav ol {
  list-style-type: none;
  padding-left: 0;
}

nav li {
  margin: 0.5em 0;
}
`;
}

function buildTitlePage(title: string, author: string): string {
  const authorLine = author ? `\n    <p class="author">by ${escapeXml(author)}</p>` : '';
  return xhtmlPage(
    title,
    `  <div class="title-page">
    <h1>${escapeXml(title)}</h1>${authorLine}
  </div>`
  );
}

function buildTocPage(documents: CompilableDocument[]): string {
  const entries = documents
    .map((doc, index) => {
      const indent = doc.depth > 0 ? ` style="margin-left: ${doc.depth * 20}px"` : '';
      return `  <p${indent}><a href="${chapterFilename(index)}">${escapeXml(doc.title)}</a></p>`;
    })
    .join('\n');
  return xhtmlPage('Table of Contents', `  <h1>Table of Contents</h1>\n${entries}`);
}

function buildChapter(doc: CompilableDocument, settings: CompileSettings): string {
  let body = '';
  if (settings.includeChapterTitles && doc.title) {
    const tag = doc.depth === 0 ? 'h1' : 'h2';
    body += `<${tag}>${escapeXml(doc.title)}</${tag}>\n`;
  }
  body += renderBlocks(markdownToBlocks(doc.content), { firstParagraphClass: 'first' });
  return xhtmlPage(doc.title, body);
}

export function exportEpub(job: CompileJob, bookId: string = uuidv4()): Buffer {
  const { documents, settings, title, author } = job;
  job.onProgress?.({ currentDocument: 0, totalDocuments: documents.length, phase: 'generating' });

  const chapters: Chapter[] = [];
  if (settings.includeTitlePage) {
    chapters.push({ filename: 'title.xhtml', title: 'Title Page', content: buildTitlePage(title, author) });
  }
  if (settings.includeTableOfContents) {
    chapters.push({ filename: 'toc-page.xhtml', title: 'Table of Contents', content: buildTocPage(documents) });
  }
  documents.forEach((doc, index) => {
    reportProcessing(job, index);
    chapters.push({ filename: chapterFilename(index), title: doc.title, content: buildChapter(doc, settings) });
  });

  const zip = new ZipArchiveWriter(job.now);
  zip.addEntry('mimetype', 'application/epub+zip', false);
  zip.addEntry('META-INF/container.xml', buildContainerXml());
  zip.addEntry('OEBPS/content.opf', buildContentOpf(title, author, bookId, job.now, chapters));
  zip.addEntry('OEBPS/toc.ncx', buildTocNcx(title, bookId, chapters));
  zip.addEntry('OEBPS/nav.xhtml', buildNavXhtml(title, chapters));
  zip.addEntry('OEBPS/styles.css', buildStylesCss(settings));
  for (const chapter of chapters) {
    zip.addEntry(`OEBPS/${chapter.filename}`, chapter.content);
  }

  job.onProgress?.({ currentDocument: documents.length, totalDocuments: documents.length, phase: 'complete' });
  return zip.finalize();
}
