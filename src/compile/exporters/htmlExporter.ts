import { CompileJob } from '../types';
import { markdownBody, markdownTableOfContents } from './markdownExporter';
import { markdownToBlocks, renderBlocks } from '../../richtext/htmlWriter';
import { escapeXml } from '../../util/xml';

const STYLES = `    body {
      font-family: Georgia, "Times New Roman", serif;
      line-height: 1.6;
      margin: 40px;
      color: #111;
    }
    h1, h2, h3, h4, h5, h6 {
      margin-top: 1.6em;
    }
    hr {
      margin: 2em 0;
    }
    .manuscript-author {
      color: #555;
      font-style: italic;
      margin-bottom: 2em;
    }`;

export function wrapHtmlBody(body: string, title: string, author: string): string {
  const escapedTitle = escapeXml(title);
  const authorLine = author ? `\n  <div class="manuscript-author">by ${escapeXml(author)}</div>` : '';

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapedTitle}</title>
  <style>
${STYLES}
  </style>
</head>
<body>
  <h1>${escapedTitle}</h1>${authorLine}
${body}
</body>
</html>
`;
}

/**
 * The Markdown manuscript rendered to HTML. Title and author live in the
 * page wrapper, so the Markdown title block and front matter are left out.
 */
export function exportHtml(job: CompileJob): Buffer {
  let markdown = '';
  if (job.settings.includeTableOfContents) {
    markdown += markdownTableOfContents(job);
  }
  markdown += markdownBody(job);

  job.onProgress?.({
    currentDocument: job.documents.length,
    totalDocuments: job.documents.length,
    phase: 'generating',
  });

  const body = renderBlocks(markdownToBlocks(markdown));
  return Buffer.from(wrapHtmlBody(body, job.title, job.author), 'utf-8');
}
