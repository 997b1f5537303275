import { CompileJob, reportProcessing } from '../types';
import { DocumentSeparator } from '../settings';

const RULE = '-'.repeat(40);

const SEPARATORS: Record<DocumentSeparator, string> = {
  none: '\n\n',
  blankLine: '\n\n\n',
  threeAsterisks: '\n\n* * *\n\n',
  pageBreak: `\n\n${RULE}\n\n`,
  chapterHeading: '\n\n',
};

// Counted in code points so the underline matches what a terminal shows
function underline(text: string, char: string): string {
  return char.repeat([...text].length);
}

/**
 * Removes common Markdown markers, keeping the text they wrap.
 */
export function stripMarkdownFormatting(text: string): string {
  const result = text
    .replace(/\*\*\*/g, '')
    .replace(/\*\*/g, '')
    .replace(/__/g, '')
    .replace(/\*/g, '')
    .replace(/_/g, ' ')
    .replace(/~~/g, '')
    .replace(/==/g, '')
    .replace(/<\/?u>/g, '')
    .replace(/`/g, '')
    .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1');

  return result
    .split('\n')
    .map(line => (line.startsWith('#') ? line.replace(/^[# ]+/, '') : line))
    .join('\n');
}

export function exportPlainText(job: CompileJob): Buffer {
  const { documents, settings, title, author } = job;

  let text = `${title.toUpperCase()}\n${underline(title, '=')}\n\n`;
  if (author) {
    text += `by ${author}\n\n`;
  }

  if (settings.includeTableOfContents) {
    text += 'TABLE OF CONTENTS\n';
    text += '-----------------\n\n';
    for (const doc of documents) {
      text += `${'  '.repeat(doc.depth)}• ${doc.title}\n`;
    }
    text += `\n${RULE}\n\n`;
  }

  documents.forEach((doc, index) => {
    reportProcessing(job, index);

    if (settings.includeChapterTitles && doc.title) {
      text += `${doc.title.toUpperCase()}\n${underline(doc.title, '-')}\n\n`;
    }

    const content = stripMarkdownFormatting(doc.content.trim());
    if (content) {
      text += content + '\n';
    }

    if (index < documents.length - 1) {
      text += SEPARATORS[settings.documentSeparator];
    }
  });

  job.onProgress?.({ currentDocument: documents.length, totalDocuments: documents.length, phase: 'generating' });
  return Buffer.from(text, 'utf-8');
}
