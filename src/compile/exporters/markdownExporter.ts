import { CompileJob, reportProcessing } from '../types';
import { MARKDOWN_SEPARATORS } from '../settings';
import { formatDay } from '../../scrivener/dates';
import { headingAnchor } from '../../util/slug';

function escapeYaml(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function markdownFrontMatter(job: CompileJob): string {
  let yaml = '---\n';
  yaml += `title: "${escapeYaml(job.title)}"\n`;
  if (job.author) {
    yaml += `author: "${escapeYaml(job.author)}"\n`;
  }
  yaml += `date: "${formatDay(job.now)}"\n`;
  yaml += '---\n\n';
  return yaml;
}

export function markdownTableOfContents(job: CompileJob): string {
  let toc = '## Table of Contents\n\n';
  for (const doc of job.documents) {
    toc += `${'  '.repeat(doc.depth)}- [${doc.title}](#${headingAnchor(doc.title)})\n`;
  }
  return toc + '\n---\n\n';
}

/**
 * Chapter headings, contents and separators; no title block.
 */
export function markdownBody(job: CompileJob): string {
  const { documents, settings } = job;
  let markdown = '';

  documents.forEach((doc, index) => {
    reportProcessing(job, index);

    if (settings.includeChapterTitles && doc.title) {
      // ## for the draft root, ### one level down, capped at ######
      const level = Math.min(doc.depth + 2, 6);
      markdown += `${'#'.repeat(level)} ${doc.title}\n\n`;
    }

    const content = doc.content.trim();
    if (content) {
      markdown += content + '\n';
    }

    if (index < documents.length - 1) {
      markdown += MARKDOWN_SEPARATORS[settings.documentSeparator];
      if (settings.documentSeparator === 'chapterHeading') {
        markdown += '\n';
      }
    }
  });

  return markdown;
}

export function exportMarkdown(job: CompileJob): Buffer {
  let markdown = '';
  if (job.settings.includeFrontMatter) {
    markdown += markdownFrontMatter(job);
  }

  markdown += `# ${job.title}\n\n`;
  if (job.author) {
    markdown += `*by ${job.author}*\n\n`;
  }

  if (job.settings.includeTableOfContents) {
    markdown += markdownTableOfContents(job);
  }
  markdown += markdownBody(job);

  job.onProgress?.({
    currentDocument: job.documents.length,
    totalDocuments: job.documents.length,
    phase: 'generating',
  });
  return Buffer.from(markdown, 'utf-8');
}
