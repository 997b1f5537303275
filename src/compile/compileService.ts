/**
 * Compile Service
 * Flattens the draft tree and hands it to the exporter for the chosen format
 */

import { Folder, Logger, Project } from '../types';
import { CompileError } from '../errors';
import { CONSTANTS } from '../constants';
import { silentLogger } from '../logger';
import { slugify } from '../util/slug';
import { sortedByOrder } from '../util/tree';
import { ScrivenerExporter } from '../scrivener/exporter';
import { CompileSettingsInput, ExportFormat, FILE_EXTENSIONS, parseCompileSettings } from './settings';
import {
  CompilableDocument,
  CompileJob,
  CompileProgressCallback,
  CompileResult,
  CompileStatistics,
  countWords,
  progressDescription,
} from './types';
import { exportMarkdown } from './exporters/markdownExporter';
import { exportPlainText } from './exporters/plainTextExporter';
import { exportHtml } from './exporters/htmlExporter';
import { exportDocx } from './exporters/docxExporter';
import { exportEpub } from './exporters/epubExporter';
import { exportPdf } from './exporters/pdfExporter';

type FileExporter = (job: CompileJob) => Buffer;

const FILE_EXPORTERS: Record<Exclude<ExportFormat, 'scrivener'>, FileExporter> = {
  pdf: exportPdf,
  docx: exportDocx,
  epub: exportEpub,
  markdown: exportMarkdown,
  plainText: exportPlainText,
  html: exportHtml,
};

export interface CompileServiceOptions {
  logger?: Logger;
  now?: () => Date;
  scrivenerExporter?: ScrivenerExporter;
}

export class CompileService {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly scrivenerExporter: ScrivenerExporter;

  constructor(options: CompileServiceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.scrivenerExporter =
      options.scrivenerExporter ?? new ScrivenerExporter({ logger: this.logger, now: this.now });
  }

  /**
   * Included documents in reading order: a folder's own documents first,
   * then each subfolder's, recursively.
   */
  collectCompilableDocuments(folder: Folder, depth = 0, parentTitle?: string): CompilableDocument[] {
    const documents: CompilableDocument[] = sortedByOrder(folder.documents.filter(doc => doc.includeInCompile)).map(
      doc => ({
        id: doc.id,
        title: doc.title,
        content: doc.content,
        order: doc.order,
        depth,
        parentTitle: parentTitle ?? folder.title,
      })
    );

    for (const subfolder of sortedByOrder(folder.subfolders)) {
      documents.push(...this.collectCompilableDocuments(subfolder, depth + 1, subfolder.title));
    }
    return documents;
  }

  async compile(
    project: Project,
    settings: CompileSettingsInput = {},
    onProgress?: CompileProgressCallback
  ): Promise<CompileResult> {
    const resolved = parseCompileSettings(settings);
    onProgress?.({ currentDocument: 0, totalDocuments: 0, phase: 'collecting' });

    const documents = this.collectCompilableDocuments(project.rootFolder);
    if (documents.length === 0) {
      throw CompileError.noDocuments();
    }

    const title = resolved.titleOverride || project.title || CONSTANTS.UNTITLED_ITEM;
    const author = resolved.authorOverride || project.author;
    const filename = `${slugify(title)}.${FILE_EXTENSIONS[resolved.format]}`;
    this.logger.log(`[Compile] ${documents.length} document(s) → ${filename}`);

    let data: Buffer;
    try {
      if (resolved.format === 'scrivener') {
        data = await this.scrivenerExporter.exportAsZip(project, fraction =>
          onProgress?.({
            currentDocument: Math.round(fraction * documents.length),
            totalDocuments: documents.length,
            phase: fraction < 1 ? 'generating' : 'complete',
          })
        );
      } else {
        const job: CompileJob = {
          documents,
          title,
          author,
          settings: resolved,
          now: this.now(),
          onProgress: progress => {
            this.logger.log(`  ${progressDescription(progress)}`);
            onProgress?.(progress);
          },
        };
        data = FILE_EXPORTERS[resolved.format](job);
      }
    } catch (error) {
      if (error instanceof CompileError) throw error;
      throw CompileError.exportFailed(error);
    }

    onProgress?.({ currentDocument: documents.length, totalDocuments: documents.length, phase: 'complete' });
    this.logger.log(`[Compile] ✓ ${filename} (${data.length} bytes)`);
    return { data, filename };
  }

  calculateStatistics(documents: CompilableDocument[]): CompileStatistics {
    const wordCount = documents.reduce((total, doc) => total + countWords(doc.content), 0);
    const characterCount = documents.reduce((total, doc) => total + [...doc.content].length, 0);
    return {
      documentCount: documents.length,
      wordCount,
      characterCount,
      estimatedPages: Math.max(1, Math.floor(wordCount / CONSTANTS.WORDS_PER_PAGE)),
    };
  }
}
