/**
 * Single-file import: Markdown, plain text and RTF files become one document.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder } from 'util';
import { v4 as uuidv4 } from 'uuid';
import { Document, ImportWarning, Logger, ProgressCallback, WarningSeverity } from '../types';
import { ImportError, errorMessage } from '../errors';
import { CONSTANTS } from '../constants';
import { silentLogger } from '../logger';
import { markdownToRuns } from '../richtext/markdownBridge';
import { plainText } from '../richtext/runs';
import { rtfToMarkdown } from '../richtext/rtfReader';

export const SUPPORTED_TEXT_EXTENSIONS = ['md', 'markdown', 'txt', 'rtf'] as const;

const TEXT_ICON = 'doc.text.fill';

export interface DocumentImportOptions {
  // When false, Markdown is flattened to plain text
  preserveFormatting: boolean;
}

export interface DocumentImportResult {
  document: Document;
  title: string;
  warnings: ImportWarning[];
}

export interface DocumentValidationResult {
  isValid: boolean;
  documentTitle: string;
  fileSize: number;
  warnings: string[];
  errors: string[];
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${Math.floor(bytes / 1024)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

function isSupported(ext: string): boolean {
  return SUPPORTED_TEXT_EXTENSIONS.some(supported => supported === ext);
}

function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes).replace(/^\uFEFF/, '');
}

export class TextDocumentImporter {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: { logger?: Logger; now?: () => Date } = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async validate(filePath: string): Promise<DocumentValidationResult> {
    const documentTitle = path.basename(filePath, path.extname(filePath));
    const invalid = (message: string): DocumentValidationResult => ({
      isValid: false,
      documentTitle,
      fileSize: 0,
      warnings: [],
      errors: [message],
    });

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(filePath);
    } catch {
      return invalid(`File does not exist at ${path.basename(filePath)}`);
    }

    const ext = extensionOf(filePath);
    if (!isSupported(ext)) {
      return invalid('File is not a supported text or markdown document (.md, .markdown, .txt, .rtf)');
    }

    const warnings: string[] = [];
    const errors: string[] = [];
    if (stats.size > CONSTANTS.LARGE_TEXT_FILE_BYTES) {
      warnings.push(`Large file (${Math.floor(stats.size / 1_000_000)} MB) - import may take a while`);
    }
    if (stats.size === 0) {
      errors.push('File is empty');
    } else if (ext !== 'rtf') {
      try {
        decodeUtf8(await fs.promises.readFile(filePath));
      } catch (error) {
        errors.push(`Could not read text content: ${errorMessage(error)}`);
      }
    }

    return { isValid: errors.length === 0, documentTitle, fileSize: stats.size, warnings, errors };
  }

  async importDocument(
    filePath: string,
    options: Partial<DocumentImportOptions> = {},
    onProgress?: ProgressCallback
  ): Promise<DocumentImportResult> {
    const preserveFormatting = options.preserveFormatting ?? true;
    const ext = extensionOf(filePath);
    const warnings: ImportWarning[] = [];

    onProgress?.(0.1, 'Reading document...');
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(filePath);
    } catch (error) {
      throw ImportError.fileReadFailed(filePath, error);
    }

    onProgress?.(0.6, 'Converting content...');
    let content: string;
    if (ext === 'rtf') {
      const converted = rtfToMarkdown(bytes);
      content = converted.markdown;
      if (converted.outcome === 'plainText') {
        warnings.push({
          message: `RTF could not be decoded; imported as plain text (${converted.detail ?? 'unknown error'})`,
          severity: WarningSeverity.INFO,
        });
      } else if (converted.outcome === 'empty') {
        warnings.push({ message: 'RTF content could not be read; imported empty', severity: WarningSeverity.WARNING });
      }
    } else {
      let raw: string;
      try {
        raw = decodeUtf8(bytes);
      } catch (error) {
        throw ImportError.fileReadFailed(filePath, error);
      }
      content = preserveFormatting || ext === 'txt' ? raw : plainText(markdownToRuns(raw));
      if ((ext === 'md' || ext === 'markdown') && preserveFormatting) {
        warnings.push({
          message: 'Markdown syntax is preserved as editable text content.',
          severity: WarningSeverity.INFO,
        });
      }
    }

    onProgress?.(0.9, 'Creating document...');
    const title = path.basename(filePath, path.extname(filePath));
    const document: Document = {
      id: uuidv4(),
      title,
      content,
      notes: '',
      synopsis: '',
      creationDate: this.now(),
      order: 0,
      keywords: [],
      includeInCompile: true,
      colorName: CONSTANTS.DEFAULT_COLOR_NAME,
      iconName: TEXT_ICON,
      comments: [],
    };

    this.logger.log(`[Import] ✓ ${title} (${formatFileSize(bytes.length)})`);
    onProgress?.(1.0, 'Import complete!');
    return { document, title, warnings };
  }
}
