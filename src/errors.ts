/**
 * Error types raised by the import, export and compile pipelines.
 *
 * Fatal problems are thrown as one of these classes; per-item problems are
 * collected as ImportWarning values and never thrown.
 */

export enum ImportErrorKind {
  NOT_A_BUNDLE = 'notABundle',
  MISSING_PROJECT_FILE = 'missingProjectFile',
  XML_PARSING_FAILED = 'xmlParsingFailed',
  RTF_CONVERSION_FAILED = 'rtfConversionFailed',
  MISSING_CONTENT = 'missingContent',
  UNSUPPORTED_VERSION = 'unsupportedVersion',
  FILE_READ_FAILED = 'fileReadFailed',
  INVALID_BUNDLE_STRUCTURE = 'invalidBundleStructure',
  CANCELLED = 'cancelled',
}

const IMPORT_RECOVERY: Record<ImportErrorKind, string | undefined> = {
  [ImportErrorKind.NOT_A_BUNDLE]: 'Please select a valid .scriv folder or bundle.',
  [ImportErrorKind.MISSING_PROJECT_FILE]:
    'The Scrivener project may be corrupted. Try opening it in Scrivener first.',
  [ImportErrorKind.XML_PARSING_FAILED]:
    'The project file may be corrupted. Try creating a backup in Scrivener and importing that instead.',
  [ImportErrorKind.RTF_CONVERSION_FAILED]:
    'Some document content may not be imported correctly. You can manually copy the content from Scrivener.',
  [ImportErrorKind.MISSING_CONTENT]:
    'The document content file may have been deleted. The document will be imported with empty content.',
  [ImportErrorKind.UNSUPPORTED_VERSION]:
    'Please upgrade your Scrivener project to version 2.x or 3.x format.',
  [ImportErrorKind.FILE_READ_FAILED]:
    'Check that you have permission to read the file and that it exists.',
  [ImportErrorKind.INVALID_BUNDLE_STRUCTURE]:
    'The Scrivener project structure is not recognized. Try creating a backup in Scrivener.',
  [ImportErrorKind.CANCELLED]: undefined,
};

export class ImportError extends Error {
  readonly recoverySuggestion?: string;

  constructor(readonly kind: ImportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImportError';
    this.recoverySuggestion = IMPORT_RECOVERY[kind];
  }

  static notABundle(): ImportError {
    return new ImportError(
      ImportErrorKind.NOT_A_BUNDLE,
      'The selected file is not a valid Scrivener project bundle.'
    );
  }

  static missingProjectFile(): ImportError {
    return new ImportError(
      ImportErrorKind.MISSING_PROJECT_FILE,
      'Could not find a .scrivx project file in the Scrivener bundle.'
    );
  }

  static xmlParsingFailed(detail: string, cause?: unknown): ImportError {
    return new ImportError(
      ImportErrorKind.XML_PARSING_FAILED,
      `Failed to parse project file: ${detail}`,
      { cause }
    );
  }

  static fileReadFailed(filePath: string, cause?: unknown): ImportError {
    return new ImportError(ImportErrorKind.FILE_READ_FAILED, `Failed to read file: ${filePath}`, {
      cause,
    });
  }

  static cancelled(): ImportError {
    return new ImportError(ImportErrorKind.CANCELLED, 'Import was cancelled.');
  }
}

export enum ExportErrorKind {
  FAILED_TO_CREATE_DIRECTORY = 'failedToCreateDirectory',
  FAILED_TO_WRITE_FILE = 'failedToWriteFile',
  FAILED_TO_CREATE_ZIP = 'failedToCreateZip',
  INVALID_REFERENCE = 'invalidReference',
  CANCELLED = 'cancelled',
}

export class ExportError extends Error {
  constructor(readonly kind: ExportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExportError';
  }

  static failedToCreateDirectory(directory: string, cause?: unknown): ExportError {
    return new ExportError(
      ExportErrorKind.FAILED_TO_CREATE_DIRECTORY,
      `Failed to create directory: ${directory}`,
      { cause }
    );
  }

  static failedToWriteFile(filename: string, cause?: unknown): ExportError {
    return new ExportError(ExportErrorKind.FAILED_TO_WRITE_FILE, `Failed to write file: ${filename}`, {
      cause,
    });
  }

  static failedToCreateZip(cause: unknown): ExportError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ExportError(ExportErrorKind.FAILED_TO_CREATE_ZIP, `Failed to create ZIP archive: ${detail}`, {
      cause,
    });
  }

  static invalidReference(problems: string[]): ExportError {
    return new ExportError(
      ExportErrorKind.INVALID_REFERENCE,
      `Project references undefined metadata: ${problems.join('; ')}`
    );
  }

  static cancelled(): ExportError {
    return new ExportError(ExportErrorKind.CANCELLED, 'Export was cancelled.');
  }
}

export enum CompileErrorKind {
  NO_DOCUMENTS = 'noDocuments',
  EXPORT_FAILED = 'exportFailed',
  PDF_GENERATION_FAILED = 'pdfGenerationFailed',
  FILE_WRITE_FAILED = 'fileWriteFailed',
}

export class CompileError extends Error {
  constructor(readonly kind: CompileErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompileError';
  }

  static noDocuments(): CompileError {
    return new CompileError(
      CompileErrorKind.NO_DOCUMENTS,
      'No documents to compile. Make sure at least one document is marked for inclusion.'
    );
  }

  static pdfGenerationFailed(detail: string): CompileError {
    return new CompileError(CompileErrorKind.PDF_GENERATION_FAILED, `Failed to generate PDF: ${detail}`);
  }

  static fileWriteFailed(filePath: string, cause?: unknown): CompileError {
    return new CompileError(CompileErrorKind.FILE_WRITE_FAILED, `Failed to write the exported file: ${filePath}`, {
      cause,
    });
  }

  static exportFailed(cause: unknown): CompileError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new CompileError(CompileErrorKind.EXPORT_FAILED, `Export failed: ${detail}`, { cause });
  }
}

/**
 * A ZIP entry name that can't be represented in the archive.
 */
export class EncodingError extends Error {
  constructor(readonly entryPath: string, reason: string) {
    super(`Cannot encode archive entry name "${entryPath}": ${reason}`);
    this.name = 'EncodingError';
  }
}

export class XmlParsingFailed extends Error {
  constructor(readonly detail: string) {
    super(`XML parsing failed: ${detail}`);
    this.name = 'XmlParsingFailed';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
