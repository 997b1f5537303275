/**
 * Public entry point for the document interchange library
 */

export * from './types';
export * from './errors';
export { CONSTANTS } from './constants';
export { getConfig, displayConfig } from './config';
export { silentLogger } from './logger';

// Archives
export { crc32 } from './archive/crc32';
export { ZipArchiveWriter, toDosDateTime } from './archive/zipArchiveWriter';
export type { DosDateTime } from './archive/zipArchiveWriter';

// Rich text
export type { TextRun, RunAttributes, HeadingLevel } from './richtext/runs';
export { runsToMarkdown, markdownToRuns, cleanupMarkdown } from './richtext/markdownBridge';
export { rtfToRuns, rtfToMarkdown, RtfParseError } from './richtext/rtfReader';
export type { RtfConversionResult, RtfConversionOutcome } from './richtext/rtfReader';
export { markdownToRtf, runsToRtf } from './richtext/rtfWriter';
export { runsToHtml } from './richtext/htmlWriter';

// Scrivener
export * from './scrivener/models';
export { BinderXmlParser } from './scrivener/xmlParser';
export { BinderXmlWriter } from './scrivener/xmlWriter';
export type { XmlWriterOptions } from './scrivener/xmlWriter';
export { buildExportMappings, collectKeywords, scrivenerUuid } from './scrivener/mappings';
export type { ExportMappings, UuidGenerator } from './scrivener/mappings';
export { BinderItemShape, classifyBinderItem } from './scrivener/classify';
export { ScrivenerImporter } from './scrivener/importer';
export type { ScrivenerImporterOptions } from './scrivener/importer';
export { ScrivenerExporter, findInvalidReferences } from './scrivener/exporter';
export type { ScrivenerExporterOptions } from './scrivener/exporter';
export { mapIcon } from './scrivener/iconMapper';
export type { IconMapping } from './scrivener/iconMapper';
export { labelColorName, parseRgb, rgbToHex, hexToRgb } from './scrivener/colors';

// Single files
export { TextDocumentImporter } from './import/textDocumentImporter';
export type {
  DocumentImportOptions,
  DocumentImportResult,
  DocumentValidationResult,
} from './import/textDocumentImporter';

// Project tree
export { DEFAULT_LABELS, DEFAULT_STATUSES, createFolder, emptyTargets } from './project/defaults';
export { parseProject, projectSchema } from './project/projectSchema';

// Compile
export { CompileService } from './compile/compileService';
export type { CompileServiceOptions } from './compile/compileService';
export * from './compile/settings';
export * from './compile/types';
