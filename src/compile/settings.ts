/**
 * Compile settings - Zod schemas and defaults for manuscript output
 */

import { z } from 'zod';

// =============================================================================
// ENUMS
// =============================================================================

export const exportFormatSchema = z.enum(['pdf', 'docx', 'epub', 'markdown', 'plainText', 'html', 'scrivener']);
export type ExportFormat = z.infer<typeof exportFormatSchema>;

export const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  pdf: 'pdf',
  docx: 'docx',
  epub: 'epub',
  markdown: 'md',
  plainText: 'txt',
  html: 'html',
  // Zipped bundle
  scrivener: 'scriv.zip',
};

export const pageSizeSchema = z.enum(['letter', 'a4']);
export type PageSize = z.infer<typeof pageSizeSchema>;

// Points at 72 dpi
export const PAGE_DIMENSIONS: Record<PageSize, { width: number; height: number }> = {
  letter: { width: 612, height: 792 },
  a4: { width: 595, height: 842 },
};

export const fontStyleSchema = z.enum(['serif', 'sansSerif', 'monospace']);
export type CompileFontStyle = z.infer<typeof fontStyleSchema>;

export const FONT_NAMES: Record<CompileFontStyle, string> = {
  serif: 'Georgia',
  sansSerif: 'Helvetica Neue',
  monospace: 'Menlo',
};

export const documentSeparatorSchema = z.enum(['none', 'blankLine', 'threeAsterisks', 'pageBreak', 'chapterHeading']);
export type DocumentSeparator = z.infer<typeof documentSeparatorSchema>;

export const MARKDOWN_SEPARATORS: Record<DocumentSeparator, string> = {
  none: '',
  blankLine: '\n\n',
  threeAsterisks: '\n\n***\n\n',
  pageBreak: '\n\n---\n\n',
  chapterHeading: '',
};

// =============================================================================
// SETTINGS
// =============================================================================

export const edgeInsetsSchema = z.object({
  top: z.number().nonnegative(),
  leading: z.number().nonnegative(),
  bottom: z.number().nonnegative(),
  trailing: z.number().nonnegative(),
});

export type CompileEdgeInsets = z.infer<typeof edgeInsetsSchema>;

export const compileSettingsSchema = z.object({
  titleOverride: z.string().optional(),
  authorOverride: z.string().optional(),
  includeFrontMatter: z.boolean().default(true),
  includeTableOfContents: z.boolean().default(false),
  documentSeparator: documentSeparatorSchema.default('chapterHeading'),
  pageSize: pageSizeSchema.default('letter'),
  fontStyle: fontStyleSchema.default('serif'),
  fontSize: z.number().positive().default(12),
  lineSpacing: z.number().positive().default(1.5),
  margins: edgeInsetsSchema.default({ top: 72, leading: 72, bottom: 72, trailing: 72 }),
  includePageNumbers: z.boolean().default(true),
  includeTitlePage: z.boolean().default(true),
  includeChapterTitles: z.boolean().default(true),
  format: exportFormatSchema.default('pdf'),
});

export type CompileSettings = z.infer<typeof compileSettingsSchema>;
export type CompileSettingsInput = z.input<typeof compileSettingsSchema>;

export function defaultCompileSettings(): CompileSettings {
  return compileSettingsSchema.parse({});
}

/**
 * Validates user-supplied overrides and fills in defaults.
 */
export function parseCompileSettings(input: unknown): CompileSettings {
  const result = compileSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid compile settings:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}
