/**
 * Project Schema - Zod validation for the JSON form of a project tree
 *
 * Dates travel as ISO strings and are coerced back to Date on parse.
 */

import { z } from 'zod';
import { Document, Folder, FolderKind, Project } from '../types';
import { CONSTANTS } from '../constants';
import { DEFAULT_LABELS, DEFAULT_STATUSES, emptyTargets } from './defaults';

export const documentCommentSchema = z.object({
  id: z.string(),
  text: z.string(),
  color: z.string().default(CONSTANTS.DEFAULT_COMMENT_COLOR),
});

export const documentSchema: z.ZodType<Document, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string().default(''),
  notes: z.string().default(''),
  synopsis: z.string().default(''),
  creationDate: z.coerce.date(),
  order: z.number().int().default(0),
  labelId: z.string().optional(),
  statusId: z.string().optional(),
  keywords: z.array(z.string()).default([]),
  includeInCompile: z.boolean().default(true),
  colorName: z.string().default(CONSTANTS.DEFAULT_COLOR_NAME),
  iconName: z.string().default(CONSTANTS.DEFAULT_ICON_NAME),
  iconColor: z.string().optional(),
  targetWordCount: z.number().int().nonnegative().optional(),
  comments: z.array(documentCommentSchema).default([]),
});

export const folderSchema: z.ZodType<Folder, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    title: z.string(),
    creationDate: z.coerce.date(),
    order: z.number().int().default(0),
    kind: z.nativeEnum(FolderKind).default(FolderKind.SUBFOLDER),
    documents: z.array(documentSchema).default([]),
    subfolders: z.array(folderSchema).default([]),
  })
);

export const projectTargetsSchema = z.object({
  draftWordCount: z.number().int().nonnegative().optional(),
  draftDeadline: z.coerce.date().optional(),
  draftDeadlineIgnored: z.boolean().default(false),
  sessionWordCount: z.number().int().nonnegative().optional(),
  sessionResetType: z.enum(['midnight', 'time']).default('midnight'),
  sessionResetTime: z.string().regex(/^\d{2}:\d{2}$/).optional(),
  sessionAllowNegatives: z.boolean().default(false),
});

export const writingHistoryEntrySchema = z.object({
  date: z.coerce.date(),
  wordsWritten: z.number().int().default(0),
  draftWordCount: z.number().int().optional(),
  sessionDuration: z.number().optional(),
});

export const projectSchema: z.ZodType<Project, z.ZodTypeDef, unknown> = z.object({
  title: z.string().default(''),
  author: z.string().default(''),
  creationDate: z.coerce.date(),
  modifiedDate: z.coerce.date(),
  rootFolder: folderSchema,
  researchFolder: folderSchema.optional(),
  trashFolder: folderSchema.optional(),
  labels: z
    .array(z.object({ id: z.string(), name: z.string(), color: z.string() }))
    .default(() => DEFAULT_LABELS.map(label => ({ ...label }))),
  statuses: z
    .array(z.object({ id: z.string(), name: z.string() }))
    .default(() => DEFAULT_STATUSES.map(status => ({ ...status }))),
  targets: projectTargetsSchema.default(emptyTargets),
  writingHistory: z.array(writingHistoryEntrySchema).default([]),
});

/**
 * Validates parsed JSON as a project. Throws one Error listing every issue.
 */
export function parseProject(input: unknown): Project {
  const result = projectSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid project file:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}
