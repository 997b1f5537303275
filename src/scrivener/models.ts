/**
 * Type definitions for the Scrivener side of the interchange
 */

import { Project, ImportWarning } from '../types';

export enum ScrivenerVersion {
  V2 = 'v2', // Files/Docs/<id>.rtf
  V3 = 'v3', // Files/Data/<uuid>/content.rtf
}

/**
 * Binder item kinds, valued as they appear in the Type attribute
 */
export enum BinderItemType {
  DRAFT_FOLDER = 'DraftFolder',
  RESEARCH_FOLDER = 'ResearchFolder',
  TRASH_FOLDER = 'TrashFolder',
  FOLDER = 'Folder',
  TEXT = 'Text',
  PDF = 'PDF',
  IMAGE = 'Image',
  WEB_PAGE = 'WebPage',
  ROOT = 'Root',
  OTHER = 'Other',
}

const KNOWN_TYPES: ReadonlySet<string> = new Set(Object.values(BinderItemType));

function isBinderItemType(value: string): value is BinderItemType {
  return KNOWN_TYPES.has(value);
}

export function toBinderItemType(raw: string): BinderItemType {
  return isBinderItemType(raw) ? raw : BinderItemType.OTHER;
}

export function isMediaType(type: BinderItemType): boolean {
  return type === BinderItemType.PDF || type === BinderItemType.IMAGE || type === BinderItemType.WEB_PAGE;
}

export interface BinderItem {
  id: string;
  uuid?: string;
  type: BinderItemType;
  title: string;
  created?: Date;
  modified?: Date;
  synopsis?: string;
  labelId?: number;
  statusId?: number;
  includeInCompile: boolean;
  // Any item type may have children, including Text
  children: BinderItem[];
  targetWordCount?: number;
  iconFileName?: string;
  keywordIds: number[];
}

// Components in [0, 1]
export interface RgbColor {
  red: number;
  green: number;
  blue: number;
}

export interface ScrivenerLabel {
  id: number;
  name: string;
  color: RgbColor;
}

export interface ScrivenerStatus {
  id: number;
  name: string;
}

export interface ScrivenerKeyword {
  id: number;
  name: string;
  color?: RgbColor;
}

export interface ScrivenerTargets {
  draftWordCount?: number;
  sessionWordCount?: number;
  deadline?: Date;
  deadlineIgnored: boolean;
  draftCountIncludedOnly: boolean;
  sessionResetType?: string;
  sessionResetTime?: string;
  sessionAllowNegatives: boolean;
}

export interface ScrivenerProject {
  title: string;
  version: ScrivenerVersion;
  binderItems: BinderItem[];
  labels: ScrivenerLabel[];
  statuses: ScrivenerStatus[];
  keywords: ScrivenerKeyword[];
  targets: ScrivenerTargets;
}

export interface ScrivenerImportOptions {
  importTrash: boolean;
  importResearch: boolean;
}

export const DEFAULT_IMPORT_OPTIONS: ScrivenerImportOptions = {
  importTrash: false,
  importResearch: true,
};

export interface ScrivenerValidationResult {
  isValid: boolean;
  projectTitle: string;
  itemCount: number;
  version: ScrivenerVersion;
  warnings: string[];
  errors: string[];
}

export interface ImportCounters {
  importedDocuments: number;
  importedFolders: number;
  skippedItems: number;
}

export interface ImportResult extends ImportCounters {
  project: Project;
  warnings: ImportWarning[];
}

export function importSummary(result: ImportCounters): string {
  let summary = `Imported ${result.importedDocuments} document(s), ${result.importedFolders} folder(s)`;
  if (result.skippedItems > 0) {
    summary += `, (${result.skippedItems} item(s) skipped)`;
  }
  return summary;
}

export function countBinderItems(items: BinderItem[]): number {
  return items.reduce((count, item) => count + 1 + countBinderItems(item.children), 0);
}

export function hasMediaContent(items: BinderItem[]): boolean {
  return items.some(item => isMediaType(item.type) || hasMediaContent(item.children));
}
