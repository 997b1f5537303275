/**
 * Type definitions for the in-memory project tree and the operations around it
 */

export enum FolderKind {
  DRAFT = 'draft',
  RESEARCH = 'research',
  TRASH = 'trash',
  SUBFOLDER = 'subfolder',
}

export interface DocumentComment {
  id: string;
  text: string; // Markdown
  color: string; // #RRGGBB
}

export interface Document {
  id: string;
  title: string;
  content: string; // Markdown
  notes: string; // Markdown
  synopsis: string;
  creationDate: Date;

  // Sibling sort key, not globally unique
  order: number;

  // Foreign keys into Project.labels / Project.statuses
  labelId?: string;
  statusId?: string;

  keywords: string[];
  includeInCompile: boolean;

  // Display hints
  colorName: string;
  iconName: string;
  iconColor?: string;

  targetWordCount?: number;
  comments: DocumentComment[];
}

export interface Folder {
  id: string;
  title: string;
  creationDate: Date;
  order: number;
  kind: FolderKind;
  documents: Document[];
  subfolders: Folder[];
}

export interface Label {
  id: string;
  name: string;
  color: string; // #RRGGBB
}

export interface Status {
  id: string;
  name: string;
}

export type SessionResetType = 'midnight' | 'time';

export interface ProjectTargets {
  draftWordCount?: number;
  draftDeadline?: Date;
  draftDeadlineIgnored: boolean;
  sessionWordCount?: number;
  sessionResetType: SessionResetType;
  sessionResetTime?: string; // HH:mm
  sessionAllowNegatives: boolean;
}

export interface WritingHistoryEntry {
  date: Date;
  wordsWritten: number;
  draftWordCount?: number;
  sessionDuration?: number; // seconds
}

export interface Project {
  title: string;
  author: string;
  creationDate: Date;
  modifiedDate: Date;

  // Exactly one draft root; research and trash are optional siblings
  rootFolder: Folder;
  researchFolder?: Folder;
  trashFolder?: Folder;

  labels: Label[];
  statuses: Status[];
  targets: ProjectTargets;
  writingHistory: WritingHistoryEntry[];
}

export enum WarningSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
}

export interface ImportWarning {
  message: string;
  itemTitle?: string;
  severity: WarningSeverity;
}

/**
 * Observer for long-running operations. Fired at stage boundaries with a
 * monotonically increasing fraction in [0, 1].
 */
export type ProgressCallback = (fraction: number, message: string) => void;

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface AppConfig {
  exportDir: string;
  largeProjectThreshold: number;
  defaultAuthor: string;
  verbose: boolean;
}
