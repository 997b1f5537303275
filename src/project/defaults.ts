/**
 * Default tables and empty values for a new project
 */

import { v4 as uuidv4 } from 'uuid';
import { Folder, FolderKind, Label, ProjectTargets, Status } from '../types';

export const DEFAULT_LABELS: readonly Label[] = [
  { id: 'label-chapter', name: 'Chapter', color: '#4A90D9' },
  { id: 'label-scene', name: 'Scene', color: '#7ED321' },
  { id: 'label-idea', name: 'Idea', color: '#F5A623' },
  { id: 'label-revision', name: 'Needs Revision', color: '#D0021B' },
];

export const DEFAULT_STATUSES: readonly Status[] = [
  { id: 'status-todo', name: 'To Do' },
  { id: 'status-progress', name: 'In Progress' },
  { id: 'status-draft', name: 'First Draft' },
  { id: 'status-revised', name: 'Revised' },
  { id: 'status-done', name: 'Done' },
];

export function emptyTargets(): ProjectTargets {
  return {
    draftDeadlineIgnored: false,
    sessionResetType: 'midnight',
    sessionAllowNegatives: false,
  };
}

export function createFolder(title: string, kind: FolderKind, creationDate: Date, order = 0): Folder {
  return {
    id: uuidv4(),
    title,
    creationDate,
    order,
    kind,
    documents: [],
    subfolders: [],
  };
}
