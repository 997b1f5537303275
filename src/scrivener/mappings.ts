/**
 * ID mapping tables for export. Built once per export and read-only after.
 */

import { v4 as uuidv4 } from 'uuid';
import { Folder, Project } from '../types';
import { forEachDocument, projectFolders, sortedByOrder } from '../util/tree';

export interface ExportMappings {
  // Folder or document id → Scrivener UUID
  uuids: ReadonlyMap<string, string>;
  labelIds: ReadonlyMap<string, number>;
  statusIds: ReadonlyMap<string, number>;
  keywordIds: ReadonlyMap<string, number>;
  // Sorted; a keyword's position is its id
  keywords: readonly string[];
}

export type UuidGenerator = () => string;

export const scrivenerUuid: UuidGenerator = () => uuidv4().toUpperCase();

/**
 * Keywords used anywhere in the draft and research trees, deduplicated and
 * sorted. Trash keywords are left out.
 */
export function collectKeywords(project: Project): string[] {
  const keywords = new Set<string>();
  const folders = project.researchFolder ? [project.rootFolder, project.researchFolder] : [project.rootFolder];
  for (const folder of folders) {
    forEachDocument(folder, document => {
      for (const keyword of document.keywords) keywords.add(keyword);
    });
  }
  return [...keywords].sort();
}

export function buildExportMappings(
  project: Project,
  generateUuid: UuidGenerator = scrivenerUuid
): ExportMappings {
  // 1. UUIDs in pre-order: folder, its documents, then its subfolders
  const uuids = new Map<string, string>();
  const mapFolder = (folder: Folder): void => {
    uuids.set(folder.id, generateUuid());
    for (const document of sortedByOrder(folder.documents)) {
      uuids.set(document.id, generateUuid());
    }
    for (const subfolder of sortedByOrder(folder.subfolders)) {
      mapFolder(subfolder);
    }
  };
  projectFolders(project).forEach(mapFolder);

  // 2. Labels and statuses by table position
  const labelIds = new Map(project.labels.map((label, index) => [label.id, index] as const));
  const statusIds = new Map(project.statuses.map((status, index) => [status.id, index] as const));

  // 3. Keywords by sorted position
  const keywords = collectKeywords(project);
  const keywordIds = new Map(keywords.map((keyword, index) => [keyword, index] as const));

  return { uuids, labelIds, statusIds, keywordIds, keywords };
}
