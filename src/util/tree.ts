import { Document, Folder, Project } from '../types';

export function sortedByOrder<T extends { order: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => a.order - b.order);
}

export function countDocuments(folder: Folder): number {
  return folder.subfolders.reduce((count, subfolder) => count + countDocuments(subfolder), folder.documents.length);
}

export function isFolderEmpty(folder: Folder): boolean {
  return folder.documents.length === 0 && folder.subfolders.length === 0;
}

/**
 * Visits every document in pre-order: a folder's documents before its subfolders.
 */
export function forEachDocument(folder: Folder, visit: (document: Document, owner: Folder) => void): void {
  for (const document of sortedByOrder(folder.documents)) visit(document, folder);
  for (const subfolder of sortedByOrder(folder.subfolders)) forEachDocument(subfolder, visit);
}

/**
 * Draft first, then research and trash when present
 */
export function projectFolders(project: Project): Folder[] {
  const folders = [project.rootFolder];
  if (project.researchFolder) folders.push(project.researchFolder);
  if (project.trashFolder) folders.push(project.trashFolder);
  return folders;
}
