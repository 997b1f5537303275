/**
 * Builders for in-memory projects used across the test suites
 */

import { Document, Folder, FolderKind, Project } from '../types';
import { DEFAULT_LABELS, DEFAULT_STATUSES, emptyTargets } from '../project/defaults';
import { CompileSettingsInput, parseCompileSettings } from '../compile/settings';
import { CompilableDocument, CompileJob } from '../compile/types';

export const CREATED = new Date('2024-01-01T00:00:00Z');

export function counter(prefix: string): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function makeDocument(id: string, title: string, overrides: Partial<Document> = {}): Document {
  return {
    id,
    title,
    content: '',
    notes: '',
    synopsis: '',
    creationDate: CREATED,
    order: 0,
    keywords: [],
    includeInCompile: true,
    colorName: 'Brown',
    iconName: 'doc.text',
    comments: [],
    ...overrides,
  };
}

export function makeFolder(id: string, title: string, kind: FolderKind, overrides: Partial<Folder> = {}): Folder {
  return { id, title, creationDate: CREATED, order: 0, kind, documents: [], subfolders: [], ...overrides };
}

export function makeProject(rootFolder: Folder, overrides: Partial<Project> = {}): Project {
  return {
    title: 'Test Novel',
    author: '',
    creationDate: CREATED,
    modifiedDate: CREATED,
    rootFolder,
    labels: DEFAULT_LABELS.map(label => ({ ...label })),
    statuses: DEFAULT_STATUSES.map(status => ({ ...status })),
    targets: emptyTargets(),
    writingHistory: [],
    ...overrides,
  };
}

export const COMPILED_AT = new Date('2024-03-05T10:00:00Z');

export function compilable(title: string, content: string, depth = 0, order = 0): CompilableDocument {
  return { id: `${title}-${depth}-${order}`, title, content, order, depth };
}

export function makeJob(documents: CompilableDocument[], settings: CompileSettingsInput = {}): CompileJob {
  return {
    documents,
    title: 'The Book',
    author: 'Jane Placeholder',
    settings: parseCompileSettings(settings),
    now: COMPILED_AT,
  };
}
