import { CompileSettings } from './settings';

/**
 * A document flattened out of the project tree, ready for output
 */
export interface CompilableDocument {
  id: string;
  title: string;
  content: string;
  order: number;
  depth: number; // 0 for the draft root
  parentTitle?: string;
}

export type CompilePhase = 'collecting' | 'processing' | 'generating' | 'complete';

export interface CompileProgress {
  currentDocument: number;
  totalDocuments: number;
  phase: CompilePhase;
}

export type CompileProgressCallback = (progress: CompileProgress) => void;

export function progressFraction(progress: CompileProgress): number {
  if (progress.totalDocuments <= 0) return 0;
  return progress.currentDocument / progress.totalDocuments;
}

export function progressDescription(progress: CompileProgress): string {
  switch (progress.phase) {
    case 'collecting':
      return 'Collecting documents...';
    case 'processing':
      return `Processing document ${progress.currentDocument} of ${progress.totalDocuments}...`;
    case 'generating':
      return 'Generating output...';
    case 'complete':
      return 'Complete';
  }
}

/**
 * Everything a format exporter needs for one run
 */
export interface CompileJob {
  documents: CompilableDocument[];
  title: string;
  author: string;
  settings: CompileSettings;
  now: Date;
  onProgress?: CompileProgressCallback;
}

export interface CompileResult {
  data: Buffer;
  filename: string;
}

export interface CompileStatistics {
  documentCount: number;
  wordCount: number;
  characterCount: number;
  estimatedPages: number;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Reports one 'processing' step per document
 */
export function reportProcessing(job: CompileJob, index: number): void {
  job.onProgress?.({ currentDocument: index + 1, totalDocuments: job.documents.length, phase: 'processing' });
}
