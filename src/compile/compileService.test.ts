import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CompileService } from './compileService';
import { CompileProgress } from './types';
import { ScrivenerExporter } from '../scrivener/exporter';
import { FolderKind, Logger, Project } from '../types';
import { CompileError, CompileErrorKind } from '../errors';
import { compilable, counter, makeDocument, makeFolder, makeProject } from '../testing/projectFixtures';

const NOW = new Date('2024-03-05T10:00:00Z');

function sampleProject(): Project {
  const draft = makeFolder('draft', 'Draft', FolderKind.DRAFT, {
    documents: [
      makeDocument('d2', 'Second', { order: 1, content: 'two words' }),
      makeDocument('d1', 'First', { order: 0, content: 'one' }),
      makeDocument('d3', 'Hidden', { order: 2, includeInCompile: false }),
    ],
    subfolders: [
      makeFolder('f2', 'Part Two', FolderKind.SUBFOLDER, {
        order: 1,
        documents: [makeDocument('late', 'Late')],
      }),
      makeFolder('f1', 'Part One', FolderKind.SUBFOLDER, {
        order: 0,
        documents: [makeDocument('early', 'Early')],
        subfolders: [makeFolder('inner', 'Inner', FolderKind.SUBFOLDER, { documents: [makeDocument('deep', 'Deep')] })],
      }),
    ],
  });
  return makeProject(draft);
}

function recordingLogger(lines: string[]): Logger {
  return {
    log: (...args: unknown[]) => lines.push(args.map(String).join(' ')),
    warn: () => undefined,
    error: () => undefined,
  };
}

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'compile-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('CompileService.collectCompilableDocuments', () => {
  it('walks included documents before subfolders, in order', () => {
    const documents = new CompileService().collectCompilableDocuments(sampleProject().rootFolder);

    expect(documents.map(doc => [doc.title, doc.depth, doc.parentTitle])).toEqual([
      ['First', 0, 'Draft'],
      ['Second', 0, 'Draft'],
      ['Early', 1, 'Part One'],
      ['Deep', 2, 'Inner'],
      ['Late', 1, 'Part Two'],
    ]);
  });
});

describe('CompileService.compile', () => {
  it('names the file after the project title and format', async () => {
    const lines: string[] = [];
    const service = new CompileService({ now: () => NOW, logger: recordingLogger(lines) });

    const result = await service.compile(sampleProject(), { format: 'markdown' });

    expect(result.filename).toBe('test-novel.md');
    expect(result.data.toString('utf-8').startsWith('---\ntitle: "Test Novel"\ndate: "2024-03-05"\n---\n\n# Test Novel\n\n')).toBe(
      true
    );
    expect(lines[0]).toBe('[Compile] 5 document(s) → test-novel.md');
  });

  it('prefers overrides for title and author', async () => {
    const service = new CompileService({ now: () => NOW });

    const result = await service.compile(sampleProject(), {
      format: 'plainText',
      titleOverride: 'My Draft!',
      authorOverride: 'A. Writer',
    });

    expect(result.filename).toBe('my-draft.txt');
    expect(result.data.toString('utf-8').startsWith('MY DRAFT!\n=========\n\nby A. Writer\n\n')).toBe(true);
  });

  it('falls back to Untitled without any title', async () => {
    const project = sampleProject();
    project.title = '';

    const result = await new CompileService({ now: () => NOW }).compile(project, { format: 'html' });

    expect(result.filename).toBe('untitled.html');
  });

  it('reports collecting, each document, then completion', async () => {
    const events: CompileProgress[] = [];

    await new CompileService({ now: () => NOW }).compile(sampleProject(), { format: 'markdown' }, progress =>
      events.push(progress)
    );

    expect(events.map(event => event.phase)).toEqual([
      'collecting',
      'processing',
      'processing',
      'processing',
      'processing',
      'processing',
      'generating',
      'complete',
    ]);
    expect(events[events.length - 1]).toEqual({ currentDocument: 5, totalDocuments: 5, phase: 'complete' });
  });

  it('rejects a draft with nothing to compile', async () => {
    const project = makeProject(makeFolder('draft', 'Draft', FolderKind.DRAFT));

    await expect(new CompileService().compile(project)).rejects.toMatchObject({
      kind: CompileErrorKind.NO_DOCUMENTS,
    });
  });

  it('zips a Scrivener bundle for the scrivener format', async () => {
    const scrivenerExporter = new ScrivenerExporter({ now: () => NOW, generateUuid: counter('UUID'), tempDir: tmpDir });
    const events: CompileProgress[] = [];

    const result = await new CompileService({ now: () => NOW, scrivenerExporter }).compile(
      sampleProject(),
      { format: 'scrivener' },
      progress => events.push(progress)
    );

    expect(result.filename).toBe('test-novel.scriv.zip');
    expect(result.data.readUInt32LE(0)).toBe(0x04034b50);
    expect(events[events.length - 1].phase).toBe('complete');
  });

  it('wraps unexpected exporter failures', async () => {
    class FailingExporter extends ScrivenerExporter {
      async exportAsZip(): Promise<Buffer> {
        throw new Error('disk full');
      }
    }
    const service = new CompileService({ scrivenerExporter: new FailingExporter() });

    const failure = await service.compile(sampleProject(), { format: 'scrivener' }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CompileError);
    expect(failure).toMatchObject({ kind: CompileErrorKind.EXPORT_FAILED, message: 'Export failed: disk full' });
  });

  it('rejects invalid settings before collecting', async () => {
    await expect(new CompileService().compile(sampleProject(), { fontSize: -1 })).rejects.toThrow(
      'Invalid compile settings:\n  fontSize: Number must be greater than 0'
    );
  });
});

describe('CompileService.calculateStatistics', () => {
  it('counts words and characters', () => {
    const stats = new CompileService().calculateStatistics([
      compilable('A', 'one two  three'),
      compilable('B', 'héllo'),
    ]);

    expect(stats).toEqual({ documentCount: 2, wordCount: 4, characterCount: 19, estimatedPages: 1 });
  });

  it('estimates a page per 250 words', () => {
    const stats = new CompileService().calculateStatistics([compilable('A', 'word '.repeat(600))]);

    expect(stats.wordCount).toBe(600);
    expect(stats.estimatedPages).toBe(2);
  });
});
