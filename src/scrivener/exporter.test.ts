import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';
import { ScrivenerExporter, findInvalidReferences } from './exporter';
import { ScrivenerImporter } from './importer';
import { buildExportMappings, collectKeywords } from './mappings';
import { FolderKind, Project } from '../types';
import { ExportError, ExportErrorKind } from '../errors';
import { counter, makeDocument, makeFolder, makeProject } from '../testing/projectFixtures';

const NOW = new Date('2024-05-01T12:00:00Z');

let tmpDir: string;

function sampleProject(): Project {
  const draft = makeFolder('draft', 'Draft', FolderKind.DRAFT, {
    documents: [
      makeDocument('doc-1', 'Opening', {
        content: '# Start\nSome **bold** words',
        notes: 'Remember *this*',
        synopsis: 'The beginning',
        labelId: 'label-idea',
        keywords: ['beta', 'alpha'],
      }),
    ],
    subfolders: [
      makeFolder('part', 'Part Two', FolderKind.SUBFOLDER, {
        order: 1,
        documents: [
          makeDocument('doc-3', 'Second', { order: 1, content: 'Two' }),
          makeDocument('doc-2', 'First', { order: 0, content: 'One' }),
        ],
      }),
    ],
  });
  return makeProject(draft, {
    trashFolder: makeFolder('trash', 'Trash', FolderKind.TRASH, {
      documents: [makeDocument('doc-t', 'Cut', { keywords: ['gone'] })],
    }),
  });
}

function exporter(): ScrivenerExporter {
  return new ScrivenerExporter({
    now: () => NOW,
    generateUuid: counter('UUID'),
    deviceName: 'test-host',
    tempDir: tmpDir,
  });
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'exporter-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('export mappings', () => {
  it('numbers items in pre-order and keywords by sorted position', () => {
    const mappings = buildExportMappings(sampleProject(), counter('U'));

    expect([...mappings.uuids.entries()]).toEqual([
      ['draft', 'U-1'],
      ['doc-1', 'U-2'],
      ['part', 'U-3'],
      ['doc-2', 'U-4'],
      ['doc-3', 'U-5'],
      ['trash', 'U-6'],
      ['doc-t', 'U-7'],
    ]);
    expect(mappings.labelIds.get('label-idea')).toBe(2);
    expect(mappings.keywords).toEqual(['alpha', 'beta']);
  });

  it('leaves trash keywords out', () => {
    expect(collectKeywords(sampleProject())).toEqual(['alpha', 'beta']);
  });
});

describe('findInvalidReferences', () => {
  it('lists unknown labels and statuses', () => {
    const project = sampleProject();
    project.rootFolder.documents[0].labelId = 'label-x';
    project.rootFolder.documents[0].statusId = 'status-y';

    expect(findInvalidReferences(project)).toEqual([
      'document "Opening" uses unknown label "label-x"',
      'document "Opening" uses unknown status "status-y"',
    ]);
  });
});

describe('ScrivenerExporter.export', () => {
  it('writes the bundle layout', async () => {
    const dest = path.join(tmpDir, 'out');
    const bundle = await exporter().export(sampleProject(), dest);

    expect(bundle).toBe(path.join(dest, 'test-novel.scriv'));
    expect(fs.readFileSync(path.join(bundle, 'Files', 'version.txt'), 'utf-8')).toBe('16');
    expect(fs.existsSync(path.join(bundle, 'test-novel.scrivx'))).toBe(true);
    expect(fs.existsSync(path.join(bundle, 'Settings'))).toBe(true);

    // Draft folder UUID-1 gets a data directory but no content
    expect(fs.readdirSync(path.join(bundle, 'Files', 'Data', 'UUID-1'))).toEqual([]);
    expect(fs.readdirSync(path.join(bundle, 'Files', 'Data', 'UUID-2')).sort()).toEqual([
      'content.rtf',
      'notes.rtf',
      'synopsis.txt',
    ]);
    expect(fs.readdirSync(path.join(bundle, 'Files', 'Data', 'UUID-4'))).toEqual(['content.rtf']);
  });

  it('cleans up the staging directory', async () => {
    await exporter().export(sampleProject(), path.join(tmpDir, 'out'));
    expect(fs.readdirSync(tmpDir)).toEqual(['out']);
  });

  it('replaces an existing bundle', async () => {
    const dest = path.join(tmpDir, 'out');
    const stale = path.join(dest, 'test-novel.scriv', 'stale.txt');
    fs.mkdirSync(path.dirname(stale), { recursive: true });
    fs.writeFileSync(stale, 'old');

    await exporter().export(sampleProject(), dest);
    expect(fs.existsSync(stale)).toBe(false);
  });

  it('round-trips through the importer', async () => {
    const bundle = await exporter().export(sampleProject(), path.join(tmpDir, 'out'));
    const { project } = await new ScrivenerImporter({ now: () => NOW }).importProject(bundle, { importTrash: true });

    const opening = project.rootFolder.documents[0];
    expect(opening.title).toBe('Opening');
    expect(opening.content).toBe('# Start\nSome **bold** words');
    expect(opening.notes).toBe('Remember *this*');
    expect(opening.synopsis).toBe('The beginning');
    expect(opening.keywords).toEqual(['beta', 'alpha']);
    expect(opening.creationDate.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(project.labels.find(label => label.id === opening.labelId)?.name).toBe('Idea');

    const part = project.rootFolder.subfolders[0];
    expect(part.title).toBe('Part Two');
    expect(part.documents.map(doc => [doc.title, doc.content])).toEqual([
      ['First', 'One'],
      ['Second', 'Two'],
    ]);
    expect(project.trashFolder?.documents.map(doc => doc.title)).toEqual(['Cut']);
  });

  it('reports progress up to completion', async () => {
    const steps: Array<[number, string]> = [];
    await exporter().export(sampleProject(), path.join(tmpDir, 'out'), (fraction, message) =>
      steps.push([fraction, message])
    );

    expect(steps[0]).toEqual([0.05, 'Preparing export...']);
    expect(steps).toContainEqual([0.35 + 0.6 / 4, 'Converting: Opening']);
    expect(steps[steps.length - 1]).toEqual([1, 'Export complete!']);
  });

  it('refuses projects with dangling references', async () => {
    const project = sampleProject();
    project.rootFolder.documents[0].statusId = 'status-y';

    await expect(exporter().export(project, path.join(tmpDir, 'out'))).rejects.toMatchObject({
      kind: ExportErrorKind.INVALID_REFERENCE,
    });
  });

  it('stops when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      exporter().export(sampleProject(), path.join(tmpDir, 'out'), undefined, controller.signal)
    ).rejects.toThrow(ExportError);
  });
});

describe('ScrivenerExporter.exportAsZip', () => {
  it('packs the bundle under its folder name', async () => {
    const archive = await JSZip.loadAsync(await exporter().exportAsZip(sampleProject()));
    const names = Object.keys(archive.files).filter(name => !archive.files[name].dir);

    expect(names).toContain('test-novel.scriv/test-novel.scrivx');
    expect(names).toContain('test-novel.scriv/Files/version.txt');
    expect(names).toContain('test-novel.scriv/Files/Data/UUID-2/content.rtf');
    expect(await archive.file('test-novel.scriv/Files/version.txt')?.async('string')).toBe('16');
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});
