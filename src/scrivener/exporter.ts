/**
 * In-memory project → Scrivener 3 bundle.
 *
 * The bundle is staged in a temporary directory and only moved into place
 * once every file is written. A cancelled or failed export leaves the
 * staging directory behind; nothing is rolled back.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Folder, Logger, ProgressCallback, Project } from '../types';
import { ExportMappings, UuidGenerator, buildExportMappings } from './mappings';
import { BinderXmlWriter } from './xmlWriter';
import { ZipArchiveWriter } from '../archive/zipArchiveWriter';
import { markdownToRtf } from '../richtext/rtfWriter';
import { ExportError } from '../errors';
import { CONSTANTS } from '../constants';
import { silentLogger } from '../logger';
import { slugify } from '../util/slug';
import { countDocuments, forEachDocument, isFolderEmpty, projectFolders, sortedByOrder } from '../util/tree';

export interface ScrivenerExporterOptions {
  logger?: Logger;
  now?: () => Date;
  generateUuid?: UuidGenerator;
  deviceName?: string;
  // Parent for staging directories; defaults to the OS temp dir
  tempDir?: string;
}

interface StagedBundle {
  stagingDir: string;
  bundleDir: string;
  bundleName: string;
}

/**
 * Lists labels and statuses that documents point at but the project tables
 * don't define.
 */
export function findInvalidReferences(project: Project): string[] {
  const labelIds = new Set(project.labels.map(label => label.id));
  const statusIds = new Set(project.statuses.map(status => status.id));
  const problems: string[] = [];

  for (const folder of projectFolders(project)) {
    forEachDocument(folder, document => {
      if (document.labelId !== undefined && !labelIds.has(document.labelId)) {
        problems.push(`document "${document.title}" uses unknown label "${document.labelId}"`);
      }
      if (document.statusId !== undefined && !statusIds.has(document.statusId)) {
        problems.push(`document "${document.title}" uses unknown status "${document.statusId}"`);
      }
    });
  }
  return problems;
}

async function makeDirectory(directory: string): Promise<void> {
  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (error) {
    throw ExportError.failedToCreateDirectory(directory, error);
  }
}

async function writeFile(filePath: string, contents: string): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, contents, 'utf-8');
  } catch (error) {
    throw ExportError.failedToWriteFile(filePath, error);
  }
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

async function moveDirectory(source: string, target: string): Promise<void> {
  try {
    await fs.promises.rename(source, target);
  } catch (error) {
    if (!isCrossDeviceError(error)) throw error;
    // rename can't cross filesystems
    await fs.promises.cp(source, target, { recursive: true });
    await fs.promises.rm(source, { recursive: true, force: true });
  }
}

async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const walk = async (directory: string): Promise<void> => {
    const entries = await fs.promises.readdir(directory, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  };
  await walk(root);
  return files;
}

export class ScrivenerExporter {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateUuid?: UuidGenerator;
  private readonly deviceName?: string;
  private readonly tempDir: string;

  constructor(options: ScrivenerExporterOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.generateUuid = options.generateUuid;
    this.deviceName = options.deviceName;
    this.tempDir = options.tempDir ?? os.tmpdir();
  }

  /**
   * Writes `<slug>.scriv` into destDir, replacing a bundle of the same name.
   * Returns the bundle path.
   */
  async export(
    project: Project,
    destDir: string,
    onProgress?: ProgressCallback,
    signal?: AbortSignal
  ): Promise<string> {
    const staged = await this.stage(project, onProgress, signal);

    onProgress?.(0.98, 'Finalizing...');
    await makeDirectory(destDir);
    const target = path.join(destDir, staged.bundleName);
    await fs.promises.rm(target, { recursive: true, force: true });
    try {
      await moveDirectory(staged.bundleDir, target);
    } catch (error) {
      throw ExportError.failedToWriteFile(target, error);
    }
    await fs.promises.rm(staged.stagingDir, { recursive: true, force: true });

    this.logger.log(`[Export] ✓ Wrote ${target}`);
    onProgress?.(1.0, 'Export complete!');
    return target;
  }

  /**
   * Stages the bundle and packs it into a ZIP whose entries sit under
   * `<slug>.scriv/`.
   */
  async exportAsZip(project: Project, onProgress?: ProgressCallback, signal?: AbortSignal): Promise<Buffer> {
    const staged = await this.stage(project, (fraction, message) => onProgress?.(fraction * 0.8, message), signal);

    onProgress?.(0.85, 'Creating ZIP archive...');
    let archive: Buffer;
    try {
      const zip = new ZipArchiveWriter(this.now());
      for (const file of await listFiles(staged.bundleDir)) {
        const relative = path.relative(staged.stagingDir, file).split(path.sep).join('/');
        zip.addEntry(relative, await fs.promises.readFile(file));
      }
      onProgress?.(0.95, 'Finalizing...');
      archive = zip.finalize();
    } catch (error) {
      throw ExportError.failedToCreateZip(error);
    }

    await fs.promises.rm(staged.stagingDir, { recursive: true, force: true });
    this.logger.log(`[Export] ✓ Packed ${staged.bundleName} (${archive.length} bytes)`);
    onProgress?.(1.0, 'Export complete!');
    return archive;
  }

  private async stage(project: Project, onProgress?: ProgressCallback, signal?: AbortSignal): Promise<StagedBundle> {
    const report = (fraction: number, message: string): void => {
      if (signal?.aborted) throw ExportError.cancelled();
      onProgress?.(fraction, message);
    };

    report(0.05, 'Preparing export...');
    const problems = findInvalidReferences(project);
    if (problems.length > 0) {
      throw ExportError.invalidReference(problems);
    }
    const mappings = buildExportMappings(project, this.generateUuid);

    report(0.1, 'Creating project structure...');
    const slug = slugify(project.title || CONSTANTS.UNTITLED_ITEM);
    const bundleName = `${slug}.scriv`;
    let stagingDir: string;
    try {
      stagingDir = await fs.promises.mkdtemp(path.join(this.tempDir, 'binder-export-'));
    } catch (error) {
      throw ExportError.failedToCreateDirectory(this.tempDir, error);
    }
    const bundleDir = path.join(stagingDir, bundleName);
    const dataDir = path.join(bundleDir, 'Files', 'Data');
    await makeDirectory(dataDir);
    await makeDirectory(path.join(bundleDir, 'Settings'));
    this.logger.log(`[Export] Staging ${bundleName} in ${stagingDir}`);

    report(0.2, 'Generating project manifest...');
    const manifest = new BinderXmlWriter(project, mappings, {
      now: this.now(),
      generateUuid: this.generateUuid,
      deviceName: this.deviceName,
    }).build();
    await writeFile(path.join(bundleDir, `${slug}.scrivx`), manifest);

    report(0.3, 'Writing version file...');
    await writeFile(path.join(bundleDir, 'Files', 'version.txt'), CONSTANTS.SCRIVENER_FORMAT_VERSION);

    report(0.35, 'Converting documents...');
    const folders = [project.rootFolder];
    if (project.researchFolder && !isFolderEmpty(project.researchFolder)) folders.push(project.researchFolder);
    if (project.trashFolder && !isFolderEmpty(project.trashFolder)) folders.push(project.trashFolder);

    const total = Math.max(
      folders.reduce((count, folder) => count + countDocuments(folder), 0),
      1
    );
    const progress = { processed: 0, total };
    for (const folder of folders) {
      await this.writeFolder(folder, dataDir, mappings, progress, report);
    }

    return { stagingDir, bundleDir, bundleName };
  }

  private async writeFolder(
    folder: Folder,
    dataDir: string,
    mappings: ExportMappings,
    progress: { processed: number; total: number },
    report: (fraction: number, message: string) => void
  ): Promise<void> {
    const folderUuid = mappings.uuids.get(folder.id);
    if (folderUuid) await makeDirectory(path.join(dataDir, folderUuid));

    for (const document of sortedByOrder(folder.documents)) {
      const documentUuid = mappings.uuids.get(document.id);
      if (!documentUuid) continue;

      const documentDir = path.join(dataDir, documentUuid);
      await makeDirectory(documentDir);
      await writeFile(path.join(documentDir, 'content.rtf'), markdownToRtf(document.content));
      if (document.notes) {
        await writeFile(path.join(documentDir, 'notes.rtf'), markdownToRtf(document.notes));
      }
      if (document.synopsis) {
        await writeFile(path.join(documentDir, 'synopsis.txt'), document.synopsis);
      }

      progress.processed++;
      report(0.35 + (progress.processed / progress.total) * 0.6, `Converting: ${document.title}`);
    }

    for (const subfolder of sortedByOrder(folder.subfolders)) {
      await this.writeFolder(subfolder, dataDir, mappings, progress, report);
    }
  }
}
