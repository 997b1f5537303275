/**
 * Scrivener bundle → in-memory project
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  Document,
  DocumentComment,
  Folder,
  FolderKind,
  ImportWarning,
  Label,
  Logger,
  ProgressCallback,
  Project,
  ProjectTargets,
  Status,
  WarningSeverity,
  WritingHistoryEntry,
} from '../types';
import {
  BinderItem,
  BinderItemType,
  DEFAULT_IMPORT_OPTIONS,
  ImportCounters,
  ImportResult,
  ScrivenerImportOptions,
  ScrivenerProject,
  ScrivenerTargets,
  ScrivenerValidationResult,
  ScrivenerVersion,
  countBinderItems,
  hasMediaContent,
  importSummary,
  isMediaType,
} from './models';
import { BinderItemShape, classifyBinderItem } from './classify';
import { BinderXmlParser } from './xmlParser';
import { parseComments } from './commentsParser';
import { parseWritingHistory } from './writingHistory';
import { mapIcon } from './iconMapper';
import { labelColorName, rgbToHex } from './colors';
import { DEFAULT_LABELS, DEFAULT_STATUSES, createFolder } from '../project/defaults';
import { rtfToMarkdown } from '../richtext/rtfReader';
import { ImportError, XmlParsingFailed, errorMessage } from '../errors';
import { CONSTANTS } from '../constants';
import { silentLogger } from '../logger';

export interface ScrivenerImporterOptions {
  logger?: Logger;
  largeProjectThreshold?: number;
  // Used for items that carry no creation date
  now?: () => Date;
}

/**
 * Per-run totals, threaded through the binder conversion
 */
interface ImportAccumulator extends ImportCounters {
  warnings: ImportWarning[];
  converted: number;
}

/**
 * Read-only inputs for one import run
 */
interface ConversionContext {
  bundlePath: string;
  version: ScrivenerVersion;
  options: ScrivenerImportOptions;
  labels: Map<number, Label>;
  statuses: Map<number, Status>;
  keywords: Map<number, string>;
  onItem: (title: string) => void;
  signal?: AbortSignal;
}

interface ItemPaths {
  content: string;
  notes: string;
  synopsis: string;
  comments?: string;
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function findScrivxFile(bundlePath: string): Promise<string | undefined> {
  try {
    const entries = await fs.promises.readdir(bundlePath);
    const scrivx = entries.sort().find(entry => path.extname(entry) === '.scrivx');
    return scrivx === undefined ? undefined : path.join(bundlePath, scrivx);
  } catch {
    return undefined;
  }
}

async function detectVersion(bundlePath: string): Promise<ScrivenerVersion> {
  return (await exists(path.join(bundlePath, 'Files', 'Data'))) ? ScrivenerVersion.V3 : ScrivenerVersion.V2;
}

function bundleName(bundlePath: string): string {
  return path.basename(bundlePath, path.extname(bundlePath));
}

function resolveTitle(scrivenerTitle: string, bundlePath: string): string {
  return scrivenerTitle && scrivenerTitle !== CONSTANTS.UNTITLED_PROJECT ? scrivenerTitle : bundleName(bundlePath);
}

function itemPaths(item: BinderItem, context: ConversionContext): ItemPaths {
  if (context.version === ScrivenerVersion.V3) {
    const dataDir = path.join(context.bundlePath, 'Files', 'Data');
    if (item.uuid) {
      const itemDir = path.join(dataDir, item.uuid);
      return {
        content: path.join(itemDir, 'content.rtf'),
        notes: path.join(itemDir, 'notes.rtf'),
        synopsis: path.join(itemDir, 'synopsis.txt'),
        comments: path.join(itemDir, 'content.comments'),
      };
    }
    return {
      content: path.join(dataDir, `${item.id}.rtf`),
      notes: path.join(dataDir, `${item.id}_notes.rtf`),
      synopsis: path.join(dataDir, `${item.id}_synopsis.txt`),
    };
  }
  const docsDir = path.join(context.bundlePath, 'Files', 'Docs');
  return {
    content: path.join(docsDir, `${item.id}.rtf`),
    notes: path.join(docsDir, `${item.id}_notes.rtf`),
    synopsis: path.join(docsDir, `${item.id}_synopsis.txt`),
  };
}

function mapTargets(targets: ScrivenerTargets): ProjectTargets {
  return {
    draftWordCount: targets.draftWordCount,
    draftDeadline: targets.deadline,
    draftDeadlineIgnored: targets.deadlineIgnored,
    sessionWordCount: targets.sessionWordCount,
    sessionResetType: targets.sessionResetType?.toLowerCase() === 'time' ? 'time' : 'midnight',
    sessionResetTime: targets.sessionResetTime,
    sessionAllowNegatives: targets.sessionAllowNegatives,
  };
}

export class ScrivenerImporter {
  private readonly logger: Logger;
  private readonly largeProjectThreshold: number;
  private readonly now: () => Date;

  constructor(options: ScrivenerImporterOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.largeProjectThreshold = options.largeProjectThreshold ?? CONSTANTS.LARGE_PROJECT_THRESHOLD;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Pre-flight check. Never throws and never writes.
   */
  async validateProject(bundlePath: string): Promise<ScrivenerValidationResult> {
    const invalid = (error: string): ScrivenerValidationResult => ({
      isValid: false,
      projectTitle: '',
      itemCount: 0,
      version: ScrivenerVersion.V3,
      warnings: [],
      errors: [error],
    });

    if (!(await exists(bundlePath))) {
      return invalid(`File does not exist at ${bundlePath}`);
    }
    if (!(await isDirectory(bundlePath))) {
      return invalid('The selected file is not a Scrivener project bundle');
    }
    const scrivxPath = await findScrivxFile(bundlePath);
    if (!scrivxPath) {
      return invalid('Missing .scrivx file - this may not be a valid Scrivener project');
    }

    const warnings: string[] = [];
    const errors: string[] = [];
    const version = await detectVersion(bundlePath);

    const hasV3Data = await exists(path.join(bundlePath, 'Files', 'Data'));
    const hasV2Docs = await exists(path.join(bundlePath, 'Files', 'Docs'));
    if (!hasV3Data && !hasV2Docs) {
      warnings.push('No content directory found - documents may be empty');
    }

    let projectTitle = '';
    let itemCount = 0;
    try {
      const project = new BinderXmlParser().parse(await fs.promises.readFile(scrivxPath, 'utf-8'));
      projectTitle = project.title;
      itemCount = countBinderItems(project.binderItems);
      if (itemCount > this.largeProjectThreshold) {
        warnings.push(`Large project (${itemCount} items) - import may take a while`);
      }
      if (hasMediaContent(project.binderItems)) {
        warnings.push('Some media files (images, PDFs) will be referenced but not embedded');
      }
    } catch (error) {
      errors.push(`Could not parse project file: ${errorMessage(error)}`);
    }

    return {
      isValid: errors.length === 0,
      projectTitle: resolveTitle(projectTitle, bundlePath),
      itemCount,
      version,
      warnings,
      errors,
    };
  }

  async importProject(
    bundlePath: string,
    options: Partial<ScrivenerImportOptions> = {},
    onProgress?: ProgressCallback,
    signal?: AbortSignal
  ): Promise<ImportResult> {
    const settings: ScrivenerImportOptions = { ...DEFAULT_IMPORT_OPTIONS, ...options };
    const report = (fraction: number, message: string): void => {
      if (signal?.aborted) throw ImportError.cancelled();
      onProgress?.(fraction, message);
    };

    // 1. Validate
    report(0.05, 'Validating Scrivener project...');
    if (!(await isDirectory(bundlePath))) {
      throw ImportError.notABundle();
    }
    const scrivxPath = await findScrivxFile(bundlePath);
    if (!scrivxPath) {
      throw ImportError.missingProjectFile();
    }

    // 2. Parse the manifest
    report(0.1, 'Reading project structure...');
    this.logger.log(`[Import] Reading ${path.basename(scrivxPath)}`);
    const scrivener = await this.parseManifest(scrivxPath);
    const version = await detectVersion(bundlePath);
    const now = this.now();

    // 3. Metadata tables; -1 is Scrivener's "no label" / "no status"
    const labels = new Map<number, Label>();
    for (const label of scrivener.labels) {
      if (label.id < 0) continue;
      labels.set(label.id, { id: `scriv-label-${label.id}`, name: label.name, color: rgbToHex(label.color) });
    }
    const statuses = new Map<number, Status>();
    for (const status of scrivener.statuses) {
      if (status.id < 0) continue;
      statuses.set(status.id, { id: `scriv-status-${status.id}`, name: status.name });
    }
    const keywords = new Map<number, string>(scrivener.keywords.map(keyword => [keyword.id, keyword.name]));

    // 4. Convert the binder
    report(0.2, 'Converting documents...');
    const totalItems = Math.max(countBinderItems(scrivener.binderItems), 1);
    const accumulator: ImportAccumulator = {
      importedDocuments: 0,
      importedFolders: 0,
      skippedItems: 0,
      warnings: [],
      converted: 0,
    };
    const context: ConversionContext = {
      bundlePath,
      version,
      options: settings,
      labels,
      statuses,
      keywords,
      signal,
      onItem: title => {
        accumulator.converted++;
        report(0.2 + (accumulator.converted / totalItems) * 0.7, `Converting: ${title}`);
      },
    };

    let draft: Folder | undefined;
    let research: Folder | undefined;
    let trash: Folder | undefined;
    const loose: Folder[] = [];

    for (const item of scrivener.binderItems) {
      if (item.type === BinderItemType.TRASH_FOLDER && !settings.importTrash) {
        accumulator.skippedItems += countBinderItems([item]);
        continue;
      }
      if (item.type === BinderItemType.RESEARCH_FOLDER && !settings.importResearch) {
        accumulator.skippedItems += countBinderItems([item]);
        continue;
      }

      const folder = await this.convertBinderItem(item, context, accumulator, loose.length);
      switch (item.type) {
        case BinderItemType.DRAFT_FOLDER:
          draft = { ...folder, kind: FolderKind.DRAFT };
          break;
        case BinderItemType.RESEARCH_FOLDER:
          research = { ...folder, kind: FolderKind.RESEARCH };
          break;
        case BinderItemType.TRASH_FOLDER:
          trash = { ...folder, kind: FolderKind.TRASH };
          break;
        default:
          loose.push(folder);
      }
    }

    const title = resolveTitle(scrivener.title, bundlePath);
    const rootFolder = draft ?? createFolder(title, FolderKind.DRAFT, now);
    // Top-level items outside the three special folders hang off the draft
    const firstLooseOrder = rootFolder.subfolders.length + rootFolder.documents.length;
    loose.forEach((folder, index) => {
      rootFolder.subfolders.push({ ...folder, order: firstLooseOrder + index });
    });

    // 5. Writing history
    report(0.95, 'Importing writing history...');
    const writingHistory = await this.importWritingHistory(bundlePath, accumulator);

    const project: Project = {
      title,
      author: '',
      creationDate: now,
      modifiedDate: now,
      rootFolder,
      researchFolder: research,
      trashFolder: trash,
      labels: labels.size > 0 ? [...labels.values()] : DEFAULT_LABELS.map(label => ({ ...label })),
      statuses: statuses.size > 0 ? [...statuses.values()] : DEFAULT_STATUSES.map(status => ({ ...status })),
      targets: mapTargets(scrivener.targets),
      writingHistory,
    };

    report(1.0, 'Import complete!');

    const result: ImportResult = {
      project,
      warnings: accumulator.warnings,
      importedDocuments: accumulator.importedDocuments,
      importedFolders: accumulator.importedFolders,
      skippedItems: accumulator.skippedItems,
    };
    this.logger.log(`[Import] ✓ ${importSummary(result)}`);
    return result;
  }

  private async parseManifest(scrivxPath: string): Promise<ScrivenerProject> {
    let xml: string;
    try {
      xml = await fs.promises.readFile(scrivxPath, 'utf-8');
    } catch (error) {
      throw ImportError.fileReadFailed(scrivxPath, error);
    }
    try {
      return new BinderXmlParser().parse(xml);
    } catch (error) {
      if (error instanceof XmlParsingFailed) throw ImportError.xmlParsingFailed(error.detail, error);
      throw error;
    }
  }

  private async importWritingHistory(
    bundlePath: string,
    accumulator: ImportAccumulator
  ): Promise<WritingHistoryEntry[]> {
    const historyPath = path.join(bundlePath, 'Files', 'writing.history');
    if (!(await exists(historyPath))) return [];

    try {
      const entries = parseWritingHistory(await fs.promises.readFile(historyPath, 'utf-8'));
      if (entries.length > 0) {
        const total = entries.reduce((sum, entry) => sum + entry.wordsWritten, 0);
        this.logger.log(`[Import] Writing history: ${entries.length} days, ${total} total words`);
      }
      return entries;
    } catch (error) {
      accumulator.warnings.push({
        message: `Could not import writing history: ${errorMessage(error)}`,
        itemTitle: 'writing.history',
        severity: WarningSeverity.INFO,
      });
      return [];
    }
  }

  private async hasContent(item: BinderItem, context: ConversionContext): Promise<boolean> {
    return exists(itemPaths(item, context).content);
  }

  /**
   * Turns any binder item into a folder. Its own text, if any, becomes the
   * folder's first document and the children shift down by one.
   */
  private async convertBinderItem(
    item: BinderItem,
    context: ConversionContext,
    accumulator: ImportAccumulator,
    order: number
  ): Promise<Folder> {
    if (context.signal?.aborted) throw ImportError.cancelled();

    const hasContent = await this.hasContent(item, context);
    const folder = createFolder(item.title, FolderKind.SUBFOLDER, item.created ?? this.now(), order);
    accumulator.importedFolders++;

    if (hasContent) {
      try {
        folder.documents.push(await this.convertTextItem(item, context, accumulator, 0));
        accumulator.importedDocuments++;
      } catch (error) {
        accumulator.warnings.push({
          message: `Could not import folder content: ${errorMessage(error)}`,
          itemTitle: item.title,
          severity: WarningSeverity.WARNING,
        });
      }
      context.onItem(item.title);
    }

    for (const [index, child] of item.children.entries()) {
      if (context.signal?.aborted) throw ImportError.cancelled();
      const childOrder = hasContent ? index + 1 : index;
      await this.convertChild(child, folder, childOrder, context, accumulator);
    }

    return folder;
  }

  private async convertChild(
    child: BinderItem,
    parent: Folder,
    order: number,
    context: ConversionContext,
    accumulator: ImportAccumulator
  ): Promise<void> {
    if (isMediaType(child.type)) {
      accumulator.warnings.push({
        message: 'Media item skipped (not yet supported)',
        itemTitle: child.title,
        severity: WarningSeverity.INFO,
      });
      accumulator.skippedItems++;
      context.onItem(child.title);
      return;
    }

    if (child.type === BinderItemType.TRASH_FOLDER) {
      if (context.options.importTrash) {
        parent.subfolders.push(await this.convertBinderItem(child, context, accumulator, order));
      } else {
        accumulator.skippedItems += countBinderItems([child]);
      }
      return;
    }

    if (child.type === BinderItemType.ROOT || child.type === BinderItemType.OTHER) {
      parent.subfolders.push(await this.convertBinderItem(child, context, accumulator, order));
      return;
    }

    // Text and folder kinds: content and children decide the shape
    const hasChildren = child.children.length > 0;
    const hasContent = child.type === BinderItemType.TEXT || (await this.hasContent(child, context));
    const shape = classifyBinderItem(hasContent, hasChildren);

    switch (shape) {
      case BinderItemShape.BOTH:
      case BinderItemShape.FOLDER_ONLY:
        parent.subfolders.push(await this.convertBinderItem(child, context, accumulator, order));
        break;

      case BinderItemShape.DOCUMENT_ONLY:
        try {
          parent.documents.push(await this.convertTextItem(child, context, accumulator, order));
          accumulator.importedDocuments++;
        } catch (error) {
          accumulator.warnings.push({
            message: `Could not import document: ${errorMessage(error)}`,
            itemTitle: child.title,
            severity: WarningSeverity.WARNING,
          });
          accumulator.skippedItems++;
        }
        context.onItem(child.title);
        break;

      case BinderItemShape.EMPTY:
        // Keeps structural placeholders
        parent.subfolders.push(createFolder(child.title, FolderKind.SUBFOLDER, child.created ?? this.now(), order));
        accumulator.importedFolders++;
        context.onItem(child.title);
        break;
    }
  }

  private async readRtf(
    filePath: string,
    item: BinderItem,
    accumulator: ImportAccumulator,
    reportFailures: boolean
  ): Promise<string> {
    if (!(await exists(filePath))) return '';

    const bytes = await fs.promises.readFile(filePath);
    const converted = rtfToMarkdown(bytes);
    if (reportFailures && converted.outcome === 'plainText') {
      accumulator.warnings.push({
        message: `RTF could not be decoded; imported as plain text (${converted.detail ?? 'unknown error'})`,
        itemTitle: item.title,
        severity: WarningSeverity.INFO,
      });
    } else if (reportFailures && converted.outcome === 'empty') {
      accumulator.warnings.push({
        message: `Could not convert RTF content: ${converted.detail ?? 'unknown error'}`,
        itemTitle: item.title,
        severity: WarningSeverity.WARNING,
      });
    }
    return converted.markdown;
  }

  private async readComments(
    commentsPath: string | undefined,
    item: BinderItem,
    accumulator: ImportAccumulator
  ): Promise<DocumentComment[]> {
    if (!commentsPath || !(await exists(commentsPath))) return [];
    try {
      return parseComments(await fs.promises.readFile(commentsPath, 'utf-8'));
    } catch (error) {
      accumulator.warnings.push({
        message: `Could not import comments: ${errorMessage(error)}`,
        itemTitle: item.title,
        severity: WarningSeverity.INFO,
      });
      return [];
    }
  }

  private async convertTextItem(
    item: BinderItem,
    context: ConversionContext,
    accumulator: ImportAccumulator,
    order: number
  ): Promise<Document> {
    const paths = itemPaths(item, context);

    const content = await this.readRtf(paths.content, item, accumulator, true);
    // Notes are secondary; a bad notes file is not worth a warning
    const notes = await this.readRtf(paths.notes, item, accumulator, false);

    let synopsis = item.synopsis ?? '';
    if (await exists(paths.synopsis)) {
      synopsis = (await fs.promises.readFile(paths.synopsis, 'utf-8')).trim();
    }

    const label = item.labelId === undefined ? undefined : context.labels.get(item.labelId);
    const status = item.statusId === undefined ? undefined : context.statuses.get(item.statusId);
    const keywords = item.keywordIds
      .map(id => context.keywords.get(id))
      .filter((keyword): keyword is string => keyword !== undefined);
    const icon = mapIcon(item.iconFileName, item.type);

    return {
      id: uuidv4(),
      title: item.title,
      content,
      notes,
      synopsis,
      creationDate: item.created ?? this.now(),
      order,
      labelId: label?.id,
      statusId: status?.id,
      keywords,
      includeInCompile: item.includeInCompile,
      colorName: label ? labelColorName(label) : CONSTANTS.DEFAULT_COLOR_NAME,
      iconName: icon.symbol,
      iconColor: icon.colorHex,
      targetWordCount: item.targetWordCount,
      comments: await this.readComments(paths.comments, item, accumulator),
    };
  }
}
