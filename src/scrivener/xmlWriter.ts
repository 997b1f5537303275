/**
 * Builds the .scrivx manifest for a Scrivener 3 bundle.
 *
 * The manifest is assembled as text: Scrivener rejects files whose sections
 * after the Binder are not in exactly this order:
 * Collections, Keywords, SectionTypes, LabelSettings, StatusSettings,
 * ProjectTargets, RecentWritingHistory, PrintSettings.
 */

import * as os from 'os';
import { Document, Folder, Project } from '../types';
import { ExportMappings, UuidGenerator, scrivenerUuid } from './mappings';
import { BinderItemType } from './models';
import { formatRgb, hexToRgb } from './colors';
import { formatScrivenerDate } from './dates';
import { escapeXml } from '../util/xml';
import { isFolderEmpty, sortedByOrder } from '../util/tree';

const INDENT = '    ';

const KEYWORD_COLORS = [
  '0.993495 0.701227 0.732594', // red
  '0.995418 0.790968 0.65239', // orange
  '0.99772 0.892753 0.652574', // yellow
  '0.715848 0.948734 0.697698', // green
  '0.702312 0.888297 0.97426', // blue
  '0.957564 0.766768 0.999625', // purple
  '0.943039 0.654989 0.986895', // pink
  '0.584909 0.947715 0.802964', // teal
];

const PRINT_SETTINGS =
  'PaperSize="612.0,792.0" LeftMargin="72.0" RightMargin="72.0" TopMargin="90.0" BottomMargin="90.0" ' +
  'PaperType="na-letter" Orientation="Portrait" HorizontalPagination="Clip" VerticalPagination="Auto" ' +
  'ScaleFactor="1.0" HorizontallyCentered="Yes" VerticallyCentered="Yes" Collates="Yes" PagesAcross="1" PagesDown="1"';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface XmlWriterOptions {
  // Timestamp for Modified attributes and session dates
  now?: Date;
  generateUuid?: UuidGenerator;
  deviceName?: string;
  creator?: string;
}

const pad = (level: number): string => INDENT.repeat(level);

export class BinderXmlWriter {
  private readonly now: Date;
  private readonly generateUuid: UuidGenerator;
  private readonly deviceName: string;
  private readonly creator: string;

  constructor(
    private project: Project,
    private mappings: ExportMappings,
    options: XmlWriterOptions = {}
  ) {
    this.now = options.now ?? new Date();
    this.generateUuid = options.generateUuid ?? scrivenerUuid;
    this.deviceName = options.deviceName ?? os.hostname();
    this.creator = options.creator ?? 'BinderInterchange-1.0';
  }

  build(): string {
    const modified = formatScrivenerDate(this.now);
    let xml =
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
      `<ScrivenerProject Identifier="${this.generateUuid()}" Version="2.0" ` +
      `Creator="${escapeXml(this.creator)}" Device="${escapeXml(this.deviceName)}" ` +
      `Modified="${modified}" ModID="${this.generateUuid()}">\n` +
      `${pad(1)}<Binder>\n`;

    xml += this.buildFolderItem(this.project.rootFolder, BinderItemType.DRAFT_FOLDER, 2, false);

    const research = this.project.researchFolder;
    if (research && !isFolderEmpty(research)) {
      xml += this.buildFolderItem(research, BinderItemType.RESEARCH_FOLDER, 2, false);
    }
    const trash = this.project.trashFolder;
    if (trash && !isFolderEmpty(trash)) {
      xml += this.buildFolderItem(trash, BinderItemType.TRASH_FOLDER, 2, true);
    }

    xml += `${pad(1)}</Binder>\n`;

    xml += this.buildCollections();
    xml += this.buildKeywords();
    xml += this.buildSectionTypes();
    xml += this.buildLabelSettings();
    xml += this.buildStatusSettings();
    xml += this.buildProjectTargets();
    xml += this.buildRecentWritingHistory();
    xml += `${pad(1)}<PrintSettings ${PRINT_SETTINGS}/>\n`;

    xml += '</ScrivenerProject>\n';
    return xml;
  }

  // MARK: binder items

  private uuidFor(id: string): string {
    return this.mappings.uuids.get(id) ?? this.generateUuid();
  }

  private buildFolderItem(folder: Folder, type: BinderItemType, level: number, inTrash: boolean): string {
    const i = pad(level);
    const special =
      type === BinderItemType.DRAFT_FOLDER ||
      type === BinderItemType.RESEARCH_FOLDER ||
      type === BinderItemType.TRASH_FOLDER;

    let xml =
      `${i}<BinderItem UUID="${this.uuidFor(folder.id)}" Type="${type}" ` +
      `Created="${formatScrivenerDate(folder.creationDate)}" Modified="${formatScrivenerDate(this.now)}">\n` +
      `${i}${INDENT}<Title>${escapeXml(folder.title)}</Title>\n` +
      `${i}${INDENT}<MetaData>\n` +
      `${i}${INDENT}${INDENT}<IncludeInCompile>Yes</IncludeInCompile>\n` +
      `${i}${INDENT}</MetaData>\n`;

    if (!special) {
      xml +=
        `${i}${INDENT}<TextSettings>\n` +
        `${i}${INDENT}${INDENT}<TextSelection>0,0</TextSelection>\n` +
        `${i}${INDENT}</TextSettings>\n`;
    }

    const documents = sortedByOrder(folder.documents);
    const subfolders = sortedByOrder(folder.subfolders);
    if (documents.length > 0 || subfolders.length > 0) {
      xml += `${i}${INDENT}<Children>\n`;
      for (const document of documents) {
        xml += this.buildDocumentItem(document, level + 2, inTrash);
      }
      for (const subfolder of subfolders) {
        xml += this.buildFolderItem(subfolder, BinderItemType.FOLDER, level + 2, inTrash);
      }
      xml += `${i}${INDENT}</Children>\n`;
    }

    xml += `${i}</BinderItem>\n`;
    return xml;
  }

  private buildDocumentItem(document: Document, level: number, inTrash: boolean): string {
    const i = pad(level);
    const meta = `${i}${INDENT}${INDENT}`;

    let xml =
      `${i}<BinderItem UUID="${this.uuidFor(document.id)}" Type="${BinderItemType.TEXT}" ` +
      `Created="${formatScrivenerDate(document.creationDate)}" Modified="${formatScrivenerDate(this.now)}">\n` +
      `${i}${INDENT}<Title>${escapeXml(document.title)}</Title>\n` +
      `${i}${INDENT}<MetaData>\n` +
      `${meta}<IncludeInCompile>${document.includeInCompile ? 'Yes' : 'No'}</IncludeInCompile>\n`;

    if (document.labelId !== undefined) {
      xml += `${meta}<LabelID>${this.requireId(this.mappings.labelIds, document.labelId, 'label')}</LabelID>\n`;
    }
    if (document.statusId !== undefined) {
      xml += `${meta}<StatusID>${this.requireId(this.mappings.statusIds, document.statusId, 'status')}</StatusID>\n`;
    }

    const keywordIds: number[] = [];
    for (const keyword of document.keywords) {
      const id = this.mappings.keywordIds.get(keyword);
      if (id !== undefined) {
        keywordIds.push(id);
      } else if (!inTrash) {
        throw new Error(`Keyword "${keyword}" was not registered before writing`);
      }
    }
    if (keywordIds.length > 0) {
      xml += `${meta}<Keywords>\n`;
      for (const id of keywordIds) xml += `${meta}${INDENT}<KeywordID>${id}</KeywordID>\n`;
      xml += `${meta}</Keywords>\n`;
    }

    xml +=
      `${i}${INDENT}</MetaData>\n` +
      `${i}${INDENT}<TextSettings>\n` +
      `${meta}<TextSelection>0,0</TextSelection>\n` +
      `${i}${INDENT}</TextSettings>\n`;

    if (document.synopsis) {
      xml += `${i}${INDENT}<Synopsis>${escapeXml(document.synopsis)}</Synopsis>\n`;
    }

    xml += `${i}</BinderItem>\n`;
    return xml;
  }

  private requireId(table: ReadonlyMap<string, number>, id: string, kind: string): number {
    const mapped = table.get(id);
    if (mapped === undefined) {
      throw new Error(`The ${kind} "${id}" was not registered before writing`);
    }
    return mapped;
  }

  // MARK: project sections

  private buildCollections(): string {
    return (
      `${pad(1)}<Collections>\n` +
      `${pad(2)}<Collection Type="Binder" ID="${this.generateUuid()}" Color="1.0 1.0 1.0">\n` +
      `${pad(3)}<Title>Binder</Title>\n` +
      `${pad(2)}</Collection>\n` +
      `${pad(1)}</Collections>\n`
    );
  }

  private buildKeywords(): string {
    if (this.mappings.keywords.length === 0) return '';

    let xml = `${pad(1)}<Keywords>\n`;
    this.mappings.keywords.forEach((keyword, index) => {
      xml +=
        `${pad(2)}<Keyword ID="${index}">\n` +
        `${pad(3)}<Title>${escapeXml(keyword)}</Title>\n` +
        `${pad(3)}<Color>${KEYWORD_COLORS[index % KEYWORD_COLORS.length]}</Color>\n` +
        `${pad(2)}</Keyword>\n`;
    });
    xml += `${pad(1)}</Keywords>\n`;
    return xml;
  }

  private buildSectionTypes(): string {
    const heading = this.generateUuid();
    const subHeading = this.generateUuid();
    const section = this.generateUuid();
    return (
      `${pad(1)}<SectionTypes>\n` +
      `${pad(2)}<TypeDefinitions>\n` +
      `${pad(3)}<Type ID="${heading}">Heading</Type>\n` +
      `${pad(3)}<Type ID="${subHeading}">Sub-Heading</Type>\n` +
      `${pad(3)}<Type ID="${section}">Section</Type>\n` +
      `${pad(2)}</TypeDefinitions>\n` +
      `${pad(2)}<LevelTypes>\n` +
      `${pad(3)}<Folders>\n${pad(4)}<Type>${heading}</Type>\n${pad(3)}</Folders>\n` +
      `${pad(3)}<Containers>\n${pad(4)}<Type>${section}</Type>\n${pad(3)}</Containers>\n` +
      `${pad(3)}<Files>\n${pad(4)}<Type>${section}</Type>\n${pad(3)}</Files>\n` +
      `${pad(2)}</LevelTypes>\n` +
      `${pad(1)}</SectionTypes>\n`
    );
  }

  private buildLabelSettings(): string {
    let xml =
      `${pad(1)}<LabelSettings>\n` +
      `${pad(2)}<Title>Label</Title>\n` +
      `${pad(2)}<DefaultLabelID>-1</DefaultLabelID>\n` +
      `${pad(2)}<Labels>\n` +
      `${pad(3)}<Label ID="-1">No Label</Label>\n`;
    this.project.labels.forEach((label, index) => {
      xml += `${pad(3)}<Label ID="${index}" Color="${formatRgb(hexToRgb(label.color))}">${escapeXml(label.name)}</Label>\n`;
    });
    xml += `${pad(2)}</Labels>\n${pad(1)}</LabelSettings>\n`;
    return xml;
  }

  private buildStatusSettings(): string {
    let xml =
      `${pad(1)}<StatusSettings>\n` +
      `${pad(2)}<Title>Status</Title>\n` +
      `${pad(2)}<DefaultStatusID>-1</DefaultStatusID>\n` +
      `${pad(2)}<StatusItems>\n` +
      `${pad(3)}<Status ID="-1">No Status</Status>\n`;
    this.project.statuses.forEach((status, index) => {
      xml += `${pad(3)}<Status ID="${index}">${escapeXml(status.name)}</Status>\n`;
    });
    xml += `${pad(2)}</StatusItems>\n${pad(1)}</StatusSettings>\n`;
    return xml;
  }

  private buildProjectTargets(): string {
    const targets = this.project.targets;
    const now = formatScrivenerDate(this.now);
    const deadline = targets.draftDeadline ? formatScrivenerDate(targets.draftDeadline) : now;
    const nextReset = formatScrivenerDate(new Date(this.now.getTime() + DAY_MS));

    const draftAttributes =
      'Type="Words" CountIncludedOnly="Yes" CurrentCompileGroupOnly="No"' +
      ` Deadline="${deadline}" IgnoreDeadline="${targets.draftDeadlineIgnored ? 'Yes' : 'No'}"`;

    const sessionAttributes =
      'Type="Words" CountDraftOnly="Yes"' +
      ` AllowNegatives="${targets.sessionAllowNegatives ? 'Yes' : 'No'}"` +
      ` NextResetDate="${nextReset}"` +
      ` ResetType="${targets.sessionResetType === 'time' ? 'Time' : 'Midnight'}"` +
      ` ResetTime="${escapeXml(targets.sessionResetTime ?? '00:00')}"` +
      ' DeterminedFromDeadline="No" WritingDays="" CanWriteOnDeadlineDate="No"';

    return (
      `${pad(1)}<ProjectTargets Notify="No">\n` +
      `${pad(2)}<DraftTarget ${draftAttributes}>${targets.draftWordCount ?? 0}</DraftTarget>\n` +
      `${pad(2)}<SessionTarget ${sessionAttributes}>${targets.sessionWordCount ?? 0}</SessionTarget>\n` +
      `${pad(2)}<PreviousSession Words="0" Characters="0" Date="${now}"/>\n` +
      `${pad(1)}</ProjectTargets>\n`
    );
  }

  private buildRecentWritingHistory(): string {
    return (
      `${pad(1)}<RecentWritingHistory Date="${formatScrivenerDate(this.now)}">\n` +
      `${pad(2)}<DraftWordCount>0</DraftWordCount>\n` +
      `${pad(2)}<DraftCharCount>0</DraftCharCount>\n` +
      `${pad(2)}<OtherWordCount>0</OtherWordCount>\n` +
      `${pad(2)}<OtherCharCount>0</OtherCharCount>\n` +
      `${pad(1)}</RecentWritingHistory>\n`
    );
  }
}
