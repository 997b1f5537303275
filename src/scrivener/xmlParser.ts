/**
 * Streaming parser for Scrivener .scrivx manifests.
 *
 * One pass over SAX events rebuilds the binder tree plus the label, status,
 * keyword and target tables. Elements such as Title or Keywords occur in
 * several unrelated places, so every handler keys off context flags rather
 * than nesting depth.
 */

import { SaxesParser } from 'saxes';
import { v4 as uuidv4 } from 'uuid';
import {
  BinderItem,
  ScrivenerKeyword,
  ScrivenerLabel,
  ScrivenerProject,
  ScrivenerStatus,
  ScrivenerTargets,
  ScrivenerVersion,
  toBinderItemType,
} from './models';
import { parseRgb } from './colors';
import { parseScrivenerDate } from './dates';
import { CONSTANTS } from '../constants';
import { XmlParsingFailed, errorMessage } from '../errors';

interface PartialBinderItem {
  id: string;
  uuid?: string;
  type: string;
  title: string;
  created?: Date;
  modified?: Date;
  synopsis?: string;
  labelId?: number;
  statusId?: number;
  includeInCompile: boolean;
  targetWordCount?: number;
  iconFileName?: string;
  keywordIds: number[];
}

interface PartialKeyword {
  id: number;
  title?: string;
  color?: string;
}

interface TagLike {
  name: string;
  attributes: Record<string, unknown>;
}

function attribute(tag: TagLike, name: string): string | undefined {
  const value = tag.attributes[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && 'value' in value && typeof value.value === 'string') {
    return value.value;
  }
  return undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*-?\d+\s*$/.test(value)) return undefined;
  return parseInt(value, 10);
}

function isYes(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'yes' || normalized === 'true';
}

export class BinderXmlParser {
  private projectTitle = '';
  private labels: ScrivenerLabel[] = [];
  private statuses: ScrivenerStatus[] = [];
  private keywords: ScrivenerKeyword[] = [];
  private targets: ScrivenerTargets = BinderXmlParser.emptyTargets();

  private currentText = '';

  private itemStack: PartialBinderItem[] = [];
  private childrenStack: BinderItem[][] = [[]];

  private currentLabel?: { id: number; color?: string };
  private currentStatusId?: number;
  private currentKeyword?: PartialKeyword;
  private currentItemKeywordIds: number[] = [];

  // Context flags
  private inBinder = false;
  private inLabelSettings = false;
  private inStatusSettings = false;
  private inKeywordSettings = false;
  private inProjectTargets = false;
  private inItemKeywords = false;

  private static emptyTargets(): ScrivenerTargets {
    return {
      deadlineIgnored: false,
      draftCountIncludedOnly: true,
      sessionAllowNegatives: false,
    };
  }

  /**
   * Parses manifest XML. The version is always reported as v3 here; the
   * importer decides it from the bundle layout.
   */
  parse(xml: string): ScrivenerProject {
    this.reset();

    const parser = new SaxesParser();
    parser.on('opentag', tag => this.handleOpen(tag));
    parser.on('closetag', tag => this.handleClose(tag.name));
    parser.on('text', text => {
      this.currentText += text;
    });
    parser.on('cdata', text => {
      this.currentText += text;
    });

    try {
      parser.write(xml.replace(/^\uFEFF/, '')).close();
    } catch (error) {
      throw new XmlParsingFailed(errorMessage(error));
    }

    return {
      title: this.projectTitle || CONSTANTS.UNTITLED_PROJECT,
      version: ScrivenerVersion.V3,
      binderItems: this.childrenStack[0] ?? [],
      labels: this.labels,
      statuses: this.statuses,
      keywords: this.keywords,
      targets: this.targets,
    };
  }

  private reset(): void {
    this.projectTitle = '';
    this.labels = [];
    this.statuses = [];
    this.keywords = [];
    this.targets = BinderXmlParser.emptyTargets();
    this.currentText = '';
    this.itemStack = [];
    this.childrenStack = [[]];
    this.currentLabel = undefined;
    this.currentStatusId = undefined;
    this.currentKeyword = undefined;
    this.currentItemKeywordIds = [];
    this.inBinder = false;
    this.inLabelSettings = false;
    this.inStatusSettings = false;
    this.inKeywordSettings = false;
    this.inProjectTargets = false;
    this.inItemKeywords = false;
  }

  private get currentItem(): PartialBinderItem | undefined {
    return this.itemStack[this.itemStack.length - 1];
  }

  private handleOpen(tag: TagLike): void {
    this.currentText = '';

    switch (tag.name) {
      case 'Binder':
        this.inBinder = true;
        break;

      case 'LabelSettings':
        this.inLabelSettings = true;
        break;

      case 'StatusSettings':
        this.inStatusSettings = true;
        break;

      case 'KeywordSettings':
        this.inKeywordSettings = true;
        break;

      case 'ProjectTargets':
        this.inProjectTargets = true;
        break;

      case 'DraftTarget':
        if (this.inProjectTargets) {
          this.targets.deadline = parseScrivenerDate(attribute(tag, 'Deadline'));
          this.targets.deadlineIgnored = isYes(attribute(tag, 'IgnoreDeadline'));
          const countIncluded = attribute(tag, 'CountIncludedOnly');
          this.targets.draftCountIncludedOnly = countIncluded === undefined || isYes(countIncluded);
        }
        break;

      case 'SessionTarget':
        if (this.inProjectTargets) {
          this.targets.sessionResetType = attribute(tag, 'ResetType');
          this.targets.sessionResetTime = attribute(tag, 'ResetTime');
          this.targets.sessionAllowNegatives = isYes(attribute(tag, 'AllowNegatives'));
        }
        break;

      case 'BinderItem':
        if (this.inBinder) {
          this.itemStack.push({
            id: attribute(tag, 'ID') ?? uuidv4().toUpperCase(),
            uuid: attribute(tag, 'UUID'),
            type: attribute(tag, 'Type') ?? 'Text',
            title: '',
            created: parseScrivenerDate(attribute(tag, 'Created')),
            modified: parseScrivenerDate(attribute(tag, 'Modified')),
            includeInCompile: true,
            keywordIds: [],
          });
          this.childrenStack.push([]);
        }
        break;

      case 'Label':
        if (this.inLabelSettings) {
          const id = parseInteger(attribute(tag, 'ID'));
          this.currentLabel = id === undefined ? undefined : { id, color: attribute(tag, 'Color') };
        }
        break;

      case 'Status':
        if (this.inStatusSettings) {
          this.currentStatusId = parseInteger(attribute(tag, 'ID'));
        }
        break;

      case 'Keywords':
        if (this.currentItem) {
          this.inItemKeywords = true;
          this.currentItemKeywordIds = [];
        } else if (!this.inBinder) {
          // Project-level keyword table
          this.inKeywordSettings = true;
        }
        break;

      case 'Keyword':
        if (this.inKeywordSettings) {
          const id = parseInteger(attribute(tag, 'ID'));
          this.currentKeyword = id === undefined ? undefined : { id, color: attribute(tag, 'Color') };
        }
        break;

      default:
        break;
    }
  }

  private handleClose(name: string): void {
    const text = this.currentText.trim();
    const item = this.currentItem;

    switch (name) {
      case 'Binder':
        this.inBinder = false;
        break;

      case 'LabelSettings':
        this.inLabelSettings = false;
        break;

      case 'StatusSettings':
        this.inStatusSettings = false;
        break;

      case 'KeywordSettings':
        this.inKeywordSettings = false;
        break;

      case 'ProjectTargets':
        this.inProjectTargets = false;
        break;

      case 'ProjectTitle':
        this.projectTitle = text;
        break;

      case 'Title':
        if (this.currentKeyword) {
          this.currentKeyword.title = text;
        } else if (item) {
          item.title = text;
        }
        break;

      case 'Color':
        if (this.currentKeyword) this.currentKeyword.color = text;
        break;

      case 'Synopsis':
        if (item) item.synopsis = text;
        break;

      case 'LabelID':
        if (item) item.labelId = parseInteger(text) ?? item.labelId;
        break;

      case 'StatusID':
        if (item) item.statusId = parseInteger(text) ?? item.statusId;
        break;

      case 'IncludeInCompile':
        if (item) item.includeInCompile = isYes(text);
        break;

      case 'Target':
        if (item) item.targetWordCount = parseInteger(text) ?? item.targetWordCount;
        break;

      case 'IconFileName':
        if (item && text) item.iconFileName = text;
        break;

      case 'DraftTarget':
        if (this.inProjectTargets) this.targets.draftWordCount = parseInteger(text);
        break;

      case 'SessionTarget':
        if (this.inProjectTargets) this.targets.sessionWordCount = parseInteger(text);
        break;

      case 'BinderItem':
        if (this.inBinder) this.finishBinderItem();
        break;

      case 'Label':
        if (this.inLabelSettings && this.currentLabel) {
          this.labels.push({
            id: this.currentLabel.id,
            name: text,
            color: parseRgb(this.currentLabel.color),
          });
          this.currentLabel = undefined;
        }
        break;

      case 'Status':
        if (this.inStatusSettings && this.currentStatusId !== undefined) {
          this.statuses.push({ id: this.currentStatusId, name: text });
          this.currentStatusId = undefined;
        }
        break;

      case 'Keyword':
        if (this.inKeywordSettings && this.currentKeyword) {
          const keyword = this.currentKeyword;
          this.keywords.push({
            id: keyword.id,
            name: keyword.title ?? text,
            color: keyword.color === undefined ? undefined : parseRgb(keyword.color),
          });
          this.currentKeyword = undefined;
        }
        break;

      case 'KeywordID':
        if (this.inItemKeywords) {
          const id = parseInteger(text);
          if (id !== undefined) this.currentItemKeywordIds.push(id);
        }
        break;

      case 'Keywords':
        if (this.inItemKeywords && item) {
          item.keywordIds = this.currentItemKeywordIds;
          this.inItemKeywords = false;
          this.currentItemKeywordIds = [];
        } else if (!item && !this.inBinder) {
          this.inKeywordSettings = false;
        }
        break;

      default:
        break;
    }
  }

  private finishBinderItem(): void {
    const partial = this.itemStack.pop();
    if (!partial) return;
    const children = this.childrenStack.pop() ?? [];

    const item: BinderItem = {
      id: partial.id,
      uuid: partial.uuid,
      type: toBinderItemType(partial.type),
      title: partial.title || CONSTANTS.UNTITLED_ITEM,
      created: partial.created,
      modified: partial.modified,
      synopsis: partial.synopsis,
      labelId: partial.labelId,
      statusId: partial.statusId,
      includeInCompile: partial.includeInCompile,
      children,
      targetWordCount: partial.targetWordCount,
      iconFileName: partial.iconFileName,
      keywordIds: partial.keywordIds,
    };

    this.childrenStack[this.childrenStack.length - 1].push(item);
  }
}
