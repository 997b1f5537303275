/**
 * Reads Files/writing.history:
 *   <Day Date="2025-01-15" WordCount="1500" DraftWordCount="50000" Duration="3600"/>
 * Older files use Words, TotalWords and SessionDuration instead.
 */

import { SaxesParser } from 'saxes';
import { WritingHistoryEntry } from '../types';
import { XmlParsingFailed, errorMessage } from '../errors';
import { parseScrivenerDate } from './dates';

function integer(value: string | undefined): number | undefined {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) return undefined;
  return parseInt(value, 10);
}

function decimal(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseWritingHistory(xml: string): WritingHistoryEntry[] {
  const entries: WritingHistoryEntry[] = [];

  const parser = new SaxesParser();
  parser.on('opentag', tag => {
    if (tag.name !== 'Day') return;
    const read = (name: string): string | undefined => {
      const value = tag.attributes[name];
      return typeof value === 'string' ? value : undefined;
    };

    const day = read('Date');
    if (!day || !/^\d{4}-\d{2}-\d{2}$/.test(day)) return;
    const date = parseScrivenerDate(day);
    if (!date) return;

    entries.push({
      date,
      wordsWritten: integer(read('WordCount') ?? read('Words')) ?? 0,
      draftWordCount: integer(read('DraftWordCount') ?? read('TotalWords')),
      sessionDuration: decimal(read('Duration') ?? read('SessionDuration')),
    });
  });

  try {
    parser.write(xml).close();
  } catch (error) {
    throw new XmlParsingFailed(errorMessage(error));
  }
  return entries;
}
