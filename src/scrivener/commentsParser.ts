/**
 * Reads Scrivener 3 content.comments files:
 *
 *   <Comments>
 *     <Comment ID="…" Color="R G B"><![CDATA[{\rtf1 …}]]></Comment>
 *   </Comments>
 */

import { SaxesParser } from 'saxes';
import { v4 as uuidv4 } from 'uuid';
import { DocumentComment } from '../types';
import { CONSTANTS } from '../constants';
import { XmlParsingFailed, errorMessage } from '../errors';
import { rtfToRuns } from '../richtext/rtfReader';
import { runsToMarkdown } from '../richtext/markdownBridge';
import { rgbToHex } from './colors';

function commentColor(value: string | undefined): string {
  if (value === undefined) return CONSTANTS.DEFAULT_COMMENT_COLOR;
  const components = value
    .trim()
    .split(/\s+/)
    .map(Number)
    .filter(component => Number.isFinite(component));
  if (components.length < 3) return CONSTANTS.DEFAULT_COMMENT_COLOR;
  return rgbToHex({ red: components[0], green: components[1], blue: components[2] });
}

/**
 * Last-resort text extraction for comment RTF the decoder rejects
 */
export function stripRtfControls(rtf: string): string {
  let text = rtf;
  const body = text.indexOf('\\pard');
  if (body >= 0) text = text.slice(body + '\\pard'.length);
  text = text
    .replace(/\\[a-z]+-?\d*\s?/g, '')
    .replace(/\{[^}]*\}/g, '')
    .replace(/\\\\/g, '')
    .replace(/[{}]/g, '');
  return text.trim();
}

function commentText(rtf: string): string {
  try {
    return runsToMarkdown(rtfToRuns(rtf));
  } catch {
    // Not decodable as RTF; keep whatever text can be salvaged
    return stripRtfControls(rtf);
  }
}

export function parseComments(xml: string): DocumentComment[] {
  const comments: DocumentComment[] = [];
  let current: { id?: string; color?: string; text: string } | undefined;

  const parser = new SaxesParser();
  parser.on('opentag', tag => {
    if (tag.name !== 'Comment') return;
    const id = tag.attributes.ID;
    const color = tag.attributes.Color;
    current = {
      id: typeof id === 'string' ? id : undefined,
      color: typeof color === 'string' ? color : undefined,
      text: '',
    };
  });
  parser.on('text', text => {
    if (current) current.text += text;
  });
  parser.on('cdata', cdata => {
    if (current) current.text = commentText(cdata);
  });
  parser.on('closetag', tag => {
    if (tag.name !== 'Comment' || !current) return;
    comments.push({
      id: current.id || uuidv4().toUpperCase(),
      text: current.text.trim(),
      color: commentColor(current.color),
    });
    current = undefined;
  });

  try {
    parser.write(xml).close();
  } catch (error) {
    throw new XmlParsingFailed(errorMessage(error));
  }
  return comments;
}
