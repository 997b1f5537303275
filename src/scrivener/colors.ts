/**
 * Color conversions between Scrivener's "R G B" float triples and hex strings
 */

import { RgbColor } from './models';
import { CONSTANTS } from '../constants';

const GRAY: RgbColor = { red: 0.5, green: 0.5, blue: 0.5 };

/**
 * Parses "R G B" floats. Fewer than three numeric components gives mid-gray.
 */
export function parseRgb(value: string | undefined): RgbColor {
  const components = (value ?? CONSTANTS.FALLBACK_GRAY)
    .trim()
    .split(/\s+/)
    .map(Number)
    .filter(component => Number.isFinite(component));
  if (components.length < 3) return { ...GRAY };
  const [red, green, blue] = components;
  return { red, green, blue };
}

export function formatRgb(color: RgbColor): string {
  return [color.red, color.green, color.blue].map(component => component.toFixed(6)).join(' ');
}

function toByte(component: number): number {
  return Math.min(255, Math.max(0, Math.trunc(component * 255)));
}

export function rgbToHex(color: RgbColor): string {
  return (
    '#' +
    [color.red, color.green, color.blue]
      .map(component => toByte(component).toString(16).toUpperCase().padStart(2, '0'))
      .join('')
  );
}

/**
 * "#RRGGBB" or "#RGB" to floats. Anything else gives mid-gray.
 */
export function hexToRgb(hex: string): RgbColor {
  let digits = hex.trim().replace(/^#/, '');
  if (/^[0-9a-f]{3}$/i.test(digits)) {
    digits = digits
      .split('')
      .map(digit => digit + digit)
      .join('');
  }
  if (!/^[0-9a-f]{6}$/i.test(digits)) return { ...GRAY };
  return {
    red: parseInt(digits.slice(0, 2), 16) / 255,
    green: parseInt(digits.slice(2, 4), 16) / 255,
    blue: parseInt(digits.slice(4, 6), 16) / 255,
  };
}

const NAME_KEYWORDS: Array<[string[], string]> = [
  [['red', 'urgent', 'critical'], 'Red'],
  [['orange', 'important'], 'Orange'],
  [['yellow', 'review'], 'Yellow'],
  [['green', 'done', 'complete'], 'Green'],
  [['blue', 'info'], 'Blue'],
  [['purple', 'violet'], 'Purple'],
  [['pink'], 'Pink'],
];

/**
 * Picks a document color name for a label. The label name wins over its
 * color value.
 */
export function labelColorName(label: { name: string; color: string }): string {
  const name = label.name.toLowerCase();
  const color = label.color.toLowerCase();

  for (const [keywords, colorName] of NAME_KEYWORDS) {
    if (keywords.some(keyword => name.includes(keyword))) return colorName;
  }

  if (color.startsWith('#ff') && !color.startsWith('#ff0') && !color.startsWith('#fff')) return 'Red';
  if (color.startsWith('#00ff') || color.startsWith('#0f0')) return 'Green';
  if (color.startsWith('#0000ff') || color.startsWith('#00f')) return 'Blue';

  return CONSTANTS.DEFAULT_COLOR_NAME;
}
