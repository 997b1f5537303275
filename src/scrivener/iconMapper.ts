/**
 * Maps Scrivener icon names ("Flag (Red)", "Lightbulb", …) to symbol names
 * with an optional hex tint.
 */

import iconMappings from './iconMappings.json';
import { BinderItemType } from './models';
import { CONSTANTS } from '../constants';

export interface IconMapping {
  symbol: string;
  colorHex?: string;
}

interface SymbolPair {
  outline: string;
  filled: string;
}

const CATEGORIES = new Map<string, SymbolPair>(Object.entries(iconMappings.categories));
const COLORS = new Map<string, string>(Object.entries(iconMappings.colors));
const ICONS = new Map<string, string>(Object.entries(iconMappings.icons));
const TYPES = new Map<string, string>(Object.entries(iconMappings.types));

const CHECKED_COLOR = '#00AA00';

const CATEGORY_WITH_VARIANT = /^(.+?)\s*\((.+?)\)$/;

function mapCategoryVariant(iconName: string): IconMapping | undefined {
  const match = CATEGORY_WITH_VARIANT.exec(iconName);
  if (!match) return undefined;

  const category = match[1].trim().toLowerCase();
  const variant = match[2].trim().toLowerCase();
  const pair = CATEGORIES.get(category);
  if (!pair) return undefined;

  const color = COLORS.get(variant);
  if (color) return { symbol: pair.filled, colorHex: color };
  if (variant === 'ticked' || variant === 'checked') return { symbol: pair.filled, colorHex: CHECKED_COLOR };
  return { symbol: pair.outline };
}

export function mapIcon(iconName: string | undefined, itemType: BinderItemType): IconMapping {
  if (iconName) {
    const variant = mapCategoryVariant(iconName);
    if (variant) return variant;

    const normalized = iconName.trim().toLowerCase();
    const direct = ICONS.get(normalized);
    if (direct) return { symbol: direct };

    if (normalized) {
      for (const [key, symbol] of ICONS) {
        if (normalized.includes(key) || key.includes(normalized)) return { symbol };
      }
    }
  }

  return { symbol: TYPES.get(itemType) ?? CONSTANTS.DEFAULT_ICON_NAME };
}
