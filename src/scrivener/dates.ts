/**
 * Date formats found in Scrivener manifests and history files.
 *
 * Values without a zone are read as UTC so that parsing does not depend on
 * the machine running the import.
 */

interface DatePattern {
  name: string;
  regex: RegExp;
}

// Groups: year, month, day, hour, minute, second, zone
const DATE_PATTERNS: DatePattern[] = [
  {
    name: 'ISO-8601 date-time',
    regex: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:\d{2})$/,
  },
  { name: 'ISO-8601 date', regex: /^(\d{4})-(\d{2})-(\d{2})$/ },
  {
    name: 'yyyy-MM-dd HH:mm:ss Z',
    regex: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) ?(Z|[+-]\d{4}|[+-]\d{2}:\d{2})$/,
  },
  { name: 'yyyy-MM-dd HH:mm:ss', regex: /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/ },
  { name: "yyyy-MM-dd'T'HH:mm:ss", regex: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/ },
  {
    name: "yyyy-MM-dd'T'HH:mm:ssZ",
    regex: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})([+-]\d{4})$/,
  },
];

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z') return 0;
  const digits = zone.replace(':', '');
  const sign = digits.startsWith('-') ? -1 : 1;
  const hours = parseInt(digits.slice(1, 3), 10);
  const minutes = parseInt(digits.slice(3, 5), 10);
  return sign * (hours * 60 + minutes);
}

function buildDate(match: RegExpExecArray): Date | undefined {
  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map(part => (part === undefined ? 0 : parseInt(part, 10)));

  const utc = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(utc);
  // Reject out-of-range fields that Date.UTC would silently roll over
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return new Date(utc - zoneOffsetMinutes(match[7]) * 60_000);
}

/**
 * Tries each known format in turn. Returns undefined when none fits.
 */
export function parseScrivenerDate(value: string | undefined): Date | undefined {
  const text = value?.trim();
  if (!text) return undefined;

  for (const pattern of DATE_PATTERNS) {
    const match = pattern.regex.exec(text);
    if (!match) continue;
    const date = buildDate(match);
    if (date) return date;
  }
  return undefined;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

export function formatDay(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * "yyyy-MM-dd HH:mm:ss +0000", always in UTC
 */
export function formatScrivenerDate(date: Date): string {
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${formatDay(date)} ${time} +0000`;
}
