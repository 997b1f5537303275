// Windows-1252 differs from Latin-1 only in 0x80–0x9F
const CP1252_HIGH = [
  0x20ac, 0xfffd, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021, 0x02c6, 0x2030, 0x0160, 0x2039,
  0x0152, 0xfffd, 0x017d, 0xfffd, 0xfffd, 0x2018, 0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014,
  0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0xfffd, 0x017e, 0x0178,
];

const ENCODE_HIGH = new Map<number, number>(
  CP1252_HIGH.flatMap((codePoint, index): Array<[number, number]> =>
    codePoint === 0xfffd ? [] : [[codePoint, 0x80 + index]]
  )
);

export function decodeCp1252(byte: number): string {
  if (byte >= 0x80 && byte <= 0x9f) return String.fromCharCode(CP1252_HIGH[byte - 0x80]);
  return String.fromCharCode(byte);
}

/**
 * Byte for a code point, or undefined when Windows-1252 can't represent it.
 */
export function encodeCp1252(codePoint: number): number | undefined {
  if (codePoint < 0x80 || (codePoint >= 0xa0 && codePoint <= 0xff)) return codePoint;
  return ENCODE_HIGH.get(codePoint);
}
