/**
 * File-name slug: lowercase words joined by "-". Empty input gives "Untitled".
 */
export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(part => part.length > 0)
    .join('-');
  return slug || 'Untitled';
}

/**
 * Heading anchor as most Markdown renderers generate it: lowercase, spaces to
 * hyphens, other punctuation dropped.
 */
export function headingAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/ /g, '-')
    .replace(/[^\p{L}\p{N}-]/gu, '');
}
