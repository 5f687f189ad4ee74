export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Lower-cases, drops a trailing colon and collapses whitespace: "Entity  Name:" -> "entity name". */
export function normalizeLabel(text: string): string {
  return collapseWhitespace(text).replace(/:\s*$/, '').toLowerCase();
}

export function titleCase(text: string): string {
  return collapseWhitespace(text)
    .toLowerCase()
    .replace(/(^|[\s/-])([a-z])/g, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

// Only the plural forms registry section headings actually use
export function singularize(word: string): string {
  if (/ies$/i.test(word)) return word.slice(0, -3) + 'y';
  if (/(ss|us)$/i.test(word)) return word;
  if (/s$/i.test(word)) return word.slice(0, -1);
  return word;
}

/** Joins address lines with ", " after trimming, skipping blanks and stray separators. */
export function joinAddressLines(lines: readonly string[]): string {
  return lines
    .map(line => collapseWhitespace(line).replace(/^,+\s*|\s*,+$/g, ''))
    .filter(line => line.length > 0)
    .join(', ');
}
