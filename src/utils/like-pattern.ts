/**
 * Case-insensitive "contains" pattern for `LOWER(column) LIKE :pattern
 * ESCAPE '\'`. Wildcards typed by the user match literally.
 */
export function containsPattern(text: string): string {
  const escaped = text
    .trim()
    .toLowerCase()
    .replace(/[\\%_]/g, (character) => `\\${character}`);
  return `%${escaped}%`;
}
