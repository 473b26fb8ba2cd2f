import { ValidationError } from "./errors";

/** Upper bound on search text handed to a backend */
export const MAX_SEARCH_LENGTH = 256;

/**
 * Escape LIKE metacharacters for use with `ESCAPE '\'`.
 * Backslash goes first so the escapes added for % and _ are not doubled.
 */
export function escapeLikePattern(input: string): string {
  return input.replace(/\\/g, "\\\\").replace(/%/g, "\\%").replace(/_/g, "\\_");
}

export function validateSearchText(
  searchText: string,
  maxLength: number = MAX_SEARCH_LENGTH
): void {
  if (searchText.length > maxLength) {
    throw new ValidationError(
      `Search text too long: ${searchText.length} characters (max: ${maxLength})`
    );
  }
}

/**
 * Length-checked `%text%` pattern for a substring match.
 */
export function prepareSafeLikePattern(
  searchText: string,
  maxLength: number = MAX_SEARCH_LENGTH
): string {
  validateSearchText(searchText, maxLength);
  return `%${escapeLikePattern(searchText)}%`;
}

/**
 * Case-insensitive substring test shared by the backends that scan pages in process.
 */
export function containsText(content: string, searchText: string): boolean {
  return content.toLowerCase().includes(searchText.toLowerCase());
}

/**
 * Cut a window around the first occurrence of `keyword`.
 */
export function extractSnippet(
  text: string,
  keyword: string,
  maxLength: number = 120
): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= maxLength) {
    return flat;
  }

  const index = keyword ? flat.toLowerCase().indexOf(keyword.toLowerCase()) : -1;
  if (index === -1) {
    return flat.slice(0, maxLength) + "...";
  }

  const start = Math.max(0, index - 40);
  const end = Math.min(flat.length, start + maxLength);
  let snippet = flat.slice(start, end);

  if (start > 0) snippet = "..." + snippet;
  if (end < flat.length) snippet = snippet + "...";

  return snippet;
}
