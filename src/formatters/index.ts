/**
 * Format a number with thousand separators.
 *
 * @example formatNumber(1234567) → "1,234,567"
 */
export function formatNumber(num: number): string {
  return num.toLocaleString("en-US");
}

/**
 * Singular or plural noun with its count.
 *
 * @example pluralize(1, "repository", "repositories") → "1 repository"
 * @example pluralize(3, "tag") → "3 tags"
 */
export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${formatNumber(count)} ${count === 1 ? singular : plural}`;
}

export const DEFAULT_PREVIEW_LIMIT = 10;

/**
 * First items of a list plus a trailer for the rest.
 *
 * @example formatPreviewList(["a", "b", "c"], 2) → ["a", "b", "... and 1 more"]
 */
export function formatPreviewList(items: readonly string[], limit = DEFAULT_PREVIEW_LIMIT): string[] {
  if (items.length <= limit) {
    return [...items];
  }
  return [...items.slice(0, limit), `... and ${formatNumber(items.length - limit)} more`];
}

/**
 * Format seconds as a short duration.
 *
 * @example formatDuration(4.2) → "4.2s"
 * @example formatDuration(125) → "2m 5s"
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}
