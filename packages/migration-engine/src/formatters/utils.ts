/**
 * Shared helpers for formatters
 */

/**
 * `missing_required_field` -> `Missing Required Field`
 */
export function humanizeKey(key: string): string {
  return key
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

/**
 * Show the first `limit` items and a line for the rest
 */
export function listWithOverflow(items: string[], limit: number): string[] {
  const lines = items.slice(0, limit).map((item) => `- ${item}`);
  if (items.length > limit) {
    lines.push(`- ... and ${items.length - limit} more`);
  }
  return lines;
}
