/**
 * Append / strip the content-warning block in a free-text overview.
 *
 * The block is everything from the first separator occurrence onward.
 * Older annotations used a "doesthedogdie:" line instead of the separator;
 * those are cut as well, after the separator cut.
 */

export const LEGACY_PREFIX = 'doesthedogdie:';

function stripLegacy(description: string): string {
  const lines = description.split('\n');
  const at = lines.findIndex(line => line.trimStart().toLowerCase().startsWith(LEGACY_PREFIX));
  if (at < 0) return description;
  return lines.slice(0, at).join('\n').trimEnd();
}

/**
 * True when some proper prefix of the separator is also its suffix (e.g. "-x-").
 * Such a separator can match earlier, across the end of the overview text,
 * and re-applying would then cut into the overview.
 */
export function separatorOverlapsItself(separator: string): boolean {
  for (let k = 1; k < separator.length; k++) {
    if (separator.startsWith(separator.slice(separator.length - k))) return true;
  }
  return false;
}

export function stripWarnings(description: string, separator: string): string {
  const at = description.indexOf(separator);
  const head = at >= 0 ? description.slice(0, at).trimEnd() : description;
  return stripLegacy(head);
}

export function applyWarnings(
  description: string,
  warningText: string | null,
  separator: string
): string {
  const clean = stripWarnings(description, separator);
  if (warningText === null) return clean;
  // stripWarnings() of the result must give back exactly this prefix
  return `${clean.trimEnd()}${separator}\n${warningText}`;
}

