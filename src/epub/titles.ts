// pattern: Functional Core

export const DEFAULT_MAX_TITLE_LENGTH = 50;

const NOISE_SUFFIXES: ReadonlyArray<RegExp> = [
  /\s*[-–—]\s*Bloomberg.*$/i,
  /\s*\(\d+\)\s*$/i,
  /\s*\|\s*Bloomberg.*$/i,
  /\s*:\s*Markets\s*Wrap\s*$/i,
];

const BREAK_POINTS: ReadonlyArray<string> = [":", " - ", " – ", ", "];

const MIN_HEADLINE_LENGTH = 20;

/**
 * Shortens an article headline for table-of-contents display.
 *
 * Publisher suffixes and part counters are dropped first. A headline that is
 * still too long is cut at the first natural break (colon, dash, comma) when
 * the leading clause is substantial, otherwise truncated on a word boundary
 * with an ellipsis.
 */
export function smartShortenTitle(
  title: string,
  maxLen: number = DEFAULT_MAX_TITLE_LENGTH,
): string {
  let cleaned = title;
  for (const pattern of NOISE_SUFFIXES) {
    cleaned = cleaned.replace(pattern, "");
  }

  if (cleaned.length <= maxLen) {
    return cleaned.trim();
  }

  for (const separator of BREAK_POINTS) {
    if (!cleaned.includes(separator)) {
      continue;
    }
    const head = cleaned.split(separator)[0] ?? "";
    if (head.length >= MIN_HEADLINE_LENGTH && head.length <= maxLen) {
      return head.trim();
    }
  }

  let truncated = cleaned.slice(0, maxLen - 3);
  const lastSpace = truncated.lastIndexOf(" ");
  if (lastSpace > maxLen * 0.6) {
    truncated = truncated.slice(0, lastSpace);
  }
  return `${truncated.trim()}...`;
}
