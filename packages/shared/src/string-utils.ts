export const TRUNCATION_MARKER = '\n...\n[TRUNCATED]\n...\n';

export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/**
 * Keeps the first and last halves of `text` when it is longer than `maxChars`.
 * The result never exceeds `maxChars` plus the marker.
 */
export function truncateMiddle(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  if (maxChars <= 0) return TRUNCATION_MARKER.trim();
  const half = Math.floor(maxChars / 2);
  return `${text.slice(0, half)}${TRUNCATION_MARKER}${text.slice(text.length - (maxChars - half))}`;
}

/**
 * Keeps the last `maxChars` characters, which is where test runners print failures.
 */
export function tail(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  if (maxChars <= 0) return '';
  return `[...${text.length - maxChars} chars omitted]\n${text.slice(text.length - maxChars)}`;
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}
