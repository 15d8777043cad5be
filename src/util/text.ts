// src/util/text.ts

/** Strip carriage returns (DOS CRLF line endings, stray CR). */
export const crlf = (s: string): string => s.replace(/\n*\r/g, '');

/** Strip NUL bytes (UTF-16 output read as UTF-8). */
export const stripNul = (s: string): string => s.replace(/\0/g, '');

/** Trim a pattern from both ends of a string. */
export const trim = (s: string, re: string | RegExp): string => {
  const src = typeof re === 'string' ? re : re.source;
  return s.replace(new RegExp(`^(?:${src})`), '').replace(new RegExp(`(?:${src})$`), '');
};

export const ELLIPSIS = '...';

/** Truncate to max characters, ending with "..." when shortened. */
export const trunc = (s: string, max: number): string => {
  if (s.length <= max) return s;
  return s.slice(0, Math.max(0, max - ELLIPSIS.length)) + ELLIPSIS;
};
