import type { EnsureLineOptions } from '../types.js';

export interface TextEdit {
  content: string;
  changed: boolean;
}

function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function joinLines(lines: string[]): string {
  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}

function lastIndexMatching(lines: string[], pattern: string): number {
  const re = new RegExp(pattern);
  for (let i = lines.length - 1; i >= 0; i--) {
    if (re.test(lines[i] ?? '')) return i;
  }
  return -1;
}

/** Replaces every literal occurrence of `pattern` */
export function replaceText(content: string, pattern: string, replacement: string): TextEdit {
  if (pattern === '' || !content.includes(pattern)) {
    return { content, changed: false };
  }
  const next = content.split(pattern).join(replacement);
  return { content: next, changed: next !== content };
}

/**
 * Makes sure `line` is present. A line matching `match` is replaced in place;
 * otherwise the line is inserted before the last `insertBefore` match, after
 * the last `insertAfter` match, or at the end of the file.
 */
export function ensureLineInContent(
  content: string,
  options: Omit<EnsureLineOptions, 'create' | 'mode'>,
): TextEdit {
  const lines = splitLines(content);

  if (options.match) {
    const idx = lastIndexMatching(lines, options.match);
    if (idx !== -1) {
      if (lines[idx] === options.line) return { content, changed: false };
      lines[idx] = options.line;
      return { content: joinLines(lines), changed: true };
    }
  }

  if (lines.includes(options.line)) return { content, changed: false };

  let at = lines.length;
  if (options.insertBefore) {
    const idx = lastIndexMatching(lines, options.insertBefore);
    if (idx !== -1) at = idx;
  } else if (options.insertAfter) {
    const idx = lastIndexMatching(lines, options.insertAfter);
    if (idx !== -1) at = idx + 1;
  }

  lines.splice(at, 0, options.line);
  return { content: joinLines(lines), changed: true };
}
