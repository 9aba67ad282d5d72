import type { TextRange } from './types.js';

export interface TextEdit {
  range: TextRange;
  newText: string;
}

export function replaceRange(text: string, range: TextRange, newText: string): string {
  return text.slice(0, range.location) + newText + text.slice(range.location + range.length);
}

export function applyEdits(text: string, edits: TextEdit[]): string {
  if (edits.length === 0) return text;
  // Highest offset first: replacing text changes its length, so every edit must still see original offsets.
  const ordered = [...edits].sort((a, b) => b.range.location - a.range.location);
  let out = text;
  for (const e of ordered) {
    out = replaceRange(out, e.range, e.newText);
  }
  return out;
}
