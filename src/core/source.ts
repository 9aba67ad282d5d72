import type { Location, TextRange } from './types.js';

function isHighSurrogate(code: number) { return code >= 0xd800 && code <= 0xdbff; }
function isLowSurrogate(code: number) { return code >= 0xdc00 && code <= 0xdfff; }

/**
 * File contents plus the offset <-> location mapping used for reporting and
 * for turning correction edits into replaceable ranges.
 */
export class SourceFile {
  private readonly lineStarts: number[];

  constructor(readonly contents: string, readonly path?: string) {
    this.lineStarts = [0];
    for (let i = 0; i < contents.length; i++) {
      const ch = contents.charCodeAt(i);
      if (ch === 10) this.lineStarts.push(i + 1);
      else if (ch === 13 && contents.charCodeAt(i + 1) !== 10) this.lineStarts.push(i + 1);
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Resolves an offset to a 1-based line/column; `undefined` when out of range or inside a surrogate pair. */
  location(offset: number): Location | undefined {
    if (!this.isBoundary(offset)) return undefined;
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) lo = mid;
      else hi = mid - 1;
    }
    const lineStart = this.lineStarts[lo] ?? 0;
    return { line: lo + 1, column: offset - lineStart + 1, characterOffset: offset };
  }

  range(start: number, end: number): TextRange | undefined {
    if (end < start || !this.isBoundary(start) || !this.isBoundary(end)) return undefined;
    return { location: start, length: end - start };
  }

  offsetOf(line: number, column: number): number | undefined {
    const lineStart = this.lineStarts[line - 1];
    if (lineStart === undefined || column < 1) return undefined;
    const offset = lineStart + column - 1;
    return this.isBoundary(offset) ? offset : undefined;
  }

  private isBoundary(offset: number): boolean {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.contents.length) return false;
    if (offset === 0 || offset === this.contents.length) return true;
    return !(isHighSurrogate(this.contents.charCodeAt(offset - 1)) && isLowSurrogate(this.contents.charCodeAt(offset)));
  }
}
