import type { Violation } from './types.js';

export interface SwiftBlock {
  content: string;
  startLine: number; // 1-based line number of the first content line (line after opening fence)
  endLine: number;   // 1-based line number of the closing fence line
  info: string;      // raw info string after the opening fence
  fence: string;     // the fence marker used (``` or ~~~, length >= 3)
}

const FENCE_RE = /^(\s{0,3})(`{3,}|~{3,})\s*([^\n`]*)?\s*$/;

function isSwiftInfo(info: string | undefined): boolean {
  if (!info) return false;
  const lang = (info.split(/\s+/)[0] || '').toLowerCase();
  return lang === 'swift';
}

export function extractSwiftBlocks(text: string): SwiftBlock[] {
  const lines = text.split(/\r?\n/);
  const blocks: SwiftBlock[] = [];
  let i = 0;
  while (i < lines.length) {
    const m = FENCE_RE.exec(lines[i] ?? '');
    const fence = m?.[2];
    const info = (m?.[3] || '').trim();
    if (fence && isSwiftInfo(info)) {
      // Capture until a closing fence of the same character, at least as long as the opening one
      const closeRe = new RegExp(`^\\s{0,3}${fence.charAt(0)}{${fence.length},}\\s*$`);
      const contentLines: string[] = [];
      const startLine = i + 2;
      i++;
      let closed = false;
      for (; i < lines.length; i++) {
        const l = lines[i] ?? '';
        if (closeRe.test(l)) {
          closed = true;
          break;
        }
        contentLines.push(l);
      }
      const endLine = closed ? i + 1 : lines.length + 1;
      blocks.push({ content: contentLines.join('\n'), startLine, endLine, info, fence });
      if (closed) i++;
      continue;
    }
    i++;
  }
  return blocks;
}

export function offsetViolations(violations: Violation[], lineOffset: number): Violation[] {
  if (!lineOffset) return violations;
  return violations.map(v => ({ ...v, line: v.line + lineOffset }));
}

// The document's own line break, so rewriting a file keeps its endings.
export function detectLineBreak(text: string): '\r\n' | '\n' {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Replaces the content lines of every swift block with `fix(block.content, block)`.
 * Blocks are rewritten from the last one up so earlier line numbers stay valid.
 */
export function rewriteSwiftBlocks(text: string, fix: (content: string, block: SwiftBlock) => string): string {
  const blocks = extractSwiftBlocks(text);
  const eol = detectLineBreak(text);
  let lines = text.split(/\r?\n/);
  for (const b of [...blocks].reverse()) {
    const fixed = fix(b.content, b);
    if (fixed === b.content) continue;
    const before = lines.slice(0, b.startLine - 1);
    const after = lines.slice(b.endLine - 1);
    lines = before.concat(fixed.split(/\r?\n/), after);
  }
  return lines.join(eol);
}
