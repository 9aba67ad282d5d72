import * as path from 'node:path';
import type { Correction, RuleOptions, Violation } from './types.js';
import { correct, lint } from './linter.js';
import { extractSwiftBlocks, offsetViolations, rewriteSwiftBlocks } from './markdown.js';
import { SourceFile } from './source.js';

export type DocumentKind = 'swift' | 'markdown';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown', '.mdx']);

// Files are routed by extension; stdin and unknown extensions by the presence of ```swift fences.
export function detectDocumentKind(filename: string, content: string): DocumentKind {
  const ext = path.extname(filename).toLowerCase();
  if (ext === '.swift') return 'swift';
  if (MARKDOWN_EXTENSIONS.has(ext)) return 'markdown';
  return extractSwiftBlocks(content).length > 0 ? 'markdown' : 'swift';
}

export interface DocumentReport {
  kind: DocumentKind;
  violations: Violation[];
  // number of swift sources checked: 1 for a swift file, the block count for markdown
  snippetCount: number;
}

export function validateDocument(content: string, kind: DocumentKind, options: Partial<RuleOptions> = {}): DocumentReport {
  if (kind === 'swift') return { kind, violations: lint(content, options), snippetCount: 1 };
  const blocks = extractSwiftBlocks(content);
  const violations: Violation[] = [];
  for (const b of blocks) {
    violations.push(...offsetViolations(lint(b.content, options), b.startLine - 1));
  }
  return { kind, violations, snippetCount: blocks.length };
}

export interface DocumentCorrection extends DocumentReport {
  contents: string;
  corrections: Correction[];
}

export function correctDocument(content: string, kind: DocumentKind, options: Partial<RuleOptions> = {}): DocumentCorrection {
  if (kind === 'swift') {
    const res = correct(content, options);
    const after = validateDocument(res.contents, kind, options);
    return { ...after, violations: res.errors.length > 0 ? res.errors : after.violations, contents: res.contents, corrections: res.corrections };
  }
  const original = new SourceFile(content);
  const corrections: Correction[] = [];
  const contents = rewriteSwiftBlocks(content, (blockContent, block) => {
    const res = correct(blockContent, options);
    for (const c of res.corrections) {
      // block lines are joined with LF; resolve against the document to count its own line breaks
      const line = c.location.line + block.startLine - 1;
      const characterOffset = original.offsetOf(line, c.location.column);
      if (characterOffset === undefined) continue;
      corrections.push({ ...c, location: { line, column: c.location.column, characterOffset } });
    }
    return res.contents;
  });
  const after = validateDocument(contents, kind, options);
  return { ...after, contents, corrections };
}
