import type { Correction, Violation } from './types.js';

export type OutputFormat = 'text' | 'json';

export function groupViolations(violations: Violation[]) {
  const errs = violations.filter(v => v.severity === 'error');
  const warns = violations.filter(v => v.severity === 'warning');
  return { errs, warns };
}

export function textReport(filename: string, content: string, violations: Violation[], options: { color?: boolean } = {}): string {
  const color = options.color ?? true;
  const paint = (code: string, s: string) => (color ? `\x1b[${code}m${s}\x1b[0m` : s);
  const { errs, warns } = groupViolations(violations);
  const allLines = content.split(/\r?\n/);
  const numWidth = String(allLines.length).length;
  const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');
  const lines: string[] = [];

  const printBlock = (kind: 'error' | 'warning', v: Violation) => {
    const kindText = kind === 'error' ? paint('31', 'error') : paint('33', 'warning');
    const code = v.code ? `[${v.code}]` : '';
    lines.push(`${kindText}${code}: ${v.message}`);
    lines.push(`at ${filename}:${v.line}:${v.column}`);
    const idx = Math.max(0, Math.min(allLines.length - 1, v.line - 1));
    const prev = idx > 0 ? allLines[idx - 1] : undefined;
    const text = allLines[idx] ?? '';
    const next = idx + 1 < allLines.length ? allLines[idx + 1] : undefined;

    if (typeof prev === 'string') lines.push(`  ${fmtNum(idx)} | ${prev}`);
    lines.push(`  ${fmtNum(idx + 1)} | ${text}`);
    const caretPad = ' '.repeat(Math.max(0, v.column - 1));
    const caretLen = Math.max(1, v.length ?? 1);
    lines.push(`  ${' '.repeat(numWidth)} | ${caretPad}${paint(kind === 'error' ? '31' : '33', '^'.repeat(caretLen))}`);
    if (v.code === 'SW-BLOCK-MISSING-RBRACE') {
      const indent = text.match(/^\s*/)?.[0] ?? '';
      lines.push(`  ${fmtNum(idx + 2)} | ${indent}}  ${paint('2', "← insert '}' here")}`);
    } else if (typeof next === 'string') {
      lines.push(`  ${fmtNum(idx + 2)} | ${next}`);
    }
    if (v.hint) {
      const hintLines = v.hint.split(/\r?\n/);
      lines.push(`hint: ${hintLines[0] ?? ''}`);
      for (let i = 1; i < hintLines.length; i++) lines.push(`  ${hintLines[i]}`);
    }
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  if (errs.length === 0 && warns.length === 0) return 'Valid';
  return lines.join('\n');
}

export function correctionReport(filename: string, corrections: Correction[]): string {
  // Corrections arrive end-of-file first; report them in source order.
  return [...corrections]
    .sort((a, b) => a.location.characterOffset - b.location.characterOffset)
    .map(c => `${filename}:${c.location.line}:${c.location.column} Corrected ${c.ruleName}`)
    .join('\n');
}

export function toJsonResult(filename: string, violations: Violation[], corrections: Correction[] = []) {
  const { errs, warns } = groupViolations(violations);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    correctionCount: corrections.length,
    errors: errs,
    warnings: warns,
    corrections,
  };
}
