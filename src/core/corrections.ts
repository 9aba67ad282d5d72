import { applyEdits, type TextEdit } from './edits.js';
import type { SourceFile } from './source.js';
import type { SuppressionFilter } from './suppression.js';
import type { Correction, CorrectionEdit, TextRange } from './types.js';

export interface RuleIdentity {
  identifier: string;
  name: string;
}

export interface AppliedCorrections {
  contents: string;
  // In application order: end of file first
  corrections: Correction[];
}

/**
 * Resolves edits to ranges, drops the ones the suppression filter does not
 * report as enabled, and replaces the rest from the end of the file backwards.
 * Correction locations refer to the original contents.
 */
export function applyCorrections(
  file: SourceFile,
  edits: CorrectionEdit[],
  filter: SuppressionFilter,
  replacement: string,
  rule: RuleIdentity
): AppliedCorrections {
  const ranges = edits
    .map((e) => file.range(e.start, e.end))
    .filter((r): r is TextRange => r !== undefined)
    .filter((r) => filter.check(r, rule.identifier) === 'enabled')
    .sort((a, b) => b.location - a.location);

  const corrections: Correction[] = [];
  const accepted: TextEdit[] = [];
  let floor = Number.POSITIVE_INFINITY;
  for (const range of ranges) {
    // overlaps a range that was already accepted
    if (range.location + range.length > floor) continue;
    const location = file.location(range.location);
    if (!location) continue;
    accepted.push({ range, newText: replacement });
    floor = range.location;
    corrections.push({ ruleId: rule.identifier, ruleName: rule.name, location });
  }
  return { contents: applyEdits(file.contents, accepted), corrections };
}
