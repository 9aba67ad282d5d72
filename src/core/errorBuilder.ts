import type { Location, Severity, Violation } from './types.js';
import { coercePos } from './diagnostics.js';

type Common = {
  code?: string;
  hint?: string;
  length?: number;
};

export function errorAt(line: number | null | undefined, column: number | null | undefined, message: string, extra: Common = {}): Violation {
  const pos = coercePos(line ?? null, column ?? null, 1, 1);
  return { line: pos.line, column: pos.column, message, severity: 'error', ...extra };
}

export function violationAt(location: Location, message: string, severity: Severity, extra: Common = {}): Violation {
  return { line: location.line, column: location.column, offset: location.characterOffset, message, severity, ...extra };
}
