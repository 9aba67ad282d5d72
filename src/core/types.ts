export type Severity = 'error' | 'warning';

export interface Violation {
  line: number;
  column: number;
  message: string;
  severity: Severity;
  code?: string;
  hint?: string;
  length?: number;
  // UTF-16 offset into the linted text, when the violation comes from a rule
  offset?: number;
}

// 1-based line and column, plus the 0-based character offset they resolve to
export interface Location {
  line: number;
  column: number;
  characterOffset: number;
}

// Half-open UTF-16 range into file contents
export interface TextRange {
  location: number;
  length: number;
}

// Rule output describing which text to replace; resolved and applied by the correction pass
export interface CorrectionEdit {
  start: number;
  end: number;
}

export interface Correction {
  ruleId: string;
  ruleName: string;
  location: Location;
}

export type FinalClassModifier = 'final class' | 'static';

export interface RuleOptions {
  severity: Severity;
  finalClassModifier: FinalClassModifier;
}
