import type { z } from 'zod';
import type { RuleConfigurationSchema } from '../core/config.js';

export interface Example {
  // `↓` marks where a violation is expected; markers are stripped before linting
  code: string;
  configuration?: z.input<typeof RuleConfigurationSchema>;
}

export interface CorrectionExample {
  before: Example;
  after: Example;
}

export type RuleKind = 'lint' | 'idiomatic' | 'style' | 'metrics' | 'performance';

export interface RuleDescription {
  identifier: string;
  name: string;
  description: string;
  kind: RuleKind;
  nonTriggeringExamples: Example[];
  triggeringExamples: Example[];
  corrections: CorrectionExample[];
}

export const VIOLATION_MARKER = '↓';
