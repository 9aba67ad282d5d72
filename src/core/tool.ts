import { z } from 'zod';
import { FinalClassModifierSchema, SeveritySchema } from './config.js';
import { groupViolations } from './format.js';
import { correctDocument, detectDocumentKind, validateDocument } from './router.js';

export const LINT_SWIFT_TOOL = 'lint_swift';

export const LintSwiftSchema = z.object({
  text: z.string().describe('Swift source text, or Markdown content with ```swift blocks'),
  autofix: z.boolean().optional().describe('If true, rewrite redundant `class` modifiers and return the corrected text'),
  final_class_modifier: FinalClassModifierSchema.optional(),
  severity: SeveritySchema.optional(),
});

export const lintSwiftToolDefinition = {
  name: LINT_SWIFT_TOOL,
  description:
    'Find `class func` / `class var` declarations that cannot be overridden because the enclosing class is final ' +
    'or the declaration is private. Accepts Swift source text or Markdown with ```swift code blocks. ' +
    'With autofix=true the redundant `class` keyword is replaced by `final class` (or `static`) and the ' +
    'corrected text is returned.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      text: {
        type: 'string',
        description: 'Swift source or Markdown content with ```swift blocks',
      },
      autofix: {
        type: 'boolean',
        description: 'Set to true to return the corrected text',
      },
      final_class_modifier: {
        type: 'string',
        enum: ['final', 'final class', 'static'],
        description: 'Replacement for the redundant `class` keyword (default: final)',
      },
      severity: {
        type: 'string',
        enum: ['warning', 'error'],
        description: 'Severity of reported violations (default: warning)',
      },
    },
    required: ['text'],
  },
};

/**
 * Runs the `lint_swift` tool. Throws a `z.ZodError` when the arguments do not match the schema.
 */
export function runLintSwift(args: unknown) {
  const parsed = LintSwiftSchema.parse(args);
  const kind = detectDocumentKind('<input>', parsed.text);
  const options = { severity: parsed.severity, finalClassModifier: parsed.final_class_modifier };
  if (parsed.autofix) {
    const res = correctDocument(parsed.text, kind, options);
    const { errs, warns } = groupViolations(res.violations);
    return {
      fixed: res.contents,
      valid: errs.length === 0,
      kind,
      snippetCount: res.snippetCount,
      correctionCount: res.corrections.length,
      errorCount: errs.length,
      warningCount: warns.length,
      violations: res.violations,
      corrections: res.corrections,
    };
  }
  const res = validateDocument(parsed.text, kind, options);
  const { errs, warns } = groupViolations(res.violations);
  return {
    valid: errs.length === 0,
    kind,
    snippetCount: res.snippetCount,
    errorCount: errs.length,
    warningCount: warns.length,
    violations: res.violations,
  };
}
