import { applyCorrections, type AppliedCorrections } from '../core/corrections.js';
import { violationAt } from '../core/errorBuilder.js';
import type { SourceFile } from '../core/source.js';
import type { SuppressionFilter } from '../core/suppression.js';
import type { CorrectionEdit, RuleOptions, Severity, Violation } from '../core/types.js';
import { isFinal, isPrivate, type Modifier, type SourceFileNode, type SyntaxNode } from '../swift/tree.js';
import type { RuleDescription } from './types.js';

export const description: RuleDescription = {
  identifier: 'non_overridable_class_declaration',
  name: 'Class Declaration in Final Class',
  description:
    'Class methods and properties in final classes should themselves be final, just as if the declarations ' +
    'are private. In both cases, they cannot be overridden. Using `final class` or `static` makes this explicit.',
  kind: 'style',
  nonTriggeringExamples: [
    { code: 'final class C {\n    final class var b: Bool { true }\n    final class func f() {}\n}' },
    { code: 'class C {\n    final class var b: Bool { true }\n    final class func f() {}\n}' },
    { code: 'class C {\n    class var b: Bool { true }\n    class func f() {}\n}' },
    { code: 'class C {\n    static var b: Bool { true }\n    static func f() {}\n}' },
    { code: 'final class C {\n    static var b: Bool { true }\n    static func f() {}\n}' },
    { code: 'final class C {\n    class D {\n        class var b: Bool { true }\n        class func f() {}\n    }\n}' },
  ],
  triggeringExamples: [
    { code: 'final class C {\n    ↓class var b: Bool { true }\n    ↓class func f() {}\n}' },
    { code: 'class C {\n    final class D {\n        ↓class var b: Bool { true }\n        ↓class func f() {}\n    }\n}' },
    { code: 'class C {\n    private ↓class var b: Bool { true }\n    private ↓class func f() {}\n}' },
  ],
  corrections: [
    {
      before: { code: 'final class C {\n    class func f() {}\n}' },
      after: { code: 'final class C {\n    final class func f() {}\n}' },
    },
    {
      before: { code: 'final class C {\n    class var b: Bool { true }\n}', configuration: { final_class_modifier: 'static' } },
      after: { code: 'final class C {\n    static var b: Bool { true }\n}' },
    },
  ],
};

export type FlagReason = 'final-class' | 'private';

export interface FlaggedDeclaration {
  // the `class` modifier token
  keyword: Modifier;
  reason: FlagReason;
  members: 'methods' | 'properties';
}

export function reasonFor(flag: FlaggedDeclaration): string {
  return flag.reason === 'final-class'
    ? `Class ${flag.members} in final classes should themselves be final`
    : 'Private class methods and properties should be declared final';
}

/**
 * Walks the tree once, keeping the finality of each enclosing class on an
 * explicit stack, and records every `class` method or property whose
 * modifier cannot have an effect. Protocol bodies are not entered.
 */
export class ScopeTrackingVisitor {
  private readonly finalClassScope: boolean[] = [];
  private flagged: FlaggedDeclaration[] = [];

  get scopeDepth(): number {
    return this.finalClassScope.length;
  }

  walk(tree: SourceFileNode): FlaggedDeclaration[] {
    this.flagged = [];
    this.visit(tree);
    return this.flagged;
  }

  private visit(node: SyntaxNode): void {
    switch (node.kind) {
      case 'protocol':
        return;
      case 'class':
        this.finalClassScope.push(isFinal(node.modifiers));
        this.visitChildren(node.children);
        this.finalClassScope.pop();
        return;
      case 'function':
        this.visitChildren(node.children);
        this.check(node.modifiers, 'methods');
        return;
      case 'variable':
        this.visitChildren(node.children);
        this.check(node.modifiers, 'properties');
        return;
      case 'sourceFile':
      case 'block':
      case 'type':
      case 'other':
        this.visitChildren(node.children);
        return;
      default: {
        const unreachable: never = node;
        return unreachable;
      }
    }
  }

  private visitChildren(children: SyntaxNode[]): void {
    for (const child of children) this.visit(child);
  }

  private check(modifiers: Modifier[], members: FlaggedDeclaration['members']): void {
    if (isFinal(modifiers)) return;
    const keyword = modifiers.find((m) => m.name === 'class');
    if (!keyword) return;
    // Outside any class the modifier cannot appear in valid code; nothing to report.
    if (this.finalClassScope.length === 0) return;
    const inFinalClass = this.finalClassScope[this.finalClassScope.length - 1] === true;
    if (!inFinalClass && !isPrivate(modifiers)) return;
    this.flagged.push({ keyword, reason: inFinalClass ? 'final-class' : 'private', members });
  }
}

export function toViolations(flagged: FlaggedDeclaration[], file: SourceFile, severity: Severity): Violation[] {
  const out: Violation[] = [];
  for (const flag of flagged) {
    const location = file.location(flag.keyword.start);
    if (!location) continue;
    out.push(
      violationAt(location, reasonFor(flag), severity, {
        code: description.identifier,
        length: flag.keyword.end - flag.keyword.start,
        hint: 'Use `final class` or `static` instead.',
      })
    );
  }
  return out;
}

export function toCorrectionEdits(flagged: FlaggedDeclaration[]): CorrectionEdit[] {
  return flagged.map((flag) => ({ start: flag.keyword.start, end: flag.keyword.end }));
}

export interface Traversal {
  flagged: FlaggedDeclaration[];
  violations: Violation[];
  edits: CorrectionEdit[];
}

/** One walk; violations and edits are both derived from the same flagged list. */
export function traverse(tree: SourceFileNode, file: SourceFile, severity: Severity): Traversal {
  const flagged = new ScopeTrackingVisitor().walk(tree);
  return { flagged, violations: toViolations(flagged, file, severity), edits: toCorrectionEdits(flagged) };
}

export interface ParsedSource {
  file: SourceFile;
  tree: SourceFileNode;
  suppression: SuppressionFilter;
}

export class NonOverridableClassDeclarationRule {
  static readonly description = description;

  constructor(readonly options: RuleOptions) {}

  validate(source: ParsedSource): Violation[] {
    const { violations } = traverse(source.tree, source.file, this.options.severity);
    return violations.filter((v) => {
      if (v.offset === undefined) return false;
      const range = source.file.range(v.offset, v.offset + (v.length ?? 0));
      return range !== undefined && source.suppression.check(range, description.identifier) === 'enabled';
    });
  }

  correct(source: ParsedSource): AppliedCorrections {
    const { edits } = traverse(source.tree, source.file, this.options.severity);
    return applyCorrections(source.file, edits, source.suppression, this.options.finalClassModifier, description);
  }
}
