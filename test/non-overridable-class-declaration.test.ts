import { describe, expect, it } from 'vitest';
import { RuleConfigurationSchema, toRuleOptions } from '../src/core/config.js';
import { correct, lint, parseSource } from '../src/core/linter.js';
import {
  NonOverridableClassDeclarationRule,
  ScopeTrackingVisitor,
  description,
  traverse,
} from '../src/rules/non-overridable-class-declaration.js';
import { VIOLATION_MARKER, type Example } from '../src/rules/types.js';

const RULE_NAME = 'Class Declaration in Final Class';

function stripMarkers(code: string) {
  const positions: { line: number; column: number }[] = [];
  let out = '';
  let line = 1;
  let column = 1;
  for (const ch of code) {
    if (ch === VIOLATION_MARKER) {
      positions.push({ line, column });
      continue;
    }
    out += ch;
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column += ch.length;
    }
  }
  return { code: out, positions };
}

function optionsFor(example: Example) {
  return toRuleOptions(RuleConfigurationSchema.parse(example.configuration ?? {}));
}

describe('ScopeTrackingVisitor', () => {
  it('flags a class method in a final class and corrects it to final class', () => {
    const text = 'final class C { class func f() {} }';
    expect(lint(text)).toEqual([
      {
        line: 1,
        column: 17,
        offset: 16,
        length: 5,
        severity: 'warning',
        code: 'non_overridable_class_declaration',
        message: 'Class methods in final classes should themselves be final',
        hint: 'Use `final class` or `static` instead.',
      },
    ]);
    const res = correct(text);
    expect(res.contents).toBe('final class C { final class func f() {} }');
    expect(res.corrections).toEqual([
      {
        ruleId: 'non_overridable_class_declaration',
        ruleName: RULE_NAME,
        location: { line: 1, column: 17, characterOffset: 16 },
      },
    ]);
    expect(res.errors).toEqual([]);
  });

  it('flags a private class property and corrects it to static', () => {
    const text = 'class C { private class var b: Bool { true } }';
    const violations = lint(text);
    expect(violations.map((v) => v.message)).toEqual(['Private class methods and properties should be declared final']);
    expect(violations[0]).toMatchObject({ line: 1, column: 19 });
    expect(correct(text, { finalClassModifier: 'static' }).contents).toBe('class C { private static var b: Bool { true } }');
  });

  it('uses the "properties" wording for variables in a final class', () => {
    expect(lint('final class C { class var x: Int { 1 } }').map((v) => v.message)).toEqual([
      'Class properties in final classes should themselves be final',
    ]);
  });

  it('ignores class members of a non-final class', () => {
    expect(lint('class C { class func f() {} }')).toEqual([]);
    expect(lint('class C { final class func f() {} }')).toEqual([]);
    expect(lint('class C { private(set) class var x = 1 }')).toEqual([]);
  });

  it('flags fileprivate class members', () => {
    expect(lint('class C { fileprivate class func f() {} }')).toHaveLength(1);
  });

  it('uses only the innermost enclosing class', () => {
    expect(lint('final class C { class D { class func f() {} } }')).toEqual([]);
    const violations = lint('class C {\n    final class D {\n        class var x: Int { 1 }\n    }\n    class func g() {}\n}');
    expect(violations.map((v) => [v.line, v.column])).toEqual([[3, 9]]);
  });

  it('does not descend into protocols', () => {
    const text = 'final class C {\n    protocol P { class func f() }\n}';
    expect(lint(text)).toEqual([]);
    const res = correct(text);
    expect(res.contents).toBe(text);
    expect(res.corrections).toEqual([]);
  });

  it('skips declarations outside any class', () => {
    expect(lint('class func f() {}')).toEqual([]);
    expect(lint('final class C {}\nextension C { class func f() {} }')).toEqual([]);
  });

  it('leaves the scope stack empty after a walk', () => {
    const { source } = parseSource('final class A { class B { final class C { class func f() {} } } }');
    if (!source) throw new Error('parse failed');
    const visitor = new ScopeTrackingVisitor();
    const flagged = visitor.walk(source.tree);
    expect(flagged).toHaveLength(1);
    expect(flagged[0]?.reason).toBe('final-class');
    expect(visitor.scopeDepth).toBe(0);
  });

  it('derives one edit per violation from a single traversal', () => {
    const { source } = parseSource('final class C {\n    class var b: Bool { true }\n    private class func f() {}\n}');
    if (!source) throw new Error('parse failed');
    const { flagged, violations, edits } = traverse(source.tree, source.file, 'warning');
    expect(flagged.map((f) => f.members)).toEqual(['properties', 'methods']);
    expect(edits).toEqual([{ start: 20, end: 25 }, { start: 59, end: 64 }]);
    expect(violations.map((v) => v.offset)).toEqual(edits.map((e) => e.start));
  });

  it('reports violations and corrections for the same declarations', () => {
    const { source } = parseSource('final class C {\n    class var b: Bool { true }\n    class func f() {}\n}');
    if (!source) throw new Error('parse failed');
    const rule = new NonOverridableClassDeclarationRule({ severity: 'error', finalClassModifier: 'final class' });
    const violations = rule.validate(source);
    const { contents, corrections } = rule.correct(source);
    expect(violations.map((v) => v.severity)).toEqual(['error', 'error']);
    // corrections are recorded end of file first
    expect(corrections.map((c) => c.location.line)).toEqual([3, 2]);
    expect(violations.map((v) => v.line)).toEqual([2, 3]);
    expect(contents).toBe('final class C {\n    final class var b: Bool { true }\n    final class func f() {}\n}');
  });
});

describe('suppression directives', () => {
  const text = [
    'final class C {',
    '    // classfinal:disable:next non_overridable_class_declaration',
    '    class func f() {}',
    '    class func g() {}',
    '}',
  ].join('\n');

  it('suppress the violation on the next line', () => {
    expect(lint(text).map((v) => [v.line, v.column])).toEqual([[4, 5]]);
  });

  it('suppress the correction on the next line', () => {
    const res = correct(text);
    expect(res.contents).toBe(text.replace('class func g', 'final class func g'));
    expect(res.corrections.map((c) => c.location.line)).toEqual([4]);
  });

  it('disable a region until re-enabled', () => {
    const region = [
      '// classfinal:disable all',
      'final class C {',
      '    class func f() {}',
      '    // classfinal:enable non_overridable_class_declaration',
      '    class func g() {}',
      '}',
    ].join('\n');
    expect(lint(region).map((v) => v.line)).toEqual([5]);
  });
});

describe('rule description examples', () => {
  description.nonTriggeringExamples.forEach((example, i) => {
    it(`non-triggering example ${i}`, () => {
      expect(lint(example.code, optionsFor(example))).toEqual([]);
    });
  });

  description.triggeringExamples.forEach((example, i) => {
    it(`triggering example ${i}`, () => {
      const { code, positions } = stripMarkers(example.code);
      const found = lint(code, optionsFor(example)).map((v) => ({ line: v.line, column: v.column }));
      expect(positions.length).toBeGreaterThan(0);
      expect(found).toEqual(positions);
    });
  });

  description.corrections.forEach((example, i) => {
    it(`correction ${i}`, () => {
      const res = correct(example.before.code, optionsFor(example.before));
      expect(res.contents).toBe(example.after.code);
    });
  });
});

describe('parse failures', () => {
  it('are reported instead of running the rule', () => {
    const violations = lint('final class C {\n    class func f() {}\n');
    expect(violations.map((v) => v.code)).toEqual(['SW-BLOCK-MISSING-RBRACE']);
  });

  it('leave the text uncorrected', () => {
    const text = 'final class C { class func f() {} }\n}';
    const res = correct(text);
    expect(res.contents).toBe(text);
    expect(res.corrections).toEqual([]);
    expect(res.errors.map((e) => e.code)).toEqual(['SW-UNEXPECTED-RBRACE']);
  });
});
