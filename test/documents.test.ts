import { describe, expect, it } from 'vitest';
import { correctionReport, textReport, toJsonResult } from '../src/core/format.js';
import { correct, lint } from '../src/core/linter.js';
import { extractSwiftBlocks, rewriteSwiftBlocks } from '../src/core/markdown.js';
import { correctDocument, detectDocumentKind, validateDocument } from '../src/core/router.js';

const markdown = [
  '# Title',
  '```swift',
  'final class C {',
  '    class func f() {}',
  '}',
  '```',
  '```js',
  'class func notSwift() {}',
  '```',
].join('\n');

describe('markdown', () => {
  it('extracts only swift fences', () => {
    expect(extractSwiftBlocks(markdown)).toEqual([
      {
        content: 'final class C {\n    class func f() {}\n}',
        startLine: 3,
        endLine: 6,
        info: 'swift',
        fence: '```',
      },
    ]);
  });

  it('rewrites blocks in place', () => {
    const out = rewriteSwiftBlocks('a\n~~~swift\nx\n~~~\nb', (content) => `${content}\ny`);
    expect(out).toBe('a\n~~~swift\nx\ny\n~~~\nb');
  });
});

describe('document routing', () => {
  it('picks the document kind from the extension, then from fences', () => {
    expect(detectDocumentKind('Sources/A.swift', '```swift\n```')).toBe('swift');
    expect(detectDocumentKind('README.md', '')).toBe('markdown');
    expect(detectDocumentKind('<stdin>', markdown)).toBe('markdown');
    expect(detectDocumentKind('<stdin>', 'let x = 1')).toBe('swift');
  });

  it('reports block violations at their line in the document', () => {
    const report = validateDocument(markdown, 'markdown');
    expect(report.snippetCount).toBe(1);
    expect(report.violations.map((v) => [v.line, v.column])).toEqual([[4, 5]]);
  });

  it('corrects blocks and places corrections in the document', () => {
    const res = correctDocument(markdown, 'markdown');
    expect(res.contents).toBe(markdown.replace('    class func f', '    final class func f'));
    expect(res.violations).toEqual([]);
    expect(res.corrections.map((c) => c.location)).toEqual([{ line: 4, column: 5, characterOffset: 37 }]);
  });

  it('keeps CRLF line breaks and document offsets when correcting markdown', () => {
    const crlf = 'Title\r\n\r\n```swift\r\nfinal class C {\r\n  class func f() {}\r\n}\r\n```\r\nEnd\r\n';
    const res = correctDocument(crlf, 'markdown');
    expect(res.contents).toBe(crlf.replace('  class func', '  final class func'));
    expect(res.corrections.map((c) => c.location)).toEqual([{ line: 5, column: 3, characterOffset: 38 }]);
  });

  it('corrects a swift file and re-checks the result', () => {
    const res = correctDocument('final class C { class var x: Int { 1 } }', 'swift', { finalClassModifier: 'static' });
    expect(res.contents).toBe('final class C { static var x: Int { 1 } }');
    expect(res.corrections).toHaveLength(1);
    expect(res.violations).toEqual([]);
  });
});

describe('reports', () => {
  const text = 'final class C {\n    class var b: Bool { true }\n    class func f() {}\n}';

  it('prints a caret snippet and hint for each violation', () => {
    const [first] = lint(text);
    if (!first) throw new Error('expected a violation');
    expect(textReport('A.swift', 'final class C {\n    class func f() {}\n}', [{ ...first, line: 2 }], { color: false })).toBe(
      [
        'warning[non_overridable_class_declaration]: Class properties in final classes should themselves be final',
        'at A.swift:2:5',
        '  1 | final class C {',
        '  2 |     class func f() {}',
        '    |     ^^^^^',
        '  3 | }',
        'hint: Use `final class` or `static` instead.',
        '',
      ].join('\n')
    );
  });

  it('prints Valid without violations', () => {
    expect(textReport('A.swift', 'class C {}', [], { color: false })).toBe('Valid');
  });

  it('lists corrections in source order', () => {
    const { corrections } = correct(text);
    expect(correctionReport('A.swift', corrections)).toBe(
      'A.swift:2:5 Corrected Class Declaration in Final Class\nA.swift:3:5 Corrected Class Declaration in Final Class'
    );
  });

  it('counts violations by severity in JSON results', () => {
    const violations = lint(text, { severity: 'error' });
    const json = toJsonResult('A.swift', violations);
    expect(json).toMatchObject({ file: 'A.swift', valid: false, errorCount: 2, warningCount: 0, correctionCount: 0 });
    expect(json.errors).toEqual(violations);
  });
});
