import { describe, expect, it } from 'vitest';
import { lint, parseSource } from '../src/core/linter.js';
import { buildTree } from '../src/swift/builder.js';
import { tokenize } from '../src/swift/lexer.js';
import { parse } from '../src/swift/parser.js';
import type { SourceFileNode } from '../src/swift/tree.js';

function treeOf(text: string): SourceFileNode {
  const lex = tokenize(text);
  expect(lex.errors).toEqual([]);
  const { cst, errors } = parse(lex.tokens);
  expect(errors).toEqual([]);
  if (!cst) throw new Error('no CST');
  return buildTree(cst);
}

describe('lexer', () => {
  it('separates keywords from identifiers that start with them', () => {
    const names = tokenize('final class C classy finally {}').tokens.map((t) => t.tokenType.name);
    expect(names).toEqual(['FinalKw', 'ClassKw', 'Identifier', 'Identifier', 'Identifier', 'LCurly', 'RCurly']);
  });

  it('puts nested block comments and line comments in the comments group', () => {
    const lex = tokenize('/* a /* b */ c */ x // tail\ny');
    expect(lex.tokens.map((t) => t.image)).toEqual(['x', 'y']);
    expect((lex.groups['comments'] ?? []).map((t) => t.image)).toEqual(['/* a /* b */ c */', '// tail']);
  });

  it('keeps braces inside string literals out of the token stream', () => {
    const names = tokenize('let s = "{"').tokens.map((t) => t.tokenType.name);
    expect(names).toEqual(['LetKw', 'Identifier', 'Punctuation', 'StringLiteral']);
  });

  it('reads a raw string as one literal', () => {
    const lex = tokenize('let s = #"a "{" b"#');
    expect(lex.errors).toEqual([]);
    expect(lex.tokens.map((t) => t.image)).toEqual(['let', 's', '=', '#"a "{" b"#']);
  });

  it('reads a multiline raw string as one literal', () => {
    const lex = tokenize('let s = #"""\n{\n"""#');
    expect(lex.tokens.map((t) => t.tokenType.name)).toEqual(['LetKw', 'Identifier', 'Punctuation', 'StringLiteral']);
  });

  it('keeps quotes inside an interpolation from ending the string', () => {
    const lex = tokenize('let s = "\\(a ? "{" : "")"');
    expect(lex.tokens.map((t) => t.tokenType.name)).toEqual(['LetKw', 'Identifier', 'Punctuation', 'StringLiteral']);
  });

  it('reads a regex literal where an expression is expected', () => {
    const names = tokenize('let r = /[{]/').tokens.map((t) => t.tokenType.name);
    expect(names).toEqual(['LetKw', 'Identifier', 'Punctuation', 'RegexLiteral']);
  });

  it('keeps a division operator after an operand', () => {
    const names = tokenize('let x = a / b').tokens.map((t) => t.tokenType.name);
    expect(names).toEqual(['LetKw', 'Identifier', 'Punctuation', 'Identifier', 'Punctuation', 'Identifier']);
  });

  it('treats a non-breaking space as whitespace', () => {
    const violations = lint('final class C {\u00A0class func f() {} }');
    expect(violations.map((v) => [v.code, v.column])).toEqual([['non_overridable_class_declaration', 17]]);
  });
});

describe('literals containing braces', () => {
  const cases: [string, string][] = [
    ['raw string', 'let s = #"a "{" b"#'],
    ['regex', 'let r = /[{]/'],
    ['interpolation', 'let s = "\\(a ? "{" : "")"'],
  ];
  cases.forEach(([name, decl]) => {
    it(`do not unbalance the class body (${name})`, () => {
      const violations = lint(`final class C {\n  ${decl}\n  class func f() {}\n}`);
      expect(violations.map((v) => [v.code, v.line, v.column])).toEqual([['non_overridable_class_declaration', 3, 3]]);
    });
  });
});

describe('tree builder', () => {
  it('records modifier offsets of a class member', () => {
    const tree = treeOf('final class C { class func f() {} }');
    expect(tree.children).toHaveLength(1);
    const cls = tree.children[0];
    expect(cls?.kind).toBe('class');
    if (cls?.kind !== 'class') return;
    expect(cls.modifiers).toEqual([{ name: 'final', start: 0, end: 5 }]);
    const fn = cls.children[0];
    expect(fn?.kind).toBe('function');
    if (fn?.kind !== 'function') return;
    expect(fn.modifiers).toEqual([{ name: 'class', start: 16, end: 21 }]);
  });

  it('keeps the detail of private(set)', () => {
    const tree = treeOf('private(set) var x = 1');
    const v = tree.children[0];
    expect(v?.kind).toBe('variable');
    if (v?.kind !== 'variable') return;
    expect(v.introducer).toBe('var');
    expect(v.modifiers).toEqual([{ name: 'private', detail: 'set', start: 0, end: 7 }]);
  });

  it('treats `class` after a colon as part of the declaration header', () => {
    const tree = treeOf('protocol P: class {}');
    expect(tree.children).toEqual([{ kind: 'protocol', modifiers: [], children: [] }]);
  });

  it('builds struct, extension and attribute-prefixed declarations', () => {
    const tree = treeOf('struct S {\n    class C {}\n}\nextension S {\n    @objc static func f() {}\n}');
    expect(tree.children.map((c) => c.kind)).toEqual(['type', 'type']);
    const [s, ext] = tree.children;
    if (s?.kind !== 'type' || ext?.kind !== 'type') throw new Error('expected type declarations');
    expect(s.introducer).toBe('struct');
    expect(s.children.map((c) => c.kind)).toEqual(['class']);
    expect(ext.introducer).toBe('extension');
    const fn = ext.children[0];
    expect(fn?.kind).toBe('function');
    expect(fn?.kind === 'function' ? fn.modifiers.map((m) => m.name) : []).toEqual(['static']);
  });

  it('treats statements in function bodies as opaque tokens', () => {
    const tree = treeOf('func f() {\n    if x { print(x) }\n    let y = g { $0 }\n}');
    const fn = tree.children[0];
    if (fn?.kind !== 'function') throw new Error('expected function');
    const body = fn.children[0];
    expect(body?.kind).toBe('block');
    expect(body?.children.map((c) => c.kind)).toEqual(['block', 'variable']);
  });
});

describe('parse errors', () => {
  it('reports a block that is never closed', () => {
    const { source, errors } = parseSource('class C {');
    expect(source).toBeUndefined();
    expect(errors).toHaveLength(1);
    expect(errors[0]?.code).toBe('SW-BLOCK-MISSING-RBRACE');
    expect(errors[0]?.line).toBe(1);
  });

  it('reports a stray closing brace', () => {
    const { errors } = parseSource('class C {}\n}');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ code: 'SW-UNEXPECTED-RBRACE', line: 2, column: 1, severity: 'error' });
  });

  it('reports characters the lexer does not recognize', () => {
    const { errors } = parseSource('let x = 1\u0001');
    expect(errors[0]?.code).toBe('SW-LEX');
  });
});
