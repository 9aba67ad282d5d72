import { createToken, Lexer, type CustomPatternMatcherReturn, type IToken, type TokenType } from 'chevrotain';

// Categories. Every token except braces is `Any`; `Plain` further excludes parens.
export const Any = createToken({ name: 'Any', pattern: Lexer.NA });
export const Plain = createToken({ name: 'Plain', pattern: Lexer.NA });
export const Modifier = createToken({ name: 'Modifier', pattern: Lexer.NA });
export const TypeIntroducer = createToken({ name: 'TypeIntroducer', pattern: Lexer.NA });
export const VariableIntroducer = createToken({ name: 'VariableIntroducer', pattern: Lexer.NA });
export const OtherIntroducer = createToken({ name: 'OtherIntroducer', pattern: Lexer.NA });

export const Identifier = createToken({
  name: 'Identifier',
  pattern: /`[^`\r\n]+`|[A-Za-z_$\u00C0-\uFFFF][A-Za-z0-9_$\u00C0-\uFFFF]*/,
  categories: [Any, Plain],
});

function keyword(word: string, ...categories: TokenType[]): TokenType {
  const name = `${word.charAt(0).toUpperCase()}${word.slice(1)}Kw`;
  return createToken({ name, pattern: new RegExp(word), longer_alt: Identifier, categories: [Any, Plain, ...categories] });
}

// Declaration introducers
export const ClassKw = keyword('class', TypeIntroducer);
export const StructKw = keyword('struct', TypeIntroducer);
export const EnumKw = keyword('enum', TypeIntroducer);
export const ActorKw = keyword('actor', TypeIntroducer);
export const ExtensionKw = keyword('extension', TypeIntroducer);
export const ProtocolKw = keyword('protocol', TypeIntroducer);
export const FuncKw = keyword('func');
export const VarKw = keyword('var', VariableIntroducer);
export const LetKw = keyword('let', VariableIntroducer);
export const InitKw = keyword('init', OtherIntroducer);
export const DeinitKw = keyword('deinit', OtherIntroducer);
export const SubscriptKw = keyword('subscript', OtherIntroducer);
export const TypealiasKw = keyword('typealias', OtherIntroducer);
export const AssociatedtypeKw = keyword('associatedtype', OtherIntroducer);
export const ImportKw = keyword('import', OtherIntroducer);
export const CaseKw = keyword('case', OtherIntroducer);
export const OperatorKw = keyword('operator', OtherIntroducer);
export const PrecedencegroupKw = keyword('precedencegroup', OtherIntroducer);
export const MacroKw = keyword('macro', OtherIntroducer);

// Declaration modifiers (`class` is handled by the parser: it is a modifier only before another modifier or introducer)
export const FinalKw = keyword('final', Modifier);
export const StaticKw = keyword('static', Modifier);
export const PrivateKw = keyword('private', Modifier);
export const FileprivateKw = keyword('fileprivate', Modifier);
export const InternalKw = keyword('internal', Modifier);
export const PublicKw = keyword('public', Modifier);
export const OpenKw = keyword('open', Modifier);
export const PackageKw = keyword('package', Modifier);
export const OverrideKw = keyword('override', Modifier);
export const RequiredKw = keyword('required', Modifier);
export const ConvenienceKw = keyword('convenience', Modifier);
export const DynamicKw = keyword('dynamic', Modifier);
export const LazyKw = keyword('lazy', Modifier);
export const WeakKw = keyword('weak', Modifier);
export const UnownedKw = keyword('unowned', Modifier);
export const MutatingKw = keyword('mutating', Modifier);
export const NonmutatingKw = keyword('nonmutating', Modifier);
export const IndirectKw = keyword('indirect', Modifier);
export const OptionalKw = keyword('optional', Modifier);
export const NonisolatedKw = keyword('nonisolated', Modifier);
export const PrefixKw = keyword('prefix', Modifier);
export const PostfixKw = keyword('postfix', Modifier);
export const InfixKw = keyword('infix', Modifier);

// Swift block comments nest, which a regular expression cannot express.
function matchBlockComment(text: string, offset: number): CustomPatternMatcherReturn | null {
  if (!text.startsWith('/*', offset)) return null;
  let depth = 0;
  let i = offset;
  while (i < text.length) {
    if (text.startsWith('/*', i)) { depth++; i += 2; continue; }
    if (text.startsWith('*/', i)) {
      depth--;
      i += 2;
      if (depth === 0) return [text.slice(offset, i)];
      continue;
    }
    i++;
  }
  return null;
}

export const LineComment = createToken({ name: 'LineComment', pattern: /\/\/[^\n\r]*/, group: 'comments' });
export const BlockComment = createToken({
  name: 'BlockComment',
  pattern: { exec: matchBlockComment },
  start_chars_hint: ['/'],
  line_breaks: true,
  group: 'comments',
});

const RAW_STRING_START = /#+"/y;

function startsString(text: string, i: number): boolean {
  if (text[i] === '"') return true;
  RAW_STRING_START.lastIndex = i;
  return RAW_STRING_START.test(text);
}

// Returns the offset just past the closing delimiter, or -1 when the literal is not terminated.
// Handles `#"…"#` raw delimiters, `"""` multiline bodies and `\(…)` interpolations that contain strings.
function scanString(text: string, start: number): number {
  let i = start;
  let hashes = 0;
  while (text[i] === '#') { hashes++; i++; }
  if (text[i] !== '"') return -1;
  const multiline = text.startsWith('"""', i);
  const quote = multiline ? '"""' : '"';
  const close = quote + '#'.repeat(hashes);
  const escape = '\\' + '#'.repeat(hashes);
  i += quote.length;
  while (i < text.length) {
    if (text.startsWith(close, i)) return i + close.length;
    const ch = text[i];
    if (!multiline && (ch === '\n' || ch === '\r')) return -1;
    if (text.startsWith(escape, i)) {
      const next = i + escape.length;
      if (text[next] === '(') {
        i = scanInterpolation(text, next + 1);
        if (i < 0) return -1;
      } else {
        i = next + 1;
      }
      continue;
    }
    i++;
  }
  return -1;
}

function scanInterpolation(text: string, start: number): number {
  let depth = 1;
  let i = start;
  while (i < text.length) {
    if (startsString(text, i)) {
      i = scanString(text, i);
      if (i < 0) return -1;
      continue;
    }
    const ch = text[i];
    if (ch === '(') depth++;
    else if (ch === ')' && --depth === 0) return i + 1;
    i++;
  }
  return -1;
}

function matchString(text: string, offset: number): CustomPatternMatcherReturn | null {
  if (!startsString(text, offset)) return null;
  const end = scanString(text, offset);
  return end < 0 ? null : [text.slice(offset, end)];
}

// Tokens after which `/` starts a regex literal rather than a division.
const REGEX_PRECEDERS = new Set(['=', '(', ',', ':', '[', '{', ';', '!', '&', '|', '?', '~', 'return', 'case', 'in', 'where', 'try', 'await']);

function expressionExpected(tokens: IToken[]): boolean {
  const prev = tokens[tokens.length - 1];
  return prev === undefined || REGEX_PRECEDERS.has(prev.image);
}

// `/[a-z]+/` where an expression is expected, or `#/…/#` anywhere.
function matchRegex(text: string, offset: number, tokens: IToken[]): CustomPatternMatcherReturn | null {
  let i = offset;
  let hashes = 0;
  while (text[i] === '#') { hashes++; i++; }
  if (text[i] !== '/') return null;
  i++;
  if (hashes === 0) {
    const first = text.charAt(i);
    if (!expressionExpected(tokens) || first === '' || first === ' ' || first === '\t' || first === '/' || first === '*') return null;
  }
  const close = '/' + '#'.repeat(hashes);
  let inClass = false;
  while (i < text.length) {
    const ch = text[i];
    if (hashes === 0 && (ch === '\n' || ch === '\r')) return null;
    if (ch === '\\') { i += 2; continue; }
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    else if (!inClass && text.startsWith(close, i)) return [text.slice(offset, i + close.length)];
    i++;
  }
  return null;
}

export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: { exec: matchString },
  start_chars_hint: ['"', '#'],
  line_breaks: true,
  categories: [Any, Plain],
});
export const RegexLiteral = createToken({
  name: 'RegexLiteral',
  pattern: { exec: matchRegex },
  start_chars_hint: ['/', '#'],
  line_breaks: true,
  categories: [Any, Plain],
});
export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /0x[0-9A-Fa-f_]+|0b[01_]+|0o[0-7_]+|[0-9][0-9_]*(?:\.[0-9][0-9_]*)?(?:[eE][+-]?[0-9]+)?/,
  categories: [Any, Plain],
});

export const At = createToken({ name: 'At', pattern: /@/, categories: [Any, Plain] });
export const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
export const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/, categories: [Any] });
export const RParen = createToken({ name: 'RParen', pattern: /\)/, categories: [Any] });
export const Punctuation = createToken({ name: 'Punctuation', pattern: /[\/=\-+!*%<>&|^~?.,:;#\[\]\\'"`]/, categories: [Any, Plain] });

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t\r\n\f\v\u00A0\uFEFF]+/, group: Lexer.SKIPPED, line_breaks: true });

export const allTokens: TokenType[] = [
  WhiteSpace,
  // comments before punctuation so '/' is not split off
  LineComment,
  BlockComment,
  // literals that may contain braces
  StringLiteral,
  RegexLiteral,
  // keywords before identifiers
  ClassKw, StructKw, EnumKw, ActorKw, ExtensionKw, ProtocolKw,
  FuncKw, VarKw, LetKw,
  InitKw, DeinitKw, SubscriptKw, TypealiasKw, AssociatedtypeKw, ImportKw, CaseKw, OperatorKw, PrecedencegroupKw, MacroKw,
  FinalKw, StaticKw, PrivateKw, FileprivateKw, InternalKw, PublicKw, OpenKw, PackageKw,
  OverrideKw, RequiredKw, ConvenienceKw, DynamicKw, LazyKw, WeakKw, UnownedKw,
  MutatingKw, NonmutatingKw, IndirectKw, OptionalKw, NonisolatedKw, PrefixKw, PostfixKw, InfixKw,
  // atoms
  Identifier,
  NumberLiteral,
  // punctuation
  At,
  LCurly, RCurly,
  LParen, RParen,
  Punctuation,
  // categories
  Any, Plain, Modifier, TypeIntroducer, VariableIntroducer, OtherIntroducer,
];

export const SwiftLexer = new Lexer(allTokens);
export function tokenize(text: string) { return SwiftLexer.tokenize(text); }
