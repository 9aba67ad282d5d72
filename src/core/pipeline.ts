import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Violation } from './types.js';
import { fromLexerError } from './diagnostics.js';
import { errorAt } from './errorBuilder.js';

export interface FrontEndAdapters<Tree> {
  tokenize: (text: string) => { tokens: IToken[]; groups: Record<string, IToken[]>; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode | undefined; errors: IRecognitionException[] };
  build: (cst: CstNode) => Tree;
  mapParserError: (err: IRecognitionException, text: string) => Violation;
}

export interface FrontEndResult<Tree> {
  // only set when lexing and parsing succeeded
  tree?: Tree;
  tokens: IToken[];
  comments: IToken[];
  errors: Violation[];
}

export function parseWithChevrotain<Tree>(text: string, adapters: FrontEndAdapters<Tree>): FrontEndResult<Tree> {
  const errors: Violation[] = [];

  // Lexing
  const lex = adapters.tokenize(text);
  const comments = lex.groups['comments'] ?? [];
  if (lex.errors.length > 0) {
    errors.push(...lex.errors.map(fromLexerError));
    return { tokens: lex.tokens, comments, errors };
  }

  // Parsing
  const parseRes = adapters.parse(lex.tokens);
  if (parseRes.errors.length > 0) {
    errors.push(...parseRes.errors.map((e) => adapters.mapParserError(e, text)));
    return { tokens: lex.tokens, comments, errors };
  }
  if (!parseRes.cst) return { tokens: lex.tokens, comments, errors };

  return { tree: adapters.build(parseRes.cst), tokens: lex.tokens, comments, errors };
}

export interface LintAdapters<Tree, Parsed> extends FrontEndAdapters<Tree> {
  prepare: (text: string, tree: Tree, comments: IToken[]) => Parsed;
  analyze: (parsed: Parsed) => Violation[];
}

export function lintWithChevrotain<Tree, Parsed>(text: string, adapters: LintAdapters<Tree, Parsed>): Violation[] {
  const front = parseWithChevrotain(text, adapters);
  if (!front.tree) return front.errors;

  // Rule analysis
  try {
    return adapters.analyze(adapters.prepare(text, front.tree, front.comments));
  } catch (e) {
    return [errorAt(1, 1, `Internal rule analysis error: ${(e as Error).message}`, { code: 'SW-INTERNAL' })];
  }
}
