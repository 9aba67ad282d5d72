import type { IToken } from 'chevrotain';
import { NonOverridableClassDeclarationRule, type ParsedSource } from '../rules/non-overridable-class-declaration.js';
import { buildTree } from '../swift/builder.js';
import { tokenize } from '../swift/lexer.js';
import { parse } from '../swift/parser.js';
import type { SourceFileNode } from '../swift/tree.js';
import { resolveRuleOptions } from './config.js';
import { mapSwiftParserError } from './diagnostics.js';
import { lintWithChevrotain, parseWithChevrotain, type FrontEndAdapters } from './pipeline.js';
import { SourceFile } from './source.js';
import { CommandSuppressionFilter } from './suppression.js';
import type { Correction, RuleOptions, Violation } from './types.js';

const swiftFrontEnd: FrontEndAdapters<SourceFileNode> = {
  tokenize,
  parse,
  build: buildTree,
  mapParserError: mapSwiftParserError,
};

function prepare(text: string, tree: SourceFileNode, comments: IToken[], path?: string): ParsedSource {
  const file = new SourceFile(text, path);
  return { file, tree, suppression: CommandSuppressionFilter.fromComments(file, comments) };
}

export interface ParseResult {
  source?: ParsedSource;
  errors: Violation[];
}

export function parseSource(text: string, path?: string): ParseResult {
  const front = parseWithChevrotain(text, swiftFrontEnd);
  if (!front.tree) return { errors: front.errors };
  return { source: prepare(text, front.tree, front.comments, path), errors: [] };
}

export function lint(text: string, options: Partial<RuleOptions> = {}): Violation[] {
  const rule = new NonOverridableClassDeclarationRule(resolveRuleOptions(options));
  return lintWithChevrotain(text, {
    ...swiftFrontEnd,
    prepare: (src, tree, comments) => prepare(src, tree, comments),
    analyze: (source) => rule.validate(source),
  });
}

export interface CorrectResult {
  contents: string;
  corrections: Correction[];
  // parse errors; nothing is corrected when there are any
  errors: Violation[];
}

export function correct(text: string, options: Partial<RuleOptions> = {}): CorrectResult {
  const { source, errors } = parseSource(text);
  if (!source) return { contents: text, corrections: [], errors };
  const rule = new NonOverridableClassDeclarationRule(resolveRuleOptions(options));
  const { contents, corrections } = rule.correct(source);
  return { contents, corrections, errors: [] };
}
