import { CstParser, EOF, tokenMatcher, type CstNode, type IRecognitionException, type IToken, type TokenType } from 'chevrotain';
import * as t from './lexer.js';

const MODIFIER_OR_INTRODUCER: TokenType[] = [t.Modifier, t.TypeIntroducer, t.FuncKw, t.VariableIntroducer, t.OtherIntroducer];

function isAnyOf(tok: IToken, types: TokenType[]): boolean {
  return types.some((tt) => tokenMatcher(tok, tt));
}

/**
 * Declaration-level Swift grammar. Only declarations, their modifiers and
 * balanced brace blocks are structured; every other token is kept as an
 * opaque member so that statements and expressions never fail the parse.
 */
export class SwiftParser extends CstParser {
  constructor() {
    super(t.allTokens, { maxLookahead: 1 });
    this.performSelfAnalysis();
  }

  public sourceFile = this.RULE('sourceFile', () => {
    this.MANY(() => this.SUBRULE(this.member));
  });

  private member = this.RULE('member', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        { GATE: () => this.atDeclarationStart(), ALT: () => this.SUBRULE(this.declaration) },
        { ALT: () => this.SUBRULE(this.block) },
        { ALT: () => this.CONSUME(t.Any, { LABEL: 'token' }) },
      ],
    });
  });

  private block = this.RULE('block', () => {
    this.CONSUME(t.LCurly);
    this.MANY(() => this.SUBRULE(this.member));
    this.CONSUME(t.RCurly);
  });

  // @available(iOS 13, *) / @objc / @MainActor
  private attribute = this.RULE('attribute', () => {
    this.CONSUME(t.At);
    this.CONSUME(t.Identifier, { LABEL: 'name' });
    this.OPTION(() => this.SUBRULE(this.parenGroup));
  });

  private parenGroup = this.RULE('parenGroup', () => {
    this.CONSUME(t.LParen);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.SUBRULE(this.parenGroup) },
        { ALT: () => this.SUBRULE(this.block) },
        { ALT: () => this.CONSUME(t.Plain, { LABEL: 'token' }) },
      ]);
    });
    this.CONSUME(t.RParen);
  });

  private declaration = this.RULE('declaration', () => {
    this.MANY(() => this.SUBRULE(this.attribute));
    this.MANY2({ GATE: () => this.atModifier(), DEF: () => this.SUBRULE(this.modifier) });
    this.OR([
      { ALT: () => this.SUBRULE(this.typeDeclaration) },
      { ALT: () => this.SUBRULE(this.functionDeclaration) },
      { ALT: () => this.SUBRULE(this.variableDeclaration) },
      { ALT: () => this.SUBRULE(this.otherDeclaration) },
    ]);
  });

  // final / private(set) / class (before another modifier or an introducer)
  private modifier = this.RULE('modifier', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Modifier, { LABEL: 'keyword' }) },
      { ALT: () => this.CONSUME(t.ClassKw, { LABEL: 'keyword' }) },
    ]);
    this.OPTION({
      GATE: () => this.atModifierDetail(1),
      DEF: () => {
        this.CONSUME(t.LParen);
        this.CONSUME(t.Identifier, { LABEL: 'detail' });
        this.CONSUME(t.RParen);
      },
    });
  });

  // class C: Base { ... } / struct / enum / actor / extension / protocol
  private typeDeclaration = this.RULE('typeDeclaration', () => {
    this.CONSUME(t.TypeIntroducer, { LABEL: 'introducer' });
    this.MANY({ GATE: () => !this.atDeclarationStart(), DEF: () => this.CONSUME(t.Any, { LABEL: 'token' }) });
    this.OPTION(() => this.SUBRULE(this.block, { LABEL: 'body' }));
  });

  private functionDeclaration = this.RULE('functionDeclaration', () => {
    this.CONSUME(t.FuncKw, { LABEL: 'introducer' });
    this.MANY({ GATE: () => !this.atDeclarationStart(), DEF: () => this.CONSUME(t.Any, { LABEL: 'token' }) });
    this.OPTION(() => this.SUBRULE(this.block, { LABEL: 'body' }));
  });

  // Stored and computed properties: the tail runs to the next declaration and keeps accessor blocks.
  private variableDeclaration = this.RULE('variableDeclaration', () => {
    this.CONSUME(t.VariableIntroducer, { LABEL: 'introducer' });
    this.MANY({
      GATE: () => !this.atDeclarationStart(),
      DEF: () => {
        this.OR([
          { ALT: () => this.CONSUME(t.Any, { LABEL: 'token' }) },
          { ALT: () => this.SUBRULE(this.block) },
        ]);
      },
    });
  });

  private otherDeclaration = this.RULE('otherDeclaration', () => {
    this.CONSUME(t.OtherIntroducer, { LABEL: 'introducer' });
    this.MANY({
      GATE: () => !this.atDeclarationStart(),
      DEF: () => {
        this.OR([
          { ALT: () => this.CONSUME(t.Any, { LABEL: 'token' }) },
          { ALT: () => this.SUBRULE(this.block) },
        ]);
      },
    });
  });

  // attributes* modifiers* introducer, where a type introducer must be followed by its name
  private atDeclarationStart(): boolean {
    let i = 1;
    while (tokenMatcher(this.LA(i), t.At) && tokenMatcher(this.LA(i + 1), t.Identifier)) {
      i += 2;
      if (tokenMatcher(this.LA(i), t.LParen)) i = this.skipParens(i);
    }
    for (;;) {
      const tok = this.LA(i);
      if (tokenMatcher(tok, t.ClassKw) && isAnyOf(this.LA(i + 1), MODIFIER_OR_INTRODUCER)) {
        i++;
        continue;
      }
      if (tokenMatcher(tok, t.Modifier)) {
        i = this.atModifierDetail(i + 1) ? i + 4 : i + 1;
        continue;
      }
      if (tokenMatcher(tok, t.TypeIntroducer)) return tokenMatcher(this.LA(i + 1), t.Identifier);
      return isAnyOf(tok, [t.FuncKw, t.VariableIntroducer, t.OtherIntroducer]);
    }
  }

  private atModifier(): boolean {
    const tok = this.LA(1);
    if (tokenMatcher(tok, t.Modifier)) return true;
    return tokenMatcher(tok, t.ClassKw) && isAnyOf(this.LA(2), MODIFIER_OR_INTRODUCER);
  }

  // `(set)` in private(set), `(unsafe)` in nonisolated(unsafe)
  private atModifierDetail(i: number): boolean {
    return tokenMatcher(this.LA(i), t.LParen)
      && tokenMatcher(this.LA(i + 1), t.Identifier)
      && tokenMatcher(this.LA(i + 2), t.RParen);
  }

  private skipParens(i: number): number {
    let depth = 0;
    for (;;) {
      const tok = this.LA(i);
      if (tokenMatcher(tok, EOF)) return i;
      if (tokenMatcher(tok, t.LParen)) depth++;
      else if (tokenMatcher(tok, t.RParen)) depth--;
      i++;
      if (depth === 0) return i;
    }
  }
}

export const parserInstance = new SwiftParser();

export function parse(tokens: IToken[]): { cst: CstNode | undefined; errors: IRecognitionException[] } {
  parserInstance.input = tokens;
  const cst: CstNode | undefined = parserInstance.sourceFile();
  return { cst, errors: parserInstance.errors };
}
