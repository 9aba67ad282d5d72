import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Violation } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function fromLexerError(e: ILexingError): Violation {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    code: 'SW-LEX',
    message: e.message,
    length: Math.max(1, e.length),
  };
}

function isInRule(err: IRecognitionException, name: string) {
  return err.context?.ruleStack?.includes(name) ?? false;
}

function atEnd(tok: IToken | undefined) {
  return !tok || tok.tokenType?.name === 'EOF';
}

export function mapSwiftParserError(err: IRecognitionException, text: string): Violation {
  const tok = err.token;
  const posFallback = endOfTextPos(text);
  const { line, column } = coercePos(tok?.startLine ?? null, tok?.startColumn ?? null, posFallback.line, posFallback.column);
  const found = tok?.image ?? '';
  const len = found.length > 0 ? found.length : 1;

  if (err.name === 'NotAllInputParsedException' && found === '}') {
    return {
      line, column, severity: 'error', code: 'SW-UNEXPECTED-RBRACE',
      message: "Unexpected '}' without a matching '{'.",
      hint: 'Remove the extra brace or add the opening one.',
      length: 1,
    };
  }

  if (err.name === 'MismatchedTokenException' && atEnd(tok)) {
    if (isInRule(err, 'parenGroup')) {
      return {
        line, column, severity: 'error', code: 'SW-ATTRIBUTE-MISSING-RPAREN',
        message: "Missing ')' to close attribute arguments.",
        hint: 'Example: @available(iOS 13, *)',
        length: 1,
      };
    }
    if (isInRule(err, 'block')) {
      return {
        line, column, severity: 'error', code: 'SW-BLOCK-MISSING-RBRACE',
        message: "Missing '}' to close a block.",
        hint: "Close the block: class Foo { ... }",
        length: 1,
      };
    }
  }

  return { line, column, severity: 'error', code: 'SW-PARSE', message: err.message || 'Parser error', length: len };
}
