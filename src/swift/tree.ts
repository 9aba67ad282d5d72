// Syntax tree consumed by rules: declarations, their modifiers and nested scopes.
// Offsets are UTF-16 code unit offsets into the source text; `end` is exclusive.

export interface Modifier {
  name: string;
  /** Parenthesized detail, e.g. `set` in `private(set)`. */
  detail?: string;
  start: number;
  end: number;
}

export type TypeIntroducer = 'struct' | 'enum' | 'actor' | 'extension';

interface DeclarationBase {
  modifiers: Modifier[];
  children: SyntaxNode[];
}

export interface ClassDeclNode extends DeclarationBase {
  kind: 'class';
}

export interface ProtocolDeclNode extends DeclarationBase {
  kind: 'protocol';
}

export interface TypeDeclNode extends DeclarationBase {
  kind: 'type';
  introducer: TypeIntroducer;
}

export interface FunctionDeclNode extends DeclarationBase {
  kind: 'function';
}

export interface VariableDeclNode extends DeclarationBase {
  kind: 'variable';
  introducer: 'var' | 'let';
}

export interface OtherDeclNode extends DeclarationBase {
  kind: 'other';
  introducer: string;
}

export interface BlockNode {
  kind: 'block';
  children: SyntaxNode[];
}

export interface SourceFileNode {
  kind: 'sourceFile';
  children: SyntaxNode[];
}

export type DeclarationNode =
  | ClassDeclNode
  | ProtocolDeclNode
  | TypeDeclNode
  | FunctionDeclNode
  | VariableDeclNode
  | OtherDeclNode;

export type SyntaxNode = SourceFileNode | BlockNode | DeclarationNode;

export function hasModifier(modifiers: Modifier[], name: string): boolean {
  return modifiers.some((m) => m.name === name);
}

export function isFinal(modifiers: Modifier[]): boolean {
  return hasModifier(modifiers, 'final');
}

// `private(set)` restricts only the setter, so it does not count.
export function isPrivate(modifiers: Modifier[]): boolean {
  return modifiers.some((m) => (m.name === 'private' || m.name === 'fileprivate') && m.detail === undefined);
}
