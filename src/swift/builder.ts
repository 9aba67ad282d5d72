import type { CstElement, CstNode, IToken } from 'chevrotain';
import type { DeclarationNode, Modifier, SourceFileNode, SyntaxNode, TypeIntroducer, BlockNode } from './tree.js';

function isCstNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

function nodes(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter(isCstNode);
}

function tokens(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter((el): el is IToken => !isCstNode(el));
}

const TYPE_INTRODUCERS: readonly string[] = ['struct', 'enum', 'actor', 'extension'] satisfies TypeIntroducer[];

function isTypeIntroducer(image: string): image is TypeIntroducer {
  return TYPE_INTRODUCERS.includes(image);
}

export function buildTree(cst: CstNode): SourceFileNode {
  return { kind: 'sourceFile', children: members(cst) };
}

function members(container: CstNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (const member of nodes(container, 'member')) {
    const decl = nodes(member, 'declaration')[0];
    if (decl) {
      const built = buildDeclaration(decl);
      if (built) out.push(built);
      continue;
    }
    const block = nodes(member, 'block')[0];
    if (block) out.push(buildBlock(block));
  }
  return out;
}

function buildBlock(block: CstNode): BlockNode {
  return { kind: 'block', children: members(block) };
}

function buildModifier(node: CstNode): Modifier | undefined {
  const keyword = tokens(node, 'keyword')[0];
  if (!keyword) return undefined;
  const detail = tokens(node, 'detail')[0];
  return {
    name: keyword.image,
    ...(detail ? { detail: detail.image } : {}),
    start: keyword.startOffset,
    end: keyword.startOffset + keyword.image.length,
  };
}

// A declaration that lost its structure is kept with the modifiers found so far and no children.
function buildDeclaration(decl: CstNode): DeclarationNode | undefined {
  const modifiers = nodes(decl, 'modifier')
    .map(buildModifier)
    .filter((m): m is Modifier => m !== undefined);

  const typeDecl = nodes(decl, 'typeDeclaration')[0];
  if (typeDecl) {
    const introducer = tokens(typeDecl, 'introducer')[0]?.image;
    const children = nodes(typeDecl, 'body').flatMap(members);
    if (introducer === 'class') return { kind: 'class', modifiers, children };
    if (introducer === 'protocol') return { kind: 'protocol', modifiers, children };
    if (introducer !== undefined && isTypeIntroducer(introducer)) return { kind: 'type', introducer, modifiers, children };
    return undefined;
  }

  const funcDecl = nodes(decl, 'functionDeclaration')[0];
  if (funcDecl) {
    return { kind: 'function', modifiers, children: nodes(funcDecl, 'body').map(buildBlock) };
  }

  const varDecl = nodes(decl, 'variableDeclaration')[0];
  if (varDecl) {
    const introducer = tokens(varDecl, 'introducer')[0]?.image === 'let' ? 'let' : 'var';
    return { kind: 'variable', introducer, modifiers, children: nodes(varDecl, 'block').map(buildBlock) };
  }

  const otherDecl = nodes(decl, 'otherDeclaration')[0];
  if (otherDecl) {
    const introducer = tokens(otherDecl, 'introducer')[0]?.image ?? '';
    return { kind: 'other', introducer, modifiers, children: nodes(otherDecl, 'block').map(buildBlock) };
  }

  return undefined;
}
