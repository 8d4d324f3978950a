import type { CstElement, CstNode, IToken } from 'chevrotain';

// Typed access to chevrotain's untyped `children` dictionary

export function isCstNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

export function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

export function childNodes(node: CstNode | undefined, key: string): CstNode[] {
  return (node?.children[key] ?? []).filter(isCstNode);
}

export function childNode(node: CstNode | undefined, key: string, index = 0): CstNode | undefined {
  return childNodes(node, key)[index];
}

export function childTokens(node: CstNode | undefined, key: string): IToken[] {
  return (node?.children[key] ?? []).filter(isToken);
}

export function childToken(node: CstNode | undefined, key: string, index = 0): IToken | undefined {
  return childTokens(node, key)[index];
}

export function has(node: CstNode | undefined, key: string): boolean {
  return (node?.children[key]?.length ?? 0) > 0;
}

/** All tokens under a node, in source order. */
export function tokensOf(node: CstNode): IToken[] {
  const out: IToken[] = [];
  for (const list of Object.values(node.children)) {
    for (const el of list) {
      if (isToken(el)) out.push(el);
      else out.push(...tokensOf(el));
    }
  }
  return out.sort((a, b) => a.startOffset - b.startOffset);
}

export function firstToken(node: CstNode): IToken | undefined {
  return tokensOf(node)[0];
}

export function unquote(s: string): string {
  if (s.length >= 2 && ((s.startsWith('"') && s.endsWith('"')) || (s.startsWith("'") && s.endsWith("'")))) {
    return s.slice(1, -1).replace(/\\(["'\\])/g, '$1');
  }
  return s;
}

/**
 * The source text a node spans, so that spacing and punctuation inside free
 * text survive. A node made of a single quoted string yields its contents.
 */
export function sourceText(source: string, node: CstNode | undefined): string {
  if (!node) return '';
  const toks = tokensOf(node);
  if (toks.length === 0) return '';
  if (toks.length === 1 && toks[0].tokenType.name === 'QuotedString') return unquote(toks[0].image);
  const first = toks[0];
  const last = toks[toks.length - 1];
  const end = last.endOffset ?? last.startOffset + last.image.length - 1;
  return source.slice(first.startOffset, end + 1).trim();
}
