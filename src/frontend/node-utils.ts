/**
 * Small helpers over tree-sitter syntax nodes.
 */

import Parser from "tree-sitter";

export type SyntaxNode = Parser.SyntaxNode;

export function getNodeText(node: SyntaxNode, content: string): string {
  return content.slice(node.startIndex, node.endIndex);
}

/** 1-based line of the node's first character. */
export function getLineNumber(node: SyntaxNode): number {
  return node.startPosition.row + 1; // tree-sitter is 0-indexed
}

/**
 * 1-based line of the node's last character. A node that ends at column 0
 * stops at the newline closing the previous line.
 */
export function getEndLineNumber(node: SyntaxNode): number {
  const { row, column } = node.endPosition;
  if (column === 0 && row > node.startPosition.row) {
    return row;
  }
  return row + 1;
}

/**
 * Stable identity for a node. tree-sitter hands out a fresh wrapper object on
 * every access, so wrappers cannot be compared with ===.
 */
export function nodeKey(node: SyntaxNode): string {
  return `${node.type}:${node.startIndex}:${node.endIndex}`;
}


/** True when `node` lies inside `ancestor`'s range (a node is within itself). */
export function isWithin(node: SyntaxNode, ancestor: SyntaxNode): boolean {
  return node.startIndex >= ancestor.startIndex && node.endIndex <= ancestor.endIndex;
}

export function getField(node: SyntaxNode, name: string): SyntaxNode | undefined {
  return node.childForFieldName(name) ?? undefined;
}

export function hasChildOfType(node: SyntaxNode, type: string): boolean {
  return node.children.some((child) => child.type === type);
}

/** Identifier of a `def`/`class` node. */
export function getDefinitionName(node: SyntaxNode, content: string): string | undefined {
  const name = getField(node, "name");
  return name ? getNodeText(name, content) : undefined;
}

export function isAsyncFunction(node: SyntaxNode): boolean {
  return node.type === "function_definition" && hasChildOfType(node, "async");
}
