/**
 * Node traversal - depth-first, pre-order walk over a source unit
 */

import ts from 'typescript';

import type { NodeDispatchEntry, NodeDispatchMap } from './visitor-registry.js';

/**
 * Called for every dispatch entry matching a node
 */
export type NodeDispatchHandler = (entry: NodeDispatchEntry, node: ts.Node) => void;

/**
 * Walk `root` and all descendants in document order, handing each node to
 * the entries registered for its kind. Returns the number of nodes visited.
 */
export function traverseNodes(root: ts.Node, dispatch: NodeDispatchMap, handle: NodeDispatchHandler): number {
  let visited = 0;

  const visit = (node: ts.Node): void => {
    visited++;
    const entries = dispatch.get(node.kind);
    if (entries) {
      for (const entry of entries) {
        handle(entry, node);
      }
    }
    ts.forEachChild(node, visit);
  };

  visit(root);
  return visited;
}

/**
 * Readable name of a syntax kind, for messages
 */
export function syntaxKindName(kind: ts.SyntaxKind): string {
  return ts.SyntaxKind[kind] ?? String(kind);
}
