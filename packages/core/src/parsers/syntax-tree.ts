/**
 * Syntax tree construction and traversal helpers shared by all adapters.
 *
 * Adapters build lightweight draft nodes carrying offsets only; `finalizeTree`
 * resolves positions, attaches leaf text, clamps spans to the source bounds
 * and freezes the result so it can be shared by concurrently evaluated rules.
 */

import type { Language, Position, Span, SyntaxDiagnostic, SyntaxNode, SyntaxTree } from './types.js';

/**
 * Node under construction
 */
export interface DraftNode {
  kind: string;
  named: boolean;
  field: string | null;
  startIndex: number;
  endIndex: number;
  children: DraftNode[];
  hasError: boolean;
}

/**
 * Diagnostic under construction
 */
export interface DraftDiagnostic {
  message: string;
  startIndex: number;
  endIndex: number;
}

/**
 * Maps string offsets to zero-based rows and columns
 */
export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(private readonly source: string) {
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  positionAt(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.source.length));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      const start = this.lineStarts[mid] ?? 0;
      if (start <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { row: low, column: clamped - (this.lineStarts[low] ?? 0) };
  }

  span(startIndex: number, endIndex: number): Span {
    const start = Math.max(0, Math.min(startIndex, this.source.length));
    const end = Math.max(start, Math.min(endIndex, this.source.length));
    return {
      startIndex: start,
      endIndex: end,
      startPosition: this.positionAt(start),
      endPosition: this.positionAt(end),
    };
  }
}

export function createDraftNode(
  kind: string,
  startIndex: number,
  endIndex: number,
  options: { named?: boolean; field?: string | null; hasError?: boolean } = {}
): DraftNode {
  return {
    kind,
    named: options.named ?? true,
    field: options.field ?? null,
    startIndex,
    endIndex,
    children: [],
    hasError: options.hasError ?? false,
  };
}

/**
 * Turn a draft tree into an immutable SyntaxTree
 */
export function finalizeTree(
  language: Language,
  source: string,
  draftRoot: DraftNode,
  draftDiagnostics: DraftDiagnostic[] = []
): SyntaxTree {
  const lines = new LineIndex(source);

  const build = (draft: DraftNode): SyntaxNode => {
    const span = lines.span(draft.startIndex, draft.endIndex);
    const children = draft.children.map(build);
    const hasError = draft.hasError || children.some((c) => c.hasError);
    const node: SyntaxNode =
      children.length === 0
        ? {
            kind: draft.kind,
            named: draft.named,
            field: draft.field,
            span: Object.freeze(span),
            children: Object.freeze(children),
            text: source.slice(span.startIndex, span.endIndex),
            hasError,
          }
        : {
            kind: draft.kind,
            named: draft.named,
            field: draft.field,
            span: Object.freeze(span),
            children: Object.freeze(children),
            hasError,
          };
    return Object.freeze(node);
  };

  const diagnostics: SyntaxDiagnostic[] = draftDiagnostics.map((d) =>
    Object.freeze({ message: d.message, span: Object.freeze(lines.span(d.startIndex, d.endIndex)) })
  );

  return Object.freeze({
    language,
    source,
    root: build(draftRoot),
    diagnostics: Object.freeze(diagnostics),
  });
}

/**
 * Source text covered by a node
 */
export function nodeText(source: string, node: SyntaxNode): string {
  return node.text ?? source.slice(node.span.startIndex, node.span.endIndex);
}

/**
 * Visitor for pre-order traversal. Returning false skips the node's children.
 */
export type NodeVisitor = (node: SyntaxNode, parent: SyntaxNode | null, depth: number) => boolean | void;

/**
 * Pre-order, depth-first traversal
 */
export function walkTree(root: SyntaxNode, visitor: NodeVisitor): void {
  const stack: Array<{ node: SyntaxNode; parent: SyntaxNode | null; depth: number }> = [
    { node: root, parent: null, depth: 0 },
  ];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    if (visitor(entry.node, entry.parent, entry.depth) === false) {
      continue;
    }
    const { children } = entry.node;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) {
        stack.push({ node: child, parent: entry.node, depth: entry.depth + 1 });
      }
    }
  }
}

export function findNodesByKind(root: SyntaxNode, kind: string): SyntaxNode[] {
  const found: SyntaxNode[] = [];
  walkTree(root, (node) => {
    if (node.kind === kind) found.push(node);
  });
  return found;
}

/**
 * Whether `outer` covers `inner` (inclusive on both ends)
 */
export function spanContains(outer: Span, inner: Span): boolean {
  return outer.startIndex <= inner.startIndex && inner.endIndex <= outer.endIndex;
}

export function spansEqual(a: Span, b: Span): boolean {
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}

/**
 * Pre-order comparison: earlier start first, wider span first on ties
 */
export function compareSpans(a: Span, b: Span): number {
  return a.startIndex - b.startIndex || b.endIndex - a.endIndex;
}
