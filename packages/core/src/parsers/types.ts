/**
 * Parser types - the language-agnostic syntax tree every adapter produces
 */

import type { ParseError } from '../errors.js';

/**
 * Languages with a syntax adapter
 */
export type Language = 'typescript' | 'javascript' | 'python' | 'java' | 'go';

export const SUPPORTED_LANGUAGES: readonly Language[] = ['typescript', 'javascript', 'python', 'java', 'go'];

export function isLanguage(value: unknown): value is Language {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

/**
 * Zero-based row and column (column counted in UTF-16 code units)
 */
export interface Position {
  row: number;
  column: number;
}

/**
 * Location of a node within its source text
 */
export interface Span {
  /** Offset of the first character */
  startIndex: number;
  /** Offset just past the last character */
  endIndex: number;
  startPosition: Position;
  endPosition: Position;
}

/**
 * A node of the normalized syntax tree
 */
export interface SyntaxNode {
  /** Grammar kind, e.g. `CatchClause` or `function_definition` */
  readonly kind: string;
  /** Whether the grammar treats the node as named (tokens are anonymous) */
  readonly named: boolean;
  /** Field of the parent that holds this node, if any */
  readonly field: string | null;
  readonly span: Span;
  readonly children: readonly SyntaxNode[];
  /** Source text of leaf nodes */
  readonly text?: string;
  /** Whether the node is, or contains, a syntax error */
  readonly hasError: boolean;
}

/**
 * A syntax error the parser recovered from
 */
export interface SyntaxDiagnostic {
  message: string;
  span: Span;
}

/**
 * Syntax tree of one source file
 */
export interface SyntaxTree {
  readonly language: Language;
  readonly source: string;
  readonly root: SyntaxNode;
  readonly diagnostics: readonly SyntaxDiagnostic[];
}

export type ParseOutcome =
  | { ok: true; tree: SyntaxTree }
  | { ok: false; error: ParseError };

/**
 * Options accepted by every adapter
 */
export interface ParseOptions {
  /** Workspace-relative path, used in diagnostics and to pick a dialect */
  filePath?: string;
  /** Whether recovered syntax errors turn into a ParseError */
  syntaxErrors?: 'tolerate' | 'reject';
}
