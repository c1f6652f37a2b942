/**
 * Matcher types - parsed queries and the matches the engine produces
 */

import type { Span, SyntaxNode } from '../parsers/types.js';

// ============================================
// Matches
// ============================================

/**
 * Capture name to matched node, one per match
 */
export type Bindings = Readonly<Record<string, SyntaxNode>>;

/**
 * One accepted match of a rule or clause
 */
export interface Match {
  /** Primary span reported for the match */
  span: Span;
  /** Node covering the primary span */
  node: SyntaxNode;
  bindings: Bindings;
}

// ============================================
// Query AST
// ============================================

export type Quantifier = 'one' | 'optional' | 'zero-or-more' | 'one-or-more';

interface PatternBase {
  quantifier: Quantifier;
  captures: string[];
}

/**
 * `(kind child*)`; a null kind is `(_)`, any named node
 */
export interface NodePattern extends PatternBase {
  type: 'node';
  kind: string | null;
  children: ChildElement[];
  absentFields: string[];
}

/**
 * `_`, any node, named or anonymous
 */
export interface WildcardPattern extends PatternBase {
  type: 'wildcard';
}

/**
 * `"text"`, a leaf whose kind or text equals the value
 */
export interface StringPattern extends PatternBase {
  type: 'string';
  value: string;
}

/**
 * `[a b ...]`, the first alternative that matches
 */
export interface AlternationPattern extends PatternBase {
  type: 'alternation';
  alternatives: QueryPattern[];
}

export type QueryPattern = NodePattern | WildcardPattern | StringPattern | AlternationPattern;

export interface ChildElement {
  field: string | null;
  pattern: QueryPattern;
}

export type PredicateArgument = { type: 'capture'; name: string } | { type: 'string'; value: string };

export interface QueryPredicate {
  /** Predicate name without the leading `#`, e.g. `eq?` */
  name: string;
  args: PredicateArgument[];
  offset: number;
}

/**
 * A parsed structural query
 */
export interface Query {
  source: string;
  pattern: QueryPattern;
  predicates: QueryPredicate[];
  /** Every capture the query declares, in order of first appearance */
  captureNames: string[];
}

export const PREDICATE_NAMES = [
  'eq?',
  'not-eq?',
  'match?',
  'not-match?',
  'any-of?',
  'not-any-of?',
  'empty?',
  'not-empty?',
] as const;

export type PredicateName = (typeof PREDICATE_NAMES)[number];

export function isPredicateName(value: string): value is PredicateName {
  return PREDICATE_NAMES.some((name) => name === value);
}
