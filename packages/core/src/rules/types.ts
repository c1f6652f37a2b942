/**
 * Rule types - the rule definition model and the violations rules produce
 *
 * Rules are plain data: pattern clauses form a tagged union interpreted by
 * the pattern matcher, so a rule can be loaded, validated and tested
 * without generating code.
 */

import type { Language } from '../parsers/types.js';

// ============================================
// Severity
// ============================================

export type Severity = 'error' | 'warning' | 'notice';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'notice'];

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

/**
 * Higher is more severe
 */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  error: 3,
  warning: 2,
  notice: 1,
};

// ============================================
// Pattern Clauses
// ============================================

/**
 * Refines the text or kind of a captured node
 */
export interface WhereConstraint {
  capture: string;
  /** Regular expression the text must match */
  matches?: string;
  /** Regular expression the text must not match */
  notMatches?: string;
  equals?: string;
  notEquals?: string;
  /** Node kinds the capture may have */
  kinds?: string[];
}

export interface StructuralClause {
  type: 'structural';
  query: string;
  /** Capture whose node is reported instead of the whole match */
  focus?: string;
  where?: WhereConstraint[];
}

export interface TextualClause {
  type: 'textual';
  regex: string;
  /** RegExp flags other than `g` and `d`, which are always set */
  flags?: string;
  where?: WhereConstraint[];
}

export interface AllClause {
  type: 'all';
  clauses: PatternClause[];
}

export interface AnyClause {
  type: 'any';
  clauses: PatternClause[];
}

export interface NotClause {
  type: 'not';
  clause: PatternClause;
}

export interface InsideClause {
  type: 'inside';
  clause: PatternClause;
}

export interface NotInsideClause {
  type: 'not-inside';
  clause: PatternClause;
}

export type GuardClause = NotClause | InsideClause | NotInsideClause;

export type PatternClause = StructuralClause | TextualClause | AllClause | AnyClause | GuardClause;

export type ClauseType = PatternClause['type'];

export const CLAUSE_TYPES: readonly ClauseType[] = ['structural', 'textual', 'all', 'any', 'not', 'inside', 'not-inside'];

export function isGuardClause(clause: PatternClause): clause is GuardClause {
  return clause.type === 'not' || clause.type === 'inside' || clause.type === 'not-inside';
}

/** Deepest allowed nesting of composite clauses */
export const MAX_CLAUSE_DEPTH = 8;

// ============================================
// Fix Templates
// ============================================

export type FixEditType = 'replace' | 'insert-before' | 'insert-after' | 'remove';

export const FIX_EDIT_TYPES: readonly FixEditType[] = ['replace', 'insert-before', 'insert-after', 'remove'];

export interface FixEditTemplate {
  type: FixEditType;
  /** Capture to edit; the whole match when absent */
  target?: string;
  /** Text with `{{capture}}` placeholders; ignored by `remove` */
  content?: string;
}

export interface FixTemplate {
  description?: string;
  edits: FixEditTemplate[];
}

// ============================================
// Embedded Fixtures
// ============================================

/**
 * An expected violation; omitted fields are not compared
 */
export interface ExpectedViolation {
  line: number;
  column?: number;
  endLine?: number;
  endColumn?: number;
  ruleId?: string;
}

export interface FixtureCase {
  name?: string;
  /** File name used for the one-file analysis, which also selects the language */
  filename?: string;
  code: string;
  expected: ExpectedViolation[];
}

// ============================================
// Rule Definition
// ============================================

export interface RuleDefinition {
  id: string;
  name?: string;
  description?: string;
  languages: Language[];
  severity: Severity;
  category?: string;
  /** Message template with `{{capture}}` placeholders */
  message: string;
  patterns: PatternClause[];
  fix?: FixTemplate;
  tests?: FixtureCase[];
  tags?: string[];
  /** SHA-256 of the canonical JSON of `patterns` */
  checksum?: string;
}

// ============================================
// Violations
// ============================================

/**
 * One-based location with an exclusive end column
 */
export interface ViolationLocation {
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  startOffset: number;
  endOffset: number;
}

export interface TextEdit {
  location: ViolationLocation;
  content: string;
}

export interface SuggestedFix {
  description: string;
  edits: TextEdit[];
}

export interface Violation {
  ruleId: string;
  /** Workspace-relative path */
  file: string;
  language: Language;
  severity: Severity;
  category: string | null;
  message: string;
  location: ViolationLocation;
  fix?: SuggestedFix;
  fingerprint: string;
}
