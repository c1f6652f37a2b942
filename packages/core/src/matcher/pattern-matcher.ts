/**
 * Pattern Matcher - evaluates a rule's pattern clauses against a syntax tree
 *
 * Structural clauses run a parsed query; textual clauses run a regular
 * expression over the file text. Composite clauses combine the two:
 *
 * - top-level clauses and `any` produce the union of their matches
 * - `all` narrows the candidates of its first positive clause by the
 *   remaining positive clauses (same span, agreeing bindings), then by
 *   its guards (`not`, `inside`, `not-inside`) in declaration order
 *
 * Results are ordered by start offset, then widest span first, so the
 * output is the same for every run over the same (tree, rule).
 */

import { EvaluationError } from '../errors.js';
import { LineIndex, compareSpans, spanContains, spansEqual } from '../parsers/syntax-tree.js';
import { isGuardClause } from '../rules/types.js';
import { BudgetTracker, type EvaluationBudget } from './budget.js';
import { parseQuery } from './query-parser.js';
import { QueryMatcher } from './query-matcher.js';

import type { Bindings, Match } from './types.js';
import type { SyntaxNode, SyntaxTree } from '../parsers/types.js';
import type {
  AllClause,
  GuardClause,
  PatternClause,
  RuleDefinition,
  StructuralClause,
  TextualClause,
  WhereConstraint,
} from '../rules/types.js';

/** Kind of the synthetic nodes produced by textual clauses */
export const TEXT_NODE_KIND = '#text';

/**
 * Per-evaluation state
 */
interface EvaluationScope {
  tree: SyntaxTree;
  tracker: BudgetTracker;
  /** Clause results, so shared sub-clauses run once */
  memo: Map<PatternClause, Match[]>;
}

/**
 * PatternMatcher compiles clauses once and evaluates them per tree.
 *
 * Compiled queries and regular expressions are cached on the (frozen)
 * clause objects, so one instance can serve every rule of a run.
 */
export class PatternMatcher {
  private readonly queries = new WeakMap<StructuralClause, QueryMatcher>();
  private readonly textualRegexes = new WeakMap<TextualClause, RegExp>();
  private readonly constraintRegexes = new Map<string, RegExp>();
  private readonly lineIndexes = new WeakMap<SyntaxTree, LineIndex>();

  /**
   * Evaluate every pattern clause of a rule.
   *
   * @throws EvaluationTimeoutError when the budget runs out
   * @throws EvaluationCancelledError when the run is cancelled
   */
  evaluate(tree: SyntaxTree, rule: RuleDefinition, budget: EvaluationBudget | BudgetTracker): Match[] {
    return this.evaluateClauses(tree, rule.patterns, budget);
  }

  evaluateClauses(
    tree: SyntaxTree,
    clauses: readonly PatternClause[],
    budget: EvaluationBudget | BudgetTracker
  ): Match[] {
    const tracker = budget instanceof BudgetTracker ? budget : new BudgetTracker(budget);
    const scope: EvaluationScope = { tree, tracker, memo: new Map() };
    tracker.checkpoint();
    return this.union(clauses.map((clause) => this.evaluateClause(clause, scope)));
  }

  // ============================================
  // Clause Evaluation
  // ============================================

  private evaluateClause(clause: PatternClause, scope: EvaluationScope): Match[] {
    const cached = scope.memo.get(clause);
    if (cached) {
      return cached;
    }

    let result: Match[];
    switch (clause.type) {
      case 'structural':
        result = this.matchStructural(clause, scope);
        break;
      case 'textual':
        result = this.matchTextual(clause, scope);
        break;
      case 'any':
        result = this.union(clause.clauses.map((inner) => this.evaluateClause(inner, scope)));
        break;
      case 'all':
        result = this.matchAll(clause, scope);
        break;
      default:
        throw new EvaluationError(`'${clause.type}' clauses are only allowed inside an 'all' clause`);
    }

    scope.memo.set(clause, result);
    return result;
  }

  private matchStructural(clause: StructuralClause, scope: EvaluationScope): Match[] {
    const matcher = this.compileQuery(clause);
    const { focus, where } = clause;
    const source = scope.tree.source;

    const accept =
      focus !== undefined || (where && where.length > 0)
        ? (bindings: Bindings): boolean =>
            (focus === undefined || bindings[focus] !== undefined) &&
            this.checkConstraints(where ?? [], bindings, source)
        : undefined;

    const matches: Match[] = [];
    for (const found of matcher.findMatches(scope.tree, scope.tracker, accept)) {
      const node = (focus !== undefined ? found.bindings[focus] : undefined) ?? found.node;
      matches.push({ span: node.span, node, bindings: found.bindings });
    }
    return matches;
  }

  private matchTextual(clause: TextualClause, scope: EvaluationScope): Match[] {
    const regex = this.compileTextual(clause);
    const { tree, tracker } = scope;
    const lines = this.lineIndex(tree);
    const matches: Match[] = [];

    for (const found of tree.source.matchAll(regex)) {
      tracker.step();
      const start = found.index ?? 0;
      const end = start + found[0].length;
      if (end === start) {
        continue;
      }

      const bindings: Record<string, SyntaxNode> = {};
      for (const [name, range] of Object.entries(found.indices?.groups ?? {})) {
        if (range) {
          bindings[name] = createTextNode(tree.source, lines, range[0], range[1]);
        }
      }
      const frozen: Bindings = Object.freeze(bindings);
      if (clause.where && !this.checkConstraints(clause.where, frozen, tree.source)) {
        continue;
      }

      const node = createTextNode(tree.source, lines, start, end);
      matches.push({ span: node.span, node, bindings: frozen });
    }
    return matches;
  }

  private matchAll(clause: AllClause, scope: EvaluationScope): Match[] {
    const positives = clause.clauses.filter((inner) => !isGuardClause(inner));
    const guards = clause.clauses.filter(isGuardClause);

    const [first, ...rest] = positives;
    if (!first) {
      throw new EvaluationError("An 'all' clause needs at least one positive clause");
    }

    let candidates = this.evaluateClause(first, scope);

    for (const inner of rest) {
      if (candidates.length === 0) {
        return [];
      }
      const bySpan = groupBySpan(this.evaluateClause(inner, scope));
      const narrowed: Match[] = [];
      for (const candidate of candidates) {
        scope.tracker.step();
        for (const other of bySpan.get(spanKey(candidate)) ?? []) {
          const merged = mergeBindings(candidate.bindings, other.bindings);
          if (merged) {
            narrowed.push({ span: candidate.span, node: candidate.node, bindings: merged });
            break;
          }
        }
      }
      candidates = narrowed;
    }

    for (const guard of guards) {
      if (candidates.length === 0) {
        return [];
      }
      candidates = this.applyGuard(guard, candidates, scope);
    }

    return candidates;
  }

  private applyGuard(guard: GuardClause, candidates: Match[], scope: EvaluationScope): Match[] {
    const others = this.evaluateClause(guard.clause, scope);
    return candidates.filter((candidate) => {
      scope.tracker.step();
      switch (guard.type) {
        case 'not':
          return !others.some((other) => spansEqual(other.span, candidate.span));
        case 'inside':
          return others.some((other) => spanContains(other.span, candidate.span));
        case 'not-inside':
          return !others.some((other) => spanContains(other.span, candidate.span));
      }
    });
  }

  /**
   * Merge clause results: ordered by span, identical (span, bindings) kept once
   */
  private union(results: Match[][]): Match[] {
    const merged = results.flat().sort((a, b) => compareSpans(a.span, b.span));
    const seen = new Set<string>();
    return merged.filter((match) => {
      const key = matchKey(match);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  // ============================================
  // Constraints
  // ============================================

  private checkConstraints(constraints: readonly WhereConstraint[], bindings: Bindings, source: string): boolean {
    return constraints.every((constraint) => {
      const node = bindings[constraint.capture];
      if (!node) {
        return constraint.matches === undefined && constraint.equals === undefined && constraint.kinds === undefined;
      }
      const text = node.text ?? source.slice(node.span.startIndex, node.span.endIndex);
      if (constraint.matches !== undefined && !this.constraintRegex(constraint.matches).test(text)) return false;
      if (constraint.notMatches !== undefined && this.constraintRegex(constraint.notMatches).test(text)) return false;
      if (constraint.equals !== undefined && text !== constraint.equals) return false;
      if (constraint.notEquals !== undefined && text === constraint.notEquals) return false;
      if (constraint.kinds !== undefined && !constraint.kinds.includes(node.kind)) return false;
      return true;
    });
  }

  // ============================================
  // Compilation Caches
  // ============================================

  private compileQuery(clause: StructuralClause): QueryMatcher {
    let matcher = this.queries.get(clause);
    if (!matcher) {
      matcher = new QueryMatcher(parseQuery(clause.query));
      this.queries.set(clause, matcher);
    }
    return matcher;
  }

  private compileTextual(clause: TextualClause): RegExp {
    let regex = this.textualRegexes.get(clause);
    if (!regex) {
      regex = new RegExp(clause.regex, textualFlags(clause.flags));
      this.textualRegexes.set(clause, regex);
    }
    return regex;
  }

  private constraintRegex(pattern: string): RegExp {
    let regex = this.constraintRegexes.get(pattern);
    if (!regex) {
      regex = new RegExp(pattern);
      this.constraintRegexes.set(pattern, regex);
    }
    return regex;
  }

  private lineIndex(tree: SyntaxTree): LineIndex {
    let lines = this.lineIndexes.get(tree);
    if (!lines) {
      lines = new LineIndex(tree.source);
      this.lineIndexes.set(tree, lines);
    }
    return lines;
  }
}

// ============================================
// Helpers
// ============================================

/**
 * Flags for a textual clause: the user's flags plus `g` and `d`
 */
export function textualFlags(flags = ''): string {
  const unique = new Set([...flags.replace(/[gdy]/g, ''), 'g', 'd']);
  return [...unique].sort().join('');
}

/**
 * Names of the named groups of a regular expression
 */
export function namedGroups(regex: string): string[] {
  return [...regex.matchAll(/\(\?<([A-Za-z_$][\w$]*)>/g)].flatMap((m) => (m[1] ? [m[1]] : []));
}

function createTextNode(source: string, lines: LineIndex, start: number, end: number): SyntaxNode {
  const span = lines.span(start, end);
  return Object.freeze({
    kind: TEXT_NODE_KIND,
    named: true,
    field: null,
    span: Object.freeze(span),
    children: Object.freeze([]),
    text: source.slice(span.startIndex, span.endIndex),
    hasError: false,
  });
}

function spanKey(match: Match): string {
  return `${match.span.startIndex}:${match.span.endIndex}`;
}

function matchKey(match: Match): string {
  const bindings = Object.keys(match.bindings)
    .sort()
    .map((name) => {
      const node = match.bindings[name];
      return node ? `${name}@${node.span.startIndex}-${node.span.endIndex}` : name;
    });
  return `${spanKey(match)}|${bindings.join(',')}`;
}

function groupBySpan(matches: Match[]): Map<string, Match[]> {
  const groups = new Map<string, Match[]>();
  for (const match of matches) {
    const key = spanKey(match);
    const group = groups.get(key);
    if (group) {
      group.push(match);
    } else {
      groups.set(key, [match]);
    }
  }
  return groups;
}

/**
 * Union of two binding sets, or null when a shared name binds different spans
 */
export function mergeBindings(a: Bindings, b: Bindings): Bindings | null {
  const merged: Record<string, SyntaxNode> = { ...a };
  for (const [name, node] of Object.entries(b)) {
    const existing = merged[name];
    if (existing && !spansEqual(existing.span, node.span)) {
      return null;
    }
    if (!existing) {
      merged[name] = node;
    }
  }
  return Object.freeze(merged);
}

const defaultMatcher = new PatternMatcher();

/**
 * Evaluate a rule with a shared matcher instance
 */
export function evaluate(tree: SyntaxTree, rule: RuleDefinition, budget: EvaluationBudget): Match[] {
  return defaultMatcher.evaluate(tree, rule, budget);
}
