/**
 * Query Matcher - evaluates a parsed structural query against a syntax tree
 *
 * Every node is tried as the root of the query in pre-order. Child
 * elements match an ordered, not necessarily contiguous, subsequence of
 * the node's children; quantifiers are greedy and backtrack. The first
 * solution that satisfies the predicates and the caller's acceptance test
 * is the match for that root.
 */

import { nodeText, walkTree } from '../parsers/syntax-tree.js';

import type { BudgetTracker } from './budget.js';
import type { Bindings, ChildElement, Query, QueryPattern, QueryPredicate } from './types.js';
import type { SyntaxNode, SyntaxTree } from '../parsers/types.js';

type Environment = ReadonlyMap<string, SyntaxNode>;

const EMPTY_ENVIRONMENT: Environment = new Map();

export interface QueryMatch {
  /** Node matched by the outermost pattern */
  node: SyntaxNode;
  bindings: Bindings;
}

interface MatchContext {
  source: string;
  tracker: BudgetTracker;
}

export class QueryMatcher {
  private readonly regexes = new Map<string, RegExp>();

  constructor(readonly query: Query) {
    for (const predicate of query.predicates) {
      const pattern = predicate.args[1];
      if ((predicate.name === 'match?' || predicate.name === 'not-match?') && pattern?.type === 'string') {
        this.regexes.set(pattern.value, new RegExp(pattern.value));
      }
    }
  }

  /**
   * All matches in pre-order, at most one per root node
   */
  findMatches(tree: SyntaxTree, tracker: BudgetTracker, accept?: (bindings: Bindings) => boolean): QueryMatch[] {
    const context: MatchContext = { source: tree.source, tracker };
    const matches: QueryMatch[] = [];

    walkTree(tree.root, (node) => {
      tracker.step();
      for (const environment of this.matchPattern(this.query.pattern, node, EMPTY_ENVIRONMENT, context)) {
        if (!this.checkPredicates(environment, context)) {
          continue;
        }
        const bindings: Bindings = Object.freeze(Object.fromEntries(environment));
        if (accept && !accept(bindings)) {
          continue;
        }
        matches.push({ node, bindings });
        break;
      }
    });

    return matches;
  }

  // ============================================
  // Structural Matching
  // ============================================

  private *matchPattern(
    pattern: QueryPattern,
    node: SyntaxNode,
    environment: Environment,
    context: MatchContext
  ): Generator<Environment> {
    context.tracker.step();

    switch (pattern.type) {
      case 'wildcard': {
        const bound = this.bind(pattern.captures, node, environment, context);
        if (bound) yield bound;
        return;
      }
      case 'string': {
        const matches =
          node.kind === pattern.value ||
          (node.children.length === 0 && nodeText(context.source, node) === pattern.value);
        const bound = matches ? this.bind(pattern.captures, node, environment, context) : null;
        if (bound) yield bound;
        return;
      }
      case 'alternation':
        for (const alternative of pattern.alternatives) {
          for (const inner of this.matchPattern(alternative, node, environment, context)) {
            const bound = this.bind(pattern.captures, node, inner, context);
            if (bound) yield bound;
          }
        }
        return;
      case 'node': {
        if (!node.named || (pattern.kind !== null && node.kind !== pattern.kind)) {
          return;
        }
        if (pattern.absentFields.some((field) => node.children.some((child) => child.field === field))) {
          return;
        }
        const bound = this.bind(pattern.captures, node, environment, context);
        if (bound) {
          yield* this.matchChildren(pattern.children, 0, node.children, 0, bound, context);
        }
        return;
      }
    }
  }

  private *matchChildren(
    elements: readonly ChildElement[],
    index: number,
    children: readonly SyntaxNode[],
    position: number,
    environment: Environment,
    context: MatchContext
  ): Generator<Environment> {
    const element = elements[index];
    if (!element) {
      yield environment;
      return;
    }

    switch (element.pattern.quantifier) {
      case 'one':
        for (const [next, matched] of this.occurrences(element, children, position, environment, context)) {
          yield* this.matchChildren(elements, index + 1, children, next, matched, context);
        }
        return;
      case 'optional':
        for (const [next, matched] of this.occurrences(element, children, position, environment, context)) {
          yield* this.matchChildren(elements, index + 1, children, next, matched, context);
        }
        yield* this.matchChildren(elements, index + 1, children, position, environment, context);
        return;
      case 'zero-or-more':
      case 'one-or-more':
        yield* this.matchRepeated(elements, index, children, position, environment, environment, 0, context);
        return;
    }
  }

  /**
   * Greedy repetition. Captures bind the first occurrence; later
   * occurrences are checked against the environment from before the
   * element and their bindings dropped.
   */
  private *matchRepeated(
    elements: readonly ChildElement[],
    index: number,
    children: readonly SyntaxNode[],
    position: number,
    environment: Environment,
    before: Environment,
    count: number,
    context: MatchContext
  ): Generator<Environment> {
    const element = elements[index];
    if (!element) {
      return;
    }

    const seed = count === 0 ? environment : before;
    for (const [next, matched] of this.occurrences(element, children, position, seed, context)) {
      const carried = count === 0 ? matched : environment;
      yield* this.matchRepeated(elements, index, children, next, carried, before, count + 1, context);
    }

    const minimum = element.pattern.quantifier === 'one-or-more' ? 1 : 0;
    if (count >= minimum) {
      yield* this.matchChildren(elements, index + 1, children, position, environment, context);
    }
  }

  /**
   * Each (next position, environment) for a child at or after `position` matching the element
   */
  private *occurrences(
    element: ChildElement,
    children: readonly SyntaxNode[],
    position: number,
    environment: Environment,
    context: MatchContext
  ): Generator<[number, Environment]> {
    const anonymous = acceptsAnonymous(element.pattern);
    for (let i = position; i < children.length; i++) {
      const child = children[i];
      if (!child) continue;
      if (element.field !== null ? child.field !== element.field : !anonymous && !child.named) {
        continue;
      }
      for (const matched of this.matchPattern(element.pattern, child, environment, context)) {
        yield [i + 1, matched];
      }
    }
  }

  private bind(
    captures: readonly string[],
    node: SyntaxNode,
    environment: Environment,
    context: MatchContext
  ): Environment | null {
    if (captures.length === 0) {
      return environment;
    }
    const next = new Map(environment);
    for (const name of captures) {
      const existing = next.get(name);
      if (existing) {
        if (existing !== node && nodeText(context.source, existing) !== nodeText(context.source, node)) {
          return null;
        }
        continue;
      }
      next.set(name, node);
    }
    return next;
  }

  // ============================================
  // Predicates
  // ============================================

  private checkPredicates(environment: Environment, context: MatchContext): boolean {
    return this.query.predicates.every((predicate) => {
      context.tracker.step();
      return this.checkPredicate(predicate, environment, context);
    });
  }

  private checkPredicate(predicate: QueryPredicate, environment: Environment, context: MatchContext): boolean {
    const negated = predicate.name.startsWith('not-');
    const [subject, ...rest] = predicate.args;
    const node = subject?.type === 'capture' ? environment.get(subject.name) : undefined;
    if (!node) {
      return negated;
    }
    const text = nodeText(context.source, node);

    let holds: boolean;
    switch (predicate.name) {
      case 'eq?':
      case 'not-eq?': {
        const other = rest[0];
        let expected: string | undefined;
        if (other?.type === 'capture') {
          const otherNode = environment.get(other.name);
          expected = otherNode ? nodeText(context.source, otherNode) : undefined;
        } else {
          expected = other?.value;
        }
        if (expected === undefined) {
          return negated;
        }
        holds = text === expected;
        break;
      }
      case 'match?':
      case 'not-match?': {
        const pattern = rest[0];
        const regex = pattern?.type === 'string' ? this.regexes.get(pattern.value) : undefined;
        holds = regex ? regex.test(text) : false;
        break;
      }
      case 'any-of?':
      case 'not-any-of?':
        holds = rest.some((arg) => arg.type === 'string' && arg.value === text);
        break;
      default:
        // empty? / not-empty?
        holds = !node.children.some((child) => child.named);
    }

    return negated ? !holds : holds;
  }
}

function acceptsAnonymous(pattern: QueryPattern): boolean {
  switch (pattern.type) {
    case 'wildcard':
    case 'string':
      return true;
    case 'alternation':
      return pattern.alternatives.some(acceptsAnonymous);
    case 'node':
      return false;
  }
}
