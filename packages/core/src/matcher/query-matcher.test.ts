/**
 * Query Matcher Tests
 */

import { describe, it, expect } from 'vitest';

import { BudgetTracker } from './budget.js';
import { parseQuery } from './query-parser.js';
import { QueryMatcher, type QueryMatch } from './query-matcher.js';
import { EvaluationTimeoutError } from '../errors.js';
import { nodeText } from '../parsers/syntax-tree.js';
import { TypeScriptParser } from '../parsers/typescript-parser.js';

import type { SyntaxTree } from '../parsers/types.js';
import type { Bindings } from './types.js';

const parser = new TypeScriptParser();

function parseSource(source: string): SyntaxTree {
  const outcome = parser.parse(source, { filePath: 'sample.ts' });
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.tree;
}

function run(
  source: string,
  query: string,
  options: { maxSteps?: number; accept?: (bindings: Bindings) => boolean } = {}
): { tree: SyntaxTree; matches: QueryMatch[] } {
  const tree = parseSource(source);
  const matcher = new QueryMatcher(parseQuery(query));
  const tracker = new BudgetTracker({ maxSteps: options.maxSteps ?? 1_000_000 });
  return { tree, matches: matcher.findMatches(tree, tracker, options.accept) };
}

function captured(tree: SyntaxTree, matches: QueryMatch[], name: string): string[] {
  return matches.flatMap((match) => {
    const node = match.bindings[name];
    return node ? [nodeText(tree.source, node)] : [];
  });
}

describe('QueryMatcher', () => {
  it('finds empty catch blocks', () => {
    const source = 'try { a(); } catch (e) {}\ntry { b(); } catch (e) { log(e); }\n';
    const { tree, matches } = run(source, '(CatchClause block: (Block) @body (#empty? @body))');

    expect(matches).toHaveLength(1);
    expect(matches[0]?.node.kind).toBe('CatchClause');
    expect(matches[0]?.node.span.startPosition).toEqual({ row: 0, column: 13 });
    expect(captured(tree, matches, 'body')).toEqual(['{}']);
    expect(matches[0]?.bindings['body']?.span.startPosition).toEqual({ row: 0, column: 23 });
  });

  it('restricts captures with #any-of?', () => {
    const { tree, matches } = run(
      'eval("x");\nexec("y");\nrun("z");\n',
      '(CallExpression expression: (Identifier) @fn (#any-of? @fn "eval" "exec"))'
    );
    expect(captured(tree, matches, 'fn')).toEqual(['eval', 'exec']);
  });

  it('restricts captures with #match?', () => {
    const { tree, matches } = run('onClick;\nonload;\nhandle;\n', '(Identifier) @id (#match? @id "^on[A-Z]")');
    expect(captured(tree, matches, 'id')).toEqual(['onClick']);
  });

  it('compares two captures with #not-eq?', () => {
    const { tree, matches } = run(
      'a + a;\na + b;\n',
      '(BinaryExpression left: (_) @l right: (_) @r (#not-eq? @l @r))'
    );
    expect(matches.map((m) => nodeText(tree.source, m.node))).toEqual(['a + b']);
  });

  it('requires a repeated capture to bind equal text', () => {
    const { tree, matches } = run(
      'a === a;\na === b;\n',
      '(BinaryExpression left: (Identifier) @x right: (Identifier) @x)'
    );
    expect(matches.map((m) => nodeText(tree.source, m.node))).toEqual(['a === a']);
  });

  it('matches anonymous tokens by their text', () => {
    const { tree, matches } = run('a === b;\na == b;\n', '(BinaryExpression "===")');
    expect(matches.map((m) => nodeText(tree.source, m.node))).toEqual(['a === b']);
  });

  it('rejects nodes holding a field marked absent', () => {
    const { tree, matches } = run('f<string>();\ng();\n', '(CallExpression !typeArguments) @call');
    expect(captured(tree, matches, 'call')).toEqual(['g()']);
  });

  it('matches quantified children as an ordered subsequence', () => {
    const { tree, matches } = run(
      '[1, 2, "x"];\n["y"];\n[1];\n',
      '(ArrayLiteralExpression (NumericLiteral)+ (StringLiteral) @s)'
    );
    expect(captured(tree, matches, 's')).toEqual(['"x"']);
  });

  it('matches alternatives', () => {
    const { matches } = run('debugger;\nthrow err;\nrun();\n', '[(DebuggerStatement) (ThrowStatement)] @stmt');
    expect(matches.map((m) => m.bindings['stmt']?.kind)).toEqual(['DebuggerStatement', 'ThrowStatement']);
  });

  it('matches any named node with a wildcard kind', () => {
    const { matches } = run('a.b();\nc();\n', '(CallExpression expression: (_) @callee)');
    expect(matches.map((m) => m.bindings['callee']?.kind)).toEqual(['PropertyAccessExpression', 'Identifier']);
  });

  it('reports nested matches in pre-order', () => {
    const { tree, matches } = run('outer(inner(1));\n', '(CallExpression) @call');
    expect(matches.map((m) => nodeText(tree.source, m.node))).toEqual(['outer(inner(1))', 'inner(1)']);
  });

  it('lets the caller veto a match', () => {
    const { tree, matches } = run('a;\nb;\n', '(Identifier) @id', {
      accept: (bindings) => bindings['id']?.text !== 'a',
    });
    expect(captured(tree, matches, 'id')).toEqual(['b']);
  });

  it('stops when the step budget runs out', () => {
    expect(() => run('const a = [1, 2, 3, 4, 5, 6];\n', '(NumericLiteral) @n', { maxSteps: 5 })).toThrow(
      EvaluationTimeoutError
    );
  });
});
