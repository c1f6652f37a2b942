/**
 * Query Parser Tests
 */

import { describe, it, expect } from 'vitest';

import { parseQuery, tokenizeQuery } from './query-parser.js';
import { QuerySyntaxError } from '../errors.js';

function syntaxError(source: string): QuerySyntaxError {
  try {
    parseQuery(source);
  } catch (error) {
    if (error instanceof QuerySyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected "${source}" to be rejected`);
}

describe('tokenizeQuery', () => {
  it('produces typed tokens with offsets', () => {
    const tokens = tokenizeQuery('(Block)? @body ; trailing comment\n"a\\"b"');

    expect(tokens.map((t) => t.type)).toEqual([
      'lparen',
      'identifier',
      'rparen',
      'quantifier',
      'capture',
      'string',
      'eof',
    ]);
    expect(tokens[4]).toEqual({ type: 'capture', value: 'body', offset: 9 });
    expect(tokens[5]?.value).toBe('a"b');
  });

  it('reads predicate names with their question mark', () => {
    const tokens = tokenizeQuery('(#not-any-of? @x "a")');
    expect(tokens[1]).toEqual({ type: 'predicate', value: 'not-any-of?', offset: 1 });
  });
});

describe('parseQuery', () => {
  it('parses nested node patterns with fields, captures and predicates', () => {
    const query = parseQuery('(CatchClause block: (Block) @body (#empty? @body))');

    expect(query.pattern).toEqual({
      type: 'node',
      kind: 'CatchClause',
      children: [
        {
          field: 'block',
          pattern: { type: 'node', kind: 'Block', children: [], absentFields: [], quantifier: 'one', captures: ['body'] },
        },
      ],
      absentFields: [],
      quantifier: 'one',
      captures: [],
    });
    expect(query.predicates).toEqual([{ name: 'empty?', args: [{ type: 'capture', name: 'body' }], offset: 35 }]);
    expect(query.captureNames).toEqual(['body']);
  });

  it('parses wildcards, strings, alternations and quantifiers', () => {
    const query = parseQuery('(_ [(A) (B)]* @item "+" _? !typeArguments)');
    if (query.pattern.type !== 'node') {
      throw new Error('expected a node pattern');
    }

    expect(query.pattern.kind).toBeNull();
    expect(query.pattern.absentFields).toEqual(['typeArguments']);
    expect(query.pattern.children.map((c) => [c.pattern.type, c.pattern.quantifier])).toEqual([
      ['alternation', 'zero-or-more'],
      ['string', 'one'],
      ['wildcard', 'optional'],
    ]);
    expect(query.captureNames).toEqual(['item']);
  });

  it('accepts predicates after the top-level pattern and in groups', () => {
    expect(parseQuery('(Identifier) @id (#eq? @id "x")').predicates).toHaveLength(1);
    expect(parseQuery('((Identifier) @id (#match? @id "^on"))').predicates).toHaveLength(1);
  });

  it('rejects an empty query', () => {
    const error = syntaxError('  ');
    expect(error.message).toBe('Query is empty at offset 0');
    expect(error.code).toBe('query-syntax');
  });

  it('rejects bare node kinds', () => {
    expect(syntaxError('CatchClause').message).toBe('Node kinds must be parenthesized: (CatchClause) at offset 0');
  });

  it('rejects more than one top-level pattern', () => {
    expect(syntaxError('(A) (B)').offset).toBe(4);
  });

  it('rejects a quantified top-level pattern', () => {
    expect(syntaxError('(A)*').message).toContain('cannot be quantified');
  });

  it('rejects an unclosed node', () => {
    expect(syntaxError('(A (B)').message).toBe('Unclosed ( at offset 0');
  });

  it('rejects an unterminated string', () => {
    expect(syntaxError('(A "abc)').message).toBe('Unterminated string at offset 3');
  });

  it('rejects unknown predicates', () => {
    expect(syntaxError('(A) @a (#bogus? @a)').message).toContain('Unknown predicate #bogus?');
  });

  it('rejects predicates on undeclared captures', () => {
    expect(syntaxError('((A) @a (#eq? @b "x"))').message).toContain('undeclared capture @b');
  });

  it('rejects invalid regular expressions in #match?', () => {
    expect(syntaxError('(A) @a (#match? @a "[")').message).toContain('#match? has an invalid regular expression');
  });

  it('checks predicate arity', () => {
    expect(syntaxError('(A) @a (#eq? @a)').message).toContain('#eq? takes exactly two arguments');
    expect(syntaxError('(A) @a (#empty? @a "x")').message).toContain('#empty? takes exactly one capture');
    expect(syntaxError('(A) @a (#any-of? @a)').message).toContain('#any-of? takes a capture and one or more strings');
  });
});
