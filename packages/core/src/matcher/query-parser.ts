/**
 * Query Parser - tokenizer and recursive-descent parser for structural queries
 *
 * Queries are S-expressions in the manner of tree-sitter queries:
 *
 *   (CatchClause block: (Block) @body (#empty? @body))
 *   (call_expression function: (identifier) @fn (#any-of? @fn "eval" "exec"))
 *   [(DebuggerStatement) (WithStatement)] @stmt
 */

import { QuerySyntaxError } from '../errors.js';
import {
  isPredicateName,
  type ChildElement,
  type PredicateArgument,
  type Quantifier,
  type Query,
  type QueryPattern,
  type QueryPredicate,
} from './types.js';

// ============================================
// Tokenizer
// ============================================

type TokenType =
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'colon'
  | 'bang'
  | 'quantifier'
  | 'capture'
  | 'predicate'
  | 'string'
  | 'identifier'
  | 'eof';

interface Token {
  type: TokenType;
  value: string;
  offset: number;
}

const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenType>> = {
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  ':': 'colon',
  '!': 'bang',
  '?': 'quantifier',
  '*': 'quantifier',
  '+': 'quantifier',
};

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
};

function isIdentifierStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return /[A-Za-z0-9_$-]/.test(ch);
}

function isCapturePart(ch: string): boolean {
  return /[A-Za-z0-9_.-]/.test(ch);
}

export function tokenizeQuery(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const readWhile = (predicate: (ch: string) => boolean): string => {
    const start = pos;
    while (pos < source.length && predicate(source.charAt(pos))) {
      pos++;
    }
    return source.slice(start, pos);
  };

  while (pos < source.length) {
    const ch = source.charAt(pos);
    const start = pos;

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    // Comment
    if (ch === ';') {
      readWhile((c) => c !== '\n');
      continue;
    }

    const single = SINGLE_CHAR_TOKENS[ch];
    if (single) {
      pos++;
      tokens.push({ type: single, value: ch, offset: start });
      continue;
    }

    if (ch === '"') {
      pos++;
      let value = '';
      for (;;) {
        if (pos >= source.length) {
          throw new QuerySyntaxError('Unterminated string', start);
        }
        const c = source.charAt(pos);
        if (c === '"') {
          pos++;
          break;
        }
        if (c === '\\') {
          const escaped = ESCAPES[source.charAt(pos + 1)];
          if (escaped === undefined) {
            throw new QuerySyntaxError(`Unknown escape sequence \\${source.charAt(pos + 1)}`, pos);
          }
          value += escaped;
          pos += 2;
          continue;
        }
        value += c;
        pos++;
      }
      tokens.push({ type: 'string', value, offset: start });
      continue;
    }

    if (ch === '@') {
      pos++;
      const name = readWhile(isCapturePart);
      if (!name) {
        throw new QuerySyntaxError('Expected a capture name after @', start);
      }
      tokens.push({ type: 'capture', value: name, offset: start });
      continue;
    }

    if (ch === '#') {
      pos++;
      let name = readWhile((c) => /[a-z-]/.test(c));
      if (source.charAt(pos) === '?') {
        name += '?';
        pos++;
      }
      if (!name) {
        throw new QuerySyntaxError('Expected a predicate name after #', start);
      }
      tokens.push({ type: 'predicate', value: name, offset: start });
      continue;
    }

    if (isIdentifierStart(ch)) {
      tokens.push({ type: 'identifier', value: readWhile(isIdentifierPart), offset: start });
      continue;
    }

    throw new QuerySyntaxError(`Unexpected character '${ch}'`, start);
  }

  tokens.push({ type: 'eof', value: '', offset: source.length });
  return tokens;
}

// ============================================
// Parser
// ============================================

const QUANTIFIERS: Readonly<Record<string, Quantifier>> = {
  '?': 'optional',
  '*': 'zero-or-more',
  '+': 'one-or-more',
};

class QueryParser {
  private pos = 0;
  private readonly predicates: QueryPredicate[] = [];
  private readonly captureNames: string[] = [];

  constructor(
    private readonly source: string,
    private readonly tokens: Token[]
  ) {}

  parse(): Query {
    if (this.peek().type === 'eof') {
      throw new QuerySyntaxError('Query is empty', 0);
    }

    const pattern = this.parsePattern(true);
    while (this.peek().type !== 'eof') {
      if (this.isPredicateStart()) {
        this.parsePredicate();
        continue;
      }
      throw new QuerySyntaxError('A query holds exactly one top-level pattern', this.peek().offset);
    }

    if (pattern.quantifier !== 'one') {
      throw new QuerySyntaxError('The top-level pattern cannot be quantified', 0);
    }

    this.checkPredicateCaptures();
    return {
      source: this.source,
      pattern,
      predicates: this.predicates,
      captureNames: this.captureNames,
    };
  }

  private parsePattern(topLevel = false): QueryPattern {
    const token = this.peek();
    let pattern: QueryPattern;

    switch (token.type) {
      case 'lparen':
        pattern = this.parseParenthesized(topLevel);
        break;
      case 'lbracket':
        pattern = this.parseAlternation();
        break;
      case 'string':
        this.advance();
        pattern = { type: 'string', value: token.value, quantifier: 'one', captures: [] };
        break;
      case 'identifier':
        if (token.value !== '_') {
          throw new QuerySyntaxError(`Node kinds must be parenthesized: (${token.value})`, token.offset);
        }
        this.advance();
        pattern = { type: 'wildcard', quantifier: 'one', captures: [] };
        break;
      default:
        throw new QuerySyntaxError(`Expected a pattern but found '${token.value || token.type}'`, token.offset);
    }

    const quantifier = this.peek();
    if (quantifier.type === 'quantifier') {
      this.advance();
      pattern.quantifier = QUANTIFIERS[quantifier.value] ?? 'one';
    }

    while (this.peek().type === 'capture') {
      const capture = this.advance();
      pattern.captures.push(capture.value);
      if (!this.captureNames.includes(capture.value)) {
        this.captureNames.push(capture.value);
      }
    }

    return pattern;
  }

  /**
   * `(kind element*)`, `(_ element*)` or a group `(pattern predicate*)`
   */
  private parseParenthesized(topLevel: boolean): QueryPattern {
    const open = this.expect('lparen');
    const head = this.peek();

    if (head.type === 'lparen' || head.type === 'lbracket' || head.type === 'string') {
      // Group: one pattern followed by predicates
      const inner = this.parsePattern(topLevel);
      while (this.isPredicateStart()) {
        this.parsePredicate();
      }
      if (this.peek().type !== 'rparen') {
        throw new QuerySyntaxError('A group holds exactly one pattern', this.peek().offset);
      }
      this.advance();
      return inner;
    }

    if (head.type !== 'identifier') {
      throw new QuerySyntaxError('Expected a node kind after (', head.offset);
    }
    this.advance();

    const children: ChildElement[] = [];
    const absentFields: string[] = [];

    for (;;) {
      const token = this.peek();
      if (token.type === 'rparen') {
        this.advance();
        break;
      }
      if (token.type === 'eof') {
        throw new QuerySyntaxError('Unclosed (', open.offset);
      }
      if (this.isPredicateStart()) {
        this.parsePredicate();
        continue;
      }
      if (token.type === 'bang') {
        this.advance();
        absentFields.push(this.expect('identifier').value);
        continue;
      }
      if (token.type === 'identifier' && this.peek(1).type === 'colon') {
        this.advance();
        this.advance();
        children.push({ field: token.value, pattern: this.parsePattern() });
        continue;
      }
      children.push({ field: null, pattern: this.parsePattern() });
    }

    return {
      type: 'node',
      kind: head.value === '_' ? null : head.value,
      children,
      absentFields,
      quantifier: 'one',
      captures: [],
    };
  }

  private parseAlternation(): QueryPattern {
    const open = this.expect('lbracket');
    const alternatives: QueryPattern[] = [];
    for (;;) {
      const token = this.peek();
      if (token.type === 'rbracket') {
        this.advance();
        break;
      }
      if (token.type === 'eof') {
        throw new QuerySyntaxError('Unclosed [', open.offset);
      }
      alternatives.push(this.parsePattern());
    }
    if (alternatives.length === 0) {
      throw new QuerySyntaxError('An alternation needs at least one pattern', open.offset);
    }
    return { type: 'alternation', alternatives, quantifier: 'one', captures: [] };
  }

  private parsePredicate(): void {
    this.expect('lparen');
    const nameToken = this.expect('predicate');
    if (!isPredicateName(nameToken.value)) {
      throw new QuerySyntaxError(`Unknown predicate #${nameToken.value}`, nameToken.offset);
    }

    const args: PredicateArgument[] = [];
    for (;;) {
      const token = this.advance();
      if (token.type === 'rparen') break;
      if (token.type === 'capture') {
        args.push({ type: 'capture', name: token.value });
      } else if (token.type === 'string') {
        args.push({ type: 'string', value: token.value });
      } else {
        throw new QuerySyntaxError(`Unexpected '${token.value || token.type}' in predicate`, token.offset);
      }
    }

    const predicate: QueryPredicate = { name: nameToken.value, args, offset: nameToken.offset };
    validatePredicate(predicate);
    this.predicates.push(predicate);
  }

  private checkPredicateCaptures(): void {
    for (const predicate of this.predicates) {
      for (const arg of predicate.args) {
        if (arg.type === 'capture' && !this.captureNames.includes(arg.name)) {
          throw new QuerySyntaxError(`Predicate references undeclared capture @${arg.name}`, predicate.offset);
        }
      }
    }
  }

  private isPredicateStart(): boolean {
    return this.peek().type === 'lparen' && this.peek(1).type === 'predicate';
  }

  private peek(ahead = 0): Token {
    const last = this.tokens[this.tokens.length - 1];
    const token = this.tokens[this.pos + ahead] ?? last;
    if (!token) {
      throw new QuerySyntaxError('Unexpected end of query', this.source.length);
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.pos++;
    }
    return token;
  }

  private expect(type: TokenType): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw new QuerySyntaxError(`Expected ${type} but found '${token.value || token.type}'`, token.offset);
    }
    return this.advance();
  }
}

function validatePredicate(predicate: QueryPredicate): void {
  const [first, ...rest] = predicate.args;
  const fail = (message: string): never => {
    throw new QuerySyntaxError(`#${predicate.name} ${message}`, predicate.offset);
  };

  if (first?.type !== 'capture') {
    fail('takes a capture as its first argument');
  }

  switch (predicate.name) {
    case 'eq?':
    case 'not-eq?':
      if (rest.length !== 1) fail('takes exactly two arguments');
      break;
    case 'match?':
    case 'not-match?': {
      const pattern = rest[0];
      if (rest.length !== 1 || pattern?.type !== 'string') {
        fail('takes a capture and a regular expression string');
      } else {
        try {
          new RegExp(pattern.value);
        } catch (error) {
          fail(`has an invalid regular expression: ${error instanceof Error ? error.message : String(error)}`);
        }
      }
      break;
    }
    case 'any-of?':
    case 'not-any-of?':
      if (rest.length === 0 || rest.some((arg) => arg.type !== 'string')) {
        fail('takes a capture and one or more strings');
      }
      break;
    default:
      if (rest.length !== 0) fail('takes exactly one capture');
  }
}

/**
 * Parse a structural query.
 *
 * @throws QuerySyntaxError with the offset of the offending token
 */
export function parseQuery(source: string): Query {
  return new QueryParser(source, tokenizeQuery(source)).parse();
}
