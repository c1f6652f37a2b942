/**
 * Rule Validator - turns decoded ruleset entries into RuleDefinitions
 *
 * Each entry is validated on its own: a malformed rule produces a
 * RuleValidationFailure carrying its position and every issue found, and
 * never prevents its siblings from loading.
 */

import { createHash } from 'node:crypto';

import { QuerySyntaxError, errorMessage } from '../errors.js';
import { namedGroups, textualFlags } from '../matcher/pattern-matcher.js';
import { parseQuery } from '../matcher/query-parser.js';
import { SUPPORTED_LANGUAGES, isLanguage, type Language } from '../parsers/types.js';
import { MATCH_PLACEHOLDER, templatePlaceholders } from './template.js';
import {
  CLAUSE_TYPES,
  FIX_EDIT_TYPES,
  MAX_CLAUSE_DEPTH,
  SEVERITIES,
  isSeverity,
  type ClauseType,
  type ExpectedViolation,
  type FixEditTemplate,
  type FixTemplate,
  type FixtureCase,
  type PatternClause,
  type RuleDefinition,
  type StructuralClause,
  type TextualClause,
  type WhereConstraint,
} from './types.js';

// ============================================
// Issue Types
// ============================================

export type RuleIssueCode =
  | 'invalid-rule'
  | 'missing-id'
  | 'duplicate-id'
  | 'invalid-languages'
  | 'invalid-severity'
  | 'missing-message'
  | 'missing-patterns'
  | 'invalid-pattern'
  | 'unknown-capture'
  | 'invalid-fix'
  | 'invalid-tests'
  | 'invalid-field'
  | 'checksum-mismatch';

/**
 * A single problem found in a rule entry
 */
export interface RuleValidationIssue {
  /** Path within the rule, e.g. `patterns[0].query` */
  path: string;
  code: RuleIssueCode;
  message: string;
  expected?: string;
  actual?: unknown;
}

export interface RuleValidationFailure {
  /** Zero-based index of the entry within its ruleset */
  position: number;
  ruleId?: string;
  issues: RuleValidationIssue[];
}

export interface RulesValidationResult {
  rules: RuleDefinition[];
  /** Index in the input of each valid rule, parallel to `rules` */
  positions: number[];
  failures: RuleValidationFailure[];
}

// ============================================
// Helpers
// ============================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function isOneOf<T extends string>(value: unknown, validValues: readonly T[]): value is T {
  return typeof value === 'string' && validValues.some((valid) => valid === value);
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

/**
 * JSON with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * SHA-256 of the canonical JSON of a rule's patterns
 */
export function computeRuleChecksum(patterns: readonly PatternClause[]): string {
  return createHash('sha256').update(canonicalJson(patterns)).digest('hex');
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

// ============================================
// Clause Validation
// ============================================

interface ClauseContext {
  issues: RuleValidationIssue[];
  /** Captures a match can bind: declared outside not, inside and not-inside guards */
  captures: Set<string>;
  /** Guards enclosing the clause being validated */
  guardDepth: number;
}

function declareCaptures(context: ClauseContext, names: readonly string[]): void {
  if (context.guardDepth === 0) {
    names.forEach((name) => context.captures.add(name));
  }
}

function validateWhere(
  raw: unknown,
  path: string,
  clauseCaptures: readonly string[],
  context: ClauseContext
): WhereConstraint[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) {
    context.issues.push({
      path,
      code: 'invalid-pattern',
      message: 'where must be an array of constraints',
      expected: 'WhereConstraint[]',
      actual: describe(raw),
    });
    return undefined;
  }

  const constraints: WhereConstraint[] = [];
  raw.forEach((entry: unknown, index) => {
    const entryPath = `${path}[${index}]`;
    const capture = isObject(entry) ? entry['capture'] : undefined;
    if (!isObject(entry) || !isNonEmptyString(capture)) {
      context.issues.push({
        path: entryPath,
        code: 'invalid-pattern',
        message: 'A where constraint needs a capture name',
        expected: '{ capture: string, ... }',
        actual: entry,
      });
      return;
    }

    if (!clauseCaptures.includes(capture)) {
      context.issues.push({
        path: `${entryPath}.capture`,
        code: 'unknown-capture',
        message: `where references capture "${capture}" which the clause does not declare`,
        expected: clauseCaptures.join(' | ') || 'a declared capture',
        actual: capture,
      });
    }

    const constraint: WhereConstraint = { capture };
    for (const key of ['matches', 'notMatches'] as const) {
      const pattern = entry[key];
      if (pattern === undefined) continue;
      if (typeof pattern !== 'string') {
        context.issues.push({ path: `${entryPath}.${key}`, code: 'invalid-pattern', message: `${key} must be a string`, actual: describe(pattern) });
        continue;
      }
      try {
        new RegExp(pattern);
        constraint[key] = pattern;
      } catch (error) {
        context.issues.push({
          path: `${entryPath}.${key}`,
          code: 'invalid-pattern',
          message: `Invalid regular expression: ${errorMessage(error)}`,
          actual: pattern,
        });
      }
    }
    for (const key of ['equals', 'notEquals'] as const) {
      const text = entry[key];
      if (text === undefined) continue;
      if (typeof text !== 'string') {
        context.issues.push({ path: `${entryPath}.${key}`, code: 'invalid-pattern', message: `${key} must be a string`, actual: describe(text) });
        continue;
      }
      constraint[key] = text;
    }
    const kinds = entry['kinds'];
    if (kinds !== undefined) {
      if (!Array.isArray(kinds) || kinds.length === 0 || !kinds.every(isNonEmptyString)) {
        context.issues.push({
          path: `${entryPath}.kinds`,
          code: 'invalid-pattern',
          message: 'kinds must be a non-empty array of node kinds',
          expected: 'string[]',
          actual: kinds,
        });
      } else {
        constraint.kinds = [...kinds];
      }
    }
    constraints.push(constraint);
  });
  return constraints;
}

function validateClause(
  raw: unknown,
  path: string,
  depth: number,
  parentType: ClauseType | null,
  context: ClauseContext
): PatternClause | null {
  const { issues } = context;

  if (!isObject(raw)) {
    issues.push({ path, code: 'invalid-pattern', message: 'A pattern clause must be an object', actual: describe(raw) });
    return null;
  }
  const type = raw['type'];
  if (!isOneOf(type, CLAUSE_TYPES)) {
    issues.push({
      path: `${path}.type`,
      code: 'invalid-pattern',
      message: 'Unknown clause type',
      expected: CLAUSE_TYPES.join(' | '),
      actual: type,
    });
    return null;
  }
  if (depth > MAX_CLAUSE_DEPTH) {
    issues.push({
      path,
      code: 'invalid-pattern',
      message: `Clauses may be nested at most ${MAX_CLAUSE_DEPTH} levels deep`,
      actual: depth,
    });
    return null;
  }

  switch (type) {
    case 'structural': {
      const query = raw['query'];
      if (!isNonEmptyString(query)) {
        issues.push({ path: `${path}.query`, code: 'invalid-pattern', message: 'A structural clause needs a query', expected: 'string', actual: describe(query) });
        return null;
      }
      let captureNames: string[];
      try {
        captureNames = parseQuery(query).captureNames;
      } catch (error) {
        issues.push({
          path: `${path}.query`,
          code: 'invalid-pattern',
          message: error instanceof QuerySyntaxError ? `Invalid query: ${error.message}` : errorMessage(error),
          actual: query,
        });
        return null;
      }
      declareCaptures(context, captureNames);

      const clause: StructuralClause = { type, query };
      const focus = raw['focus'];
      if (focus !== undefined) {
        if (!isNonEmptyString(focus) || !captureNames.includes(focus)) {
          issues.push({
            path: `${path}.focus`,
            code: 'unknown-capture',
            message: 'focus must name a capture declared by the query',
            expected: captureNames.join(' | ') || 'a declared capture',
            actual: focus,
          });
        } else {
          clause.focus = focus;
        }
      }
      const where = validateWhere(raw['where'], `${path}.where`, captureNames, context);
      if (where) clause.where = where;
      return clause;
    }

    case 'textual': {
      const regex = raw['regex'];
      const flags = raw['flags'];
      if (!isNonEmptyString(regex)) {
        issues.push({ path: `${path}.regex`, code: 'invalid-pattern', message: 'A textual clause needs a regex', expected: 'string', actual: describe(regex) });
        return null;
      }
      if (flags !== undefined && typeof flags !== 'string') {
        issues.push({ path: `${path}.flags`, code: 'invalid-pattern', message: 'flags must be a string', actual: describe(flags) });
        return null;
      }
      try {
        new RegExp(regex, textualFlags(flags));
      } catch (error) {
        issues.push({ path: `${path}.regex`, code: 'invalid-pattern', message: `Invalid regular expression: ${errorMessage(error)}`, actual: regex });
        return null;
      }
      const groups = namedGroups(regex);
      declareCaptures(context, groups);

      const clause: TextualClause = flags !== undefined ? { type, regex, flags } : { type, regex };
      const where = validateWhere(raw['where'], `${path}.where`, groups, context);
      if (where) clause.where = where;
      return clause;
    }

    case 'all':
    case 'any': {
      const rawClauses = raw['clauses'];
      if (!Array.isArray(rawClauses) || rawClauses.length === 0) {
        issues.push({ path: `${path}.clauses`, code: 'invalid-pattern', message: `An '${type}' clause needs a non-empty clauses array`, actual: describe(rawClauses) });
        return null;
      }
      const clauses: PatternClause[] = [];
      rawClauses.forEach((inner: unknown, index) => {
        const parsed = validateClause(inner, `${path}.clauses[${index}]`, depth + 1, type, context);
        if (parsed) clauses.push(parsed);
      });
      if (clauses.length !== rawClauses.length) {
        return null;
      }
      if (type === 'all' && clauses.every((clause) => clause.type === 'not' || clause.type === 'inside' || clause.type === 'not-inside')) {
        issues.push({ path, code: 'invalid-pattern', message: "An 'all' clause needs at least one positive clause" });
        return null;
      }
      return { type, clauses };
    }

    case 'not':
    case 'inside':
    case 'not-inside': {
      if (parentType !== 'all') {
        issues.push({ path, code: 'invalid-pattern', message: `'${type}' clauses are only allowed inside an 'all' clause` });
        return null;
      }
      context.guardDepth++;
      const inner = validateClause(raw['clause'], `${path}.clause`, depth + 1, type, context);
      context.guardDepth--;
      return inner ? { type, clause: inner } : null;
    }
  }
}

// ============================================
// Field Validation
// ============================================

function validateLanguages(raw: unknown, issues: RuleValidationIssue[]): Language[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    issues.push({
      path: 'languages',
      code: 'invalid-languages',
      message: 'A rule needs a non-empty array of languages',
      expected: `Array<${SUPPORTED_LANGUAGES.join(' | ')}>`,
      actual: describe(raw),
    });
    return [];
  }
  const languages: Language[] = [];
  raw.forEach((language: unknown, index) => {
    if (!isLanguage(language)) {
      issues.push({
        path: `languages[${index}]`,
        code: 'invalid-languages',
        message: 'Unrecognized language',
        expected: SUPPORTED_LANGUAGES.join(' | '),
        actual: language,
      });
    } else if (!languages.includes(language)) {
      languages.push(language);
    }
  });
  return languages;
}

function checkTemplate(
  template: string,
  path: string,
  captures: ReadonlySet<string>,
  issues: RuleValidationIssue[]
): void {
  for (const name of templatePlaceholders(template)) {
    if (name !== MATCH_PLACEHOLDER && !captures.has(name)) {
      issues.push({
        path,
        code: 'unknown-capture',
        message: `Placeholder {{${name}}} does not name a capture declared by the patterns`,
        actual: name,
      });
    }
  }
}

function validateFix(raw: unknown, captures: ReadonlySet<string>, issues: RuleValidationIssue[]): FixTemplate | undefined {
  if (raw === undefined) return undefined;
  const edits = isObject(raw) ? raw['edits'] : undefined;
  if (!isObject(raw) || !Array.isArray(edits) || edits.length === 0) {
    issues.push({
      path: 'fix',
      code: 'invalid-fix',
      message: 'A fix needs a non-empty edits array',
      expected: '{ description?: string, edits: FixEdit[] }',
      actual: describe(raw),
    });
    return undefined;
  }

  const fix: FixTemplate = { edits: [] };
  const description = raw['description'];
  if (description !== undefined) {
    if (typeof description !== 'string') {
      issues.push({ path: 'fix.description', code: 'invalid-fix', message: 'description must be a string', actual: describe(description) });
    } else {
      checkTemplate(description, 'fix.description', captures, issues);
      fix.description = description;
    }
  }

  edits.forEach((edit: unknown, index) => {
    const path = `fix.edits[${index}]`;
    const type = isObject(edit) ? edit['type'] : undefined;
    if (!isObject(edit) || !isOneOf(type, FIX_EDIT_TYPES)) {
      issues.push({
        path: `${path}.type`,
        code: 'invalid-fix',
        message: 'Unknown edit type',
        expected: FIX_EDIT_TYPES.join(' | '),
        actual: isObject(edit) ? type : describe(edit),
      });
      return;
    }
    const parsed: FixEditTemplate = { type };

    const target = edit['target'];
    if (target !== undefined) {
      if (typeof target !== 'string' || !captures.has(target)) {
        issues.push({
          path: `${path}.target`,
          code: 'unknown-capture',
          message: 'target must name a capture declared by the patterns',
          actual: target,
        });
      } else {
        parsed.target = target;
      }
    }

    const content = edit['content'];
    if (type !== 'remove') {
      if (typeof content !== 'string') {
        issues.push({ path: `${path}.content`, code: 'invalid-fix', message: `A '${type}' edit needs content`, expected: 'string', actual: describe(content) });
      } else {
        checkTemplate(content, `${path}.content`, captures, issues);
        parsed.content = content;
      }
    }
    fix.edits.push(parsed);
  });

  return fix;
}

function validateTests(raw: unknown, issues: RuleValidationIssue[]): FixtureCase[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) {
    issues.push({ path: 'tests', code: 'invalid-tests', message: 'tests must be an array of fixtures', actual: describe(raw) });
    return undefined;
  }

  const fixtures: FixtureCase[] = [];
  raw.forEach((entry: unknown, index) => {
    const path = `tests[${index}]`;
    const code = isObject(entry) ? entry['code'] : undefined;
    const expectedList = isObject(entry) ? entry['expected'] : undefined;
    if (!isObject(entry) || typeof code !== 'string' || !Array.isArray(expectedList)) {
      issues.push({
        path,
        code: 'invalid-tests',
        message: 'A fixture needs code and an expected array',
        expected: '{ code: string, expected: ExpectedViolation[] }',
        actual: describe(entry),
      });
      return;
    }

    const fixture: FixtureCase = { code, expected: [] };
    const name = entry['name'];
    const filename = entry['filename'];
    if (typeof name === 'string') fixture.name = name;
    if (typeof filename === 'string') fixture.filename = filename;

    expectedList.forEach((expected: unknown, expectedIndex) => {
      const expectedPath = `${path}.expected[${expectedIndex}]`;
      const line = isObject(expected) ? expected['line'] : undefined;
      if (!isObject(expected) || !isPositiveInteger(line)) {
        issues.push({ path: expectedPath, code: 'invalid-tests', message: 'An expected violation needs a one-based line', actual: expected });
        return;
      }
      const violation: ExpectedViolation = { line };
      for (const key of ['column', 'endLine', 'endColumn'] as const) {
        const value = expected[key];
        if (value === undefined) continue;
        if (!isPositiveInteger(value)) {
          issues.push({ path: `${expectedPath}.${key}`, code: 'invalid-tests', message: `${key} must be a positive integer`, actual: value });
        } else {
          violation[key] = value;
        }
      }
      const ruleId = expected['ruleId'];
      if (typeof ruleId === 'string') violation.ruleId = ruleId;
      fixture.expected.push(violation);
    });
    fixtures.push(fixture);
  });
  return fixtures;
}

function optionalString(
  raw: Record<string, unknown>,
  key: string,
  issues: RuleValidationIssue[]
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    issues.push({ path: key, code: 'invalid-field', message: `${key} must be a string`, actual: describe(value) });
    return undefined;
  }
  return value;
}

// ============================================
// Public API
// ============================================

/**
 * Validate one ruleset entry.
 *
 * @returns the frozen rule, or the issues that prevent loading it
 */
export function validateRule(raw: unknown): { rule: RuleDefinition | null; ruleId?: string; issues: RuleValidationIssue[] } {
  const issues: RuleValidationIssue[] = [];
  if (!isObject(raw)) {
    issues.push({ path: '', code: 'invalid-rule', message: 'A rule must be an object', actual: describe(raw) });
    return { rule: null, issues };
  }

  const id = raw['id'];
  const ruleId = typeof id === 'string' && id.trim().length > 0 ? id.trim() : undefined;
  if (!ruleId) {
    issues.push({ path: 'id', code: 'missing-id', message: 'A rule needs a non-empty id', expected: 'string', actual: describe(id) });
  }

  const languages = validateLanguages(raw['languages'], issues);

  const severity = raw['severity'];
  if (!isSeverity(severity)) {
    issues.push({ path: 'severity', code: 'invalid-severity', message: 'Unknown severity', expected: SEVERITIES.join(' | '), actual: severity });
  }

  const message = raw['message'];
  if (!isNonEmptyString(message)) {
    issues.push({ path: 'message', code: 'missing-message', message: 'A rule needs a non-empty message', expected: 'string', actual: describe(message) });
  }

  const rawPatterns = raw['patterns'];
  const patterns: PatternClause[] = [];
  const context: ClauseContext = { issues, captures: new Set(), guardDepth: 0 };
  if (!Array.isArray(rawPatterns) || rawPatterns.length === 0) {
    issues.push({ path: 'patterns', code: 'missing-patterns', message: 'A rule needs at least one pattern clause', actual: describe(rawPatterns) });
  } else {
    rawPatterns.forEach((clause: unknown, index) => {
      const parsed = validateClause(clause, `patterns[${index}]`, 1, null, context);
      if (parsed) patterns.push(parsed);
    });
  }

  if (typeof message === 'string') {
    checkTemplate(message, 'message', context.captures, issues);
  }
  const fix = validateFix(raw['fix'], context.captures, issues);
  const tests = validateTests(raw['tests'], issues);

  const tags = raw['tags'];
  if (tags !== undefined && (!Array.isArray(tags) || !tags.every((tag) => typeof tag === 'string'))) {
    issues.push({ path: 'tags', code: 'invalid-field', message: 'tags must be an array of strings', actual: tags });
  }

  const name = optionalString(raw, 'name', issues);
  const description = optionalString(raw, 'description', issues);
  const category = optionalString(raw, 'category', issues);
  const checksum = optionalString(raw, 'checksum', issues);

  if (checksum !== undefined && issues.length === 0) {
    const actual = computeRuleChecksum(patterns);
    if (actual !== checksum.toLowerCase()) {
      issues.push({
        path: 'checksum',
        code: 'checksum-mismatch',
        message: 'checksum does not match the rule patterns',
        expected: actual,
        actual: checksum,
      });
    }
  }

  if (issues.length > 0 || !ruleId || !isSeverity(severity) || typeof message !== 'string') {
    return ruleId ? { rule: null, ruleId, issues } : { rule: null, issues };
  }

  const rule: RuleDefinition = { id: ruleId, languages, severity, message, patterns };
  if (name !== undefined) rule.name = name;
  if (description !== undefined) rule.description = description;
  if (category !== undefined) rule.category = category;
  if (fix) rule.fix = fix;
  if (tests) rule.tests = tests;
  if (Array.isArray(tags)) rule.tags = tags.filter((tag): tag is string => typeof tag === 'string');
  if (checksum !== undefined) rule.checksum = checksum;

  return { rule: deepFreeze(rule), ruleId, issues };
}

/**
 * Validate every entry of a ruleset; ids must be unique within it
 */
export function validateRules(entries: readonly unknown[]): RulesValidationResult {
  const rules: RuleDefinition[] = [];
  const positions: number[] = [];
  const failures: RuleValidationFailure[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, position) => {
    const result = validateRule(entry);
    if (result.rule && seen.has(result.rule.id)) {
      failures.push({
        position,
        ruleId: result.rule.id,
        issues: [{ path: 'id', code: 'duplicate-id', message: `Rule id "${result.rule.id}" is already used in this ruleset`, actual: result.rule.id }],
      });
      return;
    }
    if (result.rule) {
      seen.add(result.rule.id);
      rules.push(result.rule);
      positions.push(position);
      return;
    }
    failures.push(result.ruleId ? { position, ruleId: result.ruleId, issues: result.issues } : { position, issues: result.issues });
  });

  return { rules, positions, failures };
}
