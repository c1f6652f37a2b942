/**
 * Output format tests - table, JSON and SARIF renderers
 */

import chalk from 'chalk';
import { describe, it, expect, beforeAll } from 'vitest';

import { formatReport, formatRulesTable, formatTestTable, toSarifLevel, toSarifLog } from '../src/output/index.js';

import type { AnalysisReport, RuleDefinition, RulesetTestReport, Violation } from 'codeprobe-core';

const debuggerViolation: Violation = {
  ruleId: 'no-debugger',
  file: 'src/a.ts',
  language: 'typescript',
  severity: 'error',
  category: null,
  message: 'Remove debugger',
  location: { line: 2, column: 3, endLine: 2, endColumn: 11, startOffset: 14, endOffset: 22 },
  fingerprint: 'fp-debugger',
};

const constViolation: Violation = {
  ruleId: 'prefer-const',
  file: 'src/a.ts',
  language: 'typescript',
  severity: 'notice',
  category: 'style',
  message: 'Use const',
  location: { line: 10, column: 1, endLine: 10, endColumn: 4, startOffset: 40, endOffset: 43 },
  fix: {
    description: 'Replace let with const',
    edits: [
      {
        location: { line: 10, column: 1, endLine: 10, endColumn: 4, startOffset: 40, endOffset: 43 },
        content: 'const',
      },
    ],
  },
  fingerprint: 'fp-const',
};

function createReport(overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  return {
    violations: [debuggerViolation, constViolation],
    errors: [{ kind: 'parse', file: 'src/b.ts', code: 'syntax-error', message: 'Unexpected token' }],
    loadErrors: [],
    summary: {
      filesAnalyzed: 2,
      filesFailed: 1,
      rulesLoaded: 2,
      evaluations: 2,
      violations: 2,
      errors: 1,
      bySeverity: { error: 1, warning: 0, notice: 1 },
      duplicatesCollapsed: 0,
      suppressed: 0,
      durationMs: 5,
    },
    cancelled: false,
    ...overrides,
  };
}

describe('table output', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('groups violations by file and aligns columns', () => {
    expect(formatReport(createReport(), 'table')).toBe(
      [
        'src/a.ts',
        '  2:3   error   Remove debugger  no-debugger',
        '  10:1  notice  Use const        prefer-const',
        '',
        'Analysis errors',
        '  parse  src/b.ts    Unexpected token',
        '',
        '✖ 2 problems (1 error, 0 warnings, 1 notice)',
      ].join('\n') + '\n'
    );
  });

  it('reports a clean run', () => {
    const report = createReport({
      violations: [],
      errors: [],
      summary: { ...createReport().summary, filesAnalyzed: 3, violations: 0, bySeverity: { error: 0, warning: 0, notice: 0 } },
    });
    expect(formatReport(report, 'table')).toBe('✔ No problems found in 3 files\n');
  });

  it('warns about a cancelled run', () => {
    const report = createReport({ violations: [], errors: [], cancelled: true, cancellationReason: 'budget-exceeded' });
    const lines = formatReport(report, 'table').split('\n');
    expect(lines[0]).toBe('⚠ Analysis cancelled (budget-exceeded); results are partial');
  });

  it('lists rules with a header', () => {
    const rule: RuleDefinition = {
      id: 'no-debugger',
      languages: ['typescript', 'javascript'],
      severity: 'error',
      message: 'Remove debugger',
      patterns: [{ type: 'textual', regex: 'debugger' }],
      tests: [{ code: 'debugger;', expected: [{ line: 1 }] }],
    };
    const lines = formatRulesTable([rule]).split('\n');

    expect(lines[0]).toBe('id           severity  languages               category  fixtures');
    expect(lines[1]).toBe('─'.repeat(65));
    expect(lines[2]).toBe('no-debugger  error     typescript, javascript            1');
  });

  it('lists load errors after the rules', () => {
    const output = formatRulesTable(
      [],
      [{ source: 'rules/core.json', position: 2, code: 'missing-id', message: 'id: A rule needs a non-empty id', issues: [] }]
    );
    expect(output).toBe(['No rules loaded.', '', 'Ruleset errors', '  rules/core.json  #2    id: A rule needs a non-empty id'].join('\n') + '\n');
  });

  it('prints the diff of failing fixtures', () => {
    const report: RulesetTestReport = {
      passed: false,
      rules: [
        {
          ruleId: 'no-debugger',
          passed: false,
          fixtures: [
            {
              ruleId: 'no-debugger',
              name: 'flags',
              filename: 'fixture.ts',
              passed: false,
              expected: [{ line: 3, column: 1 }],
              actual: [debuggerViolation],
              missing: [{ line: 3, column: 1 }],
              unexpected: [debuggerViolation],
              errors: [],
            },
          ],
        },
        { ruleId: 'untested', passed: true, fixtures: [] },
      ],
      summary: { rules: 2, untested: 1, fixtures: 1, passed: 0, failed: 1 },
    };

    expect(formatTestTable(report)).toBe(
      [
        '✖ no-debugger',
        '    ✖ flags fixture.ts',
        '        - expected violation at 3:1',
        '        + unexpected violation at 2:3 (no-debugger)',
        '○ untested (no fixtures)',
        '',
        '2 rules, 1 fixture: 0 passed, 1 failed, 1 untested',
      ].join('\n') + '\n'
    );
  });
});

describe('JSON output', () => {
  it('writes the versioned report document', () => {
    const document: unknown = JSON.parse(formatReport(createReport(), 'json'));
    expect(document).toMatchObject({
      schemaVersion: '1.0',
      cancelled: false,
      cancellationReason: null,
      violations: [
        { ruleId: 'no-debugger', category: null, fix: null },
        { ruleId: 'prefer-const', category: 'style', fix: { description: 'Replace let with const' } },
      ],
      errors: [{ kind: 'parse', ruleId: null, code: 'syntax-error' }],
    });
  });
});

describe('SARIF output', () => {
  it('maps severities to SARIF levels', () => {
    expect(toSarifLevel('error')).toBe('error');
    expect(toSarifLevel('warning')).toBe('warning');
    expect(toSarifLevel('notice')).toBe('note');
  });

  it('builds one run with rules, results and notifications', () => {
    const log = toSarifLog(createReport());
    const run = log.runs[0];

    expect(log.version).toBe('2.1.0');
    expect(run?.tool.driver.name).toBe('codeprobe');
    expect(run?.tool.driver.rules).toEqual([
      { id: 'no-debugger', defaultConfiguration: { level: 'error' } },
      { id: 'prefer-const', defaultConfiguration: { level: 'note' } },
    ]);
    expect(run?.results.map((result) => [result.ruleId, result.ruleIndex, result.level])).toEqual([
      ['no-debugger', 0, 'error'],
      ['prefer-const', 1, 'note'],
    ]);
    expect(run?.results[0]?.locations[0]?.physicalLocation).toEqual({
      artifactLocation: { uri: 'src/a.ts' },
      region: { startLine: 2, startColumn: 3, endLine: 2, endColumn: 11 },
    });
    expect(run?.results[0]?.partialFingerprints).toEqual({ 'codeprobe/v1': 'fp-debugger' });
    expect(run?.invocations[0]?.executionSuccessful).toBe(true);
    expect(run?.invocations[0]?.toolExecutionNotifications).toEqual([
      {
        level: 'error',
        message: { text: 'Unexpected token' },
        descriptor: { id: 'syntax-error' },
        locations: [{ physicalLocation: { artifactLocation: { uri: 'src/b.ts' } } }],
      },
    ]);
  });

  it('carries suggested fixes as artifact changes', () => {
    const result = toSarifLog(createReport()).runs[0]?.results[1];

    expect(result?.fixes).toEqual([
      {
        description: { text: 'Replace let with const' },
        artifactChanges: [
          {
            artifactLocation: { uri: 'src/a.ts' },
            replacements: [
              {
                deletedRegion: { startLine: 10, startColumn: 1, endLine: 10, endColumn: 4 },
                insertedContent: { text: 'const' },
              },
            ],
          },
        ],
      },
    ]);
    expect(toSarifLog(createReport()).runs[0]?.results[0]?.fixes).toBeUndefined();
  });
});
