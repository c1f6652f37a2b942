/**
 * Analysis Orchestrator Tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect } from 'vitest';

import { getParserRegistry } from '../parsers/parser-registry.js';
import { AnalysisOrchestrator, selectRules } from './orchestrator.js';

import type { AnalysisInput, AnalysisOptions, AnalysisReport } from './types.js';
import type { LoadError } from '../rules/ruleset-loader.js';
import type { RuleDefinition } from '../rules/types.js';

const noEmptyCatch: RuleDefinition = {
  id: 'no-empty-catch',
  languages: ['typescript', 'javascript'],
  severity: 'warning',
  message: 'Empty catch block',
  patterns: [{ type: 'structural', query: '(CatchClause block: (Block) @body (#empty? @body))' }],
};

const noDebugger: RuleDefinition = {
  id: 'no-debugger',
  languages: ['typescript', 'javascript'],
  severity: 'error',
  message: 'Remove {{$match}}',
  patterns: [{ type: 'textual', regex: '\\bdebugger\\b' }],
};

const files: AnalysisInput[] = [
  { path: 'src/a.ts', content: 'export const a = 1;\n' },
  { path: 'src/b.ts', content: 'try {\n  run();\n} catch (e) {}\n' },
  { path: 'src/c.js', content: 'try { run(); } catch (e) { log(e); }\n' },
];

describe.each(['worker-threads', 'in-process'] as const)('AnalysisOrchestrator (%s)', (execution) => {
  const orchestrator = new AnalysisOrchestrator();
  const run = (
    inputs: readonly AnalysisInput[],
    rules: readonly RuleDefinition[],
    options: AnalysisOptions = {},
    loadErrors: readonly LoadError[] = []
  ): Promise<AnalysisReport> => orchestrator.run(inputs, rules, { execution, ...options }, loadErrors);

  it('reports the single empty catch block of a file set', async () => {
    const report = await run(files, [noEmptyCatch]);

    expect(report.errors).toEqual([]);
    expect(report.violations).toHaveLength(1);
    expect(report.violations[0]).toMatchObject({
      ruleId: 'no-empty-catch',
      file: 'src/b.ts',
      severity: 'warning',
      message: 'Empty catch block',
      location: { line: 3, column: 3, endLine: 3, endColumn: 15 },
    });
    expect(report.summary).toMatchObject({
      filesAnalyzed: 3,
      filesFailed: 0,
      rulesLoaded: 1,
      evaluations: 3,
      violations: 1,
      errors: 0,
      bySeverity: { error: 0, warning: 1, notice: 0 },
    });
    expect(report.cancelled).toBe(false);
  });

  it('produces the same report whatever the input order and concurrency', async () => {
    const inputs: AnalysisInput[] = [
      { path: 'z.ts', content: 'debugger;\ntry { f(); } catch (e) {}\n' },
      { path: 'a.ts', content: 'function f() {\n  debugger;\n}\n' },
      { path: 'm.js', content: 'try {} catch (e) {}\ndebugger;\n' },
    ];
    const rules = [noEmptyCatch, noDebugger];

    const first = await run(inputs, rules, { maxWorkers: 1 });
    const second = await run([...inputs].reverse(), rules, { maxWorkers: 3 });

    expect(second.violations).toEqual(first.violations);
    expect(first.violations.map((v) => `${v.file}:${v.location.line}:${v.ruleId}`)).toEqual([
      'a.ts:2:no-debugger',
      'm.js:1:no-empty-catch',
      'm.js:2:no-debugger',
      'z.ts:1:no-debugger',
      'z.ts:2:no-empty-catch',
    ]);
  });

  it('isolates a file that fails to parse', async () => {
    const report = await run(
      [...files, { path: 'src/broken.ts', content: 'const = ;\n' }],
      [noEmptyCatch],
      { syntaxErrors: 'reject' }
    );

    expect(report.violations.map((v) => v.file)).toEqual(['src/b.ts']);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toMatchObject({ kind: 'parse', file: 'src/broken.ts', code: 'syntax-error' });
    expect(report.summary.filesFailed).toBe(1);
    expect(report.summary.filesAnalyzed).toBe(3);
  });

  it('reports files no adapter handles', async () => {
    const report = await run([{ path: 'notes.txt', content: 'debugger' }], [noDebugger]);
    expect(report.errors).toEqual([
      {
        kind: 'parse',
        file: 'notes.txt',
        code: 'parser-unavailable',
        message: 'No parser handles the extension of notes.txt',
      },
    ]);
  });

  it('reports unreadable and oversized files', async () => {
    const report = await run(
      [
        { path: 'missing.ts', absolutePath: '/nonexistent/codeprobe/missing.ts' },
        { path: 'big.ts', content: 'debugger;' },
      ],
      [noDebugger],
      { maxFileSizeBytes: 5 }
    );

    expect(report.errors.map((error) => [error.file, error.kind, error.code])).toEqual([
      ['big.ts', 'parse', 'file-too-large'],
      ['missing.ts', 'read', 'read-failed'],
    ]);
    expect(report.errors[0]?.message).toBe('File is 9 bytes, above the limit of 5 bytes');
  });

  it('contains a rule that runs out of budget', async () => {
    const report = await run(
      [{ path: 'x.ts', content: 'const list = [1, 2, 3];\ndebugger;\n' }],
      [noEmptyCatch, noDebugger],
      { maxSteps: 10, collectStatistics: true }
    );

    expect(report.violations.map((v) => v.ruleId)).toEqual(['no-debugger']);
    expect(report.errors).toEqual([
      expect.objectContaining({ kind: 'timeout', file: 'x.ts', ruleId: 'no-empty-catch', code: 'rule-timeout' }),
    ]);
    expect(report.summary.evaluations).toBe(1);
    expect(report.statistics?.map((s) => [s.ruleId, s.files, s.violations, s.timeouts])).toEqual([
      ['no-debugger', 1, 1, 0],
      ['no-empty-catch', 1, 0, 1],
    ]);
  });

  it('records a failing rule evaluation and keeps going', async () => {
    const broken: RuleDefinition = {
      ...noDebugger,
      id: 'broken',
      patterns: [{ type: 'not', clause: { type: 'textual', regex: 'x' } }],
    };
    const report = await run([{ path: 'x.ts', content: 'debugger;\n' }], [broken, noDebugger]);

    expect(report.violations.map((v) => v.ruleId)).toEqual(['no-debugger']);
    expect(report.errors.map((error) => [error.kind, error.ruleId, error.code])).toEqual([
      ['evaluation', 'broken', 'evaluation-failed'],
    ]);
  });

  it('stops when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await run(files, [noEmptyCatch], { signal: controller.signal });

    expect(report.cancelled).toBe(true);
    expect(report.cancellationReason).toBe('aborted');
    expect(report.violations).toEqual([]);
    expect(report.summary.filesAnalyzed).toBe(0);
  });

  it('collapses violations with the same fingerprint', async () => {
    const twice: RuleDefinition = {
      ...noDebugger,
      id: 'identifiers',
      message: 'identifier',
      patterns: [
        { type: 'structural', query: '(Identifier) @a' },
        { type: 'structural', query: '(Identifier) @b' },
      ],
    };
    const report = await run([{ path: 'x.ts', content: 'x;\n' }], [twice]);

    expect(report.violations).toHaveLength(1);
    expect(report.summary.duplicatesCollapsed).toBe(1);
  });

  it('suppresses baseline fingerprints', async () => {
    const first = await run(files, [noEmptyCatch]);
    const fingerprints = first.violations.map((v) => v.fingerprint);

    const second = await run(files, [noEmptyCatch], { baseline: fingerprints });

    expect(second.violations).toEqual([]);
    expect(second.summary.suppressed).toBe(1);
  });

  it('skips rules for other languages without parsing', async () => {
    const pythonOnly: RuleDefinition = { ...noDebugger, id: 'py-only', languages: ['python'] };
    const report = await run(files, [pythonOnly]);

    expect(report.summary.filesAnalyzed).toBe(3);
    expect(report.summary.evaluations).toBe(0);
    expect(report.violations).toEqual([]);
  });

  it('carries ruleset load errors into the report', async () => {
    const loadErrors: LoadError[] = [
      { source: 'rules.json', position: 3, code: 'missing-id', message: 'id: A rule needs a non-empty id', issues: [] },
    ];
    const report = await run(files, [noEmptyCatch], {}, loadErrors);
    expect(report.loadErrors).toEqual(loadErrors);
  });

  it('analyzes text that contains U+FFFD', async () => {
    const report = await run([{ path: 'x.ts', content: "const s = '\uFFFD';\ndebugger;\n" }], [noDebugger]);

    expect(report.errors).toEqual([]);
    expect(report.violations.map((v) => [v.ruleId, v.location.line])).toEqual([['no-debugger', 2]]);
  });

  it('decodes files read from disk as UTF-8', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'codeprobe-encoding-'));
    try {
      await fs.writeFile(path.join(dir, 'x.ts'), Buffer.from("const s = '\uFFFD';\ndebugger;\n", 'utf-8'));
      await fs.writeFile(path.join(dir, 'latin1.ts'), Buffer.from([0x2f, 0x2f, 0x20, 0xe9, 0x0a]));

      const report = await run(
        [
          { path: 'x.ts', absolutePath: path.join(dir, 'x.ts') },
          { path: 'latin1.ts', absolutePath: path.join(dir, 'latin1.ts') },
        ],
        [noDebugger]
      );

      expect(report.violations.map((v) => `${v.file}:${v.location.line}`)).toEqual(['x.ts:2']);
      expect(report.errors).toEqual([
        { kind: 'parse', file: 'latin1.ts', code: 'unsupported-encoding', message: 'Content is not valid UTF-8' },
      ]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects content bytes that are not UTF-8', async () => {
    const report = await run([{ path: 'bytes.ts', content: Uint8Array.from([0x63, 0x6f, 0xff, 0x3b]) }], [noDebugger]);

    expect(report.errors).toEqual([
      { kind: 'parse', file: 'bytes.ts', code: 'unsupported-encoding', message: 'Content is not valid UTF-8' },
    ]);
    expect(report.summary.filesFailed).toBe(1);
  });
});


describe('AnalysisOrchestrator on worker threads', () => {
  const backtracking: RuleDefinition = {
    id: 'nested-quantifier',
    languages: ['typescript'],
    severity: 'notice',
    message: 'Run of a',
    patterns: [{ type: 'textual', regex: '(a+)+$' }],
  };

  it('terminates an evaluation that never reaches a checkpoint and resumes the file', async () => {
    const orchestrator = new AnalysisOrchestrator();
    const content = `const s = '${'a'.repeat(27)}b';\ndebugger;\n`;

    const report = await orchestrator.run([{ path: 'x.ts', content }], [backtracking, noDebugger], {
      execution: 'worker-threads',
      ruleTimeoutMs: 50,
      collectStatistics: true,
    });

    expect(report.violations.map((v) => `${v.ruleId}:${v.location.line}`)).toEqual(['no-debugger:2']);
    expect(report.errors).toEqual([
      expect.objectContaining({ kind: 'timeout', file: 'x.ts', ruleId: 'nested-quantifier', code: 'rule-timeout' }),
    ]);
    expect(report.summary.filesAnalyzed).toBe(1);
    expect(report.summary.durationMs).toBeLessThan(10000);
    expect(report.statistics?.map((s) => [s.ruleId, s.timeouts])).toEqual([
      ['nested-quantifier', 1],
      ['no-debugger', 0],
    ]);
  });

  it('keeps the other files of the run', async () => {
    const orchestrator = new AnalysisOrchestrator();
    const stuck = `const s = '${'a'.repeat(27)}b';\n`;

    const report = await orchestrator.run(
      [
        { path: 'a.ts', content: 'debugger;\n' },
        { path: 'b.ts', content: stuck },
        { path: 'c.ts', content: 'debugger;\n' },
      ],
      [backtracking, noDebugger],
      { execution: 'worker-threads', ruleTimeoutMs: 50, maxWorkers: 2 }
    );

    expect(report.violations.map((v) => v.file)).toEqual(['a.ts', 'c.ts']);
    expect(report.errors.map((error) => [error.file, error.kind])).toEqual([['b.ts', 'timeout']]);
  });

  it('runs a custom parser registry in process only', async () => {
    const orchestrator = new AnalysisOrchestrator({ parsers: getParserRegistry() });

    const report = await orchestrator.run(files, [noEmptyCatch]);
    expect(report.violations.map((v) => v.file)).toEqual(['src/b.ts']);

    await expect(orchestrator.run(files, [noEmptyCatch], { execution: 'worker-threads' })).rejects.toThrow(
      'A custom parser registry cannot be used on worker threads'
    );
  });
});

describe('selectRules', () => {
  it('applies the include and exclude lists', () => {
    const rules = [noEmptyCatch, noDebugger];
    expect(selectRules(rules, {}).map((r) => r.id)).toEqual(['no-empty-catch', 'no-debugger']);
    expect(selectRules(rules, { ruleIds: ['no-debugger'] }).map((r) => r.id)).toEqual(['no-debugger']);
    expect(selectRules(rules, { excludeRuleIds: ['no-debugger'] }).map((r) => r.id)).toEqual(['no-empty-catch']);
  });
});
