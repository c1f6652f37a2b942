/**
 * CLI command tests - option wiring, exit codes and end-to-end runs over a
 * temporary workspace
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { createProgram } from '../src/index.js';
import { exitCodeFor, runAnalyze, type AnalyzeCommandOptions } from '../src/commands/analyze.js';
import { runRules } from '../src/commands/rules.js';
import { runTest } from '../src/commands/test.js';

import type { AnalysisReport, Severity, Violation } from 'codeprobe-core';

const ruleset = {
  name: 'core',
  rules: [
    {
      id: 'no-debugger',
      languages: ['typescript'],
      severity: 'error',
      message: 'Remove debugger',
      patterns: [{ type: 'textual', regex: '\\bdebugger\\b' }],
      tests: [
        { name: 'flags', code: 'debugger;\n', expected: [{ line: 1, column: 1 }] },
        { name: 'clean', code: 'run();\n', expected: [] },
      ],
    },
    {
      id: 'todo-comment',
      languages: ['typescript'],
      severity: 'notice',
      message: 'Resolve this TODO',
      patterns: [{ type: 'textual', regex: 'TODO' }],
    },
  ],
};

async function writeFile(root: string, relativePath: string, content: string): Promise<void> {
  const target = path.join(root, relativePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content);
}

function options(overrides: Partial<AnalyzeCommandOptions> = {}): AnalyzeCommandOptions {
  return { rules: ['rules/core.json'], format: 'json', failOn: 'error', ...overrides };
}

function violation(severity: Severity): Violation {
  return {
    ruleId: 'r',
    file: 'a.ts',
    language: 'typescript',
    severity,
    category: null,
    message: 'm',
    location: { line: 1, column: 1, endLine: 1, endColumn: 2, startOffset: 0, endOffset: 1 },
    fingerprint: severity,
  };
}

describe('createProgram', () => {
  it('should register the analyze, test and rules commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('codeprobe');
    expect(program.commands.map((command) => command.name())).toEqual(['analyze', 'test', 'rules']);
  });

  it('should expose the analyze options', () => {
    const analyze = createProgram().commands.find((command) => command.name() === 'analyze');
    const flags = analyze?.options.map((option) => option.long);

    expect(flags).toEqual([
      '--rules',
      '--format',
      '--output',
      '--ignore',
      '--rule',
      '--workers',
      '--timeout',
      '--max-duration',
      '--baseline',
      '--write-baseline',
      '--fail-on',
      '--stats',
      '--debug',
    ]);
  });
});

describe('exitCodeFor', () => {
  const report = (severities: Severity[]): AnalysisReport => ({
    violations: severities.map(violation),
    errors: [],
    loadErrors: [],
    summary: {
      filesAnalyzed: 1,
      filesFailed: 0,
      rulesLoaded: 1,
      evaluations: 1,
      violations: severities.length,
      errors: 0,
      bySeverity: { error: 0, warning: 0, notice: 0 },
      duplicatesCollapsed: 0,
      suppressed: 0,
      durationMs: 0,
    },
    cancelled: false,
  });

  it('should fail on violations at or above the threshold', () => {
    expect(exitCodeFor(report(['warning']), 'error')).toBe(0);
    expect(exitCodeFor(report(['warning']), 'warning')).toBe(1);
    expect(exitCodeFor(report(['warning']), 'notice')).toBe(1);
    expect(exitCodeFor(report(['error']), 'none')).toBe(0);
    expect(exitCodeFor(report([]), 'notice')).toBe(0);
  });

  it('should report an error for a cancelled run whatever the threshold', () => {
    const cancelled: AnalysisReport = { ...report([]), cancelled: true, cancellationReason: 'budget-exceeded' };
    expect(exitCodeFor(cancelled, 'none')).toBe(2);
    expect(exitCodeFor(cancelled, 'error')).toBe(2);
  });

  it('should report an error when every file failed', () => {
    const base = report([]);
    const failed: AnalysisReport = { ...base, summary: { ...base.summary, filesAnalyzed: 0, filesFailed: 2, errors: 2 } };
    expect(exitCodeFor(failed, 'none')).toBe(2);
    expect(exitCodeFor({ ...failed, summary: { ...failed.summary, filesAnalyzed: 1 } }, 'notice')).toBe(0);
  });
});

describe('commands', () => {
  let root: string;
  let stdout: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'codeprobe-cli-'));
    await writeFile(root, 'rules/core.json', JSON.stringify(ruleset));
    await writeFile(root, 'src/a.ts', 'debugger;\n// TODO tidy\n');
    await writeFile(root, 'src/b.ts', 'export const b = 2;\n');

    stdout = '';
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout += String(chunk);
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('analyze', () => {
    it('should print the JSON report and fail on an error violation', async () => {
      expect(await runAnalyze(root, options())).toBe(1);

      const document = JSON.parse(stdout);
      expect(document.violations.map((v: Violation) => [v.file, v.location.line, v.ruleId])).toEqual([
        ['src/a.ts', 1, 'no-debugger'],
        ['src/a.ts', 2, 'todo-comment'],
      ]);
      expect(document.summary.filesAnalyzed).toBe(2);
    });

    it('should pass when only rules below the threshold report', async () => {
      expect(await runAnalyze(root, options({ rule: ['todo-comment'] }))).toBe(0);
      expect(await runAnalyze(root, options({ rule: ['todo-comment'], failOn: 'notice' }))).toBe(1);
    });

    it('should take rulesets and disabled rules from the config file', async () => {
      await writeFile(root, '.codeprobe/config.json', JSON.stringify({ rulesets: ['rules/'], disabledRules: ['no-debugger'] }));

      expect(await runAnalyze(root, options({ rules: undefined }))).toBe(0);
      expect(JSON.parse(stdout).violations.map((v: Violation) => v.ruleId)).toEqual(['todo-comment']);
    });

    it('should write a baseline that suppresses the same violations', async () => {
      expect(await runAnalyze(root, options({ writeBaseline: 'baseline.json' }))).toBe(1);
      const baseline = JSON.parse(await fs.readFile(path.join(root, 'baseline.json'), 'utf-8'));
      expect(baseline.schemaVersion).toBe('1.0');
      expect(baseline.fingerprints).toHaveLength(2);

      stdout = '';
      expect(await runAnalyze(root, options({ baseline: 'baseline.json' }))).toBe(0);
      const document = JSON.parse(stdout);
      expect(document.violations).toEqual([]);
      expect(document.summary.suppressed).toBe(2);
    });

    it('should write the report to a file', async () => {
      const output = path.join(root, 'out', 'report.sarif');
      expect(await runAnalyze(root, options({ format: 'sarif', output, failOn: 'none' }))).toBe(0);

      expect(stdout).toBe('');
      const log = JSON.parse(await fs.readFile(output, 'utf-8'));
      expect(log.runs[0].results.map((result: { level: string }) => result.level)).toEqual(['error', 'note']);
    });

    it('should exit with 2 on fatal errors', async () => {
      expect(await runAnalyze(root, options({ rules: ['rules/absent.json'] }))).toBe(2);
      expect(await runAnalyze(root, options({ rules: [] }))).toBe(2);
      expect(await runAnalyze(path.join(root, 'missing'), options())).toBe(2);
      expect(stdout).toBe('');
    });

    it('should exit with 2 on an invalid config file', async () => {
      await writeFile(root, '.codeprobe/config.json', '{ "analysis": ');
      expect(await runAnalyze(root, options())).toBe(2);
    });

    it('should parse command line arguments', async () => {
      await createProgram().parseAsync(
        ['analyze', root, '--rules', 'rules/core.json', '--format', 'sarif', '--workers', '2', '--fail-on', 'none'],
        { from: 'user' }
      );

      expect(process.exitCode).toBe(0);
      expect(JSON.parse(stdout).version).toBe('2.1.0');
    });
  });

  describe('test', () => {
    it('should run the embedded fixtures', async () => {
      expect(await runTest(['rules/core.json'], { dir: root, format: 'json' })).toBe(0);

      const document = JSON.parse(stdout);
      expect(document.summary).toEqual({ rules: 2, untested: 1, fixtures: 2, passed: 2, failed: 0 });
      expect(document.loadErrors).toEqual([]);
    });

    it('should fail when a fixture fails', async () => {
      const failing = {
        rules: [{ ...ruleset.rules[1], tests: [{ code: 'let a = 1;\n', expected: [{ line: 1 }] }] }],
      };
      await writeFile(root, 'rules/failing.json', JSON.stringify(failing));

      expect(await runTest(['rules/failing.json'], { dir: root, format: 'json' })).toBe(1);
      expect(JSON.parse(stdout).rules[0].fixtures[0].missing).toEqual([
        { line: 1, column: null, endLine: null, endColumn: null, ruleId: null },
      ]);
    });

    it('should test only the selected rules', async () => {
      expect(await runTest(['rules/core.json'], { dir: root, format: 'json', rule: ['todo-comment'] })).toBe(0);
      expect(JSON.parse(stdout).summary.rules).toBe(1);
      expect(await runTest(['rules/core.json'], { dir: root, format: 'json', rule: ['absent'] })).toBe(2);
    });
  });

  describe('rules', () => {
    it('should list the loaded rules as JSON', async () => {
      expect(await runRules(['rules/core.json'], { dir: root, json: true })).toBe(0);

      const document = JSON.parse(stdout);
      expect(document.rules.map((rule: { id: string; fixtures: number }) => [rule.id, rule.fixtures])).toEqual([
        ['no-debugger', 2],
        ['todo-comment', 0],
      ]);
    });

    it('should exit with 1 when a rule fails to load', async () => {
      await writeFile(root, 'rules/broken.json', JSON.stringify([{ id: 'broken', languages: ['cobol'] }]));

      expect(await runRules(['rules/'], { dir: root, json: true })).toBe(1);
      const document = JSON.parse(stdout);
      expect(document.rules.map((rule: { id: string }) => rule.id)).toEqual(['no-debugger', 'todo-comment']);
      expect(document.loadErrors.map((error: { ruleId: string | null }) => error.ruleId)).toEqual(['broken']);
    });
  });
});
