/**
 * Table output format - human-readable terminal output.
 */

import chalk from 'chalk';

import type { AnalysisReport, LoadError, RuleDefinition, RulesetTestReport, Severity } from 'codeprobe-core';

/**
 * Pad every cell but the last of each row to its column width.
 */
export function alignColumns(rows: readonly string[][]): string[][] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map((row) => row.map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index] ?? 0))));
}

function renderTable(header: string[], rows: string[][]): string[] {
  const [head, ...body] = alignColumns([header, ...rows]);
  if (!head) return [];
  const lines = [chalk.bold(head.join('  ').trimEnd())];
  lines.push(head.map((cell) => '─'.repeat(cell.length)).join('──'));
  for (const row of body) {
    lines.push(row.join('  ').trimEnd());
  }
  return lines;
}

function colorSeverity(text: string, severity: Severity): string {
  switch (severity) {
    case 'error':
      return chalk.red(text);
    case 'warning':
      return chalk.yellow(text);
    case 'notice':
      return chalk.blue(text);
  }
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function loadErrorLines(errors: readonly LoadError[]): string[] {
  if (errors.length === 0) return [];
  const rows = errors.map((error) => [
    error.source,
    error.position === null ? '' : `#${error.position}`,
    error.ruleId ?? '',
    error.message,
  ]);
  return [chalk.bold('Ruleset errors'), ...alignColumns(rows).map((row) => `  ${row.join('  ')}`)];
}

/**
 * Violations grouped by file, then errors, statistics and a summary line.
 */
export function formatReportTable(report: AnalysisReport): string {
  const lines: string[] = [];

  const byFile = new Map<string, AnalysisReport['violations']>();
  for (const violation of report.violations) {
    const group = byFile.get(violation.file) ?? [];
    group.push(violation);
    byFile.set(violation.file, group);
  }

  for (const [file, violations] of byFile) {
    lines.push(chalk.underline(file));
    const rows = alignColumns(
      violations.map((v) => [`${v.location.line}:${v.location.column}`, v.severity, v.message, v.ruleId])
    );
    rows.forEach((row, index) => {
      const severity = violations[index]?.severity ?? 'notice';
      const [position = '', level = '', message = '', ruleId = ''] = row;
      lines.push(`  ${chalk.dim(position)}  ${colorSeverity(level, severity)}  ${message}  ${chalk.dim(ruleId)}`);
    });
    lines.push('');
  }

  if (report.errors.length > 0) {
    lines.push(chalk.bold('Analysis errors'));
    const rows = alignColumns(report.errors.map((error) => [error.kind, error.file, error.ruleId ?? '', error.message]));
    lines.push(...rows.map((row) => `  ${row.join('  ')}`));
    lines.push('');
  }

  const loadErrors = loadErrorLines(report.loadErrors);
  if (loadErrors.length > 0) {
    lines.push(...loadErrors, '');
  }

  if (report.statistics && report.statistics.length > 0) {
    lines.push(chalk.bold('Rule statistics'));
    lines.push(
      ...renderTable(
        ['rule', 'files', 'violations', 'errors', 'timeouts', 'time (ms)'],
        report.statistics.map((s) => [
          s.ruleId,
          String(s.files),
          String(s.violations),
          String(s.errors),
          String(s.timeouts),
          s.executionTimeMs.toFixed(1),
        ])
      )
    );
    lines.push('');
  }

  if (report.cancelled) {
    lines.push(chalk.yellow(`⚠ Analysis cancelled (${report.cancellationReason ?? 'aborted'}); results are partial`));
  }

  const { bySeverity, filesAnalyzed, violations } = report.summary;
  if (violations === 0) {
    lines.push(chalk.green(`✔ No problems found in ${plural(filesAnalyzed, 'file')}`));
  } else {
    lines.push(
      chalk.red(
        `✖ ${plural(violations, 'problem')} (${plural(bySeverity.error, 'error')}, ` +
          `${plural(bySeverity.warning, 'warning')}, ${plural(bySeverity.notice, 'notice')})`
      )
    );
  }

  return lines.join('\n') + '\n';
}

/**
 * Per-fixture results with the diff of failing fixtures.
 */
export function formatTestTable(report: RulesetTestReport, loadErrors: readonly LoadError[] = []): string {
  const lines: string[] = [];

  for (const rule of report.rules) {
    if (rule.fixtures.length === 0) {
      lines.push(`${chalk.gray('○')} ${rule.ruleId} ${chalk.dim('(no fixtures)')}`);
      continue;
    }
    lines.push(`${rule.passed ? chalk.green('✔') : chalk.red('✖')} ${rule.ruleId}`);
    for (const fixture of rule.fixtures) {
      lines.push(`    ${fixture.passed ? chalk.green('✔') : chalk.red('✖')} ${fixture.name} ${chalk.dim(fixture.filename)}`);
      for (const missing of fixture.missing) {
        const column = missing.column === undefined ? '' : `:${missing.column}`;
        lines.push(chalk.red(`        - expected violation at ${missing.line}${column}`));
      }
      for (const unexpected of fixture.unexpected) {
        lines.push(
          chalk.red(`        + unexpected violation at ${unexpected.location.line}:${unexpected.location.column} (${unexpected.ruleId})`)
        );
      }
      for (const error of fixture.errors) {
        lines.push(chalk.red(`        ! ${error.code}: ${error.message}`));
      }
    }
  }

  const errorLines = loadErrorLines(loadErrors);
  if (errorLines.length > 0) {
    lines.push('', ...errorLines);
  }

  const { summary } = report;
  lines.push('');
  lines.push(
    `${plural(summary.rules, 'rule')}, ${plural(summary.fixtures, 'fixture')}: ` +
      `${summary.passed} passed, ${summary.failed} failed, ${summary.untested} untested`
  );
  return lines.join('\n') + '\n';
}

/**
 * The loaded rules, one row each, followed by load errors.
 */
export function formatRulesTable(rules: readonly RuleDefinition[], loadErrors: readonly LoadError[] = []): string {
  const lines =
    rules.length === 0
      ? ['No rules loaded.']
      : renderTable(
          ['id', 'severity', 'languages', 'category', 'fixtures'],
          rules.map((rule) => [
            rule.id,
            rule.severity,
            rule.languages.join(', '),
            rule.category ?? '',
            String(rule.tests?.length ?? 0),
          ])
        );
  const errorLines = loadErrorLines(loadErrors);
  if (errorLines.length > 0) {
    lines.push('', ...errorLines);
  }
  return lines.join('\n') + '\n';
}
