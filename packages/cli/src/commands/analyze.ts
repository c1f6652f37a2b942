/**
 * codeprobe analyze - run rulesets over a workspace and report violations.
 *
 * Exit codes: 0 = clean, 1 = violations at or above --fail-on, 2 = error.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { Option, type Command } from 'commander';
import {
  FatalAnalysisError,
  SEVERITY_RANK,
  analyze,
  type AnalysisReport,
  type AnalyzeOptions,
  type Severity,
} from 'codeprobe-core';

import { readBaseline, writeBaseline } from '../baseline.js';
import {
  EXIT_ERROR,
  EXIT_FAILURE,
  EXIT_OK,
  loadContext,
  parsePositiveInt,
  registryOptions,
  rulesetSources,
  type CommandContext,
} from '../context.js';
import { OUTPUT_FORMATS, formatReport, type OutputFormat } from '../output/index.js';
import { createSpinner, status, withSpinner } from '../ui/spinner.js';

export type FailOn = Severity | 'none';

export interface AnalyzeCommandOptions {
  rules?: string[];
  format: OutputFormat;
  output?: string;
  ignore?: string[];
  rule?: string[];
  workers?: number;
  timeout?: number;
  maxDuration?: number;
  baseline?: string;
  writeBaseline?: string;
  failOn: FailOn;
  stats?: boolean;
  debug?: boolean;
}

/**
 * Exit code for a finished run: 2 when it was cancelled or no file could be
 * analyzed, 1 when a violation is at least as severe as `failOn`
 */
export function exitCodeFor(report: AnalysisReport, failOn: FailOn): number {
  if (report.cancelled) return EXIT_ERROR;
  if (report.summary.filesAnalyzed === 0 && report.summary.errors > 0) return EXIT_ERROR;
  if (failOn === 'none') return EXIT_OK;
  const threshold = SEVERITY_RANK[failOn];
  return report.violations.some((violation) => SEVERITY_RANK[violation.severity] >= threshold) ? EXIT_FAILURE : EXIT_OK;
}

/**
 * Analyze options from the configuration with command line flags on top
 */
export async function buildAnalyzeOptions(context: CommandContext, options: AnalyzeCommandOptions): Promise<AnalyzeOptions> {
  const { config, logger, rootDir } = context;
  const settings = config.analysis;

  const result: AnalyzeOptions = {
    excludeRuleIds: [...config.disabledRules],
    include: [...config.include],
    ignore: [...config.ignore, ...(options.ignore ?? [])],
    ruleTimeoutMs: options.timeout ?? settings.ruleTimeoutMs,
    maxSteps: settings.maxSteps,
    maxFileSizeBytes: settings.maxFileSizeBytes,
    syntaxErrors: settings.syntaxErrors,
    collectStatistics: options.stats ?? false,
    logger,
  };

  if (options.rule && options.rule.length > 0) result.ruleIds = [...options.rule];
  const maxWorkers = options.workers ?? settings.maxWorkers;
  if (maxWorkers !== null) result.maxWorkers = maxWorkers;
  const maxDurationMs = options.maxDuration ?? settings.maxDurationMs;
  if (maxDurationMs !== null) result.maxDurationMs = maxDurationMs;
  const registry = registryOptions(config);
  if (registry) result.registry = registry;

  const baselinePath = options.baseline ?? config.baseline;
  if (baselinePath) {
    result.baseline = await readBaseline(path.resolve(rootDir, baselinePath));
  }
  return result;
}

/**
 * Run the analyze command and return its exit code
 */
export async function runAnalyze(directory: string | undefined, options: AnalyzeCommandOptions): Promise<number> {
  let context: CommandContext;
  try {
    context = await loadContext(directory, options.debug);
  } catch (error) {
    status.error(error instanceof Error ? error.message : String(error));
    return EXIT_ERROR;
  }

  const sources = rulesetSources(options.rules, context.config);
  if (sources.length === 0) {
    status.error('No rulesets given. Pass --rules or set "rulesets" in .codeprobe/config.json');
    return EXIT_ERROR;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  let report: AnalysisReport;
  try {
    const analyzeOptions = await buildAnalyzeOptions(context, options);
    analyzeOptions.signal = controller.signal;

    const spinner = options.format === 'table' ? createSpinner('Analyzing...') : null;
    report = await withSpinner(
      spinner,
      () => analyze(context.rootDir, undefined, sources, analyzeOptions),
      (result) => `Analyzed ${result.summary.filesAnalyzed} files with ${result.summary.rulesLoaded} rules`
    );
  } catch (error) {
    if (error instanceof FatalAnalysisError) {
      status.error(`${error.message} (${error.code})`);
    } else {
      status.error(error instanceof Error ? error.message : String(error));
    }
    return EXIT_ERROR;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const rendered = formatReport(report, options.format);
  if (options.output) {
    const target = path.resolve(options.output);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, rendered);
    status.success(`Report written to ${target}`);
  } else {
    process.stdout.write(rendered);
  }

  if (report.cancelled) {
    status.warning(`Analysis cancelled (${report.cancellationReason ?? 'aborted'}); the report covers completed files only`);
  }

  if (options.writeBaseline) {
    const target = path.resolve(context.rootDir, options.writeBaseline);
    const baseline = await writeBaseline(target, report.violations);
    status.success(`Baseline of ${baseline.fingerprints.length} fingerprints written to ${target}`);
  }

  return exitCodeFor(report, options.failOn);
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze [directory]')
    .description('Run rulesets over a workspace and report violations')
    .option('-r, --rules <sources...>', 'Ruleset files, directories or registry:<name> sources')
    .addOption(new Option('-f, --format <format>', 'Output format').choices([...OUTPUT_FORMATS]).default('table'))
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('--ignore <globs...>', 'Globs of files to skip')
    .option('--rule <ids...>', 'Only run these rules')
    .option('--workers <n>', 'Files analyzed concurrently', parsePositiveInt)
    .option('--timeout <ms>', 'Time limit of one rule on one file', parsePositiveInt)
    .option('--max-duration <ms>', 'Time limit of the whole run', parsePositiveInt)
    .option('--baseline <file>', 'Suppress violations whose fingerprints are in this file')
    .option('--write-baseline <file>', 'Write the fingerprints of the reported violations to this file')
    .addOption(
      new Option('--fail-on <severity>', 'Lowest severity that fails the run')
        .choices(['error', 'warning', 'notice', 'none'])
        .default('error')
    )
    .option('--stats', 'Collect per-rule statistics')
    .option('--debug', 'Enable debug logging')
    .action(async (directory: string | undefined, opts: AnalyzeCommandOptions) => {
      process.exitCode = await runAnalyze(directory, opts);
    });
}
