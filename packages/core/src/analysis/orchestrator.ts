/**
 * Analysis Orchestrator - runs every applicable rule over every file
 *
 * One work unit per file (see file-unit.ts). Units are dispatched through a
 * WorkerPool bounded by `maxWorkers`; by default each unit runs on a
 * Piscina worker thread, so files are analyzed in parallel and an
 * evaluation that never reaches a budget checkpoint can be stopped by
 * terminating its thread. Results are merged and ordered on this thread.
 * A failed read, parse or evaluation becomes an AnalysisError and never
 * stops the run.
 */

import { MessageChannel } from 'node:worker_threads';
import { fileURLToPath } from 'node:url';

import type { CancellationReason } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { DEFAULT_MAX_STEPS, isAbortRequested } from '../matcher/budget.js';
import { PatternMatcher } from '../matcher/pattern-matcher.js';
import { getParserRegistry, type ParserRegistry } from '../parsers/parser-registry.js';
import { compareViolations } from '../rules/violation-collector.js';
import { ThreadedWorkerPool } from '../scanner/threaded-worker-pool.js';
import { WorkerPool, defaultWorkerCount } from '../scanner/worker-pool.js';
import {
  emptyUnitResult,
  isUnitProgress,
  runFileUnit,
  type FileUnitResult,
  type RuleEvaluation,
  type UnitSettings,
  type UnitTask,
} from './file-unit.js';

import type {
  AnalysisError,
  AnalysisInput,
  AnalysisOptions,
  AnalysisReport,
  AnalysisSummary,
  ExecutionMode,
  RuleStatistics,
} from './types.js';
import type { LoadError } from '../rules/ruleset-loader.js';
import type { RuleDefinition, Severity } from '../rules/types.js';

export const DEFAULT_RULE_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_FILE_SIZE_BYTES = 1024 * 1024;

/** Least time a worker thread gets past the rule timeout before it is terminated */
export const MIN_HARD_TIMEOUT_GRACE_MS = 250;

/**
 * Time after which an evaluation that has not returned is stopped by
 * terminating its worker thread
 */
export function hardTimeoutMs(ruleTimeoutMs: number): number {
  return ruleTimeoutMs + Math.max(MIN_HARD_TIMEOUT_GRACE_MS, ruleTimeoutMs);
}

type UnitThreadPool = ThreadedWorkerPool<UnitTask, FileUnitResult>;

/**
 * State shared by the units of one run
 */
interface RunContext {
  rules: readonly RuleDefinition[];
  settings: UnitSettings;
  signal: AbortSignal | undefined;
  /** Shared with the worker threads; set to 1 when the run is cancelled */
  cancelFlag: Int32Array;
  /** Set once the run is cancelled */
  cancellation: CancellationReason | null;
  logger: Logger;
}

/**
 * One dispatch of a unit to a worker thread
 */
type ThreadAttempt =
  | { kind: 'completed'; result: FileUnitResult }
  | { kind: 'terminated'; completed: RuleEvaluation[]; timedOut: RuleEvaluation; index: number };

export interface OrchestratorOptions {
  /**
   * Adapters for the units; a custom registry only exists on this thread,
   * so runs then default to in-process execution
   */
  parsers?: ParserRegistry;
  logger?: Logger;
}

/**
 * Keep the rules selected by `ruleIds` and not excluded by `excludeRuleIds`
 */
export function selectRules(
  rules: readonly RuleDefinition[],
  options: Pick<AnalysisOptions, 'ruleIds' | 'excludeRuleIds'>
): RuleDefinition[] {
  const only = options.ruleIds && options.ruleIds.length > 0 ? new Set(options.ruleIds) : null;
  const excluded = new Set(options.excludeRuleIds ?? []);
  return rules.filter((rule) => (only === null || only.has(rule.id)) && !excluded.has(rule.id));
}

export function compareAnalysisErrors(a: AnalysisError, b: AnalysisError): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  const ruleA = a.ruleId ?? '';
  const ruleB = b.ruleId ?? '';
  if (ruleA !== ruleB) return ruleA < ruleB ? -1 : 1;
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  return 0;
}

/**
 * Worker module beside this one. Running from the TypeScript sources the
 * worker threads need the same loader as this thread.
 */
function createUnitThreadPool(maxThreads: number): UnitThreadPool {
  const fromSources = import.meta.url.endsWith('.ts');
  const workerUrl = new URL(fromSources ? './unit-worker.ts' : './unit-worker.js', import.meta.url);
  return new ThreadedWorkerPool<UnitTask, FileUnitResult>({
    workerPath: fileURLToPath(workerUrl),
    minThreads: 1,
    maxThreads,
    ...(fromSources ? { execArgv: ['--import', 'tsx'] } : {}),
  });
}

export class AnalysisOrchestrator {
  private readonly parsers: ParserRegistry;
  private readonly customParsers: boolean;
  private readonly matcher = new PatternMatcher();
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions = {}) {
    this.parsers = options.parsers ?? getParserRegistry();
    this.customParsers = options.parsers !== undefined;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Analyze the inputs with the rules.
   *
   * Never throws for a unit failure; every failure is an entry of `errors`.
   */
  async run(
    inputs: readonly AnalysisInput[],
    rules: readonly RuleDefinition[],
    options: AnalysisOptions = {},
    loadErrors: readonly LoadError[] = []
  ): Promise<AnalysisReport> {
    const startedAt = Date.now();
    const logger = options.logger ?? this.logger;
    const selected = selectRules(rules, options);
    const execution = this.resolveExecution(options.execution);
    const maxWorkers = Math.max(1, Math.floor(options.maxWorkers ?? defaultWorkerCount()));

    const context: RunContext = {
      rules: selected,
      settings: {
        maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
        ruleTimeoutMs: options.ruleTimeoutMs ?? DEFAULT_RULE_TIMEOUT_MS,
        maxFileSizeBytes: options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
        syntaxErrors: options.syntaxErrors ?? 'tolerate',
        ...(options.maxDurationMs !== undefined ? { runDeadline: startedAt + options.maxDurationMs } : {}),
      },
      signal: options.signal,
      cancelFlag: new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)),
      cancellation: null,
      logger,
    };

    logger.info(`Analyzing ${inputs.length} file(s) with ${selected.length} rule(s) (${execution})`);

    const threads =
      execution === 'worker-threads' && inputs.length > 0
        ? createUnitThreadPool(Math.min(maxWorkers, inputs.length))
        : null;
    await threads?.initialize();

    const pool = new WorkerPool<AnalysisInput, FileUnitResult>({ maxWorkers });
    pool.setProcessor(async (input) => {
      if (this.checkCancellation(context)) {
        return emptyUnitResult(input.path);
      }
      const result = threads
        ? await this.runOnThread(threads, input, context)
        : await runFileUnit(input, context.rules, context.settings, {
            parsers: this.parsers,
            matcher: this.matcher,
            signal: context.signal,
            cancelFlag: context.cancelFlag,
          });
      if (result.cancellation !== null) {
        this.cancel(context, result.cancellation);
      }
      return result;
    });

    const onAbort = (): void => {
      this.cancel(context, 'aborted');
      pool.cancelAllPending();
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const results = await pool.processBatch(inputs).finally(async () => {
      options.signal?.removeEventListener('abort', onAbort);
      await pool.shutdown();
      await threads?.destroy();
    });

    const units: FileUnitResult[] = [];
    const errors: AnalysisError[] = [];
    for (const result of results) {
      const input = inputs[result.sequence];
      if (result.result) {
        units.push(result.result);
      } else if (!result.cancelled && input) {
        logger.error(`Unit failed for ${input.path}: ${result.error ?? 'unknown error'}`);
        errors.push({ kind: 'evaluation', file: input.path, code: 'internal-error', message: result.error ?? 'Unit failed' });
      }
    }
    this.checkCancellation(context);

    const evaluations = units.flatMap((unit) => unit.evaluations);
    for (const unit of units) {
      this.logUnit(unit, logger);
      errors.push(...unit.errors);
    }
    for (const evaluation of evaluations) {
      if (evaluation.error) errors.push(evaluation.error);
    }

    let violations = evaluations.flatMap((evaluation) => evaluation.violations);
    if ((options.ordering ?? 'deterministic') === 'deterministic') {
      violations.sort(compareViolations);
      errors.sort(compareAnalysisErrors);
    }

    let suppressed = 0;
    if (options.baseline) {
      const baseline = new Set(options.baseline);
      const before = violations.length;
      violations = violations.filter((violation) => !baseline.has(violation.fingerprint));
      suppressed = before - violations.length;
    }

    const bySeverity: Record<Severity, number> = { error: 0, warning: 0, notice: 0 };
    for (const violation of violations) {
      bySeverity[violation.severity]++;
    }

    const summary: AnalysisSummary = {
      filesAnalyzed: units.filter((unit) => unit.analyzed).length,
      filesFailed: errors.filter((error) => error.kind === 'read' || error.kind === 'parse').length,
      rulesLoaded: rules.length,
      evaluations: evaluations.filter((evaluation) => evaluation.error === undefined).length,
      violations: violations.length,
      errors: errors.length,
      bySeverity,
      duplicatesCollapsed: evaluations.reduce((total, evaluation) => total + evaluation.duplicatesCollapsed, 0),
      suppressed,
      durationMs: Date.now() - startedAt,
    };

    const report: AnalysisReport = {
      violations,
      errors,
      loadErrors: [...loadErrors],
      summary,
      cancelled: context.cancellation !== null,
    };
    if (context.cancellation !== null) {
      report.cancellationReason = context.cancellation;
      logger.warn(`Analysis cancelled (${context.cancellation}); the report covers completed units only`);
    }
    if (options.collectStatistics) {
      report.statistics = ruleStatistics(evaluations);
    }

    logger.info(
      `Found ${summary.violations} violation(s) in ${summary.filesAnalyzed} file(s), ${summary.errors} error(s) in ${summary.durationMs}ms`
    );
    return report;
  }

  // ============================================
  // Worker Threads
  // ============================================

  /**
   * Run a unit on a worker thread. When an evaluation outlives the hard
   * timeout its thread is terminated, the evaluation is recorded as timed
   * out and the unit resumes with the rules after it.
   */
  private async runOnThread(threads: UnitThreadPool, input: AnalysisInput, context: RunContext): Promise<FileUnitResult> {
    const merged = emptyUnitResult(input.path);
    let pending = context.rules;

    for (;;) {
      const attempt = await this.dispatch(threads, input, pending, context);
      if (attempt.kind === 'completed') {
        merged.analyzed = merged.analyzed || attempt.result.analyzed;
        merged.errors.push(...attempt.result.errors);
        merged.evaluations.push(...attempt.result.evaluations);
        merged.cancellation = attempt.result.cancellation;
        return merged;
      }

      merged.analyzed = true;
      merged.evaluations.push(...attempt.completed, attempt.timedOut);
      pending = pending.slice(attempt.index + 1);
      if (pending.length === 0 || this.checkCancellation(context)) {
        return merged;
      }
    }
  }

  private async dispatch(
    threads: UnitThreadPool,
    input: AnalysisInput,
    rules: readonly RuleDefinition[],
    context: RunContext
  ): Promise<ThreadAttempt> {
    const { port1, port2 } = new MessageChannel();
    const controller = new AbortController();
    const limitMs = hardTimeoutMs(context.settings.ruleTimeoutMs);
    const progress: {
      completed: RuleEvaluation[];
      running: { ruleId: string; index: number; startedAt: number } | null;
      watchdog: NodeJS.Timeout | undefined;
    } = { completed: [], running: null, watchdog: undefined };

    port1.on('message', (message: unknown) => {
      if (!isUnitProgress(message)) {
        return;
      }
      clearTimeout(progress.watchdog);
      if (message.type === 'rule-start') {
        progress.running = { ruleId: message.ruleId, index: message.index, startedAt: Date.now() };
        progress.watchdog = setTimeout(() => controller.abort(), limitMs);
      } else {
        progress.running = null;
        progress.completed.push(message.evaluation);
      }
    });

    const task: UnitTask = {
      input,
      rules: [...rules],
      settings: context.settings,
      cancelFlag: context.cancelFlag,
      port: port2,
    };

    try {
      const result = await threads.run(task, { transferList: [port2], signal: controller.signal });
      return { kind: 'completed', result };
    } catch (error) {
      const running = progress.running;
      if (!controller.signal.aborted || running === null) {
        throw error;
      }
      const elapsedMs = Date.now() - running.startedAt;
      return {
        kind: 'terminated',
        completed: progress.completed,
        index: running.index,
        timedOut: {
          ruleId: running.ruleId,
          violations: [],
          duplicatesCollapsed: 0,
          elapsedMs,
          error: {
            kind: 'timeout',
            file: input.path,
            ruleId: running.ruleId,
            code: 'rule-timeout',
            message: `Evaluation did not return within ${limitMs}ms; its worker thread was terminated`,
          },
        },
      };
    } finally {
      clearTimeout(progress.watchdog);
      port1.close();
    }
  }

  // ============================================
  // Helpers
  // ============================================

  private resolveExecution(requested: ExecutionMode | undefined): ExecutionMode {
    if (requested === 'worker-threads' && this.customParsers) {
      throw new Error('A custom parser registry cannot be used on worker threads; use in-process execution');
    }
    return requested ?? (this.customParsers ? 'in-process' : 'worker-threads');
  }

  private logUnit(unit: FileUnitResult, logger: Logger): void {
    for (const error of unit.errors) {
      logger.debug(`Skipped ${error.file}: ${error.message}`);
    }
    for (const evaluation of unit.evaluations) {
      if (evaluation.error?.kind === 'timeout') {
        logger.warn(`Rule ${evaluation.ruleId} timed out on ${unit.path}: ${evaluation.error.message}`);
      } else if (evaluation.error) {
        logger.warn(`Rule ${evaluation.ruleId} failed on ${unit.path}: ${evaluation.error.message}`);
      }
    }
  }

  /**
   * Whether the run is cancelled, checking the signal and the run budget
   */
  private checkCancellation(context: RunContext): boolean {
    if (context.cancellation === null) {
      if (isAbortRequested({ signal: context.signal })) {
        this.cancel(context, 'aborted');
      } else if (context.settings.runDeadline !== undefined && Date.now() > context.settings.runDeadline) {
        this.cancel(context, 'budget-exceeded');
      }
    }
    return context.cancellation !== null;
  }

  private cancel(context: RunContext, reason: CancellationReason): void {
    if (context.cancellation === null) {
      context.cancellation = reason;
      Atomics.store(context.cancelFlag, 0, 1);
      context.logger.debug(`Cancelling analysis: ${reason}`);
    }
  }
}

function ruleStatistics(evaluations: readonly RuleEvaluation[]): RuleStatistics[] {
  const byRule = new Map<string, RuleStatistics>();
  for (const evaluation of evaluations) {
    let stats = byRule.get(evaluation.ruleId);
    if (!stats) {
      stats = { ruleId: evaluation.ruleId, files: 0, violations: 0, errors: 0, timeouts: 0, executionTimeMs: 0, maxExecutionTimeMs: 0 };
      byRule.set(evaluation.ruleId, stats);
    }
    stats.files++;
    stats.violations += evaluation.violations.length;
    stats.executionTimeMs += evaluation.elapsedMs;
    stats.maxExecutionTimeMs = Math.max(stats.maxExecutionTimeMs, evaluation.elapsedMs);
    if (evaluation.error?.kind === 'timeout') stats.timeouts++;
    else if (evaluation.error) stats.errors++;
  }
  return [...byRule.values()].sort((a, b) => (a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0));
}
