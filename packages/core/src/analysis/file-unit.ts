/**
 * File unit - the analysis of one file
 *
 * Reads the content, parses it once and evaluates each rule whose languages
 * include the file's language, yielding to the event loop between rules.
 * The same code runs on the calling thread and inside a worker thread; the
 * orchestrator turns the result into report entries.
 */

import * as fs from 'node:fs/promises';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import {
  CodeprobeError,
  EvaluationCancelledError,
  EvaluationTimeoutError,
  ParseError,
  errorMessage,
  type CancellationReason,
} from '../errors.js';
import { BudgetTracker, isAbortRequested } from '../matcher/budget.js';
import { ViolationCollector } from '../rules/violation-collector.js';
import { createSourceFile } from './source-files.js';

import type { AnalysisError, AnalysisInput, SourceFile } from './types.js';
import type { MessagePort } from 'node:worker_threads';
import type { PatternMatcher } from '../matcher/pattern-matcher.js';
import type { ParserRegistry } from '../parsers/parser-registry.js';
import type { SyntaxTree } from '../parsers/types.js';
import type { RuleDefinition, Violation } from '../rules/types.js';

/**
 * Limits of one unit, identical for every unit of a run
 */
export interface UnitSettings {
  maxSteps: number;
  ruleTimeoutMs: number;
  maxFileSizeBytes: number;
  syntaxErrors: 'tolerate' | 'reject';
  /** Epoch milliseconds after which the run is out of budget */
  runDeadline?: number;
}

/**
 * Outcome of one (file, rule) evaluation
 */
export interface RuleEvaluation {
  ruleId: string;
  violations: Violation[];
  duplicatesCollapsed: number;
  elapsedMs: number;
  /** Set when the evaluation failed or timed out */
  error?: AnalysisError;
}

export interface FileUnitResult {
  path: string;
  /** Read and parsed successfully */
  analyzed: boolean;
  /** Read and parse failures */
  errors: AnalysisError[];
  evaluations: RuleEvaluation[];
  cancellation: CancellationReason | null;
}

export interface UnitEnvironment {
  parsers: ParserRegistry;
  matcher: PatternMatcher;
  signal?: AbortSignal;
  cancelFlag?: Int32Array;
  /** `index` is the rule's position in the rules handed to the unit */
  onRuleStart?: (ruleId: string, index: number) => void;
  onRuleEnd?: (evaluation: RuleEvaluation) => void;
}

/**
 * Task of the unit worker thread
 */
export interface UnitTask {
  input: AnalysisInput;
  rules: RuleDefinition[];
  settings: UnitSettings;
  cancelFlag: Int32Array;
  /** Receives UnitProgress messages */
  port: MessagePort;
}

export type UnitProgress =
  | { type: 'rule-start'; ruleId: string; index: number }
  | { type: 'rule-end'; evaluation: RuleEvaluation };

export function isUnitProgress(value: unknown): value is UnitProgress {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  if (value.type === 'rule-start') {
    return 'ruleId' in value && typeof value.ruleId === 'string' && 'index' in value && typeof value.index === 'number';
  }
  return value.type === 'rule-end' && 'evaluation' in value;
}

export function emptyUnitResult(path: string): FileUnitResult {
  return { path, analyzed: false, errors: [], evaluations: [], cancellation: null };
}

// ============================================
// Content
// ============================================

type ContentOutcome = { ok: true; content: string } | { ok: false; error: AnalysisError };

const utf8 = new TextDecoder('utf-8', { fatal: true });

function parseFailure(error: ParseError): ContentOutcome {
  return { ok: false, error: { kind: 'parse', file: error.filePath, code: error.code, message: error.message } };
}

/**
 * Decode bytes as UTF-8, failing on malformed sequences
 */
export function decodeContent(bytes: Uint8Array, filePath: string): ContentOutcome {
  try {
    return { ok: true, content: utf8.decode(bytes) };
  } catch (error) {
    return parseFailure(new ParseError('unsupported-encoding', filePath, 'Content is not valid UTF-8', error));
  }
}

/**
 * The text of an input: given text as is, given bytes decoded, otherwise read from disk
 */
export async function readUnitContent(input: AnalysisInput, maxFileSizeBytes: number): Promise<ContentOutcome> {
  const tooLarge = (size: number): ContentOutcome =>
    parseFailure(
      new ParseError('file-too-large', input.path, `File is ${size} bytes, above the limit of ${maxFileSizeBytes} bytes`)
    );

  if (typeof input.content === 'string') {
    const size = Buffer.byteLength(input.content, 'utf-8');
    return size > maxFileSizeBytes ? tooLarge(size) : { ok: true, content: input.content };
  }
  if (input.content !== undefined) {
    return input.content.byteLength > maxFileSizeBytes
      ? tooLarge(input.content.byteLength)
      : decodeContent(input.content, input.path);
  }

  const location = input.absolutePath ?? input.path;
  let bytes: Uint8Array;
  try {
    const stats = await fs.stat(location);
    if (stats.size > maxFileSizeBytes) {
      return tooLarge(stats.size);
    }
    bytes = await fs.readFile(location);
  } catch (error) {
    return {
      ok: false,
      error: { kind: 'read', file: input.path, code: 'read-failed', message: `Failed to read file: ${errorMessage(error)}` },
    };
  }
  return decodeContent(bytes, input.path);
}

// ============================================
// Unit
// ============================================

function cancellationOf(settings: UnitSettings, environment: UnitEnvironment): CancellationReason | null {
  if (isAbortRequested(environment)) {
    return 'aborted';
  }
  if (settings.runDeadline !== undefined && Date.now() > settings.runDeadline) {
    return 'budget-exceeded';
  }
  return null;
}

/**
 * Analyze one file. Unit failures are part of the result, never thrown.
 */
export async function runFileUnit(
  input: AnalysisInput,
  rules: readonly RuleDefinition[],
  settings: UnitSettings,
  environment: UnitEnvironment
): Promise<FileUnitResult> {
  const result = emptyUnitResult(input.path);
  result.cancellation = cancellationOf(settings, environment);
  if (result.cancellation !== null) {
    return result;
  }

  const language = input.language ?? environment.parsers.detectLanguage(input.path);
  if (language === null) {
    result.errors.push({
      kind: 'parse',
      file: input.path,
      code: 'parser-unavailable',
      message: `No parser handles the extension of ${input.path}`,
    });
    return result;
  }

  const read = await readUnitContent(input, settings.maxFileSizeBytes);
  if (!read.ok) {
    result.errors.push(read.error);
    return result;
  }
  const file = createSourceFile(input.path, language, read.content);

  if (!rules.some((rule) => rule.languages.includes(language))) {
    result.analyzed = true;
    return result;
  }

  const parsed = environment.parsers.parse(read.content, language, {
    filePath: file.path,
    syntaxErrors: settings.syntaxErrors,
  });
  if (!parsed.ok) {
    result.errors.push({ kind: 'parse', file: file.path, code: parsed.error.code, message: parsed.error.message });
    return result;
  }
  result.analyzed = true;

  const collector = new ViolationCollector();
  for (const [index, rule] of rules.entries()) {
    if (!rule.languages.includes(language)) {
      continue;
    }
    await yieldToEventLoop();
    result.cancellation = cancellationOf(settings, environment);
    if (result.cancellation !== null) {
      break;
    }

    environment.onRuleStart?.(rule.id, index);
    let evaluation: RuleEvaluation;
    try {
      evaluation = evaluateRule(file, parsed.tree, rule, settings, environment, collector);
    } catch (error) {
      if (error instanceof EvaluationCancelledError) {
        result.cancellation = error.reason;
        break;
      }
      throw error;
    }
    result.evaluations.push(evaluation);
    environment.onRuleEnd?.(evaluation);
  }

  return result;
}

/**
 * @throws EvaluationCancelledError when the run is cancelled mid-evaluation
 */
function evaluateRule(
  file: SourceFile,
  tree: SyntaxTree,
  rule: RuleDefinition,
  settings: UnitSettings,
  environment: UnitEnvironment,
  collector: ViolationCollector
): RuleEvaluation {
  const startedAt = Date.now();
  const tracker = new BudgetTracker({
    maxSteps: settings.maxSteps,
    deadline: startedAt + settings.ruleTimeoutMs,
    runDeadline: settings.runDeadline,
    signal: environment.signal,
    cancelFlag: environment.cancelFlag,
  });
  const collapsedBefore = collector.duplicatesCollapsed;

  try {
    const matches = environment.matcher.evaluate(tree, rule, tracker);
    const violations = collector.collect(file, rule, matches);
    return {
      ruleId: rule.id,
      violations,
      duplicatesCollapsed: collector.duplicatesCollapsed - collapsedBefore,
      elapsedMs: Date.now() - startedAt,
    };
  } catch (error) {
    if (error instanceof EvaluationCancelledError) {
      throw error;
    }
    return {
      ruleId: rule.id,
      violations: [],
      duplicatesCollapsed: 0,
      elapsedMs: Date.now() - startedAt,
      error: {
        kind: error instanceof EvaluationTimeoutError ? 'timeout' : 'evaluation',
        file: file.path,
        ruleId: rule.id,
        code: error instanceof CodeprobeError ? error.code : 'evaluation-failed',
        message: errorMessage(error),
      },
    };
  }
}
