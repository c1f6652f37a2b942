/**
 * Error taxonomy for the analysis kernel.
 *
 * Recoverable errors (parse, load, evaluation, timeout) never escape their
 * unit of work: the orchestrator and loader turn them into report entries.
 * Only FatalAnalysisError is thrown to the caller of `analyze()`.
 */

export type ParseErrorCode =
  | 'unsupported-encoding'
  | 'parser-unavailable'
  | 'parser-crash'
  | 'syntax-error'
  | 'file-too-large';

export type FatalErrorCode = 'workspace-unreadable' | 'no-rules' | 'no-files';

/**
 * Base class for every error raised by the kernel
 */
export abstract class CodeprobeError extends Error {
  abstract readonly code: string;
  abstract readonly recoverable: boolean;
  public readonly context: Readonly<Record<string, unknown>>;

  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

/**
 * A file could not be turned into a syntax tree
 */
export class ParseError extends CodeprobeError {
  readonly recoverable = true;
  public readonly code: ParseErrorCode;
  public readonly filePath: string;

  constructor(code: ParseErrorCode, filePath: string, message: string, cause?: unknown) {
    super(message, { filePath }, cause);
    this.code = code;
    this.filePath = filePath;
  }
}

/**
 * A ruleset source could not be read or decoded
 */
export class RuleLoadError extends CodeprobeError {
  readonly recoverable = true;
  public readonly code: string;
  public readonly source: string;

  constructor(code: string, source: string, message: string, cause?: unknown) {
    super(message, { source }, cause);
    this.code = code;
    this.source = source;
  }
}

/**
 * Rule evaluation failed for one (file, rule) pair
 */
export class EvaluationError extends CodeprobeError {
  readonly recoverable = true;
  readonly code: string = 'evaluation-failed';
}

/**
 * The step or time budget of one (file, rule) evaluation ran out
 */
export class EvaluationTimeoutError extends EvaluationError {
  override readonly code = 'rule-timeout';
  public readonly steps: number;
  public readonly elapsedMs: number;

  constructor(message: string, steps: number, elapsedMs: number) {
    super(message, { steps, elapsedMs });
    this.steps = steps;
    this.elapsedMs = elapsedMs;
  }
}

export type CancellationReason = 'aborted' | 'budget-exceeded';

/**
 * The run was cancelled while an evaluation was in flight
 */
export class EvaluationCancelledError extends CodeprobeError {
  readonly recoverable = true;
  readonly code = 'cancelled';
  public readonly reason: CancellationReason;

  constructor(reason: CancellationReason) {
    super(reason === 'aborted' ? 'Analysis was cancelled' : 'Analysis time budget exceeded', { reason });
    this.reason = reason;
  }
}

/**
 * A structural query could not be parsed
 */
export class QuerySyntaxError extends CodeprobeError {
  readonly recoverable = true;
  readonly code = 'query-syntax';
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`, { offset });
    this.offset = offset;
  }
}

/**
 * A suggested fix could not be applied to the content it was computed for
 */
export class FixApplicationError extends CodeprobeError {
  readonly recoverable = true;
  readonly code = 'fix-conflict';
}

/**
 * The run as a whole is meaningless and was aborted
 */
export class FatalAnalysisError extends CodeprobeError {
  readonly recoverable = false;
  public readonly code: FatalErrorCode;

  constructor(code: FatalErrorCode, message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, context, cause);
    this.code = code;
  }
}

/**
 * Normalize an unknown thrown value into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
