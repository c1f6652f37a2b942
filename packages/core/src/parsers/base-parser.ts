/**
 * Base Parser - Abstract syntax adapter
 *
 * Every language adapter extends this class and produces the same
 * SyntaxTree shape, so the matcher and orchestrator never branch on the
 * language beyond the initial dispatch.
 */

import { ParseError, errorMessage } from '../errors.js';

import type { Language, ParseOptions, ParseOutcome, SyntaxTree } from './types.js';

/**
 * Abstract base class for all language adapters.
 *
 * Subclasses implement `buildTree`; `parse` wraps it with the checks and
 * failure handling shared by every language.
 */
export abstract class BaseParser {
  /**
   * Language produced by this adapter
   */
  abstract readonly language: Language;

  /**
   * File extensions this adapter handles
   */
  abstract readonly extensions: string[];

  /**
   * Whether the underlying parser can be loaded in this process
   */
  isAvailable(): boolean {
    return true;
  }

  /**
   * Reason the adapter is unavailable, if any
   */
  getUnavailableReason(): string | null {
    return null;
  }

  /**
   * Parse source text into a syntax tree.
   *
   * Recovered syntax errors stay in the tree unless `syntaxErrors` is
   * `reject`. Encoding problems, a missing grammar and parser crashes are
   * returned as a ParseError rather than thrown.
   */
  parse(source: string, options: ParseOptions = {}): ParseOutcome {
    const filePath = options.filePath ?? `anonymous${this.extensions[0] ?? ''}`;

    const encodingProblem = this.findEncodingProblem(source);
    if (encodingProblem !== null) {
      return this.failure(new ParseError('unsupported-encoding', filePath, encodingProblem));
    }

    if (!this.isAvailable()) {
      const reason = this.getUnavailableReason() ?? 'unknown reason';
      return this.failure(
        new ParseError('parser-unavailable', filePath, `No ${this.language} parser available: ${reason}`)
      );
    }

    let tree: SyntaxTree;
    try {
      tree = this.buildTree(source, filePath);
    } catch (error) {
      return this.failure(
        new ParseError('parser-crash', filePath, `${this.language} parser failed: ${errorMessage(error)}`, error)
      );
    }

    const firstDiagnostic = tree.diagnostics[0];
    if (options.syntaxErrors === 'reject' && firstDiagnostic) {
      const { row, column } = firstDiagnostic.span.startPosition;
      return this.failure(
        new ParseError(
          'syntax-error',
          filePath,
          `Syntax error at ${row + 1}:${column + 1}: ${firstDiagnostic.message}`
        )
      );
    }

    return { ok: true, tree };
  }

  /**
   * Check if this adapter handles the given file extension.
   *
   * @param extension - File extension (with or without leading dot)
   */
  canHandle(extension: string): boolean {
    const normalizedExt = extension.startsWith('.') ? extension : `.${extension}`;
    return this.extensions.includes(normalizedExt.toLowerCase());
  }

  /**
   * Build the normalized tree. May throw on unrecoverable parser failures.
   */
  protected abstract buildTree(source: string, filePath: string): SyntaxTree;

  private findEncodingProblem(source: string): string | null {
    const nul = source.indexOf('\u0000');
    if (nul !== -1) {
      return `Content contains a NUL byte at offset ${nul}; binary files are not analyzed`;
    }
    return null;
  }

  private failure(error: ParseError): ParseOutcome {
    return { ok: false, error };
  }
}
