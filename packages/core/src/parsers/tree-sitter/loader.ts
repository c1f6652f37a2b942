/**
 * Tree-sitter Loader
 *
 * Loads the `tree-sitter` binding and the grammar packages with graceful
 * fallback. Both are optional native dependencies: when one cannot be
 * loaded the language is reported as unavailable instead of failing.
 */

import { createRequire } from 'node:module';

import type { TreeSitterLanguage, TreeSitterParser, TreeSitterParserConstructor } from './types.js';

const require = createRequire(import.meta.url);

/** Languages served by tree-sitter grammars */
export type TreeSitterLanguageId = 'python' | 'java' | 'go';

export const GRAMMAR_PACKAGES: Readonly<Record<TreeSitterLanguageId, string>> = {
  python: 'tree-sitter-python',
  java: 'tree-sitter-java',
  go: 'tree-sitter-go',
};

// ============================================
// Module State
// ============================================

interface GrammarState {
  available: boolean;
  language: TreeSitterLanguage | null;
  error: string | null;
}

let cachedTreeSitter: TreeSitterParserConstructor | null = null;
let treeSitterError: string | null = null;
const grammars = new Map<TreeSitterLanguageId, GrammarState>();

// ============================================
// Public API
// ============================================

/**
 * Check if the binding and the grammar for a language can be loaded.
 * The first call attempts the load; the result is cached.
 */
export function isTreeSitterAvailable(language: TreeSitterLanguageId): boolean {
  return loadGrammar(language).available;
}

/**
 * Reason the grammar could not be loaded, or null when it is available
 */
export function getTreeSitterLoadingError(language: TreeSitterLanguageId): string | null {
  return loadGrammar(language).error;
}

/**
 * Create a parser configured for a language.
 *
 * @throws Error if the binding or the grammar is not available
 */
export function createTreeSitterParser(language: TreeSitterLanguageId): TreeSitterParser {
  const state = loadGrammar(language);
  if (!state.available || !state.language || !cachedTreeSitter) {
    throw new Error(`${GRAMMAR_PACKAGES[language]} is not available: ${state.error ?? 'unknown error'}`);
  }
  const parser = new cachedTreeSitter();
  parser.setLanguage(state.language);
  return parser;
}

// ============================================
// Internal Functions
// ============================================

function isParserConstructor(value: unknown): value is TreeSitterParserConstructor {
  return typeof value === 'function';
}

function isGrammar(value: unknown): value is TreeSitterLanguage {
  return typeof value === 'object' && value !== null;
}

function loadBinding(): TreeSitterParserConstructor | null {
  if (cachedTreeSitter || treeSitterError) {
    return cachedTreeSitter;
  }
  try {
    const loaded: unknown = require('tree-sitter');
    if (!isParserConstructor(loaded)) {
      throw new Error('module does not export a Parser constructor');
    }
    cachedTreeSitter = loaded;
    logDebug('tree-sitter loaded');
  } catch (error) {
    treeSitterError = `Failed to load tree-sitter: ${error instanceof Error ? error.message : 'unknown error'}`;
    logDebug(treeSitterError);
  }
  return cachedTreeSitter;
}

function loadGrammar(language: TreeSitterLanguageId): GrammarState {
  const cached = grammars.get(language);
  if (cached) {
    return cached;
  }

  let state: GrammarState;
  if (!loadBinding()) {
    state = { available: false, language: null, error: treeSitterError };
  } else {
    const packageName = GRAMMAR_PACKAGES[language];
    try {
      const loaded: unknown = require(packageName);
      if (!isGrammar(loaded)) {
        throw new Error('module does not export a grammar');
      }
      state = { available: true, language: loaded, error: null };
      logDebug(`${packageName} loaded`);
    } catch (error) {
      const message = `Failed to load ${packageName}: ${error instanceof Error ? error.message : 'unknown error'}`;
      state = { available: false, language: null, error: message };
      logDebug(message);
    }
  }

  grammars.set(language, state);
  return state;
}

function logDebug(message: string): void {
  if (process.env['CODEPROBE_PARSER_DEBUG'] === 'true') {
    console.debug(`[tree-sitter-loader] ${message}`);
  }
}
