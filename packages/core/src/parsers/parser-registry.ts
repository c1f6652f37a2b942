/**
 * Parser Registry - language detection and adapter dispatch
 *
 * The only place that branches on language identity. Everything downstream
 * works on the SyntaxTree the selected adapter returns.
 */

import { ParseError } from '../errors.js';
import { TreeSitterParser } from './tree-sitter/tree-sitter-parser.js';
import { TypeScriptParser } from './typescript-parser.js';

import type { BaseParser } from './base-parser.js';
import type { Language, ParseOptions, ParseOutcome } from './types.js';

export interface AdapterStatus {
  language: Language;
  extensions: string[];
  available: boolean;
  reason: string | null;
}

export class ParserRegistry {
  private readonly parsers = new Map<Language, BaseParser>();

  constructor(parsers: BaseParser[] = ParserRegistry.defaultParsers()) {
    for (const parser of parsers) {
      this.register(parser);
    }
  }

  static defaultParsers(): BaseParser[] {
    return [
      new TypeScriptParser('typescript'),
      new TypeScriptParser('javascript'),
      new TreeSitterParser('python'),
      new TreeSitterParser('java'),
      new TreeSitterParser('go'),
    ];
  }

  /**
   * Register an adapter, replacing any adapter for the same language
   */
  register(parser: BaseParser): void {
    this.parsers.set(parser.language, parser);
  }

  get(language: Language): BaseParser | undefined {
    return this.parsers.get(language);
  }

  /**
   * Language of a file, from its extension
   */
  detectLanguage(filePath: string): Language | null {
    const extension = getExtension(filePath);
    if (!extension) {
      return null;
    }
    for (const parser of this.parsers.values()) {
      if (parser.canHandle(extension)) {
        return parser.language;
      }
    }
    return null;
  }

  parse(content: string, language: Language, options: ParseOptions = {}): ParseOutcome {
    const parser = this.parsers.get(language);
    if (!parser) {
      return {
        ok: false,
        error: new ParseError(
          'parser-unavailable',
          options.filePath ?? '<unknown>',
          `No parser registered for language '${language}'`
        ),
      };
    }
    return parser.parse(content, options);
  }

  getStatus(): AdapterStatus[] {
    return [...this.parsers.values()].map((parser) => ({
      language: parser.language,
      extensions: [...parser.extensions],
      available: parser.isAvailable(),
      reason: parser.getUnavailableReason(),
    }));
  }
}

function getExtension(filePath: string): string {
  const base = filePath.slice(filePath.replace(/\\/g, '/').lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  return dot <= 0 ? '' : base.slice(dot).toLowerCase();
}

let defaultRegistry: ParserRegistry | null = null;

/**
 * Process-wide registry with the built-in adapters
 */
export function getParserRegistry(): ParserRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ParserRegistry();
  }
  return defaultRegistry;
}

/**
 * Parse content with the built-in adapter for a language
 */
export function parse(content: string, language: Language, options: ParseOptions = {}): ParseOutcome {
  return getParserRegistry().parse(content, language, options);
}
