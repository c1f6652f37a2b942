/**
 * Ruleset Loader - resolves ruleset sources into validated rules
 *
 * A source is a JSON or YAML file, a directory of such files, an inline
 * document, or a named ruleset on an HTTP registry. Per-rule problems are
 * collected as LoadErrors next to the rules that did load; a source that
 * cannot be read or decoded yields a single LoadError and no rules.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { RuleLoadError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { RegistryClient, type RegistryOptions } from './registry-client.js';
import { validateRules, type RuleValidationIssue } from './rule-validator.js';

import type { RuleDefinition } from './types.js';

// ============================================
// Types
// ============================================

export type RulesetSource =
  | { kind: 'file'; path: string }
  | { kind: 'directory'; path: string }
  | { kind: 'inline'; name: string; document: unknown }
  | { kind: 'registry'; name: string };

/**
 * A rule, or a whole source, that could not be loaded
 */
export interface LoadError {
  /** Display form of the source, e.g. a file path or `registry:python-security` */
  source: string;
  /** Zero-based index of the rule within its ruleset; null when the whole source failed */
  position: number | null;
  ruleId?: string;
  code: string;
  message: string;
  issues: RuleValidationIssue[];
}

/**
 * Where a loaded rule was declared
 */
export interface RuleOrigin {
  source: string;
  /** Zero-based index of the rule within its ruleset document */
  position: number;
}

export interface RulesetLoadResult {
  source: string;
  name: string;
  description?: string;
  rules: RuleDefinition[];
  /** Parallel to `rules` */
  origins: RuleOrigin[];
  errors: LoadError[];
}

export interface RulesetLoaderOptions {
  /** Directory relative file and directory sources resolve against */
  baseDir?: string;
  /** Registry for `registry` sources */
  registry?: RegistryClient | RegistryOptions;
  logger?: Logger;
}

/** Extensions read from directory sources */
export const RULESET_EXTENSIONS = ['.json', '.yml', '.yaml'];

const REGISTRY_PREFIX = 'registry:';

// ============================================
// Source Helpers
// ============================================

/**
 * Interpret a command line or config entry as a ruleset source.
 * `registry:<name>` names a registry ruleset; anything else is a path,
 * a directory when it ends with a separator or has no ruleset extension.
 */
export function parseRulesetSource(text: string): RulesetSource {
  const trimmed = text.trim();
  if (trimmed.startsWith(REGISTRY_PREFIX)) {
    return { kind: 'registry', name: trimmed.slice(REGISTRY_PREFIX.length) };
  }
  const extension = path.extname(trimmed).toLowerCase();
  if (/[\\/]$/.test(trimmed) || !RULESET_EXTENSIONS.includes(extension)) {
    return { kind: 'directory', path: trimmed };
  }
  return { kind: 'file', path: trimmed };
}

export function describeSource(source: RulesetSource): string {
  switch (source.kind) {
    case 'file':
    case 'directory':
      return source.path;
    case 'inline':
      return `inline:${source.name}`;
    case 'registry':
      return `${REGISTRY_PREFIX}${source.name}`;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode JSON or YAML text; the extension picks the decoder
 */
export function decodeRulesetText(text: string, fileName: string): unknown {
  const extension = path.extname(fileName).toLowerCase();
  return extension === '.json' ? JSON.parse(text) : parseYaml(text);
}

function sourceFailure(source: string, name: string, code: string, message: string): RulesetLoadResult {
  return { source, name, rules: [], origins: [], errors: [{ source, position: null, code, message, issues: [] }] };
}

// ============================================
// Ruleset Loader
// ============================================

export class RulesetLoader {
  private readonly baseDir: string;
  private readonly logger: Logger;
  private readonly registry: RegistryClient | null;

  constructor(options: RulesetLoaderOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.logger = options.logger ?? silentLogger;
    const registry = options.registry;
    this.registry = registry === undefined ? null : registry instanceof RegistryClient ? registry : new RegistryClient(registry);
  }

  async load(source: RulesetSource): Promise<RulesetLoadResult> {
    const display = describeSource(source);
    this.logger.debug(`Loading ruleset ${display}`);

    let result: RulesetLoadResult;
    switch (source.kind) {
      case 'inline':
        result = this.fromDocument(display, source.name, source.document);
        break;
      case 'file':
        result = await this.loadFile(this.resolve(source.path));
        break;
      case 'directory':
        result = await this.loadDirectory(this.resolve(source.path));
        break;
      case 'registry':
        result = await this.loadRegistry(source.name);
        break;
    }

    for (const error of result.errors) {
      const where = error.position === null ? '' : ` (rule #${error.position}${error.ruleId ? ` "${error.ruleId}"` : ''})`;
      this.logger.warn(`${error.source}${where}: ${error.message}`);
    }
    this.logger.debug(`Loaded ${result.rules.length} rule(s) from ${display}`);
    return result;
  }

  /**
   * Load several sources into one rule list; ids must be unique across them
   */
  async loadAll(sources: readonly RulesetSource[]): Promise<{ rules: RuleDefinition[]; errors: LoadError[]; rulesets: RulesetLoadResult[] }> {
    const rulesets: RulesetLoadResult[] = [];
    for (const source of sources) {
      rulesets.push(await this.load(source));
    }
    const { rules, errors } = mergeRulesets(rulesets);
    return { rules, errors, rulesets };
  }

  private resolve(target: string): string {
    return path.resolve(this.baseDir, target);
  }

  private async loadFile(filePath: string): Promise<RulesetLoadResult> {
    const name = path.basename(filePath, path.extname(filePath));
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      return sourceFailure(filePath, name, 'read-failed', `Failed to read ruleset: ${errorMessage(error)}`);
    }

    let document: unknown;
    try {
      document = decodeRulesetText(text, filePath);
    } catch (error) {
      return sourceFailure(filePath, name, 'parse-failed', `Failed to parse ruleset: ${errorMessage(error)}`);
    }
    return this.fromDocument(filePath, name, document);
  }

  private async loadDirectory(dirPath: string): Promise<RulesetLoadResult> {
    const name = path.basename(dirPath);
    let entries: string[];
    try {
      const dirents = await fs.readdir(dirPath, { withFileTypes: true });
      entries = dirents
        .filter((entry) => entry.isFile() && RULESET_EXTENSIONS.includes(path.extname(entry.name).toLowerCase()))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      return sourceFailure(dirPath, name, 'read-failed', `Failed to read ruleset directory: ${errorMessage(error)}`);
    }

    const results: RulesetLoadResult[] = [];
    for (const entry of entries) {
      results.push(await this.loadFile(path.join(dirPath, entry)));
    }
    const { rules, origins, errors } = mergeRulesets(results);
    return { source: dirPath, name, rules, origins, errors };
  }

  private async loadRegistry(name: string): Promise<RulesetLoadResult> {
    const display = `${REGISTRY_PREFIX}${name}`;
    if (!this.registry) {
      return sourceFailure(display, name, 'registry-not-configured', 'No registry URL is configured');
    }
    try {
      const document = await this.registry.fetchRuleset(name);
      return this.fromDocument(display, name, document);
    } catch (error) {
      const code = error instanceof RuleLoadError ? error.code : 'registry-error';
      return sourceFailure(display, name, code, errorMessage(error));
    }
  }

  /**
   * Validate a decoded document: `{ name?, description?, rules: [...] }` or a bare rule array
   */
  private fromDocument(source: string, fallbackName: string, document: unknown): RulesetLoadResult {
    let entries: unknown;
    let name = fallbackName;
    let description: string | undefined;

    if (Array.isArray(document)) {
      entries = document;
    } else if (isObject(document)) {
      entries = document['rules'];
      const declaredName = document['name'];
      const declaredDescription = document['description'];
      if (typeof declaredName === 'string' && declaredName.length > 0) name = declaredName;
      if (typeof declaredDescription === 'string') description = declaredDescription;
    }

    if (!Array.isArray(entries)) {
      return sourceFailure(source, name, 'invalid-ruleset', 'A ruleset must be a list of rules or an object with a rules list');
    }

    const { rules, positions, failures } = validateRules(entries);
    const errors: LoadError[] = failures.map((failure) => {
      const first = failure.issues[0];
      const error: LoadError = {
        source,
        position: failure.position,
        code: first?.code ?? 'invalid-rule',
        message: failure.issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; '),
        issues: failure.issues,
      };
      if (failure.ruleId !== undefined) error.ruleId = failure.ruleId;
      return error;
    });

    const origins = positions.map((position) => ({ source, position }));
    const result: RulesetLoadResult = { source, name, rules, origins, errors };
    if (description !== undefined) result.description = description;
    return result;
  }
}

/**
 * Concatenate rulesets, reporting ids that appear in more than one
 */
export function mergeRulesets(results: readonly RulesetLoadResult[]): {
  rules: RuleDefinition[];
  origins: RuleOrigin[];
  errors: LoadError[];
} {
  const rules: RuleDefinition[] = [];
  const origins: RuleOrigin[] = [];
  const errors: LoadError[] = [];
  const owners = new Map<string, string>();

  for (const result of results) {
    errors.push(...result.errors);
    result.rules.forEach((rule, index) => {
      const origin = result.origins[index] ?? { source: result.source, position: index };
      const owner = owners.get(rule.id);
      if (owner !== undefined) {
        errors.push({
          source: origin.source,
          position: origin.position,
          ruleId: rule.id,
          code: 'duplicate-id',
          message: `Rule id "${rule.id}" is already defined by ${owner}`,
          issues: [],
        });
        return;
      }
      owners.set(rule.id, origin.source);
      rules.push(rule);
      origins.push(origin);
    });
  }
  return { rules, origins, errors };
}

/**
 * Load one ruleset source with default options
 */
export function loadRuleset(source: RulesetSource, options: RulesetLoaderOptions = {}): Promise<RulesetLoadResult> {
  return new RulesetLoader(options).load(source);
}
