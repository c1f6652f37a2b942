/**
 * analyze() - load rulesets, find files and run the orchestrator
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { FatalAnalysisError, errorMessage } from '../errors.js';
import { silentLogger } from '../logging/logger.js';
import { getParserRegistry } from '../parsers/parser-registry.js';
import { RulesetLoader, parseRulesetSource, type RulesetSource } from '../rules/ruleset-loader.js';
import { AnalysisOrchestrator, selectRules } from './orchestrator.js';
import { discoverFiles, matchesAny, toWorkspacePath } from './source-files.js';

import type { AnalysisInput, AnalysisReport, AnalyzeOptions } from './types.js';

/**
 * Analyze a workspace.
 *
 * @param fileList - Files to analyze, relative to the workspace root; every
 *   supported file under the root when undefined
 * @param rulesetSources - Sources as objects or as command line strings
 * @throws FatalAnalysisError when the workspace cannot be read, no rule
 *   loads or no file is left to analyze
 */
export async function analyze(
  workspaceRoot: string,
  fileList: readonly string[] | undefined,
  rulesetSources: ReadonlyArray<RulesetSource | string>,
  options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
  const root = path.resolve(workspaceRoot);
  const logger = options.logger ?? silentLogger;
  const parsers = options.parsers ?? getParserRegistry();

  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      throw new FatalAnalysisError('workspace-unreadable', `${root} is not a directory`, { workspaceRoot: root });
    }
  } catch (error) {
    if (error instanceof FatalAnalysisError) throw error;
    throw new FatalAnalysisError('workspace-unreadable', `Cannot read workspace ${root}: ${errorMessage(error)}`, { workspaceRoot: root }, error);
  }

  const sources = rulesetSources.map((source) => (typeof source === 'string' ? parseRulesetSource(source) : source));
  const loader = new RulesetLoader({
    baseDir: root,
    logger,
    ...(options.registry ? { registry: options.registry } : {}),
  });
  const { rules, errors: loadErrors } = await loader.loadAll(sources);
  if (selectRules(rules, options).length === 0) {
    throw new FatalAnalysisError('no-rules', 'No rule could be loaded from the given rulesets', {
      sources: sources.length,
      loadErrors: loadErrors.length,
    });
  }

  const relativeFiles = fileList
    ? fileList.map((file) => toWorkspacePath(root, file)).filter((file) => !matchesAny(file, options.ignore ?? []))
    : await discoverFiles(root, parsers, {
        ...(options.include ? { include: options.include } : {}),
        ...(options.ignore ? { ignore: options.ignore } : {}),
      });
  if (relativeFiles.length === 0) {
    throw new FatalAnalysisError('no-files', `No files to analyze under ${root}`, { workspaceRoot: root });
  }

  const inputs: AnalysisInput[] = relativeFiles.map((file) => ({ path: file, absolutePath: path.join(root, file) }));
  const orchestrator = new AnalysisOrchestrator({ logger, ...(options.parsers ? { parsers: options.parsers } : {}) });
  return orchestrator.run(inputs, rules, { ...options, logger }, loadErrors);
}
