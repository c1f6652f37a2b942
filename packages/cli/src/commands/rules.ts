/**
 * codeprobe rules - list the rules of rulesets and report load errors.
 *
 * Exit codes: 0 = every rule loaded, 1 = load errors, 2 = error.
 */

import { RulesetLoader, parseRulesetSource, type LoadError, type RuleDefinition } from 'codeprobe-core';

import { EXIT_ERROR, EXIT_FAILURE, EXIT_OK, loadContext, registryOptions, rulesetSources, type CommandContext } from '../context.js';
import { formatRulesJson, formatRulesTable } from '../output/index.js';
import { status } from '../ui/spinner.js';

import type { Command } from 'commander';

export interface LoadedRules {
  rules: RuleDefinition[];
  errors: LoadError[];
}

/**
 * Load the given sources, or the configured ones, relative to the context root
 */
export async function loadRules(context: CommandContext, cliSources: readonly string[] | undefined): Promise<LoadedRules | null> {
  const sources = rulesetSources(cliSources, context.config);
  if (sources.length === 0) {
    status.error('No rulesets given. Pass sources or set "rulesets" in .codeprobe/config.json');
    return null;
  }

  const registry = registryOptions(context.config);
  const loader = new RulesetLoader({
    baseDir: context.rootDir,
    logger: context.logger,
    ...(registry ? { registry } : {}),
  });
  const { rules, errors } = await loader.loadAll(sources.map(parseRulesetSource));
  return { rules, errors };
}

export interface RulesCommandOptions {
  dir?: string;
  json?: boolean;
  debug?: boolean;
}

export async function runRules(sources: string[], options: RulesCommandOptions): Promise<number> {
  let context: CommandContext;
  try {
    context = await loadContext(options.dir, options.debug);
  } catch (error) {
    status.error(error instanceof Error ? error.message : String(error));
    return EXIT_ERROR;
  }

  const loaded = await loadRules(context, sources);
  if (!loaded) return EXIT_ERROR;

  process.stdout.write(
    options.json ? formatRulesJson(loaded.rules, loaded.errors) : formatRulesTable(loaded.rules, loaded.errors)
  );
  return loaded.errors.length > 0 ? EXIT_FAILURE : EXIT_OK;
}

export function registerRulesCommand(program: Command): void {
  program
    .command('rules [sources...]')
    .description('List the rules of rulesets and report load errors')
    .option('-d, --dir <directory>', 'Project directory holding .codeprobe/config.json')
    .option('--json', 'Print the list as JSON')
    .option('--debug', 'Enable debug logging')
    .action(async (sources: string[], opts: RulesCommandOptions) => {
      process.exitCode = await runRules(sources, opts);
    });
}
