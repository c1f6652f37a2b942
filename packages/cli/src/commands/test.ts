/**
 * codeprobe test - run the fixtures embedded in rules.
 *
 * Exit codes: 0 = all fixtures pass, 1 = failures or load errors, 2 = error.
 */

import { Option, type Command } from 'commander';
import { testRuleset } from 'codeprobe-core';

import { EXIT_ERROR, EXIT_FAILURE, EXIT_OK, loadContext, type CommandContext } from '../context.js';
import { formatTestJson, formatTestTable } from '../output/index.js';
import { createSpinner, status, withSpinner } from '../ui/spinner.js';
import { loadRules } from './rules.js';

export interface TestCommandOptions {
  dir?: string;
  format: 'table' | 'json';
  rule?: string[];
  debug?: boolean;
}

export async function runTest(sources: string[], options: TestCommandOptions): Promise<number> {
  let context: CommandContext;
  try {
    context = await loadContext(options.dir, options.debug);
  } catch (error) {
    status.error(error instanceof Error ? error.message : String(error));
    return EXIT_ERROR;
  }

  const loaded = await loadRules(context, sources);
  if (!loaded) return EXIT_ERROR;

  const selected = options.rule && options.rule.length > 0 ? new Set(options.rule) : null;
  const rules = selected ? loaded.rules.filter((rule) => selected.has(rule.id)) : loaded.rules;
  if (rules.length === 0) {
    status.error('No rule to test');
    return EXIT_ERROR;
  }

  const spinner = options.format === 'table' ? createSpinner('Running rule fixtures...') : null;
  const report = await withSpinner(
    spinner,
    () => testRuleset(rules),
    (result) => `Ran ${result.summary.fixtures} fixtures`
  );

  process.stdout.write(
    options.format === 'json' ? formatTestJson(report, loaded.errors) : formatTestTable(report, loaded.errors)
  );
  return report.passed && loaded.errors.length === 0 ? EXIT_OK : EXIT_FAILURE;
}

export function registerTestCommand(program: Command): void {
  program
    .command('test [sources...]')
    .description('Run the fixtures embedded in rules')
    .option('-d, --dir <directory>', 'Project directory holding .codeprobe/config.json')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['table', 'json']).default('table'))
    .option('--rule <ids...>', 'Only test these rules')
    .option('--debug', 'Enable debug logging')
    .action(async (sources: string[], opts: TestCommandOptions) => {
      process.exitCode = await runTest(sources, opts);
    });
}
