/**
 * codeprobe-cli - command line interface of the codeprobe analyzer
 */

import { Command } from 'commander';
import { VERSION } from 'codeprobe-core';

import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerRulesCommand } from './commands/rules.js';
import { registerTestCommand } from './commands/test.js';

export function createProgram(): Command {
  const program = new Command('codeprobe')
    .description('Multi-language static analysis with declarative rules')
    .version(VERSION);

  registerAnalyzeCommand(program);
  registerTestCommand(program);
  registerRulesCommand(program);

  return program;
}

export { exitCodeFor, runAnalyze, buildAnalyzeOptions, type AnalyzeCommandOptions, type FailOn } from './commands/analyze.js';
export { runTest, type TestCommandOptions } from './commands/test.js';
export { runRules, loadRules, type RulesCommandOptions } from './commands/rules.js';
export { readBaseline, writeBaseline, createBaseline, BaselineError, type BaselineDocument } from './baseline.js';
export * from './output/index.js';
