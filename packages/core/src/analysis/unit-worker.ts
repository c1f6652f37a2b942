/**
 * Unit worker - worker thread entry that analyzes one file per task
 *
 * Progress goes out on the task's port, so the owning thread knows which
 * rule is running and keeps the finished evaluations if it has to
 * terminate this thread.
 */

import { PatternMatcher } from '../matcher/pattern-matcher.js';
import { getParserRegistry } from '../parsers/parser-registry.js';
import { runFileUnit, type FileUnitResult, type UnitProgress, type UnitTask } from './file-unit.js';

const matcher = new PatternMatcher();

export default async function analyzeUnit(task: UnitTask): Promise<FileUnitResult> {
  const { port } = task;
  const post = (message: UnitProgress): void => port.postMessage(message);

  try {
    return await runFileUnit(task.input, task.rules, task.settings, {
      parsers: getParserRegistry(),
      matcher,
      cancelFlag: task.cancelFlag,
      onRuleStart: (ruleId, index) => post({ type: 'rule-start', ruleId, index }),
      onRuleEnd: (evaluation) => post({ type: 'rule-end', evaluation }),
    });
  } finally {
    port.close();
  }
}
