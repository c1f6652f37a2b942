/**
 * JSON output format - the versioned report documents.
 */

import {
  toReportDocument,
  toTestReportDocument,
  type AnalysisReport,
  type LoadError,
  type RuleDefinition,
  type RulesetTestReport,
} from 'codeprobe-core';

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}

export function formatReportJson(report: AnalysisReport): string {
  return formatJson(toReportDocument(report));
}

export function formatTestJson(report: RulesetTestReport, loadErrors: readonly LoadError[] = []): string {
  return formatJson({ ...toTestReportDocument(report), loadErrors: loadErrors.map(loadErrorDocument) });
}

export function formatRulesJson(rules: readonly RuleDefinition[], loadErrors: readonly LoadError[] = []): string {
  return formatJson({
    rules: rules.map((rule) => ({
      id: rule.id,
      name: rule.name ?? null,
      description: rule.description ?? null,
      severity: rule.severity,
      category: rule.category ?? null,
      languages: [...rule.languages],
      tags: rule.tags ? [...rule.tags] : [],
      fixtures: rule.tests?.length ?? 0,
      checksum: rule.checksum ?? null,
    })),
    loadErrors: loadErrors.map(loadErrorDocument),
  });
}

function loadErrorDocument(error: LoadError): Record<string, unknown> {
  return {
    source: error.source,
    position: error.position,
    ruleId: error.ruleId ?? null,
    code: error.code,
    message: error.message,
    issues: [...error.issues],
  };
}
