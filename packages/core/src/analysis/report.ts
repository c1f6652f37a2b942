/**
 * Report documents - the serialized form of an AnalysisReport
 *
 * Every field is present: absent values are null, absent lists are empty.
 */

import type { AnalysisReport, AnalysisSummary, RuleStatistics } from './types.js';
import type { CancellationReason } from '../errors.js';
import type { RuleValidationIssue } from '../rules/rule-validator.js';
import type { SuggestedFix, Violation } from '../rules/types.js';

export const REPORT_SCHEMA_VERSION = '1.0';

export interface ViolationDocument extends Omit<Violation, 'fix' | 'category'> {
  category: string | null;
  fix: SuggestedFix | null;
}

export interface AnalysisErrorDocument {
  kind: string;
  file: string;
  ruleId: string | null;
  code: string;
  message: string;
}

export interface LoadErrorDocument {
  source: string;
  position: number | null;
  ruleId: string | null;
  code: string;
  message: string;
  issues: RuleValidationIssue[];
}

export interface ReportDocument {
  schemaVersion: string;
  cancelled: boolean;
  cancellationReason: CancellationReason | null;
  summary: AnalysisSummary;
  violations: ViolationDocument[];
  errors: AnalysisErrorDocument[];
  loadErrors: LoadErrorDocument[];
  statistics: RuleStatistics[];
}

export function toViolationDocument(violation: Violation): ViolationDocument {
  return {
    ruleId: violation.ruleId,
    file: violation.file,
    language: violation.language,
    severity: violation.severity,
    category: violation.category ?? null,
    message: violation.message,
    location: { ...violation.location },
    fix: violation.fix ?? null,
    fingerprint: violation.fingerprint,
  };
}

export function toReportDocument(report: AnalysisReport): ReportDocument {
  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    cancelled: report.cancelled,
    cancellationReason: report.cancellationReason ?? null,
    summary: { ...report.summary, bySeverity: { ...report.summary.bySeverity } },
    violations: report.violations.map(toViolationDocument),
    errors: report.errors.map((error) => ({
      kind: error.kind,
      file: error.file,
      ruleId: error.ruleId ?? null,
      code: error.code,
      message: error.message,
    })),
    loadErrors: report.loadErrors.map((error) => ({
      source: error.source,
      position: error.position,
      ruleId: error.ruleId ?? null,
      code: error.code,
      message: error.message,
      issues: [...error.issues],
    })),
    statistics: report.statistics ? [...report.statistics] : [],
  };
}
