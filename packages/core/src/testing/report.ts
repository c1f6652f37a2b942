/**
 * Serialized form of a rule test run
 */

import { REPORT_SCHEMA_VERSION, toViolationDocument, type AnalysisErrorDocument, type ViolationDocument } from '../analysis/report.js';

import type { RulesetTestReport } from './types.js';
import type { ExpectedViolation } from '../rules/types.js';

export interface ExpectedViolationDocument {
  line: number;
  column: number | null;
  endLine: number | null;
  endColumn: number | null;
  ruleId: string | null;
}

export interface FixtureResultDocument {
  name: string;
  filename: string;
  passed: boolean;
  expected: ExpectedViolationDocument[];
  actual: ViolationDocument[];
  missing: ExpectedViolationDocument[];
  unexpected: ViolationDocument[];
  errors: AnalysisErrorDocument[];
}

export interface TestReportDocument {
  schemaVersion: string;
  passed: boolean;
  summary: RulesetTestReport['summary'];
  rules: Array<{ ruleId: string; passed: boolean; fixtures: FixtureResultDocument[] }>;
}

function expectedDocument(entry: ExpectedViolation): ExpectedViolationDocument {
  return {
    line: entry.line,
    column: entry.column ?? null,
    endLine: entry.endLine ?? null,
    endColumn: entry.endColumn ?? null,
    ruleId: entry.ruleId ?? null,
  };
}

export function toTestReportDocument(report: RulesetTestReport): TestReportDocument {
  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    passed: report.passed,
    summary: { ...report.summary },
    rules: report.rules.map((rule) => ({
      ruleId: rule.ruleId,
      passed: rule.passed,
      fixtures: rule.fixtures.map((fixture) => ({
        name: fixture.name,
        filename: fixture.filename,
        passed: fixture.passed,
        expected: fixture.expected.map(expectedDocument),
        actual: fixture.actual.map(toViolationDocument),
        missing: fixture.missing.map(expectedDocument),
        unexpected: fixture.unexpected.map(toViolationDocument),
        errors: fixture.errors.map((error) => ({
          kind: error.kind,
          file: error.file,
          ruleId: error.ruleId ?? null,
          code: error.code,
          message: error.message,
        })),
      })),
    })),
  };
}
