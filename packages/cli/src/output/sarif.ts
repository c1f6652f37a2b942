/**
 * SARIF 2.1.0 output format.
 *
 * Severities map to SARIF levels (`notice` becomes `note`), fingerprints to
 * `partialFingerprints` and suggested fixes to `fixes`.
 */

import { VERSION, type AnalysisReport, type Severity, type SuggestedFix, type Violation, type ViolationLocation } from 'codeprobe-core';

export const SARIF_VERSION = '2.1.0';
export const SARIF_SCHEMA = 'https://json.schemastore.org/sarif-2.1.0.json';
export const FINGERPRINT_KEY = 'codeprobe/v1';

export type SarifLevel = 'error' | 'warning' | 'note';

interface SarifRegion {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

interface SarifArtifactLocation {
  uri: string;
}

interface SarifFix {
  description: { text: string };
  artifactChanges: Array<{
    artifactLocation: SarifArtifactLocation;
    replacements: Array<{ deletedRegion: SarifRegion; insertedContent: { text: string } }>;
  }>;
}

interface SarifResult {
  ruleId: string;
  ruleIndex: number;
  level: SarifLevel;
  message: { text: string };
  locations: Array<{ physicalLocation: { artifactLocation: SarifArtifactLocation; region: SarifRegion } }>;
  partialFingerprints: Record<string, string>;
  fixes?: SarifFix[];
}

interface SarifReportingDescriptor {
  id: string;
  defaultConfiguration: { level: SarifLevel };
}

interface SarifNotification {
  level: SarifLevel;
  message: { text: string };
  descriptor: { id: string };
  locations?: Array<{ physicalLocation: { artifactLocation: SarifArtifactLocation } }>;
}

export interface SarifLog {
  $schema: string;
  version: string;
  runs: Array<{
    tool: { driver: { name: string; version: string; rules: SarifReportingDescriptor[] } };
    results: SarifResult[];
    invocations: Array<{ executionSuccessful: boolean; toolExecutionNotifications: SarifNotification[] }>;
  }>;
}

export function toSarifLevel(severity: Severity): SarifLevel {
  return severity === 'notice' ? 'note' : severity;
}

function toRegion(location: ViolationLocation): SarifRegion {
  return {
    startLine: location.line,
    startColumn: location.column,
    endLine: location.endLine,
    endColumn: location.endColumn,
  };
}

function toSarifFix(uri: string, fix: SuggestedFix): SarifFix {
  return {
    description: { text: fix.description },
    artifactChanges: [
      {
        artifactLocation: { uri },
        replacements: fix.edits.map((edit) => ({
          deletedRegion: toRegion(edit.location),
          insertedContent: { text: edit.content },
        })),
      },
    ],
  };
}

function toSarifResult(violation: Violation, ruleIndex: number): SarifResult {
  const uri = violation.file;
  const result: SarifResult = {
    ruleId: violation.ruleId,
    ruleIndex,
    level: toSarifLevel(violation.severity),
    message: { text: violation.message },
    locations: [{ physicalLocation: { artifactLocation: { uri }, region: toRegion(violation.location) } }],
    partialFingerprints: { [FINGERPRINT_KEY]: violation.fingerprint },
  };
  if (violation.fix) {
    result.fixes = [toSarifFix(uri, violation.fix)];
  }
  return result;
}

export function toSarifLog(report: AnalysisReport): SarifLog {
  const rules: SarifReportingDescriptor[] = [];
  const ruleIndex = new Map<string, number>();
  for (const violation of report.violations) {
    if (!ruleIndex.has(violation.ruleId)) {
      ruleIndex.set(violation.ruleId, rules.length);
      rules.push({ id: violation.ruleId, defaultConfiguration: { level: toSarifLevel(violation.severity) } });
    }
  }

  const notifications: SarifNotification[] = report.errors.map((error) => ({
    level: error.kind === 'read' || error.kind === 'parse' ? 'error' : 'warning',
    message: { text: error.ruleId ? `${error.ruleId}: ${error.message}` : error.message },
    descriptor: { id: error.code },
    locations: [{ physicalLocation: { artifactLocation: { uri: error.file } } }],
  }));
  for (const error of report.loadErrors) {
    notifications.push({
      level: 'error',
      message: { text: `${error.source}: ${error.message}` },
      descriptor: { id: error.code },
    });
  }

  return {
    $schema: SARIF_SCHEMA,
    version: SARIF_VERSION,
    runs: [
      {
        tool: { driver: { name: 'codeprobe', version: VERSION, rules } },
        results: report.violations.map((violation) => toSarifResult(violation, ruleIndex.get(violation.ruleId) ?? 0)),
        invocations: [{ executionSuccessful: !report.cancelled, toolExecutionNotifications: notifications }],
      },
    ],
  };
}

export function formatSarif(report: AnalysisReport): string {
  return JSON.stringify(toSarifLog(report), null, 2) + '\n';
}
