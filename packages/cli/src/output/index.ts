/**
 * Output format registration - table, JSON, SARIF.
 */

import { formatReportJson } from './json.js';
import { formatSarif } from './sarif.js';
import { formatReportTable } from './table.js';

import type { AnalysisReport } from 'codeprobe-core';

export type OutputFormat = 'table' | 'json' | 'sarif';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'sarif'];

/**
 * Format an analysis report in the specified format.
 */
export function formatReport(report: AnalysisReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatReportJson(report);
    case 'sarif':
      return formatSarif(report);
    case 'table':
      return formatReportTable(report);
  }
}

export { formatReportTable, formatTestTable, formatRulesTable, alignColumns } from './table.js';
export { formatJson, formatReportJson, formatTestJson, formatRulesJson } from './json.js';
export { formatSarif, toSarifLog, toSarifLevel, type SarifLog } from './sarif.js';
