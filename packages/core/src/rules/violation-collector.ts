/**
 * Violation Collector - turns matches into violations
 *
 * Renders messages and fixes, fingerprints each violation and collapses
 * identical fingerprints within a file. One collector belongs to one run.
 */

import { createHash } from 'node:crypto';

import { renderFix, spanToLocation } from './quick-fix.js';
import { renderTemplate } from './template.js';

import type { SourceFile } from '../analysis/types.js';
import type { Match } from '../matcher/types.js';
import type { RuleDefinition, Violation, ViolationLocation } from './types.js';

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Stable identity of a violation across runs
 */
export function computeFingerprint(
  ruleId: string,
  file: string,
  location: ViolationLocation,
  matchedText: string
): string {
  const span = `${location.line}:${location.column}-${location.endLine}:${location.endColumn}`;
  return sha256([ruleId, file, span, sha256(matchedText)].join('\0'));
}

/**
 * Report order: file, start line, start column, rule id, end offset, fingerprint
 */
export function compareViolations(a: Violation, b: Violation): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.location.line !== b.location.line) return a.location.line - b.location.line;
  if (a.location.column !== b.location.column) return a.location.column - b.location.column;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  if (a.location.endOffset !== b.location.endOffset) return a.location.endOffset - b.location.endOffset;
  if (a.fingerprint !== b.fingerprint) return a.fingerprint < b.fingerprint ? -1 : 1;
  return 0;
}

export class ViolationCollector {
  /** Fingerprints seen per file */
  private readonly seen = new Map<string, Set<string>>();
  private collapsed = 0;

  /**
   * Violations for one (file, rule) evaluation, without fingerprints already collected
   */
  collect(file: SourceFile, rule: RuleDefinition, matches: readonly Match[]): Violation[] {
    let fingerprints = this.seen.get(file.path);
    if (!fingerprints) {
      fingerprints = new Set();
      this.seen.set(file.path, fingerprints);
    }

    const violations: Violation[] = [];
    for (const match of matches) {
      const violation = createViolation(file, rule, match);
      if (fingerprints.has(violation.fingerprint)) {
        this.collapsed++;
        continue;
      }
      fingerprints.add(violation.fingerprint);
      violations.push(violation);
    }
    return violations;
  }

  /**
   * Number of violations dropped because their fingerprint was already collected
   */
  get duplicatesCollapsed(): number {
    return this.collapsed;
  }
}

export function createViolation(file: SourceFile, rule: RuleDefinition, match: Match): Violation {
  const location = spanToLocation(match.span);
  const matchedText = file.content.slice(match.span.startIndex, match.span.endIndex);

  const violation: Violation = {
    ruleId: rule.id,
    file: file.path,
    language: file.language,
    severity: rule.severity,
    category: rule.category ?? null,
    message: renderTemplate(rule.message, match.bindings, file.content, matchedText),
    location,
    fingerprint: computeFingerprint(rule.id, file.path, location, matchedText),
  };

  if (rule.fix) {
    const fix = renderFix(rule.fix, match, file.content);
    if (fix) {
      violation.fix = fix;
    }
  }

  return Object.freeze(violation);
}
