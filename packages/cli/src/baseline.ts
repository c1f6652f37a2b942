/**
 * Baseline files - fingerprints of accepted violations
 *
 * Format: `{ "schemaVersion": "1.0", "fingerprints": ["…"] }`; a bare JSON
 * array of fingerprints is read as well.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { REPORT_SCHEMA_VERSION, type Violation } from 'codeprobe-core';

export interface BaselineDocument {
  schemaVersion: string;
  fingerprints: string[];
}

export class BaselineError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'BaselineError';
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

/**
 * Read the fingerprints of a baseline file.
 *
 * @throws BaselineError when the file is unreadable or malformed
 */
export async function readBaseline(filePath: string): Promise<string[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new BaselineError(`Cannot read baseline ${filePath}: ${error instanceof Error ? error.message : String(error)}`, filePath);
  }

  if (isStringArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === 'object' && parsed !== null && 'fingerprints' in parsed && isStringArray(parsed.fingerprints)) {
    return parsed.fingerprints;
  }
  throw new BaselineError(`Baseline ${filePath} must hold a list of fingerprints`, filePath);
}

export function createBaseline(violations: readonly Violation[]): BaselineDocument {
  const fingerprints = [...new Set(violations.map((violation) => violation.fingerprint))].sort();
  return { schemaVersion: REPORT_SCHEMA_VERSION, fingerprints };
}

export async function writeBaseline(filePath: string, violations: readonly Violation[]): Promise<BaselineDocument> {
  const document = createBaseline(violations);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(document, null, 2) + '\n');
  return document;
}
