/**
 * Source files - workspace discovery, reading and hashing
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { minimatch } from 'minimatch';

import type { SourceFile } from './types.js';
import type { ParserRegistry } from '../parsers/parser-registry.js';
import type { Language } from '../parsers/types.js';

/** Directories never descended into */
export const DEFAULT_IGNORE_DIRECTORIES = [
  'node_modules',
  'dist',
  'build',
  'out',
  'target',
  'vendor',
  '__pycache__',
  '.venv',
  'venv',
  'coverage',
];

export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Workspace-relative path with `/` separators
 */
export function toWorkspacePath(workspaceRoot: string, filePath: string): string {
  const relative = path.isAbsolute(filePath) ? path.relative(workspaceRoot, filePath) : filePath;
  return relative.split(path.sep).join('/').replace(/^\.\//, '');
}

export function createSourceFile(filePath: string, language: Language, content: string): SourceFile {
  return Object.freeze({ path: filePath, language, content, hash: hashContent(content) });
}

export function matchesAny(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(filePath, pattern, { dot: true, matchBase: !pattern.includes('/') }));
}

export interface DiscoveryOptions {
  include?: string[];
  ignore?: string[];
}

/**
 * Find every file under the workspace whose extension a registered adapter claims.
 * Hidden and default-ignored directories are skipped; paths are sorted.
 */
export async function discoverFiles(
  workspaceRoot: string,
  parsers: ParserRegistry,
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const include = options.include ?? [];
  const ignore = options.ignore ?? [];
  const files: string[] = [];

  const walk = async (dir: string, relativePath: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || DEFAULT_IGNORE_DIRECTORIES.includes(entry.name)) {
          continue;
        }
        if (matchesAny(relPath, ignore) || matchesAny(`${relPath}/`, ignore)) {
          continue;
        }
        await walk(path.join(dir, entry.name), relPath);
      } else if (entry.isFile()) {
        if (parsers.detectLanguage(entry.name) === null) continue;
        if (include.length > 0 && !matchesAny(relPath, include)) continue;
        if (matchesAny(relPath, ignore)) continue;
        files.push(relPath);
      }
    }
  };

  await walk(workspaceRoot, '');
  return files.sort();
}
