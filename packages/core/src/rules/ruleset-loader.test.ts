/**
 * Ruleset Loader Tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { RulesetLoader, describeSource, parseRulesetSource } from './ruleset-loader.js';

import type { FetchFunction } from './registry-client.js';

function textualRule(id: string | undefined, regex = 'debugger'): Record<string, unknown> {
  return {
    id,
    languages: ['typescript'],
    severity: 'warning',
    message: `${regex} found`,
    patterns: [{ type: 'textual', regex }],
  };
}

function respondWith(status: number, body: string, calls: string[] = []): FetchFunction {
  return async (url) => {
    calls.push(url);
    return { ok: status >= 200 && status < 300, status, statusText: status === 404 ? 'Not Found' : 'OK', text: async () => body };
  };
}

describe('parseRulesetSource', () => {
  it('recognizes registry, file and directory sources', () => {
    expect(parseRulesetSource('registry:python-security')).toEqual({ kind: 'registry', name: 'python-security' });
    expect(parseRulesetSource('rules/core.yaml')).toEqual({ kind: 'file', path: 'rules/core.yaml' });
    expect(parseRulesetSource('rules/core.JSON')).toEqual({ kind: 'file', path: 'rules/core.JSON' });
    expect(parseRulesetSource('rules/')).toEqual({ kind: 'directory', path: 'rules/' });
    expect(parseRulesetSource('rules')).toEqual({ kind: 'directory', path: 'rules' });
  });

  it('describes sources for reports', () => {
    expect(describeSource({ kind: 'inline', name: 'demo', document: [] })).toBe('inline:demo');
    expect(describeSource({ kind: 'registry', name: 'go' })).toBe('registry:go');
  });
});

describe('RulesetLoader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codeprobe-rules-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('loads the valid rules of a ruleset and reports the invalid one by position', async () => {
    const document = {
      name: 'demo',
      rules: [textualRule('r1'), textualRule('r2'), textualRule(undefined), textualRule('r4'), textualRule('r5')],
    };
    const result = await new RulesetLoader().load({ kind: 'inline', name: 'demo', document });

    expect(result.rules.map((rule) => rule.id)).toEqual(['r1', 'r2', 'r4', 'r5']);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      source: 'inline:demo',
      position: 2,
      code: 'missing-id',
      message: 'id: A rule needs a non-empty id',
    });
  });

  it('reads YAML rulesets relative to the base directory', async () => {
    await fs.writeFile(
      path.join(tempDir, 'house.yaml'),
      [
        'name: house-style',
        'description: Local conventions',
        'rules:',
        '  - id: no-debugger',
        '    languages: [typescript]',
        '    severity: warning',
        '    message: Remove debugger statements',
        '    patterns:',
        '      - type: structural',
        '        query: (DebuggerStatement)',
        '',
      ].join('\n')
    );

    const result = await new RulesetLoader({ baseDir: tempDir }).load(parseRulesetSource('house.yaml'));

    expect(result.name).toBe('house-style');
    expect(result.description).toBe('Local conventions');
    expect(result.errors).toEqual([]);
    expect(result.rules[0]?.patterns).toEqual([{ type: 'structural', query: '(DebuggerStatement)' }]);
  });

  it('accepts a bare list of rules', async () => {
    await fs.writeFile(path.join(tempDir, 'list.json'), JSON.stringify([textualRule('only')]));
    const result = await new RulesetLoader({ baseDir: tempDir }).load({ kind: 'file', path: 'list.json' });

    expect(result.name).toBe('list');
    expect(result.rules.map((rule) => rule.id)).toEqual(['only']);
  });

  it('reports undecodable and missing files as a whole-source error', async () => {
    await fs.writeFile(path.join(tempDir, 'broken.json'), '{ "rules": [');
    const loader = new RulesetLoader({ baseDir: tempDir });

    const broken = await loader.load({ kind: 'file', path: 'broken.json' });
    expect(broken.rules).toEqual([]);
    expect(broken.errors.map((error) => [error.position, error.code])).toEqual([[null, 'parse-failed']]);

    const missing = await loader.load({ kind: 'file', path: 'absent.json' });
    expect(missing.errors.map((error) => error.code)).toEqual(['read-failed']);
  });

  it('rejects documents without a rules list', async () => {
    const result = await new RulesetLoader().load({ kind: 'inline', name: 'bad', document: { name: 'bad' } });
    expect(result.errors[0]?.code).toBe('invalid-ruleset');
  });

  it('loads every ruleset file of a directory in name order', async () => {
    const dir = path.join(tempDir, 'rules');
    await fs.mkdir(dir);
    await fs.writeFile(path.join(dir, 'b.yml'), 'rules:\n  - id: shared\n    languages: [typescript]\n    severity: notice\n    message: b\n    patterns:\n      - type: textual\n        regex: b\n');
    await fs.writeFile(path.join(dir, 'a.json'), JSON.stringify({ rules: [textualRule('shared'), textualRule('a-only')] }));
    await fs.writeFile(path.join(dir, 'notes.txt'), 'not a ruleset');

    const result = await new RulesetLoader({ baseDir: tempDir }).load(parseRulesetSource('rules/'));

    expect(result.rules.map((rule) => [rule.id, rule.severity])).toEqual([
      ['shared', 'warning'],
      ['a-only', 'warning'],
    ]);
    expect(result.errors).toEqual([
      {
        source: path.join(dir, 'b.yml'),
        position: 0,
        ruleId: 'shared',
        code: 'duplicate-id',
        message: `Rule id "shared" is already defined by ${path.join(dir, 'a.json')}`,
        issues: [],
      },
    ]);
  });

  it('reports a repeated id at its position in the declaring document', async () => {
    const dir = path.join(tempDir, 'positions');
    await fs.mkdir(dir);
    await fs.writeFile(path.join(dir, 'a.json'), JSON.stringify([textualRule('dup')]));
    await fs.writeFile(path.join(dir, 'b.json'), JSON.stringify([{ id: 'bad' }, textualRule('dup', 'other')]));

    const result = await new RulesetLoader().load({ kind: 'directory', path: dir });

    expect(result.rules.map((rule) => rule.id)).toEqual(['dup']);
    expect(result.origins).toEqual([{ source: path.join(dir, 'a.json'), position: 0 }]);
    expect(result.errors.map((error) => [error.source, error.position, error.ruleId])).toEqual([
      [path.join(dir, 'b.json'), 0, 'bad'],
      [path.join(dir, 'b.json'), 1, 'dup'],
    ]);
    expect(result.errors[1]?.code).toBe('duplicate-id');
  });

  it('reports rule ids repeated across sources', async () => {
    const { rules, errors } = await new RulesetLoader().loadAll([
      { kind: 'inline', name: 'one', document: [textualRule('dup')] },
      { kind: 'inline', name: 'two', document: [textualRule('dup', 'other')] },
    ]);

    expect(rules).toHaveLength(1);
    expect(rules[0]?.message).toBe('debugger found');
    expect(errors[0]?.message).toBe('Rule id "dup" is already defined by inline:one');
  });

  describe('registry sources', () => {
    it('fetches rulesets by name', async () => {
      const calls: string[] = [];
      const loader = new RulesetLoader({
        registry: {
          url: 'https://rules.example.test/',
          fetch: respondWith(200, JSON.stringify({ name: 'python-security', rules: [textualRule('py/eval', 'eval')] }), calls),
        },
      });

      const result = await loader.load({ kind: 'registry', name: 'python-security' });

      expect(calls).toEqual(['https://rules.example.test/rulesets/python-security']);
      expect(result.source).toBe('registry:python-security');
      expect(result.rules.map((rule) => rule.id)).toEqual(['py/eval']);
    });

    it('reports missing rulesets', async () => {
      const loader = new RulesetLoader({ registry: { url: 'https://rules.example.test', fetch: respondWith(404, '') } });
      const result = await loader.load({ kind: 'registry', name: 'nope' });

      expect(result.errors.map((error) => [error.code, error.message])).toEqual([
        ['ruleset-not-found', 'Registry responded 404 Not Found for https://rules.example.test/rulesets/nope'],
      ]);
    });

    it('reports unreachable registries', async () => {
      const failing: FetchFunction = async () => {
        throw new Error('connection refused');
      };
      const loader = new RulesetLoader({ registry: { url: 'https://rules.example.test', fetch: failing } });
      const result = await loader.load({ kind: 'registry', name: 'go' });

      expect(result.errors[0]?.code).toBe('registry-unreachable');
      expect(result.errors[0]?.message).toContain('connection refused');
    });

    it('needs a configured registry', async () => {
      const result = await new RulesetLoader().load({ kind: 'registry', name: 'go' });
      expect(result.errors[0]?.code).toBe('registry-not-configured');
    });
  });
});
