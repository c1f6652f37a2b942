/**
 * Registry Client - fetches ruleset documents from an HTTP rule registry
 *
 * The registry serves `GET {url}/rulesets/{name}` with a ruleset document
 * (`{ name, description?, rules: [...] }`) as JSON.
 */

import { RuleLoadError, errorMessage } from '../errors.js';

export const DEFAULT_REGISTRY_TIMEOUT_MS = 10_000;

export type FetchFunction = (url: string, init?: { headers?: Record<string, string>; signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}>;

export interface RegistryOptions {
  /** Base URL of the registry */
  url: string;
  timeoutMs?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Fetch implementation, the global fetch by default */
  fetch?: FetchFunction;
}

export class RegistryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchFunction;

  constructor(options: RegistryOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REGISTRY_TIMEOUT_MS;
    this.headers = { Accept: 'application/json', ...options.headers };
    this.fetchImpl = options.fetch ?? fetch;
  }

  rulesetUrl(name: string): string {
    return `${this.baseUrl}/rulesets/${encodeURIComponent(name)}`;
  }

  /**
   * Fetch the decoded ruleset document.
   *
   * @throws RuleLoadError when the request fails or the body is not JSON
   */
  async fetchRuleset(name: string): Promise<unknown> {
    const url = this.rulesetUrl(name);
    let response: Awaited<ReturnType<FetchFunction>>;
    try {
      response = await this.fetchImpl(url, {
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RuleLoadError('registry-unreachable', `registry:${name}`, `Error querying ${url}: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      throw new RuleLoadError(
        response.status === 404 ? 'ruleset-not-found' : 'registry-error',
        `registry:${name}`,
        `Registry responded ${response.status} ${response.statusText} for ${url}`
      );
    }

    const body = await response.text();
    try {
      const document: unknown = JSON.parse(body);
      return document;
    } catch (error) {
      throw new RuleLoadError('parse-failed', `registry:${name}`, `Registry returned invalid JSON for ${name}: ${errorMessage(error)}`, error);
    }
  }
}
