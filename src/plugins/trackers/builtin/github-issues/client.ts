/**
 * ABOUTME: Minimal GitHub REST client on top of fetch.
 * Maps HTTP failures onto the taskloop error taxonomy, retries transient
 * failures against a RetryBudget and cooperates with the RateLimiter.
 * fetch, sleep and the random source are injectable.
 */

import { AuthError, NetworkError, NotFoundError, RateLimitError, errorMessage } from '../../../../errors.js';
import { RetryBudget, type RetryPolicy } from '../../../../utils/backoff.js';
import type { RateLimiter } from './rate-limiter.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface GitHubRequest {
  method: HttpMethod;
  /** Path under the API root, or an absolute URL (pagination links) */
  path: string;
  body?: unknown;
  /** Sends If-None-Match */
  etag?: string;
  /** Task id reported by NotFoundError on a 404 */
  notFoundId?: string;
  /**
   * Whether repeating the call after an ambiguous failure (a dropped
   * connection or a 5xx) is safe. Defaults to true for everything but POST.
   */
  idempotent?: boolean;
}

export interface GitHubResponse {
  status: number;
  /** Parsed JSON body; null for 204 and 304 */
  data: unknown;
  headers: Headers;
  etag?: string;
  notModified: boolean;
}

export interface PageResult {
  items: unknown[];
  etag?: string;
  notModified: boolean;
  pages: number;
}

export interface ApiCallInfo {
  method: HttpMethod;
  path: string;
  status: number | null;
  durationMs: number;
  attempt: number;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface GitHubClientOptions {
  apiUrl: string;
  token: string;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  rateLimiter: RateLimiter;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  userAgent?: string;
  onCall?: (info: ApiCallInfo) => void;
}

export const GITHUB_API_VERSION = '2022-11-28';

const NEXT_LINK = /<([^>]+)>\s*;\s*rel="next"/;

/**
 * Extract the rel="next" URL from a Link header.
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) {
    return null;
  }
  for (const part of header.split(',')) {
    const match = NEXT_LINK.exec(part);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

export class GitHubClient {
  private readonly options: GitHubClientOptions;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: GitHubClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
  }

  newBudget(): RetryBudget {
    return new RetryBudget(this.options.retry, this.random);
  }

  private urlFor(path: string): string {
    if (/^https?:\/\//.test(path)) {
      return path;
    }
    return `${this.options.apiUrl}${path.startsWith('/') ? '' : '/'}${path}`;
  }

  private headersFor(request: GitHubRequest): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.options.token}`,
      'X-GitHub-Api-Version': GITHUB_API_VERSION,
      'User-Agent': this.options.userAgent ?? 'taskloop',
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (request.etag) {
      headers['If-None-Match'] = request.etag;
    }
    return headers;
  }

  /**
   * Issue one logical call, retrying transient failures until the budget is spent.
   */
  async request(request: GitHubRequest, budget: RetryBudget = this.newBudget()): Promise<GitHubResponse> {
    const label = `${request.method} ${request.path}`;
    const idempotent = request.idempotent ?? request.method !== 'POST';

    for (;;) {
      budget.consume();
      await this.options.rateLimiter.beforeRequest();

      const started = Date.now();
      let response: Response;
      try {
        response = await this.fetchImpl(this.urlFor(request.path), {
          method: request.method,
          headers: this.headersFor(request),
          body: request.body === undefined ? undefined : JSON.stringify(request.body),
          signal: AbortSignal.timeout(this.options.requestTimeoutMs),
        });
      } catch (err) {
        this.report(request, null, started, budget.attemptsUsed);
        const error = new NetworkError(`GitHub request failed: ${label}: ${errorMessage(err)}`, { cause: err });
        if (idempotent && budget.canRetry()) {
          await this.sleep(budget.nextDelay());
          continue;
        }
        throw error;
      }

      this.report(request, response.status, started, budget.attemptsUsed);
      this.options.rateLimiter.update(response.headers);

      const etag = response.headers.get('etag') ?? undefined;
      if (response.status === 304) {
        return { status: 304, data: null, headers: response.headers, etag: etag ?? request.etag, notModified: true };
      }

      if (response.ok) {
        return {
          status: response.status,
          data: await this.readJson(response, label),
          headers: response.headers,
          etag,
          notModified: false,
        };
      }

      if (response.status === 401) {
        throw new AuthError(
          `GitHub rejected the credentials (401) for ${label}`,
          'Refresh the token (e.g. `gh auth login`) or check the configured token source.'
        );
      }

      if (response.status === 404) {
        throw new NotFoundError(request.notFoundId ?? request.path, `GitHub resource not found: ${label}`);
      }

      if (this.options.rateLimiter.isRateLimited(response.status, response.headers)) {
        // Throws RateLimitError when the reset is beyond the patience budget.
        await this.options.rateLimiter.waitForReset(response.status, response.headers);
        if (budget.canRetry()) {
          continue;
        }
        throw new RateLimitError(`GitHub rate limit exceeded for ${label}`, this.options.rateLimiter.getState().resetAt, response.status);
      }

      const detail = await this.readErrorMessage(response);
      if (response.status >= 500) {
        if (idempotent && budget.canRetry()) {
          await this.sleep(budget.nextDelay());
          continue;
        }
        throw new NetworkError(`GitHub server error ${response.status} for ${label}${detail}`, {
          status: response.status,
        });
      }

      throw new NetworkError(`GitHub request ${label} failed with ${response.status}${detail}`, {
        status: response.status,
        retryable: false,
      });
    }
  }

  /**
   * GET a list endpoint, following Link rel="next" up to `maxPages` pages.
   * With an etag, a 304 on the first page short-circuits.
   */
  async getPaginated(path: string, options: { etag?: string; maxPages: number }): Promise<PageResult> {
    const items: unknown[] = [];
    let next: string | null = path;
    let firstEtag: string | undefined;
    let pages = 0;

    while (next && pages < options.maxPages) {
      const response: GitHubResponse = await this.request({
        method: 'GET',
        path: next,
        etag: pages === 0 ? options.etag : undefined,
      });
      if (response.notModified) {
        return { items: [], etag: response.etag, notModified: true, pages: 0 };
      }
      if (!Array.isArray(response.data)) {
        throw new NetworkError(`Expected a JSON array from GET ${next}`, { status: response.status, retryable: false });
      }
      if (pages === 0) {
        firstEtag = response.etag;
      }
      items.push(...response.data);
      pages++;
      next = parseNextLink(response.headers.get('link'));
    }

    if (next) {
      console.warn(`[github] Stopped after ${options.maxPages} page(s); remaining issues were not fetched`);
    }
    return { items, etag: firstEtag, notModified: false, pages };
  }

  private report(request: GitHubRequest, status: number | null, started: number, attempt: number): void {
    this.options.onCall?.({
      method: request.method,
      path: request.path,
      status,
      durationMs: Date.now() - started,
      attempt,
    });
  }

  private async readJson(response: Response, label: string): Promise<unknown> {
    if (response.status === 204) {
      return null;
    }
    const text = await response.text();
    if (!text) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new NetworkError(`Invalid JSON from ${label}: ${errorMessage(err)}`, {
        status: response.status,
        retryable: false,
        cause: err,
      });
    }
  }

  private async readErrorMessage(response: Response): Promise<string> {
    const text = await response.text().catch(() => '');
    if (!text) {
      return '';
    }
    try {
      const body: unknown = JSON.parse(text);
      if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
        return `: ${body.message}`;
      }
    } catch {
      return `: ${text.slice(0, 200)}`;
    }
    return '';
  }
}
