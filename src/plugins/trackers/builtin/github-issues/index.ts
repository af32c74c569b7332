/**
 * ABOUTME: GitHub Issues tracker plugin.
 * Open issues of one repository are the tasks. Listings are served from an
 * on-disk cache with a TTL and fall back to the stale copy when GitHub is
 * unreachable. Completion is a sequence of REST calls that is undone in
 * reverse when any step fails.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { STATE_DIR } from '../../../../config/index.js';
import type { GitHubTrackerConfig, TrackerConfig } from '../../../../config/types.js';
import {
  ConfigError,
  NetworkError,
  NotFoundError,
  PartialUpdateError,
  errorMessage,
} from '../../../../errors.js';
import { appendTrackerEvent } from '../../../../logs/index.js';
import { BaseTrackerPlugin, derivePriority, toSelectedTask } from '../../base.js';
import type {
  SelectedTask,
  SyncResult,
  TaskCounts,
  TrackerPluginFactory,
  TrackerPluginMeta,
  TrackerTask,
} from '../../types.js';
import { resolveGitHubToken, type HelperRunner } from './auth.js';
import { parseIssueBody } from './body-parser.js';
import { CacheStore, cacheKey, isFresh, type CacheEntry } from './cache.js';
import { GitHubClient, type FetchFn, type GitHubResponse } from './client.js';
import { RateLimiter } from './rate-limiter.js';

export const GITHUB_CACHE_FILE = join(STATE_DIR, 'github-cache.json');

const RawLabelSchema = z.union([z.string(), z.object({ name: z.string() })]);

const RawIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().optional(),
  state: z.string(),
  labels: z.array(RawLabelSchema).optional(),
  milestone: z.object({ number: z.number().int(), title: z.string() }).nullable().optional(),
  draft: z.boolean().optional(),
  pull_request: z.unknown().optional(),
  created_at: z.string().optional(),
  html_url: z.string().optional(),
});

type RawIssue = z.infer<typeof RawIssueSchema>;

/**
 * Issue fields kept in the cache.
 */
const CachedIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string(),
  state: z.enum(['open', 'closed']),
  labels: z.array(z.string()),
  milestone: z.object({ number: z.number().int(), title: z.string() }).optional(),
  draft: z.boolean().optional(),
  createdAt: z.string().optional(),
  url: z.string().optional(),
});

const CachedIssueListSchema = z.array(CachedIssueSchema);

export type CachedIssue = z.infer<typeof CachedIssueSchema>;

const CommentResponseSchema = z.object({ id: z.number().int() });

function normalizeIssue(raw: RawIssue): CachedIssue {
  return {
    number: raw.number,
    title: raw.title,
    body: raw.body ?? '',
    state: raw.state === 'closed' ? 'closed' : 'open',
    labels: (raw.labels ?? []).map((label) => (typeof label === 'string' ? label : label.name)),
    milestone: raw.milestone ?? undefined,
    draft: raw.draft,
    createdAt: raw.created_at,
    url: raw.html_url,
  };
}

/**
 * An issue is a draft when the API flags it or it carries the `draft` label.
 */
export function issueToTask(issue: CachedIssue): TrackerTask {
  const { description, acceptance, notes } = parseIssueBody(issue.body);
  return {
    id: String(issue.number),
    title: issue.title,
    description,
    acceptance,
    notes,
    labels: issue.labels,
    priority: derivePriority(issue.labels),
    closed: issue.state === 'closed',
    draft: issue.draft === true || issue.labels.includes('draft'),
    milestone: issue.milestone,
    createdAt: issue.createdAt,
    url: issue.url,
  };
}

interface UndoAction {
  description: string;
  run: () => Promise<void>;
}

export interface GitHubIssuesTrackerOptions {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
  runHelper?: HelperRunner;
  /** Overrides the cache location (default .taskloop/github-cache.json) */
  cachePath?: string;
}

export class GitHubIssuesTrackerPlugin extends BaseTrackerPlugin {
  readonly meta: TrackerPluginMeta = {
    id: 'github-issues',
    name: 'GitHub Issues',
    description: 'Track tasks as open issues of a GitHub repository',
    networked: true,
  };

  private readonly options: GitHubIssuesTrackerOptions;
  private readonly now: () => Date;
  private client: GitHubClient | null = null;
  private cache: CacheStore<CachedIssue[]> | null = null;
  private rateLimiter: RateLimiter | null = null;

  constructor(options: GitHubIssuesTrackerOptions = {}) {
    super();
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  async initialize(config: TrackerConfig, cwd: string): Promise<void> {
    await super.initialize(config, cwd);
    const github = config.github;
    if (!github) {
      throw new ConfigError("tracker 'github-issues' selected but tracker.github.repo is not set");
    }

    const { token, source } = await resolveGitHubToken(github, {
      env: this.options.env,
      runHelper: this.options.runHelper,
    });
    console.log(`[tracker:${this.meta.id}] Authenticated via ${source} for ${github.repo}`);

    this.rateLimiter = new RateLimiter({
      lowWaterMark: github.lowWaterMark,
      patienceMs: github.patienceMs,
      backoff: github.retry,
      now: () => this.now().getTime(),
      sleep: this.options.sleep,
      random: this.options.random,
    });

    this.client = new GitHubClient({
      apiUrl: github.apiUrl,
      token,
      requestTimeoutMs: github.requestTimeoutMs,
      retry: github.retry,
      rateLimiter: this.rateLimiter,
      fetch: this.options.fetch,
      sleep: this.options.sleep,
      random: this.options.random,
      onCall: (info) => {
        void appendTrackerEvent(cwd, {
          type: 'tracker:api-call',
          timestamp: new Date().toISOString(),
          tracker: this.meta.id,
          ...info,
        });
      },
    });

    this.cache = new CacheStore(this.options.cachePath ?? join(cwd, GITHUB_CACHE_FILE), CachedIssueListSchema, {
      onWarning: (message) => this.recordWarning(message),
    });
  }

  private get github(): GitHubTrackerConfig {
    const github = this.trackerConfig.github;
    if (!github) {
      throw new ConfigError('tracker.github is not configured');
    }
    return github;
  }

  private get api(): GitHubClient {
    if (!this.client) {
      throw new Error(`Tracker '${this.meta.id}' used before initialize()`);
    }
    return this.client;
  }

  private get store(): CacheStore<CachedIssue[]> {
    if (!this.cache) {
      throw new Error(`Tracker '${this.meta.id}' used before initialize()`);
    }
    return this.cache;
  }

  private get cacheKey(): string {
    const config = this.trackerConfig;
    return cacheKey(this.github.repo, config.labelFilter, config.excludeLabels);
  }

  private issuePath(taskId: string, suffix = ''): string {
    return `/repos/${this.github.repo}/issues/${taskId}${suffix}`;
  }

  private listPath(): string {
    const params = new URLSearchParams({ state: 'open', per_page: '100' });
    const labels = this.trackerConfig.labelFilter;
    if (labels.length > 0) {
      params.set('labels', labels.join(','));
    }
    return `/repos/${this.github.repo}/issues?${params.toString()}`;
  }

  private normalizeListing(items: unknown[]): CachedIssue[] {
    const issues: CachedIssue[] = [];
    for (const item of items) {
      const parsed = RawIssueSchema.safeParse(item);
      if (!parsed.success) {
        this.recordWarning('Skipping an issue with an unexpected shape in the listing');
        continue;
      }
      if (parsed.data.pull_request !== undefined) {
        continue;
      }
      issues.push(normalizeIssue(parsed.data));
    }
    return issues;
  }

  private async recordStaleFallback(entry: CacheEntry<CachedIssue[]>, err: unknown): Promise<void> {
    this.recordWarning(
      `GitHub unreachable (${errorMessage(err)}); using cached issues for ${this.github.repo} from ${entry.fetchedAt}`
    );
    await appendTrackerEvent(this.cwd, {
      type: 'tracker:stale-cache',
      timestamp: this.now().toISOString(),
      tracker: this.meta.id,
      key: entry.key,
      fetchedAt: entry.fetchedAt,
      reason: errorMessage(err),
    });
  }

  /**
   * Open issues matching the label filter. A fresh cache entry is reused
   * unless `force` is set; a failed refresh falls back to the stale entry.
   */
  private async loadIssues(force = false): Promise<{ issues: CachedIssue[]; stale: boolean }> {
    const key = this.cacheKey;
    const entry = await this.store.get(key);
    const now = this.now();

    if (entry && !force && isFresh(entry, now)) {
      return { issues: entry.payload, stale: false };
    }

    try {
      const page = await this.api.getPaginated(this.listPath(), {
        etag: entry?.etag,
        maxPages: this.github.maxPages,
      });
      const rateLimit = this.rateLimiter?.snapshot();

      if (page.notModified && entry) {
        await this.store.touch(key, now, rateLimit);
        return { issues: entry.payload, stale: false };
      }

      const issues = this.normalizeListing(page.items);
      await this.store.put({
        key,
        payload: issues,
        fetchedAt: now.toISOString(),
        ttlSeconds: this.github.cacheTtlSeconds,
        etag: page.etag,
        rateLimit,
      });
      return { issues, stale: false };
    } catch (err) {
      if (!(err instanceof NetworkError) || !entry) {
        throw err;
      }
      await this.recordStaleFallback(entry, err);
      return { issues: entry.payload, stale: true };
    }
  }

  private async loadTasks(): Promise<TrackerTask[]> {
    const { issues } = await this.loadIssues();
    return issues.map(issueToTask);
  }

  /**
   * After a write, expire the cached listing but keep it for offline use,
   * with `revise` applied to the written issue.
   */
  private async markCacheStale(taskId: string, revise?: (issue: CachedIssue) => CachedIssue): Promise<void> {
    await this.store.markStale(
      this.cacheKey,
      revise && ((issues) => issues.map((issue) => (String(issue.number) === taskId ? revise(issue) : issue)))
    );
  }

  private async fetchIssue(taskId: string): Promise<CachedIssue> {
    if (!/^\d+$/.test(taskId)) {
      throw new NotFoundError(taskId, `Not a GitHub issue number: ${taskId}`);
    }
    const response = await this.api.request({ method: 'GET', path: this.issuePath(taskId), notFoundId: taskId });
    const parsed = RawIssueSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new NetworkError(`Unexpected response shape for issue #${taskId}`, {
        status: response.status,
        retryable: false,
      });
    }
    return normalizeIssue(parsed.data);
  }

  private async addLabels(taskId: string, labels: string[]): Promise<void> {
    await this.api.request({
      method: 'POST',
      path: this.issuePath(taskId, '/labels'),
      body: { labels },
      notFoundId: taskId,
      idempotent: true,
    });
  }

  private async removeLabel(taskId: string, label: string): Promise<void> {
    try {
      await this.api.request({
        method: 'DELETE',
        path: this.issuePath(taskId, `/labels/${encodeURIComponent(label)}`),
        notFoundId: taskId,
      });
    } catch (err) {
      // 404 here means the label is already gone.
      if (err instanceof NotFoundError) {
        return;
      }
      throw err;
    }
  }

  private async setState(taskId: string, state: 'open' | 'closed'): Promise<void> {
    await this.api.request({
      method: 'PATCH',
      path: this.issuePath(taskId),
      body: { state },
      notFoundId: taskId,
    });
  }

  private async postComment(taskId: string, body: string): Promise<GitHubResponse> {
    return this.api.request({
      method: 'POST',
      path: this.issuePath(taskId, '/comments'),
      body: { body },
      notFoundId: taskId,
    });
  }

  private async deleteComment(commentId: number): Promise<void> {
    await this.api.request({
      method: 'DELETE',
      path: `/repos/${this.github.repo}/issues/comments/${commentId}`,
    });
  }

  async claimNextTask(): Promise<SelectedTask | null> {
    const [next] = this.rankEligible(await this.loadTasks());
    return next ? toSelectedTask(next, this.now()) : null;
  }

  async getTaskCounts(): Promise<TaskCounts> {
    return this.countTasks(await this.loadTasks());
  }

  async isTaskDone(taskId: string): Promise<boolean> {
    try {
      const issue = await this.fetchIssue(taskId);
      return issue.state === 'closed';
    } catch (err) {
      if (!(err instanceof NetworkError)) {
        throw err;
      }
      const entry = await this.store.get(this.cacheKey);
      if (entry?.payload.some((issue) => String(issue.number) === taskId)) {
        await this.recordStaleFallback(entry, err);
        return false;
      }
      throw err;
    }
  }

  async forceTaskOpen(taskId: string): Promise<void> {
    const issue = await this.fetchIssue(taskId);
    const doneLabels = this.trackerConfig.addLabelsOnDone.filter((label) => issue.labels.includes(label));
    let changed = false;

    if (issue.state === 'closed') {
      await this.setState(taskId, 'open');
      changed = true;
    }
    for (const label of doneLabels) {
      await this.removeLabel(taskId, label);
      changed = true;
    }

    if (changed) {
      await this.markCacheStale(taskId, (cached) => ({
        ...cached,
        state: 'open',
        labels: cached.labels.filter((label) => !doneLabels.includes(label)),
      }));
    }
  }

  /**
   * Start labels do not affect selection, so the cached listing stays fresh.
   */
  async markTaskStarted(taskId: string): Promise<void> {
    const labels = this.trackerConfig.addLabelsOnStart;
    if (labels.length === 0) {
      return;
    }
    await this.addLabels(taskId, labels);
  }

  /**
   * Comment, add done labels, close, drop start labels. If any step fails,
   * the applied steps are undone in reverse before PartialUpdateError is thrown.
   */
  async markTaskDone(taskId: string, comment: string): Promise<void> {
    const config = this.trackerConfig;

    let issue: CachedIssue;
    try {
      issue = await this.fetchIssue(taskId);
    } catch (err) {
      if (err instanceof NetworkError) {
        throw new PartialUpdateError(taskId, 'snapshot', true, [], { cause: err });
      }
      throw err;
    }

    const undo: UndoAction[] = [];
    let step = 'snapshot';

    try {
      if (config.commentOnDone && comment.trim()) {
        step = 'comment';
        const response = await this.postComment(taskId, comment);
        const created = CommentResponseSchema.safeParse(response.data);
        undo.push({
          description: 'delete completion comment',
          run: async () => {
            if (!created.success) {
              throw new Error('comment id unknown');
            }
            await this.deleteComment(created.data.id);
          },
        });
      }

      const toAdd = config.addLabelsOnDone.filter((label) => !issue.labels.includes(label));
      if (toAdd.length > 0) {
        step = 'add-labels';
        await this.addLabels(taskId, toAdd);
        undo.push({
          description: `remove labels ${toAdd.join(', ')}`,
          run: async () => {
            for (const label of toAdd) {
              await this.removeLabel(taskId, label);
            }
          },
        });
      }

      if (config.closeOnDone && issue.state !== 'closed') {
        step = 'close';
        await this.setState(taskId, 'closed');
        undo.push({ description: 'reopen issue', run: () => this.setState(taskId, 'open') });
      }

      if (config.removeStartLabelsOnDone) {
        const toRemove = config.addLabelsOnStart.filter(
          (label) => issue.labels.includes(label) && !config.addLabelsOnDone.includes(label)
        );
        for (const label of toRemove) {
          step = 'remove-labels';
          await this.removeLabel(taskId, label);
          undo.push({ description: `re-add label ${label}`, run: () => this.addLabels(taskId, [label]) });
        }
      }
    } catch (err) {
      const residual: string[] = [];
      // A comment POST that died without a clear answer may still have landed.
      if (step === 'comment' && err instanceof NetworkError && err.retryable) {
        residual.push('completion comment may have been posted');
      }
      for (const action of undo.reverse()) {
        try {
          await action.run();
        } catch (undoErr) {
          residual.push(`${action.description}: ${errorMessage(undoErr)}`);
        }
      }
      await this.markCacheStale(taskId);

      const rolledBack = residual.length === 0;
      await appendTrackerEvent(this.cwd, {
        type: 'tracker:rollback',
        timestamp: this.now().toISOString(),
        tracker: this.meta.id,
        taskId,
        failedStep: step,
        rolledBack,
      });
      throw new PartialUpdateError(taskId, step, rolledBack, residual, { cause: err });
    }

    const removedStart = config.removeStartLabelsOnDone ? config.addLabelsOnStart : [];
    await this.markCacheStale(taskId, (cached) => ({
      ...cached,
      state: config.closeOnDone ? 'closed' : cached.state,
      labels: [
        ...cached.labels.filter((label) => !removedStart.includes(label) || config.addLabelsOnDone.includes(label)),
        ...config.addLabelsOnDone.filter((label) => !cached.labels.includes(label)),
      ],
    }));
    await appendTrackerEvent(this.cwd, {
      type: 'tracker:task-done',
      timestamp: this.now().toISOString(),
      tracker: this.meta.id,
      taskId,
    });
  }

  async sync(): Promise<SyncResult> {
    const started = Date.now();
    await appendTrackerEvent(this.cwd, {
      type: 'tracker:sync-start',
      timestamp: new Date().toISOString(),
      tracker: this.meta.id,
    });

    let result: SyncResult;
    try {
      const { issues, stale } = await this.loadIssues(true);
      result = stale
        ? {
            success: false,
            stale: true,
            taskCount: issues.length,
            message: `GitHub unreachable; ${issues.length} cached issue(s) in use`,
          }
        : {
            success: true,
            taskCount: issues.length,
            message: `Fetched ${issues.length} open issue(s) from ${this.github.repo}`,
          };
    } catch (err) {
      result = { success: false, message: `Failed to sync ${this.github.repo}`, error: errorMessage(err) };
    }

    await appendTrackerEvent(this.cwd, {
      type: 'tracker:sync-complete',
      timestamp: new Date().toISOString(),
      tracker: this.meta.id,
      success: result.success,
      durationMs: Date.now() - started,
      taskCount: result.taskCount,
      message: result.message,
      error: result.error,
    });
    return result;
  }

  async dispose(): Promise<void> {
    this.client = null;
    this.cache = null;
    this.rateLimiter = null;
    await super.dispose();
  }
}

/**
 * Factory function for the GitHub Issues tracker plugin.
 */
const createGitHubIssuesTracker: TrackerPluginFactory = () => new GitHubIssuesTrackerPlugin();

export default createGitHubIssuesTracker;
