/**
 * ABOUTME: Zod schema for the YAML configuration document.
 * Keys follow the on-disk snake_case names; the loader maps them to the
 * camelCase types in ./types.ts. Every object is strict so a misspelled key
 * is a load-time error rather than a silently ignored setting.
 */

import { z } from 'zod';

const LabelListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((label) => label.trim())
      .filter((label) => label.length > 0)
  );

export const GateSchema = z.union([
  z.string().min(1),
  z
    .object({
      name: z.string().optional(),
      command: z.string().min(1),
      timeout_seconds: z.number().int().nonnegative().optional(),
    })
    .strict(),
]);

const LoopFieldsSchema = z
  .object({
    max_iterations: z.number().int().nonnegative(),
    no_progress_limit: z.number().int().nonnegative(),
    gates: z.array(GateSchema),
    runner_timeout_seconds: z.number().int().nonnegative(),
    sleep_seconds_between_iters: z.number().nonnegative(),
    gate_fail_fast: z.boolean(),
  })
  .strict();

export const ModeOverrideSchema = LoopFieldsSchema.partial();

export const LoopSchema = LoopFieldsSchema.partial()
  .extend({
    mode: z.string().min(1).optional(),
    modes: z.record(z.string().min(1), ModeOverrideSchema).optional(),
  })
  .strict();

export const RetrySchema = z
  .object({
    max_attempts: z.number().int().min(1).optional(),
    base_delay_ms: z.number().int().nonnegative().optional(),
    max_delay_ms: z.number().int().nonnegative().optional(),
    jitter: z.number().min(0).max(1).optional(),
  })
  .strict();

export const GitHubTrackerSchema = z
  .object({
    repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, "expected 'owner/repo'"),
    auth_method: z.enum(['external-helper', 'token']).optional(),
    token_env: z.string().min(1).optional(),
    token: z.string().min(1).optional(),
    credential_helper: z.array(z.string().min(1)).min(1).optional(),
    cache_ttl_seconds: z.number().int().nonnegative().optional(),
    api_url: z.string().url().optional(),
    request_timeout_ms: z.number().int().positive().optional(),
    low_water_mark: z.number().int().nonnegative().optional(),
    patience_seconds: z.number().nonnegative().optional(),
    max_pages: z.number().int().min(1).optional(),
    retry: RetrySchema.optional(),
  })
  .strict();

export const TrackerSchema = z
  .object({
    kind: z.enum(['local', 'github-issues']).optional(),
    label_filter: LabelListSchema.optional(),
    exclude_labels: LabelListSchema.optional(),
    exclude_drafts: z.boolean().optional(),
    close_on_done: z.boolean().optional(),
    comment_on_done: z.boolean().optional(),
    add_labels_on_start: LabelListSchema.optional(),
    add_labels_on_done: LabelListSchema.optional(),
    remove_start_labels_on_done: z.boolean().optional(),
    local: z
      .object({
        path: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    github: GitHubTrackerSchema.optional(),
  })
  .strict();

export const AgentSchema = z
  .object({
    command: z.array(z.string().min(1)).min(1),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    tracker: TrackerSchema.optional(),
    agent: AgentSchema.optional(),
    loop: LoopSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type ConfigFileLoop = z.infer<typeof LoopSchema>;
export type ConfigFileModeOverride = z.infer<typeof ModeOverrideSchema>;
export type ConfigFileGate = z.infer<typeof GateSchema>;
