import { config as loadDotenv } from 'dotenv';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import type { IdentityKey } from '../types/guard-types.js';
import { BotIdentitySet, parseBotAccounts } from '../services/identity-matcher.js';
import { DEFAULT_TEMPLATE_VERSION, resolveTemplateRules, type TemplateRules } from './template-rules.js';

/**
 * Message Guard Configuration
 *
 * Read once when the host signals it is ready, then frozen. Requests only
 * ever see the frozen settings.
 */

const GuardConfigSchema = z.object({
  enabled: z.boolean().default(true),
  applyGroup: z.boolean().default(true),
  applyPrivate: z.boolean().default(true),
  applyRewrite: z.boolean().default(true),
  mergeConsecutive: z.boolean().default(true),
  maxContextSizeOverride: z.number().int().nonnegative().default(0),
  fallbackToOriginal: z.boolean().default(true),
  verbose: z.boolean().default(false),
  templateVersion: z.string().min(1).default(DEFAULT_TEMPLATE_VERSION),
  botNickname: z.string().min(1).default('bot'),
  botAccounts: z
    .array(z.object({ platform: z.string().min(1), userId: z.string().min(1) }))
    .default([]),
});

type ParsedGuardConfig = z.infer<typeof GuardConfigSchema>;

export type GuardConfig = Readonly<Omit<ParsedGuardConfig, 'botAccounts'>> & {
  readonly botAccounts: readonly IdentityKey[];
};
export type GuardConfigInput = z.input<typeof GuardConfigSchema>;

/** The original plugin's config file layout */
const SectionedConfigSchema = z.object({
  plugin: z.object({ enabled: z.boolean().optional() }).partial().optional(),
  runtime: z
    .object({
      apply_group: z.boolean(),
      apply_private: z.boolean(),
      apply_rewrite: z.boolean(),
      merge_consecutive: z.boolean(),
      max_context_size_override: z.number(),
      fallback_to_original: z.boolean(),
    })
    .partial()
    .optional(),
  log: z.object({ verbose: z.boolean() }).partial().optional(),
});

export interface GuardSettings {
  config: GuardConfig;
  botSet: BotIdentitySet;
  rules: TemplateRules;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSectioned(input: Record<string, unknown>): boolean {
  return 'plugin' in input || 'runtime' in input || 'log' in input;
}

function flattenSections(input: Record<string, unknown>): GuardConfigInput {
  const parsed = SectionedConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid guard configuration: ${describeIssues(parsed.error)}`);
  }
  const { plugin, runtime, log } = parsed.data;
  return {
    enabled: plugin?.enabled,
    applyGroup: runtime?.apply_group,
    applyPrivate: runtime?.apply_private,
    applyRewrite: runtime?.apply_rewrite,
    mergeConsecutive: runtime?.merge_consecutive,
    maxContextSizeOverride: runtime?.max_context_size_override,
    fallbackToOriginal: runtime?.fallback_to_original,
    verbose: log?.verbose,
  };
}

/**
 * Validate a configuration object. Accepts the flat shape or the
 * `plugin` / `runtime` / `log` sectioned shape.
 */
export function parseGuardConfig(input: unknown = {}): GuardConfig {
  const candidate = isRecord(input) && isSectioned(input) ? flattenSections(input) : input;

  const result = GuardConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError(`Invalid guard configuration: ${describeIssues(result.error)}`, {
      issues: result.error.issues.length,
    });
  }

  const { botAccounts, ...rest } = result.data;
  return Object.freeze({
    ...rest,
    botAccounts: Object.freeze(botAccounts.map((account) => Object.freeze({ ...account }))),
  });
}

function readBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  // Left as a string so validation reports it
  return value;
}

function readNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

/**
 * Build the configuration from `MESSAGE_GUARD_*` environment variables,
 * loading `.env` files first when reading the real process environment.
 */
export function loadGuardConfig(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  if (env === process.env) {
    loadDotenv({ path: resolve(process.cwd(), '.env') });
  }

  const accounts = env.MESSAGE_GUARD_BOT_ACCOUNTS;
  return parseGuardConfig({
    enabled: readBoolean(env.MESSAGE_GUARD_ENABLED),
    applyGroup: readBoolean(env.MESSAGE_GUARD_APPLY_GROUP),
    applyPrivate: readBoolean(env.MESSAGE_GUARD_APPLY_PRIVATE),
    applyRewrite: readBoolean(env.MESSAGE_GUARD_APPLY_REWRITE),
    mergeConsecutive: readBoolean(env.MESSAGE_GUARD_MERGE_CONSECUTIVE),
    maxContextSizeOverride: readNumber(env.MESSAGE_GUARD_MAX_CONTEXT_SIZE),
    fallbackToOriginal: readBoolean(env.MESSAGE_GUARD_FALLBACK),
    verbose: readBoolean(env.MESSAGE_GUARD_VERBOSE),
    templateVersion: env.MESSAGE_GUARD_TEMPLATE || undefined,
    botNickname: env.MESSAGE_GUARD_BOT_NICKNAME || undefined,
    botAccounts: accounts ? parseBotAccounts(accounts) : undefined,
  });
}

/**
 * Everything a request needs, resolved once. `extraAccounts` lets the host
 * add accounts it knows about beyond the configured list.
 */
export function createGuardSettings(
  config: GuardConfig,
  extraAccounts: readonly IdentityKey[] = []
): GuardSettings {
  return Object.freeze({
    config,
    botSet: BotIdentitySet.fromAccounts([...config.botAccounts, ...extraAccounts]),
    rules: resolveTemplateRules(config.templateVersion),
  });
}
