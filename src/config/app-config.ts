/**
 * Application configuration - parse, don't validate.
 *
 * - Environment is the base layer, CLI flags override it
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import { SPLIT_ORDER, rankOf } from '../domain/splits/milestones.js';
import type { SoftBand } from '../domain/splits/milestones.js';
import type { LogLevel } from '../core/logging/index.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type PollIntervalMs = Brand<number, 'PollIntervalMs'>;
export type CooldownMs = Brand<number, 'CooldownMs'>;
export type DiscordClientId = Brand<string, 'DiscordClientId'>;

export type PresenceMode = { readonly kind: 'discord' } | { readonly kind: 'log_only' };

/** Client id of the sample application; works but shows a generic name. */
export const PLACEHOLDER_CLIENT_ID = '1234567890123456789';

export interface AppConfig {
  readonly paths: {
    /** null: auto-detect. */
    readonly minecraftDir: string | null;
    /** null: `<minecraftDir>/logs/latest.log`, discovered. */
    readonly logFile: string | null;
    /** null: the minecraft directory. */
    readonly snapshotRoot: string | null;
  };
  readonly snapshot: {
    readonly fileNames: readonly string[];
    readonly maxDepth: number;
  };
  readonly polling: {
    readonly streamMs: PollIntervalMs;
    readonly snapshotMs: PollIntervalMs;
  };
  readonly reconciliation: {
    readonly cooldownMs: CooldownMs;
    readonly softBand: SoftBand;
  };
  readonly presence: {
    readonly mode: PresenceMode;
    readonly clientId: DiscordClientId;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly filePath: string | null;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

/** Values given on the command line; each one wins over its env var. */
export interface ConfigOverrides {
  readonly minecraftDir?: string;
  readonly logFile?: string;
  readonly snapshotRoot?: string;
  readonly clientId?: string;
  readonly discord?: boolean;
  readonly debug?: boolean;
}

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly overrides?: ConfigOverrides;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const intervalFromEnv = (name: string, fallback: number, min: number, max: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .default(fallback),
    );

const EnvSchema = z
  .object({
    MCSR_MC_DIR: z.string().min(1).optional(),
    MCSR_LOG_PATH: z.string().min(1).optional(),
    MCSR_SNAPSHOT_ROOT: z.string().min(1).optional(),
    MCSR_SNAPSHOT_FILE_NAMES: z
      .string()
      .default('record.json,latest_world')
      .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0))
      .pipe(z.array(z.string()).min(1, 'MCSR_SNAPSHOT_FILE_NAMES needs at least one name')),
    MCSR_SNAPSHOT_MAX_DEPTH: intervalFromEnv('MCSR_SNAPSHOT_MAX_DEPTH', 4, 0, 12),

    MCSR_STREAM_POLL_MS: intervalFromEnv('MCSR_STREAM_POLL_MS', 100, 10, 60_000),
    MCSR_SNAPSHOT_POLL_MS: intervalFromEnv('MCSR_SNAPSHOT_POLL_MS', 1_000, 50, 300_000),
    MCSR_COOLDOWN_MS: intervalFromEnv('MCSR_COOLDOWN_MS', 2_000, 0, 60_000),

    MCSR_SOFT_BAND_FROM: z.enum(SPLIT_ORDER).default('fortress'),
    MCSR_SOFT_BAND_BEFORE: z.enum(SPLIT_ORDER).default('stronghold'),

    MCSR_DISCORD_CLIENT_ID: z
      .string()
      .regex(/^\d{17,20}$/, 'MCSR_DISCORD_CLIENT_ID must be a numeric application id')
      .default(PLACEHOLDER_CLIENT_ID),
    MCSR_DISABLE_DISCORD: z.enum(['0', '1']).default('0'),

    MCSR_LOG_LEVEL: z
      .string()
      .optional()
      .transform((v) => v?.toLowerCase())
      .pipe(z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info')),
    MCSR_LOG_FILE: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (rankOf(env.MCSR_SOFT_BAND_FROM) >= rankOf(env.MCSR_SOFT_BAND_BEFORE)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MCSR_SOFT_BAND_FROM'],
        message: `Soft band must open before it closes (${env.MCSR_SOFT_BAND_FROM} is not before ${env.MCSR_SOFT_BAND_BEFORE})`,
      });
    }
  });

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const overrides = options.overrides ?? {};
  const parsed = EnvSchema.safeParse({
    ...options.env,
    ...(overrides.clientId !== undefined ? { MCSR_DISCORD_CLIENT_ID: overrides.clientId } : {}),
  });

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(brand(buildConfig(parsed.data, overrides)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return brand(value);
}

// =============================================================================
// Internal
// =============================================================================

function brand(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

function buildConfig(env: ParsedEnv, overrides: ConfigOverrides): AppConfig {
  const discordDisabled = overrides.discord === false || env.MCSR_DISABLE_DISCORD === '1';

  return {
    paths: {
      minecraftDir: overrides.minecraftDir ?? env.MCSR_MC_DIR ?? null,
      logFile: overrides.logFile ?? env.MCSR_LOG_PATH ?? null,
      snapshotRoot: overrides.snapshotRoot ?? env.MCSR_SNAPSHOT_ROOT ?? null,
    },
    snapshot: {
      fileNames: env.MCSR_SNAPSHOT_FILE_NAMES,
      maxDepth: env.MCSR_SNAPSHOT_MAX_DEPTH,
    },
    polling: {
      streamMs: env.MCSR_STREAM_POLL_MS as PollIntervalMs,
      snapshotMs: env.MCSR_SNAPSHOT_POLL_MS as PollIntervalMs,
    },
    reconciliation: {
      cooldownMs: env.MCSR_COOLDOWN_MS as CooldownMs,
      softBand: { from: env.MCSR_SOFT_BAND_FROM, before: env.MCSR_SOFT_BAND_BEFORE },
    },
    presence: {
      mode: discordDisabled ? { kind: 'log_only' } : { kind: 'discord' },
      clientId: env.MCSR_DISCORD_CLIENT_ID as DiscordClientId,
    },
    logging: {
      level: overrides.debug === true ? 'debug' : env.MCSR_LOG_LEVEL,
      filePath: env.MCSR_LOG_FILE ?? null,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
