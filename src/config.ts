/**
 * Process configuration.
 *
 * Read once from the environment at startup, validated, and frozen. Every
 * component receives the slice it needs through its constructor; nothing
 * below the entry point reads process.env.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './logger';
import { ReaperError, configInvalidError } from './domain/errors';

/** Whether the platform supports revoke-by-id. */
export type RevokeMode = 'full' | 'limited';

/** Which platform listing produces the account snapshot. */
export type ListingMode = 'scim' | 'legacy';

export interface DirectoryConfig {
  readonly url: string;
  readonly baseDn: string;
  readonly bindDn: string;
  readonly bindPassword: string;
  readonly searchFilter: string;
  readonly searchAttributes: readonly string[];
  readonly emailAttribute: string;
  readonly pageSize: number;
}

export interface PlatformConfig {
  readonly token: string;
  readonly apiUrl: string;
  readonly workspaceUrl: string;
  readonly revokeMode: RevokeMode;
  readonly listingMode: ListingMode;
  readonly botEmailSuffix: string;
}

export interface NotificationConfig {
  readonly username: string;
  readonly iconEmoji: string;
}

export interface ReaperConfig {
  readonly maxDeleteFailsafe: number;
  readonly intervalMs: number;
  readonly directory: DirectoryConfig;
  readonly platform: PlatformConfig;
  readonly notification: NotificationConfig;
  readonly statusPort?: number;
  readonly logLevel: LogLevel;
}

/** Process exit status for configuration errors (sysexits EX_CONFIG). */
export const CONFIG_ERROR_EXIT_CODE = 78;

/** Longest interval a single timer can wait: 2^31 - 1 ms, rounded down to whole seconds. */
export const MAX_INTERVAL_SECONDS = 2_147_483;

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} must not be empty`);

const attributeList = z
  .string({ required_error: 'DIRECTORY_SEARCH_ATTRIBUTES is required' })
  .transform((raw, ctx) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'DIRECTORY_SEARCH_ATTRIBUTES must be a JSON array of strings' });
      return z.NEVER;
    }
    const result = z.array(z.string().min(1)).nonempty().safeParse(parsed);
    if (!result.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'DIRECTORY_SEARCH_ATTRIBUTES must be a non-empty JSON array of strings' });
      return z.NEVER;
    }
    return result.data;
  });

const envSchema = z.object({
  MAX_DELETE_FAILSAFE: z.coerce
    .number({ invalid_type_error: 'MAX_DELETE_FAILSAFE must be a number' })
    .min(0, 'MAX_DELETE_FAILSAFE must be between 0 and 1')
    .max(1, 'MAX_DELETE_FAILSAFE must be between 0 and 1')
    .default(0.2),
  PLATFORM_TOKEN: requiredString('PLATFORM_TOKEN'),
  PLATFORM_API_URL: z.string().url('PLATFORM_API_URL must be a URL').default('https://api.slack.com'),
  PLATFORM_WORKSPACE_URL: z.string({ required_error: 'PLATFORM_WORKSPACE_URL is required' }).url('PLATFORM_WORKSPACE_URL must be a URL'),
  PLATFORM_REVOKE_MODE: z.enum(['full', 'limited']).default('full'),
  PLATFORM_LISTING_MODE: z.enum(['scim', 'legacy']).optional(),
  PLATFORM_BOT_EMAIL_SUFFIX: z.string().trim().default('@slack-bots.com'),
  DIRECTORY_URL: requiredString('DIRECTORY_URL'),
  DIRECTORY_BASE_DN: requiredString('DIRECTORY_BASE_DN'),
  DIRECTORY_BIND_DN: requiredString('DIRECTORY_BIND_DN'),
  DIRECTORY_BIND_PASSWORD: requiredString('DIRECTORY_BIND_PASSWORD'),
  DIRECTORY_SEARCH_FILTER: requiredString('DIRECTORY_SEARCH_FILTER'),
  DIRECTORY_SEARCH_ATTRIBUTES: attributeList,
  DIRECTORY_EMAIL_ATTRIBUTE: z.string().trim().min(1).default('mail'),
  DIRECTORY_PAGE_SIZE: z.coerce.number().int().positive('DIRECTORY_PAGE_SIZE must be positive').default(5000),
  SYNC_INTERVAL_SECONDS: z.coerce
    .number()
    .positive('SYNC_INTERVAL_SECONDS must be positive')
    .max(MAX_INTERVAL_SECONDS, `SYNC_INTERVAL_SECONDS must be at most ${MAX_INTERVAL_SECONDS} (timers overflow beyond that)`)
    .default(3600),
  NOTIFY_USERNAME: z.string().trim().min(1).default('workspace reaper'),
  NOTIFY_ICON_EMOJI: z.string().trim().min(1).default(':scream_cat:'),
  STATUS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  LOG_LEVEL: z
    .string()
    .default(LogLevel.Info)
    .transform((raw, ctx) => {
      const level = parseLogLevel(raw);
      if (!level) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}` });
        return z.NEVER;
      }
      return level;
    }),
});

/** Raw environment shape accepted by loadConfig. */
export type ConfigEnv = Record<string, string | undefined>;

/** Blank variables count as unset so defaults apply. */
function dropBlank(env: ConfigEnv): ConfigEnv {
  const result: ConfigEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[key] = value;
  }
  return result;
}

/**
 * Build the immutable configuration from environment variables.
 * Throws a ReaperError with code CONFIG.INVALID listing every problem found.
 */
export function loadConfig(env: ConfigEnv): ReaperConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 && !issue.message.includes(String(issue.path[0]))
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    );
    throw new ReaperError(configInvalidError('Invalid configuration', issues));
  }

  const e = parsed.data;
  const config: ReaperConfig = {
    maxDeleteFailsafe: e.MAX_DELETE_FAILSAFE,
    intervalMs: Math.round(e.SYNC_INTERVAL_SECONDS * 1000),
    directory: Object.freeze({
      url: e.DIRECTORY_URL,
      baseDn: e.DIRECTORY_BASE_DN,
      bindDn: e.DIRECTORY_BIND_DN,
      bindPassword: e.DIRECTORY_BIND_PASSWORD,
      searchFilter: e.DIRECTORY_SEARCH_FILTER,
      searchAttributes: Object.freeze([...e.DIRECTORY_SEARCH_ATTRIBUTES]),
      emailAttribute: e.DIRECTORY_EMAIL_ATTRIBUTE,
      pageSize: e.DIRECTORY_PAGE_SIZE,
    }),
    platform: Object.freeze({
      token: e.PLATFORM_TOKEN,
      apiUrl: e.PLATFORM_API_URL.replace(/\/+$/, ''),
      workspaceUrl: e.PLATFORM_WORKSPACE_URL.replace(/\/+$/, ''),
      revokeMode: e.PLATFORM_REVOKE_MODE,
      listingMode: e.PLATFORM_LISTING_MODE ?? (e.PLATFORM_REVOKE_MODE === 'full' ? 'scim' : 'legacy'),
      botEmailSuffix: e.PLATFORM_BOT_EMAIL_SUFFIX.toLowerCase(),
    }),
    notification: Object.freeze({
      username: e.NOTIFY_USERNAME,
      iconEmoji: e.NOTIFY_ICON_EMOJI,
    }),
    statusPort: e.STATUS_PORT,
    logLevel: e.LOG_LEVEL,
  };
  return Object.freeze(config);
}

/** Values that must never appear in logs or messages. */
export function configSecrets(config: ReaperConfig): string[] {
  return [config.platform.token, config.directory.bindPassword];
}
