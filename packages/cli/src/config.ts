/**
 * CLI configuration
 *
 * Read from FIRESIDE_* environment variables (a `.env` file is loaded at
 * startup), with command-line flags taking precedence.
 */

import { z } from 'zod';
import { ValidationError, type LogLevel } from '@fireside/core';

export type AuthConfig = { token: string } | { username: string; password: string | null };

export interface CliConfig {
  url: string;
  auth: AuthConfig;
  streamingUrl?: string;
  logLevel: LogLevel;
  logJson: boolean;
  pollIntervalMs?: number;
}

/** Global flags; each one overrides its environment variable */
export interface ConfigOverrides {
  url?: string;
  token?: string;
  username?: string;
  streamingUrl?: string;
  logLevel?: string;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    FIRESIDE_URL: z.string().url().optional(),
    FIRESIDE_SUBDOMAIN: z
      .string()
      .regex(/^[a-z0-9-]+$/i, 'Must contain only letters, digits and dashes')
      .optional(),
    FIRESIDE_TOKEN: z.string().optional(),
    FIRESIDE_USERNAME: z.string().optional(),
    FIRESIDE_PASSWORD: z.string().optional(),
    FIRESIDE_STREAMING_URL: z.string().url().optional(),
    FIRESIDE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
    FIRESIDE_LOG_JSON: booleanFlag,
    FIRESIDE_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  })
  .transform((env, ctx): CliConfig => {
    const url = env.FIRESIDE_URL ?? (env.FIRESIDE_SUBDOMAIN && `https://${env.FIRESIDE_SUBDOMAIN}.campfirenow.com`);
    if (!url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['FIRESIDE_URL'],
        message: 'Set FIRESIDE_URL or FIRESIDE_SUBDOMAIN',
      });
    }

    let auth: AuthConfig | null = null;
    if (env.FIRESIDE_TOKEN) {
      auth = { token: env.FIRESIDE_TOKEN };
    } else if (env.FIRESIDE_USERNAME) {
      auth = { username: env.FIRESIDE_USERNAME, password: env.FIRESIDE_PASSWORD ?? null };
    } else {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['FIRESIDE_TOKEN'],
        message: 'Set FIRESIDE_TOKEN or FIRESIDE_USERNAME',
      });
    }

    if (!url || !auth) return z.NEVER;

    return {
      url,
      auth,
      logLevel: env.FIRESIDE_LOG_LEVEL,
      logJson: env.FIRESIDE_LOG_JSON,
      ...(env.FIRESIDE_STREAMING_URL ? { streamingUrl: env.FIRESIDE_STREAMING_URL } : {}),
      ...(env.FIRESIDE_POLL_INTERVAL_MS ? { pollIntervalMs: env.FIRESIDE_POLL_INTERVAL_MS } : {}),
    };
  });

const FLAG_VARIABLES: Record<keyof ConfigOverrides, string> = {
  url: 'FIRESIDE_URL',
  token: 'FIRESIDE_TOKEN',
  username: 'FIRESIDE_USERNAME',
  streamingUrl: 'FIRESIDE_STREAMING_URL',
  logLevel: 'FIRESIDE_LOG_LEVEL',
};

function isFlag(key: string): key is keyof ConfigOverrides {
  return key in FLAG_VARIABLES;
}

/**
 * Build the CLI configuration. Empty variables count as unset.
 * Throws ValidationError listing every invalid or missing setting.
 */
export function loadConfig(env: NodeJS.ProcessEnv, overrides: ConfigOverrides = {}): CliConfig {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('FIRESIDE_') && value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (isFlag(key) && typeof value === 'string' && value.trim() !== '') {
      values[FLAG_VARIABLES[key]] = value.trim();
    }
  }

  const result = envSchema.safeParse(values);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.map(String),
      message: issue.message,
    }));
    const summary = errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ValidationError(`Invalid configuration: ${summary}`, { errors });
  }
  return result.data;
}
