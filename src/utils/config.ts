import { z } from 'zod';

import { ConfigurationError } from '~/utils/errors.js';
import { defaultHomeDir, defaultProjectsDir } from '~/utils/paths.js';

export const DEFAULT_INTERVAL_SECONDS = 3;
export const DEFAULT_EXECUTABLE = 'claude';
export const DEFAULT_IDLE_CPU_PERCENT = 1;
export const DEFAULT_ITEM_TIMEOUT_MS = 1500;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;
export const DEFAULT_SUMMARY_LENGTH = 80;

const configSchema = z.object({
  intervalSeconds: z.coerce.number().positive().max(3600),
  storeRoot: z.string().min(1),
  homeDir: z.string(),
  executableName: z
    .string()
    .min(1)
    .refine((name) => !name.includes('/'), {
      message: 'must be a base executable name, not a path',
    }),
  idleCpuPercent: z.coerce.number().min(0).max(100),
  itemTimeoutMs: z.coerce.number().int().positive(),
  maxConsecutiveFailures: z.coerce.number().int().positive(),
  summaryLength: z.coerce.number().int().min(4),
  debug: z.boolean(),
});

export type MonitorConfig = z.infer<typeof configSchema>;

/** Raw values as they arrive from the command line, all optional. */
export interface ConfigOverrides {
  intervalSeconds?: string | number;
  storeRoot?: string;
  executableName?: string;
  idleCpuPercent?: string | number;
  debug?: boolean;
}

type Env = Record<string, string | undefined>;

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Defaults, then SESSION_MONITOR_* environment variables, then explicit
 * overrides. Throws ConfigurationError listing every invalid field.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
): MonitorConfig {
  const homeDir = env.HOME ?? env.USERPROFILE ?? defaultHomeDir();
  const raw = {
    intervalSeconds:
      overrides.intervalSeconds ??
      env.SESSION_MONITOR_INTERVAL ??
      DEFAULT_INTERVAL_SECONDS,
    storeRoot:
      overrides.storeRoot ??
      env.SESSION_MONITOR_STORE ??
      defaultProjectsDir(homeDir),
    homeDir,
    executableName:
      overrides.executableName ??
      env.SESSION_MONITOR_EXECUTABLE ??
      DEFAULT_EXECUTABLE,
    idleCpuPercent:
      overrides.idleCpuPercent ??
      env.SESSION_MONITOR_IDLE_CPU ??
      DEFAULT_IDLE_CPU_PERCENT,
    itemTimeoutMs: DEFAULT_ITEM_TIMEOUT_MS,
    maxConsecutiveFailures: DEFAULT_MAX_CONSECUTIVE_FAILURES,
    summaryLength: DEFAULT_SUMMARY_LENGTH,
    debug: overrides.debug ?? envFlag(env.SESSION_MONITOR_DEBUG) ?? false,
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, {
      issues,
    });
  }
  return parsed.data;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Maps commander's parsed global options onto config overrides. */
export function toConfigOverrides(options: Record<string, unknown>): ConfigOverrides {
  return {
    intervalSeconds: stringOption(options.interval),
    storeRoot: stringOption(options.store),
    executableName: stringOption(options.executable),
    idleCpuPercent: stringOption(options.idleCpu),
    debug: options.debug === true ? true : undefined,
  };
}
