import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z, type ZodError } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { streamServerConfigSchema } from './stream/registry.js';
import type { StreamServerConfig, Triggers } from './stream/types.js';

export const DEFAULT_CONFIG_PATH = resolve('switcher.config.json');

// Load .env from the working directory
loadDotenv({ path: resolve('.env') });

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STATS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

const threshold = z.number().int().nonnegative().optional();

const fileSchema = z.object({
  streamServers: z.array(streamServerConfigSchema).default([]),
  triggers: z.object({ offline: threshold, low: threshold }).default({}),
});

export interface Config {
  logLevel: LogLevel;
  requestTimeoutMs: number;
  streamServers: readonly StreamServerConfig[];
  triggers: Readonly<Triggers>;
}

function describeIssues(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

export function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: Record<string, string | undefined> = process.env,
): Config {
  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(envResult.error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const fileResult = fileSchema.safeParse(raw);
  if (!fileResult.success) {
    throw new ConfigError(`Invalid ${configPath}: ${describeIssues(fileResult.error)}`);
  }

  return Object.freeze({
    logLevel: envResult.data.LOG_LEVEL,
    requestTimeoutMs: envResult.data.STATS_REQUEST_TIMEOUT_MS,
    streamServers: Object.freeze(fileResult.data.streamServers),
    triggers: Object.freeze(fileResult.data.triggers),
  });
}
