/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for the environment variables the engine reads,
 * validates them once, and exports a typed config object.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { flagEnabled, isJestRuntime } from '../utils/envFlags';

// Load .env into process.env before we read anything from it.
dotenv.config();

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Log file path (optional; console only when unset) */
  LOG_FILE: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

/**
 * When running under Jest, always treat the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export interface EngineConfig {
  nodeEnv: NodeEnv;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file?: string;
    /** Suppress all output (tests, unless tracing is requested). */
    silent: boolean;
  };
}

/**
 * Build the typed engine config from a raw environment.
 *
 * FLOE_ENGINE_TRACE=1 forces debug-level logging and un-silences tests.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = parseEnv(env);
  if (!parsed.success || !parsed.data) {
    const details = (parsed.errors ?? [])
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const raw = parsed.data;
  const nodeEnv = getEffectiveNodeEnv(raw);
  const trace = flagEnabled('FLOE_ENGINE_TRACE', env);

  return {
    nodeEnv,
    logging: {
      level: trace ? 'debug' : raw.LOG_LEVEL,
      format: raw.LOG_FORMAT,
      file: raw.LOG_FILE?.trim() || undefined,
      silent: nodeEnv === 'test' && !trace,
    },
  };
}

export const config: EngineConfig = loadConfig();
