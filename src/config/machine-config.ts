// Machine Configuration
// Default cache bounds and logging level, overridable from the environment

import { z } from 'zod';
import { configureLogger, LogLevelName, parseLogLevel } from '../utils/logger.js';

const bound = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

// Environment values arrive as strings; only plain digit strings are bounds
const envBound = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform(Number)
  .pipe(bound);

export const MachineConfigSchema = z.object({
  capacity: bound,
  maxAge: bound,
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

export type MachineConfig = z.infer<typeof MachineConfigSchema>;

const EnvConfigSchema = MachineConfigSchema.extend({
  capacity: z.union([bound, envBound]),
  maxAge: z.union([bound, envBound]),
});

export const DEFAULT_CONFIG: MachineConfig = {
  capacity: 128,
  maxAge: 50,
  logLevel: 'info',
};

let currentConfig: MachineConfig = { ...DEFAULT_CONFIG };

function parseConfig(schema: z.ZodType<MachineConfig, z.ZodTypeDef, unknown>, input: unknown): MachineConfig {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid machine configuration: ${details}`);
  }
  return parsed.data;
}

function applyLogLevel(level: LogLevelName): void {
  configureLogger({ level: parseLogLevel(level) });
}

/**
 * Load configuration from environment variables
 * Throws if any override is malformed
 */
export function loadMachineConfig(env: NodeJS.ProcessEnv = process.env): MachineConfig {
  const raw: Record<string, unknown> = { ...DEFAULT_CONFIG };

  if (env.SEQ_CACHE_CAPACITY !== undefined) {
    raw.capacity = env.SEQ_CACHE_CAPACITY;
  }
  if (env.SEQ_CACHE_MAX_AGE !== undefined) {
    raw.maxAge = env.SEQ_CACHE_MAX_AGE;
  }
  if (env.LOG_LEVEL !== undefined) {
    raw.logLevel = env.LOG_LEVEL.trim().toLowerCase();
  }

  currentConfig = parseConfig(EnvConfigSchema, raw);
  applyLogLevel(currentConfig.logLevel);
  return { ...currentConfig };
}

export function getMachineConfig(): MachineConfig {
  return { ...currentConfig };
}

/**
 * Update configuration at runtime
 */
export function updateMachineConfig(updates: Partial<MachineConfig>): MachineConfig {
  currentConfig = parseConfig(MachineConfigSchema, { ...currentConfig, ...updates });
  applyLogLevel(currentConfig.logLevel);
  return { ...currentConfig };
}

export function resetMachineConfig(): MachineConfig {
  currentConfig = { ...DEFAULT_CONFIG };
  applyLogLevel(currentConfig.logLevel);
  return { ...currentConfig };
}
