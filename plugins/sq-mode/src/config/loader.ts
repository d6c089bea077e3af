// Config loader — reads ~/.config/sq-mode/config.yaml and merges it over defaults.
// A missing file means defaults; nothing is written back. Unreadable or
// invalid files are logged and ignored so the server still starts.
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { SqModeConfig } from '../types/config.js';
import { SqModeError, SqModeErrorCode } from '../shared/errors.js';
import { logger } from '../logger.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'sq-mode', 'config.yaml');

export const DEFAULT_CONFIG: Readonly<SqModeConfig> = {
  program: 'sq',
  output_buffer: '*sq output*',
  key_prefix: 'C-c s',
  message_max_width: 80,
};

const configSchema = z.object({
  program: z.string().min(1),
  output_buffer: z.string().min(1),
  key_prefix: z.string().min(1),
  message_max_width: z.number().int().positive(),
}).strict();

export interface ConfigResult {
  config: SqModeConfig;
  configPath: string;
  fromFile: boolean;
}

/** Validate a parsed document merged over the defaults. */
export function parseConfig(raw: unknown): SqModeConfig {
  // An empty YAML file parses to null.
  if (raw === null || raw === undefined) return { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new SqModeError(SqModeErrorCode.CONFIG_INVALID, 'Config root must be a mapping');
  }
  const merged = { ...DEFAULT_CONFIG, ...raw };
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new SqModeError(SqModeErrorCode.CONFIG_INVALID, 'Invalid sq-mode configuration', {
      issues: result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
    });
  }
  return result.data;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env.SQ_MODE_CONFIG ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'No config file found — using defaults');
    return { config: { ...DEFAULT_CONFIG }, configPath, fromFile: false };
  }

  try {
    const raw: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
    return { config: parseConfig(raw), configPath, fromFile: true };
  } catch (err) {
    const context = err instanceof SqModeError ? err.context : undefined;
    logger.error({ configPath, error: err instanceof Error ? err.message : String(err), ...context },
      'Failed to load config — using defaults');
    return { config: { ...DEFAULT_CONFIG }, configPath, fromFile: false };
  }
}
