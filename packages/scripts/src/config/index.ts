/**
 * Configuration loading
 */

import { configSchema, envMapping, type ScriptsConfig } from './schema.js';
import { CliError, CliErrorCode } from '../errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Load configuration from environment variables and defaults.
 *
 * Empty variables count as unset.
 *
 * @throws CliError with code CONFIG_ERROR listing every invalid path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScriptsConfig {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new CliError(
      CliErrorCode.CONFIG_ERROR,
      `Configuration validation failed:\n${errors.join('\n')}`,
      { paths: result.error.errors.map((e) => e.path.join('.')) }
    );
  }

  return result.data;
}

/**
 * Config summary for debug logging
 */
export function getConfigSummary(config: ScriptsConfig): Record<string, unknown> {
  return {
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? 'none',
    },
    saveDir: config.output.saveDir,
  };
}

export type { ScriptsConfig } from './schema.js';
