import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ZodError } from 'zod';
import {
  AgentNetConfigSchema,
  DEFAULT_CONFIG,
  type AgentNetConfig,
} from '../../types/config.js';
import { ConfigError } from '../../core/errors.js';

export const CONFIG_FILENAME = '.agentnet.yaml';

/**
 * Load and validate the agentnet configuration from `dir`.
 * A missing file yields the defaults.
 */
export function loadConfig(dir: string = process.cwd()): AgentNetConfig {
  const configPath = join(dir, CONFIG_FILENAME);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const rawConfig: unknown = parseYaml(content) ?? {};

    // Interpolate environment variables
    const interpolated = interpolateEnvVars(rawConfig);

    return AgentNetConfigSchema.parse(interpolated);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        `Invalid ${CONFIG_FILENAME}: ${error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        error
      );
    }
    if (error instanceof Error) {
      throw new ConfigError(`Failed to load config: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Save configuration to .agentnet.yaml
 */
export function saveConfig(dir: string, config: AgentNetConfig): void {
  const configPath = join(dir, CONFIG_FILENAME);
  const content = stringifyYaml(config, { indent: 2 });
  writeFileSync(configPath, content, 'utf-8');
}

/**
 * Interpolate environment variables in config values.
 * Supports ${VAR_NAME} syntax; numeric strings become numbers so that
 * `timeoutMs: ${LLM_TIMEOUT}` still validates.
 */
export function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    if (!obj.includes('${')) {
      return obj;
    }
    const replaced = obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable ${varName} is not set`);
      }
      return value;
    });
    return /^-?\d+(\.\d+)?$/.test(replaced) ? Number(replaced) : replaced;
  }

  if (Array.isArray(obj)) {
    return obj.map(interpolateEnvVars);
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value);
    }
    return result;
  }

  return obj;
}
