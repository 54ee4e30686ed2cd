/**
 * Configuration loading and management
 */

import { InvalidConfigError } from '@research-desk/contracts';
import type { Logger } from '@research-desk/logger';
import { configSchema, envMapping, type Config, type EnvValueKind } from './schema.js';

/**
 * Load configuration from environment and defaults.
 *
 * @throws {InvalidConfigError} Listing every failing path
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, binding] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, binding.path, parseEnvValue(value, binding.kind));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      issues,
    });
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    return;
  }

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
 * Convert an environment string to the bound kind. Values that do not
 * convert are passed through as strings so validation reports them.
 */
export function parseEnvValue(value: string, kind: EnvValueKind): string | number | boolean {
  switch (kind) {
    case 'boolean':
      if (value === 'true' || value === '1') return true;
      if (value === 'false' || value === '0') return false;
      return value;
    case 'number': {
      const num = Number(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'string':
    default:
      return value;
  }
}

/**
 * Get configuration summary for logging. Credentials are reported only as
 * present or absent.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    provider: {
      type: config.provider.type,
      baseUrl: config.provider.baseUrl ?? 'default',
      fixturePath: config.provider.fixturePath,
      lookbackDays: config.provider.lookbackDays,
      adjusted: config.provider.adjusted,
      credentials: config.provider.crumb || config.provider.cookie ? 'configured' : 'none',
    },
    analysis: {
      pivotWindow: config.analysis.pivotWindow,
      clusterThreshold: config.analysis.clusterThreshold,
      maxLevels: config.analysis.maxLevels,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    report: {
      outputDir: config.report.outputDir,
      format: config.report.format,
    },
  };
}

// Re-export types
export type { Config, EnvBinding, EnvValueKind } from './schema.js';
export { configSchema, envMapping } from './schema.js';
