/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const reportFormatSchema = z.enum(['text', 'markdown', 'json']);

/**
 * Application configuration schema
 */
export const configSchema = z
  .object({
    app: z
      .object({
        env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
        name: z.string().default('research-desk'),
        version: z.string().default('0.1.0'),
      })
      .default({}),

    logging: z
      .object({
        level: logLevelSchema.default('info'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        filePath: z.string().optional(),
      })
      .default({}),

    provider: z
      .object({
        type: z.enum(['yahoo', 'fixture']).default('yahoo'),
        baseUrl: z.string().url().optional(),
        timeout: z.number().int().positive().default(10_000),
        fixturePath: z.string().optional(),
        crumb: z.string().optional(),
        cookie: z.string().optional(),
        lookbackDays: z.number().int().positive().default(500),
        adjusted: z.boolean().default(true),
      })
      .default({}),

    analysis: z
      .object({
        pivotWindow: z.number().int().min(3).default(10),
        clusterThreshold: z.number().gt(0).lt(1).default(0.03),
        maxLevels: z.number().int().positive().default(3),
        includeTable: z.boolean().default(false),
      })
      .default({}),

    report: z
      .object({
        outputDir: z.string().default('./reports'),
        format: reportFormatSchema.default('text'),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.provider.type === 'fixture' && !config.provider.fixturePath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['provider', 'fixturePath'],
        message: 'Required when provider type is "fixture"',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * How an environment variable's raw string is converted before validation
 */
export type EnvValueKind = 'string' | 'number' | 'boolean';

export interface EnvBinding {
  path: string;
  kind: EnvValueKind;
}

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, EnvBinding> = {
  NODE_ENV: { path: 'app.env', kind: 'string' },
  LOG_LEVEL: { path: 'logging.level', kind: 'string' },
  LOG_FORMAT: { path: 'logging.format', kind: 'string' },
  LOG_FILE: { path: 'logging.filePath', kind: 'string' },
  PROVIDER_TYPE: { path: 'provider.type', kind: 'string' },
  PROVIDER_BASE_URL: { path: 'provider.baseUrl', kind: 'string' },
  PROVIDER_TIMEOUT: { path: 'provider.timeout', kind: 'number' },
  PROVIDER_FIXTURE_PATH: { path: 'provider.fixturePath', kind: 'string' },
  PROVIDER_ADJUSTED: { path: 'provider.adjusted', kind: 'boolean' },
  YAHOO_CRUMB: { path: 'provider.crumb', kind: 'string' },
  YAHOO_COOKIE: { path: 'provider.cookie', kind: 'string' },
  LOOKBACK_DAYS: { path: 'provider.lookbackDays', kind: 'number' },
  PIVOT_WINDOW: { path: 'analysis.pivotWindow', kind: 'number' },
  CLUSTER_THRESHOLD: { path: 'analysis.clusterThreshold', kind: 'number' },
  MAX_LEVELS: { path: 'analysis.maxLevels', kind: 'number' },
  INCLUDE_TABLE: { path: 'analysis.includeTable', kind: 'boolean' },
  REPORT_DIR: { path: 'report.outputDir', kind: 'string' },
  REPORT_FORMAT: { path: 'report.format', kind: 'string' },
};
