/**
 * Configuration Loader
 *
 * Loads hedging configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import { HedgeError, zodErrorToHedgeError } from '../api/errors.js';
import type { HedgeDispatcherConfig } from '../types/config.js';
import { HedgingConfigSchema } from '../types/schemas/config.js';

/**
 * Configuration Schema (matches hedging.yaml structure)
 */
export type HedgingConfig = z.infer<typeof HedgingConfigSchema>;

export type ConfigEnvironment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace `target`
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  if (env === 'production' || env === 'test') {
    return env;
  }
  return 'development';
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): HedgingConfig {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'hedging.yaml');

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      throw new HedgeError(
        'InvalidConfiguration',
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/hedging.yaml exists in the project root.`,
        { path: finalPath }
      );
    }
    throw new HedgeError(
      'InvalidConfiguration',
      `Failed to load configuration: ${String(error)}`,
      { path: finalPath },
      { cause: error }
    );
  }

  // Validates the base sections and every environment override
  const base = validateConfig(raw);

  const env = resolveEnvironment(environment);
  const override = base.environments?.[env];
  if (!isPlainObject(raw)) {
    return base;
  }

  const baseSections: PlainObject = { ...raw };
  delete baseSections.environments;
  const merged = override ? deepMerge(baseSections, override) : baseSections;
  return validateConfig(merged);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): HedgingConfig {
  const parseResult = HedgingConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    const error = zodErrorToHedgeError(parseResult.error);
    throw new HedgeError(
      'InvalidConfiguration',
      `Configuration validation failed:\n${errors.join('\n')}`,
      error.details
    );
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: HedgingConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): HedgingConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): HedgingConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML config (snake_case) to the dispatcher config (camelCase)
 */
export function toDispatcherConfig(config: HedgingConfig = getConfig()): HedgeDispatcherConfig {
  return {
    targetSloMs: config.timing.target_slo_ms,
    hedgeFraction: config.timing.hedge_at,
    maxHedges: config.timing.max_hedges,
    hedgePoints: config.timing.hedge_points,
    adaptive: config.adaptive.enabled,
    percentile: config.adaptive.percentile,
    latencyAttribution: config.adaptive.latency_attribution,
    windowSize: config.tracker.window_size,
    minSamples: config.tracker.min_samples,
    maxEndpoints: config.tracker.max_endpoints,
    logLevel: config.logging.level,
    loggerName: config.logging.name,
  };
}
