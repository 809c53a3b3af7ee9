/**
 * Configuration loader: YAML application settings and JSON component specifications
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { AppConfig, TargetConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { AppConfigSchema, ComponentConfigSchema } from './schema.js';

/**
 * Default configuration paths
 */
const DEFAULT_CONFIG_PATHS = [
  './config/config.yaml',
  './config/config.yml',
  './config.yaml',
  './config.yml',
];

/**
 * Environment variable overriding webhook.url
 */
export const WEBHOOK_URL_ENV = 'TEAMS_WEBHOOK_URL';

/**
 * Load configuration from YAML file
 */
export async function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const path = configPath || findConfigPath();

  if (!path) {
    throw new ConfigError(
      'Configuration file not found. Please create config/config.yaml based on config/config.example.yaml'
    );
  }

  const content = await readFile(path, 'utf-8');
  return parseConfig(yaml.load(content), env);
}

/**
 * Validate a raw configuration object and apply environment overrides
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = AppConfigSchema.parse(raw ?? {});

  const webhookUrl = env[WEBHOOK_URL_ENV];
  if (webhookUrl) {
    config.webhook.url = z.string().url().parse(webhookUrl);
  }

  return config;
}

/**
 * Load and validate the component specification file
 */
export async function loadTargets(path: string): Promise<TargetConfig[]> {
  if (!existsSync(path)) {
    throw new ConfigError(`Component configuration not found: ${path}`);
  }

  const content = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Component configuration is not valid JSON (${path}): ${reason}`);
  }

  return ComponentConfigSchema.parse(raw);
}

/**
 * Find first existing config file
 */
function findConfigPath(): string | null {
  for (const path of DEFAULT_CONFIG_PATHS) {
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Render a configuration failure as readable text
 */
export function describeConfigError(err: unknown): string {
  if (err instanceof z.ZodError) {
    const errors = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('\n');
    return `Configuration validation failed:\n${errors}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return 'Unknown error';
}

/**
 * Load config with error handling for CLI use
 */
export async function loadConfigSafe(configPath?: string): Promise<{
  config: AppConfig | null;
  targets: TargetConfig[];
  error: string | null;
}> {
  try {
    const config = await loadConfig(configPath);
    const targets = await loadTargets(config.components);
    return { config, targets, error: null };
  } catch (err) {
    return { config: null, targets: [], error: describeConfigError(err) };
  }
}
