/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';
import type { ComponentSpec, PageSpec, StrategySpec, TargetConfig } from '../types/index.js';

/**
 * Reserved key of a target holding the session-priming product URL
 */
export const SETUP_URL_KEY = 'setup_product_url';

/**
 * Crawl configuration schema
 */
export const CrawlConfigSchema = z.object({
  maxWorkers: z.number().int().positive().optional(),
  alertOnPageError: z.boolean().default(false),
});

/**
 * Browser configuration schema
 */
export const BrowserConfigSchema = z.object({
  headless: z.boolean().default(true),
  userAgent: z.string().default(
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
  ),
  timeoutMs: z.number().positive().default(30000),
  scrollStepPx: z.number().int().positive().default(100),
  scrollIntervalMs: z.number().int().positive().default(60),
  settleMs: z.number().int().nonnegative().default(2000),
  viewport: z.object({ width: z.number().int().positive(), height: z.number().int().positive() }).optional(),
});

export const StorageConfigSchema = z.object({
  dir: z.string().default('./data'),
});

export const WebhookConfigSchema = z.object({
  url: z.string().url().optional(),
  timeoutMs: z.number().positive().default(10000),
});

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const DigestConfigSchema = z.object({
  windowHours: z.number().positive().default(24),
  timeZone: z.string().refine(isTimeZone, { message: 'Unknown time zone' }).default('UTC'),
});

export const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(5000),
});

/**
 * Scheduler configuration schema
 */
export const SchedulerConfigSchema = z.object({
  enabled: z.boolean().default(false),
  baseIntervalMs: z.number().positive().default(6 * 60 * 60 * 1000),
  jitterRatio: z.number().min(0).max(1).default(0.1),
});

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  file: z.string().optional(),
});

/**
 * Complete application configuration schema
 */
export const AppConfigSchema = z.object({
  components: z.string().default('./config/components.json'),
  crawl: CrawlConfigSchema.default({}),
  browser: BrowserConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  webhook: WebhookConfigSchema.default({}),
  digest: DigestConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfigInput = z.input<typeof AppConfigSchema>;

const StrategySchema = z
  .object({
    strategy_name: z.string().min(1),
    text_pattern: z.string().min(1),
    container_class: z.string().optional(),
  })
  .transform(
    (raw): StrategySpec => ({
      strategyName: raw.strategy_name,
      textPattern: raw.text_pattern,
      ...(raw.container_class ? { containerClass: raw.container_class } : {}),
    })
  );

/**
 * Component specification; "data-testid" and "data-test-id" are aliases of "attribute"
 */
export const ComponentSpecSchema = z
  .object({
    name: z.string().min(1),
    identifier_type: z.enum(['attribute', 'data-testid', 'data-test-id', 'class', 'id']),
    identifier_value: z.string().min(1),
    carousel_strategies: z.array(StrategySchema).optional(),
    text_strategies: z.array(StrategySchema).optional(),
    strategies: z.array(StrategySchema).optional(),
  })
  .transform((raw): ComponentSpec => {
    const spec: ComponentSpec = {
      name: raw.name,
      identifierType:
        raw.identifier_type === 'class' || raw.identifier_type === 'id' ? raw.identifier_type : 'attribute',
      identifierValue: raw.identifier_value,
    };

    const textStrategies = raw.text_strategies ?? raw.strategies;
    if (raw.carousel_strategies) {
      spec.strategies = raw.carousel_strategies;
      spec.strategyKind = 'carousel';
    } else if (textStrategies) {
      spec.strategies = textStrategies;
      spec.strategyKind = 'text';
    }
    return spec;
  });

export const PageSpecSchema = z.object({
  url_example: z.string().optional(),
  setup_required: z.boolean().default(false),
  components: z.array(ComponentSpecSchema).default([]),
});

/**
 * One target: the reserved setup URL plus page types in file order
 */
export const TargetSpecSchema = z
  .record(z.string(), z.union([z.string(), PageSpecSchema]))
  .superRefine((entries, ctx) => {
    for (const [key, value] of Object.entries(entries)) {
      if (key === SETUP_URL_KEY && typeof value !== 'string') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Expected a URL string' });
      }
      if (key !== SETUP_URL_KEY && typeof value === 'string') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Expected a page specification' });
      }
    }
  })
  .transform((entries) => {
    let setupProductUrl: string | undefined;
    const pages: PageSpec[] = [];

    for (const [key, value] of Object.entries(entries)) {
      if (typeof value === 'string') {
        setupProductUrl = value || undefined;
        continue;
      }
      pages.push({
        pageType: key,
        url: value.url_example || undefined,
        setupRequired: value.setup_required,
        components: value.components,
      });
    }

    return { setupProductUrl, pages };
  });

/**
 * Component configuration file: target -> page type -> page specification
 */
export const ComponentConfigSchema = z.record(z.string(), TargetSpecSchema).transform(
  (targets): TargetConfig[] =>
    Object.entries(targets).map(([target, spec]) => ({
      target,
      ...(spec.setupProductUrl ? { setupProductUrl: spec.setupProductUrl } : {}),
      pages: spec.pages,
    }))
);
