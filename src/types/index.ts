/**
 * Core type definitions for Component Sentinel
 */

/**
 * How a component is located in the rendered document
 */
export type IdentifierType = 'attribute' | 'class' | 'id';

/**
 * Label prefix family used for elements without an id
 */
export type StrategyKind = 'text' | 'carousel';

/**
 * Text check inside a matched component
 */
export interface StrategySpec {
  strategyName: string;
  textPattern: string;
  containerClass?: string;
}

/**
 * Configured UI marker expected on a page type
 */
export interface ComponentSpec {
  name: string;
  identifierType: IdentifierType;
  identifierValue: string;
  strategies?: StrategySpec[];
  strategyKind?: StrategyKind;
}

/**
 * Page template within a target
 */
export interface PageSpec {
  pageType: string;
  url?: string;
  setupRequired: boolean;
  components: ComponentSpec[];
}

/**
 * Monitored market/site
 */
export interface TargetConfig {
  target: string;
  setupProductUrl?: string;
  pages: PageSpec[];
}

export interface StrategyOutcome {
  strategiesFound: Record<string, boolean>;
  strategiesDetails: Record<string, { foundIn: string[] }>;
  potentialMatches: Record<string, string[]>;
}

export interface ComponentDetails {
  labels: string[];
  strategies: StrategyOutcome;
}

/**
 * Result of checking one component on one page
 */
export interface MatchResult {
  componentName: string;
  found: boolean;
  details: ComponentDetails | null;
  diagnostic?: string;
}

export type AlertStatus = 'MISSING_COMPONENT' | 'ERROR';

export interface Alert {
  readonly date: string;
  readonly target: string;
  readonly pageType: string;
  readonly component: string;
  readonly status: AlertStatus;
  readonly message: string;
}

export interface StoredAlert extends Alert {
  readonly id: string;
}

export interface PageCheck {
  status: 'ok';
  pageType: string;
  url: string;
  timestamp: string;
  components: MatchResult[];
}

export interface PageFailure {
  status: 'error';
  pageType: string;
  url: string;
  timestamp: string;
  error: string;
}

export type PageResult = PageCheck | PageFailure;

export type TargetStatus = 'success' | 'failed';

export interface TargetResult {
  target: string;
  status: TargetStatus;
  alertsCount: number;
  pages?: PageResult[];
  error?: string;
  timestamp: string;
}

export interface RunReport {
  executionTime: string;
  startTime: string;
  endTime: string;
  totalTargets: number;
  successful: number;
  failed: number;
  totalAlerts: number;
  results: TargetResult[];
}

export interface StoredRunReport extends RunReport {
  id: string;
  savedAt: string;
}

/**
 * Alert query filters (all optional)
 */
export interface AlertFilter {
  target?: string;
  pageType?: string;
  status?: AlertStatus;
  startDate?: string;
  endDate?: string;
}

export interface AlertPage {
  total: number;
  page: number;
  limit: number;
  pages: number;
  alerts: StoredAlert[];
}

export interface GroupCount {
  key: string;
  count: number;
}

export interface AlertStats {
  total: number;
  byTarget: GroupCount[];
  byPageType: GroupCount[];
  byStatus: GroupCount[];
}

/**
 * Scheduler configuration
 */
export interface SchedulerConfig {
  enabled: boolean;
  baseIntervalMs: number;
  jitterRatio: number;
}

/**
 * Browser configuration
 */
export interface BrowserConfig {
  headless: boolean;
  userAgent: string;
  timeoutMs: number;
  scrollStepPx: number;
  scrollIntervalMs: number;
  settleMs: number;
  viewport?: { width: number; height: number };
}

export interface CrawlConfig {
  maxWorkers?: number;
  alertOnPageError: boolean;
}

export interface StorageConfig {
  dir: string;
}

export interface WebhookConfig {
  url?: string;
  timeoutMs: number;
}

export interface DigestConfig {
  windowHours: number;
  timeZone: string;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: LogLevel;
  file?: string;
}

/**
 * Complete application configuration
 */
export interface AppConfig {
  components: string;
  crawl: CrawlConfig;
  browser: BrowserConfig;
  storage: StorageConfig;
  webhook: WebhookConfig;
  digest: DigestConfig;
  server: ServerConfig;
  scheduler: SchedulerConfig;
  logging: LoggingConfig;
}
