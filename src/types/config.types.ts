/**
 * Configuration type definitions
 */

export interface TraceSourceConfig {
  /** Root of the dated history tree, e.g. `.../globe_history/` */
  historyBaseUrl: string;
  /** Root of the rolling "latest" tree, e.g. `.../data/` */
  recentBaseUrl: string;
  /** Page the upstream expects in the Referer header, `?icao=<id>` is appended */
  refererBaseUrl: string;
  timeoutMs: number;
  concurrency: number;
}

export interface LegConfig {
  gapThresholdSeconds: number;
  filterGround: boolean;
}

export interface DisplayConfig {
  timeZone: string;
}

export interface LoggingConfig {
  level: string;
  toFiles: boolean;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  source: TraceSourceConfig;
  legs: LegConfig;
  display: DisplayConfig;
  logging: LoggingConfig;
}
