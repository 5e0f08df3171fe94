/**
 * Health check types
 */

/**
 * Overall health status of the exporter
 */
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Outcome of the most recent scrape of one target
 */
export interface TargetStatus {
  name: string;
  host: string;
  lastScrapeAt?: Date;
  lastUp?: boolean;
  lastDurationSeconds?: number;
  failedCollectors: string[];
}

/**
 * Health check response for GET /health
 */
export interface HealthResponse {
  status: HealthStatus;
  version: string;
  uptime: number;
  timestamp: Date;
  targets: TargetStatus[];
}
