/**
 * Scrape cycle types
 */
import type { ErrorKind } from '../core/errors';
import type { MetricSample } from './metric.types';

export interface CollectorFailure {
  kind: ErrorKind;
  message: string;
}

export type CollectorOutcome =
  | {
      collector: string;
      success: true;
      durationSeconds: number;
      sampleCount: number;
    }
  | {
      collector: string;
      success: false;
      durationSeconds: number;
      error: CollectorFailure;
    };

/**
 * Output of one orchestration cycle. Created per request, never cached.
 */
export interface ScrapeResult {
  target: string;
  up: boolean;
  samples: MetricSample[];
  outcomes: CollectorOutcome[];
  durationSeconds: number;
}
