/**
 * Collector catalog types
 */
import type { MetricSample } from './metric.types';
import type { ParseError } from '../core/errors';

/**
 * Text returned by one command execution
 */
export interface RawOutput {
  readonly collector: string;
  readonly command: string;
  readonly text: string;
  readonly executedAt: Date;
}

export type ParseResult =
  | { readonly ok: true; readonly samples: MetricSample[] }
  | { readonly ok: false; readonly error: ParseError };

export type OutputParser = (raw: RawOutput) => ParseResult;

/**
 * A shell command paired with the parser that understands its output
 */
export interface CollectorDefinition {
  readonly name: CollectorName;
  readonly description: string;
  readonly command: string;
  readonly parse: OutputParser;
}

export const COLLECTOR_NAMES = [
  'cpu',
  'meminfo',
  'loadavg',
  'time',
  'uname',
  'netdev',
  'filesystem',
  'wireless',
  'conntrack',
] as const;

export type CollectorName = (typeof COLLECTOR_NAMES)[number];
