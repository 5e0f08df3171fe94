import { ParseError } from '../core/errors';
import type { ParseResult, RawOutput } from '../types/collector.types';
import type { MetricLabels, MetricSample } from '../types/metric.types';

export function gauge(
  name: string,
  help: string,
  value: number,
  labels: MetricLabels = {}
): MetricSample {
  return { name, kind: 'gauge', help, labels, value };
}

export function counter(
  name: string,
  help: string,
  value: number,
  labels: MetricLabels = {}
): MetricSample {
  return { name, kind: 'counter', help, labels, value };
}

export function parsed(samples: MetricSample[]): ParseResult {
  return { ok: true, samples };
}

export function parseFailure(raw: RawOutput, reason: string, offending = raw.text): ParseResult {
  return { ok: false, error: new ParseError(raw.collector, raw.command, reason, offending) };
}
