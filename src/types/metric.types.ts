/**
 * Metric sample types shared by collectors and the exposition builder
 */

export type MetricKind = 'counter' | 'gauge';

/**
 * Label set of a sample. Keys keep insertion order and are unique by construction.
 */
export type MetricLabels = Readonly<Record<string, string>>;

export interface MetricSample {
  readonly name: string;
  readonly kind: MetricKind;
  readonly help?: string;
  readonly labels: MetricLabels;
  readonly value: number;
}
