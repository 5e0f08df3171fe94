import { Counter, Gauge, Registry } from 'prom-client';
import { createLogger } from './Logger';
import type { MetricKind, MetricLabels, MetricSample } from '../types/metric.types';

const logger = createLogger('ExpositionBuilder');

export const LIVENESS_METRIC = 'tomato_up';

interface MetricFamily {
  name: string;
  kind: MetricKind;
  help?: string;
  series: Map<string, MetricSample>;
}

/**
 * A rendered exposition document and the content type to serve it with
 */
export interface Exposition {
  contentType: string;
  body: string;
}

/**
 * Identity of a series: its label set, independent of label order
 */
function seriesKey(labels: MetricLabels): string {
  return JSON.stringify(Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function labelNamesOf(family: MetricFamily): string[] {
  const names = new Set<string>();
  for (const sample of family.series.values()) {
    Object.keys(sample.labels).forEach((name) => names.add(name));
  }
  return [...names];
}

/**
 * The liveness gauge: 1 when the target was reached and authenticated
 */
export function livenessSample(up: boolean): MetricSample {
  return {
    name: LIVENESS_METRIC,
    kind: 'gauge',
    help: 'Whether the router was reached and authenticated during this scrape.',
    labels: {},
    value: up ? 1 : 0,
  };
}

/**
 * Accumulates the samples of one scrape. Samples of one metric name are
 * grouped, names keep the order in which they were first added, and a
 * repeated series keeps its latest value.
 *
 * Rendering goes through a prom-client registry built for this scrape only,
 * so nothing carries over between scrapes or targets.
 */
export class ExpositionBuilder {
  private families: Map<string, MetricFamily> = new Map();

  add(sample: MetricSample): this {
    let family = this.families.get(sample.name);
    if (!family) {
      family = { name: sample.name, kind: sample.kind, help: sample.help, series: new Map() };
      this.families.set(sample.name, family);
    } else if (family.kind !== sample.kind) {
      logger.warn(
        `Metric ${sample.name} declared as ${family.kind} and ${sample.kind}; keeping ${family.kind}`
      );
    }

    const key = seriesKey(sample.labels);
    if (family.series.has(key)) {
      logger.warn(`Duplicate series ${sample.name}${key}; keeping the latest value`);
    }
    family.series.set(key, { ...sample, kind: family.kind });
    return this;
  }

  addAll(samples: Iterable<MetricSample>): this {
    for (const sample of samples) {
      this.add(sample);
    }
    return this;
  }

  /**
   * Deduplicated samples, grouped by metric name
   */
  samples(): MetricSample[] {
    return [...this.families.values()].flatMap((family) => [...family.series.values()]);
  }

  /**
   * A fresh registry holding one gauge or counter per family
   */
  toRegistry(): Registry {
    const registry = new Registry();

    for (const family of this.families.values()) {
      try {
        this.register(registry, family);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Dropping metric ${family.name}: ${message}`);
      }
    }

    return registry;
  }

  async render(): Promise<Exposition> {
    const registry = this.toRegistry();
    return { contentType: registry.contentType, body: await registry.metrics() };
  }

  private register(registry: Registry, family: MetricFamily): void {
    const config = {
      name: family.name,
      help: family.help || family.name,
      labelNames: labelNamesOf(family),
      registers: [registry],
    };

    if (family.kind === 'gauge') {
      const gauge = new Gauge(config);
      for (const sample of family.series.values()) {
        gauge.set(sample.labels, sample.value);
      }
      return;
    }

    const counter = new Counter(config);
    for (const sample of family.series.values()) {
      if (!Number.isFinite(sample.value) || sample.value < 0) {
        logger.warn(`Skipping counter ${family.name} with value ${sample.value}`);
        continue;
      }
      counter.inc(sample.labels, sample.value);
    }
  }
}

/**
 * Render an already assembled sample sequence
 */
export function renderExposition(samples: Iterable<MetricSample>): Promise<Exposition> {
  return new ExpositionBuilder().addAll(samples).render();
}
