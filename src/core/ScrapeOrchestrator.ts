import type winston from 'winston';
import { createLogger } from './Logger';
import { CommandExecutor } from './CommandExecutor';
import { ExpositionBuilder, livenessSample } from './ExpositionBuilder';
import { RouterTransport } from './RouterTransport';
import { SessionManager } from './SessionManager';
import { TargetLock } from './TargetLock';
import { AuthError, ConfigurationError, ExecError, ParseError } from './errors';
import { getCollectorCatalog } from '../collectors';
import type { ConsoleTransport } from './RouterTransport';
import type { TargetConfig } from '../config/schemas/config.schema';
import type { CollectorDefinition, CollectorName, RawOutput } from '../types/collector.types';
import type { MetricSample } from '../types/metric.types';
import type { CollectorFailure, CollectorOutcome, ScrapeResult } from '../types/scrape.types';

export const AUTH_OUTCOME = 'auth';

export type TransportFactory = (target: TargetConfig) => ConsoleTransport;

export interface ScrapeOrchestratorOptions {
  catalog?: Map<CollectorName, CollectorDefinition>;
  transportFactory?: TransportFactory;
  lock?: TargetLock;
}

/**
 * Per-cycle collaborators. Created fresh for every scrape so that no session
 * outlives the lock window it was obtained in.
 */
interface ScrapeCycle {
  target: TargetConfig;
  sessions: SessionManager;
  executor: CommandExecutor;
  logger: winston.Logger;
  signal?: AbortSignal;
}

function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}

function describeFailure(error: unknown): CollectorFailure {
  if (error instanceof AuthError || error instanceof ExecError || error instanceof ParseError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'Transport', message: error instanceof Error ? error.message : String(error) };
}

/**
 * ScrapeOrchestrator runs one scrape cycle against a router: log in, run every
 * enabled collector in catalog order, parse, and assemble the result.
 *
 * A failing collector never aborts the cycle. Only a failed login collapses
 * the result to the liveness sample.
 */
export class ScrapeOrchestrator {
  private catalog: Map<CollectorName, CollectorDefinition>;
  private transportFactory: TransportFactory;
  private lock: TargetLock;

  constructor(options: ScrapeOrchestratorOptions = {}) {
    this.catalog = options.catalog ?? getCollectorCatalog();
    this.transportFactory = options.transportFactory ?? ((target) => new RouterTransport(target));
    this.lock = options.lock ?? new TargetLock();
  }

  /**
   * Scrape one target. Resolves for every partial failure; rejects only with
   * a ConfigurationError.
   */
  async scrape(target: TargetConfig, signal?: AbortSignal): Promise<ScrapeResult> {
    const collectors = this.selectCollectors(target);

    return this.lock.runExclusive(target.name, () => {
      const transport = this.transportFactory(target);
      const sessions = new SessionManager(target, transport);
      const cycle: ScrapeCycle = {
        target,
        sessions,
        executor: new CommandExecutor(target, transport, sessions),
        logger: createLogger('ScrapeOrchestrator', target.name),
        signal,
      };
      return this.runCycle(cycle, collectors);
    });
  }

  /**
   * Enabled collectors in catalog order
   */
  selectCollectors(target: TargetConfig): CollectorDefinition[] {
    const known = new Set<string>([...this.catalog.values()].map((c) => c.name));
    const unknown = Object.entries(target.collectors)
      .filter(([name, enabled]) => enabled && !known.has(name))
      .map(([name]) => name);
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Target ${target.name} enables unknown collectors: ${unknown.join(', ')}`
      );
    }

    return [...this.catalog.values()].filter((collector) => target.collectors[collector.name]);
  }

  private async runCycle(
    cycle: ScrapeCycle,
    collectors: CollectorDefinition[]
  ): Promise<ScrapeResult> {
    const startedAt = performance.now();
    const builder = new ExpositionBuilder();
    const outcomes: CollectorOutcome[] = [];

    if (cycle.signal?.aborted) {
      outcomes.push({
        collector: AUTH_OUTCOME,
        success: false,
        durationSeconds: 0,
        error: { kind: 'Cancelled', message: 'Scrape cancelled before login' },
      });
      builder.add(livenessSample(false));
      cycle.logger.debug('Scrape cancelled while waiting for the previous one');
      return this.finish(cycle, false, builder, outcomes, startedAt);
    }

    try {
      await cycle.sessions.ensureSession(cycle.signal);
    } catch (error) {
      outcomes.push({
        collector: AUTH_OUTCOME,
        success: false,
        durationSeconds: elapsedSeconds(startedAt),
        error: describeFailure(error),
      });
      builder.add(livenessSample(false));
      cycle.logger.warn('Scrape failed: router not reachable or login refused');
      return this.finish(cycle, false, builder, outcomes, startedAt);
    }

    builder.add(livenessSample(true));

    for (const collector of collectors) {
      if (cycle.signal?.aborted) {
        outcomes.push({
          collector: collector.name,
          success: false,
          durationSeconds: 0,
          error: { kind: 'Cancelled', message: 'Scrape cancelled' },
        });
        continue;
      }
      outcomes.push(await this.runCollector(cycle, collector, builder));
    }

    builder.addAll(this.outcomeSamples(outcomes));
    return this.finish(cycle, true, builder, outcomes, startedAt);
  }

  private async runCollector(
    cycle: ScrapeCycle,
    collector: CollectorDefinition,
    builder: ExpositionBuilder
  ): Promise<CollectorOutcome> {
    const startedAt = performance.now();

    let raw: RawOutput;
    try {
      raw = await this.execute(cycle, collector);
    } catch (error) {
      return this.failed(cycle, collector, startedAt, describeFailure(error));
    }

    let samples: MetricSample[];
    try {
      const result = collector.parse(raw);
      if (!result.ok) {
        return this.failed(cycle, collector, startedAt, describeFailure(result.error));
      }
      samples = result.samples;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.failed(cycle, collector, startedAt, { kind: 'ParseError', message });
    }

    builder.addAll(samples);
    return {
      collector: collector.name,
      success: true,
      durationSeconds: elapsedSeconds(startedAt),
      sampleCount: samples.length,
    };
  }

  /**
   * Run one command, re-authenticating at most once for it
   */
  private async execute(cycle: ScrapeCycle, collector: CollectorDefinition): Promise<RawOutput> {
    const reauthenticating = cycle.sessions.getState() === 'expired';
    const session = await cycle.sessions.ensureSession(cycle.signal);

    try {
      return await cycle.executor.run(session, collector, cycle.signal);
    } catch (error) {
      if (!(error instanceof ExecError) || error.kind !== 'Unauthorized' || reauthenticating) {
        throw error;
      }
    }

    cycle.logger.info(`Session rejected during ${collector.name}; logging in again`);
    const renewed = await cycle.sessions.ensureSession(cycle.signal);
    return cycle.executor.run(renewed, collector, cycle.signal);
  }

  private failed(
    cycle: ScrapeCycle,
    collector: CollectorDefinition,
    startedAt: number,
    error: CollectorFailure
  ): CollectorOutcome {
    cycle.logger.warn(`${collector.name} failed (${error.kind}): ${error.message}`);
    return {
      collector: collector.name,
      success: false,
      durationSeconds: elapsedSeconds(startedAt),
      error,
    };
  }

  private outcomeSamples(outcomes: CollectorOutcome[]): MetricSample[] {
    const samples: MetricSample[] = [];
    for (const outcome of outcomes) {
      const labels = { collector: outcome.collector };
      samples.push(
        {
          name: 'node_scrape_collector_success',
          kind: 'gauge',
          help: 'node_exporter: Whether a collector succeeded.',
          labels,
          value: outcome.success ? 1 : 0,
        },
        {
          name: 'node_scrape_collector_duration_seconds',
          kind: 'gauge',
          help: 'node_exporter: Duration of a collector scrape.',
          labels,
          value: outcome.durationSeconds,
        }
      );
      if (!outcome.success) {
        samples.push({
          name: 'tomato_collector_errors',
          kind: 'gauge',
          help: 'Collectors that failed during this scrape, by error kind.',
          labels: { collector: outcome.collector, kind: outcome.error.kind },
          value: 1,
        });
      }
    }
    return samples;
  }

  private finish(
    cycle: ScrapeCycle,
    up: boolean,
    builder: ExpositionBuilder,
    outcomes: CollectorOutcome[],
    startedAt: number
  ): ScrapeResult {
    const durationSeconds = elapsedSeconds(startedAt);
    cycle.logger.debug(
      `Scraped in ${durationSeconds.toFixed(3)}s ` +
        `(${outcomes.filter((o) => o.success).length}/${outcomes.length} collectors ok)`
    );
    return { target: cycle.target.name, up, samples: builder.samples(), outcomes, durationSeconds };
  }
}
