import http from 'node:http';
import { createLogger } from './Logger';
import { renderExposition } from './ExpositionBuilder';
import type { ScrapeOrchestrator } from './ScrapeOrchestrator';
import type { TargetConfig } from '../config/schemas/config.schema';
import type { HealthResponse, HealthStatus, TargetStatus } from '../types/health.types';
import type { ScrapeResult } from '../types/scrape.types';

const logger = createLogger('MetricsServer');

export const HEALTH_PATH = '/health';

/**
 * Configuration for the metrics server
 */
export interface MetricsServerConfig {
  host: string;
  port: number;
  path: string;
  version: string;
}

type TargetSelection =
  | { target: TargetConfig }
  | { statusCode: number; message: string };

/**
 * MetricsServer exposes the scrape pipeline over HTTP.
 *
 * Endpoints:
 * - GET <path>[?target=name] - Scrape a router and return the Prometheus exposition
 * - GET /health - Exporter health with the outcome of each target's last scrape
 */
export class MetricsServer {
  private server: http.Server | null = null;
  private config: MetricsServerConfig;
  private targets: TargetConfig[];
  private orchestrator: ScrapeOrchestrator;
  private statuses: Map<string, TargetStatus> = new Map();
  private inFlight: Set<AbortController> = new Set();
  private startTime: Date;

  constructor(config: MetricsServerConfig, targets: TargetConfig[], orchestrator: ScrapeOrchestrator) {
    this.config = config;
    this.targets = targets;
    this.orchestrator = orchestrator;
    this.startTime = new Date();
    for (const target of targets) {
      this.statuses.set(target.name, { name: target.name, host: target.host, failedCollectors: [] });
    }
  }

  /**
   * Start the metrics server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          const message = error instanceof Error ? error.message : 'Unknown error';
          logger.error(`Request handling failed: ${message}`);
          if (!res.headersSent) {
            this.sendText(res, 500, 'Internal Server Error\n');
          }
        });
      });

      this.server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error(`Port ${this.config.port} is already in use`);
        } else {
          logger.error(`Metrics server error: ${error.message}`);
        }
        reject(error);
      });

      this.server.listen(this.config.port, this.config.host, () => {
        logger.info(`Metrics server listening on ${this.config.host}:${this.getPort()}${this.config.path}`);
        resolve();
      });
    });
  }

  /**
   * Stop the metrics server, cancelling scrapes still in progress
   */
  async stop(): Promise<void> {
    for (const controller of this.inFlight) {
      controller.abort();
    }

    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close(() => {
        logger.info('Metrics server stopped');
        this.server = null;
        resolve();
      });
      this.server.closeIdleConnections();
    });
  }

  /**
   * Port actually bound, which differs from the configured one when that is 0
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  getTargetStatuses(): TargetStatus[] {
    return [...this.statuses.values()];
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method || 'GET';

    if (method !== 'GET') {
      this.sendText(res, 405, 'Method Not Allowed\n');
      return;
    }

    switch (url.pathname) {
      case this.config.path:
        await this.handleMetrics(url, res);
        break;
      case HEALTH_PATH:
        this.handleHealth(res);
        break;
      default:
        this.sendText(res, 404, 'Not Found\n');
    }
  }

  /**
   * GET <path> - One scrape cycle, rendered
   */
  private async handleMetrics(url: URL, res: http.ServerResponse): Promise<void> {
    const selection = this.selectTarget(url.searchParams.get('target'));
    if (!('target' in selection)) {
      this.sendText(res, selection.statusCode, `${selection.message}\n`);
      return;
    }

    const controller = new AbortController();
    const abortOnDisconnect = (): void => {
      if (!res.writableEnded) {
        logger.debug(`Client went away; cancelling scrape of ${selection.target.name}`);
        controller.abort();
      }
    };
    res.on('close', abortOnDisconnect);
    this.inFlight.add(controller);

    try {
      const result = await this.orchestrator.scrape(selection.target, controller.signal);
      if (controller.signal.aborted) {
        if (res.destroyed) {
          return;
        }
      } else {
        this.recordStatus(result);
      }
      const exposition = await renderExposition(result.samples);
      res.statusCode = 200;
      res.setHeader('Content-Type', exposition.contentType);
      res.end(exposition.body);
    } finally {
      this.inFlight.delete(controller);
      res.off('close', abortOnDisconnect);
    }
  }

  private selectTarget(name: string | null): TargetSelection {
    if (name !== null) {
      const target = this.targets.find((t) => t.name === name);
      return target ? { target } : { statusCode: 404, message: `Unknown target: ${name}` };
    }
    if (this.targets.length === 1) {
      return { target: this.targets[0] };
    }
    return {
      statusCode: 400,
      message: `Multiple targets configured; select one with ?target=<name>`,
    };
  }

  /**
   * GET /health - Overall health status
   */
  private handleHealth(res: http.ServerResponse): void {
    const status = this.calculateOverallStatus();
    const response: HealthResponse = {
      status,
      version: this.config.version,
      uptime: this.getUptimeSeconds(),
      timestamp: new Date(),
      targets: this.getTargetStatuses(),
    };

    const statusCode = status === 'unhealthy' ? 503 : 200;
    res.statusCode = statusCode;
    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify(response, null, 2));
  }

  private recordStatus(result: ScrapeResult): void {
    const previous = this.statuses.get(result.target);
    if (!previous) {
      return;
    }
    this.statuses.set(result.target, {
      name: previous.name,
      host: previous.host,
      lastScrapeAt: new Date(),
      lastUp: result.up,
      lastDurationSeconds: result.durationSeconds,
      failedCollectors: result.outcomes.filter((o) => !o.success).map((o) => o.collector),
    });
  }

  /**
   * Healthy until a scrape says otherwise: unhealthy when every scraped target
   * was down, degraded when some were down or lost collectors
   */
  private calculateOverallStatus(): HealthStatus {
    const scraped = this.getTargetStatuses().filter((s) => s.lastUp !== undefined);
    if (scraped.length === 0) {
      return 'healthy';
    }

    const up = scraped.filter((s) => s.lastUp);
    if (up.length === 0) {
      return 'unhealthy';
    }
    if (up.length < scraped.length || up.some((s) => s.failedCollectors.length > 0)) {
      return 'degraded';
    }
    return 'healthy';
  }

  private getUptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime.getTime()) / 1000);
  }

  private sendText(res: http.ServerResponse, statusCode: number, body: string): void {
    res.statusCode = statusCode;
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.end(body);
  }
}
