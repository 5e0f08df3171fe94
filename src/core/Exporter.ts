import { createLogger } from './Logger';
import { MetricsServer } from './MetricsServer';
import { ScrapeOrchestrator } from './ScrapeOrchestrator';
import type { ExporterConfig } from '../config/schemas/config.schema';

const logger = createLogger('Exporter');

/**
 * Exporter ties configuration, the scrape pipeline and the HTTP listener
 * together and handles graceful shutdown.
 */
export class Exporter {
  private config: ExporterConfig;
  private orchestrator: ScrapeOrchestrator;
  private server: MetricsServer;
  private isRunning = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(config: ExporterConfig, version: string, orchestrator?: ScrapeOrchestrator) {
    this.config = config;
    this.orchestrator = orchestrator ?? new ScrapeOrchestrator();
    this.server = new MetricsServer(
      { ...config.server, version },
      config.targets,
      this.orchestrator
    );
  }

  /**
   * Validate targets and start listening
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Exporter is already running');
      return;
    }

    logger.info('Starting tomato-exporter...');

    // Fail at startup rather than on the first scrape
    for (const target of this.config.targets) {
      const collectors = this.orchestrator.selectCollectors(target);
      logger.debug(`${target.name}: ${collectors.length} collector(s) enabled`);
    }

    try {
      await this.server.start();
      this.isRunning = true;
      logger.info(`tomato-exporter started with ${this.config.targets.length} target(s)`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Failed to start tomato-exporter: ${message}`);
      throw error;
    }
  }

  /**
   * Stop gracefully
   */
  async stop(): Promise<void> {
    // If already shutting down, wait for that to complete
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    if (!this.isRunning) {
      return;
    }

    this.shutdownPromise = this.performShutdown();
    return this.shutdownPromise;
  }

  isActive(): boolean {
    return this.isRunning;
  }

  getServer(): MetricsServer {
    return this.server;
  }

  /**
   * Install process signal handlers that stop the exporter and exit
   */
  setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    for (const signal of signals) {
      process.on(signal, () => {
        logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.exitAfterStop(0);
      });
    }

    process.on('uncaughtException', (error) => {
      logger.error(`Uncaught exception: ${error.message}`);
      logger.error(error.stack || '');
      this.exitAfterStop(1);
    });

    process.on('unhandledRejection', (reason) => {
      const message = reason instanceof Error ? reason.message : String(reason);
      logger.error(`Unhandled rejection: ${message}`);
      this.exitAfterStop(1);
    });
  }

  private async performShutdown(): Promise<void> {
    logger.info('Stopping tomato-exporter...');
    this.isRunning = false;

    try {
      await this.server.stop();
      logger.info('tomato-exporter stopped');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Error during shutdown: ${message}`);
      throw error;
    }
  }

  private exitAfterStop(code: number): void {
    this.stop().then(
      () => process.exit(code),
      (error: unknown) => {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error(`Shutdown failed: ${message}`);
        process.exit(1);
      }
    );
  }
}
