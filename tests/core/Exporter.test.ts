import { describe, it, expect, vi } from 'vitest';
import { Exporter } from '../../src/core/Exporter';
import { ScrapeOrchestrator } from '../../src/core/ScrapeOrchestrator';
import { ConfigurationError } from '../../src/core/errors';
import { ExporterConfigSchema } from '../../src/config/schemas/config.schema';
import type { CollectorDefinition, CollectorName } from '../../src/types/collector.types';

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const config = ExporterConfigSchema.parse({
  server: { host: '127.0.0.1', port: 0 },
  targets: [{ name: 'main-router', host: '192.168.1.1', password: 'test-secret' }],
});

describe('Exporter', () => {
  it('should start and stop the metrics server', async () => {
    const exporter = new Exporter(config, '1.0.0');

    await exporter.start();
    expect(exporter.isActive()).toBe(true);
    expect(exporter.getServer().getPort()).toBeGreaterThan(0);

    await exporter.stop();
    expect(exporter.isActive()).toBe(false);
  });

  it('should ignore a second start', async () => {
    const exporter = new Exporter(config, '1.0.0');

    await exporter.start();
    await exporter.start();
    expect(exporter.isActive()).toBe(true);

    await exporter.stop();
  });

  it('should share one shutdown between concurrent stops', async () => {
    const exporter = new Exporter(config, '1.0.0');
    await exporter.start();

    await Promise.all([exporter.stop(), exporter.stop()]);
    expect(exporter.isActive()).toBe(false);
  });

  it('should refuse to start with collectors the catalog lacks', async () => {
    const orchestrator = new ScrapeOrchestrator({
      catalog: new Map<CollectorName, CollectorDefinition>(),
    });
    const exporter = new Exporter(config, '1.0.0', orchestrator);

    await expect(exporter.start()).rejects.toBeInstanceOf(ConfigurationError);
    expect(exporter.isActive()).toBe(false);
  });
});
