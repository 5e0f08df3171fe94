#!/usr/bin/env node
import { createLogger } from './core/Logger';
import { ConfigLoader } from './config';
import { Exporter } from './core/Exporter';

const VERSION = '1.0.0';
const logger = createLogger('Main');

async function main(): Promise<void> {
  const configFolder = process.env.CONFIG_FOLDER || './config';

  logger.info(`tomato-exporter v${VERSION} starting...`);
  logger.info(`Config folder: ${configFolder}`);

  // Load and validate configuration
  const configLoader = new ConfigLoader(configFolder);
  const config = configLoader.load();

  logger.debug('Configuration loaded');

  const exporter = new Exporter(config, VERSION);
  exporter.setupSignalHandlers();
  await exporter.start();

  logger.info('tomato-exporter is running. Press Ctrl+C to stop.');
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
