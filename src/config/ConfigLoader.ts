import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { createLogger } from '../core/Logger';
import { ExporterConfigSchema, type ExporterConfig } from './schemas/config.schema';

const logger = createLogger('ConfigLoader');

export const CONFIG_FILE_NAME = 'tomato-exporter.yaml';
const ENV_PREFIX = 'TOMATO_';

type ConfigNode = Record<string, unknown>;

function isConfigNode(value: unknown): value is ConfigNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ConfigLoader handles loading, validation, and environment variable overrides
 * for the exporter YAML configuration.
 */
export class ConfigLoader {
  private configFolder: string;

  constructor(configFolder: string) {
    this.configFolder = configFolder;
  }

  /**
   * Load configuration from YAML file with environment variable overrides
   * @returns Validated configuration object
   * @throws Error if configuration is invalid
   */
  load(): ExporterConfig {
    const yamlPath = path.join(this.configFolder, CONFIG_FILE_NAME);

    if (!fs.existsSync(yamlPath)) {
      this.handleMissingConfig(yamlPath);
    }

    logger.info(`Loading configuration from: ${yamlPath}`);
    const fileContent = fs.readFileSync(yamlPath, 'utf-8');
    let rawConfig: unknown;

    try {
      rawConfig = yaml.parse(fileContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse YAML configuration: ${message}`);
    }

    const config = this.applyEnvOverrides(isConfigNode(rawConfig) ? rawConfig : {});

    // Validate with Zod schema
    const result = ExporterConfigSchema.safeParse(config);

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new Error(`Configuration validation failed:\n${errors}`);
    }

    logger.info('Configuration loaded and validated successfully');
    this.logConfigSummary(result.data);

    return result.data;
  }

  /**
   * Write a template configuration and stop so the user can fill it in
   */
  private handleMissingConfig(yamlPath: string): never {
    this.createFromTemplate(yamlPath);
    logger.info('');
    logger.info('='.repeat(60));
    logger.info('CONFIGURATION REQUIRED');
    logger.info('='.repeat(60));
    logger.info(`A template configuration has been created at: ${yamlPath}`);
    logger.info('Please edit this file to configure your routers.');
    logger.info('='.repeat(60));
    process.exit(0);
  }

  /**
   * Create configuration file from template
   */
  private createFromTemplate(yamlPath: string): void {
    const templatePath = path.join(__dirname, '../../config/tomato-exporter.example.yaml');

    const templateContent = fs.existsSync(templatePath)
      ? fs.readFileSync(templatePath, 'utf-8')
      : this.generateMinimalTemplate();

    if (!fs.existsSync(this.configFolder)) {
      fs.mkdirSync(this.configFolder, { recursive: true });
    }

    fs.writeFileSync(yamlPath, templateContent, 'utf-8');
  }

  /**
   * Generate minimal configuration template
   */
  private generateMinimalTemplate(): string {
    return `# tomato-exporter configuration

server:
  host: "0.0.0.0"
  port: 9100
  path: "/metrics"

# At least one router must be configured
targets:
  - name: "router"
    host: "192.168.1.1"
    scheme: "http"
    username: "root"
    password: "change-me"
`;
  }

  // Mapping of lowercase env var keys to camelCase config keys
  private static readonly KEY_MAPPINGS: Record<string, string> = {
    verifyssl: 'verifySsl',
    httpid: 'httpId',
    tokenpattern: 'tokenPattern',
    outputmarkers: 'outputMarkers',
    authseconds: 'authSeconds',
    commandseconds: 'commandSeconds',
  };

  // Keys whose values stay strings even when they look numeric or boolean
  private static readonly STRING_KEYS = new Set([
    'name',
    'host',
    'username',
    'password',
    'httpId',
    'tokenPattern',
    'start',
    'end',
  ]);

  /**
   * Apply TOMATO_* environment variable overrides to configuration
   * Format: TOMATO_SECTION_SUBSECTION_KEY (e.g., TOMATO_TARGETS_0_PASSWORD)
   */
  private applyEnvOverrides(config: ConfigNode): ConfigNode {
    const envVars = Object.entries(process.env).filter(([key]) => key.startsWith(ENV_PREFIX));

    for (const [key, value] of envVars) {
      if (!value) continue;

      const pathParts = key
        .substring(ENV_PREFIX.length)
        .toLowerCase()
        .split('_')
        .map((part) => ConfigLoader.KEY_MAPPINGS[part] || part);

      const finalKey = pathParts[pathParts.length - 1];
      const parsed = ConfigLoader.STRING_KEYS.has(finalKey) ? value : this.parseEnvValue(value);
      this.setNestedValue(config, pathParts, parsed);
      logger.debug(`Applied env override: ${key}`);
    }

    return config;
  }

  /**
   * Set a nested value in an object using path parts
   */
  private setNestedValue(obj: ConfigNode, pathParts: string[], value: unknown): void {
    let current: ConfigNode = obj;

    for (let i = 0; i < pathParts.length - 1; i++) {
      const part = pathParts[i];

      // Handle array index (e.g., targets_0_password)
      const arrayMatch = pathParts[i + 1]?.match(/^(\d+)$/);
      if (arrayMatch) {
        const existing = current[part];
        const arr: unknown[] = Array.isArray(existing) ? existing : [];
        current[part] = arr;
        const index = parseInt(arrayMatch[1], 10);
        const entry = arr[index];
        const node: ConfigNode = isConfigNode(entry) ? entry : {};
        arr[index] = node;
        current = node;
        i++; // Skip the index part
        continue;
      }

      const existing = current[part];
      const node: ConfigNode = isConfigNode(existing) ? existing : {};
      current[part] = node;
      current = node;
    }

    const finalKey = pathParts[pathParts.length - 1];
    current[finalKey] = value;
  }

  /**
   * Parse environment variable value to appropriate type
   */
  private parseEnvValue(value: string): unknown {
    // Boolean
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    // Number
    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    // String (default)
    return value;
  }

  /**
   * Log configuration summary (without sensitive data)
   */
  private logConfigSummary(config: ExporterConfig): void {
    logger.info('Configuration summary:');
    logger.info(`  Listen: ${config.server.host}:${config.server.port}${config.server.path}`);

    for (const target of config.targets) {
      const enabled = Object.entries(target.collectors)
        .filter(([, on]) => on)
        .map(([name]) => name);
      logger.info(`  Target ${target.name}: ${target.scheme}://${target.host} [${enabled.join(', ')}]`);
    }
  }
}
