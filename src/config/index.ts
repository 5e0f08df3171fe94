export { ConfigLoader, CONFIG_FILE_NAME } from './ConfigLoader';
export {
  ExporterConfigSchema,
  TargetConfigSchema,
  ServerConfigSchema,
  CollectorsConfigSchema,
} from './schemas/config.schema';
export type {
  ExporterConfig,
  TargetConfig,
  ServerConfig,
  CollectorsConfig,
} from './schemas/config.schema';
