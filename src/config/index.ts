export { ConfigLoader, DEFAULT_CONFIG_FILE } from './ConfigLoader';
export { PlugpollConfigSchema } from './schemas/config.schema';
export type {
  PlugpollConfig,
  KasaConfig,
  TapoConfig,
  PollerConfig,
  LogLevel,
} from './schemas/config.schema';
