export {
  REGION_PATTERN,
  logLevelSchema,
  logFormatSchema,
  loggingConfigSchema,
  poolLocationSchema,
  cloudConfigSchema,
  agentTemplateConfigSchema,
  poolFileSchema,
  fleetConfigSchema,
  formatIssues,
} from './schema.js';

export type {
  LogLevel,
  LogFormat,
  LoggingConfig,
  PoolLocation,
  CloudConfig,
  AgentTemplateConfig,
  PoolFile,
  FleetConfig,
} from './schema.js';

export { loadConfig } from './load.js';
