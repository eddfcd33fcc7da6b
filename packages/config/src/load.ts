import { type FleetConfig, fleetConfigSchema, formatIssues } from './schema.js';

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws Error if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const rawConfig = {
    pool: {
      file: env.POOL_FILE,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
  };

  const result = fleetConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${formatIssues(result.error)}`);
  }

  return result.data;
}
