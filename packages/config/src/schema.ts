import { z } from 'zod';

/**
 * AWS region code (e.g. us-east-1, eu-west-3, us-gov-west-1)
 */
export const REGION_PATTERN = /^[a-z]{2}(-gov|-iso[a-z]?)?-[a-z]+-\d+$/;

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Where the pool file lives
 */
export const poolLocationSchema = z.object({
  file: z.string().min(1).default('./agent-pool.json'),
});
export type PoolLocation = z.infer<typeof poolLocationSchema>;

/**
 * Cloud the templates are registered against
 */
export const cloudConfigSchema = z.object({
  /** Human-readable name for this cloud (e.g. "ci-east") */
  name: z.string().min(1),

  /** Shared-config profile name; omitted means the default provider chain */
  credentialsId: z.string().optional(),

  /** Region the scheduler client talks to */
  regionName: z.string().regex(REGION_PATTERN, 'Invalid region name'),
});
export type CloudConfig = z.infer<typeof cloudConfigSchema>;

/**
 * One agent template as stored in the pool file
 */
export const agentTemplateConfigSchema = z.object({
  /** Whitespace-separated scheduling labels */
  label: z.string().optional(),

  /** Container image reference */
  image: z.string().trim().min(1, 'image must not be empty'),

  /** Agent filesystem root inside the container */
  remoteRootPath: z.string().optional(),

  /** Reserved memory in MiB */
  memoryMiB: z.number().int(),

  /** Reserved CPU units (1024 per core) */
  cpuUnits: z.number().int(),

  privileged: z.boolean().default(false),

  /** Compact mount list: volumeName:containerPath,... */
  mountPointsSpec: z.string().optional(),

  /** Compact volume list: volumeName:hostSourcePath,... */
  volumesSpec: z.string().optional(),

  /** Space-separated entrypoint override */
  entrypoint: z.string().optional(),

  /** Startup arguments handed to the agent process */
  extraStartupArgs: z.string().optional(),

  /** Identifier of the registered task definition, once there is one */
  registeredDefinitionId: z.string().min(1).optional(),
});
export type AgentTemplateConfig = z.infer<typeof agentTemplateConfigSchema>;

/**
 * Complete pool file: one cloud and its templates
 */
export const poolFileSchema = z.object({
  cloud: cloudConfigSchema,
  templates: z.array(agentTemplateConfigSchema).default([]),
});
export type PoolFile = z.infer<typeof poolFileSchema>;

/**
 * Complete process configuration
 */
export const fleetConfigSchema = z.object({
  pool: poolLocationSchema,
  logging: loggingConfigSchema,
});
export type FleetConfig = z.infer<typeof fleetConfigSchema>;

/**
 * Render zod issues as one `path: message` line each
 */
export function formatIssues(error: z.ZodError, indent = '  - '): string {
  return error.errors
    .map((e) => `${indent}${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
    .join('\n');
}
