import { describe, it, expect } from 'vitest';
import {
  loadConfig,
  poolFileSchema,
  agentTemplateConfigSchema,
  cloudConfigSchema,
  formatIssues,
} from '../src/index.js';

describe('pool file schema', () => {
  it('validates a complete pool file', () => {
    const pool = {
      cloud: {
        name: 'ci-east',
        credentialsId: 'ci-profile',
        regionName: 'us-east-1',
      },
      templates: [
        {
          label: 'linux docker',
          image: 'worker:latest',
          remoteRootPath: '/home/agent',
          memoryMiB: 512,
          cpuUnits: 256,
          privileged: false,
          mountPointsSpec: 'data:/var/data',
          volumesSpec: 'data:/host/data',
          entrypoint: 'sh -c run.sh',
          extraStartupArgs: '-Xmx512m',
        },
      ],
    };

    const result = poolFileSchema.safeParse(pool);
    expect(result.success).toBe(true);
  });

  it('applies defaults for optional fields', () => {
    const result = poolFileSchema.safeParse({
      cloud: { name: 'ci', regionName: 'eu-west-3' },
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.templates).toEqual([]);
      expect(result.data.cloud.credentialsId).toBeUndefined();
    }
  });

  it('defaults privileged to false', () => {
    const result = agentTemplateConfigSchema.parse({
      image: 'worker:latest',
      memoryMiB: 512,
      cpuUnits: 256,
    });

    expect(result.privileged).toBe(false);
  });

  it('rejects a blank image', () => {
    const result = agentTemplateConfigSchema.safeParse({
      image: '   ',
      memoryMiB: 512,
      cpuUnits: 256,
    });

    expect(result.success).toBe(false);
  });

  it('rejects fractional resource reservations', () => {
    const result = agentTemplateConfigSchema.safeParse({
      image: 'worker:latest',
      memoryMiB: 512.5,
      cpuUnits: 256,
    });

    expect(result.success).toBe(false);
  });

  it('accepts gov-cloud regions and rejects garbage', () => {
    expect(cloudConfigSchema.safeParse({ name: 'gov', regionName: 'us-gov-west-1' }).success).toBe(true);
    expect(cloudConfigSchema.safeParse({ name: 'bad', regionName: 'mars' }).success).toBe(false);
  });

  it('formats issues with their paths', () => {
    const result = cloudConfigSchema.safeParse({ name: 'bad', regionName: 'mars' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toBe('  - regionName: Invalid region name');
    }
  });
});

describe('loadConfig', () => {
  it('loads configuration from environment variables', () => {
    const config = loadConfig({
      POOL_FILE: '/etc/agent-fleet/pool.json',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
    });

    expect(config.pool.file).toBe('/etc/agent-fleet/pool.json');
    expect(config.logging.level).toBe('debug');
    expect(config.logging.format).toBe('json');
  });

  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.pool.file).toBe('./agent-pool.json');
    expect(config.logging.level).toBe('info');
    expect(config.logging.format).toBe('pretty');
  });

  it('throws on invalid log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('Configuration validation failed');
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('logging.level');
  });
});
