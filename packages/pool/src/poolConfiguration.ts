import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { formatIssues, poolFileSchema, type CloudConfig, type PoolFile } from '@agent-fleet/config';
import {
  AgentTemplate,
  ConfigurationError,
  FormatError,
  type OwningContext,
} from '@agent-fleet/agent-template';

/**
 * Pool configuration
 *
 * One cloud and the agent templates registered against it, backed by a
 * JSON file. Acts as the owning context of its templates: the registrar
 * reads credentials and region from here and calls `save()` after each
 * registration so identifiers survive restarts.
 */
export class PoolConfiguration implements OwningContext {
  private readonly cloud: CloudConfig;
  private readonly templates: AgentTemplate[];

  constructor(
    private readonly filePath: string,
    pool: PoolFile
  ) {
    this.cloud = pool.cloud;
    this.templates = pool.templates.map((entry) => new AgentTemplate(entry));
  }

  /**
   * Read and validate a pool file
   *
   * @throws ConfigurationError if the file is missing, not JSON, or invalid
   */
  static load(filePath: string): PoolConfiguration {
    if (!existsSync(filePath)) {
      throw new ConfigurationError(`Pool file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Pool file ${filePath} is not valid JSON`);
      }
      throw error;
    }

    const result = poolFileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(`Invalid pool file ${filePath}:\n${formatIssues(result.error)}`);
    }

    const pool = new PoolConfiguration(filePath, result.data);
    const specIssues = pool.specIssues();
    if (specIssues.length > 0) {
      throw new ConfigurationError(`Invalid pool file ${filePath}:\n${specIssues.join('\n')}`);
    }

    return pool;
  }

  /**
   * Decode every template's mount and volume specs, one `path: message`
   * line per malformed spec
   */
  private specIssues(): string[] {
    const issues: string[] = [];

    this.templates.forEach((template, index) => {
      const checks = [
        ['mountPointsSpec', () => template.mountPoints],
        ['volumesSpec', () => template.volumes],
      ] as const;

      for (const [field, decode] of checks) {
        try {
          decode();
        } catch (error) {
          if (!(error instanceof FormatError)) {
            throw error;
          }
          issues.push(`  - templates.${index}.${field}: ${error.message}`);
        }
      }
    });

    return issues;
  }

  get name(): string {
    return this.cloud.name;
  }

  get path(): string {
    return this.filePath;
  }

  getCredentialsId(): string | undefined {
    return this.cloud.credentialsId;
  }

  getRegionName(): string {
    return this.cloud.regionName;
  }

  getTemplates(): readonly AgentTemplate[] {
    return this.templates;
  }

  /**
   * First template whose label set contains the token
   */
  findTemplate(labelToken: string): AgentTemplate | undefined {
    return this.templates.find((template) => template.labelTokens.has(labelToken));
  }

  /**
   * Plain pool-file record of the current state
   */
  toPoolFile(): PoolFile {
    return {
      cloud: { ...this.cloud },
      templates: this.templates.map((template) => template.toConfig()),
    };
  }

  /**
   * Write the pool file back to disk
   */
  save(): void {
    writeFileSync(this.filePath, `${JSON.stringify(this.toPoolFile(), null, 2)}\n`);
  }
}
