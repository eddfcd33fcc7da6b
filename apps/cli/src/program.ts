import { Command } from 'commander';
import picocolors from 'picocolors';
import type { Logger } from 'pino';
import { loadConfig, type FleetConfig } from '@agent-fleet/config';
import {
  TaskDefinitionRegistrar,
  buildTaskDefinitionRequest,
  type AgentTemplate,
  type SchedulerClientFactory,
} from '@agent-fleet/agent-template';
import { createEcsSchedulerClientFactory } from '@agent-fleet/ecs-scheduler';
import { PoolConfiguration } from '@agent-fleet/pool';
import { createLogger } from './lib/logger.js';

export const VERSION = '0.1.0';

/**
 * Collaborators the commands run against
 */
export interface ProgramDeps {
  /** Environment to load configuration from */
  env?: NodeJS.ProcessEnv;

  /** Scheduler client factory (defaults to ECS) */
  clientFactory?: SchedulerClientFactory;

  /** Logger for registration events (defaults to one built from config) */
  logger?: Logger;

  /** Line sink for command output */
  out?: (line: string) => void;

  /** Force colors on or off */
  colors?: boolean;

  /** Called with the exit code when a command finishes */
  exit?: (code: number) => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

/**
 * Build the agent-fleet command-line program
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const out = deps.out ?? ((line: string) => console.log(line));
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const pc = picocolors.createColors(deps.colors ?? picocolors.isColorSupported);

  function loadPool(): { config: FleetConfig; pool: PoolConfiguration } {
    const config = loadConfig(env);
    return { config, pool: PoolConfiguration.load(config.pool.file) };
  }

  function requireTemplate(pool: PoolConfiguration, label: string): AgentTemplate {
    const template = pool.findTemplate(label);
    if (!template) {
      throw new Error(`No template with label "${label}" in ${pool.path}`);
    }
    return template;
  }

  function fail(title: string, err: unknown): void {
    out(pc.red(title));
    out(pc.red(`  ${errorMessage(err)}`));
    exit(1);
  }

  const program = new Command();

  program
    .name('agent-fleet')
    .description('Build-agent task definitions for ECS')
    .version(VERSION);

  /**
   * Check config command - validates environment and pool file
   */
  program
    .command('check-config')
    .description('Validate environment configuration and the pool file')
    .action(() => {
      try {
        const { config, pool } = loadPool();

        out(pc.bold('Configuration'));
        out(`  ${pc.cyan('POOL_FILE')}: ${config.pool.file}`);
        out(`  ${pc.cyan('CLOUD')}: ${pool.name}`);
        out(`  ${pc.cyan('REGION')}: ${pool.getRegionName()}`);
        out(`  ${pc.cyan('CREDENTIALS')}: ${pool.getCredentialsId() ?? '(default chain)'}`);
        out(`  ${pc.cyan('LOG_LEVEL')}: ${config.logging.level}`);

        out(pc.bold(`Templates (${pool.getTemplates().length})`));
        for (const template of pool.getTemplates()) {
          const state = template.registeredDefinitionId ?? pc.gray('unregistered');
          out(`  - ${template.displayName} [${template.image}] ${state}`);
        }

        out(pc.green(pc.bold('Configuration is valid!')));
        exit(0);
      } catch (err) {
        fail('Configuration Error:', err);
      }
    });

  /**
   * Render command - print the task definition a template translates to
   */
  program
    .command('render')
    .description('Print the task definition request for a template')
    .argument('<label>', 'Label token selecting the template')
    .action((label: string) => {
      try {
        const { pool } = loadPool();
        const request = buildTaskDefinitionRequest(requireTemplate(pool, label));
        out(JSON.stringify(request, null, 2));
        exit(0);
      } catch (err) {
        fail('Render Error:', err);
      }
    });

  /**
   * Register command - lazily register task definitions
   */
  program
    .command('register')
    .description('Register task definitions for templates that have none yet')
    .argument('[label]', 'Label token selecting one template (default: all)')
    .action(async (label: string | undefined) => {
      try {
        const { config, pool } = loadPool();
        const logger = deps.logger ?? createLogger(config.logging.level, config.logging.format);

        const registrar = new TaskDefinitionRegistrar({
          clientFactory: deps.clientFactory ?? createEcsSchedulerClientFactory(),
        });
        registrar.setLogger((message, level, fields) => logger[level](fields, message));

        const templates = label === undefined ? pool.getTemplates() : [requireTemplate(pool, label)];

        for (const template of templates) {
          const id = await registrar.ensureRegistered(template, pool);
          out(`  ${pc.green('✓')} ${template.displayName} → ${id}`);
        }

        exit(0);
      } catch (err) {
        fail('Registration Error:', err);
      }
    });

  return program;
}
