import type { AgentTemplate } from './agentTemplate.js';
import type { OwningContext, SchedulerClientFactory } from './scheduler.js';
import { buildTaskDefinitionRequest } from './taskDefinition.js';

/**
 * Log levels the registrar emits
 */
export type RegistrarLogLevel = 'debug' | 'info';

/**
 * Logging callback: message, level, structured fields
 */
export type RegistrarLogFn = (
  message: string,
  level: RegistrarLogLevel,
  fields: Record<string, unknown>
) => void;

/**
 * Configuration for the registrar
 */
export interface TaskDefinitionRegistrarConfig {
  /** Builds the scheduler client for the owner's credentials and region */
  clientFactory: SchedulerClientFactory;
}

/**
 * Task-definition registrar
 *
 * Registers a template's task definition the first time it is needed and
 * caches the identifier on the template. Concurrent first-time callers for
 * the same template share a single scheduler call. Errors are not caught or
 * retried: they reach the caller and the template stays unregistered.
 */
export class TaskDefinitionRegistrar {
  private config: TaskDefinitionRegistrarConfig;
  private onLog?: RegistrarLogFn;

  constructor(config: TaskDefinitionRegistrarConfig) {
    this.config = config;
  }

  /**
   * Set the logging callback
   */
  setLogger(onLog: RegistrarLogFn): void {
    this.onLog = onLog;
  }

  /**
   * Make sure the template has a registered task definition
   *
   * @returns The registered definition identifier
   */
  ensureRegistered(template: AgentTemplate, owner: OwningContext): Promise<string> {
    return template.registration.getOrInit(
      () => this.register(template, owner),
      () => owner.save()
    );
  }

  private async register(template: AgentTemplate, owner: OwningContext): Promise<string> {
    const client = this.config.clientFactory({
      credentialsId: owner.getCredentialsId(),
      regionName: owner.getRegionName(),
    });

    const request = buildTaskDefinitionRequest(template);
    const result = await client.registerTaskDefinition(request);

    this.onLog?.(`${template.displayName} - created task definition`, 'debug', {
      label: template.label,
      definitionId: result.definitionId,
      request,
    });
    this.onLog?.(`${template.displayName} - created task definition`, 'info', {
      label: template.label,
      definitionId: result.definitionId,
    });

    return result.definitionId;
  }
}

/**
 * One-shot form of {@link TaskDefinitionRegistrar.ensureRegistered}
 */
export function ensureRegistered(
  template: AgentTemplate,
  owner: OwningContext,
  config: TaskDefinitionRegistrarConfig
): Promise<string> {
  return new TaskDefinitionRegistrar(config).ensureRegistered(template, owner);
}
