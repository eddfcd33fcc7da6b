import type { AgentTemplate } from './agentTemplate.js';
import type { MountPoint, Volume } from './specParser.js';

/**
 * Container name shared by every agent task definition
 */
export const AGENT_CONTAINER_NAME = 'build-agent';

/**
 * Family every agent task definition is registered under
 */
export const AGENT_TASK_FAMILY = 'build-agent';

/**
 * Environment variable carrying the agent's startup arguments
 */
export const STARTUP_ARGS_ENV_VAR = 'JAVA_OPTS';

export interface EnvironmentEntry {
  name: string;
  value: string;
}

/**
 * Container definition, in the scheduler's field names
 */
export interface ContainerDefinition {
  name: string;
  image: string;
  memory: number;
  cpu: number;
  privileged: boolean;
  mountPoints: MountPoint[];
  entryPoint?: string[];
  environment?: EnvironmentEntry[];
  essential?: boolean;
}

/**
 * Register-task-definition request, in the scheduler's field names
 */
export interface TaskDefinitionRequest {
  family: string;
  containerDefinitions: ContainerDefinition[];
  volumes: Volume[];
}

/**
 * Translate a template into a register-task-definition request
 *
 * Pure: every call builds fresh objects from the template's current fields.
 *
 * @throws FormatError when the mount or volume list is malformed
 */
export function buildTaskDefinitionRequest(template: AgentTemplate): TaskDefinitionRequest {
  const container: ContainerDefinition = {
    name: AGENT_CONTAINER_NAME,
    image: template.image,
    memory: template.memoryMiB,
    cpu: template.cpuUnits,
    privileged: template.privileged,
    mountPoints: template.mountPoints,
  };

  if (template.entrypoint !== undefined) {
    container.entryPoint = template.entrypoint.split(/\s+/);
  }

  if (template.extraStartupArgs !== undefined) {
    container.environment = [{ name: STARTUP_ARGS_ENV_VAR, value: template.extraStartupArgs }];
    container.essential = true;
  }

  return {
    family: AGENT_TASK_FAMILY,
    containerDefinitions: [container],
    volumes: template.volumes,
  };
}
