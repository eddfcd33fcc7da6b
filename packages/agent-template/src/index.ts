// Errors
export { AgentFleetError, ConfigurationError, FormatError, RegistrationError } from './errors.js';

// Template
export { AgentTemplate, DISPLAY_NAME_PREFIX } from './agentTemplate.js';
export type { AgentTemplateOptions } from './agentTemplate.js';
export { parseLabelTokens } from './labels.js';
export { SingleAssignmentCell } from './singleAssignmentCell.js';

// Compact lists
export { parseCompactPairs, parseMountPoints, parseVolumes } from './specParser.js';
export type { CompactListKind, CompactPair, MountPoint, Volume } from './specParser.js';

// Task definitions
export {
  AGENT_CONTAINER_NAME,
  AGENT_TASK_FAMILY,
  STARTUP_ARGS_ENV_VAR,
  buildTaskDefinitionRequest,
} from './taskDefinition.js';
export type {
  ContainerDefinition,
  EnvironmentEntry,
  TaskDefinitionRequest,
} from './taskDefinition.js';

// Registration
export type {
  OwningContext,
  RegisteredTaskDefinition,
  SchedulerClient,
  SchedulerClientFactory,
  SchedulerTarget,
} from './scheduler.js';
export { TaskDefinitionRegistrar, ensureRegistered } from './registrar.js';
export type {
  RegistrarLogFn,
  RegistrarLogLevel,
  TaskDefinitionRegistrarConfig,
} from './registrar.js';
