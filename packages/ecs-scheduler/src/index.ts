export { EcsSchedulerClient, createEcsSchedulerClientFactory } from './ecsSchedulerClient.js';
export type { EcsSchedulerClientConfig, RegisterTaskDefinitionSender } from './ecsSchedulerClient.js';
export { resolveCredentials, resolveRegion } from './credentials.js';
export type { EcsCredentials } from './credentials.js';
