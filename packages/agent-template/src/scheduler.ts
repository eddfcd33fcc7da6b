import type { TaskDefinitionRequest } from './taskDefinition.js';

/**
 * Outcome of a successful registration
 */
export interface RegisteredTaskDefinition {
  /** Scheduler identifier of the new revision (an ARN on ECS) */
  definitionId: string;

  family?: string;

  revision?: number;
}

/**
 * Scheduler client interface
 *
 * Abstracts the orchestrator's registration API for testing and for other
 * schedulers
 */
export interface SchedulerClient {
  /**
   * Register a new task-definition revision
   */
  registerTaskDefinition(request: TaskDefinitionRequest): Promise<RegisteredTaskDefinition>;
}

/**
 * Where a scheduler client should point
 */
export interface SchedulerTarget {
  /** Opaque credentials identifier; undefined means the ambient credentials */
  credentialsId: string | undefined;

  regionName: string;
}

/**
 * Build a scheduler client for a credentials/region pair
 */
export type SchedulerClientFactory = (target: SchedulerTarget) => SchedulerClient;

/**
 * The configuration that owns a template
 */
export interface OwningContext {
  getCredentialsId(): string | undefined;

  getRegionName(): string;

  /**
   * Persist current state; called after a successful registration
   */
  save(): void | Promise<void>;
}
