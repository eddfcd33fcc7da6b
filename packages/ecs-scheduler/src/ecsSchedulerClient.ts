import {
  ECSClient,
  RegisterTaskDefinitionCommand,
  type RegisterTaskDefinitionCommandOutput,
} from '@aws-sdk/client-ecs';
import {
  RegistrationError,
  type RegisteredTaskDefinition,
  type SchedulerClient,
  type SchedulerClientFactory,
  type TaskDefinitionRequest,
} from '@agent-fleet/agent-template';
import { resolveCredentials, resolveRegion, type EcsCredentials } from './credentials.js';

/**
 * The one ECS operation this adapter needs
 */
export interface RegisterTaskDefinitionSender {
  send(command: RegisterTaskDefinitionCommand): Promise<RegisterTaskDefinitionCommandOutput>;
}

/**
 * Configuration for the ECS scheduler client
 */
export interface EcsSchedulerClientConfig {
  /** AWS region code */
  region: string;

  /** Credentials; omitted means the SDK default provider chain */
  credentials?: EcsCredentials;

  /** Pre-built sender (tests, custom endpoints) */
  sender?: RegisterTaskDefinitionSender;
}

/**
 * ECS scheduler client
 *
 * Registers task definitions through the AWS SDK. SDK errors (auth,
 * throttling, validation) propagate unchanged.
 */
export class EcsSchedulerClient implements SchedulerClient {
  private sender: RegisterTaskDefinitionSender;
  readonly region: string;

  constructor(config: EcsSchedulerClientConfig) {
    this.region = config.region;
    this.sender =
      config.sender ??
      new ECSClient({
        region: config.region,
        credentials: config.credentials,
      });
  }

  async registerTaskDefinition(request: TaskDefinitionRequest): Promise<RegisteredTaskDefinition> {
    const output = await this.sender.send(new RegisterTaskDefinitionCommand(request));

    const definition = output.taskDefinition;
    if (!definition?.taskDefinitionArn) {
      throw new RegistrationError(
        `ECS registered family "${request.family}" but returned no task definition ARN`
      );
    }

    return {
      definitionId: definition.taskDefinitionArn,
      family: definition.family,
      revision: definition.revision,
    };
  }
}

/**
 * Scheduler client factory backed by ECS
 *
 * Resolves the credentials identifier as a shared-config profile and
 * validates the region before building the client.
 */
export function createEcsSchedulerClientFactory(): SchedulerClientFactory {
  return ({ credentialsId, regionName }) =>
    new EcsSchedulerClient({
      region: resolveRegion(regionName),
      credentials: resolveCredentials(credentialsId),
    });
}
