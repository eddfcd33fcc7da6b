import type { ECSClientConfig } from '@aws-sdk/client-ecs';
import { fromIni } from '@aws-sdk/credential-providers';
import { REGION_PATTERN } from '@agent-fleet/config';
import { ConfigurationError } from '@agent-fleet/agent-template';

/**
 * Credentials accepted by the ECS client
 */
export type EcsCredentials = ECSClientConfig['credentials'];

/**
 * Resolve an opaque credentials identifier
 *
 * The identifier is a shared-config profile name. A blank identifier yields
 * undefined so the SDK falls back to its default provider chain.
 */
export function resolveCredentials(credentialsId: string | undefined): EcsCredentials {
  const profile = credentialsId?.trim();
  if (!profile) {
    return undefined;
  }
  return fromIni({ profile });
}

/**
 * Validate a region name and return it in canonical form
 */
export function resolveRegion(regionName: string): string {
  const region = regionName.trim().toLowerCase();
  if (!REGION_PATTERN.test(region)) {
    throw new ConfigurationError(`Unknown region "${regionName}"`);
  }
  return region;
}
