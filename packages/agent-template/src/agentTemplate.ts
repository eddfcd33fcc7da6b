import type { AgentTemplateConfig } from '@agent-fleet/config';
import { ConfigurationError } from './errors.js';
import { parseLabelTokens } from './labels.js';
import { SingleAssignmentCell } from './singleAssignmentCell.js';
import { parseMountPoints, parseVolumes, type MountPoint, type Volume } from './specParser.js';

/**
 * Prefix of every template's display name
 */
export const DISPLAY_NAME_PREFIX = 'ECS Agent';

/**
 * Fields needed to construct a template
 */
export interface AgentTemplateOptions {
  label?: string;
  image: string;
  remoteRootPath?: string;
  memoryMiB: number;
  cpuUnits: number;
  privileged?: boolean;
  mountPointsSpec?: string;
  volumesSpec?: string;
  entrypoint?: string;
  extraStartupArgs?: string;

  /** Identifier persisted by an earlier registration */
  registeredDefinitionId?: string;
}

function trimToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Agent template
 *
 * Desired shape of one container-based build agent. Required fields are
 * fixed at construction; entrypoint and startup arguments may be adjusted
 * until the template is registered. The registered task-definition
 * identifier lives in a single-assignment cell and never changes once set.
 */
export class AgentTemplate {
  readonly label: string | undefined;
  readonly image: string;
  readonly remoteRootPath: string | undefined;
  readonly memoryMiB: number;
  readonly cpuUnits: number;
  readonly privileged: boolean;
  readonly mountPointsSpec: string | undefined;
  readonly volumesSpec: string | undefined;

  private _entrypoint: string | undefined;
  private _extraStartupArgs: string | undefined;

  /** @internal read by the registrar */
  readonly registration: SingleAssignmentCell<string>;

  constructor(options: AgentTemplateOptions) {
    if (!options.image || options.image.trim() === '') {
      throw new ConfigurationError('Agent template image must not be empty');
    }
    if (!Number.isInteger(options.memoryMiB)) {
      throw new ConfigurationError(`Agent template memory must be an integer, got ${options.memoryMiB}`);
    }
    if (!Number.isInteger(options.cpuUnits)) {
      throw new ConfigurationError(`Agent template cpu must be an integer, got ${options.cpuUnits}`);
    }

    this.label = options.label;
    this.image = options.image;
    this.remoteRootPath = options.remoteRootPath;
    this.memoryMiB = options.memoryMiB;
    this.cpuUnits = options.cpuUnits;
    this.privileged = options.privileged ?? false;
    this.mountPointsSpec = options.mountPointsSpec;
    this.volumesSpec = options.volumesSpec;
    this._entrypoint = trimToUndefined(options.entrypoint);
    this._extraStartupArgs = trimToUndefined(options.extraStartupArgs);
    this.registration = new SingleAssignmentCell(trimToUndefined(options.registeredDefinitionId));
  }

  get entrypoint(): string | undefined {
    return this._entrypoint;
  }

  set entrypoint(value: string | undefined) {
    this.assertConfigurable('entrypoint');
    this._entrypoint = trimToUndefined(value);
  }

  get extraStartupArgs(): string | undefined {
    return this._extraStartupArgs;
  }

  set extraStartupArgs(value: string | undefined) {
    this.assertConfigurable('extraStartupArgs');
    this._extraStartupArgs = trimToUndefined(value);
  }

  /**
   * Parsed mount points, in declaration order
   *
   * @throws FormatError when the mount list is malformed
   */
  get mountPoints(): MountPoint[] {
    return parseMountPoints(this.mountPointsSpec);
  }

  /**
   * Parsed task volumes, in declaration order
   *
   * @throws FormatError when the volume list is malformed
   */
  get volumes(): Volume[] {
    return parseVolumes(this.volumesSpec);
  }

  get labelTokens(): Set<string> {
    return parseLabelTokens(this.label);
  }

  get displayName(): string {
    const label = this.label?.trim();
    return label ? `${DISPLAY_NAME_PREFIX} ${label}` : DISPLAY_NAME_PREFIX;
  }

  /**
   * Identifier of the registered task definition, if registered
   */
  get registeredDefinitionId(): string | undefined {
    return this.registration.get();
  }

  get isRegistered(): boolean {
    return this.registration.isSet;
  }

  /**
   * Plain record of this template, in pool-file shape
   */
  toConfig(): AgentTemplateConfig {
    const config: AgentTemplateConfig = {
      image: this.image,
      memoryMiB: this.memoryMiB,
      cpuUnits: this.cpuUnits,
      privileged: this.privileged,
    };

    if (this.label !== undefined) config.label = this.label;
    if (this.remoteRootPath !== undefined) config.remoteRootPath = this.remoteRootPath;
    if (this.mountPointsSpec !== undefined) config.mountPointsSpec = this.mountPointsSpec;
    if (this.volumesSpec !== undefined) config.volumesSpec = this.volumesSpec;
    if (this._entrypoint !== undefined) config.entrypoint = this._entrypoint;
    if (this._extraStartupArgs !== undefined) config.extraStartupArgs = this._extraStartupArgs;

    const registered = this.registration.get();
    if (registered !== undefined) config.registeredDefinitionId = registered;

    return config;
  }

  private assertConfigurable(field: string): void {
    if (this.registration.isSet || this.registration.isPending) {
      throw new ConfigurationError(
        `Cannot change ${field} of "${this.displayName}" after it has been registered`
      );
    }
  }
}
