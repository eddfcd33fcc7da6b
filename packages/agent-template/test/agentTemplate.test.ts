import { describe, it, expect } from 'vitest';
import { AgentTemplate, ConfigurationError, parseLabelTokens } from '../src/index.js';

function createTemplate(overrides: Partial<ConstructorParameters<typeof AgentTemplate>[0]> = {}) {
  return new AgentTemplate({
    label: 'linux docker',
    image: 'worker:latest',
    memoryMiB: 512,
    cpuUnits: 256,
    ...overrides,
  });
}

describe('AgentTemplate', () => {
  describe('construction', () => {
    it('keeps the required fields', () => {
      const template = createTemplate({ remoteRootPath: '/home/agent', privileged: true });

      expect(template.image).toBe('worker:latest');
      expect(template.memoryMiB).toBe(512);
      expect(template.cpuUnits).toBe(256);
      expect(template.privileged).toBe(true);
      expect(template.remoteRootPath).toBe('/home/agent');
    });

    it('defaults privileged to false', () => {
      expect(createTemplate().privileged).toBe(false);
    });

    it('rejects an empty image', () => {
      expect(() => createTemplate({ image: '' })).toThrow(ConfigurationError);
      expect(() => createTemplate({ image: '   ' })).toThrow('image must not be empty');
    });

    it('rejects fractional resource reservations', () => {
      expect(() => createTemplate({ memoryMiB: 1.5 })).toThrow(ConfigurationError);
      expect(() => createTemplate({ cpuUnits: Number.NaN })).toThrow(ConfigurationError);
    });

    it('starts unregistered', () => {
      const template = createTemplate();

      expect(template.registeredDefinitionId).toBeUndefined();
      expect(template.isRegistered).toBe(false);
    });

    it('restores a persisted definition identifier', () => {
      const template = createTemplate({ registeredDefinitionId: 'arn:test:task-definition/build-agent:3' });

      expect(template.isRegistered).toBe(true);
      expect(template.registeredDefinitionId).toBe('arn:test:task-definition/build-agent:3');
    });
  });

  describe('entrypoint and startup arguments', () => {
    it('normalizes whitespace-only values to undefined', () => {
      const template = createTemplate({ entrypoint: '  ', extraStartupArgs: '\t' });

      expect(template.entrypoint).toBeUndefined();
      expect(template.extraStartupArgs).toBeUndefined();
    });

    it('stores trimmed values through the setters', () => {
      const template = createTemplate();
      template.entrypoint = '  sh -c run.sh ';
      template.extraStartupArgs = ' -Xmx512m ';

      expect(template.entrypoint).toBe('sh -c run.sh');
      expect(template.extraStartupArgs).toBe('-Xmx512m');
    });

    it('clears a value set to an empty string', () => {
      const template = createTemplate({ entrypoint: 'sh' });
      template.entrypoint = '';

      expect(template.entrypoint).toBeUndefined();
    });

    it('refuses changes once registered', () => {
      const template = createTemplate({ registeredDefinitionId: 'arn:test:1' });

      expect(() => {
        template.entrypoint = 'sh';
      }).toThrow(ConfigurationError);
      expect(() => {
        template.extraStartupArgs = '-Xmx1g';
      }).toThrow('Cannot change extraStartupArgs of "ECS Agent linux docker" after it has been registered');
    });
  });

  describe('labels', () => {
    it('parses label tokens', () => {
      const template = createTemplate({ label: ' linux  docker\tlinux ' });

      expect([...template.labelTokens]).toEqual(['linux', 'docker']);
    });

    it('has no tokens without a label', () => {
      expect(parseLabelTokens(undefined).size).toBe(0);
      expect(createTemplate({ label: undefined }).labelTokens.size).toBe(0);
    });

    it('derives a display name from the label', () => {
      expect(createTemplate().displayName).toBe('ECS Agent linux docker');
      expect(createTemplate({ label: undefined }).displayName).toBe('ECS Agent');
      expect(createTemplate({ label: '  ' }).displayName).toBe('ECS Agent');
    });
  });

  describe('mounts and volumes', () => {
    it('exposes raw and parsed lists', () => {
      const template = createTemplate({
        mountPointsSpec: 'data:/var/data',
        volumesSpec: 'data:/host/data',
      });

      expect(template.mountPointsSpec).toBe('data:/var/data');
      expect(template.volumesSpec).toBe('data:/host/data');
      expect(template.mountPoints).toEqual([{ sourceVolume: 'data', containerPath: '/var/data' }]);
      expect(template.volumes).toEqual([{ name: 'data', host: { sourcePath: '/host/data' } }]);
    });
  });

  describe('toConfig', () => {
    it('omits absent optional fields', () => {
      expect(createTemplate().toConfig()).toEqual({
        label: 'linux docker',
        image: 'worker:latest',
        memoryMiB: 512,
        cpuUnits: 256,
        privileged: false,
      });
    });

    it('includes normalized values and the definition identifier', () => {
      const template = createTemplate({
        entrypoint: ' sh -c run.sh ',
        volumesSpec: 'data:/host/data',
        registeredDefinitionId: 'arn:test:7',
      });

      expect(template.toConfig()).toEqual({
        label: 'linux docker',
        image: 'worker:latest',
        memoryMiB: 512,
        cpuUnits: 256,
        privileged: false,
        volumesSpec: 'data:/host/data',
        entrypoint: 'sh -c run.sh',
        registeredDefinitionId: 'arn:test:7',
      });
    });
  });
});
