import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_SETTINGS, RuntimeSettingsLoader } from '../loader.js';
import { PipelineError } from '../../types/index.js';

describe('Runtime Settings Loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'cloudrun-deploy-settings-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should fall back to the documented defaults', async () => {
      const settings = await new RuntimeSettingsLoader({}).load();

      expect(settings).toEqual({
        projectId: 'merchant-onboarding',
        region: 'us-central1',
        registry: 'gcr.io',
        serviceBaseName: 'merchant-onboarding-api',
        sourceDir: '.'
      });
      expect(Object.isFrozen(settings)).toBe(true);
    });

    it('should apply project and region overrides from the environment', async () => {
      const loader = new RuntimeSettingsLoader({ GCP_PROJECT_ID: 'payments-staging', GCP_REGION: 'europe-west1' });

      const settings = await loader.load();

      expect(settings.projectId).toBe('payments-staging');
      expect(settings.region).toBe('europe-west1');
      expect(settings.registry).toBe(DEFAULT_SETTINGS.registry);
    });

    it('should ignore empty environment overrides', async () => {
      const settings = await new RuntimeSettingsLoader({ GCP_PROJECT_ID: '' }).load();

      expect(settings.projectId).toBe('merchant-onboarding');
    });

    it('should load a YAML settings file with variable substitution', async () => {
      const path = join(testDir, 'deploy.yml');
      await writeFile(path, [
        'projectId: "${TEAM_PROJECT:-file-project}"',
        'registry: us-docker.pkg.dev',
        'serviceBaseName: "${SERVICE_BASE}"',
        ''
      ].join('\n'));

      const settings = await new RuntimeSettingsLoader({ SERVICE_BASE: 'orders-api' }).load(path);

      expect(settings.projectId).toBe('file-project');
      expect(settings.registry).toBe('us-docker.pkg.dev');
      expect(settings.serviceBaseName).toBe('orders-api');
      expect(settings.region).toBe('us-central1');
    });

    it('should let environment overrides win over the settings file', async () => {
      const path = join(testDir, 'deploy.json');
      await writeFile(path, JSON.stringify({ projectId: 'file-project', region: 'asia-east1' }));

      const settings = await new RuntimeSettingsLoader({ GCP_PROJECT_ID: 'env-project' }).load(path);

      expect(settings.projectId).toBe('env-project');
      expect(settings.region).toBe('asia-east1');
    });

    it('should apply explicit overrides last', async () => {
      const settings = await new RuntimeSettingsLoader({}).load(undefined, { sourceDir: './services/api' });

      expect(settings.sourceDir).toBe('./services/api');
    });

    it('should treat an empty YAML file as no settings', async () => {
      const path = join(testDir, 'empty.yaml');
      await writeFile(path, '');

      const settings = await new RuntimeSettingsLoader({}).load(path);

      expect(settings).toEqual(DEFAULT_SETTINGS);
    });

    it('should reject unknown settings', async () => {
      const path = join(testDir, 'deploy.yml');
      await writeFile(path, 'bucket: assets\n');

      await expect(new RuntimeSettingsLoader({}).load(path)).rejects.toMatchObject({
        code: 'INVALID_SETTINGS',
        message: `Unknown setting 'bucket' in ${path}`
      });
    });

    it('should reject a missing settings file', async () => {
      const path = join(testDir, 'missing.yml');

      await expect(new RuntimeSettingsLoader({}).load(path)).rejects.toThrow(`Settings file not found: ${path}`);
    });

    it('should reject unsupported file formats', async () => {
      const path = join(testDir, 'deploy.toml');
      await writeFile(path, 'projectId = "x"\n');

      await expect(new RuntimeSettingsLoader({}).load(path)).rejects.toThrow(
        'Unsupported file format. Only .json, .yml, and .yaml files are supported.'
      );
    });

    it.each([
      ['deploy.json', '{ "projectId": '],
      ['deploy.yaml', 'projectId: [unclosed\n']
    ])('should report a malformed %s as invalid settings', async (name, content) => {
      const path = join(testDir, name);
      await writeFile(path, content);

      const error = await new RuntimeSettingsLoader({}).load(path).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toMatchObject({
        code: 'INVALID_SETTINGS',
        remediation: 'Supported settings: projectId, region, registry, serviceBaseName, sourceDir'
      });
      expect(error instanceof PipelineError && error.message.startsWith(`Failed to parse ${path}: `)).toBe(true);
    });

    it('should reject settings that fail validation', async () => {
      const loader = new RuntimeSettingsLoader({ GCP_REGION: 'Central' });

      await expect(loader.load()).rejects.toThrow('Configuration validation failed');
    });
  });

  describe('validate', () => {
    it('should validate without loading', () => {
      const result = new RuntimeSettingsLoader({}).validate({ ...DEFAULT_SETTINGS, registry: 'not a host' });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Registry must be a registry host name (e.g., gcr.io)']);
    });
  });
});
