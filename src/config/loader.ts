// Runtime settings loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { PipelineError, RuntimeSettings } from '../types/index.js';
import { ConfigValidationResult, SettingsFile, SettingsLoader } from './types.js';
import { validateAndNormalizeSettings, validateSettings } from './validator.js';

/** Environment variables that override the settings file and the defaults. */
export const SETTINGS_ENV_VARS = {
  projectId: 'GCP_PROJECT_ID',
  region: 'GCP_REGION'
} as const;

export const DEFAULT_SETTINGS: RuntimeSettings = Object.freeze({
  projectId: 'merchant-onboarding',
  region: 'us-central1',
  registry: 'gcr.io',
  serviceBaseName: 'merchant-onboarding-api',
  sourceDir: '.'
});

const SETTINGS_KEYS: readonly (keyof RuntimeSettings)[] = ['projectId', 'region', 'registry', 'serviceBaseName', 'sourceDir'];

function settingsError(message: string): PipelineError {
  return new PipelineError('INVALID_SETTINGS', message, {
    remediation: `Supported settings: ${SETTINGS_KEYS.join(', ')}`
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads the process-wide settings once: defaults, then an optional YAML or
 * JSON settings file, then environment overrides.
 */
export class RuntimeSettingsLoader implements SettingsLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * @param path - Optional settings file (YAML or JSON)
   * @param overrides - Values from command-line flags, applied last
   */
  async load(path?: string, overrides: SettingsFile = {}): Promise<RuntimeSettings> {
    const fromFile: SettingsFile = path ? await this.readSettingsFile(path) : {};
    const layers: SettingsFile[] = [fromFile, this.readEnvironmentOverrides(), overrides];

    const merged: Record<string, string> = { ...DEFAULT_SETTINGS };
    for (const layer of layers) {
      for (const [key, value] of Object.entries(layer)) {
        if (value !== undefined && value !== '') {
          merged[key] = value;
        }
      }
    }

    return validateAndNormalizeSettings(merged);
  }

  validate(settings: unknown): ConfigValidationResult {
    return validateSettings(settings);
  }

  private async readSettingsFile(path: string): Promise<SettingsFile> {
    if (!existsSync(path)) {
      throw settingsError(`Settings file not found: ${path}`);
    }

    const content = await readFile(path, 'utf-8');

    const isJson = path.endsWith('.json');
    if (!isJson && !path.endsWith('.yml') && !path.endsWith('.yaml')) {
      throw settingsError('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
    }

    let raw: unknown;
    try {
      raw = isJson ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw settingsError(`Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (raw === null || raw === undefined) {
      return {};
    }
    if (!isRecord(raw)) {
      throw settingsError(`Settings file ${path} must contain a mapping of keys to values`);
    }

    const settings: SettingsFile = {};
    for (const [key, value] of Object.entries(raw)) {
      const known = SETTINGS_KEYS.find(candidate => candidate === key);
      if (!known) {
        throw settingsError(`Unknown setting '${key}' in ${path}`);
      }
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw settingsError(`Setting '${key}' in ${path} must be a string`);
      }
      settings[known] = this.substituteEnvironmentVariables(String(value));
    }
    return settings;
  }

  private readEnvironmentOverrides(): SettingsFile {
    return {
      projectId: this.env[SETTINGS_ENV_VARS.projectId],
      region: this.env[SETTINGS_ENV_VARS.region]
    };
  }

  /**
   * Substitute environment variables in a string
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset variable without a default keeps the placeholder
      return match;
    });
  }
}

/**
 * Convenience function to load settings from the current process environment
 */
export async function loadRuntimeSettings(path?: string, overrides: SettingsFile = {}): Promise<RuntimeSettings> {
  return new RuntimeSettingsLoader().load(path, overrides);
}
