// Configuration-specific types
import { RuntimeSettings } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

/** Settings as they appear in an optional settings file, before defaults. */
export type SettingsFile = Partial<Record<keyof RuntimeSettings, string>>;

export interface SettingsLoader {
  load(path?: string): Promise<RuntimeSettings>;
  validate(settings: unknown): ConfigValidationResult;
}
