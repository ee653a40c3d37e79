import {
  DeploymentProfile,
  EnvironmentName,
  InvalidEnvironmentError,
  LOG_VERBOSITY_LEVELS,
  LogVerbosity,
  PipelineError,
  ResourceLimits,
  RuntimeSettings,
  ScalingBounds,
  isEnvironmentName
} from '../types/index.js';
import { createNamingService } from './naming.js';
import { validateProfile } from './validator.js';

interface ProfileTemplate {
  resources: ResourceLimits;
  scalingBounds: ScalingBounds;
  requestTimeoutSeconds: number;
  logVerbosity: LogVerbosity;
  requiresConfirmation: boolean;
}

// Staging trades availability for cost; production keeps a warm instance.
const PROFILE_TEMPLATES: Record<EnvironmentName, ProfileTemplate> = {
  staging: {
    resources: { memoryLimit: '1Gi', cpuCount: 1 },
    scalingBounds: { minInstances: 0, maxInstances: 5 },
    requestTimeoutSeconds: 300,
    logVerbosity: 'INFO',
    requiresConfirmation: false
  },
  production: {
    resources: { memoryLimit: '2Gi', cpuCount: 2 },
    scalingBounds: { minInstances: 1, maxInstances: 10 },
    requestTimeoutSeconds: 3600,
    logVerbosity: 'WARNING',
    requiresConfirmation: true
  }
};

export const DEFAULT_ENVIRONMENT: EnvironmentName = 'staging';

/**
 * Debug output is only enabled alongside the most verbose log level.
 */
export function isDebugLevel(level: LogVerbosity): boolean {
  return level === LOG_VERBOSITY_LEVELS[0];
}

/**
 * Resolve an environment name into a frozen deployment profile.
 *
 * Pure: reads nothing but its arguments.
 * @throws InvalidEnvironmentError for names outside the known environments
 */
export function resolveProfile(environment: string, settings: RuntimeSettings): DeploymentProfile {
  if (!isEnvironmentName(environment)) {
    throw new InvalidEnvironmentError(environment);
  }

  const template = PROFILE_TEMPLATES[environment];
  const names = createNamingService().generateResourceNames({
    serviceBaseName: settings.serviceBaseName,
    environment,
    registry: settings.registry,
    projectId: settings.projectId
  });

  const profile: DeploymentProfile = Object.freeze({
    environmentName: environment,
    serviceName: names.serviceName,
    projectId: settings.projectId,
    region: settings.region,
    resources: Object.freeze({ ...template.resources }),
    scalingBounds: Object.freeze({ ...template.scalingBounds }),
    requestTimeoutSeconds: template.requestTimeoutSeconds,
    logVerbosity: template.logVerbosity,
    debugEnabled: isDebugLevel(template.logVerbosity),
    requiresConfirmation: template.requiresConfirmation,
    imageReference: names.imageReference,
    sourceDir: settings.sourceDir
  });

  const validation = validateProfile(profile);
  if (!validation.valid) {
    throw new PipelineError('INVALID_SETTINGS', `Resolved profile for ${environment} is invalid:\n${validation.errors.join('\n')}`);
  }

  return profile;
}

/**
 * Environment variables the deployed service receives
 */
export function serviceEnvironmentVariables(profile: DeploymentProfile): Record<string, string> {
  return {
    ENVIRONMENT: profile.environmentName,
    DEBUG: String(profile.debugEnabled),
    LOG_LEVEL: profile.logVerbosity
  };
}
