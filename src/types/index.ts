// Core type definitions for the Cloud Run deployment pipeline

export const ENVIRONMENT_NAMES = ['staging', 'production'] as const;

export type EnvironmentName = (typeof ENVIRONMENT_NAMES)[number];

/** Ordered from most to least verbose. */
export const LOG_VERBOSITY_LEVELS = ['INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type LogVerbosity = (typeof LOG_VERBOSITY_LEVELS)[number];

export type HealthStatus = 'Healthy' | 'RespondingButUnhealthy' | 'Unknown';

export interface ResourceLimits {
  readonly memoryLimit: string;
  readonly cpuCount: number;
}

export interface ScalingBounds {
  readonly minInstances: number;
  readonly maxInstances: number;
}

/**
 * Process-wide settings, read once at startup and never mutated.
 */
export interface RuntimeSettings {
  readonly projectId: string;
  readonly region: string;
  readonly registry: string;
  readonly serviceBaseName: string;
  readonly sourceDir: string;
}

export interface DeploymentProfile {
  readonly environmentName: EnvironmentName;
  readonly serviceName: string;
  readonly projectId: string;
  readonly region: string;
  readonly resources: ResourceLimits;
  readonly scalingBounds: ScalingBounds;
  readonly requestTimeoutSeconds: number;
  readonly logVerbosity: LogVerbosity;
  readonly debugEnabled: boolean;
  readonly requiresConfirmation: boolean;
  readonly imageReference: string;
  readonly sourceDir: string;
}

export interface DeploymentMetadata {
  deploymentId: string;
  timestamp: Date;
  durationMs: number;
}

export interface DeploymentOutcome {
  readonly serviceEndpoint: string;
  readonly healthStatus: HealthStatus;
  readonly profile: DeploymentProfile;
  readonly metadata: Readonly<DeploymentMetadata>;
}

export type DeploymentErrorCode =
  | 'INVALID_ENVIRONMENT'
  | 'INVALID_SETTINGS'
  | 'TOOL_NOT_FOUND'
  | 'NOT_AUTHENTICATED'
  | 'BUILD_FAILED'
  | 'DEPLOY_FAILED'
  | 'DESCRIBE_FAILED';

export type DeploymentErrorCategory = 'usage' | 'precondition' | 'external';

export interface DeploymentError {
  code: DeploymentErrorCode;
  message: string;
  details?: unknown;
  remediation?: string;
}

const ERROR_CATEGORIES: Record<DeploymentErrorCode, DeploymentErrorCategory> = {
  INVALID_ENVIRONMENT: 'usage',
  INVALID_SETTINGS: 'usage',
  TOOL_NOT_FOUND: 'precondition',
  NOT_AUTHENTICATED: 'precondition',
  BUILD_FAILED: 'external',
  DEPLOY_FAILED: 'external',
  DESCRIBE_FAILED: 'external'
};

export function categorizeError(code: DeploymentErrorCode): DeploymentErrorCategory {
  return ERROR_CATEGORIES[code];
}

/**
 * Error thrown inside the pipeline's building blocks. The orchestrator turns
 * it into a {@link DeploymentError} record.
 */
export class PipelineError extends Error {
  readonly code: DeploymentErrorCode;
  readonly remediation?: string;
  readonly details?: unknown;

  constructor(code: DeploymentErrorCode, message: string, options: { remediation?: string; details?: unknown } = {}) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.remediation = options.remediation;
    this.details = options.details;
  }

  toDeploymentError(): DeploymentError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      remediation: this.remediation
    };
  }
}

export class InvalidEnvironmentError extends PipelineError {
  readonly environment: string;

  constructor(environment: string) {
    super('INVALID_ENVIRONMENT', `Invalid environment '${environment}'`, {
      remediation: `Usage: cloudrun-deploy [${ENVIRONMENT_NAMES.join('|')}]`
    });
    this.name = 'InvalidEnvironmentError';
    this.environment = environment;
  }
}

export function isEnvironmentName(value: string): value is EnvironmentName {
  return ENVIRONMENT_NAMES.some(name => name === value);
}
