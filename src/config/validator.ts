import Joi from 'joi';
import {
  DeploymentProfile,
  ENVIRONMENT_NAMES,
  LOG_VERBOSITY_LEVELS,
  PipelineError,
  RuntimeSettings
} from '../types/index.js';
import { ConfigValidationResult } from './types.js';

const MOST_VERBOSE_LEVEL = LOG_VERBOSITY_LEVELS[0];

// Joi schema for RuntimeSettings
const runtimeSettingsSchema = Joi.object<RuntimeSettings>({
  projectId: Joi.string()
    .required()
    .pattern(/^[a-z][a-z0-9-]{4,28}[a-z0-9]$/)
    .messages({
      'string.pattern.base': 'Project ID must be 6-30 lowercase letters, digits or hyphens and start with a letter'
    }),
  region: Joi.string()
    .required()
    .pattern(/^[a-z]+-[a-z]+\d+$/)
    .messages({
      'string.pattern.base': 'Region must be a valid region identifier (e.g., us-central1)'
    }),
  registry: Joi.string()
    .required()
    .hostname()
    .messages({
      'string.hostname': 'Registry must be a registry host name (e.g., gcr.io)'
    }),
  serviceBaseName: Joi.string()
    .required()
    .pattern(/^[a-z][a-z0-9-]*$/)
    .max(40)
    .messages({
      'string.pattern.base': 'Service name must start with a letter and contain only lowercase letters, digits and hyphens',
      'string.max': 'Service name must be no more than 40 characters long'
    }),
  sourceDir: Joi.string()
    .required()
    .messages({
      'string.empty': 'Source directory must not be empty'
    })
}).unknown(false);

// Joi schema for DeploymentProfile
const deploymentProfileSchema = Joi.object<DeploymentProfile>({
  environmentName: Joi.string()
    .valid(...ENVIRONMENT_NAMES)
    .required(),
  serviceName: Joi.string().required(),
  projectId: Joi.string().required(),
  region: Joi.string().required(),
  resources: Joi.object({
    memoryLimit: Joi.string()
      .pattern(/^\d+(Mi|Gi)$/)
      .required()
      .messages({
        'string.pattern.base': 'Memory limit must be expressed in Mi or Gi (e.g., 512Mi, 2Gi)'
      }),
    cpuCount: Joi.number().integer().min(1).required()
  }).required(),
  scalingBounds: Joi.object({
    minInstances: Joi.number().integer().min(0).required(),
    maxInstances: Joi.number()
      .integer()
      .min(Joi.ref('minInstances'))
      .required()
      .messages({
        'number.min': 'Maximum instances must be greater than or equal to minimum instances'
      })
  }).required(),
  requestTimeoutSeconds: Joi.number()
    .integer()
    .min(1)
    .max(3600)
    .required()
    .messages({
      'number.min': 'Request timeout must be at least 1 second',
      'number.max': 'Request timeout must be no more than 3600 seconds (60 minutes)'
    }),
  logVerbosity: Joi.string()
    .valid(...LOG_VERBOSITY_LEVELS)
    .required(),
  debugEnabled: Joi.boolean()
    .required()
    .when('logVerbosity', {
      not: MOST_VERBOSE_LEVEL,
      then: Joi.valid(false).messages({
        'any.only': `Debug can only be enabled together with ${MOST_VERBOSE_LEVEL} logging`
      })
    }),
  requiresConfirmation: Joi.boolean().required(),
  imageReference: Joi.string().required(),
  sourceDir: Joi.string().required()
}).unknown(false);

function collectErrors(error: Joi.ValidationError | undefined): string[] {
  return error ? error.details.map(detail => detail.message) : [];
}

/**
 * Validates runtime settings against the schema
 */
export function validateSettings(settings: unknown): ConfigValidationResult {
  const { error } = runtimeSettingsSchema.validate(settings, { abortEarly: false });
  const errors = collectErrors(error);
  return { valid: errors.length === 0, errors };
}

/**
 * Validates runtime settings and returns them frozen
 * @throws PipelineError with code INVALID_SETTINGS if validation fails
 */
export function validateAndNormalizeSettings(settings: unknown): RuntimeSettings {
  const { error, value } = runtimeSettingsSchema.validate(settings, { abortEarly: false });

  if (error) {
    throw new PipelineError('INVALID_SETTINGS', `Configuration validation failed:\n${collectErrors(error).join('\n')}`, {
      remediation: 'Check GCP_PROJECT_ID, GCP_REGION and the settings file passed with --config'
    });
  }

  return Object.freeze(value);
}

/**
 * Validates a resolved deployment profile
 */
export function validateProfile(profile: DeploymentProfile): ConfigValidationResult {
  const { error } = deploymentProfileSchema.validate(profile, { abortEarly: false });
  const errors = collectErrors(error);
  return { valid: errors.length === 0, errors };
}
