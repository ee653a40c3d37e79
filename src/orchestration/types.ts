// Orchestration-specific types
import { DeploymentError, DeploymentOutcome, DeploymentProfile, HealthStatus } from '../types/index.js';

export type PipelineStage = 'resolve' | 'preflight' | 'build' | 'deploy' | 'describe' | 'verify';

export type StageResult<T> =
  | { success: true; value: T }
  | { success: false; error: DeploymentError };

export type PipelineResult =
  | { status: 'succeeded'; outcome: DeploymentOutcome }
  | { status: 'cancelled'; profile: DeploymentProfile }
  | { status: 'previewed'; profile: DeploymentProfile }
  | { status: 'failed'; stage: PipelineStage; error: DeploymentError };

export interface ServiceStatus {
  profile: DeploymentProfile;
  serviceEndpoint: string;
  healthStatus: HealthStatus;
}

export type StatusResult =
  | { status: 'found'; service: ServiceStatus }
  | { status: 'failed'; stage: PipelineStage; error: DeploymentError };

/**
 * Receives progress from the pipeline. Every method is optional.
 */
export interface PipelineObserver {
  resolved?(profile: DeploymentProfile): void;
  stageStarted?(stage: PipelineStage, message: string): void;
  stageSucceeded?(stage: PipelineStage, message: string): void;
  stageFailed?(stage: PipelineStage, error: DeploymentError): void;
  warn?(message: string): void;
  /** Shown before an irreversible step that needs the operator's approval */
  caution?(message: string): void;
  preview?(profile: DeploymentProfile): void;
}

/** Reads one line of operator input. */
export interface Prompt {
  ask(question: string): Promise<string>;
}
