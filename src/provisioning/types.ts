// Provisioning-specific types
import { HealthStatus } from '../types/index.js';

export interface CommandResult {
  readonly ok: boolean;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface RunOptions {
  /** Attach the child to the terminal; nothing is captured. */
  readonly interactive?: boolean;
  /** Receives output chunks as they arrive. */
  readonly onOutput?: (chunk: string) => void;
}

/**
 * Runs an external program to completion. Never rejects for a non-zero exit;
 * the result carries it instead.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export interface BuildResult {
  /** Tagged image reference the service is deployed from */
  image: string;
}

export interface ServiceDeployResult {
  serviceName: string;
  serviceUrl: string;
}

export interface HealthCheckResult {
  status: HealthStatus;
  attempts: number;
  /** URL that answered, absent when nothing did */
  respondingUrl?: string;
}

/** Returns true when the URL answered with a non-error status. */
export interface HttpProber {
  probe(url: string): Promise<boolean>;
}
