import { CommandResult, CommandRunner } from './types.js';

export const GCLOUD_BINARY = 'gcloud';

/** Port the container listens on; Cloud Run routes ingress to it. */
export const SERVICE_PORT = 8080;

export interface SubmitBuildRequest {
  image: string;
  projectId: string;
  sourceDir: string;
}

export interface RunDeployRequest {
  serviceName: string;
  image: string;
  projectId: string;
  region: string;
  memoryLimit: string;
  cpuCount: number;
  timeoutSeconds: number;
  minInstances: number;
  maxInstances: number;
  environmentVariables: Record<string, string>;
}

export interface DescribeServiceRequest {
  serviceName: string;
  projectId: string;
  region: string;
}

export interface GcloudCliOptions {
  binary?: string;
  /** Streams output of long-running commands (builds, deploys) */
  onOutput?: (chunk: string) => void;
}

/**
 * Thin wrapper over the gcloud CLI. Every method maps to one invocation and
 * returns the raw command result; interpretation is left to the callers.
 */
export class GcloudCli {
  private readonly binary: string;
  private readonly onOutput?: (chunk: string) => void;

  constructor(private readonly runner: CommandRunner, options: GcloudCliOptions = {}) {
    this.binary = options.binary ?? GCLOUD_BINARY;
    this.onOutput = options.onOutput;
  }

  get binaryName(): string {
    return this.binary;
  }

  async isInstalled(): Promise<boolean> {
    const result = await this.runner.run(this.binary, ['--version']);
    return result.ok;
  }

  /**
   * @returns The active account, or null when no credential is active
   */
  async activeAccount(): Promise<string | null> {
    const result = await this.runner.run(this.binary, [
      'auth',
      'list',
      '--filter=status:ACTIVE',
      '--format=value(account)'
    ]);
    if (!result.ok) {
      return null;
    }
    const account = result.stdout.split('\n').map(line => line.trim()).find(line => line.length > 0);
    return account ?? null;
  }

  async login(): Promise<CommandResult> {
    return this.runner.run(this.binary, ['auth', 'login'], { interactive: true });
  }

  async submitBuild(request: SubmitBuildRequest): Promise<CommandResult> {
    return this.runner.run(
      this.binary,
      ['builds', 'submit', '--tag', request.image, '--project', request.projectId, request.sourceDir],
      { onOutput: this.onOutput }
    );
  }

  async deployService(request: RunDeployRequest): Promise<CommandResult> {
    const envVars = Object.entries(request.environmentVariables)
      .map(([key, value]) => `${key}=${value}`)
      .join(',');

    return this.runner.run(
      this.binary,
      [
        'run', 'deploy', request.serviceName,
        '--image', request.image,
        '--platform', 'managed',
        '--region', request.region,
        '--project', request.projectId,
        '--allow-unauthenticated',
        '--port', String(SERVICE_PORT),
        '--memory', request.memoryLimit,
        '--cpu', String(request.cpuCount),
        '--timeout', String(request.timeoutSeconds),
        '--min-instances', String(request.minInstances),
        '--max-instances', String(request.maxInstances),
        `--set-env-vars=${envVars}`
      ],
      { onOutput: this.onOutput }
    );
  }

  async describeServiceUrl(request: DescribeServiceRequest): Promise<CommandResult> {
    return this.runner.run(this.binary, [
      'run', 'services', 'describe', request.serviceName,
      '--platform', 'managed',
      '--region', request.region,
      '--format', 'value(status.url)',
      '--project', request.projectId
    ]);
  }
}

/**
 * Last non-empty line of a command's output (stderr preferred), for error messages
 */
export function summarizeFailure(result: CommandResult): string {
  const lastLine = (text: string): string | undefined =>
    text.split('\n').map(line => line.trim()).filter(line => line.length > 0).pop();
  const detail = lastLine(result.stderr) ?? lastLine(result.stdout);
  return detail ? `exit code ${result.exitCode}: ${detail}` : `exit code ${result.exitCode}`;
}
