import { v4 as uuidv4 } from 'uuid';
import {
  DeploymentError,
  DeploymentMetadata,
  DeploymentOutcome,
  DeploymentProfile,
  HealthStatus,
  PipelineError,
  RuntimeSettings
} from '../types/index.js';
import { DEFAULT_ENVIRONMENT, resolveProfile } from '../config/profiles.js';
import { GcloudCli } from '../provisioning/gcloud-cli.js';
import { BuildManager } from '../provisioning/build-manager.js';
import { ServiceManager } from '../provisioning/service-manager.js';
import { FetchProber, HealthProber } from '../provisioning/health-prober.js';
import { ProcessCommandRunner } from '../provisioning/command-runner.js';
import { confirmDeployment, ReadlinePrompt } from './confirmation-gate.js';
import { runPreflight } from './preflight-checker.js';
import {
  PipelineObserver,
  PipelineResult,
  PipelineStage,
  Prompt,
  StageResult,
  StatusResult
} from './types.js';

export interface OrchestratorDependencies {
  gcloud: GcloudCli;
  prompt: Prompt;
  healthProber: HealthProber;
  /** Prober for status lookups; defaults to healthProber */
  statusProber?: HealthProber;
  observer?: PipelineObserver;
  buildManager?: BuildManager;
  serviceManager?: ServiceManager;
  now?: () => Date;
  generateId?: () => string;
}

export interface DeployOptions {
  /** Resolve and preview only; no external calls */
  dryRun?: boolean;
}

function toDeploymentError(error: unknown, fallbackCode: DeploymentError['code']): DeploymentError {
  if (error instanceof PipelineError) {
    return error.toDeploymentError();
  }
  return {
    code: fallbackCode,
    message: error instanceof Error ? error.message : 'Unknown deployment error',
    details: error
  };
}

/**
 * Runs the deployment stages in order and stops at the first failure.
 *
 * Nothing is retried and nothing is cleaned up after a failure; the control
 * plane keeps serving whatever revision it served before.
 */
export class DeploymentOrchestrator {
  private readonly gcloud: GcloudCli;
  private readonly prompt: Prompt;
  private readonly healthProber: HealthProber;
  private readonly statusProber: HealthProber;
  private readonly observer: PipelineObserver;
  private readonly buildManager: BuildManager;
  private readonly serviceManager: ServiceManager;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly settings: RuntimeSettings, dependencies: OrchestratorDependencies) {
    this.gcloud = dependencies.gcloud;
    this.prompt = dependencies.prompt;
    this.healthProber = dependencies.healthProber;
    this.statusProber = dependencies.statusProber ?? dependencies.healthProber;
    this.observer = dependencies.observer ?? {};
    this.buildManager = dependencies.buildManager ?? new BuildManager(this.gcloud);
    this.serviceManager = dependencies.serviceManager ?? new ServiceManager(this.gcloud);
    this.now = dependencies.now ?? (() => new Date());
    this.generateId = dependencies.generateId ?? uuidv4;
  }

  async deploy(environment: string = DEFAULT_ENVIRONMENT, options: DeployOptions = {}): Promise<PipelineResult> {
    const startedAt = this.now();

    // Step 1: Resolve the environment profile
    const resolved = this.resolve(environment);
    if (!resolved.success) {
      return this.fail('resolve', resolved.error);
    }
    const profile = resolved.value;
    this.observer.resolved?.(profile);

    if (options.dryRun) {
      this.observer.preview?.(profile);
      return { status: 'previewed', profile };
    }

    // Step 2: Confirmation, before anything touches the cloud
    if (!(await confirmDeployment(profile, this.prompt, this.observer))) {
      this.observer.warn?.('Deployment cancelled.');
      return { status: 'cancelled', profile };
    }

    // Step 3: Tooling and credentials
    const preflight = await this.attempt('preflight', 'Checking gcloud CLI and credentials...', 'NOT_AUTHENTICATED', async () => {
      const result = await runPreflight(this.gcloud, this.observer);
      return { value: result, message: `Authenticated as ${result.account}` };
    });
    if (!preflight.success) {
      return this.fail('preflight', preflight.error);
    }

    this.observer.preview?.(profile);

    // Step 4: Build and push the image
    const build = await this.attempt('build', 'Building and pushing Docker image...', 'BUILD_FAILED', async () => {
      const result = await this.buildManager.submit(profile);
      return { value: result, message: `Built ${result.image}` };
    });
    if (!build.success) {
      return this.fail('build', build.error);
    }

    // Step 5: Deploy and read back the service URL
    const image = build.value.image;
    const deployment = await this.attempt('deploy', 'Deploying to Cloud Run...', 'DEPLOY_FAILED', async () => {
      const result = await this.serviceManager.deploy(profile, image);
      return { value: result, message: `Deployed ${result.serviceName} at ${result.serviceUrl}` };
    });
    if (!deployment.success) {
      return this.fail(deployment.error.code === 'DESCRIBE_FAILED' ? 'describe' : 'deploy', deployment.error);
    }

    // Step 6: Post-deployment verification, advisory only
    const serviceEndpoint = deployment.value.serviceUrl;
    const healthStatus = await this.verify(this.healthProber, serviceEndpoint);

    const metadata: DeploymentMetadata = {
      deploymentId: this.generateId(),
      timestamp: startedAt,
      durationMs: this.now().getTime() - startedAt.getTime()
    };

    const outcome: DeploymentOutcome = Object.freeze({
      serviceEndpoint,
      healthStatus,
      profile,
      metadata: Object.freeze(metadata)
    });

    return { status: 'succeeded', outcome };
  }

  /**
   * Look up a deployed service and probe it once
   */
  async status(environment: string = DEFAULT_ENVIRONMENT): Promise<StatusResult> {
    const resolved = this.resolve(environment);
    if (!resolved.success) {
      return { status: 'failed', stage: 'resolve', error: resolved.error };
    }
    const profile = resolved.value;

    const preflight = await this.attempt('preflight', 'Checking gcloud CLI and credentials...', 'NOT_AUTHENTICATED', async () => {
      const result = await runPreflight(this.gcloud, this.observer);
      return { value: result, message: `Authenticated as ${result.account}` };
    });
    if (!preflight.success) {
      return { status: 'failed', stage: 'preflight', error: preflight.error };
    }

    const described = await this.attempt('describe', `Describing ${profile.serviceName}...`, 'DESCRIBE_FAILED', async () => {
      const url = await this.serviceManager.getServiceUrl(profile);
      return { value: url, message: `Found ${profile.serviceName}` };
    });
    if (!described.success) {
      return { status: 'failed', stage: 'describe', error: described.error };
    }

    const healthStatus = await this.verify(this.statusProber, described.value);
    return { status: 'found', service: { profile, serviceEndpoint: described.value, healthStatus } };
  }

  private resolve(environment: string): StageResult<DeploymentProfile> {
    try {
      return { success: true, value: resolveProfile(environment, this.settings) };
    } catch (error) {
      return { success: false, error: toDeploymentError(error, 'INVALID_ENVIRONMENT') };
    }
  }

  private async verify(prober: HealthProber, endpoint: string): Promise<HealthStatus> {
    this.observer.stageStarted?.('verify', 'Testing health endpoint...');
    const health = await prober.verify(endpoint);

    if (health.status === 'Healthy') {
      this.observer.stageSucceeded?.('verify', 'Health check passed!');
    } else if (health.status === 'RespondingButUnhealthy') {
      this.observer.stageSucceeded?.('verify', 'Service is responding!');
    } else {
      this.observer.warn?.('Warning: Health check failed - service may still be starting');
    }

    return health.status;
  }

  private async attempt<T>(
    stage: PipelineStage,
    startMessage: string,
    fallbackCode: DeploymentError['code'],
    run: () => Promise<{ value: T; message: string }>
  ): Promise<StageResult<T>> {
    this.observer.stageStarted?.(stage, startMessage);
    try {
      const { value, message } = await run();
      this.observer.stageSucceeded?.(stage, message);
      return { success: true, value };
    } catch (error) {
      const deploymentError = toDeploymentError(error, fallbackCode);
      this.observer.stageFailed?.(stage, deploymentError);
      return { success: false, error: deploymentError };
    }
  }

  private fail(stage: PipelineStage, error: DeploymentError): PipelineResult {
    return { status: 'failed', stage, error };
  }
}

/**
 * Exit status for a pipeline result: only failures are non-zero
 */
export function exitCodeFor(result: PipelineResult | StatusResult): number {
  return result.status === 'failed' ? 1 : 0;
}

/**
 * Wire an orchestrator to the real gcloud CLI, terminal and network
 */
export function createOrchestrator(
  settings: RuntimeSettings,
  options: { observer?: PipelineObserver; onOutput?: (chunk: string) => void } = {}
): DeploymentOrchestrator {
  const gcloud = new GcloudCli(new ProcessCommandRunner(), { onOutput: options.onOutput });
  return new DeploymentOrchestrator(settings, {
    gcloud,
    prompt: new ReadlinePrompt(),
    healthProber: new HealthProber(),
    statusProber: new HealthProber(new FetchProber(), { backoff: { maxAttempts: 1, initialDelayMs: 0 } }),
    observer: options.observer
  });
}
