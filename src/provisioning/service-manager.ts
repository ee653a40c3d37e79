import { DeploymentProfile, PipelineError } from '../types/index.js';
import { serviceEnvironmentVariables } from '../config/profiles.js';
import { GcloudCli, summarizeFailure } from './gcloud-cli.js';
import { ServiceDeployResult } from './types.js';

/**
 * Deploys images to Cloud Run and looks up the resulting service URL.
 */
export class ServiceManager {
  constructor(private readonly gcloud: GcloudCli) {}

  /**
   * Deploy the image with the profile's sizing, then read the URL back with a
   * separate describe call. The deploy output is never parsed for the URL.
   * @throws PipelineError with code DEPLOY_FAILED or DESCRIBE_FAILED
   */
  async deploy(profile: DeploymentProfile, image: string): Promise<ServiceDeployResult> {
    const result = await this.gcloud.deployService({
      serviceName: profile.serviceName,
      image,
      projectId: profile.projectId,
      region: profile.region,
      memoryLimit: profile.resources.memoryLimit,
      cpuCount: profile.resources.cpuCount,
      timeoutSeconds: profile.requestTimeoutSeconds,
      minInstances: profile.scalingBounds.minInstances,
      maxInstances: profile.scalingBounds.maxInstances,
      environmentVariables: serviceEnvironmentVariables(profile)
    });

    if (!result.ok) {
      throw new PipelineError('DEPLOY_FAILED', `Failed to deploy service ${profile.serviceName} (${summarizeFailure(result)})`, {
        details: result,
        remediation: `Check the revisions of ${profile.serviceName} in region ${profile.region}; Cloud Run keeps serving the previous revision`
      });
    }

    const serviceUrl = await this.getServiceUrl(profile);
    return { serviceName: profile.serviceName, serviceUrl };
  }

  /**
   * @throws PipelineError with code DESCRIBE_FAILED when the service cannot be described or has no URL
   */
  async getServiceUrl(profile: DeploymentProfile): Promise<string> {
    const result = await this.gcloud.describeServiceUrl({
      serviceName: profile.serviceName,
      projectId: profile.projectId,
      region: profile.region
    });

    if (!result.ok) {
      throw new PipelineError('DESCRIBE_FAILED', `Failed to describe service ${profile.serviceName} (${summarizeFailure(result)})`, {
        details: result
      });
    }

    const serviceUrl = result.stdout.trim();
    if (!serviceUrl) {
      throw new PipelineError('DESCRIBE_FAILED', `Service ${profile.serviceName} has no URL yet`, {
        details: result
      });
    }

    return serviceUrl;
  }
}
