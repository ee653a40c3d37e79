import { DeploymentProfile, PipelineError } from '../types/index.js';
import { createNamingService } from '../config/naming.js';
import { GcloudCli, summarizeFailure } from './gcloud-cli.js';
import { BuildResult } from './types.js';

/**
 * Submits the local build context to Cloud Build.
 */
export class BuildManager {
  constructor(private readonly gcloud: GcloudCli) {}

  /**
   * Build and push `<imageReference>:latest`
   * @throws PipelineError with code BUILD_FAILED when the build backend reports failure
   */
  async submit(profile: DeploymentProfile): Promise<BuildResult> {
    const image = createNamingService().tagImage(profile.imageReference);

    const result = await this.gcloud.submitBuild({
      image,
      projectId: profile.projectId,
      sourceDir: profile.sourceDir
    });

    if (!result.ok) {
      throw new PipelineError('BUILD_FAILED', `Failed to build image ${image} (${summarizeFailure(result)})`, {
        details: result,
        remediation: `Check the Cloud Build history of project ${profile.projectId} for the build log`
      });
    }

    return { image };
  }
}
