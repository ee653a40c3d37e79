import { PipelineError } from '../types/index.js';
import { GcloudCli } from '../provisioning/gcloud-cli.js';
import { PipelineObserver } from './types.js';

export const INSTALL_URL = 'https://cloud.google.com/sdk/docs/install';

export interface PreflightResult {
  account: string;
  /** True when an interactive login ran */
  loggedIn: boolean;
}

/**
 * Verify the gcloud CLI is installed and a credential is active, running the
 * interactive login once when none is.
 * @throws PipelineError with code TOOL_NOT_FOUND or NOT_AUTHENTICATED
 */
export async function runPreflight(gcloud: GcloudCli, observer: PipelineObserver = {}): Promise<PreflightResult> {
  if (!(await gcloud.isInstalled())) {
    throw new PipelineError('TOOL_NOT_FOUND', `${gcloud.binaryName} CLI is not installed.`, {
      remediation: `Visit: ${INSTALL_URL}`
    });
  }

  const account = await gcloud.activeAccount();
  if (account) {
    return { account, loggedIn: false };
  }

  observer.warn?.(`Not authenticated. Running ${gcloud.binaryName} auth login...`);
  await gcloud.login();

  const afterLogin = await gcloud.activeAccount();
  if (!afterLogin) {
    throw new PipelineError('NOT_AUTHENTICATED', 'No active credential after login.', {
      remediation: `Run '${gcloud.binaryName} auth login' and try again`
    });
  }

  return { account: afterLogin, loggedIn: true };
}
