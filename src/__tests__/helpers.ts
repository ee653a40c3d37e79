import { vi } from 'vitest';
import { GcloudCli } from '../provisioning/gcloud-cli.js';
import { CommandResult, CommandRunner, HttpProber, RunOptions } from '../provisioning/types.js';
import { HealthProber } from '../provisioning/health-prober.js';
import { DEFAULT_SETTINGS } from '../config/loader.js';
import { RuntimeSettings } from '../types/index.js';
import { Prompt } from '../orchestration/types.js';

export const TEST_SETTINGS: RuntimeSettings = DEFAULT_SETTINGS;

export const SERVICE_URL = 'https://merchant-onboarding-api-abc123-uc.a.run.app';

export interface FakeGcloudOptions {
  installed?: boolean;
  /** Output of successive `auth list` calls; the last one repeats */
  accounts?: string[];
  buildOk?: boolean;
  deployOk?: boolean;
  describeOk?: boolean;
  serviceUrl?: string;
}

export type GcloudOperation = 'version' | 'auth-list' | 'auth-login' | 'build' | 'deploy' | 'describe' | 'other';

export function classify(args: readonly string[]): GcloudOperation {
  const joined = args.join(' ');
  if (joined === '--version') return 'version';
  if (joined.startsWith('auth list')) return 'auth-list';
  if (joined === 'auth login') return 'auth-login';
  if (joined.startsWith('builds submit')) return 'build';
  if (joined.startsWith('run deploy')) return 'deploy';
  if (joined.startsWith('run services describe')) return 'describe';
  return 'other';
}

function result(ok: boolean, stdout = '', stderr = ''): CommandResult {
  return { ok, exitCode: ok ? 0 : 1, stdout, stderr };
}

/**
 * In-memory stand-in for the gcloud binary
 */
export function createFakeGcloud(options: FakeGcloudOptions = {}) {
  const accounts = [...(options.accounts ?? ['operator@example.com'])];

  const run = vi.fn(async (_command: string, args: readonly string[], _runOptions?: RunOptions): Promise<CommandResult> => {
    switch (classify(args)) {
      case 'version':
        return options.installed === false ? result(false, '', 'command not found') : result(true, 'Google Cloud SDK 480.0.0');
      case 'auth-list': {
        const account = accounts.length > 1 ? accounts.shift() : accounts[0];
        return result(true, account ? `${account}\n` : '');
      }
      case 'auth-login':
        return result(true);
      case 'build':
        return options.buildOk === false ? result(false, '', 'ERROR: build step 0 failed') : result(true, 'DONE');
      case 'deploy':
        return options.deployOk === false ? result(false, '', 'ERROR: (gcloud.run.deploy) Revision failed') : result(true);
      case 'describe':
        return options.describeOk === false
          ? result(false, '', 'ERROR: Cannot find service')
          : result(true, `${options.serviceUrl ?? SERVICE_URL}\n`);
      default:
        return result(false, '', 'unexpected command');
    }
  });

  const runner: CommandRunner = { run };
  const gcloud = new GcloudCli(runner);

  const callsTo = (operation: GcloudOperation): number =>
    run.mock.calls.filter(call => classify(call[1]) === operation).length;

  return { run, runner, gcloud, callsTo };
}

/**
 * Prober answering per path; paths not listed fail
 */
export function createFakeProber(answers: { health?: boolean; root?: boolean } = {}) {
  const probe = vi.fn(async (url: string): Promise<boolean> => {
    if (url.endsWith('/health')) return answers.health ?? false;
    return answers.root ?? false;
  });
  const prober: HttpProber = { probe };
  return { probe, prober };
}

export function createHealthProber(prober: HttpProber, maxAttempts = 2): HealthProber {
  return new HealthProber(prober, {
    backoff: { maxAttempts },
    sleep: async () => undefined
  });
}

export function createScriptedPrompt(answer: string) {
  const ask = vi.fn(async (_question: string): Promise<string> => answer);
  const prompt: Prompt = { ask };
  return { ask, prompt };
}
