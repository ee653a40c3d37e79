import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { PipelineError, RuntimeSettings } from './types/index.js';
import { SettingsFile } from './config/types.js';
import { loadRuntimeSettings } from './config/loader.js';
import { DEFAULT_ENVIRONMENT } from './config/profiles.js';
import { createOrchestrator, DeploymentOrchestrator, exitCodeFor } from './orchestration/deployment-orchestrator.js';
import { PipelineObserver } from './orchestration/types.js';
import { Reporter } from './reporting/reporter.js';
import { ConsoleObserver } from './reporting/console-observer.js';

export interface ProgramDependencies {
  loadSettings?: (path: string | undefined, overrides: SettingsFile) => Promise<RuntimeSettings>;
  createOrchestrator?: (
    settings: RuntimeSettings,
    options: { observer: PipelineObserver; onOutput?: (chunk: string) => void }
  ) => DeploymentOrchestrator;
  reporter?: Reporter;
  /** Used by the console observer; tests pass a silent one */
  createObserver?: (reporter: Reporter, verbose: boolean) => PipelineObserver;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

interface DeployCommandOptions {
  config?: string;
  source?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

interface StatusCommandOptions {
  config?: string;
  verbose?: boolean;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Fall through when running from an unusual layout
  }
  return '0.0.0';
}

/**
 * Build the command-line program. Exit codes are reported through
 * `setExitCode` rather than by exiting, so the program can run in tests.
 */
export function createProgram(dependencies: ProgramDependencies = {}): Command {
  const loadSettings = dependencies.loadSettings ?? loadRuntimeSettings;
  const buildOrchestrator = dependencies.createOrchestrator ?? createOrchestrator;
  const reporter = dependencies.reporter ?? new Reporter();
  const createObserver =
    dependencies.createObserver ??
    ((r: Reporter, verbose: boolean) => new ConsoleObserver(r, { spinners: !verbose }));
  const stdout = dependencies.stdout ?? ((line: string) => console.log(line));
  const stderr = dependencies.stderr ?? ((line: string) => console.error(line));
  const setExitCode = dependencies.setExitCode ?? ((code: number) => { process.exitCode = code; });

  const fail = (error: unknown, verbose: boolean | undefined): void => {
    if (error instanceof PipelineError) {
      reporter.renderError(error.toDeploymentError(), verbose).forEach(stderr);
      setExitCode(1);
      return;
    }
    stderr(`${chalk.red('❌ Error:')} ${error instanceof Error ? error.message : String(error)}`);
    if (verbose) {
      stderr(String(error instanceof Error && error.stack ? error.stack : error));
    }
    setExitCode(1);
  };

  const program = new Command();

  program
    .name('cloudrun-deploy')
    .description('Build a container image and deploy it to Cloud Run')
    .version(readVersion());

  program
    .command('deploy', { isDefault: true })
    .description('Build, deploy and verify a service (default command)')
    .argument('[environment]', 'Target environment (staging|production)', DEFAULT_ENVIRONMENT)
    .option('-c, --config <path>', 'Path to a settings file (YAML or JSON)')
    .option('-s, --source <dir>', 'Build context directory')
    .option('-v, --verbose', 'Stream gcloud output and print error details')
    .option('--dry-run', 'Show the resolved configuration without deploying')
    .action(async (environment: string, options: DeployCommandOptions) => {
      try {
        const settings = await loadSettings(options.config, { sourceDir: options.source });
        const orchestrator = buildOrchestrator(settings, {
          observer: createObserver(reporter, options.verbose === true),
          onOutput: options.verbose ? (chunk: string) => process.stdout.write(chunk) : undefined
        });

        const result = await orchestrator.deploy(environment, { dryRun: options.dryRun });

        switch (result.status) {
          case 'succeeded':
            reporter.renderSummary(result.outcome).forEach(stdout);
            stdout(chalk.gray(`\n⏱️  Deployment took ${result.outcome.metadata.durationMs}ms`));
            stdout(chalk.gray(`🆔 Deployment ID: ${result.outcome.metadata.deploymentId}`));
            break;
          case 'previewed':
            stdout(chalk.green('Dry run completed - no changes made'));
            break;
          case 'cancelled':
            break;
          case 'failed':
            reporter.renderError(result.error, options.verbose).forEach(stderr);
            break;
        }

        setExitCode(exitCodeFor(result));
      } catch (error) {
        fail(error, options.verbose);
      }
    });

  program
    .command('status')
    .description('Show the URL and health of a deployed service')
    .argument('[environment]', 'Target environment (staging|production)', DEFAULT_ENVIRONMENT)
    .option('-c, --config <path>', 'Path to a settings file (YAML or JSON)')
    .option('-v, --verbose', 'Print error details')
    .action(async (environment: string, options: StatusCommandOptions) => {
      try {
        const settings = await loadSettings(options.config, {});
        const orchestrator = buildOrchestrator(settings, {
          observer: createObserver(reporter, options.verbose === true)
        });

        const result = await orchestrator.status(environment);
        if (result.status === 'found') {
          reporter.renderStatus(result.service).forEach(stdout);
        } else {
          reporter.renderError(result.error, options.verbose).forEach(stderr);
        }

        setExitCode(exitCodeFor(result));
      } catch (error) {
        fail(error, options.verbose);
      }
    });

  return program;
}
