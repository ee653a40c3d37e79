import chalk, { ChalkInstance } from 'chalk';
import ora, { Ora } from 'ora';
import { DeploymentError, DeploymentProfile } from '../types/index.js';
import { PipelineObserver, PipelineStage } from '../orchestration/types.js';
import { Reporter } from './reporter.js';

export interface ConsoleObserverOptions {
  /** Plain lines instead of spinners, for verbose runs that stream tool output */
  spinners?: boolean;
  print?: (line: string) => void;
  colors?: ChalkInstance;
}

/**
 * Prints pipeline progress: an ora spinner per running stage, colored lines
 * for everything else.
 */
export class ConsoleObserver implements PipelineObserver {
  private spinner: Ora | undefined;
  private readonly spinners: boolean;
  private readonly print: (line: string) => void;
  private readonly colors: ChalkInstance;

  constructor(private readonly reporter: Reporter, options: ConsoleObserverOptions = {}) {
    this.spinners = options.spinners ?? true;
    this.print = options.print ?? ((line: string) => console.log(line));
    this.colors = options.colors ?? chalk;
  }

  resolved(profile: DeploymentProfile): void {
    this.reporter.renderHeader(profile.environmentName).forEach(this.print);
  }

  stageStarted(_stage: PipelineStage, message: string): void {
    if (this.spinners) {
      this.spinner = ora(message).start();
    } else {
      this.print(this.colors.yellow(message));
    }
  }

  stageSucceeded(_stage: PipelineStage, message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = undefined;
    } else {
      this.print(this.colors.green(message));
    }
  }

  stageFailed(stage: PipelineStage, error: DeploymentError): void {
    const message = `${stage} failed: ${error.code}`;
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = undefined;
    } else {
      this.print(this.colors.red(message));
    }
  }

  warn(message: string): void {
    // Stops a running spinner so interactive output that follows stays readable
    if (this.spinner) {
      this.spinner.warn(message);
      this.spinner = undefined;
    } else {
      this.print(this.colors.yellow(message));
    }
  }

  caution(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = undefined;
    }
    this.print(this.colors.red(message));
  }

  preview(profile: DeploymentProfile): void {
    this.reporter.renderPreview(profile).forEach(this.print);
  }
}
