import chalk, { ChalkInstance } from 'chalk';
import { categorizeError, DeploymentError, DeploymentOutcome, DeploymentProfile } from '../types/index.js';
import { ServiceStatus } from '../orchestration/types.js';

/**
 * Variables the service reads at runtime that this tool never sets. They are
 * listed after every deployment as a reminder only.
 */
export const OPERATOR_MANAGED_SECRETS: readonly string[] = [
  'GCS_CLIENT_EMAIL',
  'GCS_PRIVATE_KEY',
  'GCS_BUCKET_NAME',
  'VERTEX_CLIENT_EMAIL (optional)',
  'VERTEX_PRIVATE_KEY (optional)',
  'DB_DSN (if using database features)'
];

const RULE = '==============================================';

/**
 * Renders the console report. Every method returns lines so the output is
 * deterministic for a given input; printing is left to the caller.
 */
export class Reporter {
  constructor(private readonly colors: ChalkInstance = chalk) {}

  renderHeader(environment: string): string[] {
    return [
      this.colors.blue('=== Cloud Run Deployment ==='),
      this.colors.yellow(`Environment: ${environment}`),
      ''
    ];
  }

  renderPreview(profile: DeploymentProfile): string[] {
    return [
      '',
      this.colors.blue('Deployment Configuration:'),
      `   Environment:    ${profile.environmentName}`,
      `   Service Name:   ${profile.serviceName}`,
      `   Project:        ${profile.projectId}`,
      `   Region:         ${profile.region}`,
      `   Resources:      ${profile.resources.memoryLimit} RAM, ${profile.resources.cpuCount} CPU`,
      `   Scaling:        ${profile.scalingBounds.minInstances}-${profile.scalingBounds.maxInstances} instances`,
      `   Log Level:      ${profile.logVerbosity}`,
      ''
    ];
  }

  renderSummary(outcome: DeploymentOutcome): string[] {
    const { profile } = outcome;
    const body = [
      RULE,
      'Deployment Complete!',
      RULE,
      `Environment:  ${profile.environmentName}`,
      `Service:      ${profile.serviceName}`,
      `URL:          ${outcome.serviceEndpoint}`,
      `Project:      ${profile.projectId}`,
      `Region:       ${profile.region}`,
      `Health:       ${outcome.healthStatus}`,
      RULE
    ];

    return [
      '',
      ...body.map(line => this.colors.green(line)),
      '',
      ...this.renderSecretReminder()
    ];
  }

  renderSecretReminder(): string[] {
    return [
      this.colors.yellow('Note: Make sure environment variables are set in Cloud Run:'),
      ...OPERATOR_MANAGED_SECRETS.map(name => `   - ${name}`)
    ];
  }

  renderStatus(service: ServiceStatus): string[] {
    return [
      this.colors.blue('Service Status:'),
      `   Environment:    ${service.profile.environmentName}`,
      `   Service Name:   ${service.profile.serviceName}`,
      `   URL:            ${service.serviceEndpoint}`,
      `   Health:         ${service.healthStatus}`
    ];
  }

  renderError(error: DeploymentError, verbose: boolean = false): string[] {
    const lines = [`${this.colors.red('❌ Error:')} ${error.message}`];
    if (error.remediation) {
      lines.push(this.colors.yellow(`💡 ${error.remediation}`));
    }
    if (verbose && error.details !== undefined) {
      lines.push(this.colors.gray(`[${categorizeError(error.code)}/${error.code}] ${JSON.stringify(error.details, null, 2)}`));
    }
    return lines;
  }
}
