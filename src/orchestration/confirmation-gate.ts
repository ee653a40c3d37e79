import { createInterface } from 'node:readline';
import { DeploymentProfile } from '../types/index.js';
import { PipelineObserver, Prompt } from './types.js';

export const CONFIRMATION_TOKEN = 'yes';

export const CONFIRMATION_QUESTION = `Type '${CONFIRMATION_TOKEN}' to confirm production deployment: `;

/**
 * Prompt backed by stdin/stdout
 */
export class ReadlinePrompt implements Prompt {
  async ask(question: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await new Promise<string>((resolve) => {
        // A closed stdin counts as an empty answer
        rl.once('close', () => resolve(''));
        rl.question(question, resolve);
      });
    } finally {
      rl.close();
    }
  }
}

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === CONFIRMATION_TOKEN;
}

/**
 * Ask for explicit approval when the profile requires it.
 * @returns true to proceed, false when the operator declined
 */
export async function confirmDeployment(
  profile: DeploymentProfile,
  prompt: Prompt,
  observer: PipelineObserver = {}
): Promise<boolean> {
  if (!profile.requiresConfirmation) {
    return true;
  }

  observer.caution?.(`WARNING: You are about to deploy to ${profile.environmentName.toUpperCase()}!`);
  const answer = await prompt.ask(CONFIRMATION_QUESTION);
  return isAffirmative(answer);
}
