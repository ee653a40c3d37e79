import { HealthCheckResult, HttpProber } from './types.js';

export const HEALTH_PATH = '/health';
export const ROOT_PATH = '/';

export interface BackoffPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  factor: 2,
  maxDelayMs: 8000
};

export interface HealthProberOptions {
  backoff?: Partial<BackoffPolicy>;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Probes with the global fetch. Redirects are reported, not followed, and any
 * status below 400 counts as an answer.
 */
export class FetchProber implements HttpProber {
  constructor(private readonly timeoutMs: number = 5000) {}

  async probe(url: string): Promise<boolean> {
    try {
      const response = await fetch(url, {
        method: 'GET',
        redirect: 'manual',
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      await response.body?.cancel();
      return response.status > 0 && response.status < 400;
    } catch {
      // Connection refused, DNS failure or timeout: the service did not answer
      return false;
    }
  }
}

export function joinEndpoint(endpoint: string, path: string): string {
  return `${endpoint.replace(/\/+$/, '')}${path}`;
}

/**
 * Delay before the given attempt (1-based). The first attempt waits too, so a
 * freshly deployed revision gets a moment to start.
 */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Polls a deployed service until it answers or the attempts run out.
 *
 * Each attempt tries the health path first and then the service root. A
 * health answer means Healthy; a root-only answer means the service is up
 * but reports no health, so polling stops with RespondingButUnhealthy.
 * Exhausting every attempt yields Unknown. Never throws.
 */
export class HealthProber {
  private readonly policy: BackoffPolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly prober: HttpProber = new FetchProber(), options: HealthProberOptions = {}) {
    this.policy = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.sleep = options.sleep ?? defaultSleep;
  }

  async verify(endpoint: string): Promise<HealthCheckResult> {
    const healthUrl = joinEndpoint(endpoint, HEALTH_PATH);
    const rootUrl = joinEndpoint(endpoint, ROOT_PATH);

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      await this.sleep(backoffDelay(this.policy, attempt));

      if (await this.prober.probe(healthUrl)) {
        return { status: 'Healthy', attempts: attempt, respondingUrl: healthUrl };
      }
      if (await this.prober.probe(rootUrl)) {
        return { status: 'RespondingButUnhealthy', attempts: attempt, respondingUrl: rootUrl };
      }
    }

    return { status: 'Unknown', attempts: this.policy.maxAttempts };
  }
}
