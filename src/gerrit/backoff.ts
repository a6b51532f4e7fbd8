import { setTimeout as sleep } from "node:timers/promises";

export interface BackoffConfig {
  /** Delay before the first retry. */
  initialDelayMs: number;
  /** Growth factor between consecutive delays. */
  multiplier: number;
  /** Upper bound on the un-jittered delay. */
  maxDelayMs: number;
  /** 0-1; each delay is spread by up to this fraction either way. */
  randomizationFactor: number;
  /** Infinity unless a bounded policy is explicitly configured. */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  initialDelayMs: 500,
  multiplier: 1.5,
  maxDelayMs: 60_000,
  randomizationFactor: 0.5,
  maxAttempts: Infinity,
};

export class ReconnectExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`gave up after ${attempts} attempts: ${String(lastError)}`);
    this.name = "ReconnectExhaustedError";
  }
}

export type RetryNotify = (error: unknown, attempt: number, delayMs: number) => void;

export interface ReconnectPolicyDeps {
  sleep?: (ms: number) => Promise<unknown>;
  random?: () => number;
}

/**
 * Exponential backoff with jitter, used to rebuild dropped SSH sessions.
 * Holds no per-run state; sessions may share one policy.
 */
export class ReconnectPolicy {
  readonly config: BackoffConfig;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly random: () => number;

  constructor(config: Partial<BackoffConfig> = {}, deps: ReconnectPolicyDeps = {}) {
    this.config = { ...DEFAULT_BACKOFF, ...config };
    this.sleep = deps.sleep ?? ((ms) => sleep(ms));
    this.random = deps.random ?? Math.random;
  }

  /** Delay to wait after the given failed attempt (0-based). */
  delayFor(attempt: number): number {
    const { initialDelayMs, multiplier, maxDelayMs, randomizationFactor } = this.config;
    const capped = Math.min(initialDelayMs * Math.pow(multiplier, attempt), maxDelayMs);
    const jitter = 1 + (this.random() * 2 - 1) * randomizationFactor;
    return Math.round(capped * jitter);
  }

  /**
   * Runs `operation` until it succeeds, sleeping between failures.
   * Throws ReconnectExhaustedError only when maxAttempts is finite.
   */
  async run<T>(operation: () => Promise<T>, notify?: RetryNotify): Promise<T> {
    let attempt = 0;
    while (true) {
      try {
        return await operation();
      } catch (err) {
        attempt++;
        if (attempt >= this.config.maxAttempts) {
          throw new ReconnectExhaustedError(attempt, err);
        }
        const delayMs = this.delayFor(attempt - 1);
        notify?.(err, attempt, delayMs);
        await this.sleep(delayMs);
      }
    }
  }
}
