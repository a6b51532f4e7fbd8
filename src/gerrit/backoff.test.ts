import { describe, it, expect } from "vitest";
import { ReconnectPolicy, ReconnectExhaustedError, DEFAULT_BACKOFF } from "./backoff";

function noJitter(config = {}) {
  const sleeps: number[] = [];
  const policy = new ReconnectPolicy(config, {
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0.5,
  });
  return { policy, sleeps };
}

describe("ReconnectPolicy", () => {
  it("defaults to retrying forever", () => {
    expect(DEFAULT_BACKOFF.maxAttempts).toBe(Infinity);
    expect(new ReconnectPolicy().config.maxAttempts).toBe(Infinity);
  });

  it("grows delays exponentially up to the cap", () => {
    const { policy } = noJitter({ initialDelayMs: 100, multiplier: 2, maxDelayMs: 500 });
    expect([0, 1, 2, 3, 4].map((a) => policy.delayFor(a))).toEqual([100, 200, 400, 500, 500]);
  });

  it("spreads delays by the randomization factor", () => {
    const low = new ReconnectPolicy({ initialDelayMs: 1000, randomizationFactor: 0.5 }, { random: () => 0 });
    const high = new ReconnectPolicy({ initialDelayMs: 1000, randomizationFactor: 0.5 }, { random: () => 1 });
    expect(low.delayFor(0)).toBe(500);
    expect(high.delayFor(0)).toBe(1500);
  });

  it("retries until the operation succeeds, notifying each failure", async () => {
    const { policy, sleeps } = noJitter({ initialDelayMs: 500, multiplier: 1.5 });
    const notified: number[] = [];
    let calls = 0;

    const result = await policy.run(
      async () => {
        calls++;
        if (calls < 4) throw new Error(`down ${calls}`);
        return "up";
      },
      (_err, attempt) => notified.push(attempt),
    );

    expect(result).toBe("up");
    expect(calls).toBe(4);
    expect(notified).toEqual([1, 2, 3]);
    expect(sleeps).toEqual([500, 750, 1125]);
  });

  it("gives up only when a finite attempt limit is configured", async () => {
    const { policy } = noJitter({ maxAttempts: 2 });
    const err = await policy
      .run(async () => {
        throw new Error("refused");
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReconnectExhaustedError);
    expect(err).toMatchObject({ attempts: 2, message: "gave up after 2 attempts: Error: refused" });
  });
});
