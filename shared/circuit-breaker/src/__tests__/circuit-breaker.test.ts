import { describe, it, expect } from "vitest";
import { CircuitBreaker, CircuitOpenError } from "../circuit-breaker.js";

class Overloaded extends Error {}

function setup(threshold = 2) {
  let clock = 0;
  const breaker = new CircuitBreaker({
    name: "test",
    failureThreshold: threshold,
    resetTimeoutMs: 1_000,
    isTransient: (err) => err instanceof Overloaded,
    now: () => clock,
  });
  return {
    breaker,
    advance(ms: number) {
      clock += ms;
    },
  };
}

const fail = (err: Error) => () => Promise.reject(err);

describe("CircuitBreaker", () => {
  it("passes results through while closed", async () => {
    const { breaker } = setup();
    await expect(breaker.execute(async () => 42)).resolves.toBe(42);
    expect(breaker.getState()).toBe("closed");
  });

  it("opens after consecutive failures and rejects without calling", async () => {
    const { breaker } = setup();
    await expect(breaker.execute(fail(new Error("boom")))).rejects.toThrow("boom");
    await expect(breaker.execute(fail(new Error("boom")))).rejects.toThrow("boom");
    expect(breaker.getState()).toBe("open");

    let called = false;
    await expect(
      breaker.execute(async () => {
        called = true;
      })
    ).rejects.toBeInstanceOf(CircuitOpenError);
    expect(called).toBe(false);
  });

  it("does not count transient errors", async () => {
    const { breaker } = setup();
    for (let i = 0; i < 5; i++) {
      await expect(breaker.execute(fail(new Overloaded("busy")))).rejects.toThrow("busy");
    }
    expect(breaker.getState()).toBe("closed");
  });

  it("resets the count after a success", async () => {
    const { breaker } = setup();
    await expect(breaker.execute(fail(new Error("boom")))).rejects.toThrow();
    await breaker.execute(async () => "ok");
    await expect(breaker.execute(fail(new Error("boom")))).rejects.toThrow();
    expect(breaker.getState()).toBe("closed");
  });

  it("probes after the reset timeout and closes on success", async () => {
    const { breaker, advance } = setup(1);
    await expect(breaker.execute(fail(new Error("boom")))).rejects.toThrow();
    advance(999);
    expect(breaker.getState()).toBe("open");
    advance(1);
    expect(breaker.getState()).toBe("half-open");
    await expect(breaker.execute(async () => "ok")).resolves.toBe("ok");
    expect(breaker.getState()).toBe("closed");
  });

  it("reopens when the probe fails", async () => {
    const { breaker, advance } = setup(3);
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail(new Error("boom")))).rejects.toThrow();
    }
    advance(1_000);
    await expect(breaker.execute(fail(new Error("still down")))).rejects.toThrow("still down");
    expect(breaker.getState()).toBe("open");
  });

  it("names the breaker in the open error", () => {
    expect(new CircuitOpenError("claude").message).toBe('Circuit breaker "claude" is open, request rejected');
  });
});
