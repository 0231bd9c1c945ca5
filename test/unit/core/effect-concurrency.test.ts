import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  EffectInterruptedError,
  interruptibleSleep,
  runEffectPromise,
  withTimeout,
} from "../../../src/core/effect-concurrency.js";

class TimedOut extends Error {
  constructor() {
    super("timed out");
    this.name = "TimedOut";
  }
}

describe("runEffectPromise", () => {
  it("resolves with the effect's value", async () => {
    await expect(runEffectPromise(Effect.succeed(42))).resolves.toBe(42);
  });

  it("rejects with the typed failure", async () => {
    const err = new Error("boom");
    await expect(runEffectPromise(Effect.fail(err))).rejects.toBe(err);
  });

  it("rejects with EffectInterruptedError on abort", async () => {
    const controller = new AbortController();
    const pending = runEffectPromise(Effect.never, { signal: controller.signal });
    controller.abort("stop");

    await expect(pending).rejects.toBeInstanceOf(EffectInterruptedError);
    await expect(pending).rejects.toThrow("Effect execution interrupted: stop");
  });
});

describe("interruptibleSleep", () => {
  it("returns true after the full interval", async () => {
    await expect(interruptibleSleep(1)).resolves.toBe(true);
  });

  it("returns false at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(interruptibleSleep(60_000, controller.signal)).resolves.toBe(false);
  });

  it("wakes early when aborted mid-sleep", async () => {
    const controller = new AbortController();
    const sleeping = interruptibleSleep(60_000, controller.signal);
    setTimeout(() => controller.abort(), 5);
    await expect(sleeping).resolves.toBe(false);
  });
});

describe("withTimeout", () => {
  it("passes through an effect that finishes in time", async () => {
    await expect(runEffectPromise(withTimeout(Effect.succeed("ok"), 1000, () => new TimedOut()))).resolves.toBe("ok");
  });

  it("fails with the timeout error", async () => {
    await expect(runEffectPromise(withTimeout(Effect.never, 5, () => new TimedOut()))).rejects.toBeInstanceOf(
      TimedOut,
    );
  });
});
