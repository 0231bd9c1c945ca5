import { Cause, Effect, Exit, Option } from "effect";

export interface RunEffectPromiseOptions {
  signal?: AbortSignal;
}

export class EffectInterruptedError extends Error {
  readonly reason: unknown;

  constructor(reason?: unknown) {
    const detail =
      reason !== undefined && reason !== null
        ? `: ${reason instanceof Error ? reason.message : String(reason)}`
        : "";
    super(`Effect execution interrupted${detail}`);
    this.name = "EffectInterruptedError";
    this.reason = reason;
  }
}

export function runEffectPromise<A, E>(
  effect: Effect.Effect<A, E, never>,
  options?: RunEffectPromiseOptions,
): Promise<A> {
  return Effect.runPromiseExit(effect, { signal: options?.signal }).then((exit) => {
    if (Exit.isSuccess(exit)) {
      return exit.value;
    }

    const failure = Cause.failureOption(exit.cause);
    if (Option.isSome(failure)) {
      throw failure.value;
    }
    if (Cause.isInterrupted(exit.cause)) {
      throw new EffectInterruptedError(options?.signal?.reason);
    }
    throw Cause.squash(exit.cause);
  });
}

export function sleep(ms: number): Effect.Effect<void> {
  return Effect.sleep(ms);
}

/**
 * Sleep for `ms`, resolving early (with `false`) when `signal` aborts.
 * Resolves `true` when the full interval elapsed.
 */
export async function interruptibleSleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await runEffectPromise(sleep(ms), { signal });
    return true;
  } catch (err) {
    if (err instanceof EffectInterruptedError) return false;
    throw err;
  }
}

export function withTimeout<A, E, ETimeout>(
  effect: Effect.Effect<A, E, never>,
  timeoutMs: number,
  onTimeout: () => ETimeout,
): Effect.Effect<A, E | ETimeout, never> {
  return effect.pipe(
    Effect.timeoutFail({
      duration: timeoutMs,
      onTimeout,
    }),
  );
}
