/**
 * Polling wait.
 *
 * Repeats a check at a fixed interval until it yields a value, the deadline
 * passes or the caller aborts. Outcomes are values; `unwrapWait` turns the
 * non-ready ones into errors for callers that cannot continue without the
 * value.
 */

import { WaitAbortedError, WaitTimeoutError } from "../errors.js";

export type WaitOptions = {
  intervalMs: number;
  /** No deadline when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called after every check that did not produce a value. */
  onPending?: (attempt: number, elapsedMs: number) => void;
};

export type WaitOutcome<T> =
  | { status: "ready"; value: T; attempts: number; elapsedMs: number }
  | { status: "timed-out"; attempts: number; elapsedMs: number }
  | { status: "aborted"; attempts: number; elapsedMs: number };

/** Check result meaning "not yet". */
export type Pending = undefined;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener("abort", finish, { once: true });
  });
}

export async function waitFor<T>(check: () => Promise<T | Pending>, options: WaitOptions): Promise<WaitOutcome<T>> {
  const started = Date.now();
  const elapsed = () => Date.now() - started;
  let attempts = 0;

  for (;;) {
    if (options.signal?.aborted) return { status: "aborted", attempts, elapsedMs: elapsed() };

    attempts += 1;
    const value = await check();
    if (value !== undefined) return { status: "ready", value, attempts, elapsedMs: elapsed() };

    const elapsedMs = elapsed();
    options.onPending?.(attempts, elapsedMs);

    let delay = options.intervalMs;
    if (options.timeoutMs !== undefined) {
      const remaining = options.timeoutMs - elapsedMs;
      if (remaining <= 0) return { status: "timed-out", attempts, elapsedMs };
      delay = Math.min(delay, remaining);
    }
    await sleep(delay, options.signal);
  }
}

/** Boolean-check convenience: ready once the check returns true. */
export function waitUntil(check: () => Promise<boolean>, options: WaitOptions): Promise<WaitOutcome<true>> {
  return waitFor(async () => ((await check()) ? true : undefined), options);
}

export function unwrapWait<T>(outcome: WaitOutcome<T>, what: string): T {
  switch (outcome.status) {
    case "ready":
      return outcome.value;
    case "timed-out":
      throw new WaitTimeoutError(what, outcome.elapsedMs);
    case "aborted":
      throw new WaitAbortedError(what);
  }
}
