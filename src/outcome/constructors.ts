import type { Done, Fail, Outcome, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure, isFailureCarrier } from "./failure";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Run `fn`, capturing a thrown library error as a Fail outcome.
 * Values thrown by anything else become an internal-error failure.
 */
export function attempt<A>(fn: () => A, meta: OutcomeMeta = {}): Outcome<A> {
  const started = Date.now();
  try {
    const value = fn();
    return done(value, { ...meta, durationMs: Date.now() - started });
  } catch (e) {
    const finalMeta = { ...meta, durationMs: Date.now() - started };
    if (isFailureCarrier(e)) {
      return fail(e.failure, finalMeta);
    }
    const message = e instanceof Error ? e.message : String(e);
    return fail(failure("internal-error", message, { context: { thrown: e } }), finalMeta);
  }
}
