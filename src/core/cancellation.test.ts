import { describe, expect, it } from "vitest";

import {
  CancellationError,
  cancellationReasonFromAbort,
  resolveCancellation,
} from "./cancellation.js";

function abortedWith(reason?: unknown): AbortSignal {
  const controller = new AbortController();
  controller.abort(reason);
  return controller.signal;
}

describe("cancellationReasonFromAbort", () => {
  it("unwraps a cancellation error reason", () => {
    const signal = abortedWith(new CancellationError({ kind: "timeout", message: "too slow" }));

    expect(cancellationReasonFromAbort(signal)).toEqual({ kind: "timeout", message: "too slow" });
  });

  it("labels string reasons as external", () => {
    expect(cancellationReasonFromAbort(abortedWith("SIGTERM"))).toEqual({
      kind: "external",
      message: "Cancelled (SIGTERM)",
    });
  });

  it("maps timeout errors to the timeout kind", () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";

    expect(cancellationReasonFromAbort(abortedWith(timeout))).toEqual({
      kind: "timeout",
      message: "The operation was aborted due to timeout",
    });
  });

  it("falls back to a generic external reason", () => {
    expect(cancellationReasonFromAbort(abortedWith(42))).toEqual({
      kind: "external",
      message: "Cancelled",
    });
  });
});

describe("resolveCancellation", () => {
  it("recognizes thrown cancellation errors even without an abort", () => {
    const error = new CancellationError({ kind: "self_preservation", message: "veto" });

    expect(resolveCancellation(error, new AbortController().signal)).toEqual({
      kind: "self_preservation",
      message: "veto",
    });
  });

  it("treats an AbortError after abort as a requested stop", () => {
    const signal = abortedWith("SIGINT");
    const abortError = new Error("This operation was aborted");
    abortError.name = "AbortError";

    expect(resolveCancellation(abortError, signal)).toEqual({
      kind: "external",
      message: "Cancelled (SIGINT)",
    });
  });

  it("keeps ordinary errors as failures", () => {
    expect(resolveCancellation(new Error("boom"), abortedWith("SIGINT"))).toBeNull();
    expect(resolveCancellation(new Error("boom"), new AbortController().signal)).toBeNull();
  });
});
