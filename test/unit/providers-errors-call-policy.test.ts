import OpenAI from "openai";
import { describe, expect, it, vi } from "vitest";
import { callWithPolicy, withTimeout } from "../../src/modules/providers/call-policy.js";
import {
  GenerationFailure,
  ProviderTimeoutError,
  StructuredOutputError,
  toGenerationFailure
} from "../../src/modules/providers/errors.js";
import { httpError } from "../helpers/assistant-fakes.js";

const POLICY = { timeoutMs: 20, retryDelayMs: 0 };

async function captureFailure(promise: Promise<unknown>): Promise<GenerationFailure> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GenerationFailure) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the call to fail");
}

describe("modules/providers/errors", () => {
  it("returns existing generation failures unchanged", () => {
    const failure = new GenerationFailure("quota", "quota exceeded");
    expect(toGenerationFailure(failure)).toBe(failure);
  });

  it("maps timeouts to non-retryable transient failures", () => {
    const fromTimeout = toGenerationFailure(new ProviderTimeoutError("generation", 50));
    expect(fromTimeout.kind).toBe("transient");
    expect(fromTimeout.retryable).toBe(false);
    expect(fromTimeout.message).toBe("generation timed out after 50ms");

    const fromSdkTimeout = toGenerationFailure(new OpenAI.APIConnectionTimeoutError());
    expect(fromSdkTimeout.kind).toBe("transient");
    expect(fromSdkTimeout.retryable).toBe(false);
  });

  it("marks connection errors and 5xx responses as retryable", () => {
    const connection = toGenerationFailure(new OpenAI.APIConnectionError({ message: "socket hang up" }));
    expect(connection.kind).toBe("transient");
    expect(connection.retryable).toBe(true);

    const serverError = toGenerationFailure(httpError(503));
    expect(serverError.kind).toBe("transient");
    expect(serverError.retryable).toBe(true);
  });

  it.each([401, 403, 404])("maps status %i to auth", (status) => {
    expect(toGenerationFailure(httpError(status)).kind).toBe("auth");
  });

  it("maps rate limits and quota codes to quota", () => {
    expect(toGenerationFailure(httpError(429)).kind).toBe("quota");
    expect(toGenerationFailure(Object.assign(httpError(400), { code: "insufficient_quota" })).kind).toBe("quota");
  });

  it("maps bad requests, refusal codes and invalid structured output to refused", () => {
    expect(toGenerationFailure(httpError(400)).kind).toBe("refused");
    expect(toGenerationFailure(Object.assign(new Error("blocked"), { code: "content_policy_violation" })).kind).toBe(
      "refused"
    );
    expect(toGenerationFailure(new StructuredOutputError("bad json")).kind).toBe("refused");
  });

  it("treats anything else as a non-retryable transient failure", () => {
    const failure = toGenerationFailure(new Error("boom"));
    expect(failure.kind).toBe("transient");
    expect(failure.retryable).toBe(false);
    expect(failure.message).toBe("boom");
    expect(toGenerationFailure("plain string").message).toBe("plain string");
  });
});

describe("modules/providers/call-policy", () => {
  it("resolves with the operation result", async () => {
    const operation = vi.fn(async (_signal: AbortSignal) => "ok");

    await expect(callWithPolicy(operation, POLICY, "generation")).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("aborts and fails with a transient failure once the timeout elapses", async () => {
    let observedSignal: AbortSignal | undefined;
    const operation = vi.fn((signal: AbortSignal) => {
      observedSignal = signal;
      return new Promise<string>(() => undefined);
    });

    const failure = await captureFailure(callWithPolicy(operation, POLICY, "generation"));

    expect(failure.kind).toBe("transient");
    expect(failure.message).toBe("generation timed out after 20ms");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(observedSignal?.aborted).toBe(true);
  });

  it("retries a retryable failure exactly once", async () => {
    const operation = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new OpenAI.APIConnectionError({ message: "connection reset" }))
      .mockResolvedValueOnce("second attempt");

    await expect(callWithPolicy(operation, POLICY, "generation")).resolves.toBe("second attempt");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("gives up after the single retry", async () => {
    const operation = vi.fn(async (_signal: AbortSignal): Promise<string> => {
      throw httpError(502);
    });

    const failure = await captureFailure(callWithPolicy(operation, POLICY, "generation"));

    expect(failure.kind).toBe("transient");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("does not retry quota failures", async () => {
    const operation = vi.fn(async (_signal: AbortSignal): Promise<string> => {
      throw httpError(429, "quota exceeded");
    });

    const failure = await captureFailure(callWithPolicy(operation, POLICY, "generation"));

    expect(failure.kind).toBe("quota");
    expect(failure.message).toBe("quota exceeded");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("rejects withTimeout with ProviderTimeoutError when the operation ignores the signal", async () => {
    vi.useFakeTimers();
    try {
      const pending = withTimeout(() => new Promise<void>(() => undefined), 7000, "health check");
      const assertion = expect(pending).rejects.toBeInstanceOf(ProviderTimeoutError);
      await vi.advanceTimersByTimeAsync(7000);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});
