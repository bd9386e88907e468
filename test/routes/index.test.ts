import { describe, expect, it, vi } from "vitest";
import { memoizeAssistant } from "../../src/api/routes/index.js";
import type { AssistantComponents } from "../../src/modules/legal/default-dependencies.js";
import { createTestAssistant, StubGenerationProvider } from "../helpers/assistant-fakes.js";

describe("memoizeAssistant", () => {
  it("builds the assistant once and shares it", async () => {
    const assistant = createTestAssistant({ generationProvider: new StubGenerationProvider() });
    const factory = vi.fn(async () => assistant);
    const getAssistant = memoizeAssistant(factory);

    const [first, second] = await Promise.all([getAssistant(), getAssistant()]);

    expect(first).toBe(assistant);
    expect(second).toBe(assistant);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("retries the factory after a failed build", async () => {
    const assistant = createTestAssistant({ generationProvider: new StubGenerationProvider() });
    const factory = vi
      .fn<() => Promise<AssistantComponents>>()
      .mockRejectedValueOnce(new Error("qdrant unreachable"))
      .mockResolvedValueOnce(assistant);
    const getAssistant = memoizeAssistant(factory);

    await expect(getAssistant()).rejects.toThrow("qdrant unreachable");
    await expect(getAssistant()).resolves.toBe(assistant);
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
