import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../core/entities/appError";
import { parseEnv } from "../../shared/config/env";
import { createRuntime } from "./runtimeFactory";

describe("createRuntime", () => {
  it("refuses to prefetch into a process-local memory cache", async () => {
    const runtime = createRuntime(parseEnv({ CACHE_BACKEND: "memory" }));

    try {
      expect(() => runtime.createPrefetchService()).toThrow(ConfigurationError);
      expect(() => runtime.createPrefetchService()).toThrow(
        "Prefetch requires CACHE_BACKEND=postgres; the memory cache is private to this process.",
      );
    } finally {
      await runtime.close();
    }
  });

  it("serves data requests from the memory cache without a queue", async () => {
    const runtime = createRuntime(parseEnv({}));

    try {
      expect(runtime.config.providerPriority).toEqual(["finnhub", "financial_datasets"]);
      expect(runtime.registry.defaultProviderId()).toBe("financial_datasets");
    } finally {
      await runtime.close();
    }
  });
});
