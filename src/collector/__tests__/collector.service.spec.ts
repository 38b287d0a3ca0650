import { CollectorService } from "../collector.service";
import { SourceAdapterRegistry } from "@/adapters/base/source-adapter.registry";
import { DatabaseSourceAdapter } from "@/adapters/database/database-source.adapter";
import type { FindOneQuery, QueryClient } from "@/adapters/database/query-client";
import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import type { AttemptLog } from "@/common/types/core";
import {
  CollectionCancelledError,
  CollectionExhaustedError,
  ConfigurationError,
  NormalizationError,
  SourceMalformedError,
  SourceNotFoundError,
  SourceRejectedError,
  SourceUnavailableError,
} from "@/error-handling/pipeline.errors";
import { ScriptedSourceAdapter, TestDataBuilder, TestHelpers, type ScriptStep } from "@/__tests__/utils";

describe("CollectorService", () => {
  let registry: SourceAdapterRegistry;
  let rateLimiter: RateLimiterService;
  let collector: CollectorService;

  const quote = TestDataBuilder.createQuotePayload();

  const register = (sourceId: string, steps: ScriptStep[], timeoutMs?: number): ScriptedSourceAdapter => {
    const adapter = new ScriptedSourceAdapter(sourceId, steps);
    registry.register(adapter, { normalization: TestDataBuilder.createMarketNormalization(), timeoutMs });
    return adapter;
  };

  beforeEach(() => {
    registry = new SourceAdapterRegistry();
    rateLimiter = new RateLimiterService({ defaultLimit: { ratePerSecond: 1000, burst: 5 } });
    collector = new CollectorService(registry, rateLimiter);
  });

  afterEach(async () => {
    await rateLimiter.onModuleDestroy();
  });

  describe("retries", () => {
    it("should retry timed-out attempts and succeed on the third", async () => {
      const adapter = register("quotes-api", [{ hang: true }, { hang: true }, { payload: quote }]);
      const request = TestDataBuilder.createCollectionRequest({ timeoutMs: 20 });

      const outcome = await collector.collect(request);

      expect(adapter.calls).toHaveLength(3);
      expect(outcome.sourceId).toBe("quotes-api");
      expect(outcome.record.fields).toEqual({ price: 189.5, volume: 1200, timestamp: 1704067200000 });
      expect(outcome.record.provenance.attempt).toBe(3);
      expect(outcome.attempts.map(attempt => [attempt.attempt, attempt.outcome, attempt.delayBeforeMs])).toEqual([
        [1, "failure", 0],
        [2, "failure", 1],
        [3, "success", 2],
      ]);
      expect(outcome.attempts[0].error).toBe("quotes-api timed out after 20ms");
      expect(collector.getCounters()).toEqual({
        "attempts_quotes-api": 3,
        "retries_quotes-api": 2,
        "successes_quotes-api": 1,
      });
    });

    it("should give up after maxAttempts unavailable failures", async () => {
      const adapter = register("quotes-api", [{ error: new SourceUnavailableError("upstream 503", "quotes-api") }]);

      const failure = collector.collect(TestDataBuilder.createCollectionRequest());

      await expect(failure).rejects.toBeInstanceOf(CollectionExhaustedError);
      await expect(failure).rejects.toThrow('Collection from "quotes-api" failed after 3 attempts: upstream 503');
      expect(adapter.calls).toHaveLength(3);
      expect(registry.getHealth()[0].consecutiveFailures).toBe(3);
      expect(collector.getCounters()["exhaustions_quotes-api"]).toBe(1);
    });

    it("should use the source timeout when the request sets none", async () => {
      register("quotes-api", [{ hang: true }], 15);

      await expect(
        collector.collect(TestDataBuilder.createCollectionRequest({ retryPolicy: { maxAttempts: 1 } }))
      ).rejects.toThrow('Collection from "quotes-api" failed after 1 attempts: quotes-api timed out after 15ms');
    });

    it("should report every attempt through onAttempt", async () => {
      register("quotes-api", [{ error: new SourceUnavailableError("flaky", "quotes-api") }, { payload: quote }]);
      const seen: AttemptLog[] = [];

      await collector.collect(TestDataBuilder.createCollectionRequest(), { onAttempt: attempt => seen.push(attempt) });

      expect(seen.map(attempt => attempt.outcome)).toEqual(["failure", "success"]);
      expect(seen[0].error).toBe("flaky");
    });
  });

  describe("non-retryable failures", () => {
    it("should stop after one attempt on a malformed payload", async () => {
      const adapter = register("quotes-api", [{ error: new SourceMalformedError("truncated body", "quotes-api") }]);

      const failure = collector.collect(TestDataBuilder.createCollectionRequest());

      await expect(failure).rejects.toThrow(new NormalizationError("truncated body"));
      await expect(failure).rejects.toBeInstanceOf(NormalizationError);
      expect(adapter.calls).toHaveLength(1);
    });

    it("should stop after one attempt when the payload has none of the mapped fields", async () => {
      const adapter = register("quotes-api", [{ payload: { status: "ok" } }]);

      await expect(collector.collect(TestDataBuilder.createCollectionRequest())).rejects.toBeInstanceOf(NormalizationError);
      expect(adapter.calls).toHaveLength(1);
      expect(collector.getCounters()["normalization_failures_quotes-api"]).toBe(1);
    });

    it("should not retry a rejected request on the same source", async () => {
      const adapter = register("quotes-api", [{ error: new SourceRejectedError("bad credentials", "quotes-api") }]);

      await expect(collector.collect(TestDataBuilder.createCollectionRequest())).rejects.toBeInstanceOf(SourceRejectedError);
      expect(adapter.calls).toHaveLength(1);
    });
  });

  describe("fallback sources", () => {
    it("should move to the next source after a rejection", async () => {
      const primary = register("quotes-api", [{ error: new SourceRejectedError("bad credentials", "quotes-api") }]);
      const fallback = register("quotes-archive", [{ payload: quote }]);

      const outcome = await collector.collect(TestDataBuilder.createCollectionRequest({ fallbackSourceIds: ["quotes-archive"] }));

      expect(outcome.sourceId).toBe("quotes-archive");
      expect(outcome.record.provenance.sourceId).toBe("quotes-archive");
      expect(primary.calls).toHaveLength(1);
      expect(fallback.calls).toHaveLength(1);
      expect(outcome.attempts.map(attempt => attempt.sourceId)).toEqual(["quotes-api", "quotes-archive"]);
    });

    it("should give each fallback its own attempt budget", async () => {
      const primary = register("quotes-api", [{ error: new SourceUnavailableError("down", "quotes-api") }]);
      const fallback = register("quotes-archive", [{ error: new SourceUnavailableError("down", "quotes-archive") }]);

      const failure = collector.collect(
        TestDataBuilder.createCollectionRequest({ fallbackSourceIds: ["quotes-archive"], retryPolicy: { maxAttempts: 2 } })
      );

      await expect(failure).rejects.toThrow('Collection from "quotes-archive" failed after 2 attempts: down');
      expect(primary.calls).toHaveLength(2);
      expect(fallback.calls).toHaveLength(2);
    });

    it("should skip unknown sources and fail with SourceNotFoundError when nothing is left", async () => {
      const fallback = register("quotes-archive", [{ payload: quote }]);

      await expect(
        collector.collect(TestDataBuilder.createCollectionRequest({ sourceId: "missing", fallbackSourceIds: ["quotes-archive"] }))
      ).resolves.toMatchObject({ sourceId: "quotes-archive" });
      expect(fallback.calls).toHaveLength(1);

      await expect(collector.collect(TestDataBuilder.createCollectionRequest({ sourceId: "missing" }))).rejects.toThrow(
        new SourceNotFoundError("missing")
      );
    });
  });

  describe("cancellation", () => {
    it("should abort an attempt in flight", async () => {
      const adapter = register("quotes-api", [{ hang: true }]);
      const controller = new AbortController();

      const pending = collector.collect(TestDataBuilder.createCollectionRequest({ timeoutMs: 5000 }), { signal: controller.signal });
      await TestHelpers.waitFor(() => adapter.calls.length === 1);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CollectionCancelledError);
      expect(adapter.calls).toHaveLength(1);
    });

    it("should abort while waiting out a backoff", async () => {
      const adapter = register("quotes-api", [{ error: new SourceUnavailableError("down", "quotes-api") }]);
      const controller = new AbortController();
      const attempts: AttemptLog[] = [];

      const pending = collector.collect(
        TestDataBuilder.createCollectionRequest({ retryPolicy: { backoffBaseMs: 5000, backoffCapMs: 5000 } }),
        { signal: controller.signal, onAttempt: attempt => attempts.push(attempt) }
      );
      await TestHelpers.waitFor(() => attempts.length === 1);
      controller.abort();

      await expect(pending).rejects.toThrow("Collection for request req-1 was cancelled");
      expect(adapter.calls).toHaveLength(1);
    });

    it("should not call the source when already cancelled", async () => {
      const adapter = register("quotes-api", [{ payload: quote }]);
      const controller = new AbortController();
      controller.abort();

      await expect(
        collector.collect(TestDataBuilder.createCollectionRequest(), { signal: controller.signal })
      ).rejects.toBeInstanceOf(CollectionCancelledError);
      expect(adapter.calls).toHaveLength(0);
    });
  });

  describe("rate limiting", () => {
    it("should keep at most burst attempts in flight per source", async () => {
      rateLimiter.configureSource("quotes-api", { ratePerSecond: 1000, burst: 2 });
      const adapter = register("quotes-api", [{ payload: quote, delayMs: 20 }]);

      const outcomes = await Promise.all(
        ["r1", "r2", "r3", "r4", "r5"].map(requestId => collector.collect(TestDataBuilder.createCollectionRequest({ requestId })))
      );

      expect(outcomes).toHaveLength(5);
      expect(adapter.calls).toHaveLength(5);
      expect(adapter.maxInFlight).toBe(2);
    });

    it("should hold the permit of a timed-out attempt until the source call returns", async () => {
      const signals: Array<AbortSignal | undefined> = [];
      let running = 0;
      let peak = 0;
      // Ignores its signal, like a driver that cannot cancel a query in progress
      const slowClient: QueryClient = {
        findOne: async (query: FindOneQuery) => {
          signals.push(query.signal);
          running++;
          peak = Math.max(peak, running);
          await TestHelpers.wait(150);
          running--;
          return { price: 189.5, volume: 1200, timestamp: "2024-01-01T00:00:00Z" };
        },
        close: async () => undefined,
      };
      const adapter = new DatabaseSourceAdapter(
        "quotes-archive",
        { uriEnv: "TEST_QUOTES_MONGO_URI", database: "market", collection: "quotes", filter: { symbol: "{target}" } },
        slowClient
      );
      registry.register(adapter, { normalization: TestDataBuilder.createMarketNormalization() });
      rateLimiter.configureSource("quotes-archive", { ratePerSecond: 1000, burst: 1 });

      const request = TestDataBuilder.createCollectionRequest({ sourceId: "quotes-archive", timeoutMs: 20 });
      await expect(collector.collect(request)).rejects.toBeInstanceOf(CollectionExhaustedError);
      await TestHelpers.waitFor(() => running === 0);

      expect(signals).toHaveLength(3);
      expect(signals.every(signal => signal?.aborted === true)).toBe(true);
      expect(peak).toBe(1);
    });
  });

  describe("configuration", () => {
    it("should reject a non-positive default timeout", () => {
      expect(() => collector.updateConfig({ defaultTimeoutMs: 0 })).toThrow(ConfigurationError);
      expect(collector.getConfig().defaultTimeoutMs).toBeGreaterThan(0);
    });
  });
});
