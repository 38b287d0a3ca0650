import { createCollectionRequest } from "../collection-request.factory";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { TestDataBuilder } from "@/__tests__/utils";

describe("createCollectionRequest", () => {
  const defaults = TestDataBuilder.createRetryPolicy({ maxAttempts: 4 });

  it("should build a frozen request with defaults filled in", () => {
    const request = createCollectionRequest({ sourceId: " quotes-api ", target: "AAPL" }, defaults);

    expect(request.requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(request).toMatchObject({
      sourceId: "quotes-api",
      target: "AAPL",
      parameters: {},
      fallbackSourceIds: [],
      retryPolicy: defaults,
    });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.retryPolicy)).toBe(true);
    expect(Object.isFrozen(request.fallbackSourceIds)).toBe(true);
  });

  it("should keep a caller-supplied id and merge retry overrides", () => {
    const request = createCollectionRequest(
      {
        requestId: "req-42",
        sourceId: "quotes-api",
        target: "MSFT",
        parameters: { exchange: "XNAS" },
        retryPolicy: { maxAttempts: 2 },
        timeoutMs: 300,
        fallbackSourceIds: ["quotes-archive"],
        schemaName: "market-quote",
        referenceValue: 400,
      },
      defaults
    );

    expect(request).toEqual({
      requestId: "req-42",
      sourceId: "quotes-api",
      target: "MSFT",
      parameters: { exchange: "XNAS" },
      retryPolicy: { ...defaults, maxAttempts: 2 },
      timeoutMs: 300,
      fallbackSourceIds: ["quotes-archive"],
      schemaName: "market-quote",
      referenceValue: 400,
    });
  });

  it("should report every problem with the input at once", () => {
    expect(() =>
      createCollectionRequest({ sourceId: "", target: " ", timeoutMs: 0, referenceValue: Number.NaN }, defaults)
    ).toThrow(
      new ConfigurationError(
        "Invalid collection request: sourceId must not be empty; target must not be empty; timeoutMs must be > 0 (got 0); referenceValue must be a finite number"
      )
    );
  });

  it("should reject a retry policy that would shrink delays", () => {
    expect(() =>
      createCollectionRequest({ sourceId: "quotes-api", target: "AAPL", retryPolicy: { backoffMultiplier: 1, jitterRatio: 0.5 } }, defaults)
    ).toThrow(ConfigurationError);
  });
});
