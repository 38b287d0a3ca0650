import { SourceAdapterRegistry } from "../source-adapter.registry";
import { ScriptedSourceAdapter, TestDataBuilder } from "@/__tests__/utils";

describe("SourceAdapterRegistry", () => {
  let registry: SourceAdapterRegistry;
  const normalization = TestDataBuilder.createMarketNormalization();

  beforeEach(() => {
    registry = new SourceAdapterRegistry();
  });

  it("should register adapters under a case-insensitive key", () => {
    const adapter = new ScriptedSourceAdapter("Quotes-API", [{ payload: {} }]);
    registry.register(adapter, { normalization, timeoutMs: 250, schemaName: "market-quote" });

    const entry = registry.get("quotes-api");
    expect(entry?.adapter).toBe(adapter);
    expect(entry?.timeoutMs).toBe(250);
    expect(entry?.schemaName).toBe("market-quote");
    expect(registry.has("QUOTES-API")).toBe(true);
  });

  it("should refuse a second adapter for the same source", () => {
    registry.register(new ScriptedSourceAdapter("quotes-api", [{ payload: {} }]), { normalization });

    expect(() => registry.register(new ScriptedSourceAdapter("QUOTES-API", [{ payload: {} }]), { normalization })).toThrow(
      "Source 'QUOTES-API' is already registered"
    );
  });

  it("should hide inactive sources from get but keep them listed", () => {
    registry.register(new ScriptedSourceAdapter("quotes-api", [{ payload: {} }]), { normalization });
    registry.register(new ScriptedSourceAdapter("quotes-page", [{ payload: {} }], "scrape"), { normalization });

    expect(registry.setActive("quotes-api", false)).toBe(true);
    expect(registry.setActive("missing", false)).toBe(false);

    expect(registry.get("quotes-api")).toBeUndefined();
    expect(registry.has("quotes-api")).toBe(true);
    expect(registry.list({ isActive: true }).map(adapter => adapter.sourceId)).toEqual(["quotes-page"]);
    expect(registry.list({ kind: "rest" }).map(adapter => adapter.sourceId)).toEqual(["quotes-api"]);
  });

  it("should derive health from consecutive failures", () => {
    registry.register(new ScriptedSourceAdapter("quotes-api", [{ payload: {} }]), { normalization });

    registry.recordFailure("quotes-api");
    expect(registry.getHealth()[0]).toMatchObject({ status: "degraded", consecutiveFailures: 1 });

    registry.recordFailure("quotes-api");
    registry.recordFailure("quotes-api");
    expect(registry.getHealth()[0]).toMatchObject({ status: "unhealthy", consecutiveFailures: 3 });

    registry.recordSuccess("quotes-api");
    expect(registry.getHealth()[0]).toMatchObject({ sourceId: "quotes-api", kind: "rest", status: "healthy", consecutiveFailures: 0 });
  });

  it("should close every adapter and collect close failures", async () => {
    const healthy = new ScriptedSourceAdapter("quotes-api", [{ payload: {} }]);
    const broken = new ScriptedSourceAdapter("quotes-page", [{ payload: {} }]);
    jest.spyOn(broken, "close").mockRejectedValue(new Error("socket already gone"));
    registry.register(healthy, { normalization });
    registry.register(broken, { normalization });

    const failures = await registry.closeAll();

    expect(healthy.closed).toBe(true);
    expect(failures.map(error => error.message)).toEqual(["socket already gone"]);
    expect(registry.list()).toEqual([]);
  });

  it("should unregister a source", () => {
    registry.register(new ScriptedSourceAdapter("quotes-api", [{ payload: {} }]), { normalization });

    expect(registry.unregister("QUOTES-API")).toBe(true);
    expect(registry.has("quotes-api")).toBe(false);
  });
});
