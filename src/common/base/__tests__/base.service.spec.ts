import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { StandardService } from "../composed.service";
import { WithConfiguration } from "../mixins/configurable.mixin";
import { WithEvents } from "../mixins/events.mixin";

interface WorkerConfig {
  concurrency: number;
  label: string;
}

type WorkerEvents = {
  tick: [number];
};

class TestWorker extends WithEvents<WorkerEvents>()(
  WithConfiguration<WorkerConfig>({ concurrency: 2, label: "worker" })(StandardService)
) {
  initializeCalls = 0;
  cleanupCalls = 0;

  override validateConfig(config: WorkerConfig): void {
    if (config.concurrency < 1) {
      throw new ConfigurationError(`concurrency must be >= 1 (got ${config.concurrency})`);
    }
  }

  override async initialize(): Promise<void> {
    this.initializeCalls++;
  }

  override async cleanup(): Promise<void> {
    this.cleanupCalls++;
  }
}

describe("StandardService", () => {
  let worker: TestWorker;

  beforeEach(() => {
    worker = new TestWorker();
  });

  afterEach(async () => {
    await worker.onModuleDestroy();
  });

  describe("lifecycle", () => {
    it("should initialize and clean up exactly once", async () => {
      await Promise.all([worker.onModuleInit(), worker.onModuleInit()]);
      await worker.onModuleDestroy();
      await worker.onModuleDestroy();

      expect(worker.initializeCalls).toBe(1);
      expect(worker.cleanupCalls).toBe(1);
      expect(worker.isServiceInitialized()).toBe(true);
      expect(worker.isServiceDestroyed()).toBe(true);
    });

    it("should clear managed timers on destroy", async () => {
      const callback = jest.fn();
      worker.createTimeout(callback, 20);
      worker.createInterval(callback, 5);

      await worker.onModuleDestroy();
      await new Promise(resolve => setTimeout(resolve, 40));

      expect(callback).not.toHaveBeenCalled();
    });
  });

  describe("monitoring", () => {
    it("should accumulate counters", () => {
      worker.incrementCounter("attempts");
      worker.incrementCounter("attempts", 2);

      expect(worker.getCounters()).toEqual({ attempts: 3 });
    });
  });

  describe("configuration", () => {
    it("should commit a valid update", () => {
      worker.updateConfig({ concurrency: 4 });

      expect(worker.getConfig()).toEqual({ concurrency: 4, label: "worker" });
    });

    it("should keep the previous values when validation fails", () => {
      expect(() => worker.updateConfig({ concurrency: 0 })).toThrow("concurrency must be >= 1 (got 0)");
      expect(worker.getConfig().concurrency).toBe(2);
    });

    it("should reset to the defaults", () => {
      worker.updateConfig({ label: "renamed" });
      worker.resetConfig();

      expect(worker.getConfig()).toEqual({ concurrency: 2, label: "worker" });
    });
  });

  describe("events", () => {
    it("should deliver typed payloads to listeners", () => {
      const seen: number[] = [];
      worker.on("tick", value => seen.push(value));

      worker.emit("tick", 1);
      worker.emit("tick", 2);

      expect(seen).toEqual([1, 2]);
    });

    it("should keep a throwing listener from reaching the emitter", () => {
      worker.on("tick", () => {
        throw new Error("listener broke");
      });

      expect(() => worker.emit("tick", 1)).not.toThrow();
    });

    it("should stop delivering after off", () => {
      const listener = jest.fn();
      worker.on("tick", listener);
      worker.off("tick", listener);

      worker.emit("tick", 1);

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
