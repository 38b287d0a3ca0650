import type { OnModuleInit, OnModuleDestroy } from "@nestjs/common";
import type { AbstractConstructor, IBaseService } from "../../types/services";
import { toError } from "../../utils/error.utils";

export interface LifecycleCapabilities {
  isServiceInitialized(): boolean;
  isServiceDestroyed(): boolean;
  createTimeout(callback: () => void, delayMs: number): NodeJS.Timeout;
  createInterval(callback: () => void, delayMs: number): NodeJS.Timeout;
  clearTimer(timer: NodeJS.Timeout): void;
}

/**
 * Ties a service to the Nest module lifecycle. `initialize` and `cleanup` each run at most once,
 * however many times Nest (or a test) calls the hooks; timers created through the service are
 * cleared before `cleanup`.
 */
export function WithLifecycle<TBase extends AbstractConstructor<IBaseService>>(Base: TBase) {
  abstract class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    private initialized = false;
    private destroyed = false;
    private initialization?: Promise<void>;
    private destruction?: Promise<void>;
    private readonly timers = new Set<NodeJS.Timeout>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    onModuleInit(): Promise<void> {
      if (!this.initialization) {
        this.initialization = this.runInitialization();
      }
      return this.initialization;
    }

    onModuleDestroy(): Promise<void> {
      if (!this.destruction) {
        this.destruction = this.runCleanup();
      }
      return this.destruction;
    }

    isServiceInitialized(): boolean {
      return this.initialized;
    }

    isServiceDestroyed(): boolean {
      return this.destroyed;
    }

    createTimeout(callback: () => void, delayMs: number): NodeJS.Timeout {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        callback();
      }, delayMs);
      this.timers.add(timer);
      return timer;
    }

    createInterval(callback: () => void, delayMs: number): NodeJS.Timeout {
      const timer = setInterval(callback, delayMs);
      this.timers.add(timer);
      return timer;
    }

    clearTimer(timer: NodeJS.Timeout): void {
      // clearTimeout and clearInterval share one id space in Node
      clearTimeout(timer);
      this.timers.delete(timer);
    }

    async initialize(): Promise<void> {}

    async cleanup(): Promise<void> {}

    private async runInitialization(): Promise<void> {
      try {
        await this.initialize();
      } catch (error) {
        this.logError(toError(error), "initialize");
        throw error;
      }
      this.initialized = true;
      this.logInitialization();
    }

    private async runCleanup(): Promise<void> {
      this.logShutdown();
      for (const timer of this.timers) {
        clearTimeout(timer);
      }
      this.timers.clear();

      try {
        await this.cleanup();
      } catch (error) {
        this.logError(toError(error), "cleanup");
        throw error;
      }
      this.destroyed = true;
    }
  }

  return LifecycleMixin;
}
