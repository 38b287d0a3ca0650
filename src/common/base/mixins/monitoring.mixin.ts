import type { AbstractConstructor, IBaseService } from "../../types/services";

export interface MonitoringCapabilities {
  incrementCounter(name: string, increment?: number): void;
  getCounters(): Record<string, number>;
  resetCounters(): void;
}

/**
 * In-process counters. Names are free-form; services key them by source or decision.
 */
export function WithMonitoring<TBase extends AbstractConstructor<IBaseService>>(Base: TBase) {
  abstract class MonitoringMixin extends Base implements MonitoringCapabilities {
    private readonly counters = new Map<string, number>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    incrementCounter(name: string, increment = 1): void {
      this.counters.set(name, (this.counters.get(name) ?? 0) + increment);
    }

    getCounters(): Record<string, number> {
      return Object.fromEntries(this.counters);
    }

    resetCounters(): void {
      this.counters.clear();
    }
  }

  return MonitoringMixin;
}
