/**
 * Helper functions for common test operations
 */
export class TestHelpers {
  /**
   * Wait for a specified amount of time
   */
  static async wait(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Wait for a condition to be true
   */
  static async waitFor(
    condition: () => boolean | Promise<boolean>,
    timeout: number = 2000,
    interval: number = 5
  ): Promise<void> {
    const start = Date.now();
    while (Date.now() - start < timeout) {
      if (await condition()) {
        return;
      }
      await this.wait(interval);
    }
    throw new Error(`Condition not met within ${timeout}ms`);
  }

  /**
   * Create a promise that can be resolved externally
   */
  static createDeferredPromise<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
  } {
    let settle: { resolve: (value: T) => void; reject: (error: unknown) => void } | undefined;
    const promise = new Promise<T>((resolve, reject) => {
      settle = { resolve, reject };
    });
    return {
      promise,
      resolve: value => settle?.resolve(value),
      reject: error => settle?.reject(error),
    };
  }

  /**
   * Let queued microtasks and already-due timers run
   */
  static async flush(): Promise<void> {
    await new Promise(resolve => setImmediate(resolve));
  }
}
