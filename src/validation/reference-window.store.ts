import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";

/** One series of reference values: a symbol's `field` as scored under the schema `schemaName` */
export interface WindowKey {
  symbol: string;
  schemaName: string;
  field: string;
}

export interface WindowUpdate<T> {
  result: T;
  /** Value to add to the window once `result` has been computed */
  append?: number;
}

/**
 * Rolling windows of reference values, one per symbol, schema and reference field, shared by
 * every validation. Symbols match case-insensitively.
 *
 * Writes to a window are serialized through a promise chain, so a read-score-append sequence
 * never interleaves with another one on the same window. Snapshots are copies and need no lock.
 */
@Injectable()
export class ReferenceWindowStore extends BaseService {
  private readonly windows = new Map<string, number[]>();
  private readonly tails = new Map<string, Promise<void>>();

  snapshot(key: WindowKey): readonly number[] {
    return this.read(this.idOf(key));
  }

  /**
   * Run `update` as the single writer for the window at `key`. It receives the window as it stood
   * before the call; any value it returns in `append` is added afterwards, keeping the newest `capacity`.
   */
  async update<T>(
    key: WindowKey,
    capacity: number,
    update: (window: readonly number[]) => WindowUpdate<T> | Promise<WindowUpdate<T>>
  ): Promise<T> {
    const id = this.idOf(key);
    const previous = this.tails.get(id) ?? Promise.resolve();

    const run = previous.then(async () => {
      const { result, append } = await update(this.read(id));
      if (append !== undefined && Number.isFinite(append)) {
        const window = this.windows.get(id) ?? [];
        window.push(append);
        if (window.length > capacity) {
          window.splice(0, window.length - capacity);
        }
        this.windows.set(id, window);
      }
      return result;
    });

    // The next writer waits for this one whatever its outcome; the caller still sees the failure
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(id, tail);
    void tail.then(() => {
      if (this.tails.get(id) === tail) this.tails.delete(id);
    });

    return run;
  }

  /** Drop every window of `symbol`, or all windows */
  clear(symbol?: string): void {
    if (symbol === undefined) {
      this.windows.clear();
      return;
    }
    const prefix = `${symbol.toUpperCase()}\u0000`;
    for (const id of [...this.windows.keys()]) {
      if (id.startsWith(prefix)) this.windows.delete(id);
    }
  }

  getStats(): { windows: number; points: number } {
    let points = 0;
    for (const window of this.windows.values()) points += window.length;
    return { windows: this.windows.size, points };
  }

  private read(id: string): readonly number[] {
    return [...(this.windows.get(id) ?? [])];
  }

  private idOf(key: WindowKey): string {
    return [key.symbol.toUpperCase(), key.schemaName, key.field].join("\u0000");
  }
}
