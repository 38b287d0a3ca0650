import { createHash } from "crypto";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { PipelineResult } from "@/common/types/core";

/**
 * Destination for terminal pipeline results
 */
export interface ResultSink {
  store(result: PipelineResult): Promise<void>;
}

export const RESULT_SINK = "RESULT_SINK";

/**
 * Keeps the newest `capacity` results in memory
 */
export class InMemoryResultSink implements ResultSink {
  private readonly results: PipelineResult[] = [];

  constructor(private readonly capacity = 1000) {}

  async store(result: PipelineResult): Promise<void> {
    this.results.push(result);
    if (this.results.length > this.capacity) {
      this.results.splice(0, this.results.length - this.capacity);
    }
  }

  get(requestId: string): PipelineResult | undefined {
    return this.results.find(result => result.requestId === requestId);
  }

  list(): readonly PipelineResult[] {
    return [...this.results];
  }

  clear(): void {
    this.results.length = 0;
  }
}

/**
 * Writes each result to `<directory>/<requestId>-<hash>.json`. The request id is reduced to
 * file-safe characters and the hash of the raw id keeps ids that reduce alike apart.
 */
export class JsonFileResultSink implements ResultSink {
  constructor(private readonly directory: string) {}

  async store(result: PipelineResult): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(result.requestId), `${JSON.stringify(result, null, 2)}\n`, "utf8");
  }

  pathFor(requestId: string): string {
    const safe = requestId.replace(/[^A-Za-z0-9_.-]/g, "_");
    const hash = createHash("sha256").update(requestId).digest("hex").slice(0, 8);
    return join(this.directory, `${safe}-${hash}.json`);
  }
}
