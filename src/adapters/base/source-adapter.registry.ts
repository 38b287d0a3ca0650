import { Logger, type OnModuleDestroy } from "@nestjs/common";
import type { NormalizationTable, SourceKind } from "@/common/types/core";
import type { SourceHealth } from "@/common/types/adapters";
import { toError } from "@/common/utils/error.utils";
import type { SourceAdapter } from "./source-adapter.interface";

export interface SourceRegistration {
  normalization: NormalizationTable;
  /** Per-attempt timeout for this source */
  timeoutMs?: number;
  /** Schema applied when a request names none */
  schemaName?: string;
}

export interface SourceRegistryEntry extends SourceRegistration {
  adapter: SourceAdapter;
  registeredAt: Date;
  isActive: boolean;
  consecutiveFailures: number;
  lastSuccessAt?: number;
  lastFailureAt?: number;
}

export interface SourceFilter {
  kind?: SourceKind;
  isActive?: boolean;
}

const UNHEALTHY_AFTER_FAILURES = 3;

/**
 * Adapters keyed by lower-cased source id, with their normalization tables and health
 */
export class SourceAdapterRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(SourceAdapterRegistry.name);
  private readonly sources = new Map<string, SourceRegistryEntry>();

  async onModuleDestroy(): Promise<void> {
    const failures = await this.closeAll();
    for (const failure of failures) {
      this.logger.warn(`Adapter close failed: ${failure.message}`);
    }
  }

  register(adapter: SourceAdapter, registration: SourceRegistration): void {
    const key = adapter.sourceId.toLowerCase();

    if (this.sources.has(key)) {
      throw new Error(`Source '${adapter.sourceId}' is already registered`);
    }

    this.sources.set(key, {
      adapter,
      normalization: registration.normalization,
      timeoutMs: registration.timeoutMs,
      schemaName: registration.schemaName,
      registeredAt: new Date(),
      isActive: true,
      consecutiveFailures: 0,
    });
  }

  unregister(sourceId: string): boolean {
    return this.sources.delete(sourceId.toLowerCase());
  }

  /**
   * Active entry for a source, if any
   */
  get(sourceId: string): SourceRegistryEntry | undefined {
    const entry = this.sources.get(sourceId.toLowerCase());
    return entry?.isActive ? entry : undefined;
  }

  has(sourceId: string): boolean {
    return this.sources.has(sourceId.toLowerCase());
  }

  list(filter: SourceFilter = {}): SourceAdapter[] {
    return Array.from(this.sources.values())
      .filter(entry => filter.kind === undefined || entry.adapter.kind === filter.kind)
      .filter(entry => filter.isActive === undefined || entry.isActive === filter.isActive)
      .map(entry => entry.adapter);
  }

  setActive(sourceId: string, isActive: boolean): boolean {
    const entry = this.sources.get(sourceId.toLowerCase());
    if (entry) {
      entry.isActive = isActive;
      return true;
    }
    return false;
  }

  recordSuccess(sourceId: string): void {
    const entry = this.sources.get(sourceId.toLowerCase());
    if (entry) {
      entry.consecutiveFailures = 0;
      entry.lastSuccessAt = Date.now();
    }
  }

  recordFailure(sourceId: string): void {
    const entry = this.sources.get(sourceId.toLowerCase());
    if (entry) {
      entry.consecutiveFailures += 1;
      entry.lastFailureAt = Date.now();
    }
  }

  getHealth(): SourceHealth[] {
    return Array.from(this.sources.values()).map(entry => ({
      sourceId: entry.adapter.sourceId,
      kind: entry.adapter.kind,
      active: entry.isActive,
      status:
        entry.consecutiveFailures === 0
          ? "healthy"
          : entry.consecutiveFailures < UNHEALTHY_AFTER_FAILURES
            ? "degraded"
            : "unhealthy",
      lastSuccessAt: entry.lastSuccessAt,
      lastFailureAt: entry.lastFailureAt,
      consecutiveFailures: entry.consecutiveFailures,
    }));
  }

  /**
   * Close every adapter; failures are collected, not thrown one by one
   */
  async closeAll(): Promise<Error[]> {
    const results = await Promise.allSettled(
      Array.from(this.sources.values()).map(entry => entry.adapter.close?.() ?? Promise.resolve())
    );
    this.sources.clear();
    return results.flatMap(result => (result.status === "rejected" ? [toError(result.reason)] : []));
  }
}
