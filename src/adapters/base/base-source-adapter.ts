import { BaseService } from "@/common/base/base.service";
import type { CollectionRequest, FetchOptions, Primitive, RawRecord, SourceKind } from "@/common/types/core";
import { getPath, isPlainObject } from "@/common/utils/template.utils";
import { classifySourceFailure } from "@/error-handling/error-classification";
import { SourceMalformedError } from "@/error-handling/pipeline.errors";
import type { SourceAdapter } from "./source-adapter.interface";

/**
 * Shared fetch envelope: timing, RawRecord assembly and error classification.
 * Subclasses only implement `doFetch`.
 */
export abstract class BaseSourceAdapter extends BaseService implements SourceAdapter {
  abstract readonly kind: SourceKind;

  constructor(readonly sourceId: string) {
    super();
  }

  async fetch(request: CollectionRequest, options: FetchOptions): Promise<RawRecord> {
    const startedAt = Date.now();

    try {
      const payload = await this.doFetch(request, options);
      const fetchedAt = Date.now();
      return { sourceId: this.sourceId, fetchedAt, payload, latencyMs: fetchedAt - startedAt };
    } catch (error) {
      const classified = classifySourceFailure(error, this.sourceId);
      this.logDebug(`${this.kind} fetch for ${request.target} failed: ${classified.message}`, request.requestId);
      throw classified;
    }
  }

  async close(): Promise<void> {
    // Stateless by default
  }

  protected abstract doFetch(request: CollectionRequest, options: FetchOptions): Promise<Record<string, unknown>>;

  /**
   * Values available to `{placeholder}` templates in source options
   */
  protected templateValues(request: CollectionRequest): Record<string, Primitive> {
    return { ...request.parameters, target: request.target };
  }

  /**
   * Reduce a decoded body to the record object. A top-level array is addressed as `{ data: [...] }`;
   * when the selection is an array its first element is the record.
   */
  protected toPayload(body: unknown, dataPath?: string): Record<string, unknown> {
    let selected = dataPath ? getPath(Array.isArray(body) ? { data: body } : body, dataPath) : body;
    if (Array.isArray(selected)) {
      selected = selected[0];
    }

    if (!isPlainObject(selected)) {
      throw new SourceMalformedError(`${this.sourceId} payload is not an object`, this.sourceId, {
        context: { dataPath, received: selected === null ? "null" : typeof selected },
      });
    }
    return selected;
  }
}
