import type { DatabaseSourceOptions } from "@/common/types/adapters";
import type { CollectionRequest, FetchOptions } from "@/common/types/core";
import { isPlainObject, renderDeep } from "@/common/utils/template.utils";
import { SourceRejectedError } from "@/error-handling/pipeline.errors";
import { BaseSourceAdapter } from "../base/base-source-adapter";
import type { QueryClient } from "./query-client";

/**
 * Reads the latest document matching a templated filter
 */
export class DatabaseSourceAdapter extends BaseSourceAdapter {
  readonly kind = "database" as const;

  constructor(
    sourceId: string,
    private readonly options: DatabaseSourceOptions,
    private readonly client: QueryClient
  ) {
    super(sourceId);
  }

  protected async doFetch(request: CollectionRequest, { signal, timeoutMs }: FetchOptions): Promise<Record<string, unknown>> {
    const filter = renderDeep(this.options.filter, this.templateValues(request));

    const document = await this.client.findOne({
      database: this.options.database,
      collection: this.options.collection,
      filter: isPlainObject(filter) ? filter : {},
      sort: this.options.sort,
      timeoutMs,
      signal,
    });

    if (document === null) {
      throw new SourceRejectedError(`${this.sourceId} has no document for "${request.target}"`, this.sourceId, {
        context: { collection: this.options.collection },
      });
    }
    return this.toPayload(document);
  }

  override async close(): Promise<void> {
    await this.client.close();
  }
}
