import type { CollectionRequest, FetchOptions, RawRecord, SourceKind } from "@/common/types/core";

/**
 * Uniform contract over upstream providers. Implementations fail with
 * SourceUnavailableError, SourceRejectedError or SourceMalformedError.
 */
export interface SourceAdapter {
  readonly sourceId: string;
  readonly kind: SourceKind;
  fetch(request: CollectionRequest, options: FetchOptions): Promise<RawRecord>;
  close?(): Promise<void>;
}
