import type { Primitive, SourceKind } from "../core/collection.types";
import type { NormalizationTable } from "../core/record.types";
import type { RateLimitConfig } from "../rate-limiting";

export interface RestSourceOptions {
  baseUrl: string;
  /** Supports {target} and {parameter} placeholders */
  path: string;
  query?: Record<string, Primitive>;
  headers?: Record<string, string>;
  /** Name of the environment variable holding a bearer token */
  apiKeyEnv?: string;
  /** Dot path to the object of interest inside the response body */
  dataPath?: string;
}

export interface DatabaseSourceOptions {
  /** Name of the environment variable holding the connection string */
  uriEnv: string;
  database: string;
  collection: string;
  filter: Record<string, Primitive>;
  sort?: Record<string, 1 | -1>;
}

export interface ScrapeFieldSelector {
  selector: string;
  /** Read an attribute instead of the element text */
  attribute?: string;
}

export interface ScrapeSourceOptions {
  url: string;
  rowSelector: string;
  fields: Record<string, ScrapeFieldSelector>;
  headers?: Record<string, string>;
}

export interface StreamSourceOptions {
  url: string;
  /** Sent once the socket opens; string values support placeholders */
  subscribeMessage?: Record<string, unknown>;
  /** Message field compared against the request target */
  symbolField?: string;
  dataPath?: string;
}

interface SourceDefinitionBase {
  id: string;
  description?: string;
  enabled?: boolean;
  timeoutMs?: number;
  rateLimit?: RateLimitConfig;
  /** Default schema for records from this source */
  schemaName?: string;
  normalization: NormalizationTable;
}

export type SourceDefinition =
  | (SourceDefinitionBase & { kind: "rest"; rest: RestSourceOptions })
  | (SourceDefinitionBase & { kind: "database"; database: DatabaseSourceOptions })
  | (SourceDefinitionBase & { kind: "scrape"; scrape: ScrapeSourceOptions })
  | (SourceDefinitionBase & { kind: "stream"; stream: StreamSourceOptions });

export interface SourceHealth {
  sourceId: string;
  kind: SourceKind;
  active: boolean;
  status: "healthy" | "degraded" | "unhealthy";
  lastSuccessAt?: number;
  lastFailureAt?: number;
  consecutiveFailures: number;
}
