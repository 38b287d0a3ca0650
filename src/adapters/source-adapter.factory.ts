import { Logger } from "@nestjs/common";
import type { SourceDefinition } from "@/common/types/adapters";
import type { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import { toError } from "@/common/utils/error.utils";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import type { SourceAdapter } from "./base/source-adapter.interface";
import type { SourceAdapterRegistry } from "./base/source-adapter.registry";
import { DatabaseSourceAdapter } from "./database/database-source.adapter";
import { MongoQueryClient, type QueryClient } from "./database/query-client";
import { RestSourceAdapter, type HttpClient } from "./rest/rest-source.adapter";
import { ScrapeSourceAdapter } from "./scrape/scrape-source.adapter";
import { StreamSourceAdapter } from "./stream/stream-source.adapter";

export interface SourceAdapterDependencies {
  http?: HttpClient;
  queryClientFor?: (uri: string) => QueryClient;
  env?: NodeJS.ProcessEnv;
}

const logger = new Logger("SourceAdapterFactory");

export function createSourceAdapter(definition: SourceDefinition, deps: SourceAdapterDependencies = {}): SourceAdapter {
  switch (definition.kind) {
    case "rest":
      return new RestSourceAdapter(definition.id, definition.rest, deps.http);
    case "database": {
      const uri = (deps.env ?? process.env)[definition.database.uriEnv];
      if (!uri) {
        throw new ConfigurationError(
          `Source "${definition.id}" needs a connection string in ${definition.database.uriEnv}`
        );
      }
      const client = deps.queryClientFor ? deps.queryClientFor(uri) : new MongoQueryClient(uri);
      return new DatabaseSourceAdapter(definition.id, definition.database, client);
    }
    case "scrape":
      return new ScrapeSourceAdapter(definition.id, definition.scrape, deps.http);
    case "stream":
      return new StreamSourceAdapter(definition.id, definition.stream);
  }
}

/**
 * Build, register and rate-limit every enabled source. A source that cannot be built is
 * skipped with a warning so one bad definition does not keep the others offline.
 */
export function registerSources(
  registry: SourceAdapterRegistry,
  rateLimiter: RateLimiterService,
  definitions: readonly SourceDefinition[],
  deps: SourceAdapterDependencies = {}
): { registered: string[]; skipped: string[] } {
  const registered: string[] = [];
  const skipped: string[] = [];

  for (const definition of definitions) {
    if (definition.enabled === false) {
      skipped.push(definition.id);
      continue;
    }

    try {
      const adapter = createSourceAdapter(definition, deps);
      registry.register(adapter, {
        normalization: definition.normalization,
        timeoutMs: definition.timeoutMs,
        schemaName: definition.schemaName,
      });
      if (definition.rateLimit) {
        rateLimiter.configureSource(definition.id, definition.rateLimit);
      }
      registered.push(definition.id);
    } catch (error) {
      logger.warn(`Skipping source ${definition.id}: ${toError(error).message}`);
      skipped.push(definition.id);
    }
  }

  logger.log(`Registered ${registered.length} source(s)${skipped.length ? `, skipped ${skipped.join(", ")}` : ""}`);
  return { registered, skipped };
}
