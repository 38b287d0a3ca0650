import { MongoClient, type Document } from "mongodb";
import { AbortedError } from "@/common/utils/async.utils";

export interface FindOneQuery {
  database: string;
  collection: string;
  filter: Record<string, unknown>;
  sort?: Record<string, 1 | -1>;
  timeoutMs?: number;
  /** Aborting stops the query; implementations must reject promptly */
  signal?: AbortSignal;
}

/**
 * Narrow read port the database adapter depends on
 */
export interface QueryClient {
  findOne(query: FindOneQuery): Promise<Record<string, unknown> | null>;
  close(): Promise<void>;
}

/**
 * MongoDB-backed QueryClient. The driver connects on first use and pools connections.
 * An abort rejects the read and closes its cursor, which kills it on the server.
 */
export class MongoQueryClient implements QueryClient {
  private readonly client: MongoClient;

  constructor(uri: string, serverSelectionTimeoutMS = 5000) {
    this.client = new MongoClient(uri, { serverSelectionTimeoutMS });
  }

  async findOne({ database, collection, filter, sort, timeoutMs, signal }: FindOneQuery): Promise<Record<string, unknown> | null> {
    if (signal?.aborted) {
      throw new AbortedError();
    }

    const query: Document = { ...filter };
    const cursor = this.client
      .db(database)
      .collection(collection)
      .find(query, { sort, limit: 1, maxTimeMS: timeoutMs, projection: { _id: 0 } });

    let onAbort = (): void => undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(new AbortedError());
    });
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await Promise.race([cursor.next(), aborted]);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await cursor.close();
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
