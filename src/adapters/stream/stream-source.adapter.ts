import WebSocket from "ws";
import type { StreamSourceOptions } from "@/common/types/adapters";
import type { CollectionRequest, FetchOptions } from "@/common/types/core";
import { AbortedError } from "@/common/utils/async.utils";
import { toError } from "@/common/utils/error.utils";
import { getPath, renderDeep, renderTemplate } from "@/common/utils/template.utils";
import { SourceMalformedError, SourceUnavailableError } from "@/error-handling/pipeline.errors";
import { BaseSourceAdapter } from "../base/base-source-adapter";

/**
 * Opens a socket per fetch, sends the optional subscription and resolves with the first
 * message for the requested target. The socket is closed as soon as the fetch settles.
 */
export class StreamSourceAdapter extends BaseSourceAdapter {
  readonly kind = "stream" as const;

  constructor(
    sourceId: string,
    private readonly options: StreamSourceOptions
  ) {
    super(sourceId);
  }

  protected doFetch(request: CollectionRequest, { signal }: FetchOptions): Promise<Record<string, unknown>> {
    const values = this.templateValues(request);
    const url = renderTemplate(this.options.url, values, true);

    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new AbortedError());
        return;
      }

      const ws = new WebSocket(url);
      let settled = false;

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        if (ws.readyState === WebSocket.OPEN) {
          ws.close(1000, "Fetch complete");
        } else if (ws.readyState === WebSocket.CONNECTING) {
          ws.terminate();
        }
        settle();
      };
      const onAbort = () => finish(() => reject(new AbortedError()));
      signal.addEventListener("abort", onAbort, { once: true });

      ws.on("open", () => {
        if (this.options.subscribeMessage) {
          ws.send(JSON.stringify(renderDeep(this.options.subscribeMessage, values)));
        }
      });

      ws.on("message", (data: WebSocket.RawData) => {
        if (settled) return;

        let message: unknown;
        try {
          message = JSON.parse(data.toString());
        } catch (error) {
          finish(() =>
            reject(
              new SourceMalformedError(`${this.sourceId} sent a non-JSON message`, this.sourceId, { cause: error })
            )
          );
          return;
        }

        if (!this.matchesTarget(message, request.target)) return;

        try {
          const payload = this.toPayload(message, this.options.dataPath);
          finish(() => resolve(payload));
        } catch (error) {
          finish(() => reject(error));
        }
      });

      ws.on("close", (code: number) => {
        finish(() =>
          reject(
            new SourceUnavailableError(`${this.sourceId} closed the stream (${code}) before sending data`, this.sourceId, {
              context: { code },
            })
          )
        );
      });

      ws.on("error", (error: Error) => {
        if (settled) {
          this.logDebug(`Socket error after fetch settled: ${error.message}`);
          return;
        }
        finish(() => reject(toError(error)));
      });
    });
  }

  private matchesTarget(message: unknown, target: string): boolean {
    if (!this.options.symbolField) {
      return true;
    }
    const symbol = getPath(message, this.options.symbolField);
    return typeof symbol === "string" && symbol.toUpperCase() === target.toUpperCase();
  }
}
