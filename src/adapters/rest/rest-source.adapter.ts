import axios, { type AxiosInstance } from "axios";
import type { RestSourceOptions } from "@/common/types/adapters";
import type { CollectionRequest, FetchOptions, Primitive } from "@/common/types/core";
import { toError } from "@/common/utils/error.utils";
import { renderTemplate } from "@/common/utils/template.utils";
import { SourceMalformedError } from "@/error-handling/pipeline.errors";
import { BaseSourceAdapter } from "../base/base-source-adapter";

export type HttpClient = Pick<AxiosInstance, "get">;

/**
 * JSON over HTTP GET. The body is read as text so unparsable payloads surface as SourceMalformedError.
 */
export class RestSourceAdapter extends BaseSourceAdapter {
  readonly kind = "rest" as const;
  private readonly http: HttpClient;

  constructor(
    sourceId: string,
    private readonly options: RestSourceOptions,
    http?: HttpClient
  ) {
    super(sourceId);
    this.http = http ?? axios.create({ baseURL: options.baseUrl });
  }

  protected async doFetch(request: CollectionRequest, { signal, timeoutMs }: FetchOptions): Promise<Record<string, unknown>> {
    const values = this.templateValues(request);
    const path = renderTemplate(this.options.path, values, true);

    const response = await this.http.get<unknown>(path, {
      params: this.buildParams(request, values),
      headers: this.buildHeaders(),
      responseType: "text",
      signal,
      timeout: timeoutMs,
    });

    return this.toPayload(this.parseBody(response.data), this.options.dataPath);
  }

  private buildParams(request: CollectionRequest, values: Record<string, Primitive>): Record<string, Primitive> {
    const params: Record<string, Primitive> = {};
    for (const [key, value] of Object.entries(this.options.query ?? {})) {
      params[key] = typeof value === "string" ? renderTemplate(value, values) : value;
    }
    for (const [key, value] of Object.entries(request.parameters)) {
      if (value !== null) params[key] = value;
    }
    return params;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json", ...this.options.headers };
    const apiKey = this.options.apiKeyEnv ? process.env[this.options.apiKeyEnv] : undefined;
    if (apiKey) {
      headers.Authorization = `Bearer ${apiKey}`;
    }
    return headers;
  }

  private parseBody(data: unknown): unknown {
    if (typeof data !== "string") {
      return data;
    }
    try {
      return JSON.parse(data);
    } catch (error) {
      throw new SourceMalformedError(`${this.sourceId} returned invalid JSON: ${toError(error).message}`, this.sourceId, {
        cause: error,
      });
    }
  }
}
