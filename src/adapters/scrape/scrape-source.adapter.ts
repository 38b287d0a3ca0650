import axios from "axios";
import * as cheerio from "cheerio";
import type { ScrapeSourceOptions } from "@/common/types/adapters";
import type { CollectionRequest, FetchOptions } from "@/common/types/core";
import { renderTemplate } from "@/common/utils/template.utils";
import { SourceMalformedError } from "@/error-handling/pipeline.errors";
import { BaseSourceAdapter } from "../base/base-source-adapter";
import type { HttpClient } from "../rest/rest-source.adapter";

/**
 * Pulls one row out of an HTML page. Fields whose selector matches nothing are left out of the payload.
 */
export class ScrapeSourceAdapter extends BaseSourceAdapter {
  readonly kind = "scrape" as const;
  private readonly http: HttpClient;

  constructor(
    sourceId: string,
    private readonly options: ScrapeSourceOptions,
    http?: HttpClient
  ) {
    super(sourceId);
    this.http = http ?? axios.create();
  }

  protected async doFetch(request: CollectionRequest, { signal, timeoutMs }: FetchOptions): Promise<Record<string, unknown>> {
    const values = this.templateValues(request);
    const url = renderTemplate(this.options.url, values, true);

    const response = await this.http.get<unknown>(url, {
      headers: { Accept: "text/html", ...this.options.headers },
      responseType: "text",
      signal,
      timeout: timeoutMs,
    });

    if (typeof response.data !== "string") {
      throw new SourceMalformedError(`${this.sourceId} did not return an HTML document`, this.sourceId);
    }
    return this.extract(cheerio.load(response.data), renderTemplate(this.options.rowSelector, values), request.target);
  }

  private extract($: cheerio.CheerioAPI, rowSelector: string, target: string): Record<string, unknown> {
    const row = $(rowSelector).first();
    if (row.length === 0) {
      throw new SourceMalformedError(`${this.sourceId} page has no row for "${target}"`, this.sourceId, {
        context: { rowSelector },
      });
    }

    const payload: Record<string, unknown> = {};
    for (const [field, { selector, attribute }] of Object.entries(this.options.fields)) {
      const element = row.find(selector).first();
      if (element.length === 0) continue;

      const value = attribute ? element.attr(attribute) : element.text().trim();
      if (value !== undefined && value !== "") {
        payload[field] = value;
      }
    }
    return payload;
  }
}
