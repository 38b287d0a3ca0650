import { AxiosError, AxiosHeaders } from "axios";
import { RestSourceAdapter } from "../rest-source.adapter";
import type { RestSourceOptions } from "@/common/types/adapters";
import { SourceMalformedError, SourceRejectedError, SourceUnavailableError } from "@/error-handling/pipeline.errors";
import { MockFactory, TestDataBuilder } from "@/__tests__/utils";

function httpError(status: number): AxiosError {
  const error = new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE");
  error.response = { status, statusText: "", data: "", headers: {}, config: { headers: new AxiosHeaders() } };
  return error;
}

describe("RestSourceAdapter", () => {
  const options: RestSourceOptions = {
    baseUrl: "https://quotes.example.com",
    path: "/v1/quotes/{target}",
    query: { symbol: "{target}", format: "json", limit: 1 },
    headers: { "X-Client": "pipeline" },
    apiKeyEnv: "TEST_QUOTES_API_KEY",
    dataPath: "data",
  };
  const signal = new AbortController().signal;

  afterEach(() => {
    delete process.env.TEST_QUOTES_API_KEY;
  });

  it("should GET the rendered path with query, headers and the attempt timeout", async () => {
    process.env.TEST_QUOTES_API_KEY = "test-secret";
    const http = MockFactory.createHttpClient(JSON.stringify({ data: { last: 189.5 } }));
    const adapter = new RestSourceAdapter("quotes-api", options, http);
    const request = TestDataBuilder.createCollectionRequest({ target: "BRK B", parameters: { exchange: "XNYS", session: null } });

    const raw = await adapter.fetch(request, { signal, timeoutMs: 300 });

    expect(raw.payload).toEqual({ last: 189.5 });
    expect(http.get).toHaveBeenCalledWith("/v1/quotes/BRK%20B", {
      params: { symbol: "BRK B", format: "json", limit: 1, exchange: "XNYS" },
      headers: { Accept: "application/json", "X-Client": "pipeline", Authorization: "Bearer test-secret" },
      responseType: "text",
      signal,
      timeout: 300,
    });
  });

  it("should leave out the Authorization header when the key is not set", async () => {
    const http = MockFactory.createHttpClient(JSON.stringify({ data: { last: 1 } }));
    const adapter = new RestSourceAdapter("quotes-api", options, http);

    await adapter.fetch(TestDataBuilder.createCollectionRequest(), { signal });

    expect(http.get.mock.calls[0][1].headers).toEqual({ Accept: "application/json", "X-Client": "pipeline" });
  });

  it("should accept a body the client already decoded", async () => {
    const http = MockFactory.createHttpClient({ data: { last: 2 } });
    const adapter = new RestSourceAdapter("quotes-api", options, http);

    await expect(adapter.fetch(TestDataBuilder.createCollectionRequest(), { signal })).resolves.toMatchObject({
      payload: { last: 2 },
    });
  });

  it("should report an unparsable body as malformed", async () => {
    const adapter = new RestSourceAdapter("quotes-api", options, MockFactory.createHttpClient("<html>maintenance</html>"));

    const failure = adapter.fetch(TestDataBuilder.createCollectionRequest(), { signal });

    await expect(failure).rejects.toBeInstanceOf(SourceMalformedError);
    await expect(failure).rejects.toThrow("quotes-api returned invalid JSON");
  });

  it("should map server errors to unavailable and client errors to rejected", async () => {
    const request = TestDataBuilder.createCollectionRequest();

    await expect(
      new RestSourceAdapter("quotes-api", options, MockFactory.createFailingHttpClient(httpError(503))).fetch(request, { signal })
    ).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(
      new RestSourceAdapter("quotes-api", options, MockFactory.createFailingHttpClient(httpError(429))).fetch(request, { signal })
    ).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(
      new RestSourceAdapter("quotes-api", options, MockFactory.createFailingHttpClient(httpError(401))).fetch(request, { signal })
    ).rejects.toThrow(new SourceRejectedError("quotes-api responded with HTTP 401", "quotes-api"));
  });
});
