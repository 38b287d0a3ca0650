import { join } from "path";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { loadSourcesFile, parseSourcesFile } from "../sources.loader";

const restSource = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: "quotes-api",
  kind: "rest",
  rest: { baseUrl: "https://quotes.example.com", path: "/v1/quotes/{target}" },
  normalization: { fields: [{ target: "price", type: "number" }] },
  ...overrides,
});

const problemsOf = (raw: unknown): string[] => {
  try {
    parseSourcesFile(raw, "inline");
  } catch (error) {
    if (error instanceof ConfigurationError) return error.problems;
    throw error;
  }
  return [];
};

describe("parseSourcesFile", () => {
  it("should read a minimal rest source", () => {
    const { sources, schemas } = parseSourcesFile({ sources: [restSource()] }, "inline");

    expect(schemas).toEqual([]);
    expect(sources).toHaveLength(1);
    expect(sources[0]).toMatchObject({
      id: "quotes-api",
      kind: "rest",
      rest: { baseUrl: "https://quotes.example.com", path: "/v1/quotes/{target}" },
      normalization: { fields: [{ target: "price", source: "price", type: "number" }] },
    });
  });

  it("should refuse anything but an object at the top level", () => {
    expect(() => parseSourcesFile([], "inline")).toThrow("inline must contain a JSON object");
  });

  it("should report an unknown source kind", () => {
    expect(problemsOf({ sources: [restSource({ kind: "ftp" })] })).toEqual([
      "inline.sources[0]: kind must be one of rest, database, scrape, stream",
    ]);
  });

  it("should report every problem at once", () => {
    const problems = problemsOf({
      sources: [
        restSource({ rest: { path: "/v1" }, timeoutMs: "soon" }),
        restSource({ id: "Quotes-API", schemaName: "ledger" }),
      ],
    });

    expect(problems).toEqual([
      "inline.sources[0]: timeoutMs must be a finite number",
      "inline.sources[0].rest: baseUrl must be a non-empty string",
      'inline: duplicate source id "Quotes-API"',
      'inline: source "Quotes-API" refers to unknown schema "ledger"',
    ]);
  });

  it("should require a normalization table", () => {
    expect(problemsOf({ sources: [restSource({ normalization: undefined })] })).toEqual([
      "inline.sources[0]: normalization is required",
    ]);
  });

  it("should accept only 1 or -1 as a database sort direction", () => {
    const problems = problemsOf({
      sources: [
        {
          id: "quotes-archive",
          kind: "database",
          database: { uriEnv: "QUOTES_MONGO_URI", database: "market", collection: "quotes", sort: { timestamp: "desc" } },
          normalization: { fields: [{ target: "price", type: "number" }] },
        },
      ],
    });

    expect(problems).toEqual(["inline.sources[0].database.sort: timestamp must be 1 or -1"]);
  });
});

describe("loadSourcesFile", () => {
  it("should load the bundled definitions", () => {
    const { sources, schemas } = loadSourcesFile(join(__dirname, "..", "sources.json"));

    expect(sources.map(source => [source.id, source.kind])).toEqual([
      ["quotes-api", "rest"],
      ["quotes-archive", "database"],
      ["quotes-page", "scrape"],
      ["quotes-stream", "stream"],
    ]);
    expect(sources[3].enabled).toBe(false);
    expect(schemas.map(schema => schema.name)).toEqual(["market-quote"]);
    expect(schemas[0].fields[2]).toMatchObject({ name: "timestamp", type: "timestamp", maxAgeMs: 86400000 });
  });

  it("should wrap read failures in a ConfigurationError", () => {
    const path = join(__dirname, "missing-sources.json");

    expect(() => loadSourcesFile(path)).toThrow(ConfigurationError);
    expect(() => loadSourcesFile(path)).toThrow(`Cannot read source configuration from ${path}`);
  });
});
