import { readFileSync } from "fs";
import type {
  DatabaseSourceOptions,
  RestSourceOptions,
  ScrapeFieldSelector,
  ScrapeSourceOptions,
  SourceDefinition,
  StreamSourceOptions,
} from "@/common/types/adapters";
import {
  FIELD_TYPES,
  SOURCE_KINDS,
  type FieldMapping,
  type FieldRule,
  type FieldType,
  type NormalizationTable,
  type Primitive,
  type RecordSchema,
  type SourceKind,
} from "@/common/types/core";
import type { RateLimitConfig } from "@/common/types/rate-limiting";
import { toError } from "@/common/utils/error.utils";
import { isPlainObject } from "@/common/utils/template.utils";
import { ConfigurationError } from "@/error-handling/pipeline.errors";

export interface SourcesFile {
  sources: SourceDefinition[];
  schemas: RecordSchema[];
}

type JsonObject = Record<string, unknown>;

/**
 * Reads typed values out of one JSON object, recording a problem for each bad key
 */
class ObjectReader {
  constructor(
    readonly value: JsonObject,
    private readonly path: string,
    private readonly problems: string[]
  ) {}

  problem(message: string): void {
    this.problems.push(`${this.path}: ${message}`);
  }

  child(key: string): ObjectReader | undefined {
    const value = this.value[key];
    if (value === undefined) return undefined;
    if (!isPlainObject(value)) {
      this.problem(`${key} must be an object`);
      return undefined;
    }
    return new ObjectReader(value, `${this.path}.${key}`, this.problems);
  }

  string(key: string, required: true): string;
  string(key: string, required?: boolean): string | undefined;
  string(key: string, required = false): string | undefined {
    const value = this.value[key];
    if (typeof value === "string" && value.trim() !== "") return value;
    if (value !== undefined || required) this.problem(`${key} must be a non-empty string`);
    return required ? "" : undefined;
  }

  number(key: string): number | undefined {
    const value = this.value[key];
    if (value === undefined) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    this.problem(`${key} must be a finite number`);
    return undefined;
  }

  boolean(key: string): boolean | undefined {
    const value = this.value[key];
    if (value === undefined) return undefined;
    if (typeof value === "boolean") return value;
    this.problem(`${key} must be a boolean`);
    return undefined;
  }

  primitives(key: string): Record<string, Primitive> | undefined {
    const reader = this.child(key);
    if (!reader) return undefined;

    const result: Record<string, Primitive> = {};
    for (const [name, value] of Object.entries(reader.value)) {
      if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        result[name] = value;
      } else {
        reader.problem(`${name} must be a string, number, boolean or null`);
      }
    }
    return result;
  }

  strings(key: string): Record<string, string> | undefined {
    const reader = this.child(key);
    if (!reader) return undefined;

    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(reader.value)) {
      if (typeof value === "string") {
        result[name] = value;
      } else {
        reader.problem(`${name} must be a string`);
      }
    }
    return result;
  }

  objects(key: string): ObjectReader[] {
    const value = this.value[key];
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      this.problem(`${key} must be an array`);
      return [];
    }

    const readers: ObjectReader[] = [];
    value.forEach((item: unknown, index: number) => {
      if (isPlainObject(item)) {
        readers.push(new ObjectReader(item, `${this.path}.${key}[${index}]`, this.problems));
      } else {
        this.problem(`${key}[${index}] must be an object`);
      }
    });
    return readers;
  }
}

function isSourceKind(value: unknown): value is SourceKind {
  return SOURCE_KINDS.some(kind => kind === value);
}

function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some(type => type === value);
}

function readFieldType(reader: ObjectReader): FieldType {
  const type = reader.value.type;
  if (isFieldType(type)) return type;
  reader.problem(`type must be one of ${FIELD_TYPES.join(", ")}`);
  return "string";
}

function readRateLimit(reader: ObjectReader | undefined): RateLimitConfig | undefined {
  if (!reader) return undefined;
  const ratePerSecond = reader.number("ratePerSecond");
  const burst = reader.number("burst");
  if (ratePerSecond === undefined || burst === undefined) {
    reader.problem("ratePerSecond and burst are both required");
    return undefined;
  }
  return { ratePerSecond, burst };
}

function readNormalization(reader: ObjectReader | undefined, owner: ObjectReader): NormalizationTable {
  if (!reader) {
    owner.problem("normalization is required");
    return { fields: [] };
  }

  const fields: FieldMapping[] = reader.objects("fields").map(field => ({
    target: field.string("target", true),
    source: field.string("source") ?? field.string("target", true),
    type: readFieldType(field),
  }));
  if (fields.length === 0) {
    reader.problem("fields must list at least one mapping");
  }
  return { fields, unit: reader.string("unit") };
}

function readSort(reader: ObjectReader | undefined): Record<string, 1 | -1> | undefined {
  if (!reader) return undefined;
  const sort: Record<string, 1 | -1> = {};
  for (const [field, direction] of Object.entries(reader.value)) {
    if (direction === 1 || direction === -1) {
      sort[field] = direction;
    } else {
      reader.problem(`${field} must be 1 or -1`);
    }
  }
  return sort;
}

function readRest(reader: ObjectReader): RestSourceOptions {
  return {
    baseUrl: reader.string("baseUrl", true),
    path: reader.string("path", true),
    query: reader.primitives("query"),
    headers: reader.strings("headers"),
    apiKeyEnv: reader.string("apiKeyEnv"),
    dataPath: reader.string("dataPath"),
  };
}

function readDatabase(reader: ObjectReader): DatabaseSourceOptions {
  return {
    uriEnv: reader.string("uriEnv", true),
    database: reader.string("database", true),
    collection: reader.string("collection", true),
    filter: reader.primitives("filter") ?? {},
    sort: readSort(reader.child("sort")),
  };
}

function readScrape(reader: ObjectReader): ScrapeSourceOptions {
  const fields: Record<string, ScrapeFieldSelector> = {};
  const fieldsReader = reader.child("fields");
  if (!fieldsReader) {
    reader.problem("fields is required");
  } else {
    for (const name of Object.keys(fieldsReader.value)) {
      const selector = fieldsReader.child(name);
      if (selector) {
        fields[name] = { selector: selector.string("selector", true), attribute: selector.string("attribute") };
      }
    }
  }

  return {
    url: reader.string("url", true),
    rowSelector: reader.string("rowSelector", true),
    fields,
    headers: reader.strings("headers"),
  };
}

function readStream(reader: ObjectReader): StreamSourceOptions {
  return {
    url: reader.string("url", true),
    subscribeMessage: reader.child("subscribeMessage")?.value,
    symbolField: reader.string("symbolField"),
    dataPath: reader.string("dataPath"),
  };
}

function readSource(reader: ObjectReader): SourceDefinition | undefined {
  const kind = reader.value.kind;
  if (!isSourceKind(kind)) {
    reader.problem(`kind must be one of ${SOURCE_KINDS.join(", ")}`);
    return undefined;
  }

  const base = {
    id: reader.string("id", true),
    description: reader.string("description"),
    enabled: reader.boolean("enabled"),
    timeoutMs: reader.number("timeoutMs"),
    rateLimit: readRateLimit(reader.child("rateLimit")),
    schemaName: reader.string("schemaName"),
    normalization: readNormalization(reader.child("normalization"), reader),
  };

  const options = reader.child(kind);
  if (!options) {
    reader.problem(`${kind} options are required`);
    return undefined;
  }

  switch (kind) {
    case "rest":
      return { ...base, kind, rest: readRest(options) };
    case "database":
      return { ...base, kind, database: readDatabase(options) };
    case "scrape":
      return { ...base, kind, scrape: readScrape(options) };
    case "stream":
      return { ...base, kind, stream: readStream(options) };
  }
}

function readSchema(reader: ObjectReader): RecordSchema {
  const fields: FieldRule[] = reader.objects("fields").map(field => ({
    name: field.string("name", true),
    type: readFieldType(field),
    required: field.boolean("required"),
    min: field.number("min"),
    max: field.number("max"),
    pattern: field.string("pattern"),
    maxAgeMs: field.number("maxAgeMs"),
    maxFutureSkewMs: field.number("maxFutureSkewMs"),
  }));

  return {
    name: reader.string("name", true),
    fields,
    referenceField: reader.string("referenceField"),
  };
}

/**
 * Turn the parsed contents of a sources file into typed definitions. All problems are
 * reported together in one ConfigurationError.
 */
export function parseSourcesFile(raw: unknown, origin = "sources"): SourcesFile {
  const problems: string[] = [];
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`${origin} must contain a JSON object`);
  }

  const root = new ObjectReader(raw, origin, problems);
  const sources = root
    .objects("sources")
    .map(readSource)
    .filter((source): source is SourceDefinition => source !== undefined);
  const schemas = root.objects("schemas").map(readSchema);

  const seen = new Set<string>();
  for (const source of sources) {
    const key = source.id.toLowerCase();
    if (seen.has(key)) problems.push(`${origin}: duplicate source id "${source.id}"`);
    seen.add(key);

    if (source.schemaName && !schemas.some(schema => schema.name === source.schemaName)) {
      problems.push(`${origin}: source "${source.id}" refers to unknown schema "${source.schemaName}"`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid source configuration: ${problems.join("; ")}`, problems);
  }
  return { sources, schemas };
}

export function loadSourcesFile(path: string): SourcesFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read source configuration from ${path}: ${toError(error).message}`);
  }
  return parseSourcesFile(raw, path);
}
