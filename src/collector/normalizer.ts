import type { FieldMapping, FieldType, FieldValue, NormalizationTable, NormalizedRecord, RawRecord } from "@/common/types/core";
import { getPath, isPlainObject } from "@/common/utils/template.utils";
import { NormalizationError } from "@/error-handling/pipeline.errors";

export interface NormalizationContext {
  symbol: string;
  requestId: string;
  attempt: number;
}

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const TRUE_WORDS = new Set(["true", "1", "yes", "y"]);
const FALSE_WORDS = new Set(["false", "0", "no", "n"]);

// Epoch values below this are taken as seconds (1e11 s is the year 5138)
const EPOCH_SECONDS_LIMIT = 1e11;

/**
 * Map a raw payload onto canonical fields using the source's table.
 *
 * Missing values become null. Values that cannot be coerced to the declared type are kept as
 * given so that consistency scoring can see them. Throws NormalizationError when the payload has
 * nothing usable: it is not an object, a mapped value is structured, or no mapped field is present.
 */
export function normalizeRecord(raw: RawRecord, table: NormalizationTable, context: NormalizationContext): NormalizedRecord {
  const { payload } = raw;
  if (!isPlainObject(payload)) {
    throw new NormalizationError(`Payload from ${raw.sourceId} is not an object`, {
      context: { sourceId: raw.sourceId },
    });
  }

  const fields: Record<string, FieldValue> = {};
  let present = 0;

  for (const mapping of table.fields) {
    const value = readField(payload, mapping, raw.sourceId);
    fields[mapping.target] = value;
    if (value !== null) present++;
  }

  if (present === 0) {
    throw new NormalizationError(`Payload from ${raw.sourceId} contains none of the mapped fields`, {
      context: { sourceId: raw.sourceId, mapped: table.fields.map(mapping => mapping.source) },
    });
  }

  return Object.freeze({
    symbol: context.symbol,
    fields: Object.freeze(fields),
    observedAt: observedAtOf(table.fields, fields),
    unit: table.unit,
    provenance: Object.freeze({
      sourceId: raw.sourceId,
      requestId: context.requestId,
      fetchedAt: raw.fetchedAt,
      latencyMs: raw.latencyMs,
      attempt: context.attempt,
    }),
  });
}

function readField(payload: Record<string, unknown>, mapping: FieldMapping, sourceId: string): FieldValue {
  const value = getPath(payload, mapping.source);

  if (value === undefined || value === null) {
    return null;
  }
  if (value instanceof Date) {
    return mapping.type === "string" ? value.toISOString() : value.getTime();
  }
  if (typeof value === "object") {
    throw new NormalizationError(`Field "${mapping.target}" (${mapping.source}) from ${sourceId} is not a scalar`, {
      context: { sourceId, field: mapping.target },
    });
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return coerceValue(value, mapping.type);
  }
  // bigint, symbol, function
  return String(value);
}

/**
 * Coerce a scalar to the declared type, or return it unchanged when it does not fit
 */
export function coerceValue(value: string | number | boolean, type: FieldType): FieldValue {
  switch (type) {
    case "number":
      return toNumber(value) ?? value;
    case "string":
      return typeof value === "string" ? value : String(value);
    case "boolean":
      return toBoolean(value) ?? value;
    case "timestamp":
      return toEpochMs(value) ?? value;
  }
}

function toNumber(value: string | number | boolean): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const cleaned = value.trim().replace(/,/g, "");
    return NUMERIC_PATTERN.test(cleaned) ? Number(cleaned) : null;
  }
  return null;
}

function toBoolean(value: string | number | boolean): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") {
    return value === 1 ? true : value === 0 ? false : null;
  }
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return null;
}

function toEpochMs(value: string | number | boolean): number | null {
  if (typeof value === "boolean") return null;

  const numeric = toNumber(value);
  if (numeric !== null) {
    return Math.round(Math.abs(numeric) < EPOCH_SECONDS_LIMIT ? numeric * 1000 : numeric);
  }

  const parsed = Date.parse(String(value));
  return Number.isNaN(parsed) ? null : parsed;
}

function observedAtOf(mappings: readonly FieldMapping[], fields: Record<string, FieldValue>): number | null {
  const preferred = mappings.find(mapping => mapping.type === "timestamp" && mapping.target === "timestamp");
  const candidates = preferred ? [preferred] : mappings.filter(mapping => mapping.type === "timestamp");

  for (const mapping of candidates) {
    const value = fields[mapping.target];
    if (typeof value === "number") return value;
  }
  return null;
}
