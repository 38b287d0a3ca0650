/**
 * Canonical record shape produced by normalization
 */

export type FieldValue = string | number | boolean | null;

export type FieldType = "number" | "string" | "boolean" | "timestamp";

export const FIELD_TYPES: readonly FieldType[] = ["number", "string", "boolean", "timestamp"];

export interface Provenance {
  sourceId: string;
  requestId: string;
  fetchedAt: number;
  latencyMs: number;
  /** Attempt number (1-based) that produced the raw record */
  attempt: number;
}

export interface NormalizedRecord {
  readonly symbol: string;
  readonly fields: Readonly<Record<string, FieldValue>>;
  /** Epoch ms of the canonical `timestamp` field, when it could be read */
  readonly observedAt: number | null;
  readonly unit?: string;
  readonly provenance: Readonly<Provenance>;
}

/**
 * One row of a source's normalization table.
 */
export interface FieldMapping {
  /** Canonical field name */
  target: string;
  /** Dot path into the raw payload */
  source: string;
  type: FieldType;
}

export interface NormalizationTable {
  fields: FieldMapping[];
  unit?: string;
}
