import { FIELD_TYPES, type FieldRule, type RecordSchema } from "@/common/types/core";
import { SchemaError } from "@/error-handling/pipeline.errors";

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function ruleProblems(rule: FieldRule, index: number): string[] {
  const problems: string[] = [];
  const label = rule.name ? `field "${rule.name}"` : `field #${index}`;

  if (typeof rule.name !== "string" || rule.name.trim() === "") {
    problems.push(`${label}: name must be a non-empty string`);
  }
  if (!FIELD_TYPES.includes(rule.type)) {
    problems.push(`${label}: unknown type "${String(rule.type)}"`);
  }

  for (const bound of ["min", "max"] as const) {
    const value = rule[bound];
    if (value === undefined) continue;
    if (!isFiniteNumber(value)) {
      problems.push(`${label}: ${bound} must be a finite number`);
    } else if (rule.type !== "number") {
      problems.push(`${label}: ${bound} only applies to number fields`);
    }
  }
  if (isFiniteNumber(rule.min) && isFiniteNumber(rule.max) && rule.min > rule.max) {
    problems.push(`${label}: min (${rule.min}) is greater than max (${rule.max})`);
  }

  if (rule.pattern !== undefined) {
    if (rule.type !== "string") {
      problems.push(`${label}: pattern only applies to string fields`);
    }
    try {
      new RegExp(rule.pattern);
    } catch (error) {
      problems.push(`${label}: invalid pattern (${error instanceof Error ? error.message : String(error)})`);
    }
  }

  for (const window of ["maxAgeMs", "maxFutureSkewMs"] as const) {
    const value = rule[window];
    if (value === undefined) continue;
    if (!isFiniteNumber(value) || value < 0) {
      problems.push(`${label}: ${window} must be a non-negative number`);
    } else if (rule.type !== "timestamp") {
      problems.push(`${label}: ${window} only applies to timestamp fields`);
    }
  }

  return problems;
}

/**
 * Every structural problem with a schema; empty when it is usable
 */
export function schemaProblems(schema: RecordSchema): string[] {
  const problems: string[] = [];

  if (typeof schema.name !== "string" || schema.name.trim() === "") {
    problems.push("schema name must be a non-empty string");
  }
  if (!Array.isArray(schema.fields) || schema.fields.length === 0) {
    problems.push("schema must declare at least one field");
    return problems;
  }

  const seen = new Set<string>();
  schema.fields.forEach((rule, index) => {
    problems.push(...ruleProblems(rule, index));
    if (seen.has(rule.name)) {
      problems.push(`field "${rule.name}" is declared more than once`);
    }
    seen.add(rule.name);
  });

  if (schema.referenceField !== undefined) {
    const reference = schema.fields.find(rule => rule.name === schema.referenceField);
    if (!reference) {
      problems.push(`referenceField "${schema.referenceField}" is not declared`);
    } else if (reference.type !== "number") {
      problems.push(`referenceField "${schema.referenceField}" must be a number field`);
    }
  }

  return problems;
}

export function assertValidSchema(schema: RecordSchema): void {
  const problems = schemaProblems(schema);
  if (problems.length > 0) {
    throw new SchemaError(`Schema "${schema.name}" is invalid: ${problems.join("; ")}`, problems);
  }
}
