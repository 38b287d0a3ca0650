import { assertValidSchema, schemaProblems } from "../schema";
import { SchemaRegistry } from "../schema.registry";
import type { FieldType, RecordSchema } from "@/common/types/core";
import { SchemaError } from "@/error-handling/pipeline.errors";
import { TestDataBuilder } from "@/__tests__/utils";

describe("schemaProblems", () => {
  it("should accept a well-formed schema", () => {
    expect(schemaProblems(TestDataBuilder.createMarketSchema())).toEqual([]);
  });

  it("should require a name and at least one field", () => {
    expect(schemaProblems({ name: "", fields: [] })).toEqual([
      "schema name must be a non-empty string",
      "schema must declare at least one field",
    ]);
  });

  it("should reject rules that do not fit the field type", () => {
    const schema: RecordSchema = {
      name: "broken",
      fields: [
        { name: "price", type: "number", min: 10, max: 1 },
        { name: "ticker", type: "string", min: 1, pattern: "([A-Z" },
        { name: "updated", type: "timestamp", maxAgeMs: -5 },
        { name: "halted", type: "boolean", maxFutureSkewMs: 100 },
      ],
    };

    expect(schemaProblems(schema)).toEqual([
      'field "price": min (10) is greater than max (1)',
      'field "ticker": min only applies to number fields',
      expect.stringMatching(/^field "ticker": invalid pattern \(/),
      'field "updated": maxAgeMs must be a non-negative number',
      'field "halted": maxFutureSkewMs only applies to timestamp fields',
    ]);
  });

  it("should reject unknown types and duplicate names", () => {
    const unknownType: FieldType = JSON.parse('"decimal"');
    const schema: RecordSchema = {
      name: "dupes",
      fields: [
        { name: "price", type: "number" },
        { name: "price", type: unknownType },
      ],
    };

    expect(schemaProblems(schema)).toEqual(['field "price": unknown type "decimal"', 'field "price" is declared more than once']);
  });

  it("should require the reference field to be a declared number", () => {
    expect(schemaProblems(TestDataBuilder.createMarketSchema({ referenceField: "bid" }))).toEqual([
      'referenceField "bid" is not declared',
    ]);
    expect(schemaProblems(TestDataBuilder.createMarketSchema({ referenceField: "timestamp" }))).toEqual([
      'referenceField "timestamp" must be a number field',
    ]);
  });

  it("should throw SchemaError listing the problems", () => {
    let caught: unknown;
    try {
      assertValidSchema({ name: "empty", fields: [] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught).toMatchObject({
      message: 'Schema "empty" is invalid: schema must declare at least one field',
      problems: ["schema must declare at least one field"],
    });
  });
});

describe("SchemaRegistry", () => {
  it("should register valid schemas and look them up by name", () => {
    const registry = new SchemaRegistry([TestDataBuilder.createMarketSchema()]);

    expect(registry.has("market-quote")).toBe(true);
    expect(registry.get("market-quote")?.referenceField).toBe("price");
    expect(registry.list().map(schema => schema.name)).toEqual(["market-quote"]);
  });

  it("should refuse an invalid schema", () => {
    const registry = new SchemaRegistry();

    expect(() => registry.register({ name: "empty", fields: [] })).toThrow(SchemaError);
    expect(registry.has("empty")).toBe(false);
  });
});
