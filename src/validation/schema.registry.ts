import type { RecordSchema } from "@/common/types/core";
import { assertValidSchema } from "./schema";

/**
 * Named record schemas. Schemas are checked when registered, so lookups hand out valid ones only.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, RecordSchema>();

  constructor(schemas: readonly RecordSchema[] = []) {
    schemas.forEach(schema => this.register(schema));
  }

  register(schema: RecordSchema): void {
    assertValidSchema(schema);
    this.schemas.set(schema.name, schema);
  }

  get(name: string): RecordSchema | undefined {
    return this.schemas.get(name);
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  list(): RecordSchema[] {
    return [...this.schemas.values()];
  }
}
