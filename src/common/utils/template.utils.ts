import type { Primitive } from "../types/core";

/**
 * Replace `{name}` placeholders from `values`. Unknown placeholders are left as written.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, Primitive>>, encode = false): string {
  return template.replace(/\{([A-Za-z0-9_]+)\}/g, (match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, name)) {
      return match;
    }
    const rendered = String(values[name]);
    return encode ? encodeURIComponent(rendered) : rendered;
  });
}

/**
 * Render every string leaf of a JSON-like value
 */
export function renderDeep(value: unknown, values: Readonly<Record<string, Primitive>>): unknown {
  if (typeof value === "string") {
    return renderTemplate(value, values);
  }
  if (Array.isArray(value)) {
    return value.map(item => renderDeep(item, values));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, renderDeep(item, values)]));
  }
  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a dot path ("data.quote.price", "items.0.value") from a nested value
 */
export function getPath(source: unknown, path: string): unknown {
  if (path === "" || path === ".") {
    return source;
  }

  let current: unknown = source;
  for (const segment of path.split(".")) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isPlainObject(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}
