import { z } from "zod";
import type { JsonObject, JsonValue, MetadataMap, MetadataValue } from "@docent/shared";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export function fromJson(value: JsonValue): MetadataValue {
  if (value === null) {
    return { kind: "null" };
  }
  if (Array.isArray(value)) {
    return { kind: "list", items: value.map(fromJson) };
  }
  switch (typeof value) {
    case "string":
      return { kind: "string", value };
    case "number":
      return { kind: "number", value };
    case "boolean":
      return { kind: "boolean", value };
    default:
      return { kind: "map", entries: fromJsonObject(value) };
  }
}

export function fromJsonObject(object: JsonObject): MetadataMap {
  const entries: MetadataMap = {};
  for (const [key, value] of Object.entries(object)) {
    entries[key] = fromJson(value);
  }
  return entries;
}

export function toJson(value: MetadataValue): JsonValue {
  switch (value.kind) {
    case "null":
      return null;
    case "string":
    case "number":
    case "boolean":
      return value.value;
    case "list":
      return value.items.map(toJson);
    case "map":
      return toJsonObject(value.entries);
  }
}

export function toJsonObject(map: MetadataMap): JsonObject {
  const object: JsonObject = {};
  for (const [key, value] of Object.entries(map)) {
    object[key] = toJson(value);
  }
  return object;
}

/** Parses a stored JSON column; anything but an object is rejected. */
export function parseMetadataJson(raw: string): MetadataMap {
  const parsed = jsonObjectSchema.parse(JSON.parse(raw));
  return fromJsonObject(parsed);
}

export function stringifyMetadata(map: MetadataMap): string {
  return JSON.stringify(toJsonObject(map));
}

export function metadataEquals(a: MetadataValue, b: MetadataValue): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "string":
    case "number":
    case "boolean":
      return b.kind === a.kind && b.value === a.value;
    case "list":
      return (
        b.kind === "list" &&
        a.items.length === b.items.length &&
        a.items.every((item, index) => {
          const other = b.items[index];
          return other !== undefined && metadataEquals(item, other);
        })
      );
    case "map": {
      if (b.kind !== "map") {
        return false;
      }
      const keys = Object.keys(a.entries);
      if (keys.length !== Object.keys(b.entries).length) {
        return false;
      }
      return keys.every((key) => {
        const left = a.entries[key];
        const right = b.entries[key];
        return left !== undefined && right !== undefined && metadataEquals(left, right);
      });
    }
  }
}

/**
 * JSONB-style containment: `candidate` contains `filter` when every key of
 * a filter map is present with a contained value, and every element of a
 * filter list is contained in some element of the candidate list. A list
 * also contains a bare scalar it holds.
 */
export function metadataContains(candidate: MetadataValue, filter: MetadataValue): boolean {
  switch (filter.kind) {
    case "map":
      return candidate.kind === "map" && mapContains(candidate.entries, filter.entries);
    case "list":
      return (
        candidate.kind === "list" &&
        filter.items.every((wanted) =>
          candidate.items.some((item) => metadataContains(item, wanted))
        )
      );
    default:
      if (candidate.kind === "list") {
        return candidate.items.some((item) => metadataEquals(item, filter));
      }
      return metadataEquals(candidate, filter);
  }
}

export function mapContains(candidate: MetadataMap, filter: MetadataMap): boolean {
  return Object.entries(filter).every(([key, wanted]) => {
    const actual = candidate[key];
    return actual !== undefined && metadataContains(actual, wanted);
  });
}

export function stringList(values: string[]): MetadataValue {
  return {
    kind: "list",
    items: values.map((value) => ({ kind: "string", value }))
  };
}
