import { z } from "zod";
import type { MetadataValue, RecipeMetadata } from "../types/contracts.js";

type Scalar = string | number | boolean | null;

export type FilterPredicate =
  | { op: "equals"; value: Scalar }
  | { op: "in"; values: Scalar[] }
  | { op: "contains"; value: string }
  | { op: "not_contains"; values: string[] };

export type MetadataFilter = Record<string, FilterPredicate>;

export const equals = (value: Scalar): FilterPredicate => ({ op: "equals", value });
export const isIn = (values: Scalar[]): FilterPredicate => ({ op: "in", values });
export const contains = (value: string): FilterPredicate => ({ op: "contains", value });
export const notContains = (values: string[]): FilterPredicate => ({ op: "not_contains", values });

export function matchesFilter(metadata: RecipeMetadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([field, predicate]) =>
    matchesPredicate(Object.hasOwn(metadata, field) ? metadata[field] : undefined, predicate)
  );
}

export function matchesPredicate(fieldValue: MetadataValue | undefined, predicate: FilterPredicate): boolean {
  switch (predicate.op) {
    case "not_contains":
      if (fieldValue === undefined || fieldValue === null) return true;
      return !predicate.values.some((value) => fieldHolds(fieldValue, value));
    case "equals":
      return fieldValue !== undefined && fieldValue === predicate.value;
    case "in":
      if (fieldValue === undefined) return false;
      if (Array.isArray(fieldValue)) {
        return predicate.values.some((value) => typeof value === "string" && fieldValue.includes(value));
      }
      return predicate.values.includes(fieldValue);
    case "contains":
      if (fieldValue === undefined || fieldValue === null) return false;
      return fieldHolds(fieldValue, predicate.value);
    default:
      return assertNever(predicate);
  }
}

function fieldHolds(fieldValue: Exclude<MetadataValue, null>, value: string): boolean {
  if (Array.isArray(fieldValue)) return fieldValue.includes(value);
  if (typeof fieldValue === "string") return fieldValue.includes(value);
  return false;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled filter predicate: ${JSON.stringify(value)}`);
}

// Wire form: { field: "x" | { $in: [...] } | { $contains: "x" } | { $not_contains: [...] } }

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const wirePredicateSchema = z.union([
  z.object({ $in: z.array(scalarSchema) }).strict(),
  z.object({ $contains: z.string() }).strict(),
  z.object({ $not_contains: z.union([z.array(z.string()), z.string()]) }).strict(),
  scalarSchema
]);

export const wireFilterSchema = z.record(wirePredicateSchema);

export type WireFilter = z.infer<typeof wireFilterSchema>;

export function parseFilter(input: unknown): MetadataFilter {
  const wire = wireFilterSchema.parse(input);
  const filter: MetadataFilter = {};
  for (const [field, constraint] of Object.entries(wire)) {
    filter[field] = toPredicate(constraint);
  }
  return filter;
}

function toPredicate(constraint: WireFilter[string]): FilterPredicate {
  if (constraint === null || typeof constraint !== "object") {
    return equals(constraint);
  }
  if ("$in" in constraint) {
    return isIn(constraint.$in);
  }
  if ("$contains" in constraint) {
    return contains(constraint.$contains);
  }
  const excluded = constraint.$not_contains;
  return notContains(typeof excluded === "string" ? [excluded] : excluded);
}
