/**
 * Index specification contract
 *
 * Validates that a requested index is well-formed. Whether an index is needed is
 * not decided here.
 *
 * Index semantics:
 *  - Field order is significant and preserved exactly as given
 *  - An index on [a, b] serves selectors on a, or on a and b
 *  - It does not serve selectors on b alone; those may fall back to a full scan
 *  - Creating an identical index twice is a no-op on the backend ("exists")
 */

import { InvalidIndexSpecError } from "./errors.js";
import type { IndexKind, IndexSpec } from "./types.js";

const INDEX_KINDS: readonly IndexKind[] = ["json", "text"];

/**
 * Validate raw tool arguments into an index specification
 * @throws InvalidIndexSpecError
 */
export function resolveIndexSpec(args: {
  fields?: unknown;
  index_name?: unknown;
  type?: unknown;
}): IndexSpec {
  const { fields, index_name: name, type } = args;

  if (!Array.isArray(fields) || fields.length === 0) {
    throw new InvalidIndexSpecError("fields must be a non-empty array of field names");
  }

  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const field of fields) {
    if (typeof field !== "string" || field.trim().length === 0) {
      throw new InvalidIndexSpecError(
        `fields must contain non-empty strings, got ${JSON.stringify(field)}`
      );
    }
    if (seen.has(field)) {
      throw new InvalidIndexSpecError(`Field "${field}" appears more than once in the index`);
    }
    seen.add(field);
    ordered.push(field);
  }

  if (name !== undefined && (typeof name !== "string" || name.trim().length === 0)) {
    throw new InvalidIndexSpecError("index_name must be a non-empty string when provided");
  }

  let kind: IndexKind = "json";
  if (type !== undefined) {
    const match = INDEX_KINDS.find((k) => k === type);
    if (match === undefined) {
      throw new InvalidIndexSpecError(
        `type must be one of ${INDEX_KINDS.join(", ")}, got ${JSON.stringify(type)}`
      );
    }
    kind = match;
  }

  return name === undefined ? { fields: ordered, kind } : { fields: ordered, name, kind };
}

/**
 * Request body for POST /{db}/_index
 */
export function indexRequestBody(spec: IndexSpec): Record<string, unknown> {
  const fields =
    spec.kind === "text" ? spec.fields.map((name) => ({ name, type: "string" })) : spec.fields;
  const body: Record<string, unknown> = { index: { fields }, type: spec.kind };
  if (spec.name !== undefined) {
    body.name = spec.name;
  }
  return body;
}

/**
 * Field prefixes a json index can serve, shortest first
 * @example servablePrefixes(["type", "status"]) // [["type"], ["type", "status"]]
 */
export function servablePrefixes(indexFields: readonly string[]): string[][] {
  return indexFields.map((_, i) => indexFields.slice(0, i + 1));
}

/**
 * Whether a json index can serve a selector constrained on the given fields.
 * The leading index field must be constrained, and every constrained field the
 * index covers must belong to a contiguous prefix.
 */
export function servesFields(indexFields: readonly string[], selectorFields: readonly string[]): boolean {
  if (indexFields.length === 0 || !selectorFields.includes(indexFields[0])) {
    return false;
  }
  let prefixEnd = 0;
  while (prefixEnd < indexFields.length && selectorFields.includes(indexFields[prefixEnd])) {
    prefixEnd++;
  }
  return indexFields.slice(prefixEnd).every((f) => !selectorFields.includes(f));
}

/**
 * Human-readable note describing which query shapes an index serves
 */
export function describeCoverage(spec: IndexSpec): string {
  if (spec.kind === "text") {
    return `Text index on [${spec.fields.join(", ")}] serves full-text search queries, not Mango selectors.`;
  }

  const prefixes = servablePrefixes(spec.fields)
    .map((p) => p.join(" + "))
    .join("; ");
  const unserved = spec.fields.filter((f) => !servesFields(spec.fields, [f]));
  const note = `Index on [${spec.fields.join(", ")}] can serve selectors constrained on: ${prefixes}.`;
  if (unserved.length === 0) {
    return note;
  }
  return `${note} Selectors on ${unserved.join(", ")} without ${spec.fields[0]} are not served by this index and may fall back to a full scan.`;
}
