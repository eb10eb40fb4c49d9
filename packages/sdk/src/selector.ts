/**
 * Selector builder for Mango queries
 *
 * Selector semantics:
 *  - Empty condition set {} matches all documents
 *  - Top-level conditions are implicitly AND-ed
 *  - A bare field value is an equality condition
 *  - A nested object without operator keys addresses sub-fields (dot path)
 *  - Field names and string operands are case-sensitive and passed through verbatim
 *  - Comparison operators ($gt, $gte, $lt, $lte) require numeric operands
 *  - $elemMatch and $allMatch take a selector applied to each array element; an
 *    object of operators applies to the element itself
 *
 * Serialization always uses explicit operators, so that building a tree from a
 * serialized selector yields the same tree.
 */

import { InvalidSelectorError } from "./errors.js";

export type ComparisonOperator = "$gt" | "$gte" | "$lt" | "$lte";

export type LeafOperator =
  | "$eq" // Equality
  | "$ne" // Inequality
  | ComparisonOperator
  | "$regex" // Pattern match (backend regex dialect)
  | "$in" // Value in array
  | "$nin" // Value not in array
  | "$exists" // Field presence
  | "$type" // JSON type name
  | "$size" // Array length
  | "$mod" // [divisor, remainder]
  | "$all" // Array contains every value
  | "$elemMatch" // Some element matches
  | "$allMatch"; // Every element matches

export type CombinatorOperator = "$and" | "$or" | "$nor";

export interface FieldCondition {
  kind: "field";
  field: string;
  operator: LeafOperator;
  operand: unknown;
}

export interface AllOf {
  kind: "all";
  children: SelectorNode[];
}

export interface AnyOf {
  kind: "any";
  children: SelectorNode[];
}

export interface NoneOf {
  kind: "none";
  children: SelectorNode[];
}

export interface Not {
  kind: "not";
  child: SelectorNode;
}

export type SelectorNode = FieldCondition | AllOf | AnyOf | NoneOf | Not;

export type MangoSelector = Record<string, unknown>;

const LEAF_OPERATORS: readonly LeafOperator[] = [
  "$eq",
  "$ne",
  "$gt",
  "$gte",
  "$lt",
  "$lte",
  "$regex",
  "$in",
  "$nin",
  "$exists",
  "$type",
  "$size",
  "$mod",
  "$all",
  "$elemMatch",
  "$allMatch",
];

export const VALUE_TYPES = ["null", "boolean", "number", "string", "array", "object"] as const;

const COMBINATOR_KINDS = {
  $and: "all",
  $or: "any",
  $nor: "none",
} as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLeafOperator(op: string): op is LeafOperator {
  return (LEAF_OPERATORS as readonly string[]).includes(op);
}

function isCombinator(key: string): key is CombinatorOperator {
  return key === "$and" || key === "$or" || key === "$nor";
}

function isValueType(value: unknown): boolean {
  return VALUE_TYPES.some((t) => t === value);
}

function single(nodes: SelectorNode[]): SelectorNode {
  return nodes.length === 1 ? nodes[0] : { kind: "all", children: nodes };
}

/**
 * Build a validated field condition
 * @throws InvalidSelectorError if the operand does not fit the operator
 */
export function condition(field: string, operator: string, operand: unknown): FieldCondition {
  if (field.length === 0) {
    throw new InvalidSelectorError("Field names must be non-empty");
  }
  if (!isLeafOperator(operator)) {
    throw new InvalidSelectorError(`Unsupported operator ${operator} on field "${field}"`);
  }

  switch (operator) {
    case "$gt":
    case "$gte":
    case "$lt":
    case "$lte":
      if (typeof operand !== "number" || !Number.isFinite(operand)) {
        throw new InvalidSelectorError(
          `${operator} on field "${field}" requires a numeric operand, got ${JSON.stringify(operand)}`
        );
      }
      break;
    case "$regex":
      if (typeof operand !== "string") {
        throw new InvalidSelectorError(`$regex on field "${field}" requires a string pattern`);
      }
      break;
    case "$in":
    case "$nin":
      if (!Array.isArray(operand)) {
        throw new InvalidSelectorError(`${operator} on field "${field}" requires an array operand`);
      }
      break;
    case "$exists":
      if (typeof operand !== "boolean") {
        throw new InvalidSelectorError(`$exists on field "${field}" requires a boolean operand`);
      }
      break;
    case "$type":
      if (!isValueType(operand)) {
        throw new InvalidSelectorError(
          `$type on field "${field}" must be one of ${VALUE_TYPES.join(", ")}, got ${JSON.stringify(operand)}`
        );
      }
      break;
    case "$size":
      if (typeof operand !== "number" || !Number.isInteger(operand) || operand < 0) {
        throw new InvalidSelectorError(`$size on field "${field}" requires a non-negative integer`);
      }
      break;
    case "$mod":
      if (
        !Array.isArray(operand) ||
        operand.length !== 2 ||
        !operand.every((n: unknown) => typeof n === "number" && Number.isInteger(n)) ||
        operand[0] === 0
      ) {
        throw new InvalidSelectorError(
          `$mod on field "${field}" requires [divisor, remainder] integers with a non-zero divisor`
        );
      }
      break;
    case "$all":
      if (!Array.isArray(operand)) {
        throw new InvalidSelectorError(`$all on field "${field}" requires an array operand`);
      }
      break;
    case "$elemMatch":
    case "$allMatch":
      validateElementSelector(field, operator, operand);
      break;
    case "$eq":
    case "$ne":
      break;
  }

  return { kind: "field", field, operator, operand };
}

function validateElementSelector(field: string, operator: string, operand: unknown): void {
  if (!isPlainObject(operand)) {
    throw new InvalidSelectorError(`${operator} on field "${field}" requires a selector object`);
  }
  const onElement = Object.keys(operand).every((k) => k === "$not" || isLeafOperator(k));
  if (onElement) {
    parseFieldValue(field, operand);
  } else {
    parseSelector(operand);
  }
}

function parseFieldValue(field: string, value: unknown): SelectorNode[] {
  if (!isPlainObject(value)) {
    return [condition(field, "$eq", value)];
  }

  const keys = Object.keys(value);
  if (keys.length === 0) {
    return [condition(field, "$eq", value)];
  }

  const operatorKeys = keys.filter((k) => k.startsWith("$"));
  if (operatorKeys.length === 0) {
    // Sub-field selector: {address: {city: "x"}} -> address.city
    return keys.flatMap((k) => {
      if (k.length === 0) {
        throw new InvalidSelectorError(`Empty sub-field name under "${field}"`);
      }
      return parseFieldValue(`${field}.${k}`, value[k]);
    });
  }
  if (operatorKeys.length !== keys.length) {
    throw new InvalidSelectorError(
      `Field "${field}" mixes operators and sub-fields; use one or the other`
    );
  }

  return operatorKeys.map((op): SelectorNode => {
    const operand = value[op];
    if (op === "$not") {
      if (!isPlainObject(operand)) {
        throw new InvalidSelectorError(`$not on field "${field}" requires an operator object`);
      }
      return { kind: "not", child: single(parseFieldValue(field, operand)) };
    }
    return condition(field, op, operand);
  });
}

function parseCombinator(key: string, value: unknown): SelectorNode {
  if (isCombinator(key)) {
    if (!Array.isArray(value)) {
      throw new InvalidSelectorError(`${key} requires an array of selectors`);
    }
    const children = value.map((child: unknown): SelectorNode => {
      if (!isPlainObject(child)) {
        throw new InvalidSelectorError(`${key} entries must be selector objects`);
      }
      return parseSelector(child);
    });
    return { kind: COMBINATOR_KINDS[key], children };
  }

  if (key === "$not") {
    if (!isPlainObject(value)) {
      throw new InvalidSelectorError("$not requires a selector object");
    }
    return { kind: "not", child: parseSelector(value) };
  }

  throw new InvalidSelectorError(`Unsupported combinator ${key}`);
}

/**
 * Parse a Mango-style condition description into a selector tree
 * @param input - Condition set, e.g. {type: "user", age: {$gte: 18}}
 * @throws InvalidSelectorError
 */
export function parseSelector(input: unknown): SelectorNode {
  if (!isPlainObject(input)) {
    throw new InvalidSelectorError("Selector must be a JSON object");
  }

  const nodes: SelectorNode[] = [];
  for (const [key, value] of Object.entries(input)) {
    if (key.startsWith("$")) {
      nodes.push(parseCombinator(key, value));
    } else {
      nodes.push(...parseFieldValue(key, value));
    }
  }
  return single(nodes);
}

/**
 * Serialize a selector tree to the backend's query-selector shape
 */
export function serializeSelector(node: SelectorNode): MangoSelector {
  switch (node.kind) {
    case "field":
      return { [node.field]: { [node.operator]: node.operand } };
    case "all":
      return node.children.length === 0 ? {} : { $and: node.children.map(serializeSelector) };
    case "any":
      return { $or: node.children.map(serializeSelector) };
    case "none":
      return { $nor: node.children.map(serializeSelector) };
    case "not":
      return { $not: serializeSelector(node.child) };
  }
}

/**
 * Validate a condition description and return the selector to send
 */
export function buildSelector(input: unknown): MangoSelector {
  return serializeSelector(parseSelector(input));
}

/**
 * Fields referenced anywhere in the tree, in first-seen order.
 * For callers pairing a query with `servesFields`; dispatch never consults it.
 */
export function selectorFields(node: SelectorNode): string[] {
  const seen = new Set<string>();
  const visit = (n: SelectorNode): void => {
    switch (n.kind) {
      case "field":
        seen.add(n.field);
        break;
      case "not":
        visit(n.child);
        break;
      default:
        n.children.forEach(visit);
    }
  };
  visit(node);
  return [...seen];
}

export const matchAll = (): AllOf => ({ kind: "all", children: [] });

export const eq = (field: string, value: unknown) => condition(field, "$eq", value);
export const ne = (field: string, value: unknown) => condition(field, "$ne", value);
export const gt = (field: string, value: number) => condition(field, "$gt", value);
export const gte = (field: string, value: number) => condition(field, "$gte", value);
export const lt = (field: string, value: number) => condition(field, "$lt", value);
export const lte = (field: string, value: number) => condition(field, "$lte", value);
export const regex = (field: string, pattern: string) => condition(field, "$regex", pattern);

export const allOf = (...children: SelectorNode[]): AllOf => ({ kind: "all", children });
export const anyOf = (...children: SelectorNode[]): AnyOf => ({ kind: "any", children });
export const noneOf = (...children: SelectorNode[]): NoneOf => ({ kind: "none", children });
export const not = (child: SelectorNode): Not => ({ kind: "not", child });
