// Canonical intermediate representation produced by `serialize` and consumed
// by `parse`. Every IR value is JSON-compatible.

export type Scalar = null | boolean | number | string;

export type IRSequence = readonly IRValue[];

export interface IRMapping {
  readonly [key: string]: IRValue;
}

export type IRValue = Scalar | IRSequence | IRMapping;

export type IRShape =
  | "null"
  | "boolean"
  | "number"
  | "string"
  | "sequence"
  | "mapping";

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "boolean" ||
    typeof value === "number" ||
    typeof value === "string"
  );
}

export function isSequence(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/**
 * A mapping is a plain object: created by a literal, `Object.create(null)` or
 * JSON.parse. Class instances (Date, Map, user classes) are not mappings.
 */
export function isMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Deep check that a value is well-formed IR: scalars, arrays and plain
 * objects only, finite, acyclic.
 */
export function isIRValue(value: unknown): value is IRValue {
  const ancestors = new Set<object>();

  const check = (node: unknown): boolean => {
    if (isScalar(node)) return true;
    if (isSequence(node)) {
      if (ancestors.has(node)) return false;
      ancestors.add(node);
      const result = node.every(check);
      ancestors.delete(node);
      return result;
    }
    if (isMapping(node)) {
      if (ancestors.has(node)) return false;
      ancestors.add(node);
      const result = Object.values(node).every(check);
      ancestors.delete(node);
      return result;
    }
    return false;
  };

  return check(value);
}

/**
 * Describe the runtime shape of any value, for diagnostics.
 */
export function shapeOf(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (Array.isArray(value)) return "sequence";
  if (isMapping(value)) return "mapping";
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    const ctor = hasConstructorName(proto) ? proto.constructor.name : "";
    return ctor ? ctor : "object";
  }
  return typeof value;
}

export function irShape(value: IRValue): IRShape {
  if (value === null) return "null";
  if (isSequence(value)) return "sequence";
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return "mapping";
  }
}

function hasConstructorName(proto: unknown): proto is { constructor: { name: string } } {
  if (proto === null || typeof proto !== "object") return false;
  if (!("constructor" in proto)) return false;
  const ctor: unknown = proto.constructor;
  return typeof ctor === "function" && typeof ctor.name === "string";
}
