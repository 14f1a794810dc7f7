import { isMapping, isSequence, type IRValue } from "./value";

/**
 * Structural equality on IR. Mapping key order is not significant;
 * sequence order is.
 */
export function irEquals(a: IRValue, b: IRValue): boolean {
  if (a === b) return true;

  if (isSequence(a)) {
    if (!isSequence(b) || a.length !== b.length) return false;
    return a.every((item, i) => irEquals(item, b[i]));
  }

  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }

  if (isMapping(a) && isMapping(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    for (const key of keysA) {
      if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
      if (!irEquals(a[key], b[key])) return false;
    }
    return true;
  }

  return false;
}
