import type { IRValue } from "../ir/value";
import { isMapping, irShape } from "../ir/value";
import type { AnyType } from "../types/descriptor";
import { formatType } from "../types/format";
import { isDone, type Outcome } from "../outcome/outcome";
import { done, invalidDescriptor, typeMismatch, unsupportedType } from "../outcome/constructors";
import type { ParseContext, SerializeContext, Strategy } from "../registry/types";

function serializeItems(items: readonly unknown[], ctx: SerializeContext) {
  const out: IRValue[] = [];
  for (let i = 0; i < items.length; i++) {
    const result = ctx.serialize(items[i], i);
    if (!isDone(result)) return result;
    out.push(result.value);
  }
  return done(out);
}

function setEntry<V>(target: Record<string, V>, key: string, value: V): void {
  if (key === "__proto__") {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
  } else {
    target[key] = value;
  }
}

/**
 * Fixed-length tuples, optionally with a homogeneous tail.
 */
export const tupleStrategy: Strategy<readonly unknown[]> = {
  name: "tuple",
  toIr: (value, ctx) => serializeItems(value, ctx),
  fromIr: (target, raw, strict, ctx) => {
    const type = ctx.resolve(target);
    if (type.kind !== "tuple") return invalidDescriptor(`tuple strategy given ${formatType(type)}`, ctx.path);
    if (!Array.isArray(raw)) return ctx.mismatch(target, raw);

    const lengthOk = type.rest ? raw.length >= type.items.length : raw.length === type.items.length;
    if (!lengthOk && strict) {
      return typeMismatch(formatType(type), `sequence of length ${raw.length}`, ctx.path, raw);
    }

    const parsed: unknown[] = [];
    for (let i = 0; i < raw.length; i++) {
      const itemType: AnyType | undefined = type.items[i] ?? type.rest;
      if (!itemType) {
        // Surplus items in lenient mode stay as they are.
        parsed.push(raw[i]);
        continue;
      }
      const result = ctx.parse(itemType, raw[i], i);
      if (!isDone(result)) return result;
      parsed.push(result.value);
    }
    return done(parsed);
  },
};

/**
 * Plain objects with string keys and uniformly typed values.
 */
export const dictStrategy: Strategy<Readonly<Record<string, unknown>>> = {
  name: "dict",
  toIr: (value, ctx) => {
    const out: Record<string, IRValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const result = ctx.serialize(item, key);
      if (!isDone(result)) return result;
      setEntry(out, key, result.value);
    }
    return done(out);
  },
  fromIr: (target, raw, _strict, ctx) => {
    const type = ctx.resolve(target);
    if (type.kind !== "dict") return invalidDescriptor(`dict strategy given ${formatType(type)}`, ctx.path);
    if (!isMapping(raw)) return ctx.mismatch(target, raw);

    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(raw)) {
      const result = ctx.parse(type.value, item, key);
      if (!isDone(result)) return result;
      setEntry(out, key, result.value);
    }
    return done(out);
  },
};

const NUMERIC_TEXT = /^-?(?:\d+|\d*\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Mapping keys are always text. Numeric-looking text is first offered to
 * the key type as a number (numbers, numeric enums and literals, unions
 * with such members), then as the text itself.
 */
function parseKey(text: string, keyType: AnyType, ctx: ParseContext): Outcome<unknown> {
  if (NUMERIC_TEXT.test(text)) {
    const asNumber = ctx.tryParse(keyType, Number(text));
    if (isDone(asNumber)) return asNumber;
  }
  return ctx.parse(keyType, text, text);
}

/**
 * `Map` instances. IR is a mapping, so serialized keys must be text or
 * numbers.
 */
export const mapStrategy: Strategy<ReadonlyMap<unknown, unknown>> = {
  name: "map",
  toIr: (value, ctx) => {
    const out: Record<string, IRValue> = {};
    for (const [key, item] of value) {
      const keyResult = ctx.serialize(key);
      if (!isDone(keyResult)) return keyResult;
      const keyIr = keyResult.value;
      if (typeof keyIr !== "string" && typeof keyIr !== "number") {
        return unsupportedType(`map key of shape ${irShape(keyIr)}`, ctx.path, key);
      }
      const keyText = String(keyIr);
      const itemResult = ctx.serialize(item, keyText);
      if (!isDone(itemResult)) return itemResult;
      setEntry(out, keyText, itemResult.value);
    }
    return done(out);
  },
  fromIr: (target, raw, _strict, ctx) => {
    if (raw instanceof Map) return done(raw);
    const type = ctx.resolve(target);
    if (type.kind !== "map") return invalidDescriptor(`map strategy given ${formatType(type)}`, ctx.path);
    if (!isMapping(raw)) return ctx.mismatch(target, raw);

    const out = new Map<unknown, unknown>();
    for (const [keyText, item] of Object.entries(raw)) {
      const keyResult = parseKey(keyText, type.keyType, ctx);
      if (!isDone(keyResult)) return keyResult;
      const itemResult = ctx.parse(type.value, item, keyText);
      if (!isDone(itemResult)) return itemResult;
      out.set(keyResult.value, itemResult.value);
    }
    return done(out);
  },
};
