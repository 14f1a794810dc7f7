import { isIRValue, shapeOf } from "../ir/value";
import { done, unsupportedType } from "../outcome/constructors";
import type { Strategy } from "../registry/types";

export const stringStrategy: Strategy<string> = {
  name: "string",
  toIr: value => done(value),
  fromIr: (target, raw, _strict, ctx) => (typeof raw === "string" ? done(raw) : ctx.mismatch(target, raw)),
};

/**
 * Floating-point numbers. Non-finite values have no IR form.
 */
export const numberStrategy: Strategy<number> = {
  name: "number",
  toIr: (value, ctx) =>
    Number.isFinite(value) ? done(value) : unsupportedType(`non-finite number ${value}`, ctx.path, value),
  fromIr: (target, raw, _strict, ctx) => (typeof raw === "number" ? done(raw) : ctx.mismatch(target, raw)),
};

export const intStrategy: Strategy<number> = {
  name: "int",
  toIr: (value, ctx) =>
    Number.isInteger(value) ? done(value) : unsupportedType(`non-integer ${value}`, ctx.path, value),
  fromIr: (target, raw, _strict, ctx) => (Number.isInteger(raw) ? done(raw) : ctx.mismatch(target, raw)),
};

export const booleanStrategy: Strategy<boolean> = {
  name: "boolean",
  toIr: value => done(value),
  fromIr: (target, raw, _strict, ctx) => (typeof raw === "boolean" ? done(raw) : ctx.mismatch(target, raw)),
};

export const nullStrategy: Strategy<null | undefined> = {
  name: "null",
  toIr: () => done(null),
  fromIr: (target, raw, _strict, ctx) =>
    raw === null || raw === undefined ? done(null) : ctx.mismatch(target, raw),
};

const INTEGER_TEXT = /^-?\d+$/;

/**
 * Big integers travel as decimal text.
 */
export const bigintStrategy: Strategy<bigint> = {
  name: "bigint",
  toIr: value => done(value.toString()),
  fromIr: (target, raw, _strict, ctx) => {
    if (typeof raw === "bigint") return done(raw);
    if (typeof raw === "number" && Number.isSafeInteger(raw)) return done(BigInt(raw));
    if (typeof raw === "string" && INTEGER_TEXT.test(raw)) return done(BigInt(raw));
    return ctx.mismatch(target, raw);
  },
};

/**
 * Accepts anything on parse. Serializes values that are already IR.
 */
export const anyStrategy: Strategy<unknown> = {
  name: "any",
  toIr: (value, ctx) => (isIRValue(value) ? done(value) : unsupportedType(shapeOf(value), ctx.path, value)),
  fromIr: (_target, raw) => done(raw),
};
