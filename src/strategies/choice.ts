import { isScalar, shapeOf } from "../ir/value";
import { isDone } from "../outcome/outcome";
import { done, invalidDescriptor, unsupportedType } from "../outcome/constructors";
import { formatType } from "../types/format";
import type { Strategy } from "../registry/types";

/**
 * First member that parses the input in strict mode wins.
 */
export const unionStrategy: Strategy<unknown> = {
  name: "union",
  toIr: (value, ctx) => ctx.serialize(value),
  fromIr: (target, raw, _strict, ctx) => {
    const type = ctx.resolve(target);
    if (type.kind !== "union") return invalidDescriptor(`union strategy given ${formatType(type)}`, ctx.path);

    if (raw === null || raw === undefined) {
      // The first nullable member decides: optional means undefined, null means null.
      for (const m of type.members) {
        const member = ctx.resolve(m);
        if (member.kind === "optional") return done(undefined);
        if (member.kind === "primitive" && member.key === "null") return done(null);
      }
    }

    for (const member of type.members) {
      const result = ctx.tryParse(member, raw);
      if (isDone(result)) return result;
    }
    return ctx.mismatch(target, raw);
  },
};

export const literalStrategy: Strategy<unknown> = {
  name: "literal",
  toIr: (value, ctx) => (isScalar(value) ? done(value) : unsupportedType(shapeOf(value), ctx.path, value)),
  fromIr: (target, raw, _strict, ctx) => {
    const type = ctx.resolve(target);
    if (type.kind !== "literal") return invalidDescriptor(`literal strategy given ${formatType(type)}`, ctx.path);
    return type.values.some(v => v === raw) ? done(raw) : ctx.mismatch(target, raw);
  },
};

/**
 * Enum members travel as their values; parse also accepts member names.
 */
export const enumStrategy: Strategy<string | number> = {
  name: "enum",
  toIr: value => done(value),
  fromIr: (target, raw, _strict, ctx) => {
    const type = ctx.resolve(target);
    if (type.kind !== "enum") return invalidDescriptor(`enum strategy given ${formatType(type)}`, ctx.path);
    for (const value of type.members.values()) {
      if (value === raw) return done(raw);
    }
    if (typeof raw === "string") {
      const byName = type.members.get(raw);
      if (byName !== undefined) return done(byName);
    }
    return ctx.mismatch(target, raw);
  },
};
