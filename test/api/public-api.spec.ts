import { describe, it, expect, afterEach } from "vitest";
import {
  defaultRegistry,
  deregisterSupport,
  done,
  parse,
  parseResult,
  registerSupport,
  serialize,
  serializeResult,
  strategies,
  t,
} from "../../src";
import type { Strategy } from "../../src";
import { User, UserType, makeUser } from "../helpers/fixtures";

const upperStrategy: Strategy<string> = {
  name: "upper",
  toIr: value => done(value.toUpperCase()),
  fromIr: (target, raw, _strict, ctx) => (typeof raw === "string" ? done(raw.toLowerCase()) : ctx.mismatch(target, raw)),
};

describe("public API", () => {
  afterEach(() => {
    registerSupport("string", strategies.stringStrategy);
  });

  it("round-trips through the default engine", () => {
    const user = makeUser({ id: 5, name: "Ada", friends: [1] });
    const ir = serialize(user);
    expect(ir).toEqual({ id: 5, name: "Ada", signupTs: null, friends: [1] });
    const parsed = parse(UserType, ir, true);
    expect(parsed).toBeInstanceOf(User);
    expect(parsed).toEqual(user);
  });

  it("defaults to lenient parsing", () => {
    expect(parse(t.int, "x")).toBe("x");
    expect(parseResult(t.int, "x").meta.notes?.[0].code).toBe("M0400");
    expect(parseResult(t.int, "x", true).tag).toBe("Fail");
    expect(serializeResult(new Map([["k", 1]]))).toEqual({ tag: "Done", value: { k: 1 }, meta: {} });
  });

  it("applies registered support process-wide until removed", () => {
    registerSupport("string", upperStrategy);
    expect(serialize({ name: "ada" })).toEqual({ name: "ADA" });
    expect(parse(t.string, "ADA", true)).toBe("ada");

    deregisterSupport("string");
    expect(serialize({ name: "ada" })).toEqual({ name: "ada" });
    expect(defaultRegistry.has("string")).toBe(false);
  });

  it("seeds the default registry with the built-in strategies", () => {
    expect(defaultRegistry.size).toBe(17);
    expect(defaultRegistry.lookup(t.date)).toBe(strategies.dateStrategy);
    expect(defaultRegistry.lookup(t.calendarDate)).toBe(strategies.calendarDateStrategy);
    expect(defaultRegistry.lookup(t.uuid)).toBe(strategies.uuidStrategy);
  });
});
