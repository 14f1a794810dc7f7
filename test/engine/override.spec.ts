import { describe, it, expect, beforeEach } from "vitest";
import { Marshaller } from "../../src/engine";
import { StrategyRegistry } from "../../src/registry";
import type { Strategy } from "../../src/registry";
import { registerBuiltins } from "../../src/strategies";
import { t } from "../../src/types";
import { done } from "../../src/outcome";
import { expectFailure } from "../helpers/outcome";

class Money {
  constructor(
    readonly cents: number,
    readonly currency: string
  ) {}
}

const MONEY_TEXT = /^(\d+) ([A-Z]{3})$/;

const moneyStrategy: Strategy<Money> = {
  name: "money",
  toIr: value => done(`${value.cents} ${value.currency}`),
  fromIr: (target, raw, _strict, ctx) => {
    if (raw instanceof Money) return done(raw);
    const m = typeof raw === "string" ? MONEY_TEXT.exec(raw) : null;
    return m ? done(new Money(Number(m[1]), m[2])) : ctx.mismatch(target, raw);
  },
};

const epochStrategy: Strategy<Date> = {
  name: "epoch-ms",
  toIr: value => done(value.getTime()),
  fromIr: (target, raw, _strict, ctx) => (typeof raw === "number" ? done(new Date(raw)) : ctx.mismatch(target, raw)),
};

describe("registry-driven dispatch", () => {
  let registry: StrategyRegistry;
  let marshaller: Marshaller;

  beforeEach(() => {
    registry = new StrategyRegistry();
    registerBuiltins(registry);
    marshaller = new Marshaller({ registry });
  });

  it("uses strategies registered for user classes", () => {
    registry.register(Money, moneyStrategy);
    const Order = t.object("Order", { price: t.instanceOf(Money) });

    expect(marshaller.serialize({ price: new Money(1250, "EUR") })).toEqual({ price: "1250 EUR" });
    expect(marshaller.parse(Order, { price: "1250 EUR" }, true)).toEqual({ price: new Money(1250, "EUR") });
    expect(expectFailure(marshaller.parseResult(Order, { price: "lots" }, true)).message).toBe(
      "Type mismatch at $.price: expected Money, got string"
    );
  });

  it("lets a registration override a built-in and falls back after deregistering", () => {
    const at = new Date(86_400_000);

    registry.register(t.date, epochStrategy);
    expect(marshaller.serialize({ at })).toEqual({ at: 86_400_000 });
    expect(marshaller.parse(t.date, 86_400_000, true)).toEqual(at);

    registry.deregister(Date);
    const failure = expectFailure(marshaller.serializeResult(at));
    expect(failure.reason).toBe("unsupported-type");
    expect(failure.message).toBe("Unsupported type at $: Date");

    const parseFailure = expectFailure(marshaller.parseResult(t.date, "1970-01-02", true));
    expect(parseFailure.reason).toBe("type-mismatch");
    expect(parseFailure.message).toBe("No strategy registered for date at $");
    expect(parseFailure.diagnostics[0].code).toBe("M0202");
    expect(marshaller.parse(t.date, "1970-01-02", false)).toBe("1970-01-02");
  });

  it("falls back to structural handling for scalars without a strategy", () => {
    registry.deregister("string");
    expect(marshaller.serialize(["a", "b"])).toEqual(["a", "b"]);
    expect(expectFailure(marshaller.parseResult(t.string, "a", true)).reason).toBe("type-mismatch");
  });

  it("resolves instances through matchers", () => {
    registry.registerMatcher("errors", key => key === Error, {
      name: "error",
      toIr: value => done(value instanceof Error ? { name: value.name, message: value.message } : null),
      fromIr: (_target, raw) => done(raw),
    });
    expect(marshaller.serialize(new TypeError("boom"))).toEqual({ name: "TypeError", message: "boom" });
  });

  it("turns strategy exceptions into failures in both modes", () => {
    registry.register("int", {
      name: "exploding",
      toIr: () => {
        throw new Error("kaboom");
      },
      fromIr: () => {
        throw new Error("kaboom");
      },
    });

    for (const strict of [true, false]) {
      const failure = expectFailure(marshaller.parseResult(t.list(t.int), [1], strict));
      expect(failure.reason).toBe("strategy-error");
      expect(failure.message).toBe("Strategy exploding threw at $[0]: kaboom");
    }
  });

  it("lets strategies serialize nested values with paths", () => {
    registry.register(Money, {
      name: "money-parts",
      toIr: (value: Money, ctx) => ctx.serialize([value.cents, new Date(Number.NaN)], "parts"),
      fromIr: (_target, raw) => done(raw),
    });
    const failure = expectFailure(marshaller.serializeResult(new Money(1, "EUR")));
    expect(failure.path).toBe("$.parts[1]");
  });

  it("does not affect other registries", () => {
    registry.deregister(Date);
    expect(new Marshaller().serialize(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
  });
});
