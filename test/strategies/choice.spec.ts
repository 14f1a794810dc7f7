import { describe, it, expect } from "vitest";
import { Marshaller } from "../../src/engine";
import { t } from "../../src/types";
import { expectFailure } from "../helpers/outcome";

const marshaller = new Marshaller();

enum Color {
  Red = "red",
  Green = "green",
}

enum Level {
  Low = 1,
  High = 2,
}

describe("union strategy", () => {
  it("takes the first member that parses", () => {
    const IntOrDate = t.union(t.int, t.date);
    expect(marshaller.parse(IntOrDate, 5, true)).toBe(5);
    expect(marshaller.parse(IntOrDate, "2024-01-02", true)).toEqual(new Date("2024-01-02T00:00:00.000Z"));
  });

  it("fails when no member fits", () => {
    expect(expectFailure(marshaller.parseResult(t.union(t.int, t.string), true, true)).message).toBe(
      "Type mismatch at $: expected int | string, got boolean"
    );
    expect(marshaller.parse(t.union(t.int, t.string), true, false)).toBe(true);
  });

  it("accepts null only for nullable unions", () => {
    expect(marshaller.parse(t.union(t.null, t.int), null, true)).toBeNull();
    expect(marshaller.parse(t.union(t.optional(t.string), t.int), undefined, true)).toBeUndefined();
    expect(marshaller.parse(t.union(t.int, t.optional(t.string)), null, true)).toBeUndefined();
    expect(marshaller.parse(t.union(t.null, t.optional(t.string)), undefined, true)).toBeNull();
    expect(expectFailure(marshaller.parseResult(t.union(t.int, t.string), null, true)).reason).toBe(
      "type-mismatch"
    );
  });
});

describe("literal strategy", () => {
  const Light = t.literal("red", "green");

  it("accepts only the listed values", () => {
    expect(marshaller.parse(Light, "red", true)).toBe("red");
    expect(expectFailure(marshaller.parseResult(Light, "blue", true)).message).toBe(
      'Type mismatch at $: expected "red" | "green", got string'
    );
  });
});

describe("enum strategy", () => {
  it("accepts member values and names", () => {
    const ColorType = t.enum(Color, "Color");
    expect(marshaller.parse(ColorType, "red", true)).toBe(Color.Red);
    expect(marshaller.parse(ColorType, "Green", true)).toBe(Color.Green);
    expect(marshaller.serialize({ color: Color.Green })).toEqual({ color: "green" });
  });

  it("handles numeric enums", () => {
    const LevelType = t.enum(Level, "Level");
    expect(marshaller.parse(LevelType, 2, true)).toBe(Level.High);
    expect(marshaller.parse(LevelType, "Low", true)).toBe(Level.Low);
    expect(expectFailure(marshaller.parseResult(LevelType, 3, true)).message).toBe(
      "Type mismatch at $: expected Level, got number"
    );
    expect(expectFailure(marshaller.parseResult(LevelType, "1", true)).reason).toBe("type-mismatch");
  });
});
