import { describe, it, expect } from "vitest";
import { Marshaller } from "../../src/engine";
import { MarshalError } from "../../src/outcome";
import { t, TypeReflector, Uuid } from "../../src/types";
import { expectFailure, expectValue } from "../helpers/outcome";
import { Opaque, makeUser } from "../helpers/fixtures";

const marshaller = new Marshaller();

describe("serialize", () => {
  it("serializes a described class field by field, in declaration order", () => {
    const user = makeUser({
      id: 123,
      name: "John Doe",
      signupTs: new Date("2024-03-05T10:20:30.456Z"),
      friends: [1, 2],
    });

    const ir = marshaller.serialize(user);
    expect(ir).toEqual({ id: 123, name: "John Doe", signupTs: "2024-03-05T10:20:30.456Z", friends: [1, 2] });
    expect(Object.keys(Object(ir))).toEqual(["id", "name", "signupTs", "friends"]);
  });

  it("follows descriptor field order, not assignment order", () => {
    class Abc {
      c = 3;
      a = 1;
      b = 2;
    }
    t.struct(Abc, { a: t.int, b: t.int, c: t.int });
    expect(Object.keys(Object(marshaller.serialize(new Abc())))).toEqual(["a", "b", "c"]);
  });

  it("describes struct instances through a caller-supplied reflector", () => {
    const isolated = new Marshaller({ reflector: new TypeReflector() });
    expect(isolated.serialize(makeUser({ id: 2, name: "b" }))).toEqual({
      id: 2,
      name: "b",
      signupTs: null,
      friends: [],
    });
  });

  it("turns absent optionals into null", () => {
    expect(marshaller.serialize(makeUser({ id: 1, name: "a" }))).toEqual({
      id: 1,
      name: "a",
      signupTs: null,
      friends: [],
    });
    expect(marshaller.serialize(undefined)).toBeNull();
  });

  it("keeps plain object key order", () => {
    const ir = marshaller.serialize({ c: 1, a: 2, b: 3 });
    expect(Object.keys(Object(ir))).toEqual(["c", "a", "b"]);
  });

  it("leaves IR unchanged", () => {
    const ir = { a: [1, "x", null, { b: true }], c: 2.5 };
    expect(marshaller.serialize(ir)).toEqual(ir);
    expect(marshaller.serialize(marshaller.serialize(ir))).toEqual(ir);
  });

  it("serializes sets, maps and the built-in leaf types", () => {
    expect(marshaller.serialize(new Set([3, 1, 2]))).toEqual([3, 1, 2]);
    expect(marshaller.serialize(new Map([["a", 1], ["b", 2]]))).toEqual({ a: 1, b: 2 });
    expect(marshaller.serialize(new Map([[1, "x"]]))).toEqual({ "1": "x" });
    expect(marshaller.serialize(new Uint8Array([0, 15, 255]))).toBe("000fff");
    expect(marshaller.serialize(Buffer.from([1, 2]))).toBe("0102");
    expect(marshaller.serialize(12345678901234567890n)).toBe("12345678901234567890");
    expect(marshaller.serialize(Uuid.parse("123E4567-E89B-12D3-A456-426614174000"))).toBe(
      "123e4567-e89b-12d3-a456-426614174000"
    );
  });

  it("rejects instances of undescribed classes", () => {
    const failure = expectFailure(marshaller.serializeResult({ nested: [new Opaque()] }));
    expect(failure.reason).toBe("unsupported-type");
    expect(failure.path).toBe("$.nested[0]");
    expect(failure.message).toBe("Unsupported type at $.nested[0]: Opaque");
  });

  it("rejects values with no IR form", () => {
    expect(expectFailure(marshaller.serializeResult(() => 1)).message).toBe("Unsupported type at $: function");
    expect(expectFailure(marshaller.serializeResult(Symbol("s"))).message).toBe("Unsupported type at $: symbol");
    expect(expectFailure(marshaller.serializeResult([Number.NaN])).message).toBe(
      "Unsupported type at $[0]: non-finite number NaN"
    );
    expect(expectFailure(marshaller.serializeResult(new Date(Number.NaN))).message).toBe(
      "Unsupported type at $: invalid Date"
    );
    expect(expectFailure(marshaller.serializeResult(new Map([[{ a: 1 }, 1]]))).message).toBe(
      "Unsupported type at $: map key of shape mapping"
    );
  });

  it("throws MarshalError from the throwing form", () => {
    expect(() => marshaller.serialize(new Opaque())).toThrow(MarshalError);
  });

  it("detects cycles but allows shared references", () => {
    const node: Record<string, unknown> = { name: "root" };
    node.self = node;
    const failure = expectFailure(marshaller.serializeResult(node));
    expect(failure.reason).toBe("circular-reference");
    expect(failure.path).toBe("$.self");

    const list: unknown[] = [];
    list.push(list);
    expect(expectFailure(marshaller.serializeResult(list)).path).toBe("$[0]");

    const shared = { x: 1 };
    expect(marshaller.serialize({ a: shared, b: shared })).toEqual({ a: { x: 1 }, b: { x: 1 } });
  });

  it("stops at the configured depth", () => {
    const shallow = new Marshaller({ config: { maxDepth: 2 } });
    expect(shallow.serialize([[1]])).toEqual([[1]]);

    const failure = expectFailure(shallow.serializeResult([[[1]]]));
    expect(failure.reason).toBe("depth-exceeded");
    expect(failure.path).toBe("$[0][0][0]");
    expect(failure.message).toBe("Nesting deeper than 2 levels at $[0][0][0]");
  });

  it("quotes keys that are not identifiers in paths", () => {
    const failure = expectFailure(marshaller.serializeResult({ "a b": { c: new Opaque() } }));
    expect(failure.path).toBe('$["a b"].c');
  });

  it("reports success as Done with empty meta", () => {
    expect(marshaller.serializeResult("x")).toEqual({ tag: "Done", value: "x", meta: {} });
    expect(expectValue(marshaller.serializeResult(true))).toBe(true);
  });
});
