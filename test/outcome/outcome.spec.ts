import { describe, it, expect } from "vitest";
import {
  MarshalError,
  allDiagnostics,
  collect,
  done,
  err,
  fail,
  failure,
  flatMapOutcome,
  isDone,
  isFail,
  isFailureReason,
  makeDiagnostic,
  mapOutcome,
  match,
  missingField,
  typeMismatch,
  unwrap,
  unwrapOr,
  wrapFailure,
} from "../../src/outcome";
import type { Outcome } from "../../src/outcome";

describe("outcome constructors", () => {
  it("builds Done and Fail with empty meta", () => {
    expect(done(1)).toEqual({ tag: "Done", value: 1, meta: {} });
    const f = err("custom:quota", "over quota");
    expect(f.tag).toBe("Fail");
    expect(f.failure).toEqual({
      reason: "custom:quota",
      message: "over quota",
      path: "$",
      diagnostics: [],
      context: undefined,
      cause: undefined,
    });
  });

  it("formats type mismatches with path and diagnostic", () => {
    const o = typeMismatch("int", "string", "$.id", "x");
    expect(o.failure.reason).toBe("type-mismatch");
    expect(o.failure.message).toBe("Type mismatch at $.id: expected int, got string");
    expect(o.failure.path).toBe("$.id");
    expect(o.failure.diagnostics).toEqual([
      {
        code: "M0200",
        severity: "error",
        message: "Type mismatch: expected int, got string",
        path: "$.id",
        data: { expected: "int", actual: "string" },
      },
    ]);
  });

  it("formats missing fields", () => {
    const o = missingField("id", "int", "$.id");
    expect(o.failure.reason).toBe("missing-field");
    expect(o.failure.message).toBe("Required field missing at $.id: id");
    expect(o.failure.context).toEqual({ field: "id", expected: "int" });
  });

  it("fills diagnostic templates", () => {
    expect(makeDiagnostic("M0401", { field: "name" }, "$.name")).toEqual({
      code: "M0401",
      severity: "info",
      message: "Field name missing, using zero value",
      path: "$.name",
      data: { field: "name" },
    });
  });
});

describe("outcome combinators", () => {
  const bad: Outcome<number> = err("type-mismatch", "nope");

  it("maps and chains only Done", () => {
    expect(mapOutcome(done(2), n => n * 3)).toEqual(done(6));
    expect(mapOutcome<number, number>(bad, n => n * 3)).toBe(bad);
    expect(flatMapOutcome(done(2), n => done(`${n}`))).toEqual(done("2"));
    expect(flatMapOutcome(done(2), () => bad)).toBe(bad);
  });

  it("matches on the tag", () => {
    const render = (o: Outcome<number>) =>
      match(o, { done: d => `ok ${d.value}`, fail: f => `fail ${f.failure.message}` });
    expect(render(done(4))).toBe("ok 4");
    expect(render(bad)).toBe("fail nope");
  });

  it("collects until the first failure", () => {
    expect(collect([done(1), done(2)])).toEqual(done([1, 2]));
    expect(collect([done(1), bad, done(3)])).toBe(bad);
  });

  it("unwraps or throws MarshalError", () => {
    expect(unwrap(done("v"))).toBe("v");
    expect(unwrapOr(bad, 7)).toBe(7);
    expect(isDone(done(0))).toBe(true);
    expect(isFail(bad)).toBe(true);

    try {
      unwrap(typeMismatch("int", "string", "$[1]"));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(MarshalError);
      if (e instanceof MarshalError) {
        expect(e.name).toBe("MarshalError");
        expect(e.reason).toBe("type-mismatch");
        expect(e.path).toBe("$[1]");
        expect(e.message).toBe("Type mismatch at $[1]: expected int, got string");
      }
    }
  });
});

describe("failures", () => {
  it("wraps a cause and gathers diagnostics from the chain", () => {
    const inner = typeMismatch("int", "string", "$.id").failure;
    const outer = wrapFailure(inner, "user record rejected", { record: 3 });
    expect(outer.cause).toBe(inner);
    expect(outer.reason).toBe("type-mismatch");
    expect(outer.context).toEqual({ expected: "int", actual: "string", value: undefined, record: 3 });
    // outer shares inner's diagnostic array; it is reported once
    expect(allDiagnostics(outer).map(d => d.code)).toEqual(["M0200"]);
    expect(isFailureReason(outer, "type-mismatch")).toBe(true);
  });

  it("defaults path to the root", () => {
    expect(failure("strategy-error", "boom").path).toBe("$");
    expect(fail(failure("strategy-error", "boom")).meta).toEqual({});
  });
});
