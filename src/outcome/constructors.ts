import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Fail {
  return fail(failure(reason, message, opts));
}

export function unsupportedType(shape: string, path: string, value?: unknown): Fail {
  return fail(
    failure("unsupported-type", `Unsupported type at ${path}: ${shape}`, {
      path,
      context: { shape, value },
      diagnostics: [makeDiagnostic("M0100", { shape }, path)],
    })
  );
}

export function typeMismatch(expected: string, actual: string, path: string, value?: unknown): Fail {
  return fail(
    failure("type-mismatch", `Type mismatch at ${path}: expected ${expected}, got ${actual}`, {
      path,
      context: { expected, actual, value },
      diagnostics: [makeDiagnostic("M0200", { expected, actual }, path)],
    })
  );
}

export function missingField(field: string, expected: string, path: string): Fail {
  return fail(
    failure("missing-field", `Required field missing at ${path}: ${field}`, {
      path,
      context: { field, expected },
      diagnostics: [makeDiagnostic("M0201", { field }, path)],
    })
  );
}

export function noStrategy(expected: string, path: string, value?: unknown): Fail {
  return fail(
    failure("type-mismatch", `No strategy registered for ${expected} at ${path}`, {
      path,
      context: { expected, value },
      diagnostics: [makeDiagnostic("M0202", { expected }, path)],
    })
  );
}

export function circularReference(path: string): Fail {
  return fail(
    failure("circular-reference", `Circular reference at ${path}`, {
      path,
      diagnostics: [makeDiagnostic("M0101", { path }, path)],
    })
  );
}

export function depthExceeded(limit: number, path: string): Fail {
  return fail(
    failure("depth-exceeded", `Nesting deeper than ${limit} levels at ${path}`, {
      path,
      context: { limit },
      diagnostics: [makeDiagnostic("M0102", { limit }, path)],
    })
  );
}

export function strategyError(strategy: string, error: unknown, path: string): Fail {
  const detail = error instanceof Error ? error.message : String(error);
  return fail(
    failure("strategy-error", `Strategy ${strategy} threw at ${path}: ${detail}`, {
      path,
      context: { strategy, error },
      diagnostics: [makeDiagnostic("M0300", { strategy, error: detail }, path)],
    })
  );
}

export function invalidDescriptor(reason: string, path: string): Fail {
  return fail(
    failure("invalid-descriptor", `Invalid type descriptor at ${path}: ${reason}`, {
      path,
      context: { reason },
      diagnostics: [makeDiagnostic("M0301", { reason }, path)],
    })
  );
}
