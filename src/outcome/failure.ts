import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "unsupported-type"
  | "type-mismatch"
  | "missing-field"
  | "circular-reference"
  | "depth-exceeded"
  | "strategy-error"
  | "invalid-descriptor"
  | `custom:${string}`;

export interface Failure {
  reason: FailureReason;
  message: string;
  /** Path from the root value to the node that failed. */
  path: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    path: opts?.path ?? "$",
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}
