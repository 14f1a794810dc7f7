import type { Failure, FailureReason } from "./failure";

/**
 * Thrown by the throwing entry points (`serialize`, `parse`) when the
 * underlying outcome fails.
 */
export class MarshalError extends Error {
  readonly failure: Failure;

  constructor(f: Failure) {
    super(f.message);
    this.name = "MarshalError";
    this.failure = f;
  }

  get reason(): FailureReason {
    return this.failure.reason;
  }

  get path(): string {
    return this.failure.path;
  }
}
