import type { IRValue } from "../ir/value";
import type { AnyType, TypeKey } from "../types/descriptor";
import type { ResolvedType } from "../types/reflect";
import type { Outcome } from "../outcome/outcome";

/**
 * Handed to `Strategy.toIr` so a strategy can serialize nested values
 * through the engine.
 */
export interface SerializeContext {
  /** Path of the value being serialized, e.g. `$.friends[1]`. */
  readonly path: string;
  /**
   * Serialize a nested value. `segment` is appended to the path.
   */
  serialize(value: unknown, segment?: string | number): Outcome<IRValue>;
}

/**
 * Handed to `Strategy.fromIr` so a strategy can parse nested values through
 * the engine with the same strictness.
 */
export interface ParseContext {
  readonly path: string;
  readonly strict: boolean;
  /** Resolve lazy descriptors. */
  resolve(type: AnyType): ResolvedType;
  /** Parse a nested value with the same strictness. */
  parse(type: AnyType, raw: unknown, segment?: string | number): Outcome<unknown>;
  /** Parse a nested value in strict mode without recording lenient notes. */
  tryParse(type: AnyType, raw: unknown): Outcome<unknown>;
  /**
   * Report that `raw` does not fit `target`: a type-mismatch failure when
   * strict, `raw` unchanged otherwise.
   */
  mismatch(target: AnyType, raw: unknown): Outcome<unknown>;
}

/**
 * A serialize/parse pair for one type identity.
 *
 * `fromIr` returns `raw` unchanged when it already is an instance of the
 * target type, otherwise attempts a coercion; when that fails it returns
 * `ctx.mismatch(target, raw)`.
 */
export interface Strategy<T = unknown> {
  readonly name: string;
  toIr(value: T, ctx: SerializeContext): Outcome<IRValue>;
  fromIr(target: AnyType, raw: unknown, strict: boolean, ctx: ParseContext): Outcome<unknown>;
}

export type KeyPredicate = (key: TypeKey) => boolean;

export interface Matcher {
  readonly name: string;
  readonly test: KeyPredicate;
  readonly strategy: Strategy;
}
