// src/index.ts
// marshal-ir - Public API
//
// Type-directed conversion between in-memory values and a JSON-compatible IR.

import { defaultMarshaller } from "./engine";
import type { IRValue } from "./ir/value";
import type { AnyType, Infer } from "./types/descriptor";
import type { Outcome } from "./outcome/outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZE / PARSE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Convert a value to IR. Throws `MarshalError` (`unsupported-type`,
 * `circular-reference`, `depth-exceeded`, `strategy-error`).
 *
 * @example
 * serialize(new Rectangle(10, 5.5)) // { length: 10, width: 5.5 }
 */
export function serialize(value: unknown): IRValue {
  return defaultMarshaller.serialize(value);
}

export function serializeResult(value: unknown): Outcome<IRValue> {
  return defaultMarshaller.serializeResult(value);
}

/**
 * Reconstruct a value of `type` from IR. Strict mode fails on the first
 * mismatch or missing field; lenient mode (the default unless
 * MARSHAL_STRICT is set) keeps unfitting input as it is.
 *
 * @example
 * const rect = parse(RectangleType, { length: 10, width: 5.5 }, true);
 */
export function parse<D extends AnyType>(type: D, raw: unknown, strict: true): Infer<D>;
export function parse<D extends AnyType>(type: D, raw: unknown, strict?: boolean): unknown;
export function parse(type: AnyType, raw: unknown, strict?: boolean): unknown {
  return defaultMarshaller.parse(type, raw, strict ?? defaultMarshaller.config.strict);
}

export function parseResult(type: AnyType, raw: unknown, strict?: boolean): Outcome<unknown> {
  return defaultMarshaller.parseResult(type, raw, strict ?? defaultMarshaller.config.strict);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE & REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export { Marshaller, defaultMarshaller, type MarshallerOptions } from "./engine";
export {
  StrategyRegistry,
  defaultRegistry,
  registerSupport,
  deregisterSupport,
  describeKey,
  type Strategy,
  type SerializeContext,
  type ParseContext,
  type KeyPredicate,
  type RegistryTarget,
} from "./registry";
export * as strategies from "./strategies";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES & IR
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./types";
export * from "./ir";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export {
  loadConfig,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  DEFAULT_CONFIG,
  type MarshalConfig,
  type LogLevel,
} from "./config/config";
export { createLogger, rootLogger, type Logger } from "./log/logger";
