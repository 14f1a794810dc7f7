import type { IRValue } from "../ir/value";
import { isMapping, isScalar, shapeOf } from "../ir/value";
import type { AnyType, ContainerType, Infer, StructType } from "../types/descriptor";
import { defaultReflector, type ResolvedType, type TypeReflector } from "../types/reflect";
import { formatType } from "../types/format";
import type { Outcome } from "../outcome/outcome";
import { isDone } from "../outcome/outcome";
import type { Diagnostic } from "../outcome/diagnostic";
import { makeDiagnostic } from "../outcome/codes";
import {
  circularReference,
  depthExceeded,
  done,
  invalidDescriptor,
  missingField,
  noStrategy,
  strategyError,
  typeMismatch,
  unsupportedType,
} from "../outcome/constructors";
import { unwrap } from "../outcome/matchers";
import { StrategyRegistry } from "../registry/registry";
import type { ParseContext, SerializeContext, Strategy } from "../registry/types";
import { registerBuiltins } from "../strategies";
import { DEFAULT_CONFIG, mergeConfigs, type MarshalConfig } from "../config/config";
import { rootLogger, type Logger } from "../log/logger";
import { joinPath, ROOT_PATH } from "./path";

export interface MarshallerOptions {
  /** Defaults to a fresh registry holding the built-in strategies. */
  registry?: StrategyRegistry;
  reflector?: TypeReflector;
  config?: Partial<MarshalConfig>;
  logger?: Logger;
}

/** Per-call state of a serialize run. */
interface SerializeRun {
  readonly ancestors: Set<object>;
}

/** Per-call state of a parse run. */
interface ParseRun {
  readonly strict: boolean;
  readonly notes: Diagnostic[];
}

/**
 * Type-directed dispatch engine. Converts values to IR by their runtime type
 * and IR back to values by a declared target type, consulting the strategy
 * registry first and falling back to structural handling of composites and
 * containers.
 */
export class Marshaller {
  readonly registry: StrategyRegistry;
  readonly reflector: TypeReflector;
  readonly config: MarshalConfig;
  private readonly logger: Logger;

  constructor(options: MarshallerOptions = {}) {
    this.reflector = options.reflector ?? defaultReflector;
    this.registry = options.registry ?? builtinRegistry(this.reflector);
    this.config = mergeConfigs(DEFAULT_CONFIG, options.config ?? {});
    this.logger = (options.logger ?? rootLogger).child({ component: "marshaller" });
  }

  // =========================================================================
  // Serialize
  // =========================================================================

  serializeResult(value: unknown): Outcome<IRValue> {
    return this.serializeAt(value, ROOT_PATH, 0, { ancestors: new Set() });
  }

  /**
   * Convert a value to IR. Throws `MarshalError` on failure.
   */
  serialize(value: unknown): IRValue {
    return unwrap(this.serializeResult(value));
  }

  private serializeAt(value: unknown, path: string, depth: number, run: SerializeRun): Outcome<IRValue> {
    if (depth > this.config.maxDepth) {
      return depthExceeded(this.config.maxDepth, path);
    }

    const strategy = this.registry.resolveRuntime(this.reflector.runtimeKeys(value));
    if (strategy) {
      return this.guardCycle(value, path, run, () => this.invokeToIr(strategy, value, path, depth, run));
    }

    if (value === null || value === undefined) {
      return done(null);
    }

    if (typeof value === "object") {
      const fieldNames = this.reflector.instanceFields(value);
      if (fieldNames) {
        return this.guardCycle(value, path, run, () =>
          this.serializeFields(value, fieldNames, path, depth, run)
        );
      }
      const elements = this.reflector.instanceElements(value);
      if (elements) {
        return this.guardCycle(value, path, run, () =>
          this.serializeElements(elements, path, depth, run)
        );
      }
    }

    if (isScalar(value) && (typeof value !== "number" || Number.isFinite(value))) {
      return done(value);
    }

    return unsupportedType(shapeOf(value), path, value);
  }

  private serializeFields(
    value: object,
    fieldNames: readonly string[],
    path: string,
    depth: number,
    run: SerializeRun
  ): Outcome<IRValue> {
    const mapping: Record<string, IRValue> = {};
    for (const name of fieldNames) {
      const field: unknown = Reflect.get(value, name);
      const result = this.serializeAt(field, joinPath(path, name), depth + 1, run);
      if (!isDone(result)) return result;
      setEntry(mapping, name, result.value);
    }
    return done(mapping);
  }

  private serializeElements(
    elements: readonly unknown[],
    path: string,
    depth: number,
    run: SerializeRun
  ): Outcome<IRValue> {
    const sequence: IRValue[] = [];
    for (let i = 0; i < elements.length; i++) {
      const result = this.serializeAt(elements[i], joinPath(path, i), depth + 1, run);
      if (!isDone(result)) return result;
      sequence.push(result.value);
    }
    return done(sequence);
  }

  private invokeToIr(
    strategy: Strategy,
    value: unknown,
    path: string,
    depth: number,
    run: SerializeRun
  ): Outcome<IRValue> {
    const ctx: SerializeContext = {
      path,
      serialize: (child, segment) => this.serializeAt(child, joinPath(path, segment), depth + 1, run),
    };
    try {
      return strategy.toIr(value, ctx);
    } catch (error) {
      this.logger.warn({ strategy: strategy.name, path, err: error }, "strategy threw during serialize");
      return strategyError(strategy.name, error, path);
    }
  }

  private guardCycle(
    value: unknown,
    path: string,
    run: SerializeRun,
    body: () => Outcome<IRValue>
  ): Outcome<IRValue> {
    if (typeof value !== "object" || value === null) {
      return body();
    }
    if (run.ancestors.has(value)) {
      return circularReference(path);
    }
    run.ancestors.add(value);
    try {
      return body();
    } finally {
      run.ancestors.delete(value);
    }
  }

  // =========================================================================
  // Parse
  // =========================================================================

  /**
   * Reconstruct a value of `type` from IR (or already-native values).
   * Lenient pass-throughs are reported in `meta.notes`.
   */
  parseResult(type: AnyType, raw: unknown, strict: boolean = this.config.strict): Outcome<unknown> {
    const run: ParseRun = { strict, notes: [] };
    const result = this.parseAt(type, raw, ROOT_PATH, 0, run);
    if (isDone(result) && run.notes.length > 0) {
      return done(result.value, { notes: run.notes });
    }
    return result;
  }

  /**
   * Reconstruct a value of `type`. Throws `MarshalError` on failure. In
   * lenient mode the result may hold raw input where it did not fit, so it
   * is typed `unknown`.
   */
  parse<D extends AnyType>(type: D, raw: unknown, strict: true): Infer<D>;
  parse<D extends AnyType>(type: D, raw: unknown, strict?: boolean): unknown;
  parse(type: AnyType, raw: unknown, strict: boolean = this.config.strict): unknown {
    return unwrap(this.parseResult(type, raw, strict));
  }

  private parseAt(type: AnyType, raw: unknown, path: string, depth: number, run: ParseRun): Outcome<unknown> {
    if (depth > this.config.maxDepth) {
      return depthExceeded(this.config.maxDepth, path);
    }

    let resolved: ResolvedType;
    try {
      resolved = this.reflector.resolve(type);
    } catch (error) {
      return invalidDescriptor(error instanceof Error ? error.message : String(error), path);
    }

    const strategy = this.registry.resolve(resolved);
    if (strategy) {
      return this.invokeFromIr(strategy, resolved, raw, path, depth, run);
    }

    const container = this.reflector.asContainer(resolved);
    if (container) {
      return this.parseContainer(container, raw, path, depth, run);
    }

    const composite = this.reflector.asComposite(resolved);
    if (composite) {
      return this.parseComposite(composite, raw, path, depth, run);
    }

    if (run.strict) {
      return noStrategy(formatType(resolved), path, raw);
    }
    return this.passThrough(resolved, raw, path, run);
  }

  private parseContainer(
    type: ContainerType,
    raw: unknown,
    path: string,
    depth: number,
    run: ParseRun
  ): Outcome<unknown> {
    if (type.kind === "optional") {
      if (raw === null || raw === undefined) return done(undefined);
      return this.parseAt(type.element, raw, path, depth + 1, run);
    }

    let items: readonly unknown[];
    if (Array.isArray(raw)) {
      items = raw;
    } else if (type.kind === "set" && raw instanceof Set) {
      items = Array.from(raw);
    } else {
      return this.mismatch(type, raw, path, run);
    }

    const parsed: unknown[] = [];
    for (let i = 0; i < items.length; i++) {
      const result = this.parseAt(type.element, items[i], joinPath(path, i), depth + 1, run);
      if (!isDone(result)) return result;
      parsed.push(result.value);
    }
    return done(type.kind === "set" ? new Set(parsed) : parsed);
  }

  private parseComposite(
    type: StructType<unknown>,
    raw: unknown,
    path: string,
    depth: number,
    run: ParseRun
  ): Outcome<unknown> {
    if (type.ctor && raw instanceof type.ctor) {
      return done(raw);
    }
    if (!isMapping(raw)) {
      return this.mismatch(type, raw, path, run);
    }

    const values: Record<string, unknown> = {};
    for (const field of this.reflector.fields(type)) {
      const fieldPath = joinPath(path, field.name);

      if (Object.prototype.hasOwnProperty.call(raw, field.name)) {
        const result = this.parseAt(field.type, raw[field.name], fieldPath, depth + 1, run);
        if (!isDone(result)) return result;
        setEntry(values, field.name, result.value);
        continue;
      }

      if (field.default) {
        const fallback = field.default.kind === "factory" ? field.default.factory() : field.default.value;
        setEntry(values, field.name, fallback);
        continue;
      }

      if (run.strict) {
        return missingField(field.name, formatType(field.type), fieldPath);
      }

      const zero = this.reflector.zeroValue(field.type);
      run.notes.push(makeDiagnostic("M0401", { field: field.name }, fieldPath));
      this.logger.debug({ path: fieldPath, zero: zero.present }, "missing field in lenient parse");
      if (zero.present) {
        setEntry(values, field.name, zero.value);
      }
    }

    try {
      return done(type.create(values));
    } catch (error) {
      this.logger.warn({ type: type.name, path, err: error }, "composite constructor threw");
      return strategyError(`${type.name}.create`, error, path);
    }
  }

  private invokeFromIr(
    strategy: Strategy,
    target: AnyType,
    raw: unknown,
    path: string,
    depth: number,
    run: ParseRun
  ): Outcome<unknown> {
    const ctx: ParseContext = {
      path,
      strict: run.strict,
      resolve: type => this.reflector.resolve(type),
      parse: (type, child, segment) => this.parseAt(type, child, joinPath(path, segment), depth + 1, run),
      tryParse: (type, child) => this.parseAt(type, child, path, depth + 1, { strict: true, notes: [] }),
      mismatch: (expected, child) => this.mismatch(expected, child, path, run),
    };
    try {
      return strategy.fromIr(target, raw, run.strict, ctx);
    } catch (error) {
      this.logger.warn({ strategy: strategy.name, path, err: error }, "strategy threw during parse");
      return strategyError(strategy.name, error, path);
    }
  }

  private mismatch(expected: AnyType, raw: unknown, path: string, run: ParseRun): Outcome<unknown> {
    if (run.strict) {
      return typeMismatch(formatType(expected), shapeOf(raw), path, raw);
    }
    return this.passThrough(expected, raw, path, run);
  }

  private passThrough(expected: AnyType, raw: unknown, path: string, run: ParseRun): Outcome<unknown> {
    const diag = makeDiagnostic("M0400", { expected: formatType(expected), actual: shapeOf(raw) }, path);
    run.notes.push(diag);
    this.logger.debug({ path, expected: formatType(expected), actual: shapeOf(raw) }, "lenient pass-through");
    return done(raw);
  }
}

function builtinRegistry(reflector: TypeReflector): StrategyRegistry {
  const registry = new StrategyRegistry(reflector);
  registerBuiltins(registry);
  return registry;
}

function setEntry<V>(target: Record<string, V>, key: string, value: V): void {
  if (key === "__proto__") {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
  } else {
    target[key] = value;
  }
}
