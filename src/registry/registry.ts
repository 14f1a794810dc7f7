import type { AnyType, TypeKey } from "../types/descriptor";
import { defaultReflector, type ResolvedType, type TypeReflector } from "../types/reflect";
import type { Logger } from "../log/logger";
import type { KeyPredicate, Matcher, Strategy } from "./types";

export type RegistryTarget = TypeKey | AnyType;

export function isTypeDescriptor(target: unknown): target is AnyType {
  return (
    typeof target === "object" &&
    target !== null &&
    "kind" in target &&
    "key" in target &&
    "origin" in target &&
    typeof target.kind === "string"
  );
}

/**
 * Human-readable form of a registry key.
 */
export function describeKey(key: TypeKey): string {
  if (typeof key === "string") return key;
  if (typeof key === "function") return key.name || "<anonymous class>";
  if ("composite" in key && typeof key.composite === "string") return key.composite;
  return "<object>";
}

/**
 * Process-wide table from type identity to strategy, plus predicate
 * matchers consulted when no identity matches.
 *
 * Every mutation is a single Map write or array swap, so a lookup observes
 * either the old or the new entry for a key.
 */
export class StrategyRegistry {
  private entries: Map<TypeKey, Strategy> = new Map();
  private matchers: readonly Matcher[] = [];

  constructor(
    private readonly reflector: TypeReflector = defaultReflector,
    private readonly logger?: Logger
  ) {}

  /**
   * Register a strategy. Overwrites an existing entry for the same key.
   */
  register<T>(target: RegistryTarget, strategy: Strategy<T>): void {
    const key = this.keyOf(target);
    const previous = this.entries.get(key);
    this.entries.set(key, strategy);
    this.logger?.debug(
      { key: describeKey(key), strategy: strategy.name, replaced: previous?.name },
      previous ? "strategy overwritten" : "strategy registered"
    );
  }

  /**
   * Remove the entry for a key. Absent keys are ignored.
   */
  deregister(target: RegistryTarget): void {
    const key = this.keyOf(target);
    if (this.entries.delete(key)) {
      this.logger?.debug({ key: describeKey(key) }, "strategy deregistered");
    }
  }

  lookup(target: RegistryTarget): Strategy | undefined {
    return this.entries.get(this.keyOf(target));
  }

  has(target: RegistryTarget): boolean {
    return this.entries.has(this.keyOf(target));
  }

  keys(): TypeKey[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Register a predicate-keyed strategy. A matcher with the same name is
   * replaced in place; new matchers are consulted after existing ones.
   */
  registerMatcher<T>(name: string, test: KeyPredicate, strategy: Strategy<T>): void {
    const matcher: Matcher = { name, test, strategy };
    const index = this.matchers.findIndex(m => m.name === name);
    this.matchers =
      index === -1
        ? [...this.matchers, matcher]
        : this.matchers.map((m, i) => (i === index ? matcher : m));
    this.logger?.debug({ matcher: name, strategy: strategy.name }, "matcher registered");
  }

  deregisterMatcher(name: string): void {
    const remaining = this.matchers.filter(m => m.name !== name);
    if (remaining.length !== this.matchers.length) {
      this.matchers = remaining;
      this.logger?.debug({ matcher: name }, "matcher deregistered");
    }
  }

  listMatchers(): Array<{ name: string; strategy: string }> {
    return this.matchers.map(m => ({ name: m.name, strategy: m.strategy.name }));
  }

  /**
   * Strategy for a declared type: exact identity, then the generic origin,
   * then matchers against either.
   */
  resolve(type: ResolvedType): Strategy | undefined {
    return (
      this.entries.get(type.key) ??
      this.entries.get(type.origin) ??
      this.matchFirst([type.key, type.origin])
    );
  }

  /**
   * Strategy for a runtime value given its keys, most specific first.
   */
  resolveRuntime(keys: readonly TypeKey[]): Strategy | undefined {
    for (const key of keys) {
      const strategy = this.entries.get(key);
      if (strategy) return strategy;
    }
    return this.matchFirst(keys);
  }

  /**
   * Independent copy sharing the reflector and logger.
   */
  clone(): StrategyRegistry {
    const copy = new StrategyRegistry(this.reflector, this.logger);
    for (const [key, strategy] of this.entries) {
      copy.entries.set(key, strategy);
    }
    copy.matchers = [...this.matchers];
    return copy;
  }

  private matchFirst(keys: readonly TypeKey[]): Strategy | undefined {
    for (const matcher of this.matchers) {
      if (keys.some(key => matcher.test(key))) return matcher.strategy;
    }
    return undefined;
  }

  private keyOf(target: RegistryTarget): TypeKey {
    return isTypeDescriptor(target) ? this.reflector.identity(target) : target;
  }
}
