import type {
  AnyType,
  ContainerType,
  Field,
  StructType,
  Type,
  TypeKey,
  LazyType,
} from "./descriptor";

/** A descriptor with every `lazy` wrapper resolved away. */
export type ResolvedType = Exclude<AnyType, LazyType<unknown>>;

export type ZeroValue = { readonly present: true; readonly value: unknown } | { readonly present: false };

const MAX_LAZY_HOPS = 32;

/** Class to composite descriptor links made by `t.struct`, shared by every reflector. */
const describedClasses = new WeakMap<object, StructType<unknown>>();

/**
 * Link a class to its composite descriptor for every reflector. Last link
 * for a class wins.
 */
export function describeClass(type: StructType<unknown>): void {
  if (type.ctor) {
    describedClasses.set(type.ctor, type);
  }
}

/**
 * Answers the questions the dispatch engine asks about types and values:
 * identity, composite fields, container element types and instance shapes.
 * The engine does not inspect descriptors or values any other way.
 */
export class TypeReflector {
  private structs = new WeakMap<object, StructType<unknown>>();

  /**
   * Link a class to a composite descriptor for this reflector only, taking
   * precedence over the link `t.struct` made.
   */
  registerStruct(type: StructType<unknown>): void {
    if (type.ctor) {
      this.structs.set(type.ctor, type);
    }
  }

  resolve<T>(type: Type<T>): ResolvedType {
    let current: AnyType = type;
    for (let hops = 0; current.kind === "lazy"; hops++) {
      if (hops >= MAX_LAZY_HOPS) {
        throw new Error(`Lazy type ${current.name} does not resolve to a concrete type`);
      }
      current = current.resolve();
    }
    return current;
  }

  identity(type: AnyType): TypeKey {
    return this.resolve(type).key;
  }

  origin(type: AnyType): TypeKey {
    return this.resolve(type).origin;
  }

  asComposite(type: AnyType): StructType<unknown> | undefined {
    const resolved = this.resolve(type);
    return resolved.kind === "struct" ? resolved : undefined;
  }

  fields(type: AnyType): readonly Field[] {
    return this.asComposite(type)?.fields ?? [];
  }

  asContainer(type: AnyType): ContainerType | undefined {
    const resolved = this.resolve(type);
    switch (resolved.kind) {
      case "optional":
      case "list":
      case "set":
        return resolved;
      default:
        return undefined;
    }
  }

  elementType(type: AnyType): AnyType | undefined {
    return this.asContainer(type)?.element;
  }

  /**
   * Field names of a composite value in declaration order: the declared
   * fields of a described class, or the own keys of a plain object.
   * Undefined when the value is not a composite.
   */
  instanceFields(value: object): readonly string[] | undefined {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      return Object.keys(value);
    }
    for (const ctor of this.constructorChain(value)) {
      const type = this.structs.get(ctor) ?? describedClasses.get(ctor);
      if (type) return type.fields.map(f => f.name);
    }
    return undefined;
  }

  /**
   * Elements of an ordered collection value (array or Set), in order.
   * Undefined for anything else.
   */
  instanceElements(value: object): readonly unknown[] | undefined {
    if (Array.isArray(value)) return value;
    if (value instanceof Set) return Array.from(value);
    return undefined;
  }

  /**
   * Registry keys of a runtime value, most specific first: the primitive
   * name, or the constructors along the prototype chain.
   */
  runtimeKeys(value: unknown): TypeKey[] {
    if (value === null || value === undefined) return ["null"];
    if (typeof value !== "object") return [typeof value];
    return this.constructorChain(value);
  }

  zeroValue(type: AnyType): ZeroValue {
    const resolved = this.resolve(type);
    switch (resolved.kind) {
      case "primitive":
        return resolved.zero ? { present: true, value: resolved.zero() } : { present: false };
      case "optional":
        return { present: true, value: undefined };
      case "list":
        return { present: true, value: [] };
      case "set":
        return { present: true, value: new Set() };
      case "dict":
        return { present: true, value: {} };
      case "map":
        return { present: true, value: new Map() };
      case "literal":
        return { present: true, value: resolved.values[0] };
      case "tuple": {
        const items: unknown[] = [];
        for (const item of resolved.items) {
          const zero = this.zeroValue(item);
          if (!zero.present) return { present: false };
          items.push(zero.value);
        }
        return { present: true, value: items };
      }
      default:
        return { present: false };
    }
  }

  private constructorChain(value: object): object[] {
    const chain: object[] = [];
    let proto: unknown = Object.getPrototypeOf(value);
    while (proto !== null && proto !== Object.prototype && typeof proto === "object") {
      const ctor: unknown = Object.getOwnPropertyDescriptor(proto, "constructor")?.value;
      if (typeof ctor === "function") chain.push(ctor);
      proto = Object.getPrototypeOf(proto);
    }
    return chain;
  }
}

export const defaultReflector = new TypeReflector();
