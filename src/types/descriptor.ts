/**
 * Runtime type descriptors. TypeScript erases types, so every target type the
 * engine can parse into is described by one of these values. `T` is a phantom
 * parameter carrying the value type the descriptor stands for.
 */

/** Registry key: a primitive name, a constructor, an enum object or a descriptor. */
export type TypeKey = string | object;

export type LiteralValue = string | number | boolean | null;

export type EnumLike = Readonly<Record<string, string | number>>;

export interface TypeBase<T> {
  readonly kind: string;
  /** Exact identity, first key looked up in the registry. */
  readonly key: TypeKey;
  /** Generic family ("list", "enum", "struct"), looked up when `key` misses. */
  readonly origin: TypeKey;
  readonly name: string;
  readonly __type?: T;
}

export interface PrimitiveType<T> extends TypeBase<T> {
  readonly kind: "primitive";
  readonly zero?: () => T;
}

export interface OptionalType<T> extends TypeBase<T> {
  readonly kind: "optional";
  readonly element: AnyType;
}

export interface ListType<T> extends TypeBase<T> {
  readonly kind: "list";
  readonly element: AnyType;
}

export interface SetType<T> extends TypeBase<T> {
  readonly kind: "set";
  readonly element: AnyType;
}

export interface TupleType<T> extends TypeBase<T> {
  readonly kind: "tuple";
  readonly items: readonly AnyType[];
  /** Element type of a variadic tail, if any. */
  readonly rest?: AnyType;
}

export interface DictType<T> extends TypeBase<T> {
  readonly kind: "dict";
  readonly value: AnyType;
}

export interface MapType<T> extends TypeBase<T> {
  readonly kind: "map";
  readonly keyType: AnyType;
  readonly value: AnyType;
}

export interface UnionType<T> extends TypeBase<T> {
  readonly kind: "union";
  readonly members: readonly AnyType[];
}

export interface LiteralType<T> extends TypeBase<T> {
  readonly kind: "literal";
  readonly values: readonly LiteralValue[];
}

export interface EnumType<T> extends TypeBase<T> {
  readonly kind: "enum";
  /** Member name to member value, without the reverse entries of numeric enums. */
  readonly members: ReadonlyMap<string, string | number>;
}

export type FieldDefault =
  | { readonly kind: "value"; readonly value: unknown }
  | { readonly kind: "factory"; readonly factory: () => unknown };

export interface Field {
  readonly name: string;
  readonly type: AnyType;
  readonly default?: FieldDefault;
}

export interface StructType<T> extends TypeBase<T> {
  readonly kind: "struct";
  readonly fields: readonly Field[];
  /** Class the instances belong to; absent for plain-object composites. */
  readonly ctor?: abstract new (...args: never[]) => unknown;
  create(values: Readonly<Record<string, unknown>>): T;
}

export interface LazyType<T> extends TypeBase<T> {
  readonly kind: "lazy";
  resolve(): AnyType;
}

export type Type<T> =
  | PrimitiveType<T>
  | OptionalType<T>
  | ListType<T>
  | SetType<T>
  | TupleType<T>
  | DictType<T>
  | MapType<T>
  | UnionType<T>
  | LiteralType<T>
  | EnumType<T>
  | StructType<T>
  | LazyType<T>;

export type AnyType = Type<unknown>;

export type ContainerType = OptionalType<unknown> | ListType<unknown> | SetType<unknown>;

/** Value type a descriptor stands for. */
export type Infer<D> = D extends TypeBase<infer T> ? T : never;
