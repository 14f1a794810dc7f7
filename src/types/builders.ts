import type {
  AnyType,
  DictType,
  EnumLike,
  EnumType,
  Field,
  FieldDefault,
  Infer,
  LazyType,
  ListType,
  LiteralType,
  LiteralValue,
  MapType,
  OptionalType,
  PrimitiveType,
  SetType,
  StructType,
  TupleType,
  TypeKey,
  UnionType,
} from "./descriptor";
import { describeClass } from "./reflect";
import { Uuid } from "./uuid";
import { CalendarDate } from "./calendarDate";
import { failure } from "../outcome/failure";
import { makeDiagnostic } from "../outcome/codes";
import { MarshalError } from "../outcome/error";

export interface FieldDef<D extends AnyType> {
  readonly kind: "field";
  readonly type: D;
  readonly default?: FieldDefault;
}

export type FieldMap = Readonly<Record<string, AnyType | FieldDef<AnyType>>>;

export type FieldValue<F> = F extends FieldDef<infer D> ? Infer<D> : Infer<F>;

export type StructValues<F extends FieldMap> = { -readonly [K in keyof F]: FieldValue<F[K]> };

export interface StructOptions<T, F extends FieldMap> {
  /** Display name; defaults to the class name. */
  name?: string;
  /** Build an instance from resolved field values. */
  create?: (values: StructValues<F>) => T;
}

type InferAll<D extends readonly AnyType[]> = { -readonly [K in keyof D]: Infer<D[K]> };

function invalid(reason: string): MarshalError {
  return new MarshalError(
    failure("invalid-descriptor", `Invalid type descriptor: ${reason}`, {
      diagnostics: [makeDiagnostic("M0301", { reason })],
    })
  );
}

function primitive<T>(key: TypeKey, name: string, zero?: () => T): PrimitiveType<T> {
  return { kind: "primitive", key, origin: key, name, zero };
}

/**
 * Declare a field with a default. Without a default a field is required,
 * unless its type is optional.
 *
 * A `default` is shared by every parsed value, so it must be a primitive;
 * objects, arrays, sets and the like go through `defaultFactory`.
 */
export function field<D extends AnyType>(
  type: D,
  opts: { default: Infer<D> } | { defaultFactory: () => Infer<D> }
): FieldDef<D> {
  if ("defaultFactory" in opts) {
    return { kind: "field", type, default: { kind: "factory", factory: opts.defaultFactory } };
  }
  const value: unknown = opts.default;
  if ((typeof value === "object" && value !== null) || typeof value === "function") {
    throw invalid("field default must be a primitive; use defaultFactory for mutable values");
  }
  return { kind: "field", type, default: { kind: "value", value } };
}

function isFieldDef(input: AnyType | FieldDef<AnyType>): input is FieldDef<AnyType> {
  return input.kind === "field";
}

function toFields(fields: FieldMap): Field[] {
  if (fields === null || typeof fields !== "object") {
    throw invalid("composite fields must be an object");
  }
  return Object.entries(fields).map(([name, input]) => {
    if (isFieldDef(input)) {
      return { name, type: input.type, default: input.default };
    }
    if (input.kind === "optional") {
      return { name, type: input, default: { kind: "value", value: undefined } };
    }
    return { name, type: input };
  });
}

function isNullaryConstructor<T>(ctor: abstract new (...args: never[]) => T): ctor is new () => T {
  return ctor.length === 0;
}

function struct<T extends object, F extends FieldMap>(
  ctor: abstract new (...args: never[]) => T,
  fields: F,
  opts: StructOptions<T, F> = {}
): StructType<T> {
  let create = opts.create;
  if (!create) {
    if (!isNullaryConstructor(ctor)) {
      throw invalid(`${ctor.name} takes constructor arguments; pass a create function`);
    }
    const nullary: new () => T = ctor;
    create = (values: StructValues<F>): T => Object.assign(new nullary(), values);
  }
  const type: StructType<T> = {
    kind: "struct",
    key: ctor,
    origin: "struct",
    name: opts.name ?? ctor.name,
    fields: toFields(fields),
    ctor,
    create,
  };
  describeClass(type);
  return type;
}

function object<F extends FieldMap>(name: string, fields: F): StructType<StructValues<F>> {
  return {
    kind: "struct",
    key: Object.freeze({ composite: name }),
    origin: "struct",
    name,
    fields: toFields(fields),
    create: (values: StructValues<F>): StructValues<F> => ({ ...values }),
  };
}

function optional<D extends AnyType>(element: D): OptionalType<Infer<D> | undefined> {
  return { kind: "optional", key: "optional", origin: "optional", name: "optional", element };
}

function list<D extends AnyType>(element: D): ListType<Infer<D>[]> {
  return { kind: "list", key: "list", origin: "list", name: "list", element };
}

function set<D extends AnyType>(element: D): SetType<Set<Infer<D>>> {
  return { kind: "set", key: "set", origin: "set", name: "set", element };
}

function tuple<D extends AnyType[]>(...items: D): TupleType<InferAll<D>> {
  if (items.length === 0) {
    throw invalid("tuple needs at least one item type");
  }
  return { kind: "tuple", key: "tuple", origin: "tuple", name: "tuple", items };
}

/** Homogeneous tuple of any length. */
function tupleOf<D extends AnyType>(element: D): TupleType<Infer<D>[]> {
  return { kind: "tuple", key: "tuple", origin: "tuple", name: "tuple", items: [], rest: element };
}

function dict<D extends AnyType>(value: D): DictType<Record<string, Infer<D>>> {
  return { kind: "dict", key: "dict", origin: "dict", name: "dict", value };
}

function map<K extends AnyType, V extends AnyType>(keyType: K, value: V): MapType<Map<Infer<K>, Infer<V>>> {
  return { kind: "map", key: Map, origin: "map", name: "map", keyType, value };
}

function union<D extends AnyType[]>(...members: D): UnionType<Infer<D[number]>> {
  if (members.length === 0) {
    throw invalid("union needs at least one member");
  }
  return { kind: "union", key: "union", origin: "union", name: "union", members };
}

function literal<L extends LiteralValue[]>(...values: L): LiteralType<L[number]> {
  if (values.length === 0) {
    throw invalid("literal needs at least one value");
  }
  return { kind: "literal", key: "literal", origin: "literal", name: "literal", values };
}

function enumOf<E extends EnumLike>(members: E, name = "enum"): EnumType<E[keyof E]> {
  const entries = new Map<string, string | number>();
  for (const [memberName, value] of Object.entries(members)) {
    // Numeric enums carry reverse entries ("0" -> "Red"); skip them.
    if (typeof value === "string" && typeof members[value] === "number") continue;
    entries.set(memberName, value);
  }
  if (entries.size === 0) {
    throw invalid(`enum ${name} has no members`);
  }
  return { kind: "enum", key: members, origin: "enum", name, members: entries };
}

function lazy<D extends AnyType>(name: string, resolve: () => D): LazyType<Infer<D>> {
  return { kind: "lazy", key: "lazy", origin: "lazy", name, resolve };
}

/** Descriptor for instances of a class handled by a registered strategy. */
function instanceOf<T>(ctor: abstract new (...args: never[]) => T, name?: string): PrimitiveType<T> {
  return primitive(ctor, name ?? ctor.name);
}

/** Descriptor keyed by an arbitrary registry key. */
function custom<T>(key: TypeKey, name: string): PrimitiveType<T> {
  return primitive(key, name);
}

export const t = {
  string: primitive<string>("string", "string", () => ""),
  number: primitive<number>("number", "number", () => 0),
  int: primitive<number>("int", "int", () => 0),
  boolean: primitive<boolean>("boolean", "boolean", () => false),
  bigint: primitive<bigint>("bigint", "bigint", () => 0n),
  null: primitive<null>("null", "null", () => null),
  any: primitive<unknown>("any", "any"),
  date: primitive<Date>(Date, "date"),
  calendarDate: primitive<CalendarDate>(CalendarDate, "calendarDate"),
  bytes: primitive<Uint8Array>(Uint8Array, "bytes"),
  uuid: primitive<Uuid>(Uuid, "uuid"),
  optional,
  list,
  set,
  tuple,
  tupleOf,
  dict,
  map,
  union,
  literal,
  enum: enumOf,
  struct,
  object,
  lazy,
  instanceOf,
  custom,
};
