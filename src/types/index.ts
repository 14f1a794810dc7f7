export * from "./descriptor";
export { t, field, type FieldDef, type FieldMap, type StructValues, type StructOptions } from "./builders";
export { TypeReflector, defaultReflector, describeClass, type ResolvedType, type ZeroValue } from "./reflect";
export { formatType } from "./format";
export { Uuid } from "./uuid";
export { CalendarDate } from "./calendarDate";
