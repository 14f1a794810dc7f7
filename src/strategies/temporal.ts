import { done, unsupportedType } from "../outcome/constructors";
import type { Strategy } from "../registry/types";
import { CalendarDate } from "../types/calendarDate";

const ISO_8601 =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

function normalizeZone(zone: string | undefined): string {
  if (zone === undefined || zone.toUpperCase() === "Z") return "Z";
  // +0200 -> +02:00
  return zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

/**
 * Parse ISO-8601 text into a Date. Text without an offset is read as UTC,
 * never as host-local time. Undefined if the text is not ISO-8601 or names
 * an impossible instant.
 */
export function parseIsoInstant(text: string): Date | undefined {
  const m = ISO_8601.exec(text);
  if (!m) return undefined;
  const day: string = m[1];
  const time: string | undefined = m[2];
  const date = new Date(time === undefined ? day : `${day}T${time}${normalizeZone(m[3])}`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Instants. IR form is `toISOString()`, which keeps millisecond precision.
 */
export const dateStrategy: Strategy<Date> = {
  name: "date",
  toIr: (value, ctx) =>
    Number.isNaN(value.getTime())
      ? unsupportedType("invalid Date", ctx.path, value)
      : done(value.toISOString()),
  fromIr: (target, raw, _strict, ctx) => {
    if (raw instanceof Date) {
      return Number.isNaN(raw.getTime()) ? ctx.mismatch(target, raw) : done(raw);
    }
    if (typeof raw === "string") {
      const parsed = parseIsoInstant(raw);
      if (parsed) return done(parsed);
    }
    return ctx.mismatch(target, raw);
  },
};

/**
 * Calendar days as `YYYY-MM-DD`. A Date is not accepted: which day an
 * instant falls on depends on a zone the IR does not carry.
 */
export const calendarDateStrategy: Strategy<CalendarDate> = {
  name: "calendarDate",
  toIr: value => done(value.toString()),
  fromIr: (target, raw, _strict, ctx) => {
    if (raw instanceof CalendarDate) return done(raw);
    if (typeof raw === "string") {
      const day = CalendarDate.tryParse(raw);
      if (day) return done(day);
    }
    return ctx.mismatch(target, raw);
  },
};
