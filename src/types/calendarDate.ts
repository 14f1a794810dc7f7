const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * A day on the calendar with no time of day and no zone. Text form is
 * `YYYY-MM-DD`.
 */
export class CalendarDate {
  private constructor(
    readonly year: number,
    /** 1-12 */
    readonly month: number,
    readonly day: number
  ) {}

  /**
   * Undefined unless the parts name a real day (so no February 30th).
   */
  static of(year: number, month: number, day: number): CalendarDate | undefined {
    if (![year, month, day].every(Number.isInteger) || year < 0 || year > 9999) {
      return undefined;
    }
    const probe = new Date(Date.UTC(2000, month - 1, day));
    probe.setUTCFullYear(year);
    if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
      return undefined;
    }
    return new CalendarDate(year, month, day);
  }

  static tryParse(text: string): CalendarDate | undefined {
    const m = CALENDAR_DATE.exec(text);
    return m ? CalendarDate.of(Number(m[1]), Number(m[2]), Number(m[3])) : undefined;
  }

  static parse(text: string): CalendarDate {
    const date = CalendarDate.tryParse(text);
    if (!date) {
      throw new Error(`Invalid calendar date: ${text}`);
    }
    return date;
  }

  /** The UTC calendar day of an instant. */
  static fromInstant(instant: Date): CalendarDate {
    return new CalendarDate(instant.getUTCFullYear(), instant.getUTCMonth() + 1, instant.getUTCDate());
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
