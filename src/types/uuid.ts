const HYPHENATED = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const COMPACT = /^[0-9a-f]{32}$/i;

/**
 * A UUID-like identifier, always held in canonical lowercase hyphenated form.
 */
export class Uuid {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Accepts hyphenated or 32-hex-digit text in any case.
   */
  static tryParse(text: string): Uuid | undefined {
    if (HYPHENATED.test(text)) {
      return new Uuid(text.toLowerCase());
    }
    if (COMPACT.test(text)) {
      const hex = text.toLowerCase();
      return new Uuid(
        `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`
      );
    }
    return undefined;
  }

  static parse(text: string): Uuid {
    const id = Uuid.tryParse(text);
    if (!id) {
      throw new Error(`Invalid UUID: ${text}`);
    }
    return id;
  }

  equals(other: Uuid): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
