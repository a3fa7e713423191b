/**
 * Value types with no native JavaScript counterpart.
 */

/** A pointer from a field to another record. */
export class Link {
  constructor(public readonly record: number) {
    if (!Number.isSafeInteger(record)) {
      throw new TypeError(`Link target must be an integer record id, got ${record}`);
    }
  }

  static to(record: number): Link {
    return new Link(record);
  }

  equals(other: unknown): boolean {
    return other instanceof Link && other.record === this.record;
  }

  toString(): string {
    return `@${this.record}`;
  }
}

/** A string value that the server stores without full-text indexing. */
export class Tag {
  constructor(public readonly value: string) {}

  static create(value: string): Tag {
    return new Tag(value);
  }

  equals(other: unknown): boolean {
    return other instanceof Tag && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }
}
