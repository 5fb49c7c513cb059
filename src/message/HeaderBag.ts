/**
 * HeaderBag
 *
 * Case-insensitive, order-preserving multi-value header store shared by
 * Request and Response. Keys are lower-cased on the way in and every value is
 * a string. A bag is never mutated; with/withAdded/without return a new one.
 */

export type RawHeaderScalar = string | number | boolean;

export type RawHeaderValue = RawHeaderScalar | readonly RawHeaderScalar[] | null | undefined;

export type RawHeaders = Readonly<Record<string, RawHeaderValue>>;

export type HeaderRecord = Record<string, string[]>;

function toValues(value: RawHeaderValue): string[] {
  if (value === null || value === undefined) {
    return [""];
  }
  if (Array.isArray(value)) {
    return value.map((item: RawHeaderScalar) => String(item));
  }
  return [String(value)];
}

export class HeaderBag implements Iterable<[string, readonly string[]]> {
  private readonly headers: ReadonlyMap<string, readonly string[]>;

  private constructor(headers: Map<string, readonly string[]>) {
    this.headers = headers;
  }

  static empty(): HeaderBag {
    return new HeaderBag(new Map());
  }

  /**
   * Builds a bag from caller-supplied headers. When two names differ only in
   * case, the later entry replaces the earlier one. Null and undefined become
   * a single empty value.
   */
  static normalize(raw: RawHeaders | HeaderBag = {}): HeaderBag {
    if (raw instanceof HeaderBag) {
      return raw;
    }

    const cleaned = new Map<string, readonly string[]>();
    for (const [name, value] of Object.entries(raw)) {
      cleaned.set(name.toLowerCase(), Object.freeze(toValues(value)));
    }
    return new HeaderBag(cleaned);
  }

  get size(): number {
    return this.headers.size;
  }

  has(name: string): boolean {
    return this.headers.has(name.toLowerCase());
  }

  get(name: string): string[] {
    return [...(this.headers.get(name.toLowerCase()) ?? [])];
  }

  /** Values joined with ", "; empty string when absent. */
  getLine(name: string): string {
    return this.get(name).join(", ");
  }

  names(): string[] {
    return [...this.headers.keys()];
  }

  with(name: string, value: RawHeaderScalar | readonly RawHeaderScalar[]): HeaderBag {
    const next = new Map(this.headers);
    next.set(name.toLowerCase(), Object.freeze(toValues(value)));
    return new HeaderBag(next);
  }

  withAdded(name: string, value: RawHeaderScalar | readonly RawHeaderScalar[]): HeaderBag {
    const key = name.toLowerCase();
    const next = new Map(this.headers);
    next.set(key, Object.freeze([...(this.headers.get(key) ?? []), ...toValues(value)]));
    return new HeaderBag(next);
  }

  without(name: string): HeaderBag {
    const key = name.toLowerCase();
    if (!this.headers.has(key)) {
      return this;
    }
    const next = new Map(this.headers);
    next.delete(key);
    return new HeaderBag(next);
  }

  toRecord(): HeaderRecord {
    const record: HeaderRecord = {};
    for (const [name, values] of this.headers) {
      record[name] = [...values];
    }
    return record;
  }

  /** Same names with the same values in the same order; name order is ignored. */
  equals(other: HeaderBag): boolean {
    if (other.size !== this.size) {
      return false;
    }
    for (const [name, values] of this.headers) {
      const otherValues = other.get(name);
      if (
        !other.has(name) ||
        otherValues.length !== values.length ||
        values.some((value, index) => otherValues[index] !== value)
      ) {
        return false;
      }
    }
    return true;
  }

  *[Symbol.iterator](): Iterator<[string, readonly string[]]> {
    for (const [name, values] of this.headers) {
      yield [name, values];
    }
  }
}
