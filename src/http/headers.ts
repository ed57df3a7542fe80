/**
 * Case-insensitive HTTP header multimap.
 *
 * Names are matched case-insensitively but remembered as first written.
 * Repeated values for one name are kept in insertion order and read back
 * comma-joined.
 */

interface HeaderEntry {
  name: string;
  values: string[];
}

export type RawHeaders = Record<string, string | readonly string[] | undefined>;

export class HttpHeaders implements Iterable<[string, string]> {
  private readonly entries = new Map<string, HeaderEntry>();

  constructor(init?: RawHeaders | HttpHeaders) {
    if (init instanceof HttpHeaders) {
      for (const entry of init.entries.values()) {
        this.entries.set(entry.name.toLowerCase(), { name: entry.name, values: [...entry.values] });
      }
    } else if (init) {
      for (const [name, value] of Object.entries(init)) {
        if (value === undefined) continue;
        if (typeof value === "string") {
          this.append(name, value);
        } else {
          for (const v of value) this.append(name, v);
        }
      }
    }
  }

  /**
   * Get the comma-joined value for a header, or undefined when absent.
   */
  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase())?.values.join(",");
  }

  getAll(name: string): string[] {
    return [...(this.entries.get(name.toLowerCase())?.values ?? [])];
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  /**
   * Replace every value of a header.
   */
  set(name: string, value: string | number): this {
    this.entries.set(name.toLowerCase(), { name, values: [String(value)] });
    return this;
  }

  append(name: string, value: string | number): this {
    const existing = this.entries.get(name.toLowerCase());
    if (existing) {
      existing.values.push(String(value));
    } else {
      this.entries.set(name.toLowerCase(), { name, values: [String(value)] });
    }
    return this;
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  names(): string[] {
    return [...this.entries.values()].map((entry) => entry.name);
  }

  get size(): number {
    return this.entries.size;
  }

  clone(): HttpHeaders {
    return new HttpHeaders(this);
  }

  /**
   * Flatten into a plain record keyed by the original names.
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [name, value] of this) {
      record[name] = value;
    }
    return record;
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const entry of this.entries.values()) {
      yield [entry.name, entry.values.join(",")];
    }
  }
}
