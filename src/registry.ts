/**
 * ReportCalc – Registry
 *
 * Name → entry table used for calculation functions and table transformers.
 * A registry is an explicit value passed to whoever needs it; there is no
 * process-wide instance. Registering an existing name replaces the entry.
 *
 * License: Apache-2.0
 */

export class Registry<T> {
  private readonly entries: Map<string, T>;

  constructor(
    /** Used in error messages, e.g. "function" or "transformer". */
    public readonly kind: string,
    entries?: Iterable<readonly [string, T]>,
  ) {
    this.entries = new Map(entries);
  }

  register(name: string, entry: T): this {
    if (typeof name !== 'string' || name.trim() === '') {
      throw new TypeError(`${this.kind} name must be a non-empty string`);
    }
    if (typeof entry !== 'function') {
      throw new TypeError(`${this.kind} "${name}" must be a function, got ${typeof entry}`);
    }
    this.entries.set(name, entry);
    return this;
  }

  get(name: string): T | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Names in registration order. */
  list(): string[] {
    return [...this.entries.keys()];
  }

  /** Independent copy; later registrations do not leak between the two. */
  clone(): Registry<T> {
    return new Registry(this.kind, this.snapshot());
  }

  protected snapshot(): Array<[string, T]> {
    return [...this.entries];
  }
}
