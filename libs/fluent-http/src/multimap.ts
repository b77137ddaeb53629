export type MultiValueInit = Record<string, string | readonly string[]> | Iterable<readonly [string, string]>;

interface Entry {
  name: string;
  values: string[];
}

/**
 * Ordered multi-valued map. Keys keep the casing they were first inserted with;
 * subclasses decide whether lookups are case-sensitive.
 */
abstract class MultiValueMap {
  private readonly store = new Map<string, Entry>();

  constructor(init?: MultiValueInit) {
    if (init) {
      this.addAll(init);
    }
  }

  protected abstract normalize(name: string): string;

  /** Replaces every value stored under `name`. */
  set(name: string, value: string): this {
    this.store.set(this.normalize(name), { name, values: [value] });
    return this;
  }

  add(name: string, value: string): this {
    const key = this.normalize(name);
    const entry = this.store.get(key);
    if (entry) {
      entry.values.push(value);
    } else {
      this.store.set(key, { name, values: [value] });
    }
    return this;
  }

  addAll(init: MultiValueInit): this {
    for (const [name, value] of iterateInit(init)) {
      this.add(name, value);
    }
    return this;
  }

  /** First value stored under `name`. */
  get(name: string): string | undefined {
    return this.store.get(this.normalize(name))?.values[0];
  }

  values(name: string): string[] {
    return [...(this.store.get(this.normalize(name))?.values ?? [])];
  }

  has(name: string): boolean {
    return this.store.has(this.normalize(name));
  }

  delete(name: string): boolean {
    return this.store.delete(this.normalize(name));
  }

  clear(): void {
    this.store.clear();
  }

  /** Number of distinct keys. */
  get size(): number {
    return this.store.size;
  }

  keys(): string[] {
    return [...this.store.values()].map((entry) => entry.name);
  }

  /** Flattened name/value pairs; values of one key stay together, in insertion order. */
  entries(): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    for (const entry of this.store.values()) {
      for (const value of entry.values) {
        pairs.push([entry.name, value]);
      }
    }
    return pairs;
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries()[Symbol.iterator]();
  }

  /** Collapses repeated values into one string per key. */
  toRecord(separator = ', '): Record<string, string> {
    const record: Record<string, string> = {};
    for (const entry of this.store.values()) {
      record[entry.name] = entry.values.join(separator);
    }
    return record;
  }
}

function* iterateInit(init: MultiValueInit): Generator<[string, string]> {
  if (isPairIterable(init)) {
    for (const [name, value] of init) {
      yield [name, value];
    }
    return;
  }
  for (const [name, value] of Object.entries(init)) {
    if (typeof value === 'string') {
      yield [name, value];
    } else {
      for (const item of value) {
        yield [name, item];
      }
    }
  }
}

function isPairIterable(init: MultiValueInit): init is Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}

/** Header container: case-insensitive names, repeated values allowed. */
export class HeaderMap extends MultiValueMap {
  protected normalize(name: string): string {
    return name.toLowerCase();
  }

  clone(): HeaderMap {
    return new HeaderMap(this.entries());
  }
}

/** Query string and form container: case-sensitive names, repeated values allowed. */
export class ParamMap extends MultiValueMap {
  protected normalize(name: string): string {
    return name;
  }

  clone(): ParamMap {
    return new ParamMap(this.entries());
  }

  toSearchParams(): URLSearchParams {
    return new URLSearchParams(this.entries());
  }

  /** Pairs of `first` followed by pairs of `second`; nothing is deduplicated. */
  static merge(first: ParamMap, second: ParamMap): ParamMap {
    return new ParamMap([...first.entries(), ...second.entries()]);
  }
}
