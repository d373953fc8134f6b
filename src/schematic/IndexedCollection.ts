import { DuplicateIdError, NotFoundError } from "@sch/errors";

export interface Identified {
  readonly uuid: string;
}

/**
 * A secondary index. `key` may return several keys (the item is listed under
 * each) or none.
 */
export interface IndexSpec<T> {
  name: string;
  key: (item: T) => string | readonly string[] | undefined;
}

export interface CollectionStats {
  size: number;
  dirty: boolean;
  rebuilds: number;
}

/**
 * Ordered list of entities with lookup by identifier and by secondary keys.
 *
 * Indexes are not maintained incrementally: any change (through the collection
 * or through `markDirty` when an item's keyed field changes) flags them stale,
 * and the next lookup rebuilds all of them in one pass. Mutations never read
 * the indexes; identifier clashes are caught by a separately kept count.
 */
export class IndexedCollection<T extends Identified> implements Iterable<T> {
  private items: T[] = [];
  // Identifier to number of holders; loaded documents may repeat one.
  private readonly idCounts = new Map<string, number>();
  private byId = new Map<string, T>();
  private indexes = new Map<string, Map<string, T[]>>();
  private dirty = false;
  private rebuilds = 0;

  constructor(
    readonly kind: string,
    private readonly specs: ReadonlyArray<IndexSpec<T>> = [],
    initial: Iterable<T> = [],
  ) {
    // Loaded items may carry duplicate identifiers; validation reports those.
    this.items = [...initial];
    for (const item of this.items) this.countId(item.uuid, 1);
    this.dirty = true;
  }

  get size(): number {
    return this.items.length;
  }

  get stats(): CollectionStats {
    return { size: this.items.length, dirty: this.dirty, rebuilds: this.rebuilds };
  }

  /** Appends an item. Its identifier must not already be in the collection. */
  add(item: T): T {
    if (this.idCounts.has(item.uuid)) throw new DuplicateIdError(item.uuid, this.kind);
    this.items.push(item);
    this.countId(item.uuid, 1);
    this.markDirty();
    return item;
  }

  get(uuid: string): T | undefined {
    this.ensureIndexes();
    return this.byId.get(uuid);
  }

  require(uuid: string): T {
    const item = this.get(uuid);
    if (!item) throw new NotFoundError(this.kind, uuid);
    return item;
  }

  has(target: string | T): boolean {
    return typeof target === "string" ? this.idCounts.has(target) : this.items.includes(target);
  }

  findBy(index: string, key: string): T[] {
    return [...(this.index(index).get(key) ?? [])];
  }

  findOneBy(index: string, key: string): T | undefined {
    return this.index(index).get(key)?.[0];
  }

  find(predicate: (item: T) => boolean): T | undefined {
    return this.items.find(predicate);
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.items.filter(predicate);
  }

  /** Removes by identifier or by the item itself. */
  remove(target: string | T): T {
    const position =
      typeof target === "string" ? this.items.findIndex((item) => item.uuid === target) : this.items.indexOf(target);
    if (position === -1) {
      throw new NotFoundError(this.kind, typeof target === "string" ? target : target.uuid, "remove");
    }
    const [item] = this.items.splice(position, 1);
    this.countId(item.uuid, -1);
    this.markDirty();
    return item;
  }

  /** Removes every item listed under `key` in a secondary index. */
  removeBy(index: string, key: string): T[] {
    const matches = this.findBy(index, key);
    if (matches.length === 0) throw new NotFoundError(this.kind, `${index}=${key}`, "remove");
    this.items = this.items.filter((item) => !matches.includes(item));
    for (const item of matches) this.countId(item.uuid, -1);
    this.markDirty();
    return matches;
  }

  clear(): void {
    this.items = [];
    this.idCounts.clear();
    this.markDirty();
  }

  /** Flags the indexes stale; the next lookup rebuilds them. */
  markDirty(): void {
    this.dirty = true;
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }

  private countId(uuid: string, delta: number): void {
    const count = (this.idCounts.get(uuid) ?? 0) + delta;
    if (count > 0) this.idCounts.set(uuid, count);
    else this.idCounts.delete(uuid);
  }

  private index(name: string): Map<string, T[]> {
    this.ensureIndexes();
    const index = this.indexes.get(name);
    if (!index) throw new NotFoundError("index", `${this.kind}.${name}`);
    return index;
  }

  private ensureIndexes(): void {
    if (!this.dirty) return;

    const byId = new Map<string, T>();
    const indexes = new Map<string, Map<string, T[]>>();
    for (const def of this.specs) indexes.set(def.name, new Map());

    for (const item of this.items) {
      if (!byId.has(item.uuid)) byId.set(item.uuid, item);
      for (const def of this.specs) {
        const index = indexes.get(def.name);
        const raw = def.key(item);
        if (!index || raw === undefined) continue;
        const keys = typeof raw === "string" ? [raw] : raw;
        for (const key of new Set(keys)) {
          const bucket = index.get(key);
          if (bucket) bucket.push(item);
          else index.set(key, [item]);
        }
      }
    }

    this.byId = byId;
    this.indexes = indexes;
    this.dirty = false;
    this.rebuilds++;
  }
}
