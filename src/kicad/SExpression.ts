/**
 * S-expression node model for KiCad files.
 *
 * Nodes keep the whitespace that preceded them in the source (`leading`) and,
 * for lists, the whitespace before the closing paren (`closing`). Quoted strings
 * keep their original source text. A node without recorded whitespace is
 * formatted by the writer following KiCad's own layout rules, so parsed and
 * freshly built nodes can be mixed freely inside one tree.
 */

export type SNode = SAtom | SString | SList;

/** Unquoted token: keywords, numbers, `yes`/`no`, enum values. */
export class SAtom {
  readonly kind = "atom";
  leading?: string;

  constructor(public value: string) {}
}

/** Double-quoted string. `value` is the unescaped text. */
export class SString {
  readonly kind = "string";
  leading?: string;
  value: string;
  private source?: { raw: string; value: string };

  constructor(value: string, raw?: string) {
    this.value = value;
    if (raw !== undefined) this.source = { raw, value };
  }

  /** Source text to emit verbatim, valid only while the value is untouched. */
  get raw(): string | undefined {
    return this.source && this.source.value === this.value ? this.source.raw : undefined;
  }
}

export class SList {
  readonly kind = "list";
  leading?: string;
  closing?: string;
  items: SNode[];

  constructor(items: SNode[] = []) {
    this.items = items;
  }

  get keyword(): string | undefined {
    const head = this.items[0];
    return head instanceof SAtom ? head.value : undefined;
  }

  get hasListChild(): boolean {
    return this.items.some((item) => item instanceof SList);
  }

  /** First child list whose keyword matches. */
  child(keyword: string): SList | undefined {
    for (const item of this.items) {
      if (item instanceof SList && item.keyword === keyword) return item;
    }
    return undefined;
  }

  children(keyword?: string): SList[] {
    const result: SList[] = [];
    for (const item of this.items) {
      if (item instanceof SList && (keyword === undefined || item.keyword === keyword)) result.push(item);
    }
    return result;
  }

  /** Text of the atom or string at `index`. */
  text(index: number): string | undefined {
    const item = this.items[index];
    if (item instanceof SAtom || item instanceof SString) return item.value;
    return undefined;
  }

  number(index: number): number | undefined {
    const item = this.items[index];
    if (!(item instanceof SAtom)) return undefined;
    const value = Number(item.value);
    return Number.isFinite(value) ? value : undefined;
  }

  /** Replaces the scalar at `index`, keeping the node's surrounding whitespace. */
  setText(index: number, value: string): void {
    const item = this.items[index];
    if (item instanceof SString) {
      item.value = value;
    } else if (item instanceof SAtom) {
      this.items[index] = adopt(str(value), item);
    } else if (index === this.items.length) {
      this.append(str(value));
    } else {
      throw new RangeError(`No scalar at index ${index} of (${this.keyword ?? ""})`);
    }
  }

  setNumber(index: number, value: number): void {
    this.setAtom(index, formatNumber(value));
  }

  setAtom(index: number, value: string): void {
    const item = this.items[index];
    if (item instanceof SAtom) {
      item.value = value;
    } else if (item instanceof SString) {
      this.items[index] = adopt(new SAtom(value), item);
    } else if (index === this.items.length) {
      this.append(new SAtom(value));
    } else {
      throw new RangeError(`No scalar at index ${index} of (${this.keyword ?? ""})`);
    }
  }

  append(node: SNode): SNode {
    return this.insert(this.items.length, node);
  }

  insert(index: number, node: SNode): SNode {
    if (node instanceof SList && !this.hasListChild && this.closing !== undefined && !this.closing.includes("\n")) {
      // An inline list that grows a nested list switches to block layout.
      this.closing = undefined;
    }
    this.items.splice(index, 0, node);
    return node;
  }

  /** Inserts `node` right after `anchor`, or appends when the anchor is absent. */
  insertAfter(anchor: SNode | undefined, node: SNode): SNode {
    const index = anchor ? this.items.indexOf(anchor) : -1;
    return this.insert(index === -1 ? this.items.length : index + 1, node);
  }

  remove(node: SNode): boolean {
    const index = this.items.indexOf(node);
    if (index === -1) return false;
    this.items.splice(index, 1);
    return true;
  }

  /**
   * Sets the values of the child list `(keyword ...)`, creating it after
   * `after` (or at the end) when missing.
   */
  upsert(keyword: string, values: Array<SNode | number>, after?: SNode): SList {
    const existing = this.child(keyword);
    const fresh = list(keyword, ...values);
    if (!existing) {
      this.insertAfter(after, fresh);
      return fresh;
    }
    existing.items.forEach((item, i) => {
      const replacement = fresh.items[i];
      if (replacement) fresh.items[i] = i === 0 || sameScalar(item, replacement) ? item : adopt(replacement, item);
    });
    existing.items = fresh.items;
    return existing;
  }
}

/** A parsed file: top-level nodes plus whatever trails the last one. */
export class SDocument {
  items: SNode[];
  trailing: string;

  constructor(items: SNode[] = [], trailing = "\n") {
    this.items = items;
    this.trailing = trailing;
  }

  get root(): SList | undefined {
    return this.items.find((item): item is SList => item instanceof SList);
  }
}

export function atom(value: string): SAtom {
  return new SAtom(value);
}

export function str(value: string): SString {
  return new SString(value);
}

export function num(value: number): SAtom {
  return new SAtom(formatNumber(value));
}

export function yesNo(value: boolean): SAtom {
  return new SAtom(value ? "yes" : "no");
}

/** Builds `(keyword ...items)`; plain numbers become formatted atoms. */
export function list(keyword: string, ...items: Array<SNode | number>): SList {
  return new SList([atom(keyword), ...items.map((item) => (typeof item === "number" ? num(item) : item))]);
}

/**
 * KiCad writes coordinates with at most four decimals, no trailing zeros and
 * never `-0`.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) throw new RangeError(`Cannot format non-finite number ${value}`);
  const fixed = value.toFixed(4).replace(/\.?0+$/, "");
  return fixed === "-0" ? "0" : fixed;
}

/** Escapes text for use between double quotes. */
export function escapeString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

export function quote(value: string): string {
  return `"${escapeString(value)}"`;
}

/**
 * Deep copy. With `stripTrivia` the copy forgets its source layout and will be
 * formatted from scratch wherever it is inserted.
 */
export function cloneNode<T extends SNode>(node: T, stripTrivia?: boolean): T;
export function cloneNode(node: SNode, stripTrivia = false): SNode {
  let copy: SNode;
  if (node instanceof SList) {
    const items = node.items.map((item) => cloneNode(item, stripTrivia));
    copy = new SList(items);
    if (!stripTrivia) copy.closing = node.closing;
  } else if (node instanceof SString) {
    copy = new SString(node.value, stripTrivia ? undefined : node.raw);
  } else {
    copy = new SAtom(node.value);
  }
  if (!stripTrivia) copy.leading = node.leading;
  return copy;
}

function adopt<T extends SNode>(node: T, previous: SNode): T {
  node.leading = previous.leading;
  return node;
}

function sameScalar(a: SNode, b: SNode): boolean {
  if (a instanceof SAtom && b instanceof SAtom) return a.value === b.value;
  if (a instanceof SString && b instanceof SString) return a.value === b.value;
  return false;
}
