/**
 * Read-only view over a weakly typed, partially populated structure
 * (protocol messages turned into plain objects, Maps, arrays).
 *
 * Every lookup returns another tree; a missing branch is an empty tree,
 * never an exception. Leaves are converted on demand by `string()` and
 * `number()`, which return `undefined` for absent or unusable values.
 */
export class OptionalTree {
  private static readonly EMPTY = new OptionalTree(undefined);

  private readonly value: unknown;

  private constructor(value: unknown) {
    this.value = value;
  }

  static of(value: unknown): OptionalTree {
    return isAbsentValue(value) ? OptionalTree.EMPTY : new OptionalTree(value);
  }

  get raw(): unknown {
    return this.value;
  }

  isAbsent(): boolean {
    return isAbsentValue(this.value);
  }

  get(key: string | number): OptionalTree {
    const v = this.value;
    if (v instanceof Map) {
      if (v.has(key)) return OptionalTree.of(v.get(key));
      // Map 的键可能是数字也可能是字符串
      const alt = typeof key === 'number' ? String(key) : toIntegerKey(key);
      return alt === undefined ? OptionalTree.EMPTY : OptionalTree.of(v.get(alt));
    }
    if (Array.isArray(v)) {
      const idx = typeof key === 'number' ? key : toIntegerKey(key);
      return idx === undefined ? OptionalTree.EMPTY : OptionalTree.of(v[idx]);
    }
    if (isRecord(v)) {
      const k = String(key);
      return Object.prototype.hasOwnProperty.call(v, k) ? OptionalTree.of(v[k]) : OptionalTree.EMPTY;
    }
    return OptionalTree.EMPTY;
  }

  path(...keys: Array<string | number>): OptionalTree {
    let node: OptionalTree = this;
    for (const key of keys) {
      node = node.get(key);
      if (node.isAbsent()) return OptionalTree.EMPTY;
    }
    return node;
  }

  /** First key whose value is present, in the given order. */
  first(keys: readonly string[]): OptionalTree {
    for (const key of keys) {
      const node = this.get(key);
      if (!node.isAbsent()) return node;
    }
    return OptionalTree.EMPTY;
  }

  or(other: OptionalTree): OptionalTree {
    return this.isAbsent() ? other : this;
  }

  string(): string | undefined {
    const v = this.value;
    if (typeof v === 'string') return v === '' ? undefined : v;
    if (typeof v === 'number') return Number.isFinite(v) ? String(v) : undefined;
    if (typeof v === 'bigint') return v.toString();
    if (v instanceof Uint8Array) {
      const text = Buffer.from(v).toString('utf8');
      return text === '' ? undefined : text;
    }
    return undefined;
  }

  number(): number | undefined {
    const v = this.value;
    if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
    if (typeof v === 'bigint') return Number(v);
    if (typeof v === 'string' && NUMERIC_RE.test(v.trim())) return Number(v.trim());
    return undefined;
  }

  /** Child trees of a list, in source order. */
  items(): OptionalTree[] {
    const v = this.value;
    if (Array.isArray(v)) return v.map((item) => OptionalTree.of(item));
    return [];
  }

  /** Entry count of a mapping or list; `undefined` when this is not a collection. */
  size(): number | undefined {
    const v = this.value;
    if (v instanceof Map) return v.size;
    if (Array.isArray(v)) return v.length;
    if (isRecord(v)) return Object.keys(v).length;
    return undefined;
  }
}

const NUMERIC_RE = /^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v) && !(v instanceof Map) && !(v instanceof Uint8Array);
}

function isAbsentValue(v: unknown): boolean {
  return v === undefined || v === null || v === '';
}

function toIntegerKey(key: string): number | undefined {
  return /^\d+$/.test(key) ? Number(key) : undefined;
}
