import { SortedSet } from './sorted-set.js';
import { resolveRange } from './range.js';
import { matchingSorted, paginate } from './scan.js';
import {
  isExpired,
  ok,
  wrongType,
  type ScanPage,
  type ScoredMember,
  type StoredValue,
  type StoreResult,
  type ValueKind,
  type ValueOfKind,
} from './types.js';

function isKind<K extends ValueKind>(value: StoredValue, kind: K): value is ValueOfKind<K> {
  return value.kind === kind;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value kind: ${JSON.stringify(value)}`);
}

/**
 * Number of elements held by a container value. Strings count as one so they are never
 * treated as an emptied container.
 */
function elementCount(value: StoredValue): number {
  switch (value.kind) {
    case 'string':
      return 1;
    case 'hash':
      return value.data.size;
    case 'list':
      return value.data.length;
    case 'set':
      return value.data.size;
    case 'zset':
      return value.data.size;
    default:
      return assertNever(value);
  }
}

/**
 * The typed keyspace.
 *
 * Every public method runs to completion synchronously, so on the event loop each one is
 * atomic with respect to every other, including the expiry sweep. The backing map never
 * leaves this class; collection reads hand out copies.
 *
 * Expired entries are invisible to every operation. Reads skip them in place; writes and
 * the sweep remove them.
 */
export class Keyspace {
  private data = new Map<string, StoredValue>();
  private sweepCursor: Iterator<[string, StoredValue]> | null = null;
  private now: () => number;

  constructor(options: { clock?: () => number } = {}) {
    this.now = options.clock ?? Date.now;
  }

  /** Raw entry count, including expired entries the sweep has not reached yet. */
  get size(): number {
    return this.data.size;
  }

  // --- Generic keys ---

  set(key: string, value: string, ttlMs?: number): void {
    const entry: StoredValue = { kind: 'string', data: value };
    if (ttlMs !== undefined && ttlMs > 0) {
      entry.expiresAt = this.now() + ttlMs;
    }
    this.data.set(key, entry);
  }

  /** Missing, expired and non-string keys all read as null. */
  get(key: string): string | null {
    const entry = this.lookup(key);
    if (!entry || entry.kind !== 'string') return null;
    return entry.data;
  }

  delete(...keys: string[]): number {
    let removed = 0;
    for (const key of keys) {
      if (this.data.delete(key)) removed++;
    }
    return removed;
  }

  exists(...keys: string[]): number {
    let count = 0;
    for (const key of keys) {
      if (this.lookup(key)) count++;
    }
    return count;
  }

  keys(pattern: string): string[] {
    return matchingSorted(this.liveKeys(), pattern);
  }

  type(key: string): ValueKind | null {
    return this.lookup(key)?.kind ?? null;
  }

  /** Remaining time to live in ms; -2 when the key is missing, -1 when it never expires. */
  ttl(key: string): number {
    const entry = this.lookup(key);
    if (!entry) return -2;
    if (entry.expiresAt === undefined) return -1;
    return Math.max(0, entry.expiresAt - this.now());
  }

  flush(): number {
    const count = this.data.size;
    this.data.clear();
    this.sweepCursor = null;
    return count;
  }

  /**
   * Deletes expired entries, examining at most `limit` of them. A bounded call resumes
   * where the previous one stopped; the walk restarts after reaching the end of the map.
   * Without a limit every entry is examined, whatever an earlier bounded call left behind.
   */
  cleanupExpired(limit = Number.POSITIVE_INFINITY): number {
    const now = this.now();
    let removed = 0;
    let examined = 0;

    if (!this.sweepCursor || limit === Number.POSITIVE_INFINITY) {
      this.sweepCursor = this.data.entries();
    }

    while (examined < limit) {
      const next = this.sweepCursor.next();
      if (next.done) {
        this.sweepCursor = null;
        break;
      }
      examined++;
      const [key, value] = next.value;
      if (isExpired(value, now)) {
        this.data.delete(key);
        removed++;
      }
    }

    return removed;
  }

  // --- Hash ---

  hset(key: string, field: string, value: string): StoreResult<number> {
    const res = this.writable(key, 'hash', () => ({ kind: 'hash', data: new Map() }));
    if (!res.ok) return res;
    const isNew = !res.value.data.has(field);
    res.value.data.set(field, value);
    return ok(isNew ? 1 : 0);
  }

  hget(key: string, field: string): StoreResult<string | null> {
    const res = this.readable(key, 'hash');
    if (!res.ok) return res;
    return ok(res.value?.data.get(field) ?? null);
  }

  hdel(key: string, ...fields: string[]): StoreResult<number> {
    const res = this.existing(key, 'hash');
    if (!res.ok) return res;
    const hash = res.value;
    if (!hash) return ok(0);
    let removed = 0;
    for (const field of fields) {
      if (hash.data.delete(field)) removed++;
    }
    this.dropIfEmpty(key, hash);
    return ok(removed);
  }

  hgetall(key: string): StoreResult<Map<string, string>> {
    const res = this.readable(key, 'hash');
    if (!res.ok) return res;
    const hash = res.value?.data;
    return ok(hash ? new Map(hash) : new Map<string, string>());
  }

  hscan(key: string, cursor: number, pattern: string, count: number): StoreResult<ScanPage> {
    const res = this.readable(key, 'hash');
    if (!res.ok) return res;
    if (!res.value) return ok({ cursor: 0, items: [] });

    const hash = res.value.data;
    const page = paginate(matchingSorted(hash.keys(), pattern), cursor, count);
    const items: string[] = [];
    for (const field of page.items) {
      items.push(field, hash.get(field) ?? '');
    }
    return ok({ cursor: page.cursor, items });
  }

  // --- List ---

  lpush(key: string, ...values: string[]): StoreResult<number> {
    const res = this.writable(key, 'list', () => ({ kind: 'list', data: [] }));
    if (!res.ok) return res;
    // each value becomes the new head: LPUSH a b c -> [c, b, a]
    for (const value of values) {
      res.value.data.unshift(value);
    }
    return ok(res.value.data.length);
  }

  rpush(key: string, ...values: string[]): StoreResult<number> {
    const res = this.writable(key, 'list', () => ({ kind: 'list', data: [] }));
    if (!res.ok) return res;
    res.value.data.push(...values);
    return ok(res.value.data.length);
  }

  lpop(key: string): StoreResult<string | null> {
    return this.pop(key, list => list.shift());
  }

  rpop(key: string): StoreResult<string | null> {
    return this.pop(key, list => list.pop());
  }

  lrange(key: string, start: number, stop: number): StoreResult<string[]> {
    const res = this.readable(key, 'list');
    if (!res.ok) return res;
    const list = res.value?.data ?? [];
    const bounds = resolveRange(list.length, start, stop);
    return ok(bounds ? list.slice(bounds.start, bounds.stop + 1) : []);
  }

  // --- Set ---

  sadd(key: string, ...members: string[]): StoreResult<number> {
    const res = this.writable(key, 'set', () => ({ kind: 'set', data: new Set() }));
    if (!res.ok) return res;
    let added = 0;
    for (const member of members) {
      if (!res.value.data.has(member)) {
        res.value.data.add(member);
        added++;
      }
    }
    return ok(added);
  }

  srem(key: string, ...members: string[]): StoreResult<number> {
    const res = this.existing(key, 'set');
    if (!res.ok) return res;
    const set = res.value;
    if (!set) return ok(0);
    let removed = 0;
    for (const member of members) {
      if (set.data.delete(member)) removed++;
    }
    this.dropIfEmpty(key, set);
    return ok(removed);
  }

  smembers(key: string): StoreResult<string[]> {
    const res = this.readable(key, 'set');
    if (!res.ok) return res;
    return ok([...(res.value?.data ?? [])].sort());
  }

  sismember(key: string, member: string): StoreResult<boolean> {
    const res = this.readable(key, 'set');
    if (!res.ok) return res;
    return ok(res.value?.data.has(member) ?? false);
  }

  sscan(key: string, cursor: number, pattern: string, count: number): StoreResult<ScanPage> {
    const res = this.readable(key, 'set');
    if (!res.ok) return res;
    if (!res.value) return ok({ cursor: 0, items: [] });
    return ok(paginate(matchingSorted(res.value.data, pattern), cursor, count));
  }

  // --- Sorted set ---

  /**
   * Returns 1 when the member is new or its score changed, 0 when the score is unchanged.
   * Reporting a score change as 1 differs from the reference database, which counts only
   * new members; clients of this engine rely on the current behavior.
   */
  zadd(key: string, score: number, member: string): StoreResult<number> {
    const res = this.writable(key, 'zset', () => ({ kind: 'zset', data: new SortedSet() }));
    if (!res.ok) return res;
    return ok(res.value.data.add(member, score) ? 1 : 0);
  }

  zscore(key: string, member: string): StoreResult<number | null> {
    const res = this.readable(key, 'zset');
    if (!res.ok) return res;
    return ok(res.value?.data.score(member) ?? null);
  }

  zrange(key: string, start: number, stop: number): StoreResult<string[]> {
    const res = this.readable(key, 'zset');
    if (!res.ok) return res;
    return ok(res.value?.data.range(start, stop) ?? []);
  }

  zrangeWithScores(key: string, start: number, stop: number): StoreResult<ScoredMember[]> {
    const res = this.readable(key, 'zset');
    if (!res.ok) return res;
    return ok(res.value?.data.rangeWithScores(start, stop) ?? []);
  }

  zrem(key: string, ...members: string[]): StoreResult<number> {
    const res = this.existing(key, 'zset');
    if (!res.ok) return res;
    const zset = res.value;
    if (!zset) return ok(0);
    let removed = 0;
    for (const member of members) {
      if (zset.data.remove(member)) removed++;
    }
    this.dropIfEmpty(key, zset);
    return ok(removed);
  }

  // --- Cursor iteration over keys ---

  scan(cursor: number, pattern: string, count: number): ScanPage {
    return paginate(this.keys(pattern), cursor, count);
  }

  // --- Internals ---

  private *liveKeys(): Generator<string> {
    const now = this.now();
    for (const [key, value] of this.data) {
      if (!isExpired(value, now)) yield key;
    }
  }

  private lookup(key: string): StoredValue | undefined {
    const entry = this.data.get(key);
    if (!entry || isExpired(entry, this.now())) return undefined;
    return entry;
  }

  /** Read access: undefined when the key is missing or expired. */
  private readable<K extends ValueKind>(key: string, kind: K): StoreResult<ValueOfKind<K> | undefined> {
    const entry = this.lookup(key);
    if (!entry) return ok(undefined);
    if (!isKind(entry, kind)) return wrongType(kind, entry.kind);
    return ok(entry);
  }

  /** Removal access: like readable, but an expired entry is dropped on the way. */
  private existing<K extends ValueKind>(key: string, kind: K): StoreResult<ValueOfKind<K> | undefined> {
    this.dropExpired(key);
    return this.readable(key, kind);
  }

  /** Insert access: creates the value when the key is missing or expired. */
  private writable<K extends ValueKind>(
    key: string,
    kind: K,
    create: () => ValueOfKind<K>,
  ): StoreResult<ValueOfKind<K>> {
    this.dropExpired(key);
    const entry = this.data.get(key);
    if (!entry) {
      const fresh = create();
      this.data.set(key, fresh);
      return ok(fresh);
    }
    if (!isKind(entry, kind)) return wrongType(kind, entry.kind);
    return ok(entry);
  }

  private pop(key: string, take: (list: string[]) => string | undefined): StoreResult<string | null> {
    const res = this.existing(key, 'list');
    if (!res.ok) return res;
    const list = res.value;
    if (!list) return ok(null);
    const value = take(list.data);
    this.dropIfEmpty(key, list);
    return ok(value ?? null);
  }

  private dropExpired(key: string): void {
    const entry = this.data.get(key);
    if (entry && isExpired(entry, this.now())) {
      this.data.delete(key);
    }
  }

  private dropIfEmpty(key: string, value: StoredValue): void {
    if (elementCount(value) === 0) {
      this.data.delete(key);
    }
  }
}
