import type { SortedSet } from './sorted-set.js';

export type ValueKind = 'string' | 'hash' | 'list' | 'set' | 'zset';

interface BaseValue {
  /** Absolute expiry in epoch milliseconds; absent means the key never expires. */
  expiresAt?: number;
}

export interface StringValue extends BaseValue {
  kind: 'string';
  data: string;
}

export interface HashValue extends BaseValue {
  kind: 'hash';
  data: Map<string, string>;
}

export interface ListValue extends BaseValue {
  kind: 'list';
  data: string[];
}

export interface SetValue extends BaseValue {
  kind: 'set';
  data: Set<string>;
}

export interface ZSetValue extends BaseValue {
  kind: 'zset';
  data: SortedSet;
}

export type StoredValue = StringValue | HashValue | ListValue | SetValue | ZSetValue;

export type ValueOfKind<K extends ValueKind> = Extract<StoredValue, { kind: K }>;

export const WRONGTYPE_MESSAGE = 'WRONGTYPE Operation against a key holding the wrong kind of value';

export class WrongTypeError extends Error {
  readonly expected: ValueKind;
  readonly actual: ValueKind;

  constructor(expected: ValueKind, actual: ValueKind) {
    super(WRONGTYPE_MESSAGE);
    this.name = 'WrongTypeError';
    this.expected = expected;
    this.actual = actual;
  }
}

export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: WrongTypeError };

export function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function wrongType<T>(expected: ValueKind, actual: ValueKind): StoreResult<T> {
  return { ok: false, error: new WrongTypeError(expected, actual) };
}

export interface ScanPage {
  cursor: number;
  items: string[];
}

export interface ScoredMember {
  member: string;
  score: number;
}

export function isExpired(value: StoredValue, now: number): boolean {
  return value.expiresAt !== undefined && value.expiresAt <= now;
}
