import { describe, it, expect, beforeEach } from 'vitest';
import { Keyspace } from '../../src/store/keyspace.js';
import { WRONGTYPE_MESSAGE } from '../../src/store/types.js';

describe('Keyspace', () => {
  let now: number;
  let keyspace: Keyspace;

  beforeEach(() => {
    now = 1_000_000;
    keyspace = new Keyspace({ clock: () => now });
  });

  describe('strings and expiry', () => {
    it('should set and get values', () => {
      keyspace.set('greeting', 'hello');
      expect(keyspace.get('greeting')).toBe('hello');
      expect(keyspace.get('missing')).toBeNull();
    });

    it('should overwrite any existing kind', () => {
      keyspace.rpush('k', 'a');
      keyspace.set('k', 'v');
      expect(keyspace.type('k')).toBe('string');
      expect(keyspace.get('k')).toBe('v');
    });

    it('should hide a key once its ttl elapses', () => {
      keyspace.set('session', 'abc', 100);
      expect(keyspace.get('session')).toBe('abc');
      expect(keyspace.ttl('session')).toBe(100);

      now += 99;
      expect(keyspace.get('session')).toBe('abc');
      expect(keyspace.ttl('session')).toBe(1);

      now += 1;
      expect(keyspace.get('session')).toBeNull();
      expect(keyspace.exists('session')).toBe(0);
      expect(keyspace.type('session')).toBeNull();
      expect(keyspace.ttl('session')).toBe(-2);
    });

    it('should leave expired entries in place on reads', () => {
      keyspace.set('session', 'abc', 10);
      now += 20;
      expect(keyspace.get('session')).toBeNull();
      expect(keyspace.size).toBe(1);
    });

    it('should clear the ttl when a key is set again without one', () => {
      keyspace.set('k', 'v1', 100);
      keyspace.set('k', 'v2');
      expect(keyspace.ttl('k')).toBe(-1);
    });

    it('should return null for a string read of another kind', () => {
      keyspace.sadd('tags', 'a');
      expect(keyspace.get('tags')).toBeNull();
    });
  });

  describe('generic keys', () => {
    it('should delete and count existing keys', () => {
      keyspace.set('a', '1');
      keyspace.set('b', '2');
      expect(keyspace.exists('a', 'b', 'c', 'a')).toBe(3);
      expect(keyspace.delete('a', 'c')).toBe(1);
      expect(keyspace.exists('a')).toBe(0);
    });

    it('should list live keys matching a pattern in order', () => {
      keyspace.set('user:2', 'x');
      keyspace.set('user:1', 'x');
      keyspace.set('order:1', 'x');
      keyspace.set('user:3', 'x', 10);
      now += 10;
      expect(keyspace.keys('user:*')).toEqual(['user:1', 'user:2']);
      expect(keyspace.keys('*')).toEqual(['order:1', 'user:1', 'user:2']);
    });

    it('should report the kind of each key', () => {
      keyspace.set('s', 'v');
      keyspace.hset('h', 'f', 'v');
      keyspace.rpush('l', 'v');
      keyspace.sadd('st', 'v');
      keyspace.zadd('z', 1, 'v');
      expect(['s', 'h', 'l', 'st', 'z', 'none'].map(k => keyspace.type(k))).toEqual([
        'string', 'hash', 'list', 'set', 'zset', null,
      ]);
    });

    it('should flush everything', () => {
      keyspace.set('a', '1');
      keyspace.sadd('b', '1');
      expect(keyspace.flush()).toBe(2);
      expect(keyspace.size).toBe(0);
    });
  });

  describe('cleanupExpired', () => {
    it('should remove every expired entry without a limit', () => {
      keyspace.set('keep', 'v');
      keyspace.set('gone1', 'v', 5);
      keyspace.set('gone2', 'v', 5);
      now += 5;
      expect(keyspace.cleanupExpired()).toBe(2);
      expect(keyspace.size).toBe(1);
    });

    it('should examine at most the limit and resume on the next call', () => {
      for (let i = 0; i < 6; i++) {
        keyspace.set(`k${i}`, 'v', 1);
      }
      now += 1;
      expect(keyspace.cleanupExpired(4)).toBe(4);
      expect(keyspace.size).toBe(2);
      expect(keyspace.cleanupExpired(4)).toBe(2);
      expect(keyspace.size).toBe(0);
    });

    it('should scan the whole map without a limit after a bounded call', () => {
      for (let i = 0; i < 6; i++) {
        keyspace.set(`k${i}`, 'v', 10);
      }
      expect(keyspace.cleanupExpired(3)).toBe(0);
      now += 10;
      expect(keyspace.cleanupExpired()).toBe(6);
      expect(keyspace.size).toBe(0);
    });

    it('should start a fresh bounded walk after an unlimited one', () => {
      for (let i = 0; i < 4; i++) {
        keyspace.set(`k${i}`, 'v', 10);
      }
      expect(keyspace.cleanupExpired(2)).toBe(0);
      expect(keyspace.cleanupExpired()).toBe(0);
      now += 10;
      expect(keyspace.cleanupExpired(2)).toBe(2);
      expect(keyspace.size).toBe(2);
    });
  });

  describe('hashes', () => {
    it('should set, get and delete fields', () => {
      expect(keyspace.hset('user', 'name', 'ada')).toEqual({ ok: true, value: 1 });
      expect(keyspace.hset('user', 'name', 'grace')).toEqual({ ok: true, value: 0 });
      expect(keyspace.hget('user', 'name')).toEqual({ ok: true, value: 'grace' });
      expect(keyspace.hget('user', 'age')).toEqual({ ok: true, value: null });
      expect(keyspace.hdel('user', 'name', 'age')).toEqual({ ok: true, value: 1 });
    });

    it('should delete the key when the last field goes', () => {
      keyspace.hset('user', 'name', 'ada');
      keyspace.hdel('user', 'name');
      expect(keyspace.exists('user')).toBe(0);
    });

    it('should return a copy of all fields', () => {
      keyspace.hset('user', 'name', 'ada');
      keyspace.hset('user', 'lang', 'en');
      const res = keyspace.hgetall('user');
      expect(res.ok).toBe(true);
      if (!res.ok) return;
      expect([...res.value]).toEqual([['name', 'ada'], ['lang', 'en']]);
      res.value.set('name', 'changed');
      expect(keyspace.hget('user', 'name')).toEqual({ ok: true, value: 'ada' });
    });

    it('should scan fields as field/value pairs', () => {
      keyspace.hset('h', 'b', '2');
      keyspace.hset('h', 'a', '1');
      keyspace.hset('h', 'c', '3');
      expect(keyspace.hscan('h', 0, '*', 2)).toEqual({ ok: true, value: { cursor: 2, items: ['a', '1', 'b', '2'] } });
      expect(keyspace.hscan('h', 2, '*', 2)).toEqual({ ok: true, value: { cursor: 0, items: ['c', '3'] } });
      expect(keyspace.hscan('missing', 0, '*', 2)).toEqual({ ok: true, value: { cursor: 0, items: [] } });
    });
  });

  describe('lists', () => {
    it('should push to both ends', () => {
      expect(keyspace.lpush('l', 'a', 'b', 'c')).toEqual({ ok: true, value: 3 });
      expect(keyspace.rpush('l', 'd')).toEqual({ ok: true, value: 4 });
      expect(keyspace.lrange('l', 0, -1)).toEqual({ ok: true, value: ['c', 'b', 'a', 'd'] });
    });

    it('should pop from both ends and drop the emptied key', () => {
      keyspace.rpush('l', 'a', 'b');
      expect(keyspace.lpop('l')).toEqual({ ok: true, value: 'a' });
      expect(keyspace.rpop('l')).toEqual({ ok: true, value: 'b' });
      expect(keyspace.exists('l')).toBe(0);
      expect(keyspace.lpop('l')).toEqual({ ok: true, value: null });
    });

    it('should clamp ranges', () => {
      keyspace.rpush('l', 'a', 'b', 'c');
      expect(keyspace.lrange('l', -100, 100)).toEqual({ ok: true, value: ['a', 'b', 'c'] });
      expect(keyspace.lrange('l', -2, -1)).toEqual({ ok: true, value: ['b', 'c'] });
      expect(keyspace.lrange('l', 2, 1)).toEqual({ ok: true, value: [] });
      expect(keyspace.lrange('missing', 0, -1)).toEqual({ ok: true, value: [] });
    });

    it('should return a copy from lrange', () => {
      keyspace.rpush('l', 'a');
      const res = keyspace.lrange('l', 0, -1);
      if (res.ok) res.value.push('x');
      expect(keyspace.lrange('l', 0, -1)).toEqual({ ok: true, value: ['a'] });
    });
  });

  describe('sets', () => {
    it('should add, check and remove members', () => {
      expect(keyspace.sadd('s', 'b', 'a', 'b')).toEqual({ ok: true, value: 2 });
      expect(keyspace.sismember('s', 'a')).toEqual({ ok: true, value: true });
      expect(keyspace.sismember('s', 'z')).toEqual({ ok: true, value: false });
      expect(keyspace.smembers('s')).toEqual({ ok: true, value: ['a', 'b'] });
      expect(keyspace.srem('s', 'a', 'z')).toEqual({ ok: true, value: 1 });
      expect(keyspace.srem('s', 'b')).toEqual({ ok: true, value: 1 });
      expect(keyspace.exists('s')).toBe(0);
    });

    it('should scan members with a pattern', () => {
      keyspace.sadd('s', 'apple', 'avocado', 'banana');
      expect(keyspace.sscan('s', 0, 'a*', 10)).toEqual({ ok: true, value: { cursor: 0, items: ['apple', 'avocado'] } });
    });
  });

  describe('sorted sets', () => {
    it('should add members and report score changes', () => {
      expect(keyspace.zadd('z', 1, 'a')).toEqual({ ok: true, value: 1 });
      expect(keyspace.zadd('z', 1, 'a')).toEqual({ ok: true, value: 0 });
      expect(keyspace.zadd('z', 2, 'a')).toEqual({ ok: true, value: 1 });
      expect(keyspace.zscore('z', 'a')).toEqual({ ok: true, value: 2 });
      expect(keyspace.zscore('z', 'b')).toEqual({ ok: true, value: null });
    });

    it('should range by rank with and without scores', () => {
      keyspace.zadd('z', 3, 'c');
      keyspace.zadd('z', 1, 'a');
      keyspace.zadd('z', 2, 'b');
      expect(keyspace.zrange('z', 0, 1)).toEqual({ ok: true, value: ['a', 'b'] });
      expect(keyspace.zrangeWithScores('z', -1, -1)).toEqual({ ok: true, value: [{ member: 'c', score: 3 }] });
    });

    it('should drop the key when the last member is removed', () => {
      keyspace.zadd('z', 1, 'a');
      expect(keyspace.zrem('z', 'a', 'b')).toEqual({ ok: true, value: 1 });
      expect(keyspace.exists('z')).toBe(0);
    });
  });

  describe('type mismatches', () => {
    it('should reject operations against another kind', () => {
      keyspace.set('s', 'v');
      const results = [
        keyspace.hset('s', 'f', 'v'),
        keyspace.hget('s', 'f'),
        keyspace.lpush('s', 'v'),
        keyspace.lrange('s', 0, -1),
        keyspace.sadd('s', 'v'),
        keyspace.zadd('s', 1, 'v'),
        keyspace.zrange('s', 0, -1),
        keyspace.zrangeWithScores('s', 0, -1),
        keyspace.zscore('s', 'v'),
        keyspace.zrem('s', 'v'),
        keyspace.hdel('s', 'f'),
        keyspace.hgetall('s'),
        keyspace.hscan('s', 0, '*', 10),
        keyspace.rpush('s', 'v'),
        keyspace.lpop('s'),
        keyspace.rpop('s'),
        keyspace.srem('s', 'v'),
        keyspace.smembers('s'),
        keyspace.sismember('s', 'v'),
        keyspace.sscan('s', 0, '*', 10),
      ];
      for (const res of results) {
        expect(res.ok).toBe(false);
        if (!res.ok) expect(res.error.message).toBe(WRONGTYPE_MESSAGE);
      }
      expect(keyspace.get('s')).toBe('v');
      expect(keyspace.type('s')).toBe('string');
    });

    it('should leave containers untouched by operations for another kind', () => {
      keyspace.rpush('l', 'a', 'b');
      keyspace.hset('h', 'f', 'v');
      const results = [
        keyspace.hdel('l', 'a'),
        keyspace.srem('l', 'a'),
        keyspace.zrem('l', 'a'),
        keyspace.hscan('l', 0, '*', 10),
        keyspace.lpop('h'),
        keyspace.rpop('h'),
        keyspace.sscan('h', 0, '*', 10),
        keyspace.smembers('h'),
      ];
      for (const res of results) {
        expect(res.ok).toBe(false);
        if (!res.ok) expect(res.error.message).toBe(WRONGTYPE_MESSAGE);
      }
      expect(keyspace.lrange('l', 0, -1)).toEqual({ ok: true, value: ['a', 'b'] });
      expect(keyspace.hget('h', 'f')).toEqual({ ok: true, value: 'v' });
    });

    it('should replace an expired key of another kind', () => {
      keyspace.set('k', 'v', 10);
      now += 10;
      expect(keyspace.rpush('k', 'a')).toEqual({ ok: true, value: 1 });
      expect(keyspace.type('k')).toBe('list');
    });
  });

  describe('end-to-end behaviour on the real clock', () => {
    it('should expire a key after its ttl elapses', async () => {
      const live = new Keyspace();
      live.set('k', 'v', 100);
      expect(live.get('k')).toBe('v');
      await new Promise(r => setTimeout(r, 150));
      expect(live.get('k')).toBeNull();
    });

    it('should count only new set members', () => {
      const live = new Keyspace();
      expect(live.sadd('k', 'a', 'b', 'c')).toEqual({ ok: true, value: 3 });
      expect(live.sadd('k', 'b', 'd')).toEqual({ ok: true, value: 1 });
      expect(live.smembers('k')).toEqual({ ok: true, value: ['a', 'b', 'c', 'd'] });
    });

    it('should push to the head and pop from both ends', () => {
      const live = new Keyspace();
      live.lpush('k', 'a', 'b', 'c');
      expect(live.lrange('k', 0, -1)).toEqual({ ok: true, value: ['c', 'b', 'a'] });
      expect(live.lpop('k')).toEqual({ ok: true, value: 'c' });
      expect(live.rpop('k')).toEqual({ ok: true, value: 'a' });
    });

    it('should reorder a sorted set member after its score changes', () => {
      const live = new Keyspace();
      live.zadd('k', 1.0, 'a');
      live.zadd('k', 2.0, 'b');
      expect(live.zrange('k', 0, -1)).toEqual({ ok: true, value: ['a', 'b'] });
      live.zadd('k', 3.0, 'a');
      expect(live.zrange('k', 0, -1)).toEqual({ ok: true, value: ['b', 'a'] });
    });
  });
});
