import { describe, expect, it } from 'vitest';

import { ClockRegressionError, InvalidConfigError } from '../errors.js';
import { MAX_SEQUENCE, MAX_TIMESTAMP, SNOWFLAKE_EPOCH, SnowflakeGenerator, decodeSnowflake } from '../utils/snowflake.js';

function scriptedClock(values: number[]) {
  let i = 0;
  return () => {
    const v = values[Math.min(i, values.length - 1)] ?? 0;
    i += 1;
    return v;
  };
}

describe('SnowflakeGenerator', () => {
  it('rejects region and worker ids outside [0, 31]', () => {
    expect(() => new SnowflakeGenerator({ regionId: 32, workerId: 0 })).toThrow(InvalidConfigError);
    expect(() => new SnowflakeGenerator({ regionId: 0, workerId: -1 })).toThrow(InvalidConfigError);
    expect(() => new SnowflakeGenerator({ regionId: 1.5, workerId: 0 })).toThrow(InvalidConfigError);
    expect(() => new SnowflakeGenerator({ regionId: 31, workerId: 31 })).not.toThrow();
  });

  it('lays out timestamp, region, worker and sequence bits', () => {
    const ts = SNOWFLAKE_EPOCH + 5;
    const gen = new SnowflakeGenerator({ regionId: 3, workerId: 7, clock: () => ts });
    const first = gen.nextId();
    const second = gen.nextId();

    expect(first).toBe((5n << 22n) | (3n << 17n) | (7n << 12n));
    expect(second).toBe(first + 1n);
    expect(decodeSnowflake(second)).toEqual({ timestamp: ts, regionId: 3, workerId: 7, sequence: 1 });
  });

  it('produces strictly increasing ids across calls', () => {
    const gen = new SnowflakeGenerator({ regionId: 1, workerId: 1 });
    let prev = -1n;
    for (let i = 0; i < 10_000; i++) {
      const id = gen.nextId();
      expect(id > prev).toBe(true);
      prev = id;
    }
  });

  it('resets the sequence when the millisecond advances', () => {
    const base = SNOWFLAKE_EPOCH + 1000;
    const gen = new SnowflakeGenerator({ regionId: 0, workerId: 0, clock: scriptedClock([base, base, base + 1]) });
    gen.nextId();
    expect(decodeSnowflake(gen.nextId()).sequence).toBe(1);
    const third = decodeSnowflake(gen.nextId());
    expect(third).toEqual({ timestamp: base + 1, regionId: 0, workerId: 0, sequence: 0 });
  });

  it('waits for the next millisecond when the sequence is exhausted', () => {
    const base = SNOWFLAKE_EPOCH + 2000;
    let calls = 0;
    // Stays on `base` for the whole sequence plus a few busy-poll reads, then advances.
    const clock = () => {
      calls += 1;
      return calls <= MAX_SEQUENCE + 1 + 3 ? base : base + 1;
    };
    const gen = new SnowflakeGenerator({ regionId: 2, workerId: 4, clock });
    for (let i = 0; i <= MAX_SEQUENCE; i++) gen.nextId();

    const overflow = decodeSnowflake(gen.nextId());
    expect(overflow.timestamp).toBe(base + 1);
    expect(overflow.sequence).toBe(0);
  });

  it('refuses to mint ids when the clock moves backwards', () => {
    const base = SNOWFLAKE_EPOCH + 3000;
    const gen = new SnowflakeGenerator({ regionId: 0, workerId: 0, clock: scriptedClock([base, base - 1]) });
    gen.nextId();
    let caught: unknown;
    try {
      gen.nextId();
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ClockRegressionError);
    if (caught instanceof ClockRegressionError) {
      expect(caught.currentTimestamp).toBe(base - 1);
      expect(caught.lastTimestamp).toBe(base);
    }
  });

  it('never collides between distinct nodes', () => {
    const ts = SNOWFLAKE_EPOCH + 4000;
    const seen = new Set<bigint>();
    for (const [regionId, workerId] of [
      [0, 0],
      [0, 1],
      [1, 0],
      [31, 31],
    ] as const) {
      const gen = new SnowflakeGenerator({ regionId, workerId, clock: () => ts });
      for (let i = 0; i < 100; i++) seen.add(gen.nextId());
    }
    expect(seen.size).toBe(400);
  });
  it('does not reissue an id when the clock steps back during the overflow wait', () => {
    const base = SNOWFLAKE_EPOCH + 5000;
    let calls = 0;
    // Calls 1..4097 read `base`, the wait inside call 4097 reads `base - 1`,
    // the retry reads `base` once more and then time moves on.
    const clock = () => {
      calls += 1;
      if (calls <= MAX_SEQUENCE + 2) return base;
      if (calls === MAX_SEQUENCE + 3) return base - 1;
      if (calls === MAX_SEQUENCE + 4) return base;
      return base + 1;
    };
    const gen = new SnowflakeGenerator({ regionId: 0, workerId: 0, clock });
    const issued = new Set<bigint>();
    for (let i = 0; i <= MAX_SEQUENCE; i++) issued.add(gen.nextId());

    expect(() => gen.nextId()).toThrow(ClockRegressionError);

    const next = gen.nextId();
    expect(issued.has(next)).toBe(false);
    expect(decodeSnowflake(next)).toEqual({ timestamp: base + 1, regionId: 0, workerId: 0, sequence: 0 });
  });

  it('rejects clock readings outside the 41-bit range of the epoch', () => {
    const before = new SnowflakeGenerator({ regionId: 0, workerId: 0, clock: () => SNOWFLAKE_EPOCH - 1 });
    expect(() => before.nextId()).toThrow(InvalidConfigError);

    const beyond = new SnowflakeGenerator({ regionId: 0, workerId: 0, clock: () => SNOWFLAKE_EPOCH + MAX_TIMESTAMP + 1 });
    expect(() => beyond.nextId()).toThrow(InvalidConfigError);

    const last = new SnowflakeGenerator({ regionId: 31, workerId: 31, clock: () => SNOWFLAKE_EPOCH + MAX_TIMESTAMP });
    const id = last.nextId();
    expect(id).toBe((1n << 63n) - 1n - BigInt(MAX_SEQUENCE));
  });
});
