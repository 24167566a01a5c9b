import { ClockRegressionError, InvalidConfigError } from '../errors.js';

/**
 * 64-bit identifiers: 1 reserved bit, 41 bits of milliseconds since `epoch`,
 * 5 bits region, 5 bits worker, 12 bits per-millisecond sequence.
 */

export const SNOWFLAKE_EPOCH = 1704067200000; // 2024-01-01T00:00:00Z

const REGION_BITS = 5;
const WORKER_BITS = 5;
const SEQUENCE_BITS = 12;
const TIMESTAMP_BITS = 41;

export const MAX_REGION_ID = (1 << REGION_BITS) - 1;
export const MAX_WORKER_ID = (1 << WORKER_BITS) - 1;
export const MAX_SEQUENCE = (1 << SEQUENCE_BITS) - 1;
export const MAX_TIMESTAMP = 2 ** TIMESTAMP_BITS - 1;

const WORKER_SHIFT = BigInt(SEQUENCE_BITS);
const REGION_SHIFT = BigInt(SEQUENCE_BITS + WORKER_BITS);
const TIMESTAMP_SHIFT = BigInt(SEQUENCE_BITS + WORKER_BITS + REGION_BITS);

export type SnowflakeOptions = {
  regionId: number;
  workerId: number;
  epoch?: number;
  clock?: () => number;
};

export type DecodedSnowflake = {
  timestamp: number;
  regionId: number;
  workerId: number;
  sequence: number;
};

export interface IdGenerator {
  nextId(): bigint;
}

function assertNodeComponent(name: string, value: number, max: number) {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidConfigError(`${name} must be an integer in [0, ${max}], got ${value}`);
  }
}

export class SnowflakeGenerator implements IdGenerator {
  readonly regionId: number;
  readonly workerId: number;
  readonly epoch: number;
  private readonly clock: () => number;
  private sequence = 0;
  private lastTimestamp = -1;

  constructor(opts: SnowflakeOptions) {
    assertNodeComponent('regionId', opts.regionId, MAX_REGION_ID);
    assertNodeComponent('workerId', opts.workerId, MAX_WORKER_ID);
    this.regionId = opts.regionId;
    this.workerId = opts.workerId;
    this.epoch = opts.epoch ?? SNOWFLAKE_EPOCH;
    this.clock = opts.clock ?? Date.now;
  }

  // Synchronous on purpose: a call never yields, so on one event loop
  // no two callers can observe the same (timestamp, sequence) pair.
  // State is committed only once an id is certain to be returned.
  nextId(): bigint {
    let ts = this.clock();
    if (ts < this.lastTimestamp) throw new ClockRegressionError(ts, this.lastTimestamp);

    let sequence = 0;
    if (ts === this.lastTimestamp) {
      sequence = (this.sequence + 1) & MAX_SEQUENCE;
      if (sequence === 0) ts = this.waitNextMillis(this.lastTimestamp);
    }

    const elapsed = ts - this.epoch;
    if (elapsed < 0 || elapsed > MAX_TIMESTAMP) {
      throw new InvalidConfigError(`clock ${ts} is outside the 41-bit id range of epoch ${this.epoch}`);
    }

    this.sequence = sequence;
    this.lastTimestamp = ts;

    return (
      (BigInt(elapsed) << TIMESTAMP_SHIFT) |
      (BigInt(this.regionId) << REGION_SHIFT) |
      (BigInt(this.workerId) << WORKER_SHIFT) |
      BigInt(sequence)
    );
  }

  private waitNextMillis(last: number): number {
    let ts = this.clock();
    while (ts <= last) {
      if (ts < last) throw new ClockRegressionError(ts, last);
      ts = this.clock();
    }
    return ts;
  }
}

export function decodeSnowflake(id: bigint, epoch = SNOWFLAKE_EPOCH): DecodedSnowflake {
  return {
    timestamp: Number(id >> TIMESTAMP_SHIFT) + epoch,
    regionId: Number((id >> REGION_SHIFT) & BigInt(MAX_REGION_ID)),
    workerId: Number((id >> WORKER_SHIFT) & BigInt(MAX_WORKER_ID)),
    sequence: Number(id & BigInt(MAX_SEQUENCE)),
  };
}
