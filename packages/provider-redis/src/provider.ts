import Redis from 'ioredis';
import type {
  ChannelChange,
  ChannelId,
  IStateProvider,
  PersistedChannelState,
  SuitCounts,
} from '@suit-tally/types';

const DEFAULT_KEY_PREFIX = 'suit-tally';
const LEDGER_KEY = /^\d+$/;

export interface RedisStateProviderConfig {
  /** Redis connection URL or ioredis instance. */
  redis: string | Redis;
  /** Prefix for every key written. Default: "suit-tally". */
  keyPrefix?: string;
}

function toCount(raw: string | undefined): number {
  const value = Number(raw ?? 0);
  return Number.isInteger(value) && value > 0 ? value : 0;
}

/**
 * Redis persistence provider.
 *
 * Layout per channel: a hash of suit counts and a set of ledger keys, plus
 * one set indexing known channels. Each flush is applied in a single MULTI.
 * Counts are written as totals and ledger keys as set members, so a batch
 * that is retried after a partly applied EXEC lands on the same state.
 */
export class RedisStateProvider implements IStateProvider {
  private redis: Redis;
  private keyPrefix: string;
  private ownsConnection: boolean;

  constructor(config: RedisStateProviderConfig) {
    if (typeof config.redis === 'string') {
      this.redis = new Redis(config.redis, { lazyConnect: true });
      this.ownsConnection = true;
    } else {
      this.redis = config.redis;
      this.ownsConnection = false;
    }
    this.keyPrefix = config.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  async initialize(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.connect();
    }
  }

  async flush(batch: Map<ChannelId, ChannelChange>): Promise<void> {
    if (batch.size === 0) return;

    const tx = this.redis.multi();
    for (const [channel, change] of batch) {
      const countsKey = this.countsKey(channel);
      const ledgerKey = this.ledgerKey(channel);

      tx.sadd(this.channelsKey(), channel);
      tx.hset(countsKey, { ...change.counts });
      if (change.purgeLedger) tx.del(ledgerKey);
      if (change.marks.length > 0) tx.sadd(ledgerKey, ...change.marks);
    }

    const results = await tx.exec();
    if (!results) {
      throw new Error('Redis transaction was aborted');
    }
    for (const [err] of results) {
      if (err) throw err;
    }
  }

  async load(): Promise<Map<ChannelId, PersistedChannelState>> {
    const channels = await this.redis.smembers(this.channelsKey());
    const entries = await Promise.all(
      channels.map(async (channel) => {
        const [hash, members] = await Promise.all([
          this.redis.hgetall(this.countsKey(channel)),
          this.redis.smembers(this.ledgerKey(channel)),
        ]);
        const counts: SuitCounts = {
          clubs: toCount(hash.clubs),
          diamonds: toCount(hash.diamonds),
          spades: toCount(hash.spades),
          hearts: toCount(hash.hearts),
        };
        const sequences = members.filter((member) => LEDGER_KEY.test(member));
        return [channel, { counts, sequences }] as const;
      })
    );
    return new Map(entries);
  }

  /** Close the Redis connection (only if this provider created it). */
  async close(): Promise<void> {
    if (this.ownsConnection) {
      await this.redis.quit();
    }
  }

  private channelsKey(): string {
    return `${this.keyPrefix}:channels`;
  }

  private countsKey(channel: ChannelId): string {
    return `${this.keyPrefix}:counts:${channel}`;
  }

  private ledgerKey(channel: ChannelId): string {
    return `${this.keyPrefix}:ledger:${channel}`;
  }
}
