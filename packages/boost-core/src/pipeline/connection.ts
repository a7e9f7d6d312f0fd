/**
 * FILE PURPOSE: Shared Redis connection parsing for BullMQ queues, flows and workers
 *
 * WHY: The intake queue, the stage workers, the flow producer and the
 *      notifier all connect from a URL; they must agree on how it is read.
 */

export interface RedisConnectionOptions {
  host: string;
  port: number;
  username: string | undefined;
  password: string | undefined;
  db: number;
  tls: Record<string, never> | undefined;
  /** BullMQ workers require blocking commands to never give up. */
  maxRetriesPerRequest: null;
}

export function parseRedisConnection(redisUrl?: string): RedisConnectionOptions {
  const url = redisUrl ?? process.env.REDIS_URL ?? 'redis://localhost:6379';
  const parsed = new URL(url);
  const dbIndex = parseInt(parsed.pathname.replace(/^\//, '') || '0', 10);

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: Number.isNaN(dbIndex) ? 0 : dbIndex,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}
