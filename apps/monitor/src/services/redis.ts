import Redis, { type RedisOptions } from 'ioredis';

// Reconnect forever with a 30s cap so the monitor recovers after a Redis restart
function retryStrategy(times: number): number {
  return Math.min(times * 1000, 30000);
}

function redisUrl(): string {
  return process.env.REDIS_URL || 'redis://localhost:6379';
}

let sharedClient: Redis | null = null;
let redisAvailable = true;

/**
 * Shared client for plain commands (cooldown keys). Lazily connected.
 */
export function getRedis(): Redis | null {
  if (!redisAvailable) {
    return null;
  }

  if (!sharedClient) {
    sharedClient = new Redis(redisUrl(), {
      maxRetriesPerRequest: 3,
      lazyConnect: true,
      retryStrategy(times) {
        const delay = retryStrategy(times);
        if (!redisAvailable) {
          console.log(`[Redis] Reconnecting (attempt ${times}, next in ${delay}ms)`);
        }
        return delay;
      }
    });

    sharedClient.on('error', (err: Error & { code?: string }) => {
      if (err.code === 'ECONNREFUSED') {
        if (redisAvailable) {
          console.error('[Redis] Unavailable, cooldowns fall back to memory');
        }
        redisAvailable = false;
      } else {
        console.error('[Redis] Connection error:', err.message);
      }
    });

    sharedClient.on('connect', () => {
      if (!redisAvailable) {
        console.log('[Redis] Reconnected');
      }
      redisAvailable = true;
    });
  }

  return sharedClient;
}

export function isRedisAvailable(): boolean {
  return redisAvailable;
}

export async function closeRedis(): Promise<void> {
  if (sharedClient) {
    await sharedClient.quit();
    sharedClient = null;
  }
}

/**
 * New connection for a BullMQ queue or worker. BullMQ needs
 * maxRetriesPerRequest: null for its blocking commands; the caller owns the
 * connection's lifecycle.
 */
export function getRedisConnection(overrides: RedisOptions = {}): Redis {
  const connection = new Redis(redisUrl(), {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    retryStrategy,
    ...overrides
  });

  connection.on('error', (err: Error) => {
    console.error('[Redis] Queue connection error:', err.message);
  });

  return connection;
}
