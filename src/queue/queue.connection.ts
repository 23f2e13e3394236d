/**
 * Queue Connection
 *
 * The narrow set of Redis primitives the QueueClient relies on. Every
 * mutation goes through exec(), which runs its commands as one MULTI block
 * so readers never see a half-written status hash.
 *
 * IORedisConnection is the production adapter. Tests plug in an in-process
 * implementation of the same interface.
 */
import IORedis from "ioredis";
import config from "../config";
import { logger } from "../monitoring/logger";
import { errorMessage } from "../shared/errors/service.error";

export type StoreCommand =
  | { op: "hset"; key: string; fields: Record<string, string> }
  | { op: "expire"; key: string; seconds: number }
  | { op: "lpush"; key: string; value: string }
  | { op: "set"; key: string; value: string; ttlMs: number }
  | { op: "del"; keys: string[] };

export interface QueueConnection {
  ping(): Promise<void>;
  /** Runs all commands atomically (MULTI/EXEC) */
  exec(commands: StoreCommand[]): Promise<void>;
  /** Pops from the head of the list, waiting up to timeoutSeconds */
  brpop(key: string, timeoutSeconds: number): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  /**
   * Set hash fields and refresh the TTL only while `field` still holds
   * `expected` ("" meaning absent), atomically. False when it changed.
   */
  hsetIfEquals(
    key: string,
    field: string,
    expected: string,
    fields: Record<string, string>,
    ttlSeconds: number
  ): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  scanKeys(pattern: string): Promise<string[]>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  llen(key: string): Promise<number>;
  close(): Promise<void>;
}

const HSET_IF_EQUALS_SCRIPT = `
local current = redis.call('HGET', KEYS[1], ARGV[1])
if (current or '') ~= ARGV[2] then
  return 0
end
for i = 4, #ARGV, 2 do
  redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1])
end
redis.call('EXPIRE', KEYS[1], ARGV[3])
return 1
`;

export type ConnectionFactory = () => Promise<QueueConnection>;

export class IORedisConnection implements QueueConnection {
  private readonly redis: IORedis;

  constructor(redis: IORedis) {
    this.redis = redis;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async exec(commands: StoreCommand[]): Promise<void> {
    const transaction = this.redis.multi();

    for (const command of commands) {
      switch (command.op) {
        case "hset":
          transaction.hset(command.key, command.fields);
          break;
        case "expire":
          transaction.expire(command.key, command.seconds);
          break;
        case "lpush":
          transaction.lpush(command.key, command.value);
          break;
        case "set":
          transaction.set(command.key, command.value, "PX", command.ttlMs);
          break;
        case "del":
          if (command.keys.length > 0) transaction.del(...command.keys);
          break;
      }
    }

    const results = await transaction.exec();
    if (results === null) {
      throw new Error("Redis transaction was discarded");
    }
    for (const [error] of results) {
      if (error) throw error;
    }
  }

  async brpop(key: string, timeoutSeconds: number): Promise<string | null> {
    const result = await this.redis.brpop(key, timeoutSeconds);
    return result ? result[1] : null;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return this.redis.hgetall(key);
  }

  async hsetIfEquals(
    key: string,
    field: string,
    expected: string,
    fields: Record<string, string>,
    ttlSeconds: number
  ): Promise<boolean> {
    const pairs = Object.entries(fields).flat();
    const result = await this.redis.eval(HSET_IF_EQUALS_SCRIPT, 1, key, field, expected, ttlSeconds, ...pairs);
    return result === 1;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.redis.exists(key)) > 0;
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = "0";

    do {
      const [next, batch] = await this.redis.scan(cursor, "MATCH", pattern, "COUNT", 100);
      for (const key of batch) keys.add(key);
      cursor = next;
    } while (cursor !== "0");

    return [...keys];
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.redis.lrange(key, start, stop);
  }

  async llen(key: string): Promise<number> {
    return this.redis.llen(key);
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, "Redis quit failed, forcing disconnect");
      this.redis.disconnect();
    }
  }
}

/**
 * Open a fresh Redis connection.
 * Automatic reconnection is disabled: the QueueClient decides when to
 * drop a connection and build a new one.
 */
export async function createRedisConnection(): Promise<QueueConnection> {
  const redis = new IORedis({
    host: config.redisHost,
    port: config.redisPort,
    password: config.redisPassword,
    db: config.redisDb,
    lazyConnect: true,
    connectTimeout: 5000,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    retryStrategy: () => null,
  });

  redis.on("error", (err: Error) => {
    logger.warn({ error: err.message }, "Redis connection error");
  });

  try {
    await redis.connect();
  } catch (error) {
    redis.disconnect();
    throw error;
  }

  return new IORedisConnection(redis);
}
