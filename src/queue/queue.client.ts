/**
 * Queue Client
 *
 * Owns one Redis connection and exposes the job queue and the status store
 * on top of it. Each process (API or worker) creates its own client; there
 * is no shared module-level connection.
 *
 * Key layout:
 * - {queueName}           list of JSON payloads, LPUSH to add, BRPOP to take (FIFO)
 * - job_status:{job_id}   hash with status, message, timestamps and identity, 24h TTL
 * - job_lease:{job_id}    string holding the owning worker id, millisecond TTL
 *
 * Every transport failure drops the cached connection and surfaces as
 * QueueUnavailableError. The next call reconnects.
 */
import { v4 as uuidv4 } from "uuid";
import config from "../config";
import { REDIS_KEYS, STATUS_MESSAGES, STATUS_RANK } from "../config/constants";
import { logger } from "../monitoring/logger";
import { QueueUnavailableError, SerializationError } from "../shared/errors/queue.errors";
import { errorMessage } from "../shared/errors/service.error";
import type {
  JobParams,
  JobParamValue,
  JobPayload,
  JobRequest,
  JobStatus,
  JobStatusRecord,
  QueuedJobSummary,
  QueueSnapshot,
} from "../shared/types/job.types";
import { nowISO } from "../shared/utils/date";
import { isJobParamValue, isJobStatus, isPlainObject } from "../shared/utils/guards";
import { createRedisConnection } from "./queue.connection";
import type { ConnectionFactory, QueueConnection, StoreCommand } from "./queue.connection";

const DELETE_BATCH_SIZE = 100;
const STATUS_WRITE_ATTEMPTS = 3;

export interface QueueClientOptions {
  statusTtlSeconds?: number;
}

export function statusKey(jobId: string): string {
  return `${REDIS_KEYS.STATUS_PREFIX}${jobId}`;
}

export function leaseKey(jobId: string): string {
  return `${REDIS_KEYS.LEASE_PREFIX}${jobId}`;
}

/**
 * Statuses only move forward: queued -> processing -> completed | failed.
 * Rewriting the current status is allowed so repeated writes are harmless.
 */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return from === to || STATUS_RANK[to] > STATUS_RANK[from];
}

function paramAsString(value: JobParamValue | undefined): string {
  if (value === undefined || value === null) return "";
  return String(value);
}

/**
 * Decode a payload popped from the queue. Returns null for anything that
 * is not a JSON object with string job_id and email.
 * Older producers wrote created_at as {"timestamp": "..."}; it is flattened.
 */
export function parseJobPayload(raw: string): JobPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.error({ error: errorMessage(error), raw: raw.slice(0, 200) }, "Discarding malformed job payload");
    return null;
  }

  if (!isPlainObject(parsed)) {
    logger.error({ raw: raw.slice(0, 200) }, "Discarding job payload that is not an object");
    return null;
  }

  const { job_id: jobId, email, created_at: createdAt, ...rest } = parsed;
  if (typeof jobId !== "string" || typeof email !== "string") {
    logger.error({ raw: raw.slice(0, 200) }, "Discarding job payload without job_id or email");
    return null;
  }

  const params: JobParams = {};
  for (const [key, value] of Object.entries(rest)) {
    if (isJobParamValue(value)) {
      params[key] = value;
    } else {
      logger.debug({ jobId, key }, "Dropping non-scalar job parameter");
    }
  }

  let created = "";
  if (typeof createdAt === "string") {
    created = createdAt;
  } else if (isPlainObject(createdAt) && typeof createdAt.timestamp === "string") {
    created = createdAt.timestamp;
  }

  return { ...params, job_id: jobId, email, created_at: created };
}

function toStatusRecord(jobId: string, fields: Record<string, string>): JobStatusRecord | null {
  if (Object.keys(fields).length === 0) return null;

  const status = fields.status;
  if (!isJobStatus(status)) {
    logger.warn({ jobId, status }, "Status hash holds an unknown status");
    return null;
  }

  return {
    job_id: jobId,
    status,
    message: fields.message ?? "",
    created_at: fields.created_at ?? "",
    updated_at: fields.updated_at ?? "",
    email: fields.email ?? "",
    entity_name: fields.entity_name ?? "",
    entity_type: fields.entity_type ?? "",
    queue_name: fields.queue ?? "",
  };
}

export class QueueClient {
  private connection: QueueConnection | null = null;
  /** In-flight connection attempt shared by concurrent callers */
  private connecting: Promise<boolean> | null = null;
  private readonly connect: ConnectionFactory;
  private readonly statusTtlSeconds: number;

  constructor(connect: ConnectionFactory = createRedisConnection, options: QueueClientOptions = {}) {
    this.connect = connect;
    this.statusTtlSeconds = options.statusTtlSeconds ?? config.statusTtlSeconds;
  }

  get isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Make sure a live connection is cached. Never throws.
   * A cached connection that fails its ping is dropped and one fresh
   * connection attempt is made.
   */
  async ensureConnection(): Promise<boolean> {
    return this.tryConnect(true);
  }

  private async tryConnect(retryStale: boolean): Promise<boolean> {
    const cached = this.connection;
    if (cached) {
      try {
        await cached.ping();
        return true;
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, "Cached Redis connection is stale, reconnecting");
        await this.drop(cached);
        return retryStale ? this.tryConnect(false) : false;
      }
    }

    if (!this.connecting) {
      this.connecting = this.openConnection().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async openConnection(): Promise<boolean> {
    let fresh: QueueConnection | null = null;
    try {
      fresh = await this.connect();
      await fresh.ping();
      this.connection = fresh;
      return true;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Redis connection failed");
      if (fresh) await this.closeConnection(fresh);
      return false;
    }
  }

  private async withConnection<T>(
    operation: string,
    fn: (connection: QueueConnection) => Promise<T>
  ): Promise<T> {
    if (!(await this.ensureConnection())) {
      throw new QueueUnavailableError();
    }
    const connection = this.connection;
    if (!connection) {
      throw new QueueUnavailableError();
    }

    try {
      return await fn(connection);
    } catch (error) {
      logger.error({ operation, error: errorMessage(error) }, "Redis operation failed");
      await this.drop(connection);
      throw new QueueUnavailableError();
    }
  }

  /**
   * Stamp a fresh job id into the payload, create its status hash and push
   * it onto the queue in one transaction.
   */
  async enqueue(queueName: string, payload: JobRequest): Promise<string> {
    const jobId = uuidv4();
    const createdAt = nowISO();
    const job: JobPayload = { ...payload, job_id: jobId, created_at: createdAt };

    let serialized: string;
    try {
      serialized = JSON.stringify(job);
    } catch (error) {
      throw new SerializationError(`Job payload could not be serialized: ${errorMessage(error)}`);
    }

    const key = statusKey(jobId);
    const commands: StoreCommand[] = [
      {
        op: "hset",
        key,
        fields: {
          status: "queued",
          message: STATUS_MESSAGES.QUEUED,
          created_at: createdAt,
          updated_at: createdAt,
          email: payload.email,
          entity_name: paramAsString(payload.entity_name),
          entity_type: paramAsString(payload.entity_type),
          queue: queueName,
        },
      },
      { op: "expire", key, seconds: this.statusTtlSeconds },
      { op: "lpush", key: queueName, value: serialized },
    ];

    await this.withConnection("enqueue", (connection) => connection.exec(commands));

    logger.info({ jobId, email: payload.email, queue: queueName }, "Job enqueued");
    return jobId;
  }

  /**
   * Pop the oldest job, waiting up to timeoutSeconds.
   * Returns null on timeout and for payloads that cannot be decoded
   * (those are gone from the queue once popped).
   */
  async dequeueBlocking(queueName: string, timeoutSeconds: number): Promise<JobPayload | null> {
    const raw = await this.withConnection("dequeue", (connection) =>
      connection.brpop(queueName, timeoutSeconds)
    );
    if (raw === null) return null;
    return parseJobPayload(raw);
  }

  /**
   * Write status, message and updated_at and refresh the TTL.
   * Returns false when the move would go backwards or leave a terminal state.
   * The write only lands if the status read for the check is still current;
   * otherwise the check is repeated against the new value.
   */
  async updateStatus(jobId: string, status: JobStatus, message: string): Promise<boolean> {
    const key = statusKey(jobId);

    return this.withConnection("updateStatus", async (connection) => {
      for (let attempt = 1; attempt <= STATUS_WRITE_ATTEMPTS; attempt++) {
        const current = (await connection.hgetall(key)).status ?? "";
        if (isJobStatus(current) && !canTransition(current, status)) {
          logger.warn({ jobId, from: current, to: status }, "Refusing status transition");
          return false;
        }

        const written = await connection.hsetIfEquals(
          key,
          "status",
          current,
          { status, message, updated_at: nowISO() },
          this.statusTtlSeconds
        );
        if (written) return true;
        logger.debug({ jobId, to: status, attempt }, "Status changed concurrently, re-checking");
      }

      logger.warn({ jobId, to: status }, "Status kept changing, giving up");
      return false;
    });
  }

  async getStatus(jobId: string): Promise<JobStatusRecord | null> {
    const fields = await this.withConnection("getStatus", (connection) =>
      connection.hgetall(statusKey(jobId))
    );
    return toStatusRecord(jobId, fields);
  }

  /** Every status hash still alive, newest first */
  async listStatuses(): Promise<JobStatusRecord[]> {
    return this.withConnection("listStatuses", async (connection) => {
      const keys = await connection.scanKeys(`${REDIS_KEYS.STATUS_PREFIX}*`);
      const records: JobStatusRecord[] = [];

      for (const key of keys) {
        const jobId = key.slice(REDIS_KEYS.STATUS_PREFIX.length);
        const record = toStatusRecord(jobId, await connection.hgetall(key));
        if (record) records.push(record);
      }

      return records.sort((a, b) => b.created_at.localeCompare(a.created_at));
    });
  }

  /** Jobs waiting in the queue, in the order workers will take them. Does not consume. */
  async peekQueue(queueName: string, limit: number = 100): Promise<QueueSnapshot> {
    return this.withConnection("peekQueue", async (connection) => {
      const count = await connection.llen(queueName);
      const start = Math.max(count - limit, 0);
      const raw = count > 0 ? await connection.lrange(queueName, start, -1) : [];

      const jobs: QueuedJobSummary[] = [];
      for (const entry of raw.reverse()) {
        const job = parseJobPayload(entry);
        if (!job) continue;
        jobs.push({
          job_id: job.job_id,
          email: job.email,
          entity_name: paramAsString(job.entity_name),
          queued_at: job.created_at,
        });
      }

      return { count, jobs };
    });
  }

  async queueLength(queueName: string): Promise<number> {
    return this.withConnection("queueLength", (connection) => connection.llen(queueName));
  }

  async deleteStatus(jobId: string): Promise<void> {
    await this.withConnection("deleteStatus", (connection) =>
      connection.exec([{ op: "del", keys: [statusKey(jobId)] }])
    );
  }

  // --- Leases ---

  async acquireLease(jobId: string, workerId: string, ttlMs: number): Promise<void> {
    await this.withConnection("acquireLease", (connection) =>
      connection.exec([{ op: "set", key: leaseKey(jobId), value: workerId, ttlMs }])
    );
  }

  async renewLease(jobId: string, workerId: string, ttlMs: number): Promise<void> {
    await this.acquireLease(jobId, workerId, ttlMs);
  }

  async releaseLease(jobId: string): Promise<void> {
    await this.withConnection("releaseLease", (connection) =>
      connection.exec([{ op: "del", keys: [leaseKey(jobId)] }])
    );
  }

  async hasLease(jobId: string): Promise<boolean> {
    return this.withConnection("hasLease", (connection) => connection.exists(leaseKey(jobId)));
  }

  /**
   * Delete every status hash, every lease and the given queue lists.
   * Returns the number of keys removed.
   */
  async clearAll(queueNames: string[]): Promise<number> {
    return this.withConnection("clearAll", async (connection) => {
      const keys = [
        ...(await connection.scanKeys(`${REDIS_KEYS.STATUS_PREFIX}*`)),
        ...(await connection.scanKeys(`${REDIS_KEYS.LEASE_PREFIX}*`)),
        ...queueNames,
      ];

      for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
        await connection.exec([{ op: "del", keys: keys.slice(i, i + DELETE_BATCH_SIZE) }]);
      }

      logger.info({ deleted: keys.length, queues: queueNames }, "Cleared queue and status keys");
      return keys.length;
    });
  }

  /** Drop the cached connection; the next call reconnects */
  async reset(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (connection) await this.closeConnection(connection);
  }

  async close(): Promise<void> {
    await this.reset();
  }

  /** Close a failed connection, uncaching it unless another caller already replaced it */
  private async drop(connection: QueueConnection): Promise<void> {
    if (this.connection === connection) this.connection = null;
    await this.closeConnection(connection);
  }

  private async closeConnection(connection: QueueConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, "Ignoring error while closing Redis connection");
    }
  }
}
