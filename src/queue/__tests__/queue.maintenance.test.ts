/**
 * Tests for failed-job cleanup and the abandoned-job reaper.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { QueueClient, statusKey, leaseKey } from "../queue.client";
import { cleanFailedJobs, reapAbandonedJobs } from "../queue.maintenance";
import { InMemoryRedis } from "../../__tests__/fakes/in-memory-redis";

const NOW = new Date("2024-06-01T12:00:00.000Z");

function seedStatus(redis: InMemoryRedis, jobId: string, fields: Record<string, string>): void {
  redis.hashes.set(statusKey(jobId), { email: "a@example.com", queue: "pwmr_jobs", ...fields });
}

describe("cleanFailedJobs", () => {
  let redis: InMemoryRedis;
  let client: QueueClient;

  beforeEach(() => {
    redis = new InMemoryRedis();
    client = new QueueClient(redis.factory);
  });

  it("removes failed jobs older than the age limit", async () => {
    seedStatus(redis, "old", { status: "failed", updated_at: "2024-06-01T11:50:00.000Z" });
    seedStatus(redis, "recent", { status: "failed", updated_at: "2024-06-01T11:58:00.000Z" });
    seedStatus(redis, "done", { status: "completed", updated_at: "2024-06-01T10:00:00.000Z" });

    const removed = await cleanFailedJobs(client, 5, NOW);

    expect(removed).toEqual(["old"]);
    expect(redis.hashes.has(statusKey("old"))).toBe(false);
    expect(redis.hashes.has(statusKey("recent"))).toBe(true);
    expect(redis.hashes.has(statusKey("done"))).toBe(true);
  });

  it("falls back to created_at and understands the legacy timestamp form", async () => {
    seedStatus(redis, "legacy", {
      status: "failed",
      created_at: JSON.stringify({ timestamp: "2024-06-01T09:00:00.000Z" }),
    });

    expect(await cleanFailedJobs(client, 5, NOW)).toEqual(["legacy"]);
  });

  it("keeps failed jobs whose timestamps cannot be parsed", async () => {
    seedStatus(redis, "garbled", { status: "failed", updated_at: "yesterday-ish" });

    expect(await cleanFailedJobs(client, 5, NOW)).toEqual([]);
    expect(redis.hashes.has(statusKey("garbled"))).toBe(true);
  });
});

describe("reapAbandonedJobs", () => {
  let redis: InMemoryRedis;
  let client: QueueClient;

  beforeEach(() => {
    redis = new InMemoryRedis();
    client = new QueueClient(redis.factory);
  });

  it("fails processing jobs without a lease", async () => {
    seedStatus(redis, "orphan", { status: "processing", updated_at: "2024-06-01T11:00:00.000Z" });

    const reaped = await reapAbandonedJobs(client, 60000, NOW);

    expect(reaped).toEqual(["orphan"]);
    expect(redis.hashes.get(statusKey("orphan"))?.status).toBe("failed");
    expect(redis.hashes.get(statusKey("orphan"))?.message).toBe("Worker lease expired; job abandoned");
  });

  it("leaves leased and freshly updated jobs alone", async () => {
    seedStatus(redis, "leased", { status: "processing", updated_at: "2024-06-01T11:00:00.000Z" });
    seedStatus(redis, "fresh", { status: "processing", updated_at: "2024-06-01T11:59:30.000Z" });
    redis.strings.set(leaseKey("leased"), { value: "worker-1", expiresAt: Date.now() + 60000 });

    expect(await reapAbandonedJobs(client, 60000, NOW)).toEqual([]);
    expect(redis.hashes.get(statusKey("leased"))?.status).toBe("processing");
    expect(redis.hashes.get(statusKey("fresh"))?.status).toBe("processing");
  });
});
