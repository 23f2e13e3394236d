/**
 * Tests for the scheduled maintenance cycle.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { MaintenanceScheduler, reapGraceMs } from "../maintenance.scheduler";
import { QueueClient, statusKey } from "../../queue/queue.client";
import { InMemoryRedis } from "../../__tests__/fakes/in-memory-redis";

const LONG_AGO = "2020-01-01T00:00:00.000Z";

describe("MaintenanceScheduler", () => {
  let redis: InMemoryRedis;
  let scheduler: MaintenanceScheduler;

  beforeEach(() => {
    redis = new InMemoryRedis();
    scheduler = new MaintenanceScheduler(new QueueClient(redis.factory));
  });

  it("cleans old failures and reaps abandoned jobs in one cycle", async () => {
    redis.hashes.set(statusKey("failed-1"), { status: "failed", updated_at: LONG_AGO, email: "a@example.com" });
    redis.hashes.set(statusKey("stuck-1"), { status: "processing", updated_at: LONG_AGO, email: "b@example.com" });
    redis.hashes.set(statusKey("queued-1"), { status: "queued", updated_at: LONG_AGO, email: "c@example.com" });

    const result = await scheduler.runCycle();

    expect(result).toEqual({ cleaned: ["failed-1"], reaped: ["stuck-1"] });
    expect(redis.hashes.has(statusKey("failed-1"))).toBe(false);
    expect(redis.hashes.get(statusKey("stuck-1"))?.status).toBe("failed");
    expect(redis.hashes.get(statusKey("queued-1"))?.status).toBe("queued");
  });

  it("skips a cycle while the previous one is still running", async () => {
    const first = scheduler.runCycle();
    const second = await scheduler.runCycle();

    expect(second).toBeNull();
    expect(await first).toEqual({ cleaned: [], reaped: [] });
  });

  it("returns null when the queue is unreachable", async () => {
    redis.down = true;

    expect(await scheduler.runCycle()).toBeNull();
  });
});

describe("reapGraceMs", () => {
  it("allows two lease periods", () => {
    expect(reapGraceMs(60000)).toBe(120000);
  });
});
