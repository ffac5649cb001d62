import { describe, it, expect, vi, beforeEach } from "vitest";
import { ConfigurationError, RunAlreadyInProgressError } from "../lib/errors.js";
import { RunReporter, type RunDraft } from "../migration/run-reporter.js";
import { MemoryWatermarkStore } from "../testing/fakes.js";
import {
  createStatusApp,
  cronExpressionForInterval,
  MigrationScheduler,
  runInBackground,
} from "./status.js";

const { task, schedule } = vi.hoisted(() => ({
  task: { stop: vi.fn() },
  schedule: vi.fn(),
}));

vi.mock("node-cron", () => ({
  default: { schedule },
}));

const DRAFT: RunDraft = {
  runId: "run-1",
  startedAt: new Date("2024-01-03T00:00:00Z"),
  cancelled: false,
  lanes: [],
};

function setup(running = false) {
  const reporter = new RunReporter({ timeZone: "UTC", dataDir: null });
  const watermarks = new MemoryWatermarkStore();
  const trigger = {
    runOnce: vi.fn((_signal?: AbortSignal) => reporter.publish(DRAFT, new Date("2024-01-03T00:01:00Z"))),
    isRunning: vi.fn(() => running),
  };
  const app = createStatusApp({ trigger, reporter, watermarks });
  return { app, trigger, reporter, watermarks };
}

describe("createStatusApp", () => {
  it("should answer the health check", async () => {
    const { app } = setup();

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("should report the latest run and the watermarks", async () => {
    const { app, reporter, watermarks } = setup(true);
    await reporter.publish(DRAFT, new Date("2024-01-03T00:01:00Z"));
    watermarks.set("OMRON", "SYSTOLIC", "2024-01-02T07:00:00Z", "SYSTOLIC@2024-01-02T07:00:00.000Z");

    const res = await app.request("/status");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.running).toBe(true);
    expect(body.timeZone).toBe("UTC");
    expect(body.lastRun.runId).toBe("run-1");
    expect(body.lastRun.finishedAt).toEqual({
      utc: "2024-01-03T00:01:00.000Z",
      local: "2024-01-03 00:01:00",
    });
    expect(body.watermarks).toEqual([
      {
        source: "OMRON",
        metricType: "SYSTOLIC",
        lastMigratedAt: { utc: "2024-01-02T07:00:00.000Z", local: "2024-01-02 07:00:00" },
        lastSourceRecordId: "SYSTOLIC@2024-01-02T07:00:00.000Z",
      },
    ]);
  });

  it("should start a run on POST /run", async () => {
    const { app, trigger } = setup();

    const res = await app.request("/run", { method: "POST" });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ status: "started" });
    expect(trigger.runOnce).toHaveBeenCalledTimes(1);
  });

  it("should refuse a second run while one is going", async () => {
    const { app, trigger } = setup(true);

    const res = await app.request("/run", { method: "POST" });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "A migration run is already in progress" });
    expect(trigger.runOnce).not.toHaveBeenCalled();
  });

  it("should turn store failures into a 500", async () => {
    const { app, watermarks } = setup();
    vi.spyOn(watermarks, "list").mockRejectedValue(new Error("disk gone"));

    const res = await app.request("/status");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Internal server error" });
  });
});

describe("runInBackground", () => {
  it("should return the run result", async () => {
    const { trigger } = setup();

    const result = await runInBackground(trigger, "test");

    expect(result?.runId).toBe("run-1");
  });

  it("should resolve to null when a run is already going", async () => {
    const { trigger } = setup();
    trigger.runOnce.mockRejectedValueOnce(new RunAlreadyInProgressError());

    await expect(runInBackground(trigger, "test")).resolves.toBeNull();
  });

  it("should resolve to null when the run throws", async () => {
    const { trigger } = setup();
    trigger.runOnce.mockRejectedValueOnce(new Error("lock file unwritable"));

    await expect(runInBackground(trigger, "test")).resolves.toBeNull();
  });
});

describe("cronExpressionForInterval", () => {
  it("should run every N hours on the hour", () => {
    expect(cronExpressionForInterval(1)).toBe("0 */1 * * *");
    expect(cronExpressionForInterval(6)).toBe("0 */6 * * *");
  });

  it("should run daily at midnight for 24 hours", () => {
    expect(cronExpressionForInterval(24)).toBe("0 0 * * *");
  });

  it("should reject intervals outside 1-24", () => {
    expect(() => cronExpressionForInterval(0)).toThrow(ConfigurationError);
    expect(() => cronExpressionForInterval(25)).toThrow(ConfigurationError);
    expect(() => cronExpressionForInterval(1.5)).toThrow(ConfigurationError);
  });
});

describe("MigrationScheduler", () => {
  beforeEach(() => {
    schedule.mockImplementation(() => task);
  });

  it("should schedule runs in the configured time zone", () => {
    const { trigger } = setup();
    const scheduler = new MigrationScheduler({ trigger, intervalHours: 6, timeZone: "Asia/Tokyo" });

    scheduler.start();
    scheduler.start();

    expect(schedule).toHaveBeenCalledTimes(1);
    expect(schedule).toHaveBeenCalledWith("0 */6 * * *", expect.any(Function), { timezone: "Asia/Tokyo" });
  });

  it("should run the migration on each tick", async () => {
    const { trigger } = setup();
    const controller = new AbortController();
    const scheduler = new MigrationScheduler({
      trigger,
      intervalHours: 24,
      timeZone: "UTC",
      signal: controller.signal,
    });

    await scheduler.tick();

    expect(trigger.runOnce).toHaveBeenCalledWith(controller.signal);
  });

  it("should stop the cron task", () => {
    const { trigger } = setup();
    const scheduler = new MigrationScheduler({ trigger, intervalHours: 6, timeZone: "UTC" });

    scheduler.start();
    scheduler.stop();

    expect(task.stop).toHaveBeenCalledTimes(1);
  });
});
