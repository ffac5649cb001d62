import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  addErrorSample,
  aggregatePerMetric,
  emptyOutcome,
  RunReporter,
  type LaneOutcome,
  type RunDraft,
} from "./run-reporter.js";

function lane(overrides: Partial<LaneOutcome>): LaneOutcome {
  return {
    source: "FITBIT",
    metricType: "WEIGHT",
    state: "DONE",
    ...emptyOutcome(),
    watermarkBefore: new Date("2024-01-01T00:00:00Z"),
    watermarkAfter: new Date("2024-01-03T00:00:00Z"),
    ...overrides,
  };
}

const DRAFT: RunDraft = {
  runId: "run-1",
  startedAt: new Date("2024-01-03T00:00:00Z"),
  cancelled: false,
  lanes: [
    lane({ fetched: 2, uploaded: 2 }),
    lane({
      source: "OMRON",
      metricType: "PULSE",
      state: "FAILED",
      fetched: 1,
      failed: 1,
      errorSamples: ["PermanentFetchError: gone"],
    }),
  ],
};

describe("addErrorSample", () => {
  it("should keep at most five samples", () => {
    const outcome = emptyOutcome();
    for (let i = 0; i < 8; i++) {
      addErrorSample(outcome, `error ${i}`);
    }

    expect(outcome.errorSamples).toEqual(["error 0", "error 1", "error 2", "error 3", "error 4"]);
  });
});

describe("aggregatePerMetric", () => {
  it("should sum lanes sharing a metric type", () => {
    const perMetric = aggregatePerMetric([
      lane({ fetched: 2, uploaded: 1, failed: 1, errorSamples: ["a", "b", "c"] }),
      lane({ source: "OMRON", fetched: 3, uploaded: 2, skippedDuplicate: 1, errorSamples: ["d", "e", "f"] }),
    ]);

    expect(perMetric.WEIGHT).toEqual({
      fetched: 5,
      uploaded: 3,
      skippedDuplicate: 1,
      failed: 1,
      errorSamples: ["a", "b", "c", "d", "e"],
    });
  });

  it("should report every metric type", () => {
    const perMetric = aggregatePerMetric([]);

    expect(Object.keys(perMetric)).toEqual(["WEIGHT", "BMI", "BODY_FAT", "SYSTOLIC", "DIASTOLIC", "PULSE"]);
    expect(perMetric.PULSE).toEqual(emptyOutcome());
  });
});

describe("RunReporter", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "run-reporter-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("should stamp, aggregate and freeze the published run", async () => {
    const reporter = new RunReporter({ timeZone: "UTC", dataDir: null });

    const result = await reporter.publish(DRAFT, new Date("2024-01-03T00:05:00Z"));

    expect(result.finishedAt.toISOString()).toBe("2024-01-03T00:05:00.000Z");
    expect(result.perMetric.WEIGHT.uploaded).toBe(2);
    expect(result.perMetric.PULSE.failed).toBe(1);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.lanes[0])).toBe(true);
    expect(reporter.latest()).toBe(result);
  });

  it("should not share error sample arrays with the draft", async () => {
    const reporter = new RunReporter({ timeZone: "UTC", dataDir: null });
    const draft: RunDraft = { ...DRAFT, lanes: [lane({ errorSamples: ["x"] })] };

    const result = await reporter.publish(draft, new Date("2024-01-03T00:05:00Z"));
    draft.lanes[0]?.errorSamples.push("y");

    expect(result.lanes[0]?.errorSamples).toEqual(["x"]);
  });

  it("should persist the latest run and load it in a new reporter", async () => {
    const first = new RunReporter({ timeZone: "UTC", dataDir });
    await first.publish(DRAFT, new Date("2024-01-03T00:05:00Z"));

    const stored = JSON.parse(await readFile(path.join(dataDir, "last-run.json"), "utf8"));
    expect(stored.runId).toBe("run-1");
    expect(stored.lanes[0].watermarkAfter).toBe("2024-01-03T00:00:00.000Z");

    const second = new RunReporter({ timeZone: "UTC", dataDir });
    const loaded = await second.load();

    expect(loaded?.runId).toBe("run-1");
    expect(loaded?.finishedAt.toISOString()).toBe("2024-01-03T00:05:00.000Z");
    expect(loaded?.lanes[1]?.state).toBe("FAILED");
    expect(loaded?.perMetric.WEIGHT.fetched).toBe(2);
  });

  it("should start empty without a persisted run", async () => {
    const reporter = new RunReporter({ timeZone: "UTC", dataDir });

    await expect(reporter.load()).resolves.toBeNull();
    expect(reporter.latest()).toBeNull();
  });

  it("should ignore a malformed persisted run", async () => {
    await writeFile(path.join(dataDir, "last-run.json"), JSON.stringify({ runId: 7 }));
    const reporter = new RunReporter({ timeZone: "UTC", dataDir });

    await expect(reporter.load()).resolves.toBeNull();
  });

  describe("status", () => {
    it("should render timestamps in UTC and in the configured zone", async () => {
      const reporter = new RunReporter({ timeZone: "Asia/Tokyo", dataDir: null });
      await reporter.publish(DRAFT, new Date("2024-01-03T00:05:00Z"));

      const status = reporter.status(
        [
          {
            source: "FITBIT",
            metricType: "WEIGHT",
            lastMigratedAt: new Date("2024-01-03T00:00:00Z"),
            lastSourceRecordId: "2",
          },
        ],
        true
      );

      expect(status.running).toBe(true);
      expect(status.timeZone).toBe("Asia/Tokyo");
      expect(status.watermarks).toEqual([
        {
          source: "FITBIT",
          metricType: "WEIGHT",
          lastMigratedAt: { utc: "2024-01-03T00:00:00.000Z", local: "2024-01-03 09:00:00" },
          lastSourceRecordId: "2",
        },
      ]);
      expect(status.lastRun?.finishedAt).toEqual({
        utc: "2024-01-03T00:05:00.000Z",
        local: "2024-01-03 09:05:00",
      });
      expect(status.lastRun?.lanes[0]?.watermarkBefore).toEqual({
        utc: "2024-01-01T00:00:00.000Z",
        local: "2024-01-01 09:00:00",
      });
    });

    it("should report no last run before the first one", () => {
      const reporter = new RunReporter({ timeZone: "UTC", dataDir: null });

      expect(reporter.status([], false)).toEqual({
        running: false,
        timeZone: "UTC",
        lastRun: null,
        watermarks: [],
      });
    });
  });
});
