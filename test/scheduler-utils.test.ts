import test from "node:test";
import assert from "node:assert/strict";
import { computeNextFire, describeSchedule, toCronExpression } from "../src/scheduler/utils.js";

test("toCronExpression maps Monday-based days onto cron's Sunday-based days", () => {
  assert.equal(toCronExpression({ dayOfWeek: 0, hour: 18, minute: 0 }), "0 18 * * 1");
  assert.equal(toCronExpression({ dayOfWeek: 1, hour: 9, minute: 0 }), "0 9 * * 2");
  assert.equal(toCronExpression({ dayOfWeek: 6, hour: 18, minute: 30 }), "30 18 * * 0");
});

test("computeNextFire finds the next weekly slot in UTC", () => {
  // 2026-03-02 is a Monday.
  const from = new Date("2026-03-02T00:00:00.000Z");
  assert.equal(
    computeNextFire({ dayOfWeek: 1, hour: 9, minute: 0 }, from, "UTC")?.toISOString(),
    "2026-03-03T09:00:00.000Z"
  );
  assert.equal(
    computeNextFire({ dayOfWeek: 6, hour: 18, minute: 30 }, from, "UTC")?.toISOString(),
    "2026-03-08T18:30:00.000Z"
  );
});

test("computeNextFire honours the configured timezone", () => {
  const from = new Date("2026-03-02T00:00:00.000Z");
  assert.equal(
    computeNextFire({ dayOfWeek: 1, hour: 9, minute: 0 }, from, "Europe/Berlin")?.toISOString(),
    "2026-03-03T08:00:00.000Z"
  );
});

test("describeSchedule names the day and pads the clock", () => {
  assert.equal(describeSchedule({ dayOfWeek: 1, hour: 9, minute: 0 }), "Tuesday at 09:00");
  assert.equal(describeSchedule({ dayOfWeek: 6, hour: 18, minute: 5 }), "Sunday at 18:05");
});
