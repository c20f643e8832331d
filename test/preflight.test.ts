import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import assert from "node:assert/strict";
import { formatPreflightReport, runCli } from "../src/bin.js";
import { runPreflightChecks } from "../src/preflight.js";
import { SqliteStorage } from "../src/storage/sqlite.js";

const ENV = {
  ROTA_DATA_DIR: "state",
  ROTA_SQLITE_PATH: "state/rota.sqlite",
  TIMEZONE: "Europe/Berlin",
  ADMIN_USER_IDS: "900,@boss"
};

test("runPreflightChecks migrates storage and reports resolved schedules", () => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "review-rota-preflight-"));
  try {
    const report = runPreflightChecks({ cwd, env: ENV });
    const sqlitePath = path.join(cwd, "state", "rota.sqlite");

    assert.equal(report.sqlitePath, sqlitePath);
    assert.equal(fs.existsSync(sqlitePath), true);
    assert.equal(report.schemaVersion, 3);
    assert.equal(report.telegramTokenPresent, false);
    assert.equal(report.adminCount, 2);
    assert.equal(
      formatPreflightReport(report),
      [
        "preflight: ok",
        `sqlite.path: ${sqlitePath}`,
        "sqlite.schema_version: 3",
        "timezone: Europe/Berlin",
        "schedule.reminder: Tuesday at 09:00 (config)",
        "schedule.autopop: Monday at 18:00 (config)",
        "telegram.token: missing",
        "admins: 2"
      ].join("\n")
    );
  } finally {
    fs.rmSync(cwd, { recursive: true, force: true });
  }
});

test("runPreflightChecks prefers schedules persisted by admins", () => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "review-rota-preflight-persisted-"));
  try {
    runPreflightChecks({ cwd, env: ENV });
    const storage = new SqliteStorage({
      sqlitePath: path.join(cwd, "state", "rota.sqlite"),
      dataDir: path.join(cwd, "state")
    });
    storage.init();
    storage.setSchedule("autopop", { dayOfWeek: 4, hour: 17, minute: 45 });
    storage.close();

    const report = runPreflightChecks({ cwd, env: { ...ENV, TELEGRAM_BOT_TOKEN: "test-token" } });
    assert.deepEqual(report.schedules.autopop, {
      dayOfWeek: 4,
      hour: 17,
      minute: 45,
      source: "persisted",
      description: "Friday at 17:45"
    });
    assert.equal(report.schedules.reminder.source, "config");
    assert.equal(report.telegramTokenPresent, true);
  } finally {
    fs.rmSync(cwd, { recursive: true, force: true });
  }
});

test("runPreflightChecks rejects an invalid timezone", () => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "review-rota-preflight-invalid-"));
  try {
    assert.throws(() => runPreflightChecks({ cwd, env: { TIMEZONE: "Nowhere/Special" } }), /Invalid config/);
  } finally {
    fs.rmSync(cwd, { recursive: true, force: true });
  }
});

test("review-rota preflight rejects extra arguments", async () => {
  await assert.rejects(runCli(["preflight", "--verbose"]), {
    message: "Unknown preflight option: --verbose"
  });
});

test("review-rota answers --help and --version without starting the bot", async () => {
  await runCli(["--help"]);
  await runCli(["-v"]);
});
