import fs from "node:fs";
import path from "node:path";
import { loadConfig, type LoadConfigOptions } from "./config/load.js";
import { resolveSchedule, type ResolvedSchedule } from "./scheduler/scheduler.js";
import { describeSchedule } from "./scheduler/utils.js";
import { SqliteStorage } from "./storage/sqlite.js";
import type { ScheduleKind } from "./types.js";

export type PreflightOptions = LoadConfigOptions;

export type PreflightReport = {
  sqlitePath: string;
  schemaVersion: number;
  timezone: string;
  schedules: Record<ScheduleKind, ResolvedSchedule & { description: string }>;
  telegramTokenPresent: boolean;
  adminCount: number;
};

/** Validates config and storage without contacting Telegram. */
export const runPreflightChecks = (options: PreflightOptions = {}): PreflightReport => {
  const config = loadConfig(options);
  const root = options.cwd ?? process.cwd();
  const sqlitePath = path.resolve(root, config.sqlitePath);
  fs.mkdirSync(path.dirname(sqlitePath), { recursive: true });

  const storage = new SqliteStorage({ sqlitePath, dataDir: path.resolve(root, config.dataDir) });
  try {
    storage.init();
    const schedule = (kind: ScheduleKind) => {
      const resolved = resolveSchedule(storage, config, kind);
      return { ...resolved, description: describeSchedule(resolved) };
    };
    return {
      sqlitePath,
      schemaVersion: storage.schemaVersion(),
      timezone: config.timezone,
      schedules: { reminder: schedule("reminder"), autopop: schedule("autopop") },
      telegramTokenPresent: Boolean(config.telegram.token),
      adminCount: config.adminIds.length
    };
  } finally {
    storage.close();
  }
};
