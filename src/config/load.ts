import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { ConfigSchema, type Config } from "./schema.js";

const parseCsv = (value?: string) =>
  value
    ? value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    : undefined;

const parseNumber = (value?: string) => (value?.trim() ? Number(value) : undefined);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonIfExists = (filePath: string): Record<string, unknown> => {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
};

const withoutUndefined = (record: Record<string, unknown>) =>
  Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));

const mergeSection = (...sources: unknown[]) => {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    if (isRecord(source)) {
      Object.assign(merged, withoutUndefined(source));
    }
  }
  return merged;
};

export type LoadConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export const loadConfig = (options: LoadConfigOptions = {}): Config => {
  const env = options.env ?? process.env;
  if (!options.env) {
    dotenv.config();
  }
  const root = options.cwd ?? process.cwd();
  const fileConfig = readJsonIfExists(path.join(root, "config.json"));
  const fileSchedule = isRecord(fileConfig.schedule) ? fileConfig.schedule : {};

  const envConfig = withoutUndefined({
    dataDir: env.ROTA_DATA_DIR,
    sqlitePath: env.ROTA_SQLITE_PATH,
    logLevel: env.ROTA_LOG_LEVEL,
    timezone: env.TIMEZONE?.trim() || undefined,
    adminIds: parseCsv(env.ADMIN_USER_IDS),
    taskName: env.ROTA_TASK_NAME?.trim() || undefined
  });

  const envTelegram = {
    token: env.TELEGRAM_BOT_TOKEN?.trim() || undefined
  };
  const envReminder = {
    dayOfWeek: parseNumber(env.REMINDER_SCHEDULE_DAY_OF_WEEK),
    hour: parseNumber(env.REMINDER_SCHEDULE_HOUR),
    minute: parseNumber(env.REMINDER_SCHEDULE_MINUTE)
  };
  const envAutopop = {
    dayOfWeek: parseNumber(env.AUTOPOP_SCHEDULE_DAY_OF_WEEK),
    hour: parseNumber(env.AUTOPOP_SCHEDULE_HOUR),
    minute: parseNumber(env.AUTOPOP_SCHEDULE_MINUTE)
  };

  const reminder = mergeSection(
    { dayOfWeek: 1, hour: 9, minute: 0 },
    fileSchedule.reminder,
    envReminder
  );
  const autopop = mergeSection(
    { dayOfWeek: 0, hour: 18, minute: 0 },
    fileSchedule.autopop,
    envAutopop
  );

  const parsed = ConfigSchema.safeParse({
    ...fileConfig,
    ...envConfig,
    telegram: mergeSection(fileConfig.telegram, envTelegram),
    schedule: { reminder, autopop }
  });

  if (!parsed.success) {
    throw new Error(`Invalid config: ${parsed.error.message}`);
  }

  return parsed.data;
};
