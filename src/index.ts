export { createRotaApp, RotaApp, type CreateRotaAppOptions } from "./app.js";
export { main } from "./main.js";
export { runPreflightChecks, type PreflightOptions, type PreflightReport } from "./preflight.js";

export { loadConfig, type LoadConfigOptions } from "./config/load.js";
export type { Config } from "./config/schema.js";

export { SqliteStorage } from "./storage/sqlite.js";
export { RotaService, type QueueSnapshot } from "./rota/service.js";
export { ReminderLifecycle } from "./rota/lifecycle.js";
export type {
  AutoPopOutcome,
  DispatchOutcome,
  SelfSkipOutcome,
  SkipWeekOutcome
} from "./rota/lifecycle.js";
export { RotaScheduler, resolveSchedule } from "./scheduler/scheduler.js";
export { CronTriggerClock, type TriggerClock, type TriggerName } from "./scheduler/clock.js";
export { CommandRegistry, defineCommand } from "./commands/registry.js";
export type { Command, CommandContext, CommandInvocation, CommandSpec } from "./commands/registry.js";
export { builtinCommands } from "./commands/builtins/index.js";
export { TelegramChannel } from "./channels/telegram.js";
export type { Channel, Notifier } from "./channels/base.js";

export type {
  ActiveReminder,
  Actor,
  HistoryRecord,
  QueueEntry,
  QueueIdentity,
  ScheduleKind,
  WeeklySchedule
} from "./types.js";
