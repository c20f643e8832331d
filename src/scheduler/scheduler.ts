import type { Logger } from "pino";
import type { Config } from "../config/schema.js";
import type { RotaService } from "../rota/service.js";
import type { SqliteStorage } from "../storage/sqlite.js";
import type { ScheduleKind, WeeklySchedule } from "../types.js";
import type { TriggerClock } from "./clock.js";
import { describeSchedule } from "./utils.js";

export type ResolvedSchedule = WeeklySchedule & { source: "persisted" | "config" };

/** Persisted schedules win over configured defaults. */
export const resolveSchedule = (
  storage: Pick<SqliteStorage, "getSchedule">,
  config: Pick<Config, "schedule">,
  kind: ScheduleKind
): ResolvedSchedule => {
  const persisted = storage.getSchedule(kind);
  if (persisted) {
    return { ...persisted, source: "persisted" };
  }
  return { ...config.schedule[kind], source: "config" };
};

export class RotaScheduler {
  private running = false;

  constructor(
    private storage: Pick<SqliteStorage, "getSchedule" | "setSchedule">,
    private service: Pick<RotaService, "dispatch" | "autoPop">,
    private clock: TriggerClock,
    private logger: Logger,
    private config: Pick<Config, "schedule">
  ) {}

  resolveSchedule(kind: ScheduleKind): ResolvedSchedule {
    return resolveSchedule(this.storage, this.config, kind);
  }

  start() {
    if (this.running) {
      return;
    }
    this.running = true;
    this.arm("reminder");
    this.arm("autopop");
  }

  stop() {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.clock.disarm("reminder");
    this.clock.disarm("autopop");
  }

  isRunning() {
    return this.running;
  }

  updateSchedule(kind: ScheduleKind, schedule: WeeklySchedule) {
    this.storage.setSchedule(kind, schedule);
    this.logger.info({ kind, schedule: describeSchedule(schedule) }, "schedule updated");
    if (this.running) {
      this.arm(kind);
    }
  }

  nextRunAt(kind: ScheduleKind): Date | null {
    return this.clock.nextFireAt(kind);
  }

  describe(kind: ScheduleKind) {
    return describeSchedule(this.resolveSchedule(kind));
  }

  private arm(kind: ScheduleKind) {
    const { source, ...schedule } = this.resolveSchedule(kind);
    const fire = kind === "reminder" ? () => this.service.dispatch() : () => this.service.autoPop();
    this.clock.arm(kind, schedule, fire);
    this.logger.info({ kind, source, schedule: describeSchedule(schedule) }, "schedule armed");
  }
}
