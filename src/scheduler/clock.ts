import type { Logger } from "pino";
import type { WeeklySchedule } from "../types.js";
import { computeNextFire } from "./utils.js";

export type TriggerName = "reminder" | "autopop";

export type TriggerCallback = () => Promise<unknown>;

export interface TriggerClock {
  arm(name: TriggerName, schedule: WeeklySchedule, fire: TriggerCallback): void;
  disarm(name: TriggerName): void;
  nextFireAt(name: TriggerName): Date | null;
  stop(): void;
}

// setTimeout overflows past this and fires immediately.
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

type ArmedTrigger = {
  schedule: WeeklySchedule;
  fire: TriggerCallback;
  nextAt: Date | null;
  timer: NodeJS.Timeout | null;
  inFlight: boolean;
};

export class CronTriggerClock implements TriggerClock {
  private triggers = new Map<TriggerName, ArmedTrigger>();

  constructor(
    private timezone: string,
    private logger: Pick<Logger, "info" | "warn" | "error" | "debug">,
    private now: () => Date = () => new Date()
  ) {}

  arm(name: TriggerName, schedule: WeeklySchedule, fire: TriggerCallback) {
    this.disarm(name);
    const trigger: ArmedTrigger = { schedule, fire, nextAt: null, timer: null, inFlight: false };
    this.triggers.set(name, trigger);
    this.plan(name, trigger);
  }

  disarm(name: TriggerName) {
    const trigger = this.triggers.get(name);
    if (trigger?.timer) {
      clearTimeout(trigger.timer);
    }
    this.triggers.delete(name);
  }

  nextFireAt(name: TriggerName) {
    return this.triggers.get(name)?.nextAt ?? null;
  }

  stop() {
    for (const name of [...this.triggers.keys()]) {
      this.disarm(name);
    }
  }

  private plan(name: TriggerName, trigger: ArmedTrigger, after?: Date) {
    const now = this.now();
    const from = after && after.getTime() > now.getTime() ? after : now;
    const nextAt = computeNextFire(trigger.schedule, from, this.timezone);
    trigger.nextAt = nextAt;
    if (!nextAt) {
      this.logger.error({ trigger: name, schedule: trigger.schedule }, "could not compute next fire time");
      return;
    }
    this.sleepUntil(name, trigger, nextAt);
    this.logger.debug({ trigger: name, nextAt: nextAt.toISOString() }, "trigger armed");
  }

  private sleepUntil(name: TriggerName, trigger: ArmedTrigger, target: Date) {
    const delay = target.getTime() - this.now().getTime();
    if (delay > MAX_TIMER_DELAY_MS) {
      trigger.timer = setTimeout(() => this.sleepUntil(name, trigger, target), MAX_TIMER_DELAY_MS);
      return;
    }
    trigger.timer = setTimeout(() => {
      void this.run(name, trigger);
    }, Math.max(0, delay));
  }

  private async run(name: TriggerName, trigger: ArmedTrigger) {
    if (this.triggers.get(name) !== trigger) {
      return;
    }
    trigger.timer = null;
    // A timer may wake a little early; never plan the same slot twice.
    const firedAt = trigger.nextAt ? new Date(trigger.nextAt.getTime() + 1_000) : undefined;
    if (trigger.inFlight) {
      this.logger.warn({ trigger: name }, "trigger fire skipped; previous run still in flight");
      this.plan(name, trigger, firedAt);
      return;
    }

    trigger.inFlight = true;
    this.plan(name, trigger, firedAt);
    try {
      this.logger.info({ trigger: name }, "trigger fired");
      await trigger.fire();
    } catch (error) {
      this.logger.error(
        { trigger: name, error: error instanceof Error ? error.message : String(error) },
        "trigger callback failed"
      );
    } finally {
      trigger.inFlight = false;
    }
  }
}
