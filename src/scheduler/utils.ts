import cronParser from "cron-parser";
import type { WeeklySchedule } from "../types.js";
import { DAY_NAMES, formatClock } from "../util/time.js";

/** Cron counts days from Sunday; schedules count them from Monday. */
export const toCronExpression = (schedule: WeeklySchedule) =>
  `${schedule.minute} ${schedule.hour} * * ${(schedule.dayOfWeek + 1) % 7}`;

export const computeNextFire = (
  schedule: WeeklySchedule,
  fromDate: Date,
  timezone: string
): Date | null => {
  try {
    const interval = cronParser.parseExpression(toCronExpression(schedule), {
      currentDate: fromDate,
      tz: timezone
    });
    return interval.next().toDate();
  } catch {
    return null;
  }
};

export const describeSchedule = (schedule: WeeklySchedule) =>
  `${DAY_NAMES[schedule.dayOfWeek] ?? `day ${schedule.dayOfWeek}`} at ${formatClock(schedule.hour, schedule.minute)}`;
