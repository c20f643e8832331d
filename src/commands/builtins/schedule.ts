import { z } from "zod";
import { entryHandle } from "../../rota/identity.js";
import { describeSchedule } from "../../scheduler/utils.js";
import type { ScheduleKind } from "../../types.js";
import { formatZoned } from "../../util/time.js";
import { defineCommand, type Command } from "../registry.js";

const INTEGER = /^[+-]?\d+$/;

const scheduleUsage = (command: string, example: string) =>
  `Usage: /${command} <day> <hour> <minute>\n\n` +
  "Day: 0=Monday, 1=Tuesday, 2=Wednesday, 3=Thursday, 4=Friday, 5=Saturday, 6=Sunday\n" +
  "Hour: 0-23 (24-hour format)\n" +
  "Minute: 0-59\n\n" +
  example;

const DAY_RANGE = "Day must be between 0 (Monday) and 6 (Sunday)";
const HOUR_RANGE = "Hour must be between 0 and 23";
const MINUTE_RANGE = "Minute must be between 0 and 59";

/** `<day> <hour> <minute>`; extra arguments are ignored. */
export const weeklyScheduleArgs = (usage: string) =>
  z
    .array(z.string())
    .min(3, usage)
    .transform((args) => args.slice(0, 3))
    .pipe(z.array(z.string().regex(INTEGER, "Invalid input. Please use numbers only.")))
    .transform(([day, hour, minute]) => ({
      dayOfWeek: Number(day),
      hour: Number(hour),
      minute: Number(minute)
    }))
    .pipe(
      z.object({
        dayOfWeek: z.number().int().min(0, DAY_RANGE).max(6, DAY_RANGE),
        hour: z.number().int().min(0, HOUR_RANGE).max(23, HOUR_RANGE),
        minute: z.number().int().min(0, MINUTE_RANGE).max(59, MINUTE_RANGE)
      })
    );

const scheduleCommand = (params: {
  name: string;
  kind: ScheduleKind;
  description: string;
  failureText: string;
  example: string;
  confirmation: (when: string, timezone: string) => string;
}) =>
  defineCommand({
    name: params.name,
    description: params.description,
    adminOnly: true,
    failureText: params.failureText,
    schema: weeklyScheduleArgs(scheduleUsage(params.name, params.example)),
    async run(schedule, ctx) {
      ctx.scheduler.updateSchedule(params.kind, schedule);
      await ctx.reply(params.confirmation(describeSchedule(schedule), ctx.config.timezone));
    }
  });

export const scheduleCommands = (): Command[] => [
  scheduleCommand({
    name: "setschedule",
    kind: "reminder",
    description: "Set reminder schedule",
    failureText: "Error setting schedule",
    example: "Example: /setschedule 0 9 0\n(Sets reminder for Monday at 9:00 AM)",
    confirmation: (when, timezone) =>
      `Schedule updated!\nReminders will be sent every ${when} (${timezone})`
  }),
  scheduleCommand({
    name: "setautopop",
    kind: "autopop",
    description: "Set auto-pop schedule",
    failureText: "Error setting auto-pop schedule",
    example: "Example: /setautopop 0 18 0\n(Sets auto-pop for Monday at 6:00 PM)",
    confirmation: (when, timezone) =>
      `Auto-pop schedule updated!\nUsers with active reminders will be auto-popped every ${when} (${timezone})`
  }),
  defineCommand({
    name: "nextreminder",
    description: "Show next reminder time and who is up next",
    adminOnly: true,
    schema: z.array(z.string()),
    async run(_args, ctx) {
      const nextRun = ctx.scheduler.nextRunAt("reminder");
      const nextRunText = nextRun ? formatZoned(nextRun, ctx.config.timezone) : "Not scheduled";

      const { entries, weekSkipped } = await ctx.service.snapshot();
      const activeIndex = entries.findIndex((item) => item.activeReminder !== null);
      const active = activeIndex >= 0 ? entries[activeIndex] : undefined;
      // With nobody reminded the front is up next; otherwise whoever follows the reminded entry.
      const upNext = active ? entries[activeIndex + 1] : entries[0];

      const thisWeek = active ? entryHandle(active.entry) : "done";
      const nextName = upNext ? entryHandle(upNext.entry) : "none";
      const skipNote = weekSkipped
        ? "\nNote: /noreview is set, so the next scheduled run will be skipped."
        : "";

      await ctx.reply(
        `This week's review is ${thisWeek}\n` +
          `Next reminder is at ${nextRunText} for ${nextName}${skipNote}`
      );
    }
  })
];
