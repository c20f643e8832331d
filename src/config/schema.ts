import { z } from "zod";

export const isValidTimezone = (value: string) => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
};

export const WeeklyScheduleSchema = z.object({
  dayOfWeek: z.number().int().min(0).max(6),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59)
});

export const ConfigSchema = z.object({
  dataDir: z.string().default("data"),
  sqlitePath: z.string().default("data/review-rota.sqlite"),
  logLevel: z.string().default("info"),
  timezone: z
    .string()
    .refine(isValidTimezone, "timezone must be an IANA identifier such as Europe/Berlin")
    .default("UTC"),
  adminIds: z.array(z.string()).default([]),
  taskName: z.string().min(1).max(80).default("paper review"),
  telegram: z
    .object({
      token: z.string().min(1).optional(),
      dropPendingUpdates: z.boolean().default(true)
    })
    .prefault({}),
  schedule: z
    .object({
      reminder: WeeklyScheduleSchema.default({ dayOfWeek: 1, hour: 9, minute: 0 }),
      autopop: WeeklyScheduleSchema.default({ dayOfWeek: 0, hour: 18, minute: 0 })
    })
    .prefault({})
});

export type Config = z.infer<typeof ConfigSchema>;
