export type QueueIdentity =
  | { kind: "unresolved"; username: string }
  | { kind: "resolved"; userId: number; username: string | null };

export type QueueEntry = {
  queueId: number;
  identity: QueueIdentity;
  displayName: string | null;
  position: number;
  addedAt: string;
};

export type ActiveReminder = {
  id: number;
  queueId: number | null;
  userId: number;
  username: string | null;
  reminderCount: number;
  createdAt: string;
  lastRemindedAt: string | null;
  nextReminderAt: string | null;
};

export type ReminderLookupKey = {
  queueId?: number | null;
  userId?: number | null;
  username?: string | null;
};

export type ScheduleKind = "reminder" | "autopop";

export type WeeklySchedule = {
  /** 0 = Monday ... 6 = Sunday */
  dayOfWeek: number;
  hour: number;
  minute: number;
};

export type HistoryAction =
  | "added_by_admin"
  | "removed_by_admin"
  | "queue_initialized"
  | "queue_cleared"
  | "identity_bound"
  | "reminded"
  | "skipped"
  | "review_skipped"
  | "week_skipped"
  | "auto_popped"
  | "auto_pop_orphaned";

export type HistoryRecord = {
  id: number;
  userId: number;
  action: HistoryAction;
  notes: string | null;
  timestamp: string;
};

export type ChatType = "private" | "group" | "supergroup" | "channel";

export type Actor = {
  userId: number;
  username: string | null;
  displayName: string | null;
};

export type PositionUpdate = {
  queueId: number;
  position: number;
};
