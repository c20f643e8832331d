import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Config } from "../config/schema.js";
import { migrations } from "./migrations.js";
import type {
  ActiveReminder,
  HistoryAction,
  HistoryRecord,
  PositionUpdate,
  QueueEntry,
  ReminderLookupKey,
  ScheduleKind,
  WeeklySchedule
} from "../types.js";
import { nowIso } from "../util/time.js";
import { identityFromRow, normalizeUsername, UNRESOLVED_USER_ID } from "../rota/identity.js";
import { selectReminderLookup } from "../rota/lookup.js";
import { nextTailPosition, planMoveToBack, planRemoval } from "../rota/rotation.js";

type QueueRow = {
  id: number;
  user_id: number;
  username: string | null;
  display_name: string | null;
  position: number;
  added_at: string;
};

type ReminderRow = {
  id: number;
  queue_id: number | null;
  user_id: number;
  username: string | null;
  reminder_count: number;
  created_at: string;
  last_reminded_at: string | null;
  next_reminder_at: string | null;
};

type HistoryRow = {
  id: number;
  user_id: number;
  action: HistoryAction;
  notes: string | null;
  timestamp: string;
};

type ScheduleRow = {
  day_of_week: number;
  hour: number;
  minute: number;
};

const scheduleTables: Record<ScheduleKind, string> = {
  reminder: "schedule",
  autopop: "autopop_schedule"
};

const mapQueueRow = (row: QueueRow): QueueEntry => ({
  queueId: row.id,
  identity: identityFromRow(row.user_id, row.username),
  displayName: row.display_name,
  position: row.position,
  addedAt: row.added_at
});

const mapReminderRow = (row: ReminderRow): ActiveReminder => ({
  id: row.id,
  queueId: row.queue_id,
  userId: row.user_id,
  username: row.username,
  reminderCount: row.reminder_count,
  createdAt: row.created_at,
  lastRemindedAt: row.last_reminded_at,
  nextReminderAt: row.next_reminder_at
});

export type LegacyReminderAdoption =
  | { status: "none" }
  | { status: "adopted"; reminderId: number; queueId: number }
  | { status: "discarded"; reminderId: number; queueId: number };

export type StorageInitReport = {
  schemaVersion: number;
  legacyReminder: LegacyReminderAdoption;
};

const isUniqueViolation = (error: unknown) =>
  error instanceof Error && error.message.includes("UNIQUE constraint failed");

export class SqliteStorage {
  private db: Database.Database;
  private config: Pick<Config, "sqlitePath" | "dataDir">;

  constructor(config: Pick<Config, "sqlitePath" | "dataDir">) {
    this.config = config;
    this.db = new Database(config.sqlitePath);
    this.db.pragma("journal_mode = WAL");
  }

  init(): StorageInitReport {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT
      );
      CREATE TABLE IF NOT EXISTS migration_history (
        id INTEGER PRIMARY KEY,
        status TEXT NOT NULL,
        applied_at TEXT NOT NULL,
        error TEXT,
        backup_path TEXT
      );
    `);

    const currentVersion = Number(this.getMeta("schema_version") ?? "0") || 0;
    const pending = migrations
      .slice()
      .sort((a, b) => a.id - b.id)
      .filter((migration) => migration.id > currentVersion);

    if (pending.length > 0) {
      this.applyMigrations(currentVersion, pending);
    }

    return {
      schemaVersion: this.schemaVersion(),
      legacyReminder: this.adoptLegacyReminder()
    };
  }

  private applyMigrations(currentVersion: number, pending: typeof migrations) {
    const backupPath =
      currentVersion > 0 || this.hasTable("user_queue")
        ? this.createPreMigrationBackup(currentVersion)
        : null;
    const recordMigration = this.db.prepare<[number, string, string, string | null, string | null]>(
      "INSERT INTO migration_history(id, status, applied_at, error, backup_path) VALUES(?,?,?,?,?) ON CONFLICT(id) DO UPDATE SET status=excluded.status, applied_at=excluded.applied_at, error=excluded.error, backup_path=excluded.backup_path"
    );

    for (const migration of pending) {
      const applyMigration = this.db.transaction(() => {
        if ("sql" in migration) {
          this.db.exec(migration.sql);
        } else {
          migration.apply(this.db);
        }
        recordMigration.run(migration.id, "applied", nowIso(), null, backupPath);
        this.setMeta("schema_version", String(migration.id));
      });
      try {
        applyMigration();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        recordMigration.run(migration.id, "failed", nowIso(), message, backupPath);
        throw new Error(
          backupPath
            ? `Migration ${migration.id} failed: ${message}. Restore backup: ${backupPath}`
            : `Migration ${migration.id} failed: ${message}.`
        );
      }
    }
    this.setMeta("schema_last_migrated_at", nowIso());
  }

  private hasTable(name: string) {
    const row = this.db
      .prepare<[string], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
      )
      .get(name);
    return Boolean(row);
  }

  private getMeta(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string | null }>("SELECT value FROM meta WHERE key = ?")
      .get(key);
    return row?.value ?? null;
  }

  private setMeta(key: string, value: string) {
    this.db
      .prepare<[string, string]>("INSERT OR REPLACE INTO meta(key, value) VALUES(?, ?)")
      .run(key, value);
  }

  private createPreMigrationBackup(currentVersion: number): string | null {
    const sqlitePath = path.resolve(this.config.sqlitePath);
    if (!fs.existsSync(sqlitePath)) {
      return null;
    }

    const backupDir = path.resolve(this.config.dataDir, "backups");
    fs.mkdirSync(backupDir, { recursive: true });
    const stamp = nowIso().replace(/[:.]/g, "-");
    const backupPath = path.join(backupDir, `pre-migration-v${currentVersion}-${stamp}.sqlite`);
    const escaped = backupPath.replace(/'/g, "''");

    this.db.exec(`VACUUM main INTO '${escaped}'`);
    return backupPath;
  }

  schemaVersion(): number {
    return Number(this.getMeta("schema_version") ?? "0") || 0;
  }

  /**
   * A reminder written before reminders were keyed by queue entry carries no
   * queue_id. When exactly one such row exists it is bound to the entry at the
   * front of the queue, provided the user ids agree or the row has none. If
   * that entry already holds a reminder, the legacy row is deleted instead.
   */
  private adoptLegacyReminder(): LegacyReminderAdoption {
    const adopt = this.db.transaction((): LegacyReminderAdoption => {
      const legacy = this.db
        .prepare<[], ReminderRow>("SELECT * FROM active_reminders WHERE queue_id IS NULL")
        .all();
      const reminder = legacy.length === 1 ? legacy[0] : undefined;
      const front = this.db
        .prepare<[], QueueRow>("SELECT * FROM user_queue ORDER BY position ASC LIMIT 1")
        .get();
      if (!reminder || !front) {
        return { status: "none" };
      }
      if (reminder.user_id !== UNRESOLVED_USER_ID && reminder.user_id !== front.user_id) {
        return { status: "none" };
      }

      const existing = this.db
        .prepare<[number], { id: number }>(
          "SELECT id FROM active_reminders WHERE queue_id = ? LIMIT 1"
        )
        .get(front.id);
      if (existing) {
        this.db.prepare<[number]>("DELETE FROM active_reminders WHERE id = ?").run(reminder.id);
        return { status: "discarded", reminderId: reminder.id, queueId: front.id };
      }

      this.db
        .prepare<[number, string | null, number]>(
          "UPDATE active_reminders SET queue_id = ?, username = ? WHERE id = ?"
        )
        .run(front.id, front.username, reminder.id);
      return { status: "adopted", reminderId: reminder.id, queueId: front.id };
    });
    return adopt();
  }

  atomically<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  // --- queue entries ---

  insertEntry(params: {
    username?: string | null;
    userId?: number;
    displayName?: string | null;
  }): boolean {
    const username = params.username ? normalizeUsername(params.username) || null : null;
    const insert = this.db.transaction(() => {
      if (username) {
        const existing = this.db
          .prepare<[string], { id: number }>(
            "SELECT id FROM user_queue WHERE username = ? COLLATE NOCASE"
          )
          .get(username);
        if (existing) {
          return false;
        }
      }
      const position = nextTailPosition(this.positions());
      this.db
        .prepare<[number, string | null, string | null, number, string]>(
          "INSERT INTO user_queue(user_id, username, display_name, position, added_at) VALUES(?,?,?,?,?)"
        )
        .run(
          params.userId ?? UNRESOLVED_USER_ID,
          username,
          params.displayName ?? null,
          position,
          nowIso()
        );
      return true;
    });

    try {
      return insert();
    } catch (error) {
      if (isUniqueViolation(error)) {
        return false;
      }
      throw error;
    }
  }

  listQueue(): QueueEntry[] {
    return this.db
      .prepare<[], QueueRow>("SELECT * FROM user_queue ORDER BY position ASC")
      .all()
      .map(mapQueueRow);
  }

  frontEntry(): QueueEntry | null {
    const row = this.db
      .prepare<[], QueueRow>("SELECT * FROM user_queue ORDER BY position ASC LIMIT 1")
      .get();
    return row ? mapQueueRow(row) : null;
  }

  findEntry(queueId: number): QueueEntry | null {
    const row = this.db
      .prepare<[number], QueueRow>("SELECT * FROM user_queue WHERE id = ?")
      .get(queueId);
    return row ? mapQueueRow(row) : null;
  }

  findEntryByUsername(username: string): QueueEntry | null {
    const row = this.db
      .prepare<[string], QueueRow>("SELECT * FROM user_queue WHERE username = ? COLLATE NOCASE")
      .get(normalizeUsername(username));
    return row ? mapQueueRow(row) : null;
  }

  findEntryByUserId(userId: number): QueueEntry | null {
    if (userId === UNRESOLVED_USER_ID) {
      return null;
    }
    const row = this.db
      .prepare<[number], QueueRow>(
        "SELECT * FROM user_queue WHERE user_id = ? ORDER BY position ASC LIMIT 1"
      )
      .get(userId);
    return row ? mapQueueRow(row) : null;
  }

  findQueueId(userId: number, username: string | null): number | null {
    const byUser = this.findEntryByUserId(userId);
    if (byUser) {
      return byUser.queueId;
    }
    if (username) {
      return this.findEntryByUsername(username)?.queueId ?? null;
    }
    return null;
  }

  removeEntry(queueId: number): boolean {
    const remove = this.db.transaction(() => {
      const updates = planRemoval(this.positions(), queueId);
      if (!updates) {
        return false;
      }
      this.db.prepare<[number]>("DELETE FROM user_queue WHERE id = ?").run(queueId);
      this.applyPositions(updates);
      return true;
    });
    return remove();
  }

  removeByUserId(userId: number): boolean {
    const entry = this.findEntryByUserId(userId);
    return entry ? this.removeEntry(entry.queueId) : false;
  }

  moveToBack(queueId: number): boolean {
    const move = this.db.transaction(() => {
      const updates = planMoveToBack(this.positions(), queueId);
      if (!updates) {
        return false;
      }
      this.applyPositions(updates);
      return true;
    });
    return move();
  }

  clearQueue(): number {
    return this.db.prepare<[]>("DELETE FROM user_queue").run().changes;
  }

  /** Binds a platform user id to an entry that was queued by username only. */
  bindIdentity(queueId: number, userId: number, displayName: string | null): boolean {
    const result = this.db
      .prepare<[number, string | null, number, number]>(
        "UPDATE user_queue SET user_id = ?, display_name = COALESCE(?, display_name) WHERE id = ? AND user_id = ?"
      )
      .run(userId, displayName, queueId, UNRESOLVED_USER_ID);
    return result.changes > 0;
  }

  private positions() {
    return this.db
      .prepare<[], { id: number; position: number }>("SELECT id, position FROM user_queue")
      .all()
      .map((row) => ({ queueId: row.id, position: row.position }));
  }

  private applyPositions(updates: PositionUpdate[]) {
    const update = this.db.prepare<[number, number]>(
      "UPDATE user_queue SET position = ? WHERE id = ?"
    );
    for (const item of updates) {
      update.run(item.position, item.queueId);
    }
  }

  // --- active reminders ---

  createReminder(params: {
    queueId: number;
    userId: number;
    username: string | null;
    at?: string;
    nextReminderAt?: string | null;
  }): number {
    const at = params.at ?? nowIso();
    const result = this.db
      .prepare<[number, number, string | null, string, string, string | null]>(
        "INSERT INTO active_reminders(queue_id, user_id, username, reminder_count, created_at, last_reminded_at, next_reminder_at) VALUES(?,?,?,0,?,?,?)"
      )
      .run(params.queueId, params.userId, params.username, at, at, params.nextReminderAt ?? null);
    return Number(result.lastInsertRowid);
  }

  getActiveReminder(key: ReminderLookupKey): ActiveReminder | null {
    const lookup = selectReminderLookup(key);
    if (!lookup) {
      return null;
    }
    let row: ReminderRow | undefined;
    switch (lookup.by) {
      case "queueId":
        row = this.db
          .prepare<[number], ReminderRow>(
            "SELECT * FROM active_reminders WHERE queue_id = ? ORDER BY id ASC LIMIT 1"
          )
          .get(lookup.queueId);
        break;
      case "userId":
        row = this.db
          .prepare<[number], ReminderRow>(
            "SELECT * FROM active_reminders WHERE user_id = ? ORDER BY id ASC LIMIT 1"
          )
          .get(lookup.userId);
        break;
      case "username":
        row = this.db
          .prepare<[string], ReminderRow>(
            "SELECT * FROM active_reminders WHERE username = ? COLLATE NOCASE ORDER BY id ASC LIMIT 1"
          )
          .get(normalizeUsername(lookup.username));
        break;
    }
    return row ? mapReminderRow(row) : null;
  }

  updateReminder(
    reminderId: number,
    patch: { reminderCount: number; lastRemindedAt: string; nextReminderAt?: string | null }
  ) {
    this.db
      .prepare<[number, string, string | null, number]>(
        "UPDATE active_reminders SET reminder_count = ?, last_reminded_at = ?, next_reminder_at = ? WHERE id = ?"
      )
      .run(patch.reminderCount, patch.lastRemindedAt, patch.nextReminderAt ?? null, reminderId);
  }

  deleteReminder(reminderId: number): boolean {
    return (
      this.db.prepare<[number]>("DELETE FROM active_reminders WHERE id = ?").run(reminderId)
        .changes > 0
    );
  }

  listActiveReminders(): ActiveReminder[] {
    return this.db
      .prepare<[], ReminderRow>("SELECT * FROM active_reminders ORDER BY id ASC")
      .all()
      .map(mapReminderRow);
  }

  // --- history ---

  addHistory(userId: number, action: HistoryAction, notes?: string) {
    this.db
      .prepare<[number, string, string, string | null]>(
        "INSERT INTO reminder_history(user_id, action, timestamp, notes) VALUES(?,?,?,?)"
      )
      .run(userId, action, nowIso(), notes ?? null);
  }

  listHistory(userId: number, limit = 10): HistoryRecord[] {
    return this.db
      .prepare<[number, number], HistoryRow>(
        "SELECT id, user_id, action, notes, timestamp FROM reminder_history WHERE user_id = ? ORDER BY timestamp DESC, id DESC LIMIT ?"
      )
      .all(userId, limit)
      .map((row) => ({
        id: row.id,
        userId: row.user_id,
        action: row.action,
        notes: row.notes,
        timestamp: row.timestamp
      }));
  }

  // --- skip-week latch ---

  setSkipWeek(reason: string) {
    this.db
      .prepare<[string, string]>("INSERT INTO skip_week(created_at, reason) VALUES(?, ?)")
      .run(nowIso(), reason);
  }

  isWeekSkipped(): boolean {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM skip_week")
      .get();
    return (row?.count ?? 0) > 0;
  }

  clearSkipWeek() {
    this.db.prepare<[]>("DELETE FROM skip_week").run();
  }

  // --- schedules and group target ---

  getSchedule(kind: ScheduleKind): WeeklySchedule | null {
    const row = this.db
      .prepare<[], ScheduleRow>(
        `SELECT day_of_week, hour, minute FROM ${scheduleTables[kind]} WHERE id = 1`
      )
      .get();
    return row ? { dayOfWeek: row.day_of_week, hour: row.hour, minute: row.minute } : null;
  }

  setSchedule(kind: ScheduleKind, schedule: WeeklySchedule) {
    this.db
      .prepare<[number, number, number, string]>(
        `INSERT INTO ${scheduleTables[kind]}(id, day_of_week, hour, minute, updated_at) VALUES(1, ?, ?, ?, ?) ON CONFLICT(id) DO UPDATE SET day_of_week = excluded.day_of_week, hour = excluded.hour, minute = excluded.minute, updated_at = excluded.updated_at`
      )
      .run(schedule.dayOfWeek, schedule.hour, schedule.minute, nowIso());
  }

  getGroupChatId(): number | null {
    const row = this.db
      .prepare<[], { chat_id: number }>("SELECT chat_id FROM group_chat WHERE id = 1")
      .get();
    return row?.chat_id ?? null;
  }

  setGroupChatId(chatId: number) {
    this.db
      .prepare<[number, string]>(
        "INSERT INTO group_chat(id, chat_id, updated_at) VALUES(1, ?, ?) ON CONFLICT(id) DO UPDATE SET chat_id = excluded.chat_id, updated_at = excluded.updated_at"
      )
      .run(chatId, nowIso());
  }

  close() {
    this.db.close();
  }
}
