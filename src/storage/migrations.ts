import type Database from "better-sqlite3";

export type Migration =
  | { id: number; sql: string }
  | { id: number; apply: (db: Database.Database) => void };

const columnNames = (db: Database.Database, table: string) =>
  new Set(
    db
      .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
      .all()
      .map((column) => column.name)
  );

export const migrations: Migration[] = [
  {
    id: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS user_queue (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL DEFAULT 0,
        username TEXT UNIQUE COLLATE NOCASE,
        display_name TEXT,
        position INTEGER NOT NULL,
        added_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_user_queue_position ON user_queue(position);
      CREATE INDEX IF NOT EXISTS idx_user_queue_user_id ON user_queue(user_id);

      CREATE TABLE IF NOT EXISTS active_reminders (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        queue_id INTEGER,
        user_id INTEGER NOT NULL DEFAULT 0,
        username TEXT COLLATE NOCASE,
        reminder_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        last_reminded_at TEXT,
        next_reminder_at TEXT
      );

      CREATE TABLE IF NOT EXISTS reminder_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        action TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        notes TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_reminder_history_user ON reminder_history(user_id, timestamp);

      CREATE TABLE IF NOT EXISTS skip_week (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        created_at TEXT NOT NULL,
        reason TEXT
      );
    `
  },
  {
    id: 2,
    sql: `
      CREATE TABLE IF NOT EXISTS schedule (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        day_of_week INTEGER NOT NULL,
        hour INTEGER NOT NULL,
        minute INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS autopop_schedule (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        day_of_week INTEGER NOT NULL,
        hour INTEGER NOT NULL,
        minute INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS group_chat (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        chat_id INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );
    `
  },
  {
    // Databases written by the first bot lack these columns; fresh ones already have them.
    id: 3,
    apply(db) {
      const reminderColumns = columnNames(db, "active_reminders");
      if (!reminderColumns.has("queue_id")) {
        db.exec("ALTER TABLE active_reminders ADD COLUMN queue_id INTEGER");
      }
      if (!reminderColumns.has("username")) {
        db.exec("ALTER TABLE active_reminders ADD COLUMN username TEXT");
      }

      const queueColumns = columnNames(db, "user_queue");
      if (!queueColumns.has("display_name")) {
        db.exec("ALTER TABLE user_queue ADD COLUMN display_name TEXT");
        if (queueColumns.has("first_name")) {
          db.exec("UPDATE user_queue SET display_name = NULLIF(first_name, '')");
        }
      }

      db.exec(
        "CREATE INDEX IF NOT EXISTS idx_active_reminders_queue_id ON active_reminders(queue_id)"
      );
    }
  }
];
