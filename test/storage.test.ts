import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import assert from "node:assert/strict";
import Database from "better-sqlite3";
import { SqliteStorage } from "../src/storage/sqlite.js";
import { createConfig, createStorageFixture, hasDensePositions } from "./test-utils.js";

const usernames = (storage: SqliteStorage) =>
  storage.listQueue().map((entry) => entry.identity.username);

test("init applies every migration once and is idempotent", () => {
  const fixture = createStorageFixture();
  try {
    assert.equal(fixture.storage.schemaVersion(), 3);

    const reopened = new SqliteStorage(fixture.config);
    assert.deepEqual(reopened.init(), { schemaVersion: 3, legacyReminder: { status: "none" } });
    reopened.close();

    assert.equal(fs.existsSync(path.join(fixture.dataDir, "backups")), false);
  } finally {
    fixture.cleanup();
  }
});

test("insertEntry appends at the tail and rejects duplicate usernames case-insensitively", () => {
  const fixture = createStorageFixture();
  try {
    assert.equal(fixture.storage.insertEntry({ username: "@alice" }), true);
    assert.equal(fixture.storage.insertEntry({ username: "bob" }), true);
    assert.equal(fixture.storage.insertEntry({ username: "ALICE" }), false);

    const entries = fixture.storage.listQueue();
    assert.deepEqual(usernames(fixture.storage), ["alice", "bob"]);
    assert.deepEqual(
      entries.map((entry) => entry.position),
      [0, 1]
    );
    assert.deepEqual(entries[0]?.identity, { kind: "unresolved", username: "alice" });
  } finally {
    fixture.cleanup();
  }
});

test("removeEntry keeps positions dense and queue ids are never reused", () => {
  const fixture = createStorageFixture();
  try {
    for (const name of ["alice", "bob", "carol"]) {
      fixture.storage.insertEntry({ username: name });
    }
    const bob = fixture.storage.findEntryByUsername("bob");
    assert.ok(bob);
    assert.equal(fixture.storage.removeEntry(bob.queueId), true);
    assert.equal(fixture.storage.removeEntry(bob.queueId), false);

    assert.deepEqual(usernames(fixture.storage), ["alice", "carol"]);
    assert.equal(hasDensePositions(fixture.storage.listQueue()), true);

    fixture.storage.insertEntry({ username: "dave" });
    const dave = fixture.storage.findEntryByUsername("dave");
    assert.ok(dave);
    assert.equal(dave.queueId > bob.queueId, true);
  } finally {
    fixture.cleanup();
  }
});

test("moveToBack rotates the queue and reports unknown entries", () => {
  const fixture = createStorageFixture();
  try {
    for (const name of ["alice", "bob", "carol"]) {
      fixture.storage.insertEntry({ username: name });
    }
    const alice = fixture.storage.frontEntry();
    assert.ok(alice);
    assert.equal(fixture.storage.moveToBack(alice.queueId), true);
    assert.deepEqual(usernames(fixture.storage), ["bob", "carol", "alice"]);
    assert.equal(hasDensePositions(fixture.storage.listQueue()), true);
    assert.equal(fixture.storage.moveToBack(9_999), false);
  } finally {
    fixture.cleanup();
  }
});

test("bindIdentity resolves an unresolved entry exactly once", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertEntry({ username: "alice" });
    const entry = fixture.storage.findEntryByUsername("Alice");
    assert.ok(entry);
    assert.equal(fixture.storage.findEntryByUserId(0), null);

    assert.equal(fixture.storage.bindIdentity(entry.queueId, 501, "Alice A."), true);
    assert.equal(fixture.storage.bindIdentity(entry.queueId, 777, null), false);

    const bound = fixture.storage.findEntryByUserId(501);
    assert.deepEqual(bound?.identity, { kind: "resolved", userId: 501, username: "alice" });
    assert.equal(bound?.displayName, "Alice A.");
    assert.equal(fixture.storage.findQueueId(0, "alice"), entry.queueId);
  } finally {
    fixture.cleanup();
  }
});

test("reminders are found by the first present lookup key", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertEntry({ username: "alice" });
    const entry = fixture.storage.frontEntry();
    assert.ok(entry);
    const id = fixture.storage.createReminder({
      queueId: entry.queueId,
      userId: 0,
      username: "alice",
      at: "2026-03-03T09:00:00.000Z"
    });

    assert.equal(fixture.storage.getActiveReminder({ queueId: entry.queueId })?.id, id);
    assert.equal(fixture.storage.getActiveReminder({ username: "ALICE" })?.id, id);
    assert.equal(fixture.storage.getActiveReminder({ userId: 0 }), null);
    assert.equal(fixture.storage.getActiveReminder({ queueId: entry.queueId + 1, username: "alice" }), null);

    fixture.storage.updateReminder(id, {
      reminderCount: 1,
      lastRemindedAt: "2026-03-10T09:00:00.000Z"
    });
    const updated = fixture.storage.getActiveReminder({ queueId: entry.queueId });
    assert.equal(updated?.reminderCount, 1);
    assert.equal(updated?.createdAt, "2026-03-03T09:00:00.000Z");
    assert.equal(updated?.lastRemindedAt, "2026-03-10T09:00:00.000Z");

    assert.equal(fixture.storage.deleteReminder(id), true);
    assert.equal(fixture.storage.deleteReminder(id), false);
    assert.deepEqual(fixture.storage.listActiveReminders(), []);
  } finally {
    fixture.cleanup();
  }
});

test("a lone legacy reminder without queue id is adopted by the front entry", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertEntry({ username: "alice" });
    fixture.storage.insertEntry({ username: "bob" });
    const front = fixture.storage.frontEntry();
    assert.ok(front);

    const raw = new Database(fixture.config.sqlitePath);
    raw
      .prepare(
        "INSERT INTO active_reminders(queue_id, user_id, username, reminder_count, created_at) VALUES(NULL, 0, NULL, 2, '2026-01-05T09:00:00.000Z')"
      )
      .run();
    raw.close();

    const reopened = new SqliteStorage(fixture.config);
    const report = reopened.init();
    reopened.close();

    const adopted = fixture.storage.getActiveReminder({ queueId: front.queueId });
    assert.deepEqual(report.legacyReminder, {
      status: "adopted",
      reminderId: adopted?.id,
      queueId: front.queueId
    });
    assert.equal(adopted?.reminderCount, 2);
    assert.equal(adopted?.username, "alice");
  } finally {
    fixture.cleanup();
  }
});

test("history lists a user's records newest first with a limit", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.addHistory(42, "reminded", "first");
    fixture.storage.addHistory(42, "skipped", "second");
    fixture.storage.addHistory(7, "reminded", "other user");
    fixture.storage.addHistory(42, "auto_popped");

    const records = fixture.storage.listHistory(42, 2);
    assert.deepEqual(
      records.map((record) => [record.action, record.notes]),
      [
        ["auto_popped", null],
        ["skipped", "second"]
      ]
    );
  } finally {
    fixture.cleanup();
  }
});

test("skip flag, schedules and group target persist", () => {
  const fixture = createStorageFixture();
  try {
    assert.equal(fixture.storage.isWeekSkipped(), false);
    fixture.storage.setSkipWeek("Admin 1 used /noreview");
    assert.equal(fixture.storage.isWeekSkipped(), true);
    fixture.storage.clearSkipWeek();
    assert.equal(fixture.storage.isWeekSkipped(), false);

    assert.equal(fixture.storage.getSchedule("reminder"), null);
    fixture.storage.setSchedule("reminder", { dayOfWeek: 3, hour: 14, minute: 30 });
    fixture.storage.setSchedule("reminder", { dayOfWeek: 4, hour: 10, minute: 5 });
    assert.deepEqual(fixture.storage.getSchedule("reminder"), { dayOfWeek: 4, hour: 10, minute: 5 });
    assert.equal(fixture.storage.getSchedule("autopop"), null);

    assert.equal(fixture.storage.getGroupChatId(), null);
    fixture.storage.setGroupChatId(-100123);
    assert.equal(fixture.storage.getGroupChatId(), -100123);
  } finally {
    fixture.cleanup();
  }
});

test("clearQueue removes every entry and reports the count", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertEntry({ username: "alice" });
    fixture.storage.insertEntry({ username: "bob" });
    assert.equal(fixture.storage.clearQueue(), 2);
    assert.deepEqual(fixture.storage.listQueue(), []);
    assert.equal(fixture.storage.frontEntry(), null);
  } finally {
    fixture.cleanup();
  }
});

test("removeByUserId removes a resolved entry and ignores unresolved ids", () => {
  const fixture = createStorageFixture();
  try {
    for (const name of ["alice", "bob", "carol"]) {
      fixture.storage.insertEntry({ username: name });
    }
    const bob = fixture.storage.findEntryByUsername("bob");
    assert.ok(bob);
    fixture.storage.bindIdentity(bob.queueId, 502, null);

    assert.equal(fixture.storage.removeByUserId(0), false);
    assert.equal(fixture.storage.removeByUserId(502), true);
    assert.equal(fixture.storage.removeByUserId(502), false);
    assert.deepEqual(usernames(fixture.storage), ["alice", "carol"]);
    assert.equal(hasDensePositions(fixture.storage.listQueue()), true);
  } finally {
    fixture.cleanup();
  }
});

test("a legacy reminder is dropped when the front entry already has one", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertEntry({ username: "alice" });
    fixture.storage.insertEntry({ username: "bob" });
    const front = fixture.storage.frontEntry();
    assert.ok(front);
    const current = fixture.storage.createReminder({
      queueId: front.queueId,
      userId: 0,
      username: "alice"
    });

    const raw = new Database(fixture.config.sqlitePath);
    const legacyId = Number(
      raw
        .prepare(
          "INSERT INTO active_reminders(queue_id, user_id, username, reminder_count, created_at) VALUES(NULL, 0, NULL, 4, '2026-01-05T09:00:00.000Z')"
        )
        .run().lastInsertRowid
    );
    raw.close();

    const reopened = new SqliteStorage(fixture.config);
    const report = reopened.init();
    reopened.close();

    assert.deepEqual(report.legacyReminder, {
      status: "discarded",
      reminderId: legacyId,
      queueId: front.queueId
    });
    assert.deepEqual(
      fixture.storage.listActiveReminders().map((reminder) => [reminder.id, reminder.queueId]),
      [[current, front.queueId]]
    );
  } finally {
    fixture.cleanup();
  }
});

test("a database written by the first bot is upgraded in place and its reminder adopted", () => {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "review-rota-legacy-"));
  const dataDir = path.join(rootDir, "data");
  fs.mkdirSync(dataDir, { recursive: true });
  const config = createConfig(dataDir);

  const raw = new Database(config.sqlitePath);
  raw.exec(`
    CREATE TABLE user_queue (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      username TEXT UNIQUE,
      first_name TEXT,
      last_name TEXT,
      position INTEGER NOT NULL,
      added_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );
    CREATE TABLE active_reminders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      reminder_count INTEGER DEFAULT 0,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      last_reminded_at TIMESTAMP,
      next_reminder_at TIMESTAMP
    );
    CREATE TABLE reminder_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      action TEXT NOT NULL,
      timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      notes TEXT
    );
    CREATE TABLE skip_week (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      reason TEXT
    );
    INSERT INTO user_queue(user_id, username, first_name, position) VALUES (501, 'alice', 'Alice', 0);
    INSERT INTO user_queue(user_id, username, first_name, position) VALUES (0, 'Bob', '', 1);
    INSERT INTO active_reminders(user_id, reminder_count) VALUES (501, 2);
  `);
  raw.close();

  const storage = new SqliteStorage(config);
  try {
    const report = storage.init();
    const [alice, bob] = storage.listQueue();
    assert.ok(alice && bob);

    assert.deepEqual(report, {
      schemaVersion: 3,
      legacyReminder: { status: "adopted", reminderId: 1, queueId: alice.queueId }
    });
    assert.deepEqual(alice.identity, { kind: "resolved", userId: 501, username: "alice" });
    assert.equal(alice.displayName, "Alice");
    assert.deepEqual(bob.identity, { kind: "unresolved", username: "Bob" });
    assert.equal(bob.displayName, null);

    const reminder = storage.getActiveReminder({ queueId: alice.queueId });
    assert.equal(reminder?.reminderCount, 2);
    assert.equal(reminder?.username, "alice");

    assert.equal(storage.insertEntry({ username: "ALICE" }), false);
    assert.equal(storage.insertEntry({ username: "carol" }), true);
    assert.equal(storage.findEntryByUsername("bob")?.queueId, bob.queueId);
    assert.equal(storage.bindIdentity(bob.queueId, 502, "Bob B."), true);
    assert.equal(storage.findEntryByUserId(502)?.displayName, "Bob B.");

    const backups = fs.readdirSync(path.join(dataDir, "backups"));
    assert.equal(backups.length, 1);
    assert.equal(backups[0]?.startsWith("pre-migration-v0-"), true);
  } finally {
    storage.close();
    fs.rmSync(rootDir, { recursive: true, force: true });
  }
});
