import test from "node:test";
import assert from "node:assert/strict";
import { selectReminderLookup } from "../src/rota/lookup.js";
import { createStorageFixture } from "./test-utils.js";

test("selectReminderLookup prefers queue id, then non-zero user id, then username", () => {
  assert.deepEqual(selectReminderLookup({ queueId: 3, userId: 7, username: "alice" }), {
    by: "queueId",
    queueId: 3
  });
  assert.deepEqual(selectReminderLookup({ userId: 7, username: "alice" }), {
    by: "userId",
    userId: 7
  });
  assert.deepEqual(selectReminderLookup({ userId: 0, username: "alice" }), {
    by: "username",
    username: "alice"
  });
  assert.equal(selectReminderLookup({ userId: 0 }), null);
  assert.equal(selectReminderLookup({}), null);
});

test("a present queue id is the only criterion even when it matches nothing", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertEntry({ username: "alice", userId: 7 });
    const alice = fixture.storage.frontEntry();
    assert.ok(alice);
    const id = fixture.storage.createReminder({ queueId: alice.queueId, userId: 7, username: "alice" });

    assert.equal(
      fixture.storage.getActiveReminder({ queueId: alice.queueId + 1, userId: 7, username: "alice" }),
      null
    );
    assert.equal(fixture.storage.getActiveReminder({ queueId: alice.queueId })?.id, id);
    assert.equal(fixture.storage.getActiveReminder({ userId: 7, username: "nobody" })?.id, id);
  } finally {
    fixture.cleanup();
  }
});

test("placeholder user id zero never matches another unresolved entry's reminder", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertEntry({ username: "bob" });
    fixture.storage.insertEntry({ username: "carol" });
    const bob = fixture.storage.frontEntry();
    assert.ok(bob);
    const id = fixture.storage.createReminder({ queueId: bob.queueId, userId: 0, username: "bob" });

    assert.equal(fixture.storage.getActiveReminder({ userId: 0, username: "carol" }), null);
    assert.equal(fixture.storage.getActiveReminder({ userId: 0, username: "BOB" })?.id, id);
  } finally {
    fixture.cleanup();
  }
});
