import test from "node:test";
import assert from "node:assert/strict";
import { isAdminIdentity } from "../src/channels/allowlist.js";
import { actor } from "./test-utils.js";

test("an empty admin list admits nobody", () => {
  assert.equal(isAdminIdentity([], actor(1, "alice")), false);
  assert.equal(isAdminIdentity(["", "  "], actor(1, "alice")), false);
});

test("numeric entries match user ids only", () => {
  assert.equal(isAdminIdentity(["900"], actor(900, "boss")), true);
  assert.equal(isAdminIdentity(["900"], actor(901, "900")), false);
});

test("unresolved actors never match by id", () => {
  assert.equal(isAdminIdentity(["0"], actor(0, "ghost")), false);
});

test("@ entries match usernames case-insensitively", () => {
  assert.equal(isAdminIdentity(["@Alice"], actor(5, "alice")), true);
  assert.equal(isAdminIdentity(["@alice"], actor(5, "@ALICE")), true);
  assert.equal(isAdminIdentity(["@alice"], actor(5, null)), false);
});

test("id|name entries match either half", () => {
  const entries = ["123|carol"];
  assert.equal(isAdminIdentity(entries, actor(123, null)), true);
  assert.equal(isAdminIdentity(entries, actor(77, "Carol")), true);
  assert.equal(isAdminIdentity(entries, actor(77, "dave")), false);
});
