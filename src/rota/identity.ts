import type { QueueEntry, QueueIdentity } from "../types.js";

export const UNRESOLVED_USER_ID = 0;

export const normalizeUsername = (value: string) => value.trim().replace(/^@+/, "");

/** Maps the persisted `(user_id, username)` pair onto the identity union. */
export const identityFromRow = (userId: number, username: string | null): QueueIdentity => {
  if (userId === UNRESOLVED_USER_ID && username) {
    return { kind: "unresolved", username };
  }
  return { kind: "resolved", userId, username };
};

export const identityUserId = (identity: QueueIdentity) =>
  identity.kind === "resolved" ? identity.userId : UNRESOLVED_USER_ID;

export const identityUsername = (identity: QueueIdentity) => identity.username;

export const entryLabel = (entry: QueueEntry) =>
  entry.displayName || identityUsername(entry.identity) || `User ${identityUserId(entry.identity)}`;

export const entryHandle = (entry: QueueEntry) =>
  identityUsername(entry.identity) || entry.displayName || `User ${identityUserId(entry.identity)}`;

export const entryMention = (entry: QueueEntry) => {
  const username = identityUsername(entry.identity);
  return username ? `@${username}` : `User ${identityUserId(entry.identity)}`;
};
