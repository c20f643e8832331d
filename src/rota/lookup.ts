import type { ReminderLookupKey } from "../types.js";

export type ReminderLookup =
  | { by: "queueId"; queueId: number }
  | { by: "userId"; userId: number }
  | { by: "username"; username: string };

/**
 * Picks the single criterion used to find an active reminder. The first
 * usable key wins: queue id, then a non-zero user id, then username. Later
 * keys are never consulted once an earlier one is present, so a placeholder
 * user id of 0 can never match some other unresolved entry's reminder.
 */
export const selectReminderLookup = (key: ReminderLookupKey): ReminderLookup | null => {
  if (key.queueId !== undefined && key.queueId !== null) {
    return { by: "queueId", queueId: key.queueId };
  }
  if (key.userId !== undefined && key.userId !== null && key.userId !== 0) {
    return { by: "userId", userId: key.userId };
  }
  if (key.username) {
    return { by: "username", username: key.username };
  }
  return null;
};
