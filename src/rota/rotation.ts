import type { PositionUpdate } from "../types.js";

export type Positioned = {
  queueId: number;
  position: number;
};

const maxPosition = (entries: readonly Positioned[]) =>
  entries.reduce<number | null>(
    (max, entry) => (max === null || entry.position > max ? entry.position : max),
    null
  );

export const nextTailPosition = (entries: readonly Positioned[]) => {
  const max = maxPosition(entries);
  return max === null ? 0 : max + 1;
};

/**
 * Moves one entry to the end of the queue. Entries behind it shift forward by
 * one, the moved entry takes the old maximum position.
 *
 * Returns `null` when the entry is not in the queue and an empty plan when it
 * already sits at the back.
 */
export const planMoveToBack = (
  entries: readonly Positioned[],
  queueId: number
): PositionUpdate[] | null => {
  const target = entries.find((entry) => entry.queueId === queueId);
  if (!target) {
    return null;
  }
  const max = maxPosition(entries);
  if (max === null || target.position === max) {
    return [];
  }

  const updates: PositionUpdate[] = entries
    .filter((entry) => entry.queueId !== queueId && entry.position > target.position)
    .sort((a, b) => a.position - b.position)
    .map((entry) => ({ queueId: entry.queueId, position: entry.position - 1 }));
  updates.push({ queueId, position: max });
  return updates;
};

/** Positions to rewrite after `queueId` is deleted, closing the gap it leaves. */
export const planRemoval = (
  entries: readonly Positioned[],
  queueId: number
): PositionUpdate[] | null => {
  const target = entries.find((entry) => entry.queueId === queueId);
  if (!target) {
    return null;
  }
  return entries
    .filter((entry) => entry.queueId !== queueId && entry.position > target.position)
    .sort((a, b) => a.position - b.position)
    .map((entry) => ({ queueId: entry.queueId, position: entry.position - 1 }));
};
