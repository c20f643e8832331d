import type { Logger } from "pino";
import type { Notifier } from "../channels/base.js";
import type { SqliteStorage } from "../storage/sqlite.js";
import type { Actor, ActiveReminder, QueueEntry } from "../types.js";
import {
  entryLabel,
  entryMention,
  identityUserId,
  identityUsername,
  UNRESOLVED_USER_ID
} from "./identity.js";
import { directReminderText, groupReminderText, weekSkippedText } from "./messages.js";

export type RotaStore = Pick<
  SqliteStorage,
  | "atomically"
  | "frontEntry"
  | "findEntry"
  | "findEntryByUserId"
  | "findEntryByUsername"
  | "findQueueId"
  | "moveToBack"
  | "createReminder"
  | "getActiveReminder"
  | "updateReminder"
  | "deleteReminder"
  | "listActiveReminders"
  | "addHistory"
  | "isWeekSkipped"
  | "setSkipWeek"
  | "clearSkipWeek"
  | "getGroupChatId"
>;

export type ReminderState = "IDLE" | "ACTIVE";

export type DispatchOutcome =
  | { status: "week_skipped" }
  | { status: "empty" }
  | {
      status: "reminded";
      entry: QueueEntry;
      reminderId: number;
      reminderCount: number;
      transition: "IDLE->ACTIVE" | "ACTIVE->ACTIVE";
      target: "group" | "direct";
      delivered: boolean;
    };

export type SelfSkipOutcome =
  | { status: "not_in_queue" }
  | { status: "no_active_reminder"; entry: QueueEntry }
  | { status: "skipped"; entry: QueueEntry; next: DispatchOutcome };

export type SkipWeekOutcome =
  | { status: "empty" }
  | { status: "flagged"; entry: QueueEntry; cancelledReminder: boolean };

export type AutoPopOutcome = {
  popped: number[];
  orphaned: number[];
  failed: number[];
};

export type LifecycleOptions = {
  taskName: string;
  now?: () => Date;
};

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Drives the per-entry reminder state machine. Every method assumes the
 * caller holds the service's serial section; none of them lock on their own.
 */
export class ReminderLifecycle {
  private readonly now: () => Date;

  constructor(
    private store: RotaStore,
    private notifier: Notifier,
    private logger: Pick<Logger, "info" | "warn" | "error" | "debug">,
    private options: LifecycleOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  stateOf(entry: QueueEntry): ReminderState {
    return this.activeReminderFor(entry) ? "ACTIVE" : "IDLE";
  }

  activeReminderFor(entry: QueueEntry): ActiveReminder | null {
    return this.store.getActiveReminder({
      queueId: entry.queueId,
      userId: identityUserId(entry.identity),
      username: identityUsername(entry.identity)
    });
  }

  async dispatch(): Promise<DispatchOutcome> {
    if (this.store.isWeekSkipped()) {
      this.store.clearSkipWeek();
      this.logger.info("week skipped by /noreview flag; flag cleared");
      const groupChatId = this.store.getGroupChatId();
      if (groupChatId !== null) {
        await this.deliver(groupChatId, weekSkippedText(this.options.taskName), {
          kind: "skip-notice"
        });
      }
      return { status: "week_skipped" };
    }

    const entry = this.store.frontEntry();
    if (!entry) {
      this.logger.info("no users in queue to remind");
      return { status: "empty" };
    }

    const userId = identityUserId(entry.identity);
    const groupChatId = this.store.getGroupChatId();
    const target = groupChatId !== null ? "group" : "direct";
    const at = this.now().toISOString();

    const transition = this.store.atomically(() => {
      const existing = this.activeReminderFor(entry);
      if (existing) {
        const reminderCount = existing.reminderCount + 1;
        this.store.updateReminder(existing.id, {
          reminderCount,
          lastRemindedAt: at,
          nextReminderAt: existing.nextReminderAt
        });
        this.store.addHistory(userId, "reminded", `Scheduled reminder re-sent (${target})`);
        return {
          reminderId: existing.id,
          reminderCount,
          transition: "ACTIVE->ACTIVE" as const
        };
      }
      const reminderId = this.store.createReminder({
        queueId: entry.queueId,
        userId,
        username: identityUsername(entry.identity),
        at
      });
      this.store.addHistory(userId, "reminded", `Initial reminder sent (${target})`);
      return { reminderId, reminderCount: 0, transition: "IDLE->ACTIVE" as const };
    });

    const meta = { kind: "reminder" as const, queueId: entry.queueId };
    const delivered =
      groupChatId !== null
        ? await this.deliver(
            groupChatId,
            groupReminderText(entryMention(entry), this.options.taskName),
            meta
          )
        : await this.deliver(
            userId === UNRESOLVED_USER_ID ? null : userId,
            directReminderText(entryLabel(entry), this.options.taskName),
            meta
          );

    this.logger.info(
      {
        queueId: entry.queueId,
        reminderId: transition.reminderId,
        transition: transition.transition,
        target,
        delivered
      },
      "reminder dispatched"
    );

    return { status: "reminded", entry, target, delivered, ...transition };
  }

  async selfSkip(actor: Actor, onSkipped?: () => Promise<void>): Promise<SelfSkipOutcome> {
    const entry = this.locate(actor);
    if (!entry) {
      return { status: "not_in_queue" };
    }
    const active = this.activeReminderFor(entry);
    if (!active) {
      return { status: "no_active_reminder", entry };
    }

    this.store.atomically(() => {
      this.store.deleteReminder(active.id);
      this.store.moveToBack(entry.queueId);
      this.store.addHistory(
        identityUserId(entry.identity),
        "skipped",
        `User skipped their turn (@${actor.username ?? actor.userId})`
      );
    });
    this.logger.info({ queueId: entry.queueId, userId: actor.userId }, "user skipped their turn");

    if (onSkipped) {
      try {
        await onSkipped();
      } catch (error) {
        this.logger.warn({ error: errorMessage(error) }, "skip acknowledgement failed");
      }
    }

    const next = await this.dispatch();
    return { status: "skipped", entry, next };
  }

  skipWeek(adminId: number): SkipWeekOutcome {
    const entry = this.store.frontEntry();
    if (!entry) {
      return { status: "empty" };
    }

    const cancelledReminder = this.store.atomically(() => {
      const active = this.activeReminderFor(entry);
      if (active) {
        this.store.deleteReminder(active.id);
        this.store.addHistory(
          identityUserId(entry.identity),
          "review_skipped",
          "Admin cancelled active reminder via /noreview"
        );
      }
      this.store.setSkipWeek(`Admin ${adminId} used /noreview`);
      this.store.addHistory(0, "week_skipped", `Admin ${adminId} skipped week via /noreview`);
      return active !== null;
    });

    this.logger.info({ adminId, queueId: entry.queueId, cancelledReminder }, "week skip flag set");
    return { status: "flagged", entry, cancelledReminder };
  }

  autoPop(): AutoPopOutcome {
    const outcome: AutoPopOutcome = { popped: [], orphaned: [], failed: [] };
    for (const reminder of this.store.listActiveReminders()) {
      try {
        const queueId = this.resolveQueueId(reminder);
        if (queueId === null) {
          this.store.atomically(() => {
            this.store.deleteReminder(reminder.id);
            this.store.addHistory(
              reminder.userId,
              "auto_pop_orphaned",
              `Reminder ${reminder.id} had no queue entry`
            );
          });
          this.logger.warn(
            { reminderId: reminder.id, queueId: reminder.queueId },
            "auto-pop could not resolve queue entry; reminder deleted"
          );
          outcome.orphaned.push(reminder.id);
          continue;
        }

        this.store.atomically(() => {
          this.store.moveToBack(queueId);
          this.store.deleteReminder(reminder.id);
          this.store.addHistory(
            reminder.userId,
            "auto_popped",
            "Moved to back after auto-pop schedule"
          );
        });
        this.logger.info({ queueId, reminderId: reminder.id }, "auto-popped queue entry");
        outcome.popped.push(queueId);
      } catch (error) {
        this.logger.error(
          { reminderId: reminder.id, error: errorMessage(error) },
          "auto-pop failed for reminder"
        );
        outcome.failed.push(reminder.id);
      }
    }
    return outcome;
  }

  /** Queue entry for the caller: non-zero user id first, then username. */
  locate(actor: Actor): QueueEntry | null {
    const byUser = this.store.findEntryByUserId(actor.userId);
    if (byUser) {
      return byUser;
    }
    return actor.username ? this.store.findEntryByUsername(actor.username) : null;
  }

  private resolveQueueId(reminder: ActiveReminder): number | null {
    if (reminder.queueId !== null) {
      return this.store.findEntry(reminder.queueId)?.queueId ?? null;
    }
    return this.store.findQueueId(reminder.userId, reminder.username);
  }

  private async deliver(
    chatId: number | null,
    text: string,
    meta: { kind: "reminder" | "skip-notice"; queueId?: number }
  ): Promise<boolean> {
    if (chatId === null) {
      this.logger.error(meta, "no chat to deliver to; user id is unresolved and no group is set");
      return false;
    }
    try {
      await this.notifier.send(chatId, text);
      return true;
    } catch (error) {
      this.logger.error({ ...meta, chatId, error: errorMessage(error) }, "failed to deliver notification");
      return false;
    }
  }
}
