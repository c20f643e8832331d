import type { Logger } from "pino";
import type { Notifier } from "../channels/base.js";
import type { SqliteStorage } from "../storage/sqlite.js";
import type { ActiveReminder, Actor, HistoryRecord, QueueEntry } from "../types.js";
import { identityUserId, normalizeUsername } from "./identity.js";
import {
  ReminderLifecycle,
  type AutoPopOutcome,
  type DispatchOutcome,
  type SelfSkipOutcome,
  type SkipWeekOutcome
} from "./lifecycle.js";
import { SerialQueue } from "./serial.js";

export type AddMemberOutcome =
  | { status: "added"; username: string; position: number }
  | { status: "duplicate"; username: string };

export type RemoveMemberOutcome =
  | { status: "removed"; entry: QueueEntry }
  | { status: "not_found"; username: string };

export type QueueSnapshot = {
  entries: Array<{ entry: QueueEntry; activeReminder: ActiveReminder | null }>;
  weekSkipped: boolean;
  groupChatId: number | null;
};

export type RotaServiceOptions = {
  taskName: string;
  now?: () => Date;
};

/**
 * Owns the queue and reminder state. Every public operation runs inside one
 * serial section, so events from triggers, users and admins never interleave.
 */
export class RotaService {
  private readonly section = new SerialQueue();
  private readonly lifecycle: ReminderLifecycle;

  constructor(
    private store: SqliteStorage,
    notifier: Notifier,
    private logger: Logger,
    options: RotaServiceOptions
  ) {
    this.lifecycle = new ReminderLifecycle(store, notifier, logger, options);
  }

  dispatch(): Promise<DispatchOutcome> {
    return this.section.enqueue(() => this.lifecycle.dispatch());
  }

  selfSkip(actor: Actor, onSkipped?: () => Promise<void>): Promise<SelfSkipOutcome> {
    return this.section.enqueue(() => this.lifecycle.selfSkip(actor, onSkipped));
  }

  skipWeek(adminId: number): Promise<SkipWeekOutcome> {
    return this.section.enqueue(() => this.lifecycle.skipWeek(adminId));
  }

  autoPop(): Promise<AutoPopOutcome> {
    return this.section.enqueue(() => this.lifecycle.autoPop());
  }

  addMember(username: string): Promise<AddMemberOutcome> {
    return this.section.enqueue(() => {
      const name = normalizeUsername(username);
      if (!this.store.insertEntry({ username: name })) {
        this.logger.warn({ username: name }, "username already in queue");
        return { status: "duplicate", username: name };
      }
      const position = this.store.listQueue().length;
      this.store.addHistory(0, "added_by_admin", `Username: @${name}, Position: ${position}`);
      this.logger.info({ username: name, position }, "added user to queue");
      return { status: "added", username: name, position };
    });
  }

  removeMember(username: string): Promise<RemoveMemberOutcome> {
    return this.section.enqueue(() => {
      const name = normalizeUsername(username);
      const entry = this.store.findEntryByUsername(name);
      if (!entry || !this.store.removeEntry(entry.queueId)) {
        return { status: "not_found", username: name };
      }
      this.store.addHistory(identityUserId(entry.identity), "removed_by_admin", `Username: @${name}`);
      this.logger.info({ queueId: entry.queueId, username: name }, "removed user from queue");
      return { status: "removed", entry };
    });
  }

  /** Replaces the whole queue; returns the usernames that were added, in order. */
  initQueue(usernames: string[]): Promise<string[]> {
    return this.section.enqueue(() =>
      this.store.atomically(() => {
        this.store.clearQueue();
        const added: string[] = [];
        for (const raw of usernames) {
          const name = normalizeUsername(raw);
          if (name && this.store.insertEntry({ username: name })) {
            added.push(name);
          } else {
            this.logger.warn({ username: raw }, "failed to add username during queue init");
          }
        }
        if (added.length > 0) {
          this.store.addHistory(
            0,
            "queue_initialized",
            `Users: ${added.map((name) => `@${name}`).join(", ")}`
          );
        }
        this.logger.info({ count: added.length }, "queue initialized");
        return added;
      })
    );
  }

  clearQueue(): Promise<number> {
    return this.section.enqueue(() => {
      const removed = this.store.clearQueue();
      this.store.addHistory(0, "queue_cleared", "All users removed from queue");
      this.logger.info({ removed }, "queue cleared");
      return removed;
    });
  }

  setGroupTarget(chatId: number): Promise<void> {
    return this.section.enqueue(() => {
      this.store.setGroupChatId(chatId);
      this.logger.info({ chatId }, "group chat set");
    });
  }

  /**
   * Completes the second phase of identity binding: an entry queued by
   * username alone takes the platform user id once that user shows up.
   */
  bindIdentity(actor: Actor): Promise<QueueEntry | null> {
    return this.section.enqueue(() => {
      if (!actor.username || actor.userId === 0) {
        return null;
      }
      const entry = this.store.findEntryByUsername(actor.username);
      if (!entry || entry.identity.kind !== "unresolved") {
        return null;
      }
      if (!this.store.bindIdentity(entry.queueId, actor.userId, actor.displayName)) {
        return null;
      }
      this.store.addHistory(actor.userId, "identity_bound", `Username: @${actor.username}`);
      this.logger.info({ queueId: entry.queueId, userId: actor.userId }, "queue identity resolved");
      return this.store.findEntry(entry.queueId);
    });
  }

  locate(actor: Actor): Promise<QueueEntry | null> {
    return this.section.enqueue(() => this.lifecycle.locate(actor));
  }

  snapshot(): Promise<QueueSnapshot> {
    return this.section.enqueue(() => ({
      entries: this.store.listQueue().map((entry) => ({
        entry,
        activeReminder: this.lifecycle.activeReminderFor(entry)
      })),
      weekSkipped: this.store.isWeekSkipped(),
      groupChatId: this.store.getGroupChatId()
    }));
  }

  history(userId: number, limit = 10): Promise<HistoryRecord[]> {
    return this.section.enqueue(() => this.store.listHistory(userId, limit));
  }
}
