import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import type { Channel, Notifier } from "./channels/base.js";
import { TelegramChannel } from "./channels/telegram.js";
import { builtinCommands } from "./commands/builtins/index.js";
import { CommandRegistry } from "./commands/registry.js";
import { loadConfig } from "./config/load.js";
import type { Config } from "./config/schema.js";
import { createLogger } from "./observability/logger.js";
import { RotaService } from "./rota/service.js";
import { CronTriggerClock, type TriggerClock } from "./scheduler/clock.js";
import { RotaScheduler } from "./scheduler/scheduler.js";
import { SqliteStorage } from "./storage/sqlite.js";

const ensureDir = (dir: string) => {
  fs.mkdirSync(dir, { recursive: true });
};

export type CreateRotaAppOptions = {
  config?: Config;
  logger?: Logger;
  clock?: TriggerClock;
  /** Replaces the Telegram channel; nothing polls for commands when set. */
  notifier?: Notifier;
};

export class RotaApp {
  private started = false;

  constructor(
    readonly config: Config,
    readonly logger: Logger,
    readonly storage: SqliteStorage,
    readonly service: RotaService,
    readonly scheduler: RotaScheduler,
    readonly registry: CommandRegistry,
    private clock: TriggerClock,
    private channel: Channel | null
  ) {}

  isRunning() {
    return this.started;
  }

  async start() {
    if (this.started) {
      return;
    }
    this.scheduler.start();
    if (this.channel) {
      await this.channel.start(this.registry, this.logger);
    }
    this.started = true;
    this.logger.info(
      {
        reminder: this.scheduler.describe("reminder"),
        autopop: this.scheduler.describe("autopop"),
        timezone: this.config.timezone
      },
      "review rota started"
    );
  }

  async stop() {
    if (!this.started) {
      return;
    }
    this.scheduler.stop();
    this.clock.stop();
    if (this.channel?.stop) {
      await this.channel.stop();
    }
    this.storage.close();
    this.started = false;
    this.logger.info("review rota stopped");
  }
}

export const createRotaApp = async (options: CreateRotaAppOptions = {}): Promise<RotaApp> => {
  const config = options.config ?? loadConfig();
  ensureDir(config.dataDir);
  ensureDir(path.dirname(config.sqlitePath));

  const logger = options.logger ?? createLogger(config);
  let channel: TelegramChannel | null = null;
  let notifier: Notifier;
  if (options.notifier) {
    notifier = options.notifier;
  } else {
    channel = new TelegramChannel(config);
    notifier = channel;
  }
  const storage = new SqliteStorage(config);
  const { schemaVersion, legacyReminder } = storage.init();
  logger.info({ sqlitePath: config.sqlitePath, schemaVersion }, "storage ready");
  if (legacyReminder.status === "adopted") {
    logger.info(legacyReminder, "legacy active reminder bound to front entry");
  } else if (legacyReminder.status === "discarded") {
    logger.warn(legacyReminder, "legacy active reminder dropped; front entry already has one");
  }

  const service = new RotaService(storage, notifier, logger, { taskName: config.taskName });
  const clock = options.clock ?? new CronTriggerClock(config.timezone, logger);
  const scheduler = new RotaScheduler(storage, service, clock, logger, config);

  const registry = new CommandRegistry({ service, scheduler, config, logger });
  for (const command of builtinCommands()) {
    registry.register(command);
  }

  return new RotaApp(config, logger, storage, service, scheduler, registry, clock, channel);
};
