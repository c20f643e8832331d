import { Bot, type CommandContext, type Context } from "grammy";
import type { Logger } from "pino";
import type { Config } from "../config/schema.js";
import { splitArgs, type CommandInvocation, type CommandRegistry } from "../commands/registry.js";
import type { Actor } from "../types.js";
import type { Channel } from "./base.js";

const toActor = (from: NonNullable<Context["from"]>): Actor => ({
  userId: from.id,
  username: from.username ?? null,
  displayName: from.first_name || null
});

export class TelegramChannel implements Channel {
  readonly name = "telegram";
  private bot: Bot;
  private logger: Logger | null = null;
  private polling: Promise<void> | null = null;

  constructor(private config: Pick<Config, "telegram">) {
    const token = config.telegram.token;
    if (!token) {
      throw new Error("TELEGRAM_BOT_TOKEN is required to start the Telegram channel.");
    }
    this.bot = new Bot(token);
  }

  async send(chatId: number, text: string) {
    await this.bot.api.sendMessage(chatId, text);
  }

  async start(registry: CommandRegistry, logger: Logger) {
    this.logger = logger;
    if (this.polling) {
      return;
    }

    for (const command of registry.list()) {
      this.bot.command(command.name, async (ctx) => {
        const invocation = this.toInvocation(ctx);
        if (!invocation) {
          return;
        }
        await registry.execute(command.name, splitArgs(ctx.match), invocation);
      });
    }

    this.bot.catch((err) => {
      logger.error(
        {
          updateId: err.ctx.update.update_id,
          error: err.error instanceof Error ? err.error.message : String(err.error)
        },
        "telegram handler failed"
      );
    });

    try {
      await this.bot.api.setMyCommands(
        registry.list().map((command) => ({
          command: command.name,
          description: command.description
        }))
      );
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        "failed to publish bot commands"
      );
    }

    this.polling = this.bot
      .start({
        drop_pending_updates: this.config.telegram.dropPendingUpdates,
        onStart: (info) => logger.info({ username: info.username }, "telegram long polling started")
      })
      .catch((error: unknown) => {
        logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          "telegram polling stopped with error"
        );
      });
  }

  async stop() {
    if (!this.polling) {
      return;
    }
    await this.bot.stop();
    await this.polling;
    this.polling = null;
    this.logger?.info("telegram channel stopped");
  }

  private toInvocation(ctx: CommandContext<Context>): CommandInvocation | null {
    const from = ctx.from;
    const chat = ctx.chat;
    if (!from || from.is_bot) {
      return null;
    }
    return {
      actor: toActor(from),
      chat: { id: chat.id, type: chat.type },
      reply: async (text) => {
        await ctx.reply(text);
      },
      isGroupAdmin: async () => {
        if (chat.type !== "group" && chat.type !== "supergroup") {
          return false;
        }
        const member = await ctx.getChatMember(from.id);
        return member.status === "creator" || member.status === "administrator";
      }
    };
  }
}
