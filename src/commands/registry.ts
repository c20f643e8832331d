import type { Logger } from "pino";
import type { z } from "zod";
import { isAdminIdentity } from "../channels/allowlist.js";
import type { Config } from "../config/schema.js";
import type { RotaService } from "../rota/service.js";
import type { RotaScheduler } from "../scheduler/scheduler.js";
import type { Actor, ChatType } from "../types.js";

/** What a transport knows about one incoming command. */
export type CommandInvocation = {
  actor: Actor;
  chat: { id: number; type: ChatType };
  reply: (text: string) => Promise<void>;
  /** Whether the transport reports the actor as creator or administrator of this chat. */
  isGroupAdmin: () => Promise<boolean>;
};

export type CommandServices = {
  service: RotaService;
  scheduler: RotaScheduler;
  config: Pick<Config, "adminIds" | "timezone" | "taskName">;
  logger: Logger;
};

export type CommandContext = CommandInvocation &
  CommandServices & {
    isAdmin: () => Promise<boolean>;
  };

export interface CommandSpec<TArgs extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  adminOnly?: boolean;
  /** Prefix of the reply sent when `run` throws. */
  failureText?: string;
  /** Parses the whitespace-split argument list; the first issue message becomes the reply. */
  schema: TArgs;
  run: (args: z.output<TArgs>, ctx: CommandContext) => Promise<void>;
}

export type Command = {
  name: string;
  description: string;
  adminOnly: boolean;
  failureText: string;
  invoke: (rawArgs: string[], ctx: CommandContext) => Promise<void>;
};

export const defineCommand = <TArgs extends z.ZodType>(spec: CommandSpec<TArgs>): Command => ({
  name: spec.name,
  description: spec.description,
  adminOnly: spec.adminOnly ?? false,
  failureText: spec.failureText ?? "Error",
  async invoke(rawArgs, ctx) {
    const parsed = spec.schema.safeParse(rawArgs);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      await ctx.reply(issue?.message ?? `Invalid arguments for /${spec.name}`);
      return;
    }
    await spec.run(parsed.data, ctx);
  }
});

export const splitArgs = (text: string) => text.split(/\s+/).filter((part) => part.length > 0);

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class CommandRegistry {
  private commands = new Map<string, Command>();

  constructor(private services: CommandServices) {}

  register(command: Command) {
    this.commands.set(command.name, command);
  }

  list(): Command[] {
    return [...this.commands.values()];
  }

  has(name: string) {
    return this.commands.has(name);
  }

  async execute(name: string, rawArgs: string[], invocation: CommandInvocation): Promise<boolean> {
    const command = this.commands.get(name);
    if (!command) {
      return false;
    }

    const { logger } = this.services;
    let adminDecision: Promise<boolean> | null = null;
    const ctx: CommandContext = {
      ...this.services,
      ...invocation,
      isAdmin: () => {
        adminDecision ??= this.resolveAdmin(invocation);
        return adminDecision;
      }
    };

    try {
      await this.services.service.bindIdentity(invocation.actor);
      if (command.adminOnly && !(await ctx.isAdmin())) {
        await invocation.reply("Only admins can use this command.");
        return true;
      }
      logger.debug({ command: name, userId: invocation.actor.userId }, "command received");
      await command.invoke(rawArgs, ctx);
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ command: name, userId: invocation.actor.userId, error: message }, "command failed");
      try {
        await invocation.reply(`${command.failureText}: ${message}`);
      } catch (replyError) {
        logger.error({ command: name, error: errorMessage(replyError) }, "failed to report command error");
      }
    }
    return true;
  }

  private async resolveAdmin(invocation: CommandInvocation) {
    if (isAdminIdentity(this.services.config.adminIds, invocation.actor)) {
      return true;
    }
    try {
      return await invocation.isGroupAdmin();
    } catch (error) {
      this.services.logger.error({ error: errorMessage(error) }, "error checking admin status");
      return false;
    }
  }
}
