import { z } from "zod";
import { entryHandle, normalizeUsername } from "../../rota/identity.js";
import { defineCommand, type Command } from "../registry.js";

const usernameArg = (usage: string) =>
  z
    .array(z.string())
    .min(1, usage)
    .transform((args) => normalizeUsername(args[0] ?? ""))
    .pipe(z.string().min(1, usage));

const ADDUSER_USAGE = "Usage: /adduser @username\nExample: /adduser @john";
const REMOVEUSER_USAGE = "Usage: /removeuser @username\nExample: /removeuser @john";
const INITQUEUE_USAGE =
  "Usage: /initqueue @user1 @user2 @user3\n" +
  "Example: /initqueue @alice @bob @charlie\n\n" +
  "This will replace the entire queue with the provided users.";

export const adminCommands = (): Command[] => [
  defineCommand({
    name: "setgroup",
    description: "Set this group as the reminder target",
    adminOnly: true,
    schema: z.array(z.string()),
    async run(_args, ctx) {
      if (ctx.chat.type !== "group" && ctx.chat.type !== "supergroup") {
        await ctx.reply("This command can only be used in a group chat.");
        return;
      }
      await ctx.service.setGroupTarget(ctx.chat.id);
      await ctx.reply(`Group chat set! Reminders will be sent to this group.\nGroup ID: ${ctx.chat.id}`);
    }
  }),
  defineCommand({
    name: "adduser",
    description: "Add user to queue by username",
    adminOnly: true,
    failureText: "Error adding user",
    schema: usernameArg(ADDUSER_USAGE),
    async run(username, ctx) {
      const outcome = await ctx.service.addMember(username);
      await ctx.reply(
        outcome.status === "added"
          ? `Added @${outcome.username} to the queue at position ${outcome.position}!`
          : `@${outcome.username} is already in the queue.`
      );
    }
  }),
  defineCommand({
    name: "removeuser",
    description: "Remove user from queue",
    adminOnly: true,
    schema: usernameArg(REMOVEUSER_USAGE),
    async run(username, ctx) {
      const outcome = await ctx.service.removeMember(username);
      await ctx.reply(
        outcome.status === "removed"
          ? `Removed @${username} from the queue.`
          : `@${username} not found in the queue.`
      );
    }
  }),
  defineCommand({
    name: "initqueue",
    description: "Initialize queue with users",
    adminOnly: true,
    schema: z.array(z.string()).min(1, INITQUEUE_USAGE),
    async run(usernames, ctx) {
      ctx.logger.info({ count: usernames.length }, "initqueue received usernames");
      const added = await ctx.service.initQueue(usernames);
      if (added.length === 0) {
        await ctx.reply("No users were added to the queue.");
        return;
      }
      await ctx.reply(
        `Queue initialized with ${added.length} users:\n` +
          added.map((name, index) => `${index + 1}. @${name}`).join("\n")
      );
    }
  }),
  defineCommand({
    name: "clearqueue",
    description: "Clear the entire queue",
    adminOnly: true,
    schema: z.array(z.string()),
    async run(_args, ctx) {
      await ctx.service.clearQueue();
      await ctx.reply("Queue cleared successfully.");
    }
  }),
  defineCommand({
    name: "noreview",
    description: "Skip this week's reminder (queue stays the same)",
    adminOnly: true,
    schema: z.array(z.string()),
    async run(_args, ctx) {
      const outcome = await ctx.service.skipWeek(ctx.actor.userId);
      if (outcome.status === "empty") {
        await ctx.reply("The queue is empty. Nothing to skip.");
        return;
      }
      const name = entryHandle(outcome.entry);
      if (outcome.cancelledReminder) {
        await ctx.reply(
          `✓ Cancelled active reminder for @${name}.\n` +
            "✓ Set skip flag to prevent next scheduled reminder.\n\n" +
            "This week's review has been skipped. Queue order remains unchanged."
        );
        return;
      }
      await ctx.reply(
        `✓ Set skip flag to prevent next scheduled reminder for @${name}.\n\n` +
          "This week's review will be skipped. Queue order remains unchanged."
      );
    }
  })
];
