import { z } from "zod";
import { entryLabel, identityUserId } from "../../rota/identity.js";
import { defineCommand, type Command } from "../registry.js";

const HISTORY_LIMIT = 10;

export const memberCommands = (): Command[] => [
  defineCommand({
    name: "queue",
    description: "View the current queue",
    schema: z.array(z.string()),
    async run(_args, ctx) {
      const { entries } = await ctx.service.snapshot();
      if (entries.length === 0) {
        await ctx.reply("The queue is empty.");
        return;
      }
      let message = "Current Queue:\n\n";
      entries.forEach(({ entry, activeReminder }, index) => {
        let marker = identityUserId(entry.identity) === ctx.actor.userId ? " 👈 (you)" : "";
        if (activeReminder) {
          marker += " 🔔";
        }
        message += `${index + 1}. ${entryLabel(entry)}${marker}\n`;
      });
      await ctx.reply(message);
    }
  }),
  defineCommand({
    name: "skip",
    description: "Skip your turn and pass to next person",
    schema: z.array(z.string()),
    async run(_args, ctx) {
      const outcome = await ctx.service.selfSkip(ctx.actor, () =>
        ctx.reply("You've skipped your turn. Moving to the next person in queue.")
      );
      if (outcome.status !== "skipped") {
        await ctx.reply("You don't have an active reminder to skip.");
      }
    }
  }),
  defineCommand({
    name: "history",
    description: "Show your recent reminder history",
    schema: z.array(z.string()),
    async run(_args, ctx) {
      const records = await ctx.service.history(ctx.actor.userId, HISTORY_LIMIT);
      if (records.length === 0) {
        await ctx.reply("No history yet.");
        return;
      }
      const lines = records.map(
        (record) => `${record.timestamp} ${record.action}${record.notes ? ` - ${record.notes}` : ""}`
      );
      await ctx.reply(`Your recent history:\n\n${lines.join("\n")}`);
    }
  })
];
