import { z } from "zod";
import { defineCommand, type Command } from "../registry.js";

const MEMBER_COMMANDS = [
  "/queue - View the current queue",
  "/skip - Skip your turn and pass to next person",
  "/history - Show your recent reminder history",
  "/help - Show this help message"
];

const welcomeText = (isAdmin: boolean) => {
  const base = ["Welcome to the Reminder Bot!", "", "Available commands:", ...MEMBER_COMMANDS].join(
    "\n"
  );
  if (!isAdmin) {
    return base;
  }
  const admin = [
    "",
    "",
    "Admin commands:",
    "/adduser @username - Add user to queue by username",
    "/removeuser @username - Remove user from queue",
    "/initqueue @user1 @user2 @user3 - Initialize queue with users",
    "/setgroup - Set this group as the reminder target",
    "/setschedule <day> <hour> <minute> - Set reminder schedule",
    "/setautopop <day> <hour> <minute> - Set auto-pop schedule",
    "/clearqueue - Clear the entire queue",
    "/noreview - Skip this week's reminder (queue stays the same)",
    "/nextreminder - Show next reminder time and who is up next"
  ].join("\n");
  return base + admin;
};

const helpText = (isAdmin: boolean, taskName: string) => {
  const base = [
    "Reminder Bot Commands:",
    "",
    ...MEMBER_COMMANDS,
    "",
    "How it works:",
    "1. Admins add users to the queue",
    `2. Every week, the bot reminds the next person in the group about the ${taskName}`,
    "3. Use /skip to pass your turn to the next person",
    "4. After the auto-pop schedule, you'll be moved to the back of the queue"
  ].join("\n");
  if (!isAdmin) {
    return base;
  }
  const admin = [
    "",
    "",
    "Admin Commands:",
    "/adduser @username - Add a user to the queue by their username",
    "/removeuser @username - Remove a user from the queue",
    "/initqueue @user1 @user2 @user3 - Initialize/replace the entire queue",
    "/setgroup - Set this group chat as the reminder target",
    "/setschedule <day> <hour> <minute> - Set reminder schedule (day: 0=Mon, 6=Sun)",
    "/setautopop <day> <hour> <minute> - Set auto-pop schedule (day: 0=Mon, 6=Sun)",
    "/clearqueue - Clear the entire queue",
    "/noreview - Skip this week's reminder (queue order unchanged)",
    "/nextreminder - Show next reminder time and who is up next",
    "",
    "Note: Users must be in the group for the bot to remind them!"
  ].join("\n");
  return base + admin;
};

export const infoCommands = (): Command[] => [
  defineCommand({
    name: "start",
    description: "Show the welcome message",
    schema: z.array(z.string()),
    async run(_args, ctx) {
      await ctx.reply(welcomeText(await ctx.isAdmin()));
    }
  }),
  defineCommand({
    name: "help",
    description: "Show this help message",
    schema: z.array(z.string()),
    async run(_args, ctx) {
      await ctx.reply(helpText(await ctx.isAdmin(), ctx.config.taskName));
    }
  })
];
