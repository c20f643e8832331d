#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { main } from "./main.js";
import { runPreflightChecks, type PreflightReport } from "./preflight.js";

const HELP_TEXT = `review-rota - weekly turn-taking reminders for a Telegram group

Usage:
  review-rota [options]
  review-rota preflight

Options:
  -h, --help      Show help
  -v, --version   Show version
`;

const isDirectExecution = () => {
  if (!process.argv[1]) {
    return false;
  }
  try {
    return path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

const readVersion = () => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // Sources sit one level below the package root; the build output two.
  for (const candidate of [path.resolve(here, "..", "package.json"), path.resolve(here, "..", "..", "package.json")]) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
      if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
        return parsed.version;
      }
    } catch {
      continue;
    }
  }
  return "0.0.0";
};

export const formatPreflightReport = (report: PreflightReport) =>
  [
    "preflight: ok",
    `sqlite.path: ${report.sqlitePath}`,
    `sqlite.schema_version: ${report.schemaVersion}`,
    `timezone: ${report.timezone}`,
    `schedule.reminder: ${report.schedules.reminder.description} (${report.schedules.reminder.source})`,
    `schedule.autopop: ${report.schedules.autopop.description} (${report.schedules.autopop.source})`,
    `telegram.token: ${report.telegramTokenPresent ? "present" : "missing"}`,
    `admins: ${report.adminCount}`
  ].join("\n");

export const runCli = async (args: string[] = process.argv.slice(2)) => {
  if (args[0] === "preflight") {
    if (args.length > 1) {
      throw new Error(`Unknown preflight option: ${args[1]}`);
    }
    process.stdout.write(`${formatPreflightReport(runPreflightChecks())}\n`);
    return;
  }
  if (args.includes("--help") || args.includes("-h")) {
    process.stdout.write(`${HELP_TEXT}\n`);
    return;
  }
  if (args.includes("--version") || args.includes("-v")) {
    process.stdout.write(`${readVersion()}\n`);
    return;
  }
  await main();
};

if (isDirectExecution()) {
  void runCli().catch((error) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`review-rota command failed: ${message}\n`);
    process.exit(1);
  });
}
