import type { Command } from "../registry.js";
import { adminCommands } from "./admin.js";
import { infoCommands } from "./info.js";
import { memberCommands } from "./member.js";
import { scheduleCommands } from "./schedule.js";

export const builtinCommands = (): Command[] => [
  ...infoCommands(),
  ...memberCommands(),
  ...adminCommands(),
  ...scheduleCommands()
];
