import type { Logger } from "pino";
import type { CommandRegistry } from "../commands/registry.js";

export interface Notifier {
  send(chatId: number, text: string): Promise<void>;
}

export interface Channel extends Notifier {
  readonly name: string;
  start(registry: CommandRegistry, logger: Logger): Promise<void>;
  stop?(): Promise<void>;
}
