import type { CommandHandler } from "./context";

export interface CommandEntry {
  handler: CommandHandler;
  argHint?: string;
  helpText: string;
}

const COMMAND_NAME = /^[a-z]+$/;

/** Commands in the order they were registered, which is also the order `!help` lists them. */
export class CommandRegistry {
  private entries = new Map<string, CommandEntry>();

  register(name: string, entry: CommandEntry): this {
    if (!COMMAND_NAME.test(name)) {
      throw new Error(`Invalid command name: ${name}`);
    }
    if (this.entries.has(name)) {
      throw new Error(`Command ${name} already registered`);
    }
    this.entries.set(name, entry);
    return this;
  }

  lookup(name: string): CommandEntry | undefined {
    return this.entries.get(name);
  }

  listAll(): Array<[string, CommandEntry]> {
    return Array.from(this.entries.entries());
  }
}
