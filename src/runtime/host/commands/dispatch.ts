import { logger } from "../../../logger";
import { domainError, unexpectedError, type Failure, type Result } from "../../../utils/result";
import type { CommandContext, CommandReply } from "./context";
import { renderReply } from "./format";
import { parseCommand } from "./parser";
import type { CommandRegistry } from "./registry";

export const HELP_NUDGE = "Say !help to see what I can do.";
const UNEXPECTED_PREFIX = "Sorry, something went wrong on my end (not your fault):";

export type IncomingText = {
  text: string;
  senderId: string;
  /** Whether the message pinged the bot. */
  mentionsSelf: boolean;
};

/**
 * Runs the command in `message`, if there is one, and returns the rendered reply.
 * Returns null when the message needs no answer. Never throws for handler failures.
 */
export async function dispatchMessage(params: {
  message: IncomingText;
  registry: CommandRegistry;
  context: CommandContext;
}): Promise<string | null> {
  const { message, registry, context } = params;
  const { senderId } = message;

  const parsed = parseCommand(message.text);
  if (!parsed) {
    return message.mentionsSelf ? renderReply(senderId, [], HELP_NUDGE) : null;
  }

  const entry = registry.lookup(parsed.name);
  let result: Result<CommandReply>;
  if (!entry) {
    result = domainError(`I don't know the command !${parsed.name}. ${HELP_NUDGE}`);
  } else {
    logger.debug({ command: parsed.name, senderId }, "Dispatching command");
    try {
      result = await entry.handler(context, senderId, parsed.args);
    } catch (error) {
      result = unexpectedError(error);
    }
  }

  if (result.ok) {
    return renderReply(senderId, result.value.mentionIds ?? [], result.value.body);
  }
  return renderReply(senderId, [], describeFailure(result.failure, parsed.name, senderId));
}

function describeFailure(failure: Failure, command: string, senderId: string): string {
  if (failure.kind === "domain") {
    return failure.message;
  }
  logger.error({ err: failure.error, command, senderId }, "Command failed");
  return `${UNEXPECTED_PREFIX} ${failure.message}`;
}
