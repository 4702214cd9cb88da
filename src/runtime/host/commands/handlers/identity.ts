import { domainError, ok, type Result } from "../../../../utils/result";
import type { CommandContext, CommandHandler } from "../context";
import { mention } from "../format";

export function unknownIdentityMessage(userId: string): string {
  return `I don't know what name ${mention(userId)} goes by in the game list spreadsheet.`;
}

export async function resolveName(context: CommandContext, userId: string): Promise<Result<string>> {
  const name = await context.identities.get(userId);
  if (name === null) {
    return domainError(unknownIdentityMessage(userId));
  }
  return ok(name);
}

export const iam: CommandHandler = async (context, senderId, args) => {
  const name = args.trim();
  if (!name) {
    return domainError("Tell me your name as it appears in the spreadsheet, e.g. !iam Alice.");
  }
  const outcome = await context.identities.set(senderId, name);
  if (outcome.status === "taken") {
    return domainError(
      outcome.holderId === null
        ? "Someone else has taken that name already."
        : `That name is already taken by ${mention(outcome.holderId)}.`,
    );
  }
  return ok({ body: `Got it, you're ${name}.` });
};

export const whoami: CommandHandler = async (context, senderId) => {
  const name = await resolveName(context, senderId);
  if (!name.ok) {
    return name;
  }
  return ok({ body: `You're ${name.value}.` });
};

export const forgetme: CommandHandler = async (context, senderId) => {
  await context.identities.delete(senderId);
  return ok({ body: "Okay, I've forgotten who you are." });
};
