import { domainError, ok } from "../../../../utils/result";
import type { CommandHandler } from "../context";

const DEFAULT_SIDES = 100;

export const roll: CommandHandler = async (context, _senderId, args) => {
  const digits = /[0-9]+/.exec(args);
  const sides = digits ? Number(digits[0]) : DEFAULT_SIDES;
  if (sides < 2) {
    return domainError("A die needs at least 2 sides.");
  }
  if (!Number.isSafeInteger(sides)) {
    return domainError("That die is too big to roll.");
  }
  const value = 1 + Math.floor(context.random() * sides);
  return ok({ body: `You rolled ${Math.min(value, sides)} (1-${sides}).` });
};
