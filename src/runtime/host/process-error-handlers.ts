import { logger } from "../../logger";
import { toError } from "../../utils/result";

let registered = false;

/** Logs stray rejections and exceptions instead of letting Node print and exit silently. */
export function registerProcessErrorHandlers(): void {
  if (registered) {
    return;
  }
  registered = true;

  process.on("unhandledRejection", (reason) => {
    logger.error({ err: toError(reason) }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ err: error }, "Uncaught exception");
    process.exitCode = 1;
  });
}
