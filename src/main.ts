#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { logger } from "./config/logger.js";

const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  process.exitCode = 1;
};

// The process state is undefined after an uncaught exception, so exit.
const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error("Command failed", { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  });
