#!/usr/bin/env node
import { createStderrLogger, describeError } from "../logger.js";
import { runDumpCommand } from "./dump-command.js";
import { runProgram } from "./program.js";

const logger = createStderrLogger();

await runProgram(process.argv, async (taskArgs) => {
  try {
    await runDumpCommand({
      taskArgs,
      sink: process.stdout,
      logger,
    });
  } catch (error) {
    logger.error(describeError(error));
    process.exitCode = 1;
  }
});
