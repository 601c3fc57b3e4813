#!/usr/bin/env node

import dotenv from "dotenv";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { createProgram } from "./program.js";

dotenv.config();

try {
  await createProgram().parseAsync(process.argv);
} catch (error) {
  logger.error({ error: errorMessage(error) }, "command failed");
  process.stderr.write(`Error: ${errorMessage(error)}\n`);
  process.exitCode = 1;
}
