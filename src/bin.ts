#!/usr/bin/env node
import process from "node:process";
import { chalk } from "zx";
import main from "./index.js";

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    const message =
      error instanceof Error ? (error.stack ?? error.message) : String(error);
    console.error(chalk.red(`Fatal error: ${message}`));
    process.exit(1);
  });
