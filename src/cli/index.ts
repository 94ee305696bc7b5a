#!/usr/bin/env node

/**
 * Assets CLI
 * Resolver cache maintenance plus offline validation and completion of asset objects
 */

import { Command } from "commander";
import chalk from "chalk";
import { cacheClearCommand, cacheListCommand } from "./commands/cache.js";
import { validateCommand } from "./commands/validate.js";
import { completeCommand } from "./commands/complete.js";
import { AssetsError, toError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("assets-core")
  .description("Resolver cache and validation tooling for asset inventories")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

const cache = program.command("cache").description("Inspect or clear the resolver disk cache");

cache
  .command("list")
  .description("List cached workspaces")
  .option("--json", "Print entries as JSON")
  .action(cacheListCommand);

cache
  .command("clear")
  .description("Remove cached workspaces")
  .option("--expired", "Remove only expired entries")
  .action(cacheClearCommand);

program
  .command("validate")
  .description("Validate properties against an object type")
  .requiredOption("-t, --type <id>", "Object type ID")
  .requiredOption("-d, --data <json>", "Properties as a JSON object")
  .requiredOption("-a, --attributes <file>", "JSON file of attribute definitions keyed by object type ID")
  .option("--create", "Also require every required field")
  .option("--update", "Treat the properties as a partial update")
  .option("--json", "Print the result as JSON")
  .action(validateCommand);

program
  .command("complete")
  .description("Apply defaults and suggest missing fields")
  .requiredOption("-t, --type <id>", "Object type ID")
  .requiredOption("-d, --data <json>", "Properties as a JSON object")
  .requiredOption("-a, --attributes <file>", "JSON file of attribute definitions keyed by object type ID")
  .option("--json", "Print the result as JSON")
  .action(completeCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(reason: unknown): void {
  const error = toError(reason);
  logger.error({ err: error }, "CLI error occurred");

  const label = error instanceof AssetsError ? `[${error.code}] ` : "";
  console.error(chalk.red(`\nError: ${label}${error.message}`));
  if (process.env.DEBUG || process.env.NODE_ENV === "development") {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
