/**
 * complete command - Fill defaults into a partial property map
 */

import chalk from "chalk";
import { getCompletionSummary, type CompletionSuggestion } from "../../core/validation/index.js";
import { createCommandContext, createValidationServices, parseProperties, printErrors } from "./shared.js";

export interface CompleteOptions {
  type: string;
  data: string;
  attributes: string;
  json?: boolean;
}

const PRIORITY_COLORS: Record<CompletionSuggestion["priority"], (text: string) => string> = {
  critical: chalk.red,
  important: chalk.yellow,
  optional: chalk.dim,
};

export async function completeCommand(options: CompleteOptions): Promise<void> {
  const { logger } = createCommandContext("complete");
  const properties = parseProperties(options.data);
  const { completion } = await createValidationServices(options.attributes, logger);

  const result = await completion.complete(options.type, properties);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    const summary = getCompletionSummary(result);
    console.log();
    console.log(result.success ? chalk.green(summary) : chalk.yellow(summary));

    if (result.appliedDefaults.length > 0) {
      console.log();
      console.log(chalk.white.bold("Applied defaults"));
      for (const applied of result.appliedDefaults) {
        console.log(
          `  ${chalk.cyan(applied.field)} = ${chalk.white(applied.value)} ${chalk.dim(`(${applied.reason}, ${applied.confidence})`)}`
        );
      }
    }

    if (result.suggestions.length > 0) {
      console.log();
      console.log(chalk.white.bold("Suggestions"));
      for (const suggestion of result.suggestions) {
        const color = PRIORITY_COLORS[suggestion.priority];
        console.log(`  ${color(suggestion.priority.padEnd(9))} ${suggestion.message}`);
        if (suggestion.options) {
          console.log(chalk.dim(`            options: ${suggestion.options.join(", ")}`));
        }
      }
    }

    if (result.warnings.length > 0) {
      console.log();
      console.log(chalk.white.bold("Remaining issues"));
      printErrors(result.warnings);
    }

    console.log();
    console.log(chalk.white.bold("Completed properties"));
    console.log(JSON.stringify(result.completedProperties, null, 2));
    console.log();
  }

  if (!result.success) {
    process.exitCode = 1;
  }
}
