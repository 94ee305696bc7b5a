/**
 * validate command - Check a property map against an object type
 */

import chalk from "chalk";
import { AssetsError, ErrorCode } from "../../core/errors.js";
import { getValidationSummary, type ValidationResult } from "../../core/validation/index.js";
import { createCommandContext, createValidationServices, parseProperties, printErrors } from "./shared.js";

export interface ValidateOptions {
  type: string;
  data: string;
  attributes: string;
  create?: boolean;
  update?: boolean;
  json?: boolean;
}

export async function validateCommand(options: ValidateOptions): Promise<void> {
  if (options.create && options.update) {
    throw new AssetsError("--create and --update cannot be combined", ErrorCode.INVALID_ARGUMENT);
  }

  const { logger } = createCommandContext("validate");
  const properties = parseProperties(options.data);
  const { validator } = await createValidationServices(options.attributes, logger);

  let result: ValidationResult;
  if (options.create) {
    result = await validator.validateForCreate(options.type, properties);
  } else if (options.update) {
    result = await validator.validateForUpdate(options.type, properties);
  } else {
    result = await validator.validate(options.type, properties);
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    const summary = getValidationSummary(result);
    console.log();
    console.log(result.valid ? chalk.green(summary) : chalk.red(summary));

    if (result.errors.length > 0) {
      console.log();
      console.log(chalk.white.bold("Errors"));
      printErrors(result.errors);
    }

    if (result.warnings.length > 0) {
      console.log();
      console.log(chalk.white.bold("Warnings"));
      for (const warning of result.warnings) {
        console.log(`  ${chalk.yellow("!")} ${chalk.white(warning.field)} ${warning.message}`);
        if (warning.suggestion) {
          console.log(chalk.dim(`    → ${warning.suggestion}`));
        }
      }
    }
    console.log();
  }

  if (!result.valid) {
    process.exitCode = 1;
  }
}
