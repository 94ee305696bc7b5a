/**
 * Helpers shared by the CLI commands
 */

import chalk from "chalk";
import { z } from "zod";
import { AssetsError, ErrorCode } from "../../core/errors.js";
import { AttributeMetadataResolver, FileAttributeSource } from "../../core/metadata/index.js";
import type { PropertyMap } from "../../core/property/index.js";
import { CompletionEngine, ObjectValidator, type ValidationError } from "../../core/validation/index.js";
import { loadConfig, type AssetsConfig } from "../../utils/config.js";
import { createChildLogger, createLogger, fileExists, type Logger } from "../../utils/index.js";

const PropertiesSchema = z.record(z.string(), z.unknown());

export interface CommandContext {
  config: AssetsConfig;
  logger: Logger;
}

/**
 * Configuration plus a logger at the configured level
 */
export function createCommandContext(command: string): CommandContext {
  const config = loadConfig();
  const logger = createChildLogger(createLogger("cli", { level: config.logLevel }), { command });
  return { config, logger };
}

/**
 * Format bytes to human readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

/**
 * Parse the `--data` argument into a property map
 *
 * @throws AssetsError when the text is not a JSON object
 */
export function parseProperties(text: string): PropertyMap {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new AssetsError("--data must be valid JSON", ErrorCode.INVALID_ARGUMENT, { data: text }, { cause: error });
  }

  const parsed = PropertiesSchema.safeParse(json);
  if (!parsed.success) {
    throw new AssetsError("--data must be a JSON object of field names to values", ErrorCode.INVALID_ARGUMENT, {
      data: text,
    });
  }
  return parsed.data;
}

export interface ValidationServices {
  validator: ObjectValidator;
  completion: CompletionEngine;
}

/**
 * Validator and completion engine over an exported attribute file
 */
export async function createValidationServices(attributesPath: string, logger: Logger): Promise<ValidationServices> {
  if (!(await fileExists(attributesPath))) {
    throw new AssetsError(`attribute file not found: ${attributesPath}`, ErrorCode.INVALID_ARGUMENT, {
      path: attributesPath,
    });
  }

  const metadataResolver = new AttributeMetadataResolver(new FileAttributeSource(attributesPath), { logger });
  return {
    validator: new ObjectValidator(metadataResolver, { logger }),
    completion: new CompletionEngine(metadataResolver, { logger }),
  };
}

export function printErrors(errors: readonly ValidationError[]): void {
  for (const error of errors) {
    console.log(`  ${chalk.red("✗")} ${chalk.white(error.field || "(object)")} ${chalk.dim(`[${error.code}]`)}`);
    console.log(`    ${error.message}`);
    if (error.suggestion) {
      console.log(chalk.dim(`    → ${error.suggestion}`));
    }
  }
}
