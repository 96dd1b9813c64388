/**
 * migsafe CLI entry point.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { MigsafeError } from "./core/errors.js";
import { configureLogger, debug, error as logError, warn } from "./core/logger.js";
import { isSeverity, SEVERITIES } from "./core/severity.js";
import type { OutputFormat } from "./core/types.js";
import { getVersion } from "./core/version.js";
import { executeLint } from "./commands/lint/index.js";
import {
  renderJson,
  renderRuleCatalog,
  renderRulesJson,
  renderSarif,
  renderTerminal,
} from "./render/index.js";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json", "sarif"];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Parse --rows as a non-negative integer.
 */
function parseRowCount(value: string): number {
  const rows = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(rows)) {
    throw new InvalidArgumentError("Row count must be a non-negative integer.");
  }
  return rows;
}

interface LintCommandOptions {
  rows: number;
  format: string;
  failOn: string;
}

const program = new Command();

program
  .name("migsafe")
  .description("Catch dangerous migrations before they lock production")
  .version(await getVersion())
  .option("-q, --quiet", "Suppress warnings and info messages", false)
  .option("--debug", "Print debug diagnostics to stderr", false)
  .hook("preAction", () => {
    configureLogger(program.opts<{ quiet: boolean; debug: boolean }>());
  });

// lint command
program
  .command("lint")
  .description("Lint SQL migration files for dangerous operations")
  .argument("<paths...>", "SQL migration files or directories")
  .option("-r, --rows <count>", "Estimated row count for lock time", parseRowCount, 0)
  .addOption(
    new Option("-f, --format <format>", "Output format")
      .choices(OUTPUT_FORMATS)
      .default("text")
  )
  .addOption(
    new Option("--fail-on <severity>", "Minimum severity that exits with 1")
      .choices(SEVERITIES)
      .default("high")
  )
  .action(async (paths: string[], options: LintCommandOptions) => {
    try {
      const format = isOutputFormat(options.format) ? options.format : "text";
      const failOn = isSeverity(options.failOn) ? options.failOn : "high";

      const { reports, failed } = await executeLint(paths, {
        rows: options.rows,
        failOn,
      });

      if (reports.length === 0) {
        warn("No .sql files found");
        process.exit(0);
      }

      switch (format) {
        case "json":
          console.log(renderJson(reports));
          break;
        case "sarif":
          console.log(JSON.stringify(renderSarif(reports), null, 2));
          break;
        case "text":
          console.log(renderTerminal(reports));
          break;
      }

      debug(`fail-on=${failOn} failed=${failed}`);
      process.exit(failed ? 1 : 0);
    } catch (error) {
      handleError(error);
    }
  });

// rules command
program
  .command("rules")
  .description("List the rule catalog")
  .addOption(
    new Option("-f, --format <format>", "Output format")
      .choices(["text", "json"])
      .default("text")
  )
  .action((options: { format: string }) => {
    console.log(options.format === "json" ? renderRulesJson() : renderRuleCatalog());
  });

/**
 * Handle errors and exit with appropriate code.
 */
function handleError(error: unknown): never {
  if (error instanceof MigsafeError) {
    logError(`Error: ${error.message}`);
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`);
    if (process.env.DEBUG) {
      logError(error.stack ?? "");
    }
  } else {
    logError("An unexpected error occurred");
  }

  process.exit(1);
}

await program.parseAsync();
