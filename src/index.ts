/**
 * migsafe library exports.
 *
 * The analyzer is pure: give it a script and an optional row-count hint and
 * it returns ordered findings. File collection and rendering are exported
 * for tools that embed the CLI behavior.
 */

// Core types
export * from "./core/types.js";
export * from "./core/severity.js";
export * from "./core/errors.js";

// Analyzer
export {
  analyze,
  estimateLockMs,
  getRule,
  matchesRule,
  riskLevel,
  riskScore,
  RULES,
  splitStatements,
  SQL_EXCERPT_LENGTH,
} from "./analyzer/index.js";

// Lint command
export {
  collectSqlFiles,
  executeLint,
  lintSource,
  shouldFail,
  type LintOptions,
  type LintResult,
} from "./commands/lint/index.js";

// Renderers
export { renderJson, toJsonOutput, type JsonOutput } from "./render/json.js";
export { renderSarif, severityToLevel, type SarifLog } from "./render/sarif.js";
export { renderTerminal } from "./render/terminal.js";
