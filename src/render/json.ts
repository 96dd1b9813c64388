/**
 * JSON renderers.
 */

import { RULES } from "../analyzer/rules.js";
import type { FileReport, Severity } from "../core/types.js";

export interface JsonFinding {
  rule_id: string;
  severity: Severity;
  message: string;
  line: number;
  lock_type: string;
  lock_ms: number | null;
}

/** Findings keyed by file path */
export type JsonOutput = Record<string, JsonFinding[]>;

export function toJsonOutput(reports: FileReport[]): JsonOutput {
  const output: JsonOutput = {};
  for (const report of reports) {
    output[report.file] = report.findings.map((f) => ({
      rule_id: f.ruleId,
      severity: f.severity,
      message: f.message,
      line: f.line,
      lock_type: f.lockType,
      lock_ms: f.lockMs,
    }));
  }
  return output;
}

/**
 * Render lint results as JSON keyed by file path.
 */
export function renderJson(reports: FileReport[]): string {
  return JSON.stringify(toJsonOutput(reports), null, 2);
}

/**
 * Render the rule catalog as JSON.
 */
export function renderRulesJson(): string {
  const rules = RULES.map((rule) => ({
    id: rule.id,
    name: rule.name,
    severity: rule.severity,
    lock_type: rule.lockType,
    base_lock_ms: rule.baseLockMs,
    message: rule.message,
  }));
  return JSON.stringify(rules, null, 2);
}
