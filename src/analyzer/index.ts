/**
 * Migration analyzer: segments a script and runs the rule catalog over it.
 */

import type { Finding } from "../core/types.js";
import { estimateLockMs } from "./estimate.js";
import { matchesRule, RULES } from "./rules.js";
import { splitStatements } from "./segmenter.js";

/** Length of the statement excerpt kept on each finding */
export const SQL_EXCERPT_LENGTH = 120;

/**
 * Analyze a SQL script for dangerous migration patterns.
 *
 * Findings are ordered by statement, then by rule catalog order.
 */
export function analyze(sql: string, rows: number = 0): Finding[] {
  const findings: Finding[] = [];

  for (const statement of splitStatements(sql)) {
    for (const rule of RULES) {
      if (!matchesRule(rule, statement.text)) continue;

      findings.push({
        ruleId: rule.id,
        severity: rule.severity,
        message: rule.message,
        line: statement.line,
        sql: statement.text.slice(0, SQL_EXCERPT_LENGTH),
        lockType: rule.lockType,
        lockMs: estimateLockMs(rule.baseLockMs, rows),
      });
    }
  }

  return findings;
}

export { estimateLockMs } from "./estimate.js";
export { getRule, matchesRule, RULES } from "./rules.js";
export { riskLevel, riskScore } from "./scoring.js";
export { splitStatements } from "./segmenter.js";
