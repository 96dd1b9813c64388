/**
 * Lint command: analyze migration files and decide the exit status.
 */

import { readFile } from "node:fs/promises";
import { analyze, riskScore } from "../../analyzer/index.js";
import { debug } from "../../core/logger.js";
import { meetsThreshold } from "../../core/severity.js";
import type { FileReport, Severity } from "../../core/types.js";
import { collectSqlFiles } from "./collect.js";

export interface LintOptions {
  /** Row-count hint for lock estimates (0 = none) */
  rows?: number;
  /** Minimum severity that fails the run */
  failOn?: Severity;
}

export interface LintResult {
  reports: FileReport[];
  failed: boolean;
}

/**
 * Analyze a single script.
 */
export function lintSource(file: string, sql: string, rows: number = 0): FileReport {
  const findings = analyze(sql, rows);
  return { file, findings, riskScore: riskScore(findings) };
}

/**
 * True when any finding reaches the threshold severity.
 */
export function shouldFail(reports: FileReport[], threshold: Severity): boolean {
  return reports.some((report) =>
    report.findings.some((finding) => meetsThreshold(finding.severity, threshold))
  );
}

/**
 * Execute the lint command over files and directories.
 */
export async function executeLint(
  paths: string[],
  options: LintOptions = {}
): Promise<LintResult> {
  const { rows = 0, failOn = "high" } = options;

  const files = await collectSqlFiles(paths);
  debug(`collected ${files.length} file(s)`);

  const reports: FileReport[] = [];
  for (const file of files) {
    const sql = await readFile(file, "utf-8");
    const report = lintSource(file, sql, rows);
    debug(`${file}: ${report.findings.length} finding(s), risk ${report.riskScore}`);
    reports.push(report);
  }

  return { reports, failed: shouldFail(reports, failOn) };
}

export { collectSqlFiles } from "./collect.js";
