/**
 * Terminal renderer with colors and tables.
 */

import chalk from "chalk";
import boxen from "boxen";
import Table from "cli-table3";
import { riskLevel } from "../analyzer/scoring.js";
import { RULES } from "../analyzer/rules.js";
import type { FileReport, RiskLevel, Severity } from "../core/types.js";

const colors = {
  header: chalk.magenta.bold,
  label: chalk.gray,
  muted: chalk.dim,
  success: chalk.green,
  warning: chalk.yellow,
};

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  critical: chalk.red.bold,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.cyan,
};

const RISK_COLORS: Record<RiskLevel, (text: string) => string> = {
  high: chalk.red.bold,
  medium: chalk.yellow.bold,
  low: chalk.green.bold,
};

const TABLE_CHARS = {
  top: "─",
  "top-mid": "┬",
  "top-left": "┌",
  "top-right": "┐",
  bottom: "─",
  "bottom-mid": "┴",
  "bottom-left": "└",
  "bottom-right": "┘",
  left: "│",
  "left-mid": "├",
  mid: "─",
  "mid-mid": "┼",
  right: "│",
  "right-mid": "┤",
  middle: "│",
};

function createTable(head: string[]) {
  return new Table({
    head: head.map((h) => colors.label(h)),
    style: {
      head: [],
      border: ["dim"],
    },
    chars: TABLE_CHARS,
  });
}

export function formatLockMs(lockMs: number | null): string {
  return lockMs === null ? "unknown" : `${lockMs}ms`;
}

function formatScore(score: number): string {
  const color = RISK_COLORS[riskLevel(score)];
  return `${color(String(score))}/100`;
}

/**
 * Render one file: a findings table and its risk score, or a clean line.
 */
export function renderFileReport(report: FileReport): string {
  if (report.findings.length === 0) {
    return `${colors.success(report.file)} — no issues\n`;
  }

  const table = createTable(["Rule", "Line", "Sev", "Lock Type", "Est.", "Message"]);
  for (const finding of report.findings) {
    table.push([
      finding.ruleId,
      String(finding.line),
      SEVERITY_COLORS[finding.severity](finding.severity),
      finding.lockType,
      finding.lockMs === null
        ? colors.warning(formatLockMs(null))
        : formatLockMs(finding.lockMs),
      finding.message,
    ]);
  }

  let output = `\n${colors.header(report.file)}\n`;
  output += table.toString() + "\n";
  output += `  Risk score: ${formatScore(report.riskScore)}\n`;
  return output;
}

/**
 * Render a summary box across all files.
 */
function renderSummary(reports: FileReport[]): string {
  const findingCount = reports.reduce((sum, r) => sum + r.findings.length, 0);
  const maxScore = reports.reduce((max, r) => Math.max(max, r.riskScore), 0);

  const lines = [
    `${colors.label("Files:")} ${reports.length}`,
    `${colors.label("Findings:")} ${findingCount}`,
    `${colors.label("Highest risk:")} ${formatScore(maxScore)}`,
  ];

  return boxen(lines.join("\n"), {
    title: "migsafe",
    titleAlignment: "left",
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderColor: "cyan",
    borderStyle: "round",
  });
}

/**
 * Render lint results for the terminal.
 */
export function renderTerminal(reports: FileReport[]): string {
  let output = "";
  for (const report of reports) {
    output += renderFileReport(report);
  }
  output += "\n" + renderSummary(reports) + "\n";
  return output;
}

/**
 * Render the rule catalog as a table.
 */
export function renderRuleCatalog(): string {
  const table = createTable(["Rule", "Sev", "Lock Type", "Base Est.", "Message"]);
  for (const rule of RULES) {
    table.push([
      rule.id,
      SEVERITY_COLORS[rule.severity](rule.severity),
      rule.lockType,
      formatLockMs(rule.baseLockMs),
      rule.message,
    ]);
  }
  return table.toString();
}
