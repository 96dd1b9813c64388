/**
 * Core types for migsafe rules, findings and reports.
 */

// ============================================================================
// Severity
// ============================================================================

export type Severity = "low" | "medium" | "high" | "critical";

export type RiskLevel = "low" | "medium" | "high";

// ============================================================================
// Rules
// ============================================================================

/**
 * A dangerous-pattern rule. The catalog is declared once and never mutated.
 */
export interface Rule {
  /** Stable identifier, also used as the SARIF rule ID */
  readonly id: string;
  /** PascalCase name for SARIF reporting descriptors */
  readonly name: string;
  /** Trigger, searched case-insensitively anywhere in a normalized statement */
  readonly pattern: RegExp;
  /**
   * Clause whose presence after the trigger cancels the match
   * (e.g. DEFAULT after NOT NULL).
   */
  readonly unless?: RegExp;
  readonly severity: Severity;
  readonly message: string;
  /** PostgreSQL lock mode the statement acquires */
  readonly lockType: string;
  /** Baseline lock estimate in ms; null when a row count is required */
  readonly baseLockMs: number | null;
}

// ============================================================================
// Statements & Findings
// ============================================================================

/**
 * A single statement with whitespace collapsed and its starting line.
 */
export interface Statement {
  text: string;
  line: number;
}

export interface Finding {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly message: string;
  /** 1-based line where the statement begins */
  readonly line: number;
  /** Leading part of the normalized statement, for display */
  readonly sql: string;
  readonly lockType: string;
  /** Estimated lock duration; null when it cannot be estimated */
  readonly lockMs: number | null;
}

// ============================================================================
// Reports
// ============================================================================

export interface FileReport {
  file: string;
  findings: Finding[];
  riskScore: number;
}

export type OutputFormat = "text" | "json" | "sarif";
