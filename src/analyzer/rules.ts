/**
 * Rule catalog.
 *
 * IDs are stable and published through SARIF output: append new rules,
 * never renumber or repurpose existing ones. Declaration order is the order
 * findings are reported within a statement.
 */

import type { Rule } from "../core/types.js";

export const RULES: readonly Rule[] = [
  {
    id: "BAN001",
    name: "DropTable",
    pattern: /\bDROP\s+TABLE\b/i,
    severity: "critical",
    message: "DROP TABLE permanently deletes data and all indexes",
    lockType: "ACCESS EXCLUSIVE",
    baseLockMs: 10,
  },
  {
    id: "BAN002",
    name: "DropColumn",
    pattern: /\bALTER\s+TABLE\s+\S+\s+DROP\s+COLUMN\b/i,
    severity: "high",
    message: "DROP COLUMN is irreversible and may break running queries",
    lockType: "ACCESS EXCLUSIVE",
    baseLockMs: 50,
  },
  {
    id: "BAN003",
    name: "RenameTableOrColumn",
    pattern: /\bALTER\s+TABLE\s+\S+\s+RENAME\b/i,
    severity: "medium",
    message: "Renaming table/column will break application queries",
    lockType: "ACCESS EXCLUSIVE",
    baseLockMs: 5,
  },
  {
    id: "LCK001",
    name: "AddNotNullColumnWithoutDefault",
    // Greedy so the trigger ends at the last NOT NULL of the statement
    pattern: /\bADD\s+(?:COLUMN\s+)?\S+\s+\S+.*\bNOT\s+NULL\b/i,
    unless: /\bDEFAULT\b/i,
    severity: "critical",
    message: "Adding NOT NULL column without DEFAULT rewrites entire table under lock",
    lockType: "ACCESS EXCLUSIVE",
    baseLockMs: null,
  },
  {
    id: "LCK002",
    name: "CreateIndexNonConcurrently",
    pattern: /\bCREATE\s+(?:UNIQUE\s+)?INDEX\s+(?!CONCURRENTLY\b)/i,
    severity: "high",
    message: "CREATE INDEX without CONCURRENTLY blocks all writes",
    lockType: "SHARE",
    baseLockMs: null,
  },
  {
    id: "LCK003",
    name: "AddForeignKeyWithoutNotValid",
    pattern: /\bADD\s+(?:CONSTRAINT\s+\S+\s+)?FOREIGN\s+KEY\b/i,
    unless: /\bNOT\s+VALID\b/i,
    severity: "high",
    message: "Adding FK without NOT VALID scans entire table under lock",
    lockType: "SHARE ROW EXCLUSIVE",
    baseLockMs: null,
  },
  {
    id: "LCK004",
    name: "AlterColumnType",
    pattern: /\bALTER\s+TABLE\s+\S+\s+ALTER\s+COLUMN\s+\S+\s+(?:SET\s+DATA\s+)?TYPE\b/i,
    severity: "critical",
    message: "Changing column type rewrites the entire table under ACCESS EXCLUSIVE lock",
    lockType: "ACCESS EXCLUSIVE",
    baseLockMs: null,
  },
  {
    id: "LCK005",
    name: "SetNotNull",
    pattern: /\bALTER\s+TABLE\s+\S+\s+ALTER\s+COLUMN\s+\S+\s+SET\s+NOT\s+NULL\b/i,
    severity: "high",
    message: "SET NOT NULL scans full table; use CHECK constraint + NOT VALID instead",
    lockType: "ACCESS EXCLUSIVE",
    baseLockMs: null,
  },
];

/**
 * Look up a rule by ID.
 */
export function getRule(id: string): Rule | undefined {
  return RULES.find((rule) => rule.id === id);
}

/**
 * Test a rule against one normalized statement.
 *
 * A rule with an `unless` clause matches when at least one trigger
 * occurrence has no such clause anywhere after it in the statement.
 */
export function matchesRule(rule: Rule, statement: string): boolean {
  // Fresh global copy per call: the catalog's patterns carry no lastIndex state
  const trigger = new RegExp(rule.pattern.source, "gi");
  for (const match of statement.matchAll(trigger)) {
    if (!rule.unless) {
      return true;
    }
    const rest = statement.slice((match.index ?? 0) + match[0].length);
    if (!rule.unless.test(rest)) {
      return true;
    }
  }
  return false;
}
