/**
 * Risk scoring over a set of findings.
 */

import { SEVERITY_RANK } from "../core/severity.js";
import type { Finding, RiskLevel } from "../core/types.js";

const POINTS_PER_WEIGHT = 25;

/**
 * Compute a 0-100 risk score. Each finding adds its severity weight
 * times 25; the total is capped at 100.
 */
export function riskScore(findings: readonly Finding[]): number {
  let score = 0;
  for (const finding of findings) {
    score += SEVERITY_RANK[finding.severity] * POINTS_PER_WEIGHT;
  }
  return Math.min(100, score);
}

/**
 * Bucket a score for display.
 */
export function riskLevel(score: number): RiskLevel {
  if (score >= 75) return "high";
  if (score >= 50) return "medium";
  return "low";
}
