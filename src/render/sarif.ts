/**
 * SARIF 2.1.0 renderer for GitHub Code Scanning and other static analysis
 * integrations.
 *
 * SARIF spec: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
 */

import { getRule } from "../analyzer/rules.js";
import { getVersionSync } from "../core/version.js";
import type { FileReport, Finding, Rule, Severity } from "../core/types.js";

// ============================================================================
// SARIF 2.1.0 Types (subset)
// ============================================================================

export interface SarifLog {
  version: "2.1.0";
  $schema: string;
  runs: SarifRun[];
}

export interface SarifRun {
  tool: SarifTool;
  results: SarifResult[];
}

export interface SarifTool {
  driver: SarifToolComponent;
}

export interface SarifToolComponent {
  name: string;
  version?: string;
  rules?: SarifReportingDescriptor[];
}

export interface SarifReportingDescriptor {
  id: string;
  name?: string;
  shortDescription?: SarifMultiformatMessageString;
  defaultConfiguration?: SarifReportingConfiguration;
  properties?: Record<string, unknown>;
}

export interface SarifReportingConfiguration {
  level?: SarifLevel;
}

export interface SarifMultiformatMessageString {
  text: string;
}

export type SarifLevel = "none" | "note" | "warning" | "error";

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: SarifMessage;
  locations: SarifLocation[];
  properties?: Record<string, unknown>;
}

export interface SarifMessage {
  text: string;
}

export interface SarifLocation {
  physicalLocation: SarifPhysicalLocation;
}

export interface SarifPhysicalLocation {
  artifactLocation: SarifArtifactLocation;
  region: SarifRegion;
}

export interface SarifArtifactLocation {
  uri: string;
}

export interface SarifRegion {
  startLine: number;
}

export const SARIF_SCHEMA =
  "https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json";

// ============================================================================
// Renderer
// ============================================================================

/**
 * critical and high are errors, everything else a warning.
 */
export function severityToLevel(severity: Severity): SarifLevel {
  return severity === "critical" || severity === "high" ? "error" : "warning";
}

function ruleToDescriptor(rule: Rule): SarifReportingDescriptor {
  return {
    id: rule.id,
    name: rule.name,
    shortDescription: { text: rule.message },
    defaultConfiguration: { level: severityToLevel(rule.severity) },
    properties: {
      severity: rule.severity,
      lockType: rule.lockType,
    },
  };
}

function findingToResult(file: string, finding: Finding): SarifResult {
  return {
    ruleId: finding.ruleId,
    level: severityToLevel(finding.severity),
    message: { text: finding.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: file },
          region: { startLine: finding.line },
        },
      },
    ],
    properties: {
      severity: finding.severity,
      lockType: finding.lockType,
      lockMs: finding.lockMs,
    },
  };
}

/**
 * Render lint results as a single-run SARIF log.
 *
 * Results follow file order, then finding order; rule descriptors cover the
 * rules that produced results, sorted by ID.
 */
export function renderSarif(reports: FileReport[]): SarifLog {
  const results = reports.flatMap((report) =>
    report.findings.map((finding) => findingToResult(report.file, finding))
  );

  const rules: SarifReportingDescriptor[] = [];
  for (const ruleId of Array.from(new Set(results.map((r) => r.ruleId))).sort()) {
    const rule = getRule(ruleId);
    if (rule) {
      rules.push(ruleToDescriptor(rule));
    }
  }

  return {
    version: "2.1.0",
    $schema: SARIF_SCHEMA,
    runs: [
      {
        tool: {
          driver: {
            name: "migsafe",
            version: getVersionSync(),
            rules,
          },
        },
        results,
      },
    ],
  };
}
