/**
 * Statement segmentation tests.
 */

import { describe, expect, it } from "vitest";
import { splitStatements } from "../src/analyzer/segmenter.js";

function split(sql: string) {
  return Array.from(splitStatements(sql));
}

describe("splitStatements", () => {
  it("should split on semicolons and collapse whitespace", () => {
    const sql = "DROP TABLE a;\nALTER TABLE b\n  DROP COLUMN c;\n";

    expect(split(sql)).toEqual([
      { text: "DROP TABLE a", line: 1 },
      { text: "ALTER TABLE b DROP COLUMN c", line: 2 },
    ]);
  });

  it("should keep a trailing statement without a semicolon", () => {
    expect(split("SELECT 1;\nSELECT 2")).toEqual([
      { text: "SELECT 1", line: 1 },
      { text: "SELECT 2", line: 2 },
    ]);
  });

  it("should report the line where the statement text begins", () => {
    expect(split("\n\n   DROP TABLE a;")).toEqual([{ text: "DROP TABLE a", line: 3 }]);
  });

  it("should skip segments that start with a line comment", () => {
    const sql = "-- drop old tables\nDROP TABLE a;\nDROP TABLE b;";

    expect(split(sql)).toEqual([{ text: "DROP TABLE b", line: 3 }]);
  });

  it("should skip empty segments", () => {
    expect(split("")).toEqual([]);
    expect(split("  ;; \n;")).toEqual([]);
  });

  it("should split inside string literals", () => {
    expect(split("INSERT INTO t VALUES ('a;b');")).toEqual([
      { text: "INSERT INTO t VALUES ('a", line: 1 },
      { text: "b')", line: 1 },
    ]);
  });

  it("should count lines across many statements", () => {
    const sql = Array.from({ length: 500 }, (_, i) => `SELECT ${i};`).join("\n");
    const statements = split(sql);

    expect(statements).toHaveLength(500);
    expect(statements[0]).toEqual({ text: "SELECT 0", line: 1 });
    expect(statements[499]).toEqual({ text: "SELECT 499", line: 500 });
    expect(statements.every((s, i) => s.line === i + 1)).toBe(true);
  });

  it("should skip comment-led segments without losing line count", () => {
    const sql = "SELECT 1;\n-- note\nSELECT 2;\n\nSELECT 3;";
    expect(split(sql)).toEqual([
      { text: "SELECT 1", line: 1 },
      { text: "SELECT 3", line: 5 },
    ]);
  });

  it("should be restartable", () => {
    const sql = "DROP TABLE a;\nDROP TABLE b;";
    expect(split(sql)).toEqual(split(sql));
  });
});
