/**
 * Statement segmentation for SQL scripts.
 */

import type { Statement } from "../core/types.js";

/**
 * Split a script on `;` into normalized statements with their starting line.
 *
 * Empty segments and segments that open with a `--` comment are skipped.
 * Semicolons inside string literals, quoted identifiers or `$$` bodies are
 * treated as terminators like any other.
 */
export function* splitStatements(sql: string): Generator<Statement> {
  let offset = 0;
  // Newlines in sql[0, scanned), carried forward so each character is counted once
  let scanned = 0;
  let newlines = 0;

  for (const part of sql.split(";")) {
    const text = part.trim();

    if (text && !text.startsWith("--")) {
      const start = offset + part.search(/\S/);
      newlines += countNewlines(sql, scanned, start);
      scanned = start;
      yield {
        text: text.split(/\s+/).join(" "),
        line: newlines + 1,
      };
    }

    offset += part.length + 1;
  }
}

function countNewlines(text: string, from: number, to: number): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}
