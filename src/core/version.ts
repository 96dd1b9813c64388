/**
 * Package version, read from package.json next to the sources or the bundle.
 */

import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | null = null;

function parseVersion(content: string): string | null {
  const pkg: unknown = JSON.parse(content);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
    const { version } = pkg;
    return typeof version === "string" && version.length > 0 ? version : null;
  }
  return null;
}

async function tryReadVersion(path: string): Promise<string | null> {
  try {
    return parseVersion(await readFile(path, "utf-8"));
  } catch {
    // missing or unreadable candidate; try the next one
    return null;
  }
}

/**
 * Resolve the version once and cache it.
 *
 * Candidates: dist/cli.js -> ../package.json, src/core/version.ts ->
 * ../../package.json.
 */
export async function getVersion(): Promise<string> {
  if (cachedVersion) {
    return cachedVersion;
  }

  const candidates = [
    join(moduleDir, "..", "package.json"),
    join(moduleDir, "..", "..", "package.json"),
  ];

  for (const candidate of candidates) {
    const version = await tryReadVersion(candidate);
    if (version) {
      cachedVersion = version;
      return version;
    }
  }

  return "unknown";
}

/**
 * Cached version, or "unknown" before getVersion() has resolved.
 */
export function getVersionSync(): string {
  return cachedVersion ?? "unknown";
}
