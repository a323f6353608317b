import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { KeyValueStorage } from "./safeStorage";

function readEntries(filePath: string): Map<string, string> {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch {
    return new Map();
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return new Map();
    const entries = Object.entries(parsed).filter(
      (entry): entry is [string, string] => typeof entry[1] === "string"
    );
    return new Map(entries);
  } catch {
    return new Map();
  }
}

/**
 * Web Storage look-alike for Node hosts. The whole namespace lives in one JSON
 * file that is rewritten synchronously on every mutation, through a temp file
 * so a crash mid-write leaves the previous contents.
 */
export function createFileStorage(filePath: string): KeyValueStorage {
  const entries = readEntries(filePath);

  const flush = () => {
    mkdirSync(dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    writeFileSync(tempPath, `${JSON.stringify(Object.fromEntries(entries), null, 2)}\n`, "utf8");
    renameSync(tempPath, filePath);
  };

  return {
    getItem: (key) => entries.get(key) ?? null,
    setItem: (key, value) => {
      entries.set(key, String(value));
      flush();
    },
    removeItem: (key) => {
      entries.delete(key);
      flush();
    },
  };
}
