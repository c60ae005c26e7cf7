import { existsSync, readFileSync } from "node:fs";

export type EnvMap = Record<string, string>;

const KEY_PATTERN = /^\s*(?:export\s+)?([A-Z0-9_]+)\s*=(.*)$/;

export function parseEnvFile(text: string): EnvMap {
  const out: EnvMap = {};
  const lines = text.split(/\r?\n/);

  for (const line of lines) {
    const match = line.match(KEY_PATTERN);
    if (!match) continue;
    const key = match[1];
    const rawValue = match[2] ?? "";
    out[key] = parseValue(rawValue);
  }

  return out;
}

/** Missing files read as empty. */
export function readEnvFile(path: string): EnvMap {
  if (!existsSync(path)) return {};
  return parseEnvFile(readFileSync(path, "utf8"));
}

function parseValue(raw: string): string {
  const trimmed = raw.trim();
  if (
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) ||
      (trimmed.startsWith("'") && trimmed.endsWith("'")))
  ) {
    return trimmed.slice(1, -1);
  }
  const comment = trimmed.search(/\s#/);
  return comment === -1 ? trimmed : trimmed.slice(0, comment).trimEnd();
}
