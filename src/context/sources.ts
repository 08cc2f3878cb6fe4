import fs from "node:fs";
import dotenv from "dotenv";
import { z } from "zod";
import { RESERVED_KEYS, type SourceMapping } from "./index.js";

export interface EnvSourceOptions {
  /** Only variables starting with this prefix are taken; it is stripped from the key. */
  prefix?: string;
  /** Separates namespace levels inside a variable name. Default `__`. */
  separator?: string;
  /** Lower-case every segment (default true), so `APP__DB__HOST` becomes `db.host`. */
  lowerCase?: boolean;
}

/**
 * Maps environment-style variables to a nested mapping. Keys are taken in sorted
 * order, so when `X__DB` and `X__DB__HOST` both exist the namespace wins.
 */
export function fromEnv(env: Record<string, string | undefined>, options: EnvSourceOptions = {}): SourceMapping {
  const prefix = options.prefix ?? "";
  const separator = options.separator ?? "__";
  const lowerCase = options.lowerCase ?? true;
  const out: Record<string, unknown> = {};
  for (const key of Object.keys(env).sort()) {
    const value = env[key];
    if (value === undefined || !key.startsWith(prefix) || key.length === prefix.length) continue;
    const segments = key
      .slice(prefix.length)
      .split(separator)
      .map(s => (lowerCase ? s.toLowerCase() : s));
    if (segments.some(s => s.length === 0 || s.includes(".") || RESERVED_KEYS.has(s))) continue;
    setPath(out, segments, value);
  }
  return out;
}

/** Reads a `.env` file without touching `process.env`. */
export function fromDotenvFile(path: string, options: EnvSourceOptions = {}): SourceMapping {
  let raw: Buffer;
  try {
    raw = fs.readFileSync(path);
  } catch (e) {
    throw new Error(`Failed to read env file '${path}': ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  return fromEnv(dotenv.parse(raw), options);
}

const JsonMapping = z.record(z.unknown());

export function fromJsonFile(path: string): SourceMapping {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (e) {
    throw new Error(`Failed to read config file '${path}': ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new Error(`Failed to parse JSON file '${path}': ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  const parsed = JsonMapping.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Config file '${path}' must contain a JSON object`);
  }
  return parsed.data;
}

function setPath(target: Record<string, unknown>, segments: string[], value: unknown): void {
  let node = target;
  for (const segment of segments.slice(0, -1)) {
    const next = node[segment];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[segment] = created;
      node = created;
    }
  }
  node[segments[segments.length - 1]] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
