import { err, ok, type Result } from "neverthrow";
import { ContextKeyNotFoundError } from "../errors/index.js";

/** One level of the Context tree. Values are scalars, sequences, nested namespaces or opaque objects. */
export interface Namespace {
  readonly [key: string]: unknown;
}

/** Anything a Context can be built from. Dotted keys (`"db.host"`) expand into nested namespaces. */
export type SourceMapping = { readonly [key: string]: unknown };
export type ContextSource = Context | SourceMapping;

export function isNamespace(value: unknown): value is Namespace {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Hierarchical, read-only configuration. Every instance is deep-frozen; merge()
 * and withOverrides() return new instances and never touch their operands.
 *
 * Merge rule: later sources win key by key, two namespaces under the same key
 * merge recursively, anything else (scalar, sequence, kind conflict) is
 * replaced outright by the later source.
 */
export class Context {
  private static readonly EMPTY = new Context(Object.freeze({}));

  private constructor(private readonly data: Namespace) {}

  static empty(): Context {
    return Context.EMPTY;
  }

  /** Builds a Context from ordered sources; the last source has the highest precedence. */
  static from(...sources: ContextSource[]): Context {
    let data: Namespace = Object.freeze({});
    for (const source of sources) {
      data = mergeNamespaces(data, source instanceof Context ? source.data : normalize(source, ""));
    }
    return new Context(data);
  }

  resolve(path: string): Result<unknown, ContextKeyNotFoundError> {
    const segments = path.split(".");
    const walked: string[] = [];
    let current: unknown = this.data;
    for (const segment of segments) {
      if (!segment || !isNamespace(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
        return err(new ContextKeyNotFoundError(path, segment, walked.join(".")));
      }
      current = current[segment];
      walked.push(segment);
    }
    return ok(current);
  }

  has(path: string): boolean {
    return this.resolve(path).isOk();
  }

  get(path: string, fallback?: unknown): unknown {
    return this.resolve(path).unwrapOr(fallback);
  }

  /** A Context rooted at the namespace under `path`. */
  namespace(path: string): Result<Context, ContextKeyNotFoundError> {
    return this.resolve(path).andThen((value): Result<Context, ContextKeyNotFoundError> => {
      if (isNamespace(value)) return ok(new Context(value));
      const segments = path.split(".");
      return err(new ContextKeyNotFoundError(path, segments[segments.length - 1], segments.slice(0, -1).join(".")));
    });
  }

  merge(other: ContextSource): Context {
    return Context.from(this, other);
  }

  withOverrides(mapping: SourceMapping): Context {
    return Context.from(this, mapping);
  }

  keys(): string[] {
    return Object.keys(this.data);
  }

  /** Deep, mutable copy of the tree. */
  toObject(): Record<string, unknown> {
    return thaw(this.data);
  }

  /** Leaf values keyed by their dotted path. Empty namespaces do not appear. */
  flatten(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    const walk = (ns: Namespace, prefix: string) => {
      for (const [k, v] of Object.entries(ns)) {
        const key = prefix ? `${prefix}.${k}` : k;
        if (isNamespace(v)) walk(v, key);
        else out[key] = v;
      }
    };
    walk(this.data, "");
    return out;
  }

  toJSON(): Record<string, unknown> {
    return this.toObject();
  }
}

function mergeNamespaces(base: Namespace, over: Namespace): Namespace {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(over)) {
    const prev = out[key];
    out[key] = isNamespace(prev) && isNamespace(value) ? mergeNamespaces(prev, value) : value;
  }
  return Object.freeze(out);
}

/** Keys that would reach the object prototype instead of the namespace. */
export const RESERVED_KEYS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

function normalize(mapping: SourceMapping, at: string): Namespace {
  let out: Namespace = Object.freeze({});
  for (const [rawKey, rawValue] of Object.entries(mapping)) {
    if (rawValue === undefined) continue;
    const segments = rawKey.split(".");
    if (segments.some(s => s.length === 0)) {
      throw new TypeError(`Invalid context key '${rawKey}'${at ? ` in '${at}'` : ""}`);
    }
    const reserved = segments.find(s => RESERVED_KEYS.has(s));
    if (reserved) {
      throw new TypeError(`Reserved context key '${reserved}' in '${at ? `${at}.${rawKey}` : rawKey}'`);
    }
    const where = at ? `${at}.${rawKey}` : rawKey;
    let value: unknown = freezeValue(rawValue, where);
    for (const segment of [...segments].reverse()) {
      value = Object.freeze({ [segment]: value });
    }
    if (isNamespace(value)) out = mergeNamespaces(out, value);
  }
  return out;
}

function freezeValue(value: unknown, at: string): unknown {
  if (isNamespace(value)) return normalize(value, at);
  if (Array.isArray(value)) return Object.freeze(value.map((v, i) => freezeValue(v, `${at}[${i}]`)));
  return value;
}

function thaw(value: Namespace): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) out[k] = thawValue(v);
  return out;
}

function thawValue(value: unknown): unknown {
  if (isNamespace(value)) return thaw(value);
  if (Array.isArray(value)) return value.map(thawValue);
  return value;
}
