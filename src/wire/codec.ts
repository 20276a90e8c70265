import { WireFormatError } from "../errors";

/**
 * Fixed-arity ordered value. JSON has no tuple type, so payloads that need to
 * come back as a tuple (rather than a list) wrap their items in one.
 */
export class Tuple<T extends readonly unknown[] = readonly unknown[]> {
  public readonly items: T;

  public constructor(items: T) {
    this.items = items;
  }

  public get length(): number {
    return this.items.length;
  }

  public toJSON(): unknown[] {
    return [...this.items];
  }
}

export function tuple<T extends unknown[]>(...items: T): Tuple<T> {
  return new Tuple(items);
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type Scalar = string | number | boolean | null;

export type EncodedValue =
  | { t: "tuple"; items: EncodedValue[] }
  | { t: "list"; items: EncodedValue[] }
  | { t: "map"; entries: Record<string, EncodedValue> }
  | { t: "scalar"; value: Scalar }
  | { t: "opaque"; encoding: "base64" | "text"; value: string };

export type EncodedTag = EncodedValue["t"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Assigns an own enumerable key, including `__proto__`, without touching the prototype. */
function setEntry<V>(target: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function opaqueText(value: unknown): EncodedValue {
  let text: string;
  if (typeof value === "object" && value !== null && "toJSON" in value && typeof value.toJSON === "function") {
    const projected: unknown = value.toJSON();
    text = typeof projected === "string" ? projected : JSON.stringify(projected) ?? safeString(value);
  } else {
    text = safeString(value);
  }
  return { t: "opaque", encoding: "text", value: text };
}

/**
 * Tags every node of `value` so it can cross a text-only transport and be
 * rebuilt with the same shape by {@link decodePayload}.
 */
export function encodePayload(value: unknown): EncodedValue {
  if (value instanceof Tuple) {
    return { t: "tuple", items: value.items.map((item: unknown) => encodePayload(item)) };
  }
  if (Array.isArray(value)) {
    return { t: "list", items: value.map((item) => encodePayload(item)) };
  }
  if (value instanceof Set) {
    return { t: "list", items: [...value].map((item) => encodePayload(item)) };
  }
  if (value === null || value === undefined) {
    return { t: "scalar", value: null };
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return { t: "scalar", value };
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? { t: "scalar", value } : opaqueText(value);
  }
  if (value instanceof Uint8Array) {
    return { t: "opaque", encoding: "base64", value: bytesToBase64(value) };
  }
  if (value instanceof Map) {
    const entries: Record<string, EncodedValue> = {};
    for (const [k, v] of value) {
      if (v !== undefined) setEntry(entries, String(k), encodePayload(v));
    }
    return { t: "map", entries };
  }
  if (isPlainObject(value)) {
    const entries: Record<string, EncodedValue> = {};
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) setEntry(entries, k, encodePayload(v));
    }
    return { t: "map", entries };
  }
  return opaqueText(value);
}

function isScalar(value: unknown): value is Scalar {
  return value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function decodeList(node: Record<string, unknown>, tag: EncodedTag): unknown[] {
  const items = node.items;
  if (!Array.isArray(items)) throw new WireFormatError(`${tag} node without items`);
  return items.map((item) => decodePayload(item));
}

export function decodePayload(encoded: unknown): unknown {
  if (!isPlainObject(encoded) || typeof encoded.t !== "string") {
    throw new WireFormatError("expected an encoded node");
  }

  switch (encoded.t) {
    case "tuple":
      return new Tuple(decodeList(encoded, "tuple"));
    case "list":
      return decodeList(encoded, "list");
    case "map": {
      const entries = encoded.entries;
      if (!isPlainObject(entries)) throw new WireFormatError("map node without entries");
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(entries)) {
        setEntry(out, k, decodePayload(v));
      }
      return out;
    }
    case "scalar":
      if (!isScalar(encoded.value)) throw new WireFormatError("scalar node with non-scalar value");
      return encoded.value;
    case "opaque": {
      if (typeof encoded.value !== "string") throw new WireFormatError("opaque node without a string value");
      if (encoded.encoding === "base64") return Buffer.from(encoded.value, "base64");
      if (encoded.encoding === "text") return encoded.value;
      throw new WireFormatError(`unknown opaque encoding ${String(encoded.encoding)}`);
    }
    default:
      throw new WireFormatError(`unknown node tag ${encoded.t}`);
  }
}

function project(value: unknown, seen: Set<object>): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value !== "object") return null;
  if (value instanceof Uint8Array) return bytesToBase64(value);

  if (seen.has(value)) throw new TypeError("circular structure");
  seen.add(value);
  try {
    if (value instanceof Tuple) return value.items.map((item: unknown) => project(item, seen));
    if (Array.isArray(value)) return value.map((item) => project(item, seen));
    if (value instanceof Set) return [...value].map((item) => project(item, seen));
    if (value instanceof Map) {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, v] of value) {
        if (v !== undefined) setEntry(out, String(k), project(v, seen));
      }
      return out;
    }
    if ("toJSON" in value && typeof value.toJSON === "function") {
      const projected: unknown = value.toJSON();
      return project(projected, seen);
    }
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      if (v === undefined || typeof v === "function" || typeof v === "symbol") continue;
      setEntry(out, k, project(v, seen));
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/**
 * JSON projection used for durable storage. Values that cannot be projected
 * are kept as `{ raw: <string form> }`.
 */
export function toJsonCompatible(value: unknown): JsonValue {
  try {
    return project(value, new Set());
  } catch {
    return { raw: safeString(value) };
  }
}
