import { describe, it, expect } from "vitest";
import { Tuple, decodePayload, encodePayload, toJsonCompatible, tuple } from "../wire/codec";
import { WireFormatError } from "../errors";

describe("wire codec", () => {
  it("tags every node of a nested payload", () => {
    expect(encodePayload({ a: [1, tuple("x", null)], b: true })).toEqual({
      t: "map",
      entries: {
        a: {
          t: "list",
          items: [
            { t: "scalar", value: 1 },
            { t: "tuple", items: [{ t: "scalar", value: "x" }, { t: "scalar", value: null }] }
          ]
        },
        b: { t: "scalar", value: true }
      }
    });
  });

  it("round-trips nested maps, lists, tuples and scalars with their shape", () => {
    const value = {
      text: "hello",
      count: 3,
      ok: false,
      nothing: null,
      list: [1, [2, 3]],
      pair: tuple("ai", { content: "hi" }),
      nested: { inner: tuple(1, tuple(2, 3)) }
    };

    const decoded = decodePayload(JSON.parse(JSON.stringify(encodePayload(value))));

    expect(decoded).toStrictEqual({
      text: "hello",
      count: 3,
      ok: false,
      nothing: null,
      list: [1, [2, 3]],
      pair: new Tuple(["ai", { content: "hi" }]),
      nested: { inner: new Tuple([1, new Tuple([2, 3])]) }
    });
  });

  it("keeps a list a list and a tuple a tuple", () => {
    expect(decodePayload(encodePayload([1, 2]))).toStrictEqual([1, 2]);
    const decodedTuple = decodePayload(encodePayload(tuple(1, 2)));
    expect(decodedTuple).toBeInstanceOf(Tuple);
    expect(Array.isArray(decodedTuple)).toBe(false);
  });

  it("encodes sets as lists and maps as string-keyed maps", () => {
    expect(decodePayload(encodePayload(new Set(["a", "b"])))).toStrictEqual(["a", "b"]);
    expect(decodePayload(encodePayload(new Map<string, number>([["k", 2]])))).toStrictEqual({ k: 2 });
  });

  it("drops undefined properties", () => {
    expect(encodePayload({ a: undefined, b: 1 })).toEqual({ t: "map", entries: { b: { t: "scalar", value: 1 } } });
  });

  it("falls back to base64 for bytes and decodes them to a Buffer", () => {
    const encoded = encodePayload(Buffer.from("hi"));
    expect(encoded).toEqual({ t: "opaque", encoding: "base64", value: "aGk=" });
    const decoded = decodePayload(encoded);
    expect(Buffer.isBuffer(decoded)).toBe(true);
    expect(decoded).toEqual(Buffer.from("hi"));
  });

  it("falls back to text for values JSON cannot carry", () => {
    expect(encodePayload(new Date("2024-01-02T03:04:05.000Z"))).toEqual({
      t: "opaque",
      encoding: "text",
      value: "2024-01-02T03:04:05.000Z"
    });
    expect(encodePayload(Number.NaN)).toEqual({ t: "opaque", encoding: "text", value: "NaN" });
    expect(encodePayload(BigInt(10))).toEqual({ t: "opaque", encoding: "text", value: "10" });
    expect(decodePayload(encodePayload(Number.POSITIVE_INFINITY))).toBe("Infinity");
  });

  it("rejects unknown node tags", () => {
    expect(() => decodePayload({ t: "bogus" })).toThrow(WireFormatError);
    expect(() => decodePayload({ t: "bogus" })).toThrow("unknown node tag bogus");
  });

  it("rejects malformed nodes", () => {
    expect(() => decodePayload("plain")).toThrow(WireFormatError);
    expect(() => decodePayload({ t: "list" })).toThrow("list node without items");
    expect(() => decodePayload({ t: "scalar", value: [1] })).toThrow("scalar node with non-scalar value");
    expect(() => decodePayload({ t: "opaque", encoding: "hex", value: "00" })).toThrow("unknown opaque encoding hex");
  });
});

describe("toJsonCompatible", () => {
  it("projects tuples, bytes, dates and bigints to JSON", () => {
    expect(
      toJsonCompatible({
        pair: tuple(1, "a"),
        bytes: new Uint8Array([104, 105]),
        at: new Date("2024-01-02T03:04:05.000Z"),
        big: BigInt(7),
        skipped: undefined,
        bad: Number.NaN
      })
    ).toEqual({ pair: [1, "a"], bytes: "aGk=", at: "2024-01-02T03:04:05.000Z", big: "7", bad: null });
  });

  it("keeps a value it cannot project as its string form", () => {
    const node: Record<string, unknown> = { name: "loop" };
    node.self = node;
    expect(toJsonCompatible(node)).toEqual({ raw: "[object Object]" });
  });

  it("accepts shared references that are not cycles", () => {
    const shared = { v: 1 };
    expect(toJsonCompatible({ a: shared, b: shared })).toEqual({ a: { v: 1 }, b: { v: 1 } });
  });
});

describe("wire codec key handling", () => {
  it("keeps a __proto__ key as plain data", () => {
    const value: unknown = JSON.parse('{"__proto__":{"polluted":true},"ok":1}');

    const decoded = decodePayload(JSON.parse(JSON.stringify(encodePayload(value))));

    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
    expect(Object.prototype.hasOwnProperty.call(decoded, "__proto__")).toBe(true);
    expect(JSON.stringify(decoded)).toBe('{"__proto__":{"polluted":true},"ok":1}');
    expect(JSON.stringify(toJsonCompatible(value))).toBe('{"__proto__":{"polluted":true},"ok":1}');
  });
});
