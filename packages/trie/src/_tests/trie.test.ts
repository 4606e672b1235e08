import { describe, expect, test } from "vitest";
import { KeyNotFoundError, PatriciaTrie } from "..";

describe("PatriciaTrie dictionary API", () => {
  test("stores and retrieves values", () => {
    const t = new PatriciaTrie<number>();
    t.set("foo", 1).set("bar", 2).set("baz", 3);

    expect(t.get("foo")).toBe(1);
    expect(t.get("bar")).toBe(2);
    expect(t.get("baz")).toBe(3);
    expect(t.contains("foo")).toBe(true);
    expect(t.has("baz")).toBe(true);
    expect(t.count()).toBe(3);
  });

  test("branch points and over-long keys are not stored keys", () => {
    const t = PatriciaTrie.from({ foo: 1, bar: 2, baz: 3 });

    expect(t.contains("ba")).toBe(false);
    expect(t.contains("fool")).toBe(false);
    expect(() => t.get("ba")).toThrow(KeyNotFoundError);
    expect(() => t.get("fool")).toThrow(
      "Key not found: 'fool' (matched 'foo')",
    );
  });

  test("reports the structurally matched prefix on a miss", () => {
    const t = PatriciaTrie.from({ bar: 2, baz: 3 });

    try {
      t.get("ba");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(KeyNotFoundError);
      if (error instanceof KeyNotFoundError) {
        expect(error.name).toBe("KeyNotFoundError");
        expect(error.key).toBe("ba");
        expect(error.matched).toBe("ba");
      }
    }
  });

  test("overwriting keeps one entry with the latest value", () => {
    const t = new PatriciaTrie<string>();
    t.set("key", "first");
    t.set("key", "second");

    expect(t.get("key")).toBe("second");
    expect(t.count()).toBe(1);
  });

  test("null and undefined are ordinary values", () => {
    const t = new PatriciaTrie<null | undefined>();
    t.set("a", null);
    t.set("b", undefined);

    expect(t.get("a")).toBeNull();
    expect(t.get("b")).toBeUndefined();
    expect(t.contains("b")).toBe(true);
    expect(t.count()).toBe(2);
  });

  test("deletion removes only the deleted key", () => {
    const t = PatriciaTrie.from({ foo: 1, bar: 2, baz: 3 });

    t.delete("bar");

    expect(() => t.get("bar")).toThrow(KeyNotFoundError);
    expect(t.get("baz")).toBe(3);
    expect(t.get("foo")).toBe(1);
    expect(t.count()).toBe(2);
    expect(() => t.delete("bar")).toThrow(KeyNotFoundError);
    expect(() => t.delete("ba")).toThrow(KeyNotFoundError);
    expect(() => t.delete("qux")).toThrow(KeyNotFoundError);
    expect(t.count()).toBe(2);

    t.set("bar", 20);
    expect(t.get("bar")).toBe(20);
    expect(t.get("baz")).toBe(3);
    expect(t.count()).toBe(3);
  });

  test("the empty key lives on the root", () => {
    const t = new PatriciaTrie<number>();
    t.set("foo", 1);
    t.set("", 2);

    expect(t.contains("")).toBe(true);
    expect(t.get("")).toBe(2);
    expect(Array.from(t.keys())).toEqual(["", "foo"]);

    t.delete("");
    expect(t.contains("")).toBe(false);
    expect(() => t.get("")).toThrow(KeyNotFoundError);
    expect(t.contains("foo")).toBe(true);
  });

  test("accepts a root value and initial entries", () => {
    const t = new PatriciaTrie<string | number>({
      value: 1,
      entries: { key: "value", king: "kong" },
    });

    expect(t.contains("")).toBe(true);
    expect(t.contains("kong")).toBe(false);
    expect(t.get("king")).toBe("kong");
    expect(t.count()).toBe(3);
    expect(Array.from(t.keys()).sort()).toEqual(["", "key", "king"]);
  });

  test("an undefined root value still counts as stored", () => {
    const t = new PatriciaTrie<undefined>({ value: undefined });
    expect(t.contains("")).toBe(true);
    expect(t.count()).toBe(1);
  });

  test("loads from any iterable of pairs", () => {
    const t = PatriciaTrie.from(
      new Map([
        ["x", 1],
        ["xy", 2],
      ]),
    );
    expect(t.get("xy")).toBe(2);
    expect([...t]).toEqual(["x", "xy"]);
  });

  test("rebuilding from items drops dead branches", () => {
    const t = PatriciaTrie.from({ key: "value", keys: "values" });
    t.delete("keys");

    const rebuilt = PatriciaTrie.from(t.items());
    expect(rebuilt.contains("key")).toBe(true);
    expect(rebuilt.contains("keys")).toBe(false);
    expect(rebuilt.contains("ke")).toBe(false);
    expect(rebuilt.contains("kex")).toBe(false);
    expect(t.isPrefix("keys")).toBe(true);
    expect(rebuilt.isPrefix("keys")).toBe(false);
  });

  test("matches a reference map on generated keys", () => {
    // small alphabet so keys share long prefixes
    let seed = 42;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed;
    };
    const reference = new Map<string, number>();
    const t = new PatriciaTrie<number>();

    for (let i = 0; i < 300; i++) {
      const length = next() % 7;
      let key = "";
      for (let j = 0; j < length; j++) key += "ab"[next() % 2];
      reference.set(key, i);
      t.set(key, i);
    }

    expect(t.count()).toBe(reference.size);
    for (const [key, value] of reference) expect(t.get(key)).toBe(value);
    expect(Array.from(t.items()).sort()).toEqual(
      Array.from(reference.entries()).sort(),
    );
    expect(t.contains("abababab")).toBe(false);
  });
});

describe("PatriciaTrie rendering", () => {
  test("lists pairs in enumeration order", () => {
    const t = new PatriciaTrie<number | string>();
    t.set("ba", 2);
    t.set("baz", "hey's");
    t.set("fool", 1.5);

    expect(t.toString()).toBe(
      `PatriciaTrie({'ba': 2, 'baz': "hey's", 'fool': 1.5})`,
    );
    expect(new PatriciaTrie().toString()).toBe("PatriciaTrie({})");
  });
});
