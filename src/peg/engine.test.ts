import { describe, expect, it } from "vitest";
import { ParseLimitError } from "../errors.js";
import { noneOf, oneOf, PegParser } from "./engine.js";

describe("PegParser", () => {
  describe("terminals", () => {
    it("literal advances only on a match", () => {
      const p = new PegParser("abc");
      expect(p.literal("x")).toBeNull();
      expect(p.position).toBe(0);
      expect(p.literal("ab")).toBe("ab");
      expect(p.position).toBe(2);
    });

    it("charRun takes the longest run", () => {
      const p = new PegParser("  \tx");
      expect(p.charRun(oneOf(" \t"), "whitespace")).toBe("  \t");
      expect(p.position).toBe(3);
    });

    it("charRun with min 0 matches the empty run", () => {
      const p = new PegParser("x");
      expect(p.charRun(noneOf("x"), "not x", 0)).toBe("");
      expect(p.position).toBe(0);
    });

    it("char fails at end of input", () => {
      const p = new PegParser("");
      expect(p.char(oneOf("a"), "a")).toBeNull();
      expect(p.atEnd()).toBe(true);
    });
  });

  describe("combinators", () => {
    it("choice restores the cursor before trying the next alternative", () => {
      const p = new PegParser("abc");
      const result = p.choice(
        () => p.literal("ab") && p.literal("x"),
        () => p.literal("a"),
      );
      expect(result).toBe("a");
      expect(p.position).toBe(1);
    });

    it("choice takes the first match even if a later one is longer", () => {
      const p = new PegParser("abc");
      const result = p.choice(
        () => p.literal("a"),
        () => p.literal("abc"),
      );
      expect(result).toBe("a");
      expect(p.position).toBe(1);
    });

    it("optional returns undefined and leaves the cursor when absent", () => {
      const p = new PegParser("abc");
      expect(p.optional(() => p.literal("a") && p.literal("c"))).toBe(
        undefined,
      );
      expect(p.position).toBe(0);
    });

    it("many stops after a match that consumed nothing", () => {
      const p = new PegParser("abc");
      const results = p.many(() => p.charRun(oneOf("x"), "x", 0));
      expect(results).toEqual([""]);
      expect(p.position).toBe(0);
    });

    it("many1 fails when nothing matches", () => {
      const p = new PegParser("abc");
      expect(p.many1(() => p.literal("x"))).toBeNull();
      expect(p.many1(() => p.char(oneOf("ab"), "a or b"))).toEqual(["a", "b"]);
    });

    it("sepBy1 gives back a trailing separator", () => {
      const p = new PegParser("a,a,");
      const items = p.sepBy1(
        () => p.literal("a"),
        () => p.literal(","),
      );
      expect(items).toEqual(["a", "a"]);
      expect(p.position).toBe(3);
    });

    it("sepBy matches zero items", () => {
      const p = new PegParser(",");
      expect(
        p.sepBy(
          () => p.literal("a"),
          () => p.literal(","),
        ),
      ).toEqual([]);
      expect(p.position).toBe(0);
    });
  });

  describe("failure tracking", () => {
    it("reports the expected label at the failing offset", () => {
      const p = new PegParser("abd");
      p.literal("ab");
      expect(p.literal("c")).toBeNull();
      expect(p.failure()).toEqual({ offset: 2, expected: ['"c"'] });
    });

    it("keeps the furthest failure across backtracking", () => {
      const p = new PegParser("abc");
      p.attempt(() => p.literal("ab") && p.literal("x"));
      p.literal("z");
      expect(p.failure()).toEqual({ offset: 2, expected: ['"x"'] });
    });

    it("collects every label expected at the same offset", () => {
      const p = new PegParser("?");
      p.choice(
        () => p.literal("b"),
        () => p.char(oneOf("0123456789"), "digit"),
      );
      expect(p.failure()).toEqual({ offset: 0, expected: ['"b"', "digit"] });
    });
  });

  it("throws ParseLimitError once the step budget is spent", () => {
    const p = new PegParser("aaaa", 2);
    p.literal("a");
    p.literal("a");
    expect(() => p.literal("a")).toThrow(ParseLimitError);
  });
});
