import { describe, expect, it } from "vitest";
import { SelectorParseError } from "./errors.js";
import { parseSelector } from "./selector.js";

describe("parseSelector", () => {
  describe("field index", () => {
    it("parses a bare 0-based field", () => {
      expect(parseSelector("1")).toEqual({
        field: 1,
        chars: null,
        style: { kind: "marker" },
        source: "1",
      });
    });

    it("keeps negative indices for counting from the end", () => {
      expect(parseSelector("-1").field).toBe(-1);
    });

    it("shifts positive indices with oneBased", () => {
      expect(parseSelector("1", { oneBased: true }).field).toBe(0);
      expect(parseSelector("-2", { oneBased: true }).field).toBe(-2);
    });

    it("rejects field 0 with oneBased", () => {
      expect(() => parseSelector("0", { oneBased: true })).toThrow(
        "field index '0' must be at least 1 with --one-based",
      );
    });

    it("rejects non-numeric fields", () => {
      expect(() => parseSelector("x:red")).toThrow("invalid field index 'x'");
      expect(() => parseSelector("1.5")).toThrow("invalid field index '1.5'");
    });
  });

  describe("style", () => {
    it("parses field:color", () => {
      expect(parseSelector("1:red")).toEqual({
        field: 1,
        chars: null,
        style: { kind: "ansi", name: "red", open: "\x1b[31m" },
        source: "1:red",
      });
    });

    it("parses field:size", () => {
      expect(parseSelector("1:size").style).toEqual({ kind: "size" });
    });

    it("names the unknown color", () => {
      expect(() => parseSelector("1:purple")).toThrow("unknown color 'purple'");
    });
  });

  describe("character range", () => {
    it("parses a single offset", () => {
      expect(parseSelector("0:3").chars).toEqual({ start: 3, end: 4 });
    });

    it("parses an inclusive range", () => {
      expect(parseSelector("0:1-3").chars).toEqual({ start: 1, end: 4 });
    });

    it("parses an open-ended range", () => {
      expect(parseSelector("0:2-").chars).toEqual({ start: 2, end: null });
    });

    it("parses offset+length", () => {
      expect(parseSelector("0:2+3").chars).toEqual({ start: 2, end: 5 });
    });

    it("shifts offsets with oneBased", () => {
      expect(parseSelector("1:1-3", { oneBased: true }).chars).toEqual({
        start: 0,
        end: 3,
      });
    });

    it("combines range and style", () => {
      const selector = parseSelector("2:0-1:green");
      expect(selector.field).toBe(2);
      expect(selector.chars).toEqual({ start: 0, end: 2 });
      expect(selector.style).toMatchObject({ name: "green" });
    });

    it("rejects backwards and empty ranges", () => {
      expect(() => parseSelector("0:5-2")).toThrow(
        "character range '5-2' ends before it starts",
      );
      expect(() => parseSelector("0:2+0")).toThrow(
        "empty character range '2+0'",
      );
    });

    it("rejects offset 0 with oneBased", () => {
      expect(() => parseSelector("1:0-2", { oneBased: true })).toThrow(
        "character offset '0' must be at least 1 with --one-based",
      );
    });
  });

  describe("malformed selectors", () => {
    it("rejects empty parts", () => {
      expect(() => parseSelector("")).toThrow("empty part in selector ''");
      expect(() => parseSelector("1:")).toThrow("empty part in selector '1:'");
    });

    it("rejects too many parts", () => {
      expect(() => parseSelector("1:2:red:x")).toThrow(
        "too many ':' separated parts in selector '1:2:red:x'",
      );
    });

    it("requires a range before a third part", () => {
      expect(() => parseSelector("1:red:green")).toThrow(
        "expected a character range, got 'red'",
      );
    });

    it("reports the offending token", () => {
      try {
        parseSelector("1:red:green");
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(SelectorParseError);
        if (e instanceof SelectorParseError) {
          expect(e.token).toBe("red");
        }
      }
    });
  });
});
