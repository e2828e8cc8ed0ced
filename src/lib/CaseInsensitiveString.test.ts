/**
 * Unit tests for CaseInsensitiveString
 */

import { CaseInsensitiveString } from "./CaseInsensitiveString";

describe("CaseInsensitiveString", () => {
  describe("value accessors", () => {
    it("should keep the original text and cache the lower-cased form", () => {
      const value = new CaseInsensitiveString("Photo.JPG");
      expect(value.toString()).toBe("Photo.JPG");
      expect(value.lower()).toBe("photo.jpg");
      expect(value.length).toBe(9);
    });
  });

  describe("comparisons", () => {
    it("should compare equal regardless of case", () => {
      const value = new CaseInsensitiveString("JPG");
      expect(value.equalsFold("jpg")).toBe(true);
      expect(value.equalsFold("Jpg")).toBe(true);
      expect(value.equalsFold(new CaseInsensitiveString("jPg"))).toBe(true);
      expect(value.notEqualsFold("png")).toBe(true);
      expect(value.notEqualsFold("jpg")).toBe(false);
    });

    it("should order by the lower-cased form", () => {
      expect(new CaseInsensitiveString("apple").compareFold("BANANA")).toBe(-1);
      expect(new CaseInsensitiveString("Zebra").compareFold("apple")).toBe(1);
      expect(new CaseInsensitiveString("ABC").compareFold("abc")).toBe(0);
    });

    it("should answer relational queries case-insensitively", () => {
      const value = new CaseInsensitiveString("ABC");
      expect(value.lessThan("abd")).toBe(true);
      expect(value.lessThanOrEqual("abc")).toBe(true);
      expect(value.greaterThan("ABB")).toBe(true);
      expect(value.greaterThanOrEqual("abc")).toBe(true);
      expect(value.greaterThan("abc")).toBe(false);
    });

    it("should share hash keys between case variants", () => {
      const counts = new Map<string, number>();
      for (const ext of ["JPG", "jpg", "Jpg", "png"]) {
        const key = new CaseInsensitiveString(ext).hashKey();
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }

      expect(counts.size).toBe(2);
      expect(counts.get(new CaseInsensitiveString("jPG").hashKey())).toBe(3);
    });
  });

  describe("substring queries", () => {
    const value = new CaseInsensitiveString("Hello World");

    it("should find contained text", () => {
      expect(value.containsFold("LO wO")).toBe(true);
      expect(value.containsFold("planet")).toBe(false);
    });

    it("should count non-overlapping occurrences", () => {
      expect(new CaseInsensitiveString("BaNaNa").countFold("AN")).toBe(2);
      expect(new CaseInsensitiveString("BaNaNa").countFold("a", 2)).toBe(2);
      expect(new CaseInsensitiveString("AAAA").countFold("aa")).toBe(2);
      expect(new CaseInsensitiveString("BaNaNa").countFold("")).toBe(7);
      expect(new CaseInsensitiveString("abc").countFold("a", 5)).toBe(0);
    });

    it("should find from the left", () => {
      expect(value.findFold("O")).toBe(4);
      expect(value.findFold("o", 5)).toBe(7);
      expect(value.findFold("o", 5, 7)).toBe(-1);
      expect(value.findFold("l", -3)).toBe(9);
      expect(value.findFold("xyz")).toBe(-1);
      expect(value.findFold("o", 20)).toBe(-1);
    });

    it("should find from the right", () => {
      expect(value.rfindFold("O")).toBe(7);
      expect(value.rfindFold("o", 0, 6)).toBe(4);
      expect(value.rfindFold("o", 5, 7)).toBe(-1);
    });

    it("should throw from index lookups when text is absent", () => {
      expect(value.indexFold("WORLD")).toBe(6);
      expect(value.rindexFold("L")).toBe(9);
      expect(() => value.indexFold("xyz")).toThrow(RangeError);
      expect(() => value.rindexFold("xyz")).toThrow("Substring not found: xyz");
    });

    it("should match prefixes and suffixes", () => {
      expect(value.startsWithFold("HELLO")).toBe(true);
      expect(value.startsWithFold("world", 6)).toBe(true);
      expect(value.endsWithFold("WORLD")).toBe(true);
      expect(value.endsWithFold("hello", 0, 5)).toBe(true);
      expect(value.endsWithFold("hello")).toBe(false);
      expect(value.startsWithFold("", 12)).toBe(false);
    });

    it("should find nothing in a window that ends before it starts", () => {
      const short = new CaseInsensitiveString("abc");
      expect(short.findFold("", 2, 1)).toBe(-1);
      expect(short.rfindFold("", 2, 1)).toBe(-1);
      expect(short.countFold("", 2, 1)).toBe(0);
      expect(short.startsWithFold("", 2, 1)).toBe(false);
      expect(short.endsWithFold("", 2, 1)).toBe(false);
      expect(() => short.indexFold("", 2, 1)).toThrow(RangeError);
    });

    it("should treat an empty window as holding the empty string", () => {
      const short = new CaseInsensitiveString("abc");
      expect(short.findFold("", 2, 2)).toBe(2);
      expect(short.countFold("", 2, 2)).toBe(1);
      expect(short.startsWithFold("", 3)).toBe(true);
    });
  });
});
