import { describe, it, expect } from "vitest";
import { InvalidCountError } from "@/lib/spell/errors";
import { WordFrequency } from "@/lib/spell/word-frequency";

const sumOf = (wf: WordFrequency) => [...wf.items()].reduce((acc, [, c]) => acc + c, 0);

describe("WordFrequency", () => {
  it("stores added counts", () => {
    const wf = new WordFrequency();
    wf.add("apple", 3);
    expect(wf.query("apple")).toBe(3);
    expect(wf.contains("apple")).toBe(true);
    expect(wf.totalWords).toBe(3);
  });

  it("accumulates repeated adds", () => {
    const wf = new WordFrequency();
    wf.add("apple");
    wf.add("Apple", 4);
    expect(wf.query("APPLE")).toBe(5);
    expect(wf.size).toBe(1);
  });

  it("returns 0 for absent words, even on an empty store", () => {
    const wf = new WordFrequency();
    expect(wf.query("nothing")).toBe(0);
    expect(wf.contains("nothing")).toBe(false);
    expect(wf.wordUsageFrequency("nothing")).toBe(0);
  });

  it.each([0, -2, 1.5, Number.NaN])("rejects count %s", count => {
    const wf = new WordFrequency();
    expect(() => wf.add("apple", count)).toThrow(InvalidCountError);
    expect(wf.size).toBe(0);
    expect(wf.totalWords).toBe(0);
  });

  it("removes whole entries and ignores absent words", () => {
    const wf = new WordFrequency();
    wf.addMany({ apple: 3, pear: 2 });
    wf.remove("apple");
    expect(wf.query("apple")).toBe(0);
    expect(wf.totalWords).toBe(2);
    wf.remove("apple");
    wf.remove("plum");
    expect(wf.totalWords).toBe(2);
  });

  it("keeps letters after removal", () => {
    const wf = new WordFrequency();
    wf.add("zoo");
    wf.remove("zoo");
    expect([...wf.letters].sort()).toEqual(["o", "z"]);
  });

  it("keeps total equal to the sum of counts across mutations", () => {
    const wf = new WordFrequency();
    wf.addMany(["a", "b", "a", "c"]);
    wf.addMany(new Map([["d", 4], ["a", 1]]));
    wf.removeMany(["b", "missing"]);
    wf.pop("c");
    wf.add("e", 7);
    expect(wf.totalWords).toBe(sumOf(wf));
    expect(wf.totalWords).toBe(14);
  });

  it("validates a mapping before adding any of it", () => {
    const wf = new WordFrequency();
    expect(() => wf.addMany({ good: 2, bad: 0 })).toThrow(InvalidCountError);
    expect(wf.contains("good")).toBe(false);
  });

  it("accumulates counts from loadWords and loadText", () => {
    const wf = new WordFrequency();
    wf.loadWords(["the", "cat", "The"]);
    wf.loadText("The dog chased the cat's toy.");
    expect(wf.query("the")).toBe(4);
    expect(wf.query("cat")).toBe(1);
    expect(wf.query("cat's")).toBe(1);
    expect(wf.totalWords).toBe(9);
  });

  it("removes counts strictly below a threshold", () => {
    const wf = new WordFrequency();
    wf.addMany({ rare: 1, edge: 5, common: 9 });
    expect(wf.removeByThreshold(5)).toBe(1);
    expect([...wf.uniqueWords()].sort()).toEqual(["common", "edge"]);
    expect(wf.totalWords).toBe(14);
  });

  it("compacts with the configured threshold only", () => {
    const plain = new WordFrequency();
    plain.addMany({ rare: 1 });
    expect(plain.compact()).toBe(0);

    const wf = new WordFrequency({ threshold: 3 });
    wf.addMany({ rare: 1, odd: 2, kept: 3 });
    expect(wf.compact()).toBe(2);
    expect([...wf.keys()]).toEqual(["kept"]);
  });

  it("computes usage frequency from the running total", () => {
    const wf = new WordFrequency();
    wf.addMany({ one: 1, three: 3 });
    expect(wf.wordUsageFrequency("three")).toBe(0.75);
  });

  it("pops with a fallback", () => {
    const wf = new WordFrequency();
    wf.add("kiwi", 2);
    expect(wf.pop("KIWI")).toBe(2);
    expect(wf.pop("kiwi", -1)).toBe(-1);
    expect(wf.pop("kiwi")).toBeUndefined();
  });

  it("honors case sensitivity", () => {
    const wf = new WordFrequency({ caseSensitive: true });
    wf.add("Paris");
    expect(wf.contains("Paris")).toBe(true);
    expect(wf.contains("paris")).toBe(false);
    expect(wf.normalize("Paris")).toBe("Paris");
  });

  it("normalizes idempotently", () => {
    const wf = new WordFrequency();
    for (const w of ["MiXeD", "straße", "ÉCOLE"]) {
      expect(wf.normalize(wf.normalize(w))).toBe(wf.normalize(w));
    }
  });

  it("tracks the longest word through removals", () => {
    const wf = new WordFrequency();
    wf.addMany(["hi", "hello", "héllo"]);
    expect(wf.longestWordLength).toBe(5);
    wf.removeMany(["hello", "héllo"]);
    expect(wf.longestWordLength).toBe(2);
  });

  it("keeps a __proto__ word through export and reload", () => {
    const wf = new WordFrequency();
    const loaded: Record<string, number> = JSON.parse('{"__proto__": 3, "cat": 2}');
    wf.addMany(loaded);
    expect(wf.query("__proto__")).toBe(3);

    const snapshot = wf.export();
    expect(Object.keys(snapshot)).toEqual(["__proto__", "cat"]);
    expect(JSON.stringify(snapshot)).toBe('{"__proto__":3,"cat":2}');

    const copy = new WordFrequency();
    copy.addMany(snapshot);
    expect(copy.query("__proto__")).toBe(3);
    expect(copy.totalWords).toBe(5);
  });

  it("exports sorted counts that reload to the same store", () => {
    const wf = new WordFrequency();
    wf.addMany({ pear: 2, apple: 5 });
    const snapshot = wf.export();
    expect(Object.keys(snapshot)).toEqual(["apple", "pear"]);

    const copy = new WordFrequency();
    copy.addMany(snapshot);
    for (const w of wf.words()) expect(copy.query(w)).toBe(wf.query(w));
    expect(copy.totalWords).toBe(wf.totalWords);
  });
});
