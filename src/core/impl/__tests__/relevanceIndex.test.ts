import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../errors.js";
import { BetaEstimator } from "../betaEstimator.js";
import { RelevanceIndex } from "../relevanceIndex.js";

const sprites = new Map([
  ["alpha", "render sprite canvas"],
  ["beta", "render sprite canvas extra"],
  ["gamma", "physics gravity"],
]);

describe("RelevanceIndex.search", () => {
  it("ranks the matching document and leaves out unrelated ones", () => {
    const index = RelevanceIndex.build({
      "canvas-2d": "canvas draw fillRect",
      physics: "collision gravity velocity",
    });
    const hits = index.search("draw 2d graphics", 5);
    expect(hits.map((h) => h.name)).toEqual(["canvas-2d"]);
    expect(hits[0]?.score).toBeGreaterThan(0);
  });

  it("orders by descending similarity", () => {
    const index = RelevanceIndex.build(
      new Map([
        ["d1", "hello world world"],
        ["d2", "hello there"],
        ["d3", "unrelated"],
      ]),
    );
    const hits = index.search("hello world", 5);
    expect(hits.map((h) => h.name)).toEqual(["d1", "d2"]);
    expect(hits[0]?.score ?? 0).toBeGreaterThan(hits[1]?.score ?? 0);
  });

  it("breaks ties by insertion order", () => {
    const index = RelevanceIndex.build(
      new Map([
        ["b", "shared word"],
        ["a", "shared word"],
      ]),
    );
    expect(index.search("shared", 5).map((h) => h.name)).toEqual(["b", "a"]);
  });

  it("keeps the given order for Map input, property order for object input", () => {
    const pairs: Array<readonly [string, string]> = [
      ["b", "shared word"],
      ["10", "shared word"],
      ["2", "shared word"],
    ];
    expect(RelevanceIndex.build(new Map(pairs)).search("shared", 5).map((h) => h.name)).toEqual(["b", "10", "2"]);
    expect(RelevanceIndex.build(pairs).names()).toEqual(["b", "10", "2"]);

    const record = RelevanceIndex.build({ b: "shared word", "10": "shared word", "2": "shared word" });
    expect(record.search("shared", 5).map((h) => h.name)).toEqual(["2", "10", "b"]);
  });

  it("caps results at topK", () => {
    const index = RelevanceIndex.build(sprites);
    expect(index.search("render sprite canvas", 1).map((h) => h.name)).toEqual(["alpha"]);
    expect(index.search("render sprite canvas", 0)).toEqual([]);
  });

  it("returns nothing for a blank or unknown query", () => {
    const index = RelevanceIndex.build(sprites);
    expect(index.search("", 5)).toEqual([]);
    expect(index.search("   ", 5)).toEqual([]);
    expect(index.search("zzz qqq", 5)).toEqual([]);
  });

  it("handles an empty index", () => {
    const index = RelevanceIndex.build({});
    expect(index.size).toBe(0);
    expect(index.search("anything", 5)).toEqual([]);
    expect(index.searchWithBoost("anything", 5)).toEqual([]);
  });

  it("rejects a negative or fractional topK", () => {
    const index = RelevanceIndex.build(sprites);
    expect(() => index.search("render", -1)).toThrow(InvalidInputError);
    expect(() => index.search("render", 1.5)).toThrow(InvalidInputError);
  });

  it("rejects duplicate names", () => {
    const docs: Array<readonly [string, string]> = [
      ["x", "one"],
      ["x", "two"],
    ];
    expect(() => RelevanceIndex.build(docs)).toThrow("documents.x duplicate document name");
  });

  it("exposes names in insertion order", () => {
    const index = RelevanceIndex.build(sprites);
    expect(index.size).toBe(3);
    expect(index.names()).toEqual(["alpha", "beta", "gamma"]);
    expect(index.has("beta")).toBe(true);
    expect(index.has("delta")).toBe(false);
  });

  it("uses a custom scorer when given", () => {
    const index = RelevanceIndex.build(sprites, { scorer: () => 0.5 });
    const hits = index.search("render", 5);
    expect(hits).toEqual([
      { name: "alpha", score: 0.5 },
      { name: "beta", score: 0.5 },
      { name: "gamma", score: 0.5 },
    ]);
  });

  it("finds nothing on a two-document corpus under plain idf", () => {
    const index = RelevanceIndex.build(
      { "canvas-2d": "canvas draw fillRect", physics: "collision gravity velocity" },
      { idfMode: "plain" },
    );
    expect(index.search("draw 2d graphics", 5)).toEqual([]);
  });
});

describe("RelevanceIndex.searchWithBoost", () => {
  const index = RelevanceIndex.build(sprites);

  it("matches plain order when nobody has observations", () => {
    const plain = index.search("render sprite canvas", 5);
    const boosted = index.searchWithBoost("render sprite canvas", 5);
    expect(boosted.map((h) => h.name)).toEqual(plain.map((h) => h.name));
    expect(boosted[0]?.score).toBeCloseTo((plain[0]?.score ?? 0) * 0.5, 12);
  });

  it("lets a proven subject overtake a slightly closer unproven one", () => {
    expect(index.search("render sprite canvas", 5).map((h) => h.name)).toEqual(["alpha", "beta"]);

    const stats = new Map([["beta", { successes: 9, total: 10 }]]);
    const boosted = index.searchWithBoost("render sprite canvas", 5, stats);
    expect(boosted.map((h) => h.name)).toEqual(["beta", "alpha"]);

    const betaPlain = index.search("render sprite canvas", 5)[1]?.score ?? 0;
    expect(boosted[0]?.score).toBeCloseTo(betaPlain * (10 / 12), 12);
  });

  it("accepts estimators as boost sources", () => {
    const stats = new Map([["beta", BetaEstimator.fromStats(9, 10)]]);
    expect(index.searchWithBoost("render sprite canvas", 5, stats).map((h) => h.name)).toEqual(["beta", "alpha"]);
  });

  it("treats zero observations as neutral", () => {
    const stats = new Map([["beta", { successes: 0, total: 0 }]]);
    expect(index.searchWithBoost("render sprite canvas", 5, stats).map((h) => h.name)).toEqual(["alpha", "beta"]);
  });

  it("never promotes a zero-similarity subject", () => {
    const stats = new Map([["gamma", { successes: 100, total: 100 }]]);
    const hits = index.searchWithBoost("render sprite canvas", 3, stats);
    expect(hits.map((h) => h.name)).toEqual(["alpha", "beta"]);
  });

  it("widens the candidate window beyond topK", () => {
    const stats = new Map([["beta", { successes: 9, total: 10 }]]);
    expect(index.searchWithBoost("render sprite canvas", 1, stats).map((h) => h.name)).toEqual(["beta"]);

    const narrow = RelevanceIndex.build(sprites, { candidateFactor: 1 });
    expect(narrow.searchWithBoost("render sprite canvas", 1, stats).map((h) => h.name)).toEqual(["alpha"]);
  });

  it("uses the configured neutral boost", () => {
    const generous = RelevanceIndex.build(sprites, { neutralBoost: 1 });
    const plain = generous.search("render sprite canvas", 5);
    expect(generous.searchWithBoost("render sprite canvas", 5)).toEqual(plain);
  });

  it("rejects invalid options", () => {
    expect(() => RelevanceIndex.build(sprites, { neutralBoost: 1.5 })).toThrow(InvalidInputError);
    expect(() => RelevanceIndex.build(sprites, { candidateFactor: 0 })).toThrow(InvalidInputError);
  });
});
