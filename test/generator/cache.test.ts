import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createDatasetCache } from "../../src/generator/cache.js";
import { smallConfig } from "../fixtures/config.js";

describe("createDatasetCache", () => {
  it("generates once per seed", () => {
    const cache = createDatasetCache(smallConfig());
    const first = cache.get(42);
    const second = cache.get(42);
    assert.strictEqual(second, first);
    assert.equal(cache.generations, 1);
  });

  it("regenerates when the seed changes", () => {
    const cache = createDatasetCache(smallConfig());
    const first = cache.get(42);
    const other = cache.get(43);
    assert.notStrictEqual(other, first);
    assert.equal(cache.generations, 2);
  });

  it("holds only the latest seed", () => {
    const cache = createDatasetCache(smallConfig());
    const first = cache.get(42);
    cache.get(43);
    const again = cache.get(42);
    assert.equal(cache.generations, 3);
    assert.notStrictEqual(again, first);
    assert.deepStrictEqual(again, first);
  });

  it("regenerates after invalidate", () => {
    const cache = createDatasetCache(smallConfig());
    cache.get(42);
    cache.invalidate();
    cache.get(42);
    assert.equal(cache.generations, 2);
  });

  it("does not cache a failed generation", () => {
    const cache = createDatasetCache(smallConfig());
    assert.throws(() => cache.get(0.5));
    assert.equal(cache.generations, 0);
  });
});
