/**
 * Weighted topic set tests.
 *
 * Run: node --import tsx --test src/topics/weighted-set.test.ts
 *
 * Covers normalization, ID allocation and the merge rules, including the
 * two ordering properties:
 *   - independent diffs give the same set in either order
 *   - a reweight and a removal touching each other's weights do not commute
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { EmptyTopicSetError } from "../types/errors.js";
import type { WeightedTopicSet } from "./schema.js";
import {
  allocateTopicId,
  createTopicSet,
  describeTopicSet,
  isEffectiveDiff,
  isNormalized,
  merge,
  normalize,
  slugifyTopicName,
} from "./weighted-set.js";

function weightsById(set: WeightedTopicSet): Record<string, number> {
  return Object.fromEntries(set.topics.map((topic) => [topic.id, topic.weight]));
}

function assertClose(actual: number | undefined, expected: number): void {
  assert.ok(actual !== undefined, "weight missing");
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTION AND NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

describe("createTopicSet", () => {
  test("folds repeated names and normalizes", () => {
    const set = createTopicSet([{ name: "Graphs" }, { name: "Trees" }, { name: " graphs " }]);

    assert.deepEqual(
      set.topics.map((topic) => topic.id),
      ["graphs", "trees"]
    );
    assertClose(weightsById(set).graphs, 2 / 3);
    assertClose(weightsById(set).trees, 1 / 3);
    assert.equal(set.revision, 0);
    assert.ok(isNormalized(set.topics));
  });

  test("drops seeds with zero weight", () => {
    const set = createTopicSet([{ name: "Sorting", weight: 0 }, { name: "Hashing", weight: 4 }]);

    assert.deepEqual(
      set.topics.map((topic) => topic.name),
      ["Hashing"]
    );
    assert.equal(set.topics[0]?.weight, 1);
  });

  test("fails when nothing remains", () => {
    assert.throws(() => createTopicSet([]), EmptyTopicSetError);
  });
});

describe("normalize", () => {
  test("preserves ratios and sums to one", () => {
    const topics = normalize([
      { id: "a", name: "A", weight: 2, tags: [] },
      { id: "b", name: "B", weight: 6, tags: [] },
    ]);

    assert.equal(topics[0]?.weight, 0.25);
    assert.equal(topics[1]?.weight, 0.75);
    assert.ok(isNormalized(topics));
  });

  test("huge finite weights still sum to one", () => {
    const topics = normalize([
      { id: "a", name: "A", weight: 1e308, tags: [] },
      { id: "b", name: "B", weight: 1e308, tags: [] },
    ]);

    assert.equal(topics[0]?.weight, 0.5);
    assert.equal(topics[1]?.weight, 0.5);
    assert.ok(isNormalized(topics));
  });

  test("rejects negative weights", () => {
    assert.throws(() => normalize([{ id: "a", name: "A", weight: -1, tags: [] }]), RangeError);
  });

  test("rejects a zero total", () => {
    assert.throws(
      () => normalize([{ id: "a", name: "A", weight: 0, tags: [] }]),
      EmptyTopicSetError
    );
  });
});

describe("topic ids", () => {
  test("slugs strip accents and punctuation", () => {
    assert.equal(slugifyTopicName("Café au Lait!"), "cafe-au-lait");
    assert.equal(slugifyTopicName("???"), "topic");
  });

  test("collisions get a numeric suffix", () => {
    assert.equal(allocateTopicId("Graphs", new Set(["graphs", "graphs-2"])), "graphs-3");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// MERGE
// ═══════════════════════════════════════════════════════════════════════════

describe("merge", () => {
  const pair = createTopicSet([{ name: "A" }, { name: "B" }]);

  test("increments the revision by one", () => {
    const { set } = merge(pair, { add: [{ name: "C" }] });

    assert.equal(set.revision, 1);
    assert.deepEqual(
      set.topics.map((topic) => topic.id),
      ["a", "b", "c"]
    );
    assertClose(weightsById(set).c, 1 / 3);
  });

  test("removing and re-adding a topic keeps its id", () => {
    const { set, applied } = merge(pair, { remove: ["A"], add: [{ name: "a" }] });

    assert.deepEqual(
      set.topics.map((topic) => topic.id),
      ["a", "b"]
    );
    assert.deepEqual(applied.removed, []);
    assert.deepEqual(applied.added, []);
    assert.deepEqual(applied.reweighted, [{ id: "a", weight: 0.5 }]);
  });

  test("remove wins over a reweight of the same topic", () => {
    const { set, applied } = merge(pair, { remove: ["B"], reweight: [{ topic: "b", weight: 0.9 }] });

    assert.deepEqual(weightsById(set), { a: 1 });
    assert.deepEqual(applied.removed, ["b"]);
    assert.deepEqual(applied.ignored, ["b"]);
  });

  test("a reweight to zero removes the topic", () => {
    const { set, applied } = merge(pair, { reweight: [{ topic: "A", weight: 0 }] });

    assert.deepEqual(weightsById(set), { b: 1 });
    assert.deepEqual(applied.removed, ["a"]);
  });

  test("reweights near the largest finite number keep the set normalized", () => {
    const { set } = merge(pair, {
      reweight: [
        { topic: "A", weight: 1.5e308 },
        { topic: "B", weight: 1.5e308 },
      ],
    });

    assert.deepEqual(weightsById(set), { a: 0.5, b: 0.5 });
    assert.ok(isNormalized(set.topics));
  });

  test("a new topic beside huge weights gets a finite share", () => {
    const { set } = merge(pair, {
      reweight: [
        { topic: "A", weight: 1.5e308 },
        { topic: "B", weight: 1.5e308 },
      ],
      add: [{ name: "C" }],
    });

    assertClose(weightsById(set).c, 1 / 3);
    assert.ok(isNormalized(set.topics));
  });

  test("unknown references are ignored", () => {
    const { set, applied } = merge(pair, { remove: ["Z"] });

    assert.deepEqual(applied.ignored, ["Z"]);
    assert.equal(isEffectiveDiff(applied), false);
    assert.equal(set.revision, 1);
  });

  test("removing every topic is rejected and leaves the base intact", () => {
    assert.throws(() => merge(pair, { remove: ["A", "B"] }), EmptyTopicSetError);
    assert.equal(pair.revision, 0);
    assert.equal(pair.topics.length, 2);
  });

  test("independent diffs give the same set in either order", () => {
    const base = createTopicSet([{ name: "X" }, { name: "Y" }, { name: "B" }]);
    const addA = { add: [{ name: "A" }] };
    const removeB = { remove: ["B"] };

    const first = merge(merge(base, addA).set, removeB).set;
    const second = merge(merge(base, removeB).set, addA).set;

    assert.deepEqual(
      first.topics.map((topic) => topic.id),
      second.topics.map((topic) => topic.id)
    );
    for (const topic of first.topics) {
      assertClose(weightsById(second)[topic.id], topic.weight);
      assertClose(topic.weight, 1 / 3);
    }
    assert.equal(first.revision, 2);
    assert.equal(second.revision, 2);
  });

  test("reweight then remove differs from remove then reweight", () => {
    const base = createTopicSet([
      { name: "X", weight: 5 },
      { name: "Y", weight: 3 },
      { name: "Z", weight: 2 },
    ]);
    const reweightX = { reweight: [{ topic: "X", weight: 0.6 }] };
    const removeY = { remove: ["Y"] };

    const reweightFirst = merge(merge(base, reweightX).set, removeY).set;
    const removeFirst = merge(merge(base, removeY).set, reweightX).set;

    assertClose(weightsById(reweightFirst).x, 0.75);
    assertClose(weightsById(reweightFirst).z, 0.25);
    assertClose(weightsById(removeFirst).x, 21 / 31);
    assertClose(weightsById(removeFirst).z, 10 / 31);
  });
});

test("describeTopicSet lists topics with percentages", () => {
  assert.equal(
    describeTopicSet(createTopicSet([{ name: "A" }, { name: "B", weight: 3 }])),
    "1. A (25.0%)\n2. B (75.0%)"
  );
});
