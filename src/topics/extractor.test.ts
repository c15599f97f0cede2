/**
 * Topic extractor tests.
 *
 * Run: node --import tsx --test src/topics/extractor.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import type { ExtractionConfig } from "../config/workflow/index.js";
import { ScriptedTopicExtraction } from "../testing/fakes.js";
import { ExtractionFailedError } from "../types/errors.js";
import { TopicExtractor } from "./extractor.js";

const CONFIG: ExtractionConfig = {
  targetTopicCount: 2,
  batchSize: 2,
  maxExcerpts: 50,
  retrievalQuery: "",
  retries: 1,
};

function extractor(capability: ScriptedTopicExtraction, config: Partial<ExtractionConfig> = {}) {
  return new TopicExtractor({ capability, config: { ...CONFIG, ...config } });
}

test("batches accumulate weight and keep the heaviest topics", async () => {
  const capability = new ScriptedTopicExtraction([
    [{ name: "Graphs" }, { name: "Trees", weight: 2 }],
    [{ name: "graphs" }, { name: "Heaps" }],
  ]);

  const set = await extractor(capability).extract(["one", "two", "three"]);

  assert.deepEqual(
    set.topics.map((topic) => [topic.id, topic.weight]),
    [
      ["graphs", 0.5],
      ["trees", 0.5],
    ]
  );
  assert.equal(set.revision, 0);
  assert.equal(capability.calls.length, 2);
  assert.deepEqual(capability.calls[0]?.excerpts, ["one", "two"]);
  assert.deepEqual(capability.calls[1]?.knownTopics, ["Graphs", "Trees"]);
  assert.equal(capability.calls[1]?.targetCount, 2);
});

test("a failed call is retried", async () => {
  const capability = new ScriptedTopicExtraction([new Error("timeout"), [{ name: "Sorting" }]]);

  const set = await extractor(capability).extract(["excerpt"]);

  assert.equal(capability.calls.length, 2);
  assert.deepEqual(
    set.topics.map((topic) => topic.name),
    ["Sorting"]
  );
});

test("exhausted retries surface as ExtractionFailed", async () => {
  const capability = new ScriptedTopicExtraction([new Error("timeout")]);

  await assert.rejects(
    () => extractor(capability).extract(["excerpt"]),
    (err: unknown) =>
      err instanceof ExtractionFailedError &&
      err.message === "Topic extraction failed on batch 1 of 1: timeout"
  );
  assert.equal(capability.calls.length, 2);
});

test("malformed output counts as a failure", async () => {
  const capability = new ScriptedTopicExtraction([[{ name: "   " }]]);

  await assert.rejects(() => extractor(capability).extract(["excerpt"]), ExtractionFailedError);
  assert.equal(capability.calls.length, 2);
});

test("no usable topics is a failure", async () => {
  const capability = new ScriptedTopicExtraction([[]]);

  await assert.rejects(
    () => extractor(capability).extract(["excerpt"]),
    (err: unknown) =>
      err instanceof ExtractionFailedError &&
      err.message === "Topic extraction returned no usable topics"
  );
});

test("blank excerpts are not sent at all", async () => {
  const capability = new ScriptedTopicExtraction([[{ name: "Unused" }]]);

  await assert.rejects(() => extractor(capability).extract(["  ", ""]), ExtractionFailedError);
  assert.equal(capability.calls.length, 0);
});

test("excerpts beyond the configured maximum are dropped", async () => {
  const capability = new ScriptedTopicExtraction([[{ name: "Hashing" }]]);

  await extractor(capability, { maxExcerpts: 2, batchSize: 10 }).extract(["a", "b", "c"]);

  assert.deepEqual(capability.calls[0]?.excerpts, ["a", "b"]);
});
