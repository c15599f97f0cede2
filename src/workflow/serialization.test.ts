/**
 * Workflow state serialization tests.
 *
 * Run: node --import tsx --test src/workflow/serialization.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createTopicSet } from "../topics/weighted-set.js";
import { SnapshotInvalidError } from "../types/errors.js";
import type { WorkflowState } from "./schema.js";
import {
  deserializeWorkflowState,
  isVersionCompatible,
  serializeWorkflowState,
  summarizeWorkflowState,
} from "./serialization.js";

const STATE: WorkflowState = {
  version: "1.0.0",
  sessionId: "session-1",
  documentsRef: "docs-1",
  phase: "negotiation",
  negotiation: {
    status: "awaiting_feedback",
    topics: createTopicSet([{ name: "Graphs" }, { name: "Trees" }]),
    revision: 0,
    rounds: 0,
    history: [],
    confirmation: null,
  },
  quiz: null,
  report: null,
  failure: null,
  warnings: [],
  sequence: 1,
  createdAt: "2025-01-01T00:00:00.000Z",
  updatedAt: "2025-01-01T00:00:00.000Z",
};

test("a serialized state restores identically and frozen", () => {
  const restored = deserializeWorkflowState(serializeWorkflowState(STATE));

  assert.deepEqual(restored, STATE);
  assert.ok(Object.isFrozen(restored));
  assert.ok(Object.isFrozen(restored.negotiation.topics?.topics));
});

test("invalid JSON is refused", () => {
  assert.throws(
    () => deserializeWorkflowState("{ nope"),
    (err: unknown) =>
      err instanceof SnapshotInvalidError &&
      err.message.startsWith("Failed to parse workflow state JSON:")
  );
});

test("records that do not match the schema are refused", () => {
  assert.throws(
    () => deserializeWorkflowState(JSON.stringify({ ...STATE, phase: "paused" })),
    (err: unknown) =>
      err instanceof SnapshotInvalidError && err.message.startsWith("Invalid workflow state: phase:")
  );
});

test("a different major version is refused", () => {
  assert.throws(
    () => deserializeWorkflowState(JSON.stringify({ ...STATE, version: "2.0.0" })),
    (err: unknown) =>
      err instanceof SnapshotInvalidError &&
      err.message ===
        "Incompatible workflow state version: 2.0.0 (current: 1.0.0). Migration may be required."
  );
  assert.equal(isVersionCompatible("1.4.2"), true);
});

test("summary lists the topics under review", () => {
  const lines = summarizeWorkflowState(STATE).split("\n");

  assert.deepEqual(lines.slice(0, 10), [
    "=== Workflow Session ===",
    "Session: session-1",
    "Version: 1.0.0",
    "Phase: negotiation",
    "Updated: 2025-01-01T00:00:00.000Z",
    "",
    "--- Topics ---",
    "Status: awaiting_feedback (revision 0, 0 feedback round(s))",
    "1. Graphs (50.0%)",
    "2. Trees (50.0%)",
  ]);
});
