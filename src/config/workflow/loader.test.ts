/**
 * Workflow configuration tests.
 *
 * Run: node --import tsx --test src/config/workflow/loader.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  DEFAULT_WORKFLOW_CONFIG,
  WorkflowConfigError,
  loadWorkflowConfig,
  loadWorkflowConfigFile,
  mergeWorkflowConfig,
  validateWorkflowConfig,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

test("defaults load and are frozen", () => {
  const config = loadWorkflowConfig(DEFAULT_WORKFLOW_CONFIG);

  assert.equal(config.quiz.questionCount, 20);
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.quiz.difficultyDistribution));
});

test("merge keeps untouched settings of a partially overridden section", () => {
  const config = loadWorkflowConfig(mergeWorkflowConfig({ quiz: { questionCount: 5 } }));

  assert.equal(config.quiz.questionCount, 5);
  assert.equal(config.quiz.minQuestionsPerTopic, 1);
  assert.equal(config.negotiation.maxFeedbackRounds, 10);
});

test("unknown keys are rejected", () => {
  const result = validateWorkflowConfig(mergeWorkflowConfig({ quiz: { questionCnt: 5 } }));

  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.code, "unrecognized_keys");
  assert.deepEqual(result.errors?.[0]?.path, ["quiz"]);
});

test("a distribution without any positive share is rejected", () => {
  assert.throws(
    () =>
      loadWorkflowConfig(
        mergeWorkflowConfig({ quiz: { difficultyDistribution: { easy: 0, medium: 0, hard: 0 } } })
      ),
    (err: unknown) =>
      err instanceof WorkflowConfigError &&
      err.format().includes("quiz.difficultyDistribution: At least one difficulty needs a positive share")
  );
});

test("non-object input is reported at the root", () => {
  const result = validateWorkflowConfig(mergeWorkflowConfig("not a config"));

  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, []);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

test("config files are merged onto the defaults", () => {
  const dir = mkdtempSync(join(tmpdir(), "workflow-config-"));
  try {
    const file = join(dir, "workflow.json");
    writeFileSync(file, JSON.stringify({ negotiation: { maxFeedbackRounds: 3 } }));

    const config = loadWorkflowConfigFile(file);
    assert.equal(config.negotiation.maxFeedbackRounds, 3);
    assert.equal(config.negotiation.interpretationRetries, 1);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("invalid JSON is reported as a configuration error", () => {
  const dir = mkdtempSync(join(tmpdir(), "workflow-config-"));
  try {
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ not json");

    assert.throws(
      () => loadWorkflowConfigFile(file),
      (err: unknown) => err instanceof WorkflowConfigError && err.issues[0]?.code === "invalid_json"
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
