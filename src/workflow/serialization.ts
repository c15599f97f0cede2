/**
 * Workflow state serialization.
 *
 * The state record is what the StateStore keeps between calls, so it is
 * also the unit of resumption: deserializing a record and applying the
 * same inputs reproduces the same transitions.
 *
 * VERSIONING: The version field allows loaders to detect old formats.
 * Only records with the current major version are accepted.
 */

import { describeTopicSet } from "../topics/weighted-set.js";
import { formatQuizReport } from "../quiz/report.js";
import { SnapshotInvalidError, describeError } from "../types/errors.js";
import { deepFreeze } from "../utils/freeze.js";
import { WORKFLOW_STATE_VERSION, WorkflowStateSchema, type WorkflowState } from "./schema.js";

/**
 * Serialize a workflow state to a JSON string.
 *
 * @param pretty - Whether to format with indentation (default: false)
 */
export function serializeWorkflowState(state: WorkflowState, pretty = false): string {
  return JSON.stringify(state, null, pretty ? 2 : undefined);
}

/**
 * Check if a state version is compatible with the current version.
 * Only an exact major version match is accepted.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = WORKFLOW_STATE_VERSION.split(".").map(Number);
  return major === currentMajor;
}

/**
 * Deserialize a workflow state from a JSON string.
 *
 * @returns Validated and frozen state
 * @throws SnapshotInvalidError if parsing, validation or the version check fails
 */
export function deserializeWorkflowState(json: string): Readonly<WorkflowState> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new SnapshotInvalidError(`Failed to parse workflow state JSON: ${describeError(err)}`);
  }

  const result = WorkflowStateSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SnapshotInvalidError(`Invalid workflow state: ${errors}`);
  }

  const state = result.data;
  if (!isVersionCompatible(state.version)) {
    throw new SnapshotInvalidError(
      `Incompatible workflow state version: ${state.version} ` +
        `(current: ${WORKFLOW_STATE_VERSION}). Migration may be required.`
    );
  }

  return deepFreeze(state);
}

/**
 * Create a human-readable summary of a workflow state.
 */
export function summarizeWorkflowState(state: WorkflowState): string {
  const { negotiation, quiz } = state;
  const lines: string[] = [
    "=== Workflow Session ===",
    `Session: ${state.sessionId}`,
    `Version: ${state.version}`,
    `Phase: ${state.phase}`,
    `Updated: ${state.updatedAt}`,
    "",
    "--- Topics ---",
    `Status: ${negotiation.status} (revision ${negotiation.revision}, ${negotiation.rounds} feedback round(s))`,
  ];

  if (negotiation.topics) {
    lines.push(describeTopicSet(negotiation.topics));
  }

  if (quiz) {
    lines.push("");
    lines.push("--- Quiz ---");
    lines.push(`Status: ${quiz.status}`);
    lines.push(`Answered: ${quiz.records.length}/${quiz.questions.length}`);
  }

  if (state.report) {
    lines.push("");
    lines.push(formatQuizReport(state.report));
  }

  if (state.failure) {
    lines.push("");
    lines.push(`Failed (${state.failure.kind}): ${state.failure.message}`);
  }

  if (state.warnings.length > 0) {
    lines.push("");
    lines.push("--- Warnings ---");
    for (const warning of state.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  return lines.join("\n");
}
