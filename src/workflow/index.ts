/**
 * Workflow module: the resumable two-phase session (topic negotiation,
 * then quiz), its persisted record and the stores that keep it.
 *
 * Usage:
 *   const orchestrator = new WorkflowOrchestrator({ capabilities, store: new InMemoryStateStore() });
 *
 *   let snapshot = await orchestrator.start(sessionId, "course-notes");
 *   snapshot = await orchestrator.submitFeedback(sessionId, "remove topic 2");
 *   snapshot = await orchestrator.confirmTopics(sessionId, { questionCount: 5 });
 *   while (snapshot.awaiting === "answer") {
 *     snapshot = await orchestrator.submitAnswer(sessionId, 0);
 *   }
 */

export {
  WORKFLOW_STATE_VERSION,
  SessionIdSchema,
  WorkflowPhase,
  WorkflowFailureSchema,
  WorkflowStateSchema,
  type WorkflowFailure,
  type WorkflowState,
} from "./schema.js";

export {
  serializeWorkflowState,
  deserializeWorkflowState,
  isVersionCompatible,
  summarizeWorkflowState,
} from "./serialization.js";

export { generateSessionId, isValidSessionId, assertSessionId } from "./ids.js";

export { InMemoryStateStore, FileStateStore, getSessionFilename } from "./store.js";

export {
  WorkflowOrchestrator,
  MAX_USER_QUESTIONS,
  toSnapshot,
  workflowStatus,
  type AwaitingInput,
  type ConfirmTopicsOptions,
  type SubmitFeedbackOptions,
  type WorkflowCapabilities,
  type WorkflowOrchestratorOptions,
  type WorkflowSnapshot,
  type WorkflowStatus,
} from "./orchestrator.js";
