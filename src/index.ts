/**
 * Topic negotiation and quiz workflow engine.
 *
 * Entry points:
 *   - WorkflowOrchestrator: resumable sessions over an injected StateStore
 *   - TopicNegotiation / QuizSession: the two state machines, usable alone
 *   - WeightedTopicSet operations: normalize, merge, describeTopicSet
 *
 * The engine never calls a model itself. Callers supply the capabilities
 * declared in ./types/capabilities.ts.
 */

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./topics/index.js";
export * from "./negotiation/index.js";
export * from "./quiz/index.js";
export * from "./workflow/index.js";
