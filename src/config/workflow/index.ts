/**
 * Workflow configuration module.
 *
 * Provides schema-validated, immutable tuning for extraction, negotiation,
 * quiz generation and answer evaluation.
 *
 * Usage:
 *   import { loadWorkflowConfig, mergeWorkflowConfig } from "./config/workflow/index.js";
 *
 *   // Defaults with a shorter quiz
 *   const config = loadWorkflowConfig(mergeWorkflowConfig({ quiz: { questionCount: 5 } }));
 */

export type {
  WorkflowConfig,
  ExtractionConfig,
  NegotiationConfig,
  QuizConfig,
  EvaluationConfig,
  DifficultyDistribution,
} from "./schema.js";

export {
  WorkflowConfigSchema,
  ExtractionConfigSchema,
  NegotiationConfigSchema,
  QuizConfigSchema,
  EvaluationConfigSchema,
  DifficultyDistributionSchema,
} from "./schema.js";

export {
  loadWorkflowConfig,
  loadWorkflowConfigFile,
  mergeWorkflowConfig,
  validateWorkflowConfig,
  WorkflowConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_WORKFLOW_CONFIG } from "./defaults.js";
