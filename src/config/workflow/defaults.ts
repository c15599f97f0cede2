/**
 * Default workflow configuration.
 */

import type { WorkflowConfig } from "./schema.js";

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  extraction: {
    targetTopicCount: 10,
    batchSize: 10,
    maxExcerpts: 50,
    retrievalQuery: "",
    retries: 2,
  },

  negotiation: {
    maxFeedbackRounds: 10,
    interpretationRetries: 1,
  },

  quiz: {
    questionCount: 20,
    minQuestionsPerTopic: 1,
    difficultyDistribution: { easy: 0.3, medium: 0.5, hard: 0.2 },
    generationRetries: 2,
    contextExcerptsPerQuestion: 5,
  },

  evaluation: {
    retries: 1,
  },

  retryDelayMs: 250,
};
