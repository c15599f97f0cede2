/**
 * Workflow configuration schema definition.
 *
 * The configuration is validated once when a workflow orchestrator is
 * built and then frozen. Sessions resumed from a snapshot must be driven
 * with the same configuration to reproduce the same transitions: the
 * allocation, difficulty plan and retry budgets all read from it.
 */

import { z } from "zod";

const RetryCount = z.number().int().min(0).max(10);

export const ExtractionConfigSchema = z
  .object({
    targetTopicCount: z
      .number()
      .int()
      .min(1)
      .max(50)
      .describe("Number of topics kept after extraction"),

    batchSize: z
      .number()
      .int()
      .min(1)
      .describe("Excerpts analysed per extraction call"),

    maxExcerpts: z
      .number()
      .int()
      .min(1)
      .describe("Upper bound on excerpts retrieved for extraction"),

    retrievalQuery: z
      .string()
      .describe("Query used to retrieve excerpts for extraction; empty means all"),

    retries: RetryCount.describe("Extra attempts per extraction call after the first"),
  })
  .strict();

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

export const NegotiationConfigSchema = z
  .object({
    maxFeedbackRounds: z
      .number()
      .int()
      .min(1)
      .describe("Feedback rounds after which the current topics are confirmed"),

    interpretationRetries: RetryCount.describe(
      "Extra attempts per feedback interpretation call after the first"
    ),
  })
  .strict();

export type NegotiationConfig = z.infer<typeof NegotiationConfigSchema>;

export const DifficultyDistributionSchema = z
  .object({
    easy: z.number().nonnegative(),
    medium: z.number().nonnegative(),
    hard: z.number().nonnegative(),
  })
  .strict()
  .refine((d) => d.easy + d.medium + d.hard > 0, "At least one difficulty needs a positive share");

export type DifficultyDistribution = z.infer<typeof DifficultyDistributionSchema>;

export const QuizConfigSchema = z
  .object({
    questionCount: z
      .number()
      .int()
      .min(1)
      .max(200)
      .describe("Default number of questions per quiz"),

    minQuestionsPerTopic: z
      .number()
      .int()
      .min(0)
      .describe("Questions guaranteed to every topic when the count allows it"),

    difficultyDistribution: DifficultyDistributionSchema.describe(
      "Relative share of each difficulty across the quiz"
    ),

    generationRetries: RetryCount.describe("Extra attempts per question slot after the first"),

    contextExcerptsPerQuestion: z
      .number()
      .int()
      .min(0)
      .describe("Excerpts retrieved per topic as question context; 0 disables retrieval"),
  })
  .strict();

export type QuizConfig = z.infer<typeof QuizConfigSchema>;

export const EvaluationConfigSchema = z
  .object({
    retries: RetryCount.describe("Extra attempts per open-answer evaluation after the first"),
  })
  .strict();

export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;

/**
 * Complete workflow configuration schema.
 */
export const WorkflowConfigSchema = z
  .object({
    extraction: ExtractionConfigSchema,
    negotiation: NegotiationConfigSchema,
    quiz: QuizConfigSchema,
    evaluation: EvaluationConfigSchema,
    retryDelayMs: z
      .number()
      .int()
      .min(0)
      .describe("Delay between attempts against an external capability"),
  })
  .strict();

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
