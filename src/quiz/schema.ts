/**
 * Quiz schema and type definitions.
 *
 * Questions are created once by the generator from a confirmed topic set
 * and never change afterwards. The session records one AnswerRecord per
 * question, in question order.
 */

import { z } from "zod";

export const QuestionKind = z.enum(["single_choice", "multi_choice", "open"]);
export type QuestionKind = z.infer<typeof QuestionKind>;

export const Difficulty = z.enum(["easy", "medium", "hard"]);
export type Difficulty = z.infer<typeof Difficulty>;

export const DIFFICULTIES: readonly Difficulty[] = Difficulty.options;

const ChoiceIndex = z.number().int().nonnegative();

export const ChoiceAnswerKeySchema = z
  .object({
    choices: z.array(z.string().min(1)).min(2),
    /** Indices into `choices`, sorted ascending */
    correct: z.array(ChoiceIndex).min(1),
  })
  .strict();
export type ChoiceAnswerKey = z.infer<typeof ChoiceAnswerKeySchema>;

export const OpenAnswerKeySchema = z
  .object({
    reference: z.string().min(1),
  })
  .strict();
export type OpenAnswerKey = z.infer<typeof OpenAnswerKeySchema>;

const QuestionBase = {
  id: z.string().min(1),
  topicId: z.string().min(1),
  prompt: z.string().min(1),
  difficulty: Difficulty,
  explanation: z.string().optional(),
};

export const QuizQuestionSchema = z.discriminatedUnion("kind", [
  z.object({ ...QuestionBase, kind: z.literal("single_choice"), answerKey: ChoiceAnswerKeySchema }).strict(),
  z.object({ ...QuestionBase, kind: z.literal("multi_choice"), answerKey: ChoiceAnswerKeySchema }).strict(),
  z.object({ ...QuestionBase, kind: z.literal("open"), answerKey: OpenAnswerKeySchema }).strict(),
]);
export type QuizQuestion = z.infer<typeof QuizQuestionSchema>;
export type ChoiceQuestion = Extract<QuizQuestion, { kind: "single_choice" | "multi_choice" }>;

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * GENERATION CAPABILITY OUTPUT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * What the question generation capability returns for one slot. Choice
 * questions must reference existing choices, and single-choice questions
 * must mark exactly one of them correct.
 */
export const GeneratedQuestionSchema = z
  .discriminatedUnion("kind", [
    z.object({
      kind: z.literal("single_choice"),
      prompt: z.string().trim().min(1),
      answerKey: ChoiceAnswerKeySchema,
      explanation: z.string().optional(),
    }),
    z.object({
      kind: z.literal("multi_choice"),
      prompt: z.string().trim().min(1),
      answerKey: ChoiceAnswerKeySchema,
      explanation: z.string().optional(),
    }),
    z.object({
      kind: z.literal("open"),
      prompt: z.string().trim().min(1),
      answerKey: OpenAnswerKeySchema,
      explanation: z.string().optional(),
    }),
  ])
  .superRefine(checkAnswerKey);
export type GeneratedQuestion = z.infer<typeof GeneratedQuestionSchema>;
export type GeneratedQuestionInput = z.input<typeof GeneratedQuestionSchema>;

/** The parts of a question that decide how it is scored */
export type KeyedQuestion =
  | { kind: "single_choice" | "multi_choice"; answerKey: ChoiceAnswerKey; explanation?: string }
  | { kind: "open"; answerKey: OpenAnswerKey; explanation?: string };

function checkAnswerKey(question: KeyedQuestion, ctx: z.RefinementCtx): void {
  if (question.kind === "open") {
    return;
  }
  const { choices, correct } = question.answerKey;
  if (new Set(correct).size !== correct.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Correct indices must be unique" });
  }
  if (correct.some((index) => index >= choices.length)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Correct index out of range" });
  }
  if (question.kind === "single_choice" && correct.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Single-choice questions need exactly one correct choice",
    });
  }
}

/**
 * What the completion capability returns for a question the user wrote:
 * the topic it belongs to (ID or name) and an answer key. The prompt
 * stays the user's own text.
 */
export const UserQuestionCompletionSchema = z
  .discriminatedUnion("kind", [
    z.object({
      kind: z.literal("single_choice"),
      topic: z.string().trim().min(1),
      answerKey: ChoiceAnswerKeySchema,
      difficulty: Difficulty.optional(),
      explanation: z.string().optional(),
    }),
    z.object({
      kind: z.literal("multi_choice"),
      topic: z.string().trim().min(1),
      answerKey: ChoiceAnswerKeySchema,
      difficulty: Difficulty.optional(),
      explanation: z.string().optional(),
    }),
    z.object({
      kind: z.literal("open"),
      topic: z.string().trim().min(1),
      answerKey: OpenAnswerKeySchema,
      difficulty: Difficulty.optional(),
      explanation: z.string().optional(),
    }),
  ])
  .superRefine(checkAnswerKey);
export type UserQuestionCompletion = z.infer<typeof UserQuestionCompletionSchema>;
export type UserQuestionCompletionInput = z.input<typeof UserQuestionCompletionSchema>;

export const AnswerEvaluationSchema = z.object({
  correct: z.boolean(),
  score: z.number().min(0).max(1),
  comment: z.string().optional(),
});
export type AnswerEvaluation = z.infer<typeof AnswerEvaluationSchema>;

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * SESSION STATE
 * ═══════════════════════════════════════════════════════════════════════════
 */

export const SubmittedAnswerSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("choice"), selected: z.array(ChoiceIndex) }).strict(),
  z.object({ type: z.literal("text"), text: z.string() }).strict(),
]);
export type SubmittedAnswer = z.infer<typeof SubmittedAnswerSchema>;

export const AnswerRecordSchema = z
  .object({
    questionId: z.string(),
    answer: SubmittedAnswerSchema,
    correct: z.boolean(),
    /** Contribution to the aggregate, in [0, 1] */
    score: z.number().min(0).max(1),
    feedback: z.string(),
    answeredAt: z.string(),
  })
  .strict();
export type AnswerRecord = z.infer<typeof AnswerRecordSchema>;

export const TopicAllocationSchema = z
  .object({
    topicId: z.string(),
    count: z.number().int().nonnegative(),
  })
  .strict();
export type TopicAllocation = z.infer<typeof TopicAllocationSchema>;

export const QuizStatus = z.enum(["in_progress", "completed"]);
export type QuizStatus = z.infer<typeof QuizStatus>;

export const QuizSessionStateSchema = z
  .object({
    status: QuizStatus,
    questions: z.array(QuizQuestionSchema),
    currentIndex: z.number().int().nonnegative(),
    records: z.array(AnswerRecordSchema),
    totalScore: z.number().nonnegative(),
    /** Mean score over answered questions */
    aggregateScore: z.number().min(0).max(1),
    allocation: z.array(TopicAllocationSchema),
  })
  .strict();
export type QuizSessionState = z.infer<typeof QuizSessionStateSchema>;

export const TopicScoreSchema = z
  .object({
    topicId: z.string(),
    name: z.string(),
    questions: z.number().int().nonnegative(),
    correct: z.number().int().nonnegative(),
    score: z.number().min(0).max(1),
  })
  .strict();
export type TopicScore = z.infer<typeof TopicScoreSchema>;

export const QuizReportSchema = z
  .object({
    totalQuestions: z.number().int().nonnegative(),
    answered: z.number().int().nonnegative(),
    correctAnswers: z.number().int().nonnegative(),
    aggregateScore: z.number().min(0).max(1),
    scorePercentage: z.number().min(0).max(100),
    topics: z.array(TopicScoreSchema),
  })
  .strict();
export type QuizReport = z.infer<typeof QuizReportSchema>;
