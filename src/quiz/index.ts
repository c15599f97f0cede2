/**
 * Quiz module: allocation, generation, the answering session and the
 * final report.
 */

export {
  QuestionKind,
  Difficulty,
  DIFFICULTIES,
  ChoiceAnswerKeySchema,
  OpenAnswerKeySchema,
  QuizQuestionSchema,
  GeneratedQuestionSchema,
  UserQuestionCompletionSchema,
  AnswerEvaluationSchema,
  SubmittedAnswerSchema,
  AnswerRecordSchema,
  TopicAllocationSchema,
  QuizStatus,
  QuizSessionStateSchema,
  TopicScoreSchema,
  QuizReportSchema,
  type ChoiceAnswerKey,
  type OpenAnswerKey,
  type QuizQuestion,
  type ChoiceQuestion,
  type GeneratedQuestion,
  type GeneratedQuestionInput,
  type KeyedQuestion,
  type UserQuestionCompletion,
  type UserQuestionCompletionInput,
  type AnswerEvaluation,
  type SubmittedAnswer,
  type AnswerRecord,
  type TopicAllocation,
  type QuizSessionState,
  type TopicScore,
  type QuizReport,
} from "./schema.js";

export { allocateQuestions, interleaveSlots, planDifficulties } from "./allocation.js";

export {
  QuizGenerator,
  promptKey,
  type GeneratedQuiz,
  type GenerateOptions,
  type QuizGeneratorOptions,
} from "./generator.js";

export {
  QuizSession,
  currentQuestion,
  presentQuestion,
  toSubmittedAnswer,
  type AnswerInput,
  type PresentedQuestion,
  type QuizSessionOptions,
  type QuizStep,
} from "./session.js";

export { buildQuizReport, formatQuizReport, reportVerdict } from "./report.js";
