/**
 * Quiz session state machine.
 *
 * States: in_progress ──answer──▶ in_progress ... ──last answer──▶ completed
 *
 * The session suspends after presenting each question and resumes with
 * the next answer. Choice questions are scored by exact set match; open
 * questions are scored by the evaluation capability. A failed evaluation
 * leaves the state as it was so the same answer can be sent again.
 */

import type { EvaluationConfig } from "../config/workflow/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { AnswerEvaluationCapability, Clock } from "../types/capabilities.js";
import {
  EvaluationFailedError,
  InvalidAnswerError,
  InvalidTransitionError,
  describeError,
} from "../types/errors.js";
import { Err, type Result } from "../utils/result.js";
import { withRetryResult } from "../utils/retry.js";
import {
  AnswerEvaluationSchema,
  type AnswerEvaluation,
  type AnswerRecord,
  type ChoiceQuestion,
  type Difficulty,
  type QuestionKind,
  type QuizQuestion,
  type QuizSessionState,
  type SubmittedAnswer,
  type TopicAllocation,
} from "./schema.js";

/** Choice index, list of choice indices, or free text */
export type AnswerInput = number | readonly number[] | string;

/**
 * A question as shown to the person taking the quiz: no answer key.
 */
export interface PresentedQuestion {
  id: string;
  topicId: string;
  kind: QuestionKind;
  prompt: string;
  difficulty: Difficulty;
  /** Present for choice questions */
  choices?: string[];
  /** 1-based */
  position: number;
  total: number;
}

export interface QuizStep {
  state: QuizSessionState;
  warnings: string[];
  /** The record appended by this step, if the answer was scored */
  record?: AnswerRecord;
}

export interface QuizSessionOptions {
  evaluator?: AnswerEvaluationCapability;
  config: EvaluationConfig;
  retryDelayMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export function currentQuestion(state: QuizSessionState): QuizQuestion | null {
  if (state.status === "completed") {
    return null;
  }
  return state.questions[state.currentIndex] ?? null;
}

export function presentQuestion(state: QuizSessionState): PresentedQuestion | null {
  const question = currentQuestion(state);
  if (question === null) {
    return null;
  }
  return {
    id: question.id,
    topicId: question.topicId,
    kind: question.kind,
    prompt: question.prompt,
    difficulty: question.difficulty,
    ...(question.kind !== "open" ? { choices: [...question.answerKey.choices] } : {}),
    position: state.currentIndex + 1,
    total: state.questions.length,
  };
}

/**
 * Check an answer against the question's kind and choices.
 *
 * @throws InvalidAnswerError if the answer does not fit the question
 */
export function toSubmittedAnswer(question: QuizQuestion, input: AnswerInput): SubmittedAnswer {
  if (question.kind === "open") {
    if (typeof input !== "string") {
      throw new InvalidAnswerError(`Question ${question.id} expects a text answer`);
    }
    if (input.trim() === "") {
      throw new InvalidAnswerError("Answer text must not be empty");
    }
    return { type: "text", text: input };
  }

  if (typeof input === "string") {
    throw new InvalidAnswerError(`Question ${question.id} expects choice indices`);
  }
  const selected = [...new Set(typeof input === "number" ? [input] : input)].sort((a, b) => a - b);
  const choiceCount = question.answerKey.choices.length;

  for (const index of selected) {
    if (!Number.isInteger(index) || index < 0 || index >= choiceCount) {
      throw new InvalidAnswerError(
        `Choice ${index} is out of range for question ${question.id} (${choiceCount} choices)`
      );
    }
  }
  if (selected.length === 0) {
    throw new InvalidAnswerError("Select at least one choice");
  }
  if (question.kind === "single_choice" && selected.length !== 1) {
    throw new InvalidAnswerError(`Question ${question.id} accepts exactly one choice`);
  }
  return { type: "choice", selected };
}

function withExplanation(text: string, question: QuizQuestion): string {
  return question.explanation !== undefined ? `${text}\n\nExplanation: ${question.explanation}` : text;
}

interface Scored {
  correct: boolean;
  score: number;
  feedback: string;
}

function scoreChoice(question: ChoiceQuestion, selected: readonly number[]): Scored {
  const { choices, correct } = question.answerKey;
  const isCorrect =
    selected.length === correct.length && selected.every((index, i) => index === correct[i]);
  const selectedText = selected.map((index) => choices[index]).join(", ");
  const correctText = correct.map((index) => choices[index]).join(", ");

  const feedback = isCorrect
    ? `Correct! You selected: ${selectedText}`
    : `Incorrect. You selected: ${selectedText}\nCorrect answer(s): ${correctText}`;

  return { correct: isCorrect, score: isCorrect ? 1 : 0, feedback: withExplanation(feedback, question) };
}

export class QuizSession {
  private readonly evaluator: AnswerEvaluationCapability | undefined;
  private readonly config: EvaluationConfig;
  private readonly retryDelayMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: QuizSessionOptions) {
    this.evaluator = options.evaluator;
    this.config = options.config;
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  start(questions: readonly QuizQuestion[], allocation: readonly TopicAllocation[]): QuizSessionState {
    return {
      status: questions.length > 0 ? "in_progress" : "completed",
      questions: [...questions],
      currentIndex: 0,
      records: [],
      totalScore: 0,
      aggregateScore: 0,
      allocation: [...allocation],
    };
  }

  /**
   * Score an answer to the current question and advance.
   *
   * @throws InvalidTransitionError once the session is completed
   * @throws InvalidAnswerError if the answer does not fit the question
   */
  async submitAnswer(state: QuizSessionState, input: AnswerInput): Promise<QuizStep> {
    const question = currentQuestion(state);
    if (question === null) {
      throw new InvalidTransitionError("submitAnswer", state.status);
    }
    const answer = toSubmittedAnswer(question, input);

    let scored: Scored;
    if (question.kind === "open") {
      const text = answer.type === "text" ? answer.text : "";
      const evaluation = await this.evaluate(question.prompt, text, question.answerKey.reference);
      if (!evaluation.ok) {
        this.logger.warn("Answer evaluation failed", {
          questionId: question.id,
          error: evaluation.error.message,
        });
        return { state, warnings: [evaluation.error.message] };
      }
      const { correct, score, comment } = evaluation.value;
      const verdict = `${correct ? "Correct!" : "Incorrect."} Score: ${Math.round(score * 100)}%`;
      scored = {
        correct,
        score,
        feedback: withExplanation(comment ? `${verdict}\n${comment}` : verdict, question),
      };
    } else {
      scored = scoreChoice(question, answer.type === "choice" ? answer.selected : []);
    }

    const record: AnswerRecord = {
      questionId: question.id,
      answer,
      ...scored,
      answeredAt: this.clock().toISOString(),
    };
    const records = [...state.records, record];
    const totalScore = state.totalScore + record.score;
    const currentIndex = state.currentIndex + 1;

    this.logger.debug("Answer recorded", {
      questionId: question.id,
      correct: record.correct,
      position: currentIndex,
    });

    return {
      state: {
        ...state,
        status: currentIndex >= state.questions.length ? "completed" : "in_progress",
        currentIndex,
        records,
        totalScore,
        aggregateScore: totalScore / records.length,
      },
      warnings: [],
      record,
    };
  }

  private async evaluate(
    prompt: string,
    answer: string,
    reference: string
  ): Promise<Result<AnswerEvaluation, EvaluationFailedError>> {
    const evaluator = this.evaluator;
    if (evaluator === undefined) {
      return Err(new EvaluationFailedError("No evaluator is configured for open questions"));
    }

    const result = await withRetryResult(
      async () => AnswerEvaluationSchema.parse(await evaluator.evaluate({ prompt, answer, reference })),
      { maxAttempts: this.config.retries + 1, delayMs: this.retryDelayMs }
    );
    if (result.ok) {
      return result;
    }
    return Err(
      new EvaluationFailedError(`Answer could not be evaluated: ${describeError(result.error)}`, {
        cause: result.error,
      })
    );
  }
}
