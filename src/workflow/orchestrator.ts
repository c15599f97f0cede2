/**
 * Workflow orchestrator.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * RESUMABLE SESSIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Each caller operation loads the session's WorkflowState from the store,
 * applies exactly one transition and saves the result before returning a
 * snapshot. No continuation is kept in memory between calls: a session can
 * be resumed by any orchestrator that shares the store and configuration.
 *
 * Operations on one session run one at a time, in arrival order, through a
 * single-slot queue. Different sessions never wait for each other.
 *
 * Errors:
 *   - Recoverable outcomes (stale revision, uninterpretable feedback,
 *     failed evaluation, reallocated questions) come back as warnings.
 *   - Fatal ones (extraction failure, an emptied topic set, a quiz that
 *     cannot be generated) move the session to `failed`; a new `start`
 *     is needed.
 *   - Caller mistakes (wrong phase, bad answer shape, unknown or corrupt
 *     session) are thrown and nothing is saved.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import pLimit, { type LimitFunction } from "p-limit";
import { z } from "zod";

import {
  DEFAULT_WORKFLOW_CONFIG,
  loadWorkflowConfig,
  type WorkflowConfig,
} from "../config/workflow/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { TopicNegotiation } from "../negotiation/machine.js";
import type { NegotiationStatus } from "../negotiation/schema.js";
import { QuizGenerator } from "../quiz/generator.js";
import { buildQuizReport } from "../quiz/report.js";
import type { QuizStatus } from "../quiz/schema.js";
import {
  QuizSession,
  presentQuestion,
  type AnswerInput,
  type PresentedQuestion,
} from "../quiz/session.js";
import { FeedbackProcessor } from "../topics/feedback.js";
import { TopicExtractor } from "../topics/extractor.js";
import type {
  AnswerEvaluationCapability,
  Clock,
  DocumentRetriever,
  FeedbackInterpretationCapability,
  QuestionGenerationCapability,
  StateStore,
  TopicExtractionCapability,
  UserQuestionCapability,
} from "../types/capabilities.js";
import {
  EmptyTopicSetError,
  ExtractionFailedError,
  GenerationFailedError,
  InvalidTransitionError,
  SessionNotFoundError,
  describeError,
  type WorkflowError,
} from "../types/errors.js";
import { withRetryResult } from "../utils/retry.js";
import { assertSessionId } from "./ids.js";
import { WORKFLOW_STATE_VERSION, type WorkflowPhase, type WorkflowState } from "./schema.js";
import { deserializeWorkflowState, serializeWorkflowState } from "./serialization.js";

export interface WorkflowCapabilities {
  retriever: DocumentRetriever;
  extraction: TopicExtractionCapability;
  interpretation: FeedbackInterpretationCapability;
  generation: QuestionGenerationCapability;
  /** Without it only choice questions are generated */
  evaluation?: AnswerEvaluationCapability;
  /** Needed only when users supply their own questions */
  userQuestions?: UserQuestionCapability;
}

export interface WorkflowOrchestratorOptions {
  capabilities: WorkflowCapabilities;
  store: StateStore;
  config?: WorkflowConfig;
  clock?: Clock;
  logger?: Logger;
}

export type WorkflowStatus = NegotiationStatus | QuizStatus | "failed";

/** The kind of human input a suspended session is waiting for */
export type AwaitingInput = "feedback" | "answer" | null;

/**
 * What every caller operation returns.
 */
export interface WorkflowSnapshot {
  sessionId: string;
  phase: WorkflowPhase;
  status: WorkflowStatus;
  awaiting: AwaitingInput;
  /** The full persisted record */
  state: WorkflowState;
  /** Warnings raised by the transition that produced this snapshot */
  warnings: string[];
  /** The question waiting for an answer, without its answer key */
  currentQuestion: PresentedQuestion | null;
}

export interface SubmitFeedbackOptions {
  /** Revision the feedback was written against; defaults to the current one */
  revision?: number;
}

export interface ConfirmTopicsOptions {
  /** Overrides the configured question count */
  questionCount?: number;
  /** Questions written by the user, asked first and on top of the question count */
  userQuestions?: readonly string[];
}

/** Most user-written questions accepted per quiz */
export const MAX_USER_QUESTIONS = 20;

const ExcerptListSchema = z.array(z.string());

interface SessionQueue {
  limit: LimitFunction;
  pending: number;
}

interface Components {
  logger: Logger;
  negotiation: TopicNegotiation;
  generator: QuizGenerator;
  session: QuizSession;
}

export function workflowStatus(state: WorkflowState): WorkflowStatus {
  switch (state.phase) {
    case "negotiation":
      return state.negotiation.status;
    case "quiz":
      return state.quiz?.status ?? "in_progress";
    case "completed":
      return "completed";
    case "failed":
      return "failed";
  }
}

export function toSnapshot(state: WorkflowState): WorkflowSnapshot {
  const quiz = state.phase === "quiz" ? state.quiz : null;
  let awaiting: AwaitingInput = null;
  if (state.phase === "negotiation" && state.negotiation.status === "awaiting_feedback") {
    awaiting = "feedback";
  } else if (quiz?.status === "in_progress") {
    awaiting = "answer";
  }

  return {
    sessionId: state.sessionId,
    phase: state.phase,
    status: workflowStatus(state),
    awaiting,
    state,
    warnings: [...state.warnings],
    currentQuestion: quiz ? presentQuestion(quiz) : null,
  };
}

function isFatal(error: unknown): error is WorkflowError {
  return (
    error instanceof ExtractionFailedError ||
    error instanceof EmptyTopicSetError ||
    error instanceof GenerationFailedError
  );
}

export class WorkflowOrchestrator {
  private readonly capabilities: WorkflowCapabilities;
  private readonly store: StateStore;
  private readonly config: WorkflowConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly queues = new Map<string, SessionQueue>();

  constructor(options: WorkflowOrchestratorOptions) {
    this.capabilities = options.capabilities;
    this.store = options.store;
    this.config = options.config ?? loadWorkflowConfig(DEFAULT_WORKFLOW_CONFIG);
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start (or restart after completion or failure) a session: retrieve
   * excerpts, extract topics and suspend for feedback.
   *
   * @throws InvalidTransitionError if the session is still in progress
   */
  async start(sessionId: string, documentsRef: string): Promise<WorkflowSnapshot> {
    assertSessionId(sessionId);
    return this.serialize(sessionId, async () => {
      const existing = await this.store.load(sessionId);
      if (existing !== null) {
        const previous = deserializeWorkflowState(existing);
        if (previous.phase !== "completed" && previous.phase !== "failed") {
          throw new InvalidTransitionError("start", workflowStatus(previous));
        }
      }

      const { logger, negotiation } = this.components(sessionId);
      const now = this.now();
      const initial: WorkflowState = {
        version: WORKFLOW_STATE_VERSION,
        sessionId,
        documentsRef,
        phase: "negotiation",
        negotiation: negotiation.initialState(),
        quiz: null,
        report: null,
        failure: null,
        warnings: [],
        sequence: 0,
        createdAt: now,
        updatedAt: now,
      };
      logger.info("Workflow started", { documentsRef });

      try {
        const excerpts = await this.retrieveExcerpts(documentsRef, logger);
        const step = await negotiation.extract(initial.negotiation, excerpts);
        return this.commit(this.advance(initial, { negotiation: step.state }, step.warnings), logger);
      } catch (error) {
        if (isFatal(error)) {
          return this.commit(this.fail(initial, error, logger), logger);
        }
        throw error;
      }
    });
  }

  /**
   * Apply a feedback instruction to the topics under review.
   *
   * @throws InvalidTransitionError outside topic negotiation
   */
  async submitFeedback(
    sessionId: string,
    text: string,
    options: SubmitFeedbackOptions = {}
  ): Promise<WorkflowSnapshot> {
    return this.serialize(sessionId, async () => {
      const state = await this.load(sessionId);
      this.assertPhase(state, "negotiation", "submitFeedback");
      const { logger, negotiation } = this.components(sessionId);

      const revision = options.revision ?? state.negotiation.revision;
      const step = await negotiation.submitFeedback(state.negotiation, text, revision);
      const next = this.advance(state, { negotiation: step.state }, step.warnings);
      logger.info("Feedback processed", {
        revision: step.state.revision,
        rounds: step.state.rounds,
        outcome: step.state.history.at(-1)?.outcome,
      });

      if (step.failure) {
        return this.commit(this.fail(next, step.failure, logger), logger);
      }
      if (step.state.status === "confirmed") {
        return this.commit(await this.beginQuiz(next, logger), logger);
      }
      return this.commit(next, logger);
    });
  }

  /**
   * Confirm the topics under review and generate the quiz.
   *
   * @throws InvalidTransitionError outside topic negotiation
   * @throws RangeError if the question count is not a positive integer, or
   *   the user questions are blank, too many, or cannot be completed
   */
  async confirmTopics(
    sessionId: string,
    options: ConfirmTopicsOptions = {}
  ): Promise<WorkflowSnapshot> {
    const { questionCount, userQuestions = [] } = options;
    if (questionCount !== undefined && (!Number.isInteger(questionCount) || questionCount < 1)) {
      throw new RangeError(`Question count must be a positive integer, got ${questionCount}`);
    }
    this.assertUserQuestions(userQuestions);
    return this.serialize(sessionId, async () => {
      const state = await this.load(sessionId);
      this.assertPhase(state, "negotiation", "confirmTopics");
      const { logger, negotiation } = this.components(sessionId);

      const step = negotiation.confirm(state.negotiation);
      logger.info("Topics confirmed", { revision: step.state.revision });
      const next = this.advance(state, { negotiation: step.state }, step.warnings);
      return this.commit(await this.beginQuiz(next, logger, questionCount, userQuestions), logger);
    });
  }

  /**
   * Answer the current question.
   *
   * @throws InvalidTransitionError outside the quiz phase
   * @throws InvalidAnswerError if the answer does not fit the question
   */
  async submitAnswer(sessionId: string, answer: AnswerInput): Promise<WorkflowSnapshot> {
    return this.serialize(sessionId, async () => {
      const state = await this.load(sessionId);
      this.assertPhase(state, "quiz", "submitAnswer");
      const quizState = state.quiz;
      if (quizState === null) {
        throw new InvalidTransitionError("submitAnswer", workflowStatus(state));
      }
      const { logger, session } = this.components(sessionId);

      const step = await session.submitAnswer(quizState, answer);
      for (const warning of step.warnings) {
        logger.warn(warning);
      }

      if (step.state.status !== "completed") {
        return this.commit(this.advance(state, { quiz: step.state }, step.warnings), logger);
      }

      const report = buildQuizReport(step.state, state.negotiation.topics?.topics ?? []);
      logger.info("Workflow completed", {
        correct: report.correctAnswers,
        total: report.totalQuestions,
        score: report.aggregateScore,
      });
      return this.commit(
        this.advance(state, { phase: "completed", quiz: step.state, report }, step.warnings),
        logger
      );
    });
  }

  /**
   * Current snapshot of a session.
   *
   * @throws SessionNotFoundError if nothing was saved under the ID
   */
  async getState(sessionId: string): Promise<WorkflowSnapshot> {
    return this.serialize(sessionId, async () => toSnapshot(await this.load(sessionId)));
  }

  private serialize<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(sessionId);
    if (!queue) {
      queue = { limit: pLimit(1), pending: 0 };
      this.queues.set(sessionId, queue);
    }
    const current = queue;
    current.pending++;
    return current.limit(task).finally(() => {
      current.pending--;
      if (current.pending === 0 && this.queues.get(sessionId) === current) {
        this.queues.delete(sessionId);
      }
    });
  }

  private components(sessionId: string): Components {
    const logger = this.logger.child({ sessionId });
    const { config, clock, capabilities } = this;
    const retryDelayMs = config.retryDelayMs;

    const extractor = new TopicExtractor({
      capability: capabilities.extraction,
      config: config.extraction,
      retryDelayMs,
      logger,
    });
    const feedback = new FeedbackProcessor({
      capability: capabilities.interpretation,
      retries: config.negotiation.interpretationRetries,
      retryDelayMs,
      clock,
      logger,
    });

    return {
      logger,
      negotiation: new TopicNegotiation({ extractor, feedback, config: config.negotiation, logger }),
      generator: new QuizGenerator({
        capability: capabilities.generation,
        retriever: capabilities.retriever,
        ...(capabilities.userQuestions !== undefined ? { userQuestions: capabilities.userQuestions } : {}),
        openQuestions: capabilities.evaluation !== undefined,
        config: config.quiz,
        retryDelayMs,
        logger,
      }),
      session: new QuizSession({
        ...(capabilities.evaluation !== undefined ? { evaluator: capabilities.evaluation } : {}),
        config: config.evaluation,
        retryDelayMs,
        clock,
        logger,
      }),
    };
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private async load(sessionId: string): Promise<WorkflowState> {
    assertSessionId(sessionId);
    const serialized = await this.store.load(sessionId);
    if (serialized === null) {
      throw new SessionNotFoundError(sessionId);
    }
    return deserializeWorkflowState(serialized);
  }

  private async commit(state: WorkflowState, logger: Logger): Promise<WorkflowSnapshot> {
    await this.store.save(state.sessionId, serializeWorkflowState(state));
    logger.debug("Workflow state saved", { phase: state.phase, sequence: state.sequence });
    return toSnapshot(state);
  }

  private assertUserQuestions(userQuestions: readonly string[]): void {
    if (userQuestions.length === 0) {
      return;
    }
    if (this.capabilities.userQuestions === undefined) {
      throw new RangeError("User questions need a question completion capability");
    }
    if (userQuestions.length > MAX_USER_QUESTIONS) {
      throw new RangeError(
        `At most ${MAX_USER_QUESTIONS} user questions are accepted, got ${userQuestions.length}`
      );
    }
    const blank = userQuestions.findIndex((question) => question.trim() === "");
    if (blank !== -1) {
      throw new RangeError(`User question ${blank + 1} is empty`);
    }
  }

  private assertPhase(state: WorkflowState, phase: WorkflowPhase, operation: string): void {
    if (state.phase !== phase) {
      throw new InvalidTransitionError(operation, workflowStatus(state));
    }
  }

  private advance(
    state: WorkflowState,
    patch: Partial<Pick<WorkflowState, "phase" | "negotiation" | "quiz" | "report" | "failure">>,
    warnings: readonly string[]
  ): WorkflowState {
    return {
      ...state,
      ...patch,
      warnings: [...warnings],
      sequence: state.sequence + 1,
      updatedAt: this.now(),
    };
  }

  private fail(state: WorkflowState, error: WorkflowError, logger: Logger): WorkflowState {
    const phase = state.phase === "quiz" ? "quiz" : "negotiation";
    logger.error("Workflow failed", { kind: error.kind, message: error.message });
    return {
      ...state,
      phase: "failed",
      failure: { kind: error.kind, message: error.message, phase, failedAt: this.now() },
      warnings: [...state.warnings, error.message],
    };
  }

  private async retrieveExcerpts(documentsRef: string, logger: Logger): Promise<string[]> {
    const { retrievalQuery, maxExcerpts, retries } = this.config.extraction;
    const result = await withRetryResult(
      async () =>
        ExcerptListSchema.parse(
          await this.capabilities.retriever.retrieve({ documentsRef, query: retrievalQuery, k: maxExcerpts })
        ),
      {
        maxAttempts: retries + 1,
        delayMs: this.config.retryDelayMs,
        onRetry: (attempt, error) =>
          logger.warn("Document retrieval attempt failed", { attempt, error: error.message }),
      }
    );
    if (!result.ok) {
      throw new ExtractionFailedError(`Document retrieval failed: ${describeError(result.error)}`, {
        cause: result.error,
      });
    }
    return result.value;
  }

  /**
   * Generate the quiz for confirmed topics. A state that confirmed an
   * empty set or cannot produce questions ends up failed.
   */
  private async beginQuiz(
    state: WorkflowState,
    logger: Logger,
    questionCount?: number,
    userQuestions: readonly string[] = []
  ): Promise<WorkflowState> {
    const { generator, session } = this.components(state.sessionId);
    const topics = state.negotiation.topics;

    try {
      if (topics === null) {
        throw new EmptyTopicSetError("No topics were confirmed");
      }
      const quiz = await generator.generate(topics, questionCount ?? this.config.quiz.questionCount, {
        documentsRef: state.documentsRef,
        userQuestions,
      });
      for (const warning of quiz.warnings) {
        logger.warn(warning);
      }
      logger.info("Quiz generated", { questions: quiz.questions.length });

      return {
        ...state,
        phase: "quiz",
        quiz: session.start(quiz.questions, quiz.allocation),
        warnings: [...state.warnings, ...quiz.warnings],
      };
    } catch (error) {
      if (isFatal(error)) {
        return this.fail(state, error, logger);
      }
      throw error;
    }
  }
}
