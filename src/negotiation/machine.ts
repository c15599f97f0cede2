/**
 * Topic negotiation state machine.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * TRANSITIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   extracting        ──extract──▶   awaiting_feedback
 *   awaiting_feedback ──feedback──▶  revising ──▶ awaiting_feedback
 *                                              └▶ confirmed (round limit)
 *   awaiting_feedback ──confirm──▶   confirmed
 *
 * Every method takes a state and returns the next one without touching
 * its input, so a state restored from storage continues exactly where it
 * was saved. Warnings describe recoverable outcomes (stale revision,
 * uninterpretable feedback, round limit); `failure` carries an error the
 * owning workflow cannot continue from.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { NegotiationConfig } from "../config/workflow/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { FeedbackProcessor, FeedbackResult } from "../topics/feedback.js";
import type { TopicExtractor } from "../topics/extractor.js";
import { emptyAppliedDiff } from "../topics/schema.js";
import {
  EmptyTopicSetError,
  InvalidTransitionError,
  type WorkflowError,
} from "../types/errors.js";
import type { NegotiationState, NegotiationStatus } from "./schema.js";

const TRANSITIONS: Record<NegotiationStatus, readonly NegotiationStatus[]> = {
  extracting: ["awaiting_feedback"],
  awaiting_feedback: ["revising", "confirmed"],
  revising: ["awaiting_feedback", "confirmed"],
  confirmed: [],
};

export function canTransition(from: NegotiationStatus, to: NegotiationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

function assertTransition(operation: string, from: NegotiationStatus, to: NegotiationStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(operation, from);
  }
}

export interface NegotiationStep {
  state: NegotiationState;
  warnings: string[];
  failure?: WorkflowError;
}

export interface TopicNegotiationOptions {
  extractor: TopicExtractor;
  feedback: FeedbackProcessor;
  config: NegotiationConfig;
  logger?: Logger;
}

export class TopicNegotiation {
  private readonly extractor: TopicExtractor;
  private readonly feedback: FeedbackProcessor;
  private readonly config: NegotiationConfig;
  private readonly logger: Logger;

  constructor(options: TopicNegotiationOptions) {
    this.extractor = options.extractor;
    this.feedback = options.feedback;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  initialState(): NegotiationState {
    return {
      status: "extracting",
      topics: null,
      revision: 0,
      rounds: 0,
      history: [],
      confirmation: null,
    };
  }

  /**
   * Run extraction once and suspend for review.
   *
   * @throws ExtractionFailedError when no topic set could be built
   */
  async extract(state: NegotiationState, excerpts: readonly string[]): Promise<NegotiationStep> {
    assertTransition("extract", state.status, "awaiting_feedback");

    const topics = await this.extractor.extract(excerpts);
    return {
      state: { ...state, status: "awaiting_feedback", topics, revision: topics.revision },
      warnings: [],
    };
  }

  /**
   * Apply one feedback instruction written against `shownRevision`.
   */
  async submitFeedback(
    state: NegotiationState,
    instruction: string,
    shownRevision: number
  ): Promise<NegotiationStep> {
    assertTransition("submitFeedback", state.status, "revising");
    const current = state.topics;
    if (current === null) {
      throw new InvalidTransitionError("submitFeedback", state.status);
    }

    const rounds = state.rounds + 1;
    const history = state.history.map((event) => event.instruction);

    let result: FeedbackResult;
    try {
      result = await this.feedback.process(current, shownRevision, instruction, history);
    } catch (error) {
      if (!(error instanceof EmptyTopicSetError)) {
        throw error;
      }
      this.logger.error("Feedback would empty the topic set", { revision: current.revision });
      const event = this.feedback.recordEvent(
        instruction,
        shownRevision,
        "rejected",
        emptyAppliedDiff(),
        error.message
      );
      return {
        state: { ...state, status: "awaiting_feedback", rounds, history: [...state.history, event] },
        warnings: [],
        failure: error,
      };
    }

    const warnings = result.outcome === "applied" ? [] : [result.error.message];
    const revised: NegotiationState = {
      ...state,
      status: "awaiting_feedback",
      topics: result.set,
      revision: result.set.revision,
      rounds,
      history: [...state.history, result.event],
    };

    if (rounds >= this.config.maxFeedbackRounds) {
      this.logger.warn("Feedback round limit reached; confirming current topics", { rounds });
      warnings.push(
        `Feedback round limit of ${this.config.maxFeedbackRounds} reached; ` +
          `the current topics were confirmed`
      );
      return {
        state: { ...revised, status: "confirmed", confirmation: "iteration_cap" },
        warnings,
      };
    }

    return { state: revised, warnings };
  }

  /**
   * Confirm the current topics. Terminal.
   */
  confirm(state: NegotiationState): NegotiationStep {
    assertTransition("confirmTopics", state.status, "confirmed");
    if (state.topics === null) {
      throw new InvalidTransitionError("confirmTopics", state.status);
    }
    return { state: { ...state, status: "confirmed", confirmation: "user" }, warnings: [] };
  }
}
