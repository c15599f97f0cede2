/**
 * Feedback processing.
 *
 * Applies one free-text instruction to the current topic set:
 *
 *   1. The revision the human was shown must match the current one,
 *      otherwise the instruction is stale and nothing changes.
 *   2. The interpretation capability turns the instruction into a diff,
 *      which is parsed and retried within the configured budget.
 *   3. The diff is merged. A merge that changes nothing counts as an
 *      interpretation failure.
 *
 * Every call produces a FeedbackEvent, including failed ones, so the
 * negotiation history lists every instruction received. A merge that
 * would empty the set throws EmptyTopicSetError and leaves the decision
 * to the caller.
 */

import { silentLogger, type Logger } from "../logging/index.js";
import type { Clock, FeedbackInterpretationCapability } from "../types/capabilities.js";
import {
  FeedbackInterpretationFailedError,
  StaleRevisionError,
  describeError,
} from "../types/errors.js";
import { withRetryResult } from "../utils/retry.js";
import {
  TopicDiffSchema,
  emptyAppliedDiff,
  type AppliedDiff,
  type FeedbackEvent,
  type FeedbackOutcomeKind,
  type WeightedTopicSet,
} from "./schema.js";
import { isEffectiveDiff, merge } from "./weighted-set.js";

export interface FeedbackProcessorOptions {
  capability: FeedbackInterpretationCapability;
  /** Extra attempts after the first interpretation call */
  retries: number;
  retryDelayMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export type FeedbackResult =
  | { outcome: "applied"; set: WeightedTopicSet; event: FeedbackEvent }
  | {
      outcome: "interpretation_failed";
      set: WeightedTopicSet;
      event: FeedbackEvent;
      error: FeedbackInterpretationFailedError;
    }
  | { outcome: "stale"; set: WeightedTopicSet; event: FeedbackEvent; error: StaleRevisionError };

export class FeedbackProcessor {
  private readonly capability: FeedbackInterpretationCapability;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: FeedbackProcessorOptions) {
    this.capability = options.capability;
    this.retries = options.retries;
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build the audit record for an instruction.
   */
  recordEvent(
    instruction: string,
    revision: number,
    outcome: FeedbackOutcomeKind,
    diff: AppliedDiff = emptyAppliedDiff(),
    message?: string
  ): FeedbackEvent {
    return {
      instruction,
      revision,
      outcome,
      diff,
      ...(message !== undefined ? { message } : {}),
      recordedAt: this.clock().toISOString(),
    };
  }

  /**
   * Apply an instruction written against `shownRevision`.
   *
   * @param history - Earlier instructions of the same negotiation, oldest first
   * @throws EmptyTopicSetError if the interpreted diff would remove every topic
   */
  async process(
    current: WeightedTopicSet,
    shownRevision: number,
    instruction: string,
    history: readonly string[] = []
  ): Promise<FeedbackResult> {
    if (shownRevision !== current.revision) {
      const error = new StaleRevisionError(current.revision, shownRevision);
      this.logger.warn("Stale feedback rejected", {
        currentRevision: current.revision,
        shownRevision,
      });
      return {
        outcome: "stale",
        set: current,
        event: this.recordEvent(instruction, shownRevision, "stale", undefined, error.message),
        error,
      };
    }

    const failed = (message: string, cause?: Error, diff?: AppliedDiff): FeedbackResult => {
      const error = new FeedbackInterpretationFailedError(message, { cause });
      this.logger.warn("Feedback not applied", { revision: current.revision, reason: message });
      return {
        outcome: "interpretation_failed",
        set: current,
        event: this.recordEvent(instruction, shownRevision, "interpretation_failed", diff, message),
        error,
      };
    };

    if (instruction.trim() === "") {
      return failed("Feedback instruction is empty");
    }

    const interpreted = await withRetryResult(
      async () =>
        TopicDiffSchema.parse(
          await this.capability.interpret({ topics: current.topics, instruction, history })
        ),
      {
        maxAttempts: this.retries + 1,
        delayMs: this.retryDelayMs,
        onRetry: (attempt, error) =>
          this.logger.debug("Feedback interpretation attempt failed", {
            attempt,
            error: error.message,
          }),
      }
    );

    if (!interpreted.ok) {
      return failed(
        `Could not interpret feedback: ${describeError(interpreted.error)}`,
        interpreted.error
      );
    }

    const { set, applied } = merge(current, interpreted.value);
    if (!isEffectiveDiff(applied)) {
      return failed("Feedback did not change any topic", undefined, applied);
    }

    this.logger.info("Feedback applied", {
      revision: set.revision,
      added: applied.added.length,
      removed: applied.removed.length,
      reweighted: applied.reweighted.length,
    });
    return {
      outcome: "applied",
      set,
      event: this.recordEvent(instruction, shownRevision, "applied", applied),
    };
  }
}
