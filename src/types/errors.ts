/**
 * Workflow error taxonomy.
 *
 * Every error raised by the engine carries a `kind` so callers and the
 * persisted failure record can branch on it without instanceof checks
 * across module boundaries.
 *
 *   ExtractionFailed              no usable topics from the documents
 *   FeedbackInterpretationFailed  instruction mapped to no diff (recoverable)
 *   StaleRevision                 feedback written against an old revision (recoverable)
 *   GenerationFailed              no topic could absorb a failed question slot
 *   EmptyTopicSet                 a set would end up with zero total weight (fatal)
 *   InvalidTransition             operation not valid in the current state
 *   EvaluationFailed              open answer could not be evaluated (recoverable)
 *   InvalidAnswer                 answer shape does not fit the question
 *   SessionNotFound               no persisted state for the session id
 *   SnapshotInvalid               persisted state failed validation
 */

export const WORKFLOW_ERROR_KINDS = [
  "ExtractionFailed",
  "FeedbackInterpretationFailed",
  "StaleRevision",
  "GenerationFailed",
  "EmptyTopicSet",
  "InvalidTransition",
  "EvaluationFailed",
  "InvalidAnswer",
  "SessionNotFound",
  "SnapshotInvalid",
] as const;

export type WorkflowErrorKind = (typeof WORKFLOW_ERROR_KINDS)[number];

export abstract class WorkflowError extends Error {
  abstract readonly kind: WorkflowErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExtractionFailedError extends WorkflowError {
  readonly kind = "ExtractionFailed";
}

export class FeedbackInterpretationFailedError extends WorkflowError {
  readonly kind = "FeedbackInterpretationFailed";
}

export class StaleRevisionError extends WorkflowError {
  readonly kind = "StaleRevision";

  constructor(
    public readonly expectedRevision: number,
    public readonly receivedRevision: number
  ) {
    super(
      `Feedback was written against revision ${receivedRevision}, ` +
        `but the current revision is ${expectedRevision}`
    );
  }
}

export class GenerationFailedError extends WorkflowError {
  readonly kind = "GenerationFailed";
}

export class EmptyTopicSetError extends WorkflowError {
  readonly kind = "EmptyTopicSet";

  constructor(message = "Topic set has no topic with a positive weight") {
    super(message);
  }
}

export class InvalidTransitionError extends WorkflowError {
  readonly kind = "InvalidTransition";

  constructor(
    public readonly operation: string,
    public readonly currentStatus: string
  ) {
    super(`Operation "${operation}" is not valid while status is "${currentStatus}"`);
  }
}

export class EvaluationFailedError extends WorkflowError {
  readonly kind = "EvaluationFailed";
}

export class InvalidAnswerError extends WorkflowError {
  readonly kind = "InvalidAnswer";
}

export class SessionNotFoundError extends WorkflowError {
  readonly kind = "SessionNotFound";

  constructor(public readonly sessionId: string) {
    super(`No workflow state found for session "${sessionId}"`);
  }
}

export class SnapshotInvalidError extends WorkflowError {
  readonly kind = "SnapshotInvalid";
}

export function isWorkflowError(value: unknown): value is WorkflowError {
  return value instanceof WorkflowError;
}

/**
 * Message of any thrown value, for logs and warnings.
 */
export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
