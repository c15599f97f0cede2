/**
 * Workflow state schema.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * THE PERSISTED RECORD
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * One WorkflowState per session is everything needed to resume it: the
 * negotiation state, the quiz session once topics are confirmed, and the
 * report once the quiz is completed. Nothing else is kept between calls.
 *
 * Phases:
 *   negotiation ──confirm──▶ quiz ──last answer──▶ completed
 *        │                    │
 *        └──── fatal error ───┴──▶ failed
 *
 * VERSIONING: `version` follows semver. Records whose major version differs
 * from WORKFLOW_STATE_VERSION are refused on load.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";
import { NegotiationStateSchema } from "../negotiation/schema.js";
import { QuizReportSchema, QuizSessionStateSchema } from "../quiz/schema.js";
import { WORKFLOW_ERROR_KINDS } from "../types/errors.js";

export const WORKFLOW_STATE_VERSION = "1.0.0";

export const SessionIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,128}$/, "Session id must be 1-128 letters, digits, '_' or '-'");

export const WorkflowPhase = z.enum(["negotiation", "quiz", "completed", "failed"]);
export type WorkflowPhase = z.infer<typeof WorkflowPhase>;

export const WorkflowFailureSchema = z
  .object({
    kind: z.enum(WORKFLOW_ERROR_KINDS),
    message: z.string(),
    /** Phase the workflow was in when it failed */
    phase: z.enum(["negotiation", "quiz"]),
    failedAt: z.string(),
  })
  .strict();
export type WorkflowFailure = z.infer<typeof WorkflowFailureSchema>;

export const WorkflowStateSchema = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/),
    sessionId: SessionIdSchema,
    /** Opaque reference to the document collection, passed to the retriever */
    documentsRef: z.string(),
    phase: WorkflowPhase,
    negotiation: NegotiationStateSchema,
    quiz: QuizSessionStateSchema.nullable(),
    report: QuizReportSchema.nullable(),
    failure: WorkflowFailureSchema.nullable(),
    /** Warnings raised by the most recent transition */
    warnings: z.array(z.string()),
    /** Number of transitions applied since start */
    sequence: z.number().int().nonnegative(),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
  .strict();
export type WorkflowState = z.infer<typeof WorkflowStateSchema>;
