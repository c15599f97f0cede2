/**
 * Negotiation state.
 *
 * `revising` is the status while an instruction is being processed. A
 * stored state is never left in it: every feedback call ends in
 * `awaiting_feedback` or, at the round limit, `confirmed`.
 */

import { z } from "zod";
import { FeedbackEventSchema, WeightedTopicSetSchema } from "../topics/schema.js";

export const NegotiationStatus = z.enum(["extracting", "awaiting_feedback", "revising", "confirmed"]);
export type NegotiationStatus = z.infer<typeof NegotiationStatus>;

export const ConfirmationSource = z.enum(["user", "iteration_cap"]);
export type ConfirmationSource = z.infer<typeof ConfirmationSource>;

export const NegotiationStateSchema = z
  .object({
    status: NegotiationStatus,
    /** Null until extraction has produced the first revision */
    topics: WeightedTopicSetSchema.nullable(),
    revision: z.number().int().nonnegative(),
    /** Feedback instructions received, stale and failed ones included */
    rounds: z.number().int().nonnegative(),
    history: z.array(FeedbackEventSchema),
    confirmation: ConfirmationSource.nullable(),
  })
  .strict();
export type NegotiationState = z.infer<typeof NegotiationStateSchema>;
