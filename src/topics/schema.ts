/**
 * Topic schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WEIGHTED TOPIC SET: THE SHARED DATA MODEL
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A WeightedTopicSet is an ordered list of topics (insertion order is the
 * order they are presented in) plus a revision counter.
 *
 * INVARIANTS (enforced by weighted-set.ts, never by callers):
 *   1. Topic IDs are unique within a set and stable across revisions
 *   2. Weights are non-negative and sum to 1.0 after every revision
 *   3. A topic whose weight reaches 0 is removed from the set
 *   4. Every successful merge increments the revision by exactly one
 *
 * Hierarchy is expressed through tags, not nesting: a sub-topic carries
 * the parent's name among its tags.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";

const Weight = z.number().finite().nonnegative();

export const TopicSchema = z
  .object({
    /** Stable identifier, derived from the name when the topic is created */
    id: z.string().min(1),
    /** Display name */
    name: z.string().min(1),
    /** Relative importance; normalized across the set */
    weight: Weight,
    /** Parent or related topic names */
    tags: z.array(z.string()),
    /** Why the topic was proposed, when the extractor said so */
    rationale: z.string().optional(),
  })
  .strict();
export type Topic = z.infer<typeof TopicSchema>;

export const WeightedTopicSetSchema = z
  .object({
    topics: z.array(TopicSchema),
    revision: z.number().int().nonnegative(),
  })
  .strict();
export type WeightedTopicSet = z.infer<typeof WeightedTopicSetSchema>;

/**
 * ═══════════════════════════════════════════════════════════════════════════
 * CAPABILITY OUTPUT SCHEMAS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Shapes returned by the external extraction and interpretation
 * capabilities. They are parsed before use; output that fails to parse
 * is treated as a capability failure.
 */

export const ExtractedTopicSchema = z.object({
  name: z.string().trim().min(1, "Topic name must not be empty"),
  rationale: z.string().optional(),
  /** Optional coverage estimate; defaults to 1 per occurrence */
  weight: Weight.optional(),
  tags: z.array(z.string()).optional(),
});
export type ExtractedTopic = z.infer<typeof ExtractedTopicSchema>;

export const ExtractedTopicListSchema = z.array(ExtractedTopicSchema);

export const TopicAdditionSchema = z.object({
  name: z.string().trim().min(1),
  weight: Weight.optional(),
  tags: z.array(z.string()).optional(),
});
export type TopicAddition = z.infer<typeof TopicAdditionSchema>;

export const TopicReweightSchema = z.object({
  /** Topic ID or name (case-insensitive) */
  topic: z.string().trim().min(1),
  weight: Weight,
});
export type TopicReweight = z.infer<typeof TopicReweightSchema>;

/**
 * Structured diff interpreted from a feedback instruction.
 * Removals reference topics by ID or name.
 */
export const TopicDiffSchema = z.object({
  add: z.array(TopicAdditionSchema).default([]),
  remove: z.array(z.string().trim().min(1)).default([]),
  reweight: z.array(TopicReweightSchema).default([]),
});
export type TopicDiff = z.infer<typeof TopicDiffSchema>;
export type TopicDiffInput = z.input<typeof TopicDiffSchema>;

/**
 * What a merge actually did, kept on every feedback event for audit.
 * Weights in `reweighted` are the raw values before renormalization.
 */
export const AppliedDiffSchema = z
  .object({
    added: z.array(z.string()),
    removed: z.array(z.string()),
    reweighted: z.array(z.object({ id: z.string(), weight: Weight }).strict()),
    /** References in the diff that matched nothing or were overridden */
    ignored: z.array(z.string()),
  })
  .strict();
export type AppliedDiff = z.infer<typeof AppliedDiffSchema>;

export function emptyAppliedDiff(): AppliedDiff {
  return { added: [], removed: [], reweighted: [], ignored: [] };
}

export const FeedbackOutcomeKind = z.enum([
  "applied",
  "interpretation_failed",
  "stale",
  "rejected",
]);
export type FeedbackOutcomeKind = z.infer<typeof FeedbackOutcomeKind>;

export const FeedbackEventSchema = z
  .object({
    instruction: z.string(),
    /** Revision the human was shown when writing the instruction */
    revision: z.number().int().nonnegative(),
    outcome: FeedbackOutcomeKind,
    diff: AppliedDiffSchema,
    message: z.string().optional(),
    recordedAt: z.string(),
  })
  .strict();
export type FeedbackEvent = z.infer<typeof FeedbackEventSchema>;
