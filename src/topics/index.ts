/**
 * Topic module.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARCHITECTURE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. EXTRACTION: TopicExtractor sends document excerpts to the extraction
 *    capability in batches and builds revision 0 of a WeightedTopicSet.
 *
 * 2. FEEDBACK: FeedbackProcessor checks the revision the human was shown,
 *    interprets their instruction into a diff and merges it. Every
 *    instruction yields a FeedbackEvent for the negotiation history.
 *
 * 3. SET OPERATIONS: weighted-set.ts holds the pure functions (normalize,
 *    merge, createTopicSet) that keep the set invariants.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXAMPLE USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   const extractor = new TopicExtractor({ capability, config: config.extraction });
 *   const initial = await extractor.extract(excerpts);
 *
 *   const feedback = new FeedbackProcessor({ capability: interpreter, retries: 1 });
 *   const result = await feedback.process(initial, initial.revision, "remove topic 2");
 *   if (result.outcome === "applied") {
 *     console.log(describeTopicSet(result.set));
 *   }
 */

// Schema and types
export {
  TopicSchema,
  WeightedTopicSetSchema,
  ExtractedTopicSchema,
  ExtractedTopicListSchema,
  TopicAdditionSchema,
  TopicReweightSchema,
  TopicDiffSchema,
  AppliedDiffSchema,
  FeedbackOutcomeKind,
  FeedbackEventSchema,
  emptyAppliedDiff,
  type Topic,
  type WeightedTopicSet,
  type ExtractedTopic,
  type TopicAddition,
  type TopicReweight,
  type TopicDiff,
  type TopicDiffInput,
  type AppliedDiff,
  type FeedbackEvent,
} from "./schema.js";

// Set operations
export {
  WEIGHT_TOLERANCE,
  allocateTopicId,
  createTopicSet,
  describeTopicSet,
  findTopic,
  isEffectiveDiff,
  isNormalized,
  merge,
  normalize,
  slugifyTopicName,
  sumWeights,
  type MergeResult,
  type TopicSeed,
} from "./weighted-set.js";

// Extraction and feedback
export { TopicExtractor, type TopicExtractorOptions } from "./extractor.js";
export {
  FeedbackProcessor,
  type FeedbackProcessorOptions,
  type FeedbackResult,
} from "./feedback.js";
