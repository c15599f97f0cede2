/**
 * Topic extraction.
 *
 * Turns retrieved document excerpts into the first revision of a weighted
 * topic set. Excerpts are sent to the extraction capability in batches;
 * every call is told which topics earlier batches already produced, and a
 * topic named by several batches accumulates weight. The heaviest
 * `targetCount` topics are kept, in order of first appearance.
 */

import type { ExtractionConfig } from "../config/workflow/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { TopicExtractionCapability } from "../types/capabilities.js";
import { ExtractionFailedError, describeError } from "../types/errors.js";
import { withRetryResult } from "../utils/retry.js";
import { ExtractedTopicListSchema, type ExtractedTopic, type WeightedTopicSet } from "./schema.js";
import { createTopicSet, type TopicSeed } from "./weighted-set.js";

export interface TopicExtractorOptions {
  capability: TopicExtractionCapability;
  config: ExtractionConfig;
  retryDelayMs?: number;
  logger?: Logger;
}

interface Candidate {
  seed: TopicSeed & { weight: number; tags: string[] };
  firstSeen: number;
}

export class TopicExtractor {
  private readonly capability: TopicExtractionCapability;
  private readonly config: ExtractionConfig;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: TopicExtractorOptions) {
    this.capability = options.capability;
    this.config = options.config;
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Extract an initial topic set (revision 0).
   *
   * @throws ExtractionFailedError when there is nothing to analyse, a batch
   *   keeps failing after its retries, or no usable topic comes back
   */
  async extract(
    excerpts: readonly string[],
    targetCount: number = this.config.targetTopicCount
  ): Promise<WeightedTopicSet> {
    const usable = excerpts
      .map((excerpt) => excerpt.trim())
      .filter((excerpt) => excerpt.length > 0)
      .slice(0, this.config.maxExcerpts);

    if (usable.length === 0) {
      throw new ExtractionFailedError("No document excerpts to extract topics from");
    }

    const batches: string[][] = [];
    for (let start = 0; start < usable.length; start += this.config.batchSize) {
      batches.push(usable.slice(start, start + this.config.batchSize));
    }

    const candidates = new Map<string, Candidate>();

    for (const [index, batch] of batches.entries()) {
      const knownTopics = [...candidates.values()].map((candidate) => candidate.seed.name);
      const topics = await this.extractBatch(batch, targetCount, knownTopics, index, batches.length);

      for (const topic of topics) {
        this.accumulate(candidates, topic);
      }
    }

    if (candidates.size === 0) {
      throw new ExtractionFailedError("Topic extraction returned no usable topics");
    }

    const kept = [...candidates.values()]
      .sort((a, b) => b.seed.weight - a.seed.weight || a.firstSeen - b.firstSeen)
      .slice(0, targetCount)
      .sort((a, b) => a.firstSeen - b.firstSeen);

    const set = createTopicSet(kept.map((candidate) => candidate.seed));
    this.logger.info("Topics extracted", {
      excerpts: usable.length,
      batches: batches.length,
      candidates: candidates.size,
      kept: set.topics.length,
    });
    return set;
  }

  private async extractBatch(
    excerpts: string[],
    targetCount: number,
    knownTopics: string[],
    index: number,
    total: number
  ): Promise<ExtractedTopic[]> {
    const result = await withRetryResult(
      async () =>
        ExtractedTopicListSchema.parse(
          await this.capability.extractTopics({ excerpts, targetCount, knownTopics })
        ),
      {
        maxAttempts: this.config.retries + 1,
        delayMs: this.retryDelayMs,
        onRetry: (attempt, error) =>
          this.logger.warn("Topic extraction attempt failed", {
            batch: index + 1,
            attempt,
            error: error.message,
          }),
      }
    );

    if (!result.ok) {
      throw new ExtractionFailedError(
        `Topic extraction failed on batch ${index + 1} of ${total}: ${describeError(result.error)}`,
        { cause: result.error }
      );
    }
    return result.value;
  }

  private accumulate(candidates: Map<string, Candidate>, topic: ExtractedTopic): void {
    const key = topic.name.toLowerCase();
    const weight = topic.weight ?? 1;
    const existing = candidates.get(key);

    if (existing) {
      existing.seed.weight += weight;
      existing.seed.tags = [...new Set([...existing.seed.tags, ...(topic.tags ?? [])])];
      existing.seed.rationale ??= topic.rationale;
      return;
    }
    if (weight <= 0) {
      return;
    }

    candidates.set(key, {
      firstSeen: candidates.size,
      seed: {
        name: topic.name,
        weight,
        tags: [...(topic.tags ?? [])],
        ...(topic.rationale !== undefined ? { rationale: topic.rationale } : {}),
      },
    });
  }
}
