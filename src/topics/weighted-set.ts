/**
 * Weighted topic set operations.
 *
 * All functions are pure: they never mutate their inputs and always return
 * fresh topic objects. The negotiation state machine relies on this to keep
 * earlier revisions intact when a merge is rejected.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * MERGE SEMANTICS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A diff is applied in this order:
 *
 *   1. Removals resolve topic references (ID, or name case-insensitively).
 *   2. An addition naming a topic that is also being removed turns into a
 *      reweight of that topic, so its ID survives.
 *   3. Reweights set a raw weight on the current (normalized) scale. A
 *      reweight of a topic that is being removed is dropped: remove wins.
 *      A reweight to 0 removes the topic.
 *   4. New topics get their explicit weight, or the mean of the surviving
 *      weights when none is given.
 *   5. The result is renormalized and the revision incremented by one.
 *
 * A diff that would leave no topic is rejected with EmptyTopicSetError;
 * the base set is left as it was.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { EmptyTopicSetError } from "../types/errors.js";
import {
  emptyAppliedDiff,
  type AppliedDiff,
  type Topic,
  type TopicAddition,
  type TopicDiffInput,
  type WeightedTopicSet,
} from "./schema.js";

/** Tolerance used when checking that weights sum to 1 */
export const WEIGHT_TOLERANCE = 1e-9;

const MAX_SLUG_LENGTH = 64;

/**
 * Input for building a set from scratch.
 */
export interface TopicSeed {
  name: string;
  weight?: number;
  tags?: readonly string[];
  rationale?: string;
}

export interface MergeResult {
  set: WeightedTopicSet;
  applied: AppliedDiff;
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Derive a URL-safe identifier from a topic name.
 */
export function slugifyTopicName(name: string): string {
  const slug = name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, MAX_SLUG_LENGTH);
  return slug.length > 0 ? slug : "topic";
}

/**
 * Pick an ID for a new topic that does not collide with `taken`.
 * Collisions get a numeric suffix: "graphs", "graphs-2", "graphs-3".
 */
export function allocateTopicId(name: string, taken: ReadonlySet<string>): string {
  const base = slugifyTopicName(name);
  if (!taken.has(base)) {
    return base;
  }
  let suffix = 2;
  while (taken.has(`${base}-${suffix}`)) {
    suffix++;
  }
  return `${base}-${suffix}`;
}

export function sumWeights(topics: readonly Topic[]): number {
  return topics.reduce((total, topic) => total + topic.weight, 0);
}

/**
 * Whether weights sum to 1 within tolerance and none is negative.
 */
export function isNormalized(topics: readonly Topic[]): boolean {
  return (
    topics.every((topic) => topic.weight >= 0) &&
    Math.abs(sumWeights(topics) - 1) <= WEIGHT_TOLERANCE * Math.max(1, topics.length)
  );
}

/**
 * Rescale weights so they sum to 1, preserving their ratios.
 *
 * @throws RangeError if a weight is negative or not finite
 * @throws EmptyTopicSetError if the total weight is zero
 */
export function normalize(topics: readonly Topic[]): Topic[] {
  for (const topic of topics) {
    if (!Number.isFinite(topic.weight) || topic.weight < 0) {
      throw new RangeError(`Topic "${topic.name}" has invalid weight ${topic.weight}`);
    }
  }

  let weights = topics.map((topic) => topic.weight);
  let total = sumWeights(topics);
  if (topics.length === 0 || total <= 0) {
    throw new EmptyTopicSetError();
  }
  // The sum of finite weights can still overflow; rescale by the largest first.
  if (!Number.isFinite(total)) {
    const largest = Math.max(...weights);
    weights = weights.map((weight) => weight / largest);
    total = weights.reduce((sum, weight) => sum + weight, 0);
  }

  return topics.map((topic, index) => ({
    ...topic,
    tags: [...topic.tags],
    weight: (weights[index] ?? 0) / total,
  }));
}

/**
 * Find a topic by ID, falling back to a case-insensitive name match.
 */
export function findTopic(topics: readonly Topic[], ref: string): Topic | undefined {
  const key = ref.trim();
  return topics.find((topic) => topic.id === key) ?? topics.find((topic) => sameName(topic.name, key));
}

/**
 * Build a normalized set from seeds. Seeds repeating a name are folded
 * into the first occurrence with their weights summed; seeds without a
 * weight count as 1.
 */
export function createTopicSet(seeds: readonly TopicSeed[], revision = 0): WeightedTopicSet {
  const folded: TopicSeed[] = [];

  for (const seed of seeds) {
    const weight = seed.weight ?? 1;
    const existing = folded.find((entry) => sameName(entry.name, seed.name));
    if (existing) {
      existing.weight = (existing.weight ?? 1) + weight;
      existing.tags = [...new Set([...(existing.tags ?? []), ...(seed.tags ?? [])])];
      continue;
    }
    folded.push({ ...seed, name: seed.name.trim(), weight });
  }

  const taken = new Set<string>();
  const topics: Topic[] = [];
  for (const seed of folded) {
    if ((seed.weight ?? 1) <= 0) {
      continue;
    }
    const id = allocateTopicId(seed.name, taken);
    taken.add(id);
    topics.push({
      id,
      name: seed.name,
      weight: seed.weight ?? 1,
      tags: [...(seed.tags ?? [])],
      ...(seed.rationale !== undefined ? { rationale: seed.rationale } : {}),
    });
  }

  return { topics: normalize(topics), revision };
}

/**
 * Whether a merge changed anything.
 */
export function isEffectiveDiff(applied: AppliedDiff): boolean {
  return applied.added.length + applied.removed.length + applied.reweighted.length > 0;
}

/**
 * Apply a structured diff to a set, producing the next revision.
 *
 * @throws EmptyTopicSetError if the diff would leave no topic
 */
export function merge(base: WeightedTopicSet, diff: TopicDiffInput): MergeResult {
  const applied = emptyAppliedDiff();
  const removeIds = new Set<string>();
  const explicitWeights = new Map<string, number>();
  const newcomers: TopicAddition[] = [];

  for (const ref of diff.remove ?? []) {
    const topic = findTopic(base.topics, ref);
    if (topic) {
      removeIds.add(topic.id);
    } else {
      applied.ignored.push(ref);
    }
  }

  for (const addition of diff.add ?? []) {
    const existing = findTopic(base.topics, addition.name);
    if (existing) {
      if (removeIds.has(existing.id)) {
        removeIds.delete(existing.id);
        explicitWeights.set(existing.id, addition.weight ?? existing.weight);
      } else if (addition.weight !== undefined) {
        explicitWeights.set(existing.id, addition.weight);
      } else {
        applied.ignored.push(addition.name);
      }
      continue;
    }
    if (newcomers.some((entry) => sameName(entry.name, addition.name))) {
      applied.ignored.push(addition.name);
      continue;
    }
    newcomers.push(addition);
  }

  for (const reweight of diff.reweight ?? []) {
    const topic = findTopic(base.topics, reweight.topic);
    if (!topic || removeIds.has(topic.id)) {
      applied.ignored.push(reweight.topic);
      continue;
    }
    explicitWeights.set(topic.id, reweight.weight);
  }

  const survivors: Topic[] = [];
  for (const topic of base.topics) {
    if (removeIds.has(topic.id)) {
      applied.removed.push(topic.id);
      continue;
    }
    const weight = explicitWeights.get(topic.id);
    if (weight === undefined) {
      survivors.push(topic);
      continue;
    }
    applied.reweighted.push({ id: topic.id, weight });
    if (weight <= 0) {
      applied.removed.push(topic.id);
      continue;
    }
    survivors.push({ ...topic, weight });
  }

  const defaultWeight =
    survivors.length > 0
      ? survivors.reduce((mean, topic) => mean + topic.weight / survivors.length, 0)
      : 1;
  const taken = new Set(base.topics.map((topic) => topic.id));

  for (const addition of newcomers) {
    const weight = addition.weight ?? defaultWeight;
    if (weight <= 0) {
      applied.ignored.push(addition.name);
      continue;
    }
    const id = allocateTopicId(addition.name, taken);
    taken.add(id);
    survivors.push({ id, name: addition.name.trim(), weight, tags: [...(addition.tags ?? [])] });
    applied.added.push(id);
  }

  if (survivors.length === 0) {
    throw new EmptyTopicSetError("Feedback would remove every remaining topic");
  }

  return {
    set: { topics: normalize(survivors), revision: base.revision + 1 },
    applied,
  };
}

/**
 * Render a set as a numbered list with percentages, in presentation order.
 */
export function describeTopicSet(set: WeightedTopicSet): string {
  return set.topics
    .map((topic, index) => `${index + 1}. ${topic.name} (${(topic.weight * 100).toFixed(1)}%)`)
    .join("\n");
}
