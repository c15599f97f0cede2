/**
 * Question allocation across topics and difficulties.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LARGEST-REMAINDER ALLOCATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Each topic first gets the floor of its exact share `weight * N`. The
 * seats left over go to the largest fractional parts; ties go to the
 * heavier topic, then to the earlier one. The counts always sum to N.
 *
 * When N allows every topic its minimum, topics below it take questions
 * from the topic furthest above the minimum.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { DifficultyDistribution } from "../config/workflow/index.js";
import { DIFFICULTIES, type Difficulty } from "./schema.js";

const EPSILON = 1e-9;

/**
 * Split `total` questions across topics in proportion to their weights.
 *
 * @param weights - Non-negative topic weights, in presentation order
 * @param minPerTopic - Guaranteed count per positive-weight topic when
 *   `total` covers all of them
 */
export function allocateQuestions(
  weights: readonly number[],
  total: number,
  minPerTopic = 0
): number[] {
  const weightSum = weights.reduce((sum, weight) => sum + weight, 0);
  if (weights.length === 0 || total <= 0 || weightSum <= 0) {
    return weights.map(() => 0);
  }

  const quotas = weights.map((weight) => (weight / weightSum) * total);
  const counts = quotas.map((quota) => Math.floor(quota + EPSILON));
  let leftover = total - counts.reduce((sum, count) => sum + count, 0);

  const byRemainder = quotas
    .map((quota, index) => ({ index, remainder: quota - (counts[index] ?? 0) }))
    .sort(
      (a, b) =>
        b.remainder - a.remainder ||
        (weights[b.index] ?? 0) - (weights[a.index] ?? 0) ||
        a.index - b.index
    );

  for (const { index } of byRemainder) {
    if (leftover <= 0) {
      break;
    }
    counts[index] = (counts[index] ?? 0) + 1;
    leftover--;
  }

  const eligible = weights.flatMap((weight, index) => (weight > 0 ? [index] : []));
  if (minPerTopic > 0 && total >= eligible.length * minPerTopic) {
    enforceMinimum(counts, weights, eligible, minPerTopic);
  }

  return counts;
}

function enforceMinimum(
  counts: number[],
  weights: readonly number[],
  eligible: readonly number[],
  minPerTopic: number
): void {
  for (const index of eligible) {
    while ((counts[index] ?? 0) < minPerTopic) {
      let donor = -1;
      for (const candidate of eligible) {
        const surplus = (counts[candidate] ?? 0) - minPerTopic;
        if (surplus <= 0) {
          continue;
        }
        const best = donor < 0 ? 0 : (counts[donor] ?? 0) - minPerTopic;
        if (
          donor < 0 ||
          surplus > best ||
          (surplus === best && (weights[candidate] ?? 0) <= (weights[donor] ?? 0))
        ) {
          donor = candidate;
        }
      }
      if (donor < 0) {
        return;
      }
      counts[donor] = (counts[donor] ?? 0) - 1;
      counts[index] = (counts[index] ?? 0) + 1;
    }
  }
}

/**
 * Order question slots round-robin across topics: one slot per topic per
 * round, topics in presentation order, until each count is used up.
 *
 * @returns Topic index for every slot
 */
export function interleaveSlots(counts: readonly number[]): number[] {
  const slots: number[] = [];
  const rounds = Math.max(0, ...counts);
  for (let round = 0; round < rounds; round++) {
    counts.forEach((count, index) => {
      if (count > round) {
        slots.push(index);
      }
    });
  }
  return slots;
}

/**
 * Difficulty for each of `total` slots. Each slot takes the difficulty
 * furthest behind its share of the slots so far; ties go to the easier one.
 */
export function planDifficulties(total: number, distribution: DifficultyDistribution): Difficulty[] {
  const shareSum = DIFFICULTIES.reduce((sum, difficulty) => sum + distribution[difficulty], 0);
  const assigned: Record<Difficulty, number> = { easy: 0, medium: 0, hard: 0 };
  const plan: Difficulty[] = [];

  for (let slot = 1; slot <= total; slot++) {
    let pick: Difficulty = "medium";
    let bestDeficit = -Infinity;
    for (const difficulty of DIFFICULTIES) {
      const deficit = (distribution[difficulty] / shareSum) * slot - assigned[difficulty];
      if (deficit > bestDeficit + EPSILON) {
        pick = difficulty;
        bestDeficit = deficit;
      }
    }
    assigned[pick]++;
    plan.push(pick);
  }

  return plan;
}
