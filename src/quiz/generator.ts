/**
 * Quiz generation from a confirmed topic set.
 *
 * Slots are allocated by weight (allocation.ts), interleaved across topics
 * and given a difficulty from the configured distribution. Each slot is
 * generated with its own retry budget. A prompt repeating an earlier one
 * for the same topic is regenerated once.
 *
 * A slot that still fails marks its topic as exhausted and moves to the
 * heaviest topic that is not, together with every later slot of the
 * failed topic. Generation fails only when no topic is left.
 *
 * Questions written by the user come first. Each is assigned a topic and
 * an answer key by the completion capability and counts towards that
 * topic's allocation, on top of the requested question count.
 *
 * Without an evaluator open questions cannot be scored, so the generator
 * is built with `openQuestions: false` and treats them as failed output.
 */

import type { QuizConfig } from "../config/workflow/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { Topic, WeightedTopicSet } from "../topics/schema.js";
import { findTopic } from "../topics/weighted-set.js";
import type {
  DocumentRetriever,
  QuestionGenerationCapability,
  UserQuestionCapability,
} from "../types/capabilities.js";
import { EmptyTopicSetError, GenerationFailedError, describeError } from "../types/errors.js";
import { Err, type Result } from "../utils/result.js";
import { withRetryResult } from "../utils/retry.js";
import { allocateQuestions, interleaveSlots, planDifficulties } from "./allocation.js";
import {
  GeneratedQuestionSchema,
  QuestionKind,
  UserQuestionCompletionSchema,
  type Difficulty,
  type GeneratedQuestion,
  type KeyedQuestion,
  type QuizQuestion,
  type TopicAllocation,
} from "./schema.js";

export interface QuizGeneratorOptions {
  capability: QuestionGenerationCapability;
  config: QuizConfig;
  /** Source of per-topic context; questions are generated without it when absent */
  retriever?: DocumentRetriever;
  /** Completes questions written by the user */
  userQuestions?: UserQuestionCapability;
  /** Whether open questions may be produced; false when nothing can score them */
  openQuestions?: boolean;
  retryDelayMs?: number;
  logger?: Logger;
}

export interface GenerateOptions {
  /** Document collection to retrieve topic context from */
  documentsRef?: string;
  /** Questions written by the user, asked before the generated ones */
  userQuestions?: readonly string[];
}

export interface GeneratedQuiz {
  questions: QuizQuestion[];
  /** Final per-topic counts, after any reallocation */
  allocation: TopicAllocation[];
  warnings: string[];
}

/**
 * Key used to detect repeated prompts: case and whitespace are ignored.
 */
export function promptKey(prompt: string): string {
  return prompt.trim().replace(/\s+/g, " ").toLowerCase();
}

function toQuizQuestion(
  id: string,
  topicId: string,
  difficulty: Difficulty,
  prompt: string,
  keyed: KeyedQuestion
): QuizQuestion {
  const base = {
    id,
    topicId,
    prompt,
    difficulty,
    ...(keyed.explanation !== undefined ? { explanation: keyed.explanation } : {}),
  };

  switch (keyed.kind) {
    case "open":
      return { ...base, kind: "open", answerKey: { reference: keyed.answerKey.reference } };
    case "single_choice":
      return { ...base, kind: "single_choice", answerKey: sortedKey(keyed.answerKey) };
    case "multi_choice":
      return { ...base, kind: "multi_choice", answerKey: sortedKey(keyed.answerKey) };
  }
}

function assertScorable(kind: QuestionKind, kinds: readonly QuestionKind[]): void {
  if (!kinds.includes(kind)) {
    throw new Error(`Question kind "${kind}" cannot be scored`);
  }
}

function sortedKey(key: { choices: string[]; correct: number[] }): {
  choices: string[];
  correct: number[];
} {
  return { choices: [...key.choices], correct: [...key.correct].sort((a, b) => a - b) };
}

export class QuizGenerator {
  private readonly capability: QuestionGenerationCapability;
  private readonly config: QuizConfig;
  private readonly retriever: DocumentRetriever | undefined;
  private readonly completion: UserQuestionCapability | undefined;
  private readonly kinds: readonly QuestionKind[];
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: QuizGeneratorOptions) {
    this.capability = options.capability;
    this.config = options.config;
    this.retriever = options.retriever;
    this.completion = options.userQuestions;
    this.kinds =
      options.openQuestions === false
        ? QuestionKind.options.filter((kind) => kind !== "open")
        : QuestionKind.options;
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Generate `questionCount` questions for the confirmed topics, after
   * any questions the user wrote.
   *
   * @throws EmptyTopicSetError if no topic has a positive weight
   * @throws GenerationFailedError if every topic failed to produce a question
   * @throws RangeError if user questions are given without a completion capability
   */
  async generate(
    confirmed: WeightedTopicSet,
    questionCount: number = this.config.questionCount,
    options: GenerateOptions = {}
  ): Promise<GeneratedQuiz> {
    const topics = confirmed.topics.filter((topic) => topic.weight > 0);
    if (topics.length === 0) {
      throw new EmptyTopicSetError("Cannot generate a quiz without topics");
    }
    const userQuestions = options.userQuestions ?? [];
    if (userQuestions.length > 0 && this.completion === undefined) {
      throw new RangeError("User questions need a question completion capability");
    }

    const counts = allocateQuestions(
      topics.map((topic) => topic.weight),
      questionCount,
      this.config.minQuestionsPerTopic
    );
    const slots = interleaveSlots(counts);
    const difficulties = planDifficulties(slots.length, this.config.difficultyDistribution);

    const warnings: string[] = [];
    const questions: QuizQuestion[] = [];
    const exhausted = new Set<number>();
    const prompts = new Map<string, string[]>();
    const contexts = new Map<string, string[]>();

    for (const text of userQuestions) {
      const prompt = text.trim();
      const id = `q${questions.length + 1}`;
      const completed = await this.completeUserQuestion(topics, id, prompt, prompts, warnings);
      if (completed === undefined) {
        continue;
      }
      const { topicIndex, question } = completed;
      counts[topicIndex] = (counts[topicIndex] ?? 0) + 1;
      questions.push(question);
    }

    for (const [slot, assigned] of slots.entries()) {
      const difficulty = difficulties[slot] ?? "medium";
      let topicIndex = assigned;

      for (;;) {
        if (exhausted.has(topicIndex)) {
          const replacement = this.pickReplacement(topics, exhausted);
          if (replacement === undefined) {
            throw new GenerationFailedError(
              `No topic could produce question ${slot + 1} of ${slots.length}`
            );
          }
          counts[topicIndex] = (counts[topicIndex] ?? 1) - 1;
          counts[replacement] = (counts[replacement] ?? 0) + 1;
          topicIndex = replacement;
        }

        const topic = topics[topicIndex];
        if (topic === undefined) {
          throw new GenerationFailedError(`Slot ${slot + 1} has no topic`);
        }

        const context = await this.contextFor(topic, contexts, options.documentsRef, warnings);
        const seen = prompts.get(topic.id) ?? [];
        const result = await this.generateForTopic(topic, difficulty, context, seen, warnings);

        if (result.ok) {
          seen.push(result.value.prompt);
          prompts.set(topic.id, seen);
          questions.push(
            toQuizQuestion(`q${questions.length + 1}`, topic.id, difficulty, result.value.prompt, result.value)
          );
          break;
        }

        exhausted.add(topicIndex);
        const message = `Question generation for "${topic.name}" failed; moving its remaining questions: ${result.error.message}`;
        warnings.push(message);
        this.logger.warn("Question slot reallocated", {
          topicId: topic.id,
          slot: slot + 1,
          error: result.error.message,
        });
      }
    }

    this.logger.info("Quiz generated", { questions: questions.length, warnings: warnings.length });
    return {
      questions,
      allocation: topics.map((topic, index) => ({ topicId: topic.id, count: counts[index] ?? 0 })),
      warnings,
    };
  }

  /**
   * Turn one user-written question into a quiz question. Returns undefined,
   * with a warning, when it repeats an earlier question or cannot be
   * completed.
   */
  private async completeUserQuestion(
    topics: readonly Topic[],
    id: string,
    prompt: string,
    prompts: Map<string, string[]>,
    warnings: string[]
  ): Promise<{ topicIndex: number; question: QuizQuestion } | undefined> {
    const completion = this.completion;
    if (completion === undefined) {
      return undefined;
    }
    if (prompt === "") {
      warnings.push("An empty user question was skipped");
      return undefined;
    }
    const key = promptKey(prompt);
    if ([...prompts.values()].some((seen) => seen.some((earlier) => promptKey(earlier) === key))) {
      warnings.push(`Repeated user question "${prompt}" was skipped`);
      return undefined;
    }

    const result = await withRetryResult(
      async () => {
        const completed = UserQuestionCompletionSchema.parse(
          await completion.completeQuestion({
            prompt,
            topics: topics.map((topic) => ({ id: topic.id, name: topic.name })),
            kinds: this.kinds,
          })
        );
        assertScorable(completed.kind, this.kinds);
        const topic = findTopic(topics, completed.topic);
        if (topic === undefined) {
          throw new Error(`Unknown topic "${completed.topic}"`);
        }
        return { topic, completed };
      },
      {
        maxAttempts: this.config.generationRetries + 1,
        delayMs: this.retryDelayMs,
        onRetry: (attempt, error) =>
          this.logger.debug("User question completion attempt failed", { attempt, error: error.message }),
      }
    );

    if (!result.ok) {
      warnings.push(`User question "${prompt}" was skipped: ${result.error.message}`);
      this.logger.warn("User question skipped", { error: result.error.message });
      return undefined;
    }

    const { topic, completed } = result.value;
    const seen = prompts.get(topic.id) ?? [];
    seen.push(prompt);
    prompts.set(topic.id, seen);
    return {
      topicIndex: topics.indexOf(topic),
      question: toQuizQuestion(id, topic.id, completed.difficulty ?? "medium", prompt, completed),
    };
  }

  /** Heaviest topic not yet exhausted; earlier topics win ties */
  private pickReplacement(topics: readonly Topic[], exhausted: ReadonlySet<number>): number | undefined {
    let best: number | undefined;
    topics.forEach((topic, index) => {
      if (exhausted.has(index)) {
        return;
      }
      if (best === undefined || topic.weight > (topics[best]?.weight ?? 0)) {
        best = index;
      }
    });
    return best;
  }

  private async contextFor(
    topic: Topic,
    cache: Map<string, string[]>,
    documentsRef: string | undefined,
    warnings: string[]
  ): Promise<string[]> {
    const cached = cache.get(topic.id);
    if (cached) {
      return cached;
    }

    let context: string[] = [];
    const k = this.config.contextExcerptsPerQuestion;
    if (this.retriever && documentsRef !== undefined && k > 0) {
      try {
        context = await this.retriever.retrieve({ documentsRef, query: topic.name, k });
      } catch (error) {
        warnings.push(`No context retrieved for "${topic.name}": ${describeError(error)}`);
        this.logger.warn("Context retrieval failed", { topicId: topic.id, error: describeError(error) });
      }
    }
    cache.set(topic.id, context);
    return context;
  }

  private async attempt(
    topic: Topic,
    difficulty: Difficulty,
    context: readonly string[],
    avoid: readonly string[]
  ): Promise<Result<GeneratedQuestion, Error>> {
    return withRetryResult(
      async () => {
        const question = GeneratedQuestionSchema.parse(
          await this.capability.generateQuestion({
            topic: { id: topic.id, name: topic.name, tags: topic.tags },
            difficulty,
            context,
            avoid,
            kinds: this.kinds,
          })
        );
        assertScorable(question.kind, this.kinds);
        return question;
      },
      {
        maxAttempts: this.config.generationRetries + 1,
        delayMs: this.retryDelayMs,
        onRetry: (attempt, error) =>
          this.logger.debug("Question generation attempt failed", {
            topicId: topic.id,
            attempt,
            error: error.message,
          }),
      }
    );
  }

  private async generateForTopic(
    topic: Topic,
    difficulty: Difficulty,
    context: readonly string[],
    seen: readonly string[],
    warnings: string[]
  ): Promise<Result<GeneratedQuestion, Error>> {
    const keys = new Set(seen.map(promptKey));

    const first = await this.attempt(topic, difficulty, context, [...seen]);
    if (!first.ok || !keys.has(promptKey(first.value.prompt))) {
      return first;
    }

    warnings.push(`Repeated prompt for "${topic.name}" was regenerated`);
    const second = await this.attempt(topic, difficulty, context, [...seen, first.value.prompt]);
    if (!second.ok) {
      return second;
    }
    if (keys.has(promptKey(second.value.prompt))) {
      return Err(new GenerationFailedError("Generated prompt repeats an earlier question"));
    }
    return second;
  }
}
