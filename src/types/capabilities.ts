/**
 * Capability interfaces consumed by the workflow engine.
 *
 * Each interface is implemented outside the core: a retrieval layer, an
 * LLM-backed adapter, a storage backend. The engine depends only on these
 * shapes, so any provider can be swapped in behind them. Return values of
 * the LLM-backed capabilities are parsed with zod before use; an adapter
 * may throw, and the engine translates that into its own error kinds.
 */

import type { ExtractedTopic, Topic, TopicDiffInput } from "../topics/schema.js";
import type {
  AnswerEvaluation,
  Difficulty,
  GeneratedQuestionInput,
  QuestionKind,
  UserQuestionCompletionInput,
} from "../quiz/schema.js";

export interface RetrievalRequest {
  /** Opaque reference to the uploaded document collection */
  documentsRef: string;
  query: string;
  /** Maximum number of excerpts to return */
  k: number;
}

export interface DocumentRetriever {
  /** Excerpts ordered by relevance */
  retrieve(request: RetrievalRequest): Promise<string[]>;
}

export interface TopicExtractionRequest {
  excerpts: readonly string[];
  targetCount: number;
  /** Topic names found in earlier batches of the same extraction */
  knownTopics: readonly string[];
}

export interface TopicExtractionCapability {
  extractTopics(request: TopicExtractionRequest): Promise<ExtractedTopic[]>;
}

export interface FeedbackInterpretationRequest {
  topics: readonly Topic[];
  instruction: string;
  /** Earlier instructions in this negotiation, oldest first */
  history: readonly string[];
}

export interface FeedbackInterpretationCapability {
  interpret(request: FeedbackInterpretationRequest): Promise<TopicDiffInput>;
}

export interface QuestionGenerationRequest {
  topic: Pick<Topic, "id" | "name" | "tags">;
  difficulty: Difficulty;
  /** Retrieved excerpts about the topic; empty when none are available */
  context: readonly string[];
  /** Prompts already generated for this topic */
  avoid: readonly string[];
  /** Question kinds that can be scored; anything else is rejected */
  kinds: readonly QuestionKind[];
}

export interface QuestionGenerationCapability {
  generateQuestion(request: QuestionGenerationRequest): Promise<GeneratedQuestionInput>;
}

export interface UserQuestionRequest {
  /** The question as the user wrote it */
  prompt: string;
  /** Confirmed topics the question must be assigned to */
  topics: readonly Pick<Topic, "id" | "name">[];
  kinds: readonly QuestionKind[];
}

/**
 * Assigns a user-written question to a topic and works out its answer key.
 */
export interface UserQuestionCapability {
  completeQuestion(request: UserQuestionRequest): Promise<UserQuestionCompletionInput>;
}

export interface AnswerEvaluationRequest {
  prompt: string;
  answer: string;
  reference: string;
}

export interface AnswerEvaluationCapability {
  evaluate(request: AnswerEvaluationRequest): Promise<AnswerEvaluation>;
}

/**
 * Persistence backend. Stores the serialized workflow record verbatim and
 * never interprets it.
 */
export interface StateStore {
  save(sessionId: string, serialized: string): Promise<void>;
  /** Null when nothing was saved under the ID */
  load(sessionId: string): Promise<string | null>;
}

/** Source of timestamps, injectable for replayable runs */
export type Clock = () => Date;
