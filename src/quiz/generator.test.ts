/**
 * Quiz generator tests.
 *
 * Run: node --import tsx --test src/quiz/generator.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import type { QuizConfig } from "../config/workflow/index.js";
import { DeterministicQuestionGenerator, StaticRetriever } from "../testing/fakes.js";
import { createTopicSet } from "../topics/weighted-set.js";
import type {
  QuestionGenerationCapability,
  QuestionGenerationRequest,
  UserQuestionCapability,
  UserQuestionRequest,
} from "../types/capabilities.js";
import { EmptyTopicSetError, GenerationFailedError } from "../types/errors.js";
import { QuizGenerator, promptKey } from "./generator.js";

const CONFIG: QuizConfig = {
  questionCount: 10,
  minQuestionsPerTopic: 1,
  difficultyDistribution: { easy: 0.3, medium: 0.5, hard: 0.2 },
  generationRetries: 1,
  contextExcerptsPerQuestion: 2,
};

const TOPICS = createTopicSet([
  { name: "Graphs", weight: 5 },
  { name: "Trees", weight: 3 },
  { name: "Heaps", weight: 2 },
]);

describe("allocation and ordering", () => {
  test("ten questions split [5, 3, 2] and interleaved", async () => {
    const generator = new QuizGenerator({
      capability: new DeterministicQuestionGenerator(),
      config: CONFIG,
    });

    const quiz = await generator.generate(TOPICS, 10);

    assert.equal(quiz.questions.length, 10);
    assert.deepEqual(quiz.allocation, [
      { topicId: "graphs", count: 5 },
      { topicId: "trees", count: 3 },
      { topicId: "heaps", count: 2 },
    ]);
    assert.deepEqual(
      quiz.questions.map((question) => question.topicId),
      ["graphs", "trees", "heaps", "graphs", "trees", "heaps", "graphs", "trees", "graphs", "graphs"]
    );
    assert.deepEqual(
      quiz.questions.map((question) => question.id).slice(0, 3),
      ["q1", "q2", "q3"]
    );
    assert.deepEqual(quiz.questions[0], {
      id: "q1",
      topicId: "graphs",
      prompt: "Graphs question 1",
      difficulty: "medium",
      explanation: "Covers Graphs at medium level.",
      kind: "single_choice",
      answerKey: { choices: ["Graphs right", "Graphs wrong", "Neither"], correct: [0] },
    });
    assert.deepEqual(quiz.warnings, []);
  });

  test("an empty topic set cannot be quizzed", async () => {
    const generator = new QuizGenerator({
      capability: new DeterministicQuestionGenerator(),
      config: CONFIG,
    });

    await assert.rejects(() => generator.generate({ topics: [], revision: 3 }, 5), EmptyTopicSetError);
  });
});

describe("context retrieval", () => {
  test("each topic is retrieved once and passed as context", async () => {
    const retriever = new StaticRetriever(["ctx one", "ctx two", "ctx three"]);
    const capability = new DeterministicQuestionGenerator();
    const generator = new QuizGenerator({ capability, retriever, config: CONFIG });

    await generator.generate(TOPICS, 10, { documentsRef: "docs-1" });

    assert.deepEqual(
      retriever.calls.map((call) => call.query),
      ["Graphs", "Trees", "Heaps"]
    );
    assert.deepEqual(retriever.calls[0], { documentsRef: "docs-1", query: "Graphs", k: 2 });
    assert.deepEqual(capability.calls[0]?.context, ["ctx one", "ctx two"]);
  });

  test("nothing is retrieved without a document reference", async () => {
    const retriever = new StaticRetriever(["ctx one"]);
    const capability = new DeterministicQuestionGenerator();
    const generator = new QuizGenerator({ capability, retriever, config: CONFIG });

    await generator.generate(TOPICS, 3);

    assert.equal(retriever.calls.length, 0);
    assert.deepEqual(capability.calls[0]?.context, []);
  });

  test("retrieval failure only warns", async () => {
    const generator = new QuizGenerator({
      capability: new DeterministicQuestionGenerator(),
      retriever: new StaticRetriever([], true),
      config: CONFIG,
    });

    const quiz = await generator.generate(TOPICS, 3, { documentsRef: "docs-1" });

    assert.equal(quiz.questions.length, 3);
    assert.equal(quiz.warnings[0], 'No context retrieved for "Graphs": Retriever unavailable');
  });
});

describe("failures", () => {
  test("a failing topic hands its slots to the heaviest remaining topic", async () => {
    const capability = new DeterministicQuestionGenerator({ failingTopics: ["trees"] });
    const generator = new QuizGenerator({ capability, config: CONFIG });

    const quiz = await generator.generate(TOPICS, 10);

    assert.equal(quiz.questions.length, 10);
    assert.deepEqual(quiz.allocation, [
      { topicId: "graphs", count: 8 },
      { topicId: "trees", count: 0 },
      { topicId: "heaps", count: 2 },
    ]);
    assert.equal(capability.calls.filter((call) => call.topic.id === "trees").length, 2);
    assert.equal(quiz.warnings.length, 1);
  });

  test("a repeated prompt is regenerated once, then the topic is given up", async () => {
    const capability = new DeterministicQuestionGenerator({ repeatingTopics: ["heaps"] });
    const generator = new QuizGenerator({ capability, config: CONFIG });

    const quiz = await generator.generate(TOPICS, 10);

    assert.deepEqual(
      quiz.allocation.map((entry) => entry.count),
      [6, 3, 1]
    );
    assert.equal(quiz.warnings[0], 'Repeated prompt for "Heaps" was regenerated');
    const heapCalls = capability.calls.filter((call) => call.topic.id === "heaps");
    assert.deepEqual(heapCalls[1]?.avoid, ["Heaps question 1"]);
    assert.deepEqual(heapCalls[2]?.avoid, ["Heaps question 1", "Heaps question 1"]);
  });

  test("generation fails when no topic can produce questions", async () => {
    const capability = new DeterministicQuestionGenerator({
      failingTopics: ["graphs", "trees", "heaps"],
    });
    const generator = new QuizGenerator({ capability, config: CONFIG });

    await assert.rejects(
      () => generator.generate(TOPICS, 10),
      (err: unknown) =>
        err instanceof GenerationFailedError && err.message === "No topic could produce question 1 of 10"
    );
  });
});

describe("capability output", () => {
  test("correct choices are sorted and invalid keys rejected", async () => {
    let call = 0;
    const capability: QuestionGenerationCapability = {
      async generateQuestion() {
        call++;
        if (call === 1) {
          return {
            kind: "single_choice",
            prompt: "Pick two",
            answerKey: { choices: ["a", "b", "c"], correct: [0, 1] },
          };
        }
        return {
          kind: "multi_choice",
          prompt: "  Which are heaps?  ",
          answerKey: { choices: ["a", "b", "c"], correct: [2, 0] },
        };
      },
    };
    const generator = new QuizGenerator({ capability, config: CONFIG });

    const quiz = await generator.generate(createTopicSet([{ name: "Heaps" }]), 1);

    assert.equal(call, 2);
    const [question] = quiz.questions;
    assert.equal(question?.kind, "multi_choice");
    assert.equal(question?.prompt, "Which are heaps?");
    if (question?.kind === "multi_choice") {
      assert.deepEqual(question.answerKey.correct, [0, 2]);
    }
  });

  test("prompt keys ignore case and spacing", () => {
    assert.equal(promptKey("  What  is a HEAP? "), "what is a heap?");
  });
});

describe("open questions", () => {
  function openFirst(): QuestionGenerationCapability & { calls: QuestionGenerationRequest[] } {
    const calls: QuestionGenerationRequest[] = [];
    return {
      calls,
      async generateQuestion(request) {
        calls.push(request);
        if (calls.length === 1) {
          return { kind: "open", prompt: "Explain heaps", answerKey: { reference: "A tree" } };
        }
        return {
          kind: "single_choice",
          prompt: "Is a heap a tree?",
          answerKey: { choices: ["yes", "no"], correct: [0] },
        };
      },
    };
  }

  test("are rejected and retried when nothing can score them", async () => {
    const capability = openFirst();
    const generator = new QuizGenerator({ capability, config: CONFIG, openQuestions: false });

    const quiz = await generator.generate(createTopicSet([{ name: "Heaps" }]), 1);

    assert.deepEqual(capability.calls[0]?.kinds, ["single_choice", "multi_choice"]);
    assert.equal(capability.calls.length, 2);
    assert.equal(quiz.questions[0]?.kind, "single_choice");
  });

  test("are kept by default", async () => {
    const capability = openFirst();
    const generator = new QuizGenerator({ capability, config: CONFIG });

    const quiz = await generator.generate(createTopicSet([{ name: "Heaps" }]), 1);

    assert.deepEqual(capability.calls[0]?.kinds, ["single_choice", "multi_choice", "open"]);
    assert.equal(quiz.questions[0]?.kind, "open");
  });
});

describe("user questions", () => {
  function completion(topic: string): UserQuestionCapability & { calls: UserQuestionRequest[] } {
    const calls: UserQuestionRequest[] = [];
    return {
      calls,
      async completeQuestion(request) {
        calls.push(request);
        return {
          kind: "multi_choice",
          topic,
          answerKey: { choices: ["a", "b", "c"], correct: [2, 1] },
          difficulty: "hard",
        };
      },
    };
  }

  test("come first and count towards their topic", async () => {
    const capability = new DeterministicQuestionGenerator();
    const userQuestions = completion("trees");
    const generator = new QuizGenerator({ capability, config: CONFIG, userQuestions });

    const quiz = await generator.generate(TOPICS, 10, { userQuestions: ["  Which are balanced?  "] });

    assert.equal(quiz.questions.length, 11);
    assert.deepEqual(quiz.questions[0], {
      id: "q1",
      topicId: "trees",
      prompt: "Which are balanced?",
      difficulty: "hard",
      kind: "multi_choice",
      answerKey: { choices: ["a", "b", "c"], correct: [1, 2] },
    });
    assert.equal(quiz.questions[1]?.id, "q2");
    assert.deepEqual(
      quiz.allocation.map((entry) => entry.count),
      [5, 4, 2]
    );
    assert.deepEqual(userQuestions.calls[0], {
      prompt: "Which are balanced?",
      topics: [
        { id: "graphs", name: "Graphs" },
        { id: "trees", name: "Trees" },
        { id: "heaps", name: "Heaps" },
      ],
      kinds: ["single_choice", "multi_choice", "open"],
    });
    const treeCall = capability.calls.find((call) => call.topic.id === "trees");
    assert.deepEqual(treeCall?.avoid, ["Which are balanced?"]);
  });

  test("an unknown topic skips the question after retries", async () => {
    const userQuestions = completion("Sorting");
    const generator = new QuizGenerator({
      capability: new DeterministicQuestionGenerator(),
      config: CONFIG,
      userQuestions,
    });

    const quiz = await generator.generate(TOPICS, 3, { userQuestions: ["What is quicksort?"] });

    assert.equal(userQuestions.calls.length, 2);
    assert.equal(quiz.questions.length, 3);
    assert.deepEqual(quiz.warnings, [
      'User question "What is quicksort?" was skipped: Unknown topic "Sorting"',
    ]);
  });

  test("a repeated user question is asked once", async () => {
    const userQuestions = completion("Heaps");
    const generator = new QuizGenerator({
      capability: new DeterministicQuestionGenerator(),
      config: CONFIG,
      userQuestions,
    });

    const quiz = await generator.generate(TOPICS, 3, { userQuestions: ["Why heaps?", "why  HEAPS?"] });

    assert.equal(userQuestions.calls.length, 1);
    assert.equal(quiz.questions.length, 4);
    assert.deepEqual(quiz.warnings, ['Repeated user question "why  HEAPS?" was skipped']);
  });

  test("need a completion capability", async () => {
    const generator = new QuizGenerator({
      capability: new DeterministicQuestionGenerator(),
      config: CONFIG,
    });

    await assert.rejects(() => generator.generate(TOPICS, 3, { userQuestions: ["Why?"] }), RangeError);
  });
});
