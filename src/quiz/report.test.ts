/**
 * Quiz report tests.
 *
 * Run: node --import tsx --test src/quiz/report.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createTopicSet } from "../topics/weighted-set.js";
import { buildQuizReport, formatQuizReport, reportVerdict } from "./report.js";
import type { QuizSessionState } from "./schema.js";

const TOPICS = createTopicSet([{ name: "Graphs" }, { name: "Trees" }, { name: "Heaps" }]).topics;

const STATE: QuizSessionState = {
  status: "completed",
  questions: [
    {
      id: "q1",
      topicId: "graphs",
      kind: "single_choice",
      prompt: "One?",
      difficulty: "easy",
      answerKey: { choices: ["x", "y"], correct: [0] },
    },
    {
      id: "q2",
      topicId: "trees",
      kind: "single_choice",
      prompt: "Two?",
      difficulty: "medium",
      answerKey: { choices: ["x", "y"], correct: [1] },
    },
    {
      id: "q3",
      topicId: "graphs",
      kind: "open",
      prompt: "Three?",
      difficulty: "hard",
      answerKey: { reference: "z" },
    },
  ],
  currentIndex: 3,
  records: [
    {
      questionId: "q1",
      answer: { type: "choice", selected: [0] },
      correct: true,
      score: 1,
      feedback: "Correct! You selected: x",
      answeredAt: "2025-01-01T00:00:00.000Z",
    },
    {
      questionId: "q2",
      answer: { type: "choice", selected: [0] },
      correct: false,
      score: 0,
      feedback: "Incorrect. You selected: x\nCorrect answer(s): y",
      answeredAt: "2025-01-01T00:00:00.000Z",
    },
    {
      questionId: "q3",
      answer: { type: "text", text: "z-ish" },
      correct: true,
      score: 0.8,
      feedback: "Correct! Score: 80%",
      answeredAt: "2025-01-01T00:00:00.000Z",
    },
  ],
  totalScore: 1.8,
  aggregateScore: 0.6,
  allocation: [
    { topicId: "graphs", count: 2 },
    { topicId: "trees", count: 1 },
    { topicId: "heaps", count: 0 },
  ],
};

test("report totals and per-topic breakdown", () => {
  const report = buildQuizReport(STATE, TOPICS);

  assert.equal(report.totalQuestions, 3);
  assert.equal(report.answered, 3);
  assert.equal(report.correctAnswers, 2);
  assert.equal(report.scorePercentage, 60);
  assert.deepEqual(
    report.topics.map((topic) => [topic.topicId, topic.name, topic.questions, topic.correct]),
    [
      ["graphs", "Graphs", 2, 2],
      ["trees", "Trees", 1, 0],
    ]
  );
  assert.ok(Math.abs((report.topics[0]?.score ?? 0) - 0.9) < 1e-9);
});

test("formatted report ends with a verdict", () => {
  assert.equal(
    formatQuizReport(buildQuizReport(STATE, TOPICS)),
    "Quiz results: 2/3 correct (60.0%)\n  - Graphs: 2/2 correct\n  - Trees: 0/1 correct\nGood job!"
  );
});

test("verdict thresholds", () => {
  assert.equal(reportVerdict(80), "Excellent work!");
  assert.equal(reportVerdict(79.9), "Good job!");
  assert.equal(reportVerdict(60), "Good job!");
  assert.equal(reportVerdict(59.9), "Keep studying!");
});
