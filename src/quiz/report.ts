/**
 * Final quiz report.
 */

import type { Topic } from "../topics/schema.js";
import type { QuizReport, QuizSessionState, TopicScore } from "./schema.js";

/**
 * Summarize a session per topic. Topics appear in allocation order; those
 * that ended up with no questions are left out.
 */
export function buildQuizReport(state: QuizSessionState, topics: readonly Topic[]): QuizReport {
  const topicOf = new Map(state.questions.map((question) => [question.id, question.topicId]));

  const breakdown: TopicScore[] = [];
  for (const { topicId } of state.allocation) {
    const questions = state.questions.filter((question) => question.topicId === topicId).length;
    if (questions === 0) {
      continue;
    }
    const records = state.records.filter((record) => topicOf.get(record.questionId) === topicId);
    const total = records.reduce((sum, record) => sum + record.score, 0);
    breakdown.push({
      topicId,
      name: topics.find((topic) => topic.id === topicId)?.name ?? topicId,
      questions,
      correct: records.filter((record) => record.correct).length,
      score: records.length > 0 ? total / records.length : 0,
    });
  }

  return {
    totalQuestions: state.questions.length,
    answered: state.records.length,
    correctAnswers: state.records.filter((record) => record.correct).length,
    aggregateScore: state.aggregateScore,
    scorePercentage: Math.round(state.aggregateScore * 1000) / 10,
    topics: breakdown,
  };
}

export function reportVerdict(scorePercentage: number): string {
  if (scorePercentage >= 80) {
    return "Excellent work!";
  }
  if (scorePercentage >= 60) {
    return "Good job!";
  }
  return "Keep studying!";
}

/**
 * Render a report for display.
 *
 *   Quiz results: 4/5 correct (80.0%)
 *     - Graphs: 2/3 correct
 *     - Trees: 2/2 correct
 *   Excellent work!
 */
export function formatQuizReport(report: QuizReport): string {
  const lines = [
    `Quiz results: ${report.correctAnswers}/${report.totalQuestions} correct (${report.scorePercentage.toFixed(1)}%)`,
  ];
  for (const topic of report.topics) {
    lines.push(`  - ${topic.name}: ${topic.correct}/${topic.questions} correct`);
  }
  lines.push(reportVerdict(report.scorePercentage));
  return lines.join("\n");
}
