#!/usr/bin/env node
/**
 * CLI command to check a workflow configuration file and, optionally, a
 * saved session before either is used.
 *
 * Validates:
 * - Workflow tuning file (merged onto the defaults)
 * - Saved session record (schema and version)
 *
 * Reports:
 * - Effective question count, feedback round limit and difficulty mix
 * - Session summary: phase, topics, quiz progress, warnings
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config -- --session output/sessions/session-abc.json
 *
 * Options:
 *   --config <path>   Workflow configuration JSON (default: $WORKFLOW_CONFIG or config/workflow.json)
 *   --session <path>  Saved session JSON to validate and summarize
 *   --session-id <id> Saved session looked up under $STATE_DIR
 *   --json            Output the report as JSON
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  createAppLogger,
  loadConfig,
  loadWorkflowConfigFile,
  validateConfig,
  WorkflowConfigError,
  type WorkflowConfig,
} from "../config/index.js";
import { isWorkflowError } from "../types/errors.js";
import { assertSessionId } from "../workflow/ids.js";
import { deserializeWorkflowState, summarizeWorkflowState } from "../workflow/serialization.js";
import { getSessionFilename } from "../workflow/store.js";

// ============================================================
// Types
// ============================================================

export interface ValidationStep {
  component: "workflow-config" | "session";
  path: string;
  success: boolean;
  message: string;
  details: string[];
}

export interface ValidationReport {
  steps: ValidationStep[];
  passed: number;
  failed: number;
}

export interface ValidationOptions {
  configPath: string;
  sessionPath?: string;
}

// ============================================================
// Validation
// ============================================================

function describeConfig(config: Readonly<WorkflowConfig>): string[] {
  const { easy, medium, hard } = config.quiz.difficultyDistribution;
  return [
    `Target topics: ${config.extraction.targetTopicCount} (batches of ${config.extraction.batchSize})`,
    `Feedback round limit: ${config.negotiation.maxFeedbackRounds}`,
    `Questions: ${config.quiz.questionCount}, at least ${config.quiz.minQuestionsPerTopic} per topic`,
    `Difficulty mix: easy ${easy}, medium ${medium}, hard ${hard}`,
  ];
}

function checkWorkflowConfig(path: string): ValidationStep {
  try {
    const config = loadWorkflowConfigFile(path);
    return {
      component: "workflow-config",
      path,
      success: true,
      message: "Workflow configuration is valid",
      details: describeConfig(config),
    };
  } catch (err) {
    if (err instanceof WorkflowConfigError) {
      return {
        component: "workflow-config",
        path,
        success: false,
        message: err.message,
        details: err.issues.map(
          (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
        ),
      };
    }
    throw err;
  }
}

function checkSession(path: string): ValidationStep {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    return {
      component: "session",
      path,
      success: false,
      message: `Cannot read session file ${path}`,
      details: [err instanceof Error ? err.message : String(err)],
    };
  }

  try {
    const state = deserializeWorkflowState(text);
    return {
      component: "session",
      path,
      success: true,
      message: `Session ${state.sessionId} is valid`,
      details: summarizeWorkflowState(state).split("\n"),
    };
  } catch (err) {
    if (isWorkflowError(err)) {
      return { component: "session", path, success: false, message: err.message, details: [] };
    }
    throw err;
  }
}

/**
 * Run every requested check and collect the results.
 */
export function runValidation(options: ValidationOptions): ValidationReport {
  const steps = [checkWorkflowConfig(options.configPath)];
  if (options.sessionPath !== undefined) {
    steps.push(checkSession(options.sessionPath));
  }
  const passed = steps.filter((step) => step.success).length;
  return { steps, passed, failed: steps.length - passed };
}

// ============================================================
// Output
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
} as const;

function c(color: keyof typeof COLORS, text: string): string {
  return `${COLORS[color]}${text}${COLORS.reset}`;
}

function printReport(report: ValidationReport): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Workflow Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");

  for (const step of report.steps) {
    const mark = step.success ? c("green", "✓") : c("red", "✗");
    console.log(`${mark} ${c("bold", step.component)}: ${step.message}`);
    console.log(`  ${c("dim", step.path)}`);
    for (const detail of step.details) {
      console.log(`    ${detail}`);
    }
    console.log("");
  }

  console.log("─".repeat(60));
  if (report.failed === 0) {
    console.log(c("green", `✓ All validations passed (${report.passed}/${report.passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${report.failed} error(s)`));
  }
  console.log("─".repeat(60));
}

// ============================================================
// Entry point
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      session: { type: "string" },
      "session-id": { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --config <path>   Workflow configuration JSON (default: $WORKFLOW_CONFIG or config/workflow.json)
  --session <path>  Saved session JSON to validate and summarize
  --session-id <id> Saved session looked up under $STATE_DIR
  --json            Output the report as JSON
  -h, --help        Show this help message
`);
    process.exit(0);
  }

  return values;
}

function main(): void {
  const args = parseCliArgs();
  const appConfig = loadConfig();
  validateConfig(appConfig);
  const logger = createAppLogger(appConfig).child({ command: "validate-config" });

  let sessionPath = args.session;
  const sessionId = args["session-id"];
  if (sessionPath === undefined && sessionId !== undefined) {
    assertSessionId(sessionId);
    sessionPath = join(appConfig.stateDir, getSessionFilename(sessionId));
  }

  const report = runValidation({
    configPath: resolve(args.config ?? appConfig.workflowConfigPath),
    ...(sessionPath !== undefined ? { sessionPath: resolve(sessionPath) } : {}),
  });
  logger.debug("Validation finished", { passed: report.passed, failed: report.failed });

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }

  process.exit(report.failed > 0 ? 1 : 0);
}

const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("validate-config.ts") || process.argv[1].endsWith("validate-config.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  }
}
