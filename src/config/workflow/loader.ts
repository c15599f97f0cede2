/**
 * Workflow configuration loader and validator.
 *
 * Responsible for:
 * - Merging partial overrides onto the defaults
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { deepFreeze } from "../../utils/freeze.js";
import { DEFAULT_WORKFLOW_CONFIG } from "./defaults.js";
import { WorkflowConfigSchema, type WorkflowConfig } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "invalid_json" / "unreadable" for file problems */
  code: string;
}

/**
 * Structured validation error for workflow configuration.
 */
export class WorkflowConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "WorkflowConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Workflow configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Overlay partial settings onto a base configuration, one section deep:
 * `{ quiz: { questionCount: 5 } }` keeps every other quiz setting.
 * The result is not validated yet.
 */
export function mergeWorkflowConfig(
  overrides: unknown,
  base: WorkflowConfig = DEFAULT_WORKFLOW_CONFIG
): unknown {
  if (!isRecord(overrides)) {
    return overrides;
  }

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

/**
 * Validate and load workflow configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen WorkflowConfig
 * @throws WorkflowConfigError if validation fails
 */
export function loadWorkflowConfig(input: unknown): Readonly<WorkflowConfig> {
  const result = WorkflowConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new WorkflowConfigError(
      `Invalid workflow configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate workflow configuration without loading.
 * Useful for checking config files before starting sessions with them.
 */
export function validateWorkflowConfig(input: unknown): {
  success: boolean;
  config?: WorkflowConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = WorkflowConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Read a JSON file of overrides, merge it onto the defaults and load it.
 *
 * @throws WorkflowConfigError if the file is unreadable, not JSON, or invalid
 */
export function loadWorkflowConfigFile(filePath: string): Readonly<WorkflowConfig> {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new WorkflowConfigError(`Cannot read workflow configuration ${filePath}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "unreadable" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new WorkflowConfigError(`Workflow configuration ${filePath} is not valid JSON`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "invalid_json" },
    ]);
  }

  return loadWorkflowConfig(mergeWorkflowConfig(parsed));
}
