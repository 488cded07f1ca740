/**
 * Configuration Validator
 *
 * Validates a parsed resub config file and resolves it into a Config,
 * falling back to the default for every field that fails validation.
 */

import type { Config } from "../entities/config";
import { createDefaultConfig } from "../entities/config";

/**
 * Validation result for a single field or section.
 */
export interface ValidationIssue {
  /** The path to the invalid field (e.g., "files.globFilter[0]") */
  path: string;

  /** The type of issue: error (invalid, default used) or warning (suboptimal) */
  severity: "error" | "warning";

  /** Human-readable description of the issue */
  message: string;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Overall validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;

  /** List of all issues found */
  issues: ValidationIssue[];

  getErrors(): ValidationIssue[];
  getWarnings(): ValidationIssue[];
}

/**
 * A config file resolved against the defaults.
 */
export interface ResolvedConfig {
  config: Config;
  validation: ValidationResult;
}

const KNOWN_KEYS = ["files", "ignorePaths", "sniffBytes"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): string[] | undefined {
  if (!Array.isArray(value)) {
    issues.push({
      path,
      severity: "error",
      message: "Expected an array of strings",
    });
    return undefined;
  }

  const items: string[] = [];
  value.forEach((item: unknown, i) => {
    if (typeof item === "string") {
      items.push(item);
    } else {
      issues.push({
        path: `${path}[${i}]`,
        severity: "error",
        message: `Expected a string, got ${typeof item}`,
      });
    }
  });

  return items.length === value.length ? items : undefined;
}

/**
 * Validate parsed config JSON and merge it over the defaults.
 *
 * @param raw - Result of JSON.parse on the config file
 */
export function resolveConfig(raw: unknown): ResolvedConfig {
  const config = createDefaultConfig();
  const issues: ValidationIssue[] = [];

  if (!isRecord(raw)) {
    issues.push({
      path: "",
      severity: "error",
      message: "Config must be a JSON object",
    });
    return { config, validation: createValidationResult(issues) };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.includes(key)) {
      issues.push({
        path: key,
        severity: "warning",
        message: `Unknown config key '${key}'`,
        suggestion: `Known keys: ${KNOWN_KEYS.join(", ")}`,
      });
    }
  }

  // files.globFilter
  if (raw.files !== undefined) {
    if (!isRecord(raw.files)) {
      issues.push({
        path: "files",
        severity: "error",
        message: "Expected an object",
        suggestion: 'Use { "globFilter": ["*.ts"] }',
      });
    } else if (raw.files.globFilter !== undefined) {
      const globFilter = readStringList(raw.files.globFilter, "files.globFilter", issues);
      if (globFilter) {
        config.files.globFilter = globFilter;
        globFilter.forEach((clause, i) => {
          if (clause.includes(",")) {
            issues.push({
              path: `files.globFilter[${i}]`,
              severity: "warning",
              message: `Clause '${clause}' contains ',' and will be split into several clauses`,
            });
          }
        });
      }
    }
  }

  // ignorePaths
  if (raw.ignorePaths !== undefined) {
    const ignorePaths = readStringList(raw.ignorePaths, "ignorePaths", issues);
    if (ignorePaths) {
      config.ignorePaths = ignorePaths;
      ignorePaths.forEach((name, i) => {
        if (name.includes("/")) {
          issues.push({
            path: `ignorePaths[${i}]`,
            severity: "warning",
            message: `Ignore path '${name}' contains '/'; only directory names are compared`,
          });
        }
      });
    }
  }

  // sniffBytes
  if (raw.sniffBytes !== undefined) {
    const value = raw.sniffBytes;
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
      issues.push({
        path: "sniffBytes",
        severity: "error",
        message: "Expected a positive integer",
        suggestion: `Default is ${config.sniffBytes}`,
      });
    } else {
      config.sniffBytes = value;
    }
  }

  return { config, validation: createValidationResult(issues) };
}

/**
 * Create a validation result object with helper methods.
 */
function createValidationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");

  return {
    valid: errors.length === 0,
    issues,
    getErrors: () => errors,
    getWarnings: () => warnings,
  };
}

/**
 * Format validation issues for display.
 */
export function formatValidationIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return "Configuration is valid.";
  }

  return issues
    .map((issue) => {
      const marker = issue.severity === "error" ? "✗" : "⚠";
      const where = issue.path === "" ? "config" : issue.path;
      const line = `  ${marker} ${where}: ${issue.message}`;
      return issue.suggestion ? `${line}\n    → ${issue.suggestion}` : line;
    })
    .join("\n");
}
