import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

const ENV_REFERENCE = /\$\{([A-Z0-9_]+)\}/gi;

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `Project config not found at ${absolutePath}.`,
      hint: "Create .deploy-scope/config.yaml in the repo or pass --config <path>.",
    });
  }

  try {
    const doc = parseYaml(readConfigFile(absolutePath), absolutePath);
    const expanded = substituteEnv(doc ?? {}, [], absolutePath);

    const parsed = ProjectConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = parsed.error.issues.map(describeIssue).join("\n");
      throw new ConfigError(`Invalid project config at ${absolutePath}:\n${details}`, parsed.error);
    }

    // repo_path is relative to the config file, not the working directory.
    const config = parsed.data;
    return { ...config, repo_path: path.resolve(path.dirname(absolutePath), config.repo_path) };
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Project config at ${absolutePath} is invalid.`,
      hint: "Fix the config file and rerun.",
      cause: err,
    });
  }
}

export function defaultProjectConfig(repoPath: string): ProjectConfig {
  return ProjectConfigSchema.parse({ repo_path: path.resolve(repoPath) });
}

// =============================================================================
// INTERNALS
// =============================================================================

function readConfigFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read project config at ${filePath}`, err);
  }
}

function parseYaml(raw: string, filePath: string): unknown {
  try {
    return yaml.load(raw);
  } catch (err) {
    if (!(err instanceof yaml.YAMLException)) {
      throw new ConfigError(`Failed to parse YAML config at ${filePath}: ${String(err)}`, err);
    }
    // js-yaml marks are zero-based.
    const { line, column } = err.mark;
    throw new ConfigError(
      `Failed to parse YAML config at ${filePath} (line ${line + 1}, column ${column + 1}): ${err.message}`,
      err,
    );
  }
}

// Replaces ${VAR} references in every string value; unset variables are config errors.
function substituteEnv(value: unknown, keyPath: string[], filePath: string): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REFERENCE, (_match, name: string) => {
      const resolved = process.env[name];
      if (resolved !== undefined) return resolved;
      const location = keyPath.length > 0 ? keyPath.join(".") : "<root>";
      throw new ConfigError(
        `Environment variable ${name} is not set but is referenced in ${filePath} (${location}).`,
      );
    });
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => substituteEnv(item, [...keyPath, String(index)], filePath));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, child]) => [
        key,
        substituteEnv(child, [...keyPath, key], filePath),
      ]),
    );
  }
  return value;
}

function describeIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
  switch (issue.code) {
    case "invalid_type":
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    case "invalid_enum_value":
      return `${location}: Expected one of ${issue.options.map((option) => JSON.stringify(option)).join(", ")}, received ${JSON.stringify(issue.received)}`;
    case "unrecognized_keys":
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    default:
      return `${location}: ${issue.message}`;
  }
}
