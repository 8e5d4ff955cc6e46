/**
 * AppContext resolves repo-scoped config + paths without mutating globals.
 * Purpose: make the repo and the state home explicit for CLI and core consumers.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { createPathsContext, type PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  // Null when the built-in defaults were used.
  configPath: string | null;
  config: ProjectConfig;
  repoPath: string;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string | null;
  config: ProjectConfig;
  home?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const repoPath = path.resolve(input.config.repo_path);

  return {
    configPath: input.configPath === null ? null : path.resolve(input.configPath),
    config: input.config,
    repoPath,
    paths: createPathsContext({ home: input.home, repoPath, env: input.env }),
  };
}
