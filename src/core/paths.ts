import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  home: string;
};

export type ResolveHomeOptions = {
  home?: string;
  repoPath?: string;
  env?: NodeJS.ProcessEnv;
};

export const HOME_ENV_VAR = "DEPLOY_SCOPE_HOME";

export const STATE_DIR_NAME = ".deploy-scope";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveDeployScopeHome(opts: ResolveHomeOptions = {}): string {
  if (opts.home) {
    return path.resolve(opts.home);
  }

  const envHome = (opts.env ?? process.env)[HOME_ENV_VAR];
  if (envHome && envHome.length > 0) {
    return path.resolve(envHome);
  }

  if (opts.repoPath) {
    return path.join(path.resolve(opts.repoPath), STATE_DIR_NAME);
  }

  return path.join(os.homedir(), STATE_DIR_NAME);
}

export function createPathsContext(opts: ResolveHomeOptions = {}): PathsContext {
  return { home: resolveDeployScopeHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function repoConfigPath(repoPath: string): string {
  return path.join(path.resolve(repoPath), STATE_DIR_NAME, "config.yaml");
}

export function runsDir(paths: PathsContext): string {
  return path.join(paths.home, "runs");
}

export function runDir(traceId: string, paths: PathsContext): string {
  return path.join(runsDir(paths), traceId);
}

export function runEventsPath(traceId: string, paths: PathsContext): string {
  return path.join(runDir(traceId, paths), "events.jsonl");
}

// Latest by events file mtime; custom run ids need not sort by time.
export async function findLatestRunId(paths: PathsContext): Promise<string | null> {
  const dir = runsDir(paths);
  if (!(await fse.pathExists(dir))) return null;

  const entries = await fse.readdir(dir);
  let latest: { runId: string; mtimeMs: number } | null = null;

  for (const runId of entries) {
    const eventsPath = runEventsPath(runId, paths);
    if (!(await fse.pathExists(eventsPath))) continue;

    const stat = await fse.stat(eventsPath);
    if (!latest || stat.mtimeMs > latest.mtimeMs) {
      latest = { runId, mtimeMs: stat.mtimeMs };
    }
  }

  return latest?.runId ?? null;
}
