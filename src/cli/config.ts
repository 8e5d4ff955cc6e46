import fs from "node:fs";
import path from "node:path";

import { createAppContext, type AppContext } from "../app/context.js";
import type { ProjectConfig } from "../core/config.js";
import { defaultProjectConfig, loadProjectConfig } from "../core/config-loader.js";
import { repoConfigPath } from "../core/paths.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// Order: --config, then <cwd>/.deploy-scope/config.yaml, then built-in defaults
// rooted at the working directory.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  repoOverride?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedCliConfig = {
  appContext: AppContext;
  config: ProjectConfig;
  configPath: string | null;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): LoadedCliConfig {
  const cwd = args.cwd ?? process.cwd();
  const configPath = resolveConfigPath(cwd, args.explicitConfigPath);

  const loaded = configPath ? loadProjectConfig(configPath) : defaultProjectConfig(cwd);
  const config: ProjectConfig = args.repoOverride
    ? { ...loaded, repo_path: path.resolve(cwd, args.repoOverride) }
    : loaded;

  return {
    appContext: createAppContext({ configPath, config, env: args.env }),
    config,
    configPath,
  };
}

function resolveConfigPath(cwd: string, explicitPath?: string): string | null {
  if (explicitPath) {
    return path.resolve(cwd, explicitPath);
  }

  const repoConfig = repoConfigPath(cwd);
  return fs.existsSync(repoConfig) ? repoConfig : null;
}
