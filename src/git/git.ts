import path from "node:path";

import { execa, type Options } from "execa";
import fse from "fs-extra";

import { GitError } from "../core/errors.js";

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: String(res.stdout ?? ""),
      stderr: String(res.stderr ?? ""),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    const { stdout, stderr } = readProcessOutput(err);
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${stderr}`, { stdout, stderr });
  }
}

export async function isGitRepo(repoPath: string): Promise<boolean> {
  return fse.pathExists(path.join(repoPath, ".git"));
}

// `git config --get` exits 1 when the key is unset; anything else is a real failure.
export async function getRemoteUrl(cwd: string, remote = "origin"): Promise<string | null> {
  const res = await git(cwd, ["config", "--get", `remote.${remote}.url`], { reject: false });
  if (res.exitCode === 1) return null;
  if (res.exitCode !== 0) {
    throw new GitError(
      `git config --get remote.${remote}.url failed (cwd=${cwd}): ${res.stderr}`,
      res,
    );
  }

  const url = res.stdout.trim();
  return url.length > 0 ? url : null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function readProcessOutput(err: unknown): { stdout: string; stderr: string } {
  if (!(err instanceof Error)) {
    return { stdout: "", stderr: String(err) };
  }

  const stdout = "stdout" in err && typeof err.stdout === "string" ? err.stdout : "";
  const stderr = "stderr" in err && typeof err.stderr === "string" && err.stderr.length > 0
    ? err.stderr
    : err.message;
  return { stdout, stderr };
}
