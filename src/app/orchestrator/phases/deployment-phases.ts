/**
 * Deployment phases: the fixed sequence the orchestrator runs, one TaskScope each.
 * Purpose: map each deployment step onto guarded git commands.
 * Assumptions: phase bodies only spawn; dependent steps await the previous handle's outcome.
 * Usage: new Orchestrator({ ..., phases: createDeploymentPhases(env) }).
 */

import type { ExecutionMode } from "../../../core/context.js";
import type { TaskHandle, TaskScope } from "../../../core/task-scope.js";
import type { GuardedActionExecutor } from "../actions/guarded-action.js";
import type { RepoInspector } from "../ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type PhaseDefinition = {
  name: string;
  run(scope: TaskScope): Promise<void>;
};

export type DeploySettings = {
  repoPath: string;
  remoteUrl: string;
  remoteName: string;
  mainBranch: string;
  commitMessage: string;
};

export type DeploymentPhaseEnv = {
  actions: GuardedActionExecutor;
  repo: RepoInspector;
  settings: DeploySettings;
};

export const DEPLOYMENT_PHASE_NAMES = [
  "meta_analysis",
  "repo_prep",
  "commit",
  "remote_deploy",
] as const;

const PIPELINE_CONCERNS = [
  "context preservation across deployments",
  "cancellation semantics for interrupted pushes",
  "resource cleanup for abandoned steps",
  "observability of deployment causality",
  "validation of destructive operations",
];

// =============================================================================
// PUBLIC API
// =============================================================================

export function createDeploymentPhases(env: DeploymentPhaseEnv): PhaseDefinition[] {
  const { actions, repo, settings } = env;

  return [
    {
      name: "meta_analysis",
      run: async (scope) => {
        await scope.emit("analysis.report", {
          concerns: PIPELINE_CONCERNS,
          phases: [...DEPLOYMENT_PHASE_NAMES],
        });
      },
    },
    {
      name: "repo_prep",
      run: async (scope) => {
        if (!(await repo.isGitRepo(settings.repoPath))) {
          const init = scope.spawn("git_init", (task) =>
            actions.run(task, { file: "git", args: ["init"] }),
          );
          if (!(await completed(init))) return;
        }

        scope.spawn("git_add", (task) => actions.run(task, { file: "git", args: ["add", "."] }));
      },
    },
    {
      name: "commit",
      run: async (scope) => {
        scope.spawn("git_commit", (task) =>
          actions.run(
            task,
            { file: "git", args: ["commit", "-m", settings.commitMessage] },
            `Record deployment commit for trace ${task.context.traceId}`,
          ),
        );
      },
    },
    {
      name: "remote_deploy",
      run: async (scope) => {
        const existing = await repo.getRemoteUrl(settings.repoPath, settings.remoteName);
        if (existing === null) {
          const addRemote = scope.spawn("add_remote", (task) =>
            actions.run(task, {
              file: "git",
              args: ["remote", "add", settings.remoteName, settings.remoteUrl],
            }),
          );
          if (!(await completed(addRemote))) return;
        }

        const branch = scope.spawn("git_branch", (task) =>
          actions.run(task, { file: "git", args: ["branch", "-M", settings.mainBranch] }),
        );
        if (!(await completed(branch))) return;

        scope.spawn("git_push", (task) =>
          actions.run(task, {
            file: "git",
            args: ["push", "-u", settings.remoteName, settings.mainBranch],
          }),
        );
      },
    },
  ];
}

export function renderCommitMessage(
  template: string,
  values: { traceId: string; mode: ExecutionMode; repo: string },
): string {
  return template
    .replaceAll("{trace_id}", values.traceId)
    .replaceAll("{mode}", values.mode)
    .replaceAll("{repo}", values.repo);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function completed(handle: TaskHandle<unknown>): Promise<boolean> {
  const outcome = await handle.outcome;
  return outcome.status === "completed";
}
