import { z } from "zod";

import { GatewayPolicySchema } from "../gateway/policy.js";

import { EXECUTION_MODES } from "./context.js";

export const DEFAULT_COMMIT_MESSAGE = [
  "Deploy {repo}",
  "",
  "Trace ID: {trace_id}",
  "Deployment Context: {mode}",
].join("\n");

export const ProjectConfigSchema = z
  .object({
    repo_path: z.string().min(1),
    remote_url: z.string().min(1).optional(),
    remote_name: z.string().min(1).default("origin"),
    main_branch: z.string().min(1).default("main"),

    mode: z.enum(EXECUTION_MODES).default("architect"),

    // Per-command budget; exceeding it cancels the task rather than failing it.
    command_timeout_seconds: z.number().int().positive().default(300),
    phase_timeout_seconds: z.number().int().positive().optional(),

    commit_message: z.string().min(1).default(DEFAULT_COMMIT_MESSAGE),

    gateway: GatewayPolicySchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
