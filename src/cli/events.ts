import fs from "node:fs";

import type { AppContext } from "../app/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { readJsonlFile } from "../core/log-query.js";
import { findLatestRunId, runEventsPath } from "../core/paths.js";

export type EventsCommandOptions = {
  runId?: string;
  type?: string;
  span?: string;
};

export async function eventsCommand(
  appContext: AppContext,
  opts: EventsCommandOptions = {},
  write: (line: string) => void = console.log,
): Promise<string[]> {
  const { paths } = appContext;
  const runId = opts.runId ?? (await findLatestRunId(paths));
  if (!runId) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "No runs found.",
      message: `No run logs exist under ${paths.home}.`,
      hint: "Run deploy-scope deploy or deploy-scope plan first.",
    });
  }

  const eventsPath = runEventsPath(runId, paths);
  if (!fs.existsSync(eventsPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Run not found.",
      message: `No event log for run ${runId} at ${eventsPath}.`,
    });
  }

  const lines = readJsonlFile(eventsPath, { typeGlob: opts.type, spanId: opts.span });
  for (const line of lines) {
    write(line);
  }
  return lines;
}
