import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { main } from "../index.js";

const tempDirs: string[] = [];

afterEach(() => {
  vi.restoreAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-main-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.yaml");
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

describe("main", () => {
  it("runs the validate command against the configured policy", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const configPath = writeConfig("repo_path: .\ngateway:\n  self_preservation: [git push]\n");

    await main(["node", "deploy-scope", "--config", configPath, "validate", "git push origin main"]);

    expect(log.mock.calls).toEqual([
      [
        'Rejected (self_preservation): Self-preservation veto: "git push origin main" matches protected pattern "git push"',
      ],
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("renders user-facing errors and exits 1", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const configPath = writeConfig("repo_path: .\nunknown_key: true\n");

    await main(["node", "deploy-scope", "--config", configPath, "validate", "git status"]);

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toContain("Project config invalid.");
    expect(process.exitCode).toBe(1);
  });

  it("rejects an unknown execution mode through commander", async () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await main(["node", "deploy-scope", "plan", "write notes", "--mode", "wizard"]);

    expect(process.exitCode).toBe(1);
    expect(stderr.mock.calls.map((call) => String(call[0])).join("")).toContain(
      "Expected one of firefighter, surgeon, architect, student, manager.",
    );
  });
});
