import { afterEach, beforeEach } from "vitest";

import { HOME_ENV_VAR } from "../src/core/paths.js";

// =============================================================================
// PROCESS STATE ISOLATION
// =============================================================================

let originalHome: string | undefined;

beforeEach(() => {
  originalHome = process.env[HOME_ENV_VAR];
  // Tests opt in to a home explicitly; never write into the developer's repo.
  delete process.env[HOME_ENV_VAR];
  process.exitCode = undefined;
});

afterEach(() => {
  if (originalHome === undefined) {
    delete process.env[HOME_ENV_VAR];
  } else {
    process.env[HOME_ENV_VAR] = originalHome;
  }
  process.exitCode = undefined;
});
