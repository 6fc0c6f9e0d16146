/**
 * Action runtime entry point (`node dist/main.js` in action.yml).
 */

import * as core from "@actions/core";
import { run } from "./action.js";

run().catch((error: unknown) => {
  core.setFailed(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
});
