// backend/services/hypepipe/src/bootstrap.ts

/**
 * Why:
 * - Side-effect import, first line of the entrypoint: load the env cascade
 *   (repo root → backend/services → backend/services/hypepipe) before the
 *   logger or config read anything.
 * - Must not import the logger; LOG_LEVEL is read when it loads.
 */

import path from "path";
import { loadEnvCascadeForService } from "../../shared/src/env";

const loaded = loadEnvCascadeForService(path.resolve(__dirname, ".."));

if (process.env.LOG_LEVEL === "debug" || process.env.LOG_LEVEL === "trace") {
  // eslint-disable-next-line no-console
  console.log(`[bootstrap] env files loaded: ${loaded.join(", ") || "(none)"}`);
}
