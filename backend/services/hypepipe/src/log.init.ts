// backend/services/hypepipe/src/log.init.ts

/**
 * Why:
 * - Side-effect init so logs carry { service: "hypepipe" } everywhere.
 */

import { initLogger } from "../../shared/src/utils/logger";
import { SERVICE_NAME } from "./config";

initLogger(SERVICE_NAME);
