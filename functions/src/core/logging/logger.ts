// functions/src/core/logging/logger.ts
import * as logger from "firebase-functions/logger";

/**
 * Central logger for the core.
 * Only this file depends on firebase-functions/logger; everything else imports from here.
 */
export { logger };
