import { Effect } from "effect";

/**
 * Log annotation that marks an info line as a completed action, so the CLI
 * logger can print it as `[SUCCESS]`.
 */
export const STATUS_ANNOTATION = "status";

export const logSuccess = (message: string) =>
  Effect.logInfo(message).pipe(Effect.annotateLogs(STATUS_ANNOTATION, "success"));
