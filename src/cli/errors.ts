import * as Data from "effect/Data";

/**
 * Raised once the reason was already logged; only sets the exit code.
 */
export class CommandFailed extends Data.TaggedError("CommandFailed")<{
  message: string;
}> {}
