import { Context, Effect, Layer } from "effect";
import * as Terminal from "@effect/platform/Terminal";
import type { TeardownTarget } from "~/config";
import { logGroupNameFor } from "~/aws";

/**
 * Show the question on the terminal and read one line. A closed input or
 * Ctrl+C yields an empty reply.
 */
export const askOnTerminal = (terminal: Pick<Terminal.Terminal, "display" | "readLine">) =>
  (question: string): Effect.Effect<string> =>
    terminal.display(question).pipe(
      Effect.zipRight(terminal.readLine),
      Effect.catchAll(error =>
        Effect.logDebug(`No answer read from terminal: ${error._tag}`).pipe(Effect.as(""))
      )
    );

/**
 * Asks the operator a question and returns the raw reply.
 */
export class Confirmation extends Context.Tag("Confirmation")<Confirmation, {
  readonly ask: (question: string) => Effect.Effect<string>;
}>() {
  /** Non-interactive runs (`--yes`). */
  static AlwaysYes = Layer.succeed(Confirmation, { ask: () => Effect.succeed("yes") });

  static Terminal = Layer.effect(
    Confirmation,
    Effect.map(Terminal.Terminal, terminal => ({ ask: askOnTerminal(terminal) }))
  );
}

export const CONFIRMATION_QUESTION = "Are you sure you want to continue? (yes/no): ";

export const isAffirmative = (reply: string): boolean => /^yes$/i.test(reply.trim());

/**
 * List what is about to be destroyed and ask for an explicit "yes".
 */
export const confirmTeardown = (target: TeardownTarget) =>
  Effect.gen(function* () {
    const confirmation = yield* Confirmation;

    yield* Effect.logWarning("This will destroy the following AWS resources:");
    yield* Effect.logWarning(`  - Lambda function: ${target.functionName}`);
    yield* Effect.logWarning(`  - API Gateway: ${target.apiName}`);
    yield* Effect.logWarning(`  - IAM role: ${target.roleName}`);
    yield* Effect.logWarning("  - Lambda permissions for API Gateway");
    yield* Effect.logWarning(`  - CloudWatch logs: ${logGroupNameFor(target.functionName)}`);
    yield* Effect.logWarning("This action cannot be undone!");

    const reply = yield* confirmation.ask(CONFIRMATION_QUESTION);
    return isAffirmative(reply);
  });
