import { Effect } from "effect";
import * as Data from "effect/Data";
import { logSuccess } from "~/logging";
import { sts } from "./clients";

export class PreflightError extends Data.TaggedError("PreflightError")<{
  reason: "unauthenticated" | "missing-account";
  message: string;
}> {}

export type CallerIdentity = {
  accountId: string;
  arn: string | undefined;
};

/**
 * Make sure credentials resolve and are accepted before anything is touched.
 */
export const checkIdentity = () =>
  Effect.gen(function* () {
    const identity = yield* sts.make("get_caller_identity", {}).pipe(
      Effect.mapError(error => new PreflightError({
        reason: "unauthenticated",
        message: `AWS credentials are not configured or were rejected (${error.message}). Configure credentials, e.g. with 'aws configure', first.`
      }))
    );

    yield* logSuccess("AWS credentials are configured and working");

    if (!identity.Account) {
      return yield* Effect.fail(new PreflightError({
        reason: "missing-account",
        message: "Could not get AWS account ID"
      }));
    }

    yield* Effect.logInfo(`AWS Account ID: ${identity.Account}`);

    return { accountId: identity.Account, arn: identity.Arn } satisfies CallerIdentity;
  });
